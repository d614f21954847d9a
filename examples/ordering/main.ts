/**
 * Ordering example
 *
 * Demonstrates:
 * - entities queuing before, during and after-commit events
 * - a three-pass before-commit cascade
 * - a handler error stopping the commit
 * - the commit exception handler for a unit-of-work type
 *
 * Run with any TypeScript runner, e.g. `ts-node examples/ordering/main.ts`.
 */

import {
  EventRunnerConfigBuilder,
  EventsRunner,
  StatusGeneric,
  consoleLogger,
} from '../../src';
import { Order, ProductStock, TaxRate } from './domain';
import { InMemoryOrderStore, InMemoryOrderUnitOfWork } from './InMemoryOrderUnitOfWork';
import { createOrderingRegistry } from './registry';

async function main(): Promise<void> {
  console.log('═══════════════════════════════════════════════════════════');
  console.log('  Domain Event Runner - Ordering Example');
  console.log('═══════════════════════════════════════════════════════════\n');

  const store = new InMemoryOrderStore()
    .addStock(new ProductStock('Widget', 3))
    .addStock(new ProductStock('Gadget', 20))
    .addTaxRate(new TaxRate('AB1 2CD', 20));

  const sent: string[] = [];
  const registry = createOrderingRegistry({
    stock: store,
    taxRates: store,
    confirmations: { send: (orderId) => sent.push(orderId) },
  });

  const config = new EventRunnerConfigBuilder()
    .withMaxBeforeCommitCascadeIterations(6)
    .registerCommitExceptionHandler(InMemoryOrderUnitOfWork, (error) =>
      new StatusGeneric().addError(
        `The order could not be saved: ${error instanceof Error ? error.message : String(error)}`,
      ),
    )
    .build();

  const runner = new EventsRunner(registry, config, consoleLogger);

  // 1. Valid order: OrderCreated → AllocateStock → RecalculateTax, then save
  console.log('--- Order 1: 5 Gadgets ---');
  const first = Order.place('order-1', 'AB1 2CD', [{ productName: 'Gadget', numOrdered: 5 }]);
  const uow1 = new InMemoryOrderUnitOfWork(runner, store).attach(first);
  const status1 = await uow1.commitWithStatusAsync();
  console.log('Valid:', status1.isValid, '|', status1.message, '| saved:', status1.result);
  console.log('Tax rate applied:', first.taxRatePercent, '| confirmations sent:', sent);
  console.log();

  // 2. Not enough stock: the commit never happens
  console.log('--- Order 2: 10 Widgets, 3 in stock ---');
  const second = new Order('order-2', 'AB1 2CD');
  second.addLine('Widget', 10);
  const uow2 = new InMemoryOrderUnitOfWork(runner, store).attach(second);
  const status2 = uow2.commitWithStatus();
  console.log('Valid:', status2.isValid, '|', status2.message);
  console.log('Errors:', status2.getAllErrors(' / '));
  console.log('Saved orders so far:', store.saveCount);

  console.log('\n═══════════════════════════════════════════════════════════');
  console.log('  Demo Complete!');
  console.log('═══════════════════════════════════════════════════════════\n');
}

// Run
main().catch(console.error);
