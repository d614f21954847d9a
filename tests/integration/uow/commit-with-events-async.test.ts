/**
 * @fileoverview Integration tests for the async commit
 *
 * The async commit accepts async handlers and awaits the save; the blocking
 * commit must refuse them.
 */

import {
  EventRunnerStatusException,
  EventsRunner,
  HandlerModeException,
  UnitOfWorkState,
  createEventRunnerConfig,
} from '../../../src';
import { Order, ProductStock, TaxRate } from '../../../examples/ordering/domain';
import {
  InMemoryOrderStore,
  InMemoryOrderUnitOfWork,
} from '../../../examples/ordering/InMemoryOrderUnitOfWork';
import { createOrderingRegistry } from '../../../examples/ordering/registry';
import { RecordingLogger } from '../../support/RecordingLogger';

describe('Async Unit of Work + Events Runner Integration', () => {
  let store: InMemoryOrderStore;
  let logger: RecordingLogger;
  let sent: string[];
  let runner: EventsRunner;

  beforeEach(() => {
    store = new InMemoryOrderStore()
      .addStock(new ProductStock('Widget', 3))
      .addStock(new ProductStock('Gadget', 20))
      .addTaxRate(new TaxRate('AB1 2CD', 17.5));
    logger = new RecordingLogger();
    sent = [];
    const registry = createOrderingRegistry(
      {
        stock: store,
        taxRates: store,
        confirmations: { send: (orderId) => void sent.push(orderId) },
        clock: () => '2026-03-01T09:00:00.000Z',
      },
      { asyncTax: true },
    );
    runner = new EventsRunner(registry, createEventRunnerConfig(), logger);
  });

  it('should run async handlers and save', async () => {
    const order = Order.place('order-1', 'AB1 2CD', [{ productName: 'Gadget', numOrdered: 2 }]);
    const uow = new InMemoryOrderUnitOfWork(runner, store, logger).attach(order);

    const saved = await uow.commitAsync();

    expect(saved).toBe(1);
    expect(order.taxRatePercent).toBe(17.5);
    expect(sent).toEqual(['order-1']);
    expect(logger.messages('info')).toEqual([
      'About to run the BeforeCommit event handler OrderCreatedHandler.',
      'About to run the BeforeCommit event handler AllocateStockHandler.',
      'About to run the BeforeCommit event handler RecalculateTaxHandlerAsync.',
      'About to run the DuringCommit event handler StampOrderHandler.',
      'Saved 1 order(s).',
      'About to run the AfterCommit event handler SendOrderConfirmationHandler.',
    ]);
    expect(uow.state).toBe(UnitOfWorkState.Committed);
  });

  it('should return the error without saving', async () => {
    const order = new Order('order-2', 'AB1 2CD');
    order.addLine('Widget', 10);
    const uow = new InMemoryOrderUnitOfWork(runner, store, logger).attach(order);

    const status = await uow.commitWithStatusAsync();

    expect(status).toHaveStatusError('Not enough stock for Widget: 10 ordered, 3 in stock.');
    expect(store.saveCount).toBe(0);
  });

  it('should reject commitAsync with the status', async () => {
    const order = new Order('order-2', 'AB1 2CD');
    order.addLine('Widget', 10);
    const uow = new InMemoryOrderUnitOfWork(runner, store, logger).attach(order);

    await expect(uow.commitAsync()).rejects.toBeInstanceOf(EventRunnerStatusException);
    expect(uow.state).toBe(UnitOfWorkState.Rejected);
  });

  it('should refuse the async handler from the blocking commit', () => {
    const order = Order.place('order-3', 'AB1 2CD', [{ productName: 'Gadget', numOrdered: 2 }]);
    const uow = new InMemoryOrderUnitOfWork(runner, store, logger).attach(order);

    expect(() => uow.commit()).toThrow(
      new HandlerModeException(
        'The BeforeCommit event handler RecalculateTaxHandlerAsync is asynchronous ' +
          'and can only be run by the async commit.',
        'RecalculateTaxHandlerAsync',
      ),
    );
    expect(store.saveCount).toBe(0);
    expect(uow.state).toBe(UnitOfWorkState.Failed);
  });
});
