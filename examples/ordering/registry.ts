/**
 * Ordering example - handler registration
 */

import { EventHandlerRegistry } from '../../src';
import {
  AllocateStock,
  OrderConfirmationRequested,
  OrderCreated,
  OrderStamped,
  RecalculateTax,
  StockCheck,
} from './domain';
import {
  AllocateStockHandler,
  ConfirmationSender,
  OrderCreatedHandler,
  RecalculateTaxHandler,
  RecalculateTaxHandlerAsync,
  SendOrderConfirmationHandler,
  StampOrderHandler,
  StockCheckHandler,
  StockLookup,
  TaxRateLookup,
} from './handlers';

export interface OrderingServices {
  readonly stock: StockLookup;
  readonly taxRates: TaxRateLookup;
  readonly confirmations: ConfirmationSender;
  readonly clock?: () => string;
}

export interface OrderingRegistryOptions {
  /** Register the async tax handler instead of the sync one */
  readonly asyncTax?: boolean;
}

export function createOrderingRegistry(
  services: OrderingServices,
  options: OrderingRegistryOptions = {},
): EventHandlerRegistry {
  const clock = services.clock ?? (() => new Date().toISOString());
  const registry = new EventHandlerRegistry()
    .addBeforeCommitHandler(StockCheck, new StockCheckHandler(services.stock))
    .addBeforeCommitHandler(OrderCreated, new OrderCreatedHandler())
    .addBeforeCommitHandler(AllocateStock, () => new AllocateStockHandler(services.stock))
    .addDuringCommitHandler(OrderStamped, new StampOrderHandler(clock))
    .addAfterCommitHandler(
      OrderConfirmationRequested,
      new SendOrderConfirmationHandler(services.confirmations),
    );

  return options.asyncTax
    ? registry.addBeforeCommitHandler(
        RecalculateTax,
        () => new RecalculateTaxHandlerAsync(services.taxRates),
      )
    : registry.addBeforeCommitHandler(RecalculateTax, new RecalculateTaxHandler(services.taxRates));
}
