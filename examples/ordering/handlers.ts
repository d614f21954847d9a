/**
 * Ordering example - event handlers
 */

import {
  EntityEvents,
  EventHandlerConfig,
  IAfterCommitEventHandler,
  IBeforeCommitEventHandler,
  IBeforeCommitEventHandlerAsync,
  IDuringCommitEventHandler,
  IEventsEntity,
  IStatusGeneric,
  StatusGeneric,
} from '../../src';
import {
  AllocateStock,
  Order,
  OrderConfirmationRequested,
  OrderCreated,
  OrderStamped,
  ProductStock,
  RecalculateTax,
  StockCheck,
  TaxRate,
} from './domain';

// ============================================================================
// Ports used by the handlers
// ============================================================================

export interface StockLookup {
  findStock(productName: string): ProductStock | undefined;
}

export interface TaxRateLookup {
  findTaxRate(postcode: string): TaxRate | undefined;
}

export interface ConfirmationSender {
  send(orderId: string): void;
}

export function notEnoughStockMessage(
  productName: string,
  numOrdered: number,
  available: number,
): string {
  return `Not enough stock for ${productName}: ${numOrdered} ordered, ${available} in stock.`;
}

export function noTaxRateMessage(postcode: string): string {
  return `No tax rate is defined for the postcode ${postcode}.`;
}

// ============================================================================
// Before commit
// ============================================================================

export class StockCheckHandler implements IBeforeCommitEventHandler<StockCheck> {
  constructor(private readonly stock: StockLookup) {}

  handle(_callingEntity: IEventsEntity, domainEvent: StockCheck): IStatusGeneric {
    const status = new StatusGeneric();
    const { productName, quantity } = domainEvent.payload;
    const available = this.stock.findStock(productName)?.available ?? 0;
    if (available < quantity) {
      status.addError(notEnoughStockMessage(productName, quantity, available), 'quantity');
    }
    return status;
  }
}

/**
 * Splits a new order into one stock allocation per line.
 */
export class OrderCreatedHandler implements IBeforeCommitEventHandler<OrderCreated> {
  handle(callingEntity: IEventsEntity, domainEvent: OrderCreated): void {
    if (!(callingEntity instanceof EntityEvents)) {
      return;
    }
    const { orderId, lines } = domainEvent.payload;
    for (const line of lines) {
      callingEntity.enqueueBefore(
        new AllocateStock({ orderId, productName: line.productName, numOrdered: line.numOrdered }),
      );
    }
  }
}

export class AllocateStockHandler implements IBeforeCommitEventHandler<AllocateStock> {
  constructor(private readonly stock: StockLookup) {}

  handle(callingEntity: IEventsEntity, domainEvent: AllocateStock): IStatusGeneric {
    const status = new StatusGeneric();
    const { orderId, productName, numOrdered } = domainEvent.payload;

    const stock = this.stock.findStock(productName);
    if (stock === undefined) {
      return status.addError(`Could not find the product ${productName}.`, 'productName');
    }
    if (stock.available < numOrdered) {
      return status.addError(
        notEnoughStockMessage(productName, numOrdered, stock.available),
        'numOrdered',
      );
    }

    stock.allocate(numOrdered);
    if (callingEntity instanceof Order) {
      callingEntity.enqueueBefore(
        new RecalculateTax({ orderId, deliveryPostcode: callingEntity.deliveryPostcode }),
      );
    }
    return status;
  }
}

export class RecalculateTaxHandler implements IBeforeCommitEventHandler<RecalculateTax> {
  constructor(private readonly taxRates: TaxRateLookup) {}

  handle(callingEntity: IEventsEntity, domainEvent: RecalculateTax): IStatusGeneric {
    return applyTaxRate(this.taxRates, callingEntity, domainEvent);
  }
}

/**
 * Same as {@link RecalculateTaxHandler}, for tax rates held by a remote service.
 */
export class RecalculateTaxHandlerAsync implements IBeforeCommitEventHandlerAsync<RecalculateTax> {
  constructor(private readonly taxRates: TaxRateLookup) {}

  async handleAsync(
    callingEntity: IEventsEntity,
    domainEvent: RecalculateTax,
  ): Promise<IStatusGeneric> {
    await Promise.resolve();
    return applyTaxRate(this.taxRates, callingEntity, domainEvent);
  }
}

function applyTaxRate(
  taxRates: TaxRateLookup,
  callingEntity: IEventsEntity,
  domainEvent: RecalculateTax,
): IStatusGeneric {
  const status = new StatusGeneric();
  const { deliveryPostcode } = domainEvent.payload;
  const taxRate = taxRates.findTaxRate(deliveryPostcode);
  if (taxRate === undefined) {
    return status.addError(noTaxRateMessage(deliveryPostcode), 'deliveryPostcode');
  }
  if (callingEntity instanceof Order) {
    callingEntity.applyTaxRate(taxRate.taxRatePercent);
  }
  return status;
}

// ============================================================================
// During commit
// ============================================================================

export class StampOrderHandler implements IDuringCommitEventHandler<OrderStamped> {
  constructor(private readonly clock: () => string) {}

  handle(callingEntity: IEventsEntity): void {
    if (callingEntity instanceof Order) {
      callingEntity.stamp(this.clock());
    }
  }
}

// ============================================================================
// After commit
// ============================================================================

@EventHandlerConfig({
  exceptionErrorMessage: 'The order was saved but its confirmation could not be sent.',
})
export class SendOrderConfirmationHandler
  implements IAfterCommitEventHandler<OrderConfirmationRequested>
{
  constructor(private readonly sender: ConfirmationSender) {}

  handle(_callingEntity: IEventsEntity, domainEvent: OrderConfirmationRequested): void {
    this.sender.send(domainEvent.payload.orderId);
  }
}
