/**
 * Ordering example - entities and events
 *
 * An order is placed against products held in stock. Placing the order
 * queues `OrderCreated`, whose handler allocates stock line by line, which
 * in turn recalculates the order's tax. The order is stamped right before
 * the save and the confirmation is sent only once the order is saved.
 */

import { DomainEventBase, EntityEvents, EventToSend } from '../../src';

// ============================================================================
// Events
// ============================================================================

export interface OrderLine {
  readonly productName: string;
  readonly numOrdered: number;
}

export class OrderCreated extends DomainEventBase<{
  readonly orderId: string;
  readonly lines: readonly OrderLine[];
}> {}

export class AllocateStock extends DomainEventBase<{
  readonly orderId: string;
  readonly productName: string;
  readonly numOrdered: number;
}> {}

export class RecalculateTax extends DomainEventBase<{
  readonly orderId: string;
  readonly deliveryPostcode: string;
}> {}

export class StockCheck extends DomainEventBase<{
  readonly productName: string;
  readonly quantity: number;
}> {}

export class OrderConfirmationRequested extends DomainEventBase<{
  readonly orderId: string;
}> {}

/** Written to the order just before the commit */
export class OrderStamped extends DomainEventBase<{
  readonly orderId: string;
}> {}

// ============================================================================
// Entities
// ============================================================================

export class ProductStock extends EntityEvents {
  private _numAllocated = 0;

  constructor(
    public readonly productName: string,
    public readonly numInStock: number,
  ) {
    super();
  }

  get numAllocated(): number {
    return this._numAllocated;
  }

  get available(): number {
    return this.numInStock - this._numAllocated;
  }

  allocate(quantity: number): void {
    this._numAllocated += quantity;
  }
}

export class TaxRate {
  constructor(
    public readonly postcode: string,
    public readonly taxRatePercent: number,
  ) {}
}

export class Order extends EntityEvents {
  private readonly _lines: OrderLine[] = [];
  private _taxRatePercent: number | undefined;
  private _stampedAt: string | undefined;

  constructor(
    public readonly orderId: string,
    public readonly deliveryPostcode: string,
  ) {
    super();
  }

  /**
   * Create an order and queue the events that validate and price it.
   */
  static place(orderId: string, deliveryPostcode: string, lines: readonly OrderLine[]): Order {
    const order = new Order(orderId, deliveryPostcode);
    order._lines.push(...lines);
    order.enqueueBefore(new OrderCreated({ orderId, lines: [...lines] }));
    order.enqueueDuring(new OrderStamped({ orderId }));
    order.addEvent(new OrderConfirmationRequested({ orderId }), EventToSend.AfterCommit);
    return order;
  }

  get lines(): readonly OrderLine[] {
    return this._lines;
  }

  get taxRatePercent(): number | undefined {
    return this._taxRatePercent;
  }

  get stampedAt(): string | undefined {
    return this._stampedAt;
  }

  /**
   * Add a line and ask for its stock to be checked before the save.
   */
  addLine(productName: string, numOrdered: number): void {
    this._lines.push({ productName, numOrdered });
    this.enqueueBefore(new StockCheck({ productName, quantity: numOrdered }));
  }

  applyTaxRate(taxRatePercent: number): void {
    this._taxRatePercent = taxRatePercent;
  }

  stamp(at: string): void {
    this._stampedAt = at;
  }
}
