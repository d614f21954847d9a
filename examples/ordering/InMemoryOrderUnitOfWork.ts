/**
 * Ordering example - in-memory persistence
 *
 * Stands in for a database-backed unit of work: tracked entities live in an
 * array and "saving" copies the orders into a map.
 */

import {
  EntityEvents,
  EventsRunner,
  ILogger,
  IEventsEntity,
  UnitOfWorkWithEvents,
  consoleLogger,
} from '../../src';
import { Order, ProductStock, TaxRate } from './domain';
import type { StockLookup, TaxRateLookup } from './handlers';

export class InMemoryOrderStore implements StockLookup, TaxRateLookup {
  private readonly stock = new Map<string, ProductStock>();
  private readonly taxRates = new Map<string, TaxRate>();
  private readonly orders = new Map<string, Order>();
  private _saveCount = 0;

  get saveCount(): number {
    return this._saveCount;
  }

  addStock(stock: ProductStock): this {
    this.stock.set(stock.productName, stock);
    return this;
  }

  addTaxRate(taxRate: TaxRate): this {
    this.taxRates.set(taxRate.postcode, taxRate);
    return this;
  }

  findStock(productName: string): ProductStock | undefined {
    return this.stock.get(productName);
  }

  findTaxRate(postcode: string): TaxRate | undefined {
    return this.taxRates.get(postcode);
  }

  findOrder(orderId: string): Order | undefined {
    return this.orders.get(orderId);
  }

  /**
   * @returns The number of orders written
   */
  saveOrders(orders: readonly Order[]): number {
    for (const order of orders) {
      this.orders.set(order.orderId, order);
    }
    this._saveCount++;
    return orders.length;
  }
}

export class InMemoryOrderUnitOfWork extends UnitOfWorkWithEvents<number> {
  private readonly tracked: EntityEvents[] = [];

  constructor(
    eventsRunner: EventsRunner,
    protected readonly store: InMemoryOrderStore,
    protected readonly logger: ILogger = consoleLogger,
  ) {
    super(eventsRunner);
  }

  /**
   * Start tracking an entity so its events run on commit.
   */
  attach(entity: EntityEvents): this {
    if (!this.tracked.includes(entity)) {
      this.tracked.push(entity);
    }
    return this;
  }

  protected getTrackedEntities(): Iterable<IEventsEntity> {
    return [...this.tracked];
  }

  protected saveChanges(): number {
    const orders = this.tracked.filter((entity): entity is Order => entity instanceof Order);
    const saved = this.store.saveOrders(orders);
    this.logger.info(`Saved ${saved} order(s).`);
    return saved;
  }

  protected async saveChangesAsync(): Promise<number> {
    await Promise.resolve();
    return this.saveChanges();
  }
}
