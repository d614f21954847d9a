/**
 * @fileoverview Domain Events - Queued Event Interfaces
 *
 * @packageDocumentation
 * @module domain-event-runner/domain/events
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Core)
 *
 * Domain layer:
 * - ✅ **CAN**: Define domain events and the entities that queue them
 * - ✅ **CAN**: Decide whether an event runs before, during or after commit
 * - ❌ **CANNOT**: Run handlers (that's the events runner's job)
 * - ❌ **CANNOT**: Know about the persistence engine
 *
 * ## Event Flow Around a Commit
 *
 * ```
 * order.enqueueBefore(new OrderCreated(...))     ← queued in memory
 * order.enqueueAfter(new OrderPlacedEmail(...))  ← queued in memory
 *   ↓
 * uow.commitWithStatus()
 *   ↓
 * 1. Before-commit cascade
 *    drainBefore() on every tracked entity, run handlers,
 *    repeat while handlers queue new before-commit events
 *   ↓ (status invalid? stop here, nothing is written)
 * 2. During-commit pass
 *   ↓
 * 3. Commit (the durable write)
 *   ↓
 * 4. After-commit dispatch
 *    drainAfter() on every tracked entity, run handlers once
 * ```
 *
 * **Why Events Are Identified by Class:**
 *
 * Handlers are registered against the event's constructor, and the runner
 * looks them up with `event.constructor`. Two events with the same
 * `eventName` but different classes go to different handlers; a subclass
 * does not receive the handlers of its base class.
 *
 * @version 1.0.0
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Metadata common to all domain events.
 *
 * @example
 * ```typescript
 * const event = new OrderCreated({ orderId: 'order-1' }, { actorId: 'user-9' });
 * event.metadata.eventId;     // '2f1c6a7e-...'
 * event.metadata.occurredAt;  // '2026-10-19T10:30:45.123Z'
 * event.metadata.actorId;     // 'user-9'
 * ```
 */
export interface EventMetadata {
  /** Unique identifier for the event instance (UUID v4 by default) */
  readonly eventId: string;

  /** ISO 8601 timestamp of when the event was raised */
  readonly occurredAt: string;

  /** Links events raised by the same logical operation */
  readonly correlationId?: string;

  /** User or system actor that caused the event */
  readonly actorId?: string;

  /** Additional request-specific data */
  readonly context?: Readonly<Record<string, unknown>>;
}

/**
 * Interface for a domain event.
 *
 * @template TPayload - The type of the payload carried by the event
 *
 * @remarks
 * Event names are past tense (`OrderCreated`, `StockAllocated`). Events are
 * immutable once created: every field is `readonly` and handlers must not
 * modify a payload.
 */
export interface IDomainEvent<TPayload = unknown> {
  /** Display name of the event, used in logs */
  readonly eventName: string;

  /** Standard metadata associated with the event */
  readonly metadata: EventMetadata;

  /** Domain-specific data */
  readonly payload: TPayload;
}

/**
 * Constructor of a domain event class. Used as the registration and lookup
 * key for handlers.
 */
export type EventType<TEvent extends IDomainEvent = IDomainEvent> = new (
  ...args: never[]
) => TEvent;

/**
 * Base class that fills in {@link EventMetadata} and names the event after
 * its class.
 *
 * @example
 * ```typescript
 * interface StockCheckPayload {
 *   productName: string;
 *   quantity: number;
 * }
 *
 * class StockCheck extends DomainEventBase<StockCheckPayload> {}
 *
 * const event = new StockCheck({ productName: 'Widget', quantity: 10 });
 * event.eventName; // 'StockCheck'
 * ```
 */
export abstract class DomainEventBase<TPayload = undefined>
  implements IDomainEvent<TPayload>
{
  readonly eventName: string;
  readonly metadata: EventMetadata;

  constructor(
    readonly payload: TPayload,
    metadataOverrides: Partial<EventMetadata> = {},
  ) {
    this.eventName = new.target.name;
    this.metadata = {
      eventId: metadataOverrides.eventId ?? uuidv4(),
      occurredAt: metadataOverrides.occurredAt ?? new Date().toISOString(),
      correlationId: metadataOverrides.correlationId,
      actorId: metadataOverrides.actorId,
      context: metadataOverrides.context,
    };
  }
}

/**
 * When a queued event should be handled.
 */
export enum EventToSend {
  /** Before the commit; handlers can stop the commit */
  BeforeCommit = 'BEFORE_COMMIT',

  /** Right before the durable write, after the before-commit cascade */
  DuringCommit = 'DURING_COMMIT',

  /** Once the commit has succeeded; failures are informational only */
  AfterCommit = 'AFTER_COMMIT',

  /** Queue the same event instance for both before and after commit */
  BeforeAndAfterCommit = 'BEFORE_AND_AFTER_COMMIT',
}

/**
 * An entity tracked by the unit of work that queues domain events.
 *
 * @remarks
 * **Drain-Then-Clear:**
 *
 * Each `drain*` call returns the queued events and empties the queue in one
 * step. A handler that queues a new event while the runner is iterating a
 * drained list adds it to the fresh queue, where the next pass finds it:
 *
 * ```
 * pass 1: drainBefore() → [OrderCreated]        queue: []
 *         OrderCreatedHandler queues AllocateStock  queue: [AllocateStock]
 * pass 2: drainBefore() → [AllocateStock]       queue: []
 * pass 3: drainBefore() → []                    cascade ends
 * ```
 */
export interface IEventsEntity {
  /** Remove and return every queued before-commit event */
  drainBefore(): IDomainEvent[];

  /** Remove and return every queued during-commit event */
  drainDuring(): IDomainEvent[];

  /** Remove and return every queued after-commit event */
  drainAfter(): IDomainEvent[];
}

/**
 * A (calling entity, event) pair: the unit of work for a handler invocation.
 *
 * @remarks
 * `callingEntity` is passed to handlers for context. The runner itself never
 * modifies it.
 */
export interface EntityAndEvent {
  readonly callingEntity: IEventsEntity;
  readonly domainEvent: IDomainEvent;
}

/**
 * Base class for entities that queue domain events.
 *
 * @example
 * ```typescript
 * class Order extends EntityEvents {
 *   constructor(public readonly id: string, public readonly lines: OrderLine[]) {
 *     super();
 *     this.enqueueBefore(new OrderCreated({ orderId: id, lines }));
 *   }
 *
 *   dispatch(when: Date): void {
 *     this.dispatchedAt = when;
 *     this.addEvent(new OrderDispatched({ orderId: this.id }), EventToSend.BeforeAndAfterCommit);
 *   }
 * }
 * ```
 */
export abstract class EntityEvents implements IEventsEntity {
  private _beforeCommitEvents: IDomainEvent[] = [];
  private _duringCommitEvents: IDomainEvent[] = [];
  private _afterCommitEvents: IDomainEvent[] = [];

  /**
   * Queue an event for the given phase.
   */
  addEvent(event: IDomainEvent, when: EventToSend = EventToSend.BeforeCommit): void {
    switch (when) {
      case EventToSend.BeforeCommit:
        this.enqueueBefore(event);
        break;
      case EventToSend.DuringCommit:
        this.enqueueDuring(event);
        break;
      case EventToSend.AfterCommit:
        this.enqueueAfter(event);
        break;
      case EventToSend.BeforeAndAfterCommit:
        this.enqueueBefore(event);
        this.enqueueAfter(event);
        break;
    }
  }

  enqueueBefore(event: IDomainEvent): void {
    this._beforeCommitEvents.push(event);
  }

  enqueueDuring(event: IDomainEvent): void {
    this._duringCommitEvents.push(event);
  }

  enqueueAfter(event: IDomainEvent): void {
    this._afterCommitEvents.push(event);
  }

  drainBefore(): IDomainEvent[] {
    const events = this._beforeCommitEvents;
    this._beforeCommitEvents = [];
    return events;
  }

  drainDuring(): IDomainEvent[] {
    const events = this._duringCommitEvents;
    this._duringCommitEvents = [];
    return events;
  }

  drainAfter(): IDomainEvent[] {
    const events = this._afterCommitEvents;
    this._afterCommitEvents = [];
    return events;
  }

  /**
   * True if any queue holds an event.
   */
  hasPendingEvents(): boolean {
    return (
      this._beforeCommitEvents.length > 0 ||
      this._duringCommitEvents.length > 0 ||
      this._afterCommitEvents.length > 0
    );
  }
}
