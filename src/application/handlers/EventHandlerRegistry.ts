/**
 * @fileoverview Event Handler Registry
 *
 * @packageDocumentation
 * @module domain-event-runner/application/handlers
 *
 * Maps an event class to the ordered list of handlers registered for it,
 * per phase. Built once at startup, frozen when handed to the events
 * runner, read-only afterwards.
 *
 * ```
 * registry
 *   .addBeforeCommitHandler(OrderCreated, () => new OrderCreatedHandler(stock))
 *   .addBeforeCommitHandler(AllocateStock, new AllocateStockHandler())
 *   .addAfterCommitHandler(OrderCreated, new SendConfirmationHandler(mailer));
 *
 * registry.resolveHandlers(OrderCreated, EventPhase.BeforeCommit)
 *   → [OrderCreatedHandler]
 * registry.resolveHandlers(OrderCancelled, EventPhase.BeforeCommit)
 *   → []   (not an error: the event is simply skipped)
 * ```
 *
 * **Exact type lookup:** a handler registered for `OrderCreated` does not
 * receive a `PriorityOrderCreated extends OrderCreated`. Register it for
 * both classes if that is what you want.
 */

import type { EventType, IDomainEvent } from '../../domain/events';
import { EventRunnerConfigurationException } from '../../domain/exceptions';
import { getEventHandlerConfig } from './EventHandlerConfig';
import {
  AfterCommitHandler,
  BeforeCommitHandler,
  DuringCommitHandler,
  EventHandler,
  EventPhase,
  HandlerOptions,
  HandlerSource,
  ResolvedHandler,
} from './IEventHandler';

/**
 * A single registration, as stored by the registry.
 */
export interface HandlerRegistration {
  readonly eventType: EventType;
  readonly phase: EventPhase;
  readonly source: HandlerSource<EventHandler<IDomainEvent>>;
  readonly options: Readonly<HandlerOptions>;
}

export class EventHandlerRegistry {
  // eslint-disable-next-line @typescript-eslint/ban-types
  private readonly registrations = new Map<EventPhase, Map<Function, HandlerRegistration[]>>();
  private frozen = false;

  addBeforeCommitHandler<TEvent extends IDomainEvent>(
    eventType: EventType<TEvent>,
    source: HandlerSource<BeforeCommitHandler<TEvent>>,
    options: HandlerOptions = {},
  ): this {
    return this.add(EventPhase.BeforeCommit, eventType, source, options);
  }

  addDuringCommitHandler<TEvent extends IDomainEvent>(
    eventType: EventType<TEvent>,
    source: HandlerSource<DuringCommitHandler<TEvent>>,
    options: HandlerOptions = {},
  ): this {
    return this.add(EventPhase.DuringCommit, eventType, source, options);
  }

  addAfterCommitHandler<TEvent extends IDomainEvent>(
    eventType: EventType<TEvent>,
    source: HandlerSource<AfterCommitHandler<TEvent>>,
    options: HandlerOptions = {},
  ): this {
    return this.add(EventPhase.AfterCommit, eventType, source, options);
  }

  /**
   * Make the registry read-only. Further registrations throw.
   */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * True if at least one handler is registered for the phase.
   */
  hasHandlersFor(phase: EventPhase): boolean {
    return (this.registrations.get(phase)?.size ?? 0) > 0;
  }

  /**
   * Registrations for a phase, in registration order (useful for debugging).
   */
  getRegistrations(phase: EventPhase): HandlerRegistration[] {
    return [...(this.registrations.get(phase)?.values() ?? [])].flat();
  }

  /**
   * Resolve the handlers for an event's runtime type.
   *
   * @param eventType - The event's constructor, i.e. `event.constructor`
   * @returns Handler instances in registration order; empty if none
   */
  // eslint-disable-next-line @typescript-eslint/ban-types
  resolveHandlers(eventType: Function, phase: EventPhase): ResolvedHandler[] {
    const registrations = this.registrations.get(phase)?.get(eventType) ?? [];
    return registrations.map((registration) => this.resolve(registration));
  }

  /**
   * Resolve every handler registered for a phase. Factories are called.
   */
  resolvePhase(phase: EventPhase): ResolvedHandler[] {
    return this.getRegistrations(phase).map((registration) => this.resolve(registration));
  }

  private add<TEvent extends IDomainEvent>(
    phase: EventPhase,
    eventType: EventType<TEvent>,
    source: HandlerSource<EventHandler<TEvent>>,
    options: HandlerOptions,
  ): this {
    if (this.frozen) {
      throw new EventRunnerConfigurationException(
        `Cannot register a ${phase} handler for ${eventType.name}: the handler registry is frozen.`,
      );
    }

    let byEventType = this.registrations.get(phase);
    if (!byEventType) {
      byEventType = new Map();
      this.registrations.set(phase, byEventType);
    }

    const registration: HandlerRegistration = {
      eventType,
      phase,
      source,
      options: { ...options },
    };
    const existing = byEventType.get(eventType);
    if (existing) {
      existing.push(registration);
    } else {
      byEventType.set(eventType, [registration]);
    }
    return this;
  }

  private resolve(registration: HandlerRegistration): ResolvedHandler {
    const { source, phase, options } = registration;
    const handler = typeof source === 'function' ? source() : source;
    const decorated = getEventHandlerConfig(handler);

    const settings = {
      name: options.name ?? decorated.name ?? handler.constructor.name,
      phase,
      stopOnFirstError: options.stopOnFirstError ?? decorated.stopOnFirstError,
      exceptionErrorMessage: options.exceptionErrorMessage ?? decorated.exceptionErrorMessage,
    };

    return 'handleAsync' in handler
      ? { ...settings, mode: 'async', handler }
      : { ...settings, mode: 'sync', handler };
  }
}
