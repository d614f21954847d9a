/**
 * @fileoverview Event Handler Interfaces
 *
 * @packageDocumentation
 * @module domain-event-runner/application/handlers
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Handlers react to a queued domain event. Each handler implements exactly
 * one of two shapes:
 *
 * | Shape | Method | Runs from |
 * |---|---|---|
 * | synchronous | `handle(entity, event)` | both entry points |
 * | asynchronous | `handleAsync(entity, event)` | async entry point only |
 *
 * and is registered for one phase:
 *
 * - **BeforeCommit**: may return a status with errors, which stops the commit.
 *   May queue further before-commit events (the cascade).
 * - **DuringCommit**: runs once, right before the commit. Errors stop the commit.
 * - **AfterCommit**: runs once the commit succeeded. Returns nothing; a
 *   failure becomes a warning.
 *
 * @example Before-commit handler
 * ```typescript
 * class StockCheckHandler implements IBeforeCommitEventHandler<StockCheck> {
 *   constructor(private readonly stock: StockLookup) {}
 *
 *   handle(_entity: IEventsEntity, event: StockCheck): IStatusGeneric {
 *     const status = new StatusGeneric();
 *     if (this.stock.available(event.payload.productName) < event.payload.quantity) {
 *       status.addError('Not enough stock');
 *     }
 *     return status;
 *   }
 * }
 * ```
 *
 * @version 1.0.0
 */

import type { IDomainEvent, IEventsEntity } from '../../domain/events';
import type { IStatusGeneric } from '../../domain/status';

/**
 * Phase in which a handler runs.
 */
export enum EventPhase {
  BeforeCommit = 'BeforeCommit',
  DuringCommit = 'DuringCommit',
  AfterCommit = 'AfterCommit',
}

/**
 * Any handler that completes without suspending.
 */
export interface ISyncEventHandler<TEvent extends IDomainEvent> {
  handle(callingEntity: IEventsEntity, domainEvent: TEvent): IStatusGeneric | void;
}

/**
 * Any handler that may await I/O.
 */
export interface IAsyncEventHandler<TEvent extends IDomainEvent> {
  handleAsync(
    callingEntity: IEventsEntity,
    domainEvent: TEvent,
  ): Promise<IStatusGeneric | void>;
}

export type EventHandler<TEvent extends IDomainEvent> =
  | ISyncEventHandler<TEvent>
  | IAsyncEventHandler<TEvent>;

// ============================================================================
// Phase-specific handler interfaces
// ============================================================================

export interface IBeforeCommitEventHandler<TEvent extends IDomainEvent>
  extends ISyncEventHandler<TEvent> {
  handle(callingEntity: IEventsEntity, domainEvent: TEvent): IStatusGeneric | void;
}

export interface IBeforeCommitEventHandlerAsync<TEvent extends IDomainEvent>
  extends IAsyncEventHandler<TEvent> {
  handleAsync(
    callingEntity: IEventsEntity,
    domainEvent: TEvent,
  ): Promise<IStatusGeneric | void>;
}

export interface IDuringCommitEventHandler<TEvent extends IDomainEvent>
  extends ISyncEventHandler<TEvent> {
  handle(callingEntity: IEventsEntity, domainEvent: TEvent): IStatusGeneric | void;
}

export interface IDuringCommitEventHandlerAsync<TEvent extends IDomainEvent>
  extends IAsyncEventHandler<TEvent> {
  handleAsync(
    callingEntity: IEventsEntity,
    domainEvent: TEvent,
  ): Promise<IStatusGeneric | void>;
}

/**
 * After-commit handlers cannot affect the result, so they return nothing.
 */
export interface IAfterCommitEventHandler<TEvent extends IDomainEvent>
  extends ISyncEventHandler<TEvent> {
  handle(callingEntity: IEventsEntity, domainEvent: TEvent): void;
}

export interface IAfterCommitEventHandlerAsync<TEvent extends IDomainEvent>
  extends IAsyncEventHandler<TEvent> {
  handleAsync(callingEntity: IEventsEntity, domainEvent: TEvent): Promise<void>;
}

export type BeforeCommitHandler<TEvent extends IDomainEvent> =
  | IBeforeCommitEventHandler<TEvent>
  | IBeforeCommitEventHandlerAsync<TEvent>;

export type DuringCommitHandler<TEvent extends IDomainEvent> =
  | IDuringCommitEventHandler<TEvent>
  | IDuringCommitEventHandlerAsync<TEvent>;

export type AfterCommitHandler<TEvent extends IDomainEvent> =
  | IAfterCommitEventHandler<TEvent>
  | IAfterCommitEventHandlerAsync<TEvent>;

// ============================================================================
// Registration types
// ============================================================================

/**
 * Factory returning a handler instance. Called every time the handler is
 * resolved, so it can hand out a fresh (scoped) instance per commit.
 */
export type HandlerFactory<THandler> = () => THandler;

/**
 * A handler instance (shared by every commit) or a factory.
 */
export type HandlerSource<THandler> = THandler | HandlerFactory<THandler>;

/**
 * Per-handler settings. The same settings can be given with the
 * `@EventHandlerConfig` decorator; registration options take precedence.
 */
export interface HandlerOptions {
  /** Name used in logs (default: the handler's class name) */
  name?: string;

  /**
   * Overrides `stopOnFirstBeforeHandlerError` after this handler has run.
   */
  stopOnFirstError?: boolean;

  /**
   * Message recorded when this handler throws, instead of the generic
   * system error (before/during) or the default warning (after).
   */
  exceptionErrorMessage?: string;
}

interface ResolvedHandlerBase {
  readonly name: string;
  readonly phase: EventPhase;
  readonly stopOnFirstError?: boolean;
  readonly exceptionErrorMessage?: string;
}

/**
 * A handler instance ready to invoke, with its effective settings.
 */
export type ResolvedHandler =
  | (ResolvedHandlerBase & {
      readonly mode: 'sync';
      readonly handler: ISyncEventHandler<IDomainEvent>;
    })
  | (ResolvedHandlerBase & {
      readonly mode: 'async';
      readonly handler: IAsyncEventHandler<IDomainEvent>;
    });
