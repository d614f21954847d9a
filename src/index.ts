/**
 * @fileoverview domain-event-runner - Domain Events Around a Commit
 * @description
 * Entities queue domain events while a unit of work changes them. On commit
 * the events runner finds the handlers registered for every queued event,
 * runs them, and turns their outcomes into a single status that decides
 * whether the commit goes ahead.
 *
 * ## Architecture Layers
 *
 * - **Domain**: events, event-queueing entities, status, exceptions
 * - **Application**: handler contracts and registry, handler invoker,
 *   events runner and its configuration, unit-of-work base class
 *
 * @packageDocumentation
 * @module domain-event-runner
 * @version 1.0.0
 */

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

// ** 1. Domain Events & Entities **
export type {
  EventMetadata,
  IDomainEvent,
  EventType,
  IEventsEntity,
  EntityAndEvent,
} from './domain/events';
export { DomainEventBase, EntityEvents, EventToSend } from './domain/events';

// ** 2. Status **
export type { IStatusGeneric, MessageSeverity, StatusMessage } from './domain/status';
export {
  StatusGeneric,
  DEFAULT_SUCCESS_MESSAGE,
  DEFAULT_INVALID_MESSAGE,
  isStatusGeneric,
} from './domain/status';

// ** 3. Exceptions **
export {
  EventRunnerException,
  CascadeOverflowException,
  HandlerModeException,
  EventRunnerConfigurationException,
  EventRunnerStatusException,
} from './domain/exceptions';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

// ** 1. Logging **
export type { ILogger } from './application/logging';
export { consoleLogger } from './application/logging';

// ** 2. Event Handlers **
export type {
  ISyncEventHandler,
  IAsyncEventHandler,
  EventHandler,
  IBeforeCommitEventHandler,
  IBeforeCommitEventHandlerAsync,
  IDuringCommitEventHandler,
  IDuringCommitEventHandlerAsync,
  IAfterCommitEventHandler,
  IAfterCommitEventHandlerAsync,
  BeforeCommitHandler,
  DuringCommitHandler,
  AfterCommitHandler,
  HandlerFactory,
  HandlerSource,
  HandlerOptions,
  ResolvedHandler,
  HandlerRegistration,
} from './application/handlers';
export {
  EventPhase,
  EventHandlerConfig,
  getEventHandlerConfig,
  EventHandlerRegistry,
  HandlerInvoker,
  SYSTEM_ERROR_MESSAGE,
  AFTER_COMMIT_FAILURE_MESSAGE,
} from './application/handlers';

// ** 3. Events Runner **
export type {
  CollaboratorType,
  CommitExceptionHandler,
  HandlerFailureContext,
  HandlerExceptionPolicy,
  CollaboratorAction,
  EventRunnerConfig,
  EventRunnerOptions,
  CommitOutcome,
  TrackedEntitiesProvider,
} from './application/runner';
export {
  EventRunnerConfigBuilder,
  createEventRunnerConfig,
  DEFAULT_MAX_BEFORE_COMMIT_CASCADE_ITERATIONS,
  CommitExceptionTranslator,
  EventsRunner,
  SUCCESSFULLY_SAVED_MESSAGE,
} from './application/runner';

// ** 4. Unit of Work **
export { UnitOfWorkWithEvents, UnitOfWorkState } from './application/uow';

// ============================================================================
// VERSION
// ============================================================================

export const VERSION = '1.0.0';
