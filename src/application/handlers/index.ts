/**
 * @module domain-event-runner/application/handlers
 * @description Event handler contracts, registration and invocation
 */

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
} from './IEventHandler';
export { EventPhase } from './IEventHandler';

export { EventHandlerConfig, getEventHandlerConfig } from './EventHandlerConfig';

export type { HandlerRegistration } from './EventHandlerRegistry';
export { EventHandlerRegistry } from './EventHandlerRegistry';

export {
  HandlerInvoker,
  SYSTEM_ERROR_MESSAGE,
  AFTER_COMMIT_FAILURE_MESSAGE,
} from './HandlerInvoker';

export { isPromiseLike } from './isPromiseLike';
