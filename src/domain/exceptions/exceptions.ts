/**
 * Events runner exceptions
 *
 * Faults the runner does not turn into a status: circular events,
 * misdeclared sync/async handlers, bad configuration, and the failed-commit
 * signal thrown by the unit of work's `commit()`.
 */

import type { IDomainEvent, IEventsEntity } from '../events';
import type { IStatusGeneric } from '../status';

/**
 * Base class of every exception the events runner throws itself
 */
export class EventRunnerException extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EventRunnerException';
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The before-commit cascade ran more passes than allowed.
 *
 * Handlers kept queuing new before-commit events, which implies a circular
 * set of events. Carries the last entity and event of the final pass.
 */
export class CascadeOverflowException extends EventRunnerException {
  constructor(
    message: string,
    public readonly callingEntity: IEventsEntity,
    public readonly domainEvent: IDomainEvent,
  ) {
    super(message);
    this.name = 'CascadeOverflowException';
  }
}

/**
 * A handler's sync/async declaration does not match how it ran: an async
 * handler reached from the blocking entry point, or a sync handler that
 * returned a promise.
 */
export class HandlerModeException extends EventRunnerException {
  constructor(
    message: string,
    public readonly handlerName: string,
  ) {
    super(message);
    this.name = 'HandlerModeException';
  }
}

/**
 * Invalid configuration or handler registration
 */
export class EventRunnerConfigurationException extends EventRunnerException {
  constructor(message: string) {
    super(message);
    this.name = 'EventRunnerConfigurationException';
  }
}

/**
 * Thrown by `UnitOfWorkWithEvents.commit()` when the events runner
 * returned an invalid status, i.e. nothing was written.
 */
export class EventRunnerStatusException extends EventRunnerException {
  constructor(public readonly status: IStatusGeneric<unknown>) {
    super(status.getAllErrors());
    this.name = 'EventRunnerStatusException';
  }
}
