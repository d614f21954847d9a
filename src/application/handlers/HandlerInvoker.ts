/**
 * @fileoverview Handler Invoker
 *
 * @packageDocumentation
 * @module domain-event-runner/application/handlers
 *
 * Runs one resolved handler against one (entity, event) pair and always
 * hands back a status, unless the failure must reach the caller.
 *
 * ```
 * invoke(handler, pair)
 *   ├─ log "About to run the BeforeCommit event handler X."
 *   ├─ handler returned a status → that status (ignored after commit)
 *   ├─ handler returned nothing  → empty valid status
 *   └─ handler threw
 *        ├─ AfterCommit    → warning (override message or default)
 *        └─ Before/During  → handler's exceptionErrorMessage
 *                            → per-event-type message
 *                            → handlerExceptionPolicy (if non-null)
 *                            → generic system error (if enabled)
 *                            → rethrow
 * ```
 *
 * Mode mismatches are not handler failures and always throw
 * {@link HandlerModeException}.
 */

import type { EntityAndEvent } from '../../domain/events';
import { HandlerModeException } from '../../domain/exceptions';
import { IStatusGeneric, StatusGeneric, isStatusGeneric } from '../../domain/status';
import type { ILogger } from '../logging';
import type { EventRunnerConfig } from '../runner/EventRunnerConfig';
import { EventPhase, ResolvedHandler } from './IEventHandler';
import { isPromiseLike } from './isPromiseLike';

/** Error recorded when a before/during handler throws and nothing more specific applies */
export const SYSTEM_ERROR_MESSAGE =
  'There was a system error. If this persists then please contact us.';

/** Warning recorded when an after-commit handler throws */
export const AFTER_COMMIT_FAILURE_MESSAGE = 'An after-commit event handler failed.';

export class HandlerInvoker {
  constructor(
    private readonly config: EventRunnerConfig,
    private readonly logger: ILogger,
  ) {}

  /**
   * Run a handler from the blocking entry point.
   *
   * @throws HandlerModeException if the handler is asynchronous, or if a
   * synchronous handler returned a promise
   */
  invoke(resolved: ResolvedHandler, pair: EntityAndEvent): IStatusGeneric {
    this.logStart(resolved, pair);
    this.ensureBlocking(resolved);

    let returned: unknown;
    try {
      returned = resolved.handler.handle(pair.callingEntity, pair.domainEvent);
    } catch (error) {
      return this.convertFailure(error, resolved, pair);
    }
    return this.toStatus(returned, resolved);
  }

  /**
   * @throws HandlerModeException if the handler can only run asynchronously
   */
  ensureBlocking(
    resolved: ResolvedHandler,
  ): asserts resolved is Extract<ResolvedHandler, { mode: 'sync' }> {
    if (resolved.mode === 'async') {
      throw new HandlerModeException(
        `The ${resolved.phase} event handler ${resolved.name} is asynchronous ` +
          `and can only be run by the async commit.`,
        resolved.name,
      );
    }
  }

  /**
   * Run a handler from the async entry point. Both modes are accepted.
   */
  async invokeAsync(resolved: ResolvedHandler, pair: EntityAndEvent): Promise<IStatusGeneric> {
    this.logStart(resolved, pair);

    let returned: unknown;
    try {
      returned =
        resolved.mode === 'async'
          ? await resolved.handler.handleAsync(pair.callingEntity, pair.domainEvent)
          : resolved.handler.handle(pair.callingEntity, pair.domainEvent);
    } catch (error) {
      return this.convertFailure(error, resolved, pair);
    }
    return this.toStatus(returned, resolved);
  }

  private logStart(resolved: ResolvedHandler, pair: EntityAndEvent): void {
    this.logger.info(`About to run the ${resolved.phase} event handler ${resolved.name}.`, {
      phase: resolved.phase,
      handler: resolved.name,
      event: pair.domainEvent.eventName,
    });
  }

  private toStatus(returned: unknown, resolved: ResolvedHandler): IStatusGeneric {
    if (isPromiseLike(returned)) {
      // The work already started; make sure its rejection is at least seen.
      void Promise.resolve(returned).catch((error: unknown) => {
        this.logger.error(`The ${resolved.phase} event handler ${resolved.name} rejected.`, {
          phase: resolved.phase,
          handler: resolved.name,
          error,
        });
      });
      throw new HandlerModeException(
        `The ${resolved.phase} event handler ${resolved.name} is declared synchronous ` +
          `but returned a promise. Implement handleAsync instead.`,
        resolved.name,
      );
    }
    // After-commit handlers cannot make a written commit invalid.
    if (resolved.phase === EventPhase.AfterCommit || !isStatusGeneric(returned)) {
      return new StatusGeneric();
    }
    return returned;
  }

  private convertFailure(
    error: unknown,
    resolved: ResolvedHandler,
    pair: EntityAndEvent,
  ): IStatusGeneric {
    this.logger.error(`The ${resolved.phase} event handler ${resolved.name} threw an exception.`, {
      phase: resolved.phase,
      handler: resolved.name,
      event: pair.domainEvent.eventName,
      error,
    });

    if (resolved.phase === EventPhase.AfterCommit) {
      return new StatusGeneric().addWarning(
        resolved.exceptionErrorMessage ?? AFTER_COMMIT_FAILURE_MESSAGE,
      );
    }

    if (resolved.exceptionErrorMessage !== undefined) {
      return new StatusGeneric().addError(resolved.exceptionErrorMessage);
    }

    const eventMessage = this.config.eventExceptionMessages.get(pair.domainEvent.constructor);
    if (eventMessage !== undefined) {
      return new StatusGeneric().addError(eventMessage);
    }

    const policyStatus = this.config.handlerExceptionPolicy?.({
      error,
      phase: resolved.phase,
      handlerName: resolved.name,
      callingEntity: pair.callingEntity,
      domainEvent: pair.domainEvent,
    });
    if (policyStatus) {
      return policyStatus;
    }

    if (this.config.turnHandlerExceptionsToErrorStatus) {
      return new StatusGeneric().addError(SYSTEM_ERROR_MESSAGE);
    }
    throw error;
  }
}
