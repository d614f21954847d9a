/**
 * @fileoverview Events Runner Configuration
 *
 * @packageDocumentation
 * @module domain-event-runner/application/runner
 *
 * The configuration is an immutable value built once at startup and handed
 * to the {@link EventsRunner} constructor. Every commit cycle reads it; none
 * writes it, so one configuration can be shared by every unit of work.
 *
 * @example
 * ```typescript
 * const config = new EventRunnerConfigBuilder()
 *   .withMaxBeforeCommitCascadeIterations(10)
 *   .withStopOnFirstBeforeHandlerError(false)
 *   .registerCommitExceptionHandler(OrderUnitOfWork, (error) =>
 *     error instanceof UniqueConstraintError
 *       ? new StatusGeneric().addError('That order number is already taken.')
 *       : null,
 *   )
 *   .build();
 *
 * const runner = new EventsRunner(registry, config);
 * ```
 */

import type { EventType, IDomainEvent, IEventsEntity } from '../../domain/events';
import { EventRunnerConfigurationException } from '../../domain/exceptions';
import type { IStatusGeneric } from '../../domain/status';
import type { EventPhase } from '../handlers/IEventHandler';

/** Default limit on before-commit cascade passes */
export const DEFAULT_MAX_BEFORE_COMMIT_CASCADE_ITERATIONS = 6;

/**
 * Constructor of a unit of work (or any other object a commit belongs to).
 * Commit exception handlers and post-cascade actions are keyed by it.
 */
export type CollaboratorType<TCollaborator extends object> = new (
  ...args: never[]
) => TCollaborator;

/**
 * Decides what a failed commit means.
 *
 * @returns `null` to rethrow the failure; a status with errors to return it
 * instead of committing; a valid status to retry the commit once.
 */
export type CommitExceptionHandler<TCollaborator extends object> = (
  error: unknown,
  collaborator: TCollaborator,
) => IStatusGeneric | null;

/**
 * Everything known about a handler that threw.
 */
export interface HandlerFailureContext {
  readonly error: unknown;
  readonly phase: EventPhase;
  readonly handlerName: string;
  readonly callingEntity: IEventsEntity;
  readonly domainEvent: IDomainEvent;
}

/**
 * Turns a before- or during-commit handler failure into a status.
 * Returning `null` falls through to the default conversion.
 */
export type HandlerExceptionPolicy = (
  context: HandlerFailureContext,
) => IStatusGeneric | null;

/**
 * An action run after the before-commit cascade succeeded and before the
 * commit, for collaborators of one exact type.
 */
export interface CollaboratorAction {
  // eslint-disable-next-line @typescript-eslint/ban-types
  readonly collaboratorType: Function;
  run(collaborator: object): void;
}

export interface EventRunnerConfig {
  /**
   * Upper bound on before-commit passes that found events. Exceeding it
   * means handlers keep queuing events for each other.
   */
  readonly maxBeforeCommitCascadeIterations: number;

  /**
   * Stop the current pass as soon as the status becomes invalid. A
   * handler's own `stopOnFirstError` takes precedence.
   */
  readonly stopOnFirstBeforeHandlerError: boolean;

  /**
   * Convert an exception thrown by a before/during handler into the
   * generic system error. When false, the exception reaches the caller.
   */
  readonly turnHandlerExceptionsToErrorStatus: boolean;

  readonly handlerExceptionPolicy?: HandlerExceptionPolicy;

  /** Error text for a handler exception, per event type */
  // eslint-disable-next-line @typescript-eslint/ban-types
  readonly eventExceptionMessages: ReadonlyMap<Function, string>;

  // eslint-disable-next-line @typescript-eslint/ban-types
  readonly commitExceptionHandlers: ReadonlyMap<Function, CommitExceptionHandler<object>>;

  readonly actionsToRunAfterBeforeEvents: readonly CollaboratorAction[];

  /** Skip the during-commit pass entirely */
  readonly notUsingDuringCommitHandlers: boolean;

  /** Skip the after-commit dispatch entirely (after-commit events stay queued) */
  readonly notUsingAfterCommitHandlers: boolean;
}

/**
 * Plain settings accepted by {@link createEventRunnerConfig}.
 */
export type EventRunnerOptions = Partial<
  Pick<
    EventRunnerConfig,
    | 'maxBeforeCommitCascadeIterations'
    | 'stopOnFirstBeforeHandlerError'
    | 'turnHandlerExceptionsToErrorStatus'
    | 'handlerExceptionPolicy'
    | 'notUsingDuringCommitHandlers'
    | 'notUsingAfterCommitHandlers'
  >
>;

type MutableOptions = { -readonly [K in keyof EventRunnerOptions]: EventRunnerOptions[K] };

/**
 * Fluent builder for {@link EventRunnerConfig}
 */
export class EventRunnerConfigBuilder {
  private options: MutableOptions = {};
  // eslint-disable-next-line @typescript-eslint/ban-types
  private readonly eventExceptionMessages = new Map<Function, string>();
  // eslint-disable-next-line @typescript-eslint/ban-types
  private readonly commitExceptionHandlers = new Map<Function, CommitExceptionHandler<object>>();
  private readonly actions: CollaboratorAction[] = [];

  /**
   * Start from plain options
   */
  withOptions(options: EventRunnerOptions): this {
    this.options = { ...this.options, ...options };
    return this;
  }

  withMaxBeforeCommitCascadeIterations(max: number): this {
    this.options.maxBeforeCommitCascadeIterations = max;
    return this;
  }

  withStopOnFirstBeforeHandlerError(stop: boolean): this {
    this.options.stopOnFirstBeforeHandlerError = stop;
    return this;
  }

  withTurnHandlerExceptionsToErrorStatus(turnToStatus: boolean): this {
    this.options.turnHandlerExceptionsToErrorStatus = turnToStatus;
    return this;
  }

  withHandlerExceptionPolicy(policy: HandlerExceptionPolicy): this {
    this.options.handlerExceptionPolicy = policy;
    return this;
  }

  /**
   * Error text used when any handler for this event type throws
   */
  withEventExceptionMessage<TEvent extends IDomainEvent>(
    eventType: EventType<TEvent>,
    message: string,
  ): this {
    this.eventExceptionMessages.set(eventType, message);
    return this;
  }

  withoutDuringCommitHandlers(): this {
    this.options.notUsingDuringCommitHandlers = true;
    return this;
  }

  withoutAfterCommitHandlers(): this {
    this.options.notUsingAfterCommitHandlers = true;
    return this;
  }

  /**
   * Register the commit exception handler for one collaborator type.
   *
   * @throws EventRunnerConfigurationException if that type already has one
   */
  registerCommitExceptionHandler<TCollaborator extends object>(
    collaboratorType: CollaboratorType<TCollaborator>,
    handler: CommitExceptionHandler<TCollaborator>,
  ): this {
    if (this.commitExceptionHandlers.has(collaboratorType)) {
      throw new EventRunnerConfigurationException(
        `You can only register one commit exception handler per collaborator type. ` +
          `${collaboratorType.name} already has one.`,
      );
    }
    this.commitExceptionHandlers.set(collaboratorType, (error, collaborator) =>
      collaborator instanceof collaboratorType ? handler(error, collaborator) : null,
    );
    return this;
  }

  /**
   * Run an action once the before-commit cascade succeeded, right before
   * the commit, whenever the collaborator is exactly of this type.
   */
  addActionToRunAfterBeforeEvents<TCollaborator extends object>(
    collaboratorType: CollaboratorType<TCollaborator>,
    action: (collaborator: TCollaborator) => void,
  ): this {
    this.actions.push({
      collaboratorType,
      run: (collaborator) => {
        if (collaborator instanceof collaboratorType) {
          action(collaborator);
        }
      },
    });
    return this;
  }

  /**
   * @throws EventRunnerConfigurationException on invalid settings
   */
  build(): EventRunnerConfig {
    const max =
      this.options.maxBeforeCommitCascadeIterations ??
      DEFAULT_MAX_BEFORE_COMMIT_CASCADE_ITERATIONS;
    if (!Number.isInteger(max) || max < 1) {
      throw new EventRunnerConfigurationException(
        `maxBeforeCommitCascadeIterations must be a positive integer, got ${max}.`,
      );
    }

    return Object.freeze({
      maxBeforeCommitCascadeIterations: max,
      stopOnFirstBeforeHandlerError: this.options.stopOnFirstBeforeHandlerError ?? true,
      turnHandlerExceptionsToErrorStatus:
        this.options.turnHandlerExceptionsToErrorStatus ?? true,
      handlerExceptionPolicy: this.options.handlerExceptionPolicy,
      eventExceptionMessages: new Map(this.eventExceptionMessages),
      commitExceptionHandlers: new Map(this.commitExceptionHandlers),
      actionsToRunAfterBeforeEvents: Object.freeze([...this.actions]),
      notUsingDuringCommitHandlers: this.options.notUsingDuringCommitHandlers ?? false,
      notUsingAfterCommitHandlers: this.options.notUsingAfterCommitHandlers ?? false,
    });
  }
}

/**
 * Build a configuration from plain options, using defaults for the rest.
 */
export function createEventRunnerConfig(options: EventRunnerOptions = {}): EventRunnerConfig {
  return new EventRunnerConfigBuilder().withOptions(options).build();
}
