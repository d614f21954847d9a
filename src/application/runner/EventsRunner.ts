/**
 * @fileoverview Events Runner - Orchestrates Domain Events Around a Commit
 *
 * @packageDocumentation
 * @module domain-event-runner/application/runner
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * The events runner drives one commit cycle:
 *
 * ```
 * runBeforeAndAfter(getTrackedEntities, commit, collaborator)
 *   ↓
 * 1. Before-commit cascade
 *    pass N: drainBefore() on every tracked entity
 *            run every handler for every event, combine statuses
 *    repeat while the last pass found events and the status is valid
 *    (more than maxBeforeCommitCascadeIterations passes → CascadeOverflowException)
 *   ↓ invalid? return the status: no commit, after-commit events stay queued
 * 2. Actions registered for the collaborator's type
 *   ↓
 * 3. During-commit pass (single pass)
 *   ↓ invalid? return the status: no commit
 * 4. Commit, through the commit exception translator
 *   ↓ failed and translated? return that status
 * 5. Status gets the result and the header "Successfully saved"
 *   ↓
 * 6. After-commit dispatch (single pass, failures become warnings)
 * ```
 *
 * The runner keeps no per-cycle state, so one instance can serve every
 * unit of work concurrently.
 *
 * @example
 * ```typescript
 * const runner = new EventsRunner(registry, config, logger);
 *
 * const status = runner.runBeforeAndAfter(
 *   () => uow.trackedEntities(),
 *   () => uow.saveChanges(),
 *   uow,
 * );
 * if (!status.isValid) {
 *   return status.getAllErrors();
 * }
 * ```
 */

import type { EntityAndEvent, IDomainEvent, IEventsEntity } from '../../domain/events';
import { CascadeOverflowException } from '../../domain/exceptions';
import { IStatusGeneric, StatusGeneric } from '../../domain/status';
import type { EventHandlerRegistry } from '../handlers/EventHandlerRegistry';
import { HandlerInvoker } from '../handlers/HandlerInvoker';
import { EventPhase, ResolvedHandler } from '../handlers/IEventHandler';
import { ILogger, consoleLogger } from '../logging';
import { CommitExceptionTranslator } from './CommitExceptionTranslator';
import { EventRunnerConfig, createEventRunnerConfig } from './EventRunnerConfig';

/** Header of the status returned by a successful commit */
export const SUCCESSFULLY_SAVED_MESSAGE = 'Successfully saved';

/**
 * Supplies the entities tracked by the unit of work. Called once per pass,
 * so entities attached by a handler are seen by the next pass.
 */
export type TrackedEntitiesProvider = () => Iterable<IEventsEntity>;

export class EventsRunner {
  private readonly invoker: HandlerInvoker;
  private readonly translator: CommitExceptionTranslator;
  private readonly skipDuringCommit: boolean;
  private readonly skipAfterCommit: boolean;
  private afterCommitCheckedForBlocking = false;

  /**
   * @param registry - Frozen by the constructor
   */
  constructor(
    private readonly registry: EventHandlerRegistry,
    private readonly config: EventRunnerConfig = createEventRunnerConfig(),
    private readonly logger: ILogger = consoleLogger,
  ) {
    registry.freeze();
    this.invoker = new HandlerInvoker(config, logger);
    this.translator = new CommitExceptionTranslator(config, logger);

    // A phase with nothing registered is skipped, leaving its events queued.
    this.skipDuringCommit =
      config.notUsingDuringCommitHandlers || !registry.hasHandlersFor(EventPhase.DuringCommit);
    this.skipAfterCommit =
      config.notUsingAfterCommitHandlers || !registry.hasHandlersFor(EventPhase.AfterCommit);
  }

  /**
   * Run a commit cycle from the blocking entry point.
   *
   * @param commit - Performs the durable write and returns its result
   * @param collaborator - Object the commit belongs to, used to find the
   * commit exception handler and the post-cascade actions
   * @throws CascadeOverflowException, HandlerModeException, or a handler or
   * commit error that was not turned into a status. An async after-commit
   * handler is refused before anything runs, not after the write.
   */
  runBeforeAndAfter<TResult>(
    getTrackedEntities: TrackedEntitiesProvider,
    commit: () => TResult,
    collaborator?: object,
  ): IStatusGeneric<TResult> {
    this.ensureAfterCommitIsBlocking();
    const status = new StatusGeneric<TResult>();

    let passes = 0;
    let pairs = this.drain(getTrackedEntities, (entity) => entity.drainBefore());
    while (pairs.length > 0) {
      passes++;
      this.logPass(passes, pairs);
      this.runPass(pairs, EventPhase.BeforeCommit, status);
      this.checkCascadeLimit(passes, pairs);
      if (!status.isValid) {
        return status;
      }
      pairs = this.drain(getTrackedEntities, (entity) => entity.drainBefore());
    }

    this.runCollaboratorActions(collaborator);

    if (!this.skipDuringCommit) {
      const duringPairs = this.drain(getTrackedEntities, (entity) => entity.drainDuring());
      this.runPass(duringPairs, EventPhase.DuringCommit, status);
      if (!status.isValid) {
        return status;
      }
    }

    const outcome = this.translator.runCommit(commit, collaborator);
    if (!outcome.committed) {
      return status.combine(outcome.status);
    }
    this.markSaved(status, outcome);

    if (!this.skipAfterCommit) {
      const afterPairs = this.drain(getTrackedEntities, (entity) => entity.drainAfter());
      this.runPass(afterPairs, EventPhase.AfterCommit, status);
    }
    return status;
  }

  /**
   * Run a commit cycle from the async entry point. Accepts both sync and
   * async handlers; otherwise behaves exactly like {@link runBeforeAndAfter}.
   */
  async runBeforeAndAfterAsync<TResult>(
    getTrackedEntities: TrackedEntitiesProvider,
    commitAsync: () => Promise<TResult>,
    collaborator?: object,
  ): Promise<IStatusGeneric<TResult>> {
    const status = new StatusGeneric<TResult>();

    let passes = 0;
    let pairs = this.drain(getTrackedEntities, (entity) => entity.drainBefore());
    while (pairs.length > 0) {
      passes++;
      this.logPass(passes, pairs);
      await this.runPassAsync(pairs, EventPhase.BeforeCommit, status);
      this.checkCascadeLimit(passes, pairs);
      if (!status.isValid) {
        return status;
      }
      pairs = this.drain(getTrackedEntities, (entity) => entity.drainBefore());
    }

    this.runCollaboratorActions(collaborator);

    if (!this.skipDuringCommit) {
      const duringPairs = this.drain(getTrackedEntities, (entity) => entity.drainDuring());
      await this.runPassAsync(duringPairs, EventPhase.DuringCommit, status);
      if (!status.isValid) {
        return status;
      }
    }

    const outcome = await this.translator.runCommitAsync(commitAsync, collaborator);
    if (!outcome.committed) {
      return status.combine(outcome.status);
    }
    this.markSaved(status, outcome);

    if (!this.skipAfterCommit) {
      const afterPairs = this.drain(getTrackedEntities, (entity) => entity.drainAfter());
      await this.runPassAsync(afterPairs, EventPhase.AfterCommit, status);
    }
    return status;
  }

  // ============================================================================
  // Passes
  // ============================================================================

  private drain(
    getTrackedEntities: TrackedEntitiesProvider,
    take: (entity: IEventsEntity) => IDomainEvent[],
  ): EntityAndEvent[] {
    const pairs: EntityAndEvent[] = [];
    for (const callingEntity of getTrackedEntities()) {
      for (const domainEvent of take(callingEntity)) {
        pairs.push({ callingEntity, domainEvent });
      }
    }
    return pairs;
  }

  private runPass<TResult>(
    pairs: readonly EntityAndEvent[],
    phase: EventPhase,
    status: StatusGeneric<TResult>,
  ): void {
    for (const pair of pairs) {
      for (const handler of this.registry.resolveHandlers(pair.domainEvent.constructor, phase)) {
        status.combine(this.invoker.invoke(handler, pair));
        if (this.shouldStop(handler, status)) {
          return;
        }
      }
    }
  }

  private async runPassAsync<TResult>(
    pairs: readonly EntityAndEvent[],
    phase: EventPhase,
    status: StatusGeneric<TResult>,
  ): Promise<void> {
    for (const pair of pairs) {
      for (const handler of this.registry.resolveHandlers(pair.domainEvent.constructor, phase)) {
        status.combine(await this.invoker.invokeAsync(handler, pair));
        if (this.shouldStop(handler, status)) {
          return;
        }
      }
    }
  }

  private shouldStop(handler: ResolvedHandler, status: IStatusGeneric<unknown>): boolean {
    if (handler.phase === EventPhase.AfterCommit || status.isValid) {
      return false;
    }
    return handler.stopOnFirstError ?? this.config.stopOnFirstBeforeHandlerError;
  }

  private checkCascadeLimit(passes: number, pairs: readonly EntityAndEvent[]): void {
    const max = this.config.maxBeforeCommitCascadeIterations;
    const last = pairs.at(-1);
    if (passes <= max || last === undefined) {
      return;
    }
    throw new CascadeOverflowException(
      `The before-commit event handlers ran more than ${max} passes, which implies a circular ` +
        `set of events. The last event was ${last.domainEvent.eventName}.`,
      last.callingEntity,
      last.domainEvent,
    );
  }

  private markSaved<TResult>(
    status: StatusGeneric<TResult>,
    outcome: { readonly result: TResult; readonly status?: IStatusGeneric },
  ): void {
    // Messages of a commit exception handler that allowed the retry.
    if (outcome.status !== undefined) {
      status.combine(outcome.status);
    }
    status.setResult(outcome.result);
    status.message = SUCCESSFULLY_SAVED_MESSAGE;
  }

  private ensureAfterCommitIsBlocking(): void {
    if (this.skipAfterCommit || this.afterCommitCheckedForBlocking) {
      return;
    }
    for (const handler of this.registry.resolvePhase(EventPhase.AfterCommit)) {
      this.invoker.ensureBlocking(handler);
    }
    this.afterCommitCheckedForBlocking = true;
  }

  private runCollaboratorActions(collaborator: object | undefined): void {
    if (collaborator === undefined) {
      return;
    }
    for (const action of this.config.actionsToRunAfterBeforeEvents) {
      if (action.collaboratorType === collaborator.constructor) {
        action.run(collaborator);
      }
    }
  }

  private logPass(pass: number, pairs: readonly EntityAndEvent[]): void {
    this.logger.debug(`Before-commit pass ${pass} found ${pairs.length} event(s).`, {
      pass,
      events: pairs.map((pair) => pair.domainEvent.eventName),
    });
  }
}
