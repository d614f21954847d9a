/**
 * @fileoverview Unit of Work With Events
 *
 * @packageDocumentation
 * @module domain-event-runner/application/uow
 *
 * Base class for a unit of work whose commit runs the domain events of the
 * entities it tracks. Adapters extend it for a specific persistence engine
 * and implement three methods:
 *
 * - `getTrackedEntities()` - every entity loaded or attached in this unit of work
 * - `saveChanges()` - the blocking durable write
 * - `saveChangesAsync()` - the asynchronous durable write
 *
 * ## Commit Flow
 *
 * ```
 * uow.commitAsync()
 *   ↓
 * EventsRunner.runBeforeAndAfterAsync(getTrackedEntities, saveChangesAsync, uow)
 *   ↓
 * Status valid?   → return the write's result
 * Status invalid? → throw EventRunnerStatusException (nothing was written)
 * ```
 *
 * Use `commitWithStatus*()` to receive the status instead of an exception,
 * e.g. to show the errors to a user.
 *
 * @example
 * ```typescript
 * class OrderUnitOfWork extends UnitOfWorkWithEvents<number> {
 *   constructor(runner: EventsRunner, private readonly db: Database) {
 *     super(runner);
 *   }
 *
 *   protected getTrackedEntities(): Iterable<IEventsEntity> {
 *     return this.db.trackedEntities();
 *   }
 *
 *   protected saveChanges(): number {
 *     return this.db.flush();
 *   }
 *
 *   protected saveChangesAsync(): Promise<number> {
 *     return this.db.flushAsync();
 *   }
 * }
 * ```
 */

import type { IEventsEntity } from '../../domain/events';
import { EventRunnerException, EventRunnerStatusException } from '../../domain/exceptions';
import type { IStatusGeneric } from '../../domain/status';
import type { EventsRunner } from '../runner/EventsRunner';

/**
 * Unit of work lifecycle state.
 */
export enum UnitOfWorkState {
  /** Nothing committed yet */
  Idle = 'IDLE',
  /** A commit cycle is running */
  Committing = 'COMMITTING',
  /** The last commit cycle wrote its changes */
  Committed = 'COMMITTED',
  /** The last commit cycle returned errors; nothing was written */
  Rejected = 'REJECTED',
  /** The last commit cycle threw */
  Failed = 'FAILED',
}

export abstract class UnitOfWorkWithEvents<TResult = number> {
  private _state = UnitOfWorkState.Idle;
  private lastCommit: { readonly value: TResult } | undefined;

  constructor(protected readonly eventsRunner: EventsRunner) {}

  get state(): UnitOfWorkState {
    return this._state;
  }

  /**
   * Entities whose queued events should run on commit. Called once per
   * cascade pass.
   */
  protected abstract getTrackedEntities(): Iterable<IEventsEntity>;

  protected abstract saveChanges(): TResult;

  protected abstract saveChangesAsync(): Promise<TResult>;

  /**
   * Run the events and commit, returning the status.
   *
   * @throws EventRunnerException if a commit cycle is already running
   */
  commitWithStatus(): IStatusGeneric<TResult> {
    this.begin();
    try {
      const status = this.eventsRunner.runBeforeAndAfter(
        () => this.getTrackedEntities(),
        () => this.record(this.saveChanges()),
        this,
      );
      this._state = status.isValid ? UnitOfWorkState.Committed : UnitOfWorkState.Rejected;
      return status;
    } catch (error) {
      this._state = UnitOfWorkState.Failed;
      throw error;
    }
  }

  async commitWithStatusAsync(): Promise<IStatusGeneric<TResult>> {
    this.begin();
    try {
      const status = await this.eventsRunner.runBeforeAndAfterAsync(
        () => this.getTrackedEntities(),
        async () => this.record(await this.saveChangesAsync()),
        this,
      );
      this._state = status.isValid ? UnitOfWorkState.Committed : UnitOfWorkState.Rejected;
      return status;
    } catch (error) {
      this._state = UnitOfWorkState.Failed;
      throw error;
    }
  }

  /**
   * Run the events and commit.
   *
   * @returns What `saveChanges()` returned
   * @throws EventRunnerStatusException if the status is invalid
   */
  commit(): TResult {
    return this.unwrap(this.commitWithStatus());
  }

  async commitAsync(): Promise<TResult> {
    return this.unwrap(await this.commitWithStatusAsync());
  }

  private begin(): void {
    if (this._state === UnitOfWorkState.Committing) {
      throw new EventRunnerException(
        `${this.constructor.name} is already committing. A handler must not commit its own unit of work.`,
      );
    }
    this._state = UnitOfWorkState.Committing;
    this.lastCommit = undefined;
  }

  private record(value: TResult): TResult {
    this.lastCommit = { value };
    return value;
  }

  private unwrap(status: IStatusGeneric<TResult>): TResult {
    const committed = this.lastCommit;
    this.lastCommit = undefined;
    if (!status.isValid || committed === undefined) {
      throw new EventRunnerStatusException(status);
    }
    return committed.value;
  }
}
