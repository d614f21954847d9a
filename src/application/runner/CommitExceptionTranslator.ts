/**
 * @fileoverview Commit Exception Translator
 *
 * @packageDocumentation
 * @module domain-event-runner/application/runner
 *
 * Wraps the commit callback. When the commit throws, the handler registered
 * for the collaborator's exact type decides what the failure means:
 *
 * ```
 * commit() throws
 *   ↓
 * handler for collaborator.constructor?
 *   ├─ none                 → rethrow
 *   ├─ returns null         → rethrow
 *   ├─ returns errors       → { committed: false, status }
 *   └─ returns valid status → commit() once more
 *                               ├─ succeeds      → { committed: true, result, status }
 *                               └─ throws again  → same handler:
 *                                    errors      → { committed: false, status }
 *                                    null/valid  → rethrow the second failure
 * ```
 *
 * A valid status means "I fixed the cause", e.g. a concurrency conflict was
 * resolved by reloading the row, so one retry is allowed. The handler's status
 * rides on the successful outcome so its warnings reach the caller.
 */

import { EventRunnerException } from '../../domain/exceptions';
import type { IStatusGeneric } from '../../domain/status';
import { isPromiseLike } from '../handlers/isPromiseLike';
import type { ILogger } from '../logging';
import type { EventRunnerConfig } from './EventRunnerConfig';

/**
 * What happened to the commit.
 */
export type CommitOutcome<TResult> =
  | { readonly committed: true; readonly result: TResult; readonly status?: IStatusGeneric }
  | { readonly committed: false; readonly status: IStatusGeneric };

type CommitAttempt<TResult> =
  | { readonly failed: false; readonly result: TResult }
  | { readonly failed: true; readonly error: unknown };

export class CommitExceptionTranslator {
  constructor(
    private readonly config: EventRunnerConfig,
    private readonly logger: ILogger,
  ) {}

  /**
   * Run a blocking commit.
   *
   * @throws EventRunnerException if the commit returned a promise
   */
  runCommit<TResult>(commit: () => TResult, collaborator?: object): CommitOutcome<TResult> {
    const first = this.attempt(commit);
    if (!first.failed) {
      return { committed: true, result: first.result };
    }

    const translated = this.translate(first.error, collaborator);
    if (!translated.isValid) {
      return { committed: false, status: translated };
    }

    this.logRetry(collaborator);
    return this.settleRetry(this.attempt(commit), translated, collaborator);
  }

  async runCommitAsync<TResult>(
    commit: () => Promise<TResult>,
    collaborator?: object,
  ): Promise<CommitOutcome<TResult>> {
    const first = await this.attemptAsync(commit);
    if (!first.failed) {
      return { committed: true, result: first.result };
    }

    const translated = this.translate(first.error, collaborator);
    if (!translated.isValid) {
      return { committed: false, status: translated };
    }

    this.logRetry(collaborator);
    return this.settleRetry(await this.attemptAsync(commit), translated, collaborator);
  }

  private attempt<TResult>(commit: () => TResult): CommitAttempt<TResult> {
    let result: TResult;
    try {
      result = commit();
    } catch (error) {
      return { failed: true, error };
    }

    if (isPromiseLike(result)) {
      void Promise.resolve(result).catch((error: unknown) => {
        this.logger.error('A commit started from the blocking entry point rejected.', { error });
      });
      throw new EventRunnerException(
        'The commit callback returned a promise. Use the async commit for asynchronous persistence.',
      );
    }
    return { failed: false, result };
  }

  private async attemptAsync<TResult>(
    commit: () => Promise<TResult>,
  ): Promise<CommitAttempt<TResult>> {
    try {
      return { failed: false, result: await commit() };
    } catch (error) {
      return { failed: true, error };
    }
  }

  private settleRetry<TResult>(
    retry: CommitAttempt<TResult>,
    resolution: IStatusGeneric,
    collaborator: object | undefined,
  ): CommitOutcome<TResult> {
    if (!retry.failed) {
      return { committed: true, result: retry.result, status: resolution };
    }

    const translated = this.translate(retry.error, collaborator);
    if (!translated.isValid) {
      return { committed: false, status: translated };
    }
    throw retry.error;
  }

  /**
   * @throws the original error when no handler applies or it returns null
   */
  private translate(error: unknown, collaborator: object | undefined): IStatusGeneric {
    const handler =
      collaborator === undefined
        ? undefined
        : this.config.commitExceptionHandlers.get(collaborator.constructor);
    if (handler === undefined || collaborator === undefined) {
      throw error;
    }

    const status = handler(error, collaborator);
    if (status === null) {
      throw error;
    }

    this.logger.warn(
      `The commit failed and was handled by the commit exception handler for ${collaborator.constructor.name}.`,
      { error, valid: status.isValid },
    );
    return status;
  }

  private logRetry(collaborator: object | undefined): void {
    this.logger.info(
      `Retrying the commit for ${collaborator?.constructor.name ?? 'the unit of work'} once.`,
    );
  }
}
