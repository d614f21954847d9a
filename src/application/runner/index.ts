/**
 * @module domain-event-runner/application/runner
 * @description Events runner, its configuration and the commit exception translator
 */

export type {
  CollaboratorType,
  CommitExceptionHandler,
  HandlerFailureContext,
  HandlerExceptionPolicy,
  CollaboratorAction,
  EventRunnerConfig,
  EventRunnerOptions,
} from './EventRunnerConfig';
export {
  EventRunnerConfigBuilder,
  createEventRunnerConfig,
  DEFAULT_MAX_BEFORE_COMMIT_CASCADE_ITERATIONS,
} from './EventRunnerConfig';

export type { CommitOutcome } from './CommitExceptionTranslator';
export { CommitExceptionTranslator } from './CommitExceptionTranslator';

export type { TrackedEntitiesProvider } from './EventsRunner';
export { EventsRunner, SUCCESSFULLY_SAVED_MESSAGE } from './EventsRunner';
