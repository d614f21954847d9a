/**
 * @module domain-event-runner/domain/exceptions
 * @description Events runner exception exports
 */

export {
  EventRunnerException,
  CascadeOverflowException,
  HandlerModeException,
  EventRunnerConfigurationException,
  EventRunnerStatusException,
} from './exceptions';
