/**
 * @module domain-event-runner/domain/status
 * @description Status aggregation exports
 */

export type {
  IStatusGeneric,
  MessageSeverity,
  StatusMessage,
} from './IStatusGeneric';

export {
  StatusGeneric,
  DEFAULT_SUCCESS_MESSAGE,
  DEFAULT_INVALID_MESSAGE,
  isStatusGeneric,
} from './StatusGeneric';
