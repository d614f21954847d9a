/**
 * @module domain-event-runner/application/uow
 */

export { UnitOfWorkWithEvents, UnitOfWorkState } from './UnitOfWorkWithEvents';
