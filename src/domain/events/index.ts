/**
 * @module domain-event-runner/domain/events
 * @description Domain events and event-queueing entity exports
 */

// ============================================================================
// Core Interfaces
// ============================================================================

export type {
  EventMetadata,
  IDomainEvent,
  EventType,
  IEventsEntity,
  EntityAndEvent,
} from './IDomainEvent';

// ============================================================================
// Base Classes & Enums
// ============================================================================

export { DomainEventBase, EntityEvents, EventToSend } from './IDomainEvent';
