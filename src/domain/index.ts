/**
 * @module domain-event-runner/domain
 * @description Domain layer exports
 */

// ============================================================================
// Domain Events
// ============================================================================

export * from './events';

// ============================================================================
// Status
// ============================================================================

export * from './status';

// ============================================================================
// Exceptions
// ============================================================================

export * from './exceptions';
