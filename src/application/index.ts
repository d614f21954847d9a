/**
 * @module domain-event-runner/application
 * @description Application layer exports
 */

// ============================================================================
// Logging
// ============================================================================

export * from './logging';

// ============================================================================
// Event Handlers
// ============================================================================

export * from './handlers';

// ============================================================================
// Events Runner
// ============================================================================

export * from './runner';

// ============================================================================
// Unit of Work
// ============================================================================

export * from './uow';
