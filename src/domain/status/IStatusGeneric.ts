/**
 * @fileoverview Status - Aggregated Validation Result
 *
 * @packageDocumentation
 * @module domain-event-runner/domain/status
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Core)
 *
 * A status is what an event handler, the commit exception handler and the
 * events runner hand back instead of throwing. It collects an ordered list
 * of messages, each with a severity, and optionally carries a typed result
 * (e.g. the number of rows the commit wrote).
 *
 * ```
 * Handler A → Status { errors: [] }
 * Handler B → Status { errors: ['Not enough stock'] }
 *    ↓ combine
 * Runner   → Status { isValid: false, errors: ['Not enough stock'] }
 * ```
 *
 * **Validity Rule:**
 *
 * A status is invalid if, and only if, it holds at least one message with
 * `'error'` severity. Warnings and info messages never change validity.
 *
 * @version 1.0.0
 */

/**
 * Severity of a single status message.
 */
export type MessageSeverity = 'error' | 'warning' | 'info';

/**
 * A single entry in a status.
 *
 * @example
 * ```typescript
 * const entry: StatusMessage = {
 *   severity: 'error',
 *   text: 'I could not accept this order because there wasn\'t enough Widget in stock.',
 *   memberNames: ['numOrdered'],
 * };
 * ```
 */
export interface StatusMessage {
  readonly severity: MessageSeverity;
  readonly text: string;

  /** Optional names of the properties the message refers to */
  readonly memberNames?: readonly string[];
}

/**
 * Read-only view of a status.
 *
 * @template TResult - Type of the optional result value. A status that
 * carries no result is an `IStatusGeneric<never>`, which can be combined
 * into a status of any result type.
 */
export interface IStatusGeneric<TResult = never> {
  /** True when no error-severity message is present */
  readonly isValid: boolean;

  /** True when at least one error-severity message is present */
  readonly hasErrors: boolean;

  /** True when at least one warning-severity message is present */
  readonly hasWarnings: boolean;

  /** Every message, in the order it was added or combined */
  readonly messages: readonly StatusMessage[];

  /** The error-severity subset of {@link messages} */
  readonly errors: readonly StatusMessage[];

  /** The warning-severity subset of {@link messages} */
  readonly warnings: readonly StatusMessage[];

  /**
   * Header message.
   *
   * @remarks
   * While valid this is the success message (default `'Success'`). Once
   * invalid it reports the error count, e.g. `'Failed with 2 errors'`.
   */
  readonly message: string;

  /** True when {@link result} was set explicitly */
  readonly hasResult: boolean;

  /** Result value, if one was set */
  readonly result: TResult | undefined;

  /**
   * Join the text of every error.
   *
   * @param separator - Placed between errors (default newline)
   */
  getAllErrors(separator?: string): string;
}
