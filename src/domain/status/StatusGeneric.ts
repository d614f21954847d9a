/**
 * @module domain-event-runner/domain/status
 */

import type {
  IStatusGeneric,
  MessageSeverity,
  StatusMessage,
} from './IStatusGeneric';

/** Header reported by a valid status whose message was never set */
export const DEFAULT_SUCCESS_MESSAGE = 'Success';

/** Error recorded by `StatusGeneric.create(false)` */
export const DEFAULT_INVALID_MESSAGE = 'The operation was not valid.';

/**
 * StatusGeneric - mutable status builder
 *
 * Combining statuses is associative and keeps message order, so combining
 * after every handler gives the same aggregate as combining all of them at
 * the end.
 *
 * @template TResult - Type of the optional result value
 *
 * @example
 * ```typescript
 * const status = new StatusGeneric<number>();
 * status.combine(handlerA.handle(order, event));
 * status.combine(handlerB.handle(order, event));
 * if (status.isValid) {
 *   status.setResult(await uow.saveChangesAsync());
 * }
 * ```
 */
export class StatusGeneric<TResult = never> implements IStatusGeneric<TResult> {
  private readonly _messages: StatusMessage[] = [];
  private _successMessage = DEFAULT_SUCCESS_MESSAGE;
  private _result: TResult | undefined;
  private _hasResult = false;

  /**
   * Create a status that is valid, or invalid with the default error.
   */
  static create<T = never>(valid: boolean = true): StatusGeneric<T> {
    const status = new StatusGeneric<T>();
    if (!valid) {
      status.addError(DEFAULT_INVALID_MESSAGE);
    }
    return status;
  }

  get isValid(): boolean {
    return !this.hasErrors;
  }

  get hasErrors(): boolean {
    return this._messages.some((entry) => entry.severity === 'error');
  }

  get hasWarnings(): boolean {
    return this._messages.some((entry) => entry.severity === 'warning');
  }

  get messages(): readonly StatusMessage[] {
    return [...this._messages];
  }

  get errors(): readonly StatusMessage[] {
    return this.filter('error');
  }

  get warnings(): readonly StatusMessage[] {
    return this.filter('warning');
  }

  get message(): string {
    if (this.isValid) {
      return this._successMessage;
    }
    const count = this.errors.length;
    return `Failed with ${count} error${count === 1 ? '' : 's'}`;
  }

  set message(value: string) {
    this._successMessage = value;
  }

  get hasResult(): boolean {
    return this._hasResult;
  }

  get result(): TResult | undefined {
    return this._result;
  }

  addError(text: string, ...memberNames: string[]): this {
    return this.add('error', text, memberNames);
  }

  addWarning(text: string, ...memberNames: string[]): this {
    return this.add('warning', text, memberNames);
  }

  /** Adds an info-severity message */
  addMessage(text: string, ...memberNames: string[]): this {
    return this.add('info', text, memberNames);
  }

  setResult(value: TResult): this {
    this._result = value;
    this._hasResult = true;
    return this;
  }

  /**
   * Merge another status into this one.
   *
   * Messages are appended in order and validity becomes the AND of both.
   * The other's result replaces ours only if it was set explicitly; its
   * header replaces ours only when both are valid and it is not the default.
   */
  combine(other: IStatusGeneric<TResult>): this {
    this._messages.push(...other.messages);

    if (this.isValid && other.isValid && other.message !== DEFAULT_SUCCESS_MESSAGE) {
      this._successMessage = other.message;
    }

    if (other.hasResult) {
      this._result = other.result;
      this._hasResult = true;
    }
    return this;
  }

  getAllErrors(separator: string = '\n'): string {
    return this.errors.map((entry) => entry.text).join(separator);
  }

  private add(severity: MessageSeverity, text: string, memberNames: string[]): this {
    this._messages.push(
      memberNames.length > 0 ? { severity, text, memberNames } : { severity, text },
    );
    return this;
  }

  private filter(severity: MessageSeverity): StatusMessage[] {
    return this._messages.filter((entry) => entry.severity === severity);
  }
}

/**
 * Type guard for what a handler hands back: a status, or nothing.
 */
export function isStatusGeneric(value: unknown): value is IStatusGeneric {
  return (
    typeof value === 'object' &&
    value !== null &&
    'isValid' in value &&
    typeof value.isValid === 'boolean' &&
    'messages' in value &&
    Array.isArray(value.messages) &&
    'getAllErrors' in value &&
    typeof value.getAllErrors === 'function'
  );
}
