/**
 * @module domain-event-runner/application/handlers
 */

import 'reflect-metadata';

import type { HandlerOptions } from './IEventHandler';

const HANDLER_CONFIG_KEY = Symbol('eventHandler:config');

/**
 * Class decorator attaching {@link HandlerOptions} to a handler class.
 *
 * @example
 * ```typescript
 * @EventHandlerConfig({
 *   stopOnFirstError: false,
 *   exceptionErrorMessage: 'Could not recalculate the tax for this order.',
 * })
 * class TaxRateChangedHandler implements IBeforeCommitEventHandler<TaxRateChanged> {
 *   handle(entity: IEventsEntity, event: TaxRateChanged): IStatusGeneric { ... }
 * }
 * ```
 */
export function EventHandlerConfig(options: HandlerOptions): ClassDecorator {
  return function (target) {
    Reflect.defineMetadata(HANDLER_CONFIG_KEY, { ...options }, target);
  };
}

/**
 * Read the options a handler's class was decorated with.
 *
 * @returns An empty object when the class is not decorated
 */
export function getEventHandlerConfig(handler: object): HandlerOptions {
  const metadata: unknown = Reflect.getMetadata(HANDLER_CONFIG_KEY, handler.constructor);
  return isHandlerOptions(metadata) ? metadata : {};
}

function isHandlerOptions(value: unknown): value is HandlerOptions {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const name: unknown = Reflect.get(value, 'name');
  const stopOnFirstError: unknown = Reflect.get(value, 'stopOnFirstError');
  const exceptionErrorMessage: unknown = Reflect.get(value, 'exceptionErrorMessage');
  return (
    (name === undefined || typeof name === 'string') &&
    (stopOnFirstError === undefined || typeof stopOnFirstError === 'boolean') &&
    (exceptionErrorMessage === undefined || typeof exceptionErrorMessage === 'string')
  );
}
