/**
 * @fileoverview Unit tests for EventHandlerRegistry
 */

import 'reflect-metadata';

import {
  DomainEventBase,
  EventHandlerConfig,
  EventHandlerRegistry,
  EventPhase,
  EventRunnerConfigurationException,
  IAfterCommitEventHandler,
  IBeforeCommitEventHandler,
  IBeforeCommitEventHandlerAsync,
  IEventsEntity,
  IStatusGeneric,
  StatusGeneric,
  getEventHandlerConfig,
} from '../../../src';

// ============================================================================
// Test Domain
// ============================================================================

class ItemAdded extends DomainEventBase<{ readonly sku: string }> {}

class PriorityItemAdded extends ItemAdded {}

class ItemRemoved extends DomainEventBase<{ readonly sku: string }> {}

class FirstHandler implements IBeforeCommitEventHandler<ItemAdded> {
  handle(): IStatusGeneric {
    return new StatusGeneric();
  }
}

class SecondHandler implements IBeforeCommitEventHandler<ItemAdded> {
  handle(): void {}
}

class AsyncHandler implements IBeforeCommitEventHandlerAsync<ItemAdded> {
  async handleAsync(): Promise<void> {}
}

@EventHandlerConfig({ name: 'decorated', stopOnFirstError: false, exceptionErrorMessage: 'From decorator' })
class DecoratedHandler implements IAfterCommitEventHandler<ItemRemoved> {
  handle(_entity: IEventsEntity, _event: ItemRemoved): void {}
}

// ============================================================================
// Tests
// ============================================================================

describe('EventHandlerRegistry', () => {
  let registry: EventHandlerRegistry;

  beforeEach(() => {
    registry = new EventHandlerRegistry();
  });

  describe('resolveHandlers', () => {
    it('should return handlers in registration order', () => {
      registry
        .addBeforeCommitHandler(ItemAdded, new FirstHandler())
        .addBeforeCommitHandler(ItemAdded, new SecondHandler());

      const resolved = registry.resolveHandlers(ItemAdded, EventPhase.BeforeCommit);

      expect(resolved.map((handler) => handler.name)).toEqual(['FirstHandler', 'SecondHandler']);
    });

    it('should return an empty list for an event without handlers', () => {
      registry.addBeforeCommitHandler(ItemAdded, new FirstHandler());

      expect(registry.resolveHandlers(ItemRemoved, EventPhase.BeforeCommit)).toEqual([]);
    });

    it('should keep phases apart', () => {
      registry.addBeforeCommitHandler(ItemAdded, new FirstHandler());

      expect(registry.resolveHandlers(ItemAdded, EventPhase.AfterCommit)).toEqual([]);
      expect(registry.resolveHandlers(ItemAdded, EventPhase.DuringCommit)).toEqual([]);
    });

    it('should match the exact event type only', () => {
      registry.addBeforeCommitHandler(ItemAdded, new FirstHandler());

      expect(registry.resolveHandlers(PriorityItemAdded, EventPhase.BeforeCommit)).toEqual([]);
    });

    it('should detect the handler mode', () => {
      registry
        .addBeforeCommitHandler(ItemAdded, new FirstHandler())
        .addBeforeCommitHandler(ItemAdded, new AsyncHandler());

      const resolved = registry.resolveHandlers(ItemAdded, EventPhase.BeforeCommit);

      expect(resolved.map((handler) => handler.mode)).toEqual(['sync', 'async']);
      expect(resolved.every((handler) => handler.phase === EventPhase.BeforeCommit)).toBe(true);
    });

    it('should share a registered instance', () => {
      const handler = new FirstHandler();
      registry.addBeforeCommitHandler(ItemAdded, handler);

      const [first] = registry.resolveHandlers(ItemAdded, EventPhase.BeforeCommit);
      const [second] = registry.resolveHandlers(ItemAdded, EventPhase.BeforeCommit);

      expect(first?.handler).toBe(handler);
      expect(second?.handler).toBe(handler);
    });

    it('should call a factory on every resolve', () => {
      const factory = jest.fn(() => new FirstHandler());
      registry.addBeforeCommitHandler(ItemAdded, factory);

      const [first] = registry.resolveHandlers(ItemAdded, EventPhase.BeforeCommit);
      const [second] = registry.resolveHandlers(ItemAdded, EventPhase.BeforeCommit);

      expect(factory).toHaveBeenCalledTimes(2);
      expect(first?.handler).not.toBe(second?.handler);
    });
  });

  describe('handler options', () => {
    it('should read options from the decorator', () => {
      registry.addAfterCommitHandler(ItemRemoved, new DecoratedHandler());

      const [resolved] = registry.resolveHandlers(ItemRemoved, EventPhase.AfterCommit);

      expect(resolved?.name).toBe('decorated');
      expect(resolved?.stopOnFirstError).toBe(false);
      expect(resolved?.exceptionErrorMessage).toBe('From decorator');
    });

    it('should let registration options override the decorator', () => {
      registry.addAfterCommitHandler(ItemRemoved, new DecoratedHandler(), {
        exceptionErrorMessage: 'From registration',
      });

      const [resolved] = registry.resolveHandlers(ItemRemoved, EventPhase.AfterCommit);

      expect(resolved?.name).toBe('decorated');
      expect(resolved?.exceptionErrorMessage).toBe('From registration');
    });

    it('should leave overrides unset on an undecorated handler', () => {
      registry.addBeforeCommitHandler(ItemAdded, new FirstHandler());

      const [resolved] = registry.resolveHandlers(ItemAdded, EventPhase.BeforeCommit);

      expect(resolved?.stopOnFirstError).toBeUndefined();
      expect(resolved?.exceptionErrorMessage).toBeUndefined();
      expect(getEventHandlerConfig(new FirstHandler())).toEqual({});
    });
  });

  describe('freeze', () => {
    it('should reject registrations once frozen', () => {
      registry.freeze();

      expect(registry.isFrozen).toBe(true);
      expect(() => registry.addBeforeCommitHandler(ItemAdded, new FirstHandler())).toThrowErrorType(
        EventRunnerConfigurationException,
      );
    });

    it('should still resolve once frozen', () => {
      registry.addBeforeCommitHandler(ItemAdded, new FirstHandler()).freeze();

      expect(registry.resolveHandlers(ItemAdded, EventPhase.BeforeCommit)).toHaveLength(1);
    });
  });

  describe('introspection', () => {
    it('should report which phases have handlers', () => {
      registry.addAfterCommitHandler(ItemRemoved, new DecoratedHandler());

      expect(registry.hasHandlersFor(EventPhase.AfterCommit)).toBe(true);
      expect(registry.hasHandlersFor(EventPhase.BeforeCommit)).toBe(false);
    });

    it('should list registrations per phase', () => {
      registry
        .addBeforeCommitHandler(ItemAdded, new FirstHandler())
        .addBeforeCommitHandler(ItemRemoved, new FirstHandler(), { name: 'removal' });

      const registrations = registry.getRegistrations(EventPhase.BeforeCommit);

      expect(registrations.map((registration) => registration.eventType)).toEqual([
        ItemAdded,
        ItemRemoved,
      ]);
      expect(registrations[1]?.options).toEqual({ name: 'removal' });
    });

    it('should resolve every handler of a phase', () => {
      registry
        .addBeforeCommitHandler(ItemAdded, new FirstHandler())
        .addBeforeCommitHandler(ItemAdded, () => new AsyncHandler())
        .addAfterCommitHandler(ItemRemoved, new DecoratedHandler());

      const resolved = registry.resolvePhase(EventPhase.BeforeCommit);

      expect(resolved.map((handler) => [handler.name, handler.mode])).toEqual([
        ['FirstHandler', 'sync'],
        ['AsyncHandler', 'async'],
      ]);
    });
  });
});
