/**
 * @fileoverview Unit tests for domain events and event-queueing entities
 *
 * Entities queue events in memory; draining a queue hands the events over
 * and empties it in one step.
 */

import { DomainEventBase, EntityEvents, EventToSend } from '../../../src/domain/events';

// ============================================================================
// Test Domain
// ============================================================================

class Ping extends DomainEventBase<{ readonly n: number }> {}

class Pong extends DomainEventBase<{ readonly n: number }> {}

class Counter extends EntityEvents {
  ping(n: number): void {
    this.enqueueBefore(new Ping({ n }));
  }
}

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

// ============================================================================
// Tests
// ============================================================================

describe('DomainEventBase', () => {
  it('should name the event after its class', () => {
    expect(new Ping({ n: 1 }).eventName).toBe('Ping');
    expect(new Pong({ n: 1 }).eventName).toBe('Pong');
  });

  it('should fill in the metadata', () => {
    const event = new Ping({ n: 1 });

    expect(event.metadata.eventId).toMatch(UUID_V4);
    expect(new Date(event.metadata.occurredAt).toISOString()).toBe(event.metadata.occurredAt);
    expect(event.metadata.actorId).toBeUndefined();
  });

  it('should give every event its own id', () => {
    expect(new Ping({ n: 1 }).metadata.eventId).not.toBe(new Ping({ n: 1 }).metadata.eventId);
  });

  it('should apply metadata overrides', () => {
    const event = new Ping(
      { n: 7 },
      { eventId: 'evt-1', occurredAt: '2026-01-01T00:00:00.000Z', actorId: 'user-1' },
    );

    expect(event.metadata).toEqual({
      eventId: 'evt-1',
      occurredAt: '2026-01-01T00:00:00.000Z',
      correlationId: undefined,
      actorId: 'user-1',
      context: undefined,
    });
    expect(event.payload).toEqual({ n: 7 });
  });
});

describe('EntityEvents', () => {
  let entity: Counter;

  beforeEach(() => {
    entity = new Counter();
  });

  describe('drain', () => {
    it('should return queued events in order', () => {
      entity.ping(1);
      entity.ping(2);

      const drained = entity.drainBefore();

      expect(drained.map((event) => event.payload)).toEqual([{ n: 1 }, { n: 2 }]);
    });

    it('should return nothing when drained twice in a row', () => {
      entity.ping(1);

      entity.drainBefore();

      expect(entity.drainBefore()).toEqual([]);
    });

    it('should put events queued after a drain into the next drain', () => {
      entity.ping(1);
      const first = entity.drainBefore();

      entity.ping(2);

      expect(first).toHaveLength(1);
      expect(entity.drainBefore().map((event) => event.payload)).toEqual([{ n: 2 }]);
    });

    it('should keep the three queues apart', () => {
      const before = new Ping({ n: 1 });
      const during = new Ping({ n: 2 });
      const after = new Ping({ n: 3 });

      entity.enqueueBefore(before);
      entity.enqueueDuring(during);
      entity.enqueueAfter(after);

      expect(entity.drainAfter()).toEqual([after]);
      expect(entity.drainDuring()).toEqual([during]);
      expect(entity.drainBefore()).toEqual([before]);
    });
  });

  describe('addEvent', () => {
    it('should queue before commit by default', () => {
      const event = new Ping({ n: 1 });

      entity.addEvent(event);

      expect(entity.drainBefore()).toEqual([event]);
      expect(entity.drainAfter()).toEqual([]);
    });

    it.each([
      [EventToSend.BeforeCommit, 1, 0, 0],
      [EventToSend.DuringCommit, 0, 1, 0],
      [EventToSend.AfterCommit, 0, 0, 1],
      [EventToSend.BeforeAndAfterCommit, 1, 0, 1],
    ])('should queue %s events in the matching queues', (when, before, during, after) => {
      entity.addEvent(new Pong({ n: 1 }), when);

      expect(entity.drainBefore()).toHaveLength(before);
      expect(entity.drainDuring()).toHaveLength(during);
      expect(entity.drainAfter()).toHaveLength(after);
    });

    it('should queue the same instance before and after commit', () => {
      const event = new Pong({ n: 1 });

      entity.addEvent(event, EventToSend.BeforeAndAfterCommit);

      expect(entity.drainBefore()[0]).toBe(event);
      expect(entity.drainAfter()[0]).toBe(event);
    });
  });

  describe('hasPendingEvents', () => {
    it('should report queued events until they are drained', () => {
      expect(entity.hasPendingEvents()).toBe(false);

      entity.addEvent(new Pong({ n: 1 }), EventToSend.AfterCommit);
      expect(entity.hasPendingEvents()).toBe(true);

      entity.drainAfter();
      expect(entity.hasPendingEvents()).toBe(false);
    });
  });
});
