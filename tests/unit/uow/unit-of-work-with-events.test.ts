/**
 * @fileoverview Unit tests for UnitOfWorkWithEvents
 */

import {
  DomainEventBase,
  EntityEvents,
  EventHandlerRegistry,
  EventRunnerException,
  EventRunnerStatusException,
  EventsRunner,
  IEventsEntity,
  StatusGeneric,
  UnitOfWorkState,
  UnitOfWorkWithEvents,
  createEventRunnerConfig,
} from '../../../src';
import { RecordingLogger } from '../../support/RecordingLogger';

class Note extends EntityEvents {}

class NoteEdited extends DomainEventBase<{ readonly text: string }> {}

/**
 * Unit of work over a plain array, counting its saves
 */
class NotesUnitOfWork extends UnitOfWorkWithEvents<string> {
  readonly notes: Note[] = [];
  saves = 0;

  protected getTrackedEntities(): Iterable<IEventsEntity> {
    return this.notes;
  }

  protected saveChanges(): string {
    this.saves++;
    return `saved ${this.notes.length}`;
  }

  protected async saveChangesAsync(): Promise<string> {
    return this.saveChanges();
  }
}

describe('UnitOfWorkWithEvents', () => {
  let registry: EventHandlerRegistry;
  let note: Note;

  const createUnitOfWork = (turnHandlerExceptionsToErrorStatus = true) => {
    const runner = new EventsRunner(
      registry,
      createEventRunnerConfig({ turnHandlerExceptionsToErrorStatus }),
      new RecordingLogger(),
    );
    const uow = new NotesUnitOfWork(runner);
    uow.notes.push(note);
    return uow;
  };

  beforeEach(() => {
    registry = new EventHandlerRegistry();
    note = new Note();
  });

  it('should start idle', () => {
    expect(createUnitOfWork().state).toBe(UnitOfWorkState.Idle);
  });

  it('should return the save result from commit()', () => {
    const uow = createUnitOfWork();

    expect(uow.commit()).toBe('saved 1');
    expect(uow.state).toBe(UnitOfWorkState.Committed);
  });

  it('should return the save result from commitAsync()', async () => {
    const uow = createUnitOfWork();

    await expect(uow.commitAsync()).resolves.toBe('saved 1');
  });

  it('should carry the save result on the status', () => {
    const status = createUnitOfWork().commitWithStatus();

    expect(status.result).toBe('saved 1');
    expect(status.message).toBe('Successfully saved');
  });

  it('should throw the invalid status from commit() without saving', () => {
    registry.addBeforeCommitHandler(NoteEdited, {
      handle: () => new StatusGeneric().addError('Notes are read-only.'),
    });
    note.enqueueBefore(new NoteEdited({ text: 'hello' }));
    const uow = createUnitOfWork();

    expect(() => uow.commit()).toThrow(EventRunnerStatusException);
    expect(uow.saves).toBe(0);
    expect(uow.state).toBe(UnitOfWorkState.Rejected);
  });

  it('should refuse a commit started by one of its own handlers', () => {
    let uow: NotesUnitOfWork | undefined;
    registry.addBeforeCommitHandler(NoteEdited, {
      handle: () => {
        uow?.commitWithStatus();
      },
    });
    note.enqueueBefore(new NoteEdited({ text: 'hello' }));
    uow = createUnitOfWork(false);
    const outer = uow;

    expect(() => outer.commitWithStatus()).toThrow(
      new EventRunnerException(
        'NotesUnitOfWork is already committing. A handler must not commit its own unit of work.',
      ),
    );
    expect(outer.saves).toBe(0);
  });

  it('should allow a new commit once the previous one finished', () => {
    const uow = createUnitOfWork();

    uow.commit();

    expect(uow.commit()).toBe('saved 1');
    expect(uow.saves).toBe(2);
  });
});
