/**
 * EventDispatcher Tests
 *
 * Verifies:
 * - Multi-listener support (.on / .off / unsubscribe)
 * - Wildcard listener receives all events
 * - Sync mode: events dispatched inline
 * - Async mode: events dispatched on microtask
 * - Listener isolation: throwing listener doesn't affect others
 * - onError callback receives thrown errors
 * - Timestamp attached to every event
 * - Every EventBus method fires its event type
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { EventDispatcher, type DispatchedEvent } from '../impl/event-dispatcher';

const applied = { connection: 'main', migration: 'users.create', durationMs: 3 };

// ── Sync Mode Tests ─────────────────────────────────────────────

describe('EventDispatcher (sync)', () => {
  let dispatcher: EventDispatcher;

  beforeEach(() => {
    dispatcher = new EventDispatcher({ mode: 'sync' });
  });

  it('dispatches to a single listener', () => {
    const received: DispatchedEvent[] = [];
    dispatcher.on('migration.applied', e => received.push(e));

    dispatcher.onMigrationApplied(applied);

    expect(received).toHaveLength(1);
    expect(received[0]?.type).toBe('migration.applied');
    expect(received[0]?.migration).toBe('users.create');
  });

  it('dispatches to multiple listeners on same event', () => {
    let a = 0, b = 0;
    dispatcher.on('tag.added', () => { a++; });
    dispatcher.on('tag.added', () => { b++; });

    dispatcher.onTagAdded({ connection: 'main', tag: 'migration:users.create' });

    expect(a).toBe(1);
    expect(b).toBe(1);
  });

  it('wildcard listener receives all events', () => {
    const all: string[] = [];
    dispatcher.on('*', e => all.push(e.type));

    dispatcher.onMigrationApplied(applied);
    dispatcher.onDDLEmitted({ connection: 'main', table: 'users', operation: 'create-table' });
    dispatcher.onRecordInserted({ connection: 'main', table: 'users', values: {} });

    expect(all).toEqual(['migration.applied', 'ddl.emitted', 'record.inserted']);
  });

  it('adds timestamp to every event', () => {
    const received: DispatchedEvent[] = [];
    dispatcher.on('migration.applied', e => received.push(e));

    const before = Date.now();
    dispatcher.onMigrationApplied(applied);

    expect(received[0]?.timestamp).toBeGreaterThanOrEqual(before);
    expect(received[0]?.timestamp).toBeLessThanOrEqual(Date.now() + 10);
  });

  it('events are frozen', () => {
    const received: DispatchedEvent[] = [];
    dispatcher.on('migration.applied', e => received.push(e));

    dispatcher.onMigrationApplied(applied);

    expect(Object.isFrozen(received[0])).toBe(true);
  });

  it('unsubscribe function removes listener', () => {
    let count = 0;
    const unsub = dispatcher.on('migration.applied', () => { count++; });

    dispatcher.onMigrationApplied(applied);
    expect(count).toBe(1);

    unsub();
    dispatcher.onMigrationApplied(applied);
    expect(count).toBe(1);
  });

  it('off() removes listener', () => {
    let count = 0;
    const listener = () => { count++; };
    dispatcher.on('migration.applied', listener);

    dispatcher.onMigrationApplied(applied);
    dispatcher.off('migration.applied', listener);
    dispatcher.onMigrationApplied(applied);

    expect(count).toBe(1);
  });

  it('off() leaves other listeners of the type and the wildcard in place', () => {
    const calls: string[] = [];
    const first = () => { calls.push('first'); };
    dispatcher.on('migration.applied', first);
    dispatcher.on('migration.applied', () => { calls.push('second'); });
    dispatcher.on('*', e => { calls.push(`* ${e.type}`); });

    dispatcher.off('migration.applied', first);
    dispatcher.onMigrationApplied(applied);

    expect(calls).toEqual(['second', '* migration.applied']);
  });

  it('resubscribes after the last listener of a type is removed', () => {
    let count = 0;
    dispatcher.on('tag.added', () => { count++; })();

    dispatcher.on('tag.added', () => { count += 10; });
    dispatcher.onTagAdded({ connection: 'main', tag: 't' });

    expect(count).toBe(10);
  });
});

// ── Listener Isolation ──────────────────────────────────────────

describe('EventDispatcher isolation', () => {
  it('throwing listener does not affect other listeners', () => {
    const dispatcher = new EventDispatcher({ mode: 'sync' });
    let reached = false;

    dispatcher.on('migration.applied', () => { throw new Error('boom'); });
    dispatcher.on('migration.applied', () => { reached = true; });

    dispatcher.onMigrationApplied(applied);

    expect(reached).toBe(true);
  });

  it('onError receives the error and the event that caused it', () => {
    const captured: Array<[unknown, DispatchedEvent]> = [];
    const dispatcher = new EventDispatcher({
      mode: 'sync',
      onError: (err, event) => captured.push([err, event]),
    });

    dispatcher.on('snapshot.saved', () => { throw new Error('bad listener'); });
    dispatcher.onSnapshotSaved({ schema: 'app', path: 'var/schema.json', layoutCount: 2 });

    expect(captured).toHaveLength(1);
    const [error, event] = captured[0] ?? [];
    expect(error instanceof Error && error.message).toBe('bad listener');
    expect(event?.type).toBe('snapshot.saved');
    expect(event?.path).toBe('var/schema.json');
  });
});

// ── Async Mode Tests ────────────────────────────────────────────

describe('EventDispatcher (async)', () => {
  it('does not fire listeners synchronously', () => {
    const dispatcher = new EventDispatcher();
    let count = 0;
    dispatcher.on('migration.applied', () => { count++; });

    dispatcher.onMigrationApplied(applied);

    expect(count).toBe(0);
  });

  it('fires listeners after flush()', async () => {
    const dispatcher = new EventDispatcher({ mode: 'async' });
    const types: string[] = [];
    dispatcher.on('*', e => types.push(e.type));

    dispatcher.onMigrationSkipped({ connection: 'main', migration: 'a' });
    dispatcher.onMigrationApplied(applied);
    await dispatcher.flush();

    expect(types).toEqual(['migration.skipped', 'migration.applied']);
  });
});

// ── All EventBus methods wired ──────────────────────────────────

describe('EventDispatcher covers all EventBus methods', () => {
  it('each method fires its event type', () => {
    const dispatcher = new EventDispatcher({ mode: 'sync' });
    const received: string[] = [];
    dispatcher.on('*', e => received.push(e.type));

    dispatcher.onMigrationApplied(applied);
    dispatcher.onMigrationRolledBack(applied);
    dispatcher.onMigrationFailed({
      connection: '', migration: '', direction: 'up', failed: '', completed: [], compensated: false,
      error: { code: '', message: '' },
    });
    dispatcher.onMigrationSkipped({ connection: '', migration: '' });
    dispatcher.onTagAdded({ connection: '', tag: '' });
    dispatcher.onTagRemoved({ connection: '', tag: '' });
    dispatcher.onDDLEmitted({ connection: '', table: '', operation: 'drop-table' });
    dispatcher.onQueryExecuted({ connection: '', table: '', rowCount: 0, durationMs: 0 });
    dispatcher.onRecordInserted({ connection: '', table: '', values: {} });
    dispatcher.onRecordUpdated({ connection: '', table: '', changes: {} });
    dispatcher.onRecordDeleted({ connection: '', table: '', soft: false });
    dispatcher.onSnapshotLoaded({ schema: '', path: '', layoutCount: 0 });
    dispatcher.onSnapshotSaved({ schema: '', path: '', layoutCount: 0 });

    expect(received).toEqual([
      'migration.applied', 'migration.rolledBack', 'migration.failed', 'migration.skipped',
      'tag.added', 'tag.removed',
      'ddl.emitted',
      'query.executed', 'record.inserted', 'record.updated', 'record.deleted',
      'snapshot.loaded', 'snapshot.saved',
    ]);
  });
});
