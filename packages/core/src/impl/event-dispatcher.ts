/**
 * EventBus that fans each callback out to listeners keyed by event type.
 * A `'*'` listener hears everything. Events are frozen and stamped with
 * `type` and `timestamp` before delivery.
 *
 * In `'async'` mode (the default) delivery waits for a microtask, so a
 * listener never runs inside the migration or write that raised the event.
 * A throwing listener is reported to `onError` and the rest still run.
 *
 * ```typescript
 * const events = new EventDispatcher();
 * const stop = events.on('migration.applied', e => log.info(e.migration));
 * const manager = new ConnectionManager(config, { drivers, events });
 * stop();
 * ```
 */

import type { EventBus } from '../interfaces/event-bus';
import { now } from '../utils';

// ── Event Types ─────────────────────────────────────────────────

/** All event type strings emitted by the system. */
export type EventType =
  // Migration lifecycle
  | 'migration.applied'
  | 'migration.rolledBack'
  | 'migration.failed'
  | 'migration.skipped'
  // Ledger
  | 'tag.added'
  | 'tag.removed'
  // Schema
  | 'ddl.emitted'
  // Data
  | 'query.executed'
  | 'record.inserted'
  | 'record.updated'
  | 'record.deleted'
  // Snapshot
  | 'snapshot.loaded'
  | 'snapshot.saved';

/** Every dispatched event carries its type and a millisecond timestamp. */
export interface DispatchedEvent {
  readonly type: EventType;
  readonly timestamp: number;
  readonly [key: string]: unknown;
}

/** Listener callback signature. */
export type EventListener = (event: DispatchedEvent) => void;

type Handler<K extends keyof EventBus> = NonNullable<EventBus[K]>;

// ── Options ─────────────────────────────────────────────────────

export interface EventDispatcherOptions {
  /**
   * Dispatch mode.
   * - `'async'` (default): listeners fire on next microtask via queueMicrotask.
   *   Connection and migrator calls return immediately; listeners execute after.
   * - `'sync'`: listeners fire inline. Use for testing or when you need
   *   to assert events immediately after an operation.
   */
  mode?: 'sync' | 'async';

  /**
   * Called when a listener throws. Without this, listener errors go nowhere
   * (listeners must never break the operation that emitted the event).
   */
  onError?: (error: unknown, event: DispatchedEvent) => void;
}

// ── EventDispatcher ─────────────────────────────────────────────

export class EventDispatcher implements EventBus {
  private readonly _listeners = new Map<string, Set<EventListener>>();
  private readonly _mode: 'sync' | 'async';
  private readonly _onError?: (error: unknown, event: DispatchedEvent) => void;

  constructor(options: EventDispatcherOptions = {}) {
    this._mode = options.mode ?? 'async';
    this._onError = options.onError;
  }

  // ── EventBus ────────────────────────────────────────────────────

  readonly onMigrationApplied: Handler<'onMigrationApplied'> = e => this._dispatch('migration.applied', e);
  readonly onMigrationRolledBack: Handler<'onMigrationRolledBack'> = e => this._dispatch('migration.rolledBack', e);
  readonly onMigrationFailed: Handler<'onMigrationFailed'> = e => this._dispatch('migration.failed', e);
  readonly onMigrationSkipped: Handler<'onMigrationSkipped'> = e => this._dispatch('migration.skipped', e);
  readonly onTagAdded: Handler<'onTagAdded'> = e => this._dispatch('tag.added', e);
  readonly onTagRemoved: Handler<'onTagRemoved'> = e => this._dispatch('tag.removed', e);
  readonly onDDLEmitted: Handler<'onDDLEmitted'> = e => this._dispatch('ddl.emitted', e);
  readonly onQueryExecuted: Handler<'onQueryExecuted'> = e => this._dispatch('query.executed', e);
  readonly onRecordInserted: Handler<'onRecordInserted'> = e => this._dispatch('record.inserted', e);
  readonly onRecordUpdated: Handler<'onRecordUpdated'> = e => this._dispatch('record.updated', e);
  readonly onRecordDeleted: Handler<'onRecordDeleted'> = e => this._dispatch('record.deleted', e);
  readonly onSnapshotLoaded: Handler<'onSnapshotLoaded'> = e => this._dispatch('snapshot.loaded', e);
  readonly onSnapshotSaved: Handler<'onSnapshotSaved'> = e => this._dispatch('snapshot.saved', e);

  // ── Subscriptions ───────────────────────────────────────────────

  /** Listen for one event type, or `'*'` for all. The returned function unsubscribes. */
  on(type: EventType | '*', listener: EventListener): () => void {
    const listeners = this._listeners.get(type) ?? new Set<EventListener>();
    this._listeners.set(type, listeners);
    listeners.add(listener);
    return () => this.off(type, listener);
  }

  off(type: EventType | '*', listener: EventListener): void {
    const listeners = this._listeners.get(type);
    if (!listeners) return;
    listeners.delete(listener);
    if (listeners.size === 0) this._listeners.delete(type);
  }

  /** Resolves once async deliveries queued so far have run. */
  async flush(): Promise<void> {
    await new Promise<void>(resolve => queueMicrotask(resolve));
  }

  // ── Delivery ────────────────────────────────────────────────────

  private _dispatch(type: EventType, payload: Record<string, unknown>): void {
    const targets = [...(this._listeners.get(type) ?? []), ...(this._listeners.get('*') ?? [])];
    if (targets.length === 0) return;

    const event: DispatchedEvent = Object.freeze({ ...payload, type, timestamp: now() });
    if (this._mode === 'sync') {
      this._deliver(targets, event);
    } else {
      queueMicrotask(() => this._deliver(targets, event));
    }
  }

  private _deliver(targets: readonly EventListener[], event: DispatchedEvent): void {
    for (const listener of targets) {
      try {
        listener(event);
      } catch (err) {
        this._onError?.(err, event);
      }
    }
  }
}
