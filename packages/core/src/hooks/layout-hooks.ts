/**
 * LayoutHooks: lifecycle hooks attached to a layout by migrations.
 *
 * `timestamps()` and `softDelete()` register listeners here; the connection
 * dispatches before every record write and before a query is rendered.
 */

import type { Layout } from '../schema/layout';
import type { DbRecord } from '../record/record';
import type { Query } from '../query/query';

export type HookType =
  | 'record.beforeInsert'
  | 'record.beforeUpdate'
  | 'record.beforeDelete'
  | 'query.beforeCreate';

/** Options passed from the caller through to listeners */
export interface HookOptions {
  /** Hard-delete even if the layout soft-deletes */
  readonly force?: boolean;
  /** Include soft-deleted rows in query results */
  readonly withRemoved?: boolean;
}

abstract class HookEvent {
  private prevented = false;

  constructor(
    public readonly layout: Layout,
    public readonly options: HookOptions
  ) {}

  /** Ask the caller to skip its default action. */
  preventDefault(): void {
    this.prevented = true;
  }

  isPrevented(): boolean {
    return this.prevented;
  }
}

export class RecordEvent extends HookEvent {
  constructor(
    layout: Layout,
    public readonly record: DbRecord,
    options: HookOptions = {}
  ) {
    super(layout, options);
  }
}

export class QueryEvent extends HookEvent {
  constructor(
    layout: Layout,
    public readonly query: Query,
    options: HookOptions = {}
  ) {
    super(layout, options);
  }
}

export interface HookEventMap {
  'record.beforeInsert': RecordEvent;
  'record.beforeUpdate': RecordEvent;
  'record.beforeDelete': RecordEvent;
  'query.beforeCreate': QueryEvent;
}

export type HookListener<T extends HookType> = (event: HookEventMap[T]) => void;

export class LayoutHooks {
  private readonly listeners: { [K in HookType]: HookListener<K>[] } = {
    'record.beforeInsert': [],
    'record.beforeUpdate': [],
    'record.beforeDelete': [],
    'query.beforeCreate': [],
  };

  hook<T extends HookType>(type: T, listener: HookListener<T>): () => void {
    const list: HookListener<T>[] = this.listeners[type];
    list.push(listener);
    return () => {
      const i = list.indexOf(listener);
      if (i !== -1) list.splice(i, 1);
    };
  }

  /** Run every listener for `type` in registration order. Listener errors propagate. */
  dispatch<T extends HookType>(type: T, event: HookEventMap[T]): HookEventMap[T] {
    const list: HookListener<T>[] = this.listeners[type];
    for (const listener of [...list]) {
      listener(event);
    }
    return event;
  }

  count(type?: HookType): number {
    if (type) return this.listeners[type].length;
    return Object.values(this.listeners).reduce((n, list) => n + list.length, 0);
  }
}
