import type { HookListener } from './layout-hooks';
import { unixTime } from '../utils';

/** Stamp `field` with the current unix time on every insert or update. */
export function updateTimestampListener(
  field: string
): HookListener<'record.beforeInsert' | 'record.beforeUpdate'> {
  return event => {
    event.record.set(field, unixTime());
  };
}

/**
 * Turn a delete into an update that stamps `field`. The caller writes the
 * record instead of deleting it. `force` skips this.
 */
export function softDeleteListener(field: string): HookListener<'record.beforeDelete'> {
  return event => {
    if (event.options.force) return;
    event.record.set(field, unixTime());
    event.preventDefault();
  };
}

/** Hide soft-deleted rows from every query on the layout unless `withRemoved` is set. */
export function softDeleteQueryListener(field: string): HookListener<'query.beforeCreate'> {
  return event => {
    if (event.options.withRemoved) return;
    event.query.require(field, 'IS', null);
  };
}
