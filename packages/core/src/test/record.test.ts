/**
 * DbRecord Tests
 *
 * Verifies:
 * - Committed/pending split: diff(), raw(), original()
 * - commit() and discard() boundaries
 * - Lookup errors for fields the layout does not define
 * - Primary key identification and recordKey()
 */

import { describe, it, expect } from 'vitest';
import { TableMigrationExecutor } from '../migration/table-migration-executor';
import { DbRecord, recordKey } from '../record/record';
import { Layout } from '../schema/layout';
import { NotFoundError } from '../types/errors';

const users = new TableMigrationExecutor(new Layout('users')).id().string('name', 255).int('age').layout();
const tags = new TableMigrationExecutor(new Layout('_tags')).string('tag', 255, false).layout();

describe('DbRecord', () => {
  it('diff() holds what was set since the last commit', () => {
    const record = new DbRecord(users, { name: 'a' });
    record.set('name', 'b');

    expect(record.diff()).toEqual({ name: 'b' });
    expect(record.isDirty()).toBe(true);

    record.commit();

    expect(record.diff()).toEqual({});
    expect(record.isDirty()).toBe(false);
    expect(record.get('name')).toBe('b');
  });

  it('raw() overlays pending values on committed ones', () => {
    const record = new DbRecord(users, { name: 'a', age: 30 });
    record.set('age', 31);

    expect(record.raw()).toEqual({ name: 'a', age: 31 });
    expect(record.original()).toEqual({ name: 'a', age: 30 });
  });

  it('discard() drops pending values', () => {
    const record = new DbRecord(users, { name: 'a' });
    record.set('name', 'b').discard();

    expect(record.get('name')).toBe('a');
    expect(record.isDirty()).toBe(false);
  });

  it('rejects fields the layout does not define', () => {
    expect(() => new DbRecord(users, { email: 'x' })).toThrow(NotFoundError);

    const record = new DbRecord(users);
    expect(() => record.set('email', 'x')).toThrow(NotFoundError);
    expect(() => record.get('email')).toThrow(NotFoundError);
  });

  it('has() distinguishes unset from null', () => {
    const record = new DbRecord(users, { age: null });

    expect(record.has('age')).toBe(true);
    expect(record.has('name')).toBe(false);
  });

  it('getPrimary() keys on the committed value', () => {
    const record = new DbRecord(users, { _id: 7, name: 'a' });
    record.set('_id', 8);

    expect(record.getPrimary()).toEqual({ _id: 7 });
  });

  it('getPrimary() falls back to the pending value before the first commit', () => {
    const record = new DbRecord(users);
    record.set('_id', 3);

    expect(record.getPrimary()).toEqual({ _id: 3 });
  });

  it('recordKey() uses every committed value without a primary key', () => {
    const record = new DbRecord(tags, { tag: 'migration:users' });

    expect(tags.getPrimaryKey()).toBeNull();
    expect(record.getPrimary()).toBeNull();
    expect(recordKey(record)).toEqual({ tag: 'migration:users' });
  });
});
