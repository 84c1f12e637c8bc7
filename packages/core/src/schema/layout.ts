/**
 * Layout: the physical shape of one table: its fields (in column order) and
 * its indexes.
 *
 * Layouts are changed only through their mutators, and the one-primary-key
 * invariant is checked there, so a layout never holds two primary indexes.
 */

import { DuplicatePrimaryKeyError, NotFoundError } from '../types/errors';
import type { FieldType } from '../types/field-type';
import { LayoutHooks } from '../hooks/layout-hooks';
import {
  softDeleteListener,
  softDeleteQueryListener,
  updateTimestampListener,
} from '../hooks/listeners';
import { TableIdentifier } from '../query/identifiers';
import { Field } from './field';
import { ForeignKey, Index } from './table-index';

/** Name of the primary index created by `primary()` */
export const PRIMARY_KEY = '_primary';

/** Conventions that come with lifecycle hooks */
export type LayoutBehavior = 'timestamps' | 'softDelete';

export const BEHAVIORS: readonly LayoutBehavior[] = ['timestamps', 'softDelete'];

/** Fields each behavior depends on */
export const BEHAVIOR_FIELDS: Readonly<Record<LayoutBehavior, readonly string[]>> = {
  timestamps: ['created', 'updated'],
  softDelete: ['removed'],
};

export class Layout {
  private readonly fields = new Map<string, Field>();
  private readonly indexes = new Map<string, Index>();
  private readonly behaviors = new Map<LayoutBehavior, Array<() => void>>();

  readonly hooks = new LayoutHooks();

  constructor(public readonly tableName: string) {}

  getTableName(): string {
    return this.tableName;
  }

  // ── Fields ────────────────────────────────────────────────────

  getField(name: string): Field {
    const field = this.fields.get(name);
    if (!field) {
      throw new NotFoundError('field', name, this.tableName);
    }
    return field;
  }

  hasField(name: string): boolean {
    return this.fields.has(name);
  }

  getFields(): Field[] {
    return [...this.fields.values()];
  }

  /** Add or replace a field. A replaced field keeps its column position. */
  setField(name: string, field: Field): this {
    this.fields.set(name, field);
    return this;
  }

  putField(name: string, type: FieldType, nullable: boolean, autoIncrement: boolean): Field {
    const field = new Field(name, type, nullable, autoIncrement, this.tableName);
    this.setField(name, field);
    return field;
  }

  /**
   * Remove a field. Behaviors that depend on it are disabled. Indexes and
   * foreign keys over the field are left alone.
   */
  unsetField(name: string): this {
    if (!this.fields.delete(name)) {
      throw new NotFoundError('field', name, this.tableName);
    }
    for (const behavior of BEHAVIORS) {
      if (BEHAVIOR_FIELDS[behavior].includes(name)) this.disable(behavior);
    }
    return this;
  }

  getAutoIncrement(): Field | null {
    return this.getFields().find(f => f.autoIncrement) ?? null;
  }

  // ── Indexes ───────────────────────────────────────────────────

  getIndex(name: string): Index {
    const index = this.indexes.get(name);
    if (!index) {
      throw new NotFoundError('index', name, this.tableName);
    }
    return index;
  }

  hasIndex(name: string): boolean {
    return this.indexes.has(name);
  }

  getIndexes(): Index[] {
    return [...this.indexes.values()];
  }

  getForeignKeys(): ForeignKey[] {
    return this.getIndexes().filter((i): i is ForeignKey => i instanceof ForeignKey);
  }

  /**
   * Add or replace an index. Throws DuplicatePrimaryKeyError if the index is
   * primary and another primary index exists.
   */
  putIndex(index: Index): this {
    if (index.isPrimary()) {
      const existing = this.getPrimaryKey();
      if (existing && existing.name !== index.name) {
        throw new DuplicatePrimaryKeyError(this.tableName, existing.name);
      }
    }
    this.indexes.set(index.name, index);
    return this;
  }

  unsetIndex(name: string): this {
    if (!this.indexes.delete(name)) {
      throw new NotFoundError('index', name, this.tableName);
    }
    return this;
  }

  /** Add a plain index over `fields`. */
  index(name: string, ...fields: Field[]): Index {
    const index = new Index(name, fields, false, false);
    this.putIndex(index);
    return index;
  }

  /** Make `field` the primary key. Throws if the layout already has one. */
  primary(field: Field): Index {
    const existing = this.getPrimaryKey();
    if (existing) {
      throw new DuplicatePrimaryKeyError(this.tableName, existing.name);
    }
    const index = new Index(PRIMARY_KEY, [field], true, true);
    this.putIndex(index);
    return index;
  }

  getPrimaryKey(): Index | null {
    return this.getIndexes().find(i => i.isPrimary()) ?? null;
  }

  // ── Behaviors ─────────────────────────────────────────────────

  /**
   * Register the lifecycle hooks of a behavior. Enabling an enabled behavior
   * does nothing.
   */
  enable(behavior: LayoutBehavior): this {
    if (this.behaviors.has(behavior)) return this;

    const off: Array<() => void> = [];
    if (behavior === 'timestamps') {
      off.push(this.hooks.hook('record.beforeInsert', updateTimestampListener('created')));
      off.push(this.hooks.hook('record.beforeUpdate', updateTimestampListener('updated')));
    } else {
      off.push(this.hooks.hook('record.beforeDelete', softDeleteListener('removed')));
      off.push(this.hooks.hook('query.beforeCreate', softDeleteQueryListener('removed')));
    }
    this.behaviors.set(behavior, off);
    return this;
  }

  disable(behavior: LayoutBehavior): this {
    this.behaviors.get(behavior)?.forEach(unhook => unhook());
    this.behaviors.delete(behavior);
    return this;
  }

  hasBehavior(behavior: LayoutBehavior): boolean {
    return this.behaviors.has(behavior);
  }

  getBehaviors(): LayoutBehavior[] {
    return [...this.behaviors.keys()];
  }

  // ── Misc ──────────────────────────────────────────────────────

  /** Identifier for building queries against this table */
  getTableReference(): TableIdentifier {
    return new TableIdentifier(this.tableName, [...this.fields.keys()]);
  }

  /**
   * Copy with the same fields, indexes and behaviors. Hooks on the copy come
   * from its behaviors; listeners added directly to `hooks` are not copied.
   */
  clone(): Layout {
    const copy = new Layout(this.tableName);
    for (const [name, field] of this.fields) copy.fields.set(name, field);
    for (const [name, index] of this.indexes) copy.indexes.set(name, index);
    for (const behavior of this.behaviors.keys()) copy.enable(behavior);
    return copy;
  }
}
