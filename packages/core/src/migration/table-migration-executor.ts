/**
 * Fluent DSL for changing one layout.
 *
 * ```typescript
 * schema.add('posts', t => {
 *   t.id();
 *   t.string('title', 255, false);
 *   t.foreign('author', schema.table('users'));
 *   t.timestamps();
 * });
 * ```
 *
 * Invariants are checked before the layout is touched, so a failed call
 * leaves the layout as it was.
 */

import type { TableMigrationListener } from '../interfaces/migration';
import type { Field } from '../schema/field';
import type { Layout } from '../schema/layout';
import { ForeignKey, Index } from '../schema/table-index';
import { DuplicatePrimaryKeyError, MissingPrimaryKeyError } from '../types/errors';
import { FieldTypes, type FieldType } from '../types/field-type';

export class TableMigrationExecutor {
  constructor(
    private readonly table: Layout,
    private listener: TableMigrationListener | null = null
  ) {}

  /**
   * Replace the listener notified of mutations. Pass null to stop
   * notifications.
   */
  listen(listener: TableMigrationListener | null): this {
    this.listener = listener;
    return this;
  }

  // ── Keys ──────────────────────────────────────────────────────

  /** Add an unsigned auto-increment field and make it the primary key. */
  increments(name: string): this {
    this.assertNoPrimary();
    this.putField(name, FieldTypes.long(true), false, true);
    return this.primary(name);
  }

  /** Shorthand for `increments('_id')`. */
  id(): this {
    return this.increments('_id');
  }

  /** Make an existing field the primary key. */
  primary(name: string): this {
    const field = this.table.getField(name);
    this.assertNoPrimary();
    this.notifyIndex(this.table.primary(field));
    return this;
  }

  // ── Fields ────────────────────────────────────────────────────

  int(name: string, unsigned = false, nullable = true): this {
    this.putField(name, FieldTypes.int(unsigned), nullable, false);
    return this;
  }

  long(name: string, unsigned = false, nullable = true): this {
    this.putField(name, FieldTypes.long(unsigned), nullable, false);
    return this;
  }

  string(name: string, length: number, nullable = true): this {
    this.putField(name, FieldTypes.string(length), nullable, false);
    return this;
  }

  /** Unbounded text. Validate what goes into these before writing. */
  text(name: string, nullable = true): this {
    this.putField(name, FieldTypes.text(), nullable, false);
    return this;
  }

  /** Throws EnumOptionsError for no or empty options, EnumSeparatorError if an option contains ",". */
  enum(name: string, options: readonly string[], nullable = true): this {
    this.putField(name, FieldTypes.enum(options), nullable, false);
    return this;
  }

  // ── Indexes ───────────────────────────────────────────────────

  index(name: string, fields: readonly string[]): this {
    const resolved = fields.map(f => this.table.getField(f));
    this.notifyIndex(this.table.index(name, ...resolved));
    return this;
  }

  unique(name: string, fields: readonly string[]): this {
    const index = new Index(name, fields.map(f => this.table.getField(f)), true, false);
    this.table.putIndex(index);
    this.notifyIndex(index);
    return this;
  }

  /**
   * Reference the primary key of `remote`. Adds a nullable field named
   * `<name><remote primary field>` with the remote key's type and a foreign
   * key index `fk_<table>_<name>`.
   *
   * Throws MissingPrimaryKeyError unless the remote primary key has exactly
   * one field.
   */
  foreign(name: string, remote: TableMigrationExecutor): this {
    const layout = remote.layout();
    const primary = layout.getPrimaryKey();
    const reference = primary?.fields.length === 1 ? primary.fields[0] : undefined;
    if (!reference) {
      throw new MissingPrimaryKeyError(this.table.tableName, layout.tableName);
    }

    const field = this.putField(name + reference.name, reference.type, true, false);
    const index = new ForeignKey(
      `fk_${this.table.tableName}_${name}`,
      field,
      layout.tableName,
      reference.name
    );
    this.table.putIndex(index);
    this.notifyIndex(index);
    return this;
  }

  // ── Behaviors ─────────────────────────────────────────────────

  /**
   * Add `created` and `updated` and stamp them on insert and update.
   */
  timestamps(): this {
    this.putField('created', FieldTypes.int(true), false, false);
    this.putField('updated', FieldTypes.int(true), true, false);
    this.table.enable('timestamps');
    return this;
  }

  /**
   * Add `removed`. Deletes set it instead of removing the row, and queries
   * skip rows where it is set.
   */
  softDelete(): this {
    this.putField('removed', FieldTypes.int(true), true, false);
    this.table.enable('softDelete');
    return this;
  }

  // ── Removal ───────────────────────────────────────────────────

  /** Remove a field. Foreign keys that reference it are not checked. */
  drop(name: string): this {
    this.table.unsetField(name);
    this.listener?.fieldRemoved(this.table.tableName, name);
    return this;
  }

  dropIndex(name: string): this {
    const index = this.table.getIndex(name);
    this.table.unsetIndex(name);
    this.listener?.indexRemoved(this.table.tableName, index);
    return this;
  }

  layout(): Layout {
    return this.table;
  }

  // ── Internal ──────────────────────────────────────────────────

  private putField(name: string, type: FieldType, nullable: boolean, autoIncrement: boolean): Field {
    const field = this.table.putField(name, type, nullable, autoIncrement);
    this.listener?.fieldAdded(this.table.tableName, field);
    return field;
  }

  private notifyIndex(index: Index): void {
    this.listener?.indexAdded(this.table.tableName, index);
  }

  private assertNoPrimary(): void {
    const existing = this.table.getPrimaryKey();
    if (existing) {
      throw new DuplicatePrimaryKeyError(this.table.tableName, existing.name);
    }
  }
}
