/**
 * DbRecord: one row of a layout with its write state.
 *
 * Values live in two maps: `committed` holds what storage is known to have,
 * `pending` what was set since. Writes send `diff()` (the pending values);
 * `commit()` marks the record in sync with storage after a successful write.
 */

import type { Layout } from '../schema/layout';
import type { Row } from '../types/table';

export class DbRecord {
  private committed: Row;
  private pending: Row = {};

  /**
   * @param values - Values storage already holds (or will hold once the
   *   record is inserted). Every key must be a field of `layout`.
   */
  constructor(
    private readonly layout: Layout,
    values: Row = {}
  ) {
    for (const name of Object.keys(values)) layout.getField(name);
    this.committed = { ...values };
  }

  getLayout(): Layout {
    return this.layout;
  }

  get(name: string): unknown {
    this.layout.getField(name);
    return name in this.pending ? this.pending[name] : this.committed[name];
  }

  has(name: string): boolean {
    return name in this.pending || name in this.committed;
  }

  set(name: string, value: unknown): this {
    this.layout.getField(name);
    this.pending[name] = value;
    return this;
  }

  /** Values set since the last commit */
  diff(): Row {
    return { ...this.pending };
  }

  isDirty(): boolean {
    return Object.keys(this.pending).length > 0;
  }

  /** Committed values overlaid with pending ones */
  raw(): Row {
    return { ...this.committed, ...this.pending };
  }

  /** Values storage is known to hold */
  original(): Row {
    return { ...this.committed };
  }

  /** Fold pending values into the committed snapshot. */
  commit(): this {
    this.committed = { ...this.committed, ...this.pending };
    this.pending = {};
    return this;
  }

  /** Drop pending values. */
  discard(): this {
    this.pending = {};
    return this;
  }

  /**
   * Committed values of the primary key fields, or null when the layout has
   * no primary key. Keyed on committed values so an update can change the key.
   */
  getPrimary(): Row | null {
    const primary = this.layout.getPrimaryKey();
    if (!primary) return null;

    const key: Row = {};
    for (const field of primary.fields) {
      key[field.name] = field.name in this.committed ? this.committed[field.name] : this.pending[field.name];
    }
    return key;
  }
}

/**
 * Values that identify the stored row of a record: its primary key, or every
 * committed value when the layout has none.
 */
export function recordKey(record: DbRecord): Row {
  return record.getPrimary() ?? record.original();
}
