/**
 * Driver: the boundary between the core and a concrete DBMS.
 *
 * A driver executes statements of its own type `S` and hands out the grammars
 * that render the abstract model into that type. The core never builds a
 * statement itself.
 *
 * Implementations:
 * - PgDriver (@tabula/postgres): parameterized SQL over a `pg` pool
 * - MemoryDriver: in-process tables, for tests and embedded use
 */

import type { DbRecord } from '../record/record';
import type { Layout } from '../schema/layout';
import type { Query } from '../query/query';
import type { DDLOperation, Row, Scalar } from '../types/table';

/**
 * Rows returned by a read. Iterate with `fetch()` (one row at a time, null
 * when exhausted) or take every remaining row with `all()`.
 */
export class ResultSet {
  private cursor = 0;

  constructor(private readonly rows: readonly Row[]) {}

  get rowCount(): number {
    return this.rows.length;
  }

  fetch(): Row | null {
    if (this.cursor >= this.rows.length) return null;
    return this.rows[this.cursor++] ?? null;
  }

  all(): Row[] {
    const rest = this.rows.slice(this.cursor);
    this.cursor = this.rows.length;
    return rest;
  }
}

export interface QueryGrammar<S> {
  query(query: Query): S;
}

export interface RecordGrammar<S> {
  /** Insert every value the record holds. */
  insert(layout: Layout, record: DbRecord): S;
  /** Write `record.diff()` to the row identified by `record.getPrimary()`. */
  update(layout: Layout, record: DbRecord): S;
  /**
   * Delete the row identified by `record.getPrimary()`. Without a primary
   * key, delete one row holding every committed value.
   */
  delete(layout: Layout, record: DbRecord): S;
}

export interface SchemaGrammar<S> {
  /** Statement whose result has at least one row iff the table exists. */
  hasTable(schemaName: string, tableName: string): S;
  /** Statements that carry out one schema change, in order. */
  ddl(operation: DDLOperation): S[];
}

export interface Driver<S = unknown> {
  readonly name: string;

  /**
   * Whether the backend can keep the migration ledger. A driver that opts out
   * never reports a migration as applied.
   */
  readonly supportsTags: boolean;

  /** Execute a statement that changes data or schema. Resolves to the affected row count. */
  write(statement: S): Promise<number>;

  read(statement: S): Promise<ResultSet>;

  /** Value the backend generated for the auto-increment field of the last insert into `layout`. */
  lastInsertId(layout: Layout): Promise<Scalar | null>;

  queryGrammar(): QueryGrammar<S>;
  recordGrammar(): RecordGrammar<S>;
  schemaGrammar(): SchemaGrammar<S>;

  /** Release backend resources. Optional. */
  close?(): Promise<void>;
}
