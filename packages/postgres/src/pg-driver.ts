/**
 * PgDriver: runs statements from the PostgreSQL grammars on a `pg` pool.
 *
 * ```typescript
 * import { Pool } from 'pg';
 *
 * const driver = new PgDriver(new Pool({ connectionString }), { prefix: 'app_' });
 * const db = new Connection(new Schema('shop'), driver);
 * ```
 */

import { DriverError, ResultSet, type Driver, type Layout, type Scalar } from '@tabula/core';
import type { PoolLike, PoolQueryResult } from './pool';
import { PgQueryGrammar } from './query-grammar';
import { PgRecordGrammar } from './record-grammar';
import { PgSchemaGrammar } from './schema-grammar';
import type { SqlStatement } from './statement';

export interface PgDriverOptions {
  /** Prepended to every table name (default: none) */
  prefix?: string;
}

export class PgDriver implements Driver<SqlStatement> {
  readonly name = 'postgres';
  readonly supportsTags = true;

  private readonly prefix: string;
  private readonly queries: PgQueryGrammar;
  private readonly records: PgRecordGrammar;
  private readonly schemas: PgSchemaGrammar;
  private returned: Record<string, unknown> | null = null;

  constructor(
    private readonly pool: PoolLike,
    options: PgDriverOptions = {}
  ) {
    this.prefix = options.prefix ?? '';
    this.queries = new PgQueryGrammar(this.prefix);
    this.records = new PgRecordGrammar(this.prefix);
    this.schemas = new PgSchemaGrammar(this.prefix);
  }

  async write(statement: SqlStatement): Promise<number> {
    const { rows, rowCount } = await this.execute(statement);
    this.returned = rows[0] ?? null;
    return rowCount ?? 0;
  }

  async read(statement: SqlStatement): Promise<ResultSet> {
    const { rows } = await this.execute(statement);
    return new ResultSet(rows);
  }

  /**
   * Key the last write returned for the auto-increment field. Inserts carry
   * `RETURNING`, so the key comes back on the session that generated it.
   * BIGINT values arrive as strings.
   */
  async lastInsertId(layout: Layout): Promise<Scalar | null> {
    const field = layout.getAutoIncrement();
    if (!field) return null;

    const id = this.returned?.[field.name];
    return typeof id === 'string' || typeof id === 'number' ? id : null;
  }

  queryGrammar(): PgQueryGrammar {
    return this.queries;
  }

  recordGrammar(): PgRecordGrammar {
    return this.records;
  }

  schemaGrammar(): PgSchemaGrammar {
    return this.schemas;
  }

  async close(): Promise<void> {
    await this.pool.end?.();
  }

  private async execute(statement: SqlStatement): Promise<PoolQueryResult> {
    try {
      return await this.pool.query(statement.text, [...statement.values]);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new DriverError(`${message} [${statement.text}]`, err);
    }
  }
}
