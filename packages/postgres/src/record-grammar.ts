/**
 * PgRecordGrammar: INSERT, UPDATE and DELETE for one record.
 *
 * Rows are identified by `recordKey()`: the primary key when the record has
 * one, every committed value otherwise. A keyless delete removes a single
 * matching row, picked by `ctid`. Inserts into a layout with an
 * auto-increment field return the generated key.
 */

import { DriverError, recordKey, type DbRecord, type Layout, type RecordGrammar, type Row } from '@tabula/core';
import { SqlBuilder, quoteIdentifier, type SqlStatement } from './statement';

export class PgRecordGrammar implements RecordGrammar<SqlStatement> {
  constructor(private readonly prefix = '') {}

  insert(layout: Layout, record: DbRecord): SqlStatement {
    const values = record.raw();
    const names = Object.keys(values).filter(name => values[name] !== undefined);
    const table = this.table(layout);
    const increment = layout.getAutoIncrement();
    const returning = increment ? ` RETURNING ${quoteIdentifier(increment.name)}` : '';

    if (names.length === 0) {
      return { text: `INSERT INTO ${table} DEFAULT VALUES${returning}`, values: [] };
    }

    const sql = new SqlBuilder();
    const placeholders = names.map(name => sql.param(values[name]));
    return sql.build(
      `INSERT INTO ${table} (${names.map(quoteIdentifier).join(', ')}) VALUES (${placeholders.join(', ')})${returning}`
    );
  }

  update(layout: Layout, record: DbRecord): SqlStatement {
    const changes = record.diff();
    const names = Object.keys(changes);
    if (names.length === 0) {
      throw new DriverError(`Nothing to update in "${layout.tableName}"`);
    }

    const sql = new SqlBuilder();
    const assignments = names.map(name => `${quoteIdentifier(name)} = ${sql.param(changes[name] ?? null)}`);
    const where = this.where(layout, recordKey(record), sql);
    return sql.build(`UPDATE ${this.table(layout)} SET ${assignments.join(', ')} WHERE ${where}`);
  }

  delete(layout: Layout, record: DbRecord): SqlStatement {
    const sql = new SqlBuilder();
    const table = this.table(layout);
    const where = this.where(layout, recordKey(record), sql);
    if (layout.getPrimaryKey()) {
      return sql.build(`DELETE FROM ${table} WHERE ${where}`);
    }
    return sql.build(`DELETE FROM ${table} WHERE ctid = (SELECT ctid FROM ${table} WHERE ${where} LIMIT 1)`);
  }

  private table(layout: Layout): string {
    return quoteIdentifier(this.prefix + layout.tableName);
  }

  private where(layout: Layout, key: Row, sql: SqlBuilder): string {
    const names = Object.keys(key);
    if (names.length === 0) {
      throw new DriverError(`Cannot identify a row of "${layout.tableName}" without values`);
    }
    return names
      .map(name => {
        const value = key[name];
        return value === null || value === undefined
          ? `${quoteIdentifier(name)} IS NULL`
          : `${quoteIdentifier(name)} = ${sql.param(value)}`;
      })
      .join(' AND ');
  }
}
