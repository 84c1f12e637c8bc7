/**
 * PgSchemaGrammar: DDL for the operations a migration queues.
 *
 * Type mapping:
 *   int → INTEGER, long → BIGINT (SERIAL / BIGSERIAL when auto-increment)
 *   string:<n> → VARCHAR(n), text → TEXT
 *   enum → VARCHAR with a CHECK (... IN (...)) constraint
 * Unsigned columns get CHECK (col >= 0).
 *
 * Plain and unique indexes are named `<table>_<index>`, since PostgreSQL
 * index names share one namespace per schema. Foreign keys are table
 * constraints under their own name; the primary key uses PostgreSQL's
 * default `<table>_pkey`.
 */

import { ForeignKey, type DDLOperation, type Field, type Index, type Layout, type SchemaGrammar } from '@tabula/core';
import { quoteIdentifier, quoteLiteral, type SqlStatement } from './statement';

export class PgSchemaGrammar implements SchemaGrammar<SqlStatement> {
  constructor(private readonly prefix = '') {}

  hasTable(schemaName: string, tableName: string): SqlStatement {
    return {
      text: 'SELECT table_name FROM information_schema.tables WHERE table_catalog = $1 AND table_schema = current_schema() AND table_name = $2',
      values: [schemaName, this.prefix + tableName],
    };
  }

  ddl(operation: DDLOperation): SqlStatement[] {
    const table = this.table(operation.table);
    switch (operation.type) {
      case 'create-table':
        return this.create(operation.layout);
      case 'drop-table':
        return [statement(`DROP TABLE ${table}`)];
      case 'add-column':
        return [statement(`ALTER TABLE ${table} ADD COLUMN ${column(operation.field)}`)];
      case 'drop-column':
        return [statement(`ALTER TABLE ${table} DROP COLUMN ${quoteIdentifier(operation.field)}`)];
      case 'add-index':
        return [this.addIndex(operation.table, operation.index)];
      case 'drop-index':
        return [this.dropIndex(operation.table, operation.index)];
    }
  }

  private create(layout: Layout): SqlStatement[] {
    const definitions = layout.getFields().map(column);
    const primary = layout.getPrimaryKey();
    if (primary) {
      definitions.push(`PRIMARY KEY (${columns(primary)})`);
    }

    const statements = [statement(`CREATE TABLE ${this.table(layout.tableName)} (${definitions.join(', ')})`)];
    for (const index of layout.getIndexes()) {
      if (!index.isPrimary()) statements.push(this.addIndex(layout.tableName, index));
    }
    return statements;
  }

  private addIndex(tableName: string, index: Index): SqlStatement {
    const table = this.table(tableName);
    if (index.isPrimary()) {
      return statement(`ALTER TABLE ${table} ADD PRIMARY KEY (${columns(index)})`);
    }
    if (index instanceof ForeignKey) {
      return statement(
        `ALTER TABLE ${table} ADD CONSTRAINT ${quoteIdentifier(index.name)} FOREIGN KEY (${quoteIdentifier(index.field.name)}) ` +
        `REFERENCES ${this.table(index.referencedTable)} (${quoteIdentifier(index.referencedField)})`
      );
    }
    const kind = index.unique ? 'UNIQUE INDEX' : 'INDEX';
    return statement(`CREATE ${kind} ${this.indexName(tableName, index)} ON ${table} (${columns(index)})`);
  }

  private dropIndex(tableName: string, index: Index): SqlStatement {
    const table = this.table(tableName);
    if (index.isPrimary()) {
      return statement(`ALTER TABLE ${table} DROP CONSTRAINT ${quoteIdentifier(`${this.prefix}${tableName}_pkey`)}`);
    }
    if (index instanceof ForeignKey) {
      return statement(`ALTER TABLE ${table} DROP CONSTRAINT ${quoteIdentifier(index.name)}`);
    }
    return statement(`DROP INDEX ${this.indexName(tableName, index)}`);
  }

  private table(name: string): string {
    return quoteIdentifier(this.prefix + name);
  }

  private indexName(tableName: string, index: Index): string {
    return quoteIdentifier(`${this.prefix}${tableName}_${index.name}`);
  }
}

function statement(text: string): SqlStatement {
  return { text, values: [] };
}

function columns(index: Index): string {
  return index.fieldNames().map(quoteIdentifier).join(', ');
}

function column(field: Field): string {
  const name = quoteIdentifier(field.name);
  let text = `${name} ${columnType(field)}`;
  if (!field.nullable) text += ' NOT NULL';
  const check = columnCheck(name, field);
  if (check) text += ` CHECK (${check})`;
  return text;
}

function columnType(field: Field): string {
  const type = field.type;
  switch (type.kind) {
    case 'int':
      return field.autoIncrement ? 'SERIAL' : 'INTEGER';
    case 'long':
      return field.autoIncrement ? 'BIGSERIAL' : 'BIGINT';
    case 'string':
      return `VARCHAR(${type.length})`;
    case 'text':
      return 'TEXT';
    case 'enum':
      return `VARCHAR(${Math.max(1, ...type.options.map(o => o.length))})`;
  }
}

function columnCheck(name: string, field: Field): string | null {
  const type = field.type;
  if (type.kind === 'enum') {
    return `${name} IN (${type.options.map(quoteLiteral).join(', ')})`;
  }
  if ((type.kind === 'int' || type.kind === 'long') && type.unsigned && !field.autoIncrement) {
    return `${name} >= 0`;
  }
  return null;
}
