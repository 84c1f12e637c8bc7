/**
 * Grammars of the memory driver. Statements are plain command objects that
 * carry the abstract model through unchanged.
 */

import type { QueryGrammar, RecordGrammar, SchemaGrammar } from '../interfaces/driver';
import type { Query } from '../query/query';
import { recordKey, type DbRecord } from '../record/record';
import type { Layout } from '../schema/layout';
import type { DDLOperation, Row } from '../types/table';

export type MemoryCommand =
  | { readonly kind: 'select'; readonly query: Query }
  | { readonly kind: 'insert'; readonly table: string; readonly values: Row }
  | { readonly kind: 'update'; readonly table: string; readonly key: Row; readonly values: Row }
  | { readonly kind: 'delete'; readonly table: string; readonly key: Row; readonly single: boolean }
  | { readonly kind: 'has-table'; readonly table: string }
  | { readonly kind: 'ddl'; readonly operation: DDLOperation };

export class MemoryQueryGrammar implements QueryGrammar<MemoryCommand> {
  query(query: Query): MemoryCommand {
    return { kind: 'select', query };
  }
}

export class MemoryRecordGrammar implements RecordGrammar<MemoryCommand> {
  insert(layout: Layout, record: DbRecord): MemoryCommand {
    return { kind: 'insert', table: layout.tableName, values: record.raw() };
  }

  update(layout: Layout, record: DbRecord): MemoryCommand {
    return { kind: 'update', table: layout.tableName, key: recordKey(record), values: record.diff() };
  }

  /** Without a primary key, only the first row holding every committed value goes. */
  delete(layout: Layout, record: DbRecord): MemoryCommand {
    return { kind: 'delete', table: layout.tableName, key: recordKey(record), single: !layout.getPrimaryKey() };
  }
}

export class MemorySchemaGrammar implements SchemaGrammar<MemoryCommand> {
  hasTable(_schemaName: string, tableName: string): MemoryCommand {
    return { kind: 'has-table', table: tableName };
  }

  ddl(operation: DDLOperation): MemoryCommand[] {
    return [{ kind: 'ddl', operation }];
  }
}
