/**
 * DriverMigrationExecutor: applies migrations to the live backend.
 *
 * Mutations go to a working copy of the connection's schema, so migrations can
 * resolve existing layouts (e.g. as foreign key targets) without touching the
 * snapshot. Each mutation queues a DDLOperation; `commit()` hands the queue
 * to the DDL provider in order.
 */

import type { Connection } from '../connection/connection';
import type { DDLProvider } from '../interfaces/ddl-provider';
import type { SchemaMigrationExecutor, TableMigrationListener } from '../interfaces/migration';
import { Layout } from '../schema/layout';
import type { Schema } from '../schema/schema';
import type { DDLOperation } from '../types/table';
import { TableMigrationExecutor } from './table-migration-executor';
import type { TagManager } from './tag-manager';

export class DriverMigrationExecutor implements SchemaMigrationExecutor {
  readonly name: string;

  private readonly working: Schema;
  private readonly queue: DDLOperation[] = [];

  private readonly listener: TableMigrationListener = {
    fieldAdded: (table, field) => { this.queue.push({ type: 'add-column', table, field }); },
    fieldRemoved: (table, field) => { this.queue.push({ type: 'drop-column', table, field }); },
    indexAdded: (table, index) => { this.queue.push({ type: 'add-index', table, index }); },
    indexRemoved: (table, index) => { this.queue.push({ type: 'drop-index', table, index }); },
  };

  constructor(
    private readonly connection: Connection,
    private readonly ddl: DDLProvider
  ) {
    this.name = `driver:${connection.getDriver().name}`;
    this.working = connection.getSchema().clone();
  }

  /**
   * Queue one `create-table` carrying the layout as `configure` left it.
   * Changes made later through the returned executor queue as alterations.
   */
  add(table: string, configure?: (table: TableMigrationExecutor) => void): TableMigrationExecutor {
    const layout = new Layout(table);
    const executor = new TableMigrationExecutor(layout);
    configure?.(executor);

    this.working.putLayout(layout);
    this.queue.push({ type: 'create-table', table, layout: layout.clone() });
    return executor.listen(this.listener);
  }

  table(name: string): TableMigrationExecutor {
    return new TableMigrationExecutor(this.working.getLayoutByName(name), this.listener);
  }

  drop(name: string): void {
    this.working.removeLayout(name);
    this.queue.push({ type: 'drop-table', table: name });
  }

  has(name: string): Promise<boolean> {
    return this.connection.has(name);
  }

  async tags(): Promise<TagManager | null> {
    return this.connection.tags();
  }

  /** Operations queued and not yet committed */
  pending(): readonly DDLOperation[] {
    return this.queue;
  }

  async commit(): Promise<void> {
    const events = this.connection.events;
    while (this.queue.length > 0) {
      const op = this.queue[0];
      if (!op) break;
      await this.ddl.emit(op);
      this.queue.shift();
      events?.onDDLEmitted?.({ connection: this.connection.getName(), table: op.table, operation: op.type });
    }
  }
}
