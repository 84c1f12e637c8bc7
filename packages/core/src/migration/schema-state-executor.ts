import type { SchemaMigrationExecutor } from '../interfaces/migration';
import { Layout } from '../schema/layout';
import type { Schema } from '../schema/schema';
import { TableMigrationExecutor } from './table-migration-executor';
import type { TagManager } from './tag-manager';

/**
 * Applies migrations to an in-memory Schema. Changes take effect at once;
 * there is nothing to commit and no ledger.
 */
export class SchemaStateMigrationExecutor implements SchemaMigrationExecutor {
  readonly name = 'schema';

  constructor(private readonly schema: Schema) {}

  add(table: string, configure?: (table: TableMigrationExecutor) => void): TableMigrationExecutor {
    const layout = new Layout(table);
    const executor = new TableMigrationExecutor(layout);
    configure?.(executor);
    this.schema.putLayout(layout);
    return executor;
  }

  table(name: string): TableMigrationExecutor {
    return new TableMigrationExecutor(this.schema.getLayoutByName(name));
  }

  drop(name: string): void {
    this.schema.removeLayout(name);
  }

  async has(name: string): Promise<boolean> {
    return this.schema.hasLayout(name);
  }

  async tags(): Promise<TagManager | null> {
    return null;
  }

  async commit(): Promise<void> {}
}
