/**
 * Migration contracts.
 *
 * A migration is authored once against `SchemaMigrationExecutor` and replayed
 * against every migrator a connection holds: the live backend first, then the
 * in-memory schema snapshot.
 */

import type { Field } from '../schema/field';
import type { Index } from '../schema/table-index';
import type { TableMigrationExecutor } from '../migration/table-migration-executor';
import type { TagManager } from '../migration/tag-manager';

export interface Migration {
  /** Stable identifier, recorded in the ledger as `migration:<identifier>` */
  identifier(): string;
  up(executor: SchemaMigrationExecutor): void | Promise<void>;
  down(executor: SchemaMigrationExecutor): void | Promise<void>;
}

export interface SchemaMigrationExecutor {
  /** Label used in errors and events, e.g. `driver:postgres` or `schema` */
  readonly name: string;

  /**
   * Create a table. Changes made in `configure` are part of the creation;
   * later changes through the returned executor alter the new table.
   */
  add(table: string, configure?: (table: TableMigrationExecutor) => void): TableMigrationExecutor;

  /** Alter an existing table. Throws NotFoundError if it does not exist. */
  table(name: string): TableMigrationExecutor;

  drop(name: string): void;

  has(name: string): Promise<boolean>;

  /** Ledger of this migrator, or null when it keeps none. */
  tags(): Promise<TagManager | null>;

  /** Carry out the changes queued since the last commit. */
  commit(): Promise<void>;
}

/**
 * Observer of layout mutations made through a TableMigrationExecutor.
 * Called after each mutation succeeded.
 */
export interface TableMigrationListener {
  fieldAdded(table: string, field: Field): void;
  fieldRemoved(table: string, field: string): void;
  indexAdded(table: string, index: Index): void;
  indexRemoved(table: string, index: Index): void;
}
