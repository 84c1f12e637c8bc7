/**
 * Migrator: brings a database up to date with a migration manifest.
 *
 * A run:
 * 1. loads the schema snapshot from the cache, if one is configured;
 * 2. fast-forwards the snapshot through every migration the ledger already
 *    records but the snapshot has not seen, so layouts resolve as they do on
 *    the database;
 * 3. applies the remaining migrations in manifest order;
 * 4. saves the snapshot.
 *
 * Manifest order matters: migrations are applied in it and rolled back in
 * reverse.
 */

import type { Connection, MigrationOptions } from '../connection/connection';
import type { FileSchemaCache } from '../impl/file-schema-cache';
import type { Migration } from '../interfaces/migration';
import { Schema } from '../schema/schema';
import { ManifestError } from '../types/errors';
import { validateManifest } from '../utils/validation';
import { SchemaStateMigrationExecutor } from './schema-state-executor';

export interface MigratorOptions extends MigrationOptions {
  /** Snapshot store. Without one the connection's schema is used as is. */
  cache?: FileSchemaCache;
  /** Progress output (default: console.log with a `[migrate]` prefix) */
  log?: (message: string) => void;
}

export interface MigrationStatus {
  identifier: string;
  applied: boolean;
}

export class Migrator {
  private readonly log: (message: string) => void;

  constructor(
    private readonly connection: Connection,
    private readonly migrations: readonly Migration[],
    private readonly options: MigratorOptions = {}
  ) {
    const issues = validateManifest(migrations);
    if (issues.length > 0) {
      throw new ManifestError(issues.map(i => `${i.path}: ${i.message}`).join('; '));
    }
    this.log = options.log ?? (message => console.log(`[migrate] ${message}`));
  }

  /** Each manifest entry and whether the ledger records it. */
  async status(): Promise<MigrationStatus[]> {
    const status: MigrationStatus[] = [];
    for (const migration of this.migrations) {
      status.push({ identifier: migration.identifier(), applied: await this.connection.contains(migration) });
    }
    return status;
  }

  /** Apply every pending migration. Resolves to the identifiers applied. */
  async run(): Promise<string[]> {
    await this.prepare();

    const applied: string[] = [];
    for (const migration of this.migrations) {
      const id = migration.identifier();
      if (await this.connection.contains(migration)) {
        this.log(`Skipping ${id}`);
        this.connection.events?.onMigrationSkipped?.({ connection: this.connection.getName(), migration: id });
        continue;
      }
      this.log(`Applying ${id}`);
      await this.connection.apply(migration, { compensate: this.options.compensate });
      applied.push(id);
    }

    await this.persist();
    return applied;
  }

  /**
   * Roll back the `steps` latest applied migrations, in reverse manifest
   * order. Resolves to the identifiers rolled back.
   */
  async rollback(steps = 1): Promise<string[]> {
    await this.prepare();

    const rolledBack: string[] = [];
    for (const migration of [...this.migrations].reverse()) {
      if (rolledBack.length >= steps) break;
      if (!(await this.connection.contains(migration))) continue;

      const id = migration.identifier();
      this.log(`Rolling back ${id}`);
      await this.connection.rollback(migration, { compensate: this.options.compensate });
      rolledBack.push(id);
    }

    await this.persist();
    return rolledBack;
  }

  private async prepare(): Promise<void> {
    const { cache } = this.options;
    if (cache) {
      const loaded = await cache.load();
      this.connection.setSchema(loaded ?? new Schema(this.connection.getSchema().getName()));
    }

    for (const migration of this.migrations) {
      const id = migration.identifier();
      const schema = this.connection.getSchema();
      if (schema.hasApplied(id) || !(await this.connection.contains(migration))) continue;

      this.log(`Fast-forwarding ${id}`);
      await migration.up(new SchemaStateMigrationExecutor(schema));
      schema.markApplied(id);
    }
  }

  private async persist(): Promise<void> {
    await this.options.cache?.save(this.connection.getSchema());
  }
}
