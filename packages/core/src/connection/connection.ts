/**
 * Connection: a driver paired with the schema snapshot of the database it
 * talks to.
 *
 * Reads and writes go through the driver's grammars; migrations are applied
 * to the live backend and to the snapshot, in that order, and recorded in the
 * tag ledger.
 *
 * Operations are awaited one at a time. A Connection is not safe to share
 * between concurrent callers, and nothing here locks, retries or times out.
 */

import { QueryEvent, RecordEvent, type HookOptions } from '../hooks/layout-hooks';
import { DriverDDLProvider } from '../impl/driver-ddl-provider';
import type { DDLProvider } from '../interfaces/ddl-provider';
import type { Driver, ResultSet } from '../interfaces/driver';
import type { EventBus } from '../interfaces/event-bus';
import type { Migration, SchemaMigrationExecutor } from '../interfaces/migration';
import { DriverMigrationExecutor } from '../migration/driver-migration-executor';
import { SchemaStateMigrationExecutor } from '../migration/schema-state-executor';
import { TagManager } from '../migration/tag-manager';
import type { Query } from '../query/query';
import type { DbRecord } from '../record/record';
import type { Layout } from '../schema/layout';
import type { Schema } from '../schema/schema';
import { MigrationError, type MigrationDirection } from '../types/errors';

export interface ConnectionOptions {
  /** Name used in events and errors (default: 'default') */
  name?: string;
  events?: EventBus;
  /** Where live DDL goes (default: rendered and written through the driver) */
  ddl?: DDLProvider;
}

export interface MigrationOptions {
  /**
   * When a migrator fails, undo the migrators that already completed by
   * running the opposite direction on them, latest first. Off by default:
   * the caller reconciles a partial failure.
   */
  compensate?: boolean;
}

/** Prefix of ledger tags that record applied migrations */
export const MIGRATION_TAG_PREFIX = 'migration:';

export function migrationTag(migration: Migration): string {
  return MIGRATION_TAG_PREFIX + migration.identifier();
}

export class Connection<S = unknown> {
  readonly events?: EventBus;

  private readonly name: string;
  private readonly ddl: DDLProvider;
  private tagManager: Promise<TagManager> | null = null;

  constructor(
    private schema: Schema,
    private readonly driver: Driver<S>,
    options: ConnectionOptions = {}
  ) {
    this.name = options.name ?? 'default';
    this.events = options.events;
    this.ddl = options.ddl ?? new DriverDDLProvider(driver);
  }

  getName(): string {
    return this.name;
  }

  getSchema(): Schema {
    return this.schema;
  }

  /** Replace the snapshot, e.g. with one loaded from a cache. */
  setSchema(schema: Schema): void {
    this.schema = schema;
    this.tagManager = null;
  }

  getDriver(): Driver<S> {
    return this.driver;
  }

  // ── Ledger ────────────────────────────────────────────────────

  /** A fresh migrator for the live backend. */
  migrator(): DriverMigrationExecutor {
    return new DriverMigrationExecutor(this, this.ddl);
  }

  /**
   * The tag manager of the live backend, or null when the driver keeps no
   * ledger. Opened once and reused; opening creates the ledger table if
   * needed.
   */
  async tags(): Promise<TagManager | null> {
    if (!this.driver.supportsTags) return null;
    if (!this.tagManager) {
      this.tagManager = TagManager.open(this).catch((err: unknown) => {
        this.tagManager = null;
        throw err;
      });
    }
    return this.tagManager;
  }

  /** Whether the ledger records `migration` as applied. Always false without a ledger. */
  async contains(migration: Migration): Promise<boolean> {
    const tags = await this.tags();
    if (!tags) return false;
    return (await tags.listTags()).includes(migrationTag(migration));
  }

  /**
   * Run `up` on the live backend, then on the schema snapshot, tagging the
   * ledger after each migrator that keeps one.
   *
   * On failure throws MigrationError. Migrators that completed stay applied
   * unless `compensate` is set.
   */
  async apply(migration: Migration, options: MigrationOptions = {}): Promise<void> {
    await this.run(migration, 'up', options);
  }

  /** Counterpart of `apply()`: runs `down` and removes the tag. */
  async rollback(migration: Migration, options: MigrationOptions = {}): Promise<void> {
    await this.run(migration, 'down', options);
  }

  // ── Data ──────────────────────────────────────────────────────

  /**
   * Read rows. Query hooks of the source layout run against a copy, so the
   * caller's query is left as it was.
   */
  async query(query: Query, options: HookOptions = {}): Promise<ResultSet> {
    const started = Date.now();
    const prepared = query.clone();
    const layout = this.layoutOf(prepared);
    layout?.hooks.dispatch('query.beforeCreate', new QueryEvent(layout, prepared, options));

    const result = await this.driver.read(this.driver.queryGrammar().query(prepared));
    this.events?.onQueryExecuted?.({
      connection: this.name,
      table: prepared.getTable().name,
      rowCount: result.rowCount,
      durationMs: Date.now() - started,
    });
    return result;
  }

  /**
   * Number of rows `query` matches, ignoring its projections, grouping, order
   * and range. Counts the primary key of the source layout, or its first
   * output.
   */
  async count(query: Query, options: HookOptions = {}): Promise<number> {
    const counting = query.withoutSelect().range(null, null).groupBy([]);
    const table = counting.getTable();
    const primary = this.layoutOf(counting)?.getPrimaryKey()?.fields[0];
    const field = primary?.name ?? table.outputNames()[0];
    if (field === undefined) return 0;

    counting.aggregate(field, 'count', 'count');
    const row = (await this.query(counting, options)).fetch();
    return Number(row?.count ?? 0);
  }

  /**
   * Write a new record. When the layout has an auto-increment field the
   * record does not set, the generated value is read back into the record.
   */
  async insert(record: DbRecord, options: HookOptions = {}): Promise<boolean> {
    const layout = record.getLayout();
    layout.hooks.dispatch('record.beforeInsert', new RecordEvent(layout, record, options));

    const affected = await this.driver.write(this.driver.recordGrammar().insert(layout, record));

    const increment = layout.getAutoIncrement();
    if (increment && (record.get(increment.name) ?? null) === null) {
      const id = await this.driver.lastInsertId(layout);
      if (id !== null) record.set(increment.name, id);
    }

    record.commit();
    this.events?.onRecordInserted?.({ connection: this.name, table: layout.tableName, values: record.raw() });
    return affected >= 0;
  }

  /**
   * Write the fields changed since the last commit. A record without changes
   * is not written and yields false.
   */
  async update(record: DbRecord, options: HookOptions = {}): Promise<boolean> {
    if (!record.isDirty()) return false;

    const layout = record.getLayout();
    layout.hooks.dispatch('record.beforeUpdate', new RecordEvent(layout, record, options));

    const changes = record.diff();
    const affected = await this.driver.write(this.driver.recordGrammar().update(layout, record));

    record.commit();
    this.events?.onRecordUpdated?.({ connection: this.name, table: layout.tableName, changes });
    return affected >= 0;
  }

  /**
   * Delete a record. On a soft-deleting layout this becomes an update of the
   * `removed` stamp unless `force` is set.
   */
  async delete(record: DbRecord, options: HookOptions = {}): Promise<boolean> {
    const layout = record.getLayout();
    const event = layout.hooks.dispatch('record.beforeDelete', new RecordEvent(layout, record, options));

    if (event.isPrevented()) {
      const written = await this.update(record, options);
      this.events?.onRecordDeleted?.({ connection: this.name, table: layout.tableName, soft: true });
      return written;
    }

    const affected = await this.driver.write(this.driver.recordGrammar().delete(layout, record));
    this.events?.onRecordDeleted?.({ connection: this.name, table: layout.tableName, soft: false });
    return affected >= 0;
  }

  /** Whether the backend has a table named `name`. */
  async has(name: string): Promise<boolean> {
    const result = await this.driver.read(this.driver.schemaGrammar().hasTable(this.schema.getName(), name));
    return result.rowCount > 0;
  }

  // ── Internal ──────────────────────────────────────────────────

  private layoutOf(query: Query): Layout | null {
    const source = query.getFrom().input;
    if (source.kind !== 'table' || !this.schema.hasLayout(source.name)) return null;
    return this.schema.getLayoutByName(source.name);
  }

  private async run(migration: Migration, direction: MigrationDirection, options: MigrationOptions): Promise<void> {
    const started = Date.now();
    const migrators: SchemaMigrationExecutor[] = [
      this.migrator(),
      new SchemaStateMigrationExecutor(this.schema),
    ];
    const completed: SchemaMigrationExecutor[] = [];

    for (const migrator of migrators) {
      try {
        await this.step(migration, direction, migrator);
      } catch (cause) {
        throw await this.fail(migration, direction, migrator, completed, cause, options);
      }
      completed.push(migrator);
    }

    const id = migration.identifier();
    if (direction === 'up') {
      this.schema.markApplied(id);
      this.events?.onMigrationApplied?.({ connection: this.name, migration: id, durationMs: Date.now() - started });
    } else {
      this.schema.markRolledBack(id);
      this.events?.onMigrationRolledBack?.({ connection: this.name, migration: id, durationMs: Date.now() - started });
    }
  }

  private async step(migration: Migration, direction: MigrationDirection, migrator: SchemaMigrationExecutor): Promise<void> {
    if (direction === 'up') {
      await migration.up(migrator);
    } else {
      await migration.down(migrator);
    }
    await migrator.commit();

    const tags = await migrator.tags();
    if (!tags) return;
    if (direction === 'up') {
      await tags.tag(migrationTag(migration));
    } else {
      await tags.untag(migrationTag(migration));
    }
  }

  /**
   * Build the error for a failed migrator, compensating first if asked to. A
   * failing compensation is reported together with the original cause.
   */
  private async fail(
    migration: Migration,
    direction: MigrationDirection,
    failed: SchemaMigrationExecutor,
    completed: SchemaMigrationExecutor[],
    cause: unknown,
    options: MigrationOptions
  ): Promise<MigrationError> {
    const id = migration.identifier();
    const names = completed.map(m => m.name);
    let compensated = false;
    let reported = cause;

    if (options.compensate && completed.length > 0) {
      const reverse: MigrationDirection = direction === 'up' ? 'down' : 'up';
      try {
        for (const migrator of [...completed].reverse()) {
          await this.step(migration, reverse, migrator);
        }
        compensated = true;
      } catch (compensationError) {
        reported = new AggregateError([cause, compensationError], `Compensating "${id}" failed`);
      }
    }

    const error = new MigrationError(id, direction, failed.name, names, reported, compensated);
    this.events?.onMigrationFailed?.({
      connection: this.name,
      migration: id,
      direction,
      failed: failed.name,
      completed: names,
      compensated,
      error: { code: error.code, message: error.message },
    });
    return error;
  }
}
