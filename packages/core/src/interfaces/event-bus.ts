import type { MigrationDirection } from '../types/errors';
import type { DDLOperationType } from '../types/table';

/**
 * Optional event publishing.
 * Every migration, ledger change, statement and snapshot transition emits an
 * event. All methods are optional; subscribe only to what you need.
 *
 * Categories:
 * - Migration lifecycle: apply, rollback, fail, skip
 * - Ledger: tag added, tag removed
 * - Schema: DDL emitted
 * - Data: query executed, record insert, update, delete
 * - Snapshot: load, save
 */
export interface EventBus {
  // ── Migration Lifecycle ───────────────────────────────────────────
  onMigrationApplied?(e: { connection: string; migration: string; durationMs: number }): void;
  onMigrationRolledBack?(e: { connection: string; migration: string; durationMs: number }): void;

  /**
   * Emitted when a migrator fails. `completed` lists the migrators that ran
   * before the failure; `compensated` tells whether they were undone.
   */
  onMigrationFailed?(e: {
    connection: string;
    migration: string;
    direction: MigrationDirection;
    failed: string;
    completed: readonly string[];
    compensated: boolean;
    error: { code: string; message: string };
  }): void;

  /**
   * Emitted by the migrator for a migration the ledger already holds.
   */
  onMigrationSkipped?(e: { connection: string; migration: string }): void;

  // ── Ledger ────────────────────────────────────────────────────────
  onTagAdded?(e: { connection: string; tag: string }): void;
  onTagRemoved?(e: { connection: string; tag: string }): void;

  // ── Schema ────────────────────────────────────────────────────────

  /**
   * Emitted after a DDL operation was handed to the DDL provider.
   */
  onDDLEmitted?(e: { connection: string; table: string; operation: DDLOperationType }): void;

  // ── Data ──────────────────────────────────────────────────────────
  onQueryExecuted?(e: { connection: string; table: string; rowCount: number; durationMs: number }): void;
  onRecordInserted?(e: { connection: string; table: string; values: Record<string, unknown> }): void;
  onRecordUpdated?(e: { connection: string; table: string; changes: Record<string, unknown> }): void;

  /**
   * Emitted when a record is deleted. `soft` is true when a soft-delete hook
   * turned the delete into an update.
   */
  onRecordDeleted?(e: { connection: string; table: string; soft: boolean }): void;

  // ── Snapshot ──────────────────────────────────────────────────────
  onSnapshotLoaded?(e: { schema: string; path: string; layoutCount: number }): void;
  onSnapshotSaved?(e: { schema: string; path: string; layoutCount: number }): void;
}
