/**
 * DDLProvider: drop point for schema operations.
 *
 * DriverDDLProvider renders and runs each operation immediately (default).
 * A provider that records or exports operations can stand in for it, e.g. to
 * hand DDL to a review step instead of the live database.
 */

import type { DDLOperation } from '../types/table';

/**
 * Provider for DDL (schema change) operations.
 */
export interface DDLProvider {
  /** Emit a DDL operation. Returns when acknowledged. */
  emit(op: DDLOperation): Promise<void>;
}
