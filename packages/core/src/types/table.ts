/**
 * Row & DDL types shared by drivers and grammars.
 */

import type { Field } from '../schema/field';
import type { Index } from '../schema/table-index';
import type { Layout } from '../schema/layout';

// ── Values ──────────────────────────────────────────────────────

/** A single value a column can hold */
export type Scalar = string | number | boolean | bigint;

/** Row data as returned by a driver: output name → value */
export type Row = Record<string, unknown>;

// ── DDL Operation ───────────────────────────────────────────────

/** DDL operation types emitted by the live-backend migrator */
export type DDLOperationType =
  | 'create-table'
  | 'drop-table'
  | 'add-column'
  | 'drop-column'
  | 'add-index'
  | 'drop-index';

/** A schema change queued by a migration, rendered by a schema grammar */
export type DDLOperation =
  | { readonly type: 'create-table'; readonly table: string; readonly layout: Layout }
  | { readonly type: 'drop-table'; readonly table: string }
  | { readonly type: 'add-column'; readonly table: string; readonly field: Field }
  | { readonly type: 'drop-column'; readonly table: string; readonly field: string }
  | { readonly type: 'add-index'; readonly table: string; readonly index: Index }
  | { readonly type: 'drop-index'; readonly table: string; readonly index: Index };
