/**
 * Base error for all Tabula errors.
 */
export class TabulaError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'TabulaError';
  }
}

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
  readonly severity: 'error' | 'warning';
}

// === Lookup ===

/**
 * A field, index, layout or output was referenced but does not exist.
 */
export class NotFoundError extends TabulaError {
  constructor(
    public readonly kind: 'field' | 'index' | 'layout' | 'output' | 'driver' | 'connection',
    public readonly key: string,
    public readonly scope?: string
  ) {
    super('NOT_FOUND', scope ? `No ${kind} "${key}" in "${scope}"` : `No ${kind} "${key}"`);
    this.name = 'NotFoundError';
  }
}

// === Invariants ===

/**
 * Base class for schema invariant violations. These are authoring errors in a
 * migration and are never recoverable at runtime.
 */
export class InvariantViolationError extends TabulaError {
  constructor(
    code: string,
    public readonly table: string | null,
    message: string
  ) {
    super(code, message);
    this.name = 'InvariantViolationError';
  }
}

/**
 * A second primary index was added to a layout.
 */
export class DuplicatePrimaryKeyError extends InvariantViolationError {
  constructor(table: string, public readonly existing: string) {
    super('DUPLICATE_PRIMARY_KEY', table, `Table "${table}" already has a primary key ("${existing}")`);
    this.name = 'DuplicatePrimaryKeyError';
  }
}

/**
 * An enum option contains the character used to join the option set.
 */
export class EnumSeparatorError extends InvariantViolationError {
  constructor(
    public readonly field: string,
    public readonly option: string,
    table: string | null = null
  ) {
    super('ENUM_SEPARATOR', table, `Enum option "${option}" of "${table ? `${table}.${field}` : field}" contains ","`);
    this.name = 'EnumSeparatorError';
  }
}

/**
 * An enum has no options, or an empty one. Neither survives the encoded form.
 */
export class EnumOptionsError extends InvariantViolationError {
  constructor(
    public readonly field: string,
    table: string | null = null
  ) {
    super('ENUM_OPTIONS', table, `Enum "${table ? `${table}.${field}` : field}" needs non-empty options`);
    this.name = 'EnumOptionsError';
  }
}

/**
 * A foreign key was pointed at a layout without a single-field primary key.
 */
export class MissingPrimaryKeyError extends InvariantViolationError {
  constructor(table: string, public readonly referenced: string) {
    super(
      'MISSING_PRIMARY_KEY',
      table,
      `Cannot reference "${referenced}" from "${table}": it has no single-field primary key`
    );
    this.name = 'MissingPrimaryKeyError';
  }
}

// === Operators ===

/**
 * The operator has no logical complement.
 */
export class InvalidOperatorError extends TabulaError {
  constructor(public readonly operator: string) {
    super('INVALID_OPERATOR', `Invalid operator detected: "${operator}" cannot be negated`);
    this.name = 'InvalidOperatorError';
  }
}

// === Backend ===

/**
 * The driver failed to execute a statement.
 */
export class DriverError extends TabulaError {
  constructor(message: string, public readonly cause?: unknown) {
    super('DRIVER_ERROR', message);
    this.name = 'DriverError';
  }
}

// === Migrations ===

export type MigrationDirection = 'up' | 'down';

/**
 * A migrator failed while a migration was being applied or rolled back.
 * Migrators listed in `completed` already ran and were not undone unless
 * compensation was requested.
 */
export class MigrationError extends TabulaError {
  constructor(
    public readonly migration: string,
    public readonly direction: MigrationDirection,
    public readonly failed: string,
    public readonly completed: readonly string[],
    public readonly cause: unknown,
    public readonly compensated = false
  ) {
    super(
      'MIGRATION_FAILED',
      `Migration "${migration}" failed (${direction}) on ${failed}: ${describe(cause)}`
    );
    this.name = 'MigrationError';
  }
}

/**
 * The migration manifest is unusable.
 */
export class ManifestError extends TabulaError {
  constructor(message: string) {
    super('MANIFEST_INVALID', message);
    this.name = 'ManifestError';
  }
}

// === Configuration ===

/**
 * Connection configuration failed validation.
 */
export class ConfigurationError extends TabulaError {
  constructor(public readonly issues: ValidationIssue[]) {
    super('CONFIG_INVALID', `Database configuration is invalid: ${issues[0]?.path} ${issues[0]?.message}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * A persisted schema snapshot failed validation.
 */
export class SnapshotError extends TabulaError {
  constructor(
    public readonly source: string,
    public readonly issues: ValidationIssue[]
  ) {
    super('SNAPSHOT_INVALID', `Schema snapshot "${source}" is invalid: ${issues[0]?.path} ${issues[0]?.message}`);
    this.name = 'SnapshotError';
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
