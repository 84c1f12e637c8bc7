// Types
export type { Scalar, Row, DDLOperationType, DDLOperation } from './types/table';
export type { FieldType, FieldKind } from './types/field-type';
export { FieldTypes, ENUM_SEPARATOR, encodeFieldType, decodeFieldType, sameFieldType } from './types/field-type';
export {
  TabulaError,
  NotFoundError,
  InvariantViolationError,
  DuplicatePrimaryKeyError,
  EnumOptionsError,
  EnumSeparatorError,
  MissingPrimaryKeyError,
  InvalidOperatorError,
  DriverError,
  MigrationError,
  ManifestError,
  ConfigurationError,
  SnapshotError,
} from './types/errors';
export type { ValidationIssue, MigrationDirection } from './types/errors';

// Query Model
export { Restriction, Operators, isScalarList } from './query/restriction';
export type { RestrictionSubject, RestrictionValue } from './query/restriction';
export { RestrictionGroup } from './query/restriction-group';
export type { GroupType, RestrictionNode } from './query/restriction-group';
export { TableIdentifier, FieldIdentifier } from './query/identifiers';
export type { RestrictionTarget } from './query/identifiers';
export { Alias } from './query/alias';
export type { QuerySource } from './query/alias';
export { Aggregate, AGGREGATE_COUNT } from './query/aggregate';
export type { AggregateOperation } from './query/aggregate';
export { SelectExpression } from './query/select-expression';
export { OrderBy } from './query/order-by';
export type { OrderDirection } from './query/order-by';
export { Join } from './query/join';
export type { JoinType } from './query/join';
export { Query } from './query/query';
export type { QueryOptions, FieldReference } from './query/query';

// Schema Model
export { Field } from './schema/field';
export { Index, ForeignKey } from './schema/table-index';
export { Layout, PRIMARY_KEY, BEHAVIORS, BEHAVIOR_FIELDS } from './schema/layout';
export type { LayoutBehavior } from './schema/layout';
export { Schema } from './schema/schema';
export { serializeSchema, deserializeSchema, SNAPSHOT_VERSION } from './schema/snapshot';
export type { SchemaSnapshot, LayoutSnapshot, FieldSnapshot, IndexSnapshot } from './schema/snapshot';

// Records & Hooks
export { DbRecord, recordKey } from './record/record';
export { LayoutHooks, RecordEvent, QueryEvent } from './hooks/layout-hooks';
export type { HookType, HookOptions, HookEventMap, HookListener } from './hooks/layout-hooks';
export { updateTimestampListener, softDeleteListener, softDeleteQueryListener } from './hooks/listeners';

// Interfaces
export { ResultSet } from './interfaces/driver';
export type { Driver, QueryGrammar, RecordGrammar, SchemaGrammar } from './interfaces/driver';
export type { DDLProvider } from './interfaces/ddl-provider';
export type { EventBus } from './interfaces/event-bus';
export type { Migration, SchemaMigrationExecutor, TableMigrationListener } from './interfaces/migration';

// Migrations
export { TableMigrationExecutor } from './migration/table-migration-executor';
export { SchemaStateMigrationExecutor } from './migration/schema-state-executor';
export { DriverMigrationExecutor } from './migration/driver-migration-executor';
export { TagManager, TagLayoutMigration, TAG_TABLE } from './migration/tag-manager';
export { Migrator } from './migration/migrator';
export type { MigratorOptions, MigrationStatus } from './migration/migrator';

// Connection
export { Connection, migrationTag, MIGRATION_TAG_PREFIX } from './connection/connection';
export type { ConnectionOptions, MigrationOptions } from './connection/connection';
export { ConnectionManager } from './connection/connection-manager';
export type { DriverFactory, ConnectionManagerOptions } from './connection/connection-manager';
export { parseSettings, DEFAULT_SETTINGS } from './connection/settings';
export type { Settings } from './connection/settings';
export { validateConfig, loadDatabaseConfig } from './connection/config';
export type { DatabaseConfig, ConnectionDefinition } from './connection/config';

// Implementations
export { MemoryDriver } from './impl/memory-driver';
export type { MemoryDriverOptions } from './impl/memory-driver';
export { MemoryQueryGrammar, MemoryRecordGrammar, MemorySchemaGrammar } from './impl/memory-grammar';
export type { MemoryCommand } from './impl/memory-grammar';
export { DriverDDLProvider } from './impl/driver-ddl-provider';
export { FileSchemaCache } from './impl/file-schema-cache';
export { EventDispatcher } from './impl/event-dispatcher';
export type { EventType, DispatchedEvent, EventListener, EventDispatcherOptions } from './impl/event-dispatcher';

// Utilities
export { validateManifest, toIssues } from './utils/validation';
export { now, unixTime } from './utils';
