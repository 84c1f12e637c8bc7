// Driver
export { PgDriver } from './pg-driver';
export type { PgDriverOptions } from './pg-driver';
export type { PoolLike, PoolQueryResult } from './pool';

// Grammars
export { PgQueryGrammar } from './query-grammar';
export { PgRecordGrammar } from './record-grammar';
export { PgSchemaGrammar } from './schema-grammar';
export { SqlBuilder, quoteIdentifier, quoteLiteral } from './statement';
export type { SqlStatement } from './statement';

// Factory
export { pgDriverFactory } from './factory';
