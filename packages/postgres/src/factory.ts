import { Pool } from 'pg';
import type { Settings } from '@tabula/core';
import { PgDriver } from './pg-driver';

/**
 * Driver factory for ConnectionManager. `settings.schema` names the database.
 *
 * ```typescript
 * new ConnectionManager(config, { drivers: { postgres: pgDriverFactory } });
 * ```
 */
export function pgDriverFactory(settings: Settings): PgDriver {
  const pool = new Pool({
    host: settings.host,
    port: settings.port,
    user: settings.user,
    password: settings.password,
    database: settings.schema,
    client_encoding: settings.encoding,
  });
  return new PgDriver(pool, { prefix: settings.prefix });
}
