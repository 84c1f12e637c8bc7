/**
 * Connection settings: where a driver connects and how it names tables.
 *
 * Settings come either as a URL or as an object; anything missing falls back
 * to DEFAULT_SETTINGS.
 *
 * ```typescript
 * parseSettings('postgres://app:test-secret@db:5432/shop?prefix=app_');
 * // { host: 'db', port: 5432, user: 'app', password: 'test-secret',
 * //   schema: 'shop', prefix: 'app_', encoding: 'utf8' }
 * ```
 */

import { ConfigurationError } from '../types/errors';

export interface Settings {
  host: string;
  port: number;
  user: string;
  password: string;
  /** Database name; also the name of the connection's Schema */
  schema: string;
  /** Prepended to every table name the driver renders */
  prefix: string;
  encoding: string;
}

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  host: 'localhost',
  port: 5432,
  user: 'postgres',
  password: '',
  schema: 'database',
  prefix: '',
  encoding: 'utf8',
};

export function parseSettings(input: string | Partial<Settings>): Settings {
  return typeof input === 'string' ? fromURL(input) : { ...DEFAULT_SETTINGS, ...input };
}

function fromURL(input: string): Settings {
  let url: URL;
  try {
    url = new URL(input);
  } catch {
    throw new ConfigurationError([{ path: 'settings', message: `Invalid connection URL "${input}"`, severity: 'error' }]);
  }

  const params = url.searchParams;
  return {
    host: url.hostname || DEFAULT_SETTINGS.host,
    port: url.port ? Number(url.port) : DEFAULT_SETTINGS.port,
    user: url.username ? decodeURIComponent(url.username) : DEFAULT_SETTINGS.user,
    password: url.password ? decodeURIComponent(url.password) : DEFAULT_SETTINGS.password,
    schema: decodeURIComponent(url.pathname.replace(/^\//, '')) || DEFAULT_SETTINGS.schema,
    prefix: params.get('prefix') ?? DEFAULT_SETTINGS.prefix,
    encoding: params.get('encoding') ?? DEFAULT_SETTINGS.encoding,
  };
}
