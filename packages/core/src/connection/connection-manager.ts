/**
 * ConnectionManager: builds and caches the connections a configuration
 * names.
 *
 * Drivers are built by the factories passed in, keyed by the `driver` field
 * of each connection definition:
 *
 * ```typescript
 * import { pgDriverFactory } from '@tabula/postgres';
 *
 * const manager = new ConnectionManager(loadDatabaseConfig('database.json'), {
 *   drivers: { postgres: pgDriverFactory },
 *   events: dispatcher,
 * });
 * const db = await manager.get();
 * ```
 */

import type { Driver } from '../interfaces/driver';
import type { EventBus } from '../interfaces/event-bus';
import { FileSchemaCache } from '../impl/file-schema-cache';
import { Schema } from '../schema/schema';
import { NotFoundError } from '../types/errors';
import type { DatabaseConfig } from './config';
import { Connection } from './connection';
import { parseSettings, type Settings } from './settings';

export type DriverFactory = (settings: Settings) => Driver | Promise<Driver>;

export interface ConnectionManagerOptions {
  drivers: Readonly<Record<string, DriverFactory>>;
  events?: EventBus;
}

export class ConnectionManager {
  private readonly connections = new Map<string, Promise<Connection>>();

  constructor(
    private readonly config: DatabaseConfig,
    private readonly options: ConnectionManagerOptions
  ) {}

  /** The connection named `name` (default: the configured default), built once. */
  get(name: string = this.config.default): Promise<Connection> {
    let connection = this.connections.get(name);
    if (!connection) {
      connection = this.make(name).catch((err: unknown) => {
        this.connections.delete(name);
        throw err;
      });
      this.connections.set(name, connection);
    }
    return connection;
  }

  /** A new, uncached connection. */
  async make(name: string): Promise<Connection> {
    const definition = this.config.connections[name];
    if (!definition) {
      throw new NotFoundError('connection', name);
    }

    const factory = this.options.drivers[definition.driver];
    if (!factory) {
      throw new NotFoundError('driver', definition.driver, name);
    }

    const settings = parseSettings(definition.settings);
    const driver = await factory(settings);
    const schema = (await this.cache(name)?.load()) ?? new Schema(settings.schema);

    return new Connection(schema, driver, { name, events: this.options.events });
  }

  /** Snapshot cache of a connection, or null when it configures none. */
  cache(name: string = this.config.default): FileSchemaCache | null {
    const path = this.config.connections[name]?.schema;
    return path ? new FileSchemaCache(path, this.options.events) : null;
  }

  names(): string[] {
    return Object.keys(this.config.connections);
  }

  /** Close the drivers of every connection built so far. */
  async close(): Promise<void> {
    const pending = [...this.connections.values()];
    this.connections.clear();
    for (const connection of pending) {
      await (await connection).getDriver().close?.();
    }
  }
}
