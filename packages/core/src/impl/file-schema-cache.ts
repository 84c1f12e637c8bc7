/**
 * FileSchemaCache: schema snapshot as a JSON file on local disk.
 *
 * Lets an application resolve layouts at startup without replaying its
 * migrations. The file is rewritten whole on every save.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { EventBus } from '../interfaces/event-bus';
import type { Schema } from '../schema/schema';
import { deserializeSchema, serializeSchema } from '../schema/snapshot';
import { SnapshotError } from '../types/errors';

export class FileSchemaCache {
  constructor(
    private readonly path: string,
    private readonly events?: EventBus
  ) {}

  getPath(): string {
    return this.path;
  }

  /** The cached schema, or null when the file does not exist. */
  async load(): Promise<Schema | null> {
    if (!existsSync(this.path)) return null;

    let data: unknown;
    try {
      data = JSON.parse(readFileSync(this.path, 'utf-8'));
    } catch (err) {
      throw new SnapshotError(this.path, [
        { path: '(root)', message: err instanceof Error ? err.message : String(err), severity: 'error' },
      ]);
    }

    const schema = deserializeSchema(data, this.path);
    this.events?.onSnapshotLoaded?.({
      schema: schema.getName(),
      path: this.path,
      layoutCount: schema.getLayouts().length,
    });
    return schema;
  }

  async save(schema: Schema): Promise<void> {
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, JSON.stringify(serializeSchema(schema), null, 2) + '\n', 'utf-8');
    this.events?.onSnapshotSaved?.({
      schema: schema.getName(),
      path: this.path,
      layoutCount: schema.getLayouts().length,
    });
  }
}
