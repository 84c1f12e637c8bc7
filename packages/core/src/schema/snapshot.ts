/**
 * The JSON form of a Schema.
 *
 * ```json
 * {
 *   "version": 1,
 *   "name": "app",
 *   "applied": ["users.create"],
 *   "layouts": [{
 *     "tableName": "users",
 *     "behaviors": ["timestamps"],
 *     "fields": [{ "name": "_id", "type": "long:unsigned", "nullable": false, "autoIncrement": true }],
 *     "indexes": [{ "name": "_primary", "fields": ["_id"], "unique": true, "primary": true }]
 *   }]
 * }
 * ```
 *
 * Behaviors are stored by name; loading re-registers their hooks.
 */

import Ajv from 'ajv';
import { SnapshotError } from '../types/errors';
import { decodeFieldType, encodeFieldType } from '../types/field-type';
import { toIssues } from '../utils/validation';
import { Layout, type LayoutBehavior } from './layout';
import { Schema } from './schema';
import { ForeignKey, Index } from './table-index';

export const SNAPSHOT_VERSION = 1;

export interface FieldSnapshot {
  name: string;
  type: string;
  nullable: boolean;
  autoIncrement: boolean;
}

export interface IndexSnapshot {
  name: string;
  fields: string[];
  unique: boolean;
  primary: boolean;
  references?: { table: string; field: string };
}

export interface LayoutSnapshot {
  tableName: string;
  behaviors: LayoutBehavior[];
  fields: FieldSnapshot[];
  indexes: IndexSnapshot[];
}

export interface SchemaSnapshot {
  version: 1;
  name: string;
  applied: string[];
  layouts: LayoutSnapshot[];
}

const snapshotSchema = {
  type: 'object',
  required: ['version', 'name', 'applied', 'layouts'],
  additionalProperties: false,
  properties: {
    version: { const: SNAPSHOT_VERSION },
    name: { type: 'string' },
    applied: { type: 'array', items: { type: 'string' } },
    layouts: {
      type: 'array',
      items: {
        type: 'object',
        required: ['tableName', 'behaviors', 'fields', 'indexes'],
        additionalProperties: false,
        properties: {
          tableName: { type: 'string', minLength: 1 },
          behaviors: { type: 'array', items: { enum: ['timestamps', 'softDelete'] } },
          fields: {
            type: 'array',
            items: {
              type: 'object',
              required: ['name', 'type', 'nullable', 'autoIncrement'],
              additionalProperties: false,
              properties: {
                name: { type: 'string', minLength: 1 },
                type: { type: 'string', minLength: 1 },
                nullable: { type: 'boolean' },
                autoIncrement: { type: 'boolean' },
              },
            },
          },
          indexes: {
            type: 'array',
            items: {
              type: 'object',
              required: ['name', 'fields', 'unique', 'primary'],
              additionalProperties: false,
              properties: {
                name: { type: 'string', minLength: 1 },
                fields: { type: 'array', items: { type: 'string' }, minItems: 1 },
                unique: { type: 'boolean' },
                primary: { type: 'boolean' },
                references: {
                  type: 'object',
                  required: ['table', 'field'],
                  additionalProperties: false,
                  properties: {
                    table: { type: 'string' },
                    field: { type: 'string' },
                  },
                },
              },
            },
          },
        },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true });
const validate = ajv.compile<SchemaSnapshot>(snapshotSchema);

export function serializeSchema(schema: Schema): SchemaSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    name: schema.getName(),
    applied: [...schema.getApplied()],
    layouts: schema.getLayouts().map(serializeLayout),
  };
}

function serializeLayout(layout: Layout): LayoutSnapshot {
  return {
    tableName: layout.tableName,
    behaviors: layout.getBehaviors(),
    fields: layout.getFields().map(f => ({
      name: f.name,
      type: encodeFieldType(f.type),
      nullable: f.nullable,
      autoIncrement: f.autoIncrement,
    })),
    indexes: layout.getIndexes().map(index => {
      const snapshot: IndexSnapshot = {
        name: index.name,
        fields: index.fieldNames(),
        unique: index.unique,
        primary: index.primary,
      };
      if (index instanceof ForeignKey) {
        snapshot.references = { table: index.referencedTable, field: index.referencedField };
      }
      return snapshot;
    }),
  };
}

/**
 * Rebuild a Schema from its JSON form. Throws SnapshotError when the document
 * does not match the snapshot format or refers to fields it does not define.
 *
 * @param source - Where the document came from, for error messages
 */
export function deserializeSchema(data: unknown, source = '(inline)'): Schema {
  if (!validate(data)) {
    throw new SnapshotError(source, toIssues(validate.errors));
  }

  const schema = new Schema(data.name);
  data.layouts.forEach((snapshot, i) => {
    schema.putLayout(deserializeLayout(snapshot, `layouts.${i}`, source));
  });
  for (const id of data.applied) schema.markApplied(id);
  return schema;
}

function deserializeLayout(snapshot: LayoutSnapshot, path: string, source: string): Layout {
  const layout = new Layout(snapshot.tableName);
  const fail = (at: string, message: string): never => {
    throw new SnapshotError(source, [{ path: `${path}.${at}`, message, severity: 'error' }]);
  };
  const attempt = (at: string, build: () => void): void => {
    try {
      build();
    } catch (err) {
      if (err instanceof SnapshotError) throw err;
      fail(at, err instanceof Error ? err.message : String(err));
    }
  };

  snapshot.fields.forEach((f, i) => {
    attempt(`fields.${i}`, () => {
      layout.putField(f.name, decodeFieldType(f.type), f.nullable, f.autoIncrement);
    });
  });

  snapshot.indexes.forEach((s, i) => {
    attempt(`indexes.${i}`, () => {
      const fields = s.fields.map(name =>
        layout.hasField(name) ? layout.getField(name) : fail(`indexes.${i}`, `Unknown field "${name}"`)
      );
      const first = fields[0];
      if (s.references && first && fields.length === 1) {
        layout.putIndex(new ForeignKey(s.name, first, s.references.table, s.references.field));
      } else {
        layout.putIndex(new Index(s.name, fields, s.unique, s.primary));
      }
    });
  });

  for (const behavior of snapshot.behaviors) layout.enable(behavior);
  return layout;
}
