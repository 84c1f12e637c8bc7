/**
 * Field types: the physical column types a layout can hold.
 *
 * Each type has a canonical string encoding used by schema snapshots:
 *   int, int:unsigned, long, long:unsigned, string:<length>, text, enum:<a>,<b>
 */

import { TabulaError } from './errors';

/** Character joining enum options in the encoded form */
export const ENUM_SEPARATOR = ',';

export type FieldType =
  | { readonly kind: 'int'; readonly unsigned: boolean }
  | { readonly kind: 'long'; readonly unsigned: boolean }
  | { readonly kind: 'string'; readonly length: number }
  | { readonly kind: 'text' }
  | { readonly kind: 'enum'; readonly options: readonly string[] };

export type FieldKind = FieldType['kind'];

export const FieldTypes = {
  int(unsigned = false): FieldType {
    return { kind: 'int', unsigned };
  },

  long(unsigned = false): FieldType {
    return { kind: 'long', unsigned };
  },

  string(length: number): FieldType {
    return { kind: 'string', length };
  },

  text(): FieldType {
    return { kind: 'text' };
  },

  enum(options: readonly string[]): FieldType {
    return { kind: 'enum', options: [...options] };
  },
} as const;

export function encodeFieldType(type: FieldType): string {
  switch (type.kind) {
    case 'int':
    case 'long':
      return type.unsigned ? `${type.kind}:unsigned` : type.kind;
    case 'string':
      return `string:${type.length}`;
    case 'text':
      return 'text';
    case 'enum':
      return `enum:${type.options.join(ENUM_SEPARATOR)}`;
  }
}

export function decodeFieldType(encoded: string): FieldType {
  const sep = encoded.indexOf(':');
  const kind = sep === -1 ? encoded : encoded.slice(0, sep);
  const arg = sep === -1 ? undefined : encoded.slice(sep + 1);

  switch (kind) {
    case 'int':
    case 'long':
      if (arg !== undefined && arg !== 'unsigned') break;
      return kind === 'int' ? FieldTypes.int(arg === 'unsigned') : FieldTypes.long(arg === 'unsigned');
    case 'string': {
      const length = Number(arg);
      if (!Number.isInteger(length) || length <= 0) break;
      return FieldTypes.string(length);
    }
    case 'text':
      if (arg !== undefined) break;
      return FieldTypes.text();
    case 'enum':
      if (!arg) break;
      return FieldTypes.enum(arg.split(ENUM_SEPARATOR));
  }

  throw new TabulaError('FIELD_TYPE_INVALID', `Unknown field type "${encoded}"`);
}

export function sameFieldType(a: FieldType, b: FieldType): boolean {
  return encodeFieldType(a) === encodeFieldType(b);
}
