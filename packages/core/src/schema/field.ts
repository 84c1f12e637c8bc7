import { EnumOptionsError, EnumSeparatorError } from '../types/errors';
import { ENUM_SEPARATOR, type FieldType } from '../types/field-type';

/**
 * A column of a layout. Fields are immutable; the migration DSL replaces
 * them instead of editing them.
 */
export class Field {
  constructor(
    public readonly name: string,
    public readonly type: FieldType,
    public readonly nullable = true,
    public readonly autoIncrement = false,
    table: string | null = null
  ) {
    if (type.kind === 'enum') {
      if (type.options.length === 0 || type.options.includes('')) {
        throw new EnumOptionsError(name, table);
      }
      const bad = type.options.find(option => option.includes(ENUM_SEPARATOR));
      if (bad !== undefined) {
        throw new EnumSeparatorError(name, bad, table);
      }
    }
  }

  /** Copy of this field under another name (used for foreign key columns). */
  withName(name: string, nullable = this.nullable): Field {
    return new Field(name, this.type, nullable, false);
  }
}
