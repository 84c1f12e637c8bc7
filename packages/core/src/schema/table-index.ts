import type { Field } from './field';

/**
 * An index over one or more fields of a layout.
 */
export class Index {
  constructor(
    public readonly name: string,
    public readonly fields: readonly Field[],
    public readonly unique = false,
    public readonly primary = false
  ) {}

  /**
   * Whether the DBMS must enforce distinct values. Primary indexes are always
   * unique, whatever `unique` says.
   */
  isUnique(): boolean {
    return this.unique || this.primary;
  }

  isPrimary(): boolean {
    return this.primary;
  }

  fieldNames(): string[] {
    return this.fields.map(f => f.name);
  }
}

/**
 * Index on a local field that references the primary key of another layout.
 */
export class ForeignKey extends Index {
  constructor(
    name: string,
    public readonly field: Field,
    public readonly referencedTable: string,
    public readonly referencedField: string
  ) {
    super(name, [field], false, false);
  }
}
