/**
 * How queries name tables and fields.
 *
 * A TableIdentifier is a named relation (a table, or a sub-query under an
 * alias) together with the names of the outputs it exposes. Resolving a name
 * that the relation does not expose is a lookup error.
 */

import { NotFoundError } from '../types/errors';

/**
 * Capability shared by everything a restriction can compare: a field of a
 * relation, or a whole sub-query.
 */
export interface RestrictionTarget {
  readonly kind: 'field' | 'query';
}

export class TableIdentifier {
  readonly kind = 'table' as const;

  constructor(
    /** Table name in the DBMS, or the alias of a sub-query */
    public readonly name: string,
    private readonly outputs: readonly string[],
    /** Alias used to refer to the relation inside a query */
    public readonly alias: string | null = null
  ) {}

  withAlias(alias: string): TableIdentifier {
    return new TableIdentifier(this.name, this.outputs, alias);
  }

  /** Alias if set, table name otherwise */
  reference(): string {
    return this.alias ?? this.name;
  }

  hasOutput(name: string): boolean {
    return this.outputs.includes(name);
  }

  getOutput(name: string): FieldIdentifier {
    if (!this.hasOutput(name)) {
      throw new NotFoundError('field', name, this.reference());
    }
    return new FieldIdentifier(this, name);
  }

  getOutputs(): FieldIdentifier[] {
    return this.outputs.map(name => new FieldIdentifier(this, name));
  }

  outputNames(): readonly string[] {
    return this.outputs;
  }
}

export class FieldIdentifier implements RestrictionTarget {
  readonly kind = 'field' as const;

  constructor(
    public readonly table: TableIdentifier,
    public readonly name: string
  ) {}

  /** `alias.name`, as used for diagnostics and aggregate aliases */
  toString(): string {
    return `${this.table.reference()}.${this.name}`;
  }
}
