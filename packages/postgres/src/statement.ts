/**
 * Parameterized SQL statements.
 */

export interface SqlStatement {
  readonly text: string;
  readonly values: readonly unknown[];
}

/**
 * Collects parameter values while a statement is rendered. `param()` returns
 * the placeholder (`$1`, `$2`, ...) to put in the text. One builder is shared
 * by a query and its sub-queries so their placeholders do not collide.
 */
export class SqlBuilder {
  private readonly values: unknown[] = [];

  param(value: unknown): string {
    this.values.push(typeof value === 'bigint' ? value.toString() : value);
    return `$${this.values.length}`;
  }

  build(text: string): SqlStatement {
    return { text, values: [...this.values] };
  }
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/** String literal for DDL, where placeholders are not allowed. */
export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}
