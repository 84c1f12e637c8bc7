import type { TableIdentifier } from './identifiers';
import type { Query } from './query';

/** A relation a query reads from: a table, or another query */
export type QuerySource = TableIdentifier | Query;

/**
 * Pairs a source with the aliased identifier the rest of the query uses to
 * refer to it.
 */
export class Alias {
  constructor(
    public readonly input: QuerySource,
    public readonly output: TableIdentifier
  ) {}

  isQuery(): boolean {
    return this.input.kind === 'query';
  }
}
