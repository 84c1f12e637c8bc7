import type { FieldIdentifier } from './identifiers';

export type AggregateOperation = 'count' | 'sum' | 'min' | 'max' | 'avg';

export const AGGREGATE_COUNT: AggregateOperation = 'count';

/**
 * An aggregate function over one field. The alias is derived from the
 * operation, the table alias and the field name, so two aggregates in one
 * query only collide when they compute the same thing.
 */
export class Aggregate {
  readonly alias: string;

  constructor(
    public readonly input: FieldIdentifier,
    public readonly operation: AggregateOperation
  ) {
    this.alias = `${operation}_${input.table.reference()}_${input.name}`;
  }
}
