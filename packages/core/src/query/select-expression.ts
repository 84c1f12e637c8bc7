import type { FieldIdentifier } from './identifiers';
import type { AggregateOperation } from './aggregate';

/**
 * One projection of a query: a field, optionally renamed and optionally
 * passed through an aggregate function.
 */
export class SelectExpression {
  constructor(
    public readonly input: FieldIdentifier,
    public readonly alias: string | null = null,
    public readonly aggregate: AggregateOperation | null = null
  ) {}

  /** Name of the output column in the result set */
  getName(): string {
    return this.alias ?? this.input.name;
  }
}
