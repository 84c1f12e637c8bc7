import { InvalidOperatorError } from '../types/errors';
import type { Scalar } from '../types/table';
import type { FieldIdentifier } from './identifiers';
import type { Query } from './query';

/** What a restriction compares: a field, or a sub-query's result */
export type RestrictionSubject = FieldIdentifier | Query;

/** What a restriction compares against */
export type RestrictionValue = Scalar | readonly Scalar[] | FieldIdentifier | null;

export const Operators = {
  EQUAL: '=',
  NOT_EQUAL: '<>',
  GREATER: '>',
  LESS: '<',
  GREATER_OR_EQUAL: '>=',
  LESS_OR_EQUAL: '<=',
  IS: 'IS',
  IS_NOT: 'IS NOT',
  LIKE: 'LIKE',
  NOT_LIKE: 'NOT LIKE',
  IN: 'IN',
  NOT_IN: 'NOT IN',
} as const;

const COMPLEMENTS: Readonly<Record<string, string>> = {
  '=': '<>',
  '<>': '=',
  '>': '<',
  '<': '>',
  'IS': 'IS NOT',
  'IS NOT': 'IS',
  'LIKE': 'NOT LIKE',
  'NOT LIKE': 'LIKE',
};

/**
 * A single condition a row must satisfy to be returned by a query.
 *
 * The operator is not checked against a fixed set; grammars decide what they
 * can render. Use `getOperator()` for the effective operator: a sequence value
 * is a set-membership test whatever the stored operator says.
 */
export class Restriction {
  private operator: string;

  constructor(
    private readonly subject: RestrictionSubject,
    operator: string,
    private readonly value: RestrictionValue
  ) {
    this.operator = operator.trim();
  }

  getField(): RestrictionSubject {
    return this.subject;
  }

  getValue(): RestrictionValue {
    return this.value;
  }

  getOperator(): string {
    if (isScalarList(this.value) && this.operator !== 'IN' && this.operator !== 'NOT IN') {
      return 'IN';
    }
    return this.operator;
  }

  getRawOperator(): string {
    return this.operator;
  }

  /**
   * Replace the operator with its complement and return it. Throws
   * InvalidOperatorError, leaving the restriction as it was, if the operator
   * has none.
   */
  negate(): string {
    const complement = COMPLEMENTS[this.operator];
    if (complement === undefined) {
      throw new InvalidOperatorError(this.operator);
    }
    this.operator = complement;
    return complement;
  }

  clone(): Restriction {
    return new Restriction(this.subject, this.operator, this.value);
  }
}

export function isScalarList(value: RestrictionValue): value is readonly Scalar[] {
  return Array.isArray(value);
}
