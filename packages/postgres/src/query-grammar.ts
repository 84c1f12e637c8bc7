/**
 * One parameterized SELECT per Query.
 *
 * Values always travel as parameters. Identifiers are quoted, and operators
 * are checked against the set PostgreSQL understands before they reach the
 * text.
 */

import {
  DriverError,
  FieldIdentifier,
  RestrictionGroup,
  isScalarList,
  type Query,
  type QueryGrammar,
  type Restriction,
  type SelectExpression,
} from '@tabula/core';
import { SqlBuilder, quoteIdentifier, type SqlStatement } from './statement';

const OPERATORS = new Set([
  '=', '<>', '!=', '<', '>', '<=', '>=',
  'LIKE', 'NOT LIKE', 'ILIKE', 'NOT ILIKE',
  'IS', 'IS NOT', 'IN', 'NOT IN',
]);

const EQUALITY = new Set(['=', 'IS']);
const INEQUALITY = new Set(['<>', '!=', 'IS NOT']);

export class PgQueryGrammar implements QueryGrammar<SqlStatement> {
  constructor(private readonly prefix = '') {}

  query(query: Query): SqlStatement {
    const sql = new SqlBuilder();
    return sql.build(this.select(query, sql));
  }

  /** Physical name of a table, quoted. */
  table(name: string): string {
    return quoteIdentifier(this.prefix + name);
  }

  private select(query: Query, sql: SqlBuilder): string {
    const outputs = query.getOutputs();
    const from = query.getFrom();
    const source = from.input.kind === 'query'
      ? `(${this.select(from.input, sql)})`
      : this.table(from.input.name);

    let text = `SELECT ${outputs.length > 0 ? outputs.map(e => this.projection(e)).join(', ') : `${quoteIdentifier(query.getTable().reference())}.*`}`;
    text += ` FROM ${source} AS ${quoteIdentifier(from.output.reference())}`;

    for (const join of query.getJoined()) {
      const on = join.getRestrictions();
      text += ` ${join.type} JOIN ${this.table(join.source.output.name)} AS ${quoteIdentifier(join.source.output.reference())}`;
      text += ` ON ${on.isEmpty() ? 'TRUE' : this.group(on, sql)}`;
    }

    const filter = query.restrictions();
    if (!filter.isEmpty()) {
      text += ` WHERE ${this.group(filter, sql)}`;
    }

    const grouping = query.getGroupBy();
    if (grouping.length > 0) {
      text += ` GROUP BY ${grouping.map(f => this.field(f)).join(', ')}`;
    }

    const order = query.getOrder();
    if (order.length > 0) {
      text += ` ORDER BY ${order.map(o => `${this.field(o.field)} ${o.direction}`).join(', ')}`;
    }

    const limit = query.getLimit();
    if (limit !== null) text += ` LIMIT ${sql.param(limit)}`;
    const offset = query.getOffset();
    if (offset !== null) text += ` OFFSET ${sql.param(offset)}`;

    return text;
  }

  private projection(expression: SelectExpression): string {
    const field = this.field(expression.input);
    const value = expression.aggregate ? `${expression.aggregate.toUpperCase()}(${field})` : field;
    return expression.alias ? `${value} AS ${quoteIdentifier(expression.alias)}` : value;
  }

  private field(field: FieldIdentifier): string {
    return `${quoteIdentifier(field.table.reference())}.${quoteIdentifier(field.name)}`;
  }

  private group(group: RestrictionGroup, sql: SqlBuilder): string {
    const parts = group.restrictions().map(child =>
      child instanceof RestrictionGroup ? `(${this.group(child, sql)})` : this.restriction(child, sql)
    );
    return parts.length > 0 ? parts.join(` ${group.getType()} `) : 'TRUE';
  }

  private restriction(restriction: Restriction, sql: SqlBuilder): string {
    const operator = restriction.getOperator().toUpperCase();
    if (!OPERATORS.has(operator)) {
      throw new DriverError(`Operator "${operator}" is not supported by PostgreSQL`);
    }

    const subject = restriction.getField();
    const value = restriction.getValue();

    let left: string;
    if (subject.kind === 'query') {
      const inner = this.select(subject, sql);
      if (value === null && EQUALITY.has(operator)) return `NOT EXISTS (${inner})`;
      if (value === null && INEQUALITY.has(operator)) return `EXISTS (${inner})`;
      left = `(${inner})`;
    } else {
      left = this.field(subject);
    }

    if (value === null) {
      if (EQUALITY.has(operator)) return `${left} IS NULL`;
      if (INEQUALITY.has(operator)) return `${left} IS NOT NULL`;
      throw new DriverError(`Operator "${operator}" cannot compare with NULL`);
    }

    if (isScalarList(value)) {
      if (value.length === 0) return operator === 'IN' ? 'FALSE' : 'TRUE';
      return `${left} ${operator} (${value.map(v => sql.param(v)).join(', ')})`;
    }

    if (value instanceof FieldIdentifier) {
      return `${left} ${operator} ${this.field(value)}`;
    }

    const param = sql.param(value);
    return operator === 'IN' || operator === 'NOT IN'
      ? `${left} ${operator} (${param})`
      : `${left} ${operator} ${param}`;
  }
}
