/**
 * Query: a structured SELECT the DBMS grammar turns into a statement.
 *
 * A query reads from one source (a table or another query), may join further
 * tables, filters through a restriction tree, and projects, groups, orders and
 * paginates its result. Nothing here knows any SQL dialect.
 *
 * Aliases are assigned per query: the source is `t0`, joins follow as `t1`,
 * `t2`, ... Pass `aliasPrefix` to a sub-query that refers to fields of an
 * enclosing query so the two alias sets cannot clash.
 */

import { NotFoundError } from '../types/errors';
import { Alias, type QuerySource } from './alias';
import { Aggregate, type AggregateOperation } from './aggregate';
import { FieldIdentifier, TableIdentifier, type RestrictionTarget } from './identifiers';
import { Join, type JoinType } from './join';
import { OrderBy, type OrderDirection } from './order-by';
import type { RestrictionSubject, RestrictionValue } from './restriction';
import { RestrictionGroup } from './restriction-group';
import { SelectExpression } from './select-expression';

export interface QueryOptions {
  /** Prefix for generated table aliases (default: 't') */
  aliasPrefix?: string;
}

export type FieldReference = string | FieldIdentifier;

export class Query implements RestrictionTarget {
  readonly kind = 'query' as const;

  private readonly aliasPrefix: string;
  private aliasCount = 0;

  private from: Alias;
  private joins: Join[] = [];
  private filter: RestrictionGroup;
  private projections: SelectExpression[] = [];
  private grouping: FieldIdentifier[] = [];
  private order: OrderBy[] = [];
  private offset: number | null = null;
  private limit: number | null = null;

  constructor(source: QuerySource, options: QueryOptions = {}) {
    this.aliasPrefix = options.aliasPrefix ?? 't';
    this.from = new Alias(source, outputOf(source).withAlias(this.nextAlias()));
    this.filter = new RestrictionGroup(this.from.output, 'AND');
  }

  // ── Restrictions ──────────────────────────────────────────────

  /** The root restriction group (AND). */
  restrictions(): RestrictionGroup {
    return this.filter;
  }

  /** Shorthand for `restrictions().where(...)`. */
  where(field: string | RestrictionSubject, value: RestrictionValue): this;
  where(field: string | RestrictionSubject, operator: string, value: RestrictionValue): this;
  where(field: string | RestrictionSubject, ...args: [RestrictionValue] | [string, RestrictionValue]): this {
    if (args.length === 1) {
      this.filter.where(field, args[0]);
    } else {
      this.filter.where(field, args[0], args[1]);
    }
    return this;
  }

  /**
   * AND a restriction with everything the query already filters on. Unlike
   * `where()`, this still narrows the result when the root group is OR: the
   * old root becomes one child of a new AND root.
   */
  require(field: string | RestrictionSubject, operator: string, value: RestrictionValue): this {
    if (this.filter.getType() !== 'AND') {
      const root = new RestrictionGroup(this.from.output, 'AND');
      if (!this.filter.isEmpty()) root.push(this.filter);
      this.filter = root;
    }
    this.filter.where(field, operator, value);
    return this;
  }

  // ── Joins ─────────────────────────────────────────────────────

  /**
   * Join a table into the query. The optional callback receives the new join
   * and this query before the join is returned, so the caller can link the
   * two:
   *
   * ```typescript
   * query.joinTable(posts, (join, q) => {
   *   join.getRestrictions().where(join.getOutput('author'), '=', q.getTable().getOutput('_id'));
   * });
   * ```
   */
  joinTable(
    table: TableIdentifier,
    configure?: (join: Join, query: Query) => void,
    type: JoinType = 'LEFT'
  ): Join {
    const join = new Join(new Alias(table, table.withAlias(this.nextAlias())), type);
    this.joins.push(join);
    configure?.(join, this);
    return join;
  }

  getJoined(): readonly Join[] {
    return this.joins;
  }

  // ── Projection ────────────────────────────────────────────────

  /**
   * Select every output of `table` (default: the source).
   */
  selectAll(table: TableIdentifier = this.from.output): SelectExpression[] {
    const added = table.getOutputs().map(field => new SelectExpression(field));
    this.projections.push(...added);
    return added;
  }

  /** Select an output of the source by name. */
  select(name: string, alias: string | null = null): SelectExpression {
    const field = this.from.output.getOutput(name);
    const expression = new SelectExpression(field, alias);
    this.projections.push(expression);
    return expression;
  }

  selectField(field: FieldIdentifier, alias: string | null = null): SelectExpression {
    const expression = new SelectExpression(this.resolve(field), alias);
    this.projections.push(expression);
    return expression;
  }

  /**
   * Project `field` through an aggregate function under `alias`. The alias is
   * used as given; it is not derived from the aggregate.
   */
  aggregate(field: FieldReference, fn: Aggregate | AggregateOperation, alias: string): this {
    const operation = fn instanceof Aggregate ? fn.operation : fn;
    this.projections.push(new SelectExpression(this.resolve(field), alias, operation));
    return this;
  }

  getOutput(name: string): SelectExpression {
    const output = this.projections.find(e => e.getName() === name);
    if (!output) {
      throw new NotFoundError('output', name, this.toString());
    }
    return output;
  }

  getOutputs(): readonly SelectExpression[] {
    return this.projections;
  }

  // ── Grouping & Order ──────────────────────────────────────────

  groupBy(fields: FieldReference[] = []): this {
    this.grouping = fields.map(f => this.resolve(f));
    return this;
  }

  getGroupBy(): readonly FieldIdentifier[] {
    return this.grouping;
  }

  /** Append an order clause, subordinate to the ones already present. */
  putOrder(order: OrderBy): this {
    this.resolve(order.field);
    this.order.push(order);
    return this;
  }

  orderBy(field: FieldReference, direction: OrderDirection = 'ASC'): this {
    return this.putOrder(new OrderBy(this.resolve(field), direction));
  }

  getOrder(): readonly OrderBy[] {
    return this.order;
  }

  // ── Pagination ────────────────────────────────────────────────

  /**
   * Skip `skip` rows and return at most `count`. Either may be null for
   * "unbounded".
   */
  range(skip: number | null = null, count: number | null = null): this {
    this.offset = skip;
    this.limit = count;
    return this;
  }

  getOffset(): number | null {
    return this.offset;
  }

  getLimit(): number | null {
    return this.limit;
  }

  // ── Source ────────────────────────────────────────────────────

  getFrom(): Alias {
    return this.from;
  }

  /** The aliased identifier of the source */
  getTable(): TableIdentifier {
    return this.from.output;
  }

  /**
   * Copy without projections and ordering, for metadata queries such as
   * counting matches. Restrictions are deep-copied; joins, grouping and the
   * range are kept.
   */
  withoutSelect(): Query {
    const copy = this.clone();
    copy.projections = [];
    copy.order = [];
    return copy;
  }

  /**
   * Copy that can be restricted further without affecting this query. The
   * restriction tree is deep-copied; joins are shared.
   */
  clone(): Query {
    const copy = new Query(this.from.input, { aliasPrefix: this.aliasPrefix });
    copy.aliasCount = this.aliasCount;
    copy.from = this.from;
    copy.joins = [...this.joins];
    copy.filter = this.filter.clone();
    copy.projections = [...this.projections];
    copy.grouping = [...this.grouping];
    copy.order = [...this.order];
    copy.offset = this.offset;
    copy.limit = this.limit;
    return copy;
  }

  toString(): string {
    return `${this.from.isQuery() ? 'Query' : 'Table'}(${this.from.output.name}) {${this.filter.size()}}`;
  }

  // ── Internal ──────────────────────────────────────────────────

  /**
   * Resolve a reference against the source or a join. Plain names resolve
   * against the source, `alias.name` against the relation with that alias.
   */
  private resolve(field: FieldReference): FieldIdentifier {
    if (typeof field !== 'string') {
      const relation = this.relation(field.table.reference());
      return relation.getOutput(field.name);
    }

    const dot = field.indexOf('.');
    if (dot === -1) {
      return this.from.output.getOutput(field);
    }
    return this.relation(field.slice(0, dot)).getOutput(field.slice(dot + 1));
  }

  private relation(alias: string): TableIdentifier {
    if (this.from.output.reference() === alias) return this.from.output;
    const join = this.joins.find(j => j.source.output.reference() === alias);
    if (!join) {
      throw new NotFoundError('layout', alias, this.toString());
    }
    return join.source.output;
  }

  private nextAlias(): string {
    return `${this.aliasPrefix}${this.aliasCount++}`;
  }
}

/** The identifier a source exposes before it is aliased. */
function outputOf(source: QuerySource): TableIdentifier {
  if (source.kind === 'table') return source;
  return new TableIdentifier(source.getTable().name, source.getOutputs().map(e => e.getName()));
}
