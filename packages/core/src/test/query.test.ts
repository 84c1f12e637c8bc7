/**
 * Query Model Tests
 *
 * Verifies:
 * - Operator complements and negate() failure without mutation
 * - Effective operator for list values
 * - AND/OR composition and nested groups
 * - Alias assignment, field resolution and lookup errors
 * - Projection, aggregates, range, withoutSelect() and clone()
 */

import { describe, it, expect } from 'vitest';
import { Aggregate } from '../query/aggregate';
import { TableIdentifier } from '../query/identifiers';
import { Query } from '../query/query';
import { Restriction } from '../query/restriction';
import { RestrictionGroup } from '../query/restriction-group';
import { InvalidOperatorError, NotFoundError } from '../types/errors';

const users = new TableIdentifier('users', ['_id', 'name', 'age']);
const posts = new TableIdentifier('posts', ['_id', 'author_id', 'title']);

// ── Restriction ─────────────────────────────────────────────────

describe('Restriction', () => {
  const name = users.withAlias('t0').getOutput('name');

  it.each([
    ['=', '<>'],
    ['>', '<'],
    ['IS', 'IS NOT'],
    ['LIKE', 'NOT LIKE'],
  ])('negates %s to %s and back', (operator, complement) => {
    const restriction = new Restriction(name, operator, 'x');

    expect(restriction.negate()).toBe(complement);
    expect(restriction.getOperator()).toBe(complement);
    expect(restriction.negate()).toBe(operator);
  });

  it('fails to negate an operator without complement and keeps it', () => {
    const restriction = new Restriction(name, 'SOUNDS LIKE', 'x');

    expect(() => restriction.negate()).toThrow(InvalidOperatorError);
    expect(restriction.getOperator()).toBe('SOUNDS LIKE');
  });

  it('trims the operator', () => {
    expect(new Restriction(name, '  >= ', 1).getOperator()).toBe('>=');
  });

  it('reports IN for a list value whatever the stored operator', () => {
    const restriction = new Restriction(name, '=', ['a', 'b']);

    expect(restriction.getOperator()).toBe('IN');
    expect(restriction.getRawOperator()).toBe('=');
  });

  it('keeps NOT IN for a list value', () => {
    expect(new Restriction(name, 'NOT IN', ['a']).getOperator()).toBe('NOT IN');
  });

  it('keeps the stored operator for a scalar value', () => {
    expect(new Restriction(name, 'LIKE', 'a%').getOperator()).toBe('LIKE');
  });

  it('clone() is independent of the original', () => {
    const restriction = new Restriction(name, '=', 'x');
    const copy = restriction.clone();
    copy.negate();

    expect(restriction.getOperator()).toBe('=');
    expect(copy.getOperator()).toBe('<>');
  });
});

// ── RestrictionGroup ────────────────────────────────────────────

describe('RestrictionGroup', () => {
  const scope = users.withAlias('t0');

  it('starts empty', () => {
    const group = new RestrictionGroup(scope);
    expect(group.isEmpty()).toBe(true);
    expect(group.getType()).toBe('AND');
  });

  it('where() with two arguments compares with =', () => {
    const group = new RestrictionGroup(scope).where('name', 'alice');
    const [first] = group.restrictions();

    expect(first).toBeInstanceOf(Restriction);
    expect(first instanceof Restriction && first.getOperator()).toBe('=');
  });

  it('where() fails for an unknown field', () => {
    expect(() => new RestrictionGroup(scope).where('email', 'x')).toThrow(NotFoundError);
  });

  it('and() on an AND group appends directly', () => {
    const a = new Restriction(scope.getOutput('name'), '=', 'a');
    const b = new Restriction(scope.getOutput('age'), '>', 1);
    const group = new RestrictionGroup(scope, 'AND').and(a, b);

    expect(group.restrictions()).toEqual([a, b]);
  });

  it('or() on an AND group nests an OR group', () => {
    const a = new Restriction(scope.getOutput('name'), '=', 'a');
    const b = new Restriction(scope.getOutput('name'), '=', 'b');
    const group = new RestrictionGroup(scope, 'AND').or(a, b);

    expect(group.size()).toBe(1);
    const nested = group.restrictions()[0];
    expect(nested).toBeInstanceOf(RestrictionGroup);
    expect(nested instanceof RestrictionGroup && nested.getType()).toBe('OR');
    expect(nested instanceof RestrictionGroup && nested.restrictions()).toEqual([a, b]);
  });

  it('group() configures and returns a nested group', () => {
    const root = new RestrictionGroup(scope);
    const nested = root.group('OR', g => g.where('name', 'a').where('name', 'b'));

    expect(root.restrictions()).toEqual([nested]);
    expect(nested.size()).toBe(2);
  });

  it('clone() copies nested restrictions deeply', () => {
    const root = new RestrictionGroup(scope);
    root.group('OR', g => g.where('name', 'a'));
    const copy = root.clone();

    const nested = copy.restrictions()[0];
    const leaf = nested instanceof RestrictionGroup ? nested.restrictions()[0] : undefined;
    if (leaf instanceof Restriction) leaf.negate();

    const original = root.restrictions()[0];
    const originalLeaf = original instanceof RestrictionGroup ? original.restrictions()[0] : undefined;
    expect(originalLeaf instanceof Restriction && originalLeaf.getOperator()).toBe('=');
  });
});

// ── Query ───────────────────────────────────────────────────────

describe('Query', () => {
  it('starts with no projections, joins, order or range', () => {
    const query = new Query(users);

    expect(query.getOutputs()).toEqual([]);
    expect(query.getJoined()).toEqual([]);
    expect(query.getOrder()).toEqual([]);
    expect(query.getGroupBy()).toEqual([]);
    expect(query.getOffset()).toBeNull();
    expect(query.getLimit()).toBeNull();
    expect(query.restrictions().isEmpty()).toBe(true);
  });

  it('aliases the source t0 and joins t1, t2', () => {
    const query = new Query(users);
    const join = query.joinTable(posts);
    const second = query.joinTable(posts);

    expect(query.getTable().reference()).toBe('t0');
    expect(join.source.output.reference()).toBe('t1');
    expect(second.source.output.reference()).toBe('t2');
  });

  it('uses aliasPrefix for generated aliases', () => {
    expect(new Query(users, { aliasPrefix: 's' }).getTable().reference()).toBe('s0');
  });

  it('runs the join configurator with the join and the query before returning', () => {
    const query = new Query(users);
    let seen: Query | null = null;

    const join = query.joinTable(posts, (j, q) => {
      seen = q;
      j.getRestrictions().where(j.getOutput('author_id'), '=', q.getTable().getOutput('_id'));
    }, 'INNER');

    expect(seen).toBe(query);
    expect(join.type).toBe('INNER');
    expect(join.getRestrictions().size()).toBe(1);
  });

  it('select() resolves against the source and fails for unknown names', () => {
    const query = new Query(users);
    const expression = query.select('name', 'n');

    expect(expression.getName()).toBe('n');
    expect(query.getOutput('n')).toBe(expression);
    expect(() => query.select('email')).toThrow(NotFoundError);
  });

  it('resolves alias-qualified names against joins', () => {
    const query = new Query(users);
    query.joinTable(posts);
    const expression = query.selectField(posts.withAlias('t1').getOutput('title'));

    expect(expression.input.toString()).toBe('t1.title');
    expect(() => query.orderBy('t9.title')).toThrow(NotFoundError);
  });

  it('aggregate() keeps the alias it is given', () => {
    const query = new Query(users).aggregate('age', 'max', 'oldest');
    const [output] = query.getOutputs();

    expect(output?.getName()).toBe('oldest');
    expect(output?.aggregate).toBe('max');
  });

  it('Aggregate derives its alias from operation, table and field', () => {
    const field = users.withAlias('t0').getOutput('age');
    expect(new Aggregate(field, 'sum').alias).toBe('sum_t0_age');
  });

  it('range() sets offset and limit independently', () => {
    const query = new Query(users).range(10, 5);
    expect(query.getOffset()).toBe(10);
    expect(query.getLimit()).toBe(5);

    query.range(null, null);
    expect(query.getOffset()).toBeNull();
    expect(query.getLimit()).toBeNull();
  });

  it('where() forwards to the root group', () => {
    const query = new Query(users).where('age', '>', 18).where('name', 'bob');
    expect(query.restrictions().size()).toBe(2);
  });

  it('withoutSelect() drops projections and order and keeps the rest', () => {
    const query = new Query(users);
    query.joinTable(posts);
    query.select('name');
    query.where('age', '>', 18).groupBy(['name']).orderBy('name', 'DESC').range(0, 10);

    const copy = query.withoutSelect();

    expect(copy.getOutputs()).toEqual([]);
    expect(copy.getOrder()).toEqual([]);
    expect(copy.getJoined()).toHaveLength(1);
    expect(copy.getGroupBy().map(f => f.name)).toEqual(['name']);
    expect(copy.restrictions().size()).toBe(1);
    expect(copy.getLimit()).toBe(10);
    expect(query.getOutputs()).toHaveLength(1);
    expect(query.getOrder()).toHaveLength(1);
  });

  it('clone() can be restricted without touching the original', () => {
    const query = new Query(users).where('age', '>', 18);
    const copy = query.clone().where('name', 'bob');

    expect(query.restrictions().size()).toBe(1);
    expect(copy.restrictions().size()).toBe(2);
    expect(copy.getTable().reference()).toBe('t0');
  });

  it('a query used as source exposes its outputs', () => {
    const inner = new Query(users);
    inner.select('name');
    inner.aggregate('age', 'avg', 'mean');

    const outer = new Query(inner);

    expect(outer.getFrom().isQuery()).toBe(true);
    expect(outer.getTable().outputNames()).toEqual(['name', 'mean']);
    expect(() => outer.select('age')).toThrow(NotFoundError);
  });

  it('require() nests an OR root under a new AND root', () => {
    const query = new Query(users);
    query.restrictions().setType('OR');
    query.where('name', 'a').where('name', 'b');
    const previous = query.restrictions();

    query.require('age', 'IS', null);

    const root = query.restrictions();
    expect(root.getType()).toBe('AND');
    expect(root.size()).toBe(2);
    expect(root.restrictions()[0]).toBe(previous);
    expect(previous.size()).toBe(2);
  });

  it('require() appends to an AND root', () => {
    const query = new Query(users).where('name', 'a');
    const root = query.restrictions();

    query.require('age', 'IS', null);

    expect(query.restrictions()).toBe(root);
    expect(root.size()).toBe(2);
  });
});
