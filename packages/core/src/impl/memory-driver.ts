/**
 * In-memory Driver: for testing and embedded use.
 *
 * Tables live in plain arrays and queries are evaluated straight from the
 * Query model: joins, nested AND/OR groups, correlated sub-queries, grouping,
 * aggregates, ordering and ranges. Every command is kept in `log` so tests
 * can assert what reached the backend.
 */

import { ResultSet, type Driver } from '../interfaces/driver';
import type { Alias } from '../query/alias';
import type { AggregateOperation } from '../query/aggregate';
import { FieldIdentifier } from '../query/identifiers';
import type { Query } from '../query/query';
import type { Restriction } from '../query/restriction';
import { RestrictionGroup } from '../query/restriction-group';
import type { Layout } from '../schema/layout';
import { DriverError } from '../types/errors';
import type { DDLOperation, Row, Scalar } from '../types/table';
import {
  MemoryQueryGrammar,
  MemoryRecordGrammar,
  MemorySchemaGrammar,
  type MemoryCommand,
} from './memory-grammar';

interface MemoryIndex {
  fields: string[];
  unique: boolean;
}

interface MemoryTable {
  columns: string[];
  /** Columns that reject null */
  required: Set<string>;
  autoIncrement: string | null;
  indexes: Map<string, MemoryIndex>;
  rows: Row[];
  sequence: number;
  lastId: Scalar | null;
}

/** Rows visible while evaluating a query: relation alias → row */
type Binding = ReadonlyMap<string, Row>;

export interface MemoryDriverOptions {
  /** Keep a migration ledger (default: true) */
  supportsTags?: boolean;
}

export class MemoryDriver implements Driver<MemoryCommand> {
  readonly name = 'memory';
  readonly supportsTags: boolean;

  /** Every command received, in order */
  readonly log: MemoryCommand[] = [];

  private readonly tables = new Map<string, MemoryTable>();
  private readonly grammars = {
    query: new MemoryQueryGrammar(),
    record: new MemoryRecordGrammar(),
    schema: new MemorySchemaGrammar(),
  };

  constructor(options: MemoryDriverOptions = {}) {
    this.supportsTags = options.supportsTags ?? true;
  }

  queryGrammar(): MemoryQueryGrammar {
    return this.grammars.query;
  }

  recordGrammar(): MemoryRecordGrammar {
    return this.grammars.record;
  }

  schemaGrammar(): MemorySchemaGrammar {
    return this.grammars.schema;
  }

  async write(command: MemoryCommand): Promise<number> {
    this.log.push(command);

    switch (command.kind) {
      case 'insert': return this.insert(command.table, command.values);
      case 'update': return this.update(command.table, command.key, command.values);
      case 'delete': return this.delete(command.table, command.key, command.single);
      case 'ddl': return this.ddl(command.operation);
      default: throw new DriverError(`Cannot write a "${command.kind}" command`);
    }
  }

  async read(command: MemoryCommand): Promise<ResultSet> {
    this.log.push(command);

    switch (command.kind) {
      case 'select': return new ResultSet(this.select(command.query, new Map()));
      case 'has-table': return new ResultSet(this.tables.has(command.table) ? [{ table_name: command.table }] : []);
      default: throw new DriverError(`Cannot read a "${command.kind}" command`);
    }
  }

  async lastInsertId(layout: Layout): Promise<Scalar | null> {
    return this.require(layout.tableName).lastId;
  }

  // ── Inspection (for tests) ────────────────────────────────────

  hasTable(name: string): boolean {
    return this.tables.has(name);
  }

  /** Copies of the stored rows of `table` */
  rows(table: string): Row[] {
    return this.require(table).rows.map(row => ({ ...row }));
  }

  columns(table: string): string[] {
    return [...this.require(table).columns];
  }

  indexes(table: string): string[] {
    return [...this.require(table).indexes.keys()];
  }

  /** Drop every table and the command log */
  clear(): void {
    this.tables.clear();
    this.log.length = 0;
  }

  // --- Writes ---

  private insert(name: string, values: Row): number {
    const table = this.require(name);
    this.checkColumns(name, table, values);

    const row: Row = {};
    for (const column of table.columns) {
      row[column] = values[column] ?? null;
    }

    const increment = table.autoIncrement;
    if (increment !== null) {
      const value = row[increment];
      if (value === null) {
        row[increment] = ++table.sequence;
      } else if (typeof value === 'number' && value > table.sequence) {
        table.sequence = value;
      }
      const id = row[increment];
      table.lastId = isScalar(id) ? id : null;
    }

    this.checkRow(name, table, row, null);
    table.rows.push(row);
    return 1;
  }

  private update(name: string, key: Row, values: Row): number {
    const table = this.require(name);
    this.checkColumns(name, table, values);

    let affected = 0;
    for (const row of table.rows) {
      if (!matchesKey(row, key)) continue;
      const next = { ...row, ...values };
      this.checkRow(name, table, next, row);
      Object.assign(row, values);
      affected++;
    }
    return affected;
  }

  private delete(name: string, key: Row, single: boolean): number {
    const table = this.require(name);
    if (single) {
      const at = table.rows.findIndex(row => matchesKey(row, key));
      if (at === -1) return 0;
      table.rows.splice(at, 1);
      return 1;
    }
    const before = table.rows.length;
    table.rows = table.rows.filter(row => !matchesKey(row, key));
    return before - table.rows.length;
  }

  private ddl(op: DDLOperation): number {
    switch (op.type) {
      case 'create-table': {
        if (this.tables.has(op.table)) {
          throw new DriverError(`Table "${op.table}" already exists`);
        }
        const fields = op.layout.getFields();
        const indexes = new Map<string, MemoryIndex>();
        for (const index of op.layout.getIndexes()) {
          indexes.set(index.name, { fields: index.fieldNames(), unique: index.isUnique() });
        }
        this.tables.set(op.table, {
          columns: fields.map(f => f.name),
          required: new Set(fields.filter(f => !f.nullable && !f.autoIncrement).map(f => f.name)),
          autoIncrement: op.layout.getAutoIncrement()?.name ?? null,
          indexes,
          rows: [],
          sequence: 0,
          lastId: null,
        });
        return 0;
      }

      case 'drop-table':
        this.require(op.table);
        this.tables.delete(op.table);
        return 0;

      case 'add-column': {
        const table = this.require(op.table);
        const { field } = op;
        if (table.columns.includes(field.name)) {
          throw new DriverError(`Column "${field.name}" of "${op.table}" already exists`);
        }
        table.columns.push(field.name);
        if (!field.nullable && !field.autoIncrement) table.required.add(field.name);
        if (field.autoIncrement) table.autoIncrement = field.name;
        for (const row of table.rows) {
          row[field.name] = field.autoIncrement ? ++table.sequence : null;
        }
        return 0;
      }

      case 'drop-column': {
        const table = this.require(op.table);
        if (!table.columns.includes(op.field)) {
          throw new DriverError(`Column "${op.field}" of "${op.table}" does not exist`);
        }
        table.columns = table.columns.filter(c => c !== op.field);
        table.required.delete(op.field);
        if (table.autoIncrement === op.field) table.autoIncrement = null;
        for (const [name, index] of table.indexes) {
          if (index.fields.includes(op.field)) table.indexes.delete(name);
        }
        for (const row of table.rows) {
          delete row[op.field];
        }
        return 0;
      }

      case 'add-index': {
        const table = this.require(op.table);
        if (table.indexes.has(op.index.name)) {
          throw new DriverError(`Index "${op.index.name}" of "${op.table}" already exists`);
        }
        table.indexes.set(op.index.name, { fields: op.index.fieldNames(), unique: op.index.isUnique() });
        return 0;
      }

      case 'drop-index': {
        const table = this.require(op.table);
        if (!table.indexes.delete(op.index.name)) {
          throw new DriverError(`Index "${op.index.name}" of "${op.table}" does not exist`);
        }
        return 0;
      }
    }
  }

  private require(name: string): MemoryTable {
    const table = this.tables.get(name);
    if (!table) {
      throw new DriverError(`Table "${name}" does not exist`);
    }
    return table;
  }

  private checkColumns(name: string, table: MemoryTable, values: Row): void {
    for (const column of Object.keys(values)) {
      if (!table.columns.includes(column)) {
        throw new DriverError(`Column "${column}" of "${name}" does not exist`);
      }
    }
  }

  /** Enforce NOT NULL and unique indexes. `current` is the row being replaced. */
  private checkRow(name: string, table: MemoryTable, row: Row, current: Row | null): void {
    for (const column of table.required) {
      if (row[column] === null || row[column] === undefined) {
        throw new DriverError(`Column "${column}" of "${name}" cannot be null`);
      }
    }

    for (const [indexName, index] of table.indexes) {
      if (!index.unique) continue;
      const values = index.fields.map(f => row[f]);
      if (values.some(v => v === null || v === undefined)) continue;

      const clash = table.rows.some(other =>
        other !== current && index.fields.every((f, i) => same(other[f], values[i]))
      );
      if (clash) {
        throw new DriverError(`Duplicate key in "${name}" violates unique index "${indexName}"`);
      }
    }
  }

  // --- Query evaluation ---

  private select(query: Query, outer: Binding): Row[] {
    const from = query.getFrom();
    const fromAlias = from.output.reference();

    let bindings: Binding[] = this.source(from, outer).map(row => bind(outer, fromAlias, row));

    for (const join of query.getJoined()) {
      const alias = join.source.output.reference();
      const candidates = this.source(join.source, outer);
      const on = join.getRestrictions();
      const next: Binding[] = [];

      if (join.type === 'RIGHT') {
        for (const row of candidates) {
          const matched = bindings.map(b => bind(b, alias, row)).filter(b => this.test(on, b));
          next.push(...(matched.length > 0 ? matched : [bind(outer, alias, row)]));
        }
      } else {
        for (const binding of bindings) {
          const matched = candidates.map(row => bind(binding, alias, row)).filter(b => this.test(on, b));
          if (matched.length > 0) {
            next.push(...matched);
          } else if (join.type === 'LEFT') {
            next.push(bind(binding, alias, {}));
          }
        }
      }
      bindings = next;
    }

    bindings = bindings.filter(b => this.test(query.restrictions(), b));

    const order = query.getOrder();
    if (order.length > 0) {
      bindings.sort((a, b) => {
        for (const clause of order) {
          const cmp = compareValues(lookup(a, clause.field), lookup(b, clause.field));
          if (cmp !== 0) return clause.direction === 'ASC' ? cmp : -cmp;
        }
        return 0;
      });
    }

    const rows = this.project(query, bindings);

    const offset = query.getOffset() ?? 0;
    const limit = query.getLimit();
    return limit === null ? rows.slice(offset) : rows.slice(offset, offset + limit);
  }

  private source(alias: Alias, outer: Binding): Row[] {
    const input = alias.input;
    if (input.kind === 'table') {
      return this.require(input.name).rows;
    }
    return this.select(input, outer);
  }

  private project(query: Query, bindings: Binding[]): Row[] {
    const outputs = query.getOutputs();
    const grouping = query.getGroupBy();

    if (grouping.length === 0 && outputs.every(o => o.aggregate === null)) {
      const fields = outputs.length > 0
        ? outputs.map(o => [o.getName(), o.input] as const)
        : query.getTable().getOutputs().map(f => [f.name, f] as const);

      return bindings.map(binding => {
        const row: Row = {};
        for (const [name, field] of fields) row[name] = lookup(binding, field);
        return row;
      });
    }

    const groups = new Map<string, Binding[]>();
    if (grouping.length === 0) groups.set('', bindings);
    for (const binding of grouping.length > 0 ? bindings : []) {
      const key = grouping.map(f => groupKey(lookup(binding, f))).join('\u0000');
      const group = groups.get(key);
      if (group) {
        group.push(binding);
      } else {
        groups.set(key, [binding]);
      }
    }

    return [...groups.values()].map(group => {
      const row: Row = {};
      for (const output of outputs) {
        row[output.getName()] = output.aggregate === null
          ? lookup(group[0] ?? new Map(), output.input)
          : aggregate(output.aggregate, group.map(b => lookup(b, output.input)));
      }
      return row;
    });
  }

  private test(group: RestrictionGroup, binding: Binding): boolean {
    const check = (child: RestrictionGroup | Restriction): boolean =>
      child instanceof RestrictionGroup ? this.test(child, binding) : this.matches(child, binding);

    const children = group.restrictions();
    return group.getType() === 'AND' ? children.every(check) : children.some(check);
  }

  private matches(restriction: Restriction, binding: Binding): boolean {
    const subject = restriction.getField();
    const operator = restriction.getOperator().toUpperCase();
    const raw = restriction.getValue();

    let left: unknown;
    if (subject.kind === 'query') {
      const rows = this.select(subject, binding);
      if (raw === null && (operator === '=' || operator === 'IS')) return rows.length === 0;
      if (raw === null && (operator === '<>' || operator === '!=' || operator === 'IS NOT')) return rows.length > 0;
      const first = rows[0];
      left = first ? Object.values(first)[0] ?? null : null;
    } else {
      left = lookup(binding, subject);
    }

    const right: unknown = raw instanceof FieldIdentifier ? lookup(binding, raw) : raw;
    return compare(left, operator, right);
  }
}

// --- Helpers ---

function bind(base: Binding, alias: string, row: Row): Binding {
  return new Map(base).set(alias, row);
}

function lookup(binding: Binding, field: FieldIdentifier): unknown {
  const value = binding.get(field.table.reference())?.[field.name];
  return value === undefined ? null : value;
}

function isScalar(value: unknown): value is Scalar {
  return ['string', 'number', 'boolean', 'bigint'].includes(typeof value);
}

function isList(value: unknown): value is readonly unknown[] {
  return Array.isArray(value);
}

function same(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  return isScalar(a) && isScalar(b) && String(a) === String(b);
}

/** Nulls sort first; numbers numerically, everything else as strings. */
function compareValues(a: unknown, b: unknown): number {
  if (a === null && b === null) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  if ((typeof a === 'number' || typeof a === 'bigint') && (typeof b === 'number' || typeof b === 'bigint')) {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

function compare(left: unknown, operator: string, right: unknown): boolean {
  switch (operator) {
    case '=':
    case 'IS':
      return right === null ? left === null : left !== null && same(left, right);
    case '<>':
    case '!=':
    case 'IS NOT':
      return right === null ? left !== null : left !== null && !same(left, right);
    case '<':
      return left !== null && right !== null && compareValues(left, right) < 0;
    case '>':
      return left !== null && right !== null && compareValues(left, right) > 0;
    case '<=':
      return left !== null && right !== null && compareValues(left, right) <= 0;
    case '>=':
      return left !== null && right !== null && compareValues(left, right) >= 0;
    case 'IN':
      return isList(right) && left !== null && right.some(v => same(left, v));
    case 'NOT IN':
      return isList(right) && left !== null && !right.some(v => same(left, v));
    case 'LIKE':
      return typeof left === 'string' && typeof right === 'string' && likePattern(right).test(left);
    case 'NOT LIKE':
      return typeof left === 'string' && typeof right === 'string' && !likePattern(right).test(left);
    default:
      throw new DriverError(`Operator "${operator}" is not supported by the memory driver`);
  }
}

/** `%` matches any run of characters, `_` exactly one. */
function likePattern(pattern: string): RegExp {
  let source = '';
  for (const char of pattern) {
    if (char === '%') source += '.*';
    else if (char === '_') source += '.';
    else source += char.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  }
  return new RegExp(`^${source}$`, 's');
}

function matchesKey(row: Row, key: Row): boolean {
  return Object.entries(key).every(([column, value]) =>
    value === null || value === undefined ? row[column] === null : same(row[column], value)
  );
}

function groupKey(value: unknown): string {
  return `${typeof value}:${String(value)}`;
}

function aggregate(operation: AggregateOperation, values: unknown[]): unknown {
  const present = values.filter(v => v !== null);
  switch (operation) {
    case 'count':
      return present.length;
    case 'sum':
      return present.reduce<number>((total, v) => total + Number(v), 0);
    case 'avg':
      return present.length === 0
        ? null
        : present.reduce<number>((total, v) => total + Number(v), 0) / present.length;
    case 'min':
      return present.length === 0 ? null : present.reduce((a, b) => (compareValues(a, b) <= 0 ? a : b));
    case 'max':
      return present.length === 0 ? null : present.reduce((a, b) => (compareValues(a, b) >= 0 ? a : b));
  }
}
