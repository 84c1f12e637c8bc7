/**
 * PgSchemaGrammar Tests
 *
 * Verifies:
 * - Column types, NOT NULL and CHECK constraints
 * - CREATE TABLE with primary key, followed by its other indexes
 * - Index naming: table-scoped plain/unique indexes, named foreign keys,
 *   the default primary key constraint
 * - Table prefix on every name
 * - The existence check against information_schema
 */

import { describe, it, expect } from 'vitest';
import { Field, FieldTypes, Layout, PRIMARY_KEY, TableMigrationExecutor } from '@tabula/core';
import { PgSchemaGrammar } from '../src/schema-grammar';

function usersTable(): TableMigrationExecutor {
  return new TableMigrationExecutor(new Layout('users'))
    .id()
    .string('name', 255, false)
    .int('age', true)
    .enum('role', ['admin', 'member'])
    .text('bio')
    .unique('name', ['name'])
    .index('age', ['age']);
}

function postsTable(): TableMigrationExecutor {
  return new TableMigrationExecutor(new Layout('posts')).id().foreign('author', usersTable());
}

const grammar = new PgSchemaGrammar();

// ── Tables ──────────────────────────────────────────────────────

describe('PgSchemaGrammar tables', () => {
  it('creates a table, then its secondary indexes', () => {
    const layout = usersTable().layout();

    expect(grammar.ddl({ type: 'create-table', table: 'users', layout }).map(s => s.text)).toEqual([
      'CREATE TABLE "users" ("_id" BIGSERIAL NOT NULL, "name" VARCHAR(255) NOT NULL, ' +
        '"age" INTEGER CHECK ("age" >= 0), "role" VARCHAR(6) CHECK ("role" IN (\'admin\', \'member\')), ' +
        '"bio" TEXT, PRIMARY KEY ("_id"))',
      'CREATE UNIQUE INDEX "users_name" ON "users" ("name")',
      'CREATE INDEX "users_age" ON "users" ("age")',
    ]);
  });

  it('adds foreign keys as named constraints after the table', () => {
    const layout = postsTable().layout();

    expect(grammar.ddl({ type: 'create-table', table: 'posts', layout }).map(s => s.text)).toEqual([
      'CREATE TABLE "posts" ("_id" BIGSERIAL NOT NULL, "author_id" BIGINT CHECK ("author_id" >= 0), PRIMARY KEY ("_id"))',
      'ALTER TABLE "posts" ADD CONSTRAINT "fk_posts_author" FOREIGN KEY ("author_id") REFERENCES "users" ("_id")',
    ]);
  });

  it('drops a table', () => {
    expect(grammar.ddl({ type: 'drop-table', table: 'users' })).toEqual([{ text: 'DROP TABLE "users"', values: [] }]);
  });

  it('prefixes every name', () => {
    const prefixed = new PgSchemaGrammar('app_');
    const layout = postsTable().layout();

    expect(prefixed.ddl({ type: 'create-table', table: 'posts', layout }).map(s => s.text)).toEqual([
      'CREATE TABLE "app_posts" ("_id" BIGSERIAL NOT NULL, "author_id" BIGINT CHECK ("author_id" >= 0), PRIMARY KEY ("_id"))',
      'ALTER TABLE "app_posts" ADD CONSTRAINT "fk_posts_author" FOREIGN KEY ("author_id") REFERENCES "app_users" ("_id")',
    ]);
  });

  it('checks information_schema for a table', () => {
    expect(new PgSchemaGrammar('app_').hasTable('shop', 'users')).toEqual({
      text: 'SELECT table_name FROM information_schema.tables WHERE table_catalog = $1 AND table_schema = current_schema() AND table_name = $2',
      values: ['shop', 'app_users'],
    });
  });
});

// ── Columns ─────────────────────────────────────────────────────

describe('PgSchemaGrammar columns', () => {
  it('adds a column', () => {
    const field = new Field('email', FieldTypes.string(120));

    expect(grammar.ddl({ type: 'add-column', table: 'users', field })).toEqual([
      { text: 'ALTER TABLE "users" ADD COLUMN "email" VARCHAR(120)', values: [] },
    ]);
  });

  it('drops a column', () => {
    expect(grammar.ddl({ type: 'drop-column', table: 'users', field: 'email' })[0]?.text)
      .toBe('ALTER TABLE "users" DROP COLUMN "email"');
  });

  it.each([
    [new Field('n', FieldTypes.int(), false, true), '"n" SERIAL NOT NULL'],
    [new Field('n', FieldTypes.int(true), false, true), '"n" SERIAL NOT NULL'],
    [new Field('n', FieldTypes.long()), '"n" BIGINT'],
    [new Field('n', FieldTypes.long(true), false), '"n" BIGINT NOT NULL CHECK ("n" >= 0)'],
    [new Field('n', FieldTypes.text(), false), '"n" TEXT NOT NULL'],
    [new Field('mood', FieldTypes.enum(["it's", 'ok']), false), '"mood" VARCHAR(4) NOT NULL CHECK ("mood" IN (\'it\'\'s\', \'ok\'))'],
  ])('renders %o as %s', (field, expected) => {
    expect(grammar.ddl({ type: 'add-column', table: 't', field })[0]?.text).toBe(`ALTER TABLE "t" ADD COLUMN ${expected}`);
  });
});

// ── Indexes ─────────────────────────────────────────────────────

describe('PgSchemaGrammar indexes', () => {
  const users = usersTable().layout();
  const posts = postsTable().layout();

  it('adds a primary key', () => {
    const index = users.getIndex(PRIMARY_KEY);

    expect(grammar.ddl({ type: 'add-index', table: 'users', index })[0]?.text)
      .toBe('ALTER TABLE "users" ADD PRIMARY KEY ("_id")');
  });

  it('drops the primary key through its default constraint name', () => {
    const index = users.getIndex(PRIMARY_KEY);

    expect(new PgSchemaGrammar('app_').ddl({ type: 'drop-index', table: 'users', index })[0]?.text)
      .toBe('ALTER TABLE "app_users" DROP CONSTRAINT "app_users_pkey"');
  });

  it('drops a plain index by its table-scoped name', () => {
    const index = users.getIndex('age');

    expect(grammar.ddl({ type: 'drop-index', table: 'users', index })[0]?.text).toBe('DROP INDEX "users_age"');
    expect(new PgSchemaGrammar('app_').ddl({ type: 'drop-index', table: 'users', index })[0]?.text)
      .toBe('DROP INDEX "app_users_age"');
  });

  it('drops a foreign key constraint', () => {
    const index = posts.getIndex('fk_posts_author');

    expect(grammar.ddl({ type: 'drop-index', table: 'posts', index })[0]?.text)
      .toBe('ALTER TABLE "posts" DROP CONSTRAINT "fk_posts_author"');
  });
});
