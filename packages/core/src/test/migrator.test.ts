/**
 * Migrator Tests
 *
 * Verifies:
 * - Manifest validation (empty and duplicate identifiers)
 * - run(): applies pending migrations in order, skips applied ones
 * - rollback(steps): reverse manifest order, only applied migrations
 * - status()
 * - Fast-forward of a fresh snapshot from the ledger
 * - Snapshot cache load and save around a run
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Connection } from '../connection/connection';
import { FileSchemaCache } from '../impl/file-schema-cache';
import { Migrator } from '../migration/migrator';
import { Schema } from '../schema/schema';
import { ManifestError } from '../types/errors';
import { createPosts, createUsers, defineMigration, harness, type Harness } from './fixtures';

describe('Migrator manifest', () => {
  it('rejects duplicate identifiers', () => {
    const { db } = harness();

    expect(() => new Migrator(db, [createUsers, createPosts, createUsers])).toThrow(ManifestError);
    expect(() => new Migrator(db, [createUsers, createPosts, createUsers])).toThrow(
      '[2]: Duplicate identifier "users.create" (first at [0])'
    );
  });

  it('rejects empty identifiers', () => {
    const { db } = harness();
    const blank = defineMigration('  ', () => undefined, () => undefined);

    expect(() => new Migrator(db, [blank])).toThrow('[0]: Identifier is empty');
  });
});

describe('Migrator run / rollback', () => {
  let h: Harness;
  let lines: string[];
  let migrator: Migrator;

  beforeEach(() => {
    h = harness();
    lines = [];
    migrator = new Migrator(h.db, [createUsers, createPosts], { log: m => lines.push(m) });
  });

  it('applies pending migrations in manifest order', async () => {
    expect(await migrator.run()).toEqual(['users.create', 'posts.create']);
    expect(lines).toEqual(['Applying users.create', 'Applying posts.create']);
    expect(h.driver.hasTable('posts')).toBe(true);
  });

  it('skips migrations the ledger holds', async () => {
    await migrator.run();
    lines.length = 0;

    expect(await migrator.run()).toEqual([]);
    expect(lines).toEqual(['Skipping users.create', 'Skipping posts.create']);
  });

  it('reports status per manifest entry', async () => {
    await h.db.apply(createUsers);

    expect(await migrator.status()).toEqual([
      { identifier: 'users.create', applied: true },
      { identifier: 'posts.create', applied: false },
    ]);
  });

  it('rolls back the latest migration by default', async () => {
    await migrator.run();
    lines.length = 0;

    expect(await migrator.rollback()).toEqual(['posts.create']);
    expect(lines).toEqual(['Rolling back posts.create']);
    expect(h.driver.hasTable('posts')).toBe(false);
    expect(h.driver.hasTable('users')).toBe(true);
  });

  it('rolls back no more than what is applied', async () => {
    await migrator.run();

    expect(await migrator.rollback(5)).toEqual(['posts.create', 'users.create']);
    expect(await h.db.contains(createUsers)).toBe(false);
  });

  it('fast-forwards a fresh snapshot through migrations the ledger holds', async () => {
    await h.db.apply(createUsers);

    const fresh = new Connection(new Schema('app'), h.driver);
    const log: string[] = [];
    const applied = await new Migrator(fresh, [createUsers, createPosts], { log: m => log.push(m) }).run();

    expect(applied).toEqual(['posts.create']);
    expect(log).toEqual(['Fast-forwarding users.create', 'Skipping users.create', 'Applying posts.create']);
    expect(fresh.getSchema().hasApplied('users.create')).toBe(true);
    expect(fresh.getSchema().getLayoutByName('posts').hasIndex('fk_posts_author')).toBe(true);
  });
});

describe('Migrator with a snapshot cache', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tabula-migrator-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('saves the snapshot after a run and loads it before the next', async () => {
    const cache = new FileSchemaCache(join(dir, 'var', 'schema.json'));
    const { db, driver } = harness();
    await new Migrator(db, [createUsers], { cache, log: () => undefined }).run();

    const saved = await cache.load();
    expect(saved?.getLayouts().map(l => l.tableName)).toEqual(['_tags', 'users']);
    expect(saved?.getApplied()).toEqual(['users.create']);

    const next = new Connection(new Schema('app'), driver);
    const log: string[] = [];
    await new Migrator(next, [createUsers], { cache, log: m => log.push(m) }).run();

    expect(log).toEqual(['Skipping users.create']);
    expect(next.getSchema().getLayoutByName('users').getField('name').nullable).toBe(false);
  });
});
