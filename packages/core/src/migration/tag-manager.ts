/**
 * TagManager: the ledger of tags a database carries.
 *
 * Tags are rows of the reserved `_tags` table. The connection records
 * `migration:<identifier>` there for every applied migration. The table has
 * no key: `untag` deletes one row by value, and nothing stops a tag from
 * being recorded twice. A tag recorded twice takes two `untag` calls.
 */

import type { Connection } from '../connection/connection';
import type { Migration, SchemaMigrationExecutor } from '../interfaces/migration';
import { Query } from '../query/query';
import { DbRecord } from '../record/record';
import type { Layout } from '../schema/layout';
import { SchemaStateMigrationExecutor } from './schema-state-executor';

export const TAG_TABLE = '_tags';

/** Creates the ledger table if it is missing. */
export class TagLayoutMigration implements Migration {
  identifier(): string {
    return '_tags.create';
  }

  async up(executor: SchemaMigrationExecutor): Promise<void> {
    if (await executor.has(TAG_TABLE)) return;
    executor.add(TAG_TABLE, t => {
      t.string('tag', 255, false);
    });
  }

  down(executor: SchemaMigrationExecutor): void {
    executor.drop(TAG_TABLE);
  }
}

export class TagManager {
  private constructor(private readonly connection: Connection) {}

  /**
   * Make sure the ledger table exists on the backend and in the schema
   * snapshot, then return a manager for it.
   */
  static async open(connection: Connection): Promise<TagManager> {
    const migration = new TagLayoutMigration();

    const live = connection.migrator();
    await migration.up(live);
    await live.commit();

    await migration.up(new SchemaStateMigrationExecutor(connection.getSchema()));

    return new TagManager(connection);
  }

  async tag(value: string): Promise<void> {
    await this.connection.insert(new DbRecord(this.layout(), { tag: value }));
    this.connection.events?.onTagAdded?.({ connection: this.connection.getName(), tag: value });
  }

  /** Delete one row holding `value`. */
  async untag(value: string): Promise<void> {
    await this.connection.delete(new DbRecord(this.layout(), { tag: value }));
    this.connection.events?.onTagRemoved?.({ connection: this.connection.getName(), tag: value });
  }

  /** Every tag, in no particular order. Duplicates are returned as stored. */
  async listTags(): Promise<string[]> {
    const result = await this.connection.query(new Query(this.layout().getTableReference()));

    const tags: string[] = [];
    for (let row = result.fetch(); row !== null; row = result.fetch()) {
      tags.push(String(row.tag));
    }
    return tags;
  }

  async has(value: string): Promise<boolean> {
    return (await this.listTags()).includes(value);
  }

  private layout(): Layout {
    return this.connection.getSchema().getLayoutByName(TAG_TABLE);
  }
}
