/**
 * Shared migrations and helpers for connection-level tests.
 */

import { Connection } from '../connection/connection';
import { MemoryDriver, type MemoryDriverOptions } from '../impl/memory-driver';
import type { EventBus } from '../interfaces/event-bus';
import type { Migration, SchemaMigrationExecutor } from '../interfaces/migration';
import { Schema } from '../schema/schema';

type Step = (executor: SchemaMigrationExecutor) => void | Promise<void>;

export function defineMigration(identifier: string, up: Step, down: Step): Migration {
  return { identifier: () => identifier, up, down };
}

export const createUsers = defineMigration(
  'users.create',
  s => {
    s.add('users', t => {
      t.id();
      t.string('name', 255, false);
      t.int('age');
      t.unique('users_name', ['name']);
    });
  },
  s => s.drop('users')
);

export const createPosts = defineMigration(
  'posts.create',
  s => {
    s.add('posts', t => {
      t.id();
      t.foreign('author', s.table('users'));
      t.string('title', 255, false);
      t.timestamps();
      t.softDelete();
    });
  },
  s => s.drop('posts')
);

export const addEmail = defineMigration(
  'users.email',
  s => {
    s.table('users').string('email', 255).index('users_email', ['email']);
  },
  s => {
    s.table('users').dropIndex('users_email').drop('email');
  }
);

export interface Harness {
  driver: MemoryDriver;
  db: Connection;
}

export function harness(options: MemoryDriverOptions & { events?: EventBus } = {}): Harness {
  const driver = new MemoryDriver(options);
  const db = new Connection(new Schema('app'), driver, { name: 'main', events: options.events });
  return { driver, db };
}
