import { describe, it, expect } from 'vitest';
import { DEFAULT_SETTINGS } from '@tabula/core';
import { PgDriver } from '../src/pg-driver';
import { pgDriverFactory } from '../src/factory';

describe('pgDriverFactory', () => {
  it('builds a driver over a lazy pool with the configured prefix', async () => {
    const driver = pgDriverFactory({ ...DEFAULT_SETTINGS, schema: 'shop', prefix: 'app_' });

    expect(driver).toBeInstanceOf(PgDriver);
    expect(driver.recordGrammar()).toBe(driver.recordGrammar());
    expect(driver.queryGrammar().table('users')).toBe('"app_users"');

    await driver.close();
  });
});
