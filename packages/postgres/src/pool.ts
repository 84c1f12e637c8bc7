/**
 * The part of a `pg` Pool the driver uses. A `pg.Pool` satisfies it; tests
 * pass an in-process fake.
 */

export interface PoolQueryResult {
  rows: Record<string, unknown>[];
  rowCount: number | null;
}

export interface PoolLike {
  query(text: string, values?: unknown[]): Promise<PoolQueryResult>;
  end?(): Promise<void>;
}
