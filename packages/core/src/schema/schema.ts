import { NotFoundError } from '../types/errors';
import type { Layout } from './layout';

/**
 * Schema: the in-memory snapshot of every layout the database holds, plus
 * the identifiers of the migrations that shaped it.
 *
 * The snapshot lets the application resolve fields without asking the DBMS.
 * It is kept in step with the live database by applying each migration to
 * both.
 */
export class Schema {
  private readonly layouts = new Map<string, Layout>();
  private readonly applied: string[] = [];

  constructor(public readonly name: string) {}

  getName(): string {
    return this.name;
  }

  putLayout(layout: Layout): this {
    this.layouts.set(layout.tableName, layout);
    return this;
  }

  getLayoutByName(name: string): Layout {
    const layout = this.layouts.get(name);
    if (!layout) {
      throw new NotFoundError('layout', name, this.name);
    }
    return layout;
  }

  hasLayout(name: string): boolean {
    return this.layouts.has(name);
  }

  removeLayout(name: string): this {
    if (!this.layouts.delete(name)) {
      throw new NotFoundError('layout', name, this.name);
    }
    return this;
  }

  getLayouts(): Layout[] {
    return [...this.layouts.values()];
  }

  // ── Applied migrations ────────────────────────────────────────

  markApplied(identifier: string): this {
    if (!this.applied.includes(identifier)) this.applied.push(identifier);
    return this;
  }

  markRolledBack(identifier: string): this {
    const i = this.applied.indexOf(identifier);
    if (i !== -1) this.applied.splice(i, 1);
    return this;
  }

  hasApplied(identifier: string): boolean {
    return this.applied.includes(identifier);
  }

  getApplied(): readonly string[] {
    return this.applied;
  }

  /** Deep copy: layouts are cloned, so mutating the copy leaves this intact. */
  clone(): Schema {
    const copy = new Schema(this.name);
    for (const layout of this.layouts.values()) copy.putLayout(layout.clone());
    for (const id of this.applied) copy.markApplied(id);
    return copy;
  }
}
