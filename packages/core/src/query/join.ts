import { RestrictionGroup } from './restriction-group';
import type { Alias } from './alias';
import type { FieldIdentifier } from './identifiers';

export type JoinType = 'INNER' | 'LEFT' | 'RIGHT';

/**
 * A table joined into a query. The join condition is a restriction group
 * scoped to the joined table; linking it to the parent query's fields is up
 * to the caller.
 */
export class Join {
  private readonly on: RestrictionGroup;

  constructor(
    public readonly source: Alias,
    public readonly type: JoinType = 'LEFT'
  ) {
    this.on = new RestrictionGroup(source.output);
  }

  getRestrictions(): RestrictionGroup {
    return this.on;
  }

  getOutput(name: string): FieldIdentifier {
    return this.source.output.getOutput(name);
  }
}
