import { Restriction, type RestrictionSubject, type RestrictionValue } from './restriction';
import type { TableIdentifier } from './identifiers';

export type GroupType = 'AND' | 'OR';

export type RestrictionNode = Restriction | RestrictionGroup;

/**
 * A boolean tree of restrictions. Children are combined with the group's
 * connective; groups nest to any depth. An empty group matches every row.
 *
 * Field names passed as strings are resolved against the group's scope, the
 * relation the group filters.
 */
export class RestrictionGroup {
  private readonly children: RestrictionNode[] = [];

  constructor(
    private readonly scope: TableIdentifier,
    private type: GroupType = 'AND'
  ) {}

  getType(): GroupType {
    return this.type;
  }

  setType(type: GroupType): this {
    this.type = type;
    return this;
  }

  getScope(): TableIdentifier {
    return this.scope;
  }

  restrictions(): readonly RestrictionNode[] {
    return this.children;
  }

  isEmpty(): boolean {
    return this.children.length === 0;
  }

  size(): number {
    return this.children.length;
  }

  push(child: RestrictionNode): this {
    this.children.push(child);
    return this;
  }

  /**
   * Append a restriction. With two arguments the operator is `=`.
   *
   * ```typescript
   * group.where('name', 'alice');
   * group.where('age', '>', 18);
   * group.where('role', ['admin', 'owner']); // effective operator IN
   * ```
   */
  where(field: string | RestrictionSubject, value: RestrictionValue): this;
  where(field: string | RestrictionSubject, operator: string, value: RestrictionValue): this;
  where(field: string | RestrictionSubject, ...args: [RestrictionValue] | [string, RestrictionValue]): this {
    const subject = typeof field === 'string' ? this.scope.getOutput(field) : field;
    const restriction = args.length === 1
      ? new Restriction(subject, '=', args[0])
      : new Restriction(subject, args[0], args[1]);
    return this.push(restriction);
  }

  /**
   * Append children so that they are AND-ed with each other. On an AND group
   * they are appended directly; on an OR group they are wrapped in one nested
   * AND group.
   */
  and(...children: RestrictionNode[]): this {
    return this.combine('AND', children);
  }

  /** Counterpart of `and()` for OR. */
  or(...children: RestrictionNode[]): this {
    return this.combine('OR', children);
  }

  /**
   * Append and return a nested group. The optional callback configures it
   * before it is returned.
   */
  group(type: GroupType, configure?: (group: RestrictionGroup) => void): RestrictionGroup {
    const child = new RestrictionGroup(this.scope, type);
    this.children.push(child);
    configure?.(child);
    return child;
  }

  /** Deep copy: restrictions are mutable through `negate()`. */
  clone(): RestrictionGroup {
    const copy = new RestrictionGroup(this.scope, this.type);
    for (const child of this.children) {
      copy.children.push(child.clone());
    }
    return copy;
  }

  private combine(type: GroupType, children: RestrictionNode[]): this {
    if (this.type === type) {
      this.children.push(...children);
      return this;
    }
    const nested = new RestrictionGroup(this.scope, type);
    nested.children.push(...children);
    return this.push(nested);
  }
}
