import type { FieldIdentifier } from './identifiers';

export type OrderDirection = 'ASC' | 'DESC';

export class OrderBy {
  constructor(
    public readonly field: FieldIdentifier,
    public readonly direction: OrderDirection = 'ASC'
  ) {}
}
