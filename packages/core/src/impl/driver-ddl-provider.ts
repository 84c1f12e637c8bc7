import type { DDLProvider } from '../interfaces/ddl-provider';
import type { Driver } from '../interfaces/driver';
import type { DDLOperation } from '../types/table';

/**
 * DDLProvider that renders each operation with the driver's schema grammar
 * and runs the statements right away.
 */
export class DriverDDLProvider<S> implements DDLProvider {
  constructor(private readonly driver: Driver<S>) {}

  async emit(op: DDLOperation): Promise<void> {
    for (const statement of this.driver.schemaGrammar().ddl(op)) {
      await this.driver.write(statement);
    }
  }
}
