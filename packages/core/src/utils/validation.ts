import type { ErrorObject } from 'ajv';
import type { Migration } from '../interfaces/migration';
import type { ValidationIssue } from '../types/errors';

export function validateManifest(migrations: readonly Migration[]): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const seen = new Map<string, number>();

  migrations.forEach((migration, i) => {
    const id = migration.identifier();
    if (!id.trim()) {
      issues.push({ path: `[${i}]`, message: 'Identifier is empty', severity: 'error' });
      return;
    }
    const first = seen.get(id);
    if (first !== undefined) {
      issues.push({ path: `[${i}]`, message: `Duplicate identifier "${id}" (first at [${first}])`, severity: 'error' });
    } else {
      seen.set(id, i);
    }
  });

  return issues;
}

/** Ajv errors as validation issues, with JSON pointers turned into dotted paths. */
export function toIssues(errors: ErrorObject[] | null | undefined): ValidationIssue[] {
  return (errors ?? []).map(err => {
    const path = err.instancePath.split('/').filter(Boolean).join('.') || '(root)';
    return { path, message: err.message ?? err.keyword, severity: 'error' };
  });
}
