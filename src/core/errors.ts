import type { ZodIssue } from 'zod';

export type StructuralInvariant =
  | 'EMPTY_TABLE_NAME'
  | 'TABLE_NAME_MISMATCH'
  | 'DUPLICATE_TABLE'
  | 'EMPTY_COLUMN_NAME'
  | 'COLUMN_TABLE_MISMATCH'
  | 'DUPLICATE_COLUMN'
  | 'IDENTITY_MISMATCH';

/**
 * A snapshot that breaks its own invariants. Comparison never proceeds past one.
 */
export class StructuralError extends Error {
  readonly table: string;
  readonly column?: string;
  readonly invariant: StructuralInvariant;

  constructor(invariant: StructuralInvariant, table: string, column?: string, detail?: string) {
    const target = column ? `${table || '<empty>'}.${column || '<empty>'}` : table || '<empty>';
    super(`${invariant} at ${target}${detail ? `: ${detail}` : ''}`);
    this.name = 'StructuralError';
    this.invariant = invariant;
    this.table = table;
    this.column = column;
  }
}

export class ConnectionError extends Error {
  constructor(
    readonly label: string,
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(`Could not connect to ${label} after ${attempts} attempt(s)`, options);
    this.name = 'ConnectionError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, readonly issues: ZodIssue[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}
