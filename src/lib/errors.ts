import type { ZodIssue } from 'zod';

export class ConfigError extends Error {
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class PassPolicyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PassPolicyError';
  }
}

/**
 * Raised when a workbook cannot be read or a cell cannot be read as a score.
 */
export class SheetFormatError extends Error {
  readonly row: number | null;
  readonly column: string | null;

  constructor(message: string, location: { row?: number; column?: string } = {}) {
    super(message);
    this.name = 'SheetFormatError';
    this.row = location.row ?? null;
    this.column = location.column ?? null;
  }
}
