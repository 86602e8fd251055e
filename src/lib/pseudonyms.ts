import type { IdentityFormatter } from './types';

/**
 * Pseudonymous labels handed out in first-seen order.
 * One table lives for exactly one export; labels are not stable across exports.
 */
export class PseudonymTable {
  private readonly labels = new Map<string, string>();

  constructor(private readonly prefix = 'Student') {}

  labelFor(value: string): string {
    const existing = this.labels.get(value);
    if (existing) return existing;

    const label = `${this.prefix}_${String(this.labels.size + 1).padStart(4, '0')}`;
    this.labels.set(value, label);
    return label;
  }

  get size(): number {
    return this.labels.size;
  }
}

export interface IdentityFormatterOptions {
  missing?: string;
  // Student ids registered up front, so labels follow table order
  seed?: readonly string[];
}

/**
 * Identity display for one export run: real values, or one label per student id.
 * A hidden name takes its student's label, so id and name never disagree.
 */
export function createIdentityFormatter(
  showStudentIds: boolean,
  options: IdentityFormatterOptions = {}
): IdentityFormatter {
  const missing = options.missing ?? 'N/A';

  if (showStudentIds) {
    return {
      id: (id) => id,
      name: (_id, name) => name ?? missing,
    };
  }

  const table = new PseudonymTable();
  options.seed?.forEach((id) => table.labelFor(id));
  return {
    id: (id) => table.labelFor(id),
    name: (id, name) => (name === null ? missing : table.labelFor(id)),
  };
}
