import { z } from 'zod';
import { PassPolicyError } from './errors';
import type { PassCriteria } from './types';

export const ThresholdSchema = z.number().finite().min(0).max(100);

export const DEFAULT_PASS_MARK = 40;

function checkThreshold(value: number, label: string): number {
  const parsed = ThresholdSchema.safeParse(value);
  if (!parsed.success) {
    throw new PassPolicyError(`Invalid pass mark for ${label}: ${value}. Must be between 0 and 100.`);
  }
  return parsed.data;
}

type OverrideInput = Readonly<Record<string, number>> | ReadonlyMap<string, number>;

function isOverrideMap(overrides: OverrideInput): overrides is ReadonlyMap<string, number> {
  return overrides instanceof Map;
}

function toOverrideMap(overrides: OverrideInput) {
  const entries: [string, number][] = isOverrideMap(overrides)
    ? Array.from(overrides.entries())
    : Object.entries(overrides);
  const map = new Map<string, number>();
  for (const [subject, value] of entries) {
    map.set(subject, checkThreshold(value, subject));
  }
  return map;
}

/**
 * Minimum passing score per subject: a subject-specific override, else the default.
 */
export class PassPolicy {
  private defaultThreshold: number;
  private overrides: Map<string, number>;

  constructor(
    defaultThreshold: number = DEFAULT_PASS_MARK,
    overrides: OverrideInput = {}
  ) {
    this.defaultThreshold = checkThreshold(defaultThreshold, 'default');
    this.overrides = toOverrideMap(overrides);
  }

  resolve(subject: string): number {
    return this.overrides.get(subject) ?? this.defaultThreshold;
  }

  setDefaultThreshold(value: number): void {
    this.defaultThreshold = checkThreshold(value, 'default');
  }

  // Replaces the whole mapping; removed subjects must not keep a stale mark.
  setOverrides(overrides: OverrideInput): void {
    this.overrides = toOverrideMap(overrides);
  }

  snapshot(): PassCriteria {
    return {
      defaultThreshold: this.defaultThreshold,
      overrides: Object.fromEntries(this.overrides),
    };
  }
}

export function thresholdFromCriteria(criteria: PassCriteria, subject: string): number {
  return Object.hasOwn(criteria.overrides, subject) ? criteria.overrides[subject] : criteria.defaultThreshold;
}
