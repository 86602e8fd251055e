import { describe, expect, it } from 'vitest';
import { analyzeResults } from '../lib/analysis';
import { PassPolicy } from '../lib/passPolicy';
import { sampleTable } from '../test/fixtures';
import { toStatsJson } from './stats';

describe('toStatsJson', () => {
  const report = analyzeResults(sampleTable(), new PassPolicy(40, { Math: 50 }));
  const stats = toStatsJson(report, new Date('2026-01-02T03:04:05.000Z'));

  it('rounds figures and stamps the time', () => {
    expect(stats.generatedAt).toBe('2026-01-02T03:04:05.000Z');
    expect(stats.departmentPassRate).toBe(66.67);
    expect(stats.averageScore).toBe(57);
    expect(stats.passCriteria).toEqual({ defaultThreshold: 40, overrides: { Math: 50 } });
  });

  it('lists subjects as an array', () => {
    expect(stats.subjects[1]).toEqual({
      subject: 'Physics',
      threshold: 40,
      attempted: 3,
      passed: 2,
      failed: 1,
      passRate: 66.67,
      failRate: 33.33,
      mean: 53.33,
      max: 70,
      min: 30,
    });
  });

  it('survives a JSON round trip', () => {
    expect(JSON.parse(JSON.stringify(stats))).toEqual(stats);
  });
});
