import { writeFile } from 'node:fs/promises';
import type { AnalysisReport } from '../lib/types';

const round2 = (value: number) => Number(value.toFixed(2));

/**
 * Plain-JSON view of a report. Maps become arrays, numbers are rounded to two places.
 */
export function toStatsJson(report: AnalysisReport, generatedAt: Date = new Date()) {
  return {
    generatedAt: generatedAt.toISOString(),
    totalStudents: report.totalStudents,
    totalSubjects: report.totalSubjects,
    departmentPassRate: round2(report.departmentPassRate),
    studentsPassedAll: report.studentsPassedAll,
    studentsFailedAny: report.studentsFailedAny,
    averageScore: round2(report.averageScore),
    passCriteria: {
      defaultThreshold: report.passCriteria.defaultThreshold,
      overrides: { ...report.passCriteria.overrides },
    },
    subjects: Array.from(report.subjectStats.values()).map((stats) => ({
      subject: stats.subject,
      threshold: stats.threshold,
      attempted: stats.attempted,
      passed: stats.passed,
      failed: stats.failed,
      passRate: round2(stats.passRate),
      failRate: round2(stats.failRate),
      mean: round2(stats.mean),
      max: stats.max,
      min: stats.min,
    })),
    anomalies: report.anomalies.map((anomaly) => ({
      kind: anomaly.kind,
      subject: anomaly.subject,
      detail: anomaly.detail === null ? null : round2(anomaly.detail),
      description: anomaly.description,
    })),
  };
}

export type StatsJson = ReturnType<typeof toStatsJson>;

export async function writeStatsJson(report: AnalysisReport, filePath: string): Promise<void> {
  await writeFile(filePath, JSON.stringify(toStatsJson(report), null, 2), 'utf-8');
}
