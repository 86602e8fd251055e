import { attemptedScores } from '../lib/analysis';
import type { AnalysisReport, ScoreBand, ScoreTable } from '../lib/types';

const SCORE_BANDS = [
  { range: '0-40', max: 40 },
  { range: '41-60', max: 60 },
  { range: '61-80', max: 80 },
  { range: '81-100', max: Infinity },
];

/**
 * Count every attempted score, across all subjects, into fixed score bands
 */
export function scoreDistribution(table: ScoreTable): ScoreBand[] {
  const counts = SCORE_BANDS.map(() => 0);
  table.students.forEach((student) => {
    attemptedScores(student, table.subjects).forEach((score) => {
      const idx = SCORE_BANDS.findIndex((band) => score <= band.max);
      counts[idx] += 1;
    });
  });
  return SCORE_BANDS.map((band, idx) => ({ range: band.range, count: counts[idx] }));
}

export function passRateSeries(report: AnalysisReport) {
  return Array.from(report.subjectStats.values()).map((stats) => ({
    subject: stats.subject,
    passRate: stats.passRate,
    threshold: stats.threshold,
  }));
}

export function passFailSeries(report: AnalysisReport) {
  return Array.from(report.subjectStats.values()).map((stats) => ({
    subject: stats.subject,
    passed: stats.passed,
    failed: stats.failed,
  }));
}

export function scoreRangeSeries(report: AnalysisReport) {
  return Array.from(report.subjectStats.values()).map((stats) => ({
    subject: stats.subject,
    min: stats.min,
    mean: stats.mean,
    max: stats.max,
  }));
}

export function departmentSplit(report: AnalysisReport) {
  return [
    { label: 'Passed All', value: report.studentsPassedAll },
    { label: 'Failed Any', value: report.studentsFailedAny },
  ];
}
