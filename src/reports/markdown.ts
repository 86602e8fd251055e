import { createIdentityFormatter } from '../lib/pseudonyms';
import type { AnalysisReport, AnomalyKind, IdentityFormatter, PassCriteria } from '../lib/types';
import { generateRecommendations } from './recommendations';

export interface MarkdownOptions {
  decimalPlaces: number;
  showStudentIds: boolean;
  topStudents: number;
}

export function anomalyTitle(kind: AnomalyKind): string {
  return kind
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export function describePassCriteria(criteria: PassCriteria): string {
  const overrides = Object.entries(criteria.overrides);
  const base = `${criteria.defaultThreshold}% minimum per subject`;
  if (overrides.length === 0) return base;
  return `${base} (overrides: ${overrides.map(([subject, mark]) => `${subject} ${mark}%`).join(', ')})`;
}

/**
 * Render the full analysis as a markdown document.
 * Section order: summary, department, top performer, subject table,
 * subject details, top students, anomalies, recommendations.
 */
export function generateMarkdownReport(
  report: AnalysisReport,
  options: MarkdownOptions,
  identity: IdentityFormatter = createIdentityFormatter(options.showStudentIds)
): string {
  const dp = options.decimalPlaces;
  const fmt = (value: number) => value.toFixed(dp);
  const lines: string[] = [];

  lines.push('# Student Examination Results Analysis Report');
  lines.push('');

  lines.push('## Executive Summary');
  lines.push('');
  lines.push(`**Total Students Analyzed:** ${report.totalStudents}`);
  lines.push(`**Total Subjects:** ${report.totalSubjects}`);
  lines.push(`**Department Pass Rate:** ${fmt(report.departmentPassRate)}%`);
  lines.push(`**Pass Criteria:** ${describePassCriteria(report.passCriteria)}`);
  lines.push('');

  lines.push('## Department Performance');
  lines.push('');
  lines.push(`- **${report.studentsPassedAll}** students passed all subjects`);
  lines.push(`- **${report.studentsFailedAny}** students failed at least one subject`);
  lines.push(`- **Average score across all subjects:** ${fmt(report.averageScore)}%`);
  lines.push('');

  if (report.overallTopStudent) {
    const top = report.overallTopStudent;
    lines.push('## Overall Top Performer');
    lines.push('');
    lines.push(`**${identity.name(top.id, top.name)}** with an average score of **${fmt(top.average)}%**`);
    lines.push('');
  }

  lines.push('## Subject Performance Summary');
  lines.push('');
  lines.push('| Subject | Students | Pass Rate | Fail Rate | Avg Score | Highest | Topper |');
  lines.push('|---------|----------|-----------|-----------|-----------|---------|--------|');
  report.subjectStats.forEach((stats, subject) => {
    lines.push(
      `| ${subject} | ${stats.attempted} | ${fmt(stats.passRate)}% | ${fmt(stats.failRate)}% | ` +
        `${fmt(stats.mean)} | ${fmt(stats.max)} | ${identity.name(stats.topper.id, stats.topper.name)} |`
    );
  });
  lines.push('');

  lines.push('## Detailed Subject Analysis');
  lines.push('');
  report.subjectStats.forEach((stats, subject) => {
    lines.push(`### ${subject}`);
    lines.push(`- **Pass Mark:** ${stats.threshold}`);
    lines.push(`- **Total Students:** ${stats.attempted}`);
    lines.push(`- **Passed:** ${stats.passed} (${fmt(stats.passRate)}%)`);
    lines.push(`- **Failed:** ${stats.failed} (${fmt(stats.failRate)}%)`);
    lines.push(`- **Average Score:** ${fmt(stats.mean)}`);
    lines.push(`- **Score Range:** ${fmt(stats.min)} - ${fmt(stats.max)}`);
    lines.push(`- **Top Performer:** ${identity.name(stats.topper.id, stats.topper.name)} (${fmt(stats.topper.score)}%)`);
    lines.push('');
  });

  lines.push('## Top Performing Students');
  lines.push('');
  const topStudents = report.rankedStudents.slice(0, options.topStudents);
  if (topStudents.length > 0) {
    lines.push('| Rank | Student | Average Score |');
    lines.push('|------|---------|---------------|');
    topStudents.forEach((student) => {
      lines.push(`| ${student.rank} | ${identity.name(student.id, student.name)} | ${fmt(student.average)}% |`);
    });
  } else {
    lines.push('No student has a recorded score.');
  }
  lines.push('');

  if (report.anomalies.length > 0) {
    lines.push('## Anomalies and Concerns');
    lines.push('');
    report.anomalies.forEach((anomaly) => {
      lines.push(`- **${anomalyTitle(anomaly.kind)}:** ${anomaly.description}`);
    });
    lines.push('');
  }

  lines.push('## Recommendations');
  lines.push('');
  generateRecommendations(report).forEach((recommendation) => {
    lines.push(`- ${recommendation}`);
  });
  lines.push('');

  lines.push('---');
  lines.push('*This report was generated automatically by the examination results analyzer*');
  lines.push('');

  return lines.join('\n');
}
