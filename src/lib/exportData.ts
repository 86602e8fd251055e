import { passedAllSubjects, studentAverage } from './analysis';
import { thresholdFromCriteria } from './passPolicy';
import { createIdentityFormatter } from './pseudonyms';
import type {
  AnalysisReport,
  ExportCell,
  ExportData,
  ExportOptions,
  ExportSheet,
  IdentityFormatter,
  ScoreTable,
} from './types';

export const MISSING_VALUE = 'N/A';

export const SHEET_NAMES = {
  summary: 'Summary',
  subjectAnalysis: 'Subject Analysis',
  studentPerformance: 'Student Performance',
} as const;

export function formatNumber(value: number, decimalPlaces: number): string {
  return value.toFixed(decimalPlaces);
}

function buildSummary(report: AnalysisReport, decimals: number): ExportSheet {
  return {
    name: SHEET_NAMES.summary,
    header: ['Metric', 'Value'],
    rows: [
      ['Total Students', report.totalStudents],
      ['Total Subjects', report.totalSubjects],
      ['Department Pass Rate (%)', formatNumber(report.departmentPassRate, decimals)],
      ['Students Passed All Subjects', report.studentsPassedAll],
      ['Students Failed At Least One Subject', report.studentsFailedAny],
      ['Average Score Across All Subjects (%)', formatNumber(report.averageScore, decimals)],
    ],
  };
}

function buildSubjectAnalysis(report: AnalysisReport, decimals: number, identity: IdentityFormatter): ExportSheet {
  const rows: ExportCell[][] = Array.from(report.subjectStats.values()).map((stats) => [
    stats.subject,
    stats.attempted,
    stats.passed,
    stats.failed,
    formatNumber(stats.passRate, decimals),
    formatNumber(stats.failRate, decimals),
    formatNumber(stats.mean, decimals),
    formatNumber(stats.max, decimals),
    formatNumber(stats.min, decimals),
    identity.name(stats.topper.id, stats.topper.name),
  ]);

  return {
    name: SHEET_NAMES.subjectAnalysis,
    header: [
      'Subject',
      'Total Students',
      'Passed',
      'Failed',
      'Pass Rate (%)',
      'Fail Rate (%)',
      'Average Score',
      'Highest Score',
      'Lowest Score',
      'Topper',
    ],
    rows,
  };
}

function buildStudentPerformance(
  report: AnalysisReport,
  table: ScoreTable,
  decimals: number,
  identity: IdentityFormatter
): ExportSheet {
  const thresholdFor = (subject: string) => thresholdFromCriteria(report.passCriteria, subject);

  const rows: ExportCell[][] = table.students.map((student) => {
    const row: ExportCell[] = [identity.id(student.id), identity.name(student.id, student.name)];

    table.subjects.forEach((subject) => {
      const score = student.scores.get(subject);
      row.push(score === null || score === undefined ? MISSING_VALUE : score);
    });

    const average = studentAverage(student, table.subjects);
    if (average === null) {
      row.push(MISSING_VALUE, MISSING_VALUE);
    } else {
      row.push(
        formatNumber(average, decimals),
        passedAllSubjects(student, table.subjects, thresholdFor) ? 'Yes' : 'No'
      );
    }
    return row;
  });

  return {
    name: SHEET_NAMES.studentPerformance,
    header: ['Student_ID', 'Student_Name', ...table.subjects, 'Average Score', 'Passed All Subjects'],
    rows,
  };
}

/**
 * One formatter per run, seeded in table order. Hand the same instance to every
 * output so a student carries one label across all of them.
 */
export function createRunIdentity(table: ScoreTable, showStudentIds: boolean): IdentityFormatter {
  return createIdentityFormatter(showStudentIds, {
    missing: MISSING_VALUE,
    seed: table.students.map((student) => student.id),
  });
}

/**
 * Flatten a report into the three tables every export format shares.
 * Pass verdicts use the criteria recorded in the report, not the live policy.
 */
export function prepareExportData(
  report: AnalysisReport,
  table: ScoreTable,
  options: ExportOptions,
  identity: IdentityFormatter = createRunIdentity(table, options.showStudentIds)
): ExportData {
  return {
    summary: buildSummary(report, options.decimalPlaces),
    subjectAnalysis: buildSubjectAnalysis(report, options.decimalPlaces, identity),
    studentPerformance: buildStudentPerformance(report, table, options.decimalPlaces, identity),
  };
}
