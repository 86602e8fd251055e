import { describe, expect, it } from 'vitest';
import { sampleTable, student, table } from '../test/fixtures';
import { analyzeResults } from './analysis';
import { prepareExportData } from './exportData';
import { PassPolicy } from './passPolicy';

describe('prepareExportData', () => {
  const data = sampleTable();
  const report = analyzeResults(data, new PassPolicy(40));

  it('builds the six summary rows', () => {
    const { summary } = prepareExportData(report, data, { decimalPlaces: 2, showStudentIds: false });

    expect(summary.name).toBe('Summary');
    expect(summary.rows).toEqual([
      ['Total Students', 3],
      ['Total Subjects', 2],
      ['Department Pass Rate (%)', '66.67'],
      ['Students Passed All Subjects', 2],
      ['Students Failed At Least One Subject', 1],
      ['Average Score Across All Subjects (%)', '57.00'],
    ]);
  });

  it('gives each student one label, in table order', () => {
    const { studentPerformance, subjectAnalysis } = prepareExportData(report, data, {
      decimalPlaces: 2,
      showStudentIds: false,
    });

    expect(studentPerformance.header).toEqual([
      'Student_ID',
      'Student_Name',
      'Math',
      'Physics',
      'Average Score',
      'Passed All Subjects',
    ]);
    expect(studentPerformance.rows).toEqual([
      ['Student_0001', 'Student_0001', 85, 60, '72.50', 'Yes'],
      ['Student_0002', 'Student_0002', 40, 30, '35.00', 'No'],
      ['Student_0003', 'N/A', 'N/A', 70, '70.00', 'Yes'],
    ]);
    expect(subjectAnalysis.rows).toEqual([
      ['Math', 2, 2, 0, '100.00', '0.00', '62.50', '85.00', '40.00', 'Student_0001'],
      ['Physics', 3, 2, 1, '66.67', '33.33', '53.33', '70.00', '30.00', 'N/A'],
    ]);
  });

  it('shows real identities and honours the precision', () => {
    const { studentPerformance, subjectAnalysis } = prepareExportData(report, data, {
      decimalPlaces: 0,
      showStudentIds: true,
    });

    expect(studentPerformance.rows[0]).toEqual(['S1', 'Alice', 85, 60, '73', 'Yes']);
    expect(subjectAnalysis.rows[1][4]).toBe('67');
  });

  it('marks students without scores as N/A', () => {
    const withAbsent = table(['Math'], [student('S1', 'Alice', { Math: 70 }), student('S2', 'Dan', { Math: null })]);
    const absentReport = analyzeResults(withAbsent, new PassPolicy());
    const { studentPerformance } = prepareExportData(absentReport, withAbsent, {
      decimalPlaces: 2,
      showStudentIds: true,
    });

    expect(studentPerformance.rows[1]).toEqual(['S2', 'Dan', 'N/A', 'N/A', 'N/A']);
  });

  it('judges verdicts by the criteria recorded in the report', () => {
    const policy = new PassPolicy(65);
    const stricter = analyzeResults(data, policy);
    policy.setDefaultThreshold(10);
    const { studentPerformance } = prepareExportData(stricter, data, { decimalPlaces: 2, showStudentIds: true });

    expect(studentPerformance.rows.map((row) => row[5])).toEqual(['No', 'No', 'Yes']);
  });
});
