import { describe, expect, it } from 'vitest';
import { readSheetText } from './sheet';
import { describeColumns, validateSheet } from './validator';

const HEADERS = ['Student_ID', 'Student_Name', 'Math', 'Physics'];

const CLEAN_ROWS = [
  ['S1', 'Alice', 72, 66],
  ['S2', 'Bob', 48, 81],
  ['S3', 'Cara', 91, 39],
  ['S4', 'Dev', 63, 74],
  ['S5', 'Eli', 57, 52],
];

describe('validateSheet', () => {
  it('accepts a clean sheet without warnings', () => {
    expect(validateSheet({ headers: HEADERS, rows: CLEAN_ROWS })).toEqual({
      isValid: true,
      errors: [],
      warnings: [],
    });
  });

  it('rejects an empty sheet', () => {
    const result = validateSheet({ headers: HEADERS, rows: [] });
    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual(['The uploaded file is empty or contains no data.']);
  });

  it('requires the identity columns', () => {
    const result = validateSheet({ headers: ['Student_ID', 'Math'], rows: [['S1', 50]] });
    expect(result.errors).toEqual(['Missing required columns: Student_Name']);
  });

  it('requires at least one subject', () => {
    const result = validateSheet({ headers: ['Student_ID', 'Student_Name'], rows: [['S1', 'Alice']] });
    expect(result.errors).toEqual([
      'No subject columns found. Please ensure your file contains at least one subject with numeric scores.',
    ]);
  });

  it('rejects a repeated column header', () => {
    const raw = readSheetText('Student_ID,Student_Name,Math,Math\nS1,A,90,10\nS2,B,80,20');
    const result = validateSheet(raw);

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual(['Duplicate column headers found: Math']);
  });

  it('rejects duplicate identifiers', () => {
    const rows = [...CLEAN_ROWS, ['S1', 'Fay', 70, 70]];
    const result = validateSheet({ headers: HEADERS, rows });
    expect(result.errors).toEqual(['Duplicate Student_IDs found: S1']);
  });

  it('rejects non-numeric and out-of-range scores', () => {
    const rows = CLEAN_ROWS.map((row) => [...row]);
    rows[0][2] = 'abc';
    rows[1][3] = 105;
    const result = validateSheet({ headers: HEADERS, rows });
    expect(result.errors).toEqual([
      "Subject 'Math' contains 1 non-numeric values.",
      "Subject 'Physics' contains scores above 100: maximum value is 105",
    ]);
  });

  it('warns about small and sparse data', () => {
    const rows = [
      ['S1', 'Alice', 72, 66],
      ['S2', 'Bob', '', 81],
      ['S3', 'Cara', 48, 39],
    ];
    const result = validateSheet({ headers: HEADERS, rows });

    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual([
      "Subject 'Math' has 33.3% missing values",
      'Dataset contains fewer than 5 students. Analysis may not be statistically meaningful.',
      "Subject 'Math' has fewer than 3 valid scores",
    ]);
  });

  it('rejects a sheet whose subjects are all empty', () => {
    const rows = CLEAN_ROWS.map(([id, name]) => [id, name, '']);
    const result = validateSheet({ headers: ['Student_ID', 'Student_Name', 'Math'], rows });

    expect(result.errors).toEqual(['All subject columns are empty. No data available for analysis.']);
    expect(result.warnings).toContain("Subject 'Math' has no valid scores.");
  });

  it('warns when most scores are multiples of five', () => {
    const rows = CLEAN_ROWS.map(([id, name], idx) => [id, name, 50 + idx * 5, 61 + idx]);
    const result = validateSheet({ headers: HEADERS, rows });
    expect(result.warnings).toEqual(["Subject 'Math' has unusually high number of scores that are multiples of 5"]);
  });
});

describe('describeColumns', () => {
  it('groups headers by role', () => {
    const headers = ['Student_ID', 'Student_Name', 'Registration_Number', 'Math'];
    expect(describeColumns({ headers, rows: [] })).toEqual({
      totalColumns: 4,
      requiredColumns: ['Student_ID', 'Student_Name'],
      descriptiveColumns: ['Registration_Number'],
      subjectColumns: ['Math'],
    });
  });
});
