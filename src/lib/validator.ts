import { DEFAULT_COLUMNS, coerceScore, duplicateHeaders, isBlank, subjectColumns } from './sheet';
import type { ColumnLayout, RawSheet, ValidationResult } from './types';

const MIN_SCORE = 0;
const MAX_SCORE = 100;
const MIN_STUDENTS = 5;
const MIN_SUBJECT_SCORES = 3;
const MISSING_WARNING_PERCENT = 20;
const ROUND_NUMBER_SHARE = 0.8;

type ColumnCells = { present: unknown[]; numeric: number[]; missing: number };

function columnCells(raw: RawSheet, column: string): ColumnCells {
  const idx = raw.headers.indexOf(column);
  const present: unknown[] = [];
  const numeric: number[] = [];
  let missing = 0;

  raw.rows.forEach((row) => {
    const cell = idx === -1 ? '' : row[idx];
    if (isBlank(cell)) {
      missing += 1;
      return;
    }
    present.push(cell);
    const score = coerceScore(cell);
    if (typeof score === 'number') numeric.push(score);
  });

  return { present, numeric, missing };
}

function validateSubjectColumn(raw: RawSheet, subject: string) {
  const errors: string[] = [];
  const warnings: string[] = [];
  const { present, numeric, missing } = columnCells(raw, subject);

  if (present.length === 0) {
    warnings.push(`Subject '${subject}' has no valid scores.`);
    return { errors, warnings };
  }

  const invalidCount = present.length - numeric.length;
  if (invalidCount > 0) {
    errors.push(`Subject '${subject}' contains ${invalidCount} non-numeric values.`);
  }

  if (numeric.length > 0) {
    const minVal = Math.min(...numeric);
    const maxVal = Math.max(...numeric);

    if (minVal < MIN_SCORE) {
      errors.push(`Subject '${subject}' contains scores below ${MIN_SCORE}: minimum value is ${minVal}`);
    }
    if (maxVal > MAX_SCORE) {
      errors.push(`Subject '${subject}' contains scores above ${MAX_SCORE}: maximum value is ${maxVal}`);
    }
    if (minVal === maxVal) {
      warnings.push(`Subject '${subject}' has identical scores for all students (${minVal})`);
    }

    const missingPercent = (missing / raw.rows.length) * 100;
    if (missingPercent > MISSING_WARNING_PERCENT) {
      warnings.push(`Subject '${subject}' has ${missingPercent.toFixed(1)}% missing values`);
    }
  }

  return { errors, warnings };
}

function checkDataQuality(raw: RawSheet, subjects: string[]): string[] {
  const warnings: string[] = [];
  const subjectIdx = subjects.map((subject) => raw.headers.indexOf(subject));

  const studentsWithNoScores = raw.rows.filter((row) => subjectIdx.every((idx) => isBlank(row[idx]))).length;
  if (studentsWithNoScores > 0) {
    warnings.push(`${studentsWithNoScores} students have no scores in any subject`);
  }

  subjects.forEach((subject) => {
    if (columnCells(raw, subject).numeric.length < MIN_SUBJECT_SCORES) {
      warnings.push(`Subject '${subject}' has fewer than ${MIN_SUBJECT_SCORES} valid scores`);
    }
  });

  // Mostly round numbers can mean estimated or hand-copied marks
  subjects.forEach((subject) => {
    const { numeric } = columnCells(raw, subject);
    if (numeric.length === 0) return;
    const multiplesOf5 = numeric.filter((score) => score % 5 === 0).length;
    if (multiplesOf5 > numeric.length * ROUND_NUMBER_SHARE) {
      warnings.push(`Subject '${subject}' has unusually high number of scores that are multiples of 5`);
    }
  });

  return warnings;
}

/**
 * Gate a sheet before analysis. Errors block analysis, warnings are advisory.
 */
export function validateSheet(raw: RawSheet, columns: ColumnLayout = DEFAULT_COLUMNS): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (raw.rows.length === 0) {
    errors.push('The uploaded file is empty or contains no data.');
    return { isValid: false, errors, warnings };
  }

  const required = [columns.idColumn, columns.nameColumn];
  const missingColumns = required.filter((column) => !raw.headers.includes(column));
  if (missingColumns.length > 0) {
    errors.push(`Missing required columns: ${missingColumns.join(', ')}`);
  }

  const repeated = duplicateHeaders(raw.headers);
  if (repeated.length > 0) {
    errors.push(`Duplicate column headers found: ${repeated.join(', ')}`);
  }

  const subjects = subjectColumns(raw.headers, columns);
  if (subjects.length === 0) {
    errors.push('No subject columns found. Please ensure your file contains at least one subject with numeric scores.');
  }

  if (errors.length === 0) {
    const ids = columnCells(raw, columns.idColumn);
    if (ids.missing > 0) {
      errors.push(`${columns.idColumn} column contains missing values.`);
    }

    const seenIds = new Set<string>();
    const duplicateIds: string[] = [];
    ids.present.forEach((value) => {
      const id = String(value).trim();
      if (seenIds.has(id)) duplicateIds.push(id);
      seenIds.add(id);
    });
    if (duplicateIds.length > 0) {
      errors.push(`Duplicate ${columns.idColumn}s found: ${duplicateIds.join(', ')}`);
    }

    const names = columnCells(raw, columns.nameColumn);
    if (names.missing > 0) {
      warnings.push(`${columns.nameColumn} column contains missing values.`);
    }
    const distinctNames = new Set(names.present.map((value) => String(value).trim()));
    if (distinctNames.size < names.present.length) {
      warnings.push('Potential duplicate student names found. Please verify if these are different students.');
    }

    subjects.forEach((subject) => {
      const result = validateSubjectColumn(raw, subject);
      errors.push(...result.errors);
      warnings.push(...result.warnings);
    });
  }

  if (errors.length === 0) {
    if (raw.rows.length < MIN_STUDENTS) {
      warnings.push(`Dataset contains fewer than ${MIN_STUDENTS} students. Analysis may not be statistically meaningful.`);
    }

    const allSubjectsEmpty = subjects.every((subject) => columnCells(raw, subject).present.length === 0);
    if (allSubjectsEmpty) {
      errors.push('All subject columns are empty. No data available for analysis.');
    }
  }

  if (errors.length === 0) {
    warnings.push(...checkDataQuality(raw, subjects));
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
  };
}

export function describeColumns(raw: RawSheet, columns: ColumnLayout = DEFAULT_COLUMNS) {
  const identity = [columns.idColumn, columns.nameColumn];
  return {
    totalColumns: raw.headers.length,
    requiredColumns: raw.headers.filter((header) => identity.includes(header)),
    descriptiveColumns: raw.headers.filter((header) => columns.descriptiveColumns.includes(header)),
    subjectColumns: subjectColumns(raw.headers, columns),
  };
}
