import { readFile } from 'node:fs/promises';
import * as XLSX from 'xlsx';
import { SheetFormatError } from './errors';
import type { ColumnLayout, RawSheet, ScoreTable, StudentRecord } from './types';

export const DEFAULT_COLUMNS: ColumnLayout = {
  idColumn: 'Student_ID',
  nameColumn: 'Student_Name',
  descriptiveColumns: ['Registration_Number'],
};

function normalizeHeader(value: unknown) {
  return String(value ?? '').replace(/^"+|"+$/g, '').trim();
}

export function isBlank(value: unknown) {
  return value === null || value === undefined || String(value).trim() === '';
}

/**
 * Read the first worksheet into a header row plus data rows.
 * Rows where every cell is blank are dropped.
 */
export function readSheetRows(data: ArrayBuffer | Uint8Array): RawSheet {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, { type: 'array' });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SheetFormatError(`Unable to read workbook: ${reason}`);
  }

  const sheetName = workbook.SheetNames[0];
  if (!sheetName) return { headers: [], rows: [] };

  const sheet = workbook.Sheets[sheetName];
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: '' });
  if (matrix.length === 0) return { headers: [], rows: [] };

  const headers = matrix[0].map(normalizeHeader);
  const rows = matrix.slice(1).filter((row) => row.some((cell) => !isBlank(cell)));

  return { headers, rows };
}

export function readSheetText(text: string): RawSheet {
  return readSheetRows(new TextEncoder().encode(text));
}

export async function readSheetFile(filePath: string): Promise<RawSheet> {
  const buffer = await readFile(filePath);
  return readSheetRows(buffer);
}

/**
 * Non-empty headers that appear more than once, in first-repeat order
 */
export function duplicateHeaders(headers: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  headers.forEach((header) => {
    if (header.length === 0) return;
    if (seen.has(header)) duplicates.add(header);
    seen.add(header);
  });
  return Array.from(duplicates);
}

export function subjectColumns(headers: readonly string[], columns: ColumnLayout = DEFAULT_COLUMNS): string[] {
  const identity = new Set([columns.idColumn, columns.nameColumn, ...columns.descriptiveColumns]);
  const subjects = headers.filter((header) => header.length > 0 && !identity.has(header));
  return Array.from(new Set(subjects));
}

/**
 * Coerce one subject cell: blank is "not attempted", anything else must be numeric.
 * Returns undefined for a value that is present but not a number.
 */
export function coerceScore(value: unknown): number | null | undefined {
  if (isBlank(value)) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string') {
    const num = Number(value.trim());
    return Number.isFinite(num) ? num : undefined;
  }
  return undefined;
}

export function parseScoreCell(value: unknown, location: { row: number; column: string }): number | null {
  const score = coerceScore(value);
  if (score === undefined) {
    throw new SheetFormatError(
      `Non-numeric score "${String(value)}" in column '${location.column}' (row ${location.row})`,
      location
    );
  }
  return score;
}

/**
 * Build the in-memory table from a sheet that already passed validation.
 */
export function buildScoreTable(raw: RawSheet, columns: ColumnLayout = DEFAULT_COLUMNS): ScoreTable {
  const idIdx = raw.headers.indexOf(columns.idColumn);
  const nameIdx = raw.headers.indexOf(columns.nameColumn);
  if (idIdx === -1) {
    throw new SheetFormatError(`Missing identifier column '${columns.idColumn}'`);
  }
  const repeated = duplicateHeaders(raw.headers);
  if (repeated.length > 0) {
    throw new SheetFormatError(`Duplicate column header '${repeated[0]}'`, { column: repeated[0] });
  }

  const subjects = subjectColumns(raw.headers, columns);
  const subjectIdx = subjects.map((subject) => ({ subject, idx: raw.headers.indexOf(subject) }));
  const descriptiveIdx = columns.descriptiveColumns
    .map((column) => ({ column, idx: raw.headers.indexOf(column) }))
    .filter((entry) => entry.idx !== -1);

  const students: StudentRecord[] = raw.rows.map((row, rowIdx) => {
    // +2: one for the header row, one for 1-based spreadsheet numbering
    const rowNumber = rowIdx + 2;
    const scores = new Map<string, number | null>();
    subjectIdx.forEach(({ subject, idx }) => {
      scores.set(subject, parseScoreCell(row[idx], { row: rowNumber, column: subject }));
    });

    const attributes: Record<string, string> = {};
    descriptiveIdx.forEach(({ column, idx }) => {
      if (!isBlank(row[idx])) attributes[column] = String(row[idx]).trim();
    });

    const name = nameIdx !== -1 && !isBlank(row[nameIdx]) ? String(row[nameIdx]).trim() : null;

    return {
      id: String(row[idIdx] ?? '').trim(),
      name,
      attributes,
      scores,
    };
  });

  return { subjects, students };
}
