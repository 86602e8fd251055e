import { writeFile } from 'node:fs/promises';
import * as XLSX from 'xlsx';
import type { ExportData, ExportSheet } from '../lib/types';

function sheetFromExport(sheet: ExportSheet): XLSX.WorkSheet {
  const worksheet = XLSX.utils.aoa_to_sheet([sheet.header, ...sheet.rows]);

  // Width each column to its longest cell
  worksheet['!cols'] = sheet.header.map((title, idx) => {
    const longest = sheet.rows.reduce((max, row) => Math.max(max, String(row[idx] ?? '').length), title.length);
    return { wch: Math.min(40, longest + 2) };
  });

  return worksheet;
}

/**
 * Workbook with the Summary, Subject Analysis and Student Performance sheets
 */
export function buildWorkbook(data: ExportData): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  [data.summary, data.subjectAnalysis, data.studentPerformance].forEach((sheet) => {
    XLSX.utils.book_append_sheet(workbook, sheetFromExport(sheet), sheet.name);
  });
  return workbook;
}

export function workbookToBuffer(workbook: XLSX.WorkBook): Buffer {
  return Buffer.from(XLSX.write(workbook, { type: 'array', bookType: 'xlsx' }));
}

export async function writeWorkbook(data: ExportData, filePath: string): Promise<void> {
  await writeFile(filePath, workbookToBuffer(buildWorkbook(data)));
}
