import { jsPDF } from 'jspdf';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { analyzeResults } from '../lib/analysis';
import { createRunIdentity, prepareExportData } from '../lib/exportData';
import { PassPolicy } from '../lib/passPolicy';
import { sampleTable, student, table } from '../test/fixtures';
import { drawChartSafely, generatePdfReport, pdfToBuffer } from './pdf';

const OPTIONS = { decimalPlaces: 2, showStudentIds: false, topStudents: 10 };

describe('generatePdfReport', () => {
  it('renders a PDF document', () => {
    const data = sampleTable();
    const report = analyzeResults(data, new PassPolicy(40));
    const doc = generatePdfReport(report, data, prepareExportData(report, data, OPTIONS), OPTIONS);

    expect(pdfToBuffer(doc).subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(doc.getNumberOfPages()).toBeGreaterThan(1);
  });

  it('renders a report with anomalies and no ranked students', () => {
    const empty = table(['Math'], [student('S1', 'a', { Math: null })]);
    const report = analyzeResults(empty, new PassPolicy());
    const doc = generatePdfReport(report, empty, prepareExportData(report, empty, OPTIONS), OPTIONS);

    expect(pdfToBuffer(doc).length).toBeGreaterThan(0);
  });
});

describe('identity labels in the PDF', () => {
  it('uses the run formatter for every student it names', () => {
    const data = table(['Math'], [student('S1', 'Ann', { Math: 50 }), student('S2', 'Ben', { Math: 90 })]);
    const report = analyzeResults(data, new PassPolicy());
    const shared = createRunIdentity(data, false);
    const labels: [string, string][] = [];
    const identity = {
      id: (id: string) => shared.id(id),
      name: (id: string, name: string | null) => {
        const label = shared.name(id, name);
        labels.push([id, label]);
        return label;
      },
    };

    const exportData = prepareExportData(report, data, OPTIONS, identity);
    generatePdfReport(report, data, exportData, OPTIONS, identity);

    expect(new Set(labels.filter(([id]) => id === 'S2').map(([, label]) => label))).toEqual(
      new Set(['Student_0002'])
    );
    expect(labels.filter(([id]) => id === 'S1').length).toBeGreaterThan(1);
    expect(exportData.subjectAnalysis.rows[0][9]).toBe('Student_0002');
  });
});

describe('drawChartSafely', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the position the chart reports', () => {
    const doc = new jsPDF();
    expect(drawChartSafely(doc, 'Chart', 60, (y) => y + 40)).toBe(118);
  });

  it('replaces a failing chart with a placeholder', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const doc = new jsPDF();

    const next = drawChartSafely(doc, 'Broken', 60, () => {
      throw new Error('no data');
    });

    expect(next).toBe(92);
    expect(doc.getNumberOfPages()).toBe(1);
    expect(spy).toHaveBeenCalledTimes(1);
  });
});
