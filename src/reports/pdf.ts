import { writeFile } from 'node:fs/promises';
import { jsPDF } from 'jspdf';
import autoTable, { type RowInput } from 'jspdf-autotable/es';
import { createRunIdentity } from '../lib/exportData';
import { createLogger } from '../lib/logger';
import type { AnalysisReport, ExportData, IdentityFormatter, ScoreBand, ScoreTable } from '../lib/types';
import {
  departmentSplit,
  passFailSeries,
  passRateSeries,
  scoreDistribution,
  scoreRangeSeries,
} from './charts';
import { anomalyTitle, describePassCriteria } from './markdown';
import { generateRecommendations } from './recommendations';

const log = createLogger('pdf');

const MARGIN = 15;
const CONTENT_TOP = 58;
const CHART_HEIGHT = 50;

type RGB = [number, number, number];
const PRIMARY: RGB = [59, 130, 246];
const PASS_COLOR: RGB = [34, 197, 94];
const FAIL_COLOR: RGB = [239, 68, 68];
const MUTED: RGB = [147, 197, 253];

export interface PdfOptions {
  decimalPlaces: number;
  showStudentIds: boolean;
  topStudents: number;
  generatedAt?: Date;
}

function addHeader(doc: jsPDF, title: string, subtitle: string) {
  const pageWidth = doc.internal.pageSize.getWidth();

  doc.setFontSize(16);
  doc.setTextColor(...PRIMARY);
  doc.setFont('helvetica', 'bold');
  doc.text('Exam Results Analyzer', MARGIN, 15);

  doc.setDrawColor(229, 231, 235);
  doc.setLineWidth(0.5);
  doc.line(MARGIN, 22, pageWidth - MARGIN, 22);

  doc.setFontSize(18);
  doc.setTextColor(...PRIMARY);
  doc.text(title, MARGIN, 38);

  doc.setFontSize(11);
  doc.setTextColor(100, 100, 100);
  doc.setFont('helvetica', 'normal');
  doc.text(subtitle, MARGIN, 48);
}

/**
 * Start a new page when fewer than `needed` units remain below `yPos`
 */
function ensureSpace(doc: jsPDF, yPos: number, needed: number) {
  const pageHeight = doc.internal.pageSize.getHeight();
  if (yPos + needed <= pageHeight - MARGIN) return yPos;
  doc.addPage();
  return 25;
}

function addSectionTitle(doc: jsPDF, title: string, startY: number) {
  const yPos = ensureSpace(doc, startY, 30);
  doc.setFillColor(...PRIMARY);
  doc.rect(MARGIN, yPos, 3, 12, 'F');
  doc.setFontSize(12);
  doc.setTextColor(...PRIMARY);
  doc.setFont('helvetica', 'bold');
  doc.text(title, MARGIN + 8, yPos + 9);
  doc.setFont('helvetica', 'normal');
  return yPos + 18;
}

function drawTable(doc: jsPDF, head: string[], body: RowInput[], startY: number) {
  let finalY = startY;
  autoTable(doc, {
    startY,
    head: [head],
    body,
    theme: 'grid',
    styles: { fontSize: 8, cellPadding: 2 },
    headStyles: { fillColor: PRIMARY, textColor: 255 },
    margin: { left: MARGIN, right: MARGIN },
    didDrawPage: (data) => {
      finalY = data.cursor?.y ?? finalY;
    },
  });
  return finalY + 10;
}

function drawBulletList(doc: jsPDF, items: string[], startY: number) {
  const contentWidth = doc.internal.pageSize.getWidth() - MARGIN * 2;
  let yPos = startY;
  doc.setFontSize(9);
  doc.setTextColor(60, 60, 60);
  items.forEach((item) => {
    const lines: string[] = doc.splitTextToSize(`• ${item.replace(/\*\*/g, '')}`, contentWidth - 4);
    lines.forEach((line) => {
      yPos = ensureSpace(doc, yPos, 6);
      doc.text(line, MARGIN + 2, yPos);
      yPos += 5;
    });
  });
  return yPos + 6;
}

function drawAxis(doc: jsPDF, left: number, top: number, width: number, height: number) {
  doc.setDrawColor(209, 213, 219);
  doc.setLineWidth(0.3);
  doc.line(left, top + height, left + width, top + height);
  doc.line(left, top, left, top + height);
}

function drawBarLabels(doc: jsPDF, labels: string[], left: number, slot: number, baseline: number) {
  doc.setFontSize(7);
  doc.setTextColor(100, 100, 100);
  labels.forEach((label, idx) => {
    const text = label.length > 12 ? `${label.slice(0, 11)}.` : label;
    doc.text(text, left + idx * slot + slot / 2, baseline + 5, { align: 'center' });
  });
}

export function drawPassRateChart(doc: jsPDF, report: AnalysisReport, startY: number) {
  const series = passRateSeries(report);
  const contentWidth = doc.internal.pageSize.getWidth() - MARGIN * 2;
  const top = startY;
  const slot = contentWidth / Math.max(1, series.length);

  drawAxis(doc, MARGIN, top, contentWidth, CHART_HEIGHT);
  doc.setFontSize(7);
  series.forEach((point, idx) => {
    const height = (point.passRate / 100) * CHART_HEIGHT;
    const x = MARGIN + idx * slot;
    doc.setFillColor(...(point.passRate < 40 ? FAIL_COLOR : PRIMARY));
    doc.rect(x + slot * 0.2, top + CHART_HEIGHT - height, slot * 0.6, height, 'F');
    doc.setTextColor(60, 60, 60);
    doc.text(`${point.passRate.toFixed(1)}%`, x + slot / 2, top + CHART_HEIGHT - height - 2, { align: 'center' });
  });
  drawBarLabels(doc, series.map((point) => point.subject), MARGIN, slot, top + CHART_HEIGHT);
  return top + CHART_HEIGHT + 14;
}

export function drawScoreDistributionChart(doc: jsPDF, bands: ScoreBand[], startY: number) {
  const contentWidth = doc.internal.pageSize.getWidth() - MARGIN * 2;
  const top = startY;
  const slot = contentWidth / Math.max(1, bands.length);
  const maxCount = Math.max(1, ...bands.map((band) => band.count));

  drawAxis(doc, MARGIN, top, contentWidth, CHART_HEIGHT);
  doc.setFontSize(7);
  bands.forEach((band, idx) => {
    const height = (band.count / maxCount) * CHART_HEIGHT;
    const x = MARGIN + idx * slot;
    doc.setFillColor(...MUTED);
    doc.rect(x + slot * 0.15, top + CHART_HEIGHT - height, slot * 0.7, height, 'F');
    doc.setTextColor(60, 60, 60);
    doc.text(String(band.count), x + slot / 2, top + CHART_HEIGHT - height - 2, { align: 'center' });
  });
  drawBarLabels(doc, bands.map((band) => band.range), MARGIN, slot, top + CHART_HEIGHT);
  return top + CHART_HEIGHT + 14;
}

export function drawPassFailChart(doc: jsPDF, report: AnalysisReport, startY: number) {
  const series = passFailSeries(report);
  const contentWidth = doc.internal.pageSize.getWidth() - MARGIN * 2;
  const top = startY;
  const slot = contentWidth / Math.max(1, series.length);
  const maxCount = Math.max(1, ...series.map((point) => Math.max(point.passed, point.failed)));

  drawAxis(doc, MARGIN, top, contentWidth, CHART_HEIGHT);
  series.forEach((point, idx) => {
    const x = MARGIN + idx * slot;
    const barWidth = slot * 0.3;
    const passHeight = (point.passed / maxCount) * CHART_HEIGHT;
    const failHeight = (point.failed / maxCount) * CHART_HEIGHT;
    doc.setFillColor(...PASS_COLOR);
    doc.rect(x + slot * 0.18, top + CHART_HEIGHT - passHeight, barWidth, passHeight, 'F');
    doc.setFillColor(...FAIL_COLOR);
    doc.rect(x + slot * 0.52, top + CHART_HEIGHT - failHeight, barWidth, failHeight, 'F');
  });
  drawBarLabels(doc, series.map((point) => point.subject), MARGIN, slot, top + CHART_HEIGHT);

  // Legend
  const legendY = top + CHART_HEIGHT + 10;
  doc.setFontSize(7);
  doc.setFillColor(...PASS_COLOR);
  doc.rect(MARGIN, legendY - 3, 3, 3, 'F');
  doc.text('Passed', MARGIN + 5, legendY);
  doc.setFillColor(...FAIL_COLOR);
  doc.rect(MARGIN + 25, legendY - 3, 3, 3, 'F');
  doc.text('Failed', MARGIN + 30, legendY);
  return legendY + 8;
}

export function drawScoreRangeChart(doc: jsPDF, report: AnalysisReport, startY: number) {
  const series = scoreRangeSeries(report);
  const contentWidth = doc.internal.pageSize.getWidth() - MARGIN * 2;
  const top = startY;
  const slot = contentWidth / Math.max(1, series.length);
  const toY = (score: number) => top + CHART_HEIGHT - (Math.min(100, Math.max(0, score)) / 100) * CHART_HEIGHT;

  drawAxis(doc, MARGIN, top, contentWidth, CHART_HEIGHT);
  series.forEach((point, idx) => {
    const cx = MARGIN + idx * slot + slot / 2;
    doc.setDrawColor(...PRIMARY);
    doc.setLineWidth(0.8);
    doc.line(cx, toY(point.min), cx, toY(point.max));
    doc.line(cx - 3, toY(point.min), cx + 3, toY(point.min));
    doc.line(cx - 3, toY(point.max), cx + 3, toY(point.max));
    doc.setFillColor(...FAIL_COLOR);
    doc.circle(cx, toY(point.mean), 1.5, 'F');
  });
  drawBarLabels(doc, series.map((point) => point.subject), MARGIN, slot, top + CHART_HEIGHT);
  return top + CHART_HEIGHT + 14;
}

function drawPieSlice(doc: jsPDF, cx: number, cy: number, radius: number, start: number, end: number) {
  const step = Math.PI / 90;
  for (let angle = start; angle < end; angle += step) {
    const next = Math.min(end, angle + step);
    doc.triangle(
      cx,
      cy,
      cx + radius * Math.cos(angle),
      cy + radius * Math.sin(angle),
      cx + radius * Math.cos(next),
      cy + radius * Math.sin(next),
      'F'
    );
  }
}

export function drawDepartmentPie(doc: jsPDF, report: AnalysisReport, startY: number) {
  const slices = departmentSplit(report);
  const total = slices.reduce((sum, slice) => sum + slice.value, 0);
  const radius = 22;
  const cx = MARGIN + radius + 5;
  const cy = startY + radius;
  const colors = [PASS_COLOR, FAIL_COLOR];

  doc.setFontSize(8);
  if (total === 0) {
    doc.setTextColor(100, 100, 100);
    doc.text('No students to chart.', MARGIN, startY + 5);
    return startY + 12;
  }

  let angle = -Math.PI / 2;
  slices.forEach((slice, idx) => {
    const sweep = (slice.value / total) * Math.PI * 2;
    doc.setFillColor(...colors[idx]);
    drawPieSlice(doc, cx, cy, radius, angle, angle + sweep);
    angle += sweep;
  });

  slices.forEach((slice, idx) => {
    const legendY = startY + 10 + idx * 8;
    doc.setFillColor(...colors[idx]);
    doc.rect(cx + radius + 15, legendY - 3, 3, 3, 'F');
    doc.setTextColor(60, 60, 60);
    const share = ((slice.value / total) * 100).toFixed(1);
    doc.text(`${slice.label}: ${slice.value} (${share}%)`, cx + radius + 20, legendY);
  });

  return startY + radius * 2 + 10;
}

/**
 * Draw one chart; a failure is logged and replaced by a placeholder line.
 */
export function drawChartSafely(
  doc: jsPDF,
  title: string,
  startY: number,
  draw: (yPos: number) => number
): number {
  const yPos = addSectionTitle(doc, title, ensureSpace(doc, startY, CHART_HEIGHT + 40));
  try {
    return draw(yPos);
  } catch (error) {
    log.error(`Chart "${title}" could not be drawn`, error);
    doc.setFontSize(9);
    doc.setTextColor(150, 150, 150);
    doc.text(`[Chart unavailable: ${title}]`, MARGIN, yPos + 5);
    return yPos + 14;
  }
}

/**
 * Build the PDF report: summary tables first, then charts, anomalies and recommendations.
 */
export function generatePdfReport(
  report: AnalysisReport,
  table: ScoreTable,
  exportData: ExportData,
  options: PdfOptions,
  identity: IdentityFormatter = createRunIdentity(table, options.showStudentIds)
): jsPDF {
  const doc = new jsPDF();
  const fmt = (value: number) => value.toFixed(options.decimalPlaces);
  const generatedAt = (options.generatedAt ?? new Date()).toISOString().split('T')[0];

  addHeader(doc, 'Examination Results Analysis', `Generated on ${generatedAt}`);

  let yPos = CONTENT_TOP;
  doc.setFontSize(9);
  doc.setTextColor(80, 80, 80);
  doc.text(`Pass criteria: ${describePassCriteria(report.passCriteria)}`, MARGIN, yPos);
  yPos += 8;

  yPos = addSectionTitle(doc, 'Summary', yPos);
  yPos = drawTable(doc, exportData.summary.header, exportData.summary.rows, yPos);

  yPos = addSectionTitle(doc, 'Subject Analysis', yPos);
  yPos = drawTable(doc, exportData.subjectAnalysis.header, exportData.subjectAnalysis.rows, yPos);

  if (report.overallTopStudent) {
    yPos = addSectionTitle(doc, 'Top Performing Students', yPos);
    const rows = report.rankedStudents
      .slice(0, options.topStudents)
      .map((student) => [student.rank, identity.name(student.id, student.name), `${fmt(student.average)}%`, student.subjectCount]);
    yPos = drawTable(doc, ['Rank', 'Student', 'Average Score', 'Subjects'], rows, yPos);
  }

  yPos = drawChartSafely(doc, 'Subject Pass Rates', yPos, (y) => drawPassRateChart(doc, report, y));
  yPos = drawChartSafely(doc, 'Score Distribution (All Subjects)', yPos, (y) =>
    drawScoreDistributionChart(doc, scoreDistribution(table), y)
  );
  yPos = drawChartSafely(doc, 'Pass / Fail by Subject', yPos, (y) => drawPassFailChart(doc, report, y));
  yPos = drawChartSafely(doc, 'Score Range (Min / Average / Max)', yPos, (y) => drawScoreRangeChart(doc, report, y));
  yPos = drawChartSafely(doc, 'Department Pass / Fail', yPos, (y) => drawDepartmentPie(doc, report, y));

  if (report.anomalies.length > 0) {
    yPos = addSectionTitle(doc, 'Anomalies and Concerns', yPos);
    yPos = drawBulletList(
      doc,
      report.anomalies.map((anomaly) => `${anomalyTitle(anomaly.kind)}: ${anomaly.description}`),
      yPos
    );
  }

  yPos = addSectionTitle(doc, 'Recommendations', yPos);
  drawBulletList(doc, generateRecommendations(report), yPos);

  return doc;
}

export function pdfToBuffer(doc: jsPDF): Buffer {
  return Buffer.from(doc.output('arraybuffer'));
}

export async function writePdfReport(doc: jsPDF, filePath: string): Promise<void> {
  await writeFile(filePath, pdfToBuffer(doc));
}
