export * from './lib/types';
export { ConfigError, PassPolicyError, SheetFormatError } from './lib/errors';
export { createLogger, logger, type Logger } from './lib/logger';
export { DEFAULT_PASS_MARK, PassPolicy, thresholdFromCriteria } from './lib/passPolicy';
export {
  AnalysisEngine,
  analyzeResults,
  attemptedScores,
  detectSubjectAnomalies,
  passedAllSubjects,
  studentAverage,
} from './lib/analysis';
export {
  DEFAULT_COLUMNS,
  buildScoreTable,
  parseScoreCell,
  readSheetFile,
  readSheetRows,
  readSheetText,
  subjectColumns,
} from './lib/sheet';
export { describeColumns, validateSheet } from './lib/validator';
export {
  AppConfigSchema,
  OUTPUT_FORMATS,
  createPassPolicy,
  loadConfig,
  parseConfig,
  type AppConfig,
  type OutputFormat,
} from './lib/config';
export { PseudonymTable, createIdentityFormatter } from './lib/pseudonyms';
export { MISSING_VALUE, SHEET_NAMES, createRunIdentity, prepareExportData } from './lib/exportData';
export { generateRecommendations } from './reports/recommendations';
export { generateMarkdownReport, type MarkdownOptions } from './reports/markdown';
export { buildWorkbook, workbookToBuffer, writeWorkbook } from './reports/spreadsheet';
export { generatePdfReport, pdfToBuffer, writePdfReport, type PdfOptions } from './reports/pdf';
export { toStatsJson, writeStatsJson, type StatsJson } from './reports/stats';
export { scoreDistribution } from './reports/charts';
