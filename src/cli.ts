import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { config as loadDotenv } from 'dotenv';
import { AnalysisEngine } from './lib/analysis';
import { createPassPolicy, loadConfig, type AppConfig, type OutputFormat } from './lib/config';
import { ConfigError } from './lib/errors';
import { createRunIdentity, prepareExportData } from './lib/exportData';
import { createLogger } from './lib/logger';
import { buildScoreTable, readSheetFile } from './lib/sheet';
import type { AnalysisReport, ScoreTable } from './lib/types';
import { validateSheet } from './lib/validator';
import { generateMarkdownReport } from './reports/markdown';
import { generatePdfReport, writePdfReport } from './reports/pdf';
import { writeWorkbook } from './reports/spreadsheet';
import { writeStatsJson } from './reports/stats';

const log = createLogger('cli');

export const USAGE = `Usage: exam-analyzer <file> [options]

Options:
  --out <dir>              Output directory (default: reports)
  --format <list>          Comma-separated formats: md,xlsx,pdf,json
  --pass-mark <n>          Default pass mark, 0-100 (default: 40)
  --override <Subject=n>   Pass mark for one subject; repeatable
  --decimals <n>           Decimal places in reports, 0-4 (default: 2)
  --top <n>                Students listed in the top table (default: 10)
  --show-ids               Show real student identifiers instead of pseudonyms
  --config <file>          JSON configuration file
  -h, --help               Show this message
`;

export interface CliArgs {
  file: string | null;
  configPath: string | undefined;
  help: boolean;
  layer: Record<string, unknown>;
}

export function sanitizeFilename(value: string) {
  return value
    .replace(/\s+/g, '_')
    .replace(/[^\w\-.]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, 80) || 'results';
}

function parseOverride(entry: string): [string, number] {
  const idx = entry.lastIndexOf('=');
  const subject = idx === -1 ? '' : entry.slice(0, idx).trim();
  if (!subject) {
    throw new ConfigError(`Invalid --override "${entry}". Expected Subject=mark.`);
  }
  return [subject, Number(entry.slice(idx + 1).trim())];
}

/**
 * Turn argv into a config layer; range checks are left to the config schema.
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      out: { type: 'string' },
      format: { type: 'string' },
      'pass-mark': { type: 'string' },
      override: { type: 'string', multiple: true },
      decimals: { type: 'string' },
      top: { type: 'string' },
      'show-ids': { type: 'boolean' },
      config: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  const layer: Record<string, unknown> = {};
  if (values.out !== undefined) layer.outputDir = values.out;
  if (values.format !== undefined) {
    layer.formats = values.format
      .split(',')
      .map((format) => format.trim())
      .filter(Boolean);
  }
  if (values['pass-mark'] !== undefined) layer.defaultThreshold = Number(values['pass-mark']);
  if (values.override !== undefined) layer.overrides = Object.fromEntries(values.override.map(parseOverride));
  if (values.decimals !== undefined) layer.decimalPlaces = Number(values.decimals);
  if (values.top !== undefined) layer.topStudents = Number(values.top);
  if (values['show-ids']) layer.showStudentIds = true;

  return {
    file: positionals[0] ?? null,
    configPath: values.config,
    help: values.help ?? false,
    layer,
  };
}

async function writeReports(
  report: AnalysisReport,
  table: ScoreTable,
  config: AppConfig,
  baseName: string
): Promise<string[]> {
  await mkdir(config.outputDir, { recursive: true });
  const identity = createRunIdentity(table, config.showStudentIds);
  const exportData = prepareExportData(
    report,
    table,
    { decimalPlaces: config.decimalPlaces, showStudentIds: config.showStudentIds },
    identity
  );

  const written: string[] = [];
  const target = (format: OutputFormat, suffix: string) => path.resolve(config.outputDir, `${baseName}${suffix}.${format}`);

  for (const format of new Set(config.formats)) {
    if (format === 'md') {
      const filePath = target(format, '_report');
      await writeFile(filePath, generateMarkdownReport(report, config, identity), 'utf-8');
      written.push(filePath);
    } else if (format === 'xlsx') {
      const filePath = target(format, '_analysis');
      await writeWorkbook(exportData, filePath);
      written.push(filePath);
    } else if (format === 'pdf') {
      const filePath = target(format, '_report');
      await writePdfReport(generatePdfReport(report, table, exportData, config, identity), filePath);
      written.push(filePath);
    } else {
      const filePath = target(format, '_stats');
      await writeStatsJson(report, filePath);
      written.push(filePath);
    }
  }
  return written;
}

/**
 * Run one analysis end to end. Resolves to the process exit code.
 */
export async function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      process.stdout.write(USAGE);
      return 0;
    }
    if (!args.file) {
      process.stderr.write(USAGE);
      return 1;
    }

    const config = await loadConfig({ configPath: args.configPath, env, cli: args.layer });
    const raw = await readSheetFile(args.file);

    const validation = validateSheet(raw, config.columns);
    validation.warnings.forEach((warning) => log.warn(warning));
    if (!validation.isValid) {
      validation.errors.forEach((message) => log.error(message));
      return 1;
    }

    const table = buildScoreTable(raw, config.columns);
    const report = new AnalysisEngine(createPassPolicy(config)).analyze(table);
    log.info('Analysis complete', {
      students: report.totalStudents,
      subjects: report.totalSubjects,
      departmentPassRate: Number(report.departmentPassRate.toFixed(2)),
    });

    const baseName = sanitizeFilename(path.basename(args.file, path.extname(args.file)));
    const written = await writeReports(report, table, config, baseName);
    written.forEach((filePath) => console.log(filePath));
    return 0;
  } catch (error) {
    log.error(error instanceof Error ? error.message : 'Analysis failed', error);
    return 1;
  }
}

const entrypoint = process.argv[1] ? pathToFileURL(process.argv[1]).href : '';
if (import.meta.url === entrypoint) {
  loadDotenv();
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      log.error('Unexpected failure', error);
      process.exitCode = 1;
    }
  );
}
