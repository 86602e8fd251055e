import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as XLSX from 'xlsx';
import { parseCliArgs, runCli, sanitizeFilename } from './cli';
import { ConfigError } from './lib/errors';

const CSV = [
  'Student_ID,Student_Name,Math,Physics',
  'S1,Alice,72,66',
  'S2,Bob,48,81',
  'S3,Cara,91,39',
  'S4,Dev,63,74',
  'S5,Eli,57,52',
].join('\n');

describe('parseCliArgs', () => {
  it('maps flags onto a config layer', () => {
    const args = parseCliArgs([
      'scores.csv',
      '--pass-mark',
      '50',
      '--override',
      'Math=60',
      '--override',
      'Physics Lab=45',
      '--format',
      'md, json',
      '--show-ids',
    ]);

    expect(args).toEqual({
      file: 'scores.csv',
      configPath: undefined,
      help: false,
      layer: {
        defaultThreshold: 50,
        overrides: { Math: 60, 'Physics Lab': 45 },
        formats: ['md', 'json'],
        showStudentIds: true,
      },
    });
  });

  it('rejects an override without a subject', () => {
    expect(() => parseCliArgs(['scores.csv', '--override', '=50'])).toThrow(ConfigError);
  });
});

describe('sanitizeFilename', () => {
  it('keeps names filesystem safe', () => {
    expect(sanitizeFilename('Term 1 results (final)')).toBe('Term_1_results_final');
    expect(sanitizeFilename('***')).toBe('results');
  });
});

describe('runCli', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'exam-cli-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the requested reports', async () => {
    const input = path.join(dir, 'scores.csv');
    const outDir = path.join(dir, 'out');
    await writeFile(input, CSV);

    const code = await runCli([input, '--out', outDir, '--format', 'md,json'], {});

    expect(code).toBe(0);
    const markdown = await readFile(path.join(outDir, 'scores_report.md'), 'utf-8');
    expect(markdown.split('\n')[0]).toBe('# Student Examination Results Analysis Report');

    const stats = JSON.parse(await readFile(path.join(outDir, 'scores_stats.json'), 'utf-8'));
    expect(stats.totalStudents).toBe(5);
    expect(stats.departmentPassRate).toBe(80);
  });

  it('labels each student the same in every report of a run', async () => {
    const input = path.join(dir, 'scores.csv');
    const outDir = path.join(dir, 'out');
    await writeFile(input, CSV);

    expect(await runCli([input, '--out', outDir, '--format', 'md,xlsx'], {})).toBe(0);

    const markdown = (await readFile(path.join(outDir, 'scores_report.md'), 'utf-8')).split('\n');
    expect(markdown).toContain('| 2 | Student_0004 | 68.50% |');

    const workbook = XLSX.read(await readFile(path.join(outDir, 'scores_analysis.xlsx')), { type: 'buffer' });
    const rows = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets['Student Performance'], { header: 1 });
    expect(rows[4].slice(0, 2)).toEqual(['Student_0004', 'Student_0004']);
  });

  it('fails when validation finds errors', async () => {
    const input = path.join(dir, 'scores.csv');
    await writeFile(input, 'Student_ID,Math\nS1,50\n');

    expect(await runCli([input, '--out', path.join(dir, 'out')], {})).toBe(1);
  });

  it('fails on invalid configuration', async () => {
    const input = path.join(dir, 'scores.csv');
    await writeFile(input, CSV);

    expect(await runCli([input, '--pass-mark', '150'], {})).toBe(1);
  });

  it('prints usage without a file', async () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    expect(await runCli([], {})).toBe(1);
    expect(write).toHaveBeenCalled();
  });
});
