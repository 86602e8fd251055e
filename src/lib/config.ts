import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from './errors';
import { DEFAULT_PASS_MARK, PassPolicy, ThresholdSchema } from './passPolicy';

export const OUTPUT_FORMATS = ['md', 'xlsx', 'pdf', 'json'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

const ColumnsSchema = z.object({
  idColumn: z.string().min(1).default('Student_ID'),
  nameColumn: z.string().min(1).default('Student_Name'),
  descriptiveColumns: z.array(z.string().min(1)).default(['Registration_Number']),
});

export const AppConfigSchema = z.object({
  defaultThreshold: ThresholdSchema.default(DEFAULT_PASS_MARK),
  overrides: z.record(z.string(), ThresholdSchema).default({}),
  decimalPlaces: z.number().int().min(0).max(4).default(2),
  showStudentIds: z.boolean().default(false),
  topStudents: z.number().int().positive().default(10),
  columns: ColumnsSchema.default({}),
  outputDir: z.string().min(1).default('reports'),
  formats: z.array(z.enum(OUTPUT_FORMATS)).min(1).default([...OUTPUT_FORMATS]),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export function parseConfig(input: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`, result.error.issues);
  }
  return result.data;
}

function parseBoolean(value: string): boolean | string {
  const lower = value.trim().toLowerCase();
  if (['1', 'true', 'yes'].includes(lower)) return true;
  if (['0', 'false', 'no'].includes(lower)) return false;
  return value; // left as-is so the schema reports it
}

/**
 * Configuration values taken from EXAM_* environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const layer: Record<string, unknown> = {};
  if (env.EXAM_PASS_MARK) layer.defaultThreshold = Number(env.EXAM_PASS_MARK);
  if (env.EXAM_DECIMAL_PLACES) layer.decimalPlaces = Number(env.EXAM_DECIMAL_PLACES);
  if (env.EXAM_SHOW_STUDENT_IDS) layer.showStudentIds = parseBoolean(env.EXAM_SHOW_STUDENT_IDS);
  if (env.EXAM_OUTPUT_DIR) layer.outputDir = env.EXAM_OUTPUT_DIR;
  return layer;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function readConfigFile(filePath: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Unable to read config file ${filePath}: ${reason}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file ${filePath} is not valid JSON: ${reason}`);
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Later layers win. `columns` is merged key by key, every other key is replaced.
 */
export function mergeConfigLayers(...layers: Record<string, unknown>[]): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      const existing = merged[key];
      merged[key] = key === 'columns' && isRecord(existing) && isRecord(value) ? { ...existing, ...value } : value;
    }
  }
  return merged;
}

export async function loadConfig(options: {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cli?: Record<string, unknown>;
} = {}): Promise<AppConfig> {
  const fileLayer = options.configPath ? await readConfigFile(options.configPath) : {};
  const envLayer = configFromEnv(options.env ?? process.env);
  return parseConfig(mergeConfigLayers(fileLayer, envLayer, options.cli ?? {}));
}

export function createPassPolicy(config: AppConfig): PassPolicy {
  return new PassPolicy(config.defaultThreshold, config.overrides);
}
