/**
 * Runtime configuration.
 *
 * Precedence, lowest first: defaults, `assessment.config.json` in the working
 * directory, environment variables. A malformed config file is logged and
 * ignored.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { z } from 'zod';

import { BenchmarkSchema, DEFAULT_BENCHMARK, type Benchmark } from '../engines/performance-insights.js';
import { DEFAULT_MODEL, DEFAULT_TIMEOUT_MS } from '../engines/llm-client.js';
import { logger } from './logger.js';

export const CONFIG_FILE_NAME = 'assessment.config.json';

const FileConfigSchema = z
  .object({
    questionsPath: z.string().min(1),
    sheetName: z.string().min(1),
    dbPath: z.string().min(1),
    backupDir: z.string().min(1),
    anthropicApiKey: z.string().min(1),
    model: z.string().min(1),
    llmTimeoutMs: z.number().int().positive(),
    benchmarkPath: z.string().min(1),
  })
  .partial()
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

export interface AppConfig {
  questionsPath: string;
  sheetName?: string | undefined;
  dbPath: string;
  /** Backups may only be written inside this directory */
  backupDir: string;
  anthropicApiKey?: string | undefined;
  model: string;
  llmTimeoutMs: number;
  benchmarkPath?: string | undefined;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function readConfigFile(cwd: string): FileConfig {
  const file = join(cwd, CONFIG_FILE_NAME);
  if (!existsSync(file)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (error) {
    logger.warn('Ignoring unreadable config file', error, { file });
    return {};
  }

  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn('Ignoring invalid config file', parsed.error, { file });
    return {};
  }
  return parsed.data;
}

function envString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function envPositiveInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const value = envString(env, key);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    logger.warn('Ignoring non-numeric environment value', undefined, { key, value });
    return undefined;
  }
  return parsed;
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const file = readConfigFile(cwd);
  const dataDir = join(homedir(), '.self-assessment');

  const questionsPath = envString(env, 'ASSESSMENT_QUESTIONS_PATH') ?? file.questionsPath ?? 'data/questions.xlsx';
  const benchmarkPath = envString(env, 'ASSESSMENT_BENCHMARK_PATH') ?? file.benchmarkPath;

  return {
    questionsPath: resolve(cwd, questionsPath),
    sheetName: envString(env, 'ASSESSMENT_SHEET') ?? file.sheetName,
    dbPath: envString(env, 'ASSESSMENT_DB_PATH') ?? file.dbPath ?? join(dataDir, 'assessment.db'),
    backupDir: resolve(cwd, envString(env, 'ASSESSMENT_BACKUP_DIR') ?? file.backupDir ?? join(dataDir, 'backups')),
    anthropicApiKey: envString(env, 'ANTHROPIC_API_KEY') ?? file.anthropicApiKey,
    model: envString(env, 'ASSESSMENT_LLM_MODEL') ?? file.model ?? DEFAULT_MODEL,
    llmTimeoutMs: envPositiveInt(env, 'ASSESSMENT_LLM_TIMEOUT_MS') ?? file.llmTimeoutMs ?? DEFAULT_TIMEOUT_MS,
    benchmarkPath: benchmarkPath === undefined ? undefined : resolve(cwd, benchmarkPath),
  };
}

/**
 * Benchmark from a JSON file, or the bundled one when no path is given or the
 * file cannot be used
 */
export function loadBenchmark(path?: string): Benchmark {
  if (path === undefined) {
    return DEFAULT_BENCHMARK;
  }

  try {
    const parsed = BenchmarkSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
    if (parsed.success) {
      return parsed.data;
    }
    logger.warn('Invalid benchmark file, using default', parsed.error, { path });
  } catch (error) {
    logger.warn('Unreadable benchmark file, using default', error, { path });
  }
  return DEFAULT_BENCHMARK;
}
