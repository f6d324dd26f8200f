/**
 * Runtime configuration.
 *
 * Resolution order for each setting: explicit override > environment >
 * `planner.config.json` in the working directory > default.
 */

import { readFileSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { logger } from './logger.js';

export const CONFIG_FILE_NAME = 'planner.config.json';

export const DEFAULT_DB_PATH = join(homedir(), '.atomic-planner', 'planner.db');
export const DEFAULT_LLM_BUDGET_USD = 5.0;
export const DEFAULT_DAYS_AHEAD = 90;

const PlannerConfigFileSchema = z
  .object({
    anthropicApiKey: z.string().min(1).optional(),
    dbPath: z.string().min(1).optional(),
    llmBudgetUsd: z.number().positive().optional(),
    daysAhead: z.number().int().positive().optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  })
  .passthrough();

export type PlannerConfigFile = z.infer<typeof PlannerConfigFileSchema>;

export interface ServiceConfig {
  /** Database path for storage */
  dbPath?: string;
  /** Anthropic API key; LLM stages are skipped without one */
  anthropicApiKey?: string;
  /** Per-user LLM spend limit in dollars */
  llmBudgetUsd?: number;
  /** Default scheduling horizon */
  daysAhead?: number;
  logLevel?: 'debug' | 'info' | 'warn' | 'error';
}

export interface ResolvedConfig {
  dbPath: string;
  anthropicApiKey?: string;
  llmBudgetUsd: number;
  daysAhead: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

/**
 * Read `planner.config.json` from a directory. Missing or invalid files yield `{}`.
 */
export function readConfigFile(dir: string = process.cwd()): PlannerConfigFile {
  const configPath = resolve(dir, CONFIG_FILE_NAME);
  if (!existsSync(configPath)) {
    logger.debug(`No config file found at ${CONFIG_FILE_NAME}`);
    return {};
  }

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    logger.warn('Config file contains invalid JSON', error, { configPath });
    return {};
  }

  const result = PlannerConfigFileSchema.safeParse(parsedJson);
  if (!result.success) {
    logger.warn('Config file has invalid structure', undefined, {
      issues: result.error.issues.map((issue) => issue.message),
      configPath,
    });
    return {};
  }
  return result.data;
}

function envNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

/**
 * Merge overrides, environment and config file into a complete config.
 */
export function resolveConfig(overrides: ServiceConfig = {}, dir?: string): ResolvedConfig {
  const file = readConfigFile(dir);
  const logLevel = overrides.logLevel ?? parseLogLevel(process.env.LOG_LEVEL) ?? file.logLevel ?? 'info';
  const anthropicApiKey = overrides.anthropicApiKey ?? (process.env.ANTHROPIC_API_KEY || undefined) ?? file.anthropicApiKey;

  return {
    dbPath: overrides.dbPath ?? process.env.PLANNER_DB_PATH ?? file.dbPath ?? DEFAULT_DB_PATH,
    llmBudgetUsd: overrides.llmBudgetUsd ?? envNumber('PLANNER_LLM_BUDGET_USD') ?? file.llmBudgetUsd ?? DEFAULT_LLM_BUDGET_USD,
    daysAhead: overrides.daysAhead ?? envNumber('PLANNER_DAYS_AHEAD') ?? file.daysAhead ?? DEFAULT_DAYS_AHEAD,
    logLevel,
    ...(anthropicApiKey !== undefined && { anthropicApiKey }),
  };
}

function parseLogLevel(value: string | undefined): ServiceConfig['logLevel'] {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      return undefined;
  }
}
