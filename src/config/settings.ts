/**
 * Runtime Settings
 *
 * Environment variables (optionally from `.env`) validated into one typed
 * settings object. Only malformed values are errors; a missing API key or
 * dataset is reported as a warning so the operator can still start the CLI.
 */

import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { LOG_LEVELS, isLogLevel, type LogLevel } from '../logging/logger.js';
import { DEFAULT_SESSION_HISTORY_DIR, DEFAULT_SESSION_ID_PATH } from '../storage/session-store.js';
import { DEFAULT_STATE_PATH } from '../storage/agent-state.js';

const blankToUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const EnvSchema = z.object({
  DATA_PATH: z.preprocess(blankToUndefined, z.string().default('data/sample_data.csv')),
  ANTHROPIC_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  CLAUDE_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  AGENT_STATE_PATH: z.preprocess(blankToUndefined, z.string().default(DEFAULT_STATE_PATH)),
  SESSION_ID_PATH: z.preprocess(blankToUndefined, z.string().default(DEFAULT_SESSION_ID_PATH)),
  SESSION_HISTORY_DIR: z.preprocess(blankToUndefined, z.string().default(DEFAULT_SESSION_HISTORY_DIR)),
  LOG_DIR: z.preprocess(blankToUndefined, z.string().default('logs')),
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z
      .string()
      .transform(level => level.toLowerCase())
      .refine(isLogLevel, { message: `expected one of ${Object.keys(LOG_LEVELS).join(', ')}` })
      .default('debug')
  ),
  CLAUDE_MODEL: z.preprocess(blankToUndefined, z.string().optional()),
  ONE_SHOT_MAX_TURNS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(3)),
});

export interface Settings {
  dataPath: string;
  apiKey: string | null;
  agentStatePath: string;
  sessionIdPath: string;
  sessionHistoryDir: string;
  logDir: string;
  logLevel: LogLevel;
  model: string | null;
  oneShotMaxTurns: number;
}

/**
 * Load `.env` into `process.env` when present. Existing variables win.
 * Returns whether a file was read.
 */
export function loadDotenv(file = '.env'): boolean {
  const result = dotenv.config({ path: file });
  return result.error === undefined;
}

/**
 * @throws ConfigError listing every malformed variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const values = parsed.data;
  const logLevel = values.LOG_LEVEL;
  return {
    dataPath: values.DATA_PATH,
    apiKey: values.ANTHROPIC_API_KEY ?? values.CLAUDE_API_KEY ?? null,
    agentStatePath: values.AGENT_STATE_PATH,
    sessionIdPath: values.SESSION_ID_PATH,
    sessionHistoryDir: values.SESSION_HISTORY_DIR,
    logDir: values.LOG_DIR,
    logLevel: isLogLevel(logLevel) ? logLevel : 'debug',
    model: values.CLAUDE_MODEL ?? null,
    oneShotMaxTurns: values.ONE_SHOT_MAX_TURNS,
  };
}

/**
 * Startup warnings: missing API key, missing dataset file.
 */
export function checkEnvironment(settings: Settings, exists: (file: string) => boolean = fs.existsSync): string[] {
  const warnings: string[] = [];
  if (!settings.apiKey) {
    warnings.push(
      'ANTHROPIC_API_KEY (or CLAUDE_API_KEY) not set. The SDK may fail to authenticate without it.'
    );
  }
  if (!exists(path.resolve(settings.dataPath))) {
    warnings.push(`data file not found at ${settings.dataPath}. Create it or set the DATA_PATH env var.`);
  }
  return warnings;
}
