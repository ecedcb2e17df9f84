/**
 * CLI configuration loading
 *
 * Loads configuration from .env files, searching from the current directory
 * up to the filesystem root. Process environment variables take precedence.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Environment, LogLevel } from '@querycheck/logger';
import { z } from 'zod';

const configSchema = z.object({
  QUERYCHECK_SCHEMA: z.string().min(1).optional(),
  QUERYCHECK_ENV: z.enum(['test', 'development', 'production']).default('production'),
  QUERYCHECK_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).optional(),
});

const CONFIG_KEYS = Object.keys(configSchema.shape);

export interface CliConfig {
  /** Schema config file, relative to the directory the CLI runs in */
  schemaPath?: string;
  environment: Environment;
  logLevel?: LogLevel;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Parse a .env file into a key-value object
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }

    result[key] = value;
  }

  return result;
}

/**
 * Find and load the nearest .env file, searching from startDir up to root
 */
function findEnvFile(startDir: string): Record<string, string> {
  let currentDir = path.resolve(startDir);

  while (true) {
    const envPath = path.join(currentDir, '.env');
    if (fs.existsSync(envPath)) {
      return parseEnvFile(fs.readFileSync(envPath, 'utf-8'));
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return {};
    }
    currentDir = parentDir;
  }
}

/**
 * Load CLI configuration from environment and .env files
 *
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env file (searched from cwd upward)
 *
 * @throws ConfigError when a setting has an invalid value
 */
export function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): CliConfig {
  const merged: Record<string, string> = {};
  for (const source of [findEnvFile(cwd), env]) {
    for (const key of CONFIG_KEYS) {
      const value = source[key];
      if (value) merged[key] = value;
    }
  }

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const { QUERYCHECK_SCHEMA, QUERYCHECK_ENV, QUERYCHECK_LOG_LEVEL } = result.data;
  return {
    schemaPath: QUERYCHECK_SCHEMA,
    environment: QUERYCHECK_ENV,
    logLevel: QUERYCHECK_LOG_LEVEL,
  };
}
