/**
 * querycheck check command
 *
 * Validates every given query document, or every `.graphql` file under the
 * given directories, against one schema.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { createLogger, type Logger, type LogEntry } from '@querycheck/logger';
import { SchemaConfigError, type GraphQLSchema } from '@querycheck/schema';
import { Command, InvalidArgumentError, Option } from 'commander';
import { glob } from 'glob';
import { checkDocument, type FileResult } from '../checker.js';
import { loadConfig, type CliConfig } from '../config.js';
import { formatJson, formatPretty } from '../reporter.js';
import { loadSchema, SchemaLoadError } from '../schema-loader.js';

export const ExitCode = {
  OK: 0,
  ERRORS: 1,
  FATAL: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export interface CheckOptions {
  schema?: string;
  format: 'pretty' | 'json';
  quiet?: boolean;
  color?: boolean;
  maxErrors?: number;
}

export interface CheckEnvironment {
  config: CliConfig;
  logger: Logger;
  cwd: string;
}

export interface CheckOutcome {
  exitCode: ExitCode;
  output: string;
}

export const checkCommand = new Command('check')
  .description('Validate query documents against a schema')
  .argument('[paths...]', 'Files or directories to check', ['.'])
  .option('--schema <path>', 'Schema config file (YAML or JSON); defaults to QUERYCHECK_SCHEMA')
  .addOption(new Option('--format <type>', 'Output format').choices(['pretty', 'json']).default('pretty'))
  .option('--quiet', 'Only output on errors')
  .option('--no-color', 'Disable colored output')
  .option('--max-errors <count>', 'Stop reporting a file after this many errors', parsePositiveInt)
  .action(async (paths: string[], options: CheckOptions) => {
    try {
      const config = loadConfig();
      const logger = createLogger({
        environment: config.environment,
        minLevel: config.logLevel,
        sink: stderrSink,
      });
      const { exitCode, output } = await runCheck(paths, options, { config, logger, cwd: process.cwd() });
      if (output) console.log(output);
      process.exit(exitCode);
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(ExitCode.FATAL);
    }
  });

/** Keeps log lines off stdout, where reports go */
function stderrSink(entry: LogEntry): void {
  console.error(JSON.stringify(entry));
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Check the documents under `paths` and render the report
 */
export async function runCheck(
  paths: string[],
  options: CheckOptions,
  { config, logger, cwd }: CheckEnvironment,
): Promise<CheckOutcome> {
  const schemaPath = options.schema ?? config.schemaPath;
  if (!schemaPath) {
    return { exitCode: ExitCode.FATAL, output: 'Error: No schema given; pass --schema or set QUERYCHECK_SCHEMA' };
  }

  let schema: GraphQLSchema;
  try {
    schema = loadSchema(path.resolve(cwd, schemaPath));
  } catch (error) {
    if (error instanceof SchemaLoadError || error instanceof SchemaConfigError) {
      logger.error('schema_load_failed', { schema: schemaPath, error });
      return { exitCode: ExitCode.FATAL, output: `Error: ${error.message}` };
    }
    throw error;
  }

  const { files, missing } = await findDocuments(paths, cwd);
  if (missing.length > 0) {
    return {
      exitCode: ExitCode.FATAL,
      output: missing.map((p) => `Error: Path not found: ${p}`).join('\n'),
    };
  }

  if (files.length === 0) {
    return { exitCode: ExitCode.OK, output: options.quiet ? '' : 'No files found to check' };
  }

  logger.info('check_started', { files: files.length, schema: schemaPath });

  const results: FileResult[] = files.map((file) => {
    const relativePath = path.relative(cwd, file);
    const diagnostics = checkDocument(fs.readFileSync(file, 'utf-8'), relativePath, schema, {
      logger: logger.child({ file: relativePath }),
      maxErrors: options.maxErrors,
    });
    return { path: relativePath, diagnostics };
  });

  const totalErrors = results.reduce((sum, result) => sum + result.diagnostics.length, 0);
  logger.info('check_completed', { files: results.length, errors: totalErrors });

  return {
    exitCode: totalErrors > 0 ? ExitCode.ERRORS : ExitCode.OK,
    output: options.format === 'json' ? formatJson(results) : formatPretty(results, options),
  };
}

/**
 * Files named directly, plus every `.graphql` file under named directories,
 * sorted and without duplicates
 */
async function findDocuments(paths: string[], cwd: string): Promise<{ files: string[]; missing: string[] }> {
  const files = new Set<string>();
  const missing: string[] = [];

  for (const p of paths) {
    const resolved = path.resolve(cwd, p);

    let stats: fs.Stats;
    try {
      stats = fs.statSync(resolved);
    } catch {
      missing.push(p);
      continue;
    }

    if (stats.isFile()) {
      files.add(resolved);
    } else if (stats.isDirectory()) {
      const found = await glob('**/*.graphql', {
        cwd: resolved,
        absolute: true,
        ignore: ['**/node_modules/**', '**/dist/**'],
      });
      for (const file of found) files.add(file);
    }
  }

  return { files: [...files].sort(), missing };
}
