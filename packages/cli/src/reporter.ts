/**
 * Check result reporters
 */

import chalk from 'chalk';
import type { FileResult } from './checker.js';

export interface ReporterOptions {
  quiet?: boolean;
  color?: boolean;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count !== 1 ? 's' : ''}`;
}

/**
 * Human readable report, one block per file
 */
export function formatPretty(results: FileResult[], options: ReporterOptions = {}): string {
  const c =
    options.color === false
      ? {
          red: (s: string) => s,
          green: (s: string) => s,
          gray: (s: string) => s,
        }
      : chalk;

  const totalErrors = results.reduce((sum, result) => sum + result.diagnostics.length, 0);
  if (options.quiet && totalErrors === 0) {
    return '';
  }

  const lines: string[] = [];
  for (const result of results) {
    if (options.quiet && result.diagnostics.length === 0) continue;

    lines.push('', `  ${result.path}`);

    if (result.diagnostics.length === 0) {
      lines.push(`    ${c.green('✓')} No issues`);
    }

    for (const diagnostic of result.diagnostics) {
      lines.push(`    ${c.red('✗')} ${c.gray(`${diagnostic.line}:${diagnostic.column}`)}  ${diagnostic.message}`);
    }
  }

  lines.push('');
  if (totalErrors === 0) {
    lines.push(c.green(`  ✓ All ${plural(results.length, 'file')} passed`));
  } else {
    lines.push(c.gray(`  Found ${plural(totalErrors, 'error')} in ${plural(results.length, 'file')}`));
  }
  lines.push('');

  return lines.join('\n');
}

/**
 * Machine readable report
 */
export function formatJson(results: FileResult[]): string {
  const output = {
    files: results.map((result) => ({
      path: result.path,
      errors: result.diagnostics,
    })),
    summary: {
      files: results.length,
      errors: results.reduce((sum, result) => sum + result.diagnostics.length, 0),
    },
  };

  return JSON.stringify(output, null, 2);
}
