import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, loadConfig, parseEnvFile } from '../src/config.js';

describe('parseEnvFile', () => {
  it('reads keys and values, skipping blanks and comments', () => {
    const content = ['# settings', '', 'QUERYCHECK_SCHEMA = schema.yaml', 'NO_EQUALS_SIGN', 'EMPTY='].join('\n');

    expect(parseEnvFile(content)).toEqual({ QUERYCHECK_SCHEMA: 'schema.yaml', EMPTY: '' });
  });

  it('strips surrounding quotes', () => {
    expect(parseEnvFile(`A="double"\nB='single'\nC="unbalanced'`)).toEqual({
      A: 'double',
      B: 'single',
      C: `"unbalanced'`,
    });
  });
});

describe('loadConfig', () => {
  let root: string;
  let nested: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'querycheck-config-'));
    nested = path.join(root, 'a', 'b');
    fs.mkdirSync(nested, { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('finds the nearest .env file above the working directory', () => {
    fs.writeFileSync(
      path.join(root, '.env'),
      'QUERYCHECK_SCHEMA=schema.yaml\nQUERYCHECK_ENV=development\nQUERYCHECK_LOG_LEVEL=debug\n',
    );

    expect(loadConfig(nested, {})).toEqual({
      schemaPath: 'schema.yaml',
      environment: 'development',
      logLevel: 'debug',
    });
  });

  it('prefers the process environment over .env', () => {
    fs.writeFileSync(path.join(root, '.env'), 'QUERYCHECK_SCHEMA=from-file.yaml\nQUERYCHECK_ENV=test\n');

    const config = loadConfig(nested, { QUERYCHECK_SCHEMA: 'from-env.yaml' });

    expect(config.schemaPath).toBe('from-env.yaml');
    expect(config.environment).toBe('test');
  });

  it('prefers the closest .env file', () => {
    fs.writeFileSync(path.join(root, '.env'), 'QUERYCHECK_SCHEMA=outer.yaml\n');
    fs.writeFileSync(path.join(nested, '.env'), 'QUERYCHECK_SCHEMA=inner.yaml\n');

    expect(loadConfig(nested, {}).schemaPath).toBe('inner.yaml');
  });

  it('defaults to production without a log level override', () => {
    fs.writeFileSync(path.join(root, '.env'), '# nothing set\n');

    expect(loadConfig(nested, {})).toEqual({
      schemaPath: undefined,
      environment: 'production',
      logLevel: undefined,
    });
  });

  it('rejects an unknown environment', () => {
    fs.writeFileSync(path.join(root, '.env'), '');

    let thrown: unknown;
    try {
      loadConfig(nested, { QUERYCHECK_ENV: 'staging' });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigError);
    expect(thrown instanceof ConfigError && thrown.issues.map((issue) => issue.split(':')[0])).toEqual([
      'QUERYCHECK_ENV',
    ]);
  });
});
