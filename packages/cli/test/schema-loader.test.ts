import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { SchemaConfigError } from '@querycheck/schema';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadSchema, SchemaLoadError } from '../src/schema-loader.js';

describe('loadSchema', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'querycheck-schema-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('builds a schema from YAML', () => {
    const schema = loadSchema(fileURLToPath(new URL('./fixtures/schema.yaml', import.meta.url)));

    expect(schema.getQueryType().name).toBe('Query');
    expect(Object.keys(schema.getQueryType().getFields())).toEqual(['dog', 'dogs']);
  });

  it('builds a schema from JSON', () => {
    const file = path.join(dir, 'schema.json');
    fs.writeFileSync(file, JSON.stringify({ types: { Query: { kind: 'object', fields: { hello: 'String' } } } }));

    expect(loadSchema(file).getType('Query')?.name).toBe('Query');
  });

  it('rejects unsupported file types', () => {
    const file = path.join(dir, 'schema.txt');

    expect(() => loadSchema(file)).toThrow(
      new SchemaLoadError(file, 'expected one of .yaml, .yml, .json'),
    );
  });

  it('rejects missing files', () => {
    expect(() => loadSchema(path.join(dir, 'missing.yaml'))).toThrow(SchemaLoadError);
  });

  it('rejects malformed YAML', () => {
    const file = path.join(dir, 'schema.yaml');
    fs.writeFileSync(file, 'types: [unclosed\n');

    expect(() => loadSchema(file)).toThrow(SchemaLoadError);
  });

  it('rejects configs that describe no valid schema', () => {
    const file = path.join(dir, 'schema.yaml');
    fs.writeFileSync(file, 'types:\n  Query:\n    kind: object\n    fields:\n      dog: Dog\n');

    expect(() => loadSchema(file)).toThrow(SchemaConfigError);
  });
});
