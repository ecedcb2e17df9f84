/**
 * Schema config file loading
 *
 * `.yaml`, `.yml` and `.json` files are accepted; both are parsed with the
 * YAML parser since JSON is a subset of YAML.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { buildSchemaFromConfig, type GraphQLSchema } from '@querycheck/schema';
import { parse as parseYaml, YAMLParseError } from 'yaml';

const SCHEMA_EXTENSIONS = ['.yaml', '.yml', '.json'];

export class SchemaLoadError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Cannot load schema ${filePath}: ${message}`);
    this.name = 'SchemaLoadError';
    this.filePath = filePath;
  }
}

/**
 * Read a schema config file and build the schema it describes
 *
 * @throws SchemaLoadError when the file cannot be read or parsed
 * @throws SchemaConfigError when the config does not describe a valid schema
 */
export function loadSchema(filePath: string): GraphQLSchema {
  const extension = path.extname(filePath).toLowerCase();
  if (!SCHEMA_EXTENSIONS.includes(extension)) {
    throw new SchemaLoadError(filePath, `expected one of ${SCHEMA_EXTENSIONS.join(', ')}`);
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new SchemaLoadError(filePath, error instanceof Error ? error.message : String(error));
  }

  let config: unknown;
  try {
    config = parseYaml(content);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new SchemaLoadError(filePath, error.message);
    }
    throw error;
  }

  return buildSchemaFromConfig(config);
}
