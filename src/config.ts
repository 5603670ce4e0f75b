/**
 * Lexer Configuration
 * Loads lexer options from a YAML file
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { createError } from './error-classes.js';
import { isTokenKind, type TokenKind } from './token-types.js';

/** Default configuration file name looked up by findConfigFile() */
export const CONFIG_FILE_NAME = '.gt-lex.yaml';

export interface LexerConfig {
  skipComments?: boolean | undefined;
  skipNewlines?: boolean | undefined;
  maxTokens?: number | undefined;
  untilKind?: TokenKind | undefined;
}

const CONFIG_KEYS: ReadonlySet<string> = new Set([
  'skipComments',
  'skipNewlines',
  'maxTokens',
  'untilKind',
]);

function invalidConfig(details: string): Error {
  return createError('GT-C001', { details });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readBoolean(
  data: Record<string, unknown>,
  key: string
): boolean | undefined {
  const value = data[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw invalidConfig(`${key} must be a boolean`);
  }
  return value;
}

/**
 * Validate parsed configuration data.
 * An empty document (null) is an empty configuration.
 * @throws GameToolsError GT-C001 naming the offending key
 */
export function parseLexerConfig(data: unknown): LexerConfig {
  if (data === null || data === undefined) return {};
  if (!isRecord(data)) {
    throw invalidConfig('expected a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!CONFIG_KEYS.has(key)) {
      throw invalidConfig(`unknown key ${key}`);
    }
  }

  const config: LexerConfig = {
    skipComments: readBoolean(data, 'skipComments'),
    skipNewlines: readBoolean(data, 'skipNewlines'),
  };

  const maxTokens = data['maxTokens'];
  if (maxTokens !== undefined) {
    if (
      typeof maxTokens !== 'number' ||
      !Number.isInteger(maxTokens) ||
      maxTokens < 0
    ) {
      throw invalidConfig('maxTokens must be a non-negative integer');
    }
    config.maxTokens = maxTokens;
  }

  const untilKind = data['untilKind'];
  if (untilKind !== undefined) {
    if (!isTokenKind(untilKind)) {
      throw invalidConfig(
        `untilKind must be a token kind, got ${String(untilKind)}`
      );
    }
    config.untilKind = untilKind;
  }

  return config;
}

/**
 * Load and validate a YAML configuration file.
 * @throws GameToolsError GT-C001 when the YAML is malformed or invalid
 */
export async function loadLexerConfig(filePath: string): Promise<LexerConfig> {
  const content = await fs.readFile(filePath, 'utf-8');

  let data: unknown;
  try {
    data = yaml.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw invalidConfig(`${path.basename(filePath)}: ${message}`);
  }

  return parseLexerConfig(data);
}

/** Path of the configuration file in `dir`, or null when there is none */
export async function findConfigFile(dir: string): Promise<string | null> {
  const candidate = path.join(dir, CONFIG_FILE_NAME);
  try {
    await fs.access(candidate);
    return candidate;
  } catch {
    return null;
  }
}
