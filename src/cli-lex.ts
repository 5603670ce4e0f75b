#!/usr/bin/env node
/**
 * CLI Lex Entry Point
 *
 * Implements main() and parseArgs() for the gt-lex binary.
 * Tokenizes a file, stdin or an inline source and prints the tokens.
 */

import * as fs from 'fs/promises';
import * as fsSync from 'fs';
import * as path from 'path';
import { explainError } from './cli-explain.js';
import { formatError, formatTokens } from './cli-shared.js';
import {
  findConfigFile,
  loadLexerConfig,
  type LexerConfig,
} from './config.js';
import { Lexer } from './lexer/tokenizer.js';
import type { LexerObservability } from './lexer/types.js';
import { isTokenKind, type TokenKind } from './token-types.js';

/** Where the source text comes from */
export type LexInput =
  | { kind: 'file'; path: string }
  | { kind: 'stdin' }
  | { kind: 'source'; source: string };

export interface LexFlags {
  json: boolean;
  verbose: boolean;
  skipComments?: boolean | undefined;
  skipNewlines?: boolean | undefined;
  untilKind?: TokenKind | undefined;
  maxTokens?: number | undefined;
  configPath?: string | undefined;
}

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'lex'; input: LexInput; flags: LexFlags }
  | { mode: 'explain'; errorId: string }
  | { mode: 'help' | 'version' };

export const USAGE = `Usage:
  gt-lex <file>          Tokenize a file
  gt-lex -               Read source from stdin
  gt-lex -e <source>     Tokenize an inline source string
  gt-lex --explain <id>  Describe an error id (e.g. GT-L001)

Options:
  --json                 Print tokens as a JSON array
  --skip-comments        Drop comment tokens
  --skip-newlines        Drop newline tokens
  --until <kind>         Stop after the first token of this kind
  --max <n>              Stop after n tokens
  --config <path>        Read options from a YAML file (default: ./.gt-lex.yaml)
  --verbose              Print a run summary to stderr
  --help                 Show this help message
  --version              Show version information`;

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined) {
    throw new Error(`Missing value after ${flag}`);
  }
  return value;
}

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseArgs(argv: string[]): ParsedArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const explainIndex = argv.indexOf('--explain');
  if (explainIndex !== -1) {
    return {
      mode: 'explain',
      errorId: requireValue(argv, explainIndex, '--explain'),
    };
  }

  const flags: LexFlags = { json: false, verbose: false };
  let input: LexInput | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--json':
        flags.json = true;
        break;
      case '--verbose':
        flags.verbose = true;
        break;
      case '--skip-comments':
        flags.skipComments = true;
        break;
      case '--skip-newlines':
        flags.skipNewlines = true;
        break;
      case '--until': {
        const kind = requireValue(argv, i++, arg);
        if (!isTokenKind(kind)) {
          throw new Error(`Unknown token kind: ${kind}`);
        }
        flags.untilKind = kind;
        break;
      }
      case '--max': {
        const value = requireValue(argv, i++, arg);
        const count = Number(value);
        if (!/^\d+$/.test(value) || !Number.isSafeInteger(count)) {
          throw new Error(`Invalid token count: ${value}`);
        }
        flags.maxTokens = count;
        break;
      }
      case '--config':
        flags.configPath = requireValue(argv, i++, arg);
        break;
      case '-e':
        if (input !== undefined) throw new Error('Multiple inputs given');
        input = { kind: 'source', source: requireValue(argv, i++, arg) };
        break;
      case '-':
        if (input !== undefined) throw new Error('Multiple inputs given');
        input = { kind: 'stdin' };
        break;
      default:
        if (arg === undefined || arg.startsWith('-')) {
          throw new Error(`Unknown option: ${String(arg)}`);
        }
        if (input !== undefined) throw new Error('Multiple inputs given');
        input = { kind: 'file', path: arg };
    }
  }

  if (input === undefined) {
    throw new Error('Missing file argument');
  }

  return { mode: 'lex', input, flags };
}

/** Flags override configuration file values */
export function mergeOptions(
  config: LexerConfig,
  flags: LexFlags
): LexerConfig {
  return {
    skipComments: flags.skipComments ?? config.skipComments,
    skipNewlines: flags.skipNewlines ?? config.skipNewlines,
    maxTokens: flags.maxTokens ?? config.maxTokens,
    untilKind: flags.untilKind ?? config.untilKind,
  };
}

async function readInput(input: LexInput): Promise<string> {
  switch (input.kind) {
    case 'file':
      return fs.readFile(input.path, 'utf-8');
    case 'stdin':
      return fsSync.readFileSync(0, 'utf-8');
    case 'source':
      return input.source;
  }
}

async function resolveConfig(flags: LexFlags): Promise<LexerConfig> {
  const configPath = flags.configPath ?? (await findConfigFile(process.cwd()));
  return configPath === null ? {} : loadLexerConfig(configPath);
}

function verboseObservability(): LexerObservability {
  return {
    onRunStart: ({ sourceLength }) => {
      console.error(`Lexing ${sourceLength} characters`);
    },
    onRunEnd: ({ tokenCount, stoppedBy }) => {
      console.error(`Produced ${tokenCount} tokens (stopped by ${stoppedBy})`);
    },
  };
}

/**
 * Tokenize the input described by parsed arguments and return stdout text
 *
 * @throws LexerError on the first lexical error
 */
export async function runLex(
  input: LexInput,
  flags: LexFlags
): Promise<string> {
  const source = await readInput(input);
  const options = mergeOptions(await resolveConfig(flags), flags);

  const lexer = new Lexer({
    skipComments: options.skipComments,
    skipNewlines: options.skipNewlines,
    observability: flags.verbose ? verboseObservability() : undefined,
  });
  lexer.run(source, {
    untilKind: options.untilKind,
    maxTokens: options.maxTokens,
  });

  return formatTokens(lexer.tokens, flags.json);
}

async function readVersion(): Promise<string> {
  const packageJsonPath = path.resolve(
    path.dirname(new URL(import.meta.url).pathname),
    '../package.json'
  );
  try {
    const packageJson: unknown = JSON.parse(
      await fs.readFile(packageJsonPath, 'utf-8')
    );
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch {
    // Fall through to the default version
  }
  return '0.1.0';
}

/**
 * Main CLI entry point
 *
 * Writes tokens to stdout and errors to stderr.
 * Sets process.exitCode to 1 on any error.
 */
export async function main(): Promise<void> {
  try {
    const parsed = parseArgs(process.argv.slice(2));

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return;

      case 'version':
        console.log(await readVersion());
        return;

      case 'explain': {
        const explanation = explainError(parsed.errorId);
        if (explanation === null) {
          throw new Error(`Unknown error ID: ${parsed.errorId}`);
        }
        console.log(explanation);
        return;
      }

      case 'lex': {
        const output = await runLex(parsed.input, parsed.flags);
        if (output.length > 0) console.log(output);
        return;
      }
    }
  } catch (err) {
    if (err instanceof Error) {
      console.error(formatError(err));
    } else {
      console.error(formatError(new Error(String(err))));
    }
    process.exitCode = 1;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  void main();
}
