#!/usr/bin/env node
/**
 * arith-scan CLI - Scan arithmetic expressions into tokens
 *
 * Usage:
 *   arith-scan 'x + 42'
 *   arith-scan --file expr.txt --format json
 *   echo '1 * 2' | arith-scan -
 */

import * as fs from 'fs/promises';
import * as fsSync from 'fs';
import { tokenize } from './index.js';
import { SCAN_ERROR_CODES, ScanError, TOKEN_TYPES } from './types.js';
import type { Token } from './types.js';
import {
  formatError,
  formatTokens,
  isOutputFormat,
  type OutputFormat,
} from './cli-shared.js';

/** Input scanned when no expression, file or stdin is given */
export const DEMO_SOURCE = 'var x = 42 + 3 * (y - 5)';

export type ScanInput =
  | { kind: 'text'; text: string }
  | { kind: 'file'; path: string }
  | { kind: 'stdin' };

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'scan'; input: ScanInput; strict: boolean; format: OutputFormat }
  | { mode: 'help' | 'version' };

/** Only one input source may be given */
function chooseInput(
  current: ScanInput | undefined,
  next: ScanInput,
  arg: string
): ScanInput {
  if (current) {
    throw new ScanError({
      code: SCAN_ERROR_CODES.CLI_UNKNOWN_OPTION,
      message: `Unexpected argument: ${arg}`,
    });
  }
  return next;
}

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined) {
    throw new ScanError({
      code: SCAN_ERROR_CODES.CLI_MISSING_ARGUMENT,
      message: `Missing value for ${flag}`,
    });
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
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let input: ScanInput | undefined;
  let strict = false;
  let format: OutputFormat = 'text';
  let positionalOnly = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (positionalOnly) {
      input = chooseInput(input, { kind: 'text', text: arg }, arg);
      continue;
    }

    switch (arg) {
      case '--':
        positionalOnly = true;
        break;
      case '-':
        input = chooseInput(input, { kind: 'stdin' }, arg);
        break;
      case '--strict':
        strict = true;
        break;
      case '--file': {
        const path = requireValue(argv, ++i, arg);
        input = chooseInput(input, { kind: 'file', path }, path);
        break;
      }
      case '--format': {
        const value = requireValue(argv, ++i, arg);
        if (!isOutputFormat(value)) {
          throw new ScanError({
            code: SCAN_ERROR_CODES.CLI_INVALID_FORMAT,
            message: `Invalid format: ${value} (expected text, json or yaml)`,
          });
        }
        format = value;
        break;
      }
      default:
        if (arg.startsWith('-')) {
          throw new ScanError({
            code: SCAN_ERROR_CODES.CLI_UNKNOWN_OPTION,
            message: `Unknown option: ${arg}`,
          });
        }
        input = chooseInput(input, { kind: 'text', text: arg }, arg);
    }
  }

  return {
    mode: 'scan',
    input: input ?? { kind: 'text', text: DEMO_SOURCE },
    strict,
    format,
  };
}

/**
 * Load the text to scan
 *
 * @throws Error with code ENOENT if the file does not exist
 */
export async function readInput(input: ScanInput): Promise<string> {
  switch (input.kind) {
    case 'text':
      return input.text;
    case 'file':
      return fs.readFile(input.path, 'utf-8');
    case 'stdin':
      // stdin must use the sync API
      return fsSync.readFileSync(0, 'utf-8');
  }
}

/**
 * Scan source text and return every token before end-of-input
 *
 * @param strict - Throw a LexerError on characters outside the grammar
 */
export function scanSource(source: string, strict = false): Token[] {
  return tokenize(source, { onUnexpected: strict ? 'throw' : 'end' }).filter(
    (token) => token.type !== TOKEN_TYPES.EOF
  );
}

function showHelp(): void {
  console.log(`Arithmetic Expression Scanner

Usage:
  arith-scan [expression]           Scan an expression (default: "${DEMO_SOURCE}")
  arith-scan --file <path>          Scan the contents of a file
  arith-scan -                      Scan text read from stdin
  arith-scan --help                 Show this help message
  arith-scan --version              Show version information

Options:
  --strict                          Report unexpected characters as errors
  --format <text|json|yaml>         Output format (default: text)

Examples:
  arith-scan 'x1 + 42'
  arith-scan --format json '(a - b) / 2'`);
}

async function showVersion(): Promise<void> {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson = JSON.parse(await fs.readFile(packageJsonPath, 'utf-8')) as {
    version: string;
  };
  console.log(`arith-scan ${packageJson.version}`);
}

/**
 * Entry point for the arith-scan binary
 *
 * Writes tokens to stdout and errors to stderr.
 * Sets exit code 1 on any error.
 */
export async function main(): Promise<void> {
  try {
    const parsed = parseArgs(process.argv.slice(2));

    switch (parsed.mode) {
      case 'help':
        showHelp();
        return;

      case 'version':
        await showVersion();
        return;

      case 'scan': {
        const source = await readInput(parsed.input);
        const tokens = scanSource(source, parsed.strict);
        if (tokens.length > 0) {
          console.log(formatTokens(tokens, parsed.format));
        }
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
