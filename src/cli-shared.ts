/**
 * CLI Shared Utilities
 * Token and error formatting for the arith-scan binary
 */

import * as yaml from 'yaml';
import { LexerError } from './lexer/errors.js';
import { SCAN_ERROR_CODES, ScanError } from './types.js';
import type { Token } from './types.js';

export const OUTPUT_FORMATS = ['text', 'json', 'yaml'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

/**
 * Render one token as a driver line
 *
 * @example formatToken(token) // 'Token: NUMBER "42" at 1:9'
 */
export function formatToken(token: Token): string {
  const { line, column } = token.span.start;
  return `Token: ${token.type} ${JSON.stringify(token.lexeme)} at ${line}:${column}`;
}

/**
 * Render a token list in the requested output format
 *
 * Text output is one line per token. JSON and YAML output the token
 * objects as-is, spans included.
 */
export function formatTokens(
  tokens: readonly Token[],
  format: OutputFormat
): string {
  switch (format) {
    case 'text':
      return tokens.map(formatToken).join('\n');
    case 'json':
      return JSON.stringify(tokens, null, 2);
    case 'yaml':
      return yaml.stringify(tokens);
  }
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: Error): string {
  if (err instanceof LexerError) {
    return `Lexer error at line ${err.location.line}: ${err.toData().message}`;
  }

  if (err instanceof ScanError) {
    const { code, message } = err.toData();
    if (code === SCAN_ERROR_CODES.CLI_UNKNOWN_OPTION) {
      return `${message} (see --help)`;
    }
    return message;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}
