/**
 * Scanner State
 * Tracks position in source text during tokenization
 */

import type { SourceLocation } from '../types.js';

export interface ScannerOptions {
  /**
   * What to do with a character outside the grammar.
   * 'end' stops the scan with EOF, 'throw' raises a LexerError.
   * Either way the scanner is exhausted afterwards.
   */
  readonly onUnexpected?: 'end' | 'throw';
}

export interface ScannerState {
  readonly source: string;
  readonly options: Required<ScannerOptions>;
  /** Offset of the first character of the token being built */
  start: number;
  /** Offset of the next character to examine */
  current: number;
  line: number;
  column: number;
  exhausted: boolean;
}

export function createScanner(
  source: string,
  options: ScannerOptions = {}
): ScannerState {
  return {
    source,
    options: { onUnexpected: options.onUnexpected ?? 'end' },
    start: 0,
    current: 0,
    line: 1,
    column: 1,
    exhausted: false,
  };
}

export function currentLocation(state: ScannerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.current };
}

export function peek(state: ScannerState, offset = 0): string {
  return state.source[state.current + offset] ?? '';
}

export function advance(state: ScannerState): string {
  const ch = state.source[state.current] ?? '';
  state.current++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

export function isAtEnd(state: ScannerState): boolean {
  return state.current >= state.source.length;
}
