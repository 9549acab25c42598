/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { SourceLocation, Token, TokenType } from '../types.js';
import { advance, currentLocation, type ScannerState } from './state.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

export function isIdentifierChar(ch: string): boolean {
  return isLetter(ch) || isDigit(ch);
}

/** Whitespace that leaves the line counter alone; newlines are handled apart */
export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r';
}

export function makeToken(
  type: TokenType,
  lexeme: string,
  start: SourceLocation,
  end: SourceLocation
): Token {
  return { type, lexeme, line: start.line, span: { start, end } };
}

/** Advance once and return a single-character token */
export function advanceAndMakeToken(
  state: ScannerState,
  type: TokenType,
  start: SourceLocation
): Token {
  const lexeme = advance(state);
  return makeToken(type, lexeme, start, currentLocation(state));
}
