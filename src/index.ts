/**
 * arith-scan Module
 * Exports the scanner, token types and errors
 */

export {
  createScanner,
  isDigit,
  isIdentifierChar,
  isLetter,
  isWhitespace,
  LexerError,
  nextToken,
  tokenize,
  type ScannerOptions,
  type ScannerState,
} from './lexer/index.js';

export * from './types.js';
