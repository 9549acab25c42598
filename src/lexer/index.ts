/**
 * Lexer Module
 * Converts source text into tokens
 */

export { LexerError } from './errors.js';
export {
  isDigit,
  isIdentifierChar,
  isLetter,
  isWhitespace,
} from './helpers.js';
export {
  createScanner,
  type ScannerOptions,
  type ScannerState,
} from './state.js';
export { nextToken, tokenize } from './tokenizer.js';
