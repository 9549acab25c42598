/**
 * Token Readers
 * Functions to read multi-character tokens from source
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { isDigit, isIdentifierChar, makeToken } from './helpers.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type ScannerState,
  peek,
} from './state.js';

/** The text between the token-start marker and the cursor */
function currentLexeme(state: ScannerState): string {
  return state.source.slice(state.start, state.current);
}

export function readNumber(state: ScannerState): Token {
  const start = currentLocation(state);

  while (!isAtEnd(state) && isDigit(peek(state))) {
    advance(state);
  }

  return makeToken(
    TOKEN_TYPES.NUMBER,
    currentLexeme(state),
    start,
    currentLocation(state)
  );
}

/** Letters and digits after a leading letter; there are no keywords */
export function readIdentifier(state: ScannerState): Token {
  const start = currentLocation(state);

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    advance(state);
  }

  return makeToken(
    TOKEN_TYPES.IDENTIFIER,
    currentLexeme(state),
    start,
    currentLocation(state)
  );
}
