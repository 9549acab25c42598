/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import {
  advanceAndMakeToken,
  isDigit,
  isLetter,
  isWhitespace,
  makeToken,
} from './helpers.js';
import { SINGLE_CHAR_OPERATORS } from './operators.js';
import { readIdentifier, readNumber } from './readers.js';
import {
  advance,
  createScanner,
  currentLocation,
  isAtEnd,
  peek,
  type ScannerOptions,
  type ScannerState,
} from './state.js';

/** Skips blanks and newlines; advance() bumps the line on '\n' */
function skipWhitespace(state: ScannerState): void {
  while (!isAtEnd(state)) {
    const ch = peek(state);
    if (!isWhitespace(ch) && ch !== '\n') return;
    advance(state);
  }
}

function endOfInput(state: ScannerState): Token {
  state.exhausted = true;
  const loc = currentLocation(state);
  return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
}

export function nextToken(state: ScannerState): Token {
  if (state.exhausted) {
    return endOfInput(state);
  }

  skipWhitespace(state);

  if (isAtEnd(state)) {
    return endOfInput(state);
  }

  state.start = state.current;
  const start = currentLocation(state);
  const ch = peek(state);

  if (isLetter(ch)) {
    return readIdentifier(state);
  }

  // Number (digits only - sign handled as a MINUS token)
  if (isDigit(ch)) {
    return readNumber(state);
  }

  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return advanceAndMakeToken(state, singleCharType, start);
  }

  // Unrecognized character: the scan ends here and stays ended
  if (state.options.onUnexpected === 'throw') {
    state.exhausted = true;
    const char = String.fromCodePoint(
      state.source.codePointAt(state.current) ?? 0
    );
    throw new LexerError(`Unexpected character: ${char}`, start, { char });
  }
  return endOfInput(state);
}

export function tokenize(source: string, options?: ScannerOptions): Token[] {
  const state = createScanner(source, options);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}
