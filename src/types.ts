/**
 * Scanner Types
 * Source locations, error hierarchy and token definitions
 */

// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

// ============================================================
// ERROR HIERARCHY
// ============================================================

/** Error codes for programmatic handling */
export const SCAN_ERROR_CODES = {
  // Lexer errors
  LEX_UNEXPECTED_CHARACTER: 'LEX_UNEXPECTED_CHARACTER',

  // CLI errors
  CLI_UNKNOWN_OPTION: 'CLI_UNKNOWN_OPTION',
  CLI_MISSING_ARGUMENT: 'CLI_MISSING_ARGUMENT',
  CLI_INVALID_FORMAT: 'CLI_INVALID_FORMAT',
} as const;

export type ScanErrorCode =
  (typeof SCAN_ERROR_CODES)[keyof typeof SCAN_ERROR_CODES];

/** Structured error data for host applications */
export interface ScanErrorData {
  readonly code: ScanErrorCode;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Base error class for all scanner errors.
 * `message` carries a ` at line:column` suffix when a location is known;
 * `detail` keeps the bare text.
 */
export class ScanError extends Error {
  readonly code: ScanErrorCode;
  readonly detail: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: ScanErrorData) {
    const loc = data.location;
    super(loc ? `${data.message} at ${loc.line}:${loc.column}` : data.message);
    this.name = 'ScanError';
    this.code = data.code;
    this.detail = data.message;
    this.location = data.location;
    this.context = data.context;
  }

  toData(): ScanErrorData {
    return {
      code: this.code,
      message: this.detail,
      location: this.location,
      context: this.context,
    };
  }
}

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  EOF: 'EOF',
  IDENTIFIER: 'IDENTIFIER',
  NUMBER: 'NUMBER',

  // Operators
  PLUS: 'PLUS',
  MINUS: 'MINUS',
  STAR: 'STAR',
  SLASH: 'SLASH',

  // Delimiters
  LPAREN: 'LPAREN',
  RPAREN: 'RPAREN',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  /** Exact source text of the token; empty for EOF */
  readonly lexeme: string;
  /** Line of the token's first character */
  readonly line: number;
  readonly span: SourceSpan;
  /** Reserved for a decoded value. The scanner leaves it unset. */
  readonly literal?: unknown;
}
