/**
 * Lexer Errors
 */

import { ScanError, SCAN_ERROR_CODES } from '../types.js';
import type { ScanErrorCode, SourceLocation } from '../types.js';

export class LexerError extends ScanError {
  // Override to make location required (lexer errors always have location)
  override readonly location: SourceLocation;

  constructor(
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>,
    code: ScanErrorCode = SCAN_ERROR_CODES.LEX_UNEXPECTED_CHARACTER
  ) {
    super({ code, message, location, context });
    this.name = 'LexerError';
    this.location = location;
  }
}
