/**
 * CLI Tests: arith-scan command
 */

import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import * as yaml from 'yaml';
import {
  DEMO_SOURCE,
  main,
  parseArgs,
  readInput,
  scanSource,
} from '../../src/cli-scan.js';
import { formatError, formatToken, formatTokens } from '../../src/cli-shared.js';
import {
  LexerError,
  SCAN_ERROR_CODES,
  ScanError,
  TOKEN_TYPES,
} from '../../src/index.js';

describe('arith-scan', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'arith-scan-test-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true });
  });

  describe('parseArgs', () => {
    it('scans the demo input by default', () => {
      expect(parseArgs([])).toEqual({
        mode: 'scan',
        input: { kind: 'text', text: DEMO_SOURCE },
        strict: false,
        format: 'text',
      });
    });

    it('parses flags and an expression', () => {
      expect(parseArgs(['--strict', '--format', 'json', '1+2'])).toEqual({
        mode: 'scan',
        input: { kind: 'text', text: '1+2' },
        strict: true,
        format: 'json',
      });
    });

    it('parses file and stdin inputs', () => {
      expect(parseArgs(['--file', 'expr.txt'])).toMatchObject({
        input: { kind: 'file', path: 'expr.txt' },
      });
      expect(parseArgs(['-'])).toMatchObject({ input: { kind: 'stdin' } });
    });

    it('takes arguments after -- as the expression', () => {
      expect(parseArgs(['--', '-5'])).toMatchObject({
        input: { kind: 'text', text: '-5' },
      });
    });

    it('recognizes help and version in any position', () => {
      expect(parseArgs(['x', '--help'])).toEqual({ mode: 'help' });
      expect(parseArgs(['-h'])).toEqual({ mode: 'help' });
      expect(parseArgs(['--version'])).toEqual({ mode: 'version' });
      expect(parseArgs(['-v'])).toEqual({ mode: 'version' });
    });

    it('throws for unknown options', () => {
      expect(() => parseArgs(['-x'])).toThrow('Unknown option: -x');
      expect(() => parseArgs(['--verbose'])).toThrow(
        'Unknown option: --verbose'
      );
    });

    it('throws for a second input', () => {
      expect(() => parseArgs(['a', 'b'])).toThrow('Unexpected argument: b');
      expect(() => parseArgs(['a', '-'])).toThrow('Unexpected argument: -');
    });

    it('throws for a missing or invalid format', () => {
      expect(() => parseArgs(['--format'])).toThrow(
        'Missing value for --format'
      );
      expect(() => parseArgs(['--format', 'xml'])).toThrow(
        'Invalid format: xml (expected text, json or yaml)'
      );
    });

    it('uses CLI error codes', () => {
      try {
        parseArgs(['--file']);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ScanError);
        if (!(err instanceof ScanError)) return;
        expect(err.code).toBe(SCAN_ERROR_CODES.CLI_MISSING_ARGUMENT);
      }
    });
  });

  describe('readInput', () => {
    it('returns inline text', async () => {
      expect(await readInput({ kind: 'text', text: 'a + b' })).toBe('a + b');
    });

    it('reads a file', async () => {
      const file = path.join(tempDir, 'expr.txt');
      await fs.writeFile(file, '(1 + 2)\n* 3');
      expect(await readInput({ kind: 'file', path: file })).toBe('(1 + 2)\n* 3');
    });

    it('rejects for a missing file', async () => {
      const file = path.join(tempDir, 'missing.txt');
      const err = await readInput({ kind: 'file', path: file }).then(
        () => undefined,
        (e: unknown) => e
      );
      expect(err).toBeInstanceOf(Error);
      if (!(err instanceof Error)) return;
      expect(formatError(err)).toBe(`File not found: ${file}`);
    });
  });

  describe('scanSource', () => {
    it('drops the EOF token', () => {
      expect(scanSource('a * 2').map((t) => t.type)).toEqual([
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.STAR,
        TOKEN_TYPES.NUMBER,
      ]);
    });

    it('stops at the first unrecognized character of the demo input', () => {
      expect(scanSource(DEMO_SOURCE).map((t) => t.lexeme)).toEqual([
        'var',
        'x',
      ]);
    });

    it('throws in strict mode', () => {
      expect(() => scanSource(DEMO_SOURCE, true)).toThrow(LexerError);
    });
  });

  describe('formatting', () => {
    it('formats a token line', () => {
      const [token] = scanSource('  42');
      expect(token).toBeDefined();
      if (!token) return;
      expect(formatToken(token)).toBe('Token: NUMBER "42" at 1:3');
    });

    it('formats tokens as text', () => {
      expect(formatTokens(scanSource('x + 42'), 'text')).toBe(
        [
          'Token: IDENTIFIER "x" at 1:1',
          'Token: PLUS "+" at 1:3',
          'Token: NUMBER "42" at 1:5',
        ].join('\n')
      );
    });

    it('formats no tokens as empty text', () => {
      expect(formatTokens([], 'text')).toBe('');
    });

    it('formats tokens as JSON', () => {
      const tokens = scanSource('(a)');
      const output = formatTokens(tokens, 'json');
      expect(JSON.parse(output)).toEqual(tokens);
      expect(output.startsWith('[\n  {\n    "type": "LPAREN"')).toBe(true);
    });

    it('formats tokens as YAML', () => {
      const tokens = scanSource('b / 7');
      const output = formatTokens(tokens, 'yaml');
      expect(yaml.parse(output)).toEqual(tokens);
      expect(output.startsWith('- type: IDENTIFIER\n  lexeme: b\n')).toBe(true);
    });

    it('formats lexer errors with the line', () => {
      const error = new LexerError('Unexpected character: ;', {
        line: 2,
        column: 3,
        offset: 6,
      });
      expect(formatError(error)).toBe(
        'Lexer error at line 2: Unexpected character: ;'
      );
    });

    it('points unknown options at --help', () => {
      const error = new ScanError({
        code: SCAN_ERROR_CODES.CLI_UNKNOWN_OPTION,
        message: 'Unknown option: -x',
      });
      expect(formatError(error)).toBe('Unknown option: -x (see --help)');
    });

    it('passes other errors through', () => {
      expect(formatError(new Error('boom'))).toBe('boom');
    });
  });

  describe('main', () => {
    const originalArgv = process.argv;

    afterEach(() => {
      process.argv = originalArgv;
      process.exitCode = undefined;
      vi.restoreAllMocks();
    });

    it('prints tokens for an expression', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      process.argv = ['node', 'arith-scan', '1 + 2'];
      await main();
      expect(log).toHaveBeenCalledWith(
        'Token: NUMBER "1" at 1:1\nToken: PLUS "+" at 1:3\nToken: NUMBER "2" at 1:5'
      );
    });

    it('prints the package version', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      process.argv = ['node', 'arith-scan', '--version'];
      await main();
      expect(log).toHaveBeenCalledWith('arith-scan 0.1.0');
    });

    it('prints nothing when the input has no tokens', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      process.argv = ['node', 'arith-scan', '@'];
      await main();
      expect(log).not.toHaveBeenCalled();
      expect(process.exitCode).toBeUndefined();
    });

    it('scans a file as JSON', async () => {
      const file = path.join(tempDir, 'main.txt');
      await fs.writeFile(file, '(x)\n');
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      process.argv = ['node', 'arith-scan', '--file', file, '--format', 'json'];
      await main();
      expect(log).toHaveBeenCalledTimes(1);
      expect(log).toHaveBeenCalledWith(
        JSON.stringify(scanSource('(x)\n'), null, 2)
      );
    });

    it('prints YAML output', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      process.argv = ['node', 'arith-scan', '--format', 'yaml', '7'];
      await main();
      expect(log).toHaveBeenCalledWith(yaml.stringify(scanSource('7')));
    });

    it('reports a strict-mode lexer error and exits with 1', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      process.argv = ['node', 'arith-scan', '--strict', 'a ; b'];
      await main();
      expect(log).not.toHaveBeenCalled();
      expect(error).toHaveBeenCalledWith(
        'Lexer error at line 1: Unexpected character: ;'
      );
      expect(process.exitCode).toBe(1);
    });

    it('reports an unknown option and exits with 1', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      process.argv = ['node', 'arith-scan', '--verbose'];
      await main();
      expect(error).toHaveBeenCalledWith(
        'Unknown option: --verbose (see --help)'
      );
      expect(process.exitCode).toBe(1);
    });

    it('reports a missing file and exits with 1', async () => {
      const file = path.join(tempDir, 'absent.txt');
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      process.argv = ['node', 'arith-scan', '--file', file];
      await main();
      expect(error).toHaveBeenCalledWith(`File not found: ${file}`);
      expect(process.exitCode).toBe(1);
    });
  });
});
