/**
 * Argument Tokenizer Tests
 */

import { describe, it, expect } from 'vitest';
import { ArgumentFormatError } from '../src/errors.js';
import { formatArguments, quoteString, tokenizeArguments } from '../src/fdo/index.js';
import { getDefaultSymbolTable } from '../src/symbols/index.js';
import type { ArgValue, AtomNode } from '../src/types.js';

const symbols = getDefaultSymbolTable();

function nodeFor(mnemonic: string, rawArguments: string, sourceLine = 1): AtomNode {
  return { definition: symbols.require(mnemonic), rawArguments, children: [], depth: 0, sourceLine };
}

function valuesOf(mnemonic: string, rawArguments: string): ArgValue[] {
  return tokenizeArguments(nodeFor(mnemonic, rawArguments), symbols).map((arg) => arg.value);
}

function failureOf(mnemonic: string, rawArguments: string): ArgumentFormatError {
  try {
    tokenizeArguments(nodeFor(mnemonic, rawArguments, 9), symbols);
  } catch (error) {
    if (error instanceof ArgumentFormatError) {
      return error;
    }
    throw error;
  }
  throw new Error(`${mnemonic} ${rawArguments} was accepted`);
}

describe('Argument Tokenizer', () => {
  describe('typed values', () => {
    it('should read an enum label and a quoted string', () => {
      expect(valuesOf('man_start_object', '<independent, "Test">')).toEqual([
        { kind: 'enum-ref', enumName: 'object_type', code: 1 },
        { kind: 'quoted-string', value: 'Test' },
      ]);
    });

    it('should read hex bytes in either case', () => {
      expect(valuesOf('idb_append_data', '<0ax, FFx, 7X>')).toEqual([
        { kind: 'hex-byte', value: 10 },
        { kind: 'hex-byte', value: 255 },
        { kind: 'hex-byte', value: 7 },
      ]);
    });

    it('should read signed integers', () => {
      expect(valuesOf('mat_width', '<-5>')).toEqual([{ kind: 'integer', value: -5 }]);
      expect(valuesOf('mat_width', '<2147483647>')).toEqual([{ kind: 'integer', value: 2147483647 }]);
    });

    it('should read coordinate pairs', () => {
      expect(valuesOf('sm_send_k1', '<32-105>')).toEqual([{ kind: 'coordinate-pair', value: [32, 105] }]);
    });

    it('should accept enum codes as numbers', () => {
      expect(valuesOf('mat_orientation', '<22>')).toEqual([{ kind: 'enum-ref', enumName: 'orientation', code: 22 }]);
    });

    it('should unescape quotes and backslashes', () => {
      expect(valuesOf('chat_message', '<"say \\"hi\\" \\\\ bye">')).toEqual([
        { kind: 'quoted-string', value: 'say "hi" \\ bye' },
      ]);
    });

    it('should read control characters from escapes', () => {
      expect(valuesOf('chat_message', '<"a\\r\\nb\\t\\x01\\x7F">')).toEqual([
        { kind: 'quoted-string', value: 'a\r\nb\t\x01\x7f' },
      ]);
    });

    it('should keep the backslash of an unknown escape', () => {
      expect(valuesOf('chat_message', '<"c:\\dir \\x4">')).toEqual([{ kind: 'quoted-string', value: 'c:\\dir \\x4' }]);
    });

    it('should keep commas inside strings', () => {
      expect(valuesOf('man_start_object', '<independent, "a, b">')[1]).toEqual({
        kind: 'quoted-string',
        value: 'a, b',
      });
    });

    it('should give a trailing raw argument the rest of the text', () => {
      expect(valuesOf('mat_field_script', '<a, b "c">')).toEqual([{ kind: 'opaque', value: 'a, b "c"' }]);
    });

    it('should read arguments written without brackets', () => {
      expect(valuesOf('mat_size', '10, 20')).toEqual([
        { kind: 'integer', value: 10 },
        { kind: 'integer', value: 20 },
      ]);
    });
  });

  describe('arity', () => {
    it('should allow optional arguments to be left out', () => {
      expect(valuesOf('mat_size', '<10, 20>')).toHaveLength(2);
      expect(valuesOf('mat_size', '<10, 20, 30>')).toHaveLength(3);
      expect(valuesOf('uni_start_stream', '')).toEqual([]);
    });

    it('should allow zero or more repeated arguments', () => {
      expect(valuesOf('uni_data', '')).toEqual([]);
      expect(valuesOf('uni_data', '<01x, 02x>')).toHaveLength(2);
    });

    it('should require at least one argument for one-or-more', () => {
      const error = failureOf('idb_append_data', '');
      expect(error.message).toBe('line 9: idb_append_data: missing hex byte argument (at "")');
    });

    it('should reject extra arguments', () => {
      const error = failureOf('mat_width', '<1, 2>');
      expect(error.message).toBe('line 9: mat_width: unexpected extra argument (at "2")');
    });
  });

  describe('errors', () => {
    it('should carry the mnemonic, line and offending text', () => {
      const error = failureOf('idb_append_data', '<01x, 02x, ff>');
      expect(error.mnemonic).toBe('idb_append_data');
      expect(error.line).toBe(9);
      expect(error.offending).toBe('ff');
      expect(error.code).toBe('argument_format_error');
    });

    it('should reject integers outside the signed 32-bit range', () => {
      expect(failureOf('mat_width', '<2147483648>').message).toBe(
        'line 9: mat_width: integer outside the signed 32-bit range (at "2147483648")'
      );
    });

    it('should reject unknown enum labels', () => {
      expect(failureOf('mat_orientation', '<sideways>').offending).toBe('sideways');
    });

    it('should reject a trailing comma', () => {
      expect(failureOf('mat_size', '<1, 2,>').message).toBe(
        'line 9: mat_size: missing argument after "," (at "<1, 2,>")'
      );
    });

    it('should reject an unterminated list or string', () => {
      expect(failureOf('mat_width', '<1').message).toContain('unterminated argument list');
      expect(failureOf('chat_message', '<"open>').message).toContain('unterminated string');
    });

    it('should reject text outside Latin-1', () => {
      expect(failureOf('chat_message', '<"\u2603">').message).toContain('character outside Latin-1');
    });

    it('should reject a bare word where a string is expected', () => {
      expect(failureOf('chat_message', '<hello>').message).toContain('expected a quoted string');
    });
  });

  describe('formatArguments', () => {
    it('should write values in canonical form', () => {
      expect(formatArguments(valuesOf('man_start_object', '<1,"Test">'), symbols)).toBe('<independent, "Test">');
      expect(formatArguments(valuesOf('idb_append_data', '<aX,1x>'), symbols)).toBe('<0ax, 01x>');
      expect(formatArguments(valuesOf('chat_message', '<"a \\"b\\" \\\\">'), symbols)).toBe('<"a \\"b\\" \\\\">');
      expect(formatArguments([], symbols)).toBe('');
    });

    it('should escape control characters so a string stays on one line', () => {
      expect(quoteString('line1\rline2\n\t\x00\x7f"')).toBe('"line1\\rline2\\n\\t\\x00\\x7f\\""');
      expect(quoteString('caf\u00e9')).toBe('"caf\u00e9"');
    });

    it('should fall back to the number for unlabelled enum codes', () => {
      expect(formatArguments(valuesOf('mat_orientation', '<900>'), symbols)).toBe('<900>');
    });
  });
});
