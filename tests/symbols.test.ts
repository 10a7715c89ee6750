/**
 * Symbol Table Tests
 */

import { describe, it, expect } from 'vitest';
import {
  buildSymbolTable,
  formatArgParam,
  getDefaultSymbolTable,
  parseArgParam,
} from '../src/symbols/index.js';
import { LookupError, SymbolTableError } from '../src/errors.js';

function issuesOf(content: unknown): string[] {
  try {
    buildSymbolTable(content);
  } catch (error) {
    if (error instanceof SymbolTableError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe('Symbol Table', () => {
  const symbols = getDefaultSymbolTable();

  describe('lookup', () => {
    it('should resolve a mnemonic to its definition', () => {
      const def = symbols.lookup('man_start_object');
      expect(def?.protocol).toBe(1);
      expect(def?.atom).toBe(0);
      expect(def?.code).toBe(256);
      expect(def?.role).toBe('object-start');
      expect(def?.argSignature).toEqual([
        { type: { kind: 'enum-ref', enumName: 'object_type' }, arity: 'one' },
        { type: { kind: 'quoted-string' }, arity: 'one' },
      ]);
    });

    it('should be case-sensitive', () => {
      expect(symbols.lookup('MAN_START_OBJECT')).toBeUndefined();
      expect(symbols.lookup('Uni_start_stream')).toBeUndefined();
    });

    it('should raise LookupError with the line from require', () => {
      expect(() => symbols.require('man_bogus', 7)).toThrow(LookupError);
      expect(() => symbols.require('man_bogus', 7)).toThrow('line 7: unknown mnemonic "man_bogus"');
    });

    it('should find definitions by code', () => {
      expect(symbols.byCode(16 * 256 + 2)?.mnemonic).toBe('mat_object_id');
      expect(symbols.byCode(31 * 256 + 255)).toBeUndefined();
    });

    it('should freeze definitions', () => {
      const def = symbols.require('uni_start_stream');
      expect(Object.isFrozen(def)).toBe(true);
      expect(Object.isFrozen(def.argSignature)).toBe(true);
      expect(Object.isFrozen(symbols)).toBe(true);
    });
  });

  describe('enums', () => {
    it('should resolve labels both ways', () => {
      expect(symbols.enumCode('object_type', 'independent')).toBe(1);
      expect(symbols.enumCode('orientation', 'vcf')).toBe(22);
      expect(symbols.enumLabel('orientation', 22)).toBe('vcf');
      expect(symbols.enumLabel('boolean', 5)).toBeUndefined();
      expect(symbols.enumCode('nope', 'yes')).toBeUndefined();
    });
  });

  describe('argument signatures', () => {
    it('should parse signature entries', () => {
      expect(parseArgParam('enum:criterion?')).toEqual({
        type: { kind: 'enum-ref', enumName: 'criterion' },
        arity: 'optional',
      });
      expect(parseArgParam('hex-byte*')).toEqual({ type: { kind: 'hex-byte' }, arity: 'many' });
      expect(parseArgParam('string')).toEqual({ type: { kind: 'quoted-string' }, arity: 'one' });
      expect(parseArgParam('float')).toBeNull();
    });

    it('should format entries back to their text form', () => {
      for (const text of ['integer', 'hex-byte+', 'string', 'coordinate-pair?', 'enum:font', 'opaque?']) {
        const param = parseArgParam(text);
        expect(param).not.toBeNull();
        if (param) {
          expect(formatArgParam(param)).toBe(text);
        }
      }
    });
  });

  describe('loading', () => {
    const enums = { boolean: { no: 0, yes: 1 } };

    it('should build a table from valid rows', () => {
      const table = buildSymbolTable({
        enums,
        atoms: [{ mnemonic: 'x_flag', protocol: 3, atom: 4, args: ['enum:boolean'] }],
      });
      expect(table.size).toBe(1);
      expect(table.lookup('x_flag')?.code).toBe(3 * 256 + 4);
    });

    it('should reject duplicate mnemonics and codes', () => {
      const issues = issuesOf({
        atoms: [
          { mnemonic: 'a', protocol: 0, atom: 1 },
          { mnemonic: 'a', protocol: 0, atom: 2 },
          { mnemonic: 'b', protocol: 0, atom: 1 },
        ],
      });
      expect(issues).toEqual(['a: duplicate mnemonic', 'b: code 0/1 already used by a']);
    });

    it('should reject out-of-range protocols and enum codes', () => {
      const issues = issuesOf({
        enums: { big: { huge: 16384 } },
        atoms: [{ mnemonic: 'a', protocol: 32, atom: 0 }],
      });
      expect(issues).toEqual([
        'enum big.huge: code must be an integer in 0..16383',
        'a: protocol must be an integer in 0..31',
      ]);
    });

    it('should reject unknown enums and bad signature orderings', () => {
      const issues = issuesOf({
        enums,
        atoms: [
          { mnemonic: 'a', protocol: 0, atom: 0, args: ['enum:colour'] },
          { mnemonic: 'b', protocol: 0, atom: 1, args: ['integer?', 'integer'] },
          { mnemonic: 'c', protocol: 0, atom: 2, args: ['string*'] },
          { mnemonic: 'd', protocol: 0, atom: 3, args: ['hex-byte*', 'integer'] },
          { mnemonic: 'e', protocol: 0, atom: 4, role: 'object-middle' },
        ],
      });
      expect(issues).toEqual([
        'a: unknown enum "colour"',
        'b: required arguments cannot follow optional ones',
        'c: text arguments cannot repeat',
        'd: a repeated argument must be the last one',
        'e: unknown role "object-middle"',
      ]);
    });

    it('should reject content that is not a table', () => {
      expect(issuesOf([])).toEqual(['table must be a JSON object']);
      expect(issuesOf({ atoms: 'none' })).toEqual(['atoms must be an array']);
    });
  });
});
