/**
 * Stream Encoder Tests
 */

import { describe, it, expect } from 'vitest';
import { EncodingError } from '../src/errors.js';
import {
  createCompiler,
  debugLayout,
  readCompactUint,
  streamBytes,
  toHex,
  unzigzag,
  writeCompactUint,
  zigzag,
  ByteReader,
  ByteWriter,
  type LayoutStrategy,
} from '../src/fdo/index.js';
import type { Variant } from '../src/types.js';
import {
  ACTION_SOURCE,
  NESTED_DEBUG_HEX,
  NESTED_PRODUCTION_HEX,
  NESTED_SOURCE,
  ROOM_DEBUG_HEX,
  ROOM_PRODUCTION_HEX,
  ROOM_SOURCE,
  RUN_DEBUG_HEX,
  RUN_PRODUCTION_HEX,
  RUN_SOURCE,
} from './samples.js';

const compiler = createCompiler();

function compileHex(source: string, variant: Variant): string {
  return toHex(streamBytes(compiler.compile(source, variant)));
}

describe('Stream Encoder', () => {
  describe('debug variant', () => {
    it('should write fixed-width records', () => {
      expect(compileHex(ROOM_SOURCE, 'debug')).toBe(ROOM_DEBUG_HEX);
    });

    it('should record nesting depth per record', () => {
      expect(compileHex(NESTED_SOURCE, 'debug')).toBe(NESTED_DEBUG_HEX);
    });

    it('should write enum codes as two bytes and integers as four', () => {
      expect(compileHex(RUN_SOURCE, 'debug')).toBe(RUN_DEBUG_HEX);
    });

    it('should write negative integers in two\'s complement', () => {
      const source = 'uni_start_stream\nmat_width <-1>\nuni_end_stream\n';
      expect(compileHex(source, 'debug')).toBe('00 01 00 01 00 00 00 10 14 00 00 04 ff ff ff ff 00 02 00 00 00');
    });
  });

  describe('production variant', () => {
    it('should write compact records', () => {
      expect(compileHex(ROOM_SOURCE, 'production')).toBe(ROOM_PRODUCTION_HEX);
    });

    it('should flag depth changes and empty records', () => {
      expect(compileHex(NESTED_SOURCE, 'production')).toBe(NESTED_PRODUCTION_HEX);
    });

    it('should fold a repeated protocol into the flag byte', () => {
      expect(compileHex(RUN_SOURCE, 'production')).toBe(RUN_PRODUCTION_HEX);
    });

    it('should zigzag negative integers', () => {
      const source = 'uni_start_stream\nmat_width <-1>\nuni_end_stream\n';
      expect(compileHex(source, 'production')).toBe('40 01 40 01 10 14 01 01 40 02');
    });

    it('should reject integers too large for a compact field', () => {
      const source = 'uni_start_stream\nmat_width <2147483647>\nuni_end_stream\n';
      expect(() => compiler.compile(source, 'production')).toThrow(EncodingError);
      expect(() => compiler.compile(source, 'production')).toThrow(
        'line 2: mat_width: value 4294967294 does not fit a compact field'
      );
      expect(compileHex(source, 'debug')).toBe('00 01 00 01 00 00 00 10 14 00 00 04 7f ff ff ff 00 02 00 00 00');
    });

    it('should reject argument data longer than a two-byte length', () => {
      const source = `uni_start_stream\nchat_message <"${'a'.repeat(40000)}">\nuni_end_stream\n`;
      expect(() => compiler.compile(source, 'production')).toThrow('line 2: chat_message: length 40000 exceeds 32767');
      expect(streamBytes(compiler.compile(source, 'debug'))).toHaveLength(40019);
    });
  });

  describe('compact fields', () => {
    it('should pick the width from the value', () => {
      const site = { mnemonic: 'mat_width', line: 1 };
      const cases: Array<[number, string]> = [
        [0x3f, '3f'],
        [0x40, '40 40'],
        [0x3fff, '7f ff'],
        [0x4000, '80 40 00'],
        [0x400000, 'c0 40 00 00'],
        [0x3fffffff, 'ff ff ff ff'],
      ];
      for (const [value, hex] of cases) {
        const out = new ByteWriter();
        writeCompactUint(out, value, site);
        const bytes = out.toUint8Array();
        expect(toHex(bytes)).toBe(hex);
        expect(readCompactUint(new ByteReader(bytes))).toBe(value);
      }
    });

    it('should map signed values onto unsigned ones', () => {
      expect([0, -1, 1, -2, 2].map(zigzag)).toEqual([0, 1, 2, 3, 4]);
      expect([0, 1, 2, 3, 4].map(unzigzag)).toEqual([0, -1, 1, -2, 2]);
    });
  });

  describe('shared behaviour', () => {
    it('should prefix each variant with its header', () => {
      const debug = compiler.compile(ROOM_SOURCE, 'debug');
      const production = compiler.compile(ROOM_SOURCE, 'production');
      expect(Array.from(debug.header)).toEqual([0x00, 0x01]);
      expect(Array.from(production.header)).toEqual([0x40, 0x01]);
      expect(debug.variant).toBe('debug');
      expect(production.variant).toBe('production');
    });

    it('should be deterministic', () => {
      for (const variant of ['debug', 'production'] as const) {
        expect(streamBytes(compiler.compile(ACTION_SOURCE, variant))).toEqual(
          streamBytes(compiler.compile(ACTION_SOURCE, variant))
        );
      }
    });

    it('should never make production streams longer than debug ones', () => {
      for (const source of [ROOM_SOURCE, NESTED_SOURCE, RUN_SOURCE, ACTION_SOURCE]) {
        const debug = streamBytes(compiler.compile(source, 'debug'));
        const production = streamBytes(compiler.compile(source, 'production'));
        expect(production.length).toBeLessThanOrEqual(debug.length);
      }
    });

    it('should reject nesting deeper than a depth byte holds', () => {
      const nested = Array.from({ length: 256 }, (_, i) => `${' '.repeat(i + 1)}uni_void`);
      const source = ['uni_start_stream', ...nested, 'uni_end_stream'].join('\n');
      for (const variant of ['debug', 'production'] as const) {
        expect(() => compiler.compile(source, variant)).toThrow('line 257: uni_void: nesting depth 256 exceeds 255');
      }
    });

    it('should report failures as data from tryCompile', () => {
      const result = compiler.tryCompile('uni_start_stream\nman_bogus\nuni_end_stream\n', 'debug');
      expect(result).toEqual({
        success: false,
        error: { type: 'lookup_error', message: 'line 2: unknown mnemonic "man_bogus"', line: 2 },
      });
    });
  });

  describe('layout strategies', () => {
    it('should accept a replacement production layout', () => {
      const marker: LayoutStrategy = {
        name: 'marker',
        variant: 'production',
        encodeBody: (tree) => Uint8Array.of(tree.nodes.length),
      };
      const custom = createCompiler({ production: marker });
      expect(compileHex(ROOM_SOURCE, 'debug')).toBe(toHex(streamBytes(custom.compile(ROOM_SOURCE, 'debug'))));
      expect(toHex(streamBytes(custom.compile(ROOM_SOURCE, 'production')))).toBe('40 01 04');
    });

    it('should refuse a layout registered for the other variant', () => {
      const custom = createCompiler({ production: debugLayout });
      expect(() => custom.compile(ROOM_SOURCE, 'production')).toThrow(
        'layout "debug" produces debug streams, not production'
      );
    });
  });
});
