/**
 * Chunking Tests
 */

import { describe, it, expect } from 'vitest';
import {
  buildPacket,
  chunkSource,
  estimateChunks,
  findSplitPoint,
  groupRecords,
  packUnits,
  segmentData,
  splitLongData,
  splitText,
  type AtomUnit,
} from '../src/chunk/index.js';
import { ChunkingError } from '../src/errors.js';
import { concatBytes, createCompiler, renderSource, streamBytes, toHex } from '../src/fdo/index.js';
import type { DecodedRecord } from '../src/types.js';
import { ACTION_SOURCE, ROOM_SOURCE } from './samples.js';

const compiler = createCompiler();
const { symbols } = compiler;

function record(mnemonic: string, depth: number, offset: number): DecodedRecord {
  return { definition: symbols.require(mnemonic), depth, values: [], offset };
}

function counting(length: number): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => i % 256);
}

describe('Chunking', () => {
  describe('splitText', () => {
    it('should prefer a sentence end inside the limit', () => {
      expect(findSplitPoint('Hello world. Next part here', 20)).toBe(13);
      expect(splitText('Hello world. Next part here', 20)).toEqual(['Hello world. ', 'Next part here']);
    });

    it('should fall back to a space, then to the limit', () => {
      expect(splitText('aaaa bbbb cccc', 7)).toEqual(['aaaa ', 'bbbb ', 'cccc']);
      expect(splitText('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
    });

    it('should leave short text whole', () => {
      expect(splitText('short', 10)).toEqual(['short']);
      expect(splitText('', 10)).toEqual(['']);
    });
  });

  describe('splitLongData', () => {
    const source = [
      'uni_start_stream',
      '  man_append_data <"Hello world. Next part here">',
      '  idb_append_data <01x, 02x, 03x, 04x, 05x>',
      '  mat_title <"Hello world. Next part here">',
      'uni_end_stream',
      '',
    ].join('\n');

    it('should split long append atoms into runs of siblings', () => {
      const tree = splitLongData(compiler.parse(source).tree, symbols, { maxTextLength: 20, maxDataBytes: 2 });
      expect(renderSource(tree)).toBe(
        [
          'uni_start_stream',
          '  man_append_data <"Hello world. ">',
          '  man_append_data <"Next part here">',
          '  idb_append_data <01x, 02x>',
          '  idb_append_data <03x, 04x>',
          '  idb_append_data <05x>',
          '  mat_title <"Hello world. Next part here">',
          'uni_end_stream',
          '',
        ].join('\n')
      );
    });

    it('should leave a tree within the limits unchanged', () => {
      const tree = compiler.parse(ROOM_SOURCE).tree;
      expect(renderSource(splitLongData(tree, symbols))).toBe(ROOM_SOURCE);
    });

    it('should reject limits below one', () => {
      expect(() => splitLongData({ nodes: [] }, symbols, { maxTextLength: 0, maxDataBytes: 1 })).toThrow(RangeError);
    });
  });

  describe('groupRecords', () => {
    it('should keep an action together with its nested stream', () => {
      const records = [
        record('uni_start_stream', 0, 2),
        record('man_start_object', 1, 4),
        record('act_replace_select_action', 2, 10),
        record('uni_start_stream', 3, 12),
        record('sm_send_k1', 4, 14),
        record('uni_end_stream', 3, 20),
        record('man_end_object', 1, 22),
        record('uni_end_stream', 0, 24),
      ];
      expect(groupRecords(records, 26)).toEqual([
        { first: 0, last: 0, isAction: false, start: 0, end: 4 },
        { first: 1, last: 1, isAction: false, start: 4, end: 10 },
        { first: 2, last: 5, isAction: true, start: 10, end: 22 },
        { first: 6, last: 6, isAction: false, start: 22, end: 24 },
        { first: 7, last: 7, isAction: false, start: 24, end: 26 },
      ]);
    });

    it('should treat an action without nested records as a single atom', () => {
      const records = [record('act_set_criterion', 1, 2), record('act_sound_beep', 1, 5)];
      expect(groupRecords(records, 7).map((u) => [u.first, u.last, u.isAction])).toEqual([
        [0, 0, false],
        [1, 1, false],
      ]);
    });
  });

  describe('segmentData', () => {
    it('should keep data up to 255 bytes whole', () => {
      expect(segmentData(counting(255))).toHaveLength(1);
    });

    it('should mark each later segment with its length', () => {
      const segments = segmentData(counting(383));
      expect(segments.map((s) => s.length)).toEqual([255, 128, 2]);
      expect(segments[1][0]).toBe(0xff);
      expect(segments[1][1]).toBe(255);
      expect(toHex(segments[2])).toBe('81 7e');
    });
  });

  describe('buildPacket', () => {
    it('should write the token and a little-endian stream id', () => {
      expect(toHex(buildPacket(Uint8Array.of(9), 0x0102, 'AT'))).toBe('41 54 02 01 09');
      expect(toHex(buildPacket(Uint8Array.of(9), 0x01020304, 'at'))).toBe('61 74 04 03 02 01 09');
    });

    it('should reject unknown tokens and out-of-range stream ids', () => {
      expect(() => buildPacket(new Uint8Array(0), 0, 'ZZ')).toThrow(ChunkingError);
      expect(() => buildPacket(new Uint8Array(0), 2 ** 24, 'At')).toThrow(
        'stream id 16777216 out of range for token "At" (0-16777215)'
      );
    });
  });

  describe('packUnits', () => {
    const unit = (start: number, end: number): AtomUnit => ({ first: 0, last: 0, isAction: false, start, end });

    it('should fill packets up to the payload limit', () => {
      const { chunks } = packUnits(counting(30), [unit(0, 10), unit(10, 20), unit(20, 30)]);
      expect(chunks).toEqual([{ size: 34, continuation: false, firstUnit: 0, lastUnit: 2 }]);
    });

    it('should give a unit over the segment limit packets of its own', () => {
      const stream = counting(430);
      const { packets, chunks } = packUnits(stream, [unit(0, 50), unit(50, 120), unit(120, 420), unit(420, 430)], 'AT', 0x0102);
      expect(chunks).toEqual([
        { size: 54, continuation: false, firstUnit: 0, lastUnit: 0 },
        { size: 74, continuation: false, firstUnit: 1, lastUnit: 1 },
        { size: 259, continuation: false, firstUnit: 2, lastUnit: 2 },
        { size: 50, continuation: true, firstUnit: 2, lastUnit: 2 },
        { size: 14, continuation: false, firstUnit: 3, lastUnit: 3 },
      ]);
      expect(toHex(packets[3], 0, 6)).toBe('41 54 02 01 ad 77');
    });
  });

  describe('chunkSource', () => {
    it('should pack a small stream into one packet with its action intact', () => {
      const result = chunkSource(compiler, ACTION_SOURCE);
      expect(result.stream).toEqual(streamBytes(compiler.compile(ACTION_SOURCE, 'production')));
      expect(result.units.map((u) => [u.first, u.last, u.isAction])).toEqual([
        [0, 0, false],
        [1, 1, false],
        [2, 2, false],
        [3, 3, false],
        [4, 9, true],
        [10, 10, false],
        [11, 11, false],
      ]);
      expect(result.chunks).toEqual([
        { size: result.stream.length + 4, continuation: false, firstUnit: 0, lastUnit: 6 },
      ]);
      expect(result.packets[0].subarray(4)).toEqual(result.stream);
    });

    it('should split long append text before encoding', () => {
      const source = ['uni_start_stream', `  man_append_data <"${'x'.repeat(300)}">`, 'uni_end_stream', ''].join('\n');
      const result = chunkSource(compiler, source);
      expect(result.units).toHaveLength(4);
      expect(compiler.decompile(result.stream)).toBe(
        [
          'uni_start_stream',
          `  man_append_data <"${'x'.repeat(200)}">`,
          `  man_append_data <"${'x'.repeat(100)}">`,
          'uni_end_stream',
          '',
        ].join('\n')
      );
      expect(result.chunks.every((c) => !c.continuation)).toBe(true);
      expect(concatBytes(...result.packets.map((p) => p.subarray(4)))).toEqual(result.stream);
    });

    it('should segment a unit that stays over 255 bytes and reassemble to the stream', () => {
      const source = ['uni_start_stream', `  man_append_data <"${'x'.repeat(300)}">`, 'uni_end_stream', ''].join('\n');
      const result = chunkSource(compiler, source, { token: 'AT', streamId: 7, limits: { maxTextLength: 1000 } });
      expect(result.chunks.map((c) => [c.continuation, c.firstUnit, c.lastUnit])).toEqual([
        [false, 0, 0],
        [false, 1, 1],
        [true, 1, 1],
        [false, 2, 2],
      ]);
      const payloads = result.packets.map((p, i) => p.subarray(result.chunks[i].continuation ? 5 : 4));
      expect(concatBytes(...payloads)).toEqual(result.stream);
    });

    it('should reject an unknown token', () => {
      expect(() => chunkSource(compiler, ROOM_SOURCE, { token: 'ZZ' })).toThrow(ChunkingError);
    });
  });

  describe('estimateChunks', () => {
    it('should size units from their source text', () => {
      expect(estimateChunks(compiler, ACTION_SOURCE)).toEqual({
        atomUnits: 7,
        actionBlocks: 1,
        estimatedSize: 264,
        estimatedChunks: 3,
        headerSize: 4,
        maxPayload: 115,
      });
    });
  });
});
