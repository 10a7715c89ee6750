/**
 * Byte-level comparison of compiler output against expected streams
 */

import { toHex } from '../fdo/index.js';
import type { Divergence } from '../types.js';

export const CONTEXT_BYTES = 8;

export interface ByteComparison {
  exactMatch: boolean;
  /** Positions where both buffers hold the same byte */
  matchingBytes: number;
  divergence?: Divergence;
}

/**
 * First offset at which two buffers differ, or -1 when identical
 *
 * When one buffer is a prefix of the other the offset is the shorter length.
 */
export function firstDivergence(expected: Uint8Array, actual: Uint8Array): number {
  const shared = Math.min(expected.length, actual.length);
  for (let i = 0; i < shared; i++) {
    if (expected[i] !== actual[i]) {
      return i;
    }
  }
  return expected.length === actual.length ? -1 : shared;
}

/**
 * Hex bytes around an offset with the byte at the offset in brackets
 *
 * `[--]` marks an offset past the end of the buffer.
 */
export function hexContext(bytes: Uint8Array, offset: number, context = CONTEXT_BYTES): string {
  const before = toHex(bytes, offset - context, offset);
  const at = offset < bytes.length ? `[${toHex(bytes, offset, offset + 1)}]` : '[--]';
  const after = toHex(bytes, offset + 1, offset + 1 + context);
  return [before, at, after].filter((part) => part !== '').join(' ');
}

export function compareBytes(expected: Uint8Array, actual: Uint8Array, context = CONTEXT_BYTES): ByteComparison {
  let matchingBytes = 0;
  const shared = Math.min(expected.length, actual.length);
  for (let i = 0; i < shared; i++) {
    if (expected[i] === actual[i]) {
      matchingBytes++;
    }
  }

  const offset = firstDivergence(expected, actual);
  if (offset < 0) {
    return { exactMatch: true, matchingBytes };
  }

  return {
    exactMatch: false,
    matchingBytes,
    divergence: {
      offset,
      expectedContext: hexContext(expected, offset, context),
      actualContext: hexContext(actual, offset, context),
    },
  };
}
