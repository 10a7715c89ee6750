/**
 * Stream variant detection
 */

import type { Variant } from '../types.js';

export const STREAM_HEADERS: Readonly<Record<Variant, readonly [number, number]>> = {
  debug: [0x00, 0x01],
  production: [0x40, 0x01],
};

export const HEADER_LENGTH = 2;

export function headerFor(variant: Variant): Uint8Array {
  return Uint8Array.from(STREAM_HEADERS[variant]);
}

/**
 * Identify a stream's variant from its two-byte header
 */
export function detectVariant(data: Uint8Array): Variant | undefined {
  if (data.length < HEADER_LENGTH) {
    return undefined;
  }
  if (data[0] === STREAM_HEADERS.debug[0] && data[1] === STREAM_HEADERS.debug[1]) {
    return 'debug';
  }
  if (data[0] === STREAM_HEADERS.production[0] && data[1] === STREAM_HEADERS.production[1]) {
    return 'production';
  }
  return undefined;
}
