/**
 * Payload packing
 *
 * Units are packed in order into payloads no larger than the outbound packet
 * limit less the token header. A unit over the segment limit is cut into
 * segments of its own: the first carries 255 bytes, each later one starts
 * with a continuation byte `0x80 | length`.
 */

import { ChunkingError } from '../errors.js';
import { concatBytes } from '../fdo/index.js';
import type { AtomUnit } from './units.js';

export const MAX_PACKET_SIZE = 119;
export const MAX_SEGMENT_SIZE = 0xff;
export const CONTINUATION_MARKER = 0x80;
export const MAX_CONTINUATION_SIZE = 0x7f;
export const DEFAULT_TOKEN = 'AT';

/** Stream id width in bytes for each packet token */
export const TOKEN_STREAM_ID_SIZES: ReadonlyMap<string, number> = new Map([
  ['AT', 2],
  ['at', 4],
  ['At', 3],
  ['f1', 2],
  ['ff', 2],
  ['DD', 2],
  ['Dd', 2],
  ['D3', 2],
  ['NX', 2],
  ['OT', 2],
  ['XS', 2],
  ['Aa', 2],
  ['aS', 2],
  ['iO', 2],
  ['ME', 2],
  ['fh', 2],
  ['iS', 2],
  ['CA', 2],
]);

export interface ChunkInfo {
  /** Packet size, header included */
  size: number;
  /** Set on the second and later segments of a cut unit */
  continuation: boolean;
  /** Units whose bytes the packet carries, in full or in part */
  firstUnit: number;
  lastUnit: number;
}

export interface PackedChunks {
  packets: Uint8Array[];
  chunks: ChunkInfo[];
}

function streamIdSize(token: string): number {
  const size = TOKEN_STREAM_ID_SIZES.get(token);
  if (size === undefined) {
    throw new ChunkingError(`unknown token "${token}"; expected one of ${[...TOKEN_STREAM_ID_SIZES.keys()].join(', ')}`);
  }
  return size;
}

/**
 * Token plus stream id
 */
export function headerSize(token: string): number {
  return 2 + streamIdSize(token);
}

export function maxPayloadSize(token: string): number {
  return MAX_PACKET_SIZE - headerSize(token);
}

/**
 * Prefix a payload with its token and little-endian stream id
 */
export function buildPacket(data: Uint8Array, streamId: number, token: string): Uint8Array {
  const size = streamIdSize(token);
  const max = 2 ** (8 * size) - 1;
  if (!Number.isInteger(streamId) || streamId < 0 || streamId > max) {
    throw new ChunkingError(`stream id ${streamId} out of range for token "${token}" (0-${max})`);
  }

  const header = new Uint8Array(2 + size);
  header[0] = token.charCodeAt(0);
  header[1] = token.charCodeAt(1);
  for (let i = 0; i < size; i++) {
    header[2 + i] = Math.floor(streamId / 2 ** (8 * i)) % 256;
  }
  return concatBytes(header, data);
}

/**
 * Cut data over the segment limit into continuation segments
 */
export function segmentData(data: Uint8Array): Uint8Array[] {
  if (data.length <= MAX_SEGMENT_SIZE) {
    return [data];
  }

  const segments = [data.subarray(0, MAX_SEGMENT_SIZE)];
  for (let offset = MAX_SEGMENT_SIZE; offset < data.length; offset += MAX_CONTINUATION_SIZE) {
    const part = data.subarray(offset, offset + MAX_CONTINUATION_SIZE);
    segments.push(concatBytes(Uint8Array.of(CONTINUATION_MARKER | part.length), part));
  }
  return segments;
}

/**
 * Pack the units of a stream into packets
 */
export function packUnits(
  stream: Uint8Array,
  units: readonly AtomUnit[],
  token: string = DEFAULT_TOKEN,
  streamId = 0
): PackedChunks {
  const limit = maxPayloadSize(token);
  const packets: Uint8Array[] = [];
  const chunks: ChunkInfo[] = [];

  const emit = (data: Uint8Array, continuation: boolean, firstUnit: number, lastUnit: number): void => {
    const packet = buildPacket(data, streamId, token);
    packets.push(packet);
    chunks.push({ size: packet.length, continuation, firstUnit, lastUnit });
  };

  let pending: Uint8Array[] = [];
  let pendingSize = 0;
  let pendingFirst = 0;
  const flush = (lastUnit: number): void => {
    if (pending.length > 0) {
      emit(concatBytes(...pending), false, pendingFirst, lastUnit);
      pending = [];
      pendingSize = 0;
    }
  };

  units.forEach((unit, index) => {
    const data = stream.subarray(unit.start, unit.end);
    const segments = segmentData(data);

    if (segments.length > 1) {
      flush(index - 1);
      segments.forEach((segment, part) => emit(segment, part > 0, index, index));
      return;
    }

    if (pendingSize + data.length > limit) {
      flush(index - 1);
    }
    if (pending.length === 0) {
      pendingFirst = index;
    }
    pending.push(data);
    pendingSize += data.length;
  });
  flush(units.length - 1);

  return { packets, chunks };
}
