/**
 * Stream chunking
 *
 * Splits over-long append atoms, encodes the tree, and packs the stream into
 * token-framed packets without separating an action from the stream it runs.
 * Concatenating the packet payloads, less continuation bytes, gives back the
 * encoded stream.
 */

import { streamBytes, type Compiler } from '../fdo/index.js';
import type { AtomTree, Variant } from '../types.js';
import { DEFAULT_TOKEN, headerSize, maxPayloadSize, packUnits, type ChunkInfo } from './packets.js';
import { DEFAULT_SPLIT_LIMITS, splitLongData, type SplitLimits } from './split.js';
import { groupNodes, groupRecords, unitLines, type AtomUnit } from './units.js';

export interface ChunkOptions {
  /** Defaults to production */
  variant?: Variant;
  token?: string;
  streamId?: number;
  limits?: Partial<SplitLimits>;
}

export interface ChunkResult {
  variant: Variant;
  token: string;
  streamId: number;
  /** The encoded stream after splitting */
  stream: Uint8Array;
  units: AtomUnit[];
  packets: Uint8Array[];
  chunks: ChunkInfo[];
}

export interface ChunkEstimate {
  atomUnits: number;
  actionBlocks: number;
  /** Source bytes of every unit; compact streams come out smaller */
  estimatedSize: number;
  estimatedChunks: number;
  headerSize: number;
  maxPayload: number;
}

function resolveLimits(limits: Partial<SplitLimits> = {}): SplitLimits {
  return { ...DEFAULT_SPLIT_LIMITS, ...limits };
}

export function chunkTree(compiler: Compiler, tree: AtomTree, options: ChunkOptions = {}): ChunkResult {
  const variant = options.variant ?? 'production';
  const token = options.token ?? DEFAULT_TOKEN;
  const streamId = options.streamId ?? 0;
  // Reject a bad token before any encoding work
  headerSize(token);

  const split = splitLongData(tree, compiler.symbols, resolveLimits(options.limits));
  const stream = streamBytes(compiler.encode(split, variant));
  const { records } = compiler.decode(stream);
  const units = groupRecords(records, stream.length);

  return { variant, token, streamId, stream, units, ...packUnits(stream, units, token, streamId) };
}

/**
 * Parse, split, encode and pack source text
 */
export function chunkSource(compiler: Compiler, source: string, options: ChunkOptions = {}): ChunkResult {
  return chunkTree(compiler, compiler.parse(source).tree, options);
}

/**
 * Size the packets of a source from its text alone, without encoding it
 */
export function estimateChunks(
  compiler: Compiler,
  source: string,
  token: string = DEFAULT_TOKEN,
  limits?: Partial<SplitLimits>
): ChunkEstimate {
  const maxPayload = maxPayloadSize(token);
  const tree = splitLongData(compiler.parse(source).tree, compiler.symbols, resolveLimits(limits));
  const units = groupNodes(tree);
  const estimatedSize = units.reduce(
    (sum, unit) => sum + Buffer.byteLength(unitLines(unit.node, unit.isAction).join('\n'), 'utf-8'),
    0
  );

  return {
    atomUnits: units.length,
    actionBlocks: units.filter((unit) => unit.isAction).length,
    estimatedSize,
    estimatedChunks: Math.max(1, Math.ceil(estimatedSize / maxPayload)),
    headerSize: headerSize(token),
    maxPayload,
  };
}

export {
  buildPacket,
  segmentData,
  packUnits,
  headerSize,
  maxPayloadSize,
  TOKEN_STREAM_ID_SIZES,
  MAX_PACKET_SIZE,
  MAX_SEGMENT_SIZE,
  MAX_CONTINUATION_SIZE,
  CONTINUATION_MARKER,
  DEFAULT_TOKEN,
  type ChunkInfo,
  type PackedChunks,
} from './packets.js';
export { splitLongData, splitText, findSplitPoint, APPEND_ATOMS, DEFAULT_SPLIT_LIMITS, type SplitLimits } from './split.js';
export { groupRecords, groupNodes, unitLines, ACTION_ATOMS, type AtomUnit } from './units.js';
