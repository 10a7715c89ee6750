/**
 * fdo_chunk - Pack a compiled stream into token-framed packets
 */

import { chunkSource, estimateChunks, TOKEN_STREAM_ID_SIZES, type ChunkEstimate, type ChunkInfo } from '../chunk/index.js';
import { toCompileFailure } from '../errors.js';
import { toHex } from '../fdo/index.js';
import { sanitizeSource } from '../sanitize/index.js';
import type { CompileFailure, Variant } from '../types.js';
import { asArgs, optionalBoolean, optionalChoice, optionalInteger, optionalString, requiredString, type ToolContext } from './input.js';

const TOKENS = [...TOKEN_STREAM_ID_SIZES.keys()];

export interface ChunkInput {
  source: string;
  token?: string;
  streamId?: number;
  variant?: Variant;
  /** Size the packets from the source text without encoding */
  estimate?: boolean;
}

export interface ChunkToolResult {
  success: boolean;
  packets?: Array<ChunkInfo & { hex: string }>;
  estimate?: ChunkEstimate;
  error?: CompileFailure;
  message: string;
}

export function parseChunkInput(args: unknown): ChunkInput {
  const input = asArgs(args);
  return {
    source: requiredString(input, 'source'),
    token: optionalChoice(input, 'token', TOKENS),
    streamId: optionalInteger(input, 'stream_id', 0, 0xffffffff),
    variant: optionalChoice(input, 'variant', ['debug', 'production'] as const),
    estimate: optionalBoolean(input, 'estimate'),
  };
}

export function chunk(ctx: ToolContext, input: ChunkInput): ChunkToolResult {
  const { text } = sanitizeSource(input.source, { tabWidth: ctx.config.tab_width });

  try {
    if (input.estimate) {
      const estimate = estimateChunks(ctx.compiler, text, input.token);
      return {
        success: true,
        estimate,
        message: `About ${estimate.estimatedChunks} packet(s) for ${estimate.atomUnits} unit(s).`,
      };
    }

    const result = chunkSource(ctx.compiler, text, {
      token: input.token,
      streamId: input.streamId,
      variant: input.variant,
    });
    return {
      success: true,
      packets: result.chunks.map((info, index) => ({ ...info, hex: toHex(result.packets[index]) })),
      message: `Packed ${result.stream.length} bytes (${result.variant}) into ${result.packets.length} packet(s).`,
    };
  } catch (error) {
    const failure = toCompileFailure(error);
    return { success: false, error: failure, message: `Chunking failed: ${failure.message}` };
  }
}

/**
 * Tool definition for MCP
 */
export const chunkToolDef = {
  name: 'fdo_chunk',
  description: 'Compile FDO source and pack the stream into token-framed packets. Long append data is split first, and an action is never separated from the stream it runs.',
  inputSchema: {
    type: 'object',
    properties: {
      source: {
        type: 'string',
        description: 'FDO source text.',
      },
      token: {
        type: 'string',
        enum: TOKENS,
        description: 'Packet token. Defaults to AT.',
      },
      stream_id: {
        type: 'number',
        description: 'Stream id written after the token. Defaults to 0.',
      },
      variant: {
        type: 'string',
        enum: ['debug', 'production'],
        description: 'Stream layout. Defaults to production.',
      },
      estimate: {
        type: 'boolean',
        description: 'Only estimate the packet count from the source text.',
      },
    },
    required: ['source'],
  },
};
