/**
 * fdo_decompile - Turn a binary stream back into FDO source
 */

import { countAtoms } from '../atoms/index.js';
import { fromHex, renderSource } from '../fdo/index.js';
import { toCompileFailure } from '../errors.js';
import type { CompileFailure, Variant } from '../types.js';
import { asArgs, optionalChoice, requiredString, type ToolContext } from './input.js';

export type DataEncoding = 'hex' | 'base64';

export interface DecompileInput {
  data: string;
  encoding?: DataEncoding;
}

export interface DecompileResult {
  success: boolean;
  variant?: Variant;
  atoms?: number;
  source?: string;
  error?: CompileFailure;
  message: string;
}

const HEX_TEXT = /^[0-9a-fA-F\s]+$/;

export function parseDecompileInput(args: unknown): DecompileInput {
  const input = asArgs(args);
  return {
    data: requiredString(input, 'data'),
    encoding: optionalChoice(input, 'encoding', ['hex', 'base64'] as const),
  };
}

export function decodeData(data: string, encoding?: DataEncoding): Uint8Array {
  const resolved = encoding ?? (HEX_TEXT.test(data) ? 'hex' : 'base64');
  return resolved === 'hex' ? fromHex(data) : new Uint8Array(Buffer.from(data, 'base64'));
}

export function decompile(ctx: ToolContext, input: DecompileInput): DecompileResult {
  try {
    const bytes = decodeData(input.data, input.encoding);
    const decoded = ctx.compiler.decode(bytes);
    const source = renderSource(decoded.tree);
    const atoms = countAtoms(decoded.tree);
    return {
      success: true,
      variant: decoded.variant,
      atoms,
      source,
      message: `Decoded ${atoms} atoms from a ${decoded.variant} stream.`,
    };
  } catch (error) {
    const failure = toCompileFailure(error);
    return { success: false, error: failure, message: `Decompilation failed: ${failure.message}` };
  }
}

/**
 * Tool definition for MCP
 */
export const decompileToolDef = {
  name: 'fdo_decompile',
  description: 'Decode a Debug or Production FDO stream back into source text. The variant is read from the stream header.',
  inputSchema: {
    type: 'object',
    properties: {
      data: {
        type: 'string',
        description: 'The stream bytes as hex (spaces allowed) or base64.',
      },
      encoding: {
        type: 'string',
        enum: ['hex', 'base64'],
        description: 'How data is encoded. Guessed when omitted.',
      },
    },
    required: ['data'],
  },
};
