/**
 * fdo_compile - Compile FDO source into a binary stream
 */

import { getScript, recordCompilation } from '../db/operations.js';
import { streamBytes, toHex } from '../fdo/index.js';
import { sanitizeSource } from '../sanitize/index.js';
import type { CompileFailure, Variant } from '../types.js';
import { asArgs, optionalChoice, optionalString, ToolInputError, type ToolContext } from './input.js';

export interface CompileInput {
  source?: string;
  /** Name of a library script to compile instead of inline source */
  script?: string;
  variant?: Variant;
}

export interface CompileResult {
  success: boolean;
  variant: Variant;
  size?: number;
  header?: string;
  hex?: string;
  base64?: string;
  error?: CompileFailure;
  message: string;
}

export function parseCompileInput(args: unknown): CompileInput {
  const input = asArgs(args);
  const parsed: CompileInput = {
    source: optionalString(input, 'source'),
    script: optionalString(input, 'script'),
    variant: optionalChoice(input, 'variant', ['debug', 'production'] as const),
  };
  if (parsed.source === undefined && parsed.script === undefined) {
    throw new ToolInputError('either source or script is required');
  }
  return parsed;
}

/**
 * Compile inline source or a library script
 */
export function compile(ctx: ToolContext, input: CompileInput): CompileResult {
  const variant = input.variant ?? ctx.config.default_variant;

  let source = input.source;
  let scriptId: number | undefined;
  if (input.script !== undefined) {
    const script = getScript(ctx.db, input.script);
    if (!script) {
      return { success: false, variant, message: `No script named "${input.script}" in the library.` };
    }
    source = script.content;
    scriptId = script.id;
  }

  const { text } = sanitizeSource(source ?? '', { tabWidth: ctx.config.tab_width });
  const result = ctx.compiler.tryCompile(text, variant);

  if (!result.success) {
    if (scriptId !== undefined) {
      recordCompilation(ctx.db, { scriptId, variant, success: false, error: result.error.message });
    }
    return {
      success: false,
      variant,
      error: result.error,
      message: `Compilation failed: ${result.error.message}`,
    };
  }

  const bytes = streamBytes(result.stream);
  if (scriptId !== undefined) {
    recordCompilation(ctx.db, { scriptId, variant, success: true, size: bytes.length });
  }

  return {
    success: true,
    variant,
    size: bytes.length,
    header: toHex(result.stream.header),
    hex: toHex(bytes),
    base64: Buffer.from(bytes).toString('base64'),
    message: `Compiled ${bytes.length} bytes (${variant}).`,
  };
}

/**
 * Tool definition for MCP
 */
export const compileToolDef = {
  name: 'fdo_compile',
  description: 'Compile FDO atom stream source into its binary form. Returns the stream as hex and base64, or a diagnostic with the failing line.',
  inputSchema: {
    type: 'object',
    properties: {
      source: {
        type: 'string',
        description: 'FDO source text, one atom per line, indentation for nesting.',
      },
      script: {
        type: 'string',
        description: 'Name of a saved library script to compile instead of source.',
      },
      variant: {
        type: 'string',
        enum: ['debug', 'production'],
        description: 'Output layout. Defaults to the configured variant.',
      },
    },
  },
};
