/**
 * fdo_validate - Check compiler output against a golden fixture corpus
 */

import { resolve } from 'path';
import { FixtureIOError } from '../errors.js';
import { formatSummary, validateCorpus } from '../validator/index.js';
import type { ValidationReport, Variant } from '../types.js';
import { asArgs, optionalString, optionalVariants, type ToolContext } from './input.js';

export interface ValidateInput {
  directory?: string;
  variants?: Variant[];
  filter?: string;
}

export interface ValidateResult {
  success: boolean;
  report?: ValidationReport;
  summary: string;
}

export function parseValidateInput(args: unknown): ValidateInput {
  const input = asArgs(args);
  return {
    directory: optionalString(input, 'directory'),
    variants: optionalVariants(input, 'variants'),
    filter: optionalString(input, 'filter'),
  };
}

export async function validate(ctx: ToolContext, input: ValidateInput): Promise<ValidateResult> {
  const directory = resolve(input.directory ?? ctx.config.golden_dir);

  try {
    const report = await validateCorpus(directory, ctx.compiler, {
      variants: input.variants,
      filter: input.filter,
      concurrency: ctx.config.validator_concurrency,
      tabWidth: ctx.config.tab_width,
    });
    return { success: true, report, summary: formatSummary(report) };
  } catch (error) {
    if (error instanceof FixtureIOError) {
      return { success: false, summary: error.message };
    }
    throw error;
  }
}

/**
 * Tool definition for MCP
 */
export const validateToolDef = {
  name: 'fdo_validate',
  description: 'Compile every fixture in a golden corpus and compare the output byte for byte with the expected streams. Reports exact matches, byte accuracy and the first divergence of each mismatch.',
  inputSchema: {
    type: 'object',
    properties: {
      directory: {
        type: 'string',
        description: 'Corpus directory of <name>.txt files with expected .bin/.str streams. Defaults to the configured golden directory.',
      },
      variants: {
        type: 'array',
        items: { type: 'string', enum: ['debug', 'production'] },
        description: 'Variants to check (default: both)',
      },
      filter: {
        type: 'string',
        description: 'Only fixtures whose name contains this text',
      },
    },
  },
};
