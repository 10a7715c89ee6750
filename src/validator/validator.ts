/**
 * Differential Validator
 *
 * Compiles every fixture in a corpus under each requested variant and
 * compares the output byte for byte with the expected streams. Mismatches and
 * compile errors are recorded in the report; only corpus I/O failures throw.
 */

import { setImmediate as nextTurn } from 'timers/promises';
import { streamBytes, type Compiler } from '../fdo/index.js';
import { sanitizeSource, type SanitizeOptions } from '../sanitize/index.js';
import { VARIANTS } from '../types.js';
import type { FixtureReport, GoldenFixture, ValidationReport, Variant, VariantComparison } from '../types.js';
import { compareBytes } from './compare.js';
import { loadFixtures } from './fixtures.js';
import { defaultConcurrency, runPool } from './pool.js';

export interface ValidateOptions {
  /** Variants to compile; defaults to both */
  variants?: readonly Variant[];
  /** Only fixtures whose name contains this text */
  filter?: string;
  /** Spaces per leading tab in fixture sources; 0 rejects tabs */
  tabWidth?: number;
  /** Pool size; defaults to the number of available cores */
  concurrency?: number;
  signal?: AbortSignal;
  /** Called once per finished fixture */
  onFixture?: (report: FixtureReport) => void;
}

/**
 * Compile one fixture and compare it with its expected streams
 *
 * The source goes through the same sanitiser as any other compile input.
 */
export function checkFixture(
  fixture: GoldenFixture,
  compiler: Compiler,
  variants: readonly Variant[] = VARIANTS,
  sanitize: SanitizeOptions = {}
): FixtureReport {
  const { text } = sanitizeSource(fixture.inputText, sanitize);
  const comparisons: VariantComparison[] = variants.map((variant) => {
    const result = compiler.tryCompile(text, variant);
    const expected = fixture.expected[variant];

    if (!result.success) {
      return {
        variant,
        compiled: false,
        expectedLength: expected?.length,
        exactMatch: expected ? false : undefined,
        matchingBytes: expected ? 0 : undefined,
        error: result.error,
      };
    }

    const actual = streamBytes(result.stream);
    if (!expected) {
      return { variant, compiled: true, outputLength: actual.length };
    }

    const comparison = compareBytes(expected, actual);
    return {
      variant,
      compiled: true,
      outputLength: actual.length,
      expectedLength: expected.length,
      matchingBytes: comparison.matchingBytes,
      exactMatch: comparison.exactMatch,
      divergence: comparison.divergence,
    };
  });

  const compared = comparisons.filter((c) => c.exactMatch !== undefined);
  const exactMatch = compared.length > 0 && compared.every((c) => c.exactMatch === true);

  return { name: fixture.name, exactMatch, comparisons, untagged: fixture.untagged };
}

/**
 * Summarise fixture reports into a corpus report
 */
export function summarize(directory: string, fixtures: FixtureReport[], cancelled: boolean): ValidationReport {
  let comparisons = 0;
  let expectedBytes = 0;
  let matchingBytes = 0;

  for (const fixture of fixtures) {
    for (const comparison of fixture.comparisons) {
      if (comparison.exactMatch === undefined) {
        continue;
      }
      comparisons++;
      expectedBytes += comparison.expectedLength ?? 0;
      matchingBytes += comparison.matchingBytes ?? 0;
    }
  }

  const byteAccuracy = expectedBytes > 0 ? Math.round((matchingBytes / expectedBytes) * 10000) / 100 : 0;

  return {
    directory,
    totalFixtures: fixtures.length,
    exactMatchCount: fixtures.filter((f) => f.exactMatch).length,
    comparisons,
    expectedBytes,
    matchingBytes,
    byteAccuracy,
    cancelled,
    fixtures,
  };
}

/**
 * Validate a corpus directory
 */
export async function validateCorpus(
  directory: string,
  compiler: Compiler,
  options: ValidateOptions = {}
): Promise<ValidationReport> {
  const fixtures = await loadFixtures(directory, options.filter);
  const variants = options.variants ?? VARIANTS;
  const concurrency = options.concurrency && options.concurrency > 0 ? options.concurrency : defaultConcurrency();

  const { results, cancelled } = await runPool(
    fixtures,
    concurrency,
    async (fixture) => {
      // Yield between fixtures so cancellation is observed
      await nextTurn();
      const report = checkFixture(fixture, compiler, variants, { tabWidth: options.tabWidth });
      options.onFixture?.(report);
      return report;
    },
    options.signal
  );

  results.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  return summarize(directory, results, cancelled);
}
