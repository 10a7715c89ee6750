/**
 * Validation report rendering
 */

import { FixtureMismatchError } from '../errors.js';
import type { FixtureReport, ValidationReport, VariantComparison } from '../types.js';

/**
 * Mismatches of a report as error values
 */
export function mismatchErrors(report: ValidationReport): FixtureMismatchError[] {
  const errors: FixtureMismatchError[] = [];
  for (const fixture of report.fixtures) {
    for (const comparison of fixture.comparisons) {
      if (comparison.divergence) {
        errors.push(new FixtureMismatchError(fixture.name, comparison.variant, comparison.divergence));
      }
    }
  }
  return errors;
}

function describeComparison(comparison: VariantComparison): string {
  const label = comparison.variant.padEnd(10);

  if (comparison.error) {
    return `  ${label} compile failed [${comparison.error.type}]: ${comparison.error.message}`;
  }
  if (comparison.exactMatch === undefined) {
    return `  ${label} ${comparison.outputLength ?? 0} bytes (no expected stream)`;
  }
  if (comparison.exactMatch) {
    return `  ${label} exact match (${comparison.outputLength} bytes)`;
  }

  const lines = [
    `  ${label} MISMATCH: ${comparison.outputLength} bytes, expected ${comparison.expectedLength}, ` +
      `${comparison.matchingBytes} matching`,
  ];
  if (comparison.divergence) {
    lines.push(`             first difference at offset ${comparison.divergence.offset}`);
    lines.push(`             expected: ${comparison.divergence.expectedContext}`);
    lines.push(`             actual:   ${comparison.divergence.actualContext}`);
  }
  return lines.join('\n');
}

export function formatFixture(fixture: FixtureReport): string {
  const lines = [`${fixture.exactMatch ? 'PASS' : 'FAIL'} ${fixture.name}`];
  lines.push(...fixture.comparisons.map(describeComparison));
  for (const file of fixture.untagged) {
    lines.push(`  skipped ${file}: unrecognised header`);
  }
  return lines.join('\n');
}

export function formatSummary(report: ValidationReport): string {
  const lines = [
    `Fixtures:       ${report.totalFixtures}`,
    `Exact matches:  ${report.exactMatchCount}/${report.totalFixtures}`,
    `Comparisons:    ${report.comparisons}`,
    `Byte accuracy:  ${report.byteAccuracy.toFixed(2)}% (${report.matchingBytes}/${report.expectedBytes})`,
  ];
  if (report.cancelled) {
    lines.push('Run cancelled before all fixtures were checked');
  }
  return lines.join('\n');
}
