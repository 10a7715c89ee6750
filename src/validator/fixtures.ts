/**
 * Golden fixture loading
 *
 * A fixture is `<name>.txt` plus any of `<name>.bin`, `<name>.str`,
 * `<name>.debug.bin` and `<name>.production.bin`. Explicit suffixes fix the
 * variant; otherwise it is read from the stream header.
 */

import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { FixtureIOError } from '../errors.js';
import { detectVariant } from '../fdo/index.js';
import type { GoldenFixture, Variant } from '../types.js';

const EXPECTED_SUFFIXES: ReadonlyArray<{ suffix: string; variant?: Variant }> = [
  { suffix: '.debug.bin', variant: 'debug' },
  { suffix: '.production.bin', variant: 'production' },
  { suffix: '.bin' },
  { suffix: '.str' },
];

async function readOrFail(path: string): Promise<Buffer> {
  try {
    return await readFile(path);
  } catch (error) {
    throw new FixtureIOError(path, error);
  }
}

/**
 * Load every fixture in a directory, sorted by name
 */
export async function loadFixtures(directory: string, filter?: string): Promise<GoldenFixture[]> {
  let entries: string[];
  try {
    entries = await readdir(directory);
  } catch (error) {
    throw new FixtureIOError(directory, error);
  }

  const files = new Set(entries);
  const names = entries
    .filter((entry) => entry.endsWith('.txt'))
    .map((entry) => entry.slice(0, -'.txt'.length))
    .filter((name) => !filter || name.includes(filter))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

  const fixtures: GoldenFixture[] = [];
  for (const name of names) {
    const inputText = (await readOrFail(join(directory, `${name}.txt`))).toString('utf-8');
    const expected: Partial<Record<Variant, Uint8Array>> = {};
    const untagged: string[] = [];

    for (const { suffix, variant } of EXPECTED_SUFFIXES) {
      const file = `${name}${suffix}`;
      if (!files.has(file)) {
        continue;
      }
      const bytes = new Uint8Array(await readOrFail(join(directory, file)));
      const tag = variant ?? detectVariant(bytes);
      if (!tag) {
        untagged.push(file);
        continue;
      }
      // Explicitly tagged files are listed first and take precedence
      if (!expected[tag]) {
        expected[tag] = bytes;
      }
    }

    fixtures.push({ name, inputText, expected, untagged });
  }

  return fixtures;
}
