/**
 * Stream decoder
 */

import { buildTree } from '../atoms/index.js';
import { DecodeError } from '../errors.js';
import type { SymbolTable } from '../symbols/index.js';
import type { DecodedRecord, DecodedStream } from '../types.js';
import { formatArguments } from './arguments.js';
import { ByteReader } from './bytes.js';
import { detectVariant, HEADER_LENGTH } from './detect.js';
import { layoutFor, type LayoutOptions } from './encoder.js';

/**
 * Read a stream back into records and an atom tree
 *
 * Decoded nodes carry canonical argument text, and their record ordinal in
 * place of a source line.
 */
export function decode(data: Uint8Array, symbols: SymbolTable, options: LayoutOptions = {}): DecodedStream {
  const variant = detectVariant(data);
  if (!variant) {
    throw new DecodeError(0, 'unrecognised stream header');
  }

  const layout = layoutFor(variant, options);
  if (!layout.decodeBody) {
    throw new DecodeError(HEADER_LENGTH, `layout "${layout.name}" cannot decode streams`);
  }

  const records = layout.decodeBody(new ByteReader(data, HEADER_LENGTH), symbols);
  checkNesting(records);

  const ordered = records.map((record, index) => ({ record, ordinal: index + 1 }));
  const tree = buildTree(
    ordered,
    ({ record }) => record.depth,
    ({ record, ordinal }, depth) => ({
      definition: record.definition,
      rawArguments: formatArguments(record.values, symbols),
      children: [],
      depth,
      sourceLine: ordinal,
    })
  );

  return { variant, records, tree };
}

function checkNesting(records: readonly DecodedRecord[]): void {
  let previous = -1;
  for (const record of records) {
    if (record.depth > previous + 1) {
      throw new DecodeError(
        record.offset,
        `${record.definition.mnemonic} at depth ${record.depth} skips a nesting level`
      );
    }
    previous = record.depth;
  }
}
