/**
 * Stream layouts
 *
 * A layout turns an atom tree into the body of one stream variant and, when it
 * can, reads a body back into records. The Production layout is a strategy:
 * any implementation of this interface can replace the default one.
 */

import type { SymbolTable } from '../symbols/index.js';
import type { AtomDefinition, AtomNode, AtomTree, DecodedRecord, Variant } from '../types.js';
import { DecodeError, EncodingError } from '../errors.js';
import type { ByteReader } from './bytes.js';

export interface LayoutStrategy {
  readonly name: string;
  readonly variant: Variant;
  encodeBody(tree: AtomTree, symbols: SymbolTable): Uint8Array;
  /** Body decoding is optional; streams of a layout without it cannot be decoded */
  decodeBody?(body: ByteReader, symbols: SymbolTable): DecodedRecord[];
}

export const MAX_DEPTH = 0xff;

/**
 * Look up the definition for a record's protocol and atom numbers
 */
export function resolveDefinition(symbols: SymbolTable, protocol: number, atom: number, offset: number): AtomDefinition {
  const definition = symbols.byCode(protocol * 256 + atom);
  if (!definition) {
    throw new DecodeError(offset, `unknown atom ${protocol}/${atom}`);
  }
  return definition;
}

export function checkDepth(node: AtomNode): void {
  if (node.depth > MAX_DEPTH) {
    throw new EncodingError(node.definition.mnemonic, node.sourceLine, `nesting depth ${node.depth} exceeds ${MAX_DEPTH}`);
  }
}
