/**
 * Long-data splitting
 *
 * `man_append_data` and `idb_append_data` append to what came before, so a
 * long one can be written as several in a row. Text is cut at a sentence end,
 * then at a space, then at the limit; the pieces join back to the original.
 */

import { formatArguments, tokenizeArguments } from '../fdo/index.js';
import type { SymbolTable } from '../symbols/index.js';
import type { ArgValue, AtomNode, AtomTree } from '../types.js';

export interface SplitLimits {
  /** Characters of text per `man_append_data` */
  maxTextLength: number;
  /** Bytes per `idb_append_data` */
  maxDataBytes: number;
}

export const DEFAULT_SPLIT_LIMITS: SplitLimits = {
  maxTextLength: 200,
  maxDataBytes: 200,
};

export const APPEND_ATOMS: ReadonlySet<string> = new Set(['man_append_data', 'idb_append_data']);

/**
 * Where to cut text that is longer than `max`
 */
export function findSplitPoint(text: string, max: number): number {
  if (text.length <= max) {
    return text.length;
  }

  const window = text.slice(0, max);
  const sentenceEnd = /[.!?]\s+/g;
  let end = 0;
  let match: RegExpExecArray | null;
  while ((match = sentenceEnd.exec(window)) !== null) {
    end = match.index + match[0].length;
  }
  if (end > 0) {
    return end;
  }

  const space = window.lastIndexOf(' ');
  return space > 0 ? space + 1 : max;
}

export function splitText(text: string, max: number): string[] {
  const pieces: string[] = [];
  let rest = text;
  while (rest.length > max) {
    const end = findSplitPoint(rest, max);
    pieces.push(rest.slice(0, end));
    rest = rest.slice(end);
  }
  if (rest.length > 0 || pieces.length === 0) {
    pieces.push(rest);
  }
  return pieces;
}

function groups<T>(items: readonly T[], size: number): T[][] {
  const result: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    result.push(items.slice(i, i + size));
  }
  return result;
}

/**
 * Argument lists for the pieces of an append atom, or null when it fits
 */
function splitValues(values: ArgValue[], limits: SplitLimits): ArgValue[][] | null {
  const [first] = values;
  if (values.length === 1 && first.kind === 'quoted-string') {
    if (first.value.length <= limits.maxTextLength) {
      return null;
    }
    return splitText(first.value, limits.maxTextLength).map((value): ArgValue[] => [{ kind: 'quoted-string', value }]);
  }

  if (values.length > limits.maxDataBytes && values.every((value) => value.kind === 'hex-byte')) {
    return groups(values, limits.maxDataBytes);
  }
  return null;
}

function splitNode(node: AtomNode, symbols: SymbolTable, limits: SplitLimits): AtomNode[] {
  if (node.children.length > 0) {
    return [{ ...node, children: node.children.flatMap((child) => splitNode(child, symbols, limits)) }];
  }
  if (!APPEND_ATOMS.has(node.definition.mnemonic)) {
    return [node];
  }

  const values = tokenizeArguments(node, symbols).map((arg) => arg.value);
  const pieces = splitValues(values, limits);
  if (!pieces) {
    return [node];
  }
  return pieces.map((piece) => ({ ...node, rawArguments: formatArguments(piece, symbols) }));
}

/**
 * Copy of a tree with over-long append atoms split into runs of siblings
 */
export function splitLongData(
  tree: AtomTree,
  symbols: SymbolTable,
  limits: SplitLimits = DEFAULT_SPLIT_LIMITS
): AtomTree {
  if (limits.maxTextLength < 1 || limits.maxDataBytes < 1) {
    throw new RangeError('split limits must be at least 1');
  }
  return { nodes: tree.nodes.flatMap((node) => splitNode(node, symbols, limits)) };
}
