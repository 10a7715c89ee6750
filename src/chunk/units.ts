/**
 * Atom units: the pieces of a stream that are never separated
 *
 * An action atom carries the stream it runs as nested records; the action
 * and everything nested under it form one unit. Every other record is a unit
 * of its own.
 */

import { walk } from '../atoms/index.js';
import type { AtomNode, AtomTree, DecodedRecord } from '../types.js';

export const ACTION_ATOMS: ReadonlySet<string> = new Set([
  'act_set_criterion',
  'act_do_action',
  'act_replace_action',
  'act_replace_select_action',
  'act_append_action',
  'act_append_select_action',
  'act_prepend_action',
  'act_prepend_select_action',
  'act_insert_select_action',
]);

export interface AtomUnit {
  /** Index of the unit's first record */
  first: number;
  /** Index of its last record */
  last: number;
  isAction: boolean;
  /** Byte range in the full stream; the first unit also holds the header */
  start: number;
  end: number;
}

/**
 * Group decoded records into units with their byte ranges
 */
export function groupRecords(records: readonly DecodedRecord[], streamLength: number): AtomUnit[] {
  const units: AtomUnit[] = [];
  let index = 0;

  while (index < records.length) {
    const record = records[index];
    let last = index;
    if (ACTION_ATOMS.has(record.definition.mnemonic)) {
      while (last + 1 < records.length && records[last + 1].depth > record.depth) {
        last++;
      }
    }

    const next = records[last + 1];
    units.push({
      first: index,
      last,
      isAction: last > index,
      start: index === 0 ? 0 : record.offset,
      end: next ? next.offset : streamLength,
    });
    index = last + 1;
  }

  return units;
}

/**
 * Units of a parsed tree, as the nodes that head them
 */
export function groupNodes(tree: AtomTree): Array<{ node: AtomNode; isAction: boolean }> {
  const units: Array<{ node: AtomNode; isAction: boolean }> = [];
  const visit = (node: AtomNode): void => {
    if (ACTION_ATOMS.has(node.definition.mnemonic) && node.children.length > 0) {
      units.push({ node, isAction: true });
      return;
    }
    units.push({ node, isAction: false });
    node.children.forEach(visit);
  };
  tree.nodes.forEach(visit);
  return units;
}

/**
 * Source lines of a unit, unindented
 */
export function unitLines(node: AtomNode, isAction: boolean): string[] {
  const nodes = isAction ? [...walk({ nodes: [node] })] : [node];
  return nodes.map((n) => (n.rawArguments ? `${n.definition.mnemonic} ${n.rawArguments}` : n.definition.mnemonic));
}
