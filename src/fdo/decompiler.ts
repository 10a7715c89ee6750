/**
 * Decompiler: atom trees and streams back to source text
 */

import { walk } from '../atoms/index.js';
import type { SymbolTable } from '../symbols/index.js';
import type { AtomTree } from '../types.js';
import { decode } from './decoder.js';
import type { LayoutOptions } from './encoder.js';

export const INDENT = '  ';

/**
 * Render a tree as source, one atom per line, two spaces per nesting level
 */
export function renderSource(tree: AtomTree): string {
  const lines: string[] = [];
  for (const node of walk(tree)) {
    const args = node.rawArguments ? ` ${node.rawArguments}` : '';
    lines.push(`${INDENT.repeat(node.depth)}${node.definition.mnemonic}${args}`);
  }
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

export function decompile(data: Uint8Array, symbols: SymbolTable, options: LayoutOptions = {}): string {
  return renderSource(decode(data, symbols, options).tree);
}
