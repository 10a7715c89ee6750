/**
 * FDO source parser
 *
 * One atom per line. Leading spaces give the nesting: a line nests under the
 * closest preceding line with fewer leading spaces. Argument text is kept
 * verbatim and only interpreted when the atom is encoded.
 */

import { ParseError } from '../errors.js';
import type { SymbolTable } from '../symbols/index.js';
import type { AtomNode, AtomTree } from '../types.js';
import { analyzeStructure, type StreamOutline } from './structure.js';

const LINE_PATTERN = /^([A-Za-z_][A-Za-z0-9_]*)(?:\s+(.*)|(<.*))?$/;
const INDENT_PATTERN = /^[ \t]*/;

export interface ParsedSource {
  tree: AtomTree;
  outline: StreamOutline;
}

/**
 * Split source text into lines, normalising CRLF and CR endings
 */
export function splitLines(text: string): string[] {
  const withoutBom = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  return withoutBom.replace(/\r\n?/g, '\n').split('\n');
}

/**
 * Lines that carry no atom: blanks, `<` comments and lone `>` block closers
 */
export function isSkippedLine(trimmed: string): boolean {
  return trimmed === '' || trimmed.startsWith('<') || trimmed === '>';
}

/**
 * Parse source into an atom tree without structural validation
 */
export function parseTree(text: string, symbols: SymbolTable): AtomTree {
  const nodes: AtomNode[] = [];
  const stack: Array<{ indent: number; node: AtomNode }> = [];
  const lines = splitLines(text);

  for (let i = 0; i < lines.length; i++) {
    const lineNumber = i + 1;
    const line = lines[i];
    const trimmed = line.trim();
    if (isSkippedLine(trimmed)) {
      continue;
    }

    const leading = INDENT_PATTERN.exec(line)?.[0] ?? '';
    if (leading.includes('\t')) {
      throw new ParseError(lineNumber, line, 'tab in indentation');
    }
    const indent = leading.length;

    const match = LINE_PATTERN.exec(trimmed);
    if (!match) {
      throw new ParseError(lineNumber, trimmed, 'expected a mnemonic followed by optional arguments');
    }
    const mnemonic = match[1];
    const rawArguments = (match[2] ?? match[3] ?? '').trim();
    const definition = symbols.require(mnemonic, lineNumber);

    while (stack.length > 0 && stack[stack.length - 1].indent >= indent) {
      stack.pop();
    }
    const parent = stack[stack.length - 1];

    const node: AtomNode = {
      definition,
      rawArguments,
      children: [],
      depth: stack.length,
      sourceLine: lineNumber,
    };

    if (parent) {
      parent.node.children.push(node);
    } else {
      nodes.push(node);
    }
    stack.push({ indent, node });
  }

  return { nodes };
}

/**
 * Parse source and validate its stream structure
 */
export function parseSource(text: string, symbols: SymbolTable): ParsedSource {
  const tree = parseTree(text, symbols);
  const outline = analyzeStructure(tree);
  return { tree, outline };
}

/**
 * Parse source into a validated atom tree
 */
export function parse(text: string, symbols: SymbolTable): AtomTree {
  return parseSource(text, symbols).tree;
}
