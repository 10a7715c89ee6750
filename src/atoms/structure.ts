/**
 * Structural validation
 *
 * Runs the stream/object state machine over an atom tree in document order
 * and returns the outline it recognised. The structural atoms are the ones
 * the symbol table gives a role.
 */

import { StructuralError } from '../errors.js';
import type { AtomNode, AtomTree } from '../types.js';
import { walk } from './tree.js';

export type OutlineEntry =
  | { kind: 'atom'; node: AtomNode }
  | ObjectOutline
  | StreamOutline;

export interface ObjectOutline {
  kind: 'object';
  start: AtomNode;
  /** Absent when the object was closed by the end of its stream */
  end?: AtomNode;
  items: OutlineEntry[];
}

export interface StreamOutline {
  kind: 'stream';
  start: AtomNode;
  end?: AtomNode;
  items: OutlineEntry[];
}

type Frame = ObjectOutline | StreamOutline;

/**
 * Validate stream and object nesting, returning the outermost stream
 */
export function analyzeStructure(tree: AtomTree): StreamOutline {
  const stack: Frame[] = [];
  let root: StreamOutline | null = null;

  for (const node of walk(tree)) {
    const { mnemonic, role } = node.definition;
    const line = node.sourceLine;
    const top = stack[stack.length - 1];

    if (!top) {
      if (root) {
        throw new StructuralError(`${mnemonic} after the end of the stream`, line);
      }
      if (role !== 'stream-start') {
        throw new StructuralError(`stream must begin with a stream start atom, found ${mnemonic}`, line);
      }
      root = { kind: 'stream', start: node, items: [] };
      stack.push(root);
      continue;
    }

    switch (role) {
      case 'stream-start': {
        const stream: StreamOutline = { kind: 'stream', start: node, items: [] };
        top.items.push(stream);
        stack.push(stream);
        break;
      }

      case 'stream-end': {
        // Objects still open inside the stream close with it
        let frame = stack.pop();
        while (frame && frame.kind === 'object') {
          frame = stack.pop();
        }
        if (!frame) {
          throw new StructuralError(`${mnemonic} without an open stream`, line);
        }
        if (frame.start.depth !== node.depth) {
          throw new StructuralError(
            `${mnemonic} at nesting level ${node.depth} does not match the stream opened on line ${frame.start.sourceLine} at level ${frame.start.depth}`,
            line
          );
        }
        frame.end = node;
        break;
      }

      case 'object-start': {
        const object: ObjectOutline = { kind: 'object', start: node, items: [] };
        top.items.push(object);
        stack.push(object);
        break;
      }

      case 'object-sibling': {
        if (top.kind !== 'object') {
          throw new StructuralError(`${mnemonic} without an open object`, line);
        }
        stack.pop();
        const parent = stack[stack.length - 1];
        if (!parent) {
          throw new StructuralError(`${mnemonic} outside a stream`, line);
        }
        const sibling: ObjectOutline = { kind: 'object', start: node, items: [] };
        parent.items.push(sibling);
        stack.push(sibling);
        break;
      }

      case 'object-end': {
        if (top.kind !== 'object') {
          throw new StructuralError(`${mnemonic} without an open object`, line);
        }
        top.end = node;
        stack.pop();
        break;
      }

      default:
        top.items.push({ kind: 'atom', node });
    }
  }

  if (!root) {
    throw new StructuralError('empty input: no atoms');
  }

  const unclosed = stack.filter((frame): frame is StreamOutline => frame.kind === 'stream');
  const innermost = unclosed[unclosed.length - 1];
  if (innermost) {
    throw new StructuralError(
      `stream opened by ${innermost.start.definition.mnemonic} on line ${innermost.start.sourceLine} is never closed`
    );
  }

  return root;
}

/**
 * Count the objects in an outline, nested streams included
 */
export function countObjects(outline: StreamOutline | ObjectOutline): number {
  let count = 0;
  for (const item of outline.items) {
    if (item.kind === 'object') {
      count += 1 + countObjects(item);
    } else if (item.kind === 'stream') {
      count += countObjects(item);
    }
  }
  return count;
}
