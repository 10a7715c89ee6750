/**
 * Atom tree exports
 */

export { parse, parseSource, parseTree, splitLines, isSkippedLine, type ParsedSource } from './parser.js';
export {
  analyzeStructure,
  countObjects,
  type OutlineEntry,
  type ObjectOutline,
  type StreamOutline,
} from './structure.js';
export { walk, countAtoms, maxDepth, treeShape, buildTree, type TreeShape } from './tree.js';
