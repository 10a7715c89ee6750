/**
 * FDO stream encoding exports
 */

export {
  tokenizeArguments,
  formatArguments,
  formatValue,
  quoteString,
  encodeArguments,
  encodeNodeArguments,
  decodeArguments,
  isUnprefixedText,
  describeType,
  INT32_MIN,
  INT32_MAX,
  UINT32_MAX,
  type FieldRules,
  type FieldSite,
} from './arguments.js';
export { ByteWriter, ByteReader, encodeLatin1, decodeLatin1, concatBytes, toHex, fromHex } from './bytes.js';
export { DEBUG_FIELDS, debugLayout } from './debug.js';
export {
  COMPACT_FIELDS,
  compactLayout,
  writeCompactUint,
  readCompactUint,
  zigzag,
  unzigzag,
  writeLength,
  readLength,
  FLAG_DEPTH,
  FLAG_NO_DATA,
  FLAG_SAME_PROTOCOL,
} from './production.js';
export { MAX_DEPTH, resolveDefinition, type LayoutStrategy } from './layout.js';
export { STREAM_HEADERS, HEADER_LENGTH, headerFor, detectVariant } from './detect.js';
export { encode, layoutFor, streamBytes, type LayoutOptions } from './encoder.js';
export { decode } from './decoder.js';
export { renderSource, decompile, INDENT } from './decompiler.js';
export { createCompiler, type Compiler, type CompilerOptions } from './compiler.js';
