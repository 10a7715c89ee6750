/**
 * MCP Tools Module
 */

export { ToolInputError, type ToolContext } from './input.js';
export { compile, compileToolDef, parseCompileInput, type CompileResult, type CompileInput } from './compile.js';
export {
  decompile,
  decompileToolDef,
  parseDecompileInput,
  decodeData,
  type DecompileResult,
  type DecompileInput,
} from './decompile.js';
export { validate, validateToolDef, parseValidateInput, type ValidateResult, type ValidateInput } from './validate.js';
export { lookup, lookupToolDef, parseLookupInput, describeAtom, type LookupResult, type AtomDescription } from './lookup.js';
export { scripts, scriptsToolDef, parseScriptsInput, SCRIPT_ACTIONS, type ScriptsResult, type ScriptsInput } from './scripts.js';
export { chunk, chunkToolDef, parseChunkInput, type ChunkToolResult, type ChunkInput } from './chunk.js';
