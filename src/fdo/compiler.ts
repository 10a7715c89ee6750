/**
 * Compiler facade
 *
 * Binds a symbol table and layout choices to the parse, encode and decode
 * stages.
 */

import { parseSource, type ParsedSource } from '../atoms/index.js';
import { toCompileFailure } from '../errors.js';
import { getDefaultSymbolTable, type SymbolTable } from '../symbols/index.js';
import type { AtomTree, CompileResult, DecodedStream, EncodedStream, Variant } from '../types.js';
import { decode } from './decoder.js';
import { decompile } from './decompiler.js';
import { encode, type LayoutOptions } from './encoder.js';

export interface CompilerOptions extends LayoutOptions {
  symbols?: SymbolTable;
}

export interface Compiler {
  readonly symbols: SymbolTable;
  parse(source: string): ParsedSource;
  encode(tree: AtomTree, variant: Variant): EncodedStream;
  /** Parse and encode; throws the first error met */
  compile(source: string, variant: Variant): EncodedStream;
  /** Parse and encode, reporting failure as data */
  tryCompile(source: string, variant: Variant): CompileResult;
  decode(data: Uint8Array): DecodedStream;
  decompile(data: Uint8Array): string;
}

export function createCompiler(options: CompilerOptions = {}): Compiler {
  const symbols = options.symbols ?? getDefaultSymbolTable();
  const layouts: LayoutOptions = { debug: options.debug, production: options.production };

  const compiler: Compiler = {
    symbols,
    parse: (source) => parseSource(source, symbols),
    encode: (tree, variant) => encode(tree, variant, symbols, layouts),
    compile: (source, variant) => encode(parseSource(source, symbols).tree, variant, symbols, layouts),
    tryCompile(source, variant) {
      try {
        return { success: true, stream: compiler.compile(source, variant) };
      } catch (error) {
        return { success: false, error: toCompileFailure(error) };
      }
    },
    decode: (data) => decode(data, symbols, layouts),
    decompile: (data) => decompile(data, symbols, layouts),
  };

  return compiler;
}
