/**
 * Compiler error taxonomy
 *
 * Every error carries a stable `code` so tool and CLI surfaces can report
 * failures as data.
 */

import type { CompileFailure, Divergence, Variant } from './types.js';

export abstract class FdoError extends Error {
  abstract readonly code: string;

  /** Source line the error refers to, when there is one */
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `line ${line}: ${message}`);
    this.name = new.target.name;
    this.line = line;
  }

  toFailure(): CompileFailure {
    return { type: this.code, message: this.message, line: this.line };
  }
}

export class ParseError extends FdoError {
  readonly code = 'parse_error';

  constructor(line: number, readonly text: string, reason: string) {
    super(`${reason}: ${JSON.stringify(text)}`, line);
  }
}

export class LookupError extends FdoError {
  readonly code = 'lookup_error';

  constructor(readonly mnemonic: string, line?: number) {
    super(`unknown mnemonic "${mnemonic}"`, line);
  }
}

export class ArgumentFormatError extends FdoError {
  readonly code = 'argument_format_error';

  constructor(
    readonly mnemonic: string,
    line: number,
    readonly offending: string,
    reason: string
  ) {
    super(`${mnemonic}: ${reason} (at ${JSON.stringify(offending)})`, line);
  }
}

export class StructuralError extends FdoError {
  readonly code = 'structural_error';
}

export class EncodingError extends FdoError {
  readonly code = 'encoding_error';

  constructor(readonly mnemonic: string, line: number, reason: string) {
    super(`${mnemonic}: ${reason}`, line);
  }
}

export class DecodeError extends FdoError {
  readonly code = 'decode_error';

  constructor(readonly offset: number, reason: string) {
    super(`offset ${offset}: ${reason}`);
  }
}

export class SymbolTableError extends FdoError {
  readonly code = 'symbol_table_error';

  constructor(readonly issues: string[]) {
    super(`invalid symbol table (${issues.length} issue${issues.length === 1 ? '' : 's'}): ${issues.slice(0, 5).join('; ')}`);
  }
}

export class FixtureIOError extends FdoError {
  readonly code = 'fixture_io_error';

  constructor(readonly path: string, cause: unknown) {
    super(`cannot read ${path}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.cause = cause;
  }
}

export class ChunkingError extends FdoError {
  readonly code = 'chunking_error';
}

/** Produced from validator reports; the validator records mismatches as data */
export class FixtureMismatchError extends FdoError {
  readonly code = 'fixture_mismatch';

  constructor(
    readonly fixture: string,
    readonly variant: Variant,
    readonly divergence: Divergence
  ) {
    super(`${fixture} [${variant}] diverges at offset ${divergence.offset}`);
  }
}

/**
 * Convert anything thrown during a compilation into a failure record
 */
export function toCompileFailure(err: unknown): CompileFailure {
  if (err instanceof FdoError) {
    return err.toFailure();
  }
  return { type: 'internal_error', message: err instanceof Error ? err.message : String(err) };
}
