/**
 * FDO Compiler Type Definitions
 */

// ============================================================================
// Symbol Table
// ============================================================================

export type ArgType =
  | { kind: 'integer' }
  | { kind: 'hex-byte' }
  | { kind: 'quoted-string' }
  | { kind: 'coordinate-pair' }
  | { kind: 'enum-ref'; enumName: string }
  | { kind: 'opaque' };

/** one: required, optional: may be omitted, many: zero or more, some: one or more */
export type Arity = 'one' | 'optional' | 'many' | 'some';

export interface ArgParam {
  readonly type: ArgType;
  readonly arity: Arity;
}

export type AtomRole =
  | 'stream-start'
  | 'stream-end'
  | 'object-start'
  | 'object-end'
  | 'object-sibling';

export interface AtomDefinition {
  readonly mnemonic: string;
  /** protocol * 256 + atom */
  readonly code: number;
  readonly protocol: number;
  readonly atom: number;
  readonly argSignature: readonly ArgParam[];
  readonly role?: AtomRole;
}

// ============================================================================
// Atom Tree
// ============================================================================

export interface AtomNode {
  readonly definition: AtomDefinition;
  readonly rawArguments: string;
  readonly children: AtomNode[];
  readonly depth: number;
  /** 1-based source line; for decoded streams, the record ordinal */
  readonly sourceLine: number;
}

export interface AtomTree {
  readonly nodes: AtomNode[];
}

// ============================================================================
// Arguments
// ============================================================================

export type ArgValue =
  | { kind: 'integer'; value: number }
  | { kind: 'hex-byte'; value: number }
  | { kind: 'quoted-string'; value: string }
  | { kind: 'coordinate-pair'; value: readonly [number, number] }
  | { kind: 'enum-ref'; enumName: string; code: number }
  | { kind: 'opaque'; value: string };

/** A value paired with the signature slot it fills */
export interface BoundArgument {
  readonly param: ArgParam;
  /** Index of the param in the signature */
  readonly slot: number;
  readonly value: ArgValue;
}

// ============================================================================
// Encoded Streams
// ============================================================================

export type Variant = 'debug' | 'production';

export const VARIANTS: readonly Variant[] = ['debug', 'production'];

export interface EncodedStream {
  readonly variant: Variant;
  /** Exactly two bytes */
  readonly header: Uint8Array;
  readonly body: Uint8Array;
}

/** One atom record read back from a stream body */
export interface DecodedRecord {
  readonly definition: AtomDefinition;
  readonly depth: number;
  readonly values: ArgValue[];
  /** Offset of the record within the full stream, header included */
  readonly offset: number;
}

export interface DecodedStream {
  readonly variant: Variant;
  readonly records: DecodedRecord[];
  readonly tree: AtomTree;
}

// ============================================================================
// Validator
// ============================================================================

export interface GoldenFixture {
  readonly name: string;
  readonly inputText: string;
  readonly expected: Partial<Record<Variant, Uint8Array>>;
  /** Expected files whose variant could not be determined */
  readonly untagged: string[];
}

export interface Divergence {
  readonly offset: number;
  readonly expectedContext: string;
  readonly actualContext: string;
}

export interface VariantComparison {
  readonly variant: Variant;
  readonly compiled: boolean;
  readonly outputLength?: number;
  readonly expectedLength?: number;
  readonly matchingBytes?: number;
  readonly exactMatch?: boolean;
  readonly divergence?: Divergence;
  readonly error?: CompileFailure;
}

export interface FixtureReport {
  readonly name: string;
  readonly exactMatch: boolean;
  readonly comparisons: VariantComparison[];
  readonly untagged: string[];
}

export interface ValidationReport {
  readonly directory: string;
  readonly totalFixtures: number;
  readonly exactMatchCount: number;
  readonly comparisons: number;
  readonly expectedBytes: number;
  readonly matchingBytes: number;
  /** Percentage of expected bytes reproduced at the same offset */
  readonly byteAccuracy: number;
  readonly cancelled: boolean;
  readonly fixtures: FixtureReport[];
}

// ============================================================================
// Compile results
// ============================================================================

export interface CompileFailure {
  readonly type: string;
  readonly message: string;
  readonly line?: number;
}

export type CompileResult =
  | { success: true; stream: EncodedStream }
  | { success: false; error: CompileFailure };

// ============================================================================
// Script Library
// ============================================================================

export interface Script {
  id: number;
  name: string;
  content: string;
  isFavorite: boolean;
  createdAt: number;
  updatedAt: number;
}

export interface CompileHistoryEntry {
  id: number;
  scriptId: number;
  variant: Variant;
  success: boolean;
  size?: number;
  error?: string;
  compiledAt: number;
}

// ============================================================================
// Configuration
// ============================================================================

export interface FdoConfig {
  default_variant: Variant;
  golden_dir: string;
  /** Replacement for the bundled atom table */
  symbol_table_path?: string;
  /** Validator pool size; 0 means one lane per available core */
  validator_concurrency: number;
  /** Spaces per tab when expanding indentation; 0 rejects tabs */
  tab_width: number;
}

export const DEFAULT_CONFIG: FdoConfig = {
  default_variant: 'production',
  golden_dir: 'fixtures/golden',
  validator_concurrency: 0,
  tab_width: 0,
};
