/**
 * Symbol Table
 *
 * Immutable registry from mnemonic to atom definition, with the enum tables
 * that EnumRef arguments resolve through. Built once and passed explicitly to
 * every stage that needs it.
 */

import { LookupError } from '../errors.js';
import type { AtomDefinition } from '../types.js';

export type EnumTable = ReadonlyMap<string, number>;

export class SymbolTable {
  private readonly byMnemonic: ReadonlyMap<string, AtomDefinition>;
  private readonly byAtomCode: ReadonlyMap<number, AtomDefinition>;
  private readonly enums: ReadonlyMap<string, EnumTable>;
  private readonly enumLabels: ReadonlyMap<string, ReadonlyMap<number, string>>;

  constructor(definitions: readonly AtomDefinition[], enums: ReadonlyMap<string, EnumTable>) {
    const byMnemonic = new Map<string, AtomDefinition>();
    const byAtomCode = new Map<number, AtomDefinition>();
    for (const def of definitions) {
      const frozen = Object.freeze({
        ...def,
        argSignature: Object.freeze(def.argSignature.map((param) => Object.freeze({ ...param }))),
      });
      byMnemonic.set(def.mnemonic, frozen);
      byAtomCode.set(def.code, frozen);
    }

    const labels = new Map<string, ReadonlyMap<number, string>>();
    for (const [enumName, table] of enums) {
      const reverse = new Map<number, string>();
      for (const [label, code] of table) {
        // First label wins when two labels share a code
        if (!reverse.has(code)) {
          reverse.set(code, label);
        }
      }
      labels.set(enumName, reverse);
    }

    this.byMnemonic = byMnemonic;
    this.byAtomCode = byAtomCode;
    this.enums = enums;
    this.enumLabels = labels;
    Object.freeze(this);
  }

  /**
   * Exact, case-sensitive lookup
   */
  lookup(mnemonic: string): AtomDefinition | undefined {
    return this.byMnemonic.get(mnemonic);
  }

  /**
   * Lookup that raises LookupError for unknown mnemonics
   */
  require(mnemonic: string, line?: number): AtomDefinition {
    const def = this.byMnemonic.get(mnemonic);
    if (!def) {
      throw new LookupError(mnemonic, line);
    }
    return def;
  }

  byCode(code: number): AtomDefinition | undefined {
    return this.byAtomCode.get(code);
  }

  hasEnum(enumName: string): boolean {
    return this.enums.has(enumName);
  }

  /** Resolve an enum label to its code */
  enumCode(enumName: string, label: string): number | undefined {
    return this.enums.get(enumName)?.get(label);
  }

  /** Resolve an enum code back to its label */
  enumLabel(enumName: string, code: number): string | undefined {
    return this.enumLabels.get(enumName)?.get(code);
  }

  mnemonics(): string[] {
    return [...this.byMnemonic.keys()];
  }

  get size(): number {
    return this.byMnemonic.size;
  }
}
