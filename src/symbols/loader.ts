/**
 * Symbol table loading and validation
 *
 * The table ships as data/atoms.json. Every row is checked on load and all
 * problems are reported together.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { SymbolTableError } from '../errors.js';
import type { ArgParam, ArgType, Arity, AtomDefinition, AtomRole } from '../types.js';
import { SymbolTable, type EnumTable } from './table.js';

export const DEFAULT_TABLE_PATH = fileURLToPath(new URL('../../data/atoms.json', import.meta.url));

export const MAX_PROTOCOL = 31;
export const MAX_ATOM = 255;
export const MAX_ENUM_CODE = 0x3fff;

const MNEMONIC_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const SIGNATURE_PATTERN = /^(integer|hex-byte|string|coordinate-pair|opaque|enum:([A-Za-z_][A-Za-z0-9_]*))([?*+]?)$/;
const ROLES: readonly AtomRole[] = ['stream-start', 'stream-end', 'object-start', 'object-end', 'object-sibling'];

const ARITY_SUFFIX: Record<string, Arity> = {
  '': 'one',
  '?': 'optional',
  '*': 'many',
  '+': 'some',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRole(value: unknown): value is AtomRole {
  return ROLES.some((role) => role === value);
}

function isIntegerIn(value: unknown, min: number, max: number): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max;
}

/**
 * Parse one signature entry such as "integer", "hex-byte*" or "enum:criterion?"
 */
export function parseArgParam(text: string): ArgParam | null {
  const match = SIGNATURE_PATTERN.exec(text);
  if (!match) {
    return null;
  }

  const [, kind, enumName, suffix] = match;
  let type: ArgType;
  if (enumName !== undefined) {
    type = { kind: 'enum-ref', enumName };
  } else if (kind === 'string') {
    type = { kind: 'quoted-string' };
  } else if (kind === 'integer' || kind === 'hex-byte' || kind === 'coordinate-pair' || kind === 'opaque') {
    type = { kind };
  } else {
    return null;
  }

  return { type, arity: ARITY_SUFFIX[suffix] ?? 'one' };
}

/**
 * Inverse of parseArgParam
 */
export function formatArgParam(param: ArgParam): string {
  const suffix = Object.entries(ARITY_SUFFIX).find(([, arity]) => arity === param.arity)?.[0] ?? '';
  switch (param.type.kind) {
    case 'quoted-string':
      return `string${suffix}`;
    case 'enum-ref':
      return `enum:${param.type.enumName}${suffix}`;
    default:
      return `${param.type.kind}${suffix}`;
  }
}

/**
 * Check the ordering rules of a signature, returning a reason when it breaks one
 */
export function checkSignature(params: readonly ArgParam[]): string | null {
  let seenOptional = false;
  for (let i = 0; i < params.length; i++) {
    const { type, arity } = params[i];
    const last = i === params.length - 1;

    if ((arity === 'many' || arity === 'some') && !last) {
      return 'a repeated argument must be the last one';
    }
    if ((arity === 'many' || arity === 'some') && (type.kind === 'quoted-string' || type.kind === 'opaque')) {
      return 'text arguments cannot repeat';
    }
    if ((arity === 'many' || arity === 'some') && seenOptional) {
      return 'a repeated argument cannot follow an optional one';
    }
    if (arity === 'optional') {
      seenOptional = true;
    } else if (seenOptional) {
      return 'required arguments cannot follow optional ones';
    }
  }
  return null;
}

/**
 * Build a SymbolTable from parsed JSON content
 */
export function buildSymbolTable(content: unknown): SymbolTable {
  const issues: string[] = [];

  if (!isRecord(content)) {
    throw new SymbolTableError(['table must be a JSON object']);
  }

  const enums = new Map<string, EnumTable>();
  if (content.enums !== undefined) {
    if (!isRecord(content.enums)) {
      issues.push('enums must be an object');
    } else {
      for (const [enumName, entries] of Object.entries(content.enums)) {
        if (!isRecord(entries)) {
          issues.push(`enum ${enumName}: must map labels to codes`);
          continue;
        }
        const table = new Map<string, number>();
        for (const [label, code] of Object.entries(entries)) {
          if (!isIntegerIn(code, 0, MAX_ENUM_CODE)) {
            issues.push(`enum ${enumName}.${label}: code must be an integer in 0..${MAX_ENUM_CODE}`);
            continue;
          }
          table.set(label, code);
        }
        enums.set(enumName, table);
      }
    }
  }

  if (!Array.isArray(content.atoms)) {
    throw new SymbolTableError([...issues, 'atoms must be an array']);
  }

  const definitions: AtomDefinition[] = [];
  const mnemonics = new Set<string>();
  const codes = new Map<number, string>();

  content.atoms.forEach((row: unknown, index: number) => {
    const where = `atoms[${index}]`;
    if (!isRecord(row)) {
      issues.push(`${where}: must be an object`);
      return;
    }

    const { mnemonic, protocol, atom, args, role } = row;
    if (typeof mnemonic !== 'string' || !MNEMONIC_PATTERN.test(mnemonic)) {
      issues.push(`${where}: invalid mnemonic`);
      return;
    }
    if (mnemonics.has(mnemonic)) {
      issues.push(`${mnemonic}: duplicate mnemonic`);
      return;
    }
    mnemonics.add(mnemonic);

    if (!isIntegerIn(protocol, 0, MAX_PROTOCOL)) {
      issues.push(`${mnemonic}: protocol must be an integer in 0..${MAX_PROTOCOL}`);
      return;
    }
    if (!isIntegerIn(atom, 0, MAX_ATOM)) {
      issues.push(`${mnemonic}: atom must be an integer in 0..${MAX_ATOM}`);
      return;
    }

    const code = protocol * 256 + atom;
    const holder = codes.get(code);
    if (holder !== undefined) {
      issues.push(`${mnemonic}: code ${protocol}/${atom} already used by ${holder}`);
      return;
    }
    codes.set(code, mnemonic);

    const argList: unknown[] = args === undefined ? [] : Array.isArray(args) ? args : [args];
    const params: ArgParam[] = [];
    for (const entry of argList) {
      const param = typeof entry === 'string' ? parseArgParam(entry) : null;
      if (!param) {
        issues.push(`${mnemonic}: unknown argument type ${JSON.stringify(entry)}`);
        return;
      }
      if (param.type.kind === 'enum-ref' && !enums.has(param.type.enumName)) {
        issues.push(`${mnemonic}: unknown enum "${param.type.enumName}"`);
        return;
      }
      params.push(param);
    }

    const signatureProblem = checkSignature(params);
    if (signatureProblem) {
      issues.push(`${mnemonic}: ${signatureProblem}`);
      return;
    }

    let atomRole: AtomRole | undefined;
    if (role !== undefined) {
      if (!isRole(role)) {
        issues.push(`${mnemonic}: unknown role ${JSON.stringify(role)}`);
        return;
      }
      atomRole = role;
    }

    definitions.push({
      mnemonic,
      code,
      protocol,
      atom,
      argSignature: params,
      ...(atomRole ? { role: atomRole } : {}),
    });
  });

  if (issues.length > 0) {
    throw new SymbolTableError(issues);
  }

  return new SymbolTable(definitions, enums);
}

/**
 * Load a symbol table from a JSON file
 */
export function loadSymbolTable(path: string = DEFAULT_TABLE_PATH): SymbolTable {
  let content: unknown;
  try {
    content = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new SymbolTableError([`cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`]);
  }
  return buildSymbolTable(content);
}

let defaultTable: SymbolTable | null = null;

/**
 * The bundled table, loaded on first use
 */
export function getDefaultSymbolTable(): SymbolTable {
  if (!defaultTable) {
    defaultTable = loadSymbolTable();
  }
  return defaultTable;
}
