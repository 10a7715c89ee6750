/**
 * fdo_lookup - Describe atoms from the symbol table
 */

import { formatArgParam, type SymbolTable } from '../symbols/index.js';
import type { AtomDefinition, AtomRole } from '../types.js';
import { asArgs, optionalString, ToolInputError } from './input.js';

export interface LookupInput {
  mnemonic?: string;
  prefix?: string;
}

export interface AtomDescription {
  mnemonic: string;
  protocol: number;
  atom: number;
  code: number;
  arguments: string[];
  role?: AtomRole;
}

export interface LookupResult {
  found: boolean;
  atoms: AtomDescription[];
  message: string;
}

const MAX_MATCHES = 50;

export function describeAtom(definition: AtomDefinition): AtomDescription {
  return {
    mnemonic: definition.mnemonic,
    protocol: definition.protocol,
    atom: definition.atom,
    code: definition.code,
    arguments: definition.argSignature.map(formatArgParam),
    ...(definition.role ? { role: definition.role } : {}),
  };
}

export function parseLookupInput(args: unknown): LookupInput {
  const input = asArgs(args);
  const parsed = { mnemonic: optionalString(input, 'mnemonic'), prefix: optionalString(input, 'prefix') };
  if (parsed.mnemonic === undefined && parsed.prefix === undefined) {
    throw new ToolInputError('either mnemonic or prefix is required');
  }
  return parsed;
}

export function lookup(symbols: SymbolTable, input: LookupInput): LookupResult {
  if (input.mnemonic !== undefined) {
    const definition = symbols.lookup(input.mnemonic);
    if (!definition) {
      return { found: false, atoms: [], message: `Unknown mnemonic "${input.mnemonic}".` };
    }
    return { found: true, atoms: [describeAtom(definition)], message: `${definition.mnemonic} is atom ${definition.protocol}/${definition.atom}.` };
  }

  const prefix = input.prefix ?? '';
  const matches = symbols
    .mnemonics()
    .filter((mnemonic) => mnemonic.startsWith(prefix))
    .sort()
    .slice(0, MAX_MATCHES)
    .map((mnemonic) => symbols.require(mnemonic));

  return {
    found: matches.length > 0,
    atoms: matches.map(describeAtom),
    message: `${matches.length} atom(s) starting with "${prefix}".`,
  };
}

/**
 * Tool definition for MCP
 */
export const lookupToolDef = {
  name: 'fdo_lookup',
  description: 'Look up an atom mnemonic (or all mnemonics with a prefix) and return its protocol, atom number and argument signature.',
  inputSchema: {
    type: 'object',
    properties: {
      mnemonic: {
        type: 'string',
        description: 'Exact, case-sensitive mnemonic such as man_start_object',
      },
      prefix: {
        type: 'string',
        description: 'List mnemonics beginning with this text, such as mat_',
      },
    },
  },
};
