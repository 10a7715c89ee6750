/**
 * Production layout: context-compact strategy
 *
 * Each record opens with a flag byte:
 *
 *   0x80  depth differs from the previous record; a depth byte follows
 *   0x40  no argument data; no length follows
 *   0x20  same protocol as the previous record
 *
 * Without 0x20 the low five bits hold the protocol and an atom byte follows.
 * With it they hold the atom number, 31 meaning an atom byte follows.
 * Argument data is preceded by a one-byte length (< 0x80) or a two-byte
 * length with the top bit set.
 *
 * Integers are zigzag-mapped and written with a two-bit width prefix; enum
 * codes and coordinates use the same width-prefixed form unsigned. A text
 * value that ends the argument data carries no length prefix.
 *
 * No record is ever longer than its Debug counterpart.
 */

import { walk } from '../atoms/index.js';
import { DecodeError, EncodingError } from '../errors.js';
import type { SymbolTable } from '../symbols/index.js';
import type { AtomTree, DecodedRecord } from '../types.js';
import { decodeArguments, encodeNodeArguments, type FieldRules, type FieldSite } from './arguments.js';
import { ByteWriter, type ByteReader } from './bytes.js';
import { checkDepth, resolveDefinition, type LayoutStrategy } from './layout.js';

export const FLAG_DEPTH = 0x80;
export const FLAG_NO_DATA = 0x40;
export const FLAG_SAME_PROTOCOL = 0x20;
export const LOW_BITS = 0x1f;
export const ATOM_ESCAPE = 0x1f;

export const MAX_COMPACT = 0x3fffffff;
export const MAX_LENGTH = 0x7fff;

/**
 * Unsigned value with a two-bit width prefix: 1 to 4 bytes, 6/14/22/30 value bits
 */
export function writeCompactUint(out: ByteWriter, value: number, site: FieldSite): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_COMPACT) {
    throw new EncodingError(site.mnemonic, site.line, `value ${value} does not fit a compact field`);
  }
  if (value < 0x40) {
    out.u8(value);
  } else if (value < 0x4000) {
    out.u8(0x40 | (value >>> 8));
    out.u8(value & 0xff);
  } else if (value < 0x400000) {
    out.u8(0x80 | (value >>> 16));
    out.u8((value >>> 8) & 0xff);
    out.u8(value & 0xff);
  } else {
    out.u8(0xc0 | (value >>> 24));
    out.u8((value >>> 16) & 0xff);
    out.u8((value >>> 8) & 0xff);
    out.u8(value & 0xff);
  }
}

export function readCompactUint(input: ByteReader): number {
  const lead = input.u8('compact value');
  const width = (lead >>> 6) + 1;
  let value = lead & 0x3f;
  for (let i = 1; i < width; i++) {
    value = value * 256 + input.u8('compact value');
  }
  return value;
}

export function zigzag(value: number): number {
  return value >= 0 ? value * 2 : -value * 2 - 1;
}

export function unzigzag(value: number): number {
  return value % 2 === 0 ? value / 2 : -(value + 1) / 2;
}

export function writeLength(out: ByteWriter, length: number, site: FieldSite): void {
  if (length < 0x80) {
    out.u8(length);
  } else if (length <= MAX_LENGTH) {
    out.u16(0x8000 | length);
  } else {
    throw new EncodingError(site.mnemonic, site.line, `length ${length} exceeds ${MAX_LENGTH}`);
  }
}

export function readLength(input: ByteReader): number {
  const first = input.u8('length');
  if ((first & 0x80) === 0) {
    return first;
  }
  return ((first & 0x7f) << 8) | input.u8('length');
}

export const COMPACT_FIELDS: FieldRules = {
  writeInteger(out, value, site) {
    writeCompactUint(out, zigzag(value), site);
  },
  readInteger(input) {
    return unzigzag(readCompactUint(input));
  },
  writeCoordinate(out, [first, second], site) {
    writeCompactUint(out, first, site);
    writeCompactUint(out, second, site);
  },
  readCoordinate(input) {
    return [readCompactUint(input), readCompactUint(input)];
  },
  writeEnum(out, code, site) {
    writeCompactUint(out, code, site);
  },
  readEnum(input) {
    return readCompactUint(input);
  },
  writeText(out, bytes, unprefixed, site) {
    if (!unprefixed) {
      writeLength(out, bytes.length, site);
    }
    out.append(bytes);
  },
  readText(input, unprefixed) {
    const length = unprefixed ? input.remaining : readLength(input);
    return input.take(length, 'text');
  },
};

export const compactLayout: LayoutStrategy = {
  name: 'context-compact',
  variant: 'production',

  encodeBody(tree: AtomTree, symbols: SymbolTable): Uint8Array {
    const out = new ByteWriter();
    let previousProtocol: number | null = null;
    let previousDepth = 0;

    for (const node of walk(tree)) {
      checkDepth(node);
      const { protocol, atom, mnemonic } = node.definition;
      const site: FieldSite = { mnemonic, line: node.sourceLine };
      const args = encodeNodeArguments(node, symbols, COMPACT_FIELDS);

      let lead = 0;
      const trailer: number[] = [];

      if (protocol === previousProtocol) {
        lead |= FLAG_SAME_PROTOCOL;
        if (atom < ATOM_ESCAPE) {
          lead |= atom;
        } else {
          lead |= ATOM_ESCAPE;
          trailer.push(atom);
        }
      } else {
        lead |= protocol;
        trailer.push(atom);
      }

      if (node.depth !== previousDepth) {
        lead |= FLAG_DEPTH;
        trailer.push(node.depth);
      }

      if (args.length === 0) {
        lead |= FLAG_NO_DATA;
      }

      out.u8(lead);
      out.append(trailer);
      if (args.length > 0) {
        writeLength(out, args.length, site);
        out.append(args);
      }

      previousProtocol = protocol;
      previousDepth = node.depth;
    }

    return out.toUint8Array();
  },

  decodeBody(body: ByteReader, symbols: SymbolTable): DecodedRecord[] {
    const records: DecodedRecord[] = [];
    let previousProtocol: number | null = null;
    let previousDepth = 0;

    while (body.remaining > 0) {
      const offset = body.offset;
      const lead = body.u8('record flags');

      let protocol: number;
      let atom: number;
      if (lead & FLAG_SAME_PROTOCOL) {
        if (previousProtocol === null) {
          throw new DecodeError(offset, 'first record cannot reuse a previous protocol');
        }
        protocol = previousProtocol;
        atom = (lead & LOW_BITS) === ATOM_ESCAPE ? body.u8('atom') : lead & LOW_BITS;
      } else {
        protocol = lead & LOW_BITS;
        atom = body.u8('atom');
      }

      const depth = lead & FLAG_DEPTH ? body.u8('depth') : previousDepth;
      const definition = resolveDefinition(symbols, protocol, atom, offset);
      const length = lead & FLAG_NO_DATA ? 0 : readLength(body);
      const values = decodeArguments(body.sub(length, 'argument data'), definition, COMPACT_FIELDS);

      records.push({ definition, depth, values, offset });
      previousProtocol = protocol;
      previousDepth = depth;
    }

    return records;
  },
};
