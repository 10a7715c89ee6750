/**
 * Debug layout
 *
 * Each atom in document order is written as
 *
 *   [protocol] [atom] [depth] [argument length, u16 BE] [argument bytes]
 *
 * with fixed-width fields and a length prefix on every text value.
 */

import { walk } from '../atoms/index.js';
import { EncodingError } from '../errors.js';
import type { SymbolTable } from '../symbols/index.js';
import type { AtomTree, DecodedRecord } from '../types.js';
import { decodeArguments, encodeNodeArguments, type FieldRules } from './arguments.js';
import { ByteWriter, type ByteReader } from './bytes.js';
import { checkDepth, resolveDefinition, type LayoutStrategy } from './layout.js';

const MAX_U16 = 0xffff;

export const DEBUG_FIELDS: FieldRules = {
  writeInteger(out, value) {
    out.u32(value);
  },
  readInteger(input) {
    return input.u32('integer') | 0;
  },
  writeCoordinate(out, [first, second]) {
    out.u32(first);
    out.u32(second);
  },
  readCoordinate(input) {
    return [input.u32('coordinate'), input.u32('coordinate')];
  },
  writeEnum(out, code) {
    out.u16(code);
  },
  readEnum(input) {
    return input.u16('enum code');
  },
  writeText(out, bytes, _unprefixed, site) {
    if (bytes.length > MAX_U16) {
      throw new EncodingError(site.mnemonic, site.line, `text of ${bytes.length} bytes exceeds ${MAX_U16}`);
    }
    out.u16(bytes.length);
    out.append(bytes);
  },
  readText(input) {
    return input.take(input.u16('text length'), 'text');
  },
};

export const debugLayout: LayoutStrategy = {
  name: 'debug',
  variant: 'debug',

  encodeBody(tree: AtomTree, symbols: SymbolTable): Uint8Array {
    const out = new ByteWriter();

    for (const node of walk(tree)) {
      checkDepth(node);
      const args = encodeNodeArguments(node, symbols, DEBUG_FIELDS);
      if (args.length > MAX_U16) {
        throw new EncodingError(
          node.definition.mnemonic,
          node.sourceLine,
          `argument data of ${args.length} bytes exceeds ${MAX_U16}`
        );
      }

      out.u8(node.definition.protocol);
      out.u8(node.definition.atom);
      out.u8(node.depth);
      out.u16(args.length);
      out.append(args);
    }

    return out.toUint8Array();
  },

  decodeBody(body: ByteReader, symbols: SymbolTable): DecodedRecord[] {
    const records: DecodedRecord[] = [];

    while (body.remaining > 0) {
      const offset = body.offset;
      const protocol = body.u8('protocol');
      const atom = body.u8('atom');
      const depth = body.u8('depth');
      const length = body.u16('argument length');
      const definition = resolveDefinition(symbols, protocol, atom, offset);
      const values = decodeArguments(body.sub(length, 'argument data'), definition, DEBUG_FIELDS);
      records.push({ definition, depth, values, offset });
    }

    return records;
  },
};
