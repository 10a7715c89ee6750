/**
 * Argument Encoder
 *
 * Interprets an atom's raw argument text against its declared signature and
 * converts the resulting values to bytes using a variant's field rules.
 * The signature decides how each literal is read; values are never sniffed.
 */

import { ArgumentFormatError, DecodeError } from '../errors.js';
import { MAX_ENUM_CODE, type SymbolTable } from '../symbols/index.js';
import type { ArgParam, ArgType, ArgValue, AtomDefinition, AtomNode, BoundArgument } from '../types.js';
import { ByteWriter, decodeLatin1, encodeLatin1, type ByteReader } from './bytes.js';

export const INT32_MIN = -0x80000000;
export const INT32_MAX = 0x7fffffff;
export const UINT32_MAX = 0xffffffff;

/** Where a field is being written, for error reports */
export interface FieldSite {
  mnemonic: string;
  line: number;
}

/**
 * Per-variant byte layout of individual argument fields
 */
export interface FieldRules {
  writeInteger(out: ByteWriter, value: number, site: FieldSite): void;
  readInteger(input: ByteReader): number;
  writeCoordinate(out: ByteWriter, value: readonly [number, number], site: FieldSite): void;
  readCoordinate(input: ByteReader): [number, number];
  writeEnum(out: ByteWriter, code: number, site: FieldSite): void;
  readEnum(input: ByteReader): number;
  /** `unprefixed` is set when the text runs to the end of the argument data */
  writeText(out: ByteWriter, bytes: Uint8Array, unprefixed: boolean, site: FieldSite): void;
  readText(input: ByteReader, unprefixed: boolean): Uint8Array;
}

const HEX_BYTE_PATTERN = /^([0-9A-Fa-f]{1,2})[xX]$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const COORDINATE_PATTERN = /^(\d+)\s*-\s*(\d+)$/;
const ENUM_LABEL_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function describeType(type: ArgType): string {
  switch (type.kind) {
    case 'integer':
      return 'integer';
    case 'hex-byte':
      return 'hex byte';
    case 'quoted-string':
      return 'quoted string';
    case 'coordinate-pair':
      return 'coordinate pair';
    case 'enum-ref':
      return `${type.enumName} value`;
    case 'opaque':
      return 'raw value';
  }
}

/**
 * Whether a text argument in this slot is written without a length prefix
 *
 * Only a required text argument in the last slot qualifies: its end is the
 * end of the argument data.
 */
export function isUnprefixedText(signature: readonly ArgParam[], slot: number): boolean {
  const param = signature[slot];
  return (
    slot === signature.length - 1 &&
    param.arity === 'one' &&
    (param.type.kind === 'quoted-string' || param.type.kind === 'opaque')
  );
}

class ArgumentCursor {
  private position = 0;

  constructor(private readonly text: string) {}

  atEnd(): boolean {
    return this.position >= this.text.length;
  }

  peek(): string {
    return this.text.charAt(this.position);
  }

  next(): string {
    return this.text.charAt(this.position++);
  }

  skipSpaces(): void {
    while (!this.atEnd() && /\s/.test(this.peek())) {
      this.position++;
    }
  }

  consume(char: string): boolean {
    if (this.peek() === char) {
      this.position++;
      return true;
    }
    return false;
  }

  /** Text up to the next comma, trimmed */
  readBare(): string {
    const start = this.position;
    while (!this.atEnd() && this.peek() !== ',') {
      this.position++;
    }
    return this.text.slice(start, this.position).trim();
  }

  readRest(): string {
    const rest = this.text.slice(this.position).trim();
    this.position = this.text.length;
    return rest;
  }

  rest(): string {
    return this.text.slice(this.position);
  }
}

/**
 * Read the argument text of one atom into typed values
 */
export function tokenizeArguments(node: AtomNode, symbols: SymbolTable): BoundArgument[] {
  const { definition, rawArguments, sourceLine } = node;
  const fail = (offending: string, reason: string): never => {
    throw new ArgumentFormatError(definition.mnemonic, sourceLine, offending, reason);
  };

  let body = rawArguments.trim();
  if (body.startsWith('<')) {
    if (!body.endsWith('>')) {
      fail(rawArguments, 'unterminated argument list');
    }
    body = body.slice(1, -1);
  }

  const signature = definition.argSignature;
  const cursor = new ArgumentCursor(body);
  const bound: BoundArgument[] = [];
  cursor.skipSpaces();

  for (let slot = 0; slot < signature.length; slot++) {
    const param = signature[slot];
    const repeats = param.arity === 'many' || param.arity === 'some';
    const lastSlot = slot === signature.length - 1;
    let taken = 0;

    while (!cursor.atEnd() && (repeats || taken === 0)) {
      const value = readValue(cursor, param.type, lastSlot, symbols, fail);
      bound.push({ param, slot, value });
      taken++;

      cursor.skipSpaces();
      if (!cursor.atEnd()) {
        if (!cursor.consume(',')) {
          fail(cursor.rest(), 'expected ","');
        }
        cursor.skipSpaces();
        if (cursor.atEnd()) {
          fail(rawArguments, 'missing argument after ","');
        }
      }
    }

    if (taken === 0 && (param.arity === 'one' || param.arity === 'some')) {
      fail(rawArguments, `missing ${describeType(param.type)} argument`);
    }
  }

  if (!cursor.atEnd()) {
    fail(cursor.rest(), 'unexpected extra argument');
  }

  return bound;
}

function readValue(
  cursor: ArgumentCursor,
  type: ArgType,
  lastSlot: boolean,
  symbols: SymbolTable,
  fail: (offending: string, reason: string) => never
): ArgValue {
  if (type.kind === 'quoted-string') {
    return { kind: 'quoted-string', value: readQuoted(cursor, fail) };
  }

  if (type.kind === 'opaque') {
    const value = lastSlot ? cursor.readRest() : cursor.readBare();
    if (encodeLatin1(value) === null) {
      fail(value, 'character outside Latin-1');
    }
    return { kind: 'opaque', value };
  }

  const token = cursor.readBare();
  if (token === '') {
    fail(cursor.rest(), `empty ${describeType(type)}`);
  }

  switch (type.kind) {
    case 'hex-byte': {
      const match = HEX_BYTE_PATTERN.exec(token);
      if (!match) {
        return fail(token, 'expected a hex byte such as 0ax');
      }
      return { kind: 'hex-byte', value: parseInt(match[1], 16) };
    }

    case 'integer': {
      if (!INTEGER_PATTERN.test(token)) {
        return fail(token, 'expected a decimal integer');
      }
      const value = Number(token);
      if (value < INT32_MIN || value > INT32_MAX) {
        return fail(token, 'integer outside the signed 32-bit range');
      }
      return { kind: 'integer', value };
    }

    case 'coordinate-pair': {
      const match = COORDINATE_PATTERN.exec(token);
      if (!match) {
        return fail(token, 'expected a coordinate pair such as 32-105');
      }
      const first = Number(match[1]);
      const second = Number(match[2]);
      if (first > UINT32_MAX || second > UINT32_MAX) {
        return fail(token, 'coordinate outside the unsigned 32-bit range');
      }
      return { kind: 'coordinate-pair', value: [first, second] };
    }

    case 'enum-ref': {
      if (/^\d+$/.test(token)) {
        const code = Number(token);
        if (code > MAX_ENUM_CODE) {
          return fail(token, `${type.enumName} code above ${MAX_ENUM_CODE}`);
        }
        return { kind: 'enum-ref', enumName: type.enumName, code };
      }
      const code = ENUM_LABEL_PATTERN.test(token) ? symbols.enumCode(type.enumName, token) : undefined;
      if (code === undefined) {
        return fail(token, `unknown ${type.enumName} value`);
      }
      return { kind: 'enum-ref', enumName: type.enumName, code };
    }
  }
}

function readQuoted(cursor: ArgumentCursor, fail: (offending: string, reason: string) => never): string {
  if (!cursor.consume('"')) {
    return fail(cursor.rest(), 'expected a quoted string');
  }

  let value = '';
  for (;;) {
    if (cursor.atEnd()) {
      return fail(value, 'unterminated string');
    }
    const char = cursor.next();
    if (char === '"') {
      break;
    }
    if (char === '\\') {
      value += readEscape(cursor);
    } else {
      value += char;
    }
  }

  if (encodeLatin1(value) === null) {
    fail(value, 'character outside Latin-1');
  }
  return value;
}

const ESCAPES: Readonly<Record<string, string>> = { '"': '"', '\\': '\\', n: '\n', r: '\r', t: '\t' };
const ESCAPED: Readonly<Record<string, string>> = { '"': '\\"', '\\': '\\\\', '\n': '\\n', '\r': '\\r', '\t': '\\t' };
const HEX_ESCAPE_PATTERN = /^[0-9A-Fa-f]{2}$/;

/**
 * Text for the escape after a backslash; an unknown escape keeps the backslash
 */
function readEscape(cursor: ArgumentCursor): string {
  const char = cursor.peek();
  const simple = ESCAPES[char];
  if (simple !== undefined) {
    cursor.next();
    return simple;
  }
  if (char === 'x') {
    const digits = cursor.rest().slice(1, 3);
    if (HEX_ESCAPE_PATTERN.test(digits)) {
      cursor.next();
      cursor.next();
      cursor.next();
      return String.fromCharCode(parseInt(digits, 16));
    }
  }
  return '\\';
}

/**
 * Quote a string so that it reads back unchanged and stays on one line
 */
export function quoteString(value: string): string {
  const body = value.replace(/["\\\x00-\x1f\x7f]/g, (char) => {
    return ESCAPED[char] ?? `\\x${char.charCodeAt(0).toString(16).padStart(2, '0')}`;
  });
  return `"${body}"`;
}

/**
 * Canonical argument text for a list of values
 */
export function formatArguments(values: readonly ArgValue[], symbols: SymbolTable): string {
  if (values.length === 0) {
    return '';
  }
  return `<${values.map((value) => formatValue(value, symbols)).join(', ')}>`;
}

export function formatValue(value: ArgValue, symbols: SymbolTable): string {
  switch (value.kind) {
    case 'integer':
      return String(value.value);
    case 'hex-byte':
      return `${value.value.toString(16).padStart(2, '0')}x`;
    case 'quoted-string':
      return quoteString(value.value);
    case 'coordinate-pair':
      return `${value.value[0]}-${value.value[1]}`;
    case 'enum-ref':
      return symbols.enumLabel(value.enumName, value.code) ?? String(value.code);
    case 'opaque':
      return value.value;
  }
}

/**
 * Encode bound values into argument bytes
 */
export function encodeArguments(
  args: readonly BoundArgument[],
  definition: AtomDefinition,
  rules: FieldRules,
  site: FieldSite
): Uint8Array {
  const out = new ByteWriter();

  for (const { slot, value } of args) {
    switch (value.kind) {
      case 'hex-byte':
        out.u8(value.value);
        break;
      case 'integer':
        rules.writeInteger(out, value.value, site);
        break;
      case 'coordinate-pair':
        rules.writeCoordinate(out, value.value, site);
        break;
      case 'enum-ref':
        rules.writeEnum(out, value.code, site);
        break;
      case 'quoted-string':
      case 'opaque': {
        // Latin-1 was checked when the text was read
        const bytes = encodeLatin1(value.value) ?? new Uint8Array(0);
        rules.writeText(out, bytes, isUnprefixedText(definition.argSignature, slot), site);
        break;
      }
    }
  }

  return out.toUint8Array();
}

/**
 * Tokenize and encode the arguments of one node
 */
export function encodeNodeArguments(node: AtomNode, symbols: SymbolTable, rules: FieldRules): Uint8Array {
  const site: FieldSite = { mnemonic: node.definition.mnemonic, line: node.sourceLine };
  return encodeArguments(tokenizeArguments(node, symbols), node.definition, rules, site);
}

/**
 * Read the argument bytes of one record back into values
 */
export function decodeArguments(input: ByteReader, definition: AtomDefinition, rules: FieldRules): ArgValue[] {
  const values: ArgValue[] = [];
  const signature = definition.argSignature;

  for (let slot = 0; slot < signature.length; slot++) {
    const param = signature[slot];
    const unprefixed = isUnprefixedText(signature, slot);

    if (param.arity === 'many' || param.arity === 'some') {
      if (param.arity === 'some' && input.remaining === 0) {
        throw new DecodeError(input.offset, `${definition.mnemonic}: missing ${describeType(param.type)} argument`);
      }
      while (input.remaining > 0) {
        values.push(readField(input, param.type, false, rules));
      }
      continue;
    }

    if (input.remaining === 0 && !unprefixed) {
      if (param.arity === 'one') {
        throw new DecodeError(input.offset, `${definition.mnemonic}: missing ${describeType(param.type)} argument`);
      }
      continue;
    }

    values.push(readField(input, param.type, unprefixed, rules));
  }

  if (input.remaining > 0) {
    throw new DecodeError(input.offset, `${definition.mnemonic}: ${input.remaining} unexpected argument byte(s)`);
  }

  return values;
}

function readField(input: ByteReader, type: ArgType, unprefixed: boolean, rules: FieldRules): ArgValue {
  switch (type.kind) {
    case 'hex-byte':
      return { kind: 'hex-byte', value: input.u8('hex byte') };
    case 'integer':
      return { kind: 'integer', value: rules.readInteger(input) };
    case 'coordinate-pair':
      return { kind: 'coordinate-pair', value: rules.readCoordinate(input) };
    case 'enum-ref':
      return { kind: 'enum-ref', enumName: type.enumName, code: rules.readEnum(input) };
    case 'quoted-string':
      return { kind: 'quoted-string', value: decodeLatin1(rules.readText(input, unprefixed)) };
    case 'opaque':
      return { kind: 'opaque', value: decodeLatin1(rules.readText(input, unprefixed)) };
  }
}
