/**
 * Tool argument validation
 *
 * MCP clients send arbitrary JSON; these helpers read the fields each tool
 * expects and reject anything of the wrong shape.
 */

import type Database from 'better-sqlite3';
import type { Compiler } from '../fdo/index.js';
import type { FdoConfig, Variant } from '../types.js';

export interface ToolContext {
  db: Database.Database;
  compiler: Compiler;
  config: FdoConfig;
}

export class ToolInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolInputError';
  }
}

export type ToolArgs = Record<string, unknown>;

export function asArgs(args: unknown): ToolArgs {
  if (args === undefined || args === null) {
    return {};
  }
  if (typeof args !== 'object' || Array.isArray(args)) {
    throw new ToolInputError('arguments must be an object');
  }
  return { ...args };
}

export function optionalString(args: ToolArgs, key: string): string | undefined {
  const value = args[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ToolInputError(`${key} must be a string`);
  }
  return value;
}

export function requiredString(args: ToolArgs, key: string): string {
  const value = optionalString(args, key);
  if (value === undefined || value === '') {
    throw new ToolInputError(`${key} is required`);
  }
  return value;
}

export function optionalBoolean(args: ToolArgs, key: string): boolean | undefined {
  const value = args[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new ToolInputError(`${key} must be a boolean`);
  }
  return value;
}

export function optionalInteger(args: ToolArgs, key: string, min: number, max: number): number | undefined {
  const value = args[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    throw new ToolInputError(`${key} must be an integer between ${min} and ${max}`);
  }
  return value;
}

export function optionalChoice<T extends string>(args: ToolArgs, key: string, choices: readonly T[]): T | undefined {
  const value = args[key];
  if (value === undefined) {
    return undefined;
  }
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new ToolInputError(`${key} must be one of: ${choices.join(', ')}`);
  }
  return match;
}

export function optionalVariants(args: ToolArgs, key: string): Variant[] | undefined {
  const value = args[key];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new ToolInputError(`${key} must be an array`);
  }
  return value.map((item) => {
    if (item !== 'debug' && item !== 'production') {
      throw new ToolInputError(`${key} entries must be "debug" or "production"`);
    }
    return item;
  });
}
