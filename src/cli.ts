#!/usr/bin/env node
/**
 * fdoc - FDO compiler CLI
 *
 * Compiles and decompiles FDO atom streams, validates the compiler against a
 * golden corpus and manages the local script library.
 */

import { readFileSync, writeFileSync } from 'fs';
import { join, dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { getConfig, getConfigForDisplay, resetConfig, updateConfig, validateConfig } from './config/index.js';
import { openLibraryDb } from './db/index.js';
import { countAtoms } from './atoms/index.js';
import { chunkSource, estimateChunks } from './chunk/index.js';
import { FdoError, FixtureIOError } from './errors.js';
import { createCompiler, renderSource, streamBytes, toHex, type Compiler } from './fdo/index.js';
import { sanitizeSource } from './sanitize/index.js';
import { getDefaultSymbolTable, loadSymbolTable } from './symbols/index.js';
import { lookup, scripts, SCRIPT_ACTIONS, type ToolContext } from './tools/index.js';
import type { Variant } from './types.js';
import { formatFixture, formatSummary, validateCorpus } from './validator/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Package info
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')
);

// Colors for terminal output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

function log(message: string, color: keyof typeof colors = 'reset'): void {
  console.log(`${colors[color]}${message}${colors.reset}`);
}

function success(message: string): void {
  log(`✓ ${message}`, 'green');
}

function info(message: string): void {
  log(`ℹ ${message}`, 'blue');
}

function warn(message: string): void {
  log(`⚠ ${message}`, 'yellow');
}

/** Diagnostics go to stderr so stdout stays usable in pipelines */
function error(message: string): void {
  console.error(`${colors.red}✗ ${message}${colors.reset}`);
}

const VALUE_OPTIONS = new Set(['--variant', '--filter', '--set-variant', '--set-golden-dir', '--set-tab-width', '--limit', '--token', '--stream-id']);

/**
 * Value of --name=value or --name value
 */
function option(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith(prefix)) {
      return args[i].slice(prefix.length);
    }
    if (args[i] === `--${name}` && i + 1 < args.length && !args[i + 1].startsWith('--')) {
      return args[i + 1];
    }
  }
  return undefined;
}

function positional(args: string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      // Skip the value of a spaced option
      if (!args[i].includes('=') && VALUE_OPTIONS.has(args[i]) && i + 1 < args.length) {
        i++;
      }
      continue;
    }
    result.push(args[i]);
  }
  return result;
}

function parseVariant(value: string | undefined): Variant | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value === 'debug' || value === 'production') {
    return value;
  }
  throw new Error(`Unknown variant "${value}" (expected debug or production)`);
}

function makeCompiler(): Compiler {
  const config = getConfig();
  const symbols = config.symbol_table_path ? loadSymbolTable(config.symbol_table_path) : getDefaultSymbolTable();
  return createCompiler({ symbols });
}

/**
 * Show help message
 */
function showHelp(): void {
  console.log(`
${colors.bright}fdoc${colors.reset} v${packageJson.version}
FDO atom stream compiler

${colors.cyan}Usage:${colors.reset}
  fdoc <command> [options]

${colors.cyan}Commands:${colors.reset}
  compile <input> <output>    Compile FDO source to a binary stream
  decompile <input> [output]  Decode a binary stream back to source
  chunk <input>               Pack a compiled stream into packets
  validate [dir]              Compare compiler output with a golden corpus
  lookup <mnemonic|prefix*>   Show an atom's code and argument signature
  scripts <action> [name]     Manage the script library (${SCRIPT_ACTIONS.join(', ')})
  config                      Manage configuration
  version                     Show version
  help                        Show this help

${colors.cyan}Compile Options:${colors.reset}
  --variant <debug|production>  Output layout (default from config)

${colors.cyan}Chunk Options:${colors.reset}
  --token <token>               Packet token (default AT)
  --stream-id <n>               Stream id after the token (default 0)
  --variant <debug|production>  Stream layout (default production)
  --estimate                    Estimate the packet count without encoding

${colors.cyan}Validate Options:${colors.reset}
  --variant <debug|production>  Only check one variant
  --filter <text>               Only fixtures whose name contains text
  --json                        Print the full report as JSON
  --strict                      Exit 1 unless every fixture matches exactly

${colors.cyan}Scripts:${colors.reset}
  scripts list [--favorites]
  scripts get <name>
  scripts save <name> <file> [--favorite]
  scripts delete <name>
  scripts favorite <name> [--off]
  scripts history <name>
  scripts stats

${colors.cyan}Config Options:${colors.reset}
  --show                        Show current configuration
  --set-variant <variant>       Set the default variant
  --set-golden-dir <dir>        Set the golden fixture directory
  --set-tab-width <n>           Expand leading tabs to n columns (0 rejects tabs)
  --reset                       Restore defaults

${colors.cyan}Examples:${colors.reset}
  fdoc compile room.txt room.bin --variant=debug
  fdoc decompile room.bin
  fdoc validate fixtures/golden --filter 32-
  fdoc lookup man_start_object
  fdoc lookup mat_*
`);
}

/**
 * Compile a source file
 */
function compileCommand(args: string[]): number {
  const [input, output] = positional(args);
  if (!input || !output) {
    error('Usage: fdoc compile <input> <output> [--variant=debug|production]');
    return 1;
  }

  const config = getConfig();
  const variant = parseVariant(option(args, 'variant')) ?? config.default_variant;
  const compiler = makeCompiler();

  const { text } = sanitizeSource(readFileSync(input, 'utf-8'), { tabWidth: config.tab_width });
  try {
    const stream = compiler.compile(text, variant);
    const bytes = streamBytes(stream);
    writeFileSync(output, bytes);
    success(`Compiled ${input} -> ${output} (${bytes.length} bytes, ${variant})`);
    return 0;
  } catch (err) {
    if (err instanceof FdoError) {
      error(`${input}: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

/**
 * Decompile a binary stream
 */
function decompileCommand(args: string[]): number {
  const [input, output] = positional(args);
  if (!input) {
    error('Usage: fdoc decompile <input> [output]');
    return 1;
  }

  const compiler = makeCompiler();
  const bytes = new Uint8Array(readFileSync(input));
  try {
    const decoded = compiler.decode(bytes);
    const source = renderSource(decoded.tree);
    if (output) {
      writeFileSync(output, source, 'utf-8');
      success(`Decompiled ${input} -> ${output} (${countAtoms(decoded.tree)} atoms, ${decoded.variant})`);
    } else {
      process.stdout.write(source);
    }
    return 0;
  } catch (err) {
    if (err instanceof FdoError) {
      error(`${input}: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

/**
 * Pack a source file into packets
 */
function chunkCommand(args: string[]): number {
  const [input] = positional(args);
  if (!input) {
    error('Usage: fdoc chunk <input> [--token=AT] [--stream-id=0] [--variant=debug|production] [--estimate]');
    return 1;
  }

  const config = getConfig();
  const compiler = makeCompiler();
  const token = option(args, 'token');
  const streamId = option(args, 'stream-id');
  if (streamId !== undefined && !/^\d+$/.test(streamId)) {
    error(`Invalid stream id: ${streamId}`);
    return 1;
  }

  const { text } = sanitizeSource(readFileSync(input, 'utf-8'), { tabWidth: config.tab_width });
  try {
    if (args.includes('--estimate')) {
      const estimate = estimateChunks(compiler, text, token);
      info(`${estimate.atomUnits} unit(s), ${estimate.actionBlocks} action block(s), ~${estimate.estimatedSize} bytes`);
      info(`About ${estimate.estimatedChunks} packet(s) of up to ${estimate.maxPayload} payload bytes`);
      return 0;
    }

    const result = chunkSource(compiler, text, {
      token,
      streamId: streamId === undefined ? undefined : Number(streamId),
      variant: parseVariant(option(args, 'variant')),
    });
    result.chunks.forEach((chunk, index) => {
      const mark = chunk.continuation ? ' (continued)' : '';
      console.log(`#${index + 1}  ${String(chunk.size).padStart(3)} bytes${mark}  ${toHex(result.packets[index])}`);
    });
    success(`${result.stream.length} bytes (${result.variant}) in ${result.packets.length} packet(s)`);
    return 0;
  } catch (err) {
    if (err instanceof FdoError) {
      error(`${input}: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

/**
 * Validate against a golden corpus
 */
async function validateCommand(args: string[]): Promise<number> {
  const config = getConfig();
  const directory = resolve(positional(args)[0] ?? config.golden_dir);
  const variant = parseVariant(option(args, 'variant'));
  const asJson = args.includes('--json');
  const strict = args.includes('--strict');

  const controller = new AbortController();
  const onInterrupt = (): void => {
    warn('Interrupted, finishing fixtures in progress...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const report = await validateCorpus(directory, makeCompiler(), {
      variants: variant ? [variant] : undefined,
      filter: option(args, 'filter'),
      concurrency: config.validator_concurrency,
      tabWidth: config.tab_width,
      signal: controller.signal,
    });

    if (asJson) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      info(`Corpus: ${directory}`);
      for (const fixture of report.fixtures) {
        log(formatFixture(fixture), fixture.exactMatch ? 'green' : 'yellow');
      }
      console.log('');
      log(formatSummary(report), 'bright');
    }

    if (report.cancelled) {
      return 130;
    }
    return strict && report.exactMatchCount < report.totalFixtures ? 1 : 0;
  } catch (err) {
    if (err instanceof FixtureIOError) {
      error(err.message);
      return 1;
    }
    throw err;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

/**
 * Describe atoms
 */
function lookupCommand(args: string[]): number {
  const [query] = positional(args);
  if (!query) {
    error('Usage: fdoc lookup <mnemonic|prefix*>');
    return 1;
  }

  const { symbols } = makeCompiler();
  const result = query.endsWith('*')
    ? lookup(symbols, { prefix: query.slice(0, -1) })
    : lookup(symbols, { mnemonic: query });

  if (!result.found) {
    error(result.message);
    return 1;
  }

  for (const atom of result.atoms) {
    const args = atom.arguments.length > 0 ? atom.arguments.join(', ') : '(none)';
    const role = atom.role ? `  [${atom.role}]` : '';
    console.log(`${colors.bright}${atom.mnemonic}${colors.reset}  ${atom.protocol}/${atom.atom}  args: ${args}${role}`);
  }
  return 0;
}

/**
 * Script library management
 */
function scriptsCommand(args: string[]): number {
  const [action, name, file] = positional(args);
  const known = SCRIPT_ACTIONS.find((candidate) => candidate === (action ?? 'list'));
  if (!known) {
    error(`Unknown scripts action: ${action}`);
    return 1;
  }

  const db = openLibraryDb();
  try {
    const ctx: ToolContext = { db, compiler: makeCompiler(), config: getConfig() };
    const favorite = args.includes('--off') ? false : args.includes('--favorite') || args.includes('--favorites') ? true : undefined;
    const limit = option(args, 'limit');

    const result = scripts(ctx, {
      action: known,
      name,
      content: known === 'save' && file ? readFileSync(file, 'utf-8') : undefined,
      favorite: known === 'favorite' ? favorite ?? true : favorite,
      limit: limit && /^\d+$/.test(limit) ? Number(limit) : undefined,
    });

    if (!result.success) {
      error(result.message);
      return 1;
    }

    if (known === 'get' && result.scripts?.[0]?.content !== undefined) {
      process.stdout.write(result.scripts[0].content);
      return 0;
    }

    for (const script of result.scripts ?? []) {
      const star = script.isFavorite ? '★ ' : '  ';
      console.log(`${star}${script.name}  (updated ${new Date(script.updatedAt).toISOString()})`);
    }
    for (const entry of result.history ?? []) {
      const outcome = entry.success ? `${entry.size} bytes` : `failed: ${entry.error}`;
      console.log(`  ${new Date(entry.compiledAt).toISOString()}  ${entry.variant.padEnd(10)} ${outcome}`);
    }
    if (result.stats) {
      console.log(JSON.stringify(result.stats, null, 2));
    }
    success(result.message);
    return 0;
  } finally {
    db.close();
  }
}

/**
 * Manage configuration
 */
function configCommand(args: string[]): number {
  if (args.includes('--reset')) {
    resetConfig();
    success('Configuration reset to defaults');
    return 0;
  }

  const variant = parseVariant(option(args, 'set-variant'));
  const goldenDir = option(args, 'set-golden-dir');
  const tabWidth = option(args, 'set-tab-width');

  if (variant || goldenDir || tabWidth !== undefined) {
    updateConfig({
      ...(variant ? { default_variant: variant } : {}),
      ...(goldenDir ? { golden_dir: goldenDir } : {}),
      ...(tabWidth !== undefined && /^\d+$/.test(tabWidth) ? { tab_width: Number(tabWidth) } : {}),
    });
    success('Configuration updated');
  }

  log('\nFDO Compiler Configuration\n', 'bright');
  for (const [key, value] of Object.entries(getConfigForDisplay())) {
    console.log(`  ${key.padEnd(22)} ${String(value)}`);
  }

  const { issues } = validateConfig();
  for (const issue of issues) {
    warn(issue);
  }
  return 0;
}

/**
 * Main entry point
 */
async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const command = args[0];

  switch (command) {
    case 'compile':
      return compileCommand(args.slice(1));
    case 'decompile':
      return decompileCommand(args.slice(1));
    case 'chunk':
      return chunkCommand(args.slice(1));
    case 'validate':
      return validateCommand(args.slice(1));
    case 'lookup':
      return lookupCommand(args.slice(1));
    case 'scripts':
      return scriptsCommand(args.slice(1));
    case 'config':
      return configCommand(args.slice(1));
    case 'version':
    case '-v':
    case '--version':
      console.log(`fdoc v${packageJson.version}`);
      return 0;
    case 'help':
    case '-h':
    case '--help':
    case undefined:
      showHelp();
      return 0;
    default:
      error(`Unknown command: ${command}`);
      showHelp();
      return 1;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
