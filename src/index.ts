#!/usr/bin/env node
/**
 * FDO Compiler MCP Server
 *
 * Exposes the compiler, decompiler, golden-fixture validator and script
 * library as MCP tools over stdio.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { openLibraryDb } from './db/index.js';
import { loadConfig } from './config/index.js';
import { createCompiler } from './fdo/index.js';
import { getDefaultSymbolTable, loadSymbolTable } from './symbols/index.js';
import {
  compile,
  compileToolDef,
  parseCompileInput,
  decompile,
  decompileToolDef,
  parseDecompileInput,
  validate,
  validateToolDef,
  parseValidateInput,
  lookup,
  lookupToolDef,
  parseLookupInput,
  scripts,
  scriptsToolDef,
  parseScriptsInput,
  chunk,
  chunkToolDef,
  parseChunkInput,
  type ToolContext,
} from './tools/index.js';

// Initialize config, symbol table and database
const appConfig = loadConfig();
const symbols = appConfig.symbol_table_path
  ? loadSymbolTable(appConfig.symbol_table_path)
  : getDefaultSymbolTable();
const db = openLibraryDb();

const ctx: ToolContext = {
  db,
  compiler: createCompiler({ symbols }),
  config: appConfig,
};

function textResult(payload: unknown, isError = false) {
  return {
    content: [
      {
        type: 'text' as const,
        text: typeof payload === 'string' ? payload : JSON.stringify(payload, null, 2),
      },
    ],
    ...(isError ? { isError: true } : {}),
  };
}

// Create MCP server
const server = new Server(
  {
    name: 'fdo-compiler',
    version: '0.1.0',
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

// List available tools
server.setRequestHandler(ListToolsRequestSchema, async () => {
  return {
    tools: [
      compileToolDef,
      decompileToolDef,
      validateToolDef,
      lookupToolDef,
      scriptsToolDef,
      chunkToolDef,
    ],
  };
});

// Handle tool calls
server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  try {
    switch (name) {
      case 'fdo_compile': {
        const result = compile(ctx, parseCompileInput(args));
        return textResult(result, !result.success);
      }

      case 'fdo_decompile': {
        const result = decompile(ctx, parseDecompileInput(args));
        return textResult(result, !result.success);
      }

      case 'fdo_validate': {
        const result = await validate(ctx, parseValidateInput(args));
        return textResult(result, !result.success);
      }

      case 'fdo_lookup': {
        return textResult(lookup(symbols, parseLookupInput(args)));
      }

      case 'fdo_scripts': {
        const result = scripts(ctx, parseScriptsInput(args));
        return textResult(result, !result.success);
      }

      case 'fdo_chunk': {
        const result = chunk(ctx, parseChunkInput(args));
        return textResult(result, !result.success);
      }

      default:
        return textResult(`Unknown tool: ${name}`, true);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return textResult(`Error: ${message}`, true);
  }
});

// Start server
async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // Log to stderr so it doesn't interfere with MCP protocol
  console.error(`FDO compiler MCP server started (${symbols.size} atoms, default variant ${appConfig.default_variant})`);
}

function shutdown(): void {
  db.close();
  process.exit(0);
}

// Handle shutdown
process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
