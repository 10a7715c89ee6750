/**
 * fdo_scripts - Manage the local script library
 */

import {
  deleteScript,
  getCompileHistory,
  getLibraryStats,
  getScript,
  listScripts,
  saveScript,
  setFavorite,
  type LibraryStats,
} from '../db/operations.js';
import type { CompileHistoryEntry, Script } from '../types.js';
import {
  asArgs,
  optionalBoolean,
  optionalChoice,
  optionalInteger,
  optionalString,
  requiredString,
  ToolInputError,
  type ToolContext,
} from './input.js';

export const SCRIPT_ACTIONS = ['list', 'get', 'save', 'delete', 'favorite', 'history', 'stats'] as const;
export type ScriptAction = (typeof SCRIPT_ACTIONS)[number];

export interface ScriptsInput {
  action: ScriptAction;
  name?: string;
  content?: string;
  favorite?: boolean;
  limit?: number;
}

export interface ScriptsResult {
  success: boolean;
  scripts?: Array<Omit<Script, 'content'> & { content?: string }>;
  history?: CompileHistoryEntry[];
  stats?: LibraryStats;
  message: string;
}

export function parseScriptsInput(args: unknown): ScriptsInput {
  const input = asArgs(args);
  const action = optionalChoice(input, 'action', SCRIPT_ACTIONS);
  if (!action) {
    throw new ToolInputError(`action is required (${SCRIPT_ACTIONS.join(', ')})`);
  }
  return {
    action,
    name: optionalString(input, 'name'),
    content: optionalString(input, 'content'),
    favorite: optionalBoolean(input, 'favorite'),
    limit: optionalInteger(input, 'limit', 1, 1000),
  };
}

function requireName(input: ScriptsInput): string {
  return requiredString({ name: input.name }, 'name');
}

export function scripts(ctx: ToolContext, input: ScriptsInput): ScriptsResult {
  switch (input.action) {
    case 'list': {
      const found = listScripts(ctx.db, { favoritesOnly: input.favorite, limit: input.limit });
      return {
        success: true,
        // Listings omit script bodies
        scripts: found.map(({ content: _content, ...rest }) => rest),
        message: `${found.length} script(s).`,
      };
    }

    case 'get': {
      const name = requireName(input);
      const script = getScript(ctx.db, name);
      if (!script) {
        return { success: false, message: `No script named "${name}".` };
      }
      return { success: true, scripts: [script], message: `Loaded "${name}".` };
    }

    case 'save': {
      const name = requireName(input);
      const content = requiredString({ content: input.content }, 'content');
      const script = saveScript(ctx.db, { name, content, isFavorite: input.favorite });
      return { success: true, scripts: [script], message: `Saved "${name}".` };
    }

    case 'delete': {
      const name = requireName(input);
      const deleted = deleteScript(ctx.db, name);
      return { success: deleted, message: deleted ? `Deleted "${name}".` : `No script named "${name}".` };
    }

    case 'favorite': {
      const name = requireName(input);
      const favorite = input.favorite ?? true;
      const updated = setFavorite(ctx.db, name, favorite);
      return {
        success: updated,
        message: updated
          ? `"${name}" ${favorite ? 'marked' : 'unmarked'} as favorite.`
          : `No script named "${name}".`,
      };
    }

    case 'history': {
      const name = requireName(input);
      const script = getScript(ctx.db, name);
      if (!script) {
        return { success: false, message: `No script named "${name}".` };
      }
      const history = getCompileHistory(ctx.db, script.id, input.limit);
      return { success: true, history, message: `${history.length} compilation(s) of "${name}".` };
    }

    case 'stats': {
      const stats = getLibraryStats(ctx.db);
      return { success: true, stats, message: `${stats.scripts} script(s), ${stats.compilations} compilation(s).` };
    }
  }
}

/**
 * Tool definition for MCP
 */
export const scriptsToolDef = {
  name: 'fdo_scripts',
  description: 'Manage saved FDO scripts: list, get, save, delete, mark favorites, show compile history or library stats.',
  inputSchema: {
    type: 'object',
    properties: {
      action: {
        type: 'string',
        enum: [...SCRIPT_ACTIONS],
        description: 'What to do',
      },
      name: {
        type: 'string',
        description: 'Script name (get, save, delete, favorite, history)',
      },
      content: {
        type: 'string',
        description: 'Script source (save)',
      },
      favorite: {
        type: 'boolean',
        description: 'Favorite flag (save, favorite); with list, only favorites',
      },
      limit: {
        type: 'number',
        description: 'Maximum entries (list, history)',
      },
    },
    required: ['action'],
  },
};
