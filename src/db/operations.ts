/**
 * Script library operations
 */

import type Database from 'better-sqlite3';
import type { CompileHistoryEntry, Script, Variant } from '../types.js';

interface ScriptRow {
  id: number;
  name: string;
  content: string;
  is_favorite: number;
  created_at: number;
  updated_at: number;
}

interface HistoryRow {
  id: number;
  script_id: number;
  variant: string;
  success: number;
  size: number | null;
  error: string | null;
  compiled_at: number;
}

export interface SaveScriptInput {
  name: string;
  content: string;
  isFavorite?: boolean;
}

export interface ListScriptsInput {
  favoritesOnly?: boolean;
  limit?: number;
}

export interface RecordCompilationInput {
  scriptId: number;
  variant: Variant;
  success: boolean;
  size?: number;
  error?: string;
}

export interface LibraryStats {
  scripts: number;
  favorites: number;
  compilations: number;
  failedCompilations: number;
  lastCompiledAt?: number;
}

function rowToScript(row: ScriptRow): Script {
  return {
    id: row.id,
    name: row.name,
    content: row.content,
    isFavorite: row.is_favorite === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rowToHistory(row: HistoryRow): CompileHistoryEntry {
  return {
    id: row.id,
    scriptId: row.script_id,
    variant: row.variant === 'debug' ? 'debug' : 'production',
    success: row.success === 1,
    size: row.size ?? undefined,
    error: row.error ?? undefined,
    compiledAt: row.compiled_at,
  };
}

/**
 * Create a script, or replace the content of the one with the same name
 */
export function saveScript(db: Database.Database, input: SaveScriptInput): Script {
  const now = Date.now();
  const existing = getScript(db, input.name);

  if (existing) {
    const isFavorite = input.isFavorite ?? existing.isFavorite;
    db.prepare<[string, number, number, number]>(`
      UPDATE scripts SET content = ?, is_favorite = ?, updated_at = ? WHERE id = ?
    `).run(input.content, isFavorite ? 1 : 0, now, existing.id);
    return { ...existing, content: input.content, isFavorite, updatedAt: now };
  }

  const result = db.prepare<[string, string, number, number, number]>(`
    INSERT INTO scripts (name, content, is_favorite, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?)
  `).run(input.name, input.content, input.isFavorite ? 1 : 0, now, now);

  return {
    id: Number(result.lastInsertRowid),
    name: input.name,
    content: input.content,
    isFavorite: input.isFavorite ?? false,
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * Get a script by name
 */
export function getScript(db: Database.Database, name: string): Script | null {
  const row = db.prepare<[string], ScriptRow>('SELECT * FROM scripts WHERE name = ?').get(name);
  return row ? rowToScript(row) : null;
}

/**
 * List scripts, favourites first, most recently updated next
 */
export function listScripts(db: Database.Database, input: ListScriptsInput = {}): Script[] {
  const where = input.favoritesOnly ? 'WHERE is_favorite = 1' : '';
  const rows = db.prepare<[number], ScriptRow>(`
    SELECT * FROM scripts ${where}
    ORDER BY is_favorite DESC, updated_at DESC, name ASC
    LIMIT ?
  `).all(input.limit ?? 100);
  return rows.map(rowToScript);
}

/**
 * Delete a script and its history
 */
export function deleteScript(db: Database.Database, name: string): boolean {
  const result = db.prepare<[string]>('DELETE FROM scripts WHERE name = ?').run(name);
  return result.changes > 0;
}

/**
 * Mark or unmark a script as favourite
 */
export function setFavorite(db: Database.Database, name: string, isFavorite: boolean): boolean {
  const result = db.prepare<[number, number, string]>(`
    UPDATE scripts SET is_favorite = ?, updated_at = ? WHERE name = ?
  `).run(isFavorite ? 1 : 0, Date.now(), name);
  return result.changes > 0;
}

/**
 * Log the outcome of compiling a library script
 */
export function recordCompilation(db: Database.Database, input: RecordCompilationInput): CompileHistoryEntry {
  const now = Date.now();
  const result = db.prepare<[number, string, number, number | null, string | null, number]>(`
    INSERT INTO compile_history (script_id, variant, success, size, error, compiled_at)
    VALUES (?, ?, ?, ?, ?, ?)
  `).run(input.scriptId, input.variant, input.success ? 1 : 0, input.size ?? null, input.error ?? null, now);

  return {
    id: Number(result.lastInsertRowid),
    scriptId: input.scriptId,
    variant: input.variant,
    success: input.success,
    size: input.size,
    error: input.error,
    compiledAt: now,
  };
}

/**
 * Compile history of a script, newest first
 */
export function getCompileHistory(db: Database.Database, scriptId: number, limit = 20): CompileHistoryEntry[] {
  const rows = db.prepare<[number, number], HistoryRow>(`
    SELECT * FROM compile_history WHERE script_id = ?
    ORDER BY compiled_at DESC, id DESC
    LIMIT ?
  `).all(scriptId, limit);
  return rows.map(rowToHistory);
}

/**
 * Library-wide counts
 */
export function getLibraryStats(db: Database.Database): LibraryStats {
  const scripts = db.prepare<[], { total: number; favorites: number | null }>(`
    SELECT COUNT(*) AS total, SUM(is_favorite) AS favorites FROM scripts
  `).get();
  const history = db.prepare<[], { total: number; failed: number | null; last: number | null }>(`
    SELECT COUNT(*) AS total, SUM(1 - success) AS failed, MAX(compiled_at) AS last FROM compile_history
  `).get();

  return {
    scripts: scripts?.total ?? 0,
    favorites: scripts?.favorites ?? 0,
    compilations: history?.total ?? 0,
    failedCompilations: history?.failed ?? 0,
    lastCompiledAt: history?.last ?? undefined,
  };
}
