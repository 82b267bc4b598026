/**
 * SQLite-backed extraction cache
 */

import Database from 'better-sqlite3';
import path from 'node:path';
import fs from 'node:fs';

import type { CacheKey, ExtractionCache } from './index.js';

interface TokenRow {
  mtime_ms: number;
  size: number;
  tokens: string;
}

export class SqliteExtractionCache implements ExtractionCache {
  private db: Database.Database | null = null;
  private dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  async initialize(): Promise<void> {
    if (this.db) return;

    if (this.dbPath !== ':memory:') {
      const dir = path.dirname(this.dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS extractions (
        file_path TEXT PRIMARY KEY,
        mtime_ms REAL NOT NULL,
        size INTEGER NOT NULL,
        tokens TEXT NOT NULL
      )
    `);
  }

  async get(key: CacheKey): Promise<string[] | null> {
    const row = this.getDb()
      .prepare('SELECT mtime_ms, size, tokens FROM extractions WHERE file_path = ?')
      .get(key.path) as TokenRow | undefined;

    if (!row || row.mtime_ms !== key.mtimeMs || row.size !== key.size) return null;
    return parseTokens(row.tokens);
  }

  async set(key: CacheKey, tokens: readonly string[]): Promise<void> {
    this.getDb()
      .prepare(
        `INSERT INTO extractions (file_path, mtime_ms, size, tokens) VALUES (?, ?, ?, ?)
         ON CONFLICT(file_path) DO UPDATE SET mtime_ms = excluded.mtime_ms, size = excluded.size, tokens = excluded.tokens`
      )
      .run(key.path, key.mtimeMs, key.size, JSON.stringify(tokens));
  }

  async retainOnly(paths: ReadonlySet<string>): Promise<number> {
    const db = this.getDb();
    const stored = db.prepare('SELECT file_path FROM extractions').pluck().all() as string[];
    const stale = stored.filter(filePath => !paths.has(filePath));
    if (stale.length === 0) return 0;

    const remove = db.prepare('DELETE FROM extractions WHERE file_path = ?');
    const transaction = db.transaction((filePaths: string[]) => {
      for (const filePath of filePaths) remove.run(filePath);
    });
    transaction(stale);
    return stale.length;
  }

  async clear(): Promise<void> {
    this.getDb().exec('DELETE FROM extractions');
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }

  private getDb(): Database.Database {
    if (!this.db) throw new Error('Database not initialized');
    return this.db;
  }
}

/**
 * Stored token list, or null (a cache miss) when the row does not hold one
 */
function parseTokens(raw: string): string[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!Array.isArray(parsed)) return null;
  const tokens = parsed.filter((token): token is string => typeof token === 'string');
  return tokens.length === parsed.length ? tokens : null;
}
