/**
 * Extraction cache interface and exports
 */

export interface CacheKey {
  /** Path relative to the repository root */
  path: string;
  mtimeMs: number;
  size: number;
}

/**
 * Raw import tokens per file, valid while the file's modification time and
 * size are unchanged.
 */
export interface ExtractionCache {
  initialize(): Promise<void>;
  get(key: CacheKey): Promise<string[] | null>;
  set(key: CacheKey, tokens: readonly string[]): Promise<void>;
  /** Forget every entry whose path is not in `paths` */
  retainOnly(paths: ReadonlySet<string>): Promise<number>;
  clear(): Promise<void>;
  close(): Promise<void>;
}

export { MemoryExtractionCache } from './memory.js';
export { SqliteExtractionCache } from './sqlite.js';
