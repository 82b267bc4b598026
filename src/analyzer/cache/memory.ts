/**
 * In-process extraction cache
 */

import type { CacheKey, ExtractionCache } from './index.js';

interface Entry {
  mtimeMs: number;
  size: number;
  tokens: string[];
}

export class MemoryExtractionCache implements ExtractionCache {
  private entries = new Map<string, Entry>();

  async initialize(): Promise<void> {}

  async get(key: CacheKey): Promise<string[] | null> {
    const entry = this.entries.get(key.path);
    if (!entry || entry.mtimeMs !== key.mtimeMs || entry.size !== key.size) return null;
    return [...entry.tokens];
  }

  async set(key: CacheKey, tokens: readonly string[]): Promise<void> {
    this.entries.set(key.path, { mtimeMs: key.mtimeMs, size: key.size, tokens: [...tokens] });
  }

  async retainOnly(paths: ReadonlySet<string>): Promise<number> {
    let removed = 0;
    for (const filePath of Array.from(this.entries.keys())) {
      if (!paths.has(filePath)) {
        this.entries.delete(filePath);
        removed++;
      }
    }
    return removed;
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
