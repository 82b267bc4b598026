/**
 * File enumeration for a scan: include/exclude globs plus root .gitignore rules
 */

import fs from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';

import type { SourceFile } from '../types/index.js';
import type { ExtractorRegistry } from './extractors/index.js';

/** Directories never worth scanning for imports */
export const SKIP_DIRS = [
  '__pycache__',
  '.git',
  'venv',
  '.venv',
  'env',
  'node_modules',
  'dist',
  'build',
  'target',
  '.next',
  '.nuxt',
  'vendor',
];

export interface ScanOptions {
  rootDirectory: string;
  registry: ExtractorRegistry;
  include?: string[];
  exclude?: string[];
  respectGitignore?: boolean;
}

export const DEFAULT_EXCLUDE = SKIP_DIRS.map(dir => `**/${dir}/**`);

/**
 * List analyzable files under the root, sorted by relative path.
 */
export async function scanFiles(options: ScanOptions): Promise<SourceFile[]> {
  const rootDir = path.resolve(options.rootDirectory);
  const include = options.include && options.include.length > 0 ? options.include : ['**/*'];
  const ignore = [...DEFAULT_EXCLUDE, ...(options.exclude ?? [])];

  if (options.respectGitignore ?? true) {
    ignore.push(...(await readGitignore(rootDir)));
  }

  const entries = await fg(include, {
    cwd: rootDir,
    ignore,
    onlyFiles: true,
    dot: false,
    followSymbolicLinks: false,
    stats: true,
  });

  const files: SourceFile[] = [];
  for (const entry of entries) {
    const relativePath = entry.path.replace(/\\/g, '/');
    if (!options.registry.canExtract(relativePath)) continue;

    files.push({
      path: relativePath,
      absolutePath: path.join(rootDir, relativePath),
      language: options.registry.detectLanguage(relativePath),
      size: entry.stats?.size ?? 0,
      mtimeMs: entry.stats?.mtimeMs ?? 0,
    });
  }

  return files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

async function readGitignore(rootDir: string): Promise<string[]> {
  const gitignorePath = path.join(rootDir, '.gitignore');
  if (!fs.existsSync(gitignorePath)) return [];

  const content = await fs.promises.readFile(gitignorePath, 'utf-8');
  return content
    .split(/\r?\n/)
    .flatMap(gitignoreToGlobs);
}

/**
 * Convert one .gitignore line to fast-glob ignore patterns.
 * Negations are not supported by ignore lists and are dropped.
 */
export function gitignoreToGlobs(line: string): string[] {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith('#') || trimmed.startsWith('!')) return [];

  let pattern = trimmed;
  const anchored = pattern.startsWith('/');
  if (anchored) pattern = pattern.slice(1);

  const directoryOnly = pattern.endsWith('/');
  if (directoryOnly) pattern = pattern.slice(0, -1);
  if (!pattern) return [];

  // A slash in the middle anchors the pattern to the root, as in git
  const rooted = anchored || pattern.includes('/');
  const base = rooted ? pattern : `**/${pattern}`;

  if (directoryOnly) return [`${base}/**`];
  // The name may be a file or a directory
  return [base, `${base}/**`];
}
