/**
 * Resolution of raw import tokens to modules of the scanned tree
 */

import path from 'node:path';
import type { ImportStatus, LanguageId, ModuleKind } from '../types/index.js';
import type { ExtractorRegistry, LanguageDefinition } from './extractors/index.js';

export type FolderModuleMode = 'independent' | 'aggregate';

export interface ModuleResolverOptions {
  /** Relative paths of every file in the snapshot */
  files: Iterable<string>;
  registry: ExtractorRegistry;
  aliasPrefixes?: string[];
  sourceRoots?: string[];
  folderModules?: FolderModuleMode;
}

export interface Resolution {
  status: ImportStatus;
  target?: string;
  kind?: ModuleKind;
}

/** Identifier used for a folder-module at the repository root */
export const ROOT_MODULE_ID = '.';

const JS_EXTENSION = /\.(?:js|jsx|mjs|cjs)$/;
const EXTERNAL_SCHEME = /^(?:node|dart|bun|npm|jsr|https?):/;

interface ModuleKey {
  key: string;
  kind: ModuleKind;
  /** File path for files, directory path for folders */
  path: string;
}

interface Candidates {
  paths: string[];
  /** Segments for trailing-segment matching, when the language allows it */
  segments: string[] | null;
  /** Whether a miss means an external package rather than a broken path */
  pathLike: boolean;
}

export class ModuleResolver {
  private files: Set<string>;
  private registry: ExtractorRegistry;
  private aliasPrefixes: string[];
  private sourceRoots: string[];
  private folderMode: FolderModuleMode;
  private directFiles = new Map<string, string[]>();
  private subtreeFiles = new Map<string, string[]>();
  private suffixIndex = new Map<string, ModuleKey[]>();
  private entryNames: Set<string>;
  private allExtensions: string[];

  constructor(options: ModuleResolverOptions) {
    this.files = new Set(Array.from(options.files, normalizeSlashes));
    this.registry = options.registry;
    this.aliasPrefixes = options.aliasPrefixes ?? ['@/', '~/', '#/'];
    this.sourceRoots = (options.sourceRoots ?? ['src', 'lib']).map(root => trimSlashes(normalizeSlashes(root)));
    this.folderMode = options.folderModules ?? 'independent';

    const definitions = this.registry.getDefinitions();
    this.entryNames = new Set(definitions.flatMap(def => def.entryFiles));
    this.allExtensions = Array.from(new Set(definitions.flatMap(def => def.resolveExtensions)));

    this.indexFiles();
  }

  /**
   * Resolve a raw token found in `fromFile` to at most one module identifier.
   */
  resolve(token: string, fromFile: string, language?: LanguageId | null): Resolution {
    const from = normalizeSlashes(fromFile);
    const lang = language ?? this.registry.detectLanguage(from);
    const definition = lang ? this.registry.getByLanguage(lang)?.definition : undefined;

    const candidates = this.candidatesFor(token.trim(), from, definition);
    if (!candidates) {
      return { status: 'external' };
    }

    for (const candidate of candidates.paths) {
      const hit = this.matchCandidate(candidate, definition);
      if (hit) return this.toResolution(hit);
    }

    if (candidates.segments && candidates.segments.length > 0) {
      const hit = this.matchTrailingSegments(candidates.segments, definition);
      if (hit) return this.toResolution(hit);
    }

    return { status: candidates.pathLike ? 'unresolved' : 'external' };
  }

  /**
   * Module identifier a file belongs to. In aggregate mode files inside an
   * entry-less folder with several source files collapse into the folder.
   */
  moduleOf(filePath: string): string {
    const file = normalizeSlashes(filePath);
    if (this.folderMode !== 'aggregate') return file;

    const dir = dirOf(file);
    const siblings = this.directFiles.get(dir) ?? [];
    if (siblings.length < 2 || this.entryFileIn(dir) !== null) return file;
    return folderId(dir);
  }

  isFolderModule(moduleId: string): boolean {
    return !this.files.has(moduleId) && this.subtreeFiles.has(folderPath(moduleId));
  }

  /**
   * Files a module stands for: the file itself, or a folder's direct files
   * (its whole subtree when it has none directly).
   */
  filesOf(moduleId: string): string[] {
    if (this.files.has(moduleId)) return [moduleId];
    const dir = folderPath(moduleId);
    const direct = this.directFiles.get(dir);
    if (direct && direct.length > 0) return [...direct];
    return [...(this.subtreeFiles.get(dir) ?? [])];
  }

  get mode(): FolderModuleMode {
    return this.folderMode;
  }

  private indexFiles(): void {
    const sorted = Array.from(this.files).sort();

    for (const file of sorted) {
      const dir = dirOf(file);
      const direct = this.directFiles.get(dir) ?? [];
      direct.push(file);
      this.directFiles.set(dir, direct);

      // Every ancestor directory, root included, owns this file in its subtree
      let current: string | null = dir;
      while (current !== null) {
        const subtree = this.subtreeFiles.get(current) ?? [];
        subtree.push(file);
        this.subtreeFiles.set(current, subtree);
        current = current === '' ? null : dirOf(current);
      }

      this.addKey({ key: stripExtension(file), kind: 'file', path: file });
    }

    for (const dir of Array.from(this.subtreeFiles.keys()).sort()) {
      if (dir !== '') this.addKey({ key: dir, kind: 'folder', path: dir });
    }
  }

  private addKey(entry: ModuleKey): void {
    const segments = entry.key.split('/');
    for (let i = 0; i < segments.length; i++) {
      const suffix = segments.slice(i).join('/');
      const bucket = this.suffixIndex.get(suffix) ?? [];
      bucket.push(entry);
      this.suffixIndex.set(suffix, bucket);
    }
  }

  private candidatesFor(
    token: string,
    fromFile: string,
    definition: LanguageDefinition | undefined
  ): Candidates | null {
    if (!token || EXTERNAL_SCHEME.test(token) || token.includes('://')) return null;

    const fromDir = dirOf(fromFile);
    const style = definition?.pathStyle ?? 'relative';
    const namespaced = definition?.namespaced ?? false;

    switch (style) {
      case 'dotted':
        return this.dottedCandidates(token, fromDir, namespaced);
      case 'rust':
        return this.rustCandidates(token, fromFile);
      case 'include':
        return this.withRoots([joinWithin(fromDir, token), ...this.rootedAt(token), joinWithin('include', token)], null, true);
      case 'go': {
        const segments = token.split('/').filter(Boolean);
        return this.withRoots(token.startsWith('.') ? [joinWithin(fromDir, token)] : this.rootedAt(token), segments, false);
      }
      case 'php': {
        if (token.includes('/') || token.endsWith('.php')) {
          return this.relativeCandidates(token, fromDir, definition);
        }
        const asPath = token.replace(/^\\+/, '').replace(/\\/g, '/');
        return this.withRoots(this.rootedAt(asPath), asPath.split('/'), false);
      }
      case 'relative':
        return this.relativeCandidates(token, fromDir, definition);
    }
  }

  private relativeCandidates(
    token: string,
    fromDir: string,
    definition: LanguageDefinition | undefined
  ): Candidates {
    const namespaced = definition?.namespaced ?? false;

    if (token.startsWith('package:')) {
      // Dart package imports: package:<name>/<path> lives under lib/ of that package
      const rest = token.replace(/^package:[^/]+\/?/, '');
      return this.withRoots([joinWithin('lib', rest), joinWithin('', rest)], namespaced ? rest.split('/') : null, false);
    }

    if (token === '.' || token === '..' || token.startsWith('./') || token.startsWith('../')) {
      return this.withRoots([joinWithin(fromDir, token)], null, true);
    }

    if (token.startsWith('/')) {
      return this.withRoots([joinWithin('', token.slice(1))], null, true);
    }

    for (const prefix of this.aliasPrefixes) {
      if (token.startsWith(prefix)) {
        const rest = token.slice(prefix.length);
        return this.withRoots(this.rootedAt(rest), null, true);
      }
    }

    // Bare specifier: a package unless it happens to name a path under the root
    // or a source root (baseUrl-style imports)
    const paths = definition?.id === 'dart' ? [joinWithin(fromDir, token)] : this.rootedAt(token);
    return this.withRoots(paths, namespaced ? token.split('/') : null, false);
  }

  private dottedCandidates(token: string, fromDir: string, namespaced: boolean): Candidates {
    const leading = token.match(/^\.+/)?.[0].length ?? 0;

    if (leading > 0) {
      let base: string | null = fromDir;
      for (let i = 1; i < leading && base !== null; i++) {
        base = base === '' ? null : dirOf(base);
      }
      if (base === null) return { paths: [], segments: null, pathLike: true };
      const rest = token.slice(leading).split('.').filter(Boolean);
      return this.withRoots(prefixesOf(rest).map(prefix => joinWithin(base ?? '', prefix)), null, true);
    }

    const segments = token.split('.').filter(Boolean);
    const paths: Array<string | null> = [];
    for (const prefix of prefixesOf(segments)) {
      paths.push(...this.rootedAt(prefix), joinWithin(fromDir, prefix));
    }
    return this.withRoots(paths, namespaced ? segments : null, false);
  }

  private rustCandidates(token: string, fromFile: string): Candidates {
    const segments = token.replace(/^::/, '').split('::').filter(Boolean);
    const head = segments[0];
    const fromDir = dirOf(fromFile);
    const stem = path.posix.basename(fromFile, '.rs');
    // `self` inside foo.rs refers to foo/, inside mod.rs/lib.rs/main.rs to the directory itself
    const selfDir = ['mod', 'lib', 'main'].includes(stem) ? fromDir : joinWithin(fromDir, stem) ?? fromDir;

    let bases: string[];
    let rest: string[];
    if (head === 'crate') {
      bases = [this.crateRoot(fromDir)];
      rest = segments.slice(1);
    } else if (head === 'self') {
      bases = [selfDir, fromDir];
      rest = segments.slice(1);
    } else if (head === 'super') {
      let base = selfDir;
      let i = 0;
      while (segments[i] === 'super') {
        base = base === '' ? '' : dirOf(base);
        i++;
      }
      bases = [base];
      rest = segments.slice(i);
    } else {
      bases = [this.crateRoot(fromDir), ''];
      rest = segments;
    }

    const paths: Array<string | null> = rest.length === 0 ? [...bases] : [];
    for (const prefix of prefixesOf(rest)) {
      for (const base of bases) paths.push(joinWithin(base, prefix));
    }
    const isLocal = head === 'crate' || head === 'self' || head === 'super';
    return this.withRoots(paths, isLocal ? null : segments, isLocal);
  }

  /**
   * Nearest ancestor directory holding lib.rs or main.rs
   */
  private crateRoot(fromDir: string): string {
    let current: string | null = fromDir;
    while (current !== null) {
      const files = this.directFiles.get(current) ?? [];
      if (files.some(file => file.endsWith('/lib.rs') || file.endsWith('/main.rs') || file === 'lib.rs' || file === 'main.rs')) {
        return current;
      }
      current = current === '' ? null : dirOf(current);
    }
    return this.subtreeFiles.has('src') ? 'src' : '';
  }

  private rootedAt(relative: string): Array<string | null> {
    return [joinWithin('', relative), ...this.sourceRoots.map(root => joinWithin(root, relative))];
  }

  private withRoots(paths: Array<string | null>, segments: string[] | null, pathLike: boolean): Candidates {
    const unique: string[] = [];
    for (const candidate of paths) {
      if (candidate !== null && !unique.includes(candidate)) unique.push(candidate);
    }
    return { paths: unique, segments, pathLike };
  }

  /**
   * Strategies (a) exact file, (b) extension completion, (c) folder match.
   */
  private matchCandidate(candidate: string, definition: LanguageDefinition | undefined): ModuleKey | null {
    if (candidate !== '' && this.files.has(candidate)) {
      return { key: candidate, kind: 'file', path: candidate };
    }

    const extensions = definition?.resolveExtensions ?? this.allExtensions;
    const stems = [candidate];
    if (JS_EXTENSION.test(candidate)) stems.push(candidate.replace(JS_EXTENSION, ''));

    for (const stem of stems) {
      if (stem === '') continue;
      for (const ext of extensions) {
        if (this.files.has(stem + ext)) {
          return { key: stem, kind: 'file', path: stem + ext };
        }
      }
    }

    if (this.subtreeFiles.has(candidate)) {
      return { key: candidate, kind: 'folder', path: candidate };
    }

    return null;
  }

  /**
   * Strategy (d): match trailing segments of the token against known module
   * paths, longest token suffix first, then shorter token prefixes of at
   * least two segments. The head segment alone ("java", "kotlin") names a
   * package root and never matches a folder.
   */
  private matchTrailingSegments(segments: string[], definition: LanguageDefinition | undefined): ModuleKey | null {
    const head = segments[0];
    const probes: string[] = [];
    for (let start = 0; start < segments.length; start++) {
      probes.push(segments.slice(start).join('/'));
    }
    for (let end = segments.length - 1; end >= 2; end--) {
      probes.push(segments.slice(0, end).join('/'));
    }

    const extensions = new Set(definition?.resolveExtensions ?? this.allExtensions);

    for (const probe of probes) {
      const matches = (this.suffixIndex.get(probe) ?? []).filter(entry =>
        entry.kind === 'folder' ? probe !== head : extensions.has(extensionOf(entry.path))
      );
      if (matches.length === 0) continue;

      matches.sort((a, b) => {
        const depth = a.key.split('/').length - b.key.split('/').length;
        if (depth !== 0) return depth;
        if (a.kind !== b.kind) return a.kind === 'file' ? -1 : 1;
        return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
      });
      return matches[0] ?? null;
    }

    return null;
  }

  private toResolution(hit: ModuleKey): Resolution {
    if (hit.kind === 'file') {
      const target = this.moduleOf(hit.path);
      return { status: 'resolved', target, kind: target === hit.path ? 'file' : 'folder' };
    }

    const entry = this.entryFileIn(hit.path);
    if (entry) {
      const target = this.moduleOf(entry);
      return { status: 'resolved', target, kind: target === entry ? 'file' : 'folder' };
    }
    return { status: 'resolved', target: folderId(hit.path), kind: 'folder' };
  }

  private entryFileIn(dir: string): string | null {
    for (const file of this.directFiles.get(dir) ?? []) {
      if (this.entryNames.has(path.posix.basename(file))) return file;
    }
    return null;
  }
}

function normalizeSlashes(value: string): string {
  return value.replace(/\\/g, '/');
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, '');
}

/** Directory of a relative path; '' is the root */
function dirOf(relativePath: string): string {
  const dir = path.posix.dirname(relativePath);
  return dir === '.' ? '' : dir;
}

function folderId(dir: string): string {
  return dir === '' ? ROOT_MODULE_ID : dir;
}

function folderPath(moduleId: string): string {
  return moduleId === ROOT_MODULE_ID ? '' : moduleId;
}

/**
 * Join inside the repository; null when the result escapes the root.
 */
function joinWithin(base: string, relative: string): string | null {
  const joined = path.posix.normalize(path.posix.join(base || '.', relative));
  if (joined === '..' || joined.startsWith('../') || path.posix.isAbsolute(joined)) return null;
  return joined === '.' ? '' : trimSlashes(joined);
}

/** 'a/b/c' style prefixes, longest first */
function prefixesOf(segments: string[]): string[] {
  const prefixes: string[] = [];
  for (let end = segments.length; end >= 1; end--) {
    prefixes.push(segments.slice(0, end).join('/'));
  }
  return prefixes;
}

function stripExtension(file: string): string {
  const ext = path.posix.extname(file);
  return ext ? file.slice(0, -ext.length) : file;
}

function extensionOf(file: string): string {
  return path.posix.extname(file).toLowerCase();
}
