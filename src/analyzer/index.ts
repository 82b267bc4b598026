/**
 * Module analysis orchestration
 */

import fs from 'node:fs';
import path from 'node:path';

import type {
  AnalysisStatus,
  Dendrogram,
  GraphEdge,
  ImportEdge,
  ModuleKind,
  ModuleNode,
  NamedCluster,
  SelectionResult,
  SourceFile,
  UnanalyzedFile,
} from '../types/index.js';
import { FileAnalysisError } from '../errors.js';
import { getDefaultConfig, type Config } from '../config/index.js';
import { buildDependencyGraph } from '../graph/builder.js';
import type { DependencyGraph } from '../graph/dependency-graph.js';
import { buildDendrogram, cutDendrogram, flatClusters, selectCluster, selectClusterAt } from '../graph/cluster.js';
import { selectModules, selectableModules } from '../selector/index.js';
import { createDefaultRegistry, type ExtractorRegistry } from './extractors/index.js';
import { ModuleResolver } from './module-resolver.js';
import { ModuleLookup, type LookupError } from './module-lookup.js';
import { scanFiles } from './scanner.js';
import { MemoryExtractionCache, SqliteExtractionCache, type ExtractionCache } from './cache/index.js';

export interface AnalyzerOptions {
  rootDirectory: string;
  config?: Config;
  /** Overrides the cache the configuration would create */
  cache?: ExtractionCache;
  registry?: ExtractorRegistry;
}

export interface AnalyzeOptions {
  signal?: AbortSignal;
  /** Pre-filtered file list; skips the directory scan */
  files?: SourceFile[];
  onFileAnalyzed?: (file: SourceFile, done: number, total: number) => void;
}

export interface AnalysisSnapshot {
  rootDirectory: string;
  files: SourceFile[];
  edges: ImportEdge[];
  graph: DependencyGraph;
  dendrogram: Dendrogram;
  clusters: NamedCluster[];
  createdAt: number;
}

interface AnalysisSummary {
  rootDirectory: string;
  totalFiles: number;
  /** Relative paths of files whose imports were extracted */
  analyzedFiles: string[];
  skippedFiles: UnanalyzedFile[];
  durationMs: number;
}

export type AnalysisResult =
  | (AnalysisSummary & { status: 'complete'; snapshot: AnalysisSnapshot })
  | (AnalysisSummary & { status: 'partial'; snapshot: AnalysisSnapshot })
  | (AnalysisSummary & { status: 'cancelled' });

export interface ModuleSelection {
  moduleId: string;
  kind: ModuleKind;
  files: string[];
  size: number;
  impact: number;
}

export type ModuleSelectionResult =
  | { success: true; selection: ModuleSelection }
  | { success: false; error: LookupError };

export interface ClusterSelection {
  clusterId: number | null;
  height: number;
  modules: string[];
  files: string[];
}

export type ClusterSelectionResult =
  | { success: true; cluster: ClusterSelection }
  | { success: false; error: LookupError };

export interface OptimalPromptOptions {
  /** Byte budget; defaults to selector.maxContentLength × selector.budgetPercent */
  budget?: number;
}

type FileOutcome =
  | { ok: true; file: SourceFile; tokens: string[] }
  | { ok: false; problem: UnanalyzedFile };

export class ModuleAnalyzer {
  private rootDir: string;
  private config: Config;
  private registry: ExtractorRegistry;
  private cache: ExtractionCache;
  private initialized = false;
  private snapshot: AnalysisSnapshot | null = null;
  private resolver: ModuleResolver | null = null;
  private lookup: ModuleLookup | null = null;

  constructor(options: AnalyzerOptions) {
    this.rootDir = path.resolve(options.rootDirectory);
    this.config = options.config ?? getDefaultConfig();
    this.registry = options.registry ?? createDefaultRegistry({ languages: this.config.extractor.languages });
    this.cache = options.cache ?? this.createCache();
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;
    await this.cache.initialize();
    this.initialized = true;
  }

  async close(): Promise<void> {
    await this.cache.close();
    this.initialized = false;
  }

  getRootDir(): string {
    return this.rootDir;
  }

  /**
   * Last completed snapshot. A cancelled scan leaves the previous one in place.
   */
  getSnapshot(): AnalysisSnapshot | null {
    return this.snapshot;
  }

  async analyze(options: AnalyzeOptions = {}): Promise<AnalysisResult> {
    await this.initialize();

    const startTime = Date.now();
    const files = options.files ?? (await scanFiles({
      rootDirectory: this.rootDir,
      registry: this.registry,
      include: this.config.scan.include,
      exclude: this.config.scan.exclude,
      respectGitignore: this.config.scan.respectGitignore,
    }));

    const { outcomes, cancelled } = await this.extractAll(files, options);

    const analyzed: Array<{ file: SourceFile; tokens: string[] }> = [];
    const skippedFiles: UnanalyzedFile[] = [];
    for (const outcome of outcomes) {
      if (!outcome) continue;
      if (outcome.ok) analyzed.push(outcome);
      else skippedFiles.push(outcome.problem);
    }

    const summary: AnalysisSummary = {
      rootDirectory: this.rootDir,
      totalFiles: files.length,
      analyzedFiles: analyzed.map(entry => entry.file.path),
      skippedFiles,
      durationMs: 0,
    };

    if (cancelled) {
      return { ...summary, status: 'cancelled', durationMs: Date.now() - startTime };
    }

    const snapshot = this.buildSnapshot(files, analyzed);
    const status: Exclude<AnalysisStatus, 'cancelled'> = skippedFiles.length > 0 ? 'partial' : 'complete';

    await this.cache.retainOnly(new Set(files.map(file => file.path)));

    return { ...summary, status, snapshot, durationMs: Date.now() - startTime };
  }

  /**
   * Modules ranked by impact, highest first
   */
  listModules(): ModuleNode[] {
    return this.requireSnapshot().graph.rankByImpact();
  }

  /**
   * Resolve user input ("pkg", "src/utils", "utils.py") to one module and its files.
   */
  selectModule(input: string): ModuleSelectionResult {
    const { graph, files: scanned } = this.requireSnapshot();
    const found = this.requireLookup().lookup(input);
    if (!found.success) return found;

    const node = graph.getModule(found.moduleId);
    if (node) {
      return {
        success: true,
        selection: { moduleId: node.id, kind: node.kind, files: [...node.files], size: node.size, impact: node.impact },
      };
    }

    // A folder nothing imports is still selectable as a unit
    const resolver = this.requireResolver();
    const files = resolver.filesOf(found.moduleId);
    const sizes = new Map(scanned.map(file => [file.path, file.size]));
    const size = files.reduce((sum, file) => sum + (sizes.get(file) ?? 0), 0);
    return { success: true, selection: { moduleId: found.moduleId, kind: 'folder', files, size, impact: 0 } };
  }

  selectCluster(clusterId: number): ClusterSelection | null {
    const { dendrogram } = this.requireSnapshot();
    const modules = selectCluster(dendrogram, clusterId);
    if (!modules) return null;
    const height = clusterId < dendrogram.leaves.length ? 0 : dendrogram.merges[clusterId - dendrogram.leaves.length]?.height ?? 0;
    return { clusterId, height, modules, files: this.filesOfModules(modules) };
  }

  /**
   * Group containing `moduleInput` when the dendrogram is cut at `height`.
   */
  selectClusterAt(height: number, moduleInput: string): ClusterSelectionResult {
    const { dendrogram } = this.requireSnapshot();
    const found = this.requireLookup().lookup(moduleInput);
    if (!found.success) return found;

    const modules = selectClusterAt(dendrogram, height, found.moduleId);
    if (!modules) {
      return {
        success: false,
        error: { type: 'not_found', message: `Module "${found.moduleId}" has no dependency edges and belongs to no cluster` },
      };
    }
    return { success: true, cluster: { clusterId: null, height, modules, files: this.filesOfModules(modules) } };
  }

  cutClusters(height: number): string[][] {
    return cutDendrogram(this.requireSnapshot().dendrogram, height);
  }

  selectOptimalPrompt(options: OptimalPromptOptions = {}): SelectionResult {
    const { graph, files } = this.requireSnapshot();
    return selectModules(selectableModules(graph), {
      budget: options.budget,
      maxContentLength: this.config.selector.maxContentLength,
      budgetPercent: this.config.selector.budgetPercent,
      maxCapacityUnits: this.config.selector.maxCapacityUnits,
      maxDpCells: this.config.selector.maxDpCells,
      fileSizes: new Map(files.map(file => [file.path, file.size])),
    });
  }

  private createCache(): ExtractionCache {
    if (!this.config.cache.enabled) return new MemoryExtractionCache();
    return new SqliteExtractionCache(path.resolve(this.rootDir, this.config.cache.database));
  }

  /**
   * Read and extract every file with a bounded pool of workers. Each worker
   * checks the signal before taking its next file and again once the file is
   * done.
   */
  private async extractAll(
    files: SourceFile[],
    options: AnalyzeOptions
  ): Promise<{ outcomes: Array<FileOutcome | undefined>; cancelled: boolean }> {
    const outcomes: Array<FileOutcome | undefined> = new Array(files.length);
    let nextIndex = 0;
    let done = 0;
    let cancelled = false;

    const worker = async (): Promise<void> => {
      while (nextIndex < files.length) {
        if (options.signal?.aborted) {
          cancelled = true;
          return;
        }
        const index = nextIndex++;
        const file = files[index];
        if (!file) continue;

        const outcome = await this.extractFile(file);
        // Files still in flight when the signal fires are not counted
        if (options.signal?.aborted) {
          cancelled = true;
          return;
        }
        outcomes[index] = outcome;
        done++;
        options.onFileAnalyzed?.(file, done, files.length);
      }
    };

    const concurrency = Math.max(1, Math.min(this.config.scan.concurrency, files.length));
    const workers: Promise<void>[] = [];
    for (let i = 0; i < concurrency; i++) workers.push(worker());
    await Promise.all(workers);

    return { outcomes, cancelled: cancelled || (options.signal?.aborted ?? false) };
  }

  private async extractFile(file: SourceFile): Promise<FileOutcome> {
    const key = { path: file.path, mtimeMs: file.mtimeMs, size: file.size };
    const cached = await this.cache.get(key);
    if (cached) return { ok: true, file, tokens: cached };

    try {
      const text = await readCapped(file, this.config.extractor.maxReadBytes);
      const tokens = Array.from(this.registry.extractImports(file.path, text));
      await this.cache.set(key, tokens);
      return { ok: true, file, tokens };
    } catch (error) {
      if (error instanceof FileAnalysisError) {
        return { ok: false, problem: { path: error.filePath, code: error.code, message: error.message } };
      }
      throw error;
    }
  }

  private buildSnapshot(files: SourceFile[], analyzed: Array<{ file: SourceFile; tokens: string[] }>): AnalysisSnapshot {
    const resolver = new ModuleResolver({
      files: files.map(file => file.path),
      registry: this.registry,
      aliasPrefixes: this.config.resolver.aliasPrefixes,
      sourceRoots: this.config.resolver.sourceRoots,
      folderModules: this.config.resolver.folderModules,
    });

    const edges: ImportEdge[] = [];
    const graphEdges: GraphEdge[] = [];
    for (const { file, tokens } of analyzed) {
      for (const token of tokens) {
        const resolution = resolver.resolve(token, file.path, file.language);
        edges.push({ from: file.path, token, status: resolution.status, target: resolution.target });
        if (resolution.status === 'resolved' && resolution.target) {
          graphEdges.push({ from: file.path, to: resolution.target });
        }
      }
    }

    const graph = buildDependencyGraph({
      files: analyzed.map(entry => entry.file.path),
      edges: graphEdges,
      fileSizes: new Map(files.map(file => [file.path, file.size])),
      moduleOf: filePath => resolver.moduleOf(filePath),
      filesOf: moduleId => resolver.filesOf(moduleId),
    });

    const dendrogram = buildDendrogram(graph, {
      linkage: this.config.cluster.linkage,
      disconnectedDistance: this.config.cluster.disconnectedDistance,
    });
    const clusters = flatClusters(dendrogram, graph, {
      maxClusters: this.config.cluster.maxClusters,
      maxClusterSize: this.config.cluster.maxClusterSize,
      impactThreshold: this.config.cluster.impactThreshold,
    });

    const snapshot: AnalysisSnapshot = {
      rootDirectory: this.rootDir,
      files,
      edges,
      graph,
      dendrogram,
      clusters,
      createdAt: Date.now(),
    };

    // Replaced together, and only by a scan that ran to the end
    this.snapshot = snapshot;
    this.resolver = resolver;
    this.lookup = new ModuleLookup([...graph.moduleIds(), ...folderIdsOf(files)]);
    return snapshot;
  }

  private filesOfModules(modules: readonly string[]): string[] {
    const { graph } = this.requireSnapshot();
    const files = new Set<string>();
    for (const id of modules) {
      for (const file of graph.getModule(id)?.files ?? []) files.add(file);
    }
    return Array.from(files).sort();
  }

  private requireSnapshot(): AnalysisSnapshot {
    if (!this.snapshot) {
      throw new Error('No analysis snapshot available. Run analyze() first.');
    }
    return this.snapshot;
  }

  private requireResolver(): ModuleResolver {
    if (!this.resolver) throw new Error('No analysis snapshot available. Run analyze() first.');
    return this.resolver;
  }

  private requireLookup(): ModuleLookup {
    if (!this.lookup) throw new Error('No analysis snapshot available. Run analyze() first.');
    return this.lookup;
  }
}

/**
 * Read at most `maxBytes` of a file and decode it as UTF-8. A NUL byte marks
 * the file as binary. A multi-byte character cut by the cap is not an error;
 * one cut by the end of the file is.
 */
export async function readCapped(file: SourceFile, maxBytes: number): Promise<string> {
  let buffer: Buffer;
  let capped = false;
  try {
    const handle = await fs.promises.open(file.absolutePath, 'r');
    try {
      const chunk = Buffer.alloc(maxBytes);
      const { bytesRead } = await handle.read(chunk, 0, maxBytes, 0);
      buffer = chunk.subarray(0, bytesRead);
      capped = bytesRead === maxBytes;
    } finally {
      await handle.close();
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new FileAnalysisError(file.path, 'unreadable', `Cannot read file: ${message}`);
  }

  if (buffer.includes(0)) {
    throw new FileAnalysisError(file.path, 'binary', 'File appears to be binary');
  }

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buffer, { stream: capped });
  } catch {
    throw new FileAnalysisError(file.path, 'decode', 'File is not valid UTF-8');
  }
}

/**
 * Every directory holding a scanned file, as module identifiers
 */
function folderIdsOf(files: readonly SourceFile[]): string[] {
  const dirs = new Set<string>();
  for (const file of files) {
    let dir = path.posix.dirname(file.path);
    while (dir !== '.' && !dirs.has(dir)) {
      dirs.add(dir);
      dir = path.posix.dirname(dir);
    }
  }
  return Array.from(dirs);
}

export { ModuleResolver, ROOT_MODULE_ID, type FolderModuleMode, type Resolution } from './module-resolver.js';
export { ModuleLookup, type LookupResult, type LookupError } from './module-lookup.js';
export { scanFiles, gitignoreToGlobs, SKIP_DIRS, DEFAULT_EXCLUDE, type ScanOptions } from './scanner.js';
export * from './extractors/index.js';
export * from './cache/index.js';
