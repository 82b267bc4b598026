/**
 * Core types for module analysis
 */

export type LanguageId =
  | 'python'
  | 'javascript'
  | 'typescript'
  | 'vue'
  | 'rust'
  | 'java'
  | 'kotlin'
  | 'scala'
  | 'c'
  | 'cpp'
  | 'go'
  | 'csharp'
  | 'ruby'
  | 'php'
  | 'swift'
  | 'dart';

export interface SourceFile {
  /** Path relative to the repository root, always with forward slashes */
  path: string;
  absolutePath: string;
  language: LanguageId | null;
  /** Size in bytes on disk */
  size: number;
  mtimeMs: number;
}

export type ImportStatus = 'resolved' | 'external' | 'unresolved';

export interface ImportEdge {
  from: string;
  token: string;
  status: ImportStatus;
  /** Module identifier the token resolved to */
  target?: string;
}

export type ModuleKind = 'file' | 'folder';

export interface ModuleNode {
  id: string;
  kind: ModuleKind;
  /** Relative paths of the files this module stands for */
  files: readonly string[];
  size: number;
  imports: readonly string[];
  importedBy: readonly string[];
  /** Count of distinct modules importing this one */
  impact: number;
  /** impact / (moduleCount - 1) */
  centrality: number;
}

export interface GraphEdge {
  from: string;
  to: string;
}

export interface ClusterNode {
  id: number;
  members: readonly string[];
  height: number;
  children: readonly ClusterNode[];
}

export type LinkageMethod = 'average' | 'complete' | 'single';

export interface MergeStep {
  left: number;
  right: number;
  height: number;
  size: number;
}

export interface Dendrogram {
  linkage: LinkageMethod;
  leaves: readonly string[];
  merges: readonly MergeStep[];
  root: ClusterNode | null;
}

export interface NamedCluster {
  name: string;
  clusterIds: readonly number[];
  modules: readonly string[];
  fileCount: number;
  aggregateImpact: number;
}

export type SelectionStrategy = 'all' | 'exact' | 'greedy';

export interface SelectedModule {
  id: string;
  size: number;
  impact: number;
}

export interface SelectionResult {
  modules: SelectedModule[];
  files: string[];
  totalSize: number;
  totalImpact: number;
  budget: number;
  strategy: SelectionStrategy;
  estimatedTokens: number;
}

export type UnanalyzedCode = 'unreadable' | 'binary' | 'decode';

export interface UnanalyzedFile {
  path: string;
  code: UnanalyzedCode;
  message: string;
}

export type AnalysisStatus = 'complete' | 'partial' | 'cancelled';
