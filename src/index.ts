/**
 * module-atlas - module dependency analysis for assembling LLM prompts
 *
 * Extracts imports across languages, builds a module dependency graph,
 * clusters related modules and picks the highest-impact file set that
 * fits a content budget. The same operations are exposed over MCP.
 */

// Types
export * from './types/index.js';
export { AnalysisConfigError, FileAnalysisError, type ErrorCategory } from './errors.js';

// Analyzer
export {
  ModuleAnalyzer,
  readCapped,
  type AnalyzerOptions,
  type AnalyzeOptions,
  type AnalysisSnapshot,
  type AnalysisResult,
  type ModuleSelection,
  type ModuleSelectionResult,
  type ClusterSelection,
  type ClusterSelectionResult,
  type OptimalPromptOptions,
} from './analyzer/index.js';

// Extraction, resolution and lookup
export {
  ImportExtractor,
  ExtractorRegistry,
  createDefaultRegistry,
  getDefaultRegistry,
  LANGUAGE_DEFINITIONS,
  ModuleResolver,
  ROOT_MODULE_ID,
  ModuleLookup,
  scanFiles,
  gitignoreToGlobs,
  MemoryExtractionCache,
  SqliteExtractionCache,
  type ExtractionCache,
  type LanguageDefinition,
  type Resolution,
  type LookupResult,
} from './analyzer/index.js';

// Graph
export { DependencyGraph } from './graph/dependency-graph.js';
export { buildDependencyGraph, type GraphBuildInput } from './graph/builder.js';
export {
  buildDendrogram,
  cutDendrogram,
  flatClusters,
  selectCluster,
  selectClusterAt,
  pathLengthsFrom,
  DEFAULT_DISCONNECTED_DISTANCE,
} from './graph/cluster.js';

// Selector
export {
  selectModules,
  selectableModules,
  estimateTokens,
  resolveBudget,
  type SelectableModule,
  type SelectorOptions,
} from './selector/index.js';

// Server
export { createServer, startStdioServer, registerTools, type ServerOptions } from './server/index.js';

// Config
export {
  configSchema,
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  type Config,
} from './config/index.js';
