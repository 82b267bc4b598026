/**
 * Config module exports
 */

export {
  configSchema,
  languageIdSchema,
  scanConfigSchema,
  extractorConfigSchema,
  resolverConfigSchema,
  clusterConfigSchema,
  selectorConfigSchema,
  cacheConfigSchema,
  type Config,
  type ScanConfig,
  type ExtractorConfig,
  type ResolverConfig,
  type ClusterConfig,
  type SelectorConfig,
  type CacheConfig,
} from './schema.js';

export {
  loadConfig,
  parseConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  CONFIG_FILE_NAMES,
  PACKAGE_JSON_KEY,
} from './loader.js';
