/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

export const languageIdSchema = z.enum([
  'python',
  'javascript',
  'typescript',
  'vue',
  'rust',
  'java',
  'kotlin',
  'scala',
  'c',
  'cpp',
  'go',
  'csharp',
  'ruby',
  'php',
  'swift',
  'dart',
]);

export const scanConfigSchema = z.object({
  include: z.array(z.string()).default(['**/*']),
  exclude: z.array(z.string()).default([]),
  respectGitignore: z.boolean().default(true),
  concurrency: z.number().int().min(1).max(64).default(8),
});

export const extractorConfigSchema = z.object({
  maxReadBytes: z.number().int().positive().default(50 * 1024),
  // Empty means every supported language
  languages: z.array(languageIdSchema).default([]),
});

export const resolverConfigSchema = z.object({
  folderModules: z.enum(['independent', 'aggregate']).default('independent'),
  aliasPrefixes: z.array(z.string()).default(['@/', '~/', '#/']),
  sourceRoots: z.array(z.string()).default(['src', 'lib']),
});

export const clusterConfigSchema = z.object({
  linkage: z.enum(['average', 'complete', 'single']).default('average'),
  maxClusters: z.number().int().min(2).default(25),
  maxClusterSize: z.number().int().min(1).default(50),
  impactThreshold: z.number().min(0).default(0),
  /** Distance between modules with no undirected path between them */
  disconnectedDistance: z.number().positive().default(1000),
});

export const selectorConfigSchema = z.object({
  maxContentLength: z.number().int().positive().default(500_000),
  budgetPercent: z.number().gt(0).max(100).default(80),
  maxCapacityUnits: z.number().int().positive().default(10_000),
  maxDpCells: z.number().int().positive().default(4_000_000),
});

export const cacheConfigSchema = z.object({
  enabled: z.boolean().default(true),
  database: z.string().default('.module-atlas/cache.db'),
});

export const configSchema = z.object({
  scan: scanConfigSchema.default({}),
  extractor: extractorConfigSchema.default({}),
  resolver: resolverConfigSchema.default({}),
  cluster: clusterConfigSchema.default({}),
  selector: selectorConfigSchema.default({}),
  cache: cacheConfigSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
export type ScanConfig = z.infer<typeof scanConfigSchema>;
export type ExtractorConfig = z.infer<typeof extractorConfigSchema>;
export type ResolverConfig = z.infer<typeof resolverConfigSchema>;
export type ClusterConfig = z.infer<typeof clusterConfigSchema>;
export type SelectorConfig = z.infer<typeof selectorConfigSchema>;
export type CacheConfig = z.infer<typeof cacheConfigSchema>;
