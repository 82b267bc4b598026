import { describe, it, expect } from 'vitest';
import {
  configSchema,
  scanConfigSchema,
  clusterConfigSchema,
  selectorConfigSchema,
  languageIdSchema,
} from '../../../src/config/schema.js';

describe('Config Schema', () => {
  describe('configSchema', () => {
    it('should apply a default for every section', () => {
      const result = configSchema.parse({});

      expect(Object.keys(result).sort()).toEqual(['cache', 'cluster', 'extractor', 'resolver', 'scan', 'selector']);
      expect(result.resolver.sourceRoots).toEqual(['src', 'lib']);
      expect(result.selector.maxCapacityUnits).toBe(10000);
      expect(result.selector.maxDpCells).toBe(4000000);
    });

    it('should reject unknown languages', () => {
      const invalid = configSchema.safeParse({ extractor: { languages: ['cobol'] } });
      expect(invalid.success).toBe(false);
    });
  });

  describe('languageIdSchema', () => {
    it('should accept every extractor language', () => {
      for (const id of ['python', 'typescript', 'rust', 'go', 'csharp', 'dart']) {
        expect(languageIdSchema.safeParse(id).success).toBe(true);
      }
    });
  });

  describe('scanConfigSchema', () => {
    it('should validate include as array of strings', () => {
      expect(scanConfigSchema.safeParse({ include: ['src/**'] }).success).toBe(true);
      expect(scanConfigSchema.safeParse({ include: 'src/**' }).success).toBe(false);
    });

    it('should require an integer concurrency', () => {
      expect(scanConfigSchema.safeParse({ concurrency: 2.5 }).success).toBe(false);
    });
  });

  describe('clusterConfigSchema', () => {
    it('should accept the supported linkage methods', () => {
      for (const linkage of ['average', 'complete', 'single']) {
        expect(clusterConfigSchema.safeParse({ linkage }).success).toBe(true);
      }
      expect(clusterConfigSchema.safeParse({ linkage: 'ward' }).success).toBe(false);
    });

    it('should require at least two clusters', () => {
      expect(clusterConfigSchema.safeParse({ maxClusters: 1 }).success).toBe(false);
    });

    it('should default the disconnected distance and require it to be positive', () => {
      expect(clusterConfigSchema.parse({}).disconnectedDistance).toBe(1000);
      expect(clusterConfigSchema.safeParse({ disconnectedDistance: 0 }).success).toBe(false);
    });

    it('should reject a negative impact threshold', () => {
      expect(clusterConfigSchema.safeParse({ impactThreshold: -0.1 }).success).toBe(false);
    });
  });

  describe('selectorConfigSchema', () => {
    it('should keep budgetPercent within (0, 100]', () => {
      expect(selectorConfigSchema.safeParse({ budgetPercent: 100 }).success).toBe(true);
      expect(selectorConfigSchema.safeParse({ budgetPercent: 0 }).success).toBe(false);
      expect(selectorConfigSchema.safeParse({ budgetPercent: 101 }).success).toBe(false);
    });

    it('should require a positive content length', () => {
      expect(selectorConfigSchema.safeParse({ maxContentLength: 0 }).success).toBe(false);
    });
  });
});
