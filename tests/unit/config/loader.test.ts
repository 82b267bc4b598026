import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import {
  loadConfig,
  parseConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
} from '../../../src/config/loader.js';
import { AnalysisConfigError } from '../../../src/errors.js';
import { getFixturePath } from '../../helpers/fixtures.js';

describe('Config Loader', () => {
  describe('loadConfig', () => {
    it('should load and parse a valid config file', async () => {
      const config = await loadConfig(getFixturePath('configs', 'valid-config.json'));

      expect(config.scan.include).toEqual(['src/**/*', 'lib/**/*']);
      expect(config.scan.exclude).toEqual(['**/generated/**']);
      expect(config.scan.concurrency).toBe(4);
      expect(config.extractor.languages).toEqual(['python', 'typescript']);
      expect(config.resolver.folderModules).toBe('aggregate');
      expect(config.cluster.linkage).toBe('complete');
      expect(config.cluster.maxClusters).toBe(10);
      expect(config.selector.maxContentLength).toBe(200000);
      expect(config.selector.budgetPercent).toBe(50);
      expect(config.cache.enabled).toBe(false);
    });

    it('should fill defaults inside partially given sections', async () => {
      const config = await loadConfig(getFixturePath('configs', 'valid-config.json'));

      expect(config.scan.respectGitignore).toBe(true);
      expect(config.cluster.maxClusterSize).toBe(50);
      expect(config.cache.database).toBe('.module-atlas/cache.db');
    });

    it('should apply defaults for an empty config', async () => {
      const config = await loadConfig(getFixturePath('configs', 'minimal-config.json'));

      expect(config).toEqual(getDefaultConfig());
    });

    it('should throw for non-existent config file', async () => {
      await expect(loadConfig('/non/existent/config.json')).rejects.toThrow('Config file not found');
    });

    it('should throw for invalid JSON', async () => {
      await expect(loadConfig(getFixturePath('configs', 'invalid-json.json'))).rejects.toThrow('Invalid JSON');
    });

    it('should throw a config error naming the failing fields', async () => {
      const promise = loadConfig(getFixturePath('configs', 'invalid-schema.json'));

      await expect(promise).rejects.toBeInstanceOf(AnalysisConfigError);
      await expect(loadConfig(getFixturePath('configs', 'invalid-schema.json'))).rejects.toThrow(/scan\.include/);
      await expect(loadConfig(getFixturePath('configs', 'invalid-schema.json'))).rejects.toThrow(/selector\.budgetPercent/);
    });
  });

  describe('parseConfig', () => {
    it('should start the message with Invalid configuration', () => {
      expect(() => parseConfig({ cluster: { linkage: 'ward' } })).toThrow(/^Invalid configuration:\n {2}- cluster\.linkage: /);
    });

    it('should reject a concurrency outside 1-64', () => {
      expect(() => parseConfig({ scan: { concurrency: 0 } })).toThrow(AnalysisConfigError);
      expect(() => parseConfig({ scan: { concurrency: 65 } })).toThrow(AnalysisConfigError);
    });
  });

  describe('getDefaultConfig', () => {
    it('should return valid default configuration', () => {
      const config = getDefaultConfig();

      expect(config.scan.include).toEqual(['**/*']);
      expect(config.scan.exclude).toEqual([]);
      expect(config.scan.concurrency).toBe(8);
      expect(config.extractor.maxReadBytes).toBe(51200);
      expect(config.extractor.languages).toEqual([]);
      expect(config.resolver.folderModules).toBe('independent');
      expect(config.resolver.aliasPrefixes).toEqual(['@/', '~/', '#/']);
      expect(config.cluster.linkage).toBe('average');
      expect(config.selector.maxContentLength).toBe(500000);
      expect(config.selector.budgetPercent).toBe(80);
      expect(config.cache.enabled).toBe(true);
    });

    it('should return a new object each time', () => {
      const config1 = getDefaultConfig();
      const config2 = getDefaultConfig();

      expect(config1).not.toBe(config2);
      expect(config1).toEqual(config2);
    });
  });

  describe('findConfig', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'module-atlas-config-test-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should find module-atlas.config.json in current directory', async () => {
      fs.writeFileSync(path.join(tempDir, 'module-atlas.config.json'), JSON.stringify({ cluster: { maxClusters: 3 } }));

      const config = await findConfig(tempDir);

      expect(config?.cluster.maxClusters).toBe(3);
    });

    it('should find .moduleatlasrc.json in current directory', async () => {
      fs.writeFileSync(path.join(tempDir, '.moduleatlasrc.json'), JSON.stringify({ cluster: { maxClusters: 4 } }));

      const config = await findConfig(tempDir);

      expect(config?.cluster.maxClusters).toBe(4);
    });

    it('should find .moduleatlasrc in current directory', async () => {
      fs.writeFileSync(path.join(tempDir, '.moduleatlasrc'), JSON.stringify({ cluster: { maxClusters: 5 } }));

      const config = await findConfig(tempDir);

      expect(config?.cluster.maxClusters).toBe(5);
    });

    it('should traverse parent directories to find config', async () => {
      fs.writeFileSync(path.join(tempDir, 'module-atlas.config.json'), JSON.stringify({ selector: { budgetPercent: 25 } }));
      const childDir = path.join(tempDir, 'nested', 'deep');
      fs.mkdirSync(childDir, { recursive: true });

      const config = await findConfig(childDir);

      expect(config?.selector.budgetPercent).toBe(25);
    });

    it('should extract the moduleAtlas key from package.json', async () => {
      fs.writeFileSync(path.join(tempDir, 'package.json'), JSON.stringify({
        name: 'test-package',
        moduleAtlas: { resolver: { folderModules: 'aggregate' } },
      }));

      const config = await findConfig(tempDir);

      expect(config?.resolver.folderModules).toBe('aggregate');
    });

    it('should skip a package.json without the key and keep walking', async () => {
      fs.writeFileSync(path.join(tempDir, 'module-atlas.config.json'), JSON.stringify({ cluster: { maxClusters: 7 } }));
      const childDir = path.join(tempDir, 'child');
      fs.mkdirSync(childDir);
      fs.writeFileSync(path.join(childDir, 'package.json'), JSON.stringify({ name: 'child' }));

      const config = await findConfig(childDir);

      expect(config?.cluster.maxClusters).toBe(7);
    });

    it('should prefer module-atlas.config.json over package.json', async () => {
      fs.writeFileSync(path.join(tempDir, 'module-atlas.config.json'), JSON.stringify({ cluster: { maxClusters: 8 } }));
      fs.writeFileSync(
        path.join(tempDir, 'package.json'),
        JSON.stringify({ name: 'test', moduleAtlas: { cluster: { maxClusters: 9 } } })
      );

      const config = await findConfig(tempDir);

      expect(config?.cluster.maxClusters).toBe(8);
    });
  });

  describe('loadConfigOrDefault', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'module-atlas-config-or-default-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should load config when found', async () => {
      fs.writeFileSync(path.join(tempDir, 'module-atlas.config.json'), JSON.stringify({ scan: { concurrency: 2 } }));

      const config = await loadConfigOrDefault(tempDir);

      expect(config.scan.concurrency).toBe(2);
    });

    it('should use an explicit config path over discovery', async () => {
      fs.writeFileSync(path.join(tempDir, 'module-atlas.config.json'), JSON.stringify({ scan: { concurrency: 2 } }));

      const config = await loadConfigOrDefault(tempDir, getFixturePath('configs', 'valid-config.json'));

      expect(config.scan.concurrency).toBe(4);
    });

    it('should throw when the explicit config path is missing', async () => {
      await expect(loadConfigOrDefault(tempDir, path.join(tempDir, 'nope.json'))).rejects.toThrow('Config file not found');
    });
  });
});
