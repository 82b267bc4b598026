/**
 * Test fixture utilities
 */

import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { fileURLToPath } from 'node:url';
import type { Config } from '../../src/config/index.js';
import { getDefaultConfig } from '../../src/config/index.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(...parts: string[]): string {
  return path.join(__dirname, '../fixtures', ...parts);
}

export interface TempProjectResult {
  rootDir: string;
  cleanup: () => void;
  addFile: (relativePath: string, content: string | Buffer) => string;
  removeFile: (relativePath: string) => void;
  getFilePath: (relativePath: string) => string;
}

/**
 * Create a temporary project directory with files
 */
export function createTempProject(files: Record<string, string | Buffer> = {}): TempProjectResult {
  const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'module-atlas-project-'));

  const addFile = (relativePath: string, content: string | Buffer): string => {
    const filePath = path.join(rootDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  for (const [relativePath, content] of Object.entries(files)) {
    addFile(relativePath, content);
  }

  const cleanup = () => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  };

  const removeFile = (relativePath: string): void => {
    const filePath = path.join(rootDir, relativePath);
    if (fs.existsSync(filePath)) {
      fs.unlinkSync(filePath);
    }
  };

  const getFilePath = (relativePath: string): string => {
    return path.join(rootDir, relativePath);
  };

  return { rootDir, cleanup, addFile, removeFile, getFilePath };
}

/**
 * Default config with the on-disk cache turned off
 */
export function testConfig(overrides: (config: Config) => void = () => {}): Config {
  const config = getDefaultConfig();
  config.cache.enabled = false;
  overrides(config);
  return config;
}

/**
 * A small python project: app imports models and utils, models imports utils.
 */
export const PYTHON_PROJECT: Record<string, string> = {
  'app.py': 'import models\nfrom utils import helper\n',
  'models.py': 'from utils import helper\n\nclass User:\n    pass\n',
  'utils.py': 'def helper():\n    return 1\n',
  'README.md': '# readme\n',
};

export const VALID_CONFIG = {
  scan: {
    include: ['**/*.py'],
    concurrency: 2,
  },
  cluster: {
    linkage: 'complete',
  },
  selector: {
    budgetPercent: 50,
  },
};

export const MINIMAL_CONFIG = {};

export const INVALID_SCHEMA_CONFIG = {
  scan: {
    include: 'not-an-array',
  },
  selector: {
    budgetPercent: 150,
  },
};
