import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { ModuleAnalyzer } from '../../src/analyzer/index.js';
import { analyzeRepositoryTool } from '../../src/server/tools/analyze-repository.js';
import { listModulesTool } from '../../src/server/tools/list-modules.js';
import { selectModuleTool } from '../../src/server/tools/select-module.js';
import { selectClusterTool } from '../../src/server/tools/select-cluster.js';
import { selectOptimalPromptTool } from '../../src/server/tools/select-optimal-prompt.js';
import type { ToolResponse } from '../../src/server/tools/compact-format.js';
import { createTempProject, PYTHON_PROJECT, testConfig, type TempProjectResult } from '../helpers/fixtures.js';

function textOf(response: ToolResponse): string {
  return response.content.map(part => part.text).join('\n');
}

describe('MCP Tools Integration', () => {
  let project: TempProjectResult;
  let analyzer: ModuleAnalyzer;

  beforeAll(() => {
    project = createTempProject(PYTHON_PROJECT);
    analyzer = new ModuleAnalyzer({ rootDirectory: project.rootDir, config: testConfig() });
  });

  afterAll(async () => {
    await analyzer.close();
    project.cleanup();
  });

  describe('list_modules', () => {
    it('analyzes on first use and ranks by impact', async () => {
      const response = await listModulesTool(analyzer, {});

      expect(response.isError).toBeUndefined();
      expect(textOf(response)).toBe(
        [
          '[MODULES] total=3 offset=0 showing=3',
          'module\tkind\tfiles\tbytes\timpact\tcentrality',
          'utils.py\tfile\t1\t27\t2\t1.000',
          'models.py\tfile\t1\t47\t1\t0.500',
          'app.py\tfile\t1\t39\t0\t0.000',
        ].join('\n')
      );
    });

    it('pages with a next offset', async () => {
      const text = textOf(await listModulesTool(analyzer, { limit: 1 }));

      expect(text.split('\n')).toEqual([
        '[MODULES] total=3 offset=0 showing=1',
        'module\tkind\tfiles\tbytes\timpact\tcentrality',
        'utils.py\tfile\t1\t27\t2\t1.000',
        '[NEXT_OFFSET] 1',
      ]);
    });

    it('filters by minimum impact', async () => {
      const text = textOf(await listModulesTool(analyzer, { min_impact: 1 }));

      expect(text.split('\n')[0]).toBe('[MODULES] total=2 offset=0 showing=2');
    });

    it('explains an empty result', async () => {
      const text = textOf(await listModulesTool(analyzer, { kind: 'folder' }));

      expect(text).toBe('No modules found. Check the scan include/exclude patterns.');
    });
  });

  describe('select_module', () => {
    it('returns the module with its neighbours and files', async () => {
      const response = await selectModuleTool(analyzer, { module: 'models' });

      expect(textOf(response)).toBe(
        [
          '[MODULE models.py] kind=file files=1 bytes=47 impact=1',
          'imports: utils.py',
          'imported_by: app.py',
          '[FILES]',
          'models.py',
        ].join('\n')
      );
    });

    it('renders markdown on request', async () => {
      const text = textOf(await selectModuleTool(analyzer, { module: 'app.py', format: 'markdown' }));

      expect(text).toBe(
        [
          '# app.py',
          '',
          '- **Kind**: file',
          '- **Size**: 39 bytes',
          '- **Impact**: 0',
          '- **Imports**: `models.py`, `utils.py`',
          '- **Imported by**: none',
          '',
          '## Files',
          '',
          '- `app.py`',
        ].join('\n')
      );
    });

    it('flags an unknown module as an error', async () => {
      const response = await selectModuleTool(analyzer, { module: 'nowhere/at/all' });

      expect(response.isError).toBe(true);
    });
  });

  describe('select_cluster', () => {
    it('lists named clusters when called without arguments', async () => {
      const text = textOf(await selectClusterTool(analyzer, {}));

      expect(text).toBe(
        [
          '[CLUSTERS] total=2',
          'name\tmodules\tfiles\timpact\tmembers',
          'Cluster 2\t1\t1\t1.000\tutils.py',
          'Cluster 1\t2\t2\t0.500\tapp.py, models.py',
        ].join('\n')
      );
    });

    it('selects a cluster by id', async () => {
      const text = textOf(await selectClusterTool(analyzer, { cluster_id: 3 }));

      expect(text).toBe(
        ['[CLUSTER cluster 3] height=1 modules=2 files=2', '[MODULES]', 'app.py', 'models.py', '[FILES]', 'app.py', 'models.py'].join('\n')
      );
    });

    it('reports an unknown cluster id', async () => {
      const response = await selectClusterTool(analyzer, { cluster_id: 99 });

      expect(response.isError).toBe(true);
      expect(textOf(response)).toBe('Cluster 99 does not exist in the current dendrogram.');
    });

    it('needs a module when selecting by height', async () => {
      const response = await selectClusterTool(analyzer, { height: 0.5 });

      expect(response.isError).toBe(true);
      expect(textOf(response)).toBe('Selecting by height needs a module to locate the cluster.');
    });

    it('cuts at a height around a module', async () => {
      const text = textOf(await selectClusterTool(analyzer, { height: 0, module: 'utils' }));

      expect(text).toBe(['[CLUSTER cut at 0] height=0 modules=1 files=1', '[MODULES]', 'utils.py', '[FILES]', 'utils.py'].join('\n'));
    });
  });

  describe('select_optimal_prompt', () => {
    it('fits the highest-impact files into the budget', async () => {
      const text = textOf(await selectOptimalPromptTool(analyzer, { budget: 40 }));

      expect(text).toBe(
        [
          '[SELECTION] strategy=exact budget=40 bytes=27 impact=2 tokens~7 modules=1 files=1',
          'module\tbytes\timpact',
          'utils.py\t27\t2',
          '[FILES]',
          'utils.py',
        ].join('\n')
      );
    });

    it('rejects a non-positive budget', async () => {
      const response = await selectOptimalPromptTool(analyzer, { budget: 0 });

      expect(response.isError).toBe(true);
      expect(textOf(response)).toBe('Budget must be a positive finite number, got 0');
    });
  });

  describe('analyze_repository', () => {
    it('rescans and summarizes the snapshot', async () => {
      const text = textOf(await analyzeRepositoryTool(analyzer, {}));

      expect(text.startsWith('[ANALYSIS] status=complete files=3 analyzed=3 skipped=0 modules=3 edges=3 clusters=2 duration_ms=')).toBe(true);
    });

    it('lists skipped files after a partial scan', async () => {
      project.addFile('blob.py', Buffer.from([0x00, 0x01]));
      try {
        const text = textOf(await analyzeRepositoryTool(analyzer, {}));
        const lines = text.split('\n');

        expect(lines[0]).toMatch(/^\[ANALYSIS\] status=partial files=4 analyzed=3 skipped=1 /);
        expect(lines.slice(1)).toEqual(['[SKIPPED]', 'path\tcode\tmessage', 'blob.py\tbinary\tFile appears to be binary']);
      } finally {
        project.removeFile('blob.py');
        await analyzeRepositoryTool(analyzer, {});
      }
    });
  });
});
