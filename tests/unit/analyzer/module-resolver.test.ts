import { describe, it, expect } from 'vitest';
import { ModuleResolver } from '../../../src/analyzer/module-resolver.js';
import { createDefaultRegistry } from '../../../src/analyzer/extractors/registry.js';

const registry = createDefaultRegistry();

function resolverFor(files: string[], folderModules: 'independent' | 'aggregate' = 'independent'): ModuleResolver {
  return new ModuleResolver({ files, registry, folderModules });
}

describe('ModuleResolver', () => {
  describe('folder-as-module', () => {
    it('should resolve a folder without an entry file to the folder itself', () => {
      const resolver = resolverFor(['main.py', 'pkg/mod1.py', 'pkg/mod2.py']);

      expect(resolver.resolve('pkg', 'main.py')).toEqual({ status: 'resolved', target: 'pkg', kind: 'folder' });
      expect(resolver.isFolderModule('pkg')).toBe(true);
      expect(resolver.filesOf('pkg')).toEqual(['pkg/mod1.py', 'pkg/mod2.py']);
    });

    it('should resolve a folder with an entry file to that file', () => {
      const resolver = resolverFor(['main.py', 'pkg/__init__.py', 'pkg/mod1.py']);

      expect(resolver.resolve('pkg', 'main.py')).toEqual({
        status: 'resolved',
        target: 'pkg/__init__.py',
        kind: 'file',
      });
    });

    it('should collapse files of an entry-less folder in aggregate mode', () => {
      const resolver = resolverFor(['main.py', 'pkg/mod1.py', 'pkg/mod2.py'], 'aggregate');

      expect(resolver.moduleOf('pkg/mod1.py')).toBe('pkg');
      expect(resolver.moduleOf('main.py')).toBe('main.py');
      expect(resolver.resolve('pkg.mod1', 'main.py')).toEqual({ status: 'resolved', target: 'pkg', kind: 'folder' });
    });

    it('should keep files independent by default', () => {
      const resolver = resolverFor(['main.py', 'pkg/mod1.py', 'pkg/mod2.py']);

      expect(resolver.mode).toBe('independent');
      expect(resolver.resolve('pkg.mod1', 'main.py')).toEqual({
        status: 'resolved',
        target: 'pkg/mod1.py',
        kind: 'file',
      });
    });
  });

  describe('relative paths', () => {
    const files = ['src/app.ts', 'src/utils/index.ts', 'src/lib/math.ts'];

    it('should complete extensions and map .js to .ts sources', () => {
      const resolver = resolverFor(files);

      expect(resolver.resolve('./lib/math.js', 'src/app.ts')).toEqual({
        status: 'resolved',
        target: 'src/lib/math.ts',
        kind: 'file',
      });
    });

    it('should resolve a directory import to its index file', () => {
      const resolver = resolverFor(files);

      expect(resolver.resolve('./utils', 'src/app.ts')).toEqual({
        status: 'resolved',
        target: 'src/utils/index.ts',
        kind: 'file',
      });
    });

    it('should resolve alias prefixes against source roots', () => {
      const resolver = resolverFor(files);

      expect(resolver.resolve('@/lib/math', 'src/app.ts').target).toBe('src/lib/math.ts');
    });

    it('should flag a missing relative path as unresolved', () => {
      const resolver = resolverFor(files);

      expect(resolver.resolve('./missing', 'src/app.ts')).toEqual({ status: 'unresolved' });
    });

    it('should not resolve paths that leave the repository', () => {
      const resolver = resolverFor(files);

      expect(resolver.resolve('../../outside', 'src/app.ts')).toEqual({ status: 'unresolved' });
    });
  });

  describe('external packages', () => {
    it('should classify bare specifiers and schemes as external', () => {
      const resolver = resolverFor(['src/app.ts']);

      expect(resolver.resolve('react', 'src/app.ts')).toEqual({ status: 'external' });
      expect(resolver.resolve('node:fs', 'src/app.ts')).toEqual({ status: 'external' });
      expect(resolver.resolve('https://cdn.example.test/x.js', 'src/app.ts')).toEqual({ status: 'external' });
    });

    it('should classify unknown python packages as external', () => {
      const resolver = resolverFor(['main.py']);

      expect(resolver.resolve('requests', 'main.py')).toEqual({ status: 'external' });
    });
  });

  describe('namespaced imports', () => {
    it('should match trailing segments against known modules', () => {
      const resolver = resolverFor(['src/main/java/com/acme/App.java', 'src/main/java/com/acme/Util.java']);

      expect(resolver.resolve('com.acme.Util', 'src/main/java/com/acme/App.java')).toEqual({
        status: 'resolved',
        target: 'src/main/java/com/acme/Util.java',
        kind: 'file',
      });
    });

    describe('source roots named after the language', () => {
      const files = [
        'src/main/java/com/acme/App.java',
        'src/main/java/com/acme/util/Strings.java',
        'src/main/kotlin/com/acme/Main.kt',
      ];

      it('should keep standard library packages external', () => {
        const resolver = resolverFor(files);

        expect(resolver.resolve('java.util.List', 'src/main/java/com/acme/App.java')).toEqual({ status: 'external' });
        expect(resolver.resolve('kotlin.collections.List', 'src/main/kotlin/com/acme/Main.kt')).toEqual({ status: 'external' });
        expect(resolver.resolve('kotlin', 'src/main/kotlin/com/acme/Main.kt')).toEqual({ status: 'external' });
      });

      it('should still match project packages below the root', () => {
        const resolver = resolverFor(files);

        expect(resolver.resolve('com.acme.util', 'src/main/java/com/acme/App.java')).toEqual({
          status: 'resolved',
          target: 'src/main/java/com/acme/util',
          kind: 'folder',
        });
      });
    });

    it('should resolve python relative imports from the package directory', () => {
      const resolver = resolverFor(['pkg/__init__.py', 'pkg/app.py', 'pkg/models.py']);

      expect(resolver.resolve('.models', 'pkg/app.py').target).toBe('pkg/models.py');
    });

    it('should resolve rust crate paths from the crate root', () => {
      const resolver = resolverFor(['src/lib.rs', 'src/graph.rs', 'src/cache/mod.rs']);

      expect(resolver.resolve('crate::graph::Node', 'src/lib.rs').target).toBe('src/graph.rs');
      expect(resolver.resolve('self::cache', 'src/lib.rs').target).toBe('src/cache/mod.rs');
    });

    it('should resolve C includes relative to the including file', () => {
      const resolver = resolverFor(['src/main.c', 'src/util.h']);

      expect(resolver.resolve('util.h', 'src/main.c').target).toBe('src/util.h');
    });
  });

  it('should be deterministic for a fixed file set', () => {
    const files = ['a/x/util.py', 'b/x/util.py', 'main.py'];
    const first = resolverFor(files).resolve('x.util', 'main.py');
    const second = resolverFor([...files].reverse()).resolve('x.util', 'main.py');

    expect(first).toEqual(second);
  });
});
