import { describe, it, expect } from 'vitest';
import { ModuleLookup } from '../../../src/analyzer/module-lookup.js';

const ids = ['main.py', 'pkg', 'pkg/mod1.py', 'src/utils.ts', 'src/core/utils.py', 'lib/core/utils.py'];

describe('ModuleLookup', () => {
  const lookup = new ModuleLookup(ids);

  it('should match exact identifiers', () => {
    expect(lookup.lookup('pkg')).toEqual({ success: true, moduleId: 'pkg', matchedBy: 'exact' });
  });

  it('should normalize leading ./, trailing slashes and backslashes', () => {
    expect(lookup.lookup('./pkg/')).toEqual({ success: true, moduleId: 'pkg', matchedBy: 'exact' });
    expect(lookup.lookup('pkg\\mod1.py')).toEqual({ success: true, moduleId: 'pkg/mod1.py', matchedBy: 'exact' });
  });

  it('should match identifiers without their extension', () => {
    expect(lookup.lookup('src/utils')).toEqual({ success: true, moduleId: 'src/utils.ts', matchedBy: 'stem' });
  });

  it('should match a unique path suffix', () => {
    expect(lookup.lookup('mod1')).toEqual({ success: true, moduleId: 'pkg/mod1.py', matchedBy: 'suffix' });
    expect(lookup.lookup('src/core/utils')).toEqual({
      success: true,
      moduleId: 'src/core/utils.py',
      matchedBy: 'stem',
    });
  });

  it('should report ambiguous suffixes shallowest first', () => {
    const result = lookup.lookup('utils');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.type).toBe('ambiguous');
    expect(result.error.message).toBe('Multiple modules match "utils". Please specify a more complete path.');
    expect(result.error.suggestions).toEqual(['src/utils.ts', 'lib/core/utils.py', 'src/core/utils.py']);
  });

  it('should report unknown modules as not found', () => {
    const result = lookup.lookup('nothing-like-this-at-all');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.type).toBe('not_found');
    expect(result.error.message).toBe('Module not found: "nothing-like-this-at-all"');
  });

  it('should suggest close identifiers', () => {
    expect(lookup.suggest('mod1.py')).toContain('pkg/mod1.py');
  });

  it('should map an empty input to the root module', () => {
    const rooted = new ModuleLookup(['.', 'a.py']);

    expect(rooted.lookup('./')).toEqual({ success: true, moduleId: '.', matchedBy: 'exact' });
  });
});
