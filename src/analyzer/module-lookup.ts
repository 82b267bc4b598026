/**
 * ModuleLookup - Turns user input into a module identifier of the current snapshot
 */

import path from 'node:path';
import Fuse from 'fuse.js';

export type LookupErrorType = 'not_found' | 'ambiguous';

export interface LookupError {
  type: LookupErrorType;
  message: string;
  suggestions?: string[];
}

export type LookupResult =
  | { success: true; moduleId: string; matchedBy: 'exact' | 'stem' | 'suffix' }
  | { success: false; error: LookupError };

interface Candidate {
  id: string;
  /** Identifier without its file extension */
  stem: string;
}

/**
 * Resolves user-provided module names against known module identifiers.
 * Strategies, in order:
 * 1. Exact identifier (after trimming ./ and trailing slashes)
 * 2. Identifier without its extension ("src/utils" for "src/utils.py")
 * 3. Unique path-suffix match ("utils.py", "utils", "core/utils")
 * Failing those, fuzzy suggestions from the known identifiers.
 */
export class ModuleLookup {
  private candidates: Candidate[];
  private fuse: Fuse<Candidate> | null = null;

  constructor(moduleIds: Iterable<string>) {
    this.candidates = Array.from(new Set(moduleIds))
      .sort()
      .map(id => ({ id, stem: stripExtension(id) }));
  }

  lookup(input: string): LookupResult {
    const normalized = normalizeInput(input);

    const exact = this.candidates.find(candidate => candidate.id === normalized);
    if (exact) return { success: true, moduleId: exact.id, matchedBy: 'exact' };

    const byStem = this.candidates.filter(candidate => candidate.stem === normalized);
    if (byStem.length === 1 && byStem[0]) {
      return { success: true, moduleId: byStem[0].id, matchedBy: 'stem' };
    }
    if (byStem.length > 1) return this.ambiguous(input, byStem);

    const bySuffix = this.candidates.filter(
      candidate => candidate.id.endsWith('/' + normalized) || candidate.stem.endsWith('/' + normalized)
    );
    if (bySuffix.length === 1 && bySuffix[0]) {
      return { success: true, moduleId: bySuffix[0].id, matchedBy: 'suffix' };
    }
    if (bySuffix.length > 1) return this.ambiguous(input, bySuffix);

    const suggestions = this.suggest(normalized);
    return {
      success: false,
      error: {
        type: 'not_found',
        message: `Module not found: "${input}"`,
        suggestions: suggestions.length > 0 ? suggestions : undefined,
      },
    };
  }

  /**
   * Closest known identifiers by fuzzy match
   */
  suggest(input: string, limit = 5): string[] {
    if (!this.fuse) {
      this.fuse = new Fuse(this.candidates, {
        keys: ['id', 'stem'],
        threshold: 0.4,
        ignoreLocation: true,
      });
    }
    return this.fuse.search(input, { limit }).map(result => result.item.id);
  }

  private ambiguous(input: string, matches: Candidate[]): LookupResult {
    // Shallowest paths first so the likeliest intent leads
    const ordered = [...matches].sort(
      (a, b) => a.id.split('/').length - b.id.split('/').length || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
    );
    return {
      success: false,
      error: {
        type: 'ambiguous',
        message: `Multiple modules match "${input}". Please specify a more complete path.`,
        suggestions: ordered.slice(0, 5).map(candidate => candidate.id),
      },
    };
  }
}

function normalizeInput(input: string): string {
  const trimmed = input.trim().replace(/\\/g, '/').replace(/^\.\/+/, '').replace(/\/+$/, '');
  return trimmed === '' ? '.' : trimmed;
}

function stripExtension(id: string): string {
  const ext = path.posix.extname(id);
  return ext ? id.slice(0, -ext.length) : id;
}
