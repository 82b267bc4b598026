/**
 * Regex-driven import extractor for one language
 */

import type { LanguageId } from '../../types/index.js';
import { firstGroup, type ImportPattern, type LanguageDefinition } from './languages.js';

interface PatternCursor {
  pattern: ImportPattern;
  iterator: Iterator<RegExpMatchArray>;
  current: RegExpMatchArray | undefined;
}

export class ImportExtractor {
  constructor(readonly definition: LanguageDefinition) {}

  get language(): LanguageId {
    return this.definition.id;
  }

  get extensions(): string[] {
    return this.definition.extensions;
  }

  canExtract(filePath: string): boolean {
    const ext = filePath.split('.').pop()?.toLowerCase() ?? '';
    return this.definition.extensions.includes(ext);
  }

  /**
   * Lazily yield raw import tokens in order of first occurrence.
   *
   * Every pattern runs over the whole text; their matches are merged by offset so
   * output order does not depend on pattern order. Each call starts from the top.
   */
  *extract(text: string): Generator<string, void, undefined> {
    const cursors: PatternCursor[] = this.definition.patterns.map(pattern => {
      const iterator = text.matchAll(pattern.regex);
      return { pattern, iterator, current: advance(iterator) };
    });

    while (true) {
      let next: PatternCursor | undefined;
      for (const cursor of cursors) {
        if (!cursor.current) continue;
        // Strict comparison keeps the earlier pattern on equal offsets
        if (!next || offsetOf(cursor.current) < offsetOf(next.current)) {
          next = cursor;
        }
      }
      if (!next?.current) return;

      const match = next.current;
      next.current = advance(next.iterator);

      const expand = next.pattern.expand ?? firstGroup;
      for (const token of expand(match)) {
        const trimmed = token.trim();
        if (trimmed) yield trimmed;
      }
    }
  }
}

function advance(iterator: Iterator<RegExpMatchArray>): RegExpMatchArray | undefined {
  const result = iterator.next();
  return result.done ? undefined : result.value;
}

function offsetOf(match: RegExpMatchArray | undefined): number {
  return match?.index ?? Number.POSITIVE_INFINITY;
}
