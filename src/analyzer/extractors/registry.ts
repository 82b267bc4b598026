/**
 * Extractor registry keyed by language and file extension
 */

import type { LanguageId } from '../../types/index.js';
import { ImportExtractor } from './base.js';
import { LANGUAGE_DEFINITIONS, type LanguageDefinition } from './languages.js';

export interface RegistryOptions {
  /** Restrict to these languages. Empty or missing means all known languages. */
  languages?: LanguageId[];
}

export class ExtractorRegistry {
  private extractors: Map<LanguageId, ImportExtractor> = new Map();
  private extensionMap: Map<string, ImportExtractor> = new Map();

  register(extractor: ImportExtractor): void {
    this.extractors.set(extractor.language, extractor);

    for (const ext of extractor.extensions) {
      this.extensionMap.set(ext.toLowerCase(), extractor);
    }
  }

  getByLanguage(language: LanguageId): ImportExtractor | undefined {
    return this.extractors.get(language);
  }

  /**
   * Get the extractor for a file path based on its extension
   */
  getByFilePath(filePath: string): ImportExtractor | undefined {
    return this.extensionMap.get(this.getExtension(filePath));
  }

  canExtract(filePath: string): boolean {
    return this.getByFilePath(filePath) !== undefined;
  }

  detectLanguage(filePath: string): LanguageId | null {
    return this.getByFilePath(filePath)?.language ?? null;
  }

  /**
   * Raw import tokens of a file. Unknown extensions give an empty sequence.
   */
  extractImports(filePath: string, text: string): Iterable<string> {
    const extractor = this.getByFilePath(filePath);
    return extractor ? extractor.extract(text) : [];
  }

  getLanguages(): LanguageId[] {
    return Array.from(this.extractors.keys());
  }

  getDefinitions(): LanguageDefinition[] {
    return Array.from(this.extractors.values(), extractor => extractor.definition);
  }

  /**
   * Get all supported extensions (lowercase, without dot)
   */
  getExtensions(): string[] {
    return Array.from(this.extensionMap.keys());
  }

  private getExtension(filePath: string): string {
    const match = filePath.match(/\.([^./\\]+)$/);
    return match?.[1]?.toLowerCase() ?? '';
  }
}

export function createDefaultRegistry(options: RegistryOptions = {}): ExtractorRegistry {
  const registry = new ExtractorRegistry();
  const enabled = options.languages && options.languages.length > 0
    ? new Set(options.languages)
    : null;

  for (const definition of LANGUAGE_DEFINITIONS) {
    if (enabled && !enabled.has(definition.id)) continue;
    registry.register(new ImportExtractor(definition));
  }

  return registry;
}

// Singleton registry instance
let defaultRegistry: ExtractorRegistry | null = null;

export function getDefaultRegistry(): ExtractorRegistry {
  if (!defaultRegistry) {
    defaultRegistry = createDefaultRegistry();
  }
  return defaultRegistry;
}

export function resetRegistry(): void {
  defaultRegistry = null;
}
