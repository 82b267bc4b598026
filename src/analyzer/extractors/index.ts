/**
 * Extractor exports
 */

export { ImportExtractor } from './base.js';
export {
  ExtractorRegistry,
  createDefaultRegistry,
  getDefaultRegistry,
  resetRegistry,
  type RegistryOptions,
} from './registry.js';
export {
  LANGUAGE_DEFINITIONS,
  firstGroup,
  type LanguageDefinition,
  type ImportPattern,
  type PathStyle,
} from './languages.js';
