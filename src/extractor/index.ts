/**
 * Extractor exports
 */

export {
  DeclarationExtractor,
  type ExtractionResult,
  type ExtractorOptions,
  type Language,
} from './base.js';
export { ExtractorRegistry, createDefaultRegistry } from './registry.js';
export { PythonExtractor, extractDeclarations } from './python.js';
