/**
 * docsmith - structured docstring generation for Python sources
 *
 * Extracts declarations with tree-sitter, builds a validated signature model
 * for each, renders it as a sectioned docstring and splices the result back
 * into the source without touching any other byte.
 */

// Types
export * from './types/index.js';

// Errors
export {
  DocsmithError,
  ParseError,
  ModelValidationError,
  DocstringFormatError,
  PatchConflictError,
  FileIOError,
  UnsupportedFileError,
  ConfigError,
  isDeclarationError,
  describeError,
  type ErrorScope,
} from './errors/index.js';

// Extractors
export {
  DeclarationExtractor,
  ExtractorRegistry,
  PythonExtractor,
  createDefaultRegistry,
  extractDeclarations,
  type ExtractorOptions,
  type ExtractionResult,
  type Language,
} from './extractor/index.js';

// Signature model
export {
  buildSignatureModel,
  inferReturnType,
  normalizeAnnotation,
  signatureModelSchema,
  modelParameterSchema,
  DEFAULT_SUMMARY_TEMPLATE,
  type ModelBuilderOptions,
} from './model/index.js';

// Renderer
export {
  renderDocstring,
  renderSections,
  mergeSections,
  parseDocstring,
  readDocstring,
  cleanDocstring,
  parseNotes,
  DEFAULT_SECTIONS,
  type RenderOptions,
  type NoteContext,
} from './render/index.js';

// Patcher
export {
  createPatch,
  applyPatches,
  patchDeclaration,
  formatDocstringLiteral,
  type Patch,
} from './patch/index.js';

// Pipeline
export {
  DocstringPipeline,
  parallelMap,
  writeFileAtomic,
  finalizeDraft,
  draftPathFor,
  type PipelineOptions,
  type SourceResult,
} from './pipeline/index.js';

// Logging
export { ConsoleLogger, SilentLogger, createLogger, type Logger } from './logger/index.js';

// Config
export {
  configSchema,
  loadConfig,
  parseConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  type Config,
} from './config/index.js';
