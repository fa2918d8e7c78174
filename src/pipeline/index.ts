export { DocstringPipeline, isPrivate, type PipelineOptions, type SourceResult } from './pipeline.js';
export { parallelMap, type Settled } from './parallel.js';
export { writeFileAtomic } from './atomic-write.js';
export { readSourceFile } from './source-file.js';
export {
  finalizeDraft,
  draftPathFor,
  sourcePathFor,
  DEFAULT_DRAFT_EXTENSION,
  type FinalizeOptions,
  type FinalizeResult,
} from './draft.js';
