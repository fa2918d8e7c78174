/**
 * Model exports
 */

export {
  signatureModelSchema,
  modelParameterSchema,
  declarationKindSchema,
  type SignatureModel,
  type SignatureModelInput,
  type ModelParameter,
} from './schema.js';
export {
  buildSignatureModel,
  inferReturnType,
  DEFAULT_SUMMARY_TEMPLATE,
  type ModelBuilderOptions,
} from './builder.js';
export { normalizeAnnotation, type AnnotationResult } from './annotations.js';
