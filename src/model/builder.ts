/**
 * Signature model builder
 */

import { isCallable } from '../types/index.js';
import type {
  CallableDeclaration,
  DeclarationKind,
  DeclarationRecord,
  ReturnRecord,
} from '../types/index.js';
import { ModelValidationError } from '../errors/index.js';
import { normalizeAnnotation } from './annotations.js';
import { signatureModelSchema, type SignatureModel, type SignatureModelInput } from './schema.js';

export interface ModelBuilderOptions {
  /** Infer literal return types of unannotated callables */
  inferReturns?: boolean;
  /** Summary template; `{name}`, `{qualifiedName}` and `{kind}` are substituted */
  summaryTemplate?: string;
}

export const DEFAULT_SUMMARY_TEMPLATE = 'Summary of {name}.';

const KIND_LABELS: Record<DeclarationKind, string> = {
  function: 'function',
  'async-function': 'async function',
  method: 'method',
  class: 'class',
};

const IMPLICIT_RECEIVERS = new Set(['self', 'cls']);

export function buildSignatureModel(
  record: DeclarationRecord,
  options: ModelBuilderOptions = {}
): SignatureModel {
  const issues: string[] = [];
  const warnings: string[] = [];

  const input: SignatureModelInput = {
    qualifiedName: record.qualifiedName,
    name: record.name,
    kind: record.kind,
    summary: renderSummary(options.summaryTemplate ?? DEFAULT_SUMMARY_TEMPLATE, record),
  };

  if (isCallable(record)) {
    input.parameters = documentedParameters(record).map((param, index) => {
      if (!param.name) {
        issues.push(`parameter ${index + 1} has no name`);
      }

      let type: string | undefined;
      if (param.annotation !== null) {
        const annotation = normalizeAnnotation(param.annotation);
        if (annotation.ok) {
          type = annotation.text;
          warnings.push(...annotation.warnings.map(w => `${param.name}: ${w}`));
        } else {
          issues.push(`${param.name || `parameter ${index + 1}`}: ${annotation.issue}`);
        }
      }

      return { name: param.name, type, hasDefault: param.hasDefault };
    });

    if (record.returnAnnotation !== null) {
      const annotation = normalizeAnnotation(record.returnAnnotation);
      if (annotation.ok) {
        input.returns = annotation.text;
        warnings.push(...annotation.warnings.map(w => `return: ${w}`));
      } else {
        issues.push(`return: ${annotation.issue}`);
      }
    } else if (options.inferReturns ?? true) {
      input.returns = inferReturnType(record.returnValues);
    }

    input.raises = distinct(record.raises.map(r => r.type));
  } else {
    input.returns = null;
  }

  if (issues.length > 0) {
    throw new ModelValidationError(record.qualifiedName, issues);
  }

  input.warnings = warnings;
  const result = signatureModelSchema.safeParse(input);
  if (!result.success) {
    throw new ModelValidationError(
      record.qualifiedName,
      result.error.errors.map(e => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    );
  }

  return result.data;
}

/**
 * Parameters that appear in Args: the implicit receiver of a method is left out
 */
function documentedParameters(record: CallableDeclaration): CallableDeclaration['parameters'] {
  const [first, ...rest] = record.parameters;
  const isStatic = record.decorators.some(d => /^@staticmethod\b/.test(d));

  if (record.kind === 'method' && !isStatic && first && IMPLICIT_RECEIVERS.has(first.name)) {
    return rest;
  }
  return record.parameters;
}

/**
 * A body whose value-returning statements all return literals of one type
 * returns that type; any other value-returning body returns `Any`.
 */
export function inferReturnType(returnValues: ReturnRecord[]): string {
  const types = new Set(returnValues.map(r => r.literalType ?? 'Any'));
  if (types.size === 0) return 'None';

  const [only] = types;
  return types.size === 1 && only !== undefined ? only : 'Any';
}

function renderSummary(template: string, record: DeclarationRecord): string {
  return template
    .replace(/\{name\}/g, record.name)
    .replace(/\{qualifiedName\}/g, record.qualifiedName)
    .replace(/\{kind\}/g, KIND_LABELS[record.kind]);
}

function distinct(values: string[]): string[] {
  return [...new Set(values)];
}
