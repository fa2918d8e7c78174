/**
 * Signature model schema using Zod
 *
 * The schema is the only way a SignatureModel is constructed: missing types
 * are filled with their documented defaults and duplicate names are rejected.
 */

import { z } from 'zod';

export const declarationKindSchema = z.enum(['function', 'async-function', 'method', 'class']);

export const modelParameterSchema = z.object({
  name: z.string().trim().min(1, 'parameter name is blank'),
  type: z.string().trim().min(1, 'annotation is empty').default('Any'),
  hasDefault: z.boolean().default(false),
}).strict();

export const signatureModelSchema = z.object({
  qualifiedName: z.string().min(1),
  name: z.string().min(1),
  kind: declarationKindSchema,
  summary: z.string(),
  parameters: z.array(modelParameterSchema).default([]),
  // null only for classes, which have no return value to document
  returns: z.string().trim().min(1).nullable().default('None'),
  raises: z.array(z.string().trim().min(1, 'exception name is blank')).default([]),
  warnings: z.array(z.string()).default([]),
}).strict().superRefine((model, ctx) => {
  const seen = new Set<string>();
  model.parameters.forEach((param, index) => {
    const bare = param.name.replace(/^\*{1,2}/, '');
    if (seen.has(bare)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['parameters', index, 'name'],
        message: `duplicate parameter "${bare}"`,
      });
    }
    seen.add(bare);
  });

  if (new Set(model.raises).size !== model.raises.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['raises'],
      message: 'duplicate exception type',
    });
  }

  if (model.kind === 'class' && model.returns !== null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['returns'],
      message: 'classes have no return type',
    });
  }
});

export type SignatureModelInput = z.input<typeof signatureModelSchema>;
export type SignatureModel = z.infer<typeof signatureModelSchema>;
export type ModelParameter = z.infer<typeof modelParameterSchema>;
