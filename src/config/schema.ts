/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

export const sectionNameSchema = z.enum(['Args', 'Returns', 'Raises', 'Examples']);

export const parserConfigSchema = z.object({
  maxFileSize: z.number().int().min(0).default(1024 * 1024), // 1MB default, 0 = unlimited
});

export const placeholdersConfigSchema = z.object({
  summary: z.string().min(1).default('Summary of {name}.'),
  description: z.string().min(1).default('...'),
  examples: z.string().min(1).default('>>> ...'),
});

export const configSchema = z.object({
  include: z.array(z.string()).default([
    '**/*.py',
    '**/*.pyi',
  ]),
  exclude: z.array(z.string()).default([
    '**/.git/**',
    '**/venv/**',
    '**/.venv/**',
    '**/__pycache__/**',
    '**/node_modules/**',
    '**/build/**',
    '**/dist/**',
    '**/.tox/**',
    '**/*.docsmith-draft.py',
    '**/*.docsmith-draft.pyi',
  ]),
  overwriteExisting: z.boolean().default(false),
  sections: z.array(sectionNameSchema)
    .default(['Args', 'Returns', 'Raises'])
    .refine(sections => new Set(sections).size === sections.length, 'sections must not repeat'),
  dryRun: z.boolean().default(false),
  draft: z.boolean().default(false),
  draftExtension: z.string().regex(/^\.[^/\\]*\.py$/, 'draft extension must look like ".name.py"').default('.docsmith-draft.py'),
  includePrivate: z.boolean().default(true),
  inferReturns: z.boolean().default(true),
  concurrency: z.number().int().min(1).max(64).default(4),
  placeholders: placeholdersConfigSchema.default({}),
  parser: parserConfigSchema.default({}),
}).strict();

export type Config = z.infer<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;
export type ParserConfig = z.infer<typeof parserConfigSchema>;
export type PlaceholdersConfig = z.infer<typeof placeholdersConfigSchema>;
