/**
 * Source patcher
 *
 * Patches are computed against an immutable SourceUnit and validated against
 * its text before anything is spliced. Application runs end-to-start so the
 * spans of earlier patches stay valid.
 */

import type { DeclarationRecord, SourceUnit, Span } from '../types/index.js';
import { PatchConflictError } from '../errors/index.js';
import { formatDocstringLiteral } from './literal.js';

export type PatchKind = 'replace' | 'insert';

export interface Patch {
  qualifiedName: string;
  kind: PatchKind;
  /** Replaced range; empty for insertions */
  span: Span;
  replacement: string;
  /** Text that must be found at `span.start` when the patch is applied */
  expected: string;
}

const BOM = '\uFEFF';

/**
 * Build the patch that puts `rendered` in place of the record's docstring,
 * or null when the source already holds exactly that literal.
 */
export function createPatch(unit: SourceUnit, record: DeclarationRecord, rendered: string): Patch | null {
  const { body, docstring } = record;
  const literal = formatDocstringLiteral(rendered, {
    indent: body.indent,
    eol: unit.eol,
    prefix: docstring?.prefix ?? null,
    quote: docstring?.quote ?? null,
  });

  if (docstring) {
    if (literal === docstring.raw) return null;
    return {
      qualifiedName: record.qualifiedName,
      kind: 'replace',
      span: { ...docstring.span },
      replacement: literal,
      expected: docstring.raw,
    };
  }

  return {
    qualifiedName: record.qualifiedName,
    kind: 'insert',
    span: { start: body.insertionOffset, end: body.insertionOffset },
    replacement: body.inline ? `${literal}; ` : `${body.indent}${literal}${unit.eol}`,
    expected: body.anchor,
  };
}

/**
 * Apply patches to the unit text and return the new file content.
 * Nothing is applied unless every patch matches and no two overlap.
 */
export function applyPatches(unit: SourceUnit, patches: Patch[]): string {
  const ordered = [...patches].sort((a, b) => a.span.start - b.span.start || a.span.end - b.span.end);

  let previous: Patch | null = null;
  for (const patch of ordered) {
    const { start, end } = patch.span;
    if (start < 0 || end < start || end > unit.text.length) {
      throw new PatchConflictError(patch.qualifiedName, start, 'span is outside the source text');
    }

    const found = unit.text.slice(start, start + patch.expected.length);
    if (found !== patch.expected) {
      throw new PatchConflictError(
        patch.qualifiedName,
        start,
        `expected ${JSON.stringify(patch.expected)} but found ${JSON.stringify(found)}`
      );
    }

    if (previous && (start < previous.span.end || start === previous.span.start)) {
      throw new PatchConflictError(patch.qualifiedName, start, `overlaps the patch for ${previous.qualifiedName}`);
    }
    previous = patch;
  }

  let text = unit.text;
  for (const patch of ordered.reverse()) {
    text = text.slice(0, patch.span.start) + patch.replacement + text.slice(patch.span.end);
  }

  return unit.bom ? BOM + text : text;
}

export function patchDeclaration(unit: SourceUnit, record: DeclarationRecord, rendered: string): string {
  const patch = createPatch(unit, record, rendered);
  return applyPatches(unit, patch ? [patch] : []);
}
