/**
 * Annotation text normalization
 */

export type AnnotationResult =
  | { ok: true; text: string; warnings: string[] }
  | { ok: false; issue: string };

/**
 * Render an annotation as written. Only annotations that span several lines
 * are rewritten, by collapsing their whitespace onto one line.
 */
export function normalizeAnnotation(raw: string): AnnotationResult {
  if (hasComment(raw)) {
    return { ok: false, issue: 'annotation contains a comment' };
  }

  const multiLine = /[\r\n]/.test(raw);
  const text = multiLine
    ? raw
        .replace(/\\\r?\n/g, ' ')
        .replace(/\s+/g, ' ')
        .replace(/([[(])\s+/g, '$1')
        .replace(/\s+([\])])/g, '$1')
        .trim()
    : raw.trim();

  if (!text) {
    return { ok: false, issue: 'annotation is empty' };
  }

  const warnings: string[] = [];
  if (/['"]/.test(text)) {
    warnings.push(`quoted annotation ${text} rendered as written`);
  }
  if (multiLine) {
    warnings.push(`multi-line annotation collapsed to ${text}`);
  }

  return { ok: true, text, warnings };
}

function hasComment(raw: string): boolean {
  let quote: string | null = null;

  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '#') {
      return true;
    }
  }

  return false;
}
