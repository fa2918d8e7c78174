/**
 * Python string literal formatting for rendered docstrings
 */

import type { LineEnding } from '../types/index.js';

export interface LiteralOptions {
  /** Continuation-line indentation */
  indent: string;
  eol: LineEnding;
  /** String prefix of the literal being replaced; null for a new literal */
  prefix?: string | null;
  /** Quote of the literal being replaced */
  quote?: string | null;
}

const TRIPLE_QUOTES = ['"""', "'''"] as const;

/**
 * Format docstring text as a string literal. The first line follows the
 * opening quotes; a multi-line docstring closes on its own line at `indent`.
 */
export function formatDocstringLiteral(text: string, options: LiteralOptions): string {
  const lines = text.split('\n');
  const prefix = literalPrefix(text, options.prefix ?? '');
  // A trailing backslash would escape the closing quote
  const multiline = lines.length > 1 || text.endsWith('\\');

  const quote = chooseQuote(text, multiline, options.quote ?? null);
  const mark = quote.charAt(0);
  const body = text.includes(quote) || (!multiline && text.endsWith(mark))
    ? text.split(mark).join(`\\${mark}`)
    : text;

  if (!multiline) {
    return `${prefix}${quote}${body}${quote}`;
  }

  const [first = '', ...rest] = body.split('\n');
  return [
    `${prefix}${quote}${first}`,
    ...rest.map(line => (line === '' ? '' : `${options.indent}${line}`)),
    `${options.indent}${quote}`,
  ].join(options.eol);
}

/**
 * Text with a backslash needs a raw literal. An existing `u` prefix is
 * dropped since `ur` is not a valid prefix.
 */
function literalPrefix(text: string, existing: string): string {
  if (!text.includes('\\') || /r/i.test(existing)) return existing;
  return 'r';
}

function chooseQuote(text: string, multiline: boolean, existing: string | null): string {
  const preferred = existing === "'''" ? "'''" : '"""';
  const fits = (quote: string): boolean =>
    !text.includes(quote) && (multiline || !text.endsWith(quote.charAt(0)));

  if (fits(preferred)) return preferred;
  return TRIPLE_QUOTES.find(fits) ?? preferred;
}
