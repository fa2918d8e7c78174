/**
 * Reader for docstrings in the structured section layout
 */

import type {
  DocstringEntry,
  DocstringRecord,
  DocstringSections,
  ReturnsEntry,
  SectionName,
} from '../types/index.js';
import { DocstringFormatError } from '../errors/index.js';
import { parseNotes, startsWithNote, type NoteContext } from './notes.js';

const HEADER = /^([A-Z][A-Za-z ]*):$/;
const ARG_HEAD = /^(\*{0,2}[A-Za-z_][A-Za-z0-9_]*)(?: \((.*)\))?$/;
const SECTION_INDENT = '    ';

const SECTION_ALIASES: Record<string, SectionName> = {
  Args: 'Args',
  Returns: 'Returns',
  Raises: 'Raises',
  Examples: 'Examples',
  Example: 'Examples',
};

export const SECTION_RANK: Record<SectionName, number> = {
  Args: 1,
  Returns: 2,
  Raises: 3,
  Examples: 4,
};

/**
 * Strip docstring indentation the way PEP 257 describes: the first line
 * loses its leading whitespace, the rest lose their common margin, and
 * blank lines at either end are dropped.
 */
export function cleanDocstring(content: string): string[] {
  const [first = '', ...rest] = content.split(/\r?\n/).map(line => line.trimEnd());

  const margins = rest
    .filter(line => line.length > 0)
    .map(line => line.length - line.trimStart().length);
  const margin = margins.length > 0 ? Math.min(...margins) : 0;

  const lines = [first.trimStart(), ...rest.map(line => line.slice(margin))];

  while (lines.length > 0 && lines[0] === '') lines.shift();
  while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();

  return lines;
}

/**
 * Parse cleaned docstring text into section data
 */
export function parseDocstring(content: string): DocstringSections {
  const lines = cleanDocstring(content);
  const sections: DocstringSections = {
    summary: [],
    args: [],
    returns: null,
    raises: [],
    examples: null,
  };

  let current: SectionName | null = null;
  let entry: DocstringEntry | ReturnsEntry | null = null;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    const lineNumber = i + 1;

    const header = line.match(HEADER);
    if (header) {
      const label = header[1] ?? '';
      const name = SECTION_ALIASES[label];
      if (!name) {
        throw new DocstringFormatError(`unrecognized section "${label}"`, lineNumber);
      }
      if (current !== null && SECTION_RANK[name] === SECTION_RANK[current]) {
        throw new DocstringFormatError(`duplicate ${name} section`, lineNumber);
      }
      if (current !== null && SECTION_RANK[name] < SECTION_RANK[current]) {
        throw new DocstringFormatError(`${name} section after ${current} section`, lineNumber);
      }

      trimTrailingBlanks(entry?.description);
      current = name;
      entry = null;
      if (name === 'Examples') sections.examples = [];
      continue;
    }

    if (current === null) {
      sections.summary.push(line);
      continue;
    }

    if (line === '') {
      if (current === 'Examples') sections.examples?.push('');
      else entry?.description.push('');
      continue;
    }

    if (!line.startsWith(SECTION_INDENT)) {
      throw new DocstringFormatError(`text outside the ${current} section`, lineNumber);
    }
    const body = line.slice(SECTION_INDENT.length);

    if (current === 'Examples') {
      sections.examples?.push(body);
      continue;
    }

    if (/^\s/.test(body)) {
      if (!entry) {
        throw new DocstringFormatError(`continuation line before the first ${current} entry`, lineNumber);
      }
      entry.description.push(body);
      continue;
    }

    trimTrailingBlanks(entry?.description);

    if (current === 'Args') {
      const split = splitEntry(body);
      const match = split?.head.match(ARG_HEAD);
      if (!split || !match) {
        throw new DocstringFormatError(`malformed Args entry "${body}"`, lineNumber);
      }
      const arg: DocstringEntry = {
        name: match[1] ?? '',
        type: match[2] ?? null,
        description: [split.text],
      };
      sections.args.push(arg);
      entry = arg;
    } else if (current === 'Returns') {
      if (sections.returns) {
        throw new DocstringFormatError('more than one Returns entry', lineNumber);
      }
      const split = splitEntry(body);
      const returns: ReturnsEntry = split
        ? { type: split.head, description: [split.text] }
        : { type: null, description: [body] };
      sections.returns = returns;
      entry = returns;
    } else {
      const split = splitEntry(body);
      if (!split) {
        throw new DocstringFormatError(`malformed Raises entry "${body}"`, lineNumber);
      }
      const raised: DocstringEntry = {
        name: split.head,
        type: null,
        description: [split.text],
      };
      sections.raises.push(raised);
      entry = raised;
    }
  }

  trimTrailingBlanks(entry?.description);
  trimTrailingBlanks(sections.summary);
  trimTrailingBlanks(sections.examples ?? undefined);

  return sections;
}

/**
 * Parse the docstring literal found by the extractor, either in the section
 * layout or as author notes
 */
export function readDocstring(docstring: DocstringRecord, context: NoteContext = {}): DocstringSections {
  if (docstring.isConcatenated) {
    throw new DocstringFormatError('docstring is built from concatenated literals');
  }

  const lines = cleanDocstring(docstring.content);
  if (startsWithNote(lines, context)) {
    return parseNotes(lines, context);
  }
  return parseDocstring(docstring.content);
}

/**
 * Split an entry line at the first colon outside brackets and quotes that
 * ends the line or is followed by a space. Types such as
 * `Annotated[str, "format: iso"]` stay whole.
 */
export function splitEntry(body: string): { head: string; text: string } | null {
  let depth = 0;
  let quote: string | null = null;

  for (let i = 0; i < body.length; i++) {
    const ch = body.charAt(i);
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if ('([{'.includes(ch)) {
      depth++;
    } else if (')]}'.includes(ch)) {
      depth = Math.max(0, depth - 1);
    } else if (ch === ':' && depth === 0 && (i === body.length - 1 || body.charAt(i + 1) === ' ')) {
      const head = body.slice(0, i);
      return head ? { head, text: body.slice(i + 2) } : null;
    }
  }

  return null;
}

function trimTrailingBlanks(lines: string[] | undefined): void {
  while (lines && lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
}
