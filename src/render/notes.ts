/**
 * Author notes
 *
 * A docstring may hold notes written as `marker: text` lines instead of the
 * section layout:
 *
 *     """description: Add two numbers.
 *     a: Left operand.
 *     return: The sum.
 *     """
 *
 * `description` gives the summary, a parameter name gives that parameter's
 * Args text, `return` the Returns text, `exception` the Raises text and
 * `example` the Examples lines. Lines that do not start a note continue the
 * note above them.
 */

import type { DocstringEntry, DocstringSections } from '../types/index.js';
import { DocstringFormatError } from '../errors/index.js';

const NOTE = /^([A-Za-z_][A-Za-z0-9_]*):\s*(.*)$/;
const NAMED_EXCEPTION = /^([A-Za-z_][A-Za-z0-9_.]*):\s*(.*)$/;
const KEYWORDS = new Set(['description', 'return', 'exception', 'example']);

export interface NoteContext {
  /** Parameter names of the declaration, stars included */
  parameters?: readonly string[];
  /** Exceptions the declaration raises directly */
  raises?: readonly string[];
}

interface Note {
  marker: string;
  line: number;
  text: string[];
}

export function startsWithNote(lines: readonly string[], context: NoteContext = {}): boolean {
  const first = lines[0];
  return first !== undefined && noteMarker(first, context) !== null;
}

/**
 * Read author notes into docstring sections
 */
export function parseNotes(lines: readonly string[], context: NoteContext = {}): DocstringSections {
  const sections: DocstringSections = {
    summary: [],
    args: [],
    returns: null,
    raises: [],
    examples: null,
  };

  const seen = new Set<string>();
  for (const note of collectNotes(lines, context)) {
    if (seen.has(note.marker)) {
      throw new DocstringFormatError(`duplicate "${note.marker}" note`, note.line);
    }
    seen.add(note.marker);

    switch (note.marker) {
      case 'description':
        sections.summary = note.text;
        break;
      case 'example':
        sections.examples = note.text;
        break;
      case 'return':
        sections.returns = { type: null, description: entryDescription(note.text) };
        break;
      case 'exception':
        sections.raises = exceptionEntries(note, context.raises ?? []);
        break;
      default:
        sections.args.push({
          name: parameterNamed(note.marker, context) ?? note.marker,
          type: null,
          description: entryDescription(note.text),
        });
    }
  }

  return sections;
}

function collectNotes(lines: readonly string[], context: NoteContext): Note[] {
  const notes: { marker: string; line: number; first: string; rest: string[] }[] = [];

  lines.forEach((line, index) => {
    const marker = noteMarker(line, context);
    const current = notes[notes.length - 1];
    if (marker !== null) {
      notes.push({ marker, line: index + 1, first: line.match(NOTE)?.[2] ?? '', rest: [] });
    } else if (current) {
      current.rest.push(line);
    }
  });

  return notes.map(({ marker, line, first, rest }) => ({
    marker,
    line,
    text: trimBlankEnds([first, ...dedent(rest)]),
  }));
}

function noteMarker(line: string, context: NoteContext): string | null {
  const name = line.match(NOTE)?.[1];
  if (name === undefined) return null;
  if (KEYWORDS.has(name) || parameterNamed(name, context) !== undefined) return name;
  return null;
}

function parameterNamed(name: string, context: NoteContext): string | undefined {
  return context.parameters?.find(param => param.replace(/^\*{1,2}/, '') === name);
}

/**
 * `exception: ValueError: text` documents one exception; a note without a
 * name describes every exception the declaration raises.
 */
function exceptionEntries(note: Note, raised: readonly string[]): DocstringEntry[] {
  const [first = '', ...rest] = note.text;
  const named = first.match(NAMED_EXCEPTION);
  if (named) {
    return [{ name: named[1] ?? '', type: null, description: entryDescription([named[2] ?? '', ...rest]) }];
  }

  if (raised.length === 0) {
    throw new DocstringFormatError('exception note names no exception and none is raised', note.line);
  }
  return raised.map(name => ({ name, type: null, description: entryDescription(note.text) }));
}

/**
 * Entry descriptions keep continuation lines indented under the entry
 */
function entryDescription(text: string[]): string[] {
  const [first = '', ...rest] = text;
  return [first, ...rest.map(line => (line === '' ? '' : `    ${line}`))];
}

function dedent(lines: string[]): string[] {
  const margins = lines
    .filter(line => line.trim().length > 0)
    .map(line => line.length - line.trimStart().length);
  const margin = margins.length > 0 ? Math.min(...margins) : 0;
  return lines.map(line => line.slice(margin));
}

function trimBlankEnds(lines: string[]): string[] {
  const result = [...lines];
  while (result.length > 0 && result[0] === '') result.shift();
  while (result.length > 0 && result[result.length - 1] === '') result.pop();
  return result;
}
