/**
 * Docstring renderer
 *
 * Pure: the same model and options always give the same text, with `\n`
 * line endings and four-space section indentation.
 */

import type { DocstringEntry, DocstringSections, ReturnsEntry, SectionName } from '../types/index.js';
import type { SignatureModel } from '../model/schema.js';

export const DEFAULT_SECTIONS: readonly SectionName[] = ['Args', 'Returns', 'Raises'];
export const DEFAULT_DESCRIPTION_PLACEHOLDER = '...';
export const DEFAULT_EXAMPLES_PLACEHOLDER = '>>> ...';

export interface RenderOptions {
  sections?: readonly SectionName[];
  placeholders?: {
    description?: string;
    examples?: string;
  };
  /** Sections of the docstring being replaced; its written text is carried over */
  existing?: DocstringSections | null;
  /**
   * Keep every entry of the existing docstring, including Args entries with
   * no matching parameter and sections that are not enabled
   */
  preserveExisting?: boolean;
}

export function renderDocstring(model: SignatureModel, options: RenderOptions = {}): string {
  return renderSections(mergeSections(model, options));
}

/**
 * Combine a model with an existing docstring: structure and types come from
 * the model, written descriptions from the existing docstring.
 */
export function mergeSections(model: SignatureModel, options: RenderOptions = {}): DocstringSections {
  const enabled = new Set(options.sections ?? DEFAULT_SECTIONS);
  const placeholder = options.placeholders?.description ?? DEFAULT_DESCRIPTION_PLACEHOLDER;
  const existing = options.existing ?? null;
  const preserve = options.preserveExisting ?? false;

  const describe = (entry: { description: string[] } | undefined | null): string[] =>
    entry ? [...entry.description] : [placeholder];
  const copy = (entry: DocstringEntry): DocstringEntry => ({ ...entry, description: [...entry.description] });

  const args: DocstringEntry[] = enabled.has('Args')
    ? model.parameters.map(param => ({
        name: param.name,
        type: param.type,
        description: describe(findEntry(existing?.args, param.name)),
      }))
    : [];
  if (preserve) {
    for (const entry of existing?.args ?? []) {
      if (!findEntry(args, entry.name)) args.push(copy(entry));
    }
  }

  let returns: ReturnsEntry | null = null;
  if (enabled.has('Returns') && model.returns !== null) {
    returns = { type: model.returns, description: describe(existing?.returns) };
  } else if (preserve && existing?.returns) {
    returns = { ...existing.returns, description: [...existing.returns.description] };
  }

  let raises: DocstringEntry[] = [];
  if (enabled.has('Raises')) {
    const detected = new Set(model.raises);
    raises = [
      ...model.raises.map(name => ({
        name,
        type: null,
        description: describe(findEntry(existing?.raises, name)),
      })),
      // Documented exceptions that are not raised directly, e.g. by callees
      ...(existing?.raises ?? []).filter(entry => !detected.has(entry.name)).map(copy),
    ];
  } else if (preserve) {
    raises = (existing?.raises ?? []).map(copy);
  }

  let examples: string[] | null = null;
  if (existing?.examples && existing.examples.length > 0) {
    examples = [...existing.examples];
  } else if (enabled.has('Examples')) {
    examples = [options.placeholders?.examples ?? DEFAULT_EXAMPLES_PLACEHOLDER];
  }

  return {
    summary: existing && existing.summary.length > 0 ? [...existing.summary] : [model.summary],
    args,
    returns,
    raises,
    examples,
  };
}

export function renderSections(sections: DocstringSections): string {
  const lines = [...sections.summary];

  const section = (header: string, body: string[]): void => {
    if (lines.length > 0) lines.push('');
    lines.push(`${header}:`, ...body.map(line => (line === '' ? '' : `    ${line}`)));
  };

  if (sections.args.length > 0) {
    section('Args', sections.args.flatMap(arg =>
      entryLines(arg.type !== null ? `${arg.name} (${arg.type})` : arg.name, arg.description)
    ));
  }

  if (sections.returns) {
    const { type, description } = sections.returns;
    section('Returns', type !== null ? entryLines(type, description) : description);
  }

  if (sections.raises.length > 0) {
    section('Raises', sections.raises.flatMap(raised => entryLines(raised.name, raised.description)));
  }

  if (sections.examples && sections.examples.length > 0) {
    section('Examples', sections.examples);
  }

  return lines.join('\n');
}

function entryLines(head: string, description: string[]): string[] {
  const [first = '', ...rest] = description;
  return [first ? `${head}: ${first}` : `${head}:`, ...rest];
}

function findEntry(entries: DocstringEntry[] | undefined, name: string): DocstringEntry | undefined {
  const bare = name.replace(/^\*{1,2}/, '');
  return entries?.find(entry => entry.name.replace(/^\*{1,2}/, '') === bare);
}
