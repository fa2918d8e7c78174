/**
 * Declaration records produced by the extractor
 */

import type Parser from 'tree-sitter';

export type DeclarationKind = 'function' | 'async-function' | 'method' | 'class';
export type LineEnding = '\n' | '\r\n';

/**
 * Half-open range of string indexes into a SourceUnit's text
 */
export interface Span {
  start: number;
  end: number;
}

export interface SourceUnit {
  readonly filePath: string;
  /** File text with any leading byte order mark removed */
  readonly text: string;
  readonly bom: boolean;
  readonly eol: LineEnding;
  readonly tree: Parser.Tree;
}

export type ParameterVariety = 'positional' | 'variadic' | 'keyword' | 'keyword-variadic';

export interface ParameterRecord {
  /** Name as written, with `*` / `**` kept for variadic parameters */
  name: string;
  annotation: string | null;
  hasDefault: boolean;
  variety: ParameterVariety;
}

export interface RaiseRecord {
  /** Exception type as written, with call arguments dropped */
  type: string;
  line: number;
}

export interface ReturnRecord {
  /**
   * Literal type of the returned value: `'None'` for bare returns,
   * null when the value is not a literal
   */
  literalType: string | null;
  line: number;
}

export interface DocstringRecord {
  span: Span;
  /** Literal exactly as it appears in the source, prefix and quotes included */
  raw: string;
  prefix: string;
  quote: string;
  /** Text between the quotes; empty for concatenated literals */
  content: string;
  isConcatenated: boolean;
}

export interface BodyInfo {
  span: Span;
  /** Indentation given to docstring continuation lines */
  indent: string;
  /** True when the body shares the header line, e.g. `def f(): return 1` */
  inline: boolean;
  insertionOffset: number;
  /** Source text found at insertionOffset when the record was made */
  anchor: string;
}

interface DeclarationBase {
  name: string;
  qualifiedName: string;
  parent: string | null;
  depth: number;
  span: Span;
  headerSpan: Span;
  startLine: number;
  endLine: number;
  decorators: string[];
  body: BodyInfo;
  docstring: DocstringRecord | null;
}

export interface CallableDeclaration extends DeclarationBase {
  kind: 'function' | 'async-function' | 'method';
  isAsync: boolean;
  parameters: ParameterRecord[];
  returnAnnotation: string | null;
  raises: RaiseRecord[];
  returnValues: ReturnRecord[];
}

export interface ClassDeclaration extends DeclarationBase {
  kind: 'class';
  bases: string[];
}

export type DeclarationRecord = CallableDeclaration | ClassDeclaration;

export function isCallable(record: DeclarationRecord): record is CallableDeclaration {
  return record.kind !== 'class';
}
