/**
 * Python declaration extractor using tree-sitter
 */

import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';

import type {
  BodyInfo,
  CallableDeclaration,
  ClassDeclaration,
  DeclarationRecord,
  DocstringRecord,
  ParameterRecord,
  ParameterVariety,
  RaiseRecord,
  ReturnRecord,
  SourceUnit,
  Span,
} from '../types/index.js';
import { ParseError } from '../errors/index.js';
import { DeclarationExtractor, type ExtractionResult, type ExtractorOptions, type Language } from './base.js';

type SyntaxNode = Parser.SyntaxNode;

const STRING_LITERAL = /^([A-Za-z]*)('''|"""|'|")/;
const ANCHOR_LENGTH = 40;

/** Nodes whose bodies belong to another scope */
const SCOPE_BOUNDARIES = new Set([
  'function_definition',
  'class_definition',
  'decorated_definition',
  'lambda',
]);

const LITERAL_TYPES: Record<string, string> = {
  integer: 'int',
  float: 'float',
  true: 'bool',
  false: 'bool',
  none: 'None',
  list: 'list',
  list_comprehension: 'list',
  dictionary: 'dict',
  dictionary_comprehension: 'dict',
  set: 'set',
  set_comprehension: 'set',
  tuple: 'tuple',
  expression_list: 'tuple',
};

interface WalkFrame {
  node: SyntaxNode;
  parent: DeclarationRecord | null;
}

export class PythonExtractor extends DeclarationExtractor {
  private parser: Parser;

  constructor(options: ExtractorOptions = {}) {
    super(options);
    this.parser = new Parser();
    this.parser.setLanguage(Python as unknown as Parser.Language);
  }

  get language(): Language {
    return 'python';
  }

  get extensions(): string[] {
    return ['py', 'pyi'];
  }

  canParse(filePath: string): boolean {
    const ext = filePath.split('.').pop()?.toLowerCase() ?? '';
    return this.extensions.includes(ext);
  }

  parse(filePath: string, content: string): SourceUnit {
    if (this.isFileTooLarge(content)) {
      const size = Buffer.byteLength(content, 'utf8');
      throw new ParseError(
        filePath,
        `File size (${this.formatBytes(size)}) exceeds limit (${this.formatBytes(this.options.maxFileSize)})`
      );
    }

    const bom = content.charCodeAt(0) === 0xfeff;
    const text = bom ? content.slice(1) : content;
    const tree = this.parser.parse(text, undefined, {
      bufferSize: Math.max(1024 * 1024, text.length + 1),
    });

    const problem = this.findSyntaxProblem(tree.rootNode);
    if (problem) {
      throw new ParseError(filePath, problem.message, problem.line);
    }

    return { filePath, text, bom, eol: this.detectLineEnding(text), tree };
  }

  /**
   * Walk the tree with an explicit stack; definitions open a new scope whose
   * qualified name prefixes everything declared inside it.
   */
  extract(unit: SourceUnit): DeclarationRecord[] {
    const records: DeclarationRecord[] = [];
    const stack: WalkFrame[] = [{ node: unit.tree.rootNode, parent: null }];

    while (stack.length > 0) {
      const frame = stack.pop();
      if (!frame) break;

      const { node, parent } = frame;
      let scope = parent;
      let next: SyntaxNode[] = node.namedChildren;

      if (node.type === 'function_definition' || node.type === 'class_definition') {
        const record = this.buildRecord(unit, node, parent);
        if (record) {
          records.push(record);
          scope = record;
        }
        const body = node.childForFieldName('body');
        next = body ? [body] : [];
      } else if (node.type === 'lambda') {
        continue;
      }

      for (const child of [...next].reverse()) {
        stack.push({ node: child, parent: scope });
      }
    }

    return records;
  }

  private findSyntaxProblem(root: SyntaxNode): { message: string; line?: number } | null {
    const stack: SyntaxNode[] = [root];

    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;

      if (node.type === 'ERROR') {
        return { message: 'Invalid syntax', line: node.startPosition.row + 1 };
      }
      if (node.type === 'block' && this.statementsOf(node).length === 0) {
        return { message: 'Expected an indented block', line: node.startPosition.row + 1 };
      }

      for (const child of [...node.children].reverse()) {
        stack.push(child);
      }
    }

    // Missing tokens are only visible in the S-expression form
    if (/\(MISSING\b/.test(root.toString())) {
      return { message: 'Incomplete statement' };
    }

    return null;
  }

  private buildRecord(
    unit: SourceUnit,
    node: SyntaxNode,
    parent: DeclarationRecord | null
  ): DeclarationRecord | null {
    const nameNode = node.childForFieldName('name');
    const bodyNode = node.childForFieldName('body');
    if (!nameNode || !bodyNode) return null;

    const body = this.describeBody(unit, node, bodyNode);
    if (!body) return null;

    const outer = node.parent?.type === 'decorated_definition' ? node.parent : node;
    const decorators = outer === node
      ? []
      : outer.namedChildren.filter(c => c.type === 'decorator').map(d => this.collapse(d.text));

    const name = nameNode.text;
    const shared = {
      name,
      qualifiedName: parent ? `${parent.qualifiedName}.${name}` : name,
      parent: parent?.qualifiedName ?? null,
      depth: parent ? parent.depth + 1 : 0,
      span: this.spanOf(outer),
      headerSpan: this.headerSpan(node, bodyNode),
      startLine: outer.startPosition.row + 1,
      endLine: outer.endPosition.row + 1,
      decorators,
      body,
      docstring: this.findDocstring(unit, bodyNode),
    };

    if (node.type === 'class_definition') {
      const record: ClassDeclaration = {
        ...shared,
        kind: 'class',
        bases: this.parseBases(node),
      };
      return record;
    }

    const isAsync = node.children[0]?.type === 'async';
    const returnTypeNode = node.childForFieldName('return_type');
    const { raises, returnValues } = this.scanBody(unit, bodyNode);

    const record: CallableDeclaration = {
      ...shared,
      kind: parent?.kind === 'class' ? 'method' : isAsync ? 'async-function' : 'function',
      isAsync,
      parameters: this.parseParameters(unit, node),
      returnAnnotation: returnTypeNode ? this.textOf(unit, returnTypeNode) : null,
      raises,
      returnValues,
    };
    return record;
  }

  private describeBody(unit: SourceUnit, definition: SyntaxNode, bodyNode: SyntaxNode): BodyInfo | null {
    const first = this.statementsOf(bodyNode)[0];
    if (!first) return null;

    const text = unit.text;
    const lineStart = this.lineStartOf(text, first.startIndex);
    const leading = text.slice(lineStart, first.startIndex);
    const inline = !/^[ \t]*$/.test(leading);

    const headerLine = text.slice(this.lineStartOf(text, definition.startIndex), definition.startIndex);
    const headerIndent = headerLine.match(/^[ \t]*/)?.[0] ?? '';
    const indent = inline
      ? headerIndent + (headerIndent.includes('\t') ? '\t' : '    ')
      : leading;

    const insertionOffset = inline ? first.startIndex : lineStart;
    let lineEnd = text.indexOf('\n', first.startIndex);
    if (lineEnd === -1) lineEnd = text.length;

    return {
      span: this.spanOf(bodyNode),
      indent,
      inline,
      insertionOffset,
      anchor: text.slice(insertionOffset, Math.min(lineEnd, first.startIndex + ANCHOR_LENGTH)),
    };
  }

  private findDocstring(unit: SourceUnit, bodyNode: SyntaxNode): DocstringRecord | null {
    const first = this.statementsOf(bodyNode)[0];
    if (!first || first.type !== 'expression_statement') return null;

    const expressions = first.namedChildren.filter(c => c.type !== 'comment');
    const statement = expressions[0];
    if (expressions.length !== 1 || !statement) return null;

    // `("doc")` is still a docstring; only the inner literal is replaced
    const expr = this.unwrapParentheses(statement);

    const raw = this.textOf(unit, expr);

    if (expr.type === 'concatenated_string') {
      const parts = expr.namedChildren.filter(c => c.type === 'string');
      if (parts.some(p => !this.isDocstringPrefix(this.textOf(unit, p)))) return null;
      return {
        span: this.spanOf(expr),
        raw,
        prefix: '',
        quote: '',
        content: '',
        isConcatenated: true,
      };
    }

    if (expr.type !== 'string') return null;

    const match = raw.match(STRING_LITERAL);
    const prefix = match?.[1] ?? '';
    const quote = match?.[2] ?? '';
    if (!match || !this.isDocstringPrefix(raw)) return null;

    return {
      span: this.spanOf(expr),
      raw,
      prefix,
      quote,
      content: raw.slice(prefix.length + quote.length, raw.length - quote.length),
      isConcatenated: false,
    };
  }

  private unwrapParentheses(node: SyntaxNode): SyntaxNode {
    let current = node;
    while (current.type === 'parenthesized_expression') {
      const inner = current.namedChildren.filter(c => c.type !== 'comment');
      const only = inner[0];
      if (inner.length !== 1 || !only) break;
      current = only;
    }
    return current;
  }

  /**
   * Byte strings and f-strings are expressions, not docstrings
   */
  private isDocstringPrefix(raw: string): boolean {
    const prefix = raw.match(STRING_LITERAL)?.[1]?.toLowerCase() ?? '';
    return !prefix.includes('b') && !prefix.includes('f');
  }

  private parseParameters(unit: SourceUnit, funcNode: SyntaxNode): ParameterRecord[] {
    const parameters: ParameterRecord[] = [];
    const paramsNode = funcNode.childForFieldName('parameters');
    if (!paramsNode) return parameters;

    let keywordOnly = false;
    const named = (variety: ParameterVariety): ParameterVariety =>
      keywordOnly && variety === 'positional' ? 'keyword' : variety;

    for (const param of paramsNode.namedChildren) {
      switch (param.type) {
        case 'identifier':
          parameters.push({ name: param.text, annotation: null, hasDefault: false, variety: named('positional') });
          break;

        case 'typed_parameter': {
          const target = param.namedChildren[0];
          const typeNode = param.childForFieldName('type');
          const splat = target ? this.splatName(target) : null;
          parameters.push({
            name: splat?.name ?? target?.text ?? '',
            annotation: typeNode ? this.textOf(unit, typeNode) : null,
            hasDefault: false,
            variety: splat?.variety ?? named('positional'),
          });
          if (splat?.variety === 'variadic') keywordOnly = true;
          break;
        }

        case 'default_parameter':
        case 'typed_default_parameter': {
          const nameNode = param.childForFieldName('name');
          const typeNode = param.childForFieldName('type');
          parameters.push({
            name: nameNode?.type === 'identifier' ? nameNode.text : '',
            annotation: typeNode ? this.textOf(unit, typeNode) : null,
            hasDefault: true,
            variety: named('positional'),
          });
          break;
        }

        case 'list_splat_pattern':
        case 'dictionary_splat_pattern': {
          const splat = this.splatName(param);
          if (splat) {
            parameters.push({ name: splat.name, annotation: null, hasDefault: false, variety: splat.variety });
            if (splat.variety === 'variadic') keywordOnly = true;
          }
          break;
        }

        case 'keyword_separator':
          keywordOnly = true;
          break;

        case 'tuple_pattern':
          parameters.push({ name: '', annotation: null, hasDefault: false, variety: named('positional') });
          break;

        default:
          // positional_separator, comments
          break;
      }
    }

    return parameters;
  }

  private splatName(node: SyntaxNode): { name: string; variety: ParameterVariety } | null {
    const inner = node.namedChildren[0]?.text ?? '';
    if (node.type === 'list_splat_pattern') return { name: `*${inner}`, variety: 'variadic' };
    if (node.type === 'dictionary_splat_pattern') return { name: `**${inner}`, variety: 'keyword-variadic' };
    return null;
  }

  /**
   * Collect raise and return statements that belong to this body, leaving
   * out nested functions, classes and lambdas.
   */
  private scanBody(
    unit: SourceUnit,
    bodyNode: SyntaxNode
  ): { raises: RaiseRecord[]; returnValues: ReturnRecord[] } {
    const raises: RaiseRecord[] = [];
    const returnValues: ReturnRecord[] = [];
    const stack: SyntaxNode[] = [bodyNode];

    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;

      if (node.type === 'raise_statement') {
        const cause = node.childForFieldName('cause');
        const raised = node.namedChildren.find(
          c => c.type !== 'comment' && (!cause || c.startIndex !== cause.startIndex)
        );
        // A bare `raise` re-raises and names no type
        if (raised) {
          raises.push({ type: this.exceptionTypeName(unit, raised), line: node.startPosition.row + 1 });
        }
        continue;
      }

      if (node.type === 'return_statement') {
        const value = node.namedChildren.find(c => c.type !== 'comment');
        returnValues.push({
          literalType: value ? this.literalTypeOf(unit, value) : 'None',
          line: node.startPosition.row + 1,
        });
        continue;
      }

      for (const child of [...node.namedChildren].reverse()) {
        if (!SCOPE_BOUNDARIES.has(child.type)) {
          stack.push(child);
        }
      }
    }

    return { raises, returnValues };
  }

  private exceptionTypeName(unit: SourceUnit, node: SyntaxNode): string {
    if (node.type === 'parenthesized_expression') {
      const inner = node.namedChildren.find(c => c.type !== 'comment');
      if (inner) return this.exceptionTypeName(unit, inner);
    }
    if (node.type === 'call') {
      const callee = node.childForFieldName('function');
      if (callee) return this.collapse(this.textOf(unit, callee));
    }
    return this.collapse(this.textOf(unit, node));
  }

  private literalTypeOf(unit: SourceUnit, node: SyntaxNode): string | null {
    switch (node.type) {
      case 'string':
        return this.stringType(this.textOf(unit, node));
      case 'concatenated_string': {
        const first = node.namedChildren[0];
        return first ? this.stringType(this.textOf(unit, first)) : 'str';
      }
      case 'parenthesized_expression': {
        const inner = node.namedChildren.find(c => c.type !== 'comment');
        return inner ? this.literalTypeOf(unit, inner) : null;
      }
      case 'unary_operator': {
        const operand = node.childForFieldName('argument');
        if (operand && (operand.type === 'integer' || operand.type === 'float')) {
          return LITERAL_TYPES[operand.type] ?? null;
        }
        return null;
      }
      default:
        return LITERAL_TYPES[node.type] ?? null;
    }
  }

  private stringType(raw: string): string {
    const prefix = raw.match(STRING_LITERAL)?.[1]?.toLowerCase() ?? '';
    return prefix.includes('b') ? 'bytes' : 'str';
  }

  private parseBases(classNode: SyntaxNode): string[] {
    const superclasses = classNode.childForFieldName('superclasses');
    if (!superclasses) return [];

    return superclasses.namedChildren
      .filter(c => c.type !== 'keyword_argument' && c.type !== 'comment')
      .map(c => this.collapse(c.text));
  }

  private headerSpan(node: SyntaxNode, bodyNode: SyntaxNode): Span {
    const colons = node.children.filter(c => c.type === ':' && c.endIndex <= bodyNode.startIndex);
    const colon = colons[colons.length - 1];
    return { start: node.startIndex, end: colon ? colon.endIndex : bodyNode.startIndex };
  }

  private statementsOf(block: SyntaxNode): SyntaxNode[] {
    return block.namedChildren.filter(c => c.type !== 'comment');
  }

  private lineStartOf(text: string, index: number): number {
    return index === 0 ? 0 : text.lastIndexOf('\n', index - 1) + 1;
  }

  private spanOf(node: SyntaxNode): Span {
    return { start: node.startIndex, end: node.endIndex };
  }

  private textOf(unit: SourceUnit, node: SyntaxNode): string {
    return unit.text.slice(node.startIndex, node.endIndex);
  }

  private collapse(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
  }
}

let sharedExtractor: PythonExtractor | null = null;

/**
 * Parse Python source and list its declarations with a shared extractor
 */
export function extractDeclarations(filePath: string, content: string): ExtractionResult {
  sharedExtractor ??= new PythonExtractor();
  return sharedExtractor.extractDeclarations(filePath, content);
}
