import { describe, it, expect } from 'vitest';
import { buildSignatureModel, inferReturnType } from '../../../src/model/index.js';
import { extractDeclarations } from '../../../src/extractor/index.js';
import { ModelValidationError } from '../../../src/errors/index.js';
import type { CallableDeclaration, DeclarationRecord, ParameterRecord } from '../../../src/types/index.js';
import { py } from '../../helpers/fixtures.js';

function declaration(source: string, qualifiedName: string): DeclarationRecord {
  const record = extractDeclarations('test.py', source).declarations.find(d => d.qualifiedName === qualifiedName);
  if (!record) throw new Error(`no declaration ${qualifiedName}`);
  return record;
}

function param(name: string, annotation: string | null = null): ParameterRecord {
  return { name, annotation, hasDefault: false, variety: 'positional' };
}

function callableRecord(overrides: Partial<CallableDeclaration>): CallableDeclaration {
  return {
    name: 'f',
    qualifiedName: 'f',
    parent: null,
    depth: 0,
    span: { start: 0, end: 0 },
    headerSpan: { start: 0, end: 0 },
    startLine: 1,
    endLine: 1,
    decorators: [],
    body: { span: { start: 0, end: 0 }, indent: '    ', inline: false, insertionOffset: 0, anchor: '' },
    docstring: null,
    kind: 'function',
    isAsync: false,
    parameters: [],
    returnAnnotation: null,
    raises: [],
    returnValues: [],
    ...overrides,
  };
}

describe('buildSignatureModel', () => {
  it('should build the model of an annotated function', () => {
    const model = buildSignatureModel(declaration('def add(a: int, b: int) -> int:\n    return a + b\n', 'add'));

    expect(model).toEqual({
      qualifiedName: 'add',
      name: 'add',
      kind: 'function',
      summary: 'Summary of add.',
      parameters: [
        { name: 'a', type: 'int', hasDefault: false },
        { name: 'b', type: 'int', hasDefault: false },
      ],
      returns: 'int',
      raises: [],
      warnings: [],
    });
  });

  it('should default missing parameter types to Any', () => {
    const model = buildSignatureModel(declaration('def f(x, y=2):\n    pass\n', 'f'));

    expect(model.parameters).toEqual([
      { name: 'x', type: 'Any', hasDefault: false },
      { name: 'y', type: 'Any', hasDefault: true },
    ]);
  });

  it('should list each raised exception once in first-seen order', () => {
    const model = buildSignatureModel(declaration(py(
      'def check(x):',
      '    if x < 0:',
      '        raise ValueError("negative")',
      '    if x == 0:',
      '        raise TypeError("zero")',
      '    raise ValueError("other")',
    ), 'check'));

    expect(model.raises).toEqual(['ValueError', 'TypeError']);
    expect(model.returns).toBe('None');
  });

  it('should leave self out of method arguments', () => {
    const model = buildSignatureModel(declaration(py(
      'class Account:',
      '    def deposit(self, amount: float) -> None:',
      '        self.balance += amount',
    ), 'Account.deposit'));

    expect(model.kind).toBe('method');
    expect(model.parameters).toEqual([{ name: 'amount', type: 'float', hasDefault: false }]);
  });

  it('should leave cls out of class methods', () => {
    const model = buildSignatureModel(declaration(py(
      'class Account:',
      '    @classmethod',
      '    def create(cls):',
      '        return cls()',
    ), 'Account.create'));

    expect(model.parameters).toEqual([]);
  });

  it('should keep the first parameter of a static method', () => {
    const model = buildSignatureModel(declaration(py(
      'class Account:',
      '    @staticmethod',
      '    def parse(self):',
      '        return self',
    ), 'Account.parse'));

    expect(model.parameters.map(p => p.name)).toEqual(['self']);
  });

  it('should keep stars on variadic parameters', () => {
    const model = buildSignatureModel(declaration('def f(*args: int, **kwargs):\n    pass\n', 'f'));

    expect(model.parameters.map(p => `${p.name}: ${p.type}`)).toEqual(['*args: int', '**kwargs: Any']);
  });

  it('should model classes without parameters or return type', () => {
    const model = buildSignatureModel(declaration('class Point(Base):\n    x = 0\n', 'Point'));

    expect(model).toMatchObject({ kind: 'class', parameters: [], returns: null, raises: [] });
  });

  it('should substitute the summary template', () => {
    const model = buildSignatureModel(
      declaration('async def load():\n    pass\n', 'load'),
      { summaryTemplate: 'The {kind} {qualifiedName} ({name}).' }
    );

    expect(model.summary).toBe('The async function load (load).');
  });

  describe('return types', () => {
    it('should infer a literal return type', () => {
      const model = buildSignatureModel(declaration('def f():\n    return "x"\n', 'f'));

      expect(model.returns).toBe('str');
    });

    it('should use Any when returned values disagree', () => {
      const model = buildSignatureModel(declaration(py(
        'def f(x):',
        '    if x:',
        '        return 1',
        '    return x',
      ), 'f'));

      expect(model.returns).toBe('Any');
    });

    it('should prefer the annotation over inference', () => {
      const model = buildSignatureModel(declaration('def f() -> float:\n    return 1\n', 'f'));

      expect(model.returns).toBe('float');
    });

    it('should fall back to None when inference is off', () => {
      const model = buildSignatureModel(declaration('def f():\n    return 1\n', 'f'), { inferReturns: false });

      expect(model.returns).toBe('None');
    });
  });

  describe('annotations', () => {
    it('should flag quoted forward references without rewriting them', () => {
      const model = buildSignatureModel(declaration('def f(node: "Node") -> "Tree":\n    pass\n', 'f'));

      expect(model.parameters[0]?.type).toBe('"Node"');
      expect(model.returns).toBe('"Tree"');
      expect(model.warnings).toEqual([
        'node: quoted annotation "Node" rendered as written',
        'return: quoted annotation "Tree" rendered as written',
      ]);
    });

    it('should collapse annotations that span several lines', () => {
      const model = buildSignatureModel(callableRecord({
        parameters: [param('mapping', 'Dict[\n    str,\n    int\n]')],
      }));

      expect(model.parameters[0]?.type).toBe('Dict[str, int]');
      expect(model.warnings).toEqual(['mapping: multi-line annotation collapsed to Dict[str, int]']);
    });
  });

  describe('validation failures', () => {
    it('should reject duplicate parameter names', () => {
      const record = callableRecord({ parameters: [param('a'), param('a')] });

      expect(() => buildSignatureModel(record)).toThrow(ModelValidationError);
      expect(() => buildSignatureModel(record)).toThrow('f: parameters.1.name: duplicate parameter "a"');
    });

    it('should treat *a and **a as the same name', () => {
      const record = callableRecord({
        parameters: [
          { name: '*a', annotation: null, hasDefault: false, variety: 'variadic' },
          { name: '**a', annotation: null, hasDefault: false, variety: 'keyword-variadic' },
        ],
      });

      expect(() => buildSignatureModel(record)).toThrow('duplicate parameter "a"');
    });

    it('should reject parameters without a name', () => {
      const record = callableRecord({ parameters: [param('x'), param('')] });

      expect(() => buildSignatureModel(record)).toThrow('f: parameter 2 has no name');
    });

    it('should reject annotations containing comments', () => {
      const record = callableRecord({
        qualifiedName: 'mod.f',
        parameters: [param('x', 'int  # count')],
      });

      try {
        buildSignatureModel(record);
        expect.unreachable('model should be rejected');
      } catch (error) {
        expect(error).toBeInstanceOf(ModelValidationError);
        if (error instanceof ModelValidationError) {
          expect(error.code).toBe('MODEL_VALIDATION');
          expect(error.qualifiedName).toBe('mod.f');
          expect(error.issues).toEqual(['x: annotation contains a comment']);
        }
      }
    });

    it('should reject blank annotations', () => {
      const record = callableRecord({ returnAnnotation: '   ' });

      expect(() => buildSignatureModel(record)).toThrow('f: return: annotation is empty');
    });
  });
});

describe('inferReturnType', () => {
  it('should return None when nothing is returned', () => {
    expect(inferReturnType([])).toBe('None');
  });

  it('should return the shared literal type', () => {
    expect(inferReturnType([
      { literalType: 'int', line: 2 },
      { literalType: 'int', line: 4 },
    ])).toBe('int');
  });

  it('should return Any for mixed or non-literal values', () => {
    expect(inferReturnType([{ literalType: 'int', line: 2 }, { literalType: 'str', line: 3 }])).toBe('Any');
    expect(inferReturnType([{ literalType: null, line: 2 }])).toBe('Any');
    expect(inferReturnType([{ literalType: 'None', line: 2 }, { literalType: 'int', line: 3 }])).toBe('Any');
  });
});
