import { describe, it, expect } from 'vitest';
import { formatDocstringLiteral } from '../../../src/patch/index.js';

const options = { indent: '    ', eol: '\n' } as const;

describe('formatDocstringLiteral', () => {
  it('should keep a one-line docstring on one line', () => {
    expect(formatDocstringLiteral('Summary.', options)).toBe('"""Summary."""');
  });

  it('should indent continuation lines and close on its own line', () => {
    expect(formatDocstringLiteral('Summary.\n\nArgs:\n    a (int): ...', options)).toBe(
      '"""Summary.\n\n    Args:\n        a (int): ...\n    """'
    );
  });

  it('should join lines with the source line ending', () => {
    expect(formatDocstringLiteral('Summary.\n\nReturns:\n    int: ...', { indent: '  ', eol: '\r\n' })).toBe(
      '"""Summary.\r\n\r\n  Returns:\r\n      int: ...\r\n  """'
    );
  });

  it('should give new literals containing backslashes a raw prefix', () => {
    expect(formatDocstringLiteral(String.raw`Match \d+.`, options)).toBe(String.raw`r"""Match \d+."""`);
  });

  it('should keep the prefix and quote of the literal being replaced', () => {
    expect(formatDocstringLiteral('Summary.', { ...options, prefix: 'u', quote: "'''" })).toBe("u'''Summary.'''");
    expect(formatDocstringLiteral(String.raw`Keep \n`, { ...options, prefix: 'R' })).toBe(String.raw`R"""Keep \n"""`);
  });

  it('should make a replaced literal raw when the new text has a backslash', () => {
    expect(formatDocstringLiteral(String.raw`Takes Literal['\d'].`, { ...options, prefix: '' })).toBe(
      String.raw`r"""Takes Literal['\d']."""`
    );
    expect(formatDocstringLiteral(String.raw`Takes \d.`, { ...options, prefix: 'u' })).toBe(String.raw`r"""Takes \d."""`);
  });

  it('should switch quotes when the text contains the preferred ones', () => {
    expect(formatDocstringLiteral('Use """quotes""".', options)).toBe(`'''Use """quotes""".'''`);
    expect(formatDocstringLiteral('Say "hi"', options)).toBe(`'''Say "hi"'''`);
  });

  it('should escape quotes when neither triple quote fits', () => {
    expect(formatDocstringLiteral(`a """ b ''' c`, options)).toBe(String.raw`"""a \"\"\" b ''' c"""`);
  });

  it('should close on a new line when the text ends with a backslash', () => {
    expect(formatDocstringLiteral('Ends with \\', options)).toBe('r"""Ends with \\\n    """');
  });
});
