import { parsePythonLiteral } from './python-literal';

describe('parsePythonLiteral', () => {
  it('reads nested containers with both keyword spellings', () => {
    expect(
      parsePythonLiteral("{'a': [1, 2.5, -3], 'b': (None, True, false), \"c\": 'x'}"),
    ).toEqual({ a: [1, 2.5, -3], b: [null, true, false], c: 'x' });
  });

  it('accepts trailing commas', () => {
    expect(parsePythonLiteral('[1, 2,]')).toEqual([1, 2]);
    expect(parsePythonLiteral("{'k': 1,}")).toEqual({ k: 1 });
  });

  it('decodes escapes', () => {
    expect(parsePythonLiteral("'it\\'s\\n'")).toBe("it's\n");
  });

  it('reports trailing input', () => {
    expect(() => parsePythonLiteral('[1] x')).toThrow(
      'Unexpected trailing input at position 4',
    );
  });

  it('reports truncated input', () => {
    expect(() => parsePythonLiteral('[1,')).toThrow(SyntaxError);
  });
});
