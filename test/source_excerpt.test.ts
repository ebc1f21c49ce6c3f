import { describe, expect, it } from 'vitest';

import { caretExcerpt, lineText, makeSourceFile, posAtOffset } from '../src/frontend/source.js';

describe('source positions and excerpts', () => {
  const file = makeSourceFile('main.c', 'int main() {\r\n\treturn 1;\n}');

  it('maps offsets to 1-based line and column', () => {
    expect(posAtOffset(file, 0)).toEqual({ line: 1, column: 1, offset: 0 });
    expect(posAtOffset(file, 15)).toEqual({ line: 2, column: 2, offset: 15 });
    expect(posAtOffset(file, 999)).toEqual({ line: 3, column: 2, offset: 26 });
  });

  it('returns line text without terminators', () => {
    expect(lineText(file, 1)).toBe('int main() {');
    expect(lineText(file, 2)).toBe('\treturn 1;');
    expect(lineText(file, 3)).toBe('}');
    expect(lineText(file, 4)).toBe('');
  });

  it('keeps tabs in the caret line', () => {
    expect(caretExcerpt(file, 2, 9)).toEqual(['  \treturn 1;', '  \t       ^']);
  });

  it('pads the caret past the end of the line', () => {
    expect(caretExcerpt(file, 3, 3)).toEqual(['  }', '    ^']);
  });
});
