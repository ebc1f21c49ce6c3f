import { describe, expect, it } from 'vitest';

import { DiagnosticIds, compile, defaultFormatWriters } from '../src/index.js';
import { fixturePath } from './helpers/compile.js';

describe('smoke', () => {
  it('compiles through the public entry point', async () => {
    const res = await compile(
      fixturePath('return_42.c'),
      { target: 'aarch64-linux' },
      { formats: defaultFormatWriters },
    );
    expect(res.diagnostics).toEqual([]);
    const asm = res.artifacts[0];
    expect(asm?.kind).toBe('asm');
    expect(asm?.kind === 'asm' ? asm.text : '').toContain('\tmov\tx0, #42\n');
  });

  it('exposes stable diagnostic ids', () => {
    expect(DiagnosticIds.LexError).toBe('MCC100');
    expect(DiagnosticIds.ParseError).toBe('MCC200');
    expect(DiagnosticIds.UnsupportedConstruct).toBe('MCC300');
  });
});
