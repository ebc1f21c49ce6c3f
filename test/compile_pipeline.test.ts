import { describe, expect, it } from 'vitest';

import { compile, compileSource } from '../src/compile.js';
import { defaultFormatWriters } from '../src/formats/index.js';
import type { AsmArtifact, AstArtifact, TokensArtifact } from '../src/formats/types.js';
import { compileText, fixturePath } from './helpers/compile.js';

describe('compile pipeline', () => {
  it('compiles a fixture from disk into a single asm artifact', async () => {
    const entry = fixturePath('return_42.c');
    const res = await compile(entry, { target: 'x86_64-linux' }, { formats: defaultFormatWriters });
    expect(res.diagnostics).toEqual([]);
    expect(res.artifacts.map((a) => a.kind)).toEqual(['asm']);

    const asm = res.artifacts.find((a): a is AsmArtifact => a.kind === 'asm');
    expect(asm?.text.split('\n')[0]).toBe('# mincc x86_64-linux: return_42.c');
    expect(asm?.text).toContain('\tmovl\t$42, %eax\n');
  });

  it('defaults to the x86_64-linux target', () => {
    const res = compileText('int main(){return 1;}');
    const asm = res.artifacts.find((a): a is AsmArtifact => a.kind === 'asm');
    expect(asm?.text.startsWith('# mincc x86_64-linux: main.c\n')).toBe(true);
  });

  it('reports a lex error and produces no artifacts', async () => {
    const entry = fixturePath('stray_char.c');
    const res = await compile(entry, {}, { formats: defaultFormatWriters });
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics).toEqual([
      {
        id: 'MCC100',
        severity: 'error',
        message: "unexpected character '@'",
        file: entry,
        line: 2,
        column: 10,
      },
    ]);
  });

  it('reports a stray character even when a parse error comes first', () => {
    const res = compileText('int f() { return } @');
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics).toEqual([
      {
        id: 'MCC100',
        severity: 'error',
        message: "unexpected character '@'",
        file: 'main.c',
        line: 1,
        column: 20,
      },
    ]);
  });

  it('reports a parse error and produces no artifacts', async () => {
    const entry = fixturePath('missing_semi.c');
    const res = await compile(entry, {}, { formats: defaultFormatWriters });
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics).toEqual([
      {
        id: 'MCC200',
        severity: 'error',
        message: "expected expression or ';', found r_brace '}'",
        file: entry,
        line: 1,
        column: 21,
      },
    ]);
  });

  it('reports a missing file as MCC001', async () => {
    const entry = fixturePath('does_not_exist.c');
    const res = await compile(entry, {}, { formats: defaultFormatWriters });
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics).toHaveLength(1);
    expect(res.diagnostics[0]?.id).toBe('MCC001');
    expect(res.diagnostics[0]?.file).toBe(entry);
    expect(res.diagnostics[0]?.message.startsWith('Failed to read source file: ')).toBe(true);
  });

  it('still produces assembly alongside warnings', async () => {
    const entry = fixturePath('dead_code.c');
    const res = await compile(entry, { target: 'aarch64-linux' }, { formats: defaultFormatWriters });
    expect(res.diagnostics.map((d) => [d.id, d.severity, d.line, d.column])).toEqual([
      ['MCC401', 'warning', 5, 3],
    ]);
    const asm = res.artifacts.find((a): a is AsmArtifact => a.kind === 'asm');
    expect(asm?.text).toContain('answer:\n');
    expect(asm?.text).toContain('\tmov\tx0, #7\n\tb\t.Lanswer_epilogue\n\tmov\tx0, #8\n');
  });

  it('compiles a bare return with a warning and an empty body silently', async () => {
    const deps = { formats: defaultFormatWriters };
    const bare = await compile(fixturePath('return_void.c'), {}, deps);
    expect(bare.diagnostics.map((d) => [d.id, d.line, d.column])).toEqual([['MCC400', 2, 3]]);
    expect(bare.artifacts.map((a) => a.kind)).toEqual(['asm']);

    const empty = await compile(fixturePath('empty_body.c'), {}, deps);
    expect(empty.diagnostics).toEqual([]);
    expect(empty.artifacts.map((a) => a.kind)).toEqual(['asm']);
  });

  it('adds token and AST dumps on request', () => {
    const res = compileText('int main(){return 42;}', { emitTokens: true, emitAst: true });
    expect(res.artifacts.map((a) => a.kind)).toEqual(['asm', 'tokens', 'ast']);

    const tokens = res.artifacts.find((a): a is TokensArtifact => a.kind === 'tokens');
    expect(tokens?.text.split('\n')[0]).toBe("1:1\tint 'int'");

    const ast = res.artifacts.find((a): a is AstArtifact => a.kind === 'ast');
    expect(ast?.json.format).toBe('mincc-ast');
  });

  it('warns and skips a dump when no writer is configured', () => {
    const res = compileSource(
      'main.c',
      'int main(){return 0;}',
      { emitTokens: true, emitAst: true },
      { formats: { writeAsm: defaultFormatWriters.writeAsm } },
    );
    expect(res.artifacts.map((a) => a.kind)).toEqual(['asm']);
    expect(res.diagnostics.map((d) => [d.id, d.severity])).toEqual([
      ['MCC000', 'warning'],
      ['MCC000', 'warning'],
    ]);
  });

  it('honors the requested line ending', () => {
    const res = compileSource(
      'main.c',
      'int main(){return 0;}',
      { target: 'x86_64-linux', lineEnding: '\r\n' },
      { formats: defaultFormatWriters },
    );
    const asm = res.artifacts.find((a): a is AsmArtifact => a.kind === 'asm');
    expect(asm?.text.endsWith('@progbits\r\n')).toBe(true);
    expect(asm?.text.includes('\r\n\t.text\r\n')).toBe(true);
  });
});
