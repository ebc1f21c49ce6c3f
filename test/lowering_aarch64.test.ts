import { describe, expect, it } from 'vitest';

import { asmFor, instructions } from './helpers/compile.js';

describe('aarch64 lowering', () => {
  it('emits a complete Mach-O translation unit for return 42', () => {
    expect(asmFor('int main(){return 42;}', 'aarch64-macos')).toBe(
      [
        '// mincc aarch64-macos: main.c',
        '\t.text',
        '',
        '\t.globl\t_main',
        '\t.p2align\t2',
        '_main:',
        '\tstp\tx29, x30, [sp, #-16]!',
        '\tmov\tx29, sp',
        '\tmov\tx0, #42',
        '\tldp\tx29, x30, [sp], #16',
        '\tret',
        '',
        '\t.subsections_via_symbols',
        '',
      ].join('\n'),
    );
  });

  it('emits ELF symbol metadata and the GNU-stack note on Linux', () => {
    const lines = asmFor('int main(){return 42;}', 'aarch64-linux').split('\n');
    expect(lines).toContain('\t.type\tmain, %function');
    expect(lines).toContain('\t.size\tmain, .-main');
    expect(lines).toContain('\t.section\t.note.GNU-stack, "", %progbits');
  });

  it('builds wide values from 16-bit chunks, skipping zero chunks', () => {
    const loads = (v: string) => {
      const ins = instructions(asmFor(`int f(){ return ${v}; }`, 'aarch64-linux'));
      return ins.slice(2, -2);
    };
    expect(loads('65535')).toEqual(['mov\tx0, #65535']);
    expect(loads('65536')).toEqual(['movz\tx0, #0x1, lsl #16']);
    expect(loads('4886718345')).toEqual([
      'movz\tx0, #0x6789',
      'movk\tx0, #0x2345, lsl #16',
      'movk\tx0, #0x1, lsl #32',
    ]);
    expect(loads('9223372036854775807')).toEqual([
      'movz\tx0, #0xffff',
      'movk\tx0, #0xffff, lsl #16',
      'movk\tx0, #0xffff, lsl #32',
      'movk\tx0, #0x7fff, lsl #48',
    ]);
  });

  it('branches to the epilogue from an early return', () => {
    const ins = instructions(asmFor('int main(){ return 1; return 2; }', 'aarch64-linux'));
    expect(ins).toEqual([
      'stp\tx29, x30, [sp, #-16]!',
      'mov\tx29, sp',
      'mov\tx0, #1',
      'b\t.Lmain_epilogue',
      'mov\tx0, #2',
      'ldp\tx29, x30, [sp], #16',
      'ret',
    ]);
  });

  it('restores the frame before returning from an empty body', () => {
    const ins = instructions(asmFor('int main(){}', 'aarch64-macos'));
    expect(ins.slice(-2)).toEqual(['ldp\tx29, x30, [sp], #16', 'ret']);
    expect(ins).toHaveLength(5);
  });
});
