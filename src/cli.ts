#!/usr/bin/env node
import { existsSync, readFileSync, realpathSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';
import { caretExcerpt } from './frontend/source.js';
import { TARGET_IDS, hostTarget, isTargetId } from './targets/index.js';
import type { TargetId } from './targets/types.js';

type CliExit = { code: number };

type CliOptions = {
  entryFile: string;
  outputPath?: string;
  target: TargetId;
  printOutput: boolean;
  emitTokens: boolean;
  emitAst: boolean;
};

function usage(): string {
  return [
    'mincc [options] <file.c>',
    '',
    'Options:',
    '  -o, --output <file>   Assembly output path (default: <file>.s)',
    `  -t, --target <t>      Target: ${TARGET_IDS.join('|')} (default: host)`,
    '  -p, --print-output    Print tokens, AST and assembly to stdout',
    '      --emit-tokens     Also write <base>.tokens.txt',
    '      --emit-ast        Also write <base>.ast.json',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
    'Notes:',
    '  - <file.c> must be the last argument.',
    '  - Sidecar files are written next to the assembly output using its base name.',
    '',
  ].join('\n');
}

class CliError extends Error {
  override name = 'CliError';
}

function fail(message: string): never {
  throw new CliError(message);
}

function readVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // src/cli.ts when run from sources, dist/src/cli.js when built.
  const candidates = [resolve(here, '..', 'package.json'), resolve(here, '..', '..', 'package.json')];
  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
    if (pkg !== null && typeof pkg === 'object' && 'version' in pkg) {
      return String(pkg.version);
    }
  }
  return '0.0.0';
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let target: TargetId = hostTarget(process.arch, process.platform);
  let printOutput = false;
  let emitTokens = false;
  let emitAst = false;
  let entryFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${readVersion()}\n`);
      return { code: 0 };
    }
    if (a === '-o' || a === '--output' || a.startsWith('--output=')) {
      const v = a.startsWith('--output=') ? a.slice('--output='.length) : argv[++i];
      if (!v) fail(`${a.startsWith('--output=') ? '--output' : a} expects a value`);
      outputPath = v;
      continue;
    }
    if (a === '-t' || a === '--target' || a.startsWith('--target=')) {
      const v = a.startsWith('--target=') ? a.slice('--target='.length) : argv[++i];
      if (!v) fail(`${a.startsWith('--target=') ? '--target' : a} expects a value`);
      if (!isTargetId(v)) fail(`Unsupported --target "${v}" (expected ${TARGET_IDS.join('|')})`);
      target = v;
      continue;
    }
    if (a === '-p' || a === '--print-output') {
      printOutput = true;
      continue;
    }
    if (a === '--emit-tokens') {
      emitTokens = true;
      continue;
    }
    if (a === '--emit-ast') {
      emitAst = true;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <file.c> argument (and it must be last)`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <file.c> argument (and it must be last)`);
  }
  if (extname(entryFile) !== '.c') {
    fail(`Input file must have a .c extension: "${entryFile}"`);
  }
  if (outputPath && resolve(outputPath) === resolve(entryFile)) {
    fail(`--output must not overwrite the input file`);
  }

  return {
    entryFile,
    ...(outputPath ? { outputPath } : {}),
    target,
    printOutput,
    emitTokens,
    emitAst,
  };
}

function stripExt(path: string): string {
  const ext = extname(path);
  return ext.length > 0 ? path.slice(0, -ext.length) : path;
}

type OutputPaths = { asm: string; tokens: string; ast: string };

function outputPaths(entryFile: string, outputPath?: string): OutputPaths {
  const asm = outputPath ? resolve(outputPath) : `${stripExt(resolve(entryFile))}.s`;
  const base = stripExt(asm);
  return { asm, tokens: `${base}.tokens.txt`, ast: `${base}.ast.json` };
}

function renderArtifact(a: Artifact): string {
  switch (a.kind) {
    case 'asm':
    case 'tokens':
      return a.text;
    case 'ast':
      return JSON.stringify(a.json, null, 2) + '\n';
    default: {
      const unreachable: never = a;
      return String(unreachable);
    }
  }
}

async function writeArtifacts(
  paths: OutputPaths,
  artifacts: Artifact[],
  sidecars: { tokens: boolean; ast: boolean },
): Promise<void> {
  for (const a of artifacts) {
    if (a.kind === 'tokens' && !sidecars.tokens) continue;
    if (a.kind === 'ast' && !sidecars.ast) continue;
    const path = paths[a.kind];
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, renderArtifact(a), 'utf8');
  }
}

function printStages(artifacts: Artifact[]): void {
  for (const kind of ['tokens', 'ast', 'asm'] as const) {
    const a = artifacts.find((x) => x.kind === kind);
    if (!a) continue;
    process.stdout.write(renderArtifact(a));
    process.stdout.write('\n');
  }
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0) return colCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  return a.id.localeCompare(b.id);
}

function formatDiagnostic(d: Diagnostic): string {
  const loc =
    d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const res = await compile(
      parsed.entryFile,
      {
        target: parsed.target,
        emitTokens: parsed.emitTokens || parsed.printOutput,
        emitAst: parsed.emitAst || parsed.printOutput,
      },
      { formats: defaultFormatWriters },
    );

    for (const d of [...res.diagnostics].sort(compareDiagnosticsForCli)) {
      process.stderr.write(`${formatDiagnostic(d)}\n`);
      const src = res.source;
      if (src && d.file === src.path && d.line !== undefined && d.column !== undefined) {
        for (const l of caretExcerpt(src, d.line, d.column)) process.stderr.write(`${l}\n`);
      }
    }
    if (res.diagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    const paths = outputPaths(parsed.entryFile, parsed.outputPath);
    // -p alone prints the dumps without leaving sidecar files behind.
    await writeArtifacts(paths, res.artifacts, {
      tokens: parsed.emitTokens,
      ast: parsed.emitAst,
    });
    if (parsed.printOutput) printStages(res.artifacts);
    process.stdout.write(`${paths.asm}\n`);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`mincc: ${msg}\n`);
    if (!(err instanceof CliError)) return 1;
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  try {
    return realpathSync.native(resolved);
  } catch {
    return resolved;
  }
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  if (normalizePathForCompare(invokedAs) === normalizePathForCompare(self)) return true;
  // Windows can surface different canonical path spellings for the same file.
  const invoked = normalizePathForCompare(invokedAs).replace(/\\/g, '/');
  return invoked.endsWith('/dist/src/cli.js') && self.replace(/\\/g, '/').endsWith('/dist/src/cli.js');
}

if (isDirectCliInvocation(process.argv[1])) {
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
