import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';

import { CompileError } from './diagnostics/errors.js';
import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import type { Artifact } from './formats/types.js';
import { tokenize } from './frontend/lexer.js';
import { parse } from './frontend/parser.js';
import { makeSourceFile } from './frontend/source.js';
import { emitProgram } from './lowering/emit.js';
import type { CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';
import { analyzeProgram } from './semantics/analyze.js';
import { DEFAULT_TARGET, getTarget } from './targets/index.js';

function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

/**
 * Run `stage`, turning a thrown {@link CompileError} into its diagnostic and anything else into
 * an internal-error diagnostic. Returns `undefined` when the stage failed.
 */
function runStage<T>(
  stage: string,
  file: string,
  diagnostics: Diagnostic[],
  fn: () => T,
): T | undefined {
  try {
    return fn();
  } catch (err) {
    if (err instanceof CompileError) {
      diagnostics.push(err.toDiagnostic());
    } else {
      diagnostics.push({
        id: DiagnosticIds.InternalError,
        severity: 'error',
        message: `Internal error during ${stage}: ${String(err)}`,
        file,
      });
    }
    return undefined;
  }
}

/**
 * Compile in-memory source text. Pure: reads and writes nothing.
 *
 * The whole source is lexed before parsing starts, so a lex error anywhere wins over a parse
 * error. Then semantic checks, then lowering. The first error ends the run with no artifacts.
 */
export function compileSource(
  path: string,
  text: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): CompileResult {
  const diagnostics: Diagnostic[] = [];
  const file = makeSourceFile(path, text);
  const target = getTarget(options.target ?? DEFAULT_TARGET);

  const parsed = runStage('parse', path, diagnostics, () => {
    const tokens = [...tokenize(file)];
    return { tokens, program: parse(tokens) };
  });
  if (!parsed || hasErrors(diagnostics)) return { diagnostics, artifacts: [], source: file };
  const { tokens, program } = parsed;

  analyzeProgram(program, diagnostics);

  const asm = runStage('code generation', path, diagnostics, () =>
    emitProgram(program, target, basename(path)),
  );
  if (!asm || hasErrors(diagnostics)) return { diagnostics, artifacts: [], source: file };

  const artifacts: Artifact[] = [
    deps.formats.writeAsm(asm, options.lineEnding ? { lineEnding: options.lineEnding } : {}),
  ];

  if (options.emitTokens) {
    if (deps.formats.writeTokens) {
      artifacts.push(deps.formats.writeTokens(tokens));
    } else {
      diagnostics.push({
        id: DiagnosticIds.Unknown,
        severity: 'warning',
        message: 'emitTokens=true but no token writer is configured; skipping token dump.',
        file: path,
      });
    }
  }
  if (options.emitAst) {
    if (deps.formats.writeAst) {
      artifacts.push(deps.formats.writeAst(program));
    } else {
      diagnostics.push({
        id: DiagnosticIds.Unknown,
        severity: 'warning',
        message: 'emitAst=true but no AST writer is configured; skipping AST dump.',
        file: path,
      });
    }
  }

  return { diagnostics, artifacts, source: file };
}

/**
 * Compile a single C source file into target assembly (plus optional stage dumps).
 */
export const compile: CompileFn = async (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> => {
  let text: string;
  try {
    text = await readFile(entryFile, 'utf8');
  } catch (err) {
    return {
      diagnostics: [
        {
          id: DiagnosticIds.IoReadFailed,
          severity: 'error',
          message: `Failed to read source file: ${String(err)}`,
          file: entryFile,
        },
      ],
      artifacts: [],
    };
  }
  return compileSource(entryFile, text, options, deps);
};
