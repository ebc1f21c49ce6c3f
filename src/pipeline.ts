import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters } from './formats/types.js';
import type { SourceFile } from './frontend/source.js';
import type { TargetId } from './targets/types.js';

/**
 * Options that influence compilation behavior and which artifacts are produced.
 */
export interface CompilerOptions {
  /** Architecture/OS pair to generate for. Defaults to `x86_64-linux`. */
  target?: TargetId;
  /** Also produce a token dump artifact. */
  emitTokens?: boolean;
  /** Also produce an AST JSON artifact. */
  emitAst?: boolean;
  /** Line ending for the `.s` artifact. */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Result of a compilation run: diagnostics plus any produced artifacts.
 *
 * When any diagnostic has severity `error`, `artifacts` is empty.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
  /** The compiled source, when it could be read. Lets callers quote lines under diagnostics. */
  source?: SourceFile;
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can be pure/in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => Promise<CompileResult>;
