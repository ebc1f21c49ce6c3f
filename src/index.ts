export { compile, compileSource } from './compile.js';
export type { CompileFn, CompileResult, CompilerOptions, PipelineDeps } from './pipeline.js';
export { CompileError, LexError, ParseError, UnsupportedConstructError } from './diagnostics/errors.js';
export { DiagnosticIds } from './diagnostics/types.js';
export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export { tokenize } from './frontend/lexer.js';
export { parse } from './frontend/parser.js';
export { makeSourceFile } from './frontend/source.js';
export type * from './frontend/ast.js';
export type { Token } from './frontend/tokens.js';
export { emitProgram } from './lowering/emit.js';
export { defaultFormatWriters } from './formats/index.js';
export type { Artifact, AsmArtifact, AsmLine, AsmProgram, FormatWriters } from './formats/types.js';
export { DEFAULT_TARGET, TARGET_IDS, getTarget, hostTarget } from './targets/index.js';
export type { Target, TargetId } from './targets/types.js';
