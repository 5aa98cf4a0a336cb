export {
  clean,
  compile,
  emitIntermediate,
  COMPILE_TARGETS,
  DEFAULT_OUTPUT_DIRECTORY,
  DEFAULT_TIMEOUT_MS,
  EMIT_FORMS,
  OPTIMIZATION_MODES,
  type CleanResult,
  type CompileOptions,
  type CompileResult,
  type CompileTarget,
  type EmitForm,
  type EmitResult,
} from "./pipeline.js";
export {
  formatDiagnostic,
  type Diagnostic,
  type SourceSpan,
} from "./diagnostics/index.js";
export type { OptimizationMode, ToolchainRunner } from "./emitter/index.js";
export type { CompilerHost } from "./host/index.js";
export { run } from "./run.js";
