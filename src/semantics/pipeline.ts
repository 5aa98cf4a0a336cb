import type { Diagnostic } from "../diagnostics/index.js";
import type { Program } from "../parser/ast.js";
import { incrementCompilerPerfCounter } from "../perf.js";
import { resolveProgram, type ResolutionResult } from "./resolver.js";
import { checkProgram, type TypingResult } from "./typing/typechecker.js";

export interface SemanticsResult {
  resolution: ResolutionResult;
  typing: TypingResult;
  /** Resolver diagnostics followed by type checker diagnostics. */
  diagnostics: Diagnostic[];
}

/**
 * Name resolution then type checking. Both passes always run so one
 * compile reports every name and type error together.
 */
export const analyzeProgram = (program: Program): SemanticsResult => {
  const resolution = resolveProgram(program);
  incrementCompilerPerfCounter("semantics.bindings", resolution.bindings.size);
  incrementCompilerPerfCounter("semantics.symbols", resolution.symbols.symbolCount);

  const typing = checkProgram(program, resolution);
  return {
    resolution,
    typing,
    diagnostics: [...resolution.diagnostics, ...typing.diagnostics],
  };
};
