export * from "./types.js";
export * from "./registry.js";

import {
  type Diagnostic,
  type DiagnosticHint,
  type DiagnosticInput,
  type DiagnosticSeverity,
  type SourceSpan,
} from "./types.js";
import {
  formatDiagnosticMessage,
  getDiagnosticDefinition,
  type DiagnosticCode,
  type DiagnosticParams,
} from "./registry.js";

export const createDiagnostic = ({
  severity,
  ...input
}: DiagnosticInput): Diagnostic => ({
  ...input,
  severity: severity ?? "error",
});

type RegistryDiagnosticOptions<K extends DiagnosticCode> = {
  code: K;
  params: DiagnosticParams<K>;
  span: SourceSpan;
  severity?: DiagnosticSeverity;
  hints?: readonly DiagnosticHint[];
};

export const diagnosticFromCode = <K extends DiagnosticCode>(
  options: RegistryDiagnosticOptions<K>
): Diagnostic => {
  const definition = getDiagnosticDefinition(options.code);
  return createDiagnostic({
    code: options.code,
    kind: definition.kind,
    variant: definition.variant,
    message: formatDiagnosticMessage(options.code, options.params),
    span: options.span,
    severity: options.severity ?? definition.severity,
    phase: definition.phase,
    hints: options.hints ?? definition.hints,
  });
};

/** `<file>:<line>:<col>: <ErrorKind>: <message>` */
export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const { file, line, column } = diagnostic.span;
  return `${file}:${line}:${column}: ${diagnostic.kind}: ${diagnostic.message}`;
};

export const hasErrors = (diagnostics: readonly Diagnostic[]): boolean =>
  diagnostics.some((diagnostic) => diagnostic.severity === "error");

export const sortDiagnostics = (
  diagnostics: readonly Diagnostic[]
): Diagnostic[] =>
  [...diagnostics].sort((left, right) => left.span.start - right.span.start);

export class DiagnosticError extends Error {
  diagnostic: Diagnostic;
  diagnostics: readonly Diagnostic[];

  constructor(diagnostic: Diagnostic, diagnostics?: readonly Diagnostic[]) {
    super(formatDiagnostic(diagnostic));
    this.diagnostic = diagnostic;
    this.diagnostics =
      diagnostics && diagnostics.length > 0 ? [...diagnostics] : [diagnostic];
  }
}

export class DiagnosticEmitter {
  #diagnostics: Diagnostic[] = [];

  report<K extends DiagnosticCode>(
    options: RegistryDiagnosticOptions<K>
  ): Diagnostic {
    const diagnostic = diagnosticFromCode(options);
    this.#diagnostics.push(diagnostic);
    return diagnostic;
  }

  error<K extends DiagnosticCode>(options: RegistryDiagnosticOptions<K>): never {
    const diagnostic = this.report(options);
    throw new DiagnosticError(diagnostic, this.#diagnostics);
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.#diagnostics;
  }
}

/** Span used for diagnostics that are not tied to source text. */
export const fileSpan = (file: string): SourceSpan => ({
  file,
  start: 0,
  end: 0,
  line: 1,
  column: 1,
});
