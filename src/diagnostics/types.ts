export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase =
  | "lexer"
  | "parser"
  | "resolver"
  | "typing"
  | "codegen"
  | "build"
  | "io";

/** User-facing error family, printed in the `<file>:<line>:<col>: <kind>: ...` line. */
export type ErrorKind =
  | "LexError"
  | "ParseError"
  | "NameError"
  | "TypeError"
  | "CodegenError"
  | "BuildError"
  | "IoError";

/**
 * A range of source text. `start`/`end` are UTF-16 offsets into the file;
 * `line` and `column` are 1-based and describe `start`.
 */
export interface SourceSpan {
  file: string;
  start: number;
  end: number;
  line: number;
  column: number;
}

export interface DiagnosticHint {
  message: string;
}

export interface Diagnostic {
  code: string;
  kind: ErrorKind;
  variant: string;
  message: string;
  severity: DiagnosticSeverity;
  span: SourceSpan;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
}

export type DiagnosticInput = {
  code: string;
  kind: ErrorKind;
  variant: string;
  message: string;
  span: SourceSpan;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};
