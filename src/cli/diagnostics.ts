import { readFileSync } from "node:fs";
import type {
  Diagnostic,
  DiagnosticSeverity,
} from "../diagnostics/index.js";

type Colorizer = {
  kind: (severity: DiagnosticSeverity, text: string) => string;
  pointer: (severity: DiagnosticSeverity, text: string) => string;
  accent: (text: string) => string;
  muted: (text: string) => string;
};

export type SourceReader = (file: string) => string | undefined;

const readSourceFromDisk: SourceReader = (file) => {
  try {
    return readFileSync(file, "utf8");
  } catch {
    return undefined;
  }
};

const colorForSeverity = (
  severity: DiagnosticSeverity
): ((text: string) => string) => {
  switch (severity) {
    case "warning":
      return (text) => `\u001B[33m${text}\u001B[0m`;
    case "note":
      return (text) => `\u001B[36m${text}\u001B[0m`;
    default:
      return (text) => `\u001B[31m${text}\u001B[0m`;
  }
};

const createColorizer = (enabled: boolean): Colorizer => {
  if (!enabled) {
    const identity = (text: string) => text;
    return {
      kind: (_severity, text) => text,
      pointer: (_severity, text) => text,
      accent: identity,
      muted: identity,
    };
  }

  const bold = (text: string) => `\u001B[1m${text}\u001B[0m`;
  const dim = (text: string) => `\u001B[2m${text}\u001B[0m`;
  return {
    kind: (severity, text) => bold(colorForSeverity(severity)(text)),
    pointer: (severity, text) => colorForSeverity(severity)(text),
    accent: (text) => `\u001B[35m${text}\u001B[0m`,
    muted: dim,
  };
};

const formatSnippet = ({
  diagnostic,
  lineText,
  color,
}: {
  diagnostic: Diagnostic;
  lineText: string;
  color: Colorizer;
}): string => {
  const { line, column, start, end } = diagnostic.span;
  const pointerOffset = Math.min(column - 1, lineText.length);
  const available = Math.max(1, lineText.length - pointerOffset);
  const pointerLength = Math.min(Math.max(1, end - start), available);
  const gutter = `${line}`;
  const padding = " ".repeat(gutter.length);
  const marker = `${" ".repeat(pointerOffset)}${color.pointer(
    diagnostic.severity,
    "^".repeat(pointerLength)
  )}`;

  return [
    `${padding} |`,
    `${gutter} | ${lineText}`,
    `${padding} | ${marker}`,
  ].join("\n");
};

/**
 * `<file>:<line>:<col>: <ErrorKind>: <message>`, followed by the offending
 * source line when snippets are on and the file can be read.
 */
export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  options: { color?: boolean; snippet?: boolean; readSource?: SourceReader } = {}
): string => {
  const colorEnabled = options.color ?? true;
  const color = createColorizer(colorEnabled);
  const { file, line, column } = diagnostic.span;
  const header = `${color.accent(`${file}:${line}:${column}`)}: ${color.kind(
    diagnostic.severity,
    diagnostic.kind
  )}: ${diagnostic.message}`;

  if (!(options.snippet ?? colorEnabled)) {
    return header;
  }

  const source = (options.readSource ?? readSourceFromDisk)(file);
  const lineText = source?.split("\n")[line - 1];
  const lines = [header];
  if (lineText !== undefined) {
    lines.push(formatSnippet({ diagnostic, lineText, color }));
  }
  diagnostic.hints?.forEach((hint) => lines.push(color.muted(`  = help: ${hint.message}`)));
  return lines.join("\n");
};
