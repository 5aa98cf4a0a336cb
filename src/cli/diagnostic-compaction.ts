import type { Diagnostic } from "../diagnostics/index.js";

export type DiagnosticsCompactionResult = {
  diagnostics: Diagnostic[];
  /** Exact repeats of an earlier diagnostic. */
  duplicateCount: number;
};

const identityOf = ({ code, severity, phase, span, message }: Diagnostic): string =>
  `${code}|${severity}|${phase ?? ""}|${span.file}|${span.start}|${span.end}|${message}`;

/**
 * Prepares diagnostics for the terminal: exact repeats are dropped and
 * everything else is kept in order, one line per error.
 */
export const compactDiagnosticsForCli = (
  diagnostics: readonly Diagnostic[]
): DiagnosticsCompactionResult => {
  const seen = new Set<string>();
  const kept = diagnostics.filter((diagnostic) => {
    const identity = identityOf(diagnostic);
    if (seen.has(identity)) return false;
    seen.add(identity);
    return true;
  });

  return { diagnostics: kept, duplicateCount: diagnostics.length - kept.length };
};

export const formatCompactionSummary = ({
  duplicateCount,
}: DiagnosticsCompactionResult): string | undefined =>
  duplicateCount > 0
    ? `Suppressed ${duplicateCount} duplicate diagnostic${duplicateCount === 1 ? "" : "s"}.`
    : undefined;
