import { performance } from "node:perf_hooks";

/**
 * Opt-in compiler instrumentation. With `KINDRED_COMPILER_PERF=1` every
 * compile prints one `[kindred:compiler:perf]` JSON line to stderr holding
 * per-phase wall times and the counters bumped during that compile.
 * Otherwise every helper here is a no-op.
 */

const COMPILER_PERF_ENV = "KINDRED_COMPILER_PERF";

const PERF_ENABLED = ["1", "true", "yes"].includes(
  (process.env[COMPILER_PERF_ENV] ?? "").trim().toLowerCase()
);

type CounterSnapshot = ReadonlyMap<string, number>;

const counters = new Map<string, number>();

export const incrementCompilerPerfCounter = (name: string, amount = 1): void => {
  if (PERF_ENABLED && amount !== 0) {
    counters.set(name, (counters.get(name) ?? 0) + amount);
  }
};

export const snapshotCompilerPerfCounters = (): CounterSnapshot =>
  new Map(PERF_ENABLED ? counters : []);

/** Counters that moved between two snapshots, sorted by name. */
export const diffCompilerPerfCounters = ({
  before,
  after,
}: {
  before: CounterSnapshot;
  after: CounterSnapshot;
}): Record<string, number> => {
  const names = [...new Set([...before.keys(), ...after.keys()])].sort();
  const delta: Record<string, number> = {};
  names.forEach((name) => {
    const moved = (after.get(name) ?? 0) - (before.get(name) ?? 0);
    if (moved !== 0) delta[name] = moved;
  });
  return delta;
};

const addElapsed = (phasesMs: Record<string, number>, phase: string, start: number) => {
  phasesMs[phase] = (phasesMs[phase] ?? 0) + performance.now() - start;
};

/** Runs `run`, adding its wall time to `phasesMs[phase]`. */
export const timePhase = <T>(
  phasesMs: Record<string, number>,
  phase: string,
  run: () => T
): T => {
  if (!PERF_ENABLED) return run();
  const start = performance.now();
  try {
    return run();
  } finally {
    addElapsed(phasesMs, phase, start);
  }
};

/** `timePhase` for work that has to be awaited, such as the emit phase. */
export const timePhaseAsync = async <T>(
  phasesMs: Record<string, number>,
  phase: string,
  run: () => Promise<T>
): Promise<T> => {
  if (!PERF_ENABLED) return run();
  const start = performance.now();
  try {
    return await run();
  } finally {
    addElapsed(phasesMs, phase, start);
  }
};

export type CompilerPerfSummary = {
  sourcePath: string;
  target: string;
  success: boolean;
  phasesMs: Readonly<Record<string, number>>;
  counters: Readonly<Record<string, number>>;
  diagnostics: number;
};

// Microsecond precision is plenty for a one-line summary.
const roundMs = (ms: number): number => Math.round(ms * 1000) / 1000;

export const logCompilerPerfSummary = (summary: CompilerPerfSummary): void => {
  if (!PERF_ENABLED) return;

  const phasesMs = Object.fromEntries(
    Object.keys(summary.phasesMs)
      .sort()
      .map((phase) => [phase, roundMs(summary.phasesMs[phase] ?? 0)])
  );
  console.error(`[kindred:compiler:perf] ${JSON.stringify({ ...summary, phasesMs })}`);
};
