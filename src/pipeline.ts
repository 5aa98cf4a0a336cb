import { generateAssembly, generateWasm, type NativePlatform } from "./codegen/index.js";
import {
  DiagnosticEmitter,
  DiagnosticError,
  fileSpan,
  hasErrors,
  sortDiagnostics,
  type Diagnostic,
} from "./diagnostics/index.js";
import {
  createSpawnToolchainRunner,
  emitNative,
  emitWasm,
  removeBuildDirectory,
  type OptimizationMode,
  type ToolchainRunner,
} from "./emitter/index.js";
import { describeIoError } from "./host/errors.js";
import { createFsCompilerHost } from "./host/fs-host.js";
import type { CompilerHost } from "./host/types.js";
import { lowerProgram, printModule, type IrModule } from "./ir/index.js";
import { parse, tokenize, type Program } from "./parser/index.js";
import {
  diffCompilerPerfCounters,
  logCompilerPerfSummary,
  snapshotCompilerPerfCounters,
  timePhase,
  timePhaseAsync,
} from "./perf.js";
import { analyzeProgram } from "./semantics/index.js";

export type CompileTarget = "native" | "wasm";

/** Intermediate forms `--emit` can print instead of building. */
export type EmitForm = "tokens" | "ast" | "ir" | "asm" | "wat";

export const COMPILE_TARGETS: readonly CompileTarget[] = ["native", "wasm"];
export const OPTIMIZATION_MODES: readonly OptimizationMode[] = ["debug", "release"];
export const EMIT_FORMS: readonly EmitForm[] = ["tokens", "ast", "ir", "asm", "wat"];

export const DEFAULT_OUTPUT_DIRECTORY = "build";
export const DEFAULT_TIMEOUT_MS = 60_000;

export type CompileOptions = {
  outputDirectory?: string;
  optimizationMode?: OptimizationMode;
  target?: CompileTarget;
  /** C compiler driver used to assemble and link; defaults to `KINDRED_CC`, then `cc`. */
  toolchain?: string;
  timeoutMs?: number;
  platform?: NativePlatform;
  host?: CompilerHost;
  runner?: ToolchainRunner;
};

export type CompileResult =
  | { success: true; outputPath: string; diagnostics: Diagnostic[] }
  | { success: false; diagnostics: Diagnostic[] };

/** `output` is present whenever the form could be produced, even alongside errors. */
export type EmitResult = {
  success: boolean;
  output?: string;
  diagnostics: Diagnostic[];
};

export type CleanResult =
  | { success: true; removed: boolean }
  | { success: false; diagnostics: Diagnostic[] };

type ResolvedOptions = Required<CompileOptions>;

export const defaultToolchain = (): string => {
  const fromEnv = process.env.KINDRED_CC?.trim();
  return fromEnv ? fromEnv : "cc";
};

const defaultPlatform = (): NativePlatform =>
  process.platform === "darwin" ? "darwin" : "linux";

const resolveOptions = (options: CompileOptions): ResolvedOptions => ({
  outputDirectory: options.outputDirectory ?? DEFAULT_OUTPUT_DIRECTORY,
  optimizationMode: options.optimizationMode ?? "release",
  target: options.target ?? "native",
  toolchain: options.toolchain ?? defaultToolchain(),
  timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
  platform: options.platform ?? defaultPlatform(),
  host: options.host ?? createFsCompilerHost(),
  runner: options.runner ?? createSpawnToolchainRunner(),
});

type Session = {
  sourcePath: string;
  options: ResolvedOptions;
  emitter: DiagnosticEmitter;
  /** Diagnostics from stages that collect rather than throw. */
  collected: Diagnostic[];
  phasesMs: Record<string, number>;
};

const readSource = async (session: Session): Promise<string> => {
  const { host } = session.options;
  try {
    return await host.readFile(host.path.resolve(session.sourcePath));
  } catch (error) {
    return session.emitter.error({
      code: "IO0001",
      params: { kind: "read-failed", path: session.sourcePath, reason: describeIoError(error) },
      span: fileSpan(session.sourcePath),
    });
  }
};

/** Parses and checks the source. Returns undefined when any error was reported. */
const runFrontEnd = (
  session: Session,
  source: string
): { program: Program; ir: () => IrModule } | undefined => {
  const parsed = timePhase(session.phasesMs, "parse", () => parse(source, session.sourcePath));
  const semantics = timePhase(session.phasesMs, "semantics", () => analyzeProgram(parsed.program));
  session.collected.push(...parsed.diagnostics, ...semantics.diagnostics);
  if (hasErrors(session.collected)) return undefined;

  return {
    program: parsed.program,
    ir: () => timePhase(session.phasesMs, "lower", () => lowerProgram(parsed.program, semantics)),
  };
};

const assemble = (session: Session, ir: IrModule): string =>
  timePhase(session.phasesMs, "codegen", () =>
    generateAssembly(ir, session.emitter, { platform: session.options.platform })
  );

const buildWasm = (session: Session, ir: IrModule) =>
  timePhase(session.phasesMs, "codegen", () =>
    generateWasm(ir, session.emitter, {
      optimize: session.options.optimizationMode === "release",
    })
  );

/**
 * Runs a session to completion. Fatal diagnostics surface as a
 * `DiagnosticError`; anything else is a compiler bug and propagates.
 */
const runSession = async <T>(
  sourcePath: string,
  options: CompileOptions,
  run: (session: Session) => Promise<T | undefined>
): Promise<{ value?: T; diagnostics: Diagnostic[] }> => {
  const session: Session = {
    sourcePath,
    options: resolveOptions(options),
    emitter: new DiagnosticEmitter(),
    collected: [],
    phasesMs: {},
  };
  const countersBefore = snapshotCompilerPerfCounters();

  let value: T | undefined;
  try {
    value = await run(session);
  } catch (error) {
    if (!(error instanceof DiagnosticError)) throw error;
  }

  const diagnostics = sortDiagnostics([...session.collected, ...session.emitter.diagnostics]);
  logCompilerPerfSummary({
    sourcePath,
    target: session.options.target,
    success: value !== undefined && !hasErrors(diagnostics),
    phasesMs: session.phasesMs,
    counters: diffCompilerPerfCounters({
      before: countersBefore,
      after: snapshotCompilerPerfCounters(),
    }),
    diagnostics: diagnostics.length,
  });
  return { value, diagnostics };
};

const artifactStem = (host: CompilerHost, sourcePath: string): string =>
  host.path.basename(sourcePath, host.path.extname(sourcePath));

/**
 * Compiles one translation unit into an executable (native) or a `.wasm`
 * module. Every front-end error is reported together; nothing is written
 * unless the front end succeeds.
 */
export const compile = async (
  sourcePath: string,
  options: CompileOptions = {}
): Promise<CompileResult> => {
  const { value, diagnostics } = await runSession(sourcePath, options, async (session) => {
    const frontEnd = runFrontEnd(session, await readSource(session));
    if (!frontEnd) return undefined;

    const { host, target, optimizationMode, outputDirectory } = session.options;
    const ctx = {
      host,
      emitter: session.emitter,
      sourcePath,
      outputDirectory,
      stem: artifactStem(host, sourcePath),
      mode: optimizationMode,
    };
    const ir = frontEnd.ir();

    if (target === "wasm") {
      const output = buildWasm(session, ir);
      return timePhaseAsync(session.phasesMs, "emit", () => emitWasm(output, ctx));
    }

    const assembly = assemble(session, ir);
    return timePhaseAsync(session.phasesMs, "emit", () =>
      emitNative(assembly, {
        ...ctx,
        runner: session.options.runner,
        toolchain: session.options.toolchain,
        timeoutMs: session.options.timeoutMs,
        platform: session.options.platform,
      })
    );
  });

  return value !== undefined
    ? { success: true, outputPath: value, diagnostics }
    : { success: false, diagnostics };
};

const formatTokens = (
  source: string,
  sourcePath: string
): { text: string; diagnostics: readonly Diagnostic[] } => {
  const { tokens, diagnostics } = tokenize(source, sourcePath);
  const text = tokens
    .map((token) => `${token.span.line}:${token.span.column} ${token.toString()}`)
    .join("\n");
  return { text, diagnostics };
};

/** JSON form of the syntax tree; Int literals print as `"5n"`. */
const stringifyAst = (program: Program): string =>
  JSON.stringify(
    program,
    (_key, value: unknown) => (typeof value === "bigint" ? `${value}n` : value),
    2
  );

/** Renders an intermediate form of the program instead of building it. */
export const emitIntermediate = async (
  sourcePath: string,
  form: EmitForm,
  options: CompileOptions = {}
): Promise<EmitResult> => {
  const { value, diagnostics } = await runSession(sourcePath, options, async (session) => {
    const source = await readSource(session);
    if (form === "tokens") {
      const { text, diagnostics: lexical } = formatTokens(source, sourcePath);
      session.collected.push(...lexical);
      return text;
    }

    const frontEnd = runFrontEnd(session, source);
    if (!frontEnd) return undefined;

    switch (form) {
      case "ast":
        return stringifyAst(frontEnd.program);
      case "ir":
        return printModule(frontEnd.ir());
      case "asm":
        return assemble(session, frontEnd.ir());
      case "wat":
        return buildWasm(session, frontEnd.ir()).text;
    }
  });

  return { success: value !== undefined && !hasErrors(diagnostics), output: value, diagnostics };
};

/** Removes a build directory; a missing directory counts as success. */
export const clean = async (
  buildDir: string,
  options: Pick<CompileOptions, "host"> = {}
): Promise<CleanResult> => {
  const host = options.host ?? createFsCompilerHost();
  const emitter = new DiagnosticEmitter();
  try {
    return { success: true, removed: await removeBuildDirectory(host, buildDir, emitter) };
  } catch (error) {
    if (!(error instanceof DiagnosticError)) throw error;
    return { success: false, diagnostics: [...emitter.diagnostics] };
  }
};
