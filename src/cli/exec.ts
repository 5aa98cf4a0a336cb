import { getConfig } from "./config/index.js";
import type { CleanConfig, KindredConfig, MakeConfig } from "./config/types.js";
import {
  compactDiagnosticsForCli,
  formatCompactionSummary,
} from "./diagnostic-compaction.js";
import { formatCliDiagnostic } from "./diagnostics.js";
import { DiagnosticError, type Diagnostic } from "../diagnostics/index.js";
import type { ToolchainRunner } from "../emitter/index.js";
import { createFsCompilerHost } from "../host/fs-host.js";
import type { CompilerHost } from "../host/types.js";
import { clean, compile, emitIntermediate, type CompileOptions } from "../pipeline.js";

export type CliIo = {
  host?: CompilerHost;
  runner?: ToolchainRunner;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
};

type ResolvedIo = {
  host: CompilerHost;
  runner?: ToolchainRunner;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

export const exec = () =>
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch(errorHandler);

async function main(): Promise<number> {
  const config = getConfig();
  return runConfig(
    config.command === "make"
      ? { ...config, color: config.color && Boolean(process.stderr.isTTY) }
      : config
  );
}

/** Runs one parsed command line. Returns the process exit code. */
export const runConfig = async (
  config: KindredConfig,
  io: CliIo = {}
): Promise<number> => {
  const resolved: ResolvedIo = {
    host: io.host ?? createFsCompilerHost(),
    runner: io.runner,
    stdout: io.stdout ?? ((text) => console.log(text)),
    stderr: io.stderr ?? ((text) => console.error(text)),
  };

  switch (config.command) {
    case "make":
      return make(config, resolved);
    case "clean":
      return cleanBuild(config, resolved);
  }
};

const make = async (config: MakeConfig, io: ResolvedIo): Promise<number> => {
  const options: CompileOptions = {
    outputDirectory: config.outDir,
    optimizationMode: config.mode,
    target: config.target,
    toolchain: config.cc,
    timeoutMs: config.timeoutMs,
    host: io.host,
    runner: io.runner,
  };

  if (config.emit) {
    const result = await emitIntermediate(config.source, config.emit, options);
    if (result.output !== undefined) {
      io.stdout(result.output);
    }
    await reportDiagnostics(result.diagnostics, config.color, io);
    return result.success ? 0 : 1;
  }

  const result = await compile(config.source, options);
  await reportDiagnostics(result.diagnostics, config.color, io);
  if (!result.success) {
    return 1;
  }
  io.stdout(`built ${result.outputPath}`);
  return 0;
};

const cleanBuild = async (config: CleanConfig, io: ResolvedIo): Promise<number> => {
  const result = await clean(config.outDir, { host: io.host });
  if (!result.success) {
    await reportDiagnostics(result.diagnostics, false, io);
    return 1;
  }
  io.stdout(result.removed ? `removed ${config.outDir}` : `nothing to clean in ${config.outDir}`);
  return 0;
};

const loadSources = async (
  diagnostics: readonly Diagnostic[],
  host: CompilerHost
): Promise<Map<string, string>> => {
  const sources = new Map<string, string>();
  const files = new Set(diagnostics.map((diagnostic) => diagnostic.span.file));
  for (const file of files) {
    // No snippet for files that cannot be read.
    const source = await host.readFile(host.path.resolve(file)).catch(() => undefined);
    if (source !== undefined) {
      sources.set(file, source);
    }
  }
  return sources;
};

const reportDiagnostics = async (
  diagnostics: readonly Diagnostic[],
  color: boolean,
  io: ResolvedIo
): Promise<void> => {
  if (diagnostics.length === 0) return;

  const compacted = compactDiagnosticsForCli(diagnostics);
  const sources = color ? await loadSources(compacted.diagnostics, io.host) : new Map<string, string>();
  compacted.diagnostics.forEach((diagnostic) =>
    io.stderr(
      formatCliDiagnostic(diagnostic, {
        color,
        readSource: (file) => sources.get(file),
      })
    )
  );

  const summary = formatCompactionSummary(compacted);
  if (summary) {
    io.stderr(summary);
  }
};

function errorHandler(error: unknown) {
  if (error instanceof DiagnosticError) {
    error.diagnostics.forEach((diagnostic) =>
      console.error(formatCliDiagnostic(diagnostic, { color: false }))
    );
    process.exit(1);
  }

  console.error(error);
  process.exit(1);
}
