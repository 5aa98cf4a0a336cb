import { fileSpan, type DiagnosticEmitter } from "../diagnostics/index.js";
import { describeIoError } from "../host/errors.js";
import type { CompilerHost } from "../host/types.js";
import type { NativePlatform } from "../codegen/x86-64.js";
import type { ToolchainRunner } from "./toolchain.js";

export type OptimizationMode = "debug" | "release";

export type EmitContext = {
  host: CompilerHost;
  emitter: DiagnosticEmitter;
  /** The source file, for diagnostics that have no better location. */
  sourcePath: string;
  outputDirectory: string;
  /** File name of the artifacts, without extension. */
  stem: string;
  mode: OptimizationMode;
};

export type NativeEmitContext = EmitContext & {
  runner: ToolchainRunner;
  toolchain: string;
  timeoutMs: number;
  platform: NativePlatform;
};

const writeArtifact = async (
  ctx: EmitContext,
  file: string,
  contents: string | Uint8Array
): Promise<void> => {
  try {
    await ctx.host.writeFile(file, contents);
  } catch (error) {
    ctx.emitter.error({
      code: "IO0002",
      params: { kind: "write-failed", path: file, reason: describeIoError(error) },
      span: fileSpan(ctx.sourcePath),
    });
  }
};

const prepareOutputDirectory = async (ctx: EmitContext): Promise<string> => {
  const dir = ctx.host.path.resolve(ctx.outputDirectory);
  try {
    await ctx.host.makeDirectory(dir);
  } catch (error) {
    ctx.emitter.error({
      code: "IO0002",
      params: { kind: "write-failed", path: dir, reason: describeIoError(error) },
      span: fileSpan(ctx.sourcePath),
    });
  }
  return dir;
};

export const toolchainArgs = ({
  assemblyPath,
  executablePath,
  mode,
  platform,
}: {
  assemblyPath: string;
  executablePath: string;
  mode: OptimizationMode;
  platform: NativePlatform;
}): string[] => [
  ...(platform === "darwin" ? ["-arch", "x86_64"] : []),
  ...(mode === "debug" ? ["-g"] : platform === "linux" ? ["-s"] : []),
  "-o",
  executablePath,
  assemblyPath,
];

/**
 * Writes `<out>/<stem>.s` and links it into `<out>/<stem>` with the C
 * compiler driver. Neither file is left behind when the driver fails.
 */
export const emitNative = async (assembly: string, ctx: NativeEmitContext): Promise<string> => {
  const dir = await prepareOutputDirectory(ctx);
  const assemblyPath = ctx.host.path.join(dir, `${ctx.stem}.s`);
  const executablePath = ctx.host.path.join(dir, ctx.stem);
  await writeArtifact(ctx, assemblyPath, assembly);

  const outcome = ctx.runner.run({
    command: ctx.toolchain,
    args: toolchainArgs({ assemblyPath, executablePath, mode: ctx.mode, platform: ctx.platform }),
    timeoutMs: ctx.timeoutMs,
  });
  if (outcome.kind === "exited" && outcome.exitCode === 0) {
    return executablePath;
  }

  await ctx.host.remove(executablePath);
  await ctx.host.remove(assemblyPath);
  const span = fileSpan(ctx.sourcePath);
  switch (outcome.kind) {
    case "not-found":
      return ctx.emitter.error({
        code: "BL0002",
        params: { kind: "toolchain-not-found", command: ctx.toolchain },
        span,
      });
    case "timed-out":
      return ctx.emitter.error({
        code: "BL0003",
        params: { kind: "toolchain-timeout", command: ctx.toolchain, timeoutMs: ctx.timeoutMs },
        span,
      });
    case "exited":
      return ctx.emitter.error({
        code: "BL0001",
        params: {
          kind: "toolchain-failure",
          command: ctx.toolchain,
          exitCode: outcome.exitCode,
          stderr: outcome.stderr,
        },
        span,
      });
  }
};

/** Writes `<out>/<stem>.wasm`, plus its text form in debug mode. */
export const emitWasm = async (
  output: { binary: Uint8Array; text: string },
  ctx: EmitContext
): Promise<string> => {
  const dir = await prepareOutputDirectory(ctx);
  const wasmPath = ctx.host.path.join(dir, `${ctx.stem}.wasm`);
  await writeArtifact(ctx, wasmPath, output.binary);
  if (ctx.mode === "debug") {
    await writeArtifact(ctx, ctx.host.path.join(dir, `${ctx.stem}.wat`), output.text);
  }
  return wasmPath;
};
