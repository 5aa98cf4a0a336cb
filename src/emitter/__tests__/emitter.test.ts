import { describe, expect, it } from "vitest";
import {
  DiagnosticEmitter,
  DiagnosticError,
  formatDiagnostic,
} from "../../diagnostics/index.js";
import { createMemoryCompilerHost } from "../../host/memory-host.js";
import type { CompilerHost } from "../../host/types.js";
import { emitNative, emitWasm, toolchainArgs, type EmitContext } from "../emitter.js";
import { createFakeRunner } from "./fake-runner.js";

const context = (host: CompilerHost): EmitContext => ({
  host,
  emitter: new DiagnosticEmitter(),
  sourcePath: "prog.kin",
  outputDirectory: "build",
  stem: "prog",
  mode: "release",
});

const captureDiagnostics = async (run: () => Promise<unknown>) => {
  try {
    await run();
  } catch (error) {
    if (error instanceof DiagnosticError) {
      return error.diagnostics.map(formatDiagnostic);
    }
    throw error;
  }
  return [];
};

describe("toolchainArgs", () => {
  const paths = { assemblyPath: "b/p.s", executablePath: "b/p" };

  it("strips release executables on linux", () => {
    expect(toolchainArgs({ ...paths, mode: "release", platform: "linux" })).toEqual([
      "-s",
      "-o",
      "b/p",
      "b/p.s",
    ]);
  });

  it("selects x86-64 on darwin", () => {
    expect(toolchainArgs({ ...paths, mode: "release", platform: "darwin" })).toEqual([
      "-arch",
      "x86_64",
      "-o",
      "b/p",
      "b/p.s",
    ]);
    expect(toolchainArgs({ ...paths, mode: "debug", platform: "darwin" })).toEqual([
      "-arch",
      "x86_64",
      "-g",
      "-o",
      "b/p",
      "b/p.s",
    ]);
  });
});

describe("emitNative", () => {
  it("passes the timeout to the runner", async () => {
    const host = createMemoryCompilerHost();
    const runner = createFakeRunner();
    const path = await emitNative("\t.text\n", {
      ...context(host),
      runner,
      toolchain: "gcc",
      timeoutMs: 1234,
      platform: "linux",
    });

    expect(path).toBe("/work/build/prog");
    expect(host.readBytes("/work/build/prog.s")).toEqual(new TextEncoder().encode("\t.text\n"));
    expect(runner.invocations[0]).toMatchObject({ command: "gcc", timeoutMs: 1234 });
  });

  it("reports a driver killed by a signal", async () => {
    const host = createMemoryCompilerHost();
    const diagnostics = await captureDiagnostics(() =>
      emitNative("", {
        ...context(host),
        runner: createFakeRunner({ kind: "exited", exitCode: -1, stderr: "" }),
        toolchain: "cc",
        timeoutMs: 10,
        platform: "linux",
      })
    );
    expect(diagnostics).toEqual(["prog.kin:1:1: BuildError: 'cc' exited with code -1"]);
  });
});

describe("emitWasm", () => {
  it("skips the text form in release mode", async () => {
    const host = createMemoryCompilerHost();
    await emitWasm({ binary: new Uint8Array([0, 97, 115, 109]), text: "(module)" }, context(host));
    expect(host.listFiles()).toEqual(["/work/build/prog.wasm"]);
  });

  it("reports an output directory that cannot be created", async () => {
    const host: CompilerHost = {
      ...createMemoryCompilerHost(),
      makeDirectory: async () => {
        throw Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
      },
    };
    const diagnostics = await captureDiagnostics(() =>
      emitWasm({ binary: new Uint8Array(), text: "" }, context(host))
    );
    expect(diagnostics).toEqual([
      "prog.kin:1:1: IoError: cannot write /work/build: permission denied",
    ]);
  });
});
