import { afterEach, describe, expect, it, vi } from "vitest";
import { formatDiagnostic } from "../diagnostics/index.js";
import { createFakeRunner } from "../emitter/__tests__/fake-runner.js";
import { createMemoryCompilerHost } from "../host/memory-host.js";
import { lowerSource } from "../ir/__tests__/lower-source.js";
import { printModule } from "../ir/printer.js";
import { clean, compile, emitIntermediate, type CompileOptions } from "../pipeline.js";
import { run } from "../run.js";

const hello = [
  "let greeting = \"hi\";",
  "fn main() -> Int {",
  "    print_str(greeting);",
  "    return 0;",
  "}",
].join("\n");

const setup = (source: string, extraFiles: Record<string, string> = {}) => {
  const host = createMemoryCompilerHost({ files: { "hello.kin": source, ...extraFiles } });
  const runner = createFakeRunner();
  const options: CompileOptions = { host, runner, toolchain: "cc", platform: "linux" };
  return { host, runner, options };
};

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("compile", () => {
  it("writes assembly and links it with the toolchain driver", async () => {
    const { host, runner, options } = setup(hello);
    const result = await compile("hello.kin", options);

    expect(result).toEqual({ success: true, outputPath: "/work/build/hello", diagnostics: [] });
    expect(host.listFiles()).toEqual(["/work/build/hello.s", "/work/hello.kin"]);
    expect(runner.invocations).toEqual([
      {
        command: "cc",
        args: ["-s", "-o", "/work/build/hello", "/work/build/hello.s"],
        timeoutMs: 60000,
      },
    ]);
  });

  it("keeps debug information in debug mode", async () => {
    const { runner, options } = setup(hello);
    await compile("hello.kin", { ...options, optimizationMode: "debug", outputDirectory: "out" });
    expect(runner.invocations[0]?.args).toEqual(["-g", "-o", "/work/out/hello", "/work/out/hello.s"]);
  });

  it("takes the toolchain driver from KINDRED_CC", async () => {
    vi.stubEnv("KINDRED_CC", "clang");
    const { runner, options } = setup(hello);
    await compile("hello.kin", { ...options, toolchain: undefined });
    expect(runner.invocations[0]?.command).toBe("clang");
  });

  it("writes nothing when the program has a type error", async () => {
    const { host, runner, options } = setup("var x: Int = true;\nfn main() {}");
    const result = await compile("hello.kin", options);

    expect(result.success).toBe(false);
    expect(result.diagnostics.map(formatDiagnostic)).toEqual([
      "hello.kin:1:14: TypeError: mismatched types: expected Int, found Bool",
    ]);
    expect(host.listFiles()).toEqual(["/work/hello.kin"]);
    expect(runner.invocations).toEqual([]);
  });

  it("reports every front-end error from one run", async () => {
    const { options } = setup(
      [
        "fn first() {",
        "    print_int(alpha);",
        "}",
        "fn second() {",
        "    print_int(beta);",
        "}",
        "fn main() {",
        "    let flag: Bool = 1;",
        "}",
      ].join("\n")
    );
    const result = await compile("hello.kin", options);
    expect(result.diagnostics.map(formatDiagnostic)).toEqual([
      "hello.kin:2:15: NameError: cannot find value 'alpha' in this scope",
      "hello.kin:5:15: NameError: cannot find value 'beta' in this scope",
      "hello.kin:8:22: TypeError: mismatched types: expected Bool, found Int",
    ]);
  });

  it("reports an unreadable source file", async () => {
    const { options } = setup(hello);
    const result = await compile("missing.kin", options);
    expect(result.success).toBe(false);
    expect(result.diagnostics.map(formatDiagnostic)).toEqual([
      "missing.kin:1:1: IoError: cannot read missing.kin: no such file or directory",
    ]);
  });

  it("requires an entry point", async () => {
    const { host, options } = setup("fn helper() {}");
    const result = await compile("hello.kin", options);
    expect(result.diagnostics.map(formatDiagnostic)).toEqual([
      "hello.kin:1:1: CodegenError: program has no `fn main()` entry point",
    ]);
    expect(host.listFiles()).toEqual(["/work/hello.kin"]);
  });

  it("removes the assembly and a stale executable when the driver fails", async () => {
    const { host, options } = setup(hello, { "build/hello": "stale" });
    const runner = createFakeRunner({ kind: "exited", exitCode: 1, stderr: "hello.s:3: bad\n" });
    const result = await compile("hello.kin", { ...options, runner });

    expect(result.diagnostics.map(formatDiagnostic)).toEqual([
      "hello.kin:1:1: BuildError: 'cc' exited with code 1\nhello.s:3: bad",
    ]);
    expect(host.listFiles()).toEqual(["/work/hello.kin"]);
  });

  it("reports a missing toolchain driver and leaves no artifact", async () => {
    const { host, options } = setup(hello);
    const result = await compile("hello.kin", {
      ...options,
      toolchain: "no-such-cc",
      runner: createFakeRunner({ kind: "not-found" }),
    });
    expect(result.diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      "toolchain driver 'no-such-cc' could not be found (set KINDRED_CC or pass --cc)",
    ]);
    expect(host.listFiles()).toEqual(["/work/hello.kin"]);
  });

  it("reports a toolchain timeout and leaves no artifact", async () => {
    const { host, options } = setup(hello);
    const result = await compile("hello.kin", {
      ...options,
      timeoutMs: 5,
      runner: createFakeRunner({ kind: "timed-out" }),
    });
    expect(result.diagnostics[0]).toMatchObject({
      code: "BL0003",
      variant: "ToolchainTimeout",
      message: "'cc' did not finish within 5ms",
    });
    expect(host.listFiles()).toEqual(["/work/hello.kin"]);
  });

  it("builds a runnable wasm module", async () => {
    const { host, runner, options } = setup(hello);
    const result = await compile("hello.kin", { ...options, target: "wasm" });

    expect(result).toEqual({ success: true, outputPath: "/work/build/hello.wasm", diagnostics: [] });
    expect(runner.invocations).toEqual([]);
    const binary = host.readBytes("/work/build/hello.wasm");
    expect(binary).toBeDefined();
    if (!binary) return;

    const output: string[] = [];
    expect(run(binary, { writeLine: (line) => output.push(line) })).toBe(0);
    expect(output).toEqual(["hi"]);
  });

  it("writes the wasm text form in debug mode", async () => {
    const { host, options } = setup(hello);
    await compile("hello.kin", { ...options, target: "wasm", optimizationMode: "debug" });
    expect(host.listFiles()).toEqual([
      "/work/build/hello.wasm",
      "/work/build/hello.wat",
      "/work/hello.kin",
    ]);
  });
});

describe("emitIntermediate", () => {
  it("prints one token per line with its position", async () => {
    const { options } = setup("x = 1 + 2;");
    const result = await emitIntermediate("hello.kin", "tokens", options);
    expect(result.success).toBe(true);

    const lines = result.output?.split("\n") ?? [];
    expect(lines.slice(0, 6)).toEqual([
      "1:1 Identifier(x)",
      "1:3 Assign",
      "1:5 Int(1)",
      "1:7 Plus",
      "1:9 Int(2)",
      "1:10 Semicolon",
    ]);
    expect(lines).toHaveLength(7);
  });

  it("still prints tokens when the lexer reports errors", async () => {
    const { options } = setup("1 @ 2");
    const result = await emitIntermediate("hello.kin", "tokens", options);
    expect(result.success).toBe(false);
    expect(result.output?.split("\n")[1]).toBe("1:3 Error(@)");
    expect(result.diagnostics.map(formatDiagnostic)).toEqual([
      "hello.kin:1:3: LexError: unexpected character '@'",
    ]);
  });

  it("prints the lowered program", async () => {
    const { options } = setup(hello);
    const result = await emitIntermediate("hello.kin", "ir", options);
    expect(result).toEqual({
      success: true,
      output: printModule(lowerSource(hello)),
      diagnostics: [],
    });
  });

  it("prints assembly without invoking the toolchain", async () => {
    const { host, runner, options } = setup(hello);
    const result = await emitIntermediate("hello.kin", "asm", options);

    expect(result.success).toBe(true);
    expect(result.output).toContain("kin_fn_main:");
    expect(runner.invocations).toEqual([]);
    expect(host.listFiles()).toEqual(["/work/hello.kin"]);
  });

  it("serializes the syntax tree with bigint literals", async () => {
    const { options } = setup("let n = 5;");
    const result = await emitIntermediate("hello.kin", "ast", options);
    expect(result.success).toBe(true);
    expect(result.output).toContain('"5n"');
  });

  it("stops at front-end errors", async () => {
    const { options } = setup("fn main() { print_int(true); }");
    const result = await emitIntermediate("hello.kin", "ir", options);
    expect(result.success).toBe(false);
    expect(result.output).toBeUndefined();
  });
});

describe("clean", () => {
  it("removes the build directory and is idempotent", async () => {
    const { host, options } = setup(hello);
    await compile("hello.kin", options);

    expect(await clean("build", { host })).toEqual({ success: true, removed: true });
    expect(host.listFiles()).toEqual(["/work/hello.kin"]);
    expect(await clean("build", { host })).toEqual({ success: true, removed: false });
  });

  it("refuses to remove a directory holding the working directory", async () => {
    const { host } = setup(hello);
    const result = await clean("..", { host });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      "refusing to remove /: it contains the working directory",
    ]);
    expect(host.listFiles()).toEqual(["/work/hello.kin"]);
  });
});
