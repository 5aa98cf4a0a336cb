import { describe, expect, it } from "vitest";
import { createFakeRunner } from "../../emitter/__tests__/fake-runner.js";
import { createMemoryCompilerHost } from "../../host/memory-host.js";
import type { MakeConfig } from "../config/types.js";
import { runConfig } from "../exec.js";

const makeConfig = (overrides: Partial<MakeConfig> = {}): MakeConfig => ({
  command: "make",
  source: "hello.kin",
  mode: "release",
  outDir: "build",
  target: "native",
  cc: "cc",
  timeoutMs: 60000,
  color: false,
  ...overrides,
});

const setup = (source: string) => {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const host = createMemoryCompilerHost({ files: { "hello.kin": source } });
  const io = {
    host,
    runner: createFakeRunner(),
    stdout: (text: string) => stdout.push(text),
    stderr: (text: string) => stderr.push(text),
  };
  return { host, io, stdout, stderr };
};

describe("runConfig", () => {
  it("builds and reports the artifact", async () => {
    const { io, stdout, stderr } = setup("fn main() {}");
    expect(await runConfig(makeConfig(), io)).toBe(0);
    expect(stdout).toEqual(["built /work/build/hello"]);
    expect(stderr).toEqual([]);
  });

  it("prints diagnostics and fails on a type error", async () => {
    const { io, stdout, stderr } = setup("var x: Int = true;\nfn main() {}");
    expect(await runConfig(makeConfig(), io)).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual([
      "hello.kin:1:14: TypeError: mismatched types: expected Int, found Bool",
    ]);
  });

  it("prints every use of an undefined name", async () => {
    const body = Array.from({ length: 4 }, () => "    print_int(ghost);");
    const { io, stderr } = setup(["fn main() {", ...body, "}"].join("\n"));
    expect(await runConfig(makeConfig(), io)).toBe(1);
    expect(stderr).toEqual(
      [2, 3, 4, 5].map(
        (line) => `hello.kin:${line}:15: NameError: cannot find value 'ghost' in this scope`
      )
    );
  });

  it("adds a source snippet when color is on", async () => {
    const { io, stderr } = setup("var x: Int = true;\nfn main() {}");
    await runConfig(makeConfig({ color: true }), io);
    expect(stderr[0]?.split("\n")[2]).toBe("1 | var x: Int = true;");
  });

  it("prints an intermediate form instead of building", async () => {
    const { host, io, stdout } = setup("fn main() {}");
    expect(await runConfig(makeConfig({ emit: "tokens" }), io)).toBe(0);
    expect(stdout[0]?.split("\n").slice(0, 2)).toEqual(["1:1 Fn", "1:4 Identifier(main)"]);
    expect(host.listFiles()).toEqual(["/work/hello.kin"]);
  });

  it("cleans the build directory", async () => {
    const { io, stdout } = setup("fn main() {}");
    await runConfig(makeConfig(), io);

    expect(await runConfig({ command: "clean", outDir: "build" }, io)).toBe(0);
    expect(await runConfig({ command: "clean", outDir: "build" }, io)).toBe(0);
    expect(stdout.slice(1)).toEqual(["removed build", "nothing to clean in build"]);
  });

  it("fails to clean a directory above the working directory", async () => {
    const { io, stderr } = setup("fn main() {}");
    expect(await runConfig({ command: "clean", outDir: "/" }, io)).toBe(1);
    expect(stderr).toEqual([
      "/:1:1: IoError: refusing to remove /: it contains the working directory",
    ]);
  });
});
