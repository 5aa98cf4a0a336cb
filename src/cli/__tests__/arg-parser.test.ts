import { describe, expect, it } from "vitest";
import { getConfigFromCli } from "../config/arg-parser.js";

const runWithArgv = (argv: string[]) => {
  const originalArgv = process.argv;
  process.argv = argv;
  try {
    return getConfigFromCli();
  } finally {
    process.argv = originalArgv;
  }
};

describe("getConfigFromCli", () => {
  it("defaults make to main.kin, a release build and the native target", () => {
    expect(runWithArgv(["node", "kindred", "make"])).toEqual({
      command: "make",
      source: "main.kin",
      mode: "release",
      outDir: "build",
      target: "native",
      cc: undefined,
      timeoutMs: 60000,
      emit: undefined,
      color: true,
    });
  });

  it("reads every make option", () => {
    const config = runWithArgv([
      "node",
      "kindred",
      "make",
      "prog.kin",
      "-m",
      "debug",
      "-o",
      "out",
      "-t",
      "wasm",
      "--cc",
      "clang",
      "--timeout",
      "500",
      "--emit",
      "ir",
      "--no-color",
    ]);
    expect(config).toEqual({
      command: "make",
      source: "prog.kin",
      mode: "debug",
      outDir: "out",
      target: "wasm",
      cc: "clang",
      timeoutMs: 500,
      emit: "ir",
      color: false,
    });
  });

  it("accepts long option names and mixed case choices", () => {
    const config = runWithArgv([
      "node",
      "kindred",
      "make",
      "--mode",
      "DEBUG",
      "--out-dir",
      "target",
      "--target",
      "Native",
    ]);
    expect(config).toMatchObject({ mode: "debug", outDir: "target", target: "native" });
  });

  it("parses clean with its build directory", () => {
    expect(runWithArgv(["node", "kindred", "clean"])).toEqual({
      command: "clean",
      outDir: "build",
    });
    expect(runWithArgv(["node", "kindred", "clean", "--out-dir", "dist"])).toEqual({
      command: "clean",
      outDir: "dist",
    });
  });
});
