import { describe, expect, it } from "vitest";
import { describeIoError } from "../errors.js";
import { createMemoryCompilerHost } from "../memory-host.js";

describe("createMemoryCompilerHost", () => {
  it("resolves relative paths against its working directory", async () => {
    const host = createMemoryCompilerHost({ files: { "src/main.kin": "fn main() {}" }, cwd: "/proj" });
    expect(await host.readFile("/proj/src/main.kin")).toBe("fn main() {}");
    expect(await host.exists("src")).toBe(true);
    expect(host.path.resolve("out")).toBe("/proj/out");
  });

  it("refuses to write into a missing directory", async () => {
    const host = createMemoryCompilerHost();
    const failure = await host.writeFile("out/a.s", "").catch((error: unknown) => error);
    expect(describeIoError(failure)).toBe("no such file or directory");

    await host.makeDirectory("out");
    await host.writeFile("out/a.s", "");
    expect(host.listFiles()).toEqual(["/work/out/a.s"]);
  });

  it("removes whole directory trees", async () => {
    const host = createMemoryCompilerHost({
      files: { "build/a": "1", "build/nested/b": "2", "build-other/c": "3" },
    });
    await host.remove("build");
    expect(host.listFiles()).toEqual(["/work/build-other/c"]);
    expect(await host.exists("build/nested")).toBe(false);
  });
});

describe("describeIoError", () => {
  it("falls back to the error message for unknown codes", () => {
    expect(describeIoError(Object.assign(new Error("disk on fire"), { code: "EIO" }))).toBe(
      "disk on fire"
    );
    expect(describeIoError("plain")).toBe("plain");
  });
});
