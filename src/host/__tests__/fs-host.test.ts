import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createFsCompilerHost } from "../fs-host.js";

describe("createFsCompilerHost", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "kindred-host-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes, reads and removes files", async () => {
    const host = createFsCompilerHost();
    const out = path.join(dir, "build", "nested");
    await host.makeDirectory(out);
    await host.writeFile(path.join(out, "a.s"), "\t.text\n");

    expect(await host.readFile(path.join(out, "a.s"))).toBe("\t.text\n");
    await host.remove(path.join(dir, "build"));
    expect(await host.exists(path.join(dir, "build"))).toBe(false);
  });

  it("ignores removal of a missing path", async () => {
    const host = createFsCompilerHost();
    await host.remove(path.join(dir, "missing"));
    expect(await host.exists(path.join(dir, "missing"))).toBe(false);
  });
});
