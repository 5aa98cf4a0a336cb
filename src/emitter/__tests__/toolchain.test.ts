import { describe, expect, it } from "vitest";
import { createSpawnToolchainRunner } from "../toolchain.js";

describe("createSpawnToolchainRunner", () => {
  it("reports a driver that does not exist", () => {
    const outcome = createSpawnToolchainRunner().run({
      command: "kindred-test-no-such-driver",
      args: [],
      timeoutMs: 1000,
    });
    expect(outcome).toEqual({ kind: "not-found" });
  });
});
