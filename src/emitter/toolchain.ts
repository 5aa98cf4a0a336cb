import { spawnSync } from "node:child_process";

export type ToolchainInvocation = {
  command: string;
  args: readonly string[];
  timeoutMs: number;
};

export type ToolchainOutcome =
  | { kind: "exited"; exitCode: number; stderr: string }
  | { kind: "not-found" }
  | { kind: "timed-out" };

/** Runs the external assembler/linker driver and waits for it to finish. */
export interface ToolchainRunner {
  run(invocation: ToolchainInvocation): ToolchainOutcome;
}

const errorCode = (error: Error): string | undefined =>
  "code" in error && typeof error.code === "string" ? error.code : undefined;

export const createSpawnToolchainRunner = (): ToolchainRunner => ({
  run: ({ command, args, timeoutMs }) => {
    const result = spawnSync(command, args, {
      encoding: "utf8",
      timeout: timeoutMs,
      stdio: ["ignore", "pipe", "pipe"],
    });

    if (result.error) {
      const code = errorCode(result.error);
      if (code === "ENOENT") return { kind: "not-found" };
      if (code === "ETIMEDOUT") return { kind: "timed-out" };
      return { kind: "exited", exitCode: -1, stderr: result.error.message };
    }

    // A driver killed by a signal has no status.
    return {
      kind: "exited",
      exitCode: result.status ?? -1,
      stderr: result.stderr ?? "",
    };
  },
});
