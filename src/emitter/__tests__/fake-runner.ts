import type {
  ToolchainInvocation,
  ToolchainOutcome,
  ToolchainRunner,
} from "../toolchain.js";

export type FakeRunner = ToolchainRunner & {
  invocations: ToolchainInvocation[];
};

/** Records every invocation and answers with `outcome`. */
export const createFakeRunner = (
  outcome: ToolchainOutcome = { kind: "exited", exitCode: 0, stderr: "" }
): FakeRunner => {
  const invocations: ToolchainInvocation[] = [];
  return {
    invocations,
    run: (invocation) => {
      invocations.push(invocation);
      return outcome;
    },
  };
};
