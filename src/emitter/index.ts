export { removeBuildDirectory } from "./clean.js";
export {
  emitNative,
  emitWasm,
  toolchainArgs,
  type EmitContext,
  type NativeEmitContext,
  type OptimizationMode,
} from "./emitter.js";
export {
  createSpawnToolchainRunner,
  type ToolchainInvocation,
  type ToolchainOutcome,
  type ToolchainRunner,
} from "./toolchain.js";
