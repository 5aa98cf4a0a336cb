import type { CompileTarget, EmitForm } from "../../pipeline.js";
import type { OptimizationMode } from "../../emitter/index.js";

export type MakeConfig = {
  command: "make";
  /** Source file to compile (default: main.kin) */
  source: string;
  mode: OptimizationMode;
  outDir: string;
  target: CompileTarget;
  /** Toolchain driver override; falls back to KINDRED_CC, then cc */
  cc?: string;
  timeoutMs: number;
  /** Print this intermediate form instead of building */
  emit?: EmitForm;
  color: boolean;
};

export type CleanConfig = {
  command: "clean";
  outDir: string;
};

export type KindredConfig = MakeConfig | CleanConfig;
