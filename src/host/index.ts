export { createFsCompilerHost, createNodePathAdapter } from "./fs-host.js";
export { createMemoryCompilerHost, type MemoryCompilerHost } from "./memory-host.js";
export type { CompilerHost, HostPathAdapter } from "./types.js";
