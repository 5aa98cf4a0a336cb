export { ENTRY_NAME, findEntryPoint } from "./entry.js";
export {
  generateWasm,
  WASM_ENTRY_EXPORT,
  WASM_IMPORT_MODULE,
  WASM_MEMORY_EXPORT,
  type WasmOptions,
  type WasmOutput,
} from "./wasm.js";
export { generateAssembly, type AssemblyOptions, type NativePlatform } from "./x86-64.js";
