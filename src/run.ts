import {
  WASM_ENTRY_EXPORT,
  WASM_IMPORT_MODULE,
  WASM_MEMORY_EXPORT,
} from "./codegen/wasm.js";

export type RunOptions = {
  /** Receives each printed line, without its newline. */
  writeLine?: (line: string) => void;
};

const readCString = (memory: WebAssembly.Memory, address: number): string => {
  const bytes = new Uint8Array(memory.buffer);
  let end = address;
  while (end < bytes.length && bytes[end] !== 0) end += 1;
  return new TextDecoder().decode(bytes.subarray(address, end));
};

/**
 * Instantiates a module produced by the wasm target, supplies the print
 * builtins and runs `_start`. Returns the program's exit status.
 */
export function run(binary: Uint8Array, { writeLine = console.log }: RunOptions = {}): number {
  const compiled = new WebAssembly.Module(new Uint8Array(binary));
  let memory: WebAssembly.Memory | undefined;

  const instance = new WebAssembly.Instance(compiled, {
    [WASM_IMPORT_MODULE]: {
      print_int: (value: bigint) => writeLine(value.toString()),
      print_bool: (value: number) => writeLine(value ? "true" : "false"),
      print_str: (address: number) => {
        if (!memory) throw new Error("module memory is not available");
        writeLine(readCString(memory, address));
      },
    },
  });

  const exportedMemory = instance.exports[WASM_MEMORY_EXPORT];
  if (exportedMemory instanceof WebAssembly.Memory) memory = exportedMemory;

  const start = instance.exports[WASM_ENTRY_EXPORT];
  if (typeof start !== "function") {
    throw new Error(`module does not export ${WASM_ENTRY_EXPORT}`);
  }
  return Number(start());
}
