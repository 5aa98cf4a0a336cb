import { fileSpan, type DiagnosticEmitter } from "../diagnostics/index.js";
import { formatSignature, type IrFunction, type IrModule } from "../ir/types.js";

export const ENTRY_NAME = "main";

/**
 * Finds `fn main()` and checks it can serve as the process entry point:
 * no parameters, returning Int (the exit status) or Unit (exit status 0).
 */
export const findEntryPoint = (
  module: IrModule,
  emitter: DiagnosticEmitter
): IrFunction => {
  const entry = module.functions.find((fn) => fn.name === ENTRY_NAME);
  if (!entry) {
    return emitter.error({
      code: "CG0001",
      params: { kind: "missing-entry" },
      span: fileSpan(module.file),
    });
  }

  if (entry.paramCount > 0 || (entry.returnType !== "i64" && entry.returnType !== "unit")) {
    return emitter.error({
      code: "CG0002",
      params: { kind: "invalid-entry-signature", found: formatSignature(entry) },
      span: entry.span ?? fileSpan(module.file),
    });
  }

  return entry;
};
