import { fileSpan, type DiagnosticEmitter } from "../diagnostics/index.js";
import { describeIoError } from "../host/errors.js";
import type { CompilerHost } from "../host/types.js";

const contains = (host: CompilerHost, dir: string, target: string): boolean => {
  const relative = host.path.relative(dir, target);
  if (relative === "") return true;
  return relative.split(/[\\/]/)[0] !== ".." && !host.path.isAbsolute(relative);
};

/**
 * Removes a build directory. A missing directory is not an error. A
 * directory that holds the working directory is never removed.
 */
export const removeBuildDirectory = async (
  host: CompilerHost,
  buildDir: string,
  emitter: DiagnosticEmitter
): Promise<boolean> => {
  const dir = host.path.resolve(buildDir);
  if (!(await host.exists(dir))) return false;

  if (contains(host, dir, host.path.resolve(host.cwd()))) {
    return emitter.error({
      code: "IO0003",
      params: { kind: "unsafe-clean", path: dir },
      span: fileSpan(dir),
    });
  }

  try {
    await host.remove(dir);
  } catch (error) {
    emitter.error({
      code: "IO0003",
      params: { kind: "remove-failed", path: dir, reason: describeIoError(error) },
      span: fileSpan(dir),
    });
  }
  return true;
};
