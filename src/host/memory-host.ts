import path from "node:path";
import type { CompilerHost, HostPathAdapter } from "./types.js";

export type MemoryCompilerHost = CompilerHost & {
  /** Every file currently stored, sorted by path. */
  listFiles(): string[];
  readBytes(path: string): Uint8Array | undefined;
};

const ioError = (code: string, message: string, target: string) =>
  Object.assign(new Error(`${code}: ${message}, '${target}'`), { code });

const createPosixPathAdapter = (cwd: string): HostPathAdapter => ({
  resolve: (...parts: string[]) => path.posix.resolve(cwd, ...parts),
  join: path.posix.join,
  relative: path.posix.relative,
  dirname: path.posix.dirname,
  basename: path.posix.basename,
  extname: path.posix.extname,
  isAbsolute: path.posix.isAbsolute,
});

/** In-process host over POSIX paths, for tests. */
export const createMemoryCompilerHost = ({
  files = {},
  cwd = "/work",
}: {
  files?: Record<string, string>;
  cwd?: string;
} = {}): MemoryCompilerHost => {
  const pathAdapter = createPosixPathAdapter(cwd);
  const stored = new Map<string, string | Uint8Array>();
  const directories = new Set<string>();

  const registerDirectory = (dir: string) => {
    let current = dir;
    while (!directories.has(current)) {
      directories.add(current);
      const parent = pathAdapter.dirname(current);
      if (parent === current) break;
      current = parent;
    }
  };

  const isWithin = (candidate: string, root: string) =>
    candidate === root || candidate.startsWith(root === "/" ? root : `${root}/`);

  registerDirectory(pathAdapter.resolve(cwd));
  Object.entries(files).forEach(([file, contents]) => {
    const full = pathAdapter.resolve(file);
    stored.set(full, contents);
    registerDirectory(pathAdapter.dirname(full));
  });

  return {
    path: pathAdapter,
    cwd: () => cwd,
    readFile: async (file: string) => {
      const full = pathAdapter.resolve(file);
      const contents = stored.get(full);
      if (contents === undefined) {
        throw ioError("ENOENT", "no such file or directory", full);
      }
      return typeof contents === "string" ? contents : new TextDecoder().decode(contents);
    },
    writeFile: async (file: string, contents: string | Uint8Array) => {
      const full = pathAdapter.resolve(file);
      if (!directories.has(pathAdapter.dirname(full))) {
        throw ioError("ENOENT", "no such file or directory", full);
      }
      stored.set(full, contents);
    },
    makeDirectory: async (dir: string) => {
      registerDirectory(pathAdapter.resolve(dir));
    },
    remove: async (target: string) => {
      const full = pathAdapter.resolve(target);
      [...stored.keys()].filter((file) => isWithin(file, full)).forEach((file) => stored.delete(file));
      [...directories].filter((dir) => isWithin(dir, full)).forEach((dir) => directories.delete(dir));
    },
    exists: async (target: string) => {
      const full = pathAdapter.resolve(target);
      return stored.has(full) || directories.has(full);
    },
    listFiles: () => [...stored.keys()].sort(),
    readBytes: (file: string) => {
      const contents = stored.get(pathAdapter.resolve(file));
      if (contents === undefined) return undefined;
      return typeof contents === "string" ? new TextEncoder().encode(contents) : contents;
    },
  };
};
