import { mkdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import type { CompilerHost, HostPathAdapter } from "./types.js";

export const createNodePathAdapter = (): HostPathAdapter => ({
  resolve: path.resolve,
  join: path.join,
  relative: path.relative,
  dirname: path.dirname,
  basename: path.basename,
  extname: path.extname,
  isAbsolute: path.isAbsolute,
});

export const createFsCompilerHost = (): CompilerHost => ({
  path: createNodePathAdapter(),
  cwd: () => process.cwd(),
  readFile: (file: string) => readFile(file, "utf8"),
  writeFile: (file: string, contents: string | Uint8Array) => writeFile(file, contents),
  makeDirectory: async (dir: string) => {
    await mkdir(dir, { recursive: true });
  },
  remove: (target: string) => rm(target, { recursive: true, force: true }),
  exists: (target: string) =>
    stat(target)
      .then(() => true)
      .catch(() => false),
});
