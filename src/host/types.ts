export interface HostPathAdapter {
  resolve(...parts: string[]): string;
  join(...parts: string[]): string;
  relative(from: string, to: string): string;
  dirname(path: string): string;
  basename(path: string, ext?: string): string;
  extname(path: string): string;
  isAbsolute(path: string): boolean;
}

/** File access used by `compile` and `clean`. Relative paths resolve against `cwd()`. */
export interface CompilerHost {
  path: HostPathAdapter;
  cwd(): string;
  readFile(path: string): Promise<string>;
  writeFile(path: string, contents: string | Uint8Array): Promise<void>;
  /** Creates the directory and any missing parents. */
  makeDirectory(path: string): Promise<void>;
  /** Removes a file or a directory tree. Missing paths are ignored. */
  remove(path: string): Promise<void>;
  exists(path: string): Promise<boolean>;
}
