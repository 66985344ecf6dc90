import { types } from "util";

type FileNode = {
  type: "file";
  content: Buffer;
  createdAt?: Date;
  updatedAt?: Date;
  accessedAt?: Date;
};

type DirectoryNode = {
  type: "directory";
  createdAt?: Date;
  updatedAt?: Date;
  accessedAt?: Date;
};

export type FileSystemNode = FileNode | DirectoryNode;

/**
 * Initial content of the in-memory file system: absolute paths mapped to nodes.
 * Parent directories of every entry are created implicitly.
 */
export type FileSystemTree = Record<string, FileSystemNode>;

export type FileStat = {
  isFile: () => boolean;
  isDirectory: () => boolean;
  isSymbolicLink: () => boolean;
  size: number;
  createdAt: Date;
  updatedAt: Date;
  accessedAt: Date;
};

/**
 * Synchronous file system used by the operation layer.
 *
 * Every method accepting a path resolves it against `root`. Failures are
 * thrown as `NodeJS.ErrnoException` carrying the errno `code` of the host
 * (`ENOENT`, `ENOTEMPTY`, `EROFS`, ...), whatever the backend.
 */
export type VirtualFileSystem = {
  root: string;
  resolve(...path: string[]): string;
  /**
   * Returns the canonical absolute form of `path`: the longest existing prefix
   * has its symlinks resolved, the missing remainder is appended as is.
   */
  realpath(path: string): string;
  exists(path: string): boolean;
  readFile(path: string): Buffer;
  writeFile(path: string, content: Buffer | string): void;
  readdir: (path: string) => string[];
  /** Follows symlinks. */
  stat: (path: string) => FileStat;
  /** Does not follow symlinks. */
  lstat: (path: string) => FileStat;
  mkdir(path: string, options: { recursive: boolean }): void;
  unlink(path: string): void;
  /** Removes an empty directory. */
  rmdir(path: string): void;
  /** Removes a file or a whole directory tree. */
  remove(path: string): void;
  rename(from: string, to: string): void;
  /** Copies a file, replacing `to`, preserving timestamps and mode. */
  copyFile(from: string, to: string): void;
  /** Moves a file, across devices if needed. `to` must not exist. */
  move(from: string, to: string): void;
};

/**
 * Creates an error shaped like the ones thrown by the `fs` module.
 */
export function makeErrnoError(
  code: string,
  syscall: string,
  filePath: string,
  description: string,
): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(
    `${code}: ${description}, ${syscall} '${filePath}'`,
  );
  error.code = code;
  error.syscall = syscall;
  error.path = filePath;
  return error;
}

/**
 * Returns true if `error` carries an errno code.
 */
export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return (
    types.isNativeError(error) && typeof Reflect.get(error, "code") === "string"
  );
}
