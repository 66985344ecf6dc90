import {
  FileStat,
  FileSystemNode,
  FileSystemTree,
  VirtualFileSystem,
  makeErrnoError,
} from "./virtualFileSystem";
import path from "path";

/**
 * Creates an in-memory virtual file system holding files and directories.
 * It does not interact with the host file system and has no symlinks.
 *
 * @param root - The root directory for the virtual file system.
 * @param fileSystemTree - The initial structure of the in-memory file system. Default is an empty object.
 * @param readonly - If true, prevents write operations. Default is false.
 * @returns A VirtualFileSystem instance for managing in-memory files.
 */
export function createVirtualFileSystem(
  root: string,
  fileSystemTree: FileSystemTree = {},
  readonly: boolean = false,
): VirtualFileSystem {
  const normalizedRoot = path.resolve(root);
  const memoryFS = new Map<string, FileSystemNode>();

  const addDirectoryChain = (dirPath: string): void => {
    let current = dirPath;
    while (!memoryFS.has(current)) {
      memoryFS.set(current, { type: "directory", createdAt: new Date() });
      const parent = path.dirname(current);
      if (parent === current) break;
      current = parent;
    }
  };

  addDirectoryChain(normalizedRoot);
  Object.entries(fileSystemTree).forEach(([entryPath, node]) => {
    const resolvedPath = path.resolve(normalizedRoot, entryPath);
    addDirectoryChain(path.dirname(resolvedPath));
    memoryFS.set(resolvedPath, { ...node });
  });

  const isDescendant = (candidate: string, ancestor: string): boolean =>
    candidate.startsWith(
      ancestor.endsWith(path.sep) ? ancestor : ancestor + path.sep,
    );

  const childrenOf = (dirPath: string): string[] =>
    [...memoryFS.keys()].filter(
      (key) => key !== dirPath && path.dirname(key) === dirPath,
    );

  const ensureWritable = (syscall: string, filePath: string): void => {
    if (readonly) {
      throw makeErrnoError(
        "EROFS",
        syscall,
        filePath,
        "the file system is in readonly mode",
      );
    }
  };

  const getNode = (syscall: string, filePath: string): FileSystemNode => {
    const node = memoryFS.get(filePath);
    if (node === undefined) {
      throw makeErrnoError(
        "ENOENT",
        syscall,
        filePath,
        "no such file or directory",
      );
    }
    return node;
  };

  const requireParentDirectory = (syscall: string, filePath: string): void => {
    const parent = memoryFS.get(path.dirname(filePath));
    if (parent === undefined) {
      throw makeErrnoError(
        "ENOENT",
        syscall,
        filePath,
        "no such file or directory",
      );
    }
    if (parent.type !== "directory") {
      throw makeErrnoError("ENOTDIR", syscall, filePath, "not a directory");
    }
  };

  const toFileStat = (node: FileSystemNode): FileStat => {
    const createdAt = node.createdAt ?? new Date();
    return {
      isFile: () => node.type === "file",
      isDirectory: () => node.type === "directory",
      isSymbolicLink: () => false,
      size: node.type === "file" ? node.content.length : 0,
      createdAt,
      updatedAt: node.updatedAt ?? createdAt,
      accessedAt: node.accessedAt ?? createdAt,
    };
  };

  /**
   * Moves `from` with its whole subtree to `to`.
   */
  const relocate = (from: string, to: string): void => {
    const moved = [...memoryFS.entries()].filter(
      ([key]) => key === from || isDescendant(key, from),
    );
    moved.forEach(([key]) => memoryFS.delete(key));
    moved.forEach(([key, node]) =>
      memoryFS.set(to + key.slice(from.length), node),
    );
  };

  return {
    /**
     * The normalized root directory for the virtual file system.
     */
    root: normalizedRoot,

    resolve(...filePath: string[]): string {
      return path.normalize(path.resolve(normalizedRoot, ...filePath));
    },

    realpath(filePath: string): string {
      return this.resolve(filePath);
    },

    exists(filePath: string): boolean {
      return memoryFS.has(this.resolve(filePath));
    },

    readFile(filePath: string): Buffer {
      const resolvedPath = this.resolve(filePath);
      const node = getNode("open", resolvedPath);
      if (node.type !== "file") {
        throw makeErrnoError(
          "EISDIR",
          "read",
          resolvedPath,
          "illegal operation on a directory",
        );
      }
      node.accessedAt = new Date();
      return Buffer.from(node.content);
    },

    /**
     * Writes content to a file. The parent directory must exist.
     */
    writeFile(filePath: string, content: Buffer | string): void {
      const resolvedPath = this.resolve(filePath);
      ensureWritable("open", resolvedPath);
      requireParentDirectory("open", resolvedPath);
      const existing = memoryFS.get(resolvedPath);
      if (existing?.type === "directory") {
        throw makeErrnoError(
          "EISDIR",
          "open",
          resolvedPath,
          "illegal operation on a directory",
        );
      }
      const now = new Date();
      memoryFS.set(resolvedPath, {
        type: "file",
        content: typeof content === "string" ? Buffer.from(content) : content,
        createdAt: existing?.createdAt ?? now,
        updatedAt: now,
        accessedAt: now,
      });
    },

    readdir(dirPath: string): string[] {
      const resolvedPath = this.resolve(dirPath);
      const node = getNode("scandir", resolvedPath);
      if (node.type !== "directory") {
        throw makeErrnoError(
          "ENOTDIR",
          "scandir",
          resolvedPath,
          "not a directory",
        );
      }
      return childrenOf(resolvedPath)
        .map((child) => path.basename(child))
        .sort();
    },

    stat(filePath: string): FileStat {
      return toFileStat(getNode("stat", this.resolve(filePath)));
    },

    lstat(filePath: string): FileStat {
      return toFileStat(getNode("lstat", this.resolve(filePath)));
    },

    mkdir(dirPath: string, { recursive }: { recursive: boolean }): void {
      const resolvedPath = this.resolve(dirPath);
      ensureWritable("mkdir", resolvedPath);
      const existing = memoryFS.get(resolvedPath);
      if (existing !== undefined) {
        if (existing.type === "directory" && recursive) return;
        throw makeErrnoError("EEXIST", "mkdir", resolvedPath, "file already exists");
      }
      if (!recursive) {
        requireParentDirectory("mkdir", resolvedPath);
        memoryFS.set(resolvedPath, { type: "directory", createdAt: new Date() });
        return;
      }
      const missing: string[] = [];
      let current = resolvedPath;
      while (!memoryFS.has(current)) {
        missing.push(current);
        current = path.dirname(current);
      }
      if (memoryFS.get(current)?.type !== "directory") {
        throw makeErrnoError("ENOTDIR", "mkdir", resolvedPath, "not a directory");
      }
      missing
        .reverse()
        .forEach((dir) =>
          memoryFS.set(dir, { type: "directory", createdAt: new Date() }),
        );
    },

    unlink(filePath: string): void {
      const resolvedPath = this.resolve(filePath);
      ensureWritable("unlink", resolvedPath);
      const node = getNode("unlink", resolvedPath);
      if (node.type === "directory") {
        throw makeErrnoError(
          "EISDIR",
          "unlink",
          resolvedPath,
          "illegal operation on a directory",
        );
      }
      memoryFS.delete(resolvedPath);
    },

    rmdir(dirPath: string): void {
      const resolvedPath = this.resolve(dirPath);
      ensureWritable("rmdir", resolvedPath);
      const node = getNode("rmdir", resolvedPath);
      if (node.type !== "directory") {
        throw makeErrnoError("ENOTDIR", "rmdir", resolvedPath, "not a directory");
      }
      if (childrenOf(resolvedPath).length > 0) {
        throw makeErrnoError(
          "ENOTEMPTY",
          "rmdir",
          resolvedPath,
          "directory not empty",
        );
      }
      memoryFS.delete(resolvedPath);
    },

    remove(filePath: string): void {
      const resolvedPath = this.resolve(filePath);
      ensureWritable("rm", resolvedPath);
      [...memoryFS.keys()]
        .filter((key) => key === resolvedPath || isDescendant(key, resolvedPath))
        .forEach((key) => memoryFS.delete(key));
    },

    rename(from: string, to: string): void {
      const resolvedFrom = this.resolve(from);
      const resolvedTo = this.resolve(to);
      ensureWritable("rename", resolvedFrom);
      const source = getNode("rename", resolvedFrom);
      requireParentDirectory("rename", resolvedTo);
      if (resolvedFrom === resolvedTo) return;
      if (isDescendant(resolvedTo, resolvedFrom)) {
        throw makeErrnoError("EINVAL", "rename", resolvedFrom, "invalid argument");
      }
      const target = memoryFS.get(resolvedTo);
      if (target !== undefined) {
        if (source.type === "file" && target.type === "directory") {
          throw makeErrnoError(
            "EISDIR",
            "rename",
            resolvedTo,
            "illegal operation on a directory",
          );
        }
        if (source.type === "directory" && target.type === "file") {
          throw makeErrnoError("ENOTDIR", "rename", resolvedTo, "not a directory");
        }
        if (childrenOf(resolvedTo).length > 0) {
          throw makeErrnoError(
            "ENOTEMPTY",
            "rename",
            resolvedTo,
            "directory not empty",
          );
        }
        memoryFS.delete(resolvedTo);
      }
      relocate(resolvedFrom, resolvedTo);
    },

    copyFile(from: string, to: string): void {
      const resolvedFrom = this.resolve(from);
      const resolvedTo = this.resolve(to);
      ensureWritable("copyfile", resolvedTo);
      const source = getNode("copyfile", resolvedFrom);
      if (source.type !== "file") {
        throw makeErrnoError(
          "EISDIR",
          "copyfile",
          resolvedFrom,
          "illegal operation on a directory",
        );
      }
      requireParentDirectory("copyfile", resolvedTo);
      if (memoryFS.get(resolvedTo)?.type === "directory") {
        throw makeErrnoError(
          "EISDIR",
          "copyfile",
          resolvedTo,
          "illegal operation on a directory",
        );
      }
      memoryFS.set(resolvedTo, {
        ...source,
        content: Buffer.from(source.content),
      });
    },

    move(from: string, to: string): void {
      const resolvedTo = this.resolve(to);
      if (memoryFS.has(resolvedTo)) {
        throw makeErrnoError("EEXIST", "rename", resolvedTo, "file already exists");
      }
      this.rename(from, to);
    },
  };
}
