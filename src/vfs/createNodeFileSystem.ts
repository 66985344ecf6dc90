import {
  VirtualFileSystem,
  FileStat,
  isErrnoException,
  makeErrnoError,
} from "./virtualFileSystem";
import type { Stats } from "fs";
import fs from "fs-extra";
import path from "path";

function toFileStat(stats: Stats): FileStat {
  return {
    isFile: () => stats.isFile(),
    isDirectory: () => stats.isDirectory(),
    isSymbolicLink: () => stats.isSymbolicLink(),
    size: stats.size,
    createdAt: stats.birthtime,
    updatedAt: stats.mtime,
    accessedAt: stats.atime,
  };
}

/**
 * Creates a Virtual File System backed by the local file system.
 * This file system interacts directly with the host's disk storage.
 *
 * @param root - The directory relative paths are resolved against.
 * @param readonly - If true, prevents write operations. Default is false.
 * @returns A VirtualFileSystem instance with local file system operations.
 */
export function createNodeFileSystem(
  root: string,
  readonly: boolean = false,
): VirtualFileSystem {
  const normalizedRoot = path.resolve(root);

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

  return {
    /**
     * The normalized root directory for the virtual file system.
     */
    root: normalizedRoot,

    /**
     * Resolves the given path segments to an absolute path within the root.
     */
    resolve(...filePath: string[]): string {
      return path.normalize(path.resolve(normalizedRoot, ...filePath));
    },

    /**
     * Resolves symlinks of the longest existing prefix of the path.
     */
    realpath(filePath: string): string {
      const resolvedPath = this.resolve(filePath);
      try {
        return fs.realpathSync(resolvedPath);
      } catch (err) {
        if (
          !isErrnoException(err) ||
          (err.code !== "ENOENT" && err.code !== "ENOTDIR")
        ) {
          throw err;
        }
        const parent = path.dirname(resolvedPath);
        if (parent === resolvedPath) {
          return resolvedPath;
        }
        return path.join(this.realpath(parent), path.basename(resolvedPath));
      }
    },

    /**
     * Checks if a file or directory exists at the specified path.
     */
    exists(filePath: string): boolean {
      return fs.existsSync(this.resolve(filePath));
    },

    readFile(filePath: string): Buffer {
      return fs.readFileSync(this.resolve(filePath));
    },

    /**
     * Writes content to a file. The parent directory must exist.
     */
    writeFile(filePath: string, content: Buffer | string): void {
      const resolvedPath = this.resolve(filePath);
      ensureWritable("open", resolvedPath);
      fs.writeFileSync(resolvedPath, content);
    },

    /**
     * Reads the names of the entries of a directory, sorted by name.
     */
    readdir(dirPath: string): string[] {
      return fs.readdirSync(this.resolve(dirPath)).sort();
    },

    stat(filePath: string): FileStat {
      return toFileStat(fs.statSync(this.resolve(filePath)));
    },

    lstat(filePath: string): FileStat {
      return toFileStat(fs.lstatSync(this.resolve(filePath)));
    },

    mkdir(dirPath: string, { recursive }: { recursive: boolean }): void {
      const resolvedPath = this.resolve(dirPath);
      ensureWritable("mkdir", resolvedPath);
      fs.mkdirSync(resolvedPath, { recursive });
    },

    unlink(filePath: string): void {
      const resolvedPath = this.resolve(filePath);
      ensureWritable("unlink", resolvedPath);
      fs.unlinkSync(resolvedPath);
    },

    rmdir(dirPath: string): void {
      const resolvedPath = this.resolve(dirPath);
      ensureWritable("rmdir", resolvedPath);
      fs.rmdirSync(resolvedPath);
    },

    remove(filePath: string): void {
      const resolvedPath = this.resolve(filePath);
      ensureWritable("rm", resolvedPath);
      fs.removeSync(resolvedPath);
    },

    rename(from: string, to: string): void {
      const resolvedFrom = this.resolve(from);
      ensureWritable("rename", resolvedFrom);
      fs.renameSync(resolvedFrom, this.resolve(to));
    },

    copyFile(from: string, to: string): void {
      const resolvedTo = this.resolve(to);
      ensureWritable("copyfile", resolvedTo);
      fs.copySync(this.resolve(from), resolvedTo, {
        overwrite: true,
        errorOnExist: false,
        preserveTimestamps: true,
      });
    },

    move(from: string, to: string): void {
      const resolvedFrom = this.resolve(from);
      ensureWritable("rename", resolvedFrom);
      fs.moveSync(resolvedFrom, this.resolve(to), { overwrite: false });
    },
  };
}
