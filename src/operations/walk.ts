import { FileStat, VirtualFileSystem } from "../vfs/virtualFileSystem";
import path from "path";

export type WalkEvent =
  /** A directory whose entries were read. */
  | { kind: "directory"; path: string }
  /** A directory entry. `stat` does not follow symlinks. */
  | { kind: "entry"; path: string; stat: FileStat }
  /** A directory that could not be read or an entry that could not be stat'd. */
  | { kind: "error"; path: string; error: unknown };

export interface WalkOptions {
  /** Descend into subdirectories. Symlinked directories are never descended. */
  recursive: boolean;
}

/**
 * Depth-first traversal of `directory`.
 *
 * Entries are produced in name order. When `recursive` is set, the contents
 * of a subdirectory are produced before the entry of the subdirectory itself;
 * a subdirectory that cannot be read is reported as an error and its entry is
 * omitted.
 *
 * @returns `false` if `directory` itself could not be read.
 */
export function* walkDirectory(
  fs: VirtualFileSystem,
  directory: string,
  options: WalkOptions,
): Generator<WalkEvent, boolean, undefined> {
  let names: string[];
  try {
    names = fs.readdir(directory);
  } catch (error) {
    yield { kind: "error", path: directory, error };
    return false;
  }
  yield { kind: "directory", path: directory };
  for (const name of names) {
    const entryPath = path.join(directory, name);
    let stat: FileStat;
    try {
      stat = fs.lstat(entryPath);
    } catch (error) {
      yield { kind: "error", path: entryPath, error };
      continue;
    }
    if (options.recursive && stat.isDirectory()) {
      const readable = yield* walkDirectory(fs, entryPath, options);
      if (!readable) continue;
    }
    yield { kind: "entry", path: entryPath, stat };
  }
  return true;
}
