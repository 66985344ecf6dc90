import {
  ErrorContext,
  FsError,
  FsErrorKind,
  OperationName,
  OpResult,
  fail,
  ok,
} from "./errors";
import {
  extensionMatcher,
  fileSuffix,
  isValidExtension,
  normalizeExtension,
  replaceExtension,
} from "./extensions";
import { FileInfo, readFileInfo } from "./fileInfo";
import { OperationStats, OperationStatsSnapshot } from "./stats";
import { walkDirectory } from "./walk";
import { errorMessage } from "../internals/exceptions";
import { Logger } from "../internals/logger";
import { unreachable } from "../internals/util";
import {
  VirtualFileSystem,
  isErrnoException,
} from "../vfs/virtualFileSystem";
import path from "path";

export const OPERATIONS_COMPONENT = "operations";

/**
 * Aborts the operation in progress with an error of the given kind.
 */
type Reject = (kind: FsErrorKind, reason: string, cause?: unknown) => never;

/**
 * Filesystem maintenance primitives.
 *
 * Operations run synchronously and report their outcome as an `OpResult`
 * instead of throwing. Every operation updates the statistics accumulator
 * owned by the manager; `bulkChangeExtensions` and `clean` reset it first.
 */
export class FileSystemManager {
  private readonly logger: Logger;

  /**
   * @param fs File system the operations run on.
   * @param logger Parent logger; the manager logs as the `operations` component.
   * @param stats Accumulator updated by the operations.
   */
  constructor(
    readonly fs: VirtualFileSystem,
    logger: Logger,
    private readonly stats: OperationStats = new OperationStats(),
  ) {
    this.logger = logger.child(OPERATIONS_COMPONENT);
  }

  /**
   * Current values of the statistics counters.
   */
  get statistics(): OperationStatsSnapshot {
    return this.stats.snapshot();
  }

  resetStats(): void {
    this.stats.reset();
  }

  /**
   * Resolves `filePath` to its canonical absolute form.
   * @param shouldExist Fail with `PathNotFound` if nothing exists at the path.
   */
  public validate(filePath: string, shouldExist: boolean = true): OpResult<string> {
    return this.check(filePath, shouldExist, "validate");
  }

  /**
   * Reads the metadata of an existing path.
   */
  public fileInfo(filePath: string): OpResult<FileInfo> {
    const target = this.check(filePath, true, "fileInfo");
    if (target.kind === "error") return target;
    return this.attempt(
      "fileInfo",
      [target.value],
      `Could not get info for ${target.value}`,
      () => readFileInfo(this.fs, target.value),
    );
  }

  /**
   * Lists the entries of a directory.
   *
   * With `recursive`, the contents of each subdirectory precede the entry of
   * the subdirectory itself. Entries that cannot be read are skipped with a
   * warning.
   */
  public list(directory: string, recursive: boolean = false): OpResult<FileInfo[]> {
    const target = this.check(directory, true, "list");
    if (target.kind === "error") return target;
    const dir = target.value;
    return this.attempt(
      "list",
      [dir],
      `Could not list directory ${dir}`,
      (reject) => {
        this.requireDirectory(dir, reject);
        const results: FileInfo[] = [];
        for (const event of walkDirectory(this.fs, dir, { recursive })) {
          switch (event.kind) {
            case "directory":
              this.stats.countDirectory();
              this.stats.countSuccess();
              break;
            case "entry":
              try {
                results.push(readFileInfo(this.fs, event.path));
                this.stats.countFile();
              } catch (err) {
                this.skip(event.path, err);
              }
              break;
            case "error":
              if (event.path === dir) throw event.error;
              this.skip(event.path, event.error);
              break;
            default:
              unreachable(event);
          }
        }
        this.logger.debug(`Listed ${results.length} entries of ${dir}`);
        return results;
      },
    );
  }

  /**
   * Copies a file, preserving its timestamps and mode.
   * @returns The path of the copy.
   */
  public copy(
    source: string,
    destination: string,
    overwrite: boolean = false,
  ): OpResult<string> {
    return this.transfer("copy", source, destination, overwrite);
  }

  /**
   * Moves a file.
   * @returns The new path of the file.
   */
  public move(
    source: string,
    destination: string,
    overwrite: boolean = false,
  ): OpResult<string> {
    return this.transfer("move", source, destination, overwrite);
  }

  /**
   * Deletes a single file. Directories are refused.
   */
  public deleteFile(filePath: string): OpResult<string> {
    const target = this.check(filePath, true, "deleteFile");
    if (target.kind === "error") return target;
    const file = target.value;
    return this.attempt(
      "deleteFile",
      [file],
      `Could not delete file ${file}`,
      (reject) => {
        if (this.fs.stat(file).isDirectory()) {
          reject("FileSystemError", `path ${file} is a directory`);
        }
        this.fs.unlink(file);
        this.stats.countFile();
        this.stats.countSuccess();
        this.logger.info(`Deleted file ${file}`);
        return file;
      },
    );
  }

  /**
   * Creates a directory.
   * @param parents Create missing parent directories.
   * @param existOk Accept an existing directory at the path.
   */
  public createDirectory(
    dirPath: string,
    parents: boolean = true,
    existOk: boolean = true,
  ): OpResult<string> {
    const target = this.check(dirPath, false, "createDirectory");
    if (target.kind === "error") return target;
    const dir = target.value;
    return this.attempt(
      "createDirectory",
      [dir],
      `Could not create directory ${dir}`,
      (reject) => {
        if (this.fs.exists(dir)) {
          if (!this.fs.stat(dir).isDirectory()) {
            reject("FileSystemError", `path ${dir} exists and is not a directory`);
          }
          if (!existOk) {
            reject("FileSystemError", `directory ${dir} already exists`);
          }
        } else {
          this.fs.mkdir(dir, { recursive: parents });
        }
        this.stats.countDirectory();
        this.stats.countSuccess();
        this.logger.info(`Created directory ${dir}`);
        return dir;
      },
    );
  }

  /**
   * Deletes a directory.
   * @param recursive Delete the directory with all its contents. Otherwise,
   *                  only an empty directory is deleted.
   */
  public deleteDirectory(
    dirPath: string,
    recursive: boolean = false,
  ): OpResult<string> {
    const target = this.check(dirPath, true, "deleteDirectory");
    if (target.kind === "error") return target;
    const dir = target.value;
    return this.attempt(
      "deleteDirectory",
      [dir],
      `Could not delete directory ${dir}`,
      (reject) => {
        this.requireDirectory(dir, reject);
        if (recursive) {
          this.fs.remove(dir);
        } else {
          try {
            this.fs.rmdir(dir);
          } catch (err) {
            if (
              isErrnoException(err) &&
              (err.code === "ENOTEMPTY" || err.code === "EEXIST")
            ) {
              reject("NotEmptyDirectory", `directory ${dir} is not empty`, err);
            }
            throw err;
          }
        }
        this.stats.countDirectory();
        this.stats.countSuccess();
        this.logger.info(`Deleted directory ${dir}`);
        return dir;
      },
    );
  }

  /**
   * Renames a file or directory within its parent directory. An existing
   * entry with the new name is never replaced.
   * @returns The new path.
   */
  public rename(source: string, newName: string): OpResult<string> {
    const target = this.check(source, true, "rename");
    if (target.kind === "error") return target;
    const from = target.value;
    return this.attempt(
      "rename",
      [from],
      `Could not rename ${from} to ${newName}`,
      (reject) => {
        if (
          newName === "" ||
          newName === "." ||
          newName === ".." ||
          newName.includes("/") ||
          newName.includes(path.sep)
        ) {
          reject("FileSystemError", `invalid name '${newName}'`);
        }
        const to = path.join(path.dirname(from), newName);
        if (this.fs.exists(to)) {
          reject("FileSystemError", `destination ${to} already exists`);
        }
        this.fs.rename(from, to);
        this.stats.countFile();
        this.stats.countSuccess();
        this.logger.info(`Renamed ${from} to ${to}`);
        return to;
      },
    );
  }

  /**
   * Replaces the last suffix of a file name, or appends one if the name has
   * none. Fails if a file with the new name exists.
   * @param newExtension Extension with or without the leading dot.
   * @returns The new path.
   */
  public changeExtension(
    filePath: string,
    newExtension: string,
  ): OpResult<string> {
    const target = this.check(filePath, true, "changeExtension");
    if (target.kind === "error") return target;
    const from = target.value;
    const extension = normalizeExtension(newExtension);
    return this.attempt(
      "changeExtension",
      [from],
      `Could not change extension for ${from}`,
      (reject) => {
        if (!isValidExtension(extension)) {
          reject("FileSystemError", `invalid extension '${newExtension}'`);
        }
        const to = replaceExtension(from, extension);
        if (this.fs.exists(to)) {
          reject("FileSystemError", `destination ${to} already exists`);
        }
        this.fs.rename(from, to);
        this.stats.countFile();
        this.stats.countSuccess();
        this.logger.info(`Changed extension for ${from} to ${extension}`);
        return to;
      },
    );
  }

  /**
   * Renames every file of `directory` whose extension is one of
   * `currentExtensions` (case-insensitive) to `newExtension`. Files whose
   * renamed path already exists are skipped and counted as failures.
   *
   * Resets the statistics before processing.
   * @returns Statistics of the run.
   */
  public bulkChangeExtensions(
    directory: string,
    currentExtensions: string[],
    newExtension: string,
    recursive: boolean = false,
  ): OpResult<OperationStatsSnapshot> {
    const target = this.check(directory, true, "bulkChangeExtensions");
    if (target.kind === "error") return target;
    const dir = target.value;
    this.stats.reset();
    const extension = normalizeExtension(newExtension);
    const matches = extensionMatcher(currentExtensions);
    return this.attempt(
      "bulkChangeExtensions",
      [dir],
      `Bulk extension change failed for ${dir}`,
      (reject) => {
        this.requireDirectory(dir, reject);
        if (!isValidExtension(extension)) {
          reject("FileSystemError", `invalid extension '${newExtension}'`);
        }
        for (const event of walkDirectory(this.fs, dir, { recursive })) {
          if (event.kind === "error") {
            if (event.path === dir) throw event.error;
            this.skip(event.path, event.error);
            continue;
          }
          if (
            event.kind !== "entry" ||
            !(
              event.stat.isFile() ||
              (event.stat.isSymbolicLink() && this.isExistingFile(event.path))
            ) ||
            !matches(path.basename(event.path))
          ) {
            continue;
          }
          this.stats.countFile();
          const renamed = replaceExtension(event.path, extension);
          if (this.fs.exists(renamed)) {
            this.logger.warn(`Skipped ${event.path} - target exists`);
            this.stats.countFailure();
            continue;
          }
          try {
            this.fs.rename(event.path, renamed);
            this.stats.countSuccess();
            this.logger.info(`Changed ${event.path} to ${renamed}`);
          } catch (err) {
            this.logger.error(
              `Error processing ${event.path}: ${errorMessage(err)}`,
            );
            this.stats.countFailure();
          }
        }
        return this.stats.snapshot();
      },
    );
  }

  /**
   * Creates a new file. `.json` files get an empty object and `.csv` files
   * stay empty whatever `content` is; other files receive `content` if given.
   * @returns The path of the created file.
   */
  public createEmpty(
    filePath: string,
    content?: string | Buffer,
  ): OpResult<string> {
    const target = this.check(filePath, false, "createEmpty");
    if (target.kind === "error") return target;
    const file = target.value;
    return this.attempt(
      "createEmpty",
      [file],
      `Could not create file ${file}`,
      (reject) => {
        if (this.fs.exists(file)) {
          reject("FileSystemError", `file ${file} already exists`);
        }
        this.fs.writeFile(file, initialContent(file, content));
        this.stats.countFile();
        this.stats.countSuccess();
        this.logger.info(`Created file ${file}`);
        return file;
      },
    );
  }

  /**
   * Sums the sizes of the regular files of a directory. Files that cannot be
   * measured are skipped with a warning.
   * @param recursive Include the files of all subdirectories.
   * @returns Size in bytes.
   */
  public size(directory: string, recursive: boolean = true): OpResult<number> {
    const target = this.check(directory, true, "size");
    if (target.kind === "error") return target;
    const dir = target.value;
    return this.attempt(
      "size",
      [dir],
      `Could not calculate size for ${dir}`,
      (reject) => {
        this.requireDirectory(dir, reject);
        let total = 0;
        for (const event of walkDirectory(this.fs, dir, { recursive })) {
          if (event.kind === "error") {
            if (event.path === dir) throw event.error;
            this.skip(event.path, event.error);
            continue;
          }
          if (event.kind !== "entry" || event.stat.isDirectory()) {
            continue;
          }
          try {
            const stat = event.stat.isSymbolicLink()
              ? this.fs.stat(event.path)
              : event.stat;
            if (stat.isFile()) {
              total += stat.size;
              this.stats.countFile();
            }
          } catch (err) {
            this.skip(event.path, err);
          }
        }
        this.stats.countDirectory();
        this.stats.countSuccess();
        this.logger.info(`Calculated size of ${dir}: ${total} bytes`);
        return total;
      },
    );
  }

  /**
   * Removes every entry of a directory, keeping the directory itself. An entry
   * that cannot be removed is logged and the sweep goes on.
   *
   * Resets the statistics before processing.
   * @returns Statistics of the run.
   */
  public clean(directory: string): OpResult<OperationStatsSnapshot> {
    const target = this.check(directory, true, "clean");
    if (target.kind === "error") return target;
    const dir = target.value;
    this.stats.reset();
    return this.attempt(
      "clean",
      [dir],
      `Could not clean directory ${dir}`,
      (reject) => {
        this.requireDirectory(dir, reject);
        for (const name of this.fs.readdir(dir)) {
          const entry = path.join(dir, name);
          try {
            if (this.fs.lstat(entry).isDirectory()) {
              this.fs.remove(entry);
              this.stats.countDirectory();
            } else {
              this.fs.unlink(entry);
              this.stats.countFile();
            }
            this.stats.countSuccess();
            this.logger.info(`Removed ${entry}`);
          } catch (err) {
            this.logger.error(`Could not remove ${entry}: ${errorMessage(err)}`);
            this.stats.countFailure();
          }
        }
        this.logger.info(`Cleaned directory ${dir}`);
        return this.stats.snapshot();
      },
    );
  }

  /**
   * Shared implementation of `copy` and `move`.
   *
   * The destination anchor is the parent of `destination` if it names an
   * existing file, `destination` itself otherwise. A directory anchor
   * receives the file under its original name.
   */
  private transfer(
    operation: "copy" | "move",
    source: string,
    destination: string,
    overwrite: boolean,
  ): OpResult<string> {
    const target = this.check(source, true, operation);
    if (target.kind === "error") return target;
    const from = target.value;
    return this.attempt(
      operation,
      [from, destination],
      `Could not ${operation} ${from} to ${destination}`,
      (reject) => {
        if (this.fs.stat(from).isDirectory()) {
          reject(
            "UnsupportedOperation",
            `${from} is a directory; only files can be ${operation === "copy" ? "copied" : "moved"}`,
          );
        }
        const anchor = this.fs.realpath(
          this.isExistingFile(destination)
            ? path.dirname(this.fs.resolve(destination))
            : destination,
        );
        const to = this.isExistingDirectory(anchor)
          ? path.join(anchor, path.basename(from))
          : anchor;
        if (to === from) {
          reject("FileSystemError", `source and destination are the same file`);
        }
        if (this.fs.exists(to)) {
          if (!overwrite) {
            reject("FileSystemError", `destination file ${to} already exists`);
          }
          if (operation === "move") {
            this.fs.unlink(to);
          }
        }
        if (operation === "copy") {
          this.fs.copyFile(from, to);
        } else {
          this.fs.move(from, to);
        }
        this.stats.countFile();
        this.stats.countSuccess();
        this.logger.info(
          `${operation === "copy" ? "Copied" : "Moved"} ${from} to ${to}`,
        );
        return to;
      },
    );
  }

  /**
   * Resolves a path on behalf of `operation`. Failures are not counted.
   */
  private check(
    filePath: string,
    shouldExist: boolean,
    operation: OperationName,
  ): OpResult<string> {
    let resolved: string;
    try {
      resolved = this.fs.realpath(filePath);
    } catch (err) {
      return fail(
        FsError.from(err, `Could not resolve path '${filePath}'`, {
          operation,
          paths: [filePath],
        }),
      );
    }
    if (shouldExist && !this.fs.exists(resolved)) {
      return fail(
        new FsError("PathNotFound", `Path '${resolved}' does not exist`, {
          operation,
          paths: [resolved],
        }),
      );
    }
    return ok(resolved);
  }

  /**
   * Runs the body of an operation, turning anything it throws into an
   * `FsError` that is logged and counted as a failure.
   */
  private attempt<T>(
    operation: OperationName,
    paths: string[],
    summary: string,
    body: (reject: Reject) => T,
  ): OpResult<T> {
    const context: ErrorContext = { operation, paths };
    const reject: Reject = (kind, reason, cause) => {
      throw new FsError(
        kind,
        `${summary}: ${reason}`,
        context,
        isErrnoException(cause) ? cause.code : undefined,
        { cause },
      );
    };
    try {
      return ok(body(reject));
    } catch (err) {
      const error = FsError.from(err, summary, context);
      this.logger.error(error.message);
      this.stats.countFailure();
      return fail(error);
    }
  }

  private requireDirectory(dir: string, reject: Reject): void {
    if (!this.fs.stat(dir).isDirectory()) {
      reject("FileSystemError", `path ${dir} is not a directory`);
    }
  }

  private isExistingFile(filePath: string): boolean {
    return this.fs.exists(filePath) && this.fs.stat(filePath).isFile();
  }

  private isExistingDirectory(filePath: string): boolean {
    return this.fs.exists(filePath) && this.fs.stat(filePath).isDirectory();
  }

  /**
   * Reports an entry left out of a traversal.
   */
  private skip(entryPath: string, err: unknown): void {
    this.logger.warn(`Could not process ${entryPath}: ${errorMessage(err)}`);
    this.stats.countFailure();
  }
}

/**
 * Content written to a new file depending on its extension.
 */
function initialContent(
  filePath: string,
  content: string | Buffer | undefined,
): string | Buffer {
  switch (fileSuffix(path.basename(filePath)).toLowerCase()) {
    case ".json":
      return JSON.stringify({});
    case ".csv":
      return "";
    default:
      return content ?? "";
  }
}
