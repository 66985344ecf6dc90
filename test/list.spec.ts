import { FileSystemManager } from "../src/operations/manager";
import { createVirtualFileSystem } from "../src/vfs/createVirtualFileSystem";
import { makeErrnoError } from "../src/vfs/virtualFileSystem";
import {
  makeManager,
  makeTempDir,
  makeTestLogger,
  unwrap,
  unwrapError,
  writeTree,
} from "./testUtil";
import fs from "fs-extra";
import path from "path";

describe("Directory listing", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
    writeTree(root, {
      "a.txt": "aa",
      "sub/b.txt": "bbb",
      "sub/deep/c.txt": "c",
    });
  });

  afterEach(() => {
    fs.removeSync(root);
  });

  it("lists direct children in name order", () => {
    const { manager } = makeManager(root);
    const entries = unwrap(manager.list(root));
    expect(entries.map((entry) => entry.path)).toEqual([
      path.join(root, "a.txt"),
      path.join(root, "sub"),
    ]);
    expect(entries[0]).toMatchObject({
      name: "a.txt",
      size: 2,
      isFile: true,
      isDirectory: false,
    });
    expect(entries[1]).toMatchObject({
      name: "sub",
      isFile: false,
      isDirectory: true,
    });
  });

  it("lists the contents of a subdirectory before the subdirectory", () => {
    const { manager } = makeManager(root);
    const entries = unwrap(manager.list(root, true));
    expect(entries.map((entry) => entry.path)).toEqual([
      path.join(root, "a.txt"),
      path.join(root, "sub", "b.txt"),
      path.join(root, "sub", "deep", "c.txt"),
      path.join(root, "sub", "deep"),
      path.join(root, "sub"),
    ]);
  });

  it("counts every visited directory", () => {
    const { manager } = makeManager(root);
    unwrap(manager.list(root, true));
    expect(manager.statistics).toEqual({
      filesProcessed: 5,
      directoriesProcessed: 3,
      successfulOperations: 3,
      failedOperations: 0,
    });
  });

  it("refuses a file", () => {
    const { manager } = makeManager(root);
    const file = path.join(root, "a.txt");
    const error = unwrapError(manager.list("a.txt"));
    expect(error.kind).toBe("FileSystemError");
    expect(error.message).toBe(
      `Could not list directory ${file}: path ${file} is not a directory`,
    );
    expect(manager.statistics.failedOperations).toBe(1);
  });

  it("reads the metadata of a single path", () => {
    const { manager } = makeManager(root);
    const info = unwrap(manager.fileInfo("sub/b.txt"));
    expect(info).toMatchObject({
      path: path.join(root, "sub", "b.txt"),
      name: "b.txt",
      size: 3,
      isFile: true,
      isDirectory: false,
    });
    expect(info.modifiedAt.getTime()).toBe(
      fs.statSync(path.join(root, "sub", "b.txt")).mtime.getTime(),
    );
    expect(unwrapError(manager.fileInfo("nowhere")).kind).toBe("PathNotFound");
  });

  it("fails with PathNotFound for a missing directory", () => {
    const { manager } = makeManager(root);
    expect(unwrapError(manager.list("nowhere")).kind).toBe("PathNotFound");
  });
});

describe("Directory listing with unreadable entries", () => {
  it("skips an entry whose metadata cannot be read", () => {
    const vfs = createVirtualFileSystem("/data", {
      "/data/a.txt": { type: "file", content: Buffer.from("a") },
      "/data/b.txt": { type: "file", content: Buffer.from("b") },
    });
    const originalStat = vfs.stat;
    vfs.stat = jest.fn((filePath: string) => {
      if (filePath === "/data/b.txt") {
        throw makeErrnoError("EACCES", "stat", filePath, "permission denied");
      }
      return originalStat.call(vfs, filePath);
    });
    const logger = makeTestLogger();
    const manager = new FileSystemManager(vfs, logger);
    const entries = unwrap(manager.list("/data"));
    expect(entries.map((entry) => entry.name)).toEqual(["a.txt"]);
    expect(manager.statistics.failedOperations).toBe(1);
    expect(logger.getJsonLogs().warn).toEqual([
      "Could not process /data/b.txt: EACCES: permission denied, stat '/data/b.txt'",
    ]);
  });
});
