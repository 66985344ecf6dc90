import { makeManager, makeTempDir, unwrap, unwrapError, writeTree } from "./testUtil";
import fs from "fs-extra";
import path from "path";

describe("Deleting files", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    fs.removeSync(root);
  });

  it("deletes a file", () => {
    writeTree(root, { "a.txt": "a" });
    const { manager } = makeManager(root);
    expect(unwrap(manager.deleteFile("a.txt"))).toBe(path.join(root, "a.txt"));
    expect(fs.existsSync(path.join(root, "a.txt"))).toBe(false);
    expect(manager.statistics).toEqual({
      filesProcessed: 1,
      directoriesProcessed: 0,
      successfulOperations: 1,
      failedOperations: 0,
    });
  });

  it("refuses a directory", () => {
    fs.mkdirSync(path.join(root, "dir"));
    const { manager } = makeManager(root);
    const dir = path.join(root, "dir");
    const error = unwrapError(manager.deleteFile("dir"));
    expect(error.kind).toBe("FileSystemError");
    expect(error.message).toBe(
      `Could not delete file ${dir}: path ${dir} is a directory`,
    );
    expect(fs.existsSync(dir)).toBe(true);
  });

  it("fails with PathNotFound for a missing file", () => {
    const { manager } = makeManager(root);
    expect(unwrapError(manager.deleteFile("missing.txt")).kind).toBe(
      "PathNotFound",
    );
  });
});

describe("Creating directories", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    fs.removeSync(root);
  });

  it("accepts an existing directory twice", () => {
    const { manager } = makeManager(root);
    expect(unwrap(manager.createDirectory("d"))).toBe(path.join(root, "d"));
    expect(unwrap(manager.createDirectory("d"))).toBe(path.join(root, "d"));
    expect(fs.readdirSync(root)).toEqual(["d"]);
    expect(fs.statSync(path.join(root, "d")).isDirectory()).toBe(true);
  });

  it("creates missing parents", () => {
    const { manager } = makeManager(root);
    unwrap(manager.createDirectory("a/b/c"));
    expect(fs.statSync(path.join(root, "a", "b", "c")).isDirectory()).toBe(
      true,
    );
  });

  it("fails without parents when the parent is missing", () => {
    const { manager } = makeManager(root);
    expect(unwrapError(manager.createDirectory("a/b", false)).kind).toBe(
      "PathNotFound",
    );
    expect(fs.existsSync(path.join(root, "a"))).toBe(false);
  });

  it("rejects an existing directory when asked to", () => {
    fs.mkdirSync(path.join(root, "d"));
    const { manager } = makeManager(root);
    const dir = path.join(root, "d");
    expect(unwrapError(manager.createDirectory("d", true, false)).message).toBe(
      `Could not create directory ${dir}: directory ${dir} already exists`,
    );
  });

  it("rejects an existing file", () => {
    writeTree(root, { "f": "x" });
    const { manager } = makeManager(root);
    const file = path.join(root, "f");
    expect(unwrapError(manager.createDirectory("f")).message).toBe(
      `Could not create directory ${file}: path ${file} exists and is not a directory`,
    );
  });
});

describe("Deleting directories", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    fs.removeSync(root);
  });

  it("keeps a non-empty directory unless recursive", () => {
    writeTree(root, { "d/a.txt": "a", "d/sub/b.txt": "b" });
    const { manager } = makeManager(root);
    const dir = path.join(root, "d");
    const error = unwrapError(manager.deleteDirectory("d"));
    expect(error.kind).toBe("NotEmptyDirectory");
    expect(error.message).toBe(
      `Could not delete directory ${dir}: directory ${dir} is not empty`,
    );
    expect(fs.readFileSync(path.join(dir, "a.txt"), "utf8")).toBe("a");
    expect(fs.readFileSync(path.join(dir, "sub", "b.txt"), "utf8")).toBe("b");

    unwrap(manager.deleteDirectory("d", true));
    expect(fs.existsSync(dir)).toBe(false);
  });

  it("deletes an empty directory", () => {
    fs.mkdirSync(path.join(root, "empty"));
    const { manager } = makeManager(root);
    unwrap(manager.deleteDirectory("empty"));
    expect(fs.existsSync(path.join(root, "empty"))).toBe(false);
    expect(manager.statistics).toEqual({
      filesProcessed: 0,
      directoriesProcessed: 1,
      successfulOperations: 1,
      failedOperations: 0,
    });
  });

  it("refuses a file", () => {
    writeTree(root, { "a.txt": "a" });
    const { manager } = makeManager(root);
    const file = path.join(root, "a.txt");
    expect(unwrapError(manager.deleteDirectory("a.txt", true)).message).toBe(
      `Could not delete directory ${file}: path ${file} is not a directory`,
    );
    expect(fs.existsSync(file)).toBe(true);
  });
});
