import { makeManager, makeTempDir, unwrap, unwrapError, writeTree } from "./testUtil";
import fs from "fs-extra";
import path from "path";

describe("Renaming", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    fs.removeSync(root);
  });

  it("renames a file within its directory", () => {
    writeTree(root, { "sub/a.txt": "a" });
    const { manager } = makeManager(root);
    expect(unwrap(manager.rename("sub/a.txt", "b.txt"))).toBe(
      path.join(root, "sub", "b.txt"),
    );
    expect(fs.readdirSync(path.join(root, "sub"))).toEqual(["b.txt"]);
  });

  it("renames a directory", () => {
    writeTree(root, { "dir/a.txt": "a" });
    const { manager } = makeManager(root);
    unwrap(manager.rename("dir", "renamed"));
    expect(fs.readFileSync(path.join(root, "renamed", "a.txt"), "utf8")).toBe(
      "a",
    );
  });

  it("never replaces an existing entry", () => {
    writeTree(root, { "a.txt": "a", "b.txt": "b" });
    const { manager } = makeManager(root);
    const error = unwrapError(manager.rename("a.txt", "b.txt"));
    expect(error.kind).toBe("FileSystemError");
    expect(error.message).toBe(
      `Could not rename ${path.join(root, "a.txt")} to b.txt: destination ${path.join(root, "b.txt")} already exists`,
    );
    expect(fs.readFileSync(path.join(root, "a.txt"), "utf8")).toBe("a");
    expect(fs.readFileSync(path.join(root, "b.txt"), "utf8")).toBe("b");
  });

  it.each(["", ".", "..", "../escape.txt", "sub/b.txt"])(
    "rejects the name '%s'",
    (newName) => {
      writeTree(root, { "a.txt": "a" });
      const { manager } = makeManager(root);
      expect(unwrapError(manager.rename("a.txt", newName)).message).toBe(
        `Could not rename ${path.join(root, "a.txt")} to ${newName}: invalid name '${newName}'`,
      );
      expect(fs.existsSync(path.join(root, "a.txt"))).toBe(true);
    },
  );
});

describe("Changing extensions", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    fs.removeSync(root);
  });

  it("replaces the last suffix", () => {
    writeTree(root, { "notes.txt": "n", "archive.tar.gz": "z" });
    const { manager } = makeManager(root);
    expect(unwrap(manager.changeExtension("notes.txt", "md"))).toBe(
      path.join(root, "notes.md"),
    );
    expect(unwrap(manager.changeExtension("archive.tar.gz", ".zip"))).toBe(
      path.join(root, "archive.tar.zip"),
    );
    expect(fs.readdirSync(root).sort()).toEqual(["archive.tar.zip", "notes.md"]);
  });

  it("appends an extension to a name without one", () => {
    writeTree(root, { README: "r" });
    const { manager } = makeManager(root);
    expect(unwrap(manager.changeExtension("README", ".md"))).toBe(
      path.join(root, "README.md"),
    );
  });

  it("restores the original name when changed back", () => {
    writeTree(root, { "report.txt": "r" });
    const { manager } = makeManager(root);
    const changed = unwrap(manager.changeExtension("report.txt", ".x"));
    expect(unwrap(manager.changeExtension(changed, ".txt"))).toBe(
      path.join(root, "report.txt"),
    );
    expect(fs.readFileSync(path.join(root, "report.txt"), "utf8")).toBe("r");
  });

  it("fails when the new name exists", () => {
    writeTree(root, { "a.txt": "t", "a.md": "m" });
    const { manager } = makeManager(root);
    const error = unwrapError(manager.changeExtension("a.txt", ".md"));
    expect(error.message).toBe(
      `Could not change extension for ${path.join(root, "a.txt")}: destination ${path.join(root, "a.md")} already exists`,
    );
    expect(fs.readFileSync(path.join(root, "a.txt"), "utf8")).toBe("t");
    expect(fs.readFileSync(path.join(root, "a.md"), "utf8")).toBe("m");
  });

  it("rejects an empty extension", () => {
    writeTree(root, { "a.txt": "t" });
    const { manager } = makeManager(root);
    expect(unwrapError(manager.changeExtension("a.txt", ".")).message).toBe(
      `Could not change extension for ${path.join(root, "a.txt")}: invalid extension '.'`,
    );
  });
});
