import {
  extensionMatcher,
  fileSuffix,
  isValidExtension,
  normalizeExtension,
  replaceExtension,
} from "../src/operations/extensions";
import path from "path";

describe("Extension helpers", () => {
  it("adds the leading dot", () => {
    expect(normalizeExtension("md")).toBe(".md");
    expect(normalizeExtension(" .md ")).toBe(".md");
  });

  it("validates extensions", () => {
    expect(isValidExtension(".md")).toBe(true);
    expect(isValidExtension(".")).toBe(false);
    expect(isValidExtension(".a/b")).toBe(false);
  });

  it("finds the last suffix", () => {
    expect(fileSuffix("a.tar.gz")).toBe(".gz");
    expect(fileSuffix(".bashrc")).toBe("");
    expect(fileSuffix("trailing.")).toBe("");
    expect(fileSuffix("README")).toBe("");
  });

  it("replaces or appends the suffix", () => {
    expect(replaceExtension(path.join("dir", "a.txt"), ".md")).toBe(
      path.join("dir", "a.md"),
    );
    expect(replaceExtension("README", ".md")).toBe("README.md");
  });

  it("matches names case-insensitively", () => {
    const matches = extensionMatcher([".TXT", "doc", " "]);
    expect(matches("a.txt")).toBe(true);
    expect(matches("b.Doc")).toBe(true);
    expect(matches("c.md")).toBe(false);
    expect(matches("noext")).toBe(false);
  });
});
