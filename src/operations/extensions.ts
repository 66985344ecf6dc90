import path from "path";

/**
 * Returns the extension with a leading dot: `md` and `.md` both give `.md`.
 * Surrounding whitespace is dropped.
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim();
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

/**
 * Returns true if `extension` can be used as a file suffix: a dot followed by
 * at least one character, without path separators.
 */
export function isValidExtension(extension: string): boolean {
  return (
    extension.length > 1 &&
    extension.startsWith(".") &&
    !extension.includes("/") &&
    !extension.includes(path.sep)
  );
}

/**
 * Returns the last suffix of the file name, dot included, or an empty string.
 * Dot-files such as `.bashrc` have no suffix, and neither has a name ending
 * with a dot.
 */
export function fileSuffix(fileName: string): string {
  const suffix = path.extname(fileName);
  return suffix === "." ? "" : suffix;
}

/**
 * Returns `filePath` with its last suffix replaced by `extension`, or with
 * `extension` appended if the name has no suffix.
 */
export function replaceExtension(filePath: string, extension: string): string {
  const name = path.basename(filePath);
  const suffix = fileSuffix(name);
  const stem = suffix === "" ? name : name.slice(0, -suffix.length);
  return path.join(path.dirname(filePath), `${stem}${extension}`);
}

/**
 * Builds a case-insensitive matcher of file names by their suffix.
 * @param extensions Extensions with or without the leading dot. Blank ones are ignored.
 */
export function extensionMatcher(
  extensions: string[],
): (fileName: string) => boolean {
  const wanted = new Set(
    extensions
      .filter((extension) => extension.trim() !== "")
      .map((extension) => normalizeExtension(extension).toLowerCase()),
  );
  return (fileName: string) => {
    const suffix = fileSuffix(fileName).toLowerCase();
    return suffix !== "" && wanted.has(suffix);
  };
}
