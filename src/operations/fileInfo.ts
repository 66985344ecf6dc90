import { VirtualFileSystem } from "../vfs/virtualFileSystem";
import path from "path";

/**
 * Point-in-time metadata of a file or directory.
 */
export type FileInfo = Readonly<{
  path: string;
  name: string;
  /** Size in bytes. */
  size: number;
  createdAt: Date;
  modifiedAt: Date;
  accessedAt: Date;
  isDirectory: boolean;
  isFile: boolean;
}>;

/**
 * Reads the metadata of `filePath`, following symlinks.
 * @throws The host error if the path cannot be stat'd.
 */
export function readFileInfo(
  fs: VirtualFileSystem,
  filePath: string,
): FileInfo {
  const stat = fs.stat(filePath);
  return Object.freeze({
    path: filePath,
    name: path.basename(filePath),
    size: stat.size,
    createdAt: stat.createdAt,
    modifiedAt: stat.updatedAt,
    accessedAt: stat.accessedAt,
    isDirectory: stat.isDirectory(),
    isFile: stat.isFile(),
  });
}
