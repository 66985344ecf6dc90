import { FsError } from "../operations/errors";
import { FileInfo } from "../operations/fileInfo";
import { OperationStatsSnapshot } from "../operations/stats";
import { ansi, paint } from "../internals/util";

const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

const grouped = (value: number, fractionDigits: number): string =>
  value.toLocaleString("en-US", {
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits,
  });

/**
 * Renders a directory listing, one entry per line.
 */
export function formatListing(entries: FileInfo[], colorize: boolean): string {
  return entries
    .map((entry) =>
      entry.isDirectory
        ? `${paint("DIR", ansi.blue, colorize)} - ${entry.path} (${entry.size} bytes)`
        : `FILE - ${entry.path} (${entry.size} bytes)`,
    )
    .join("\n");
}

/**
 * Renders a directory size in bytes, KB, MB and GB.
 */
export function formatSize(label: string, bytes: number): string {
  return [
    `\nSize of ${label}:`,
    `Bytes: ${grouped(bytes, 0)}`,
    `KB: ${grouped(bytes / KB, 2)}`,
    `MB: ${grouped(bytes / MB, 2)}`,
    `GB: ${grouped(bytes / GB, 4)}`,
  ].join("\n");
}

/**
 * Renders the outcome of a bulk extension change.
 */
export function formatBulkStats(stats: OperationStatsSnapshot): string {
  return [
    "\nOperation completed:",
    `Files processed: ${stats.filesProcessed}`,
    `Successful changes: ${stats.successfulOperations}`,
    `Failed changes: ${stats.failedOperations}`,
  ].join("\n");
}

/**
 * Renders the outcome of a directory clean.
 */
export function formatCleanStats(stats: OperationStatsSnapshot): string {
  return [
    `Files removed: ${stats.filesProcessed}`,
    `Directories removed: ${stats.directoriesProcessed}`,
    `Failed removals: ${stats.failedOperations}`,
  ].join("\n");
}

export function formatError(err: FsError | string, colorize: boolean): string {
  const message = typeof err === "string" ? err : err.message;
  return paint(`Error: ${message}`, ansi.red, colorize);
}

export function formatSuccess(message: string, colorize: boolean): string {
  return paint(message, ansi.green, colorize);
}

/**
 * Renders the banner printed when the shell starts.
 */
export function formatBanner(colorize: boolean): string {
  const rule = "=".repeat(50);
  const title = "FILE SYSTEM MANAGER";
  const left = Math.floor((50 - title.length) / 2);
  const centered = " ".repeat(left) + title + " ".repeat(50 - title.length - left);
  return [
    "\n" + rule,
    paint(centered, ansi.bold, colorize),
    rule,
    "\nType 'help' for available commands\n",
  ].join("\n");
}
