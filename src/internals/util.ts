/**
 * Additional generic TypeScript functions used in the project.
 *
 * @packageDocumentation
 */

import { InternalException } from "./exceptions";

/**
 * ANSI escape sequences used to colorize terminal output.
 */
export const ansi = {
  reset: "\u001b[0m",
  bold: "\u001b[1m",
  red: "\u001b[31m",
  green: "\u001b[32m",
  blue: "\u001b[34m",
} as const;

/**
 * Wraps `text` into the given ANSI color when `colorize` is set.
 */
export function paint(text: string, color: string, colorize: boolean): string {
  return colorize ? `${color}${text}${ansi.reset}` : text;
}

/**
 * Unreachable case for exhaustive checking.
 */
export function unreachable(value: never): never {
  throw InternalException.make(`Reached impossible case`, { node: value });
}

/**
 * Returns a copy of `values` without duplicates, keeping the first occurrence.
 */
export const uniqueList = <T>(values: T[]): T[] => [...new Set(values)];
