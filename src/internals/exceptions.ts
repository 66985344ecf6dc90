import { FSMAN_VERSION } from "../version";
import { types } from "util";
import { ZodError } from "zod";

const SEPARATOR = "=".repeat(60);

/**
 * Message of a thrown value. Errors raised by Node's built-in modules may come
 * from another realm, so they are recognized without `instanceof`.
 */
export function errorMessage(err: unknown): string {
  return types.isNativeError(err) ? err.message : String(err);
}

function dump(value: unknown): string {
  try {
    return JSON.stringify(value, null, 2) ?? String(value);
  } catch (err) {
    return `<${errorMessage(err)}>`;
  }
}

/**
 * Error caused by a bug in fsman. The message carries the offending value, the
 * command line and the fsman version.
 */
export class InternalException {
  private constructor() {}
  static make(msg: string, { node }: { node?: unknown } = {}): Error {
    const lines = ["Internal fsman Error:", msg];
    if (node !== undefined) {
      lines.push(SEPARATOR, dump(node));
    }
    lines.push(
      SEPARATOR,
      `Command: ${process.argv.join(" ")}`,
      `Using fsman ${FSMAN_VERSION}`,
    );
    return new Error(lines.join("\n"));
  }
}

/**
 * Error caused by the user or the environment: a broken configuration file, a
 * log file that cannot be opened, bad options.
 */
export class ExecutionException {
  private constructor() {}
  static make(msg: string): Error {
    return new Error(`Execution Error:\n${msg}`);
  }
}

/**
 * Runs `callback`, prefixing the message of anything it throws with `message`.
 */
export function tryMsg<T>(callback: () => T, message: string): T {
  try {
    return callback();
  } catch (err) {
    throw new Error(`${message}: ${errorMessage(err)}`);
  }
}

/**
 * Rethrows a configuration validation failure as an ExecutionException
 * listing one issue per line.
 */
export function throwZodError(
  err: unknown,
  { msg, help }: { msg?: string; help?: string } = {},
): never {
  if (!(err instanceof ZodError)) {
    throw err;
  }
  const issues = err.errors.map(
    (issue) =>
      `- ${issue.message} at ${issue.path.length ? issue.path.join(" > ") : "root"}`,
  );
  throw ExecutionException.make(
    [...(msg ? [msg] : []), ...issues, ...(help ? ["", help] : [])].join("\n"),
  );
}
