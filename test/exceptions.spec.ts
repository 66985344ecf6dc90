import {
  ExecutionException,
  InternalException,
  errorMessage,
  throwZodError,
  tryMsg,
} from "../src/internals/exceptions";
import { unreachable } from "../src/internals/util";
import { FSMAN_VERSION } from "../src/version";
import vm from "vm";
import { z } from "zod";

const SEPARATOR = "=".repeat(60);

describe("Exceptions", () => {
  it("describes an internal error with the offending value", () => {
    const error = InternalException.make("Unexpected entry", {
      node: { kind: "socket" },
    });
    expect(error.message.split("\n")).toEqual([
      "Internal fsman Error:",
      "Unexpected entry",
      SEPARATOR,
      "{",
      '  "kind": "socket"',
      "}",
      SEPARATOR,
      `Command: ${process.argv.join(" ")}`,
      `Using fsman ${FSMAN_VERSION}`,
    ]);
  });

  it("omits the value section when there is none", () => {
    const lines = InternalException.make("Lost state").message.split("\n");
    expect(lines.slice(0, 3)).toEqual([
      "Internal fsman Error:",
      "Lost state",
      SEPARATOR,
    ]);
    expect(lines).toHaveLength(5);
  });

  it("throws an internal error on an impossible case", () => {
    const describeLevel = (level: "quiet" | "debug"): string => {
      switch (level) {
        case "quiet":
        case "debug":
          return level;
        default:
          return unreachable(level);
      }
    };
    expect(() => describeLevel(JSON.parse('"loud"'))).toThrow(
      /^Internal fsman Error:\nReached impossible case\n/,
    );
  });

  it("prefixes execution errors", () => {
    expect(ExecutionException.make("Bad option").message).toBe(
      "Execution Error:\nBad option",
    );
  });

  it("adds context to anything thrown inside tryMsg", () => {
    expect(() =>
      tryMsg(() => {
        throw new Error("EACCES: permission denied");
      }, "Cannot open log file a.log"),
    ).toThrow("Cannot open log file a.log: EACCES: permission denied");
    expect(() =>
      tryMsg(() => {
        throw "busy";
      }, "Cannot open log file a.log"),
    ).toThrow("Cannot open log file a.log: busy");
    expect(tryMsg(() => 42, "unused")).toBe(42);
  });

  it("reads the message of errors from another realm", () => {
    const foreign: unknown = vm.runInNewContext('new Error("gone")');
    expect(errorMessage(foreign)).toBe("gone");
    expect(errorMessage(7)).toBe("7");
  });

  it("lists every validation issue", () => {
    const schema = z.object({ colors: z.boolean() }).strict();
    const result = schema.safeParse({ colors: "yes" });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(() =>
      throwZodError(result.error, { msg: "Bad configuration", help: "See help" }),
    ).toThrow(
      "Execution Error:\nBad configuration\n- Expected boolean, received string at colors\n\nSee help",
    );
  });

  it("rethrows anything that is not a validation error", () => {
    const original = new Error("plain");
    expect(() => throwZodError(original)).toThrow(original);
  });
});
