import {
  DebugLogger,
  Logger,
  LogLevel,
  QuietLogger,
  createFileSink,
  formatLogLine,
  formatTimestamp,
} from "../src/internals/logger";
import { makeTempDir } from "./testUtil";
import fs from "fs-extra";
import path from "path";

describe("Logger", () => {
  const at = new Date(2024, 0, 2, 3, 4, 5);

  it("formats timestamps and lines", () => {
    expect(formatTimestamp(at)).toBe("2024-01-02 03:04:05");
    expect(formatLogLine("operations", LogLevel.WARN, "careful", at)).toBe(
      "2024-01-02 03:04:05 - operations - WARNING - careful",
    );
    expect(
      formatLogLine("shell", LogLevel.ERROR, new Error("broken"), at),
    ).toBe("2024-01-02 03:04:05 - shell - ERROR - broken");
  });

  it("uses the log function of each level", () => {
    const info = jest.fn();
    const error = jest.fn();
    const logger = new Logger(
      { [LogLevel.INFO]: info, [LogLevel.ERROR]: error },
      { showTimestamps: false },
    );
    logger.debug("hidden");
    logger.info("shown");
    logger.error("failed");
    expect(info).toHaveBeenCalledWith("shown");
    expect(error).toHaveBeenCalledWith("failed");
    expect(info).toHaveBeenCalledTimes(1);
  });

  it("sends every level to the sinks", () => {
    const lines: [LogLevel, string][] = [];
    const logger = new QuietLogger({
      sinks: [(level, line) => lines.push([level, line])],
    });
    logger.debug("one");
    logger.warn("two");
    expect(lines.map(([level]) => level)).toEqual([
      LogLevel.DEBUG,
      LogLevel.WARN,
    ]);
    expect(lines[1][1]).toMatch(
      /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} - fsman - WARNING - two$/,
    );
  });

  it("shares storage with child loggers", () => {
    const lines: string[] = [];
    const logger = new QuietLogger({
      saveJson: true,
      sinks: [(_level, line) => lines.push(line)],
    });
    const child = logger.child("operations");
    child.info("from child");
    expect(child.component).toBe("operations");
    expect(logger.getJsonLogs().info).toEqual(["from child"]);
    expect(lines[0]).toContain(" - operations - INFO - from child");
  });

  it("refuses to return logs it does not keep", () => {
    expect(() => new Logger().getJsonLogs()).toThrow(
      "JSON logging not enabled for this logger instance",
    );
  });

  it("prints debug messages when verbose", () => {
    const spy = jest.spyOn(console, "log").mockImplementation(() => {});
    new DebugLogger({ showTimestamps: false }).debug("details");
    expect(spy).toHaveBeenCalledWith("details");
    spy.mockRestore();
  });

  it("appends to a log file", () => {
    const root = makeTempDir();
    const logFile = path.join(root, "logs", "fsman.log");
    const logger = new QuietLogger({ sinks: [createFileSink(logFile)] });
    logger.info("first");
    logger.error("second");
    const lines = fs.readFileSync(logFile, "utf8").trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/ - fsman - INFO - first$/);
    expect(lines[1]).toMatch(/ - fsman - ERROR - second$/);
    fs.removeSync(root);
  });
});
