import fs from "fs-extra";
import path from "path";

export enum LogLevel {
  DEBUG,
  INFO,
  WARN,
  ERROR,
}

type MessageType = string | Error;

export type LogFunction = (message: string) => void;

/**
 * Receives every formatted log line regardless of the console verbosity.
 */
export type LogSink = (level: LogLevel, line: string) => void;

export const DEFAULT_COMPONENT = "fsman";

export interface LoggerOptions {
  /** Name of the component printed in every line. */
  component: string;
  /** Collect messages in memory instead of printing them. */
  saveJson: boolean;
  /** Prefix console lines with `timestamp - component - LEVEL - `. */
  showTimestamps: boolean;
  /** Additional sinks, such as the log file. */
  sinks: LogSink[];
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARNING",
  [LogLevel.ERROR]: "ERROR",
};

const pad = (value: number, width: number = 2): string =>
  value.toString().padStart(width, "0");

/**
 * Formats the given time as `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(now: Date = new Date()): string {
  const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
  return `${date} ${time}`;
}

/**
 * Formats a log line as `timestamp - component - LEVEL - message`.
 */
export function formatLogLine(
  component: string,
  level: LogLevel,
  msg: MessageType,
  now: Date = new Date(),
): string {
  const text = typeof msg === "string" ? msg : msg.message;
  return `${formatTimestamp(now)} - ${component} - ${LEVEL_NAMES[level]} - ${text}`;
}

/**
 * Creates a sink appending every line to `logFile`, creating the file and its
 * parent directories on first use.
 */
export function createFileSink(logFile: string): LogSink {
  const resolved = path.resolve(logFile);
  fs.ensureFileSync(resolved);
  return (_level: LogLevel, line: string) => {
    fs.appendFileSync(resolved, `${line}\n`, "utf8");
  };
}

/**
 * Provides a customizable logging mechanism across different levels of verbosity.
 */
export class Logger {
  private logFunctions: Map<LogLevel, LogFunction | undefined>;
  private jsonLogs: Map<LogLevel, string[]>;
  protected readonly options: LoggerOptions;

  constructor(
    logMapping?: Partial<Record<LogLevel, LogFunction | undefined>>,
    options: Partial<LoggerOptions> = {},
  ) {
    this.options = {
      component: options.component ?? DEFAULT_COMPONENT,
      saveJson: options.saveJson ?? false,
      showTimestamps: options.showTimestamps ?? true,
      sinks: options.sinks ?? [],
    };
    this.jsonLogs = new Map([
      [LogLevel.DEBUG, []],
      [LogLevel.INFO, []],
      [LogLevel.WARN, []],
      [LogLevel.ERROR, []],
    ]);
    this.logFunctions = new Map<LogLevel, LogFunction | undefined>([
      [LogLevel.DEBUG, undefined],
      [LogLevel.INFO, console.log],
      [LogLevel.WARN, console.warn],
      [LogLevel.ERROR, console.error],
    ]);
    if (logMapping) {
      for (const level of [
        LogLevel.DEBUG,
        LogLevel.INFO,
        LogLevel.WARN,
        LogLevel.ERROR,
      ]) {
        if (level in logMapping) {
          this.logFunctions.set(level, logMapping[level]);
        }
      }
    }
  }

  get component(): string {
    return this.options.component;
  }

  /**
   * Creates a logger for another component sharing the console functions,
   * the sinks and the JSON storage of this one.
   */
  public child(component: string): Logger {
    const child = new Logger(undefined, { ...this.options, component });
    child.logFunctions = this.logFunctions;
    child.jsonLogs = this.jsonLogs;
    return child;
  }

  public getJsonLogs(): Record<string, string[]> {
    if (!this.options.saveJson) {
      throw new Error("JSON logging not enabled for this logger instance");
    }

    return {
      debug: this.jsonLogs.get(LogLevel.DEBUG) ?? [],
      info: this.jsonLogs.get(LogLevel.INFO) ?? [],
      warn: this.jsonLogs.get(LogLevel.WARN) ?? [],
      error: this.jsonLogs.get(LogLevel.ERROR) ?? [],
    };
  }

  /**
   * Logs a message at the specified log level: every sink receives the full
   * line, the console only if a log function is defined for the level.
   * @param level The severity level of the log entry.
   * @param msg The content of the log message.
   */
  protected log(level: LogLevel, msg: MessageType): void {
    const line = formatLogLine(this.options.component, level, msg);
    this.options.sinks.forEach((sink) => sink(level, line));
    const text = typeof msg === "string" ? msg : msg.message;
    if (this.options.saveJson) {
      this.jsonLogs.get(level)?.push(text);
      return;
    }
    const logFunction = this.logFunctions.get(level);
    if (logFunction) {
      logFunction(this.options.showTimestamps ? line : text);
    }
  }

  /**
   * Logs a debug message.
   */
  public debug(msg: MessageType): void {
    this.log(LogLevel.DEBUG, msg);
  }

  /**
   * Logs an info message.
   */
  public info(msg: MessageType): void {
    this.log(LogLevel.INFO, msg);
  }

  /**
   * Logs a warning message.
   */
  public warn(msg: MessageType): void {
    this.log(LogLevel.WARN, msg);
  }

  /**
   * Logs an error message.
   */
  public error(msg: MessageType): void {
    this.log(LogLevel.ERROR, msg);
  }
}

/**
 * Logger that silences the console. Sinks still receive every line.
 */
export class QuietLogger extends Logger {
  constructor(options: Partial<LoggerOptions> = {}) {
    super(
      {
        [LogLevel.INFO]: undefined,
        [LogLevel.WARN]: undefined,
        [LogLevel.ERROR]: undefined,
      },
      options,
    );
  }
}

/**
 * Logger that enables debug level logging to stdout.
 */
export class DebugLogger extends Logger {
  constructor(options: Partial<LoggerOptions> = {}) {
    super(
      {
        [LogLevel.DEBUG]: console.log,
      },
      options,
    );
  }
}
