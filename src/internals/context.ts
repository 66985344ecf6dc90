import { FsmanConfig } from "./config";
import { throwZodError, tryMsg } from "./exceptions";
import {
  DebugLogger,
  Logger,
  LoggerOptions,
  LogSink,
  QuietLogger,
  createFileSink,
} from "./logger";
import { CLIOptions, cliOptionDefaults } from "../cli/options";
import { VirtualFileSystem } from "../vfs/virtualFileSystem";
import path from "path";

/**
 * Represents the context for an fsman run.
 */
export class FsmanContext {
  public logger: Logger;
  public config: FsmanConfig;

  /**
   * Path of the log file in use, if any.
   */
  readonly logFile: string | undefined;

  /**
   * Initializes the context for fsman, setting up configuration and appropriate logger.
   * @param fs File system the configuration is read from. The log file is
   * always written to the host, relative to the working directory.
   * @param sinks Additional log sinks.
   */
  constructor(
    fs: VirtualFileSystem,
    options: CLIOptions = cliOptionDefaults,
    sinks: LogSink[] = [],
  ) {
    try {
      this.config = new FsmanConfig({ configPath: options.config, fs });
    } catch (err) {
      throwZodError(err, {
        msg: `Error parsing fsman configuration${options.config ? " " + options.config : ""}`,
        help: "Supported keys: logFile, verbosity, colors, confirmDestructive",
      });
    }

    // Prioritize CLI options to configuration file values
    const logFile =
      options.logFile === false
        ? null
        : (options.logFile ?? this.config.logFile);
    this.logFile = logFile === null ? undefined : path.resolve(logFile);
    if (options.colors === false) {
      this.config.colors = false;
    }
    if (options.yes) {
      this.config.confirmDestructive = false;
    }

    const fileLog = this.logFile;
    const loggerOptions: Partial<LoggerOptions> = {
      sinks:
        fileLog === undefined
          ? sinks
          : [
              ...sinks,
              tryMsg(
                () => createFileSink(fileLog),
                `Cannot open log file ${fileLog}`,
              ),
            ],
    };
    this.logger = options.verbose
      ? new DebugLogger(loggerOptions)
      : options.quiet
        ? new QuietLogger(loggerOptions)
        : this.config.verbosity === "quiet"
          ? new QuietLogger(loggerOptions)
          : this.config.verbosity === "debug"
            ? new DebugLogger(loggerOptions)
            : new Logger(undefined, loggerOptions);
  }
}
