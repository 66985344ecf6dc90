import { ExecutionException, errorMessage } from "./exceptions";
import { VirtualFileSystem } from "../vfs/virtualFileSystem";
import { z } from "zod";

export const DEFAULT_LOG_FILE = "fsman.log";

const VerbositySchema = z.enum(["quiet", "debug", "default"]);

export type Verbosity = z.infer<typeof VerbositySchema>;

const ConfigSchema = z
  .object({
    logFile: z.string().min(1).nullable().optional(),
    verbosity: VerbositySchema.optional().default("default"),
    colors: z.boolean().optional().default(true),
    confirmDestructive: z.boolean().optional().default(true),
  })
  .strict();

/**
 * Represents content of the fsman configuration file (fsman.config.json).
 */
export class FsmanConfig {
  /** Path of the log file, `null` to disable file logging. */
  public logFile: string | null;
  public verbosity: Verbosity;
  public colors: boolean;
  /** Ask for confirmation before `delete`, `rmdir` and `clean`. */
  public confirmDestructive: boolean;

  /**
   * @param configPath Path to the JSON configuration file. Defaults are used if not set.
   * @param fs File system to read the configuration file from.
   * @throws ExecutionException if the file cannot be read or parsed.
   * @throws ZodError if the content does not follow the schema.
   */
  constructor({
    configPath = undefined,
    fs = undefined,
  }: Partial<{
    configPath: string;
    fs: VirtualFileSystem;
  }> = {}) {
    let configData: unknown = {};
    if (configPath) {
      if (fs === undefined) {
        throw ExecutionException.make(
          `Cannot read config file (${configPath}): no file system given`,
        );
      }
      try {
        configData = JSON.parse(fs.readFile(configPath).toString("utf8"));
      } catch (err) {
        throw ExecutionException.make(
          `Could not load or parse config file (${configPath}): ${errorMessage(err)}`,
        );
      }
    }

    const parsedConfig = ConfigSchema.parse(configData);
    this.logFile =
      parsedConfig.logFile === undefined
        ? FsmanEnv.FSMAN_LOG_FILE
        : parsedConfig.logFile;
    this.verbosity = parsedConfig.verbosity;
    this.colors = parsedConfig.colors;
    this.confirmDestructive = parsedConfig.confirmDestructive;
  }
}

/**
 * Environment variables to configure advanced fsman options.
 */
export class FsmanEnv {
  /**
   * Default path of the log file.
   */
  public static FSMAN_LOG_FILE: string =
    process.env.FSMAN_LOG_FILE || DEFAULT_LOG_FILE;
}
