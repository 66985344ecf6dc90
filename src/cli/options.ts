import { Option } from "commander";

export interface CLIOptions {
  config?: string;
  verbose: boolean;
  quiet: boolean;
  /** Overrides the log file of the configuration. `false` disables file logging. */
  logFile?: string | false;
  colors: boolean;
  yes: boolean;
  readOnly: boolean;
}

export const cliOptionDefaults: CLIOptions = {
  config: undefined,
  verbose: false,
  quiet: false,
  logFile: undefined,
  colors: true,
  yes: false,
  readOnly: false,
};

export const cliOptions = [
  new Option("--config <PATH>", "Path to the fsman configuration file."),
  new Option("--verbose", "Enable verbose output.").default(
    cliOptionDefaults.verbose,
  ),
  new Option("--quiet", "Suppress log output on the console.").default(
    cliOptionDefaults.quiet,
  ),
  new Option(
    "--log-file <PATH>",
    "File to append the log to. Overrides the configuration file.",
  ),
  new Option("--no-log-file", "Do not write the log to a file."),
  new Option("--no-colors", "Disable ANSI colors in the output."),
  new Option(
    "-y, --yes",
    "Do not ask for confirmation before destructive commands.",
  ).default(cliOptionDefaults.yes),
  new Option(
    "--read-only",
    "Refuse every command that modifies the file system.",
  ).default(cliOptionDefaults.readOnly),
];
