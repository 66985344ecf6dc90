import { CLIOptions, cliOptionDefaults, cliOptions } from "./options";
import { Prompter, ReadlinePrompter } from "./prompter";
import { Shell } from "./shell";
import { ExitCode } from "./types";
import { FsmanContext } from "../internals/context";
import { LogSink } from "../internals/logger";
import { FileSystemManager } from "../operations/manager";
import { FSMAN_VERSION } from "../version";
import { createNodeFileSystem } from "../vfs/createNodeFileSystem";
import { Command } from "commander";

/**
 * Where the shell reads its input and writes its output.
 */
export interface ShellIO {
  prompter: Prompter;
  print: (text: string) => void;
  /** Log sinks added to the ones set up by the configuration. */
  sinks: LogSink[];
}

/**
 * Creates and configures the fsman CLI command.
 * @returns The configured commander Command instance.
 */
export function createFsmanCommand(): Command {
  const command = new Command()
    .name("fsman")
    .description("Interactive file maintenance shell")
    .version(`fsman ${FSMAN_VERSION}`);
  cliOptions.forEach((option) => command.addOption(option));
  return command;
}

/**
 * Parses the command line and runs the shell in the current working directory
 * until it exits.
 *
 * Note: This function throws execution exceptions on wrong options or
 * configuration. Handle exceptions appropriately when calling this function.
 *
 * @param args The list of arguments to pass to the CLI command.
 * @param io Overrides of the terminal input and output.
 * @param command Optional pre-configured Command instance. Defaults to createFsmanCommand().
 * @returns The exit code of the shell.
 */
export async function runFsmanCommand(
  args: string[],
  io: Partial<ShellIO> = {},
  command: Command = createFsmanCommand(),
): Promise<ExitCode> {
  await command.parseAsync(args, { from: "user" });
  const options: CLIOptions = {
    ...cliOptionDefaults,
    ...command.opts<Partial<CLIOptions>>(),
  };
  const fs = createNodeFileSystem(process.cwd(), options.readOnly);
  const ctx = new FsmanContext(fs, options, io.sinks);
  ctx.logger.debug(
    `Starting fsman ${FSMAN_VERSION} in ${fs.root}${options.readOnly ? " (read-only)" : ""}`,
  );
  if (ctx.logFile !== undefined) {
    ctx.logger.debug(`Logging to ${ctx.logFile}`);
  }
  const manager = new FileSystemManager(fs, ctx.logger);
  const shell = new Shell(
    manager,
    io.prompter ?? new ReadlinePrompter(),
    ctx.logger,
    {
      colors: ctx.config.colors,
      confirmDestructive: ctx.config.confirmDestructive,
      print: io.print,
    },
  );
  return shell.run();
}
