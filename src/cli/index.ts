export { CLIOptions, cliOptions, cliOptionDefaults } from "./options";
export { ExitCode } from "./types";
export { Prompter, ReadlinePrompter } from "./prompter";
export { Shell, ShellOptions, PROMPT } from "./shell";
export * from "./commands";
export * from "./format";
export { ShellIO, createFsmanCommand, runFsmanCommand } from "./cli";
