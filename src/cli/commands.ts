import { uniqueList } from "../internals/util";

/**
 * Commands accepted at the shell prompt, in the order `help` lists them.
 */
export const COMMANDS = [
  "list",
  "copy",
  "move",
  "delete",
  "rename",
  "mkdir",
  "rmdir",
  "ext",
  "bulk_ext",
  "create",
  "size",
  "clean",
  "help",
  "exit",
] as const;

export type CommandName = (typeof COMMANDS)[number];

export const COMMAND_DESCRIPTIONS: Record<CommandName, string> = {
  list: "List directory contents",
  copy: "Copy a file",
  move: "Move a file",
  delete: "Delete a file",
  rename: "Rename a file",
  mkdir: "Create a directory",
  rmdir: "Delete a directory",
  ext: "Change a file's extension",
  bulk_ext: "Bulk change file extensions",
  create: "Create an empty file",
  size: "Get directory size",
  clean: "Clean directory contents",
  help: "Show this help",
  exit: "Exit the program",
};

const COMMAND_SET: ReadonlySet<string> = new Set(COMMANDS);

const isCommandName = (token: string): token is CommandName =>
  COMMAND_SET.has(token);

/**
 * Parses a line typed at the prompt.
 * @returns The command, or `undefined` if the line names no command.
 */
export function parseCommand(line: string): CommandName | undefined {
  const token = line.trim().toLowerCase();
  return isCommandName(token) ? token : undefined;
}

/**
 * Returns true for the answers accepted as "yes": `y` and `yes`, in any case.
 */
export function isYes(answer: string | undefined): boolean {
  const normalized = (answer ?? "").trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}

/**
 * Splits a comma-separated list, dropping blank and repeated items.
 */
export function parseList(answer: string): string[] {
  return uniqueList(
    answer
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item !== ""),
  );
}

/**
 * Builds the text printed by `help`.
 */
export function generateHelpMessage(): string {
  return [
    "Available commands:",
    ...COMMANDS.map((name) => `${name} - ${COMMAND_DESCRIPTIONS[name]}`),
  ].join("\n");
}
