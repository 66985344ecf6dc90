import { CommandName, generateHelpMessage, isYes, parseCommand, parseList } from "./commands";
import {
  formatBanner,
  formatBulkStats,
  formatCleanStats,
  formatError,
  formatListing,
  formatSize,
  formatSuccess,
} from "./format";
import { Prompter } from "./prompter";
import { ExitCode } from "./types";
import { errorMessage } from "../internals/exceptions";
import { Logger } from "../internals/logger";
import { unreachable } from "../internals/util";
import { OpResult } from "../operations/errors";
import { FileSystemManager } from "../operations/manager";

export const SHELL_COMPONENT = "shell";
export const PROMPT = "\n> ";

export interface ShellOptions {
  /** Colorize results and errors. */
  colors: boolean;
  /** Ask before `delete`, `rmdir` and `clean`. */
  confirmDestructive: boolean;
  /** Receives every line the shell prints. */
  print: (text: string) => void;
}

/**
 * Interactive loop reading commands and their arguments from a prompter and
 * running them on a `FileSystemManager`.
 */
export class Shell {
  private readonly logger: Logger;
  private readonly options: ShellOptions;

  constructor(
    private readonly manager: FileSystemManager,
    private readonly prompter: Prompter,
    logger: Logger,
    options: Partial<ShellOptions> = {},
  ) {
    this.logger = logger.child(SHELL_COMPONENT);
    this.options = {
      colors: options.colors ?? true,
      confirmDestructive: options.confirmDestructive ?? true,
      print: options.print ?? console.log,
    };
  }

  /**
   * Runs commands until `exit` or the end of the input.
   */
  async run(): Promise<ExitCode> {
    this.print(formatBanner(this.options.colors));
    try {
      for (;;) {
        const line = await this.prompter.ask(PROMPT);
        if (line === undefined) {
          this.logger.debug("End of input");
          this.print("Goodbye!");
          return ExitCode.SUCCESS;
        }
        const command = parseCommand(line);
        if (command === undefined) {
          this.print("Invalid command. Type 'help' for available commands.");
          continue;
        }
        this.logger.debug(`Running command ${command}`);
        try {
          if (!(await this.execute(command))) {
            return ExitCode.SUCCESS;
          }
        } catch (err) {
          const reason = errorMessage(err);
          this.logger.error(`Command ${command} failed: ${reason}`);
          this.print(formatError(reason, this.options.colors));
        }
      }
    } finally {
      this.prompter.close();
    }
  }

  /**
   * Runs a single command.
   * @returns `false` if the shell should stop.
   */
  async execute(command: CommandName): Promise<boolean> {
    switch (command) {
      case "list":
        await this.list();
        return true;
      case "copy":
        await this.transfer("copy");
        return true;
      case "move":
        await this.transfer("move");
        return true;
      case "delete":
        await this.deleteFile();
        return true;
      case "rename":
        await this.rename();
        return true;
      case "mkdir":
        await this.createDirectory();
        return true;
      case "rmdir":
        await this.deleteDirectory();
        return true;
      case "ext":
        await this.changeExtension();
        return true;
      case "bulk_ext":
        await this.bulkChangeExtensions();
        return true;
      case "create":
        await this.createFile();
        return true;
      case "size":
        await this.size();
        return true;
      case "clean":
        await this.clean();
        return true;
      case "help":
        this.print("\n" + generateHelpMessage());
        return true;
      case "exit":
        this.print("Goodbye!");
        return false;
      default:
        unreachable(command);
    }
  }

  private async list(): Promise<void> {
    const dir = (await this.ask("Directory path (leave blank for current): ")) || ".";
    const recursive = await this.askYesNo("Recursive? (y/n): ");
    this.report(this.manager.list(dir, recursive), (entries) => {
      if (entries.length > 0) {
        this.print(formatListing(entries, this.options.colors));
      }
    });
  }

  private async transfer(operation: "copy" | "move"): Promise<void> {
    const source = await this.ask("Source file: ");
    const destination = await this.ask("Destination: ");
    const overwrite = await this.askYesNo("Overwrite if exists? (y/n): ");
    if (operation === "copy") {
      this.report(this.manager.copy(source, destination, overwrite), () =>
        this.success("File copied successfully."),
      );
    } else {
      this.report(this.manager.move(source, destination, overwrite), () =>
        this.success("File moved successfully."),
      );
    }
  }

  private async deleteFile(): Promise<void> {
    const file = await this.ask("File to delete: ");
    if (
      !(await this.confirm(`Are you sure you want to delete ${file}? (y/n): `))
    ) {
      return;
    }
    this.report(this.manager.deleteFile(file), () =>
      this.success("File deleted successfully."),
    );
  }

  private async rename(): Promise<void> {
    const source = await this.ask("File to rename: ");
    const newName = await this.ask("New name: ");
    this.report(this.manager.rename(source, newName), () =>
      this.success("File renamed successfully."),
    );
  }

  private async createDirectory(): Promise<void> {
    const dir = await this.ask("Directory path: ");
    const parents = await this.askYesNo(
      "Create parent directories if needed? (y/n): ",
    );
    this.report(this.manager.createDirectory(dir, parents), () =>
      this.success("Directory created successfully."),
    );
  }

  private async deleteDirectory(): Promise<void> {
    const dir = await this.ask("Directory to delete: ");
    const recursive = await this.askYesNo("Delete contents recursively? (y/n): ");
    if (
      !(await this.confirm(`Are you sure you want to delete ${dir}? (y/n): `))
    ) {
      return;
    }
    this.report(this.manager.deleteDirectory(dir, recursive), () =>
      this.success("Directory deleted successfully."),
    );
  }

  private async changeExtension(): Promise<void> {
    const file = await this.ask("File path: ");
    const extension = await this.ask("New extension (with dot, e.g. '.txt'): ");
    this.report(this.manager.changeExtension(file, extension), () =>
      this.success("Extension changed successfully."),
    );
  }

  private async bulkChangeExtensions(): Promise<void> {
    const dir = await this.ask("Directory path: ");
    const current = parseList(
      await this.ask("Current extensions (comma separated, e.g. '.txt,.doc'): "),
    );
    const extension = await this.ask("New extension (with dot, e.g. '.md'): ");
    const recursive = await this.askYesNo("Process subdirectories? (y/n): ");
    this.report(
      this.manager.bulkChangeExtensions(dir, current, extension, recursive),
      (stats) => this.print(formatBulkStats(stats)),
    );
  }

  private async createFile(): Promise<void> {
    const file = await this.ask("File path: ");
    const content = await this.ask(
      "Optional content (leave blank for empty file): ",
    );
    this.report(this.manager.createEmpty(file, content || undefined), () =>
      this.success("File created successfully."),
    );
  }

  private async size(): Promise<void> {
    const dir = await this.ask("Directory path: ");
    const recursive = await this.askYesNo("Include subdirectories? (y/n): ");
    this.report(this.manager.size(dir, recursive), (bytes) =>
      this.print(formatSize(dir, bytes)),
    );
  }

  private async clean(): Promise<void> {
    const dir = await this.ask("Directory to clean: ");
    if (
      !(await this.confirm(
        `Are you sure you want to delete ALL contents of ${dir}? (y/n): `,
      ))
    ) {
      return;
    }
    this.report(this.manager.clean(dir), (stats) => {
      this.success("Directory cleaned successfully.");
      this.print(formatCleanStats(stats));
    });
  }

  /**
   * Prints the error of a failed operation, or hands the value to `onOk`.
   */
  private report<T>(result: OpResult<T>, onOk: (value: T) => void): void {
    switch (result.kind) {
      case "ok":
        onOk(result.value);
        break;
      case "error":
        this.print(formatError(result.error, this.options.colors));
        break;
      default:
        unreachable(result);
    }
  }

  /**
   * Asks a question; the end of the input reads as an empty answer.
   */
  private async ask(question: string): Promise<string> {
    return ((await this.prompter.ask(question)) ?? "").trim();
  }

  private async askYesNo(question: string): Promise<boolean> {
    return isYes(await this.prompter.ask(question));
  }

  /**
   * Asks for confirmation of a destructive command unless confirmations are
   * disabled. Prints `Operation cancelled.` on refusal.
   */
  private async confirm(question: string): Promise<boolean> {
    if (!this.options.confirmDestructive) {
      return true;
    }
    if (await this.askYesNo(question)) {
      return true;
    }
    this.print("Operation cancelled.");
    this.logger.info("Operation cancelled by the user");
    return false;
  }

  private success(message: string): void {
    this.print(formatSuccess(message, this.options.colors));
  }

  private print(text: string): void {
    this.options.print(text);
  }
}
