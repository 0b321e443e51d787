import type { CommandContext } from "../context.js";

export interface Command {
  name: string;
  /** Arguments after the command name, for help output. */
  usage: string;
  summary: string;
  run(ctx: CommandContext, argv: string[]): Promise<void>;
}

/** A command whose first argument picks one of its subcommands. */
export interface CommandGroup {
  name: string;
  summary: string;
  subcommands: readonly Command[];
}

export type CommandEntry = Command | CommandGroup;

export function isCommandGroup(entry: CommandEntry): entry is CommandGroup {
  return "subcommands" in entry;
}
