import { UsageError } from "@treetool/core/errors";
import { configGroup } from "./config.js";
import { confirmCommand } from "./confirm.js";
import { dupesGroup } from "./dupes.js";
import { echoCommand } from "./echo.js";
import { indexCommand, listCommand } from "./list.js";
import { matchCommand } from "./match.js";
import { scanCommand } from "./scan.js";
import { isCommandGroup, type Command, type CommandEntry } from "./types.js";
import { zeroesCommand } from "./zeroes.js";

export type { Command, CommandEntry, CommandGroup } from "./types.js";
export { formatEntry, scanReport, type ScanReport } from "./scan.js";

export const COMMANDS: readonly CommandEntry[] = [
  scanCommand,
  listCommand,
  indexCommand,
  matchCommand,
  confirmCommand,
  zeroesCommand,
  dupesGroup,
  echoCommand,
  configGroup,
];

/**
 * Finds the command named by the first argument, descending into a
 * group for its subcommand. Returns the arguments left for the command.
 */
export function resolveCommand(
  name: string,
  argv: string[],
): { command: Command; argv: string[] } {
  const entry = COMMANDS.find((c) => c.name === name);
  if (entry === undefined) {
    throw new UsageError(`unknown command: ${name}`);
  }
  if (!isCommandGroup(entry)) {
    return { command: entry, argv };
  }

  const [sub, ...rest] = argv;
  const subcommands = entry.subcommands.map((c) => c.name);
  if (sub === undefined) {
    throw new UsageError(`${name}: missing subcommand`, { subcommands });
  }
  const command = entry.subcommands.find((c) => c.name === sub);
  if (command === undefined) {
    throw new UsageError(`${name}: unknown subcommand: ${sub}`, { subcommands });
  }
  return { command: { ...command, name: `${name} ${command.name}` }, argv: rest };
}

export function usage(): string {
  const rows: Array<[string, string]> = [];
  for (const entry of COMMANDS) {
    if (isCommandGroup(entry)) {
      for (const sub of entry.subcommands) {
        rows.push([`${entry.name} ${sub.name} ${sub.usage}`.trimEnd(), sub.summary]);
      }
    } else {
      rows.push([`${entry.name} ${entry.usage}`.trimEnd(), entry.summary]);
    }
  }
  const width = Math.max(...rows.map(([left]) => left.length));

  return [
    "usage: treetool [-q] [-v...] [--config <path>] <command> [args]",
    "",
    "Paths are optional: no input (or -) reads stdin, no output writes stdout",
    "and no root scans the working directory.",
    "",
    "commands:",
    ...rows.map(([left, summary]) => `  ${left.padEnd(width)}  ${summary}`),
    "",
  ].join("\n");
}
