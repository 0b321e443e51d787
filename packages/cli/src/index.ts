export { run, VERSION, type RunOptions } from "./run.js";
export {
  parseGlobalArgs,
  parseCommandArgs,
  optionalPositionals,
  type GlobalArgs,
} from "./args.js";
export { resolveLogLevel, treeOptions, type CommandContext } from "./context.js";
export {
  COMMANDS,
  resolveCommand,
  usage,
  formatEntry,
  scanReport,
  type ScanReport,
  type Command,
  type CommandEntry,
  type CommandGroup,
} from "./commands/index.js";
