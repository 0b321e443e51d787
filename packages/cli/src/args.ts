import { parseArgs, type ParseArgsConfig } from "node:util";
import { UsageError, isErrnoException } from "@treetool/core/errors";

export interface GlobalArgs {
  quiet: boolean;
  /** Number of -v flags. */
  verbosity: number;
  configPath?: string;
  help: boolean;
  version: boolean;
  command?: string;
  /** Everything after the command name. */
  rest: string[];
}

const GLOBAL_OPTIONS = {
  quiet: { type: "boolean", short: "q" },
  verbose: { type: "boolean", short: "v", multiple: true },
  config: { type: "string" },
  help: { type: "boolean", short: "h" },
  version: { type: "boolean" },
} as const;

function toUsageError(err: unknown): unknown {
  if (isErrnoException(err) && err.code?.startsWith("ERR_PARSE_ARGS") === true) {
    return new UsageError(err.message);
  }
  return err;
}

/**
 * Splits argv into the options before the command and the command's own
 * arguments. Global options must precede the command name.
 */
export function parseGlobalArgs(argv: string[]): GlobalArgs {
  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    if (arg === "--") {
      i++;
      break;
    }
    if (arg === "-" || !arg.startsWith("-")) {
      break;
    }
    i += arg === "--config" ? 2 : 1;
  }

  const { values } = parseCommandArgs({
    args: argv.slice(0, Math.min(i, argv.length)),
    options: GLOBAL_OPTIONS,
    allowPositionals: false,
  });

  return {
    quiet: values.quiet ?? false,
    verbosity: values.verbose?.length ?? 0,
    configPath: values.config,
    help: values.help ?? false,
    version: values.version ?? false,
    command: argv[i],
    rest: argv.slice(i + 1),
  };
}

/** `parseArgs` with parse failures reported as UsageError. */
export function parseCommandArgs<T extends ParseArgsConfig>(
  config: T,
): ReturnType<typeof parseArgs<T>> {
  try {
    return parseArgs(config);
  } catch (err: unknown) {
    throw toUsageError(err);
  }
}

/**
 * Checks that at most `names.length` positionals were given and returns
 * them padded to that length; missing ones are undefined.
 */
export function optionalPositionals(
  command: string,
  positionals: string[],
  names: readonly string[],
): Array<string | undefined> {
  if (positionals.length > names.length) {
    throw new UsageError(
      `${command}: unexpected argument "${positionals[names.length]}"`,
      { expected: [...names] },
    );
  }
  return names.map((_, at): string | undefined => positionals[at]);
}
