import type { LoadConfigOptions } from "@treetool/core/config";
import type { StdioStreams } from "@treetool/core/io";
import type { Logger } from "@treetool/core/logger";
import type { LogLevel, ToolConfig } from "@treetool/core/schemas";
import type { TreeListOptions } from "@treetool/core/tree";

/** What every command runs with. */
export interface CommandContext {
  config: ToolConfig;
  /** Where the config was looked up; `config init` writes there. */
  configOptions: LoadConfigOptions;
  logger: Logger;
  stdio: StdioStreams;
}

const VERBOSE_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug", "trace"];

/**
 * -q silences logging; each -v steps up from error, so -v is warn and
 * -vvvv is trace. Without either the configured level applies.
 */
export function resolveLogLevel(
  configured: LogLevel,
  quiet: boolean,
  verbosity: number,
): LogLevel {
  if (quiet) {
    return "silent";
  }
  if (verbosity > 0) {
    return VERBOSE_LEVELS[Math.min(verbosity, VERBOSE_LEVELS.length - 1)];
  }
  return configured;
}

export function treeOptions(ctx: CommandContext, fast = false): TreeListOptions {
  return {
    algorithm: ctx.config.digest.algorithm,
    fast,
    symlinks: ctx.config.walk.symlinks,
    concurrency: ctx.config.walk.concurrency,
  };
}
