import type { Writable } from "node:stream";
import { HOME_PATH_ENV, loadConfig, type LoadConfigOptions } from "@treetool/core/config";
import { UsageError, isTreeToolError } from "@treetool/core/errors";
import { openOutput, processStdio, type StdioStreams } from "@treetool/core/io";
import { createLogger, type Logger } from "@treetool/core/logger";
import { parseGlobalArgs } from "./args.js";
import { resolveCommand, usage } from "./commands/index.js";
import { resolveLogLevel } from "./context.js";

export const VERSION = "0.1.0";

export interface RunOptions {
  stdio?: StdioStreams;
  /** Receives the one-line error report. */
  stderr?: Writable;
  env?: NodeJS.ProcessEnv;
  /** Replaces the logger built from the config and -q/-v. */
  logger?: Logger;
}

async function print(stdio: StdioStreams, text: string): Promise<void> {
  const output = await openOutput(undefined, stdio);
  await output.write(text);
  await output.close();
}

function report(err: unknown, stderr: Writable, logger: Logger | undefined): number {
  if (isTreeToolError(err)) {
    logger?.debug({ err }, "command failed");
    stderr.write(`error: ${err.message}\n`);
    return err.exitCode;
  }
  logger?.error({ err }, "unexpected failure");
  stderr.write(`error: ${err instanceof Error ? err.message : String(err)}\n`);
  return 1;
}

/**
 * Runs one treetool invocation and resolves to the process exit code.
 * Never rejects: failures are reported on stderr.
 */
export async function run(argv: string[], options: RunOptions = {}): Promise<number> {
  const stdio = options.stdio ?? processStdio();
  const stderr = options.stderr ?? process.stderr;
  const env = options.env ?? process.env;
  let logger = options.logger;

  try {
    const globals = parseGlobalArgs(argv);
    if (globals.version) {
      await print(stdio, VERSION + "\n");
      return 0;
    }
    if (globals.help) {
      await print(stdio, usage());
      return 0;
    }
    if (globals.command === undefined) {
      throw new UsageError('missing command; see "treetool --help"');
    }

    const configOptions: LoadConfigOptions = {
      configPath: globals.configPath,
      homePath: env[HOME_PATH_ENV],
    };
    const config = await loadConfig(configOptions);
    logger ??= createLogger({
      ...config.logging,
      level: resolveLogLevel(config.logging.level, globals.quiet, globals.verbosity),
    });

    const { command, argv: rest } = resolveCommand(globals.command, globals.rest);
    logger.debug({ command: command.name, argv: rest }, "running command");
    await command.run({ config, configOptions, logger, stdio }, rest);
    return 0;
  } catch (err: unknown) {
    return report(err, stderr, logger);
  }
}
