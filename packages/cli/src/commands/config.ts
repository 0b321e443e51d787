import { access } from "node:fs/promises";
import { resolveConfigPath, saveConfig } from "@treetool/core/config";
import { UsageError } from "@treetool/core/errors";
import { openOutput } from "@treetool/core/io";
import { ToolConfigSchema } from "@treetool/core/schemas";
import { parseCommandArgs } from "../args.js";
import type { Command, CommandGroup } from "./types.js";

async function exists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false,
  );
}

const showCommand: Command = {
  name: "show",
  usage: "",
  summary: "print the resolved configuration",
  async run(ctx, argv) {
    parseCommandArgs({ args: argv });
    const output = await openOutput(undefined, ctx.stdio);
    await output.write(JSON.stringify(ctx.config, null, 2) + "\n");
    await output.close();
  },
};

const initCommand: Command = {
  name: "init",
  usage: "[--force]",
  summary: "write the default configuration to the config path",
  async run(ctx, argv) {
    const { values } = parseCommandArgs({
      args: argv,
      options: { force: { type: "boolean" } },
    });
    const configPath = resolveConfigPath(ctx.configOptions);
    if (values.force !== true && (await exists(configPath))) {
      throw new UsageError(`config file already exists: ${configPath}`, { configPath });
    }

    const written = await saveConfig(ToolConfigSchema.parse({}), ctx.configOptions);
    ctx.logger.info({ configPath: written }, "wrote config");
    const output = await openOutput(undefined, ctx.stdio);
    await output.write(written + "\n");
    await output.close();
  },
};

export const configGroup: CommandGroup = {
  name: "config",
  summary: "show or initialise the configuration file",
  subcommands: [showCommand, initCommand],
};
