import { copyInput, inputName, openInput, outputName } from "@treetool/core/io";
import { optionalPositionals, parseCommandArgs } from "../args.js";
import { withOutput } from "./shared.js";
import type { Command } from "./types.js";

export const echoCommand: Command = {
  name: "echo",
  usage: "[-o output] [input]",
  summary: "copy input to output unchanged",
  async run(ctx, argv) {
    const { values, positionals } = parseCommandArgs({
      args: argv,
      options: { output: { type: "string", short: "o" } },
      allowPositionals: true,
    });
    const [inputPath] = optionalPositionals("echo", positionals, ["input"]);

    ctx.logger.debug(
      { input: inputName(inputPath), output: outputName(values.output) },
      "echoing",
    );
    const input = await openInput(inputPath, ctx.stdio);
    await withOutput(ctx, values.output, (output) => copyInput(input, output));
  },
};
