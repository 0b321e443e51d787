import { inputName, outputName } from "@treetool/core/io";
import { dropZeroLength } from "@treetool/core/tree";
import { optionalPositionals, parseCommandArgs } from "../args.js";
import { readIndexFrom, withOutput, writeIndex } from "./shared.js";
import type { Command } from "./types.js";

export const zeroesCommand: Command = {
  name: "zeroes",
  usage: "[input] [output]",
  summary: "drop groups of zero-length files",
  async run(ctx, argv) {
    const { positionals } = parseCommandArgs({ args: argv, allowPositionals: true });
    const [inputPath, outputPath] = optionalPositionals("zeroes", positionals, [
      "input",
      "output",
    ]);

    ctx.logger.debug(
      { input: inputName(inputPath), output: outputName(outputPath) },
      "removing zero-length groups",
    );
    const index = await readIndexFrom(ctx, inputPath, true);
    const kept = dropZeroLength(index);
    for (const { item } of kept.values()) {
      ctx.logger.trace({ path: item.path }, "kept");
    }

    await withOutput(ctx, outputPath, (output) => writeIndex(output, kept));
  },
};
