import { inputName, outputName } from "@treetool/core/io";
import { confirmDigestIndex, countDupes } from "@treetool/core/tree";
import { optionalPositionals, parseCommandArgs } from "../args.js";
import { readIndexFrom, withOutput, writeIndex } from "./shared.js";
import type { Command } from "./types.js";

export const confirmCommand: Command = {
  name: "confirm",
  usage: "[input] [output]",
  summary: "re-digest an index in full and keep only true duplicates",
  async run(ctx, argv) {
    const { positionals } = parseCommandArgs({ args: argv, allowPositionals: true });
    const [inputPath, outputPath] = optionalPositionals("confirm", positionals, [
      "input",
      "output",
    ]);

    ctx.logger.debug(
      { input: inputName(inputPath), output: outputName(outputPath) },
      "confirming index",
    );
    const index = await readIndexFrom(ctx, inputPath, true);
    const confirmed = await confirmDigestIndex(index, {
      algorithm: ctx.config.digest.algorithm,
      onConfirmed: (item, dupe) => ctx.logger.debug({ item: item.path, dupe }, "confirmed"),
      onRejected: (item, dupe) => ctx.logger.debug({ item: item.path, dupe }, "rejected"),
    });
    ctx.logger.info(
      { before: countDupes(index), after: countDupes(confirmed) },
      "confirm complete",
    );

    await withOutput(ctx, outputPath, (output) => writeIndex(output, confirmed));
  },
};
