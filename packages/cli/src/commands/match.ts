import { dirName, inputName, outputName, resolveDir } from "@treetool/core/io";
import { countDupes, matchTree } from "@treetool/core/tree";
import { optionalPositionals, parseCommandArgs } from "../args.js";
import { treeOptions } from "../context.js";
import { readIndexFrom, withOutput, writeIndex } from "./shared.js";
import type { Command } from "./types.js";

export const matchCommand: Command = {
  name: "match",
  usage: "[--fast] [root] [input] [output]",
  summary: "find copies of the indexed files below root",
  async run(ctx, argv) {
    const { values, positionals } = parseCommandArgs({
      args: argv,
      options: { fast: { type: "boolean" } },
      allowPositionals: true,
    });
    const [root, inputPath, outputPath] = optionalPositionals("match", positionals, [
      "root",
      "input",
      "output",
    ]);

    ctx.logger.debug(
      { root: dirName(root), input: inputName(inputPath), output: outputName(outputPath) },
      "matching tree against index",
    );
    const index = await readIndexFrom(ctx, inputPath, false);
    const matched = await matchTree(index, resolveDir(root), treeOptions(ctx, values.fast));
    ctx.logger.info({ dupes: countDupes(matched) }, "match complete");

    await withOutput(ctx, outputPath, (output) => writeIndex(output, matched));
  },
};
