import { dirName, outputName, resolveDir } from "@treetool/core/io";
import {
  buildTreeList,
  countDupes,
  formatItem,
  indexFromList,
} from "@treetool/core/tree";
import { optionalPositionals, parseCommandArgs } from "../args.js";
import { treeOptions } from "../context.js";
import { withOutput, writeIndex } from "./shared.js";
import type { Command } from "./types.js";

export const listCommand: Command = {
  name: "list",
  usage: "[--fast] [root] [output]",
  summary: "write one item line per file below root",
  async run(ctx, argv) {
    const { values, positionals } = parseCommandArgs({
      args: argv,
      options: { fast: { type: "boolean" } },
      allowPositionals: true,
    });
    const [root, outputPath] = optionalPositionals("list", positionals, ["root", "output"]);

    ctx.logger.debug({ root: dirName(root), output: outputName(outputPath) }, "listing tree");
    const list = await buildTreeList(resolveDir(root), treeOptions(ctx, values.fast));

    await withOutput(ctx, outputPath, async (output) => {
      for (const item of list) {
        ctx.logger.trace({ path: item.path }, "listed");
        await output.write(formatItem(item));
      }
    });
  },
};

export const indexCommand: Command = {
  name: "index",
  usage: "[--dupes] [--fast] [root] [output]",
  summary: "group the files below root by digest",
  async run(ctx, argv) {
    const { values, positionals } = parseCommandArgs({
      args: argv,
      options: { dupes: { type: "boolean" }, fast: { type: "boolean" } },
      allowPositionals: true,
    });
    const [root, outputPath] = optionalPositionals("index", positionals, ["root", "output"]);

    ctx.logger.debug({ root: dirName(root), output: outputName(outputPath) }, "indexing tree");
    const list = await buildTreeList(resolveDir(root), treeOptions(ctx, values.fast));
    const index = indexFromList(list, { withDupes: values.dupes });
    ctx.logger.info({ items: index.size, dupes: countDupes(index) }, "index complete");

    await withOutput(ctx, outputPath, (output) => writeIndex(output, index));
  },
};
