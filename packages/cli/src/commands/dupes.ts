import { inputName, outputName, resolveDir } from "@treetool/core/io";
import { UsageError } from "@treetool/core/errors";
import {
  copyDupes,
  countDupes,
  deleteDupes,
  dupeDirs,
  dupeSavings,
  findDupes,
  formatSavings,
} from "@treetool/core/tree";
import { optionalPositionals, parseCommandArgs } from "../args.js";
import { readIndexFrom, withOutput, writeIndex } from "./shared.js";
import type { Command, CommandGroup } from "./types.js";

const findCommand: Command = {
  name: "find",
  usage: "needle haystack [output]",
  summary: "needle items that also appear in the haystack index",
  async run(ctx, argv) {
    const { positionals } = parseCommandArgs({ args: argv, allowPositionals: true });
    const [needlePath, haystackPath, outputPath] = optionalPositionals(
      "dupes find",
      positionals,
      ["needle", "haystack", "output"],
    );
    if (haystackPath === undefined) {
      throw new UsageError(
        "dupes find: missing haystack index (use - to read the needle from stdin)",
      );
    }

    ctx.logger.debug(
      { needle: inputName(needlePath), haystack: haystackPath, output: outputName(outputPath) },
      "finding duplicates",
    );
    const needle = await readIndexFrom(ctx, needlePath, false);
    const haystack = await readIndexFrom(ctx, haystackPath, true);
    const found = findDupes(needle, haystack);
    ctx.logger.info({ items: found.size, dupes: countDupes(found) }, "find complete");

    await withOutput(ctx, outputPath, (output) => writeIndex(output, found));
  },
};

const listDirsCommand: Command = {
  name: "listdirs",
  usage: "[input] [output]",
  summary: "directories holding duplicates",
  async run(ctx, argv) {
    const { positionals } = parseCommandArgs({ args: argv, allowPositionals: true });
    const [inputPath, outputPath] = optionalPositionals("dupes listdirs", positionals, [
      "input",
      "output",
    ]);

    const index = await readIndexFrom(ctx, inputPath, true);
    await withOutput(ctx, outputPath, async (output) => {
      for (const dir of dupeDirs(index)) {
        await output.write(dir + "\n");
      }
    });
  },
};

const sizeCommand: Command = {
  name: "size",
  usage: "[input] [output]",
  summary: "storage freed by removing every duplicate",
  async run(ctx, argv) {
    const { positionals } = parseCommandArgs({ args: argv, allowPositionals: true });
    const [inputPath, outputPath] = optionalPositionals("dupes size", positionals, [
      "input",
      "output",
    ]);

    const index = await readIndexFrom(ctx, inputPath, true);
    const bytes = dupeSavings(index);
    ctx.logger.debug({ bytes }, "computed savings");
    await withOutput(ctx, outputPath, (output) => output.write(formatSavings(bytes) + "\n"));
  },
};

const copyCommand: Command = {
  name: "copy",
  usage: "[--dry-run] [input] [dest] [output]",
  summary: "copy each duplicate to dest/<digest><ext>",
  async run(ctx, argv) {
    const { values, positionals } = parseCommandArgs({
      args: argv,
      options: { "dry-run": { type: "boolean" } },
      allowPositionals: true,
    });
    const [inputPath, dest, outputPath] = optionalPositionals("dupes copy", positionals, [
      "input",
      "dest",
      "output",
    ]);
    const dryRun = values["dry-run"] ?? false;

    const index = await readIndexFrom(ctx, inputPath, true);
    await withOutput(ctx, outputPath, async (output) => {
      const actions = await copyDupes(index, resolveDir(dest), {
        dryRun,
        onAction: (action) => output.write(action + "\n"),
      });
      ctx.logger.info({ actions, dryRun }, "copy complete");
    });
  },
};

const deleteCommand: Command = {
  name: "delete",
  usage: "[--dry-run] [input] [output]",
  summary: "delete every duplicate, keeping items",
  async run(ctx, argv) {
    const { values, positionals } = parseCommandArgs({
      args: argv,
      options: { "dry-run": { type: "boolean" } },
      allowPositionals: true,
    });
    const [inputPath, outputPath] = optionalPositionals("dupes delete", positionals, [
      "input",
      "output",
    ]);
    const dryRun = values["dry-run"] ?? false;

    const index = await readIndexFrom(ctx, inputPath, true);
    await withOutput(ctx, outputPath, async (output) => {
      const actions = await deleteDupes(index, {
        dryRun,
        onAction: (action) => output.write(action + "\n"),
      });
      ctx.logger.info({ actions, dryRun }, "delete complete");
    });
  },
};

export const dupesGroup: CommandGroup = {
  name: "dupes",
  summary: "work with duplicate groups of a digest index",
  subcommands: [findCommand, listDirsCommand, sizeCommand, copyCommand, deleteCommand],
};
