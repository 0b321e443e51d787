import { resolve } from "node:path";
import { dirName, outputName, resolveDir } from "@treetool/core/io";
import { buildIndex, type TreeEntry, type TreeIndex } from "@treetool/core/tree";
import { optionalPositionals, parseCommandArgs } from "../args.js";
import { treeOptions } from "../context.js";
import { withOutput } from "./shared.js";
import type { Command } from "./types.js";

export function formatEntry(entry: TreeEntry): string {
  return `${entry.digest} ${entry.size} ${entry.modifiedTime.toISOString()} ${entry.relativePath}\n`;
}

export interface ScanReport {
  root: string;
  algorithm: string;
  entries: Array<{ path: string; digest: string; size: number; modifiedTime: string }>;
}

export function scanReport(root: string, algorithm: string, index: TreeIndex): ScanReport {
  return {
    root: resolve(root),
    algorithm,
    entries: [...index.values()].map((entry) => ({
      path: entry.relativePath,
      digest: entry.digest,
      size: entry.size,
      modifiedTime: entry.modifiedTime.toISOString(),
    })),
  };
}

export const scanCommand: Command = {
  name: "scan",
  usage: "[--json] [root] [output]",
  summary: "digest every regular file below root",
  async run(ctx, argv) {
    const { values, positionals } = parseCommandArgs({
      args: argv,
      options: { json: { type: "boolean" } },
      allowPositionals: true,
    });
    const [root, outputPath] = optionalPositionals("scan", positionals, ["root", "output"]);

    ctx.logger.debug({ root: dirName(root), output: outputName(outputPath) }, "scanning tree");
    const rootPath = resolveDir(root);
    const { algorithm, symlinks, concurrency } = treeOptions(ctx);
    const index = await buildIndex(rootPath, { algorithm, symlinks, concurrency });
    ctx.logger.info({ files: index.size }, "scan complete");

    await withOutput(ctx, outputPath, async (output) => {
      if (values.json === true) {
        const report = scanReport(rootPath, ctx.config.digest.algorithm, index);
        await output.write(JSON.stringify(report, null, 2) + "\n");
        return;
      }
      for (const entry of index.values()) {
        await output.write(formatEntry(entry));
      }
    });
  },
};
