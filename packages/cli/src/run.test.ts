import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { access, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { PassThrough, Readable } from "node:stream";
import pino from "pino";
import { createTempTree, sha256Hex, type TempTree } from "@treetool/core/test-utils";
import { run, VERSION, type RunOptions } from "./run.js";

const H = sha256Hex("hello");
const W = sha256Hex("world");
const E = sha256Hex("");

interface Harness {
  options: RunOptions;
  stdout(): string;
  stderr(): string;
}

function collect(stream: PassThrough): () => string {
  const chunks: Buffer[] = [];
  stream.on("data", (chunk: Buffer) => chunks.push(chunk));
  return () => Buffer.concat(chunks).toString("utf-8");
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

async function exists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false,
  );
}

describe("run", () => {
  let tree: TempTree;
  let other: TempTree;
  let home: TempTree;

  function harness(input?: string): Harness {
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    return {
      options: {
        stdio: { stdin: Readable.from(input === undefined ? [] : [input]), stdout },
        stderr,
        env: { TREETOOL_HOME: home.root },
        logger: pino({ level: "silent" }),
      },
      stdout: collect(stdout),
      stderr: collect(stderr),
    };
  }

  async function treetool(
    argv: string[],
    input?: string,
  ): Promise<{ code: number; stdout: string; stderr: string }> {
    const h = harness(input);
    const code = await run(argv, h.options);
    await flush();
    return { code, stdout: h.stdout(), stderr: h.stderr() };
  }

  beforeEach(async () => {
    tree = await createTempTree(
      { "a.txt": "hello", "b.txt": "world", "empty.txt": "", "sub/c.txt": "hello" },
      "run-tree-",
    );
    other = await createTempTree({ "x.txt": "hello" }, "run-other-");
    home = await createTempTree({}, "run-home-");
  });

  afterEach(async () => {
    await tree.remove();
    await other.remove();
    await home.remove();
  });

  describe("scan", () => {
    it("writes digest, size, mtime and relative path per file in path order", async () => {
      const { code, stdout } = await treetool(["scan", tree.root]);

      expect(code).toBe(0);
      const lines = stdout.trimEnd().split("\n").map((line) => line.split(" "));
      expect(lines.map(([digest, size, , path]) => [digest, size, path])).toEqual([
        [H, "5", "a.txt"],
        [W, "5", "b.txt"],
        [E, "0", "empty.txt"],
        [H, "5", "sub/c.txt"],
      ]);
      expect(Number.isNaN(Date.parse(lines[0][2]))).toBe(false);
    });

    it("writes a JSON report with --json", async () => {
      const out = home.path("scan.json");
      const { code } = await treetool(["scan", "--json", tree.root, out]);

      expect(code).toBe(0);
      const report = JSON.parse(await readFile(out, "utf-8"));
      expect(report.root).toBe(tree.root);
      expect(report.algorithm).toBe("sha256");
      expect(report.entries.map((e: { path: string }) => e.path)).toEqual([
        "a.txt",
        "b.txt",
        "empty.txt",
        "sub/c.txt",
      ]);
      expect(report.entries[0]).toMatchObject({ digest: H, size: 5 });
    });

    it("exits 66 when the root is missing", async () => {
      const missing = join(tree.root, "nope");
      const { code, stderr } = await treetool(["scan", missing]);

      expect(code).toBe(66);
      expect(stderr).toBe(`error: no such file or directory: ${missing}\n`);
    });

    it("exits 66 when the root is a file", async () => {
      const file = tree.path("a.txt");
      const { code, stderr } = await treetool(["scan", file]);

      expect(code).toBe(66);
      expect(stderr).toBe(`error: not a directory: ${file}\n`);
    });
  });

  describe("list / index", () => {
    it("lists every file as an item line", async () => {
      const { code, stdout } = await treetool(["list", tree.root]);

      expect(code).toBe(0);
      expect(stdout).toBe(
        `${H} 5 ${tree.path("a.txt")}\n` +
          `${W} 5 ${tree.path("b.txt")}\n` +
          `${E} 0 ${tree.path("empty.txt")}\n` +
          `${H} 5 ${tree.path("sub/c.txt")}\n`,
      );
    });

    it("groups duplicates with --dupes", async () => {
      const out = home.path("index.txt");
      const { code } = await treetool(["index", "--dupes", tree.root, out]);

      expect(code).toBe(0);
      expect(await readFile(out, "utf-8")).toBe(
        `${H} 5 ${tree.path("a.txt")}\n` +
          `- ${tree.path("sub/c.txt")}\n` +
          `${W} 5 ${tree.path("b.txt")}\n` +
          `${E} 0 ${tree.path("empty.txt")}\n`,
      );
    });

    it("keeps one line per digest without --dupes", async () => {
      const { stdout } = await treetool(["index", tree.root]);

      expect(stdout).toBe(
        `${H} 5 ${tree.path("a.txt")}\n` +
          `${W} 5 ${tree.path("b.txt")}\n` +
          `${E} 0 ${tree.path("empty.txt")}\n`,
      );
    });
  });

  describe("index pipelines", () => {
    let indexFile: string;

    beforeEach(async () => {
      indexFile = home.path("dupes.txt");
      expect(await run(["index", "--dupes", tree.root, indexFile], harness().options)).toBe(0);
    });

    it("zeroes drops zero-length groups", async () => {
      const { code, stdout } = await treetool(["zeroes", indexFile]);

      expect(code).toBe(0);
      expect(stdout).toBe(
        `${H} 5 ${tree.path("a.txt")}\n` +
          `- ${tree.path("sub/c.txt")}\n` +
          `${W} 5 ${tree.path("b.txt")}\n`,
      );
    });

    it("zeroes reads standard input when no input is named", async () => {
      const { stdout } = await treetool(["zeroes"], `${E} 0 /x/empty\n${W} 5 /x/w\n`);
      expect(stdout).toBe(`${W} 5 /x/w\n`);
    });

    it("confirm keeps true duplicates", async () => {
      const { code, stdout } = await treetool(["confirm", indexFile]);

      expect(code).toBe(0);
      expect(stdout).toBe(await readFile(indexFile, "utf-8"));
    });

    it("confirm drops a duplicate whose content changed", async () => {
      await writeFile(tree.path("sub/c.txt"), "HELLO");
      const { stdout } = await treetool(["confirm", indexFile]);

      expect(stdout).toBe(
        `${H} 5 ${tree.path("a.txt")}\n` +
          `${W} 5 ${tree.path("b.txt")}\n` +
          `${E} 0 ${tree.path("empty.txt")}\n`,
      );
    });

    it("dupes size reports the bytes saved", async () => {
      const { stdout } = await treetool(["dupes", "size", indexFile]);
      expect(stdout).toBe("Total saved 5 Bytes\n");
    });

    it("dupes listdirs lists directories holding duplicates", async () => {
      const { stdout } = await treetool(["dupes", "listdirs", indexFile]);
      expect(stdout).toBe(`${dirname(tree.path("sub/c.txt"))}\n`);
    });

    it("dupes delete --dry-run reports without deleting", async () => {
      const { code, stdout } = await treetool(["dupes", "delete", "--dry-run", indexFile]);

      expect(code).toBe(0);
      expect(stdout).toBe(`rm ${tree.path("sub/c.txt")}\n`);
      expect(await exists(tree.path("sub/c.txt"))).toBe(true);
    });

    it("dupes delete removes duplicates and keeps items", async () => {
      await treetool(["dupes", "delete", indexFile]);

      expect(await exists(tree.path("sub/c.txt"))).toBe(false);
      expect(await exists(tree.path("a.txt"))).toBe(true);
    });

    it("dupes copy copies each duplicate under its digest", async () => {
      const dest = await createTempTree({}, "run-dest-");
      try {
        const { code, stdout } = await treetool(["dupes", "copy", indexFile, dest.root]);

        expect(code).toBe(0);
        expect(stdout).toBe(`cp ${tree.path("sub/c.txt")} ${dest.path(`${H}.txt`)}\n`);
        expect(await readFile(dest.path(`${H}.txt`), "utf-8")).toBe("hello");
      } finally {
        await dest.remove();
      }
    });

    it("dupes find lists haystack copies of needle items", async () => {
      const needle = home.path("needle.txt");
      expect(await run(["index", other.root, needle], harness().options)).toBe(0);

      const { code, stdout } = await treetool(["dupes", "find", needle, indexFile]);

      expect(code).toBe(0);
      expect(stdout).toBe(
        `${H} 5 ${other.path("x.txt")}\n` +
          `- ${tree.path("a.txt")}\n` +
          `- ${tree.path("sub/c.txt")}\n`,
      );
    });

    it("dupes find needs a haystack", async () => {
      const { code, stderr } = await treetool(["dupes", "find", indexFile]);

      expect(code).toBe(64);
      expect(stderr).toBe(
        "error: dupes find: missing haystack index (use - to read the needle from stdin)\n",
      );
    });
  });

  describe("match", () => {
    it("finds copies of indexed items below the root", async () => {
      const { code, stdout } = await treetool(
        ["match", tree.root],
        `${H} 5 ${other.path("x.txt")}\n`,
      );

      expect(code).toBe(0);
      expect(stdout).toBe(
        `${H} 5 ${other.path("x.txt")}\n` +
          `- ${tree.path("a.txt")}\n` +
          `- ${tree.path("sub/c.txt")}\n`,
      );
    });
  });

  describe("echo", () => {
    it("copies standard input to standard output", async () => {
      const { code, stdout } = await treetool(["echo"], "one\ntwo\n");

      expect(code).toBe(0);
      expect(stdout).toBe("one\ntwo\n");
    });

    it("exits 74 when the input cannot be read", async () => {
      const out = home.path("echo.txt");
      const { code, stderr } = await treetool(["echo", "-o", out, tree.path("sub")]);

      expect(code).toBe(74);
      expect(stderr.startsWith(`error: i/o error on ${tree.path("sub")}: `)).toBe(true);
    });

    it("copies a file to the -o file", async () => {
      const out = home.path("echo.txt");
      const { code } = await treetool(["echo", "-o", out, tree.path("b.txt")]);

      expect(code).toBe(0);
      expect(await readFile(out, "utf-8")).toBe("world");
    });
  });

  describe("config", () => {
    it("show prints the defaults when no config file exists", async () => {
      const { code, stdout } = await treetool(["config", "show"]);

      expect(code).toBe(0);
      expect(JSON.parse(stdout)).toEqual({
        logging: { level: "warn", pretty: true },
        digest: { algorithm: "sha256" },
        walk: { symlinks: "within-root", concurrency: 1 },
      });
    });

    it("show reads the file named by --config", async () => {
      const configPath = home.path("custom.json");
      await writeFile(configPath, JSON.stringify({ walk: { symlinks: "never" } }));

      const { stdout } = await treetool(["--config", configPath, "config", "show"]);

      expect(JSON.parse(stdout).walk).toEqual({ symlinks: "never", concurrency: 1 });
    });

    it("init writes the defaults once", async () => {
      const configPath = home.path("config.json");

      const first = await treetool(["config", "init"]);
      expect(first.code).toBe(0);
      expect(first.stdout).toBe(`${configPath}\n`);
      expect(JSON.parse(await readFile(configPath, "utf-8")).digest).toEqual({
        algorithm: "sha256",
      });

      const second = await treetool(["config", "init"]);
      expect(second.code).toBe(64);
      expect(second.stderr).toBe(`error: config file already exists: ${configPath}\n`);

      expect((await treetool(["config", "init", "--force"])).code).toBe(0);
    });

    it("exits 78 on an invalid config file", async () => {
      await writeFile(home.path("config.json"), "{ not json");
      const { code, stderr } = await treetool(["scan", tree.root]);

      expect(code).toBe(78);
      expect(stderr.startsWith(`error: invalid config ${home.path("config.json")}: `)).toBe(
        true,
      );
    });
  });

  describe("errors and flags", () => {
    it("exits 64 for an unknown command", async () => {
      const { code, stderr } = await treetool(["frob"]);

      expect(code).toBe(64);
      expect(stderr).toBe("error: unknown command: frob\n");
    });

    it("exits 64 without a command", async () => {
      const { code, stderr } = await treetool([]);

      expect(code).toBe(64);
      expect(stderr).toBe('error: missing command; see "treetool --help"\n');
    });

    it("exits 64 for an unknown command option", async () => {
      const { code, stderr } = await treetool(["scan", "--bogus"]);

      expect(code).toBe(64);
      expect(stderr.startsWith("error: ")).toBe(true);
    });

    it("exits 64 for too many arguments", async () => {
      const { code, stderr } = await treetool(["zeroes", "a", "b", "c"]);

      expect(code).toBe(64);
      expect(stderr).toBe('error: zeroes: unexpected argument "c"\n');
    });

    it("exits 65 on a malformed index", async () => {
      const { code, stderr } = await treetool(["zeroes"], "garbage\n");

      expect(code).toBe(65);
      expect(stderr).toBe("error: invalid index format: missing digest on line 1\n");
    });

    it("exits 74 when the input file cannot be opened", async () => {
      const missing = home.path("missing.txt");
      const { code, stderr } = await treetool(["zeroes", missing]);

      expect(code).toBe(74);
      expect(stderr.startsWith(`error: i/o error on ${missing}: `)).toBe(true);
    });

    it("prints the version", async () => {
      const { code, stdout } = await treetool(["--version"]);

      expect(code).toBe(0);
      expect(stdout).toBe(`${VERSION}\n`);
    });

    it("prints usage for --help", async () => {
      const { code, stdout } = await treetool(["--help"]);

      expect(code).toBe(0);
      expect(stdout.startsWith("usage: treetool ")).toBe(true);
    });

    it("accepts -q and -v before the command", async () => {
      const { code } = await treetool(["-q", "-vv", "index", tree.root]);
      expect(code).toBe(0);
    });
  });
});
