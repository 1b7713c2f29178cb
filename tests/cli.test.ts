import { Command } from "commander";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ZodError } from "zod";
import type { CliEnvironment } from "../src/cli/context";
import { CliError, UsageError } from "../src/cli/errors";
import { main } from "../src/cli/main";
import { formatDate } from "../src/cli/output";
import { createProgram } from "../src/cli/program";
import { NotFoundError } from "../src/database/errors";

describe("mem CLI", () => {
  let workDir: string;
  let dbPath: string;
  let environment: CliEnvironment;
  let output: string[];

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(os.tmpdir(), "memvault-cli-"));
    dbPath = path.join(workDir, "test.db");
    environment = {
      cwd: workDir,
      homeDir: workDir,
      useDotenv: false,
      envVars: { LOG_LEVEL: "silent", MEMVAULT_DB: undefined },
    };
    output = [];
    vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
      output.push(args.map(String).join(" "));
    });
    Object.defineProperty(process.stdin, "isTTY", { value: false, configurable: true });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(workDir, { recursive: true, force: true });
  });

  function program(): Command {
    const cli = createProgram(environment);
    cli.exitOverride();
    cli.configureOutput({ writeOut: () => {}, writeErr: () => {} });
    return cli;
  }

  async function mem(...args: string[]): Promise<string[]> {
    output = [];
    await program().parseAsync(["node", "mem", "--db", dbPath, ...args]);
    return output;
  }

  async function importFixture(entries: unknown[]): Promise<void> {
    const file = path.join(workDir, "fixture.json");
    await writeFile(file, JSON.stringify(entries), "utf-8");
    await mem("import", file);
  }

  it("registers every command", () => {
    expect(program().commands.map((command) => command.name())).toEqual([
      "remember",
      "recall",
      "update",
      "list",
      "forget",
      "tags",
      "dedupe",
      "rebuild-index",
      "init",
      "stats",
      "export",
      "import",
    ]);
  });

  describe("remember", () => {
    it("prints the new id", async () => {
      expect(await mem("remember", "Prefers dark mode")).toEqual(["Remembered (id=1)"]);
      expect(await mem("--quiet", "remember", "Uses zsh")).toEqual(["2"]);
    });

    it("reports auto-detected tags", async () => {
      expect(await mem("remember", "The API uses JWT", "--auto-tag")).toEqual([
        "Remembered (id=1) [auto-tagged: api, auth]",
      ]);
    });

    it("prints JSON with the detected tags", async () => {
      const [json] = await mem("remember", "The API uses JWT", "-t", "backend", "--auto-tag", "--json");

      expect(JSON.parse(json ?? "")).toEqual({
        id: 1,
        content: "The API uses JWT",
        tags: ["backend", "api", "auth"],
        auto_tags: ["api", "auth"],
      });
    });

    it("reads content from a file", async () => {
      const file = path.join(workDir, "note.txt");
      await writeFile(file, "Notes from a file", "utf-8");

      await mem("remember", "--file", file);

      const [json] = await mem("list", "--json");
      expect(JSON.parse(json ?? "")).toMatchObject([{ id: 1, content: "Notes from a file" }]);
    });

    it("rejects a missing file and out-of-range importance", async () => {
      await expect(mem("remember", "--file", path.join(workDir, "nope.txt"))).rejects.toThrow(UsageError);
      await expect(mem("remember", "Too loud", "-i", "9")).rejects.toThrow(ZodError);
    });
  });

  describe("recall and list", () => {
    beforeEach(async () => {
      await mem("remember", "Deploy API behind the gateway", "-t", "ops", "--session", "s1");
      await mem("remember", "API rate limits are per token", "-t", "api", "-i", "5");
      await mem("remember", "Unrelated grocery list");
    });

    it("prints matching ids", async () => {
      expect((await mem("-q", "recall", "API")).sort()).toEqual(["1", "2"]);
      expect(await mem("-q", "recall", "API", "--tag", "ops")).toEqual(["1"]);
      expect(await mem("-q", "recall", "API", "--min-importance", "4")).toEqual(["2"]);
    });

    it("includes scores in JSON only when asked", async () => {
      const [plain] = await mem("recall", "grocery", "--json");
      const [scored] = await mem("recall", "grocery", "--json", "--show-score");

      expect(JSON.parse(plain ?? "")[0]).not.toHaveProperty("score");
      expect(JSON.parse(scored ?? "")[0].score).toBeLessThan(0);
    });

    it("says so when nothing matches", async () => {
      expect(await mem("recall", "kubernetes")).toEqual(["No memories found."]);
    });

    it("lists with filters and a limit", async () => {
      expect(await mem("-q", "list")).toEqual(["1", "2", "3"]);
      expect(await mem("-q", "list", "--session", "s1")).toEqual(["1"]);
      expect(await mem("-q", "list", "-n", "2")).toEqual(["1", "2"]);
    });
  });

  describe("update", () => {
    beforeEach(async () => {
      await mem("remember", "Cache TTL is 60s", "-t", "cache");
    });

    it("edits in place", async () => {
      expect(await mem("update", "1", "Cache TTL is 120s", "-t", "perf")).toEqual(["Updated memory 1"]);

      const [json] = await mem("list", "--json");
      expect(JSON.parse(json ?? "")).toMatchObject([{ id: 1, content: "Cache TTL is 120s", tags: ["cache", "perf"] }]);
    });

    it("reports when nothing changed", async () => {
      expect(await mem("update", "1", "-t", "cache")).toEqual(["No changes made to memory 1"]);
    });

    it("fails for an unknown id", async () => {
      await expect(mem("update", "99", "x")).rejects.toThrow(NotFoundError);
    });
  });

  describe("forget", () => {
    beforeEach(async () => {
      await mem("remember", "keep me", "-t", "stable");
      await mem("remember", "draft one", "-t", "draft");
      await mem("remember", "draft two", "-t", "draft");
    });

    it("deletes by id", async () => {
      expect(await mem("forget", "1")).toEqual(["Deleted memory 1"]);
      expect(await mem("-q", "list")).toEqual(["2", "3"]);
    });

    it("deletes by tag with confirmation skipped", async () => {
      expect(await mem("forget", "--tag", "draft", "-y")).toEqual(["Deleted 2 memories"]);
      expect(await mem("-q", "list")).toEqual(["1"]);
    });

    it("aborts a bulk delete it cannot confirm", async () => {
      await expect(mem("forget", "--tag", "draft")).rejects.toThrow(CliError);
      expect(await mem("-q", "list")).toEqual(["1", "2", "3"]);
    });

    it("reports an unknown tag", async () => {
      expect(await mem("forget", "--tag", "nothing")).toEqual(["No memories found with tag 'nothing'"]);
    });

    it("needs an id or a tag", async () => {
      await expect(mem("forget")).rejects.toThrow("Provide either a memory id or --tag");
    });
  });

  it("manages tags idempotently", async () => {
    await mem("remember", "tag me", "-t", "a");

    expect(await mem("tags", "add", "1", "b")).toEqual(["Added tag 'b' to memory 1"]);
    expect(await mem("tags", "add", "1", "b")).toEqual(["Memory 1 already has tag 'b'"]);
    expect(await mem("tags", "rm", "1", "a")).toEqual(["Removed tag 'a' from memory 1"]);
    expect(await mem("tags", "rm", "1", "a")).toEqual(["Memory 1 doesn't have tag 'a'"]);

    const [json] = await mem("tags", "list", "--json");
    expect(JSON.parse(json ?? "")).toEqual({ b: 1 });
  });

  describe("dedupe", () => {
    const created = Date.parse("2024-03-01T12:00:00.000Z");
    const later = Date.parse("2024-03-02T12:00:00.000Z");

    beforeEach(async () => {
      await importFixture([
        {
          content: "API configuration documentation",
          tags: ["old-tag"],
          created_at: new Date(created).toISOString(),
        },
        {
          content: "API configuration documentation guide",
          tags: ["new-tag"],
          created_at: new Date(later).toISOString(),
        },
      ]);
    });

    it("shows groups without merging in a dry run", async () => {
      expect(await mem("dedupe", "--dry-run", "--threshold", "0")).toEqual([
        "Found 1 duplicate group(s):\n",
        "Group 1:",
        `  [1] API configuration documentation (tags: old-tag) (${formatDate(created)})`,
        `  [2] API configuration documentation guide (tags: new-tag) (${formatDate(later)})`,
        "",
      ]);
      expect(await mem("-q", "list")).toEqual(["1", "2"]);
    });

    it("merges into the newest memory in auto mode", async () => {
      const lines = await mem("dedupe", "--auto", "--threshold", "0");

      expect(lines.slice(-2)).toEqual([
        "  → Merged into [2], deleted 1 duplicate(s)\n",
        "Merged 1 duplicate(s) total.",
      ]);
      const [json] = await mem("list", "--json");
      expect(JSON.parse(json ?? "")).toMatchObject([{ id: 2, tags: ["new-tag", "old-tag"] }]);
    });

    it("merges nothing when it cannot ask", async () => {
      const lines = await mem("dedupe", "--threshold", "0");

      expect(lines.at(-1)).toBe("Merged 0 duplicate(s) total.");
      expect(await mem("-q", "list")).toEqual(["1", "2"]);
    });

    it("prints the dry-run report as snake_case JSON", async () => {
      const [json] = await mem("--json", "dedupe", "--dry-run", "--threshold", "0");

      expect(JSON.parse(json ?? "")).toEqual({
        status: "completed",
        dry_run: true,
        scanned: 2,
        merged_count: 0,
        groups: [
          {
            position: 1,
            members: [
              {
                id: 1,
                preview: "API configuration documentation",
                tags: ["old-tag"],
                created_at: "2024-03-01T12:00:00.000Z",
              },
              {
                id: 2,
                preview: "API configuration documentation guide",
                tags: ["new-tag"],
                created_at: "2024-03-02T12:00:00.000Z",
              },
            ],
            merged: false,
            survivor_id: null,
            deleted_ids: [],
            tags: ["old-tag", "new-tag"],
          },
        ],
      });
    });

    it("reports merges in JSON", async () => {
      const [json] = await mem("--json", "dedupe", "--auto", "--threshold", "0");

      expect(JSON.parse(json ?? "")).toMatchObject({
        status: "completed",
        dry_run: false,
        merged_count: 1,
        groups: [{ merged: true, survivor_id: 2, deleted_ids: [1], tags: ["new-tag", "old-tag"] }],
      });
    });

    it("finds nothing at the default threshold", async () => {
      expect(await mem("dedupe")).toEqual(["No duplicates found."]);
    });
  });

  it("needs two memories to deduplicate", async () => {
    await mem("remember", "lonely");

    expect(await mem("dedupe", "--auto")).toEqual(["Not enough memories to deduplicate."]);
  });

  it("exports and imports memories", async () => {
    await mem("remember", "first", "-t", "x");
    await mem("remember", "second");
    const file = path.join(workDir, "backup.json");

    expect(await mem("export", file)).toEqual([`Exported 2 memories to ${file}`]);
    const exported = JSON.parse(await readFile(file, "utf-8"));
    expect(exported).toHaveLength(2);
    expect(exported[0]).toMatchObject({ content: "first", tags: ["x"], source: "user" });

    dbPath = path.join(workDir, "restored.db");
    expect(await mem("import", file)).toEqual([`Imported 2 memories from ${file}`]);
    expect(await mem("-q", "list")).toEqual(["1", "2"]);
  });

  it("rejects an import file that is missing or not JSON", async () => {
    const broken = path.join(workDir, "broken.json");
    await writeFile(broken, "{ not json", "utf-8");

    await expect(mem("import", path.join(workDir, "missing.json"))).rejects.toThrow("File not found");
    await expect(mem("import", broken)).rejects.toThrow(UsageError);
  });

  it("rebuilds the index", async () => {
    await mem("remember", "one");
    await mem("remember", "two");

    expect(await mem("rebuild-index")).toEqual(["Rebuilt index with 2 memories"]);
  });

  it("reports stats as JSON", async () => {
    await mem("remember", "one", "-t", "a", "-t", "b");
    await mem("remember", "two", "-t", "a");

    const [json] = await mem("stats", "--json");

    expect(JSON.parse(json ?? "")).toMatchObject({
      db_path: dbPath,
      memory_count: 2,
      tag_count: 2,
      tags: { a: 2, b: 1 },
    });
  });

  it("initializes a local database in the working directory", async () => {
    output = [];
    await program().parseAsync(["node", "mem", "init"]);

    expect(output).toEqual([
      `Local database initialized at: ${path.join(workDir, ".memvault", "memory.db")}`,
    ]);
  });

  it("treats an unparseable search query as a usage error", async () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => {});
    await mem("remember", "anything");

    const code = await main(["node", "mem", "--db", dbPath, "recall", '"open']);

    expect(code).toBe(2);
    expect(errors).toHaveBeenCalledWith("Error: Invalid search query: unterminated string");
  });

  it("exits with status 2 and a message for usage errors", async () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => {});

    const code = await main(["node", "mem", "--db", dbPath, "forget"]);

    expect(code).toBe(2);
    expect(errors).toHaveBeenCalledWith("Error: Provide either a memory id or --tag");
  });
});
