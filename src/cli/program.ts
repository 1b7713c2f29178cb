import { Command } from "commander";
import { readJsonSync } from "fs-extra";
import path from "node:path";
import { z } from "zod";
import type { CliEnvironment } from "./context";
import { registerDedupeCommand } from "./commands/dedupe";
import { registerForgetCommand } from "./commands/forget";
import { registerInitCommand } from "./commands/init";
import { registerListCommand } from "./commands/list";
import { registerRebuildIndexCommand } from "./commands/rebuild-index";
import { registerRecallCommand } from "./commands/recall";
import { registerRememberCommand } from "./commands/remember";
import { registerStatsCommand } from "./commands/stats";
import { registerTagsCommand } from "./commands/tags";
import { registerUpdateCommand } from "./commands/update";
import { registerExportCommand, registerImportCommand } from "./commands/transfer";

const PackageManifestSchema = z.object({ version: z.string() });

function readVersion(): string {
  // Same relative location from src/cli and dist/cli.
  const manifest = readJsonSync(path.resolve(__dirname, "..", "..", "package.json"));
  return PackageManifestSchema.parse(manifest).version;
}

const EXAMPLES = `
Examples:
  mem remember "API key is in .env"              Store a memory
  mem remember "JWT auth setup" --auto-tag       Detect tags from keywords
  mem recall "API" --show-score --recent-first   Search, newest first
  mem update 42 "New content" --tag newtag       Edit in place
  mem list --session work --min-importance 4     Filtered listing
  mem dedupe --dry-run                           Report near-duplicates

Database: ./.memvault/memory.db when present, otherwise ~/.memvault/memory.db.
Override with --db PATH or MEMVAULT_DB.`;

export function createProgram(environment: CliEnvironment = {}): Command {
  const program = new Command();

  program
    .name("mem")
    .description("Persistent memory for LLM sessions, searchable with SQLite full-text search")
    .version(readVersion())
    .option("-j, --json", "Output results as JSON")
    .option("-q, --quiet", "Print only ids")
    .option("--db <path>", "Database file; overrides every other location")
    .option("-g, --global", "Use the global database even when ./.memvault exists")
    .addHelpText("after", EXAMPLES);

  registerRememberCommand(program, environment);
  registerRecallCommand(program, environment);
  registerUpdateCommand(program, environment);
  registerListCommand(program, environment);
  registerForgetCommand(program, environment);
  registerTagsCommand(program, environment);
  registerDedupeCommand(program, environment);
  registerRebuildIndexCommand(program, environment);
  registerInitCommand(program, environment);
  registerStatsCommand(program, environment);
  registerExportCommand(program, environment);
  registerImportCommand(program, environment);

  return program;
}
