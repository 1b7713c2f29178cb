import type { Command } from "commander";
import { pathExists, stat } from "fs-extra";
import { readGlobalOptions, withContainer, type CliEnvironment } from "../context";
import { printJson, printTagCounts } from "../output";

export function registerStatsCommand(program: Command, environment: CliEnvironment): void {
  program
    .command("stats")
    .description("Show database location, size, memory count and tag usage")
    .action(async (_rawOptions: unknown, command: Command) => {
      const globals = readGlobalOptions(command);

      await withContainer(environment, globals, async ({ config, repositories, services }) => {
        const dbPath = config.database.path;
        const sizeBytes = (await pathExists(dbPath)) ? (await stat(dbPath)).size : 0;
        const memoryCount = repositories.memory.count();
        const tagCounts = services.memory.countTags();

        if (globals.json) {
          printJson({
            db_path: dbPath,
            db_size_bytes: sizeBytes,
            memory_count: memoryCount,
            tag_count: tagCounts.length,
            tags: Object.fromEntries(tagCounts.map(({ tag, count }) => [tag, count])),
          });
          return;
        }

        console.log(`Database: ${dbPath}`);
        console.log(`Size: ${sizeBytes.toLocaleString("en-US")} bytes`);
        console.log(`Memories: ${memoryCount}`);
        console.log(`Unique tags: ${tagCounts.length}`);
        if (tagCounts.length > 0) {
          printTagCounts(tagCounts, "human");
        }
      });
    });
}
