import type { Command } from "commander";
import { z } from "zod";
import { readGlobalOptions, withContainer, type CliEnvironment } from "../context";
import { printMemories, resolveOutputMode } from "../output";
import { collect, parseInteger } from "../parsers";

const ListOptionsSchema = z.object({
  tag: z.array(z.string()).default([]),
  since: z.string().optional(),
  limit: z.number().default(50),
  session: z.string().optional(),
  minImportance: z.number().optional(),
});

export function registerListCommand(program: Command, environment: CliEnvironment): void {
  program
    .command("list")
    .description("List memories in creation order")
    .option("-t, --tag <tag>", "Keep memories carrying this tag (repeatable)", collect, [])
    .option("--since <date>", "Only memories created on or after this date (YYYY-MM-DD)")
    .option("-n, --limit <count>", "Maximum number of results", parseInteger, 50)
    .option("--session <id>", "Only memories from this session")
    .option("--min-importance <level>", "Only memories at or above this importance", parseInteger)
    .action(async (rawOptions: unknown, command: Command) => {
      const options = ListOptionsSchema.parse(rawOptions);
      const globals = readGlobalOptions(command);

      await withContainer(environment, globals, ({ services }) => {
        const memories = services.memory.list({
          since: options.since,
          limit: options.limit,
          tags: options.tag,
          sessionId: options.session,
          minImportance: options.minImportance,
        });
        printMemories(memories, resolveOutputMode(globals));
      });
    });
}
