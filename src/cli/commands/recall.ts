import type { Command } from "commander";
import { z } from "zod";
import { readGlobalOptions, withContainer, type CliEnvironment } from "../context";
import { printMemories, resolveOutputMode } from "../output";
import { collect, parseInteger } from "../parsers";

const RecallOptionsSchema = z.object({
  tag: z.array(z.string()).default([]),
  limit: z.number().default(10),
  showScore: z.boolean().default(false),
  recentFirst: z.boolean().default(false),
  session: z.string().optional(),
  minImportance: z.number().optional(),
  boostImportant: z.boolean().default(false),
});

export function registerRecallCommand(program: Command, environment: CliEnvironment): void {
  program
    .command("recall")
    .description("Search memories with full-text search over content and context")
    .argument("<query>", "FTS5 query, e.g. \"api OR database\" or \"config*\"")
    .option("-t, --tag <tag>", "Keep results carrying this tag (repeatable)", collect, [])
    .option("-n, --limit <count>", "Maximum number of results", parseInteger, 10)
    .option("--show-score", "Show bm25 relevance scores")
    .option("--recent-first", "Sort by creation date, newest first")
    .option("--session <id>", "Only memories from this session")
    .option("--min-importance <level>", "Only memories at or above this importance", parseInteger)
    .option("--boost-important", "Rank higher importance first, then relevance")
    .action(async (query: string, rawOptions: unknown, command: Command) => {
      const options = RecallOptionsSchema.parse(rawOptions);
      const globals = readGlobalOptions(command);

      await withContainer(environment, globals, ({ services }) => {
        const results = services.search.recall({
          query,
          limit: options.limit,
          tags: options.tag,
          sessionId: options.session,
          minImportance: options.minImportance,
          recentFirst: options.recentFirst,
          boostImportant: options.boostImportant,
        });

        const scores = options.showScore
          ? new Map(results.map(({ memory, score }) => [memory.id, score]))
          : undefined;

        printMemories(
          results.map(({ memory }) => memory),
          resolveOutputMode(globals),
          scores,
        );
      });
    });
}
