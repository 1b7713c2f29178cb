import type { Command } from "commander";
import { z } from "zod";
import type { DedupeListener, DuplicateGroupReport } from "../../services/types";
import { confirm } from "../confirm";
import { readGlobalOptions, withContainer, type CliEnvironment } from "../context";
import { formatDate, formatTags, printJson, resolveOutputMode, toDedupeJson } from "../output";
import { parseNumber } from "../parsers";

const DedupeOptionsSchema = z.object({
  dryRun: z.boolean().default(false),
  auto: z.boolean().default(false),
  threshold: z.number().optional(),
});

export function describeGroup(group: DuplicateGroupReport): string[] {
  return [
    `Group ${group.position}:`,
    ...group.members.map(
      (member) => `  [${member.id}] ${member.preview}${formatTags(member.tags)} (${formatDate(member.createdAt)})`,
    ),
    "",
  ];
}

const consoleListener: DedupeListener = {
  onGroup(group, total) {
    if (group.position === 1) {
      console.log(`Found ${total} duplicate group(s):\n`);
    }
    describeGroup(group).forEach((line) => console.log(line));
  },
  onMerge(_group, result) {
    console.log(`  → Merged into [${result.survivorId}], deleted ${result.mergedCount} duplicate(s)\n`);
  },
};

export function registerDedupeCommand(program: Command, environment: CliEnvironment): void {
  program
    .command("dedupe")
    .description("Find near-duplicate memories and merge each group into its newest member")
    .option("--dry-run", "Report duplicate groups without merging")
    .option("--auto", "Merge every group without asking")
    .option("--threshold <score>", "bm25 cut-off; lower means stricter", parseNumber)
    .action(async (rawOptions: unknown, command: Command) => {
      const options = DedupeOptionsSchema.parse(rawOptions);
      const globals = readGlobalOptions(command);
      const mode = resolveOutputMode(globals);
      const interactive = mode === "human";

      await withContainer(environment, globals, async ({ services }) => {
        const report = await services.dedupe.run({
          dryRun: options.dryRun,
          auto: options.auto,
          threshold: options.threshold,
          confirm: interactive ? () => confirm("Merge this group (keep newest)?") : undefined,
          listener: interactive ? consoleListener : undefined,
        });

        if (mode === "json") {
          printJson(toDedupeJson(report));
          return;
        }
        if (mode === "quiet") {
          return;
        }

        if (report.status === "not-enough-memories") {
          console.log("Not enough memories to deduplicate.");
        } else if (report.status === "no-duplicates") {
          console.log("No duplicates found.");
        } else if (!report.dryRun) {
          console.log(`Merged ${report.mergedCount} duplicate(s) total.`);
        }
      });
    });
}
