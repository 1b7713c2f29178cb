import type { Command } from "commander";
import { z } from "zod";
import { readGlobalOptions, withContainer, type CliEnvironment } from "../context";
import { printJson, resolveOutputMode } from "../output";
import { collect, collectIntegers, parseInteger } from "../parsers";

const UpdateOptionsSchema = z.object({
  tag: z.array(z.string()).default([]),
  context: z.string().optional(),
  clearTags: z.boolean().default(false),
  session: z.string().optional(),
  supersedes: z.number().optional(),
  seeAlso: z.array(z.number()).default([]),
  sourceUrl: z.string().optional(),
  sourceFile: z.string().optional(),
  importance: z.number().optional(),
});

export function registerUpdateCommand(program: Command, environment: CliEnvironment): void {
  program
    .command("update")
    .description("Modify a memory in place, keeping its id and creation time")
    .argument("<id>", "Id of the memory to update", parseInteger)
    .argument("[content]", "Replacement content")
    .option("-t, --tag <tag>", "Add a tag (repeatable)", collect, [])
    .option("-c, --context <text>", "Replace the context")
    .option("--clear-tags", "Remove every tag")
    .option("--session <id>", "Set the session id")
    .option("--supersedes <id>", "Set the id of the memory this one replaces", parseInteger)
    .option("--see-also <id>", "Link a related memory (repeatable)", collectIntegers, [])
    .option("--source-url <url>", "Set the source URL")
    .option("--source-file <path>", "Set the source file")
    .option("-i, --importance <level>", "Set importance from 1 to 5", parseInteger)
    .action(async (id: number, content: string | undefined, rawOptions: unknown, command: Command) => {
      const options = UpdateOptionsSchema.parse(rawOptions);
      const globals = readGlobalOptions(command);
      const mode = resolveOutputMode(globals);

      await withContainer(environment, globals, ({ services }) => {
        const { memory, changed } = services.memory.update({
          id,
          content,
          addTags: options.tag,
          clearTags: options.clearTags,
          context: options.context,
          sessionId: options.session,
          supersedes: options.supersedes,
          addSeeAlso: options.seeAlso,
          sourceUrl: options.sourceUrl,
          sourceFile: options.sourceFile,
          importance: options.importance,
        });

        if (!changed) {
          if (mode !== "quiet") {
            console.log(`No changes made to memory ${id}`);
          }
          return;
        }

        if (mode === "quiet") {
          console.log(String(memory.id));
        } else if (mode === "json") {
          printJson({ id: memory.id, content: memory.content, tags: memory.tags, updated: true });
        } else {
          console.log(`Updated memory ${memory.id}`);
        }
      });
    });
}
