import type { Command } from "commander";
import { readGlobalOptions, withContainer, type CliEnvironment } from "../context";
import { printTagCounts } from "../output";
import { parseInteger } from "../parsers";

export function registerTagsCommand(program: Command, environment: CliEnvironment): void {
  const tags = program.command("tags").description("Manage tags on memories");

  tags
    .command("list")
    .description("Show every tag with its usage count")
    .action(async (_rawOptions: unknown, command: Command) => {
      const globals = readGlobalOptions(command);
      await withContainer(environment, globals, ({ services }) => {
        printTagCounts(services.memory.countTags(), globals.json ? "json" : "human");
      });
    });

  tags
    .command("add")
    .description("Add a tag to a memory; adding an existing tag does nothing")
    .argument("<id>", "Memory id", parseInteger)
    .argument("<tag>", "Tag to add")
    .action(async (id: number, tag: string, _rawOptions: unknown, command: Command) => {
      const globals = readGlobalOptions(command);
      await withContainer(environment, globals, ({ services }) => {
        const change = services.memory.addTag(id, tag);
        if (globals.quiet) {
          return;
        }
        console.log(
          change === "added"
            ? `Added tag '${tag}' to memory ${id}`
            : `Memory ${id} already has tag '${tag}'`,
        );
      });
    });

  tags
    .command("rm")
    .description("Remove a tag from a memory; removing a missing tag does nothing")
    .argument("<id>", "Memory id", parseInteger)
    .argument("<tag>", "Tag to remove")
    .action(async (id: number, tag: string, _rawOptions: unknown, command: Command) => {
      const globals = readGlobalOptions(command);
      await withContainer(environment, globals, ({ services }) => {
        const change = services.memory.removeTag(id, tag);
        if (globals.quiet) {
          return;
        }
        console.log(
          change === "removed"
            ? `Removed tag '${tag}' from memory ${id}`
            : `Memory ${id} doesn't have tag '${tag}'`,
        );
      });
    });
}
