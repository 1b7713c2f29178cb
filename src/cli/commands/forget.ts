import type { Command } from "commander";
import { z } from "zod";
import { confirm } from "../confirm";
import { readGlobalOptions, withContainer, type CliEnvironment } from "../context";
import { CliError, UsageError } from "../errors";
import { parseInteger } from "../parsers";

type ForgetTarget = { id: number } | { tag: string };

function resolveTarget(id: number | undefined, tag: string | undefined): ForgetTarget {
  if (id !== undefined) {
    return { id };
  }
  if (tag !== undefined) {
    return { tag };
  }
  throw new UsageError("Provide either a memory id or --tag");
}

const ForgetOptionsSchema = z.object({
  tag: z.string().min(1).optional(),
  confirm: z.boolean().default(false),
});

export function registerForgetCommand(program: Command, environment: CliEnvironment): void {
  program
    .command("forget")
    .description("Delete a memory by id, or every memory carrying a tag")
    .argument("[id]", "Id of the memory to delete", parseInteger)
    .option("-t, --tag <tag>", "Delete all memories with this tag")
    .option("-y, --confirm", "Skip the confirmation prompt for bulk deletes")
    .action(async (id: number | undefined, rawOptions: unknown, command: Command) => {
      const options = ForgetOptionsSchema.parse(rawOptions);
      const globals = readGlobalOptions(command);

      const target = resolveTarget(id, options.tag);

      await withContainer(environment, globals, async ({ services }) => {
        if ("id" in target) {
          services.memory.forget(target.id);
          if (!globals.quiet) {
            console.log(`Deleted memory ${target.id}`);
          }
          return;
        }

        const { tag } = target;
        const matches = services.memory.findByTag(tag);
        if (matches.length === 0) {
          console.log(`No memories found with tag '${tag}'`);
          return;
        }

        const approved = await confirm(`Delete ${matches.length} memories with tag '${tag}'?`, {
          yes: options.confirm,
        });
        if (!approved) {
          throw new CliError("Aborted");
        }

        const deleted = services.memory.forgetByTag(tag);
        if (!globals.quiet) {
          console.log(`Deleted ${deleted.length} memories`);
        }
      });
    });
}
