import type { Command } from "commander";
import { readGlobalOptions, withContainer, type CliEnvironment } from "../context";

export function registerRebuildIndexCommand(program: Command, environment: CliEnvironment): void {
  program
    .command("rebuild-index")
    .description("Rebuild the full-text index from the stored memories")
    .action(async (_rawOptions: unknown, command: Command) => {
      const globals = readGlobalOptions(command);
      await withContainer(environment, globals, ({ services }) => {
        const count = services.memory.rebuildIndex();
        console.log(`Rebuilt index with ${count} memories`);
      });
    });
}
