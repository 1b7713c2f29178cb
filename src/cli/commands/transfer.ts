import type { Command } from "commander";
import { pathExists, readJson, writeJson } from "fs-extra";
import { readGlobalOptions, withContainer, type CliEnvironment } from "../context";
import { UsageError } from "../errors";

export function registerExportCommand(program: Command, environment: CliEnvironment): void {
  program
    .command("export")
    .description("Write every memory to a JSON file")
    .argument("<file>", "Destination path")
    .action(async (file: string, _rawOptions: unknown, command: Command) => {
      const globals = readGlobalOptions(command);

      await withContainer(environment, globals, async ({ services }) => {
        const entries = services.memory.exportAll();
        await writeJson(file, entries, { spaces: 2 });
        if (!globals.quiet) {
          console.log(`Exported ${entries.length} memories to ${file}`);
        }
      });
    });
}

export function registerImportCommand(program: Command, environment: CliEnvironment): void {
  program
    .command("import")
    .description("Add memories from a JSON file written by export")
    .argument("<file>", "Source path")
    .action(async (file: string, _rawOptions: unknown, command: Command) => {
      const globals = readGlobalOptions(command);

      if (!(await pathExists(file))) {
        throw new UsageError(`File not found: ${file}`);
      }

      let payload: unknown;
      try {
        payload = await readJson(file);
      } catch (error) {
        throw new UsageError(`Could not parse ${file} as JSON`, { cause: error });
      }

      await withContainer(environment, globals, ({ services }) => {
        const imported = services.memory.importAll(payload);
        if (!globals.quiet) {
          console.log(`Imported ${imported.length} memories from ${file}`);
        }
      });
    });
}
