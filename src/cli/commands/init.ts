import type { Command } from "commander";
import { localDatabasePath } from "../../config";
import { readGlobalOptions, withContainer, type CliEnvironment } from "../context";

export function registerInitCommand(program: Command, environment: CliEnvironment): void {
  program
    .command("init")
    .description("Create a memory database, in ./.memvault unless --global or --db is given")
    .action(async (_rawOptions: unknown, command: Command) => {
      const globals = readGlobalOptions(command);

      if (globals.db || globals.global) {
        await withContainer(environment, globals, ({ config }) => {
          const label = globals.db ? "Database" : "Global database";
          console.log(`${label} initialized at: ${config.database.path}`);
        });
        return;
      }

      const localPath = localDatabasePath(environment.cwd);
      await withContainer(environment, { db: localPath, global: false }, ({ config }) => {
        console.log(`Local database initialized at: ${config.database.path}`);
      });
    });
}
