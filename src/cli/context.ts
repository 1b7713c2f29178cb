import type { Command } from "commander";
import { z } from "zod";
import { loadConfig, type LoadConfigOptions } from "../config";
import { createAppContainer, type AppContainer } from "../container";

export const GlobalOptionsSchema = z.object({
  json: z.boolean().default(false),
  quiet: z.boolean().default(false),
  db: z.string().min(1).optional(),
  global: z.boolean().default(false),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

/** Environment the CLI resolves its configuration from. Tests point it at a scratch directory. */
export type CliEnvironment = Pick<LoadConfigOptions, "cwd" | "homeDir" | "envVars" | "useDotenv" | "envFile">;

export function readGlobalOptions(command: Command): GlobalOptions {
  return GlobalOptionsSchema.parse(command.optsWithGlobals());
}

export async function withContainer<T>(
  environment: CliEnvironment,
  options: Pick<GlobalOptions, "db" | "global">,
  run: (container: AppContainer) => Promise<T> | T,
): Promise<T> {
  const config = loadConfig({}, { ...environment, dbPath: options.db, useGlobal: options.global });
  const container = await createAppContainer({ config });
  try {
    return await run(container);
  } finally {
    await container.shutdown();
  }
}
