import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../src/config";
import { createAppContainer, type AppContainer } from "../src/container";
import { applyMigrations } from "../src/database/migrations";
import { createSilentLogger } from "../src/logging";

describe("createAppContainer", () => {
  let workDir: string;
  let container: AppContainer | undefined;

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(os.tmpdir(), "memvault-container-"));
  });

  afterEach(async () => {
    await container?.shutdown();
    container = undefined;
    await rm(workDir, { recursive: true, force: true });
  });

  function configFor(filename: string) {
    return loadConfig(
      {},
      {
        useDotenv: false,
        cwd: workDir,
        homeDir: workDir,
        envVars: { MEMVAULT_DB: undefined },
        dbPath: path.join(workDir, filename),
      },
    );
  }

  it("logs every SQL statement at debug level with its duration", async () => {
    const logger = createSilentLogger();
    const debug = vi.spyOn(logger, "debug");
    container = await createAppContainer({ config: configFor("timed.db"), logger });
    debug.mockClear();

    container.repositories.memory.count();

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith(
      { sql: "SELECT COUNT(*) AS total FROM memories;", durationMs: expect.any(Number) },
      "SQL statement",
    );
  });

  it("applies migrations once per database file", async () => {
    container = await createAppContainer({ config: configFor("twice.db"), logger: createSilentLogger() });

    expect(await applyMigrations(container.sqlite)).toEqual({
      applied: [],
      skipped: ["001_memories.sql"],
    });
  });

  it("wires the services to the configured database", async () => {
    container = await createAppContainer({ config: configFor("wired.db"), logger: createSilentLogger() });

    const { memory } = container.services.memory.remember({ content: "wired up" });

    expect(container.sqlite.filepath).toBe(path.join(workDir, "wired.db"));
    expect(container.repositories.memory.findById(memory.id)?.content).toBe("wired up");
  });
});
