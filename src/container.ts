import { loadConfig, type Config } from "./config";
import { createLogger, type AppLogger } from "./logging";
import { applyMigrations } from "./database/migrations";
import { createSQLiteClient, type SQLiteClient } from "./database/sqlite";
import { MemoryRepository } from "./repositories/memory-repository";
import { DefaultDedupeService } from "./services/dedupe-service";
import { DefaultMemoryService } from "./services/memory-service";
import { DefaultSearchService } from "./services/search-service";
import { DefaultSimilarityService } from "./services/similarity-service";
import type { ServiceRegistry } from "./services/types";

export interface RepositoryRegistry {
  memory: MemoryRepository;
}

export interface AppContainer {
  config: Config;
  logger: AppLogger;
  sqlite: SQLiteClient;
  repositories: RepositoryRegistry;
  services: ServiceRegistry;
  shutdown: () => Promise<void>;
}

export interface CreateContainerOptions {
  config?: Config;
  logger?: AppLogger;
  /** Overrides the bundled `sql/migrations` directory. */
  migrationsDir?: string;
}

export async function createAppContainer(
  options: CreateContainerOptions = {},
): Promise<AppContainer> {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger(config);

  const sqlite = createSQLiteClient({
    filepath: config.database.path,
    telemetry: ({ sql, durationMs }) => {
      logger.debug({ sql, durationMs }, "SQL statement");
    },
  });

  try {
    const { applied } = await applyMigrations(sqlite, options.migrationsDir);
    if (applied.length > 0) {
      logger.debug({ applied, database: config.database.path }, "Applied migrations");
    }
  } catch (error) {
    sqlite.close();
    throw error;
  }

  const memoryRepository = new MemoryRepository(sqlite);

  const similarity = new DefaultSimilarityService({
    store: memoryRepository,
    logger,
  });

  const memoryService = new DefaultMemoryService({
    memoryRepository,
    similarity,
    logger,
    similarDefaults: config.similar,
  });

  const searchService = new DefaultSearchService({
    store: memoryRepository,
    logger,
  });

  const dedupeService = new DefaultDedupeService({
    store: memoryRepository,
    similarity,
    logger,
    defaults: config.dedupe,
  });

  const services: ServiceRegistry = {
    memory: memoryService,
    search: searchService,
    similarity,
    dedupe: dedupeService,
  };

  return {
    config,
    logger,
    sqlite,
    repositories: { memory: memoryRepository },
    services,
    shutdown: async () => {
      sqlite.close();
    },
  };
}
