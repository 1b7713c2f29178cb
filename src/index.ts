export { loadConfig, resolveDatabaseLocation, type Config, type LoadConfigOptions } from "./config";
export { createLogger, createSilentLogger, type AppLogger } from "./logging";
export { createAppContainer, type AppContainer, type CreateContainerOptions } from "./container";
export { DatabaseError, NotFoundError, isDatabaseError } from "./database/errors";
export { SQLiteClient, createSQLiteClient } from "./database/sqlite";
export { applyMigrations } from "./database/migrations";
export { MemoryRepository } from "./repositories/memory-repository";
export * from "./services";
export type * from "./repositories/types";
export type * from "./services/types";
