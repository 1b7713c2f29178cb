import Database from "better-sqlite3";
import { ensureDirSync } from "fs-extra";
import path from "node:path";
import { performance } from "node:perf_hooks";
import { normalizeSQLiteError } from "./errors";

export interface SQLiteTelemetryEvent {
  sql: string;
  durationMs: number;
}

export interface SQLiteConnectionOptions {
  /** A file path, or `:memory:` for a throwaway database. */
  filepath: string;
  busyTimeoutMs?: number;
  /** Called after every statement, whether it succeeded or not. */
  telemetry?: (event: SQLiteTelemetryEvent) => void;
}

export interface SQLiteRunResult {
  changes: number;
  lastInsertRowid: number;
}

export class SQLiteClient {
  readonly filepath: string;
  #db: Database.Database;
  #telemetry?: (event: SQLiteTelemetryEvent) => void;

  constructor(options: SQLiteConnectionOptions) {
    const { filepath, busyTimeoutMs = 5000, telemetry } = options;
    this.filepath = filepath;
    this.#telemetry = telemetry;

    const isInMemory = filepath === ":memory:";
    if (!isInMemory) {
      ensureDirSync(path.dirname(filepath));
    }

    try {
      this.#db = new Database(filepath, { timeout: busyTimeoutMs });
      if (!isInMemory) {
        this.#db.pragma("journal_mode = WAL");
      }
      this.#db.pragma("synchronous = NORMAL");
    } catch (error) {
      throw normalizeSQLiteError(error, "open-database");
    }
  }

  close(): void {
    if (this.#db.open) {
      this.#db.close();
    }
  }

  exec(sql: string): void {
    this.#measure(sql, () => {
      this.#db.exec(sql);
    });
  }

  run(sql: string, params: unknown[] = []): SQLiteRunResult {
    const statement = this.prepare(sql);
    return this.#measure(sql, () => {
      const result = statement.run(...params);
      return { changes: result.changes, lastInsertRowid: Number(result.lastInsertRowid) };
    });
  }

  get<T = unknown>(sql: string, params: unknown[] = []): T | undefined {
    const statement = this.prepare<T>(sql);
    return this.#measure(sql, () => statement.get(...params));
  }

  all<T = unknown>(sql: string, params: unknown[] = []): T[] {
    const statement = this.prepare<T>(sql);
    return this.#measure(sql, () => statement.all(...params));
  }

  prepare<T = unknown>(sql: string): Database.Statement<unknown[], T> {
    try {
      return this.#db.prepare<unknown[], T>(sql);
    } catch (error) {
      throw normalizeSQLiteError(error, sql);
    }
  }

  /** Runs `fn` inside BEGIN IMMEDIATE; any throw rolls the whole thing back. */
  transaction<T>(fn: (client: SQLiteClient) => T): T {
    const wrapped = this.#db.transaction(() => fn(this));
    try {
      return wrapped.immediate();
    } catch (error) {
      if (error instanceof Database.SqliteError) {
        throw normalizeSQLiteError(error, "transaction");
      }
      throw error;
    }
  }

  #measure<T>(sql: string, fn: () => T): T {
    const start = performance.now();
    try {
      return fn();
    } catch (error) {
      throw normalizeSQLiteError(error, sql);
    } finally {
      this.#telemetry?.({ sql, durationMs: performance.now() - start });
    }
  }
}

export function createSQLiteClient(options: SQLiteConnectionOptions): SQLiteClient {
  return new SQLiteClient(options);
}
