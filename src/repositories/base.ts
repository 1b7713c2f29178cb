import { NotFoundError } from "../database/errors";
import type { SQLiteClient } from "../database/sqlite";

export abstract class BaseRepository {
  protected readonly db: SQLiteClient;

  protected constructor(db: SQLiteClient) {
    this.db = db;
  }

  protected parseJsonArray<T>(
    value: unknown,
    guard: (item: unknown) => item is T,
  ): T[] {
    if (typeof value !== "string") {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(value);
    } catch {
      return [];
    }

    return Array.isArray(parsed) ? parsed.filter(guard) : [];
  }

  protected stringifyJson(value: unknown): string {
    return JSON.stringify(value ?? []);
  }

  protected assertFound<T>(record: T | undefined, id: number): T {
    if (!record) {
      throw new NotFoundError(id);
    }
    return record;
  }
}
