import { DatabaseError } from "../../src/database/errors";
import type { MemoryRecord, MemoryStore, RankedMemory } from "../../src/repositories/types";

export function makeMemory(overrides: Partial<MemoryRecord> & Pick<MemoryRecord, "id" | "content">): MemoryRecord {
  return {
    tags: [],
    context: null,
    source: "user",
    sessionId: null,
    supersedes: null,
    seeAlso: [],
    sourceUrl: null,
    sourceFile: null,
    importance: 3,
    createdAt: overrides.id * 1_000,
    updatedAt: overrides.id * 1_000,
    ...overrides,
  };
}

export type ScriptedResponse = Array<{ id: number; score: number }> | Error;

/**
 * In-memory store whose search results are scripted per query string.
 * Unscripted queries return nothing.
 */
export class ScriptedMemoryStore implements MemoryStore {
  readonly records = new Map<number, MemoryRecord>();
  readonly searches: Array<{ query: string; limit: number }> = [];
  readonly operations: string[] = [];
  readonly #responses = new Map<string, ScriptedResponse>();
  #failDeleteOf?: number;

  constructor(records: MemoryRecord[] = []) {
    records.forEach((record) => this.records.set(record.id, { ...record }));
  }

  script(query: string, response: ScriptedResponse): this {
    this.#responses.set(query, response);
    return this;
  }

  failDeleteOf(id: number): this {
    this.#failDeleteOf = id;
    return this;
  }

  searchRanked(query: string, limit: number): RankedMemory[] {
    this.searches.push({ query, limit });
    const response = this.#responses.get(query) ?? [];
    if (response instanceof Error) {
      throw response;
    }

    const ranked: RankedMemory[] = [];
    for (const { id, score } of response) {
      const record = this.records.get(id);
      if (record) {
        ranked.push({ record: { ...record }, score });
      }
    }
    return ranked.slice(0, limit);
  }

  listAll(): MemoryRecord[] {
    return [...this.records.values()]
      .sort((a, b) => a.id - b.id)
      .map((record) => ({ ...record }));
  }

  save(record: MemoryRecord): MemoryRecord {
    this.operations.push(`save:${record.id}`);
    this.records.set(record.id, { ...record });
    return { ...record };
  }

  delete(id: number): void {
    if (id === this.#failDeleteOf) {
      throw new DatabaseError(`disk I/O error deleting ${id}`, "UNKNOWN");
    }
    this.operations.push(`delete:${id}`);
    this.records.delete(id);
  }

  /** Restores the records and logs `rollback` when `fn` throws. */
  transaction<T>(fn: () => T): T {
    const snapshot = new Map(this.records);
    try {
      return fn();
    } catch (error) {
      this.records.clear();
      snapshot.forEach((record, id) => this.records.set(id, record));
      this.operations.push("rollback");
      throw error;
    }
  }
}
