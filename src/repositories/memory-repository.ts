import type { SQLiteClient } from "../database/sqlite";
import { BaseRepository } from "./base";
import type {
  MemoryListFilter,
  MemoryRecord,
  MemoryStore,
  NewMemoryRecord,
  RankedMemory,
} from "./types";

interface MemoryRow {
  id: number;
  content: string;
  tags: string;
  context: string | null;
  source: string;
  session_id: string | null;
  supersedes: number | null;
  see_also: string;
  source_url: string | null;
  source_file: string | null;
  importance: number;
  created_at: number;
  updated_at: number;
}

interface RankedMemoryRow extends MemoryRow {
  score: number;
}

const isString = (value: unknown): value is string => typeof value === "string";
const isInteger = (value: unknown): value is number => Number.isInteger(value);

export function uniqueValues<T>(values: readonly T[]): T[] {
  return Array.from(new Set(values));
}

export class MemoryRepository extends BaseRepository implements MemoryStore {
  constructor(db: SQLiteClient) {
    super(db);
  }

  create(input: NewMemoryRecord): MemoryRecord {
    const now = Date.now();
    const createdAt = input.createdAt ?? now;
    const updatedAt = Math.max(input.updatedAt ?? createdAt, createdAt);

    const { lastInsertRowid } = this.db.run(
      `INSERT INTO memories (
        content, tags, context, source, session_id, supersedes, see_also,
        source_url, source_file, importance, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?);`,
      [
        input.content,
        this.stringifyJson(uniqueValues(input.tags ?? [])),
        input.context ?? null,
        input.source ?? "user",
        input.sessionId ?? null,
        input.supersedes ?? null,
        this.stringifyJson(uniqueValues(input.seeAlso ?? [])),
        input.sourceUrl ?? null,
        input.sourceFile ?? null,
        input.importance ?? 3,
        createdAt,
        updatedAt,
      ],
    );

    return this.assertFound(this.findById(lastInsertRowid), lastInsertRowid);
  }

  /**
   * Writes every mutable field of an existing record. `id` and `createdAt`
   * are never rewritten; `updatedAt` is refreshed.
   */
  save(record: MemoryRecord): MemoryRecord {
    const existing = this.assertFound(this.findById(record.id), record.id);
    const updatedAt = Math.max(Date.now(), existing.updatedAt, existing.createdAt);

    this.db.run(
      `UPDATE memories SET
        content = ?, tags = ?, context = ?, source = ?, session_id = ?,
        supersedes = ?, see_also = ?, source_url = ?, source_file = ?,
        importance = ?, updated_at = ?
       WHERE id = ?;`,
      [
        record.content,
        this.stringifyJson(uniqueValues(record.tags)),
        record.context,
        record.source,
        record.sessionId,
        record.supersedes,
        this.stringifyJson(uniqueValues(record.seeAlso)),
        record.sourceUrl,
        record.sourceFile,
        record.importance,
        updatedAt,
        record.id,
      ],
    );

    return this.assertFound(this.findById(record.id), record.id);
  }

  delete(id: number): void {
    this.db.run("DELETE FROM memories WHERE id = ?;", [id]);
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(() => fn());
  }

  findById(id: number): MemoryRecord | undefined {
    const row = this.db.get<MemoryRow>(
      "SELECT * FROM memories WHERE id = ? LIMIT 1;",
      [id],
    );
    return row ? this.#mapRow(row) : undefined;
  }

  listAll(): MemoryRecord[] {
    const rows = this.db.all<MemoryRow>(
      "SELECT * FROM memories ORDER BY id ASC;",
    );
    return rows.map((row) => this.#mapRow(row));
  }

  list(filter: MemoryListFilter = {}): MemoryRecord[] {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (typeof filter.since === "number") {
      conditions.push("created_at >= ?");
      params.push(filter.since);
    }

    const whereClause = conditions.length ? `WHERE ${conditions.join(" AND ")}` : "";
    const limitClause = typeof filter.limit === "number" ? "LIMIT ?" : "";
    if (typeof filter.limit === "number") {
      params.push(filter.limit);
    }

    const rows = this.db.all<MemoryRow>(
      `SELECT * FROM memories ${whereClause} ORDER BY id ASC ${limitClause};`,
      params,
    );
    return rows.map((row) => this.#mapRow(row));
  }

  count(): number {
    const row = this.db.get<{ total: number }>(
      "SELECT COUNT(*) AS total FROM memories;",
    );
    return row?.total ?? 0;
  }

  /**
   * Full-text search over content and context, best match first. The query
   * is passed to FTS5 verbatim, so malformed syntax raises a DatabaseError.
   */
  searchRanked(query: string, limit: number): RankedMemory[] {
    const rows = this.db.all<RankedMemoryRow>(
      `SELECT m.*, bm25(fts_memories) AS score
       FROM fts_memories
       JOIN memories m ON m.id = fts_memories.rowid
       WHERE fts_memories MATCH ?
       ORDER BY score ASC
       LIMIT ?;`,
      [query, limit],
    );

    return rows.map((row) => ({
      record: this.#mapRow(row),
      score: row.score,
    }));
  }

  rebuildSearchIndex(): number {
    this.db.exec("INSERT INTO fts_memories(fts_memories) VALUES('rebuild');");
    return this.count();
  }

  #mapRow(row: MemoryRow): MemoryRecord {
    return {
      id: row.id,
      content: row.content,
      tags: this.parseJsonArray(row.tags, isString),
      context: row.context ?? null,
      source: row.source,
      sessionId: row.session_id ?? null,
      supersedes: row.supersedes ?? null,
      seeAlso: this.parseJsonArray(row.see_also, isInteger),
      sourceUrl: row.source_url ?? null,
      sourceFile: row.source_file ?? null,
      importance: row.importance,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
