export interface MemoryRecord {
  id: number;
  content: string;
  tags: string[];
  context: string | null;
  source: string;
  sessionId: string | null;
  supersedes: number | null;
  seeAlso: number[];
  sourceUrl: string | null;
  sourceFile: string | null;
  importance: number;
  createdAt: number;
  updatedAt: number;
}

export interface NewMemoryRecord
  extends Partial<Omit<MemoryRecord, "id" | "content">> {
  content: string;
}

export interface RankedMemory {
  record: MemoryRecord;
  /** bm25 relevance; lower (more negative) is a better match. */
  score: number;
}

export interface MemoryListFilter {
  /** Only memories created at or after this epoch-ms timestamp. */
  since?: number;
  limit?: number;
}

/**
 * The storage collaborator consumed by the similarity and dedupe services.
 */
export interface MemoryStore {
  searchRanked(query: string, limit: number): RankedMemory[];
  listAll(): MemoryRecord[];
  save(record: MemoryRecord): MemoryRecord;
  delete(id: number): void;
  /** Runs `fn` atomically; a throw undoes every write it made. */
  transaction<T>(fn: () => T): T;
}

export interface TagCount {
  tag: string;
  count: number;
}
