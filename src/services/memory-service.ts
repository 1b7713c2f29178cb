import { NotFoundError } from "../database/errors";
import type { AppLogger } from "../logging";
import { MemoryRepository, uniqueValues } from "../repositories/memory-repository";
import type { MemoryRecord, TagCount } from "../repositories/types";
import {
  ExportFileSchema,
  ListRequestSchema,
  MemoryCreateInputSchema,
  MemoryUpdateInputSchema,
  type ExportedMemory,
  type ListRequest,
  type MemoryCreateInput,
  type MemoryUpdateInput,
} from "../schemas/memory";
import { detectTags } from "./auto-tag";
import type {
  MemoryService,
  RememberResult,
  SimilarityOptions,
  SimilarityService,
  SimilarMemory,
  TagChange,
  UpdateResult,
} from "./types";

export interface MemoryServiceDependencies {
  memoryRepository: MemoryRepository;
  similarity: SimilarityService;
  logger: AppLogger;
  similarDefaults: SimilarityOptions;
}

export class DefaultMemoryService implements MemoryService {
  #memoryRepository: MemoryRepository;
  #similarity: SimilarityService;
  #logger: AppLogger;
  #similarDefaults: SimilarityOptions;

  constructor(deps: MemoryServiceDependencies) {
    this.#memoryRepository = deps.memoryRepository;
    this.#similarity = deps.similarity;
    this.#logger = deps.logger;
    this.#similarDefaults = deps.similarDefaults;
  }

  remember(input: MemoryCreateInput): RememberResult {
    const parsed = MemoryCreateInputSchema.parse(input);
    const tags = uniqueValues(parsed.tags);

    if (parsed.autoTag) {
      tags.push(...detectTags(parsed.content).filter((tag) => !tags.includes(tag)));
    }

    const memory = this.#memoryRepository.create({
      content: parsed.content,
      tags,
      context: parsed.context ?? null,
      source: parsed.source,
      sessionId: parsed.sessionId ?? null,
      supersedes: parsed.supersedes ?? null,
      seeAlso: parsed.seeAlso,
      sourceUrl: parsed.sourceUrl ?? null,
      sourceFile: parsed.sourceFile ?? null,
      importance: parsed.importance,
    });

    this.#logger.debug({ memoryId: memory.id, tags: memory.tags }, "Stored memory");

    const autoTags = parsed.autoTag
      ? detectTags(parsed.content).filter((tag) => memory.tags.includes(tag))
      : [];

    return { memory, autoTags };
  }

  get(id: number): MemoryRecord {
    const memory = this.#memoryRepository.findById(id);
    if (!memory) {
      throw new NotFoundError(id);
    }
    return memory;
  }

  update(input: MemoryUpdateInput): UpdateResult {
    const parsed = MemoryUpdateInputSchema.parse(input);
    const memory = { ...this.get(parsed.id) };
    let changed = false;

    if (parsed.content !== undefined) {
      memory.content = parsed.content;
      changed = true;
    }

    if (parsed.clearTags) {
      memory.tags = [];
      changed = true;
    } else {
      const added = parsed.addTags.filter((tag) => !memory.tags.includes(tag));
      if (added.length > 0) {
        memory.tags = uniqueValues([...memory.tags, ...added]);
        changed = true;
      }
    }

    if (parsed.context !== undefined) {
      memory.context = parsed.context;
      changed = true;
    }

    if (parsed.sessionId !== undefined) {
      memory.sessionId = parsed.sessionId;
      changed = true;
    }

    if (parsed.supersedes !== undefined) {
      memory.supersedes = parsed.supersedes;
      changed = true;
    }

    const linked = parsed.addSeeAlso.filter((id) => !memory.seeAlso.includes(id));
    if (linked.length > 0) {
      memory.seeAlso = uniqueValues([...memory.seeAlso, ...linked]);
      changed = true;
    }

    if (parsed.sourceUrl !== undefined) {
      memory.sourceUrl = parsed.sourceUrl;
      changed = true;
    }

    if (parsed.sourceFile !== undefined) {
      memory.sourceFile = parsed.sourceFile;
      changed = true;
    }

    if (parsed.importance !== undefined) {
      memory.importance = parsed.importance;
      changed = true;
    }

    if (!changed) {
      return { memory, changed };
    }

    return { memory: this.#memoryRepository.save(memory), changed };
  }

  forget(id: number): MemoryRecord {
    const memory = this.get(id);
    this.#memoryRepository.delete(id);
    this.#logger.debug({ memoryId: id }, "Deleted memory");
    return memory;
  }

  findByTag(tag: string): MemoryRecord[] {
    return this.#memoryRepository.listAll().filter((memory) => memory.tags.includes(tag));
  }

  forgetByTag(tag: string): MemoryRecord[] {
    const doomed = this.findByTag(tag);
    for (const memory of doomed) {
      this.#memoryRepository.delete(memory.id);
    }
    this.#logger.debug({ tag, count: doomed.length }, "Deleted memories by tag");
    return doomed;
  }

  list(request: ListRequest = {}): MemoryRecord[] {
    const parsed = ListRequestSchema.parse(request);
    const since = parsed.since === undefined ? undefined : Date.parse(parsed.since);

    return this.#memoryRepository
      .list({ since })
      .filter((memory) => matchesFilters(memory, parsed))
      .slice(0, parsed.limit);
  }

  countTags(): TagCount[] {
    const counts = new Map<string, number>();
    for (const memory of this.#memoryRepository.listAll()) {
      for (const tag of memory.tags) {
        counts.set(tag, (counts.get(tag) ?? 0) + 1);
      }
    }

    return Array.from(counts, ([tag, count]) => ({ tag, count })).sort((a, b) =>
      a.tag.localeCompare(b.tag),
    );
  }

  addTag(id: number, tag: string): TagChange {
    const memory = this.get(id);
    if (memory.tags.includes(tag)) {
      return "unchanged";
    }
    this.#memoryRepository.save({ ...memory, tags: [...memory.tags, tag] });
    return "added";
  }

  removeTag(id: number, tag: string): TagChange {
    const memory = this.get(id);
    if (!memory.tags.includes(tag)) {
      return "unchanged";
    }
    this.#memoryRepository.save({
      ...memory,
      tags: memory.tags.filter((existing) => existing !== tag),
    });
    return "removed";
  }

  similarTo(memory: MemoryRecord): SimilarMemory[] {
    return this.#similarity.findSimilar(memory, this.#similarDefaults);
  }

  exportAll(): ExportedMemory[] {
    return this.#memoryRepository.listAll().map((memory) => ({
      content: memory.content,
      tags: memory.tags,
      context: memory.context,
      source: memory.source,
      session_id: memory.sessionId,
      supersedes: memory.supersedes,
      see_also: memory.seeAlso,
      source_url: memory.sourceUrl,
      source_file: memory.sourceFile,
      importance: memory.importance,
      created_at: new Date(memory.createdAt).toISOString(),
      updated_at: new Date(memory.updatedAt).toISOString(),
    }));
  }

  /**
   * Validates the whole payload before inserting anything. Imported entries
   * get fresh ids; their original timestamps are kept when present.
   */
  importAll(entries: unknown): MemoryRecord[] {
    const parsed = ExportFileSchema.parse(entries);

    const imported = parsed.map((entry) =>
      this.#memoryRepository.create({
        content: entry.content,
        tags: entry.tags,
        context: entry.context ?? null,
        source: entry.source,
        sessionId: entry.session_id ?? null,
        supersedes: entry.supersedes ?? null,
        seeAlso: entry.see_also,
        sourceUrl: entry.source_url ?? null,
        sourceFile: entry.source_file ?? null,
        importance: entry.importance,
        createdAt: entry.created_at ? Date.parse(entry.created_at) : undefined,
        updatedAt: entry.updated_at ? Date.parse(entry.updated_at) : undefined,
      }),
    );

    this.#logger.info({ count: imported.length }, "Imported memories");
    return imported;
  }

  rebuildIndex(): number {
    const count = this.#memoryRepository.rebuildSearchIndex();
    this.#logger.info({ count }, "Rebuilt search index");
    return count;
  }
}

export interface MemoryFilter {
  tags: string[];
  sessionId?: string;
  minImportance?: number;
}

/** Tag filters match when the memory carries any of the requested tags. */
export function matchesFilters(memory: MemoryRecord, filter: MemoryFilter): boolean {
  if (filter.tags.length > 0 && !filter.tags.some((tag) => memory.tags.includes(tag))) {
    return false;
  }
  if (filter.sessionId !== undefined && memory.sessionId !== filter.sessionId) {
    return false;
  }
  if (filter.minImportance !== undefined && memory.importance < filter.minImportance) {
    return false;
  }
  return true;
}
