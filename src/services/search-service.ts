import type { AppLogger } from "../logging";
import type { MemoryStore } from "../repositories/types";
import { RecallRequestSchema, type RecallRequest } from "../schemas/memory";
import { matchesFilters } from "./memory-service";
import type { ScoredMemory, SearchService } from "./types";

/** Ranked results are over-fetched by this factor so post-filters can still fill the limit. */
const RECALL_OVERFETCH = 2;

export interface SearchServiceDependencies {
  store: Pick<MemoryStore, "searchRanked">;
  logger: AppLogger;
}

export class DefaultSearchService implements SearchService {
  #store: Pick<MemoryStore, "searchRanked">;
  #logger: AppLogger;

  constructor(deps: SearchServiceDependencies) {
    this.#store = deps.store;
    this.#logger = deps.logger;
  }

  recall(request: RecallRequest): ScoredMemory[] {
    const parsed = RecallRequestSchema.parse(request);
    const started = Date.now();

    const results = this.#store
      .searchRanked(parsed.query, parsed.limit * RECALL_OVERFETCH)
      .filter(({ record }) => matchesFilters(record, parsed))
      .map(({ record, score }) => ({ memory: record, score }));

    if (parsed.recentFirst) {
      results.sort((a, b) => b.memory.createdAt - a.memory.createdAt);
    } else if (parsed.boostImportant) {
      results.sort(
        (a, b) => b.memory.importance - a.memory.importance || a.score - b.score,
      );
    }

    const limited = results.slice(0, parsed.limit);
    this.#logger.debug(
      { query: parsed.query, returned: limited.length, tookMs: Date.now() - started },
      "Recall finished",
    );
    return limited;
  }
}
