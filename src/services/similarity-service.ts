import { isDatabaseError } from "../database/errors";
import type { AppLogger } from "../logging";
import type { MemoryRecord, MemoryStore, RankedMemory } from "../repositories/types";
import type { SimilarityOptions, SimilarityService, SimilarMemory } from "./types";

/** Only the leading tokens of a probe contribute to its similarity query. */
export const SIMILARITY_QUERY_TOKENS = 10;

export interface SimilarityServiceDependencies {
  store: Pick<MemoryStore, "searchRanked">;
  logger: AppLogger;
}

/**
 * Builds an FTS query matching any of the first ten whitespace-delimited
 * tokens of `content`. Returns `undefined` when there is nothing to search for.
 */
export function buildSimilarityQuery(content: string): string | undefined {
  const tokens = content
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .slice(0, SIMILARITY_QUERY_TOKENS);

  return tokens.length > 0 ? tokens.join(" OR ") : undefined;
}

export class DefaultSimilarityService implements SimilarityService {
  #store: Pick<MemoryStore, "searchRanked">;
  #logger: AppLogger;

  constructor(deps: SimilarityServiceDependencies) {
    this.#store = deps.store;
    this.#logger = deps.logger;
  }

  findSimilar(target: MemoryRecord, options: SimilarityOptions): SimilarMemory[] {
    const { limit, threshold } = options;
    const query = buildSimilarityQuery(target.content);
    if (!query || limit <= 0) {
      return [];
    }

    let results: RankedMemory[];
    try {
      // One extra slot: the probe usually matches itself.
      results = this.#store.searchRanked(query, limit + 1);
    } catch (error) {
      if (!isDatabaseError(error)) {
        throw error;
      }
      this.#logger.debug(
        { memoryId: target.id, query, code: error.code, err: error },
        "Similarity search failed; treating memory as having no neighbours",
      );
      return [];
    }

    const similar: SimilarMemory[] = [];
    for (const { record, score } of results) {
      if (record.id === target.id) {
        continue;
      }
      if (score <= threshold) {
        similar.push({ memory: record, score });
      }
      if (similar.length >= limit) {
        break;
      }
    }

    return similar;
  }
}
