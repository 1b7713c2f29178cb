import type { AppLogger } from "../logging";
import { uniqueValues } from "../repositories/memory-repository";
import type { MemoryRecord, MemoryStore } from "../repositories/types";
import { previewText } from "../utils/text";
import type {
  DedupeOptions,
  DedupeReport,
  DedupeService,
  DuplicateGroup,
  DuplicateGroupReport,
  MergeResult,
  SimilarityOptions,
  SimilarityService,
} from "./types";

export const DEFAULT_DEDUPE_THRESHOLD = -3;
export const DEFAULT_DEDUPE_LIMIT = 10;
const PREVIEW_LENGTH = 60;

/**
 * Partitions `memories` into single-hop duplicate groups. Each unvisited
 * memory seeds a group made of its unvisited neighbours; neighbours of
 * neighbours are not explored. Seeds without neighbours stay unvisited and
 * can still join a later group.
 */
export function buildDuplicateGroups(
  memories: readonly MemoryRecord[],
  similarity: SimilarityService,
  options: SimilarityOptions,
): DuplicateGroup[] {
  const visited = new Set<number>();
  const groups: DuplicateGroup[] = [];

  for (const memory of memories) {
    if (visited.has(memory.id)) {
      continue;
    }

    const neighbours = similarity.findSimilar(memory, options);
    if (neighbours.length === 0) {
      continue;
    }

    const group: DuplicateGroup = [memory];
    for (const { memory: neighbour } of neighbours) {
      if (!visited.has(neighbour.id)) {
        group.push(neighbour);
        visited.add(neighbour.id);
      }
    }

    if (group.length > 1) {
      visited.add(memory.id);
      groups.push(group);
    }
  }

  return groups;
}

/** Newest first; members created at the same instant keep their order. */
export function orderBySurvival(group: DuplicateGroup): DuplicateGroup {
  return [...group].sort((a, b) => b.createdAt - a.createdAt);
}

/**
 * Keeps the most recently created member, gives it the union of every
 * member's tags, and deletes the others. The group is merged atomically.
 */
export function mergeDuplicateGroup(
  store: Pick<MemoryStore, "save" | "delete" | "transaction">,
  group: DuplicateGroup,
): MergeResult {
  const [survivor, ...losers] = orderBySurvival(group);
  if (!survivor) {
    throw new Error("Cannot merge an empty duplicate group");
  }

  const tags = uniqueValues([survivor, ...losers].flatMap((member) => member.tags));
  const deletedIds = losers.map((loser) => loser.id);

  store.transaction(() => {
    store.save({ ...survivor, tags });
    deletedIds.forEach((id) => store.delete(id));
  });

  return {
    survivorId: survivor.id,
    deletedIds,
    tags,
    mergedCount: deletedIds.length,
  };
}

export interface DedupeServiceDependencies {
  store: MemoryStore;
  similarity: SimilarityService;
  logger: AppLogger;
  defaults?: Partial<Pick<DedupeOptions, "threshold" | "limit">>;
}

export class DefaultDedupeService implements DedupeService {
  #store: MemoryStore;
  #similarity: SimilarityService;
  #logger: AppLogger;
  #threshold: number;
  #limit: number;

  constructor(deps: DedupeServiceDependencies) {
    this.#store = deps.store;
    this.#similarity = deps.similarity;
    this.#logger = deps.logger;
    this.#threshold = deps.defaults?.threshold ?? DEFAULT_DEDUPE_THRESHOLD;
    this.#limit = deps.defaults?.limit ?? DEFAULT_DEDUPE_LIMIT;
  }

  async run(options: DedupeOptions = {}): Promise<DedupeReport> {
    const { dryRun = false, auto = false, confirm, listener } = options;
    const threshold = options.threshold ?? this.#threshold;
    const limit = options.limit ?? this.#limit;

    const memories = this.#store.listAll();
    if (memories.length < 2) {
      return { status: "not-enough-memories", dryRun, scanned: memories.length, groups: [], mergedCount: 0 };
    }

    const groups = buildDuplicateGroups(memories, this.#similarity, { threshold, limit });
    this.#logger.info(
      { scanned: memories.length, groups: groups.length, threshold, dryRun },
      "Duplicate scan finished",
    );

    if (groups.length === 0) {
      return { status: "no-duplicates", dryRun, scanned: memories.length, groups: [], mergedCount: 0 };
    }

    const reports: DuplicateGroupReport[] = [];
    let mergedCount = 0;

    for (const [index, group] of groups.entries()) {
      const report = this.#describeGroup(group, index + 1);
      reports.push(report);
      listener?.onGroup?.(report, groups.length);

      if (dryRun) {
        continue;
      }

      const shouldMerge = auto || (confirm ? await confirm(report) : false);
      if (!shouldMerge) {
        continue;
      }

      const result = mergeDuplicateGroup(this.#store, group);
      report.merged = true;
      report.survivorId = result.survivorId;
      report.deletedIds = result.deletedIds;
      report.tags = result.tags;
      mergedCount += result.mergedCount;

      this.#logger.debug(
        { survivorId: result.survivorId, deletedIds: result.deletedIds, groupSize: group.length },
        "Merged duplicate group",
      );
      listener?.onMerge?.(report, result);
    }

    return { status: "completed", dryRun, scanned: memories.length, groups: reports, mergedCount };
  }

  #describeGroup(group: DuplicateGroup, position: number): DuplicateGroupReport {
    return {
      position,
      members: group.map((member) => ({
        id: member.id,
        preview: previewText(member.content, PREVIEW_LENGTH),
        tags: member.tags,
        createdAt: member.createdAt,
      })),
      merged: false,
      survivorId: null,
      deletedIds: [],
      tags: uniqueValues(group.flatMap((member) => member.tags)),
    };
  }
}
