import type { MemoryRecord, TagCount } from "../repositories/types";
import type {
  ExportedMemory,
  ListRequest,
  MemoryCreateInput,
  MemoryUpdateInput,
  RecallRequest,
} from "../schemas/memory";

export interface SimilarityOptions {
  limit: number;
  /** Candidates qualify when `score <= threshold`. */
  threshold: number;
}

export interface SimilarMemory {
  memory: MemoryRecord;
  score: number;
}

export interface SimilarityService {
  findSimilar(target: MemoryRecord, options: SimilarityOptions): SimilarMemory[];
}

/** Two or more memories judged near-duplicates of the group's first member. */
export type DuplicateGroup = MemoryRecord[];

export interface MergeResult {
  survivorId: number;
  deletedIds: number[];
  tags: string[];
  mergedCount: number;
}

export interface MemorySummary {
  id: number;
  preview: string;
  tags: string[];
  createdAt: number;
}

export interface DuplicateGroupReport {
  /** 1-based discovery order. */
  position: number;
  members: MemorySummary[];
  merged: boolean;
  survivorId: number | null;
  deletedIds: number[];
  /** Union of the members' tags, which the survivor carries after a merge. */
  tags: string[];
}

export type DedupeStatus = "not-enough-memories" | "no-duplicates" | "completed";

export interface DedupeReport {
  status: DedupeStatus;
  dryRun: boolean;
  scanned: number;
  groups: DuplicateGroupReport[];
  mergedCount: number;
}

export type DedupeConfirm = (
  group: DuplicateGroupReport,
) => Promise<boolean> | boolean;

export interface DedupeListener {
  onGroup?(group: DuplicateGroupReport, total: number): void;
  onMerge?(group: DuplicateGroupReport, result: MergeResult): void;
}

export interface DedupeOptions {
  dryRun?: boolean;
  auto?: boolean;
  threshold?: number;
  limit?: number;
  /**
   * Asked once per group when neither `dryRun` nor `auto` is set. Without it
   * every group is declined.
   */
  confirm?: DedupeConfirm;
  listener?: DedupeListener;
}

export interface DedupeService {
  run(options?: DedupeOptions): Promise<DedupeReport>;
}

export interface RememberResult {
  memory: MemoryRecord;
  autoTags: string[];
}

export interface UpdateResult {
  memory: MemoryRecord;
  changed: boolean;
}

export type TagChange = "added" | "removed" | "unchanged";

export interface MemoryService {
  remember(input: MemoryCreateInput): RememberResult;
  get(id: number): MemoryRecord;
  update(input: MemoryUpdateInput): UpdateResult;
  forget(id: number): MemoryRecord;
  findByTag(tag: string): MemoryRecord[];
  forgetByTag(tag: string): MemoryRecord[];
  list(request?: ListRequest): MemoryRecord[];
  countTags(): TagCount[];
  addTag(id: number, tag: string): TagChange;
  removeTag(id: number, tag: string): TagChange;
  similarTo(memory: MemoryRecord): SimilarMemory[];
  exportAll(): ExportedMemory[];
  importAll(entries: unknown): MemoryRecord[];
  rebuildIndex(): number;
}

export interface ScoredMemory {
  memory: MemoryRecord;
  score: number;
}

export interface SearchService {
  recall(request: RecallRequest): ScoredMemory[];
}

export interface ServiceRegistry {
  memory: MemoryService;
  search: SearchService;
  similarity: SimilarityService;
  dedupe: DedupeService;
}
