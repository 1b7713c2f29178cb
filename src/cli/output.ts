import Table from "cli-table3";
import pc from "picocolors";
import type { MemoryRecord, TagCount } from "../repositories/types";
import type { DedupeReport, DedupeStatus } from "../services/types";
import { previewText } from "../utils/text";

export type OutputMode = "human" | "json" | "quiet";

export function resolveOutputMode(options: { json: boolean; quiet: boolean }): OutputMode {
  if (options.quiet) {
    return "quiet";
  }
  return options.json ? "json" : "human";
}

export interface MemoryJson {
  id: number;
  content: string;
  tags: string[];
  context: string | null;
  source: string;
  session_id: string | null;
  supersedes: number | null;
  see_also: number[];
  source_url: string | null;
  source_file: string | null;
  importance: number;
  created_at: string;
  updated_at: string;
  score?: number;
}

export function toMemoryJson(memory: MemoryRecord, score?: number): MemoryJson {
  const json: MemoryJson = {
    id: memory.id,
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
  };
  if (score !== undefined) {
    json.score = score;
  }
  return json;
}

export interface DedupeJson {
  status: DedupeStatus;
  dry_run: boolean;
  scanned: number;
  merged_count: number;
  groups: Array<{
    position: number;
    members: Array<{ id: number; preview: string; tags: string[]; created_at: string }>;
    merged: boolean;
    survivor_id: number | null;
    deleted_ids: number[];
    tags: string[];
  }>;
}

export function toDedupeJson(report: DedupeReport): DedupeJson {
  return {
    status: report.status,
    dry_run: report.dryRun,
    scanned: report.scanned,
    merged_count: report.mergedCount,
    groups: report.groups.map((group) => ({
      position: group.position,
      members: group.members.map((member) => ({
        id: member.id,
        preview: member.preview,
        tags: member.tags,
        created_at: new Date(member.createdAt).toISOString(),
      })),
      merged: group.merged,
      survivor_id: group.survivorId,
      deleted_ids: group.deletedIds,
      tags: group.tags,
    })),
  };
}

const pad = (value: number): string => String(value).padStart(2, "0");

/** Local calendar date, `YYYY-MM-DD`. */
export function formatDate(epochMs: number): string {
  const date = new Date(epochMs);
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Local date and time, `YYYY-MM-DD HH:MM`. */
export function formatTimestamp(epochMs: number): string {
  const date = new Date(epochMs);
  return `${formatDate(epochMs)} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function formatTags(tags: readonly string[]): string {
  return tags.length ? ` (tags: ${tags.join(", ")})` : "";
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function printTable(
  rows: string[][],
  options: Table.TableConstructorOptions & { head: string[] },
): void {
  const table = new Table(options);
  rows.forEach((row) => table.push(row));
  console.log(table.toString());
}

/**
 * Prints memories as ids, a JSON array or a table. A score column appears
 * only when `scores` is given.
 */
export function printMemories(
  memories: readonly MemoryRecord[],
  mode: OutputMode,
  scores?: ReadonlyMap<number, number>,
): void {
  if (mode === "quiet") {
    memories.forEach((memory) => console.log(String(memory.id)));
    return;
  }

  if (mode === "json") {
    printJson(memories.map((memory) => toMemoryJson(memory, scores?.get(memory.id))));
    return;
  }

  if (memories.length === 0) {
    console.log("No memories found.");
    return;
  }

  const head = ["ID", "Content", "Tags", ...(scores ? ["Score"] : []), "Created"];
  const rows = memories.map((memory) => [
    pc.dim(String(memory.id)),
    previewText(memory.content, 60, 57),
    memory.tags.length ? pc.cyan(memory.tags.join(", ")) : "-",
    ...(scores ? [pc.yellow((scores.get(memory.id) ?? 0).toFixed(2))] : []),
    pc.green(formatTimestamp(memory.createdAt)),
  ]);

  printTable(rows, { head, wordWrap: true });
}

export function printTagCounts(counts: readonly TagCount[], mode: Exclude<OutputMode, "quiet">): void {
  if (mode === "json") {
    printJson(Object.fromEntries(counts.map(({ tag, count }) => [tag, count])));
    return;
  }

  if (counts.length === 0) {
    console.log("No tags found.");
    return;
  }

  printTable(
    counts.map(({ tag, count }) => [pc.cyan(tag), String(count)]),
    { head: ["Tag", "Count"], colAligns: ["left", "right"] },
  );
}
