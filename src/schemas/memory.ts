import { z } from "zod";

export const ImportanceSchema = z.number().int().min(1).max(5);

const MemoryIdSchema = z.number().int().positive();

export const MemoryCreateInputSchema = z.object({
  content: z
    .string()
    .refine((value) => value.trim().length > 0, "Content must not be empty"),
  tags: z.array(z.string().min(1)).default([]),
  context: z.string().nullish(),
  source: z.string().min(1).default("user"),
  sessionId: z.string().nullish(),
  supersedes: MemoryIdSchema.nullish(),
  seeAlso: z.array(MemoryIdSchema).default([]),
  sourceUrl: z.string().nullish(),
  sourceFile: z.string().nullish(),
  importance: ImportanceSchema.default(3),
  autoTag: z.boolean().default(false),
});

export const MemoryUpdateInputSchema = z.object({
  id: MemoryIdSchema,
  content: z
    .string()
    .refine((value) => value.trim().length > 0, "Content must not be empty")
    .optional(),
  addTags: z.array(z.string().min(1)).default([]),
  clearTags: z.boolean().default(false),
  context: z.string().optional(),
  sessionId: z.string().optional(),
  supersedes: MemoryIdSchema.optional(),
  addSeeAlso: z.array(MemoryIdSchema).default([]),
  sourceUrl: z.string().optional(),
  sourceFile: z.string().optional(),
  importance: ImportanceSchema.optional(),
});

const memoryFilterShape = {
  tags: z.array(z.string()).default([]),
  sessionId: z.string().optional(),
  minImportance: ImportanceSchema.optional(),
};

export const RecallRequestSchema = z.object({
  query: z.string().min(1),
  limit: z.number().int().min(1).default(10),
  ...memoryFilterShape,
  recentFirst: z.boolean().default(false),
  boostImportant: z.boolean().default(false),
});

export const ListRequestSchema = z.object({
  since: z
    .string()
    .refine((value) => !Number.isNaN(Date.parse(value)), "Invalid date format")
    .optional(),
  limit: z.number().int().min(1).default(50),
  ...memoryFilterShape,
});

const isoTimestamp = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), "Invalid timestamp");

/** Shape written by `export` and read back by `import`. */
export const ExportedMemorySchema = z.object({
  content: z.string().min(1),
  tags: z.array(z.string()).default([]),
  context: z.string().nullish(),
  source: z.string().default("imported"),
  session_id: z.string().nullish(),
  supersedes: MemoryIdSchema.nullish(),
  see_also: z.array(MemoryIdSchema).default([]),
  source_url: z.string().nullish(),
  source_file: z.string().nullish(),
  importance: ImportanceSchema.default(3),
  created_at: isoTimestamp.nullish(),
  updated_at: isoTimestamp.nullish(),
});

export const ExportFileSchema = z.array(ExportedMemorySchema);

export type MemoryCreateInput = z.input<typeof MemoryCreateInputSchema>;
export type MemoryUpdateInput = z.input<typeof MemoryUpdateInputSchema>;
export type RecallRequest = z.input<typeof RecallRequestSchema>;
export type ListRequest = z.input<typeof ListRequestSchema>;
export type ExportedMemory = z.infer<typeof ExportedMemorySchema>;
