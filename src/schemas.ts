import { z } from "zod";

// ---------------------------------------------------------------------------
// Vector payloads
// ---------------------------------------------------------------------------

export const TierSchema = z.enum(["daily", "weekly", "archived", "entity"]);

/** The only payload shape ever written to or read back from the vector store. */
export const MemoryPayloadSchema = z
  .object({
    content: z.string(),
    chunk_index: z.number().int().nonnegative(),
    total_chunks: z.number().int().positive(),
    tier: TierSchema,
    collection: z.string().min(1),
    timestamp: z.string(),
    source_file: z.string(),
    date: z.string().optional(),
  })
  .strict();

export type MemoryPayload = z.infer<typeof MemoryPayloadSchema>;

// ---------------------------------------------------------------------------
// Tracking ledger (on-disk shape, snake_case)
// ---------------------------------------------------------------------------

const ImportanceSchema = z.enum(["normal", "high", "action", "decision", "long-term"]);

export const AccessLogSchema = z.object({
  query: z.string(),
  source: z.enum(["vectors", "files"]),
  results: z.number().int().nonnegative(),
  timestamp: z.string(),
});

export const DailyEntrySummarySchema = z.object({
  content: z.string(),
  role: z.enum(["user", "assistant"]),
  category: z.string(),
  importance: ImportanceSchema,
  timestamp: z.string(),
});

export const WeeklyRecordSchema = z.object({
  file: z.string(),
  week_start: z.string(),
  entries_consolidated: z.number().int().nonnegative(),
  timestamp: z.string(),
});

export const QuarantineRecordSchema = z.object({
  name: z.string().min(1),
  file: z.string(),
  discovery_context: z.string(),
  discovered_at: z.string(),
  status: z.literal("pending"),
});

export const EntityRecordSchema = z.object({
  name: z.string().min(1),
  file: z.string(),
  discovery_context: z.string(),
  discovered_at: z.string(),
  collection: z.string(),
  keywords: z.array(z.string()),
  validated_at: z.string(),
  status: z.literal("validated"),
});

export const LedgerStateSchema = z.object({
  access_logs: z.array(AccessLogSchema).default([]),
  memory_metrics: z.record(z.object({ entries_written: z.number().int().nonnegative() })).default({}),
  last_consolidation: z.string().nullable().default(null),
  daily_files: z.record(z.array(DailyEntrySummarySchema)).default({}),
  weekly_summaries: z.record(WeeklyRecordSchema).default({}),
  quarantine: z.array(QuarantineRecordSchema).default([]),
  validated_entities: z.array(EntityRecordSchema).default([]),
  indexed_files: z.record(z.string()).default({}),
});

export type AccessLog = z.infer<typeof AccessLogSchema>;
export type DailyEntrySummary = z.infer<typeof DailyEntrySummarySchema>;
export type WeeklyRecord = z.infer<typeof WeeklyRecordSchema>;
export type QuarantineRecord = z.infer<typeof QuarantineRecordSchema>;
export type EntityRecord = z.infer<typeof EntityRecordSchema>;
export type LedgerState = z.infer<typeof LedgerStateSchema>;
