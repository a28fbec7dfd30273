export type Role = "user" | "assistant";
export type Importance = "normal" | "high" | "action" | "decision" | "long-term";
export type Tier = "daily" | "weekly" | "archived" | "entity";
export type ResultSource = "vectors" | "files";

export const IMPORTANCE_LEVELS: readonly Importance[] = [
  "normal",
  "high",
  "action",
  "decision",
  "long-term",
];

/** One retained conversational turn. Immutable once appended to a daily file. */
export interface MemoryEntry {
  content: string;
  role: Role;
  /** Free-form label, e.g. decision / action / important / general / conversation. */
  category: string;
  importance: Importance;
  /** ISO-8601 with its own UTC offset; the calendar date is read as written. */
  timestamp: string;
}

/** A turn as handed over by the transcript source, before filtering. */
export interface TranscriptTurn {
  role: string;
  text: string;
  timestamp: string;
}

export interface TranscriptSession {
  id: string;
  turns: TranscriptTurn[];
}

export interface CollectionDefinition {
  description: string;
  keywords: string[];
}

export interface MemoryConfig {
  memoryDir: string;
  debug: boolean;
  pruning: {
    dailyFileRetentionDays: number;
    /** Reserved; vectors are never expired. */
    shortTermVectorDays: number;
    autoPruneEnabled: boolean;
  };
  collections: Record<string, CollectionDefinition>;
  vector: {
    enabled: boolean;
    url: string;
    timeoutMs: number;
  };
  embedding: {
    baseUrl: string;
    model: string;
    dimensions: number;
    apiKey: string | undefined;
  };
  entities: {
    defaultCollection: string;
    autoDiscover: boolean;
  };
  ingest: {
    sessionDirs: string[];
  };
  retrieval: {
    windowDays: number;
    limit: number;
  };
}

export interface DailyHit {
  file: string;
  date: string;
  preview: string;
}

export interface WeeklyHit {
  file: string;
  week: string;
  preview: string;
}

export interface VectorHit {
  collection: string;
  content: string;
  score: number;
  file?: string;
  line?: number;
}

export interface QueryResult {
  source: ResultSource;
  daily: DailyHit[];
  weekly: WeeklyHit[];
  vectors: VectorHit[];
  /** Collections whose similarity query failed while the backend was otherwise up. */
  failedCollections: string[];
}

export interface WeeklySummary {
  weekStart: string;
  weekEnd: string;
  label: string;
  file: string;
  dailyFiles: number;
  decisions: string[];
  preferences: string[];
  actions: string[];
}

export interface PruneResult {
  pruned: number;
  kept: number;
  failed: number;
}

export interface ConflictRecord {
  memory_1: string;
  memory_2: string;
  collection_1: string;
  collection_2: string;
  score_1: number;
  score_2: number;
  conflict_type: "contradiction";
  resolution: "ASK_USER";
}

export interface ConflictReport {
  source: ResultSource;
  conflicts: ConflictRecord[];
  question: string | null;
}

export interface IngestResult {
  sessions: number;
  messages: number;
  kept: number;
  discarded: number;
  written: number;
  failedSessions: number;
  quarantined: number;
}

export interface IndexResult {
  indexed: number;
  skipped: number;
  failed: number;
  chunks: number;
}

export interface StatusReport {
  dailyFiles: number;
  weeklySummaries: number;
  archivedFiles: number;
  quarantined: number;
  validated: number;
  lastConsolidation: string | null;
  collections: Record<string, number | null>;
}

/** Injected wall clock; tests pin it to a fixed instant. */
export type Clock = () => Date;

export interface TierInventory {
  daily: string[];
  weekly: string[];
  archived: string[];
}

export interface LineMatch {
  file: string;
  /** 1-based */
  line: number;
  text: string;
}
