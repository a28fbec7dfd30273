import os from "node:os";
import path from "node:path";
import { mkdtemp, rm } from "node:fs/promises";
import { parseConfig } from "../src/config.js";
import { BackendUnavailableError } from "../src/errors.js";
import { initLogger } from "../src/logger.js";
import type { MemoryPayload } from "../src/schemas.js";
import type { Clock, MemoryConfig, MemoryEntry } from "../src/types.js";
import type { EmbeddingBackend, SimilarPoint } from "../src/vector-backend.js";

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "tiered-memory-test-"));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/** Local wall-clock instant, so date keys do not depend on the host zone. */
export function fixedClock(year: number, month: number, day: number, hour = 12, minute = 0): Clock {
  return () => new Date(year, month - 1, day, hour, minute);
}

export function testConfig(memoryDir: string, raw: Record<string, unknown> = {}): MemoryConfig {
  return { ...parseConfig(raw), memoryDir };
}

export function entry(content: string, timestamp: string, extra: Partial<MemoryEntry> = {}): MemoryEntry {
  return { content, timestamp, role: "user", category: "conversation", importance: "normal", ...extra };
}

export interface CapturedLogs {
  debug: string[];
  info: string[];
  warn: string[];
  error: string[];
}

export function captureLogs(debug = false): CapturedLogs {
  const logs: CapturedLogs = { debug: [], info: [], warn: [], error: [] };
  initLogger(
    {
      debug: (msg) => logs.debug.push(msg),
      info: (msg) => logs.info.push(msg),
      warn: (msg) => logs.warn.push(msg),
      error: (msg) => logs.error.push(msg),
    },
    debug,
  );
  return logs;
}

// ---------------------------------------------------------------------------
// In-process vector store
// ---------------------------------------------------------------------------

const DIMS = 64;

function hashToken(token: string): number {
  let h = 0;
  for (let i = 0; i < token.length; i++) h = (h * 31 + token.charCodeAt(i)) >>> 0;
  return h % DIMS;
}

/** Bag-of-words vector: texts sharing words point the same way. */
export function bagOfWords(text: string): number[] {
  const v = new Array<number>(DIMS).fill(0);
  for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) v[hashToken(token)] += 1;
  return v;
}

function cosine(a: number[], b: number[]): number {
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  return na === 0 || nb === 0 ? 0 : dot / Math.sqrt(na * nb);
}

interface StoredPoint {
  vector: number[];
  payload: MemoryPayload;
}

export class InMemoryBackend implements EmbeddingBackend {
  readonly collections = new Map<string, Map<string, StoredPoint>>();
  readonly ensured: string[] = [];
  embedCalls = 0;
  failEmbed = false;
  /** Makes embed() never settle, to exercise timeouts. */
  hangEmbed = false;
  readonly failingCollections = new Set<string>();

  async embed(text: string): Promise<number[]> {
    this.embedCalls += 1;
    if (this.hangEmbed) return new Promise<number[]>(() => {});
    if (this.failEmbed) throw new BackendUnavailableError("embedding service down");
    return bagOfWords(text);
  }

  async ensureCollection(name: string): Promise<void> {
    if (!this.collections.has(name)) this.collections.set(name, new Map());
    this.ensured.push(name);
  }

  async upsert(collection: string, id: string, vector: number[], payload: MemoryPayload): Promise<void> {
    if (this.failingCollections.has(collection)) throw new BackendUnavailableError(`${collection} down`);
    const points = this.collections.get(collection) ?? new Map<string, StoredPoint>();
    points.set(id, { vector, payload });
    this.collections.set(collection, points);
  }

  async querySimilar(collection: string, vector: number[], k: number): Promise<SimilarPoint[]> {
    if (this.failingCollections.has(collection)) throw new BackendUnavailableError(`${collection} down`);
    const points = this.collections.get(collection);
    if (!points) throw new BackendUnavailableError(`collection ${collection} not found`);
    return [...points.entries()]
      .map(([id, p]) => ({ id, score: cosine(vector, p.vector), payload: p.payload }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }

  async getCollectionStats(name: string): Promise<number> {
    const points = this.collections.get(name);
    if (!points) throw new BackendUnavailableError(`collection ${name} not found`);
    return points.size;
  }

  /** Store `content` directly, embedding it the same way queries are embedded. */
  seed(collection: string, id: string, content: string, sourceFile = "seed.md"): void {
    const points = this.collections.get(collection) ?? new Map<string, StoredPoint>();
    points.set(id, {
      vector: bagOfWords(content),
      payload: {
        content,
        chunk_index: 0,
        total_chunks: 1,
        tier: "daily",
        collection,
        timestamp: "2026-02-09T09:00:00.000+00:00",
        source_file: sourceFile,
      },
    });
    this.collections.set(collection, points);
  }
}
