import { log } from "./logger.js";
import { BackendUnavailableError, errorMessage } from "./errors.js";
import { toLocalIsoString } from "./dates.js";
import type { TrackingLedger } from "./ledger.js";
import type { TieredStore } from "./storage.js";
import type { Clock, QueryResult, ResultSource, VectorHit } from "./types.js";
import type { EmbeddingBackend } from "./vector-backend.js";

/** Score given to every lexical-fallback hit; below any cosine match worth keeping. */
export const LEXICAL_FALLBACK_SCORE = 0.5;
export const FALLBACK_LINES_PER_FILE = 3;
const CONTENT_CHARS = 200;

export interface QueryOptions {
  includeDaily?: boolean;
  includeWeekly?: boolean;
  limit?: number;
  windowDays?: number;
  /** Search only these collections instead of every configured one. */
  collections?: string[];
  /** Skip the backend entirely and serve vectors from the file scan. */
  forceFallback?: boolean;
}

export interface RouterContext {
  store: TieredStore;
  ledger: TrackingLedger;
  clock: Clock;
  backend: EmbeddingBackend | null;
  collections: string[];
  timeoutMs: number;
  defaults: { limit: number; windowDays: number };
}

/** Reject with BackendUnavailableError if `promise` has not settled within `ms`. */
export async function withTimeout<T>(promise: Promise<T>, ms: number, what: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new BackendUnavailableError(`${what} timed out after ${ms}ms`)), ms);
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}

interface VectorOutcome {
  hits: VectorHit[];
  failedCollections: string[];
}

/**
 * Two strategies behind one result shape. Daily and weekly portions always
 * come from the file tiers; the vectors portion comes from the embedding
 * backend when it answers and from a line scan of the daily and archived
 * files when it does not. `source` says which one served.
 */
export class RetrievalRouter {
  constructor(private readonly ctx: RouterContext) {}

  async query(text: string, options: QueryOptions = {}): Promise<QueryResult> {
    const limit = options.limit ?? this.ctx.defaults.limit;
    const windowDays = options.windowDays ?? this.ctx.defaults.windowDays;

    const daily = options.includeDaily === false ? [] : await this.ctx.store.queryByKeyword(text, windowDays);
    const weekly = options.includeWeekly === false ? [] : await this.ctx.store.queryWeekly(text);

    let source: ResultSource = "vectors";
    let outcome: VectorOutcome | null = null;
    if (options.forceFallback) {
      log.debug("vector search skipped: fallback forced");
    } else {
      outcome = await this.vectorSearch(text, limit, options.collections ?? this.ctx.collections);
    }

    let vectors: VectorHit[];
    let failedCollections: string[] = [];
    if (outcome) {
      vectors = outcome.hits;
      failedCollections = outcome.failedCollections;
    } else {
      source = "files";
      vectors = await this.lexicalSearch(text, limit);
    }

    this.ctx.ledger.recordAccess({
      query: text,
      source,
      results: daily.length + weekly.length + vectors.length,
      timestamp: toLocalIsoString(this.ctx.clock()),
    });

    return { source, daily, weekly, vectors, failedCollections };
  }

  /** Null means the backend could not serve this query at all. */
  private async vectorSearch(text: string, limit: number, collections: string[]): Promise<VectorOutcome | null> {
    const { backend, timeoutMs } = this.ctx;
    if (!backend) {
      log.debug("no embedding backend configured; using file search");
      return null;
    }

    let vector: number[];
    try {
      vector = await withTimeout(backend.embed(text), timeoutMs, "embedding");
    } catch (err) {
      log.warn(`embedding backend unavailable (${errorMessage(err)}); falling back to file search`);
      return null;
    }

    const hits: VectorHit[] = [];
    const failedCollections: string[] = [];
    for (const collection of collections) {
      try {
        const points = await withTimeout(backend.querySimilar(collection, vector, limit), timeoutMs, `search ${collection}`);
        for (const point of points) {
          hits.push({
            collection,
            content: point.payload.content.slice(0, CONTENT_CHARS),
            score: point.score,
            file: point.payload.source_file,
          });
        }
      } catch (err) {
        failedCollections.push(collection);
        log.debug(`collection ${collection} failed: ${errorMessage(err)}`);
      }
    }

    if (collections.length > 0 && failedCollections.length === collections.length) {
      log.warn(`all ${collections.length} collections failed; falling back to file search`);
      return null;
    }
    if (failedCollections.length > 0) {
      log.warn(`vector search skipped failing collections: ${failedCollections.join(", ")}`);
    }

    hits.sort((a, b) => b.score - a.score);
    return { hits: hits.slice(0, limit), failedCollections };
  }

  private async lexicalSearch(text: string, limit: number): Promise<VectorHit[]> {
    const matches = await this.ctx.store.searchLines(text, FALLBACK_LINES_PER_FILE);
    return matches.slice(0, limit).map((m) => ({
      collection: "file",
      content: m.text.slice(0, CONTENT_CHARS),
      score: LEXICAL_FALLBACK_SCORE,
      file: m.file,
      line: m.line,
    }));
  }
}
