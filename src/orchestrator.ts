import { log } from "./logger.js";
import { BackendUnavailableError, errorMessage } from "./errors.js";
import { ConflictDetector } from "./conflicts.js";
import { addDays, localDateKey, mostRecentMonday, toLocalIsoString, entryDateKey } from "./dates.js";
import { FALLBACK_COLLECTION } from "./config.js";
import { Indexer, type IndexOptions } from "./indexer.js";
import { TrackingLedger } from "./ledger.js";
import { EntityQuarantine, type QuarantineOutcome, type ValidateOptions } from "./quarantine.js";
import { RetrievalRouter, type QueryOptions } from "./retrieval.js";
import type { EntityRecord, QuarantineRecord } from "./schemas.js";
import { detectMemoryTrigger, filterTurns } from "./significance.js";
import { TieredStore } from "./storage.js";
import { findSessionFiles, readSessionFile } from "./transcript.js";
import type {
  Clock,
  ConflictReport,
  Importance,
  IndexResult,
  IngestResult,
  MemoryConfig,
  PruneResult,
  QueryResult,
  Role,
  StatusReport,
  TranscriptSession,
  WeeklySummary,
} from "./types.js";
import { OpenAiEmbedder, QdrantBackend, type EmbeddingBackend } from "./vector-backend.js";

export interface OrchestratorOptions {
  /** Overrides the backend built from config; null disables vector search. */
  backend?: EmbeddingBackend | null;
  clock?: Clock;
}

export interface SaveOptions {
  category?: string;
  importance?: Importance;
  role?: Role;
}

export interface SaveResult {
  file: string;
  date: string;
  written: number;
}

export interface RememberResult extends SaveResult {
  trigger: string;
  category: string;
  importance: Importance;
}

export interface IngestSessionOptions {
  sinceHours?: number;
  sourceFilter?: string;
  /** Defaults to ingest.session_dirs. */
  dirs?: string[];
}

export interface MaintainResult {
  consolidated: WeeklySummary[];
  pruned: PruneResult | null;
}

/** Components bound to one loaded ledger. */
interface Session {
  ledger: TrackingLedger;
  store: TieredStore;
  quarantine: EntityQuarantine;
  router: RetrievalRouter;
}

/**
 * One method per entry point. Each call loads the ledger, runs to completion,
 * and commits the ledger once with a single atomic write. A ledger write
 * failure (LedgerWriteError) is the only error that aborts an operation after
 * its work is done.
 */
export class Orchestrator {
  private constructor(
    readonly config: MemoryConfig,
    readonly backend: EmbeddingBackend | null,
    private readonly clock: Clock,
  ) {}

  static open(config: MemoryConfig, options: OrchestratorOptions = {}): Orchestrator {
    const backend = options.backend !== undefined ? options.backend : Orchestrator.createBackend(config);
    return new Orchestrator(config, backend, options.clock ?? (() => new Date()));
  }

  static createBackend(config: MemoryConfig): EmbeddingBackend | null {
    if (!config.vector.enabled) return null;
    const embedder = new OpenAiEmbedder({
      baseUrl: config.embedding.baseUrl,
      model: config.embedding.model,
      apiKey: config.embedding.apiKey,
      timeoutMs: config.vector.timeoutMs,
    });
    return new QdrantBackend(embedder, {
      url: config.vector.url,
      timeoutMs: config.vector.timeoutMs,
      dimensions: config.embedding.dimensions,
    });
  }

  private async run<T>(operation: string, fn: (session: Session) => Promise<T>): Promise<T> {
    const ledger = await TrackingLedger.load(TrackingLedger.ledgerPath(this.config.memoryDir));
    const store = new TieredStore({ memoryDir: this.config.memoryDir, ledger, clock: this.clock });
    const session: Session = {
      ledger,
      store,
      quarantine: new EntityQuarantine({
        memoryDir: this.config.memoryDir,
        ledger,
        clock: this.clock,
        defaultCollection: this.config.entities.defaultCollection,
        backend: this.backend,
      }),
      router: new RetrievalRouter({
        store,
        ledger,
        clock: this.clock,
        backend: this.backend,
        collections: this.searchCollections(ledger),
        timeoutMs: this.config.vector.timeoutMs,
        defaults: { limit: this.config.retrieval.limit, windowDays: this.config.retrieval.windowDays },
      }),
    };

    const result = await fn(session);
    await ledger.commit();
    log.debug(`${operation} complete`);
    return result;
  }

  /** Configured collections plus any that validated entities were filed under. */
  private searchCollections(ledger: TrackingLedger): string[] {
    const names = new Set(Object.keys(this.config.collections));
    for (const entity of ledger.state.validated_entities) names.add(entity.collection);
    return [...names];
  }

  // -------------------------------------------------------------------------
  // Writing memories
  // -------------------------------------------------------------------------

  async save(content: string, options: SaveOptions = {}): Promise<SaveResult> {
    return this.run("save", async ({ store }) => {
      const timestamp = toLocalIsoString(this.clock());
      const written = await store.append({
        content,
        role: options.role ?? "user",
        category: options.category ?? "general",
        importance: options.importance ?? "normal",
        timestamp,
      });
      const date = entryDateKey(timestamp);
      return { file: store.dailyPath(date), date, written };
    });
  }

  /** Save only when `text` carries an explicit memory trigger ("remember this: ..."). */
  async remember(text: string): Promise<RememberResult | null> {
    const trigger = detectMemoryTrigger(text);
    if (!trigger) return null;
    const saved = await this.save(trigger.content, { category: trigger.category, importance: trigger.importance });
    return { ...saved, trigger: trigger.trigger, category: trigger.category, importance: trigger.importance };
  }

  async ingest(sessions: readonly TranscriptSession[]): Promise<IngestResult> {
    return this.run("ingest", (session) => this.ingestInto(session, sessions, 0));
  }

  /** Read session logs from disk, then ingest them. Unreadable files count as failed sessions. */
  async ingestSessions(options: IngestSessionOptions = {}): Promise<IngestResult> {
    const files = await findSessionFiles(options.dirs ?? this.config.ingest.sessionDirs, {
      sinceHours: options.sinceHours,
      sourceFilter: options.sourceFilter,
      now: this.clock(),
    });

    const sessions: TranscriptSession[] = [];
    let unreadable = 0;
    for (const file of files) {
      try {
        sessions.push(await readSessionFile(file));
      } catch (err) {
        unreadable += 1;
        log.warn(`could not read session ${file}: ${errorMessage(err)}`);
      }
    }
    return this.run("ingest", (session) => this.ingestInto(session, sessions, unreadable));
  }

  private async ingestInto(
    { store, quarantine }: Session,
    sessions: readonly TranscriptSession[],
    failedSessions: number,
  ): Promise<IngestResult> {
    const result: IngestResult = {
      sessions: sessions.length + failedSessions,
      messages: 0,
      kept: 0,
      discarded: 0,
      written: 0,
      failedSessions,
      quarantined: 0,
    };

    for (const transcript of sessions) {
      try {
        const filtered = filterTurns(transcript.turns);
        result.messages += transcript.turns.length;
        result.kept += filtered.kept.length;
        result.discarded += filtered.discarded;
        result.written += await store.appendMany(filtered.kept);

        if (this.config.entities.autoDiscover) {
          for (const entry of filtered.kept) {
            const outcomes = await quarantine.discoverAndQuarantine(entry.content);
            result.quarantined += outcomes.filter((o) => o.status === "quarantined").length;
          }
        }
      } catch (err) {
        result.failedSessions += 1;
        log.warn(`ingest failed for session ${transcript.id}: ${errorMessage(err)}`);
      }
    }

    log.info(
      `ingest: ${result.kept}/${result.messages} turns kept from ${result.sessions} sessions, ${result.written} written`,
    );
    return result;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async consolidate(weekStart?: string): Promise<WeeklySummary | null> {
    return this.run("consolidate", ({ store }) => store.consolidate(weekStart));
  }

  async prune(retentionDays?: number): Promise<PruneResult> {
    return this.run("prune", ({ store }) =>
      store.prune(retentionDays ?? this.config.pruning.dailyFileRetentionDays),
    );
  }

  /** Consolidate last week and this week; prune too when auto-prune is on. */
  async maintain(): Promise<MaintainResult> {
    return this.run("maintain", async ({ store }) => {
      const thisWeek = mostRecentMonday(localDateKey(this.clock()));
      const consolidated: WeeklySummary[] = [];
      for (const weekStart of [addDays(thisWeek, -7), thisWeek]) {
        const summary = await store.consolidate(weekStart);
        if (summary) consolidated.push(summary);
      }
      const pruned = this.config.pruning.autoPruneEnabled
        ? await store.prune(this.config.pruning.dailyFileRetentionDays)
        : null;
      return { consolidated, pruned };
    });
  }

  // -------------------------------------------------------------------------
  // Entities
  // -------------------------------------------------------------------------

  async discover(text: string): Promise<string[]> {
    return this.run("discover", async ({ quarantine }) => quarantine.discover(text));
  }

  async discoverAndQuarantine(text: string): Promise<QuarantineOutcome[]> {
    return this.run("discover", ({ quarantine }) => quarantine.discoverAndQuarantine(text));
  }

  async quarantine(name: string, context: string): Promise<QuarantineOutcome> {
    return this.run("quarantine", ({ quarantine }) => quarantine.quarantine(name, context));
  }

  async validate(name: string, options: ValidateOptions = {}): Promise<EntityRecord> {
    return this.run("validate", ({ quarantine }) => quarantine.validate(name, options));
  }

  async reject(name: string): Promise<QuarantineRecord> {
    return this.run("reject", ({ quarantine }) => quarantine.reject(name));
  }

  async listQuarantine(): Promise<QuarantineRecord[]> {
    return this.run("quarantine-list", async ({ quarantine }) => quarantine.list());
  }

  // -------------------------------------------------------------------------
  // Retrieval
  // -------------------------------------------------------------------------

  async query(text: string, options: QueryOptions = {}): Promise<QueryResult> {
    return this.run("query", ({ router }) => router.query(text, options));
  }

  async detectConflicts(query: string, limit = 10, options: Pick<QueryOptions, "forceFallback"> = {}): Promise<ConflictReport> {
    return this.run("conflicts", ({ router }) => new ConflictDetector(router).detect(query, limit, options));
  }

  async index(options: IndexOptions = {}): Promise<IndexResult> {
    const backend = this.backend;
    if (!backend) throw new BackendUnavailableError("vector backend is disabled (vector.enabled = false)");
    return this.run("index", ({ ledger, store }) =>
      new Indexer({
        memoryDir: this.config.memoryDir,
        ledger,
        clock: this.clock,
        store,
        backend,
        collections: this.config.collections,
        fallbackCollection: FALLBACK_COLLECTION in this.config.collections ? FALLBACK_COLLECTION : this.config.entities.defaultCollection,
      }).indexAll(options),
    );
  }

  async status(): Promise<StatusReport> {
    return this.run("status", async ({ ledger, store }) => {
      const inventory = await store.listTierFiles();
      const collections: Record<string, number | null> = {};
      for (const name of this.searchCollections(ledger)) {
        if (!this.backend) {
          collections[name] = null;
          continue;
        }
        try {
          collections[name] = await this.backend.getCollectionStats(name);
        } catch (err) {
          collections[name] = null;
          log.debug(`stats unavailable for ${name}: ${errorMessage(err)}`);
        }
      }
      return {
        dailyFiles: inventory.daily.length,
        weeklySummaries: inventory.weekly.length,
        archivedFiles: inventory.archived.length,
        quarantined: ledger.state.quarantine.length,
        validated: ledger.state.validated_entities.length,
        lastConsolidation: ledger.state.last_consolidation,
        collections,
      };
    });
  }
}
