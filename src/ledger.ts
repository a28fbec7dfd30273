import path from "node:path";
import { readFile, rename } from "node:fs/promises";
import { log } from "./logger.js";
import { LedgerWriteError, MalformedRecordError, errorMessage } from "./errors.js";
import { hasErrorCode, writeJsonFileAtomic } from "./fs-utils.js";
import {
  LedgerStateSchema,
  type AccessLog,
  type DailyEntrySummary,
  type EntityRecord,
  type LedgerState,
  type QuarantineRecord,
  type WeeklyRecord,
} from "./schemas.js";

const MAX_ACCESS_LOGS = 500;

export function emptyLedgerState(): LedgerState {
  return LedgerStateSchema.parse({});
}

/**
 * Durable lifecycle metadata: the source of truth for tier membership,
 * quarantine state, and consolidation history.
 *
 * Loaded once per operation; mutations stay in memory until commit(), which
 * replaces the file with a single write-temp-then-rename.
 */
export class TrackingLedger {
  private dirty = false;

  private constructor(
    readonly filePath: string,
    private readonly data: LedgerState,
  ) {}

  static ledgerPath(memoryDir: string): string {
    return path.join(memoryDir, "state", "ledger.json");
  }

  static inMemory(filePath: string): TrackingLedger {
    return new TrackingLedger(filePath, emptyLedgerState());
  }

  static async load(filePath: string): Promise<TrackingLedger> {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch (err) {
      if (hasErrorCode(err, "ENOENT")) return new TrackingLedger(filePath, emptyLedgerState());
      // An empty ledger here would replace the real one on the next commit.
      throw new LedgerWriteError(`cannot read ledger ${filePath}: ${errorMessage(err)}`, err);
    }

    try {
      const parsed = LedgerStateSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return new TrackingLedger(filePath, parsed.data);
      throw new MalformedRecordError(
        `ledger does not match its schema: ${parsed.error.issues[0]?.message ?? "unknown issue"}`,
        filePath,
      );
    } catch (err) {
      // Keep the unreadable file for the operator instead of overwriting it on the next commit.
      const aside = `${filePath}.corrupt-${Date.now()}`;
      log.warn(`malformed ledger at ${filePath} (${errorMessage(err)}); moved to ${aside}, starting fresh`);
      try {
        await rename(filePath, aside);
      } catch (renameErr) {
        throw new LedgerWriteError(`could not move malformed ledger aside: ${errorMessage(renameErr)}`, renameErr);
      }
      return new TrackingLedger(filePath, emptyLedgerState());
    }
  }

  get state(): Readonly<LedgerState> {
    return this.data;
  }

  isDirty(): boolean {
    return this.dirty;
  }

  async commit(): Promise<void> {
    if (!this.dirty) return;
    try {
      await writeJsonFileAtomic(this.filePath, this.data);
    } catch (err) {
      throw new LedgerWriteError(`failed to persist ledger ${this.filePath}: ${errorMessage(err)}`, err);
    }
    this.dirty = false;
  }

  // -------------------------------------------------------------------------
  // Daily tier
  // -------------------------------------------------------------------------

  recordDailyEntry(date: string, summary: DailyEntrySummary): void {
    if (!this.data.daily_files[date]) this.data.daily_files[date] = [];
    this.data.daily_files[date].push(summary);
    const metrics = this.data.memory_metrics[date] ?? { entries_written: 0 };
    metrics.entries_written += 1;
    this.data.memory_metrics[date] = metrics;
    this.dirty = true;
  }

  // -------------------------------------------------------------------------
  // Weekly tier
  // -------------------------------------------------------------------------

  recordWeeklySummary(label: string, record: WeeklyRecord): void {
    this.data.weekly_summaries[label] = record;
    this.data.last_consolidation = record.timestamp;
    this.dirty = true;
  }

  // -------------------------------------------------------------------------
  // Entities
  // -------------------------------------------------------------------------

  findPending(name: string): QuarantineRecord | undefined {
    return this.data.quarantine.find((r) => r.name === name);
  }

  findValidated(name: string): EntityRecord | undefined {
    return this.data.validated_entities.find((r) => r.name === name);
  }

  addPending(record: QuarantineRecord): void {
    if (this.findPending(record.name) || this.findValidated(record.name)) return;
    this.data.quarantine.push(record);
    this.dirty = true;
  }

  removePending(name: string): QuarantineRecord | undefined {
    const idx = this.data.quarantine.findIndex((r) => r.name === name);
    if (idx === -1) return undefined;
    const [removed] = this.data.quarantine.splice(idx, 1);
    this.dirty = true;
    return removed;
  }

  /** pending → validated as one in-memory step; the record leaves the quarantine list before it joins the validated list. */
  promote(name: string, validated: EntityRecord): boolean {
    if (!this.removePending(name)) return false;
    this.data.validated_entities.push(validated);
    this.dirty = true;
    return true;
  }

  // -------------------------------------------------------------------------
  // Retrieval & indexing
  // -------------------------------------------------------------------------

  recordAccess(entry: AccessLog): void {
    this.data.access_logs.push(entry);
    if (this.data.access_logs.length > MAX_ACCESS_LOGS) {
      this.data.access_logs.splice(0, this.data.access_logs.length - MAX_ACCESS_LOGS);
    }
    this.dirty = true;
  }

  indexedHash(relPath: string): string | undefined {
    return this.data.indexed_files[relPath];
  }

  recordIndexed(relPath: string, hash: string): void {
    this.data.indexed_files[relPath] = hash;
    this.dirty = true;
  }

  /** An archived file keeps its hash, so indexing does not embed it a second time under the new path. */
  moveIndexed(fromRel: string, toRel: string): void {
    const hash = this.indexedHash(fromRel);
    if (hash === undefined) return;
    delete this.data.indexed_files[fromRel];
    this.data.indexed_files[toRel] = hash;
    this.dirty = true;
  }
}
