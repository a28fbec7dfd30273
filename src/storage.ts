import { appendFile, mkdir, readFile, rename } from "node:fs/promises";
import path from "node:path";
import { log } from "./logger.js";
import { errorMessage } from "./errors.js";
import { consolidationClassifier, type Classifier, type ConsolidationBucket } from "./classify.js";
import {
  addDays,
  entryClock,
  entryDateKey,
  isDateKey,
  localDateKey,
  mostRecentMonday,
  toLocalIsoString,
} from "./dates.js";
import { hasErrorCode, listMarkdownFiles, toPosixRelPath, uniquePath, writeFileAtomic } from "./fs-utils.js";
import type { TrackingLedger } from "./ledger.js";
import type {
  Clock,
  DailyHit,
  LineMatch,
  MemoryEntry,
  PruneResult,
  TierInventory,
  WeeklyHit,
  WeeklySummary,
} from "./types.js";

export const WEEKLY_BUCKET_CAP = 5;
export const DAILY_PREVIEW_CHARS = 500;
export const WEEKLY_PREVIEW_CHARS = 300;
const SUMMARY_CONTENT_CHARS = 100;

export interface StoreContext {
  memoryDir: string;
  ledger: TrackingLedger;
  clock: Clock;
  /** Bucket heuristic for weekly consolidation. */
  classifier?: Classifier<ConsolidationBucket>;
}

// ---------------------------------------------------------------------------
// Daily block format
// ---------------------------------------------------------------------------

export function formatDailyBlock(entry: MemoryEntry): string {
  return [
    `## ${entryClock(entry.timestamp)} - ${entry.category.toUpperCase()} [${entry.importance}]`,
    `*${entry.role} · ${entry.timestamp}*`,
    "",
    entry.content,
    "",
    "---",
    "",
    "",
  ].join("\n");
}

function dailyHeader(date: string): string {
  return `# Daily Memory - ${date}\n\n`;
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

/**
 * The file tiers: daily files at the root of the memory directory, weekly
 * summaries under distilled/, relocated daily files under archive/.
 *
 * Every age decision reads the date from the file name, never the mtime.
 */
export class TieredStore {
  private readonly classifier: Classifier<ConsolidationBucket>;

  constructor(private readonly ctx: StoreContext) {
    this.classifier = ctx.classifier ?? consolidationClassifier;
  }

  get dailyDir(): string {
    return this.ctx.memoryDir;
  }
  get weeklyDir(): string {
    return path.join(this.ctx.memoryDir, "distilled");
  }
  get archiveDir(): string {
    return path.join(this.ctx.memoryDir, "archive");
  }

  dailyPath(date: string): string {
    return path.join(this.dailyDir, `${date}.md`);
  }

  weeklyPath(weekStart: string): string {
    return path.join(this.weeklyDir, `Week_${weekStart}.md`);
  }

  private today(): string {
    return localDateKey(this.ctx.clock());
  }

  // -------------------------------------------------------------------------
  // Daily tier
  // -------------------------------------------------------------------------

  async append(entry: MemoryEntry): Promise<number> {
    return this.appendMany([entry]);
  }

  /**
   * Append entries to the daily file of each entry's own calendar date.
   * Returns how many entries reached disk.
   */
  async appendMany(entries: readonly MemoryEntry[]): Promise<number> {
    const byDate = new Map<string, MemoryEntry[]>();
    for (const entry of entries) {
      let date: string;
      try {
        date = entryDateKey(entry.timestamp);
      } catch (err) {
        log.warn(`skipping entry with unusable timestamp: ${errorMessage(err)}`);
        continue;
      }
      const bucket = byDate.get(date) ?? [];
      bucket.push(entry);
      byDate.set(date, bucket);
    }

    let written = 0;
    for (const [date, batch] of byDate) {
      const filePath = this.dailyPath(date);
      try {
        await mkdir(this.dailyDir, { recursive: true });
        // "wx" creates the header exactly once; EEXIST means another block already started the file.
        await appendFile(filePath, dailyHeader(date), { encoding: "utf-8", flag: "wx" }).catch((err: unknown) => {
          if (!hasErrorCode(err, "EEXIST")) throw err;
        });
        await appendFile(filePath, batch.map(formatDailyBlock).join(""), "utf-8");
      } catch (err) {
        log.warn(`failed to append ${batch.length} entries to ${filePath}: ${errorMessage(err)}`);
        continue;
      }

      for (const entry of batch) {
        this.ctx.ledger.recordDailyEntry(date, {
          content: entry.content.slice(0, SUMMARY_CONTENT_CHARS),
          role: entry.role,
          category: entry.category,
          importance: entry.importance,
          timestamp: entry.timestamp,
        });
      }
      written += batch.length;
      log.debug(`appended ${batch.length} entries to ${filePath}`);
    }
    return written;
  }

  // -------------------------------------------------------------------------
  // Weekly tier
  // -------------------------------------------------------------------------

  /**
   * Summarise the daily files of [weekStart, weekStart + 6]. A window without
   * daily files yields null and writes nothing; re-running overwrites.
   */
  async consolidate(weekStart?: string): Promise<WeeklySummary | null> {
    const start = weekStart ?? mostRecentMonday(this.today());
    if (!isDateKey(start)) throw new RangeError(`week start is not a calendar date: ${start}`);
    const end = addDays(start, 6);
    const label = `${start}_to_${end}`;

    const texts: string[] = [];
    for (let i = 0; i < 7; i++) {
      const filePath = this.dailyPath(addDays(start, i));
      try {
        texts.push(await readFile(filePath, "utf-8"));
      } catch (err) {
        if (!hasErrorCode(err, "ENOENT")) log.warn(`skipping unreadable daily file ${filePath}: ${errorMessage(err)}`);
      }
    }

    if (texts.length === 0) {
      log.debug(`no daily files for ${label}; nothing to consolidate`);
      return null;
    }

    const buckets: Record<ConsolidationBucket, string[]> = { decision: [], preference: [], action: [] };
    for (const text of texts) {
      const [bucket] = this.classifier.classify(text);
      if (bucket && buckets[bucket].length < WEEKLY_BUCKET_CAP) {
        buckets[bucket].push(text.trim());
      }
    }

    const now = this.ctx.clock();
    const file = this.weeklyPath(start);
    await writeFileAtomic(file, renderWeekly(start, end, texts.length, buckets, now));

    this.ctx.ledger.recordWeeklySummary(label, {
      file: toPosixRelPath(file, this.ctx.memoryDir),
      week_start: start,
      entries_consolidated: texts.length,
      timestamp: toLocalIsoString(now),
    });
    log.info(`consolidated ${texts.length} daily files into ${file}`);

    return {
      weekStart: start,
      weekEnd: end,
      label,
      file,
      dailyFiles: texts.length,
      decisions: buckets.decision,
      preferences: buckets.preference,
      actions: buckets.action,
    };
  }

  // -------------------------------------------------------------------------
  // Retention
  // -------------------------------------------------------------------------

  /** Move daily files dated on or before today - retentionDays into archive/. */
  async prune(retentionDays: number): Promise<PruneResult> {
    if (!Number.isInteger(retentionDays) || retentionDays < 0) {
      throw new RangeError(`retention days must be a non-negative integer, got ${retentionDays}`);
    }
    const cutoff = addDays(this.today(), -retentionDays);
    const result: PruneResult = { pruned: 0, kept: 0, failed: 0 };

    for (const filePath of await listMarkdownFiles(this.dailyDir)) {
      const name = path.basename(filePath);
      const stem = name.slice(0, -".md".length);
      if (stem.startsWith("Week_")) continue;
      if (!isDateKey(stem) || stem > cutoff) {
        result.kept += 1;
        continue;
      }

      try {
        await mkdir(this.archiveDir, { recursive: true });
        const dest = await uniquePath(this.archiveDir, name);
        await rename(filePath, dest);
        this.ctx.ledger.moveIndexed(
          toPosixRelPath(filePath, this.ctx.memoryDir),
          toPosixRelPath(dest, this.ctx.memoryDir),
        );
        result.pruned += 1;
        log.debug(`archived ${name} → ${dest}`);
      } catch (err) {
        result.failed += 1;
        log.warn(`failed to archive ${filePath}: ${errorMessage(err)}`);
      }
    }

    log.info(`prune: ${result.pruned} archived, ${result.kept} kept, ${result.failed} failed`);
    return result;
  }

  // -------------------------------------------------------------------------
  // Scans
  // -------------------------------------------------------------------------

  /** Daily files dated after today - windowDays whose text contains `term`. */
  async queryByKeyword(term: string, windowDays: number): Promise<DailyHit[]> {
    const cutoff = addDays(this.today(), -windowDays);
    const needle = term.toLowerCase();
    const hits: DailyHit[] = [];

    for (const filePath of await this.listDailyFiles()) {
      const date = path.basename(filePath, ".md");
      if (date <= cutoff) continue;
      const text = await this.readForScan(filePath);
      if (text !== null && text.toLowerCase().includes(needle)) {
        hits.push({ file: filePath, date, preview: text.slice(0, DAILY_PREVIEW_CHARS) });
      }
    }
    return hits;
  }

  async queryWeekly(term: string): Promise<WeeklyHit[]> {
    const needle = term.toLowerCase();
    const hits: WeeklyHit[] = [];
    for (const filePath of await this.listWeeklyFiles()) {
      const text = await this.readForScan(filePath);
      if (text !== null && text.toLowerCase().includes(needle)) {
        hits.push({ file: filePath, week: path.basename(filePath, ".md"), preview: text.slice(0, WEEKLY_PREVIEW_CHARS) });
      }
    }
    return hits;
  }

  /** Case-insensitive line match over daily and archived files; weekly summaries are not scanned. */
  async searchLines(term: string, maxPerFile: number): Promise<LineMatch[]> {
    const needle = term.toLowerCase();
    const files = [...(await this.listDailyFiles()), ...(await listMarkdownFiles(this.archiveDir))];
    const matches: LineMatch[] = [];

    for (const filePath of files) {
      const text = await this.readForScan(filePath);
      if (text === null) continue;
      let found = 0;
      const lines = text.split("\n");
      for (let i = 0; i < lines.length && found < maxPerFile; i++) {
        if (lines[i].trim().length > 0 && lines[i].toLowerCase().includes(needle)) {
          matches.push({ file: filePath, line: i + 1, text: lines[i].trim() });
          found += 1;
        }
      }
    }
    return matches;
  }

  async listTierFiles(): Promise<TierInventory> {
    return {
      daily: await this.listDailyFiles(),
      weekly: await this.listWeeklyFiles(),
      archived: await listMarkdownFiles(this.archiveDir),
    };
  }

  private async listDailyFiles(): Promise<string[]> {
    return (await listMarkdownFiles(this.dailyDir)).filter((f) => isDateKey(path.basename(f, ".md")));
  }

  private async listWeeklyFiles(): Promise<string[]> {
    return (await listMarkdownFiles(this.weeklyDir)).filter((f) => path.basename(f).startsWith("Week_"));
  }

  private async readForScan(filePath: string): Promise<string | null> {
    try {
      return await readFile(filePath, "utf-8");
    } catch (err) {
      log.warn(`skipping unreadable file ${filePath}: ${errorMessage(err)}`);
      return null;
    }
  }
}

function renderWeekly(
  start: string,
  end: string,
  fileCount: number,
  buckets: Record<ConsolidationBucket, string[]>,
  now: Date,
): string {
  const lines = [
    `# Weekly Memory Summary - ${start} to ${end}`,
    "",
    `*Generated: ${localDateKey(now)} ${entryClock(toLocalIsoString(now))}*`,
    "",
    `## Consolidated from ${fileCount} daily files`,
    "",
  ];
  const sections: Array<[string, string[]]> = [
    ["Decisions", buckets.decision],
    ["Preferences", buckets.preference],
    ["Action Items", buckets.action],
  ];
  for (const [title, items] of sections) {
    if (items.length === 0) continue;
    lines.push(`## ${title}`, ...items.map((item) => `- ${item}`), "");
  }
  lines.push("---", "*Weekly distilled summary. See the daily files for full detail.*", "");
  return lines.join("\n");
}
