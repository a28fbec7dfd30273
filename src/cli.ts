import { InvalidArgumentError, type Command } from "commander";
import { MemoryError } from "./errors.js";
import { isDateKey } from "./dates.js";
import type { Orchestrator } from "./orchestrator.js";
import { IMPORTANCE_LEVELS, type Importance, type QueryResult } from "./types.js";

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError("expected a non-negative integer");
  return n;
}

function parsePositive(value: string): number {
  const n = parseCount(value);
  if (n === 0) throw new InvalidArgumentError("expected a positive integer");
  return n;
}

function parseImportance(value: string): Importance {
  const level = IMPORTANCE_LEVELS.find((l) => l === value);
  if (!level) throw new InvalidArgumentError(`expected one of ${IMPORTANCE_LEVELS.join(", ")}`);
  return level;
}

function parseDate(value: string): string {
  if (!isDateKey(value)) throw new InvalidArgumentError("expected YYYY-MM-DD");
  return value;
}

function parseList(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function printQuery(io: CliIo, text: string, result: QueryResult): void {
  io.out(`Query: "${text}" (source: ${result.source})`);
  if (result.daily.length > 0) {
    io.out(`\nDaily (${result.daily.length}):`);
    for (const hit of result.daily) io.out(`  ${hit.date}  ${hit.file}`);
  }
  if (result.weekly.length > 0) {
    io.out(`\nWeekly (${result.weekly.length}):`);
    for (const hit of result.weekly) io.out(`  ${hit.week}  ${hit.file}`);
  }
  io.out(`\nMemories (${result.vectors.length}):`);
  for (const hit of result.vectors) {
    const where = hit.line !== undefined ? ` ${hit.file}:${hit.line}` : "";
    io.out(`  [${hit.collection}] ${hit.score.toFixed(3)}${where}  ${hit.content.replace(/\s+/g, " ")}`);
  }
  if (result.failedCollections.length > 0) {
    io.out(`\nUnavailable collections: ${result.failedCollections.join(", ")}`);
  }
}

/**
 * Attach every entry point to `program`. `open` is called once per command
 * so global options (--config, --debug) are read after parsing.
 */
export function registerCli(program: Command, open: () => Promise<Orchestrator>, io: CliIo = consoleIo): void {
  // MemoryErrors are expected operator-facing failures: one line, exit code 1.
  const guard =
    <A extends unknown[]>(fn: (orchestrator: Orchestrator, ...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      try {
        await fn(await open(), ...args);
      } catch (err) {
        if (!(err instanceof MemoryError)) throw err;
        io.err(`error: ${err.message}`);
        process.exitCode = 1;
      }
    };

  program
    .command("status")
    .description("Show tier inventory, quarantine counts and collection sizes")
    .action(
      guard(async (orchestrator: Orchestrator) => {
        const s = await orchestrator.status();
        io.out(`Daily files:        ${s.dailyFiles}`);
        io.out(`Weekly summaries:   ${s.weeklySummaries}`);
        io.out(`Archived files:     ${s.archivedFiles}`);
        io.out(`In quarantine:      ${s.quarantined}`);
        io.out(`Validated entities: ${s.validated}`);
        io.out(`Last consolidation: ${s.lastConsolidation ?? "never"}`);
        io.out("Collections:");
        for (const [name, count] of Object.entries(s.collections)) {
          io.out(`  ${name}: ${count === null ? "unavailable" : `${count} points`}`);
        }
      }),
    );

  program
    .command("save")
    .description("Append one memory to today's daily file")
    .argument("<text>", "memory content")
    .option("--category <category>", "category label", "general")
    .option("--importance <level>", `one of ${IMPORTANCE_LEVELS.join(", ")}`, parseImportance, "normal")
    .action(
      guard(async (orchestrator: Orchestrator, text: string, opts: { category: string; importance: Importance }) => {
        const result = await orchestrator.save(text, { category: opts.category, importance: opts.importance });
        io.out(`Saved to ${result.file}`);
      }),
    );

  program
    .command("remember")
    .description('Save text only if it carries a memory trigger ("remember this: ...")')
    .argument("<text>", "text to inspect")
    .action(
      guard(async (orchestrator: Orchestrator, text: string) => {
        const result = await orchestrator.remember(text);
        io.out(result ? `Saved ${result.category} [${result.importance}] to ${result.file}` : "No memory trigger found");
      }),
    );

  program
    .command("ingest")
    .description("Filter session transcripts into daily files")
    .option("--hours <n>", "only sessions modified in the last N hours", parseCount)
    .option("--source <substring>", "only session files whose path contains this")
    .action(
      guard(async (orchestrator: Orchestrator, opts: { hours?: number; source?: string }) => {
        const r = await orchestrator.ingestSessions({ sinceHours: opts.hours, sourceFilter: opts.source });
        io.out(
          `Ingested ${r.sessions} sessions: ${r.messages} messages, ${r.kept} kept, ${r.discarded} discarded, ` +
            `${r.written} written, ${r.failedSessions} failed`,
        );
        if (r.quarantined > 0) io.out(`Quarantined ${r.quarantined} new entities`);
      }),
    );

  program
    .command("consolidate")
    .description("Summarise one week of daily files")
    .option("--week-start <date>", "first day of the week (default: most recent Monday)", parseDate)
    .action(
      guard(async (orchestrator: Orchestrator, opts: { weekStart?: string }) => {
        const summary = await orchestrator.consolidate(opts.weekStart);
        if (!summary) {
          io.out("No daily files in that week; nothing written");
          return;
        }
        io.out(`Wrote ${summary.file} from ${summary.dailyFiles} daily files`);
        io.out(
          `  ${summary.decisions.length} decisions, ${summary.preferences.length} preferences, ${summary.actions.length} actions`,
        );
      }),
    );

  program
    .command("prune")
    .description("Move old daily files into the archive")
    .option("--retention-days <n>", "keep files newer than this many days", parseCount)
    .action(
      guard(async (orchestrator: Orchestrator, opts: { retentionDays?: number }) => {
        const r = await orchestrator.prune(opts.retentionDays);
        io.out(`Archived ${r.pruned}, kept ${r.kept}, failed ${r.failed}`);
      }),
    );

  program
    .command("discover")
    .description("List candidate entity names in text")
    .argument("<text>", "text to scan")
    .option("--quarantine", "also place every candidate in quarantine")
    .action(
      guard(async (orchestrator: Orchestrator, text: string, opts: { quarantine?: boolean }) => {
        if (opts.quarantine) {
          const outcomes = await orchestrator.discoverAndQuarantine(text);
          if (outcomes.length === 0) io.out("No new entities");
          for (const o of outcomes) io.out(`${o.name}: ${o.status}`);
          return;
        }
        const names = await orchestrator.discover(text);
        io.out(names.length > 0 ? names.join("\n") : "No new entities");
      }),
    );

  program
    .command("quarantine")
    .description("Place a named entity in quarantine")
    .argument("<name>", "entity name")
    .option("--context <text>", "where the name came from", "")
    .action(
      guard(async (orchestrator: Orchestrator, name: string, opts: { context: string }) => {
        const outcome = await orchestrator.quarantine(name, opts.context);
        io.out(`${outcome.name}: ${outcome.status}`);
      }),
    );

  program
    .command("quarantine-list")
    .description("List entities awaiting validation")
    .action(
      guard(async (orchestrator: Orchestrator) => {
        const pending = await orchestrator.listQuarantine();
        if (pending.length === 0) {
          io.out("Quarantine is empty");
          return;
        }
        for (const record of pending) io.out(`${record.name}  (discovered ${record.discovered_at})`);
      }),
    );

  program
    .command("validate")
    .description("Promote a quarantined entity")
    .argument("<name>", "entity name")
    .option("--collection <name>", "target collection (default: entities.default_collection)")
    .option("--keywords <list>", "comma-separated keywords", parseList)
    .action(
      guard(async (orchestrator: Orchestrator, name: string, opts: { collection?: string; keywords?: string[] }) => {
        const record = await orchestrator.validate(name, { collection: opts.collection, keywords: opts.keywords });
        io.out(`Validated ${record.name} → ${record.collection}`);
      }),
    );

  program
    .command("reject")
    .description("Discard a quarantined entity")
    .argument("<name>", "entity name")
    .action(
      guard(async (orchestrator: Orchestrator, name: string) => {
        const record = await orchestrator.reject(name);
        io.out(`Rejected ${record.name}`);
      }),
    );

  program
    .command("query")
    .description("Search every tier")
    .argument("<text>", "query text")
    .option("--no-daily", "skip the daily tier scan")
    .option("--no-weekly", "skip the weekly tier scan")
    .option("--limit <n>", "maximum memories", parsePositive)
    .option("--collection <name>", "search only this vector collection")
    .option("--files-only", "skip the vector backend")
    .option("--json", "print the raw result as JSON")
    .action(
      guard(
        async (
          orchestrator: Orchestrator,
          text: string,
          opts: {
            daily: boolean;
            weekly: boolean;
            limit?: number;
            collection?: string;
            filesOnly?: boolean;
            json?: boolean;
          },
        ) => {
          const result = await orchestrator.query(text, {
            includeDaily: opts.daily,
            includeWeekly: opts.weekly,
            limit: opts.limit,
            collections: opts.collection ? [opts.collection] : undefined,
            forceFallback: opts.filesOnly === true,
          });
          if (opts.json) {
            io.out(JSON.stringify(result, null, 2));
            return;
          }
          printQuery(io, text, result);
        },
      ),
    );

  program
    .command("conflicts")
    .description("Look for contradicting memories about a topic")
    .argument("<query>", "topic to check")
    .option("--limit <n>", "memories to compare", parsePositive, 10)
    .option("--files-only", "skip the vector backend")
    .action(
      guard(async (orchestrator: Orchestrator, query: string, opts: { limit: number; filesOnly?: boolean }) => {
        const report = await orchestrator.detectConflicts(query, opts.limit, { forceFallback: opts.filesOnly === true });
        if (report.conflicts.length === 0) {
          io.out(`No conflicts found (source: ${report.source})`);
          return;
        }
        io.out(`${report.conflicts.length} potential conflicts (source: ${report.source})`);
        if (report.question) io.out(`\n${report.question}`);
      }),
    );

  program
    .command("index")
    .description("Embed tier files into the vector store")
    .option("--force", "re-embed files that have not changed")
    .action(
      guard(async (orchestrator: Orchestrator, opts: { force?: boolean }) => {
        const r = await orchestrator.index({ force: opts.force === true });
        io.out(`Indexed ${r.indexed} files (${r.chunks} chunks), ${r.skipped} unchanged, ${r.failed} failed`);
      }),
    );

  program
    .command("maintain")
    .description("Scheduled upkeep: consolidate recent weeks, prune when enabled")
    .action(
      guard(async (orchestrator: Orchestrator) => {
        const r = await orchestrator.maintain();
        io.out(`Consolidated ${r.consolidated.length} weeks`);
        if (r.pruned) io.out(`Archived ${r.pruned.pruned}, kept ${r.pruned.kept}, failed ${r.pruned.failed}`);
      }),
    );
}
