import path from "node:path";
import { readFile, rm } from "node:fs/promises";
import { log } from "./logger.js";
import { MalformedRecordError, NotFoundError, errorMessage } from "./errors.js";
import { capitalizedPhraseExtractor, type EntityExtractor } from "./classify.js";
import { localDateKey, entryClock, toLocalIsoString } from "./dates.js";
import { toPosixRelPath, writeFileAtomic } from "./fs-utils.js";
import type { TrackingLedger } from "./ledger.js";
import type { EntityRecord, QuarantineRecord } from "./schemas.js";
import type { Clock } from "./types.js";
import type { EmbeddingBackend } from "./vector-backend.js";

const CONTEXT_CHARS = 500;

export type QuarantineStatus = "quarantined" | "already_pending" | "already_validated";

export interface QuarantineOutcome {
  name: string;
  file: string;
  status: QuarantineStatus;
}

export interface ValidateOptions {
  collection?: string;
  keywords?: string[];
}

export interface QuarantineContext {
  memoryDir: string;
  ledger: TrackingLedger;
  clock: Clock;
  defaultCollection: string;
  backend?: EmbeddingBackend | null;
  extractor?: EntityExtractor;
}

/** "Jane Doe" → "jane_doe" */
export function entitySlug(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "_")
    .replace(/[^a-z0-9_-]/g, "");
}

function stamp(d: Date): string {
  return `${localDateKey(d)} ${entryClock(toLocalIsoString(d))}`;
}

export function renderQuarantineRecord(name: string, context: string, discoveredAt: Date): string {
  return [
    `# ${name} (IN QUARANTINE)`,
    "",
    `*Discovered: ${stamp(discoveredAt)}*`,
    "*Status: PENDING VALIDATION*",
    "",
    "## Context",
    "",
    context.trim().length > 0 ? context.trim() : "Discovered during conversation.",
    "",
    "## Keywords",
    "",
    `- ${name}`,
    `- ${entitySlug(name)}`,
    "",
    "## Validation",
    "",
    "- [ ] Confirm entity exists",
    "- [ ] Determine entity type (person, project, topic)",
    "- [ ] Add to appropriate collection",
    "",
    "---",
    "",
    "*Generated on discovery. Must be validated before promotion.*",
    "",
  ].join("\n");
}

/**
 * Proposed entities wait in entities/_quarantine/ until someone validates
 * them. Per name: absent → pending → validated, or pending → absent on reject.
 * The ledger decides state; files are the human-readable mirror.
 */
export class EntityQuarantine {
  private readonly extractor: EntityExtractor;

  constructor(private readonly ctx: QuarantineContext) {
    this.extractor = ctx.extractor ?? capitalizedPhraseExtractor;
  }

  get entitiesDir(): string {
    return path.join(this.ctx.memoryDir, "entities");
  }

  get quarantineDir(): string {
    return path.join(this.entitiesDir, "_quarantine");
  }

  /**
   * First file stem for `name` that no pending or validated record holds, so
   * names that slug alike ("Jane Doe", "JANE DOE.") get jane_doe, jane_doe.1, ...
   */
  private claimSlug(name: string): string {
    const { state } = this.ctx.ledger;
    const taken = new Set(
      [...state.quarantine, ...state.validated_entities].map((r) => path.posix.basename(r.file, ".md")),
    );
    const base = entitySlug(name) || "entity";
    let slug = base;
    for (let n = 1; taken.has(slug); n++) slug = `${base}.${n}`;
    return slug;
  }

  /** Candidate names not yet known to the ledger. Never changes state. */
  discover(text: string): string[] {
    const { ledger } = this.ctx;
    return this.extractor
      .extract(text)
      .filter((name) => !ledger.findPending(name) && !ledger.findValidated(name));
  }

  async quarantine(name: string, context: string): Promise<QuarantineOutcome> {
    const { ledger } = this.ctx;
    const validated = ledger.findValidated(name);
    if (validated) {
      return { name, file: path.join(this.ctx.memoryDir, validated.file), status: "already_validated" };
    }
    const pending = ledger.findPending(name);
    if (pending) {
      return { name, file: path.join(this.ctx.memoryDir, pending.file), status: "already_pending" };
    }

    const now = this.ctx.clock();
    const file = path.join(this.quarantineDir, `${this.claimSlug(name)}.md`);
    await writeFileAtomic(file, renderQuarantineRecord(name, context, now));
    ledger.addPending({
      name,
      file: toPosixRelPath(file, this.ctx.memoryDir),
      discovery_context: context.slice(0, CONTEXT_CHARS),
      discovered_at: toLocalIsoString(now),
      status: "pending",
    });
    log.debug(`quarantined entity "${name}"`);
    return { name, file, status: "quarantined" };
  }

  async discoverAndQuarantine(text: string): Promise<QuarantineOutcome[]> {
    const outcomes: QuarantineOutcome[] = [];
    for (const name of this.discover(text)) {
      outcomes.push(await this.quarantine(name, text));
    }
    return outcomes;
  }

  list(): QuarantineRecord[] {
    return [...this.ctx.ledger.state.quarantine];
  }

  async validate(name: string, options: ValidateOptions = {}): Promise<EntityRecord> {
    const pending = this.requirePending(name);
    const collection = options.collection ?? this.ctx.defaultCollection;
    const keywords = options.keywords ?? [];
    const now = this.ctx.clock();

    // The pending record's file keeps the stem claimed at quarantine time.
    const source = path.join(this.ctx.memoryDir, pending.file);
    let record: string;
    try {
      record = await readFile(source, "utf-8");
    } catch (err) {
      const malformed = new MalformedRecordError(`quarantine record for "${name}" is unreadable`, source, err);
      log.warn(`${malformed.message} (${errorMessage(err)}); rebuilding it from the ledger`);
      record = renderQuarantineRecord(name, pending.discovery_context, new Date(pending.discovered_at));
    }

    const details = [
      "",
      "## Validation Details",
      `- Validated: ${toLocalIsoString(now)}`,
      `- Target Collection: ${collection}`,
      ...(keywords.length > 0 ? [`- Keywords: ${keywords.join(", ")}`] : []),
      "",
    ].join("\n");
    const promoted =
      record
        .replace("(IN QUARANTINE)", "(VALIDATED)")
        .replace("*Status: PENDING VALIDATION*", "*Status: VALIDATED*")
        .trimEnd() + "\n" + details;

    const target = path.join(this.entitiesDir, path.basename(source));
    await writeFileAtomic(target, promoted);
    await rm(source, { force: true });

    const validated: EntityRecord = {
      name,
      file: toPosixRelPath(target, this.ctx.memoryDir),
      discovery_context: pending.discovery_context,
      discovered_at: pending.discovered_at,
      collection,
      keywords,
      validated_at: toLocalIsoString(now),
      status: "validated",
    };
    this.ctx.ledger.promote(name, validated);
    log.info(`validated entity "${name}" into ${collection}`);

    if (this.ctx.backend) {
      try {
        await this.ctx.backend.ensureCollection(collection);
      } catch (err) {
        log.warn(`could not ensure collection ${collection}: ${errorMessage(err)}`);
      }
    }
    return validated;
  }

  async reject(name: string): Promise<QuarantineRecord> {
    const pending = this.requirePending(name);
    await rm(path.join(this.ctx.memoryDir, pending.file), { force: true });
    const removed = this.ctx.ledger.removePending(name);
    if (!removed) throw new NotFoundError(`"${name}" is not in quarantine`);
    log.info(`rejected entity "${name}"`);
    return removed;
  }

  private requirePending(name: string): QuarantineRecord {
    const pending = this.ctx.ledger.findPending(name);
    if (pending) return pending;
    if (this.ctx.ledger.findValidated(name)) {
      throw new NotFoundError(`"${name}" is already validated, not pending`);
    }
    throw new NotFoundError(`"${name}" is not in quarantine`);
  }
}
