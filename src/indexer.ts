import path from "node:path";
import { readFile } from "node:fs/promises";
import { log } from "./logger.js";
import { errorMessage } from "./errors.js";
import { chunkContent, DEFAULT_CHUNKING_CONFIG, type ChunkingConfig } from "./chunking.js";
import { collectionClassifier, type Classifier } from "./classify.js";
import { isDateKey, toLocalIsoString } from "./dates.js";
import { listMarkdownFiles, sha256String, toPosixRelPath } from "./fs-utils.js";
import type { TrackingLedger } from "./ledger.js";
import type { MemoryPayload } from "./schemas.js";
import type { TieredStore } from "./storage.js";
import type { Clock, CollectionDefinition, IndexResult, Tier } from "./types.js";
import { pointIdFor, type EmbeddingBackend } from "./vector-backend.js";

export interface IndexerContext {
  memoryDir: string;
  ledger: TrackingLedger;
  clock: Clock;
  store: TieredStore;
  backend: EmbeddingBackend;
  collections: Record<string, CollectionDefinition>;
  fallbackCollection: string;
  chunking?: ChunkingConfig;
}

export interface IndexOptions {
  /** Re-embed files whose content hash is unchanged. */
  force?: boolean;
}

type FileOutcome = { status: "indexed"; chunks: number } | { status: "skipped" };

// Role lines ("*user · 2026-...*") appear in every daily block and would
// route every file to whichever collection lists "user".
const ROLE_LINE_RE = /^\*(?:user|assistant) · [^\n]*\*$/gm;

function dateOf(fileName: string): string | undefined {
  const m = fileName.match(/(\d{4}-\d{2}-\d{2})/);
  return m && isDateKey(m[1]) ? m[1] : undefined;
}

/**
 * Pushes tier files into the vector store: each file goes, chunked, to the
 * first collection whose keywords appear in its text or name.
 */
export class Indexer {
  private readonly router: Classifier<string>;
  private readonly ensured = new Set<string>();

  constructor(private readonly ctx: IndexerContext) {
    this.router = collectionClassifier(ctx.collections);
  }

  routeCollection(text: string, fileName: string): string {
    const [byText] = this.router.classify(`${text.replace(ROLE_LINE_RE, "")}\n${fileName}`);
    return byText ?? this.ctx.fallbackCollection;
  }

  async indexAll(options: IndexOptions = {}): Promise<IndexResult> {
    const inventory = await this.ctx.store.listTierFiles();
    const entityFiles = await listMarkdownFiles(path.join(this.ctx.memoryDir, "entities"));
    const sources: Array<[string, Tier]> = [
      ...inventory.daily.map((f): [string, Tier] => [f, "daily"]),
      ...inventory.weekly.map((f): [string, Tier] => [f, "weekly"]),
      ...inventory.archived.map((f): [string, Tier] => [f, "archived"]),
      ...entityFiles.map((f): [string, Tier] => [f, "entity"]),
    ];

    const result: IndexResult = { indexed: 0, skipped: 0, failed: 0, chunks: 0 };
    for (const [filePath, tier] of sources) {
      try {
        const outcome = await this.indexFile(filePath, tier, options.force ?? false);
        if (outcome.status === "indexed") {
          result.indexed += 1;
          result.chunks += outcome.chunks;
        } else {
          result.skipped += 1;
        }
      } catch (err) {
        result.failed += 1;
        log.warn(`failed to index ${filePath}: ${errorMessage(err)}`);
      }
    }

    log.info(
      `index: ${result.indexed} files (${result.chunks} chunks), ${result.skipped} unchanged, ${result.failed} failed`,
    );
    return result;
  }

  async indexFile(filePath: string, tier: Tier, force: boolean): Promise<FileOutcome> {
    const text = await readFile(filePath, "utf-8");
    const rel = toPosixRelPath(filePath, this.ctx.memoryDir);
    const hash = sha256String(text);
    if (!force && this.ctx.ledger.indexedHash(rel) === hash) {
      log.debug(`unchanged since last index: ${rel}`);
      return { status: "skipped" };
    }

    const chunks = chunkContent(text, this.ctx.chunking ?? DEFAULT_CHUNKING_CONFIG);
    if (chunks.length === 0) return { status: "skipped" };

    const fileName = path.basename(filePath, ".md");
    const collection = this.routeCollection(text, fileName);
    await this.ensure(collection);

    const timestamp = toLocalIsoString(this.ctx.clock());
    const date = dateOf(fileName);
    // TODO: delete points past the new total_chunks when a re-indexed file has shrunk.
    for (const chunk of chunks) {
      const vector = await this.ctx.backend.embed(chunk.content);
      const payload: MemoryPayload = {
        content: chunk.content,
        chunk_index: chunk.index,
        total_chunks: chunks.length,
        tier,
        collection,
        timestamp,
        source_file: rel,
        ...(date ? { date } : {}),
      };
      await this.ctx.backend.upsert(collection, pointIdFor(`${rel}#${chunk.index}`), vector, payload);
    }

    this.ctx.ledger.recordIndexed(rel, hash);
    log.debug(`${rel} → ${collection} (${chunks.length} chunks)`);
    return { status: "indexed", chunks: chunks.length };
  }

  private async ensure(collection: string): Promise<void> {
    if (this.ensured.has(collection)) return;
    await this.ctx.backend.ensureCollection(collection);
    this.ensured.add(collection);
  }
}
