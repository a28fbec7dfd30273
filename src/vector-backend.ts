import OpenAI from "openai";
import { z } from "zod";
import { log } from "./logger.js";
import { BackendUnavailableError, MalformedRecordError, errorMessage } from "./errors.js";
import { sha256String } from "./fs-utils.js";
import { MemoryPayloadSchema, type MemoryPayload } from "./schemas.js";

export interface Embedder {
  embed(text: string): Promise<number[]>;
}

export interface SimilarPoint {
  id: string;
  score: number;
  payload: MemoryPayload;
}

/**
 * Everything the engine needs from the semantic side. Implementations throw
 * BackendUnavailableError on any transport failure; call sites decide whether
 * that degrades, gets counted, or is reported.
 */
export interface EmbeddingBackend {
  embed(text: string): Promise<number[]>;
  upsert(collection: string, id: string, vector: number[], payload: MemoryPayload): Promise<void>;
  querySimilar(collection: string, vector: number[], k: number): Promise<SimilarPoint[]>;
  /** Number of stored points. */
  getCollectionStats(name: string): Promise<number>;
  ensureCollection(name: string): Promise<void>;
}

/** Deterministic UUID-shaped id derived from `key`, so re-indexing overwrites in place. */
export function pointIdFor(key: string): string {
  const hex = sha256String(key);
  const variant = ((parseInt(hex[16], 16) & 0x3) | 0x8).toString(16);
  return [hex.slice(0, 8), hex.slice(8, 12), `5${hex.slice(13, 16)}`, `${variant}${hex.slice(17, 20)}`, hex.slice(20, 32)].join(
    "-",
  );
}

// ---------------------------------------------------------------------------
// Embeddings (OpenAI-compatible endpoint)
// ---------------------------------------------------------------------------

const MAX_EMBED_INPUT_CHARS = 8000;

export interface OpenAiEmbedderOptions {
  baseUrl: string;
  model: string;
  apiKey?: string;
  timeoutMs: number;
}

/** Any server speaking the /v1/embeddings dialect: OpenAI itself, llama.cpp, text-embeddings-inference. */
export class OpenAiEmbedder implements Embedder {
  private readonly client: OpenAI;

  constructor(private readonly opts: OpenAiEmbedderOptions) {
    this.client = new OpenAI({
      // Local servers ignore the key, but the SDK refuses to start without one.
      apiKey: opts.apiKey ?? "unused",
      baseURL: opts.baseUrl,
      timeout: opts.timeoutMs,
      maxRetries: 0,
    });
  }

  async embed(text: string): Promise<number[]> {
    let vector: number[] | undefined;
    try {
      const res = await this.client.embeddings.create({
        model: this.opts.model,
        input: text.slice(0, MAX_EMBED_INPUT_CHARS),
      });
      vector = res.data[0]?.embedding;
    } catch (err) {
      throw new BackendUnavailableError(`embedding request failed: ${errorMessage(err)}`, err);
    }
    if (!vector || vector.length === 0) {
      throw new BackendUnavailableError("embedding response carried no vector");
    }
    return vector;
  }
}

// ---------------------------------------------------------------------------
// Qdrant REST
// ---------------------------------------------------------------------------

const SearchResponseSchema = z.object({
  result: z.array(
    z.object({
      id: z.union([z.string(), z.number()]),
      score: z.number(),
      payload: z.unknown().optional(),
    }),
  ),
});

const CollectionInfoSchema = z.object({
  result: z.object({
    points_count: z.number().nullable().optional(),
  }),
});

export interface QdrantBackendOptions {
  url: string;
  timeoutMs: number;
  dimensions: number;
  fetchImpl?: typeof fetch;
}

export class QdrantBackend implements EmbeddingBackend {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly embedder: Embedder,
    private readonly opts: QdrantBackendOptions,
  ) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  embed(text: string): Promise<number[]> {
    return this.embedder.embed(text);
  }

  async ensureCollection(name: string): Promise<void> {
    const res = await this.send("GET", `/collections/${encodeURIComponent(name)}`);
    if (res.ok) return;
    if (res.status !== 404) {
      throw new BackendUnavailableError(`GET collection ${name} → HTTP ${res.status}`);
    }
    await this.request("PUT", `/collections/${encodeURIComponent(name)}`, {
      vectors: { size: this.opts.dimensions, distance: "Cosine" },
    });
    log.info(`created collection ${name} (${this.opts.dimensions} dims)`);
  }

  async upsert(collection: string, id: string, vector: number[], payload: MemoryPayload): Promise<void> {
    const checked = MemoryPayloadSchema.safeParse(payload);
    if (!checked.success) {
      throw new MalformedRecordError(
        `refusing to write payload for ${id}: ${checked.error.issues[0]?.message ?? "invalid"}`,
        payload.source_file,
      );
    }
    await this.request("PUT", `/collections/${encodeURIComponent(collection)}/points?wait=true`, {
      points: [{ id, vector, payload: checked.data }],
    });
  }

  async querySimilar(collection: string, vector: number[], k: number): Promise<SimilarPoint[]> {
    const body = await this.request("POST", `/collections/${encodeURIComponent(collection)}/points/search`, {
      vector,
      limit: k,
      with_payload: true,
    });
    const parsed = SearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new BackendUnavailableError(`unexpected search response from ${collection}`);
    }

    const points: SimilarPoint[] = [];
    for (const hit of parsed.data.result) {
      const payload = MemoryPayloadSchema.safeParse(hit.payload);
      if (!payload.success) {
        log.warn(`skipping point ${hit.id} in ${collection}: payload does not match the memory schema`);
        continue;
      }
      points.push({ id: String(hit.id), score: hit.score, payload: payload.data });
    }
    return points;
  }

  async getCollectionStats(name: string): Promise<number> {
    const body = await this.request("GET", `/collections/${encodeURIComponent(name)}`);
    const parsed = CollectionInfoSchema.safeParse(body);
    if (!parsed.success) {
      throw new BackendUnavailableError(`unexpected collection info for ${name}`);
    }
    return parsed.data.result.points_count ?? 0;
  }

  private async send(method: string, pathname: string, body?: unknown): Promise<Response> {
    try {
      return await this.fetchImpl(`${this.opts.url}${pathname}`, {
        method,
        headers: { "Content-Type": "application/json" },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });
    } catch (err) {
      throw new BackendUnavailableError(`${method} ${pathname} failed: ${errorMessage(err)}`, err);
    }
  }

  private async request(method: string, pathname: string, body?: unknown): Promise<unknown> {
    const res = await this.send(method, pathname, body);
    if (!res.ok) {
      throw new BackendUnavailableError(`${method} ${pathname} → HTTP ${res.status}`);
    }
    try {
      return await res.json();
    } catch (err) {
      throw new BackendUnavailableError(`${method} ${pathname} returned invalid JSON`, err);
    }
  }
}
