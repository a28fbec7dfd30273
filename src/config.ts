import os from "node:os";
import path from "node:path";
import { readFile } from "node:fs/promises";
import { log } from "./logger.js";
import { ConfigInvalidError } from "./errors.js";
import type { CollectionDefinition, MemoryConfig } from "./types.js";

const HOME = process.env.HOME ?? os.homedir();

export const DEFAULT_CONFIG_PATH = path.join(HOME, ".tiered-memory", "config.json");
const DEFAULT_MEMORY_DIR = path.join(HOME, ".tiered-memory", "memory");

export const DEFAULT_COLLECTIONS: Record<string, CollectionDefinition> = {
  mem_user: {
    description: "User preferences, history, context",
    keywords: ["user", "preferences", "goals"],
  },
  mem_projects: {
    description: "Active projects, status, decisions",
    keywords: ["project", "task", "status", "goal"],
  },
  mem_business: {
    description: "Business context",
    keywords: ["business", "client", "revenue", "consulting"],
  },
  mem_agents: {
    description: "Agent capabilities, decisions",
    keywords: ["agent", "collective", "decision"],
  },
  mem_sessions: {
    description: "Session transcripts",
    keywords: ["session", "transcript", "conversation"],
  },
  mem_distilled: {
    description: "Weekly summaries",
    keywords: ["weekly", "summary", "distilled"],
  },
};

export const FALLBACK_COLLECTION = "mem_sessions";

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalid(key: string, reason: string): void {
  const err = new ConfigInvalidError(`ignoring invalid ${key}: ${reason}; using default`, key);
  log.warn(err.message);
}

function section(cfg: RawObject, key: string): RawObject {
  const value = cfg[key];
  if (value === undefined) return {};
  if (isObject(value)) return value;
  invalid(key, "expected an object");
  return {};
}

function readInt(obj: RawObject, key: string, fallback: number, label: string, min = 0): number {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value === "number" && Number.isInteger(value) && value >= min) return value;
  invalid(label, `expected an integer >= ${min}`);
  return fallback;
}

function readBool(obj: RawObject, key: string, fallback: boolean, label: string): boolean {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value === "boolean") return value;
  invalid(label, "expected a boolean");
  return fallback;
}

function readString(obj: RawObject, key: string, fallback: string, label: string): string {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value === "string" && value.trim().length > 0) return value.trim();
  invalid(label, "expected a non-empty string");
  return fallback;
}

function readStringList(obj: RawObject, key: string, fallback: string[], label: string): string[] {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (Array.isArray(value) && value.every((v) => typeof v === "string")) {
    return value.map((v) => String(v));
  }
  invalid(label, "expected a list of strings");
  return fallback;
}

export function expandHome(p: string): string {
  if (p === "~") return HOME;
  if (p.startsWith("~/")) return path.join(HOME, p.slice(2));
  return p;
}

function resolveEnvVars(value: string, label: string): string | undefined {
  const missing: string[] = [];
  const resolved = value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
    const envValue = process.env[envVar];
    if (!envValue) {
      missing.push(envVar);
      return "";
    }
    return envValue;
  });
  if (missing.length > 0) {
    invalid(label, `environment variable ${missing.join(", ")} is not set`);
    return undefined;
  }
  return resolved;
}

function normalizeUrl(value: string, fallback: string, label: string): string {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    invalid(label, "not a valid URL");
    return fallback;
  }
  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    invalid(label, `unsupported URL scheme (${parsed.protocol.replace(":", "")})`);
    return fallback;
  }
  return parsed.toString().replace(/\/+$/, "");
}

function parseCollections(raw: unknown): Record<string, CollectionDefinition> {
  if (raw === undefined) return { ...DEFAULT_COLLECTIONS };
  if (!isObject(raw)) {
    invalid("collections", "expected an object of name → definition");
    return { ...DEFAULT_COLLECTIONS };
  }

  const out: Record<string, CollectionDefinition> = {};
  for (const [name, def] of Object.entries(raw)) {
    if (!isObject(def)) {
      invalid(`collections.${name}`, "expected { description, keywords }");
      continue;
    }
    out[name] = {
      description: typeof def.description === "string" ? def.description : "",
      keywords: readStringList(def, "keywords", [], `collections.${name}.keywords`).map((k) =>
        k.toLowerCase(),
      ),
    };
  }

  if (Object.keys(out).length === 0) {
    invalid("collections", "no usable collection definitions");
    return { ...DEFAULT_COLLECTIONS };
  }
  return out;
}

/**
 * Map the snake_case configuration record onto MemoryConfig. Never throws:
 * every unusable value is reported and replaced by its documented default.
 */
export function parseConfig(raw: unknown): MemoryConfig {
  const cfg = isObject(raw) ? raw : {};
  if (raw !== undefined && raw !== null && !isObject(raw)) {
    invalid("config", "expected a JSON object");
  }

  const pruning = section(cfg, "pruning");
  const vector = section(cfg, "vector");
  const embedding = section(cfg, "embedding");
  const entities = section(cfg, "entities");
  const ingest = section(cfg, "ingest");
  const retrieval = section(cfg, "retrieval");

  const memoryDir = expandHome(
    process.env.TIERED_MEMORY_DIR ?? readString(cfg, "memory_dir", DEFAULT_MEMORY_DIR, "memory_dir"),
  );

  const vectorUrlRaw = process.env.QDRANT_URL ?? readString(vector, "url", "http://127.0.0.1:6333", "vector.url");
  const embeddingUrlRaw =
    process.env.EMBEDDING_BASE_URL ??
    readString(embedding, "base_url", "http://127.0.0.1:8080/v1", "embedding.base_url");

  let apiKey: string | undefined;
  if (typeof embedding.api_key === "string" && embedding.api_key.length > 0) {
    apiKey = resolveEnvVars(embedding.api_key, "embedding.api_key");
  } else {
    apiKey = process.env.EMBEDDING_API_KEY;
  }

  const collections = parseCollections(cfg.collections);
  let defaultCollection = readString(entities, "default_collection", "mem_user", "entities.default_collection");
  if (!(defaultCollection in collections)) {
    const first = Object.keys(collections)[0];
    invalid("entities.default_collection", `unknown collection ${defaultCollection}`);
    defaultCollection = first;
  }

  return {
    memoryDir,
    debug: readBool(cfg, "debug", false, "debug"),
    pruning: {
      dailyFileRetentionDays: readInt(pruning, "daily_file_retention_days", 7, "pruning.daily_file_retention_days"),
      shortTermVectorDays: readInt(pruning, "short_term_vector_days", 30, "pruning.short_term_vector_days"),
      autoPruneEnabled: readBool(pruning, "auto_prune_enabled", false, "pruning.auto_prune_enabled"),
    },
    collections,
    vector: {
      enabled: readBool(vector, "enabled", true, "vector.enabled"),
      url: normalizeUrl(vectorUrlRaw, "http://127.0.0.1:6333", "vector.url"),
      timeoutMs: readInt(vector, "timeout_ms", 5000, "vector.timeout_ms", 1),
    },
    embedding: {
      baseUrl: normalizeUrl(embeddingUrlRaw, "http://127.0.0.1:8080/v1", "embedding.base_url"),
      model: readString(embedding, "model", "all-MiniLM-L6-v2", "embedding.model"),
      dimensions: readInt(embedding, "dimensions", 384, "embedding.dimensions", 1),
      apiKey,
    },
    entities: {
      defaultCollection,
      autoDiscover: readBool(entities, "auto_discover", false, "entities.auto_discover"),
    },
    ingest: {
      sessionDirs: readStringList(ingest, "session_dirs", [], "ingest.session_dirs").map(expandHome),
    },
    retrieval: {
      windowDays: readInt(retrieval, "window_days", 7, "retrieval.window_days"),
      limit: readInt(retrieval, "limit", 10, "retrieval.limit", 1),
    },
  };
}

/** Read and parse the config file. Missing or malformed files yield the defaults. */
export async function loadConfigFile(configPath?: string): Promise<MemoryConfig> {
  const target = expandHome(configPath ?? process.env.TIERED_MEMORY_CONFIG ?? DEFAULT_CONFIG_PATH);
  let raw: string;
  try {
    raw = await readFile(target, "utf-8");
  } catch {
    log.debug(`no config at ${target}; using defaults`);
    return parseConfig({});
  }

  try {
    return parseConfig(JSON.parse(raw));
  } catch (err) {
    invalid("config", `could not parse ${target} (${err instanceof Error ? err.message : String(err)})`);
    return parseConfig({});
  }
}
