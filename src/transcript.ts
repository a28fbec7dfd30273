import type { Stats } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { log } from "./logger.js";
import { MalformedRecordError, errorMessage } from "./errors.js";
import { toLocalIsoString } from "./dates.js";
import type { TranscriptSession, TranscriptTurn } from "./types.js";

/**
 * Session logs are JSONL, one event per line. Two envelope generations are
 * in the wild: `{ message: {...} }` and the older `{ data: {...} }`.
 * Message content is either a string or a list of parts of which only the
 * text parts matter.
 */
const ContentPartSchema = z.union([z.string(), z.object({ type: z.string(), text: z.string().optional() }).passthrough()]);

const MessageSchema = z
  .object({
    role: z.string().optional(),
    content: z.union([z.string(), z.array(z.unknown())]).optional(),
  })
  .passthrough();

const TimestampSchema = z.union([z.string(), z.number()]);

const SessionLineSchema = z
  .object({
    message: MessageSchema.optional(),
    data: MessageSchema.optional(),
    timestamp: TimestampSchema.optional(),
    createdAt: TimestampSchema.optional(),
    date: TimestampSchema.optional(),
  })
  .passthrough();

function contentText(content: string | unknown[] | undefined): string {
  if (content === undefined) return "";
  if (typeof content === "string") return content;
  let text = "";
  for (const raw of content) {
    const part = ContentPartSchema.safeParse(raw);
    if (!part.success) continue;
    if (typeof part.data === "string") {
      text += part.data;
    } else if (part.data.type === "text" && part.data.text) {
      text += part.data.text;
    }
  }
  return text;
}

// Below this a numeric stamp is epoch seconds; as milliseconds it would fall in 1973.
const EPOCH_SECONDS_LIMIT = 1e11;

function normalizeTimestamp(value: string | number | undefined, fallback: string): string {
  if (typeof value === "number" && Number.isFinite(value)) {
    return toLocalIsoString(new Date(Math.abs(value) < EPOCH_SECONDS_LIMIT ? value * 1000 : value));
  }
  if (typeof value === "string" && !Number.isNaN(Date.parse(value))) return value;
  return fallback;
}

/** Parse one session log. Lines that are not JSON or carry no text are skipped. */
export async function readSessionFile(filePath: string): Promise<TranscriptSession> {
  const [raw, info] = await Promise.all([readFile(filePath, "utf-8"), stat(filePath)]);
  const mtime = toLocalIsoString(info.mtime);
  const turns: TranscriptTurn[] = [];
  let malformed = 0;

  for (const line of raw.split("\n")) {
    if (!line.trim()) continue;

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      malformed += 1;
      continue;
    }
    const parsed = SessionLineSchema.safeParse(json);
    if (!parsed.success) {
      malformed += 1;
      continue;
    }

    const event = parsed.data;
    const message = event.message ?? event.data;
    if (!message) continue;
    const text = contentText(message.content);
    if (!text) continue;

    turns.push({
      role: message.role ?? "",
      text,
      timestamp: normalizeTimestamp(event.timestamp ?? event.createdAt ?? event.date, mtime),
    });
  }

  if (malformed > 0) {
    const err = new MalformedRecordError(`${malformed} unreadable lines`, filePath);
    log.warn(`${err.message} in ${filePath}; skipped`);
  }

  return { id: path.basename(filePath, ".jsonl"), turns };
}

export interface FindSessionOptions {
  /** Only files modified within the last N hours. */
  sinceHours?: number;
  /** Only files whose path contains this substring. */
  sourceFilter?: string;
  now?: Date;
}

/** *.jsonl directly inside each directory, newest first. Missing directories are skipped. */
export async function findSessionFiles(dirs: readonly string[], options: FindSessionOptions = {}): Promise<string[]> {
  const found: Array<{ file: string; mtimeMs: number }> = [];
  const cutoff =
    options.sinceHours !== undefined
      ? (options.now ?? new Date()).getTime() - options.sinceHours * 60 * 60 * 1000
      : null;

  for (const dir of dirs) {
    let names: string[];
    try {
      names = await readdir(dir);
    } catch {
      log.debug(`session directory not found: ${dir}`);
      continue;
    }

    for (const name of names) {
      if (!name.endsWith(".jsonl")) continue;
      const file = path.join(dir, name);
      if (options.sourceFilter && !file.includes(options.sourceFilter)) continue;
      let info: Stats;
      try {
        info = await stat(file);
      } catch (err) {
        log.debug(`session file vanished while scanning: ${file} (${errorMessage(err)})`);
        continue;
      }
      if (!info.isFile()) continue;
      if (cutoff !== null && info.mtimeMs < cutoff) continue;
      found.push({ file, mtimeMs: info.mtimeMs });
    }
  }

  return found.sort((a, b) => b.mtimeMs - a.mtimeMs).map((f) => f.file);
}
