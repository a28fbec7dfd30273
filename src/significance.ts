import type { Importance, MemoryEntry, Role, TranscriptTurn } from "./types.js";

/** Markers of agent machinery rather than conversation. */
export const NOISE_MARKERS: readonly string[] = ["HEARTBEAT_OK", "Read HEARTBEAT.md", "system:", "{"];

export const MIN_CONTENT_CHARS = 50;

export type DiscardReason = "role" | "noise" | "too_short";

export type TurnVerdict =
  | { keep: true; entry: MemoryEntry }
  | { keep: false; reason: DiscardReason };

export interface FilterResult {
  kept: MemoryEntry[];
  discarded: number;
  reasons: Record<DiscardReason, number>;
}

function isRole(role: string): role is Role {
  return role === "user" || role === "assistant";
}

export function evaluateTurn(turn: TranscriptTurn): TurnVerdict {
  if (!isRole(turn.role)) return { keep: false, reason: "role" };
  if (NOISE_MARKERS.some((m) => turn.text.includes(m))) return { keep: false, reason: "noise" };
  if (turn.text.length < MIN_CONTENT_CHARS) return { keep: false, reason: "too_short" };

  return {
    keep: true,
    entry: {
      content: turn.text,
      role: turn.role,
      category: "conversation",
      importance: "normal",
      timestamp: turn.timestamp,
    },
  };
}

export function isSignificant(turn: TranscriptTurn): boolean {
  return evaluateTurn(turn).keep;
}

export function filterTurns(turns: readonly TranscriptTurn[]): FilterResult {
  const kept: MemoryEntry[] = [];
  const reasons: Record<DiscardReason, number> = { role: 0, noise: 0, too_short: 0 };

  for (const turn of turns) {
    const verdict = evaluateTurn(turn);
    if (verdict.keep) {
      kept.push(verdict.entry);
    } else {
      reasons[verdict.reason] += 1;
    }
  }

  return { kept, discarded: turns.length - kept.length, reasons };
}

// ---------------------------------------------------------------------------
// Explicit "remember this" triggers
// ---------------------------------------------------------------------------

export interface MemoryTrigger {
  content: string;
  importance: Importance;
  category: string;
  trigger: string;
}

const TRIGGERS: Array<{ pattern: RegExp; importance: Importance; category: string }> = [
  { pattern: /remember this[:\s]+(.+)/is, importance: "normal", category: "general" },
  { pattern: /don't forget[:\s]+(.+)/is, importance: "high", category: "general" },
  { pattern: /make sure to[:\s]+(.+)/is, importance: "action", category: "action" },
  { pattern: /we decided[:\s]+(.+)/is, importance: "decision", category: "decision" },
  { pattern: /this is important[:\s]+(.+)/is, importance: "high", category: "important" },
  { pattern: /for future reference[:\s]+(.+)/is, importance: "long-term", category: "general" },
];

export function detectMemoryTrigger(text: string): MemoryTrigger | null {
  for (const { pattern, importance, category } of TRIGGERS) {
    const match = text.match(pattern);
    if (match) {
      const content = match[1].trim();
      if (content.length === 0) continue;
      return { content, importance, category, trigger: pattern.source };
    }
  }
  return null;
}
