/**
 * Keyword heuristics used by consolidation, conflict detection, collection
 * routing and entity discovery. Lifecycle code depends only on the
 * `Classifier` / `EntityExtractor` shapes, so any of these can be replaced.
 */

export interface Classifier<L extends string = string> {
  /** Labels that apply to `text`, in the classifier's priority order. */
  classify(text: string): L[];
}

export interface EntityExtractor {
  extract(text: string): string[];
}

export type KeywordGroups<L extends string> = ReadonlyArray<readonly [L, readonly string[]]>;

/** Case-insensitive substring match; a label applies when any of its phrases occurs. */
export function keywordClassifier<L extends string>(groups: KeywordGroups<L>): Classifier<L> {
  const lowered = groups.map(([label, phrases]) => [label, phrases.map((p) => p.toLowerCase())] as const);
  return {
    classify(text: string): L[] {
      const lower = text.toLowerCase();
      return lowered.filter(([, phrases]) => phrases.some((p) => lower.includes(p))).map(([label]) => label);
    },
  };
}

// ---------------------------------------------------------------------------
// Weekly consolidation buckets
// ---------------------------------------------------------------------------

export type ConsolidationBucket = "decision" | "preference" | "action";

export const CONSOLIDATION_KEYWORDS: KeywordGroups<ConsolidationBucket> = [
  ["decision", ["decision", "decided"]],
  ["preference", ["prefer", "like"]],
  ["action", ["action", "make sure"]],
];

export const consolidationClassifier: Classifier<ConsolidationBucket> = keywordClassifier(CONSOLIDATION_KEYWORDS);

// ---------------------------------------------------------------------------
// Contradiction indicators
// ---------------------------------------------------------------------------

export type ContradictionGroup = "use-prefer-instead" | "instead-not-rather" | "actually-really" | "change-update-switch";

export const CONTRADICTION_KEYWORDS: KeywordGroups<ContradictionGroup> = [
  ["use-prefer-instead", ["use", "prefer", "instead"]],
  ["instead-not-rather", ["instead of", "not", "rather than"]],
  ["actually-really", ["actually", "really"]],
  ["change-update-switch", ["change", "update", "switch"]],
];

export const contradictionClassifier: Classifier<ContradictionGroup> = keywordClassifier(CONTRADICTION_KEYWORDS);

// ---------------------------------------------------------------------------
// Collection routing
// ---------------------------------------------------------------------------

/**
 * Routes text to collections whose keywords appear in it, in definition
 * order. Callers take the first label and fall back to a default.
 */
export function collectionClassifier(
  collections: Record<string, { keywords: readonly string[] }>,
): Classifier<string> {
  return keywordClassifier(Object.entries(collections).map(([name, def]) => [name, def.keywords] as const));
}

// ---------------------------------------------------------------------------
// Entity candidates
// ---------------------------------------------------------------------------

export const ENTITY_STOPWORDS: ReadonlySet<string> = new Set([
  "I",
  "We",
  "You",
  "He",
  "She",
  "It",
  "They",
  "The",
  "A",
  "An",
  "This",
  "That",
  "These",
  "Those",
  "When",
  "Where",
  "How",
  "Why",
  "What",
  "Who",
  "If",
  "But",
  "And",
  "So",
  "Then",
  "Also",
  "My",
  "Our",
  "Your",
  "Yes",
  "No",
  "Please",
  "Today",
  "Yesterday",
  "Tomorrow",
]);

const CAPITALIZED_RUN = /\b[A-Z][a-z]+(?:\s+[A-Z][a-z]+)+\b/g;

/**
 * Two to four consecutive capitalised tokens. A leading stop-word
 * ("When Jane Doe ...") is dropped before the length check.
 */
export const capitalizedPhraseExtractor: EntityExtractor = {
  extract(text: string): string[] {
    const seen = new Set<string>();
    const out: string[] = [];
    for (const match of text.matchAll(CAPITALIZED_RUN)) {
      let tokens = match[0].split(/\s+/);
      if (ENTITY_STOPWORDS.has(tokens[0])) tokens = tokens.slice(1);
      if (tokens.length < 2 || tokens.length > 4) continue;
      const name = tokens.join(" ");
      if (seen.has(name)) continue;
      seen.add(name);
      out.push(name);
    }
    return out;
  },
};
