import { log } from "./logger.js";
import { contradictionClassifier, type Classifier, type ContradictionGroup } from "./classify.js";
import type { RetrievalRouter, QueryOptions } from "./retrieval.js";
import type { ConflictRecord, ConflictReport, VectorHit } from "./types.js";

const MEMORY_PREVIEW_CHARS = 200;
const QUESTION_PREVIEW_CHARS = 100;

/**
 * Pairs of memories that both echo the same contradiction vocabulary and are
 * not the same text (compared case-insensitively).
 */
export function findConflicts(
  memories: readonly VectorHit[],
  classifier: Classifier<ContradictionGroup> = contradictionClassifier,
): ConflictRecord[] {
  if (memories.length < 2) return [];

  const groups = memories.map((m) => new Set(classifier.classify(m.content)));
  const conflicts: ConflictRecord[] = [];

  for (let i = 0; i < memories.length; i++) {
    for (let j = i + 1; j < memories.length; j++) {
      const a = memories[i];
      const b = memories[j];
      if (a.content.toLowerCase() === b.content.toLowerCase()) continue;
      const shared = [...groups[i]].some((g) => groups[j].has(g));
      if (!shared) continue;
      conflicts.push({
        memory_1: a.content.slice(0, MEMORY_PREVIEW_CHARS),
        memory_2: b.content.slice(0, MEMORY_PREVIEW_CHARS),
        collection_1: a.collection,
        collection_2: b.collection,
        score_1: a.score,
        score_2: b.score,
        conflict_type: "contradiction",
        resolution: "ASK_USER",
      });
    }
  }
  return conflicts;
}

/**
 * One clarifying question for the operator, quoting the conflict whose two
 * previews are shortest together (earliest wins a tie).
 */
export function conflictQuestion(conflicts: readonly ConflictRecord[]): string | null {
  if (conflicts.length === 0) return null;

  let pick = conflicts[0];
  for (const c of conflicts) {
    if (c.memory_1.length + c.memory_2.length < pick.memory_1.length + pick.memory_2.length) pick = c;
  }

  return [
    "Memory conflict detected",
    "",
    "These memories may contradict each other:",
    "",
    `Memory A: "${pick.memory_1.slice(0, QUESTION_PREVIEW_CHARS)}..."`,
    `Memory B: "${pick.memory_2.slice(0, QUESTION_PREVIEW_CHARS)}..."`,
    "",
    'Are these separate contexts (e.g. "X in context A, Y in context B"), or should the newer one replace your earlier preference?',
  ].join("\n");
}

export class ConflictDetector {
  constructor(
    private readonly router: RetrievalRouter,
    private readonly classifier: Classifier<ContradictionGroup> = contradictionClassifier,
  ) {}

  /** Never resolves anything; every record carries resolution ASK_USER. */
  async detect(query: string, limit = 10, options: Pick<QueryOptions, "forceFallback"> = {}): Promise<ConflictReport> {
    const result = await this.router.query(query, {
      includeDaily: false,
      includeWeekly: false,
      limit,
      forceFallback: options.forceFallback,
    });
    const conflicts = findConflicts(result.vectors, this.classifier);
    if (conflicts.length > 0) {
      log.info(`${conflicts.length} potential conflicts for "${query}"`);
    }
    return { source: result.source, conflicts, question: conflictQuestion(conflicts) };
  }
}
