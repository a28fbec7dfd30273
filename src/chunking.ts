/**
 * Sentence-boundary chunking for indexing.
 *
 * Tier files are split into chunks of at most `targetChars` characters,
 * never mid-sentence unless a single sentence is itself longer than the
 * target. Consecutive chunks may share trailing sentences for context.
 */

export interface ChunkingConfig {
  /** Upper bound on chunk length in characters (default 800) */
  targetChars: number;
  /** Sentences carried over from the previous chunk (default 1) */
  overlapSentences: number;
}

export interface Chunk {
  content: string;
  /** 0-based index */
  index: number;
}

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  targetChars: 800,
  overlapSentences: 1,
};

/**
 * Split text into sentences, keeping the terminating punctuation.
 * Trailing text without punctuation becomes a final sentence.
 */
export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  const sentenceRegex = /[^.!?]*[.!?]+(?:\s+|$)/g;

  let match: RegExpExecArray | null;
  let lastIndex = 0;

  while ((match = sentenceRegex.exec(text)) !== null) {
    sentences.push(match[0].trim());
    lastIndex = sentenceRegex.lastIndex;
  }

  if (lastIndex < text.length) {
    const remaining = text.slice(lastIndex).trim();
    if (remaining) sentences.push(remaining);
  }

  return sentences.filter((s) => s.length > 0);
}

function hardSplit(sentence: string, limit: number): string[] {
  if (sentence.length <= limit) return [sentence];
  const pieces: string[] = [];
  for (let i = 0; i < sentence.length; i += limit) {
    pieces.push(sentence.slice(i, i + limit));
  }
  return pieces;
}

function joinedLength(sentences: readonly string[]): number {
  if (sentences.length === 0) return 0;
  return sentences.reduce((sum, s) => sum + s.length, 0) + sentences.length - 1;
}

export function chunkContent(content: string, config: ChunkingConfig = DEFAULT_CHUNKING_CONFIG): Chunk[] {
  const text = content.trim();
  if (text.length === 0) return [];
  if (text.length <= config.targetChars) return [{ content: text, index: 0 }];

  const sentences = splitSentences(text).flatMap((s) => hardSplit(s, config.targetChars));
  const chunks: Chunk[] = [];
  let current: string[] = [];
  let fresh = 0;

  const emit = () => {
    chunks.push({ content: current.join(" "), index: chunks.length });
    fresh = 0;
  };

  for (const sentence of sentences) {
    if (fresh > 0 && joinedLength([...current, sentence]) > config.targetChars) {
      emit();
      current = config.overlapSentences > 0 ? current.slice(-config.overlapSentences) : [];
      // Overlap yields to the new sentence when both do not fit.
      while (current.length > 0 && joinedLength([...current, sentence]) > config.targetChars) {
        current = current.slice(1);
      }
    }
    current.push(sentence);
    fresh += 1;
  }
  if (fresh > 0) emit();

  return chunks;
}
