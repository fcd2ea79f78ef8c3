// ABOUTME: Assembles retrieved chunks into one bounded context block for the prompt.
// ABOUTME: Chunks go in whole, best first; the first one that does not fit ends the block.
import type { ScoredChunk } from './types.js';

export const CONTEXT_HEADER = '=== RELEVANT STORE DATA ===';

export interface ContextBlock {
  /** Empty when no chunk fits. */
  text: string;
  included: ScoredChunk[];
  /** Chunks left out for lack of room. */
  dropped: number;
  /** Chunks removed because a better-ranked chunk had the same hash. */
  deduplicated: number;
}

export function formatChunkLine(result: ScoredChunk): string {
  return `- [${result.chunk.chunkType}] ${result.chunk.chunkText.trim()}`;
}

export class ContextBuilder {
  constructor(private maxChars: number) {}

  build(chunks: ScoredChunk[], options: { maxChars?: number } = {}): ContextBlock {
    const maxChars = options.maxChars ?? this.maxChars;
    const ranked = [...chunks].sort((a, b) => b.score - a.score || a.chunk.id - b.chunk.id);

    const seen = new Set<string>();
    const unique: ScoredChunk[] = [];
    for (const result of ranked) {
      if (seen.has(result.chunk.chunkHash)) continue;
      seen.add(result.chunk.chunkHash);
      unique.push(result);
    }

    const lines = [CONTEXT_HEADER];
    let length = CONTEXT_HEADER.length;
    const included: ScoredChunk[] = [];

    for (const result of unique) {
      const line = formatChunkLine(result);
      if (length + 1 + line.length > maxChars) break;
      lines.push(line);
      length += 1 + line.length;
      included.push(result);
    }

    return {
      text: included.length > 0 ? lines.join('\n') : '',
      included,
      dropped: unique.length - included.length,
      deduplicated: ranked.length - unique.length,
    };
  }
}
