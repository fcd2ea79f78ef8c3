// ABOUTME: Hash-based change detection for rendered chunks.
// ABOUTME: Classifies a rendered row as new, changed or unchanged relative to its stored chunk_hash.
import { createHash } from 'node:crypto';

export type ChangeKind = 'new' | 'changed' | 'unchanged';

export interface ChangeClassification {
  kind: ChangeKind;
  hash: string;
}

/**
 * SHA-256 of the UTF-8 chunk text, hex encoded (64 characters).
 */
export function computeChunkHash(chunkText: string): string {
  return createHash('sha256').update(chunkText, 'utf8').digest('hex');
}

/**
 * An advancing updated_at on the source row does not imply new text:
 * only a different hash counts as a change.
 */
export function classifyChunk(existingHash: string | null | undefined, chunkText: string): ChangeClassification {
  const hash = computeChunkHash(chunkText);

  if (existingHash === null || existingHash === undefined) {
    return { kind: 'new', hash };
  }

  return { kind: existingHash === hash ? 'unchanged' : 'changed', hash };
}
