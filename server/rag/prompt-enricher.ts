// ABOUTME: Prompt enricher: appends retrieved store data to a base prompt before the model call.
// ABOUTME: Never throws; every failure path returns the base prompt unchanged and logs why.
import type { ContextBuilder } from './context-builder.js';
import { errorMessage } from './errors.js';
import type { RetrievalFailureReason, Retriever } from './retriever.js';
import type { ChunkType } from './types.js';

export type EnrichmentFallbackReason = 'disabled' | RetrievalFailureReason | 'empty_context' | 'error';

export interface EnrichmentResult {
  prompt: string;
  enriched: boolean;
  reason?: EnrichmentFallbackReason;
  /** Chunks placed in the context block. */
  chunks: number;
}

export const CONTEXT_INSTRUCTIONS = [
  '=== INSTRUCTIONS ===',
  "Use the store data above to answer the user's question.",
  'If it does not contain what you need, answer from general knowledge and say so.',
].join('\n');

export interface PromptEnricherOptions {
  retriever: Pick<Retriever, 'retrieve'>;
  contextBuilder: ContextBuilder;
  enabled: boolean;
}

export class PromptEnricher {
  constructor(private options: PromptEnricherOptions) {}

  async enrich(basePrompt: string, tenantId: number, queryText: string): Promise<string> {
    const result = await this.enrichDetailed(basePrompt, tenantId, queryText);
    return result.prompt;
  }

  async enrichDetailed(
    basePrompt: string,
    tenantId: number,
    queryText: string,
    options: { chunkTypes?: ChunkType[] } = {},
  ): Promise<EnrichmentResult> {
    if (!this.options.enabled) {
      return this.fallback(basePrompt, tenantId, 'disabled');
    }

    try {
      const retrieval = await this.options.retriever.retrieve(tenantId, queryText, options);
      if (!retrieval.ok) {
        return this.fallback(basePrompt, tenantId, retrieval.reason, retrieval.error);
      }

      const block = this.options.contextBuilder.build(retrieval.chunks);
      if (!block.text) {
        return this.fallback(basePrompt, tenantId, 'empty_context');
      }

      console.log(
        `[PromptEnricher] Tenant ${tenantId}: added ${block.included.length} chunk(s), ` +
          `${block.text.length} chars (${block.dropped} dropped, ${block.deduplicated} duplicate)`
      );
      return {
        prompt: `${basePrompt}\n\n${block.text}\n\n${CONTEXT_INSTRUCTIONS}`,
        enriched: true,
        chunks: block.included.length,
      };
    } catch (error) {
      return this.fallback(basePrompt, tenantId, 'error', error);
    }
  }

  private fallback(
    basePrompt: string,
    tenantId: number,
    reason: EnrichmentFallbackReason,
    error?: unknown,
  ): EnrichmentResult {
    const detail = error === undefined ? '' : `: ${errorMessage(error)}`;
    if (reason === 'disabled' || reason === 'no_results' || reason === 'empty_query') {
      console.log(`[PromptEnricher] Tenant ${tenantId}: using base prompt (${reason})`);
    } else {
      console.warn(`[PromptEnricher] Tenant ${tenantId}: using base prompt (${reason})${detail}`);
    }
    return { prompt: basePrompt, enriched: false, reason, chunks: 0 };
  }
}
