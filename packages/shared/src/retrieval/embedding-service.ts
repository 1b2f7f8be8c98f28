/**
 * Embedding Retrieval
 *
 * Embeds texts through an injectable provider and ranks document chunks against a
 * query. Chunk vectors are computed lazily and stored on the chunk, so every
 * parameter of a run (and any later run given the same chunk list) reuses them.
 */

import OpenAI from 'openai';
import { config } from '../config';
import { logger } from '../logger';
import { embeddingRequestsCounter } from '../metrics';
import { UpstreamUnavailableError, errorMessage } from '../errors';
import type { DocumentChunk, ScoredChunk } from '../types';
import { rankBySimilarity, selectTopMatches } from './similarity';

/**
 * Text → vector capability. Implementations return one vector per input, in order.
 */
export interface EmbeddingProvider {
  readonly model: string;
  embed(texts: string[]): Promise<number[][]>;
}

export interface OpenAiEmbeddingOptions {
  apiKey?: string;
  model?: string;
  batchSize?: number;
  maxTextLength?: number;
  timeoutMs?: number;
}

/**
 * Embedding provider backed by the OpenAI embeddings API.
 * Inputs are truncated to maxTextLength and sent in sequential batches.
 */
export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private readonly client: OpenAI;
  private readonly batchSize: number;
  private readonly maxTextLength: number;

  constructor(options: OpenAiEmbeddingOptions = {}) {
    this.model = options.model || config.embeddingModel;
    this.batchSize = Math.max(1, options.batchSize || config.embeddingBatchSize);
    this.maxTextLength = options.maxTextLength || config.maxEmbeddingTextLength;
    this.client = new OpenAI({
      apiKey: options.apiKey || config.openaiApiKey,
      timeout: options.timeoutMs || config.llmRequestTimeoutMs,
      maxRetries: 0,
    });
  }

  async embed(texts: string[]): Promise<number[][]> {
    const inputs = texts.map((text) => text.slice(0, this.maxTextLength));
    const vectors: number[][] = [];

    for (let start = 0; start < inputs.length; start += this.batchSize) {
      const batch = inputs.slice(start, start + this.batchSize);
      try {
        const response = await this.client.embeddings.create({ model: this.model, input: batch });
        const ordered = [...response.data].sort((a, b) => a.index - b.index);
        vectors.push(...ordered.map((item) => item.embedding));
        embeddingRequestsCounter.inc({ model: this.model, status: 'success' });
      } catch (error) {
        embeddingRequestsCounter.inc({ model: this.model, status: 'error' });
        throw new UpstreamUnavailableError('embedding', errorMessage(error), error);
      }
    }

    return vectors;
  }
}

export interface RetrievalOptions {
  topK: number;
  threshold: number;
}

export const DEFAULT_RETRIEVAL_OPTIONS: RetrievalOptions = {
  topK: config.topKChunks,
  threshold: config.similarityThreshold,
};

/**
 * Embed a batch of texts and check the provider returned one vector per text.
 */
export async function embedAll(provider: EmbeddingProvider, texts: string[]): Promise<number[][]> {
  if (texts.length === 0) {
    return [];
  }
  const vectors = await provider.embed(texts);
  if (vectors.length !== texts.length) {
    throw new UpstreamUnavailableError(
      'embedding',
      `expected ${texts.length} vectors, received ${vectors.length}`
    );
  }
  return vectors;
}

/**
 * Embed any chunks that do not carry a vector yet and store the vector on the chunk.
 */
export async function ensureChunkEmbeddings(
  chunks: DocumentChunk[],
  provider: EmbeddingProvider
): Promise<void> {
  const pending = chunks.filter((chunk) => chunk.embedding === undefined);
  if (pending.length === 0) {
    return;
  }

  const vectors = await embedAll(
    provider,
    pending.map((chunk) => chunk.content)
  );
  pending.forEach((chunk, i) => {
    chunk.embedding = vectors[i];
  });

  logger.debug('Embedded document chunks', { chunk_count: pending.length, model: provider.model });
}

/**
 * Rank chunks by cosine similarity to the query and return at most topK scoring at
 * or above the threshold, highest first.
 *
 * @throws UpstreamUnavailableError when the embedding capability fails
 */
export async function findRelevantChunks(
  query: string,
  chunks: DocumentChunk[],
  provider: EmbeddingProvider,
  options: RetrievalOptions = DEFAULT_RETRIEVAL_OPTIONS
): Promise<ScoredChunk[]> {
  if (chunks.length === 0) {
    return [];
  }

  const [queryVector] = await embedAll(provider, [query]);
  await ensureChunkEmbeddings(chunks, provider);

  const ranked = rankBySimilarity(queryVector, chunks, (chunk) => chunk.embedding ?? []);
  const matches = selectTopMatches(ranked, options.topK, options.threshold).map(({ item, score }) => ({
    chunk: item,
    score,
  }));

  logger.debug('Chunk retrieval complete', {
    query: query.slice(0, 50),
    candidates: chunks.length,
    matches: matches.length,
    threshold: options.threshold,
  });

  return matches;
}
