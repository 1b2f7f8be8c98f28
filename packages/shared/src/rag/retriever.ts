/**
 * Domain Knowledge Retriever (RAG)
 *
 * Optional retrieval over the curated knowledge base. Its context feeds the LLM
 * fallback prompt; it never raises, degrading to empty results instead.
 */

import { readFile } from 'node:fs/promises';
import { logger } from '../logger';
import { errorMessage } from '../errors';
import { embedAll, type EmbeddingProvider } from '../retrieval/embedding-service';
import { rankBySimilarity, selectTopMatches } from '../retrieval/similarity';
import { parseKnowledgeBase, type KnowledgeChunk } from './knowledge-base';

/** Characters of chunk text kept per entry in a formatted context */
export const MAX_CONTEXT_CHARS_PER_CHUNK = 500;

export interface KnowledgeMatch {
  chunk: KnowledgeChunk;
  similarity: number;
}

/**
 * Capability consumed by the orchestrator. The no-op implementation disables RAG.
 */
export interface DomainKnowledgeRetriever {
  getContextForParameter(name: string, description: string, topK?: number): Promise<string>;
}

export class NoopKnowledgeRetriever implements DomainKnowledgeRetriever {
  async getContextForParameter(): Promise<string> {
    return '';
  }
}

interface EmbeddedKnowledge {
  chunk: KnowledgeChunk;
  vector: number[];
}

export class KnowledgeRetriever implements DomainKnowledgeRetriever {
  private entries: EmbeddedKnowledge[] = [];
  private ready = false;

  constructor(
    private readonly knowledgeBasePath: string,
    private readonly embeddings: EmbeddingProvider
  ) {}

  get isReady(): boolean {
    return this.ready;
  }

  get chunkCount(): number {
    return this.entries.length;
  }

  /**
   * Load, split and embed the knowledge base.
   *
   * @returns false when the source is missing or empty, or embedding fails
   */
  async initialize(): Promise<boolean> {
    let content: string;
    try {
      content = await readFile(this.knowledgeBasePath, 'utf-8');
    } catch (error) {
      logger.warn('Knowledge base not readable', {
        knowledge_base_path: this.knowledgeBasePath,
        error: errorMessage(error),
      });
      return false;
    }

    const chunks = parseKnowledgeBase(content);
    if (chunks.length === 0) {
      logger.warn('Knowledge base has no chunks', { knowledge_base_path: this.knowledgeBasePath });
      return false;
    }

    try {
      const vectors = await embedAll(
        this.embeddings,
        chunks.map((chunk) => chunk.text)
      );
      this.entries = chunks.map((chunk, i) => ({ chunk, vector: vectors[i] }));
    } catch (error) {
      logger.error('Failed to embed knowledge base', error, {
        knowledge_base_path: this.knowledgeBasePath,
      });
      return false;
    }

    this.ready = true;
    logger.info('Knowledge retriever initialized', { knowledge_chunks: this.entries.length });
    return true;
  }

  /**
   * Rank knowledge chunks against the query. Empty when uninitialized or on failure.
   */
  async retrieveKnowledge(query: string, topK = 3, minSimilarity = 0.5): Promise<KnowledgeMatch[]> {
    if (!this.ready) {
      logger.warn('Knowledge retriever not initialized');
      return [];
    }

    try {
      const [queryVector] = await embedAll(this.embeddings, [query]);
      const ranked = rankBySimilarity(queryVector, this.entries, (entry) => entry.vector);
      const matches = selectTopMatches(ranked, topK, minSimilarity).map(({ item, score }) => ({
        chunk: item.chunk,
        similarity: score,
      }));

      logger.debug('Retrieved knowledge chunks', { query: query.slice(0, 50), matches: matches.length });
      return matches;
    } catch (error) {
      logger.error('Knowledge retrieval failed', error, { query: query.slice(0, 50) });
      return [];
    }
  }

  async getContextForParameter(name: string, description: string, topK = 2): Promise<string> {
    if (!this.ready) {
      return '';
    }

    const matches = await this.retrieveKnowledge(`${name}: ${description}`, topK);
    return formatKnowledgeContext(matches);
  }
}

/**
 * Format matches as a prompt block headed "Domain Knowledge Context:".
 */
export function formatKnowledgeContext(matches: readonly KnowledgeMatch[]): string {
  if (matches.length === 0) {
    return '';
  }

  const parts = ['Domain Knowledge Context:'];
  for (const { chunk, similarity } of matches) {
    parts.push(`\n[${chunk.title}] (similarity: ${similarity.toFixed(2)})`);
    parts.push(chunk.text.slice(0, MAX_CONTEXT_CHARS_PER_CHUNK));
  }
  return parts.join('\n');
}
