/**
 * Parameter Extraction Orchestrator
 *
 * Routes each requested parameter by category, finds the best matching chunk by
 * embedding similarity, runs the fallback chain, and scores the result. Every
 * branch yields a well-formed ExtractionResult; collaborator failures degrade
 * only the parameter they affect.
 */

import { DEFAULT_CONFIDENCE_POLICY, scoreExtraction, type ConfidencePolicy } from '../confidence';
import { parseCrifReport } from '../crif/parser';
import type { CrifReport } from '../crif/models';
import { errorMessage } from '../errors';
import { logger } from '../logger';
import { parameterExtractionsCounter } from '../metrics';
import { defaultParameterRegistry, type ParameterRegistry, type ParameterSpec } from '../parameters/specs';
import { NoopTextGenerator, type TextGenerator } from '../llm/text-generator';
import { NoopKnowledgeRetriever, type DomainKnowledgeRetriever } from '../rag/retriever';
import { prepareChunks } from '../retrieval/chunks';
import {
  DEFAULT_RETRIEVAL_OPTIONS,
  findRelevantChunks,
  type EmbeddingProvider,
  type RetrievalOptions,
} from '../retrieval/embedding-service';
import type { DocumentChunk, ExtractionResult, ParsedDocument, ScoredChunk } from '../types';
import { BUREAU_RULES } from './rules';
import { chunkScopedStep, createLlmFallbackStep, fullReportStep } from './steps';
import type { ExtractionStep, ParameterRuleTable, StepInput, StepOutcome } from './types';

export interface OrchestratorDependencies {
  embeddings: EmbeddingProvider;
  registry?: ParameterRegistry;
  rules?: ParameterRuleTable;
  knowledge?: DomainKnowledgeRetriever;
  generator?: TextGenerator;
  policy?: ConfidencePolicy;
  retrieval?: RetrievalOptions;
}

interface ExtractionSession {
  report: CrifReport;
  chunks: DocumentChunk[];
}

export class ParameterExtractionOrchestrator {
  private readonly embeddings: EmbeddingProvider;
  private readonly registry: ParameterRegistry;
  private readonly rules: ParameterRuleTable;
  private readonly knowledge: DomainKnowledgeRetriever;
  private readonly policy: ConfidencePolicy;
  private readonly retrieval: RetrievalOptions;
  private readonly steps: readonly ExtractionStep[];

  constructor(deps: OrchestratorDependencies) {
    this.embeddings = deps.embeddings;
    this.registry = deps.registry ?? defaultParameterRegistry;
    this.rules = deps.rules ?? BUREAU_RULES;
    this.knowledge = deps.knowledge ?? new NoopKnowledgeRetriever();
    this.policy = deps.policy ?? DEFAULT_CONFIDENCE_POLICY;
    this.retrieval = deps.retrieval ?? DEFAULT_RETRIEVAL_OPTIONS;
    this.steps = [chunkScopedStep, fullReportStep, createLlmFallbackStep(deps.generator ?? new NoopTextGenerator())];
  }

  /**
   * Extract every requested parameter, sequentially and in caller order.
   * A repeated id keeps the position of its first occurrence and the result of its last.
   */
  async extract(doc: ParsedDocument, parameterIds: readonly string[]): Promise<Record<string, ExtractionResult>> {
    const session: ExtractionSession = {
      report: parseCrifReport(doc),
      chunks: doc.embeddedChunks ?? prepareChunks(doc),
    };

    logger.info('Starting parameter extraction', {
      parameter_count: parameterIds.length,
      account_count: session.report.accounts.length,
      chunk_count: session.chunks.length,
    });

    const results = new Map<string, ExtractionResult>();
    for (const parameterId of parameterIds) {
      results.set(parameterId, await this.extractParameter(parameterId, session));
    }

    logger.info('Parameter extraction complete', {
      parameter_count: results.size,
      extracted: [...results.values()].filter((r) => r.status === 'extracted').length,
    });

    return Object.fromEntries(results);
  }

  private async extractParameter(parameterId: string, session: ExtractionSession): Promise<ExtractionResult> {
    const spec = this.registry.get(parameterId);
    if (!spec) {
      logger.warn('No parameter spec registered', { parameter_id: parameterId });
      return this.record('unknown', {
        value: null,
        source: 'Unknown parameter',
        confidence: 0,
        status: 'extraction_failed',
        error: `No parameter spec registered for ${parameterId}`,
      });
    }

    if (spec.category === 'policy') {
      return this.record(spec.category, {
        value: null,
        source: 'Not applicable (policy parameter)',
        confidence: 0,
        status: 'not_applicable',
      });
    }

    const rule = this.rules.get(spec.id);
    if (!rule) {
      logger.warn('No extraction rule for parameter', { parameter_id: spec.id, category: spec.category });
      return this.record(spec.category, {
        value: null,
        source: 'No extraction rule',
        confidence: 0,
        status: 'extraction_failed',
        error: `No extraction rule registered for ${spec.id}`,
      });
    }

    const ragContext = await this.fetchRagContext(spec);

    let matches: ScoredChunk[];
    try {
      matches = await findRelevantChunks(
        `${spec.name}: ${spec.description}`,
        session.chunks,
        this.embeddings,
        this.retrieval
      );
    } catch (error) {
      logger.error('Chunk retrieval failed', error, { parameter_id: spec.id });
      return this.record(spec.category, {
        value: null,
        source: 'Chunk retrieval failed',
        confidence: 0,
        status: 'extraction_failed',
        error: errorMessage(error),
      });
    }

    if (matches.length === 0) {
      logger.warn('No relevant chunks found', { parameter_id: spec.id, threshold: this.retrieval.threshold });
      return this.record(spec.category, {
        value: null,
        source: 'No relevant sections found',
        confidence: 0,
        status: 'not_found',
        ...(ragContext ? { rag_context: ragContext } : {}),
      });
    }

    const bestChunk = matches[0];
    logger.debug('Best chunk selected', {
      parameter_id: spec.id,
      candidates: matches.length,
      chunk_source: bestChunk.chunk.source,
      similarity: Number(bestChunk.score.toFixed(3)),
    });

    let outcome: StepOutcome | null;
    try {
      outcome = await this.runSteps({ spec, rule, report: session.report, bestChunk, ragContext });
    } catch (error) {
      logger.error('Extraction step failed', error, { parameter_id: spec.id });
      return this.record(spec.category, {
        value: null,
        source: 'Extraction step failed',
        confidence: 0,
        status: 'extraction_failed',
        similarity_score: bestChunk.score,
        error: errorMessage(error),
      });
    }

    if (outcome?.kind === 'terminal') {
      return this.record(spec.category, { ...outcome.result, similarity_score: bestChunk.score });
    }

    if (outcome?.kind === 'value') {
      return this.record(spec.category, {
        value: outcome.value,
        source: outcome.source,
        confidence: scoreExtraction(spec, outcome.value, outcome.method, bestChunk.score, this.policy),
        status: 'extracted',
        similarity_score: bestChunk.score,
        extraction_method: outcome.method,
        ...(ragContext ? { rag_context: ragContext } : {}),
      });
    }

    return this.record(spec.category, {
      value: null,
      source: `Not found in ${bestChunk.chunk.source} or full report`,
      confidence: 0,
      status: 'not_found',
      similarity_score: bestChunk.score,
      ...(ragContext ? { rag_context: ragContext } : {}),
    });
  }

  private async runSteps(input: StepInput): Promise<StepOutcome | null> {
    for (const step of this.steps) {
      const outcome = await step.run(input);
      if (outcome) {
        logger.debug('Extraction step produced outcome', {
          parameter_id: input.spec.id,
          step: step.name,
          outcome: outcome.kind,
        });
        return outcome;
      }
    }
    return null;
  }

  private async fetchRagContext(spec: ParameterSpec): Promise<string> {
    try {
      return await this.knowledge.getContextForParameter(spec.name, spec.description);
    } catch (error) {
      logger.warn('Domain knowledge lookup failed', { parameter_id: spec.id, error: errorMessage(error) });
      return '';
    }
  }

  private record(category: string, result: ExtractionResult): ExtractionResult {
    parameterExtractionsCounter.inc({
      category,
      status: result.status,
      method: result.extraction_method ?? 'none',
    });
    return result;
  }
}
