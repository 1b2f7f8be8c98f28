/**
 * Fallback Chain Steps
 *
 * Ordered steps tried for each document-sourced parameter:
 * chunk-scoped → full report → LLM with RAG context. The first step returning
 * a non-null outcome wins.
 */

import { parseAccountsFromText } from '../crif/parser';
import { errorMessage } from '../errors';
import { logger } from '../logger';
import type { TextGenerator } from '../llm/text-generator';
import { buildLlmPrompt, interpretLlmResponse } from './llm-extraction';
import type { ExtractionStep, StepInput, StepOutcome } from './types';

/**
 * Answer the parameter from the best chunk alone.
 * Direct rules need a table chunk of the recognized shape; account flags need a
 * text chunk whose accounts include at least one match. Derived rules never
 * answer here.
 */
export const chunkScopedStep: ExtractionStep = {
  name: 'chunk_scoped',

  async run({ rule, bestChunk }: StepInput): Promise<StepOutcome | null> {
    const { chunk } = bestChunk;

    if (rule.kind === 'direct' && chunk.type === 'table') {
      const value = rule.fromTable(chunk.data);
      if (value === null) return null;
      return {
        kind: 'value',
        value,
        source: `${rule.tableLabel} (from ${chunk.source})`,
        method: 'chunk_scoped',
      };
    }

    const predicate = rule.kind === 'flag' ? rule.accountPredicate : null;
    if (predicate && chunk.type === 'text') {
      const accounts = parseAccountsFromText(chunk.data.text);
      const matched = accounts.filter(predicate).length;
      if (matched === 0) return null;
      return {
        kind: 'value',
        value: true,
        source: `Account Remarks (${matched}/${accounts.length} accounts in chunk)`,
        method: 'chunk_scoped',
      };
    }

    return null;
  },
};

/**
 * Answer the parameter from the whole parsed report.
 */
export const fullReportStep: ExtractionStep = {
  name: 'full_report',

  async run({ rule, report }: StepInput): Promise<StepOutcome | null> {
    switch (rule.kind) {
      case 'direct': {
        const value = rule.fromReport(report);
        if (value === null) return null;
        return { kind: 'value', value, source: rule.tableLabel, method: 'full_report' };
      }
      case 'flag': {
        const { value, source } = rule.fromReport(report);
        return { kind: 'value', value, source, method: 'full_report' };
      }
      case 'derived':
        return {
          kind: 'value',
          value: rule.compute(report),
          source: `Computed from ${report.accounts.length} accounts`,
          method: 'computed',
        };
    }
  },
};

/**
 * Ask the LLM, with domain knowledge, to read the value from the best chunk.
 * Skipped when there is no RAG context.
 */
export function createLlmFallbackStep(generator: TextGenerator): ExtractionStep {
  return {
    name: 'llm_with_rag',

    async run({ spec, bestChunk, ragContext }: StepInput): Promise<StepOutcome | null> {
      if (!ragContext) {
        return null;
      }

      const { chunk } = bestChunk;
      logger.info('Deterministic extraction found nothing, trying LLM with RAG context', {
        parameter_id: spec.id,
        chunk_source: chunk.source,
      });

      let response: string;
      try {
        response = await generator.generate(buildLlmPrompt(spec, chunk.content, ragContext));
      } catch (error) {
        logger.error('LLM fallback failed', error, { parameter_id: spec.id });
        return {
          kind: 'terminal',
          result: {
            value: null,
            source: chunk.source,
            confidence: 0,
            status: 'extraction_failed',
            extraction_method: 'llm_with_rag',
            error: errorMessage(error),
          },
        };
      }

      const answer = interpretLlmResponse(response, spec.expectedType);
      logger.debug('LLM fallback answer', { parameter_id: spec.id, answer: answer.kind });

      if (answer.kind === 'value') {
        return { kind: 'value', value: answer.value, source: chunk.source, method: 'llm_with_rag' };
      }

      return {
        kind: 'terminal',
        result: {
          value: null,
          source: chunk.source,
          confidence: 0,
          status: answer.kind,
          extraction_method: 'llm_with_rag',
          rag_context: ragContext,
        },
      };
    },
  };
}
