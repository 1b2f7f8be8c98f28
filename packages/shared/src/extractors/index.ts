/**
 * Parameter Extractors
 *
 * Rule table, fallback chain steps, LLM fallback helpers and the orchestrator.
 */

export type {
  DirectRule,
  FlagRule,
  FlagOutcome,
  DerivedRule,
  ParameterRule,
  ParameterRuleTable,
  StepInput,
  StepOutcome,
  ExtractionStep,
} from './types';

export { BUREAU_RULES } from './rules';

export { chunkScopedStep, fullReportStep, createLlmFallbackStep } from './steps';

export {
  buildLlmPrompt,
  coerceLlmValue,
  interpretLlmResponse,
  MAX_PROMPT_CHUNK_CHARS,
  NOT_FOUND_TOKEN,
  NOT_APPLICABLE_TOKEN,
  type LlmAnswer,
} from './llm-extraction';

export {
  ParameterExtractionOrchestrator,
  type OrchestratorDependencies,
} from './orchestrator';
