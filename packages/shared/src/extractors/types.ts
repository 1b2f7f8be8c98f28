/**
 * Parameter Extractor Types
 *
 * Defines the rule table that maps parameter ids to their deterministic extraction
 * logic, and the outcomes produced by each step of the fallback chain.
 */

import type { Account, CrifReport } from '../crif/models';
import type { ParameterSpec, NonNullValue } from '../parameters/specs';
import type {
  ExtractionMethod,
  ExtractionResult,
  ParsedTable,
  ScoredChunk,
} from '../types';

/**
 * A single field read from a recognized table. The same field is read from the
 * best chunk's table when it has the right shape, else from the parsed report.
 */
export interface DirectRule {
  kind: 'direct';
  /** Provenance label of the table the field lives in, e.g. "Account Summary Table" */
  tableLabel: string;
  fromTable: (table: ParsedTable) => NonNullValue | null;
  fromReport: (report: CrifReport) => NonNullValue | null;
}

export interface FlagOutcome {
  value: boolean;
  source: string;
}

/**
 * A boolean over parsed accounts. Rules with an account predicate can be answered
 * from the accounts inside the best chunk; report-level flags (NTC) cannot.
 */
export interface FlagRule {
  kind: 'flag';
  accountPredicate: ((account: Account) => boolean) | null;
  fromReport: (report: CrifReport) => FlagOutcome;
}

/**
 * An aggregate that is only meaningful over the whole report.
 */
export interface DerivedRule {
  kind: 'derived';
  compute: (report: CrifReport) => NonNullValue;
}

export type ParameterRule = DirectRule | FlagRule | DerivedRule;

/** Lookup of parameter id to extraction rule. Adding a parameter is a table edit. */
export type ParameterRuleTable = ReadonlyMap<string, ParameterRule>;

/**
 * Everything a fallback step may consult for one parameter.
 */
export interface StepInput {
  spec: ParameterSpec;
  rule: ParameterRule;
  report: CrifReport;
  bestChunk: ScoredChunk;
  ragContext: string;
}

/**
 * A step either produced a value to be scored, or decided the final result itself
 * (LLM answers NOT_FOUND / NOT_APPLICABLE, or the LLM call failed).
 */
export type StepOutcome =
  | { kind: 'value'; value: NonNullValue; source: string; method: ExtractionMethod }
  | { kind: 'terminal'; result: ExtractionResult };

export interface ExtractionStep {
  readonly name: string;
  run(input: StepInput): Promise<StepOutcome | null>;
}
