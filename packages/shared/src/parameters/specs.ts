/**
 * Parameter Specifications
 *
 * Static table describing every bureau parameter the engine knows how to extract:
 * what it means, what type its value has, and which extraction strategy applies.
 */

import type { ParameterValue } from '../types';

/**
 * Runtime type tag for a parameter value.
 * - 'int': finite integer number
 * - 'float': any finite number (JavaScript has no separate float type)
 * - 'none': only null matches (policy parameters)
 */
export type ExpectedType = 'int' | 'float' | 'bool' | 'string' | 'none';

/**
 * Extraction strategy family:
 * - 'direct': a single field read from a recognized table
 * - 'flag': a boolean predicate over parsed accounts
 * - 'derived': an aggregate computed over the whole report
 * - 'policy': externally configured, never present in documents
 */
export type ParameterCategory = 'direct' | 'flag' | 'derived' | 'policy';

export type NonNullValue = Exclude<ParameterValue, null>;

export interface ParameterSpec {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly expectedType: ExpectedType;
  readonly category: ParameterCategory;
  readonly allowedSources: readonly string[];
  readonly validator?: (value: NonNullValue) => boolean;
}

/** Immutable lookup of parameter id to spec, passed explicitly to consumers. */
export type ParameterRegistry = ReadonlyMap<string, ParameterSpec>;

export function matchesExpectedType(value: ParameterValue, expectedType: ExpectedType): boolean {
  switch (expectedType) {
    case 'int':
      return typeof value === 'number' && Number.isInteger(value);
    case 'float':
      return typeof value === 'number' && Number.isFinite(value);
    case 'bool':
      return typeof value === 'boolean';
    case 'string':
      return typeof value === 'string';
    case 'none':
      return value === null;
  }
}

/**
 * Domain validation for an extracted value.
 * Null is valid only for policy parameters; anything else must match the
 * expected type exactly and pass the spec's predicate.
 */
export function validateParameterValue(spec: ParameterSpec, value: ParameterValue): boolean {
  if (value === null) {
    return spec.category === 'policy';
  }

  if (!matchesExpectedType(value, spec.expectedType)) {
    return false;
  }

  if (spec.validator && !spec.validator(value)) {
    return false;
  }

  return true;
}

const nonNegative = (value: NonNullValue): boolean => typeof value === 'number' && value >= 0;

const inRange =
  (min: number, max: number) =>
  (value: NonNullValue): boolean =>
    typeof value === 'number' && value >= min && value <= max;

export const DEFAULT_PARAMETER_SPECS: readonly ParameterSpec[] = [
  {
    id: 'bureau_credit_score',
    name: 'CIBIL Score',
    description: 'Credit bureau score (300–900 range)',
    expectedType: 'int',
    category: 'direct',
    allowedSources: ['Verification'],
    validator: inRange(300, 900),
  },
  {
    id: 'bureau_ntc_accepted',
    name: 'NTC Accepted',
    description: 'Whether No-Track-Case (NTC) applicants are acceptable',
    expectedType: 'bool',
    category: 'flag',
    allowedSources: ['Verification', 'Account Remarks'],
  },
  {
    id: 'bureau_overdue_threshold',
    name: 'Overdue Threshold',
    description: 'Maximum allowable overdue amount',
    expectedType: 'none',
    category: 'policy',
    allowedSources: [],
  },
  {
    id: 'bureau_dpd_30',
    name: '30+ DPD',
    description: 'Count of accounts with 30+ days past due',
    expectedType: 'int',
    category: 'derived',
    allowedSources: ['Payment History'],
    validator: nonNegative,
  },
  {
    id: 'bureau_dpd_60',
    name: '60+ DPD',
    description: 'Count of accounts with 60+ days past due',
    expectedType: 'int',
    category: 'derived',
    allowedSources: ['Payment History'],
    validator: nonNegative,
  },
  {
    id: 'bureau_dpd_90',
    name: '90+ DPD',
    description: 'Count of accounts with 90+ days past due',
    expectedType: 'int',
    category: 'derived',
    allowedSources: ['Payment History'],
    validator: nonNegative,
  },
  {
    id: 'bureau_settlement_writeoff',
    name: 'Settlement / Write-off',
    description: 'Presence of settlement or write-off',
    expectedType: 'bool',
    category: 'flag',
    allowedSources: ['Account Remarks'],
  },
  {
    id: 'bureau_no_live_pl_bl',
    name: 'No Live PL/BL',
    description: 'Check for no live Personal Loan or Business Loan',
    expectedType: 'bool',
    category: 'derived',
    allowedSources: ['Account Information'],
  },
  {
    id: 'bureau_suit_filed',
    name: 'Suit Filed',
    description: 'Indicates whether any suit filed status exists',
    expectedType: 'bool',
    category: 'flag',
    allowedSources: ['Account Remarks'],
  },
  {
    id: 'bureau_wilful_default',
    name: 'Wilful Default',
    description: 'Indicates wilful default status',
    expectedType: 'bool',
    category: 'flag',
    allowedSources: ['Account Remarks'],
  },
  {
    id: 'bureau_written_off_debt_amount',
    name: 'Written-off Debt Amount',
    description: 'Total written-off debt exposure',
    expectedType: 'float',
    category: 'direct',
    allowedSources: ['Account Summary'],
    validator: nonNegative,
  },
  {
    id: 'bureau_max_loans',
    name: 'Max Loans',
    description: 'Maximum number of loans in selected months',
    expectedType: 'int',
    category: 'direct',
    allowedSources: ['Account Summary'],
    validator: nonNegative,
  },
  {
    id: 'bureau_loan_amount_threshold',
    name: 'Loan Amount Threshold',
    description: 'Maximum cumulative loan amount exposure',
    expectedType: 'none',
    category: 'policy',
    allowedSources: [],
  },
  {
    id: 'bureau_credit_inquiries',
    name: 'Credit Inquiries',
    description: 'Number of bureau credit inquiries',
    expectedType: 'int',
    category: 'direct',
    allowedSources: ['Additional Summary', 'Inquiry'],
    validator: nonNegative,
  },
  {
    id: 'bureau_max_active_loans',
    name: 'Max Active Loans',
    description: 'Maximum active loans',
    expectedType: 'int',
    category: 'direct',
    allowedSources: ['Account Summary'],
    validator: nonNegative,
  },
];

/**
 * Build an immutable registry from a list of specs.
 *
 * @throws Error if two specs share an id or a policy spec carries a type or sources
 */
export function createParameterRegistry(specs: readonly ParameterSpec[]): ParameterRegistry {
  const registry = new Map<string, ParameterSpec>();

  for (const spec of specs) {
    if (registry.has(spec.id)) {
      throw new Error(`Duplicate parameter spec: ${spec.id}`);
    }
    if (spec.category === 'policy' && (spec.expectedType !== 'none' || spec.allowedSources.length > 0)) {
      throw new Error(`Policy parameter ${spec.id} must have expected type 'none' and no allowed sources`);
    }
    registry.set(spec.id, Object.freeze({ ...spec, allowedSources: Object.freeze([...spec.allowedSources]) }));
  }

  return registry;
}

export const defaultParameterRegistry: ParameterRegistry = createParameterRegistry(DEFAULT_PARAMETER_SPECS);
