/**
 * Parameter Spec Tests
 */

import {
  DEFAULT_PARAMETER_SPECS,
  createParameterRegistry,
  defaultParameterRegistry,
  matchesExpectedType,
  validateParameterValue,
  type ParameterSpec,
} from '@risklens/shared';

function spec(id: string): ParameterSpec {
  const found = defaultParameterRegistry.get(id);
  if (!found) throw new Error(`missing spec ${id}`);
  return found;
}

describe('Parameter registry', () => {
  it('should register all fifteen bureau parameters', () => {
    expect(defaultParameterRegistry.size).toBe(15);
    expect(DEFAULT_PARAMETER_SPECS.map((s) => s.id)).toContain('bureau_credit_score');
  });

  it('should mark threshold parameters as policy with no type or sources', () => {
    for (const id of ['bureau_overdue_threshold', 'bureau_loan_amount_threshold']) {
      expect(spec(id).category).toBe('policy');
      expect(spec(id).expectedType).toBe('none');
      expect(spec(id).allowedSources).toEqual([]);
    }
  });

  it('should reject duplicate ids', () => {
    const score = spec('bureau_credit_score');
    expect(() => createParameterRegistry([score, score])).toThrow('Duplicate parameter spec: bureau_credit_score');
  });

  it('should reject a policy spec with an expected type', () => {
    const bad: ParameterSpec = { ...spec('bureau_overdue_threshold'), expectedType: 'float' };
    expect(() => createParameterRegistry([bad])).toThrow(/must have expected type 'none'/);
  });

  it('should freeze registered specs', () => {
    expect(Object.isFrozen(spec('bureau_dpd_30'))).toBe(true);
  });
});

describe('Type matching', () => {
  it('should distinguish integers from other numbers', () => {
    expect(matchesExpectedType(42, 'int')).toBe(true);
    expect(matchesExpectedType(42.5, 'int')).toBe(false);
    expect(matchesExpectedType(42.5, 'float')).toBe(true);
    expect(matchesExpectedType(42, 'float')).toBe(true);
  });

  it('should not treat booleans as numbers', () => {
    expect(matchesExpectedType(true, 'int')).toBe(false);
    expect(matchesExpectedType(true, 'bool')).toBe(true);
  });

  it('should only accept null for none', () => {
    expect(matchesExpectedType(null, 'none')).toBe(true);
    expect(matchesExpectedType(0, 'none')).toBe(false);
  });
});

describe('Value validation', () => {
  it('should accept a score inside 300-900 and reject one outside', () => {
    expect(validateParameterValue(spec('bureau_credit_score'), 742)).toBe(true);
    expect(validateParameterValue(spec('bureau_credit_score'), 299)).toBe(false);
    expect(validateParameterValue(spec('bureau_credit_score'), 901)).toBe(false);
  });

  it('should reject negative counts', () => {
    expect(validateParameterValue(spec('bureau_dpd_30'), -1)).toBe(false);
    expect(validateParameterValue(spec('bureau_dpd_30'), 0)).toBe(true);
  });

  it('should reject null for document parameters and accept it for policy parameters', () => {
    expect(validateParameterValue(spec('bureau_suit_filed'), null)).toBe(false);
    expect(validateParameterValue(spec('bureau_overdue_threshold'), null)).toBe(true);
  });

  it('should reject a value of the wrong type', () => {
    expect(validateParameterValue(spec('bureau_suit_filed'), 'yes')).toBe(false);
  });
});
