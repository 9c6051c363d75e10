/**
 * Tax Rule Tables Test Suite
 */

import { defineTaxRuleSet, TAX_RULES_2025, TaxRulesService, taxRulesService } from '../services/tax-rules.service';
import { ValidationError } from '../utils/errors';
import { testUtils } from './setup';

const inps = { threshold: 18_415, rate: 0.24 };

describe('defineTaxRuleSet', () => {
  test('should accept contiguous bands ending in an open band', () => {
    const rules = defineTaxRuleSet(2030, [
      { lowerBound: 0, upperBound: 10_000, rate: 0.2 },
      { lowerBound: 10_000, upperBound: Infinity, rate: 0.4 }
    ], inps);

    expect(rules.fiscalYear).toBe(2030);
    expect(rules.irpefBrackets).toHaveLength(2);
    expect(Object.isFrozen(rules)).toBe(true);
    expect(Object.isFrozen(rules.irpefBrackets[0])).toBe(true);
  });

  test('should reject an empty table', () => {
    expect(() => defineTaxRuleSet(2030, [], inps)).toThrow('IRPEF table 2030 has no brackets');
  });

  test('should reject a table that does not start at zero', () => {
    expect(() => defineTaxRuleSet(2030, [{ lowerBound: 100, upperBound: Infinity, rate: 0.2 }], inps))
      .toThrow('IRPEF table 2030: bracket 0 starts at 100, expected 0');
  });

  test('should reject a gap between bands', () => {
    expect(() => defineTaxRuleSet(2030, [
      { lowerBound: 0, upperBound: 10_000, rate: 0.2 },
      { lowerBound: 12_000, upperBound: Infinity, rate: 0.4 }
    ], inps)).toThrow('IRPEF table 2030: bracket 1 starts at 12000, expected 10000');
  });

  test('should reject a closed top band', () => {
    expect(() => defineTaxRuleSet(2030, [{ lowerBound: 0, upperBound: 50_000, rate: 0.2 }], inps))
      .toThrow('IRPEF table 2030 must end with an open (Infinity) bracket');
  });

  test('should reject rates outside [0, 1]', () => {
    expect(() => defineTaxRuleSet(2030, [{ lowerBound: 0, upperBound: Infinity, rate: 23 }], inps))
      .toThrow('IRPEF table 2030: bracket 0 rate 23 outside [0, 1]');
    expect(() => defineTaxRuleSet(2030, [{ lowerBound: 0, upperBound: Infinity, rate: 0.2 }], { threshold: 0, rate: 2 }))
      .toThrow('INPS rule 2030 is out of range');
  });
});

describe('TaxRulesService', () => {
  test('should hold the 2024 and 2025 tables', () => {
    expect(taxRulesService.getAvailableYears()).toEqual([2024, 2025]);
    expect(taxRulesService.get(2025)).toBe(TAX_RULES_2025);
    expect(taxRulesService.has(2023)).toBe(false);
  });

  test('should fail with a ValidationError for a year without tables', () => {
    const error = testUtils.catchError(() => taxRulesService.get(1999));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      field: 'fiscalYear',
      message: 'Invalid fiscalYear: no tax tables for 1999 (available: 2024, 2025)'
    });
  });

  test('should serve custom rule sets side by side', () => {
    const custom = defineTaxRuleSet(2030, [{ lowerBound: 0, upperBound: Infinity, rate: 0.1 }], inps);
    const service = new TaxRulesService([TAX_RULES_2025, custom]);

    expect(service.getAvailableYears()).toEqual([2025, 2030]);
    expect(service.get(2030).irpefBrackets[0].rate).toBe(0.1);
  });
});
