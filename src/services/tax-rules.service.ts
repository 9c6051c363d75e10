/**
 * Tax Rule Tables
 *
 * IRPEF bands and INPS parameters per fiscal year. Rule sets are frozen
 * values handed to the engine explicitly, so several years can be used side
 * by side.
 */

import { InpsRule, IrpefBracket, TaxRuleSet } from '../types/tax.types';
import { ValidationError } from '../utils/errors';

/**
 * Build a rule set, checking that the IRPEF bands start at 0, are contiguous,
 * ascending and open-ended. Throws on a malformed table.
 */
export function defineTaxRuleSet(fiscalYear: number, irpefBrackets: IrpefBracket[], inps: InpsRule): TaxRuleSet {
    if (irpefBrackets.length === 0) {
        throw new Error(`IRPEF table ${fiscalYear} has no brackets`);
    }

    let expectedLower = 0;
    for (const [index, bracket] of irpefBrackets.entries()) {
        if (bracket.lowerBound !== expectedLower) {
            throw new Error(`IRPEF table ${fiscalYear}: bracket ${index} starts at ${bracket.lowerBound}, expected ${expectedLower}`);
        }
        if (!(bracket.upperBound > bracket.lowerBound)) {
            throw new Error(`IRPEF table ${fiscalYear}: bracket ${index} is empty or inverted`);
        }
        if (!(bracket.rate >= 0 && bracket.rate <= 1)) {
            throw new Error(`IRPEF table ${fiscalYear}: bracket ${index} rate ${bracket.rate} outside [0, 1]`);
        }
        expectedLower = bracket.upperBound;
    }
    if (expectedLower !== Infinity) {
        throw new Error(`IRPEF table ${fiscalYear} must end with an open (Infinity) bracket`);
    }

    if (!(inps.threshold >= 0) || !(inps.rate >= 0 && inps.rate <= 1)) {
        throw new Error(`INPS rule ${fiscalYear} is out of range`);
    }

    return Object.freeze({
        fiscalYear,
        irpefBrackets: Object.freeze(irpefBrackets.map((bracket) => Object.freeze({ ...bracket }))),
        inps: Object.freeze({ ...inps })
    });
}

export const TAX_RULES_2025 = defineTaxRuleSet(
    2025,
    [
        { lowerBound: 0, upperBound: 15_000, rate: 0.23 },
        { lowerBound: 15_000, upperBound: 28_000, rate: 0.25 },
        { lowerBound: 28_000, upperBound: 50_000, rate: 0.35 },
        { lowerBound: 50_000, upperBound: Infinity, rate: 0.43 }
    ],
    { threshold: 18_415, rate: 0.24 }
);

// Three-band scale (first two bands merged at 23%)
export const TAX_RULES_2024 = defineTaxRuleSet(
    2024,
    [
        { lowerBound: 0, upperBound: 28_000, rate: 0.23 },
        { lowerBound: 28_000, upperBound: 50_000, rate: 0.35 },
        { lowerBound: 50_000, upperBound: Infinity, rate: 0.43 }
    ],
    { threshold: 18_415, rate: 0.24 }
);

export class TaxRulesService {
    private readonly ruleSets: ReadonlyMap<number, TaxRuleSet>;

    constructor(ruleSets: readonly TaxRuleSet[] = [TAX_RULES_2024, TAX_RULES_2025]) {
        this.ruleSets = new Map(ruleSets.map((ruleSet) => [ruleSet.fiscalYear, ruleSet]));
    }

    get(fiscalYear: number): TaxRuleSet {
        const ruleSet = this.ruleSets.get(fiscalYear);
        if (!ruleSet) {
            throw new ValidationError(
                'fiscalYear',
                `no tax tables for ${fiscalYear} (available: ${this.getAvailableYears().join(', ')})`
            );
        }
        return ruleSet;
    }

    has(fiscalYear: number): boolean {
        return this.ruleSets.has(fiscalYear);
    }

    getAvailableYears(): number[] {
        return [...this.ruleSets.keys()].sort((a, b) => a - b);
    }
}

export const taxRulesService = new TaxRulesService();
