/**
 * IRPEF Calculator
 *
 * Progressive marginal-band taxation: each band taxes only the part of the
 * amount that falls inside it.
 */

import { IrpefBandTax, IrpefBracket, IrpefCalculation } from '../types/tax.types';
import { ValidationError } from '../utils/errors';

export class IrpefCalculatorService {
    /**
     * Calculate IRPEF on one partner's taxable amount
     *
     * @param amount - Non-negative taxable amount
     * @param brackets - Contiguous bands from a rule set
     */
    calculate(amount: number, brackets: readonly IrpefBracket[]): IrpefCalculation {
        if (!Number.isFinite(amount) || amount < 0) {
            throw new ValidationError('amount', `IRPEF needs a non-negative amount, got ${amount}`);
        }

        let totalTax = 0;
        let marginalRate = 0;
        const breakdown: IrpefBandTax[] = [];

        for (const bracket of brackets) {
            if (amount <= bracket.lowerBound) {
                break; // Nothing left for this band
            }

            const taxableInBracket = Math.min(amount, bracket.upperBound) - bracket.lowerBound;
            const taxInBracket = taxableInBracket * bracket.rate;
            totalTax += taxInBracket;
            marginalRate = bracket.rate;

            breakdown.push({
                lowerBound: bracket.lowerBound,
                upperBound: bracket.upperBound,
                rate: bracket.rate,
                taxableAmount: taxableInBracket,
                tax: taxInBracket
            });
        }

        const effectiveRate = amount > 0 ? (totalTax / amount) * 100 : 0;

        return {
            taxableAmount: amount,
            totalTax,
            effectiveRate,
            marginalRate: marginalRate * 100,
            breakdown
        };
    }

    /**
     * Label a band for display, e.g. `€15,000 - €28,000` or `Above €50,000`
     */
    describeBand(band: Pick<IrpefBracket, 'lowerBound' | 'upperBound'>): string {
        const lower = band.lowerBound.toLocaleString('en-US');
        return band.upperBound === Infinity
            ? `Above €${lower}`
            : `€${lower} - €${band.upperBound.toLocaleString('en-US')}`;
    }
}

export const irpefCalculatorService = new IrpefCalculatorService();
