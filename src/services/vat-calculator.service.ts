import type { VatMode } from '../schemas/partnership.schema';
import { VatSettlement } from '../types/tax.types';
import { ValidationError } from '../utils/errors';

export class VATCalculatorService {
    /**
     * Settle VAT for the period
     *
     * - exclusive: salesGross is revenue before VAT, debit = salesGross × rate
     * - inclusive: salesGross already contains VAT, which is extracted first
     */
    settle(salesGross: number, vatRate: number, inputVat: number, vatMode: VatMode = 'exclusive'): VatSettlement {
        this.requireAmount('salesGross', salesGross);
        this.requireAmount('inputVat', inputVat);
        if (!Number.isFinite(vatRate) || vatRate < 0 || vatRate > 1) {
            throw new ValidationError('vatRate', `VAT rate must be between 0 and 1, got ${vatRate}`);
        }

        let salesNet: number;
        let vatDebit: number;

        if (vatMode === 'inclusive') {
            // Amount includes VAT, extract it
            salesNet = salesGross / (1 + vatRate);
            vatDebit = salesGross - salesNet;
        } else {
            salesNet = salesGross;
            vatDebit = salesGross * vatRate;
        }

        return {
            vatMode,
            salesNet,
            vatDebit,
            vatCredit: inputVat,
            vatBalance: vatDebit - inputVat
        };
    }

    private requireAmount(field: 'salesGross' | 'inputVat', value: number): void {
        if (!Number.isFinite(value) || value < 0) {
            throw new ValidationError(field, `VAT needs a non-negative amount, got ${value}`);
        }
    }
}

export const vatCalculatorService = new VATCalculatorService();
