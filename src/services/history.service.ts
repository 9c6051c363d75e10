/**
 * Calculation History
 *
 * Runs the engine for a saved company, saves results, and recomputes past
 * calculations from their stored input snapshot.
 */

import type { CompanyFinancialInput, FinancialFigures } from '../schemas/partnership.schema';
import { CalculationRecord, CalculationSummary, CompanyRecord, TaxStore } from '../repositories/tax-store.repository';
import { TaxResult } from '../types/tax.types';
import { NotFoundError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { partnershipTaxService, PartnershipTaxService } from './partnership-tax.service';
import { taxRulesService, TaxRulesService } from './tax-rules.service';

export interface CalculationOutcome {
    input: CompanyFinancialInput;
    result: TaxResult;
}

export interface RecomputedCalculation extends CalculationOutcome {
    record: CalculationRecord;
}

export class HistoryService {
    constructor(
        private readonly store: TaxStore,
        private readonly engine: PartnershipTaxService = partnershipTaxService,
        private readonly rules: TaxRulesService = taxRulesService
    ) {}

    /**
     * Compute taxes for a company profile without saving anything
     */
    calculate(company: CompanyRecord, figures: FinancialFigures, fiscalYear: number): CalculationOutcome {
        const input: CompanyFinancialInput = {
            ...figures,
            vatMode: figures.vatMode ?? 'exclusive',
            partners: company.partners.map((partner) => ({ ...partner }))
        };
        const result = this.engine.calculate(input, this.rules.get(fiscalYear));
        return { input, result };
    }

    async save(company: CompanyRecord, name: string, outcome: CalculationOutcome): Promise<CalculationSummary> {
        const calculationName = name.trim();
        if (!calculationName) {
            throw new ValidationError('name', 'calculation name is empty');
        }
        const summary = await this.store.saveCalculation(company.id, calculationName, outcome.input, outcome.result);
        logger.info('[History] Saved calculation', { id: summary.id, company: company.name });
        return summary;
    }

    list(companyId?: number): Promise<CalculationSummary[]> {
        return this.store.listHistory(companyId);
    }

    async load(id: number): Promise<CalculationRecord> {
        const record = await this.store.loadCalculation(id);
        if (!record) {
            throw new NotFoundError('calculation', id);
        }
        return record;
    }

    /**
     * Run the engine again on a stored calculation's own input snapshot
     *
     * @param fiscalYear - Defaults to the year the calculation was made for
     */
    async recompute(id: number, fiscalYear?: number): Promise<RecomputedCalculation> {
        const record = await this.load(id);
        const input: CompanyFinancialInput = {
            ...record.input,
            partners: record.input.partners.map((partner) => ({ ...partner }))
        };
        const result = this.engine.calculate(input, this.rules.get(fiscalYear ?? record.fiscalYear));
        return { record, input, result };
    }

    async delete(id: number): Promise<void> {
        const deleted = await this.store.deleteCalculation(id);
        if (!deleted) {
            throw new NotFoundError('calculation', id);
        }
        logger.info('[History] Deleted calculation', { id });
    }
}
