/**
 * History/Profile Store
 *
 * Repository interface for company profiles and calculation history. The
 * engine never depends on it; front ends save what the engine returns.
 */

import type { CompanyFinancialInput, Partner, PartnerRole, VatMode } from '../schemas/partnership.schema';
import { TaxResult } from '../types/tax.types';

export interface CompanySummary {
    id: number;
    name: string;
    createdAt: Date;
}

export interface CompanyRecord extends CompanySummary {
    partners: Partner[];
}

export interface CalculationSummary {
    id: number;
    name: string;
    companyId: number;
    companyName: string;
    fiscalYear: number;
    calculatedAt: Date;
}

export interface StoredPartnerLine {
    name: string;
    role: PartnerRole;
    sharePercent: number;
    profitShare: number;
    irpefDue: number;
    inpsDue: number;
    netIncome: number;
}

export interface CalculationRecord extends CalculationSummary {
    /** Snapshot of what the engine was given */
    input: CompanyFinancialInput & { vatMode: VatMode };
    salesNet: number;
    vatDebit: number;
    vatCredit: number;
    vatBalance: number;
    taxableProfit: number;
    totalIrpef: number;
    totalInps: number;
    lines: StoredPartnerLine[];
}

export interface TaxStore {
    /** Creates the company, or replaces the partners of an existing one with the same name */
    saveCompany(name: string, partners: readonly Partner[]): Promise<CompanyRecord>;
    loadCompany(name: string): Promise<CompanyRecord | null>;
    loadCompanyById(id: number): Promise<CompanyRecord | null>;
    listCompanies(): Promise<CompanySummary[]>;
    /** Also removes the company's history */
    deleteCompany(id: number): Promise<boolean>;

    saveCalculation(
        companyId: number,
        name: string,
        input: CompanyFinancialInput,
        result: TaxResult
    ): Promise<CalculationSummary>;
    /** Newest first; all companies when companyId is omitted */
    listHistory(companyId?: number): Promise<CalculationSummary[]>;
    loadCalculation(id: number): Promise<CalculationRecord | null>;
    deleteCalculation(id: number): Promise<boolean>;

    close(): Promise<void>;
}
