import type { PartnerRole, VatMode } from '../schemas/partnership.schema';

export interface IrpefBracket {
    lowerBound: number;
    /** `Infinity` for the top band */
    upperBound: number;
    rate: number;
}

export interface InpsRule {
    /** Contributions apply only to the profit share above this amount */
    threshold: number;
    rate: number;
}

export interface TaxRuleSet {
    fiscalYear: number;
    irpefBrackets: readonly IrpefBracket[];
    inps: InpsRule;
}

export interface IrpefBandTax {
    lowerBound: number;
    upperBound: number;
    rate: number;
    taxableAmount: number;
    tax: number;
}

export interface IrpefCalculation {
    taxableAmount: number;
    totalTax: number;
    /** Percent */
    effectiveRate: number;
    /** Percent */
    marginalRate: number;
    breakdown: IrpefBandTax[];
}

export interface VatSettlement {
    vatMode: VatMode;
    salesNet: number;
    vatDebit: number;
    vatCredit: number;
    /** Positive: owed. Negative: credit carried forward */
    vatBalance: number;
}

export interface PartnerTaxLine {
    name: string;
    role: PartnerRole;
    sharePercent: number;
    /** Negative when the company made a loss */
    profitShare: number;
    irpefDue: number;
    inpsDue: number;
    netIncome: number;
    irpefBreakdown: readonly IrpefBandTax[];
}

export interface TaxResult extends VatSettlement {
    fiscalYear: number;
    taxableProfit: number;
    perPartner: readonly PartnerTaxLine[];
    totalIrpef: number;
    totalInps: number;
    netProfitAfterTax: number;
    /** Percent of taxable profit; 0 when there is no profit */
    effectiveTaxRate: number;
    isLoss: boolean;
    warnings: readonly string[];
}
