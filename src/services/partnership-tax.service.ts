/**
 * Partnership Tax Engine
 *
 * Turns a company's figures and partner list into a frozen TaxResult:
 * VAT settlement, profit before tax, and IRPEF/INPS per partner.
 * Pure and synchronous; the rule set is always passed in.
 */

import { CompanyFinancialInput } from '../schemas/partnership.schema';
import { PartnerTaxLine, TaxResult, TaxRuleSet } from '../types/tax.types';
import { irpefCalculatorService, IrpefCalculatorService } from './irpef-calculator.service';
import { inpsCalculatorService, InpsCalculatorService } from './inps-calculator.service';
import { vatCalculatorService, VATCalculatorService } from './vat-calculator.service';
import { partnershipValidatorService, PartnershipValidatorService } from './partnership-validator.service';

export class PartnershipTaxService {
    constructor(
        private readonly validator: PartnershipValidatorService = partnershipValidatorService,
        private readonly vat: VATCalculatorService = vatCalculatorService,
        private readonly irpef: IrpefCalculatorService = irpefCalculatorService,
        private readonly inps: InpsCalculatorService = inpsCalculatorService
    ) {}

    /**
     * Validate the input, then compute. Accepts untrusted values (parsed
     * flags, prompts, stored rows); throws ValidationError before any math.
     */
    calculate(input: unknown, rules: TaxRuleSet): TaxResult {
        const validated = this.validator.validate(input);
        return this.compute(validated, rules);
    }

    private compute(input: CompanyFinancialInput, rules: TaxRuleSet): TaxResult {
        const settlement = this.vat.settle(input.salesGross, input.vatRate, input.inputVat, input.vatMode);

        // Reported as is when negative
        const taxableProfit = settlement.salesNet - input.expenses;

        let totalIrpef = 0;
        let totalInps = 0;
        const perPartner: PartnerTaxLine[] = input.partners.map((partner) => {
            const profitShare = taxableProfit * (partner.sharePercent / 100);
            const taxable = Math.max(0, profitShare);

            const irpef = this.irpef.calculate(taxable, rules.irpefBrackets);
            const inpsDue = this.inps.calculate(taxable, partner.role, rules.inps);

            totalIrpef += irpef.totalTax;
            totalInps += inpsDue;

            return Object.freeze({
                name: partner.name,
                role: partner.role,
                sharePercent: partner.sharePercent,
                profitShare,
                irpefDue: irpef.totalTax,
                inpsDue,
                netIncome: profitShare - irpef.totalTax - inpsDue,
                irpefBreakdown: Object.freeze(irpef.breakdown.map((band) => Object.freeze(band)))
            });
        });

        const warnings: string[] = [];
        if (taxableProfit < 0) {
            warnings.push('Expenses exceed net sales: the company made a loss, no IRPEF or INPS is due');
        }
        if (!this.validator.hasManagingPartner(input.partners)) {
            warnings.push('No accomandatario partner: INPS contributions are zero');
        }

        return Object.freeze({
            fiscalYear: rules.fiscalYear,
            ...settlement,
            taxableProfit,
            perPartner: Object.freeze(perPartner),
            totalIrpef,
            totalInps,
            netProfitAfterTax: taxableProfit - totalIrpef - totalInps,
            effectiveTaxRate: taxableProfit > 0 ? ((totalIrpef + totalInps) / taxableProfit) * 100 : 0,
            isLoss: taxableProfit < 0,
            warnings: Object.freeze(warnings)
        });
    }
}

export const partnershipTaxService = new PartnershipTaxService();
