/**
 * Text rendering of tax results and history entries for the terminal
 */

import { TaxResult } from '../types/tax.types';
import type { Partner } from '../schemas/partnership.schema';
import type { CalculationRecord, CalculationSummary, CompanySummary } from '../repositories/tax-store.repository';
import { irpefCalculatorService } from './irpef-calculator.service';

export function formatEuro(amount: number): string {
    return `${amount.toFixed(2)} €`;
}

export function formatPercent(value: number): string {
    return `${Number(value.toFixed(2))}%`;
}

/** dd/mm/yyyy HH:MM in local time */
export function formatDateTime(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export class ReportFormatterService {
    formatTaxReport(result: TaxResult): string {
        const lines: string[] = [];
        const balanceLabel = result.vatBalance < 0 ? 'credit carried forward' : 'due';

        lines.push(`--- S.a.s. Tax Calculation (fiscal year ${result.fiscalYear}) ---`);
        lines.push(`Net sales (excl. VAT): ${formatEuro(result.salesNet)}`);
        lines.push(`VAT debit: ${formatEuro(result.vatDebit)}`);
        lines.push(`VAT credit: ${formatEuro(result.vatCredit)}`);
        lines.push(`VAT balance (${balanceLabel}): ${formatEuro(result.vatBalance)}`);
        lines.push('');
        lines.push(`Profit before tax and contributions: ${formatEuro(result.taxableProfit)}`);

        for (const line of result.perPartner) {
            lines.push('');
            lines.push(`Partner: ${line.name} (${line.role}, ${formatPercent(line.sharePercent)})`);
            lines.push(`  Profit share: ${formatEuro(line.profitShare)}`);
            lines.push(`  IRPEF due: ${formatEuro(line.irpefDue)}`);
            for (const band of line.irpefBreakdown) {
                lines.push(`    ${irpefCalculatorService.describeBand(band)} at ${formatPercent(band.rate * 100)}: ${formatEuro(band.tax)}`);
            }
            lines.push(`  INPS due: ${formatEuro(line.inpsDue)}`);
            lines.push(`  Net after tax: ${formatEuro(line.netIncome)}`);
        }

        lines.push('');
        lines.push(`Total IRPEF: ${formatEuro(result.totalIrpef)}`);
        lines.push(`Total INPS: ${formatEuro(result.totalInps)}`);
        lines.push(`Net profit after tax and contributions: ${formatEuro(result.netProfitAfterTax)}`);
        lines.push(`Effective tax rate: ${result.effectiveTaxRate.toFixed(2)}%`);

        for (const warning of result.warnings) {
            lines.push(`Warning: ${warning}`);
        }

        return lines.join('\n');
    }

    formatTaxResultJson(result: TaxResult): string {
        // Infinity (top IRPEF band) becomes null
        return JSON.stringify(result, null, 2);
    }

    formatPartner(partner: Partner): string {
        return `${partner.name}: ${formatPercent(partner.sharePercent)} (${partner.role})`;
    }

    formatCompanySummary(company: CompanySummary, position: number): string {
        return `${position}. ${company.name}`;
    }

    formatCalculationSummary(calculation: CalculationSummary, position: number): string {
        return `${position}. [${formatDateTime(calculation.calculatedAt)}] ${calculation.name} - ${calculation.companyName}`;
    }

    /**
     * Details of a saved calculation: the figures it was run on, then the
     * stored per-partner results
     */
    formatCalculationRecord(record: CalculationRecord): string {
        const { input } = record;
        const lines: string[] = [
            `--- ${record.name} (${record.companyName}) ---`,
            `Date: ${formatDateTime(record.calculatedAt)}`,
            `Fiscal year: ${record.fiscalYear}`,
            `Gross sales: ${formatEuro(input.salesGross)} (VAT ${input.vatMode})`,
            `VAT rate: ${formatPercent(input.vatRate * 100)}`,
            `Input VAT: ${formatEuro(input.inputVat)}`,
            `Expenses: ${formatEuro(input.expenses)}`,
            '',
            `Net sales (excl. VAT): ${formatEuro(record.salesNet)}`,
            `VAT balance: ${formatEuro(record.vatBalance)}`,
            `Profit before tax and contributions: ${formatEuro(record.taxableProfit)}`
        ];

        for (const line of record.lines) {
            lines.push('');
            lines.push(`Partner: ${line.name} (${line.role}, ${formatPercent(line.sharePercent)})`);
            lines.push(`  Profit share: ${formatEuro(line.profitShare)}`);
            lines.push(`  IRPEF due: ${formatEuro(line.irpefDue)}`);
            lines.push(`  INPS due: ${formatEuro(line.inpsDue)}`);
            lines.push(`  Net after tax: ${formatEuro(line.netIncome)}`);
        }

        lines.push('');
        lines.push(`Total IRPEF: ${formatEuro(record.totalIrpef)}`);
        lines.push(`Total INPS: ${formatEuro(record.totalInps)}`);
        return lines.join('\n');
    }
}

export const reportFormatterService = new ReportFormatterService();
