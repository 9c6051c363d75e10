import { parseArgs } from 'node:util';
import type { FinancialFigures, Partner } from '../schemas/partnership.schema';
import { partnerParserService } from '../services/partner-parser.service';
import { ParseError } from '../utils/errors';
import { parseDecimal } from '../utils/numbers';

export const USAGE = `Usage: sas-tax --sales-gross <amount> --input-vat <amount> --expenses <amount>
               --partner <name:share:role> [--partner ...]
               [--vat-rate <0..1>] [--fiscal-year <year>] [--vat-inclusive] [--json]

Without arguments an interactive menu starts (requires PostgreSQL).

  --sales-gross    Revenue for the period (VAT excluded unless --vat-inclusive)
  --input-vat      VAT paid on purchases
  --vat-rate       VAT rate on sales, e.g. 0.22
  --expenses       Deductible costs, VAT excluded
  --partner        Partner as name:share_percent:role, role being
                   accomandante or accomandatario; repeat for each partner
  --fiscal-year    Tax tables to use
  --vat-inclusive  --sales-gross already includes VAT
  --json           Print the result as JSON
  -h, --help       Show this help`;

export interface CliDefaults {
    vatRate: number;
    fiscalYear: number;
}

export type CliCommand =
    | { kind: 'help' }
    | {
        kind: 'calculate';
        figures: FinancialFigures;
        partners: Partner[];
        fiscalYear: number;
        json: boolean;
    };

function parseNumber(flag: string, raw: string): number {
    const value = parseDecimal(raw);
    if (value === null) {
        throw new ParseError(`--${flag} ${raw}`, 'expected a number');
    }
    return value;
}

function requireNumber(flag: string, raw: string | undefined): number {
    if (raw === undefined) {
        throw new ParseError(`--${flag}`, 'flag is required');
    }
    return parseNumber(flag, raw);
}

function readArgs(argv: readonly string[]) {
    try {
        return parseArgs({
            args: [...argv],
            strict: true,
            allowPositionals: false,
            options: {
                'sales-gross': { type: 'string' },
                'input-vat': { type: 'string' },
                'vat-rate': { type: 'string' },
                expenses: { type: 'string' },
                partner: { type: 'string', multiple: true },
                'fiscal-year': { type: 'string' },
                'vat-inclusive': { type: 'boolean' },
                json: { type: 'boolean' },
                help: { type: 'boolean', short: 'h' }
            }
        }).values;
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ParseError(argv.join(' '), reason);
    }
}

/**
 * Turn command-line arguments into a typed command. Unknown flags, missing
 * required flags, non-numeric values and malformed partners are ParseErrors.
 */
export function parseCliArgs(argv: readonly string[], defaults: CliDefaults): CliCommand {
    const values = readArgs(argv);

    if (values.help) {
        return { kind: 'help' };
    }

    const rawPartners = values.partner ?? [];
    if (rawPartners.length === 0) {
        throw new ParseError('--partner', 'at least one partner is required');
    }

    const fiscalYear = values['fiscal-year'] === undefined
        ? defaults.fiscalYear
        : parseNumber('fiscal-year', values['fiscal-year']);
    if (!Number.isInteger(fiscalYear)) {
        throw new ParseError(`--fiscal-year ${fiscalYear}`, 'expected a whole year');
    }

    return {
        kind: 'calculate',
        figures: {
            salesGross: requireNumber('sales-gross', values['sales-gross']),
            inputVat: requireNumber('input-vat', values['input-vat']),
            vatRate: values['vat-rate'] === undefined ? defaults.vatRate : parseNumber('vat-rate', values['vat-rate']),
            expenses: requireNumber('expenses', values.expenses),
            vatMode: values['vat-inclusive'] ? 'inclusive' : 'exclusive'
        },
        partners: partnerParserService.parseAll(rawPartners),
        fiscalYear,
        json: values.json ?? false
    };
}
