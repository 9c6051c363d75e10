import { Type } from '@sinclair/typebox';
import type { Static, TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { SqlClient, SqlPool } from '../config/database';
import { runMigrations } from '../migrate';
import { CompanyFinancialInput, Partner, PartnerRoleSchema, VatModeSchema } from '../schemas/partnership.schema';
import { TaxResult } from '../types/tax.types';
import { NotFoundError, StoreError, TaxCalculatorError } from '../utils/errors';
import { logger } from '../utils/logger';
import {
    CalculationRecord,
    CalculationSummary,
    CompanyRecord,
    CompanySummary,
    StoredPartnerLine,
    TaxStore
} from './tax-store.repository';

const CompanyRowSchema = Type.Object({
    id: Type.Integer(),
    name: Type.String(),
    created_at: Type.Date()
});

const PartnerRowSchema = Type.Object({
    name: Type.String(),
    share_percent: Type.Number(),
    role: PartnerRoleSchema
});

const CalculationSummaryRowSchema = Type.Object({
    id: Type.Integer(),
    name: Type.String(),
    company_id: Type.Integer(),
    company_name: Type.String(),
    fiscal_year: Type.Integer(),
    calculated_at: Type.Date()
});

const CalculationRowSchema = Type.Composite([
    CalculationSummaryRowSchema,
    Type.Object({
        vat_mode: VatModeSchema,
        sales_gross: Type.Number(),
        input_vat: Type.Number(),
        vat_rate: Type.Number(),
        expenses: Type.Number(),
        sales_net: Type.Number(),
        vat_debit: Type.Number(),
        vat_credit: Type.Number(),
        vat_balance: Type.Number(),
        taxable_profit: Type.Number(),
        total_irpef: Type.Number(),
        total_inps: Type.Number()
    })
]);

const ResultRowSchema = Type.Object({
    partner_name: Type.String(),
    role: PartnerRoleSchema,
    share_percent: Type.Number(),
    profit_share: Type.Number(),
    irpef: Type.Number(),
    inps: Type.Number(),
    net_income: Type.Number()
});

const InsertedCalculationRowSchema = Type.Object({
    id: Type.Integer(),
    calculated_at: Type.Date()
});

function parseRows<T extends TSchema>(schema: T, rows: unknown[], table: string): Static<T>[] {
    return rows.map((row) => {
        if (!Value.Check(schema, row)) {
            const error = Value.Errors(schema, row).First();
            throw new StoreError(`Malformed ${table} row${error ? ` at ${error.path}: ${error.message}` : ''}`);
        }
        return row;
    });
}

const mapCompany = (row: Static<typeof CompanyRowSchema>): CompanySummary => ({
    id: row.id,
    name: row.name,
    createdAt: row.created_at
});

const mapPartner = (row: Static<typeof PartnerRowSchema>): Partner => ({
    name: row.name,
    sharePercent: row.share_percent,
    role: row.role
});

const mapCalculationSummary = (row: Static<typeof CalculationSummaryRowSchema>): CalculationSummary => ({
    id: row.id,
    name: row.name,
    companyId: row.company_id,
    companyName: row.company_name,
    fiscalYear: row.fiscal_year,
    calculatedAt: row.calculated_at
});

const mapResultLine = (row: Static<typeof ResultRowSchema>): StoredPartnerLine => ({
    name: row.partner_name,
    role: row.role,
    sharePercent: row.share_percent,
    profitShare: row.profit_share,
    irpefDue: row.irpef,
    inpsDue: row.inps,
    netIncome: row.net_income
});

/**
 * PostgreSQL-backed TaxStore
 */
export class PgTaxStore implements TaxStore {
    constructor(private readonly pool: SqlPool) {}

    /**
     * Apply pending schema migrations
     */
    async init(): Promise<void> {
        await this.guard('schema migration', () => runMigrations(this.pool));
    }

    async saveCompany(name: string, partners: readonly Partner[]): Promise<CompanyRecord> {
        return this.guard('save company', () => this.transaction(async (client) => {
            const inserted = await client.query(
                `INSERT INTO companies (name) VALUES ($1)
                 ON CONFLICT (name) DO UPDATE SET updated_at = NOW()
                 RETURNING id, name, created_at;`,
                [name]
            );
            const [company] = parseRows(CompanyRowSchema, inserted.rows, 'companies');
            if (!company) {
                throw new StoreError(`Company "${name}" was not saved`);
            }

            await client.query('DELETE FROM partners WHERE company_id = $1;', [company.id]);
            for (const [position, partner] of partners.entries()) {
                await client.query(
                    `INSERT INTO partners (company_id, position, name, share_percent, role)
                     VALUES ($1, $2, $3, $4, $5);`,
                    [company.id, position, partner.name, partner.sharePercent, partner.role]
                );
            }

            logger.info('[Store] Company saved', { id: company.id, name, partners: partners.length });
            return { ...mapCompany(company), partners: partners.map((partner) => ({ ...partner })) };
        }));
    }

    async loadCompany(name: string): Promise<CompanyRecord | null> {
        return this.guard('load company', () => this.findCompany('name = $1', name));
    }

    async loadCompanyById(id: number): Promise<CompanyRecord | null> {
        return this.guard('load company', () => this.findCompany('id = $1', id));
    }

    async listCompanies(): Promise<CompanySummary[]> {
        return this.guard('list companies', async () => {
            const result = await this.pool.query('SELECT id, name, created_at FROM companies ORDER BY name ASC;');
            return parseRows(CompanyRowSchema, result.rows, 'companies').map(mapCompany);
        });
    }

    async deleteCompany(id: number): Promise<boolean> {
        return this.guard('delete company', async () => {
            const result = await this.pool.query('DELETE FROM companies WHERE id = $1 RETURNING id;', [id]);
            return result.rows.length > 0;
        });
    }

    async saveCalculation(
        companyId: number,
        name: string,
        input: CompanyFinancialInput,
        result: TaxResult
    ): Promise<CalculationSummary> {
        return this.guard('save calculation', () => this.transaction(async (client) => {
            const companyResult = await client.query('SELECT id, name, created_at FROM companies WHERE id = $1;', [companyId]);
            const [company] = parseRows(CompanyRowSchema, companyResult.rows, 'companies');
            if (!company) {
                throw new NotFoundError('company', companyId);
            }

            const inserted = await client.query(
                `INSERT INTO calculations (
                    company_id, name, fiscal_year, vat_mode, sales_gross, input_vat, vat_rate, expenses,
                    sales_net, vat_debit, vat_credit, vat_balance, taxable_profit, total_irpef, total_inps
                 ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)
                 RETURNING id, calculated_at;`,
                [
                    companyId,
                    name,
                    result.fiscalYear,
                    result.vatMode,
                    input.salesGross,
                    input.inputVat,
                    input.vatRate,
                    input.expenses,
                    result.salesNet,
                    result.vatDebit,
                    result.vatCredit,
                    result.vatBalance,
                    result.taxableProfit,
                    result.totalIrpef,
                    result.totalInps
                ]
            );
            const [calculation] = parseRows(InsertedCalculationRowSchema, inserted.rows, 'calculations');
            if (!calculation) {
                throw new StoreError(`Calculation "${name}" was not saved`);
            }

            for (const [position, line] of result.perPartner.entries()) {
                await client.query(
                    `INSERT INTO calculation_results (
                        calculation_id, position, partner_name, role, share_percent, profit_share, irpef, inps, net_income
                     ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9);`,
                    [
                        calculation.id,
                        position,
                        line.name,
                        line.role,
                        line.sharePercent,
                        line.profitShare,
                        line.irpefDue,
                        line.inpsDue,
                        line.netIncome
                    ]
                );
            }

            logger.info('[Store] Calculation saved', { id: calculation.id, companyId, name });
            return {
                id: calculation.id,
                name,
                companyId,
                companyName: company.name,
                fiscalYear: result.fiscalYear,
                calculatedAt: calculation.calculated_at
            };
        }));
    }

    async listHistory(companyId?: number): Promise<CalculationSummary[]> {
        return this.guard('list history', async () => {
            const filter = companyId === undefined ? '' : 'WHERE c.company_id = $1';
            const result = await this.pool.query(
                `SELECT c.id, c.name, c.company_id, co.name AS company_name, c.fiscal_year, c.calculated_at
                 FROM calculations c
                 JOIN companies co ON co.id = c.company_id
                 ${filter}
                 ORDER BY c.calculated_at DESC, c.id DESC;`,
                companyId === undefined ? [] : [companyId]
            );
            return parseRows(CalculationSummaryRowSchema, result.rows, 'calculations').map(mapCalculationSummary);
        });
    }

    async loadCalculation(id: number): Promise<CalculationRecord | null> {
        return this.guard('load calculation', async () => {
            const result = await this.pool.query(
                `SELECT c.*, co.name AS company_name
                 FROM calculations c
                 JOIN companies co ON co.id = c.company_id
                 WHERE c.id = $1;`,
                [id]
            );
            const [row] = parseRows(CalculationRowSchema, result.rows, 'calculations');
            if (!row) {
                return null;
            }

            const lines = await this.pool.query(
                `SELECT partner_name, role, share_percent, profit_share, irpef, inps, net_income
                 FROM calculation_results
                 WHERE calculation_id = $1
                 ORDER BY position ASC;`,
                [id]
            );
            const partnerLines = parseRows(ResultRowSchema, lines.rows, 'calculation_results').map(mapResultLine);

            return {
                ...mapCalculationSummary(row),
                input: {
                    salesGross: row.sales_gross,
                    inputVat: row.input_vat,
                    vatRate: row.vat_rate,
                    expenses: row.expenses,
                    vatMode: row.vat_mode,
                    partners: partnerLines.map((line) => ({
                        name: line.name,
                        sharePercent: line.sharePercent,
                        role: line.role
                    }))
                },
                salesNet: row.sales_net,
                vatDebit: row.vat_debit,
                vatCredit: row.vat_credit,
                vatBalance: row.vat_balance,
                taxableProfit: row.taxable_profit,
                totalIrpef: row.total_irpef,
                totalInps: row.total_inps,
                lines: partnerLines
            };
        });
    }

    async deleteCalculation(id: number): Promise<boolean> {
        return this.guard('delete calculation', async () => {
            const result = await this.pool.query('DELETE FROM calculations WHERE id = $1 RETURNING id;', [id]);
            return result.rows.length > 0;
        });
    }

    async close(): Promise<void> {
        await this.pool.end();
    }

    private async findCompany(condition: 'id = $1' | 'name = $1', key: number | string): Promise<CompanyRecord | null> {
        const result = await this.pool.query(`SELECT id, name, created_at FROM companies WHERE ${condition};`, [key]);
        const [company] = parseRows(CompanyRowSchema, result.rows, 'companies');
        if (!company) {
            return null;
        }

        const partners = await this.pool.query(
            'SELECT name, share_percent, role FROM partners WHERE company_id = $1 ORDER BY position ASC;',
            [company.id]
        );
        return {
            ...mapCompany(company),
            partners: parseRows(PartnerRowSchema, partners.rows, 'partners').map(mapPartner)
        };
    }

    private async transaction<T>(work: (client: SqlClient) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();
        try {
            await client.query('BEGIN;');
            const result = await work(client);
            await client.query('COMMIT;');
            return result;
        } catch (error) {
            try {
                await client.query('ROLLBACK;');
            } catch (rollbackError) {
                logger.error('[Store] Rollback failed', rollbackError);
            }
            throw error;
        } finally {
            client.release();
        }
    }

    /**
     * Wrap driver failures in StoreError; calculator errors pass through
     */
    private async guard<T>(operation: string, work: () => Promise<T>): Promise<T> {
        try {
            return await work();
        } catch (error) {
            if (error instanceof TaxCalculatorError) {
                throw error;
            }
            logger.error(`[Store] ${operation} failed`, error);
            throw new StoreError(`Could not ${operation}`, error);
        }
    }
}
