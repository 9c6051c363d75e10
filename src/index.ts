#!/usr/bin/env node
/**
 * S.a.s. Tax Calculator
 *
 * With flags: one-shot calculation printed to stdout, nothing stored.
 * Without flags: interactive menu backed by PostgreSQL.
 */

import { config } from './config';
import { createPostgresPool, ensurePostgresConnection } from './config/database';
import { initSentry, reportError } from './config/sentry.config';
import { runCli } from './cli/run-cli';
import { InteractiveMenu } from './cli/menu';
import { ReadlinePrompter } from './cli/prompter';
import { PgTaxStore } from './repositories/pg-tax-store.repository';
import { CompanyService } from './services/company.service';
import { HistoryService } from './services/history.service';
import { logger } from './utils/logger';

export const EXIT_UNEXPECTED = 2;

async function runInteractive(): Promise<void> {
    const pool = createPostgresPool();
    const store = new PgTaxStore(pool);
    const prompter = new ReadlinePrompter();

    try {
        await ensurePostgresConnection(pool);
        await store.init();

        const menu = new InteractiveMenu(
            prompter,
            new CompanyService(store),
            new HistoryService(store),
            { fiscalYear: config.tax.fiscalYear, defaultVatRate: config.tax.defaultVatRate }
        );
        await menu.run();
        prompter.print('Goodbye!');
    } finally {
        prompter.close();
        await store.close();
    }
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
    if (argv.length > 0) {
        return runCli(argv);
    }
    await runInteractive();
    return 0;
}

async function start(): Promise<void> {
    initSentry();
    try {
        process.exitCode = await main();
    } catch (error) {
        logger.error('[App] Unexpected failure', error);
        await reportError(error);
        process.exitCode = EXIT_UNEXPECTED;
    }
}

if (require.main === module) {
    void start();
}

export { runCli } from './cli/run-cli';
export { partnershipTaxService, PartnershipTaxService } from './services/partnership-tax.service';
export { taxRulesService, TAX_RULES_2024, TAX_RULES_2025 } from './services/tax-rules.service';
export { irpefCalculatorService } from './services/irpef-calculator.service';
export { inpsCalculatorService } from './services/inps-calculator.service';
export { vatCalculatorService } from './services/vat-calculator.service';
export { partnerParserService } from './services/partner-parser.service';
export * from './types/tax.types';
export * from './utils/errors';
export type { CompanyFinancialInput, FinancialFigures, Partner, PartnerRole, VatMode } from './schemas/partnership.schema';
