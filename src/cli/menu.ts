/**
 * Interactive Menu
 *
 * Prompt-driven front end: new calculations, company profiles and the
 * calculation history. Invalid answers are re-asked; engine validation
 * errors are shown and the flow returns to the previous menu.
 */

import type { FinancialFigures, Partner, PartnerRole } from '../schemas/partnership.schema';
import { CompanyRecord } from '../repositories/tax-store.repository';
import { CompanyService } from '../services/company.service';
import { HistoryService, CalculationOutcome } from '../services/history.service';
import { partnershipValidatorService } from '../services/partnership-validator.service';
import { formatPercent, reportFormatterService, ReportFormatterService } from '../services/report-formatter.service';
import { describeError, isUserFacingError } from '../utils/errors';
import { parseDecimal } from '../utils/numbers';
import { InputClosedError, Prompter } from './prompter';

const YES = ['s', 'si', 'sì', 'y', 'yes'];
const NO = ['n', 'no'];

export interface MenuSettings {
    fiscalYear: number;
    defaultVatRate: number;
}

export class InteractiveMenu {
    constructor(
        private readonly prompter: Prompter,
        private readonly companies: CompanyService,
        private readonly history: HistoryService,
        private readonly settings: MenuSettings,
        private readonly formatter: ReportFormatterService = reportFormatterService
    ) {}

    /**
     * Main loop. Returns on "Exit" or when input ends.
     */
    async run(): Promise<void> {
        try {
            await this.mainMenu();
        } catch (error) {
            if (!(error instanceof InputClosedError)) {
                throw error;
            }
            this.prompter.print('');
        }
    }

    private async mainMenu(): Promise<void> {
        for (;;) {
            this.prompter.print('\n===== S.a.s. Tax Calculator =====');
            this.prompter.print('1. New calculation');
            this.prompter.print('2. Manage companies');
            this.prompter.print('3. Calculation history');
            this.prompter.print('0. Exit');

            const choice = await this.askInteger('Choose an option: ');
            switch (choice) {
                case 0:
                    return;
                case 1:
                    await this.guarded(() => this.newCalculation());
                    break;
                case 2:
                    await this.guarded(() => this.manageCompanies());
                    break;
                case 3:
                    await this.guarded(() => this.calculationHistory());
                    break;
                default:
                    this.prompter.print('Invalid choice.');
            }
        }
    }

    async newCalculation(): Promise<void> {
        const company = await this.selectOrCreateCompany();
        if (!company) {
            return;
        }

        this.prompter.print(`\n===== New calculation for ${company.name} =====`);
        const figures = await this.askFigures();
        await this.runCalculation(company, figures, this.settings.fiscalYear);
    }

    async manageCompanies(): Promise<void> {
        for (;;) {
            this.prompter.print('\n===== Manage Companies =====');
            const company = await this.pickCompany();
            if (!company) {
                return;
            }

            this.prompter.print(`\n===== Company: ${company.name} =====`);
            this.prompter.print('Partners:');
            for (const partner of company.partners) {
                this.prompter.print(`  - ${this.formatter.formatPartner(partner)}`);
            }
            this.prompter.print('\n1. Edit partners');
            this.prompter.print('2. Delete company');
            this.prompter.print('0. Back');

            const choice = await this.askInteger('Choose an option: ');
            if (choice === 1) {
                const updated = await this.createCompany(company.name);
                if (updated) {
                    this.prompter.print('Company updated.');
                }
            } else if (choice === 2) {
                if (await this.askYesNo(`Delete company '${company.name}' and its history? (y/n): `)) {
                    await this.companies.deleteCompany(company.id);
                    this.prompter.print('Company deleted.');
                }
            } else if (choice !== 0) {
                this.prompter.print('Invalid choice.');
            }
        }
    }

    async calculationHistory(): Promise<void> {
        for (;;) {
            this.prompter.print('\n===== Calculation History =====');
            const calculations = await this.history.list();
            if (calculations.length === 0) {
                this.prompter.print('No saved calculations.');
                return;
            }

            calculations.forEach((calculation, index) => {
                this.prompter.print(this.formatter.formatCalculationSummary(calculation, index + 1));
            });
            this.prompter.print('\n0. Back');

            const choice = await this.askInteger('Choose a calculation (0 to go back): ');
            if (choice === 0) {
                return;
            }
            const summary = calculations[choice - 1];
            if (!summary) {
                this.prompter.print('Invalid choice.');
                continue;
            }

            const record = await this.history.load(summary.id);
            this.prompter.print('');
            this.prompter.print(this.formatter.formatCalculationRecord(record));
            this.prompter.print('\n1. Repeat this calculation');
            this.prompter.print('2. Delete this calculation');
            this.prompter.print('0. Back');

            const action = await this.askInteger('Choose an option: ');
            if (action === 1) {
                const company = await this.companies.getCompanyById(record.companyId);
                const { input, result } = await this.history.recompute(record.id);
                await this.showAndOfferSave(company, { input, result });
            } else if (action === 2) {
                if (await this.askYesNo('Delete this calculation? (y/n): ')) {
                    await this.history.delete(record.id);
                    this.prompter.print('Calculation deleted.');
                }
            } else if (action !== 0) {
                this.prompter.print('Invalid choice.');
            }
        }
    }

    private async selectOrCreateCompany(): Promise<CompanyRecord | null> {
        this.prompter.print('\n===== Select Company =====');
        this.prompter.print('1. Use an existing company');
        this.prompter.print('2. Create a new company');
        this.prompter.print('0. Back');

        const choice = await this.askInteger('Choose an option: ');
        switch (choice) {
            case 0:
                return null;
            case 1:
                return this.pickCompany();
            case 2:
                return this.createCompany();
            default:
                this.prompter.print('Invalid choice.');
                return null;
        }
    }

    private async pickCompany(): Promise<CompanyRecord | null> {
        const companies = await this.companies.listCompanies();
        if (companies.length === 0) {
            this.prompter.print('No saved companies.');
            return null;
        }

        companies.forEach((company, index) => {
            this.prompter.print(this.formatter.formatCompanySummary(company, index + 1));
        });
        this.prompter.print('\n0. Back');

        const choice = await this.askInteger('Choose a company (0 to go back): ');
        if (choice === 0) {
            return null;
        }
        const summary = companies[choice - 1];
        if (!summary) {
            this.prompter.print('Invalid choice.');
            return null;
        }
        return this.companies.getCompanyById(summary.id);
    }

    /**
     * @param fixedName - Keep this name (editing an existing company)
     */
    private async createCompany(fixedName?: string): Promise<CompanyRecord | null> {
        this.prompter.print(fixedName ? `\n===== Edit Company: ${fixedName} =====` : '\n===== New Company =====');

        const name = fixedName ?? await this.askName('Company name: ');
        const count = await this.askPositiveInteger('Number of partners: ');

        const partners: Partner[] = [];
        for (let i = 1; i <= count; i += 1) {
            const partnerName = await this.askUniqueName(`Partner #${i} name: `, partners);
            const sharePercent = await this.askNumber(`Share percentage for '${partnerName}' (e.g. 80): `);
            const role = await this.askRole(`Role of '${partnerName}' ('accomandante' or 'accomandatario'): `);
            partners.push({ name: partnerName, sharePercent, role });
        }

        let normalizeShares = false;
        if (!partnershipValidatorService.sharesAddUp(partners)) {
            const total = partnershipValidatorService.sumShares(partners);
            this.prompter.print(`Warning: shares add up to ${formatPercent(total)}, not 100%.`);
            if (!await this.askYesNo('Normalise shares to 100%? (y/n): ')) {
                this.prompter.print('Cancelled.');
                return null;
            }
            normalizeShares = true;
        }

        if (!partnershipValidatorService.hasManagingPartner(partners)) {
            this.prompter.print('Error: an S.a.s. needs at least one accomandatario partner.');
            return null;
        }

        try {
            const company = await this.companies.saveCompany(name, partners, { normalizeShares });
            this.prompter.print(`Company '${company.name}' saved.`);
            return company;
        } catch (error) {
            if (isUserFacingError(error)) {
                this.prompter.print(`Error: ${describeError(error)}`);
                return null;
            }
            throw error;
        }
    }

    private async runCalculation(company: CompanyRecord, figures: FinancialFigures, fiscalYear: number): Promise<void> {
        let outcome: CalculationOutcome;
        try {
            outcome = this.history.calculate(company, figures, fiscalYear);
        } catch (error) {
            if (isUserFacingError(error)) {
                this.prompter.print(`Error: ${describeError(error)}`);
                return;
            }
            throw error;
        }
        await this.showAndOfferSave(company, outcome);
    }

    private async showAndOfferSave(company: CompanyRecord, outcome: CalculationOutcome): Promise<void> {
        this.prompter.print('');
        this.prompter.print(this.formatter.formatTaxReport(outcome.result));

        if (await this.askYesNo('\nSave this calculation to history? (y/n): ')) {
            const name = await this.askName('Name for this calculation: ');
            await this.history.save(company, name, outcome);
            this.prompter.print(`Calculation '${name}' saved.`);
        }
    }

    private async askFigures(): Promise<FinancialFigures> {
        const salesGross = await this.askNumber('Gross sales €: ');
        const vatInclusive = await this.askYesNo('Do gross sales include VAT? (y/n): ');
        const inputVat = await this.askNumber('VAT paid on purchases €: ');
        const vatRate = await this.askNumber(
            `VAT rate on sales (e.g. 0.22, blank for ${this.settings.defaultVatRate}): `,
            this.settings.defaultVatRate
        );
        const expenses = await this.askNumber('Total expenses (VAT excluded) €: ');

        return {
            salesGross,
            inputVat,
            vatRate,
            expenses,
            vatMode: vatInclusive ? 'inclusive' : 'exclusive'
        };
    }

    /**
     * Show user-facing errors and return to the main menu
     */
    private async guarded(flow: () => Promise<void>): Promise<void> {
        try {
            await flow();
        } catch (error) {
            if (!isUserFacingError(error)) {
                throw error;
            }
            this.prompter.print(`Error: ${describeError(error)}`);
        }
    }

    private async askNumber(question: string, fallback?: number): Promise<number> {
        for (;;) {
            const answer = (await this.prompter.ask(question)).trim();
            if (answer === '' && fallback !== undefined) {
                return fallback;
            }
            const value = parseDecimal(answer.replace(',', '.'));
            if (value !== null) {
                return value;
            }
            this.prompter.print('Error: enter a valid number.');
        }
    }

    private async askInteger(question: string): Promise<number> {
        for (;;) {
            const answer = (await this.prompter.ask(question)).trim();
            if (/^-?\d+$/.test(answer)) {
                return Number(answer);
            }
            this.prompter.print('Error: enter a whole number.');
        }
    }

    private async askPositiveInteger(question: string): Promise<number> {
        for (;;) {
            const value = await this.askInteger(question);
            if (value > 0) {
                return value;
            }
            this.prompter.print('Error: enter a number greater than 0.');
        }
    }

    private async askYesNo(question: string): Promise<boolean> {
        for (;;) {
            const answer = (await this.prompter.ask(question)).trim().toLowerCase();
            if (YES.includes(answer)) {
                return true;
            }
            if (NO.includes(answer)) {
                return false;
            }
            this.prompter.print("Error: answer 'y' or 'n'.");
        }
    }

    private async askName(question: string): Promise<string> {
        for (;;) {
            const name = (await this.prompter.ask(question)).trim();
            if (name) {
                return name;
            }
            this.prompter.print('Error: the name cannot be empty.');
        }
    }

    private async askUniqueName(question: string, partners: readonly Partner[]): Promise<string> {
        for (;;) {
            const name = await this.askName(question);
            if (!partners.some((partner) => partner.name === name)) {
                return name;
            }
            this.prompter.print(`Error: partner '${name}' already exists.`);
        }
    }

    private async askRole(question: string): Promise<PartnerRole> {
        for (;;) {
            const role = (await this.prompter.ask(question)).trim().toLowerCase();
            if (partnershipValidatorService.isRole(role)) {
                return role;
            }
            this.prompter.print("Error: invalid role. Use 'accomandante' or 'accomandatario'.");
        }
    }
}
