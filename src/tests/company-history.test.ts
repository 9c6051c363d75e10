/**
 * Company Profiles and Calculation History Test Suite
 */

import type { FinancialFigures } from '../schemas/partnership.schema';
import { CompanyService } from '../services/company.service';
import { HistoryService } from '../services/history.service';
import { NotFoundError, ValidationError } from '../utils/errors';
import { InMemoryTaxStore } from './support/in-memory-tax-store';
import { testUtils } from './setup';

const figures: FinancialFigures = { salesGross: 30_000, inputVat: 2_000, vatRate: 0.22, expenses: 10_000 };

describe('CompanyService', () => {
  let store: InMemoryTaxStore;
  let companies: CompanyService;

  beforeEach(() => {
    store = new InMemoryTaxStore();
    companies = new CompanyService(store);
  });

  test('should save a company under its trimmed name', async () => {
    const company = await companies.saveCompany('  Alfa Sas ', testUtils.partners());

    expect(company.id).toBe(1);
    expect(company.name).toBe('Alfa Sas');
    expect(await companies.getCompany('Alfa Sas')).toEqual(company);
  });

  test('should replace the partners of an existing company', async () => {
    const first = await companies.saveCompany('Alfa Sas', testUtils.partners());
    const second = await companies.saveCompany('Alfa Sas', [
      { name: 'Mario Rossi', sharePercent: 50, role: 'accomandatario' },
      { name: 'Anna Verdi', sharePercent: 50, role: 'accomandante' }
    ]);

    expect(second.id).toBe(first.id);
    expect((await companies.getCompanyById(first.id)).partners.map((partner) => partner.name))
      .toEqual(['Mario Rossi', 'Anna Verdi']);
    expect(await companies.listCompanies()).toHaveLength(1);
  });

  test('should reject an empty name', async () => {
    const error = await testUtils.catchAsyncError(() => companies.saveCompany('   ', testUtils.partners()));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ field: 'name' });
  });

  test('should refuse a company without an accomandatario', async () => {
    const partners = testUtils.partners().map((partner) => ({ ...partner, role: 'accomandante' as const }));
    const error = await testUtils.catchAsyncError(() => companies.saveCompany('Alfa Sas', partners));

    expect(error).toMatchObject({ message: 'Invalid partners: at least one accomandatario is required' });
    expect(await companies.listCompanies()).toEqual([]);
  });

  test('should reject shares that do not add up unless asked to normalise', async () => {
    const partners = [
      { name: 'A', sharePercent: 60, role: 'accomandatario' as const },
      { name: 'B', sharePercent: 60, role: 'accomandante' as const }
    ];

    await expect(companies.saveCompany('Alfa Sas', partners)).rejects.toThrow(ValidationError);

    const company = await companies.saveCompany('Alfa Sas', partners, { normalizeShares: true });
    expect(company.partners.map((partner) => partner.sharePercent)).toEqual([50, 50]);
  });

  test('should list companies by name', async () => {
    await companies.saveCompany('Zeta Sas', testUtils.partners());
    await companies.saveCompany('Alfa Sas', testUtils.partners());

    expect((await companies.listCompanies()).map((company) => company.name)).toEqual(['Alfa Sas', 'Zeta Sas']);
  });

  test('should fail with NotFoundError for unknown companies', async () => {
    const error = await testUtils.catchAsyncError(() => companies.getCompany('Beta'));

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ message: 'No company found for "Beta"' });
    await expect(companies.getCompanyById(99)).rejects.toThrow(NotFoundError);
    await expect(companies.deleteCompany(99)).rejects.toThrow(NotFoundError);
  });

  test('should delete a company with its history', async () => {
    const company = await companies.saveCompany('Alfa Sas', testUtils.partners());
    const history = new HistoryService(store);
    await history.save(company, 'Q1', history.calculate(company, figures, 2025));

    await companies.deleteCompany(company.id);

    expect(await companies.listCompanies()).toEqual([]);
    expect(await history.list()).toEqual([]);
  });
});

describe('HistoryService', () => {
  let store: InMemoryTaxStore;
  let companies: CompanyService;
  let history: HistoryService;

  beforeEach(() => {
    store = new InMemoryTaxStore();
    companies = new CompanyService(store);
    history = new HistoryService(store);
  });

  test('should calculate for a company without saving', async () => {
    const company = await companies.saveCompany('Alfa Sas', testUtils.partners());
    const { input, result } = history.calculate(company, figures, 2025);

    expect(input).toEqual({ ...figures, vatMode: 'exclusive', partners: testUtils.partners() });
    expect(result.taxableProfit).toBe(20_000);
    expect(result.totalIrpef).toBeCloseTo(4_600, 6);
    expect(await history.list()).toEqual([]);
  });

  test('should fail for a year without tables', async () => {
    const company = await companies.saveCompany('Alfa Sas', testUtils.partners());

    expect(() => history.calculate(company, figures, 1999)).toThrow(ValidationError);
  });

  test('should save and reload a calculation', async () => {
    const company = await companies.saveCompany('Alfa Sas', testUtils.partners());
    const summary = await history.save(company, ' Q1 2025 ', history.calculate(company, figures, 2025));

    expect(summary).toMatchObject({ name: 'Q1 2025', companyId: company.id, companyName: 'Alfa Sas', fiscalYear: 2025 });

    const record = await history.load(summary.id);
    expect(record.taxableProfit).toBe(20_000);
    expect(record.lines.map((line) => line.name)).toEqual(['Mario Rossi', 'Luigi Bianchi']);
    expect(record.lines[0].irpefDue).toBeCloseTo(3_220, 6);
  });

  test('should reject an empty calculation name', async () => {
    const company = await companies.saveCompany('Alfa Sas', testUtils.partners());

    await expect(history.save(company, '  ', history.calculate(company, figures, 2025))).rejects.toThrow(ValidationError);
  });

  test('should list newest first and filter by company', async () => {
    const alfa = await companies.saveCompany('Alfa Sas', testUtils.partners());
    const beta = await companies.saveCompany('Beta Sas', testUtils.partners());
    await history.save(alfa, 'First', history.calculate(alfa, figures, 2025));
    await history.save(beta, 'Second', history.calculate(beta, figures, 2025));
    await history.save(alfa, 'Third', history.calculate(alfa, figures, 2025));

    expect((await history.list()).map((entry) => entry.name)).toEqual(['Third', 'Second', 'First']);
    expect((await history.list(alfa.id)).map((entry) => entry.name)).toEqual(['Third', 'First']);
  });

  test('should recompute from the stored snapshot, not the current partners', async () => {
    const company = await companies.saveCompany('Alfa Sas', testUtils.partners());
    const summary = await history.save(company, 'Q1', history.calculate(company, figures, 2025));
    await companies.saveCompany('Alfa Sas', [
      { name: 'Mario Rossi', sharePercent: 50, role: 'accomandatario' },
      { name: 'Anna Verdi', sharePercent: 50, role: 'accomandante' }
    ]);

    const { record, result } = await history.recompute(summary.id);

    expect(record.id).toBe(summary.id);
    expect(result.fiscalYear).toBe(2025);
    expect(result.perPartner.map((line) => [line.name, line.sharePercent])).toEqual([
      ['Mario Rossi', 70],
      ['Luigi Bianchi', 30]
    ]);
    expect(result.totalIrpef).toBeCloseTo(record.totalIrpef, 6);
  });

  test('should recompute under another fiscal year', async () => {
    const company = await companies.saveCompany('Alfa Sas', testUtils.partners());
    const summary = await history.save(company, 'Q1', history.calculate(company, { ...figures, salesGross: 100_000, expenses: 40_000 }, 2025));

    const { result } = await history.recompute(summary.id, 2024);

    expect(result.fiscalYear).toBe(2024);
    expect(result.perPartner[0].irpefDue).toBeCloseTo(11_340, 6);
  });

  test('should delete a calculation and fail on unknown ids', async () => {
    const company = await companies.saveCompany('Alfa Sas', testUtils.partners());
    const summary = await history.save(company, 'Q1', history.calculate(company, figures, 2025));

    await history.delete(summary.id);

    expect(await history.list()).toEqual([]);
    await expect(history.delete(summary.id)).rejects.toThrow(NotFoundError);
    await expect(history.load(42)).rejects.toThrow('No calculation found for 42');
  });
});
