/**
 * Company Profiles
 * Create, update and remove S.a.s. profiles in the store
 */

import type { Partner } from '../schemas/partnership.schema';
import { CompanyRecord, CompanySummary, TaxStore } from '../repositories/tax-store.repository';
import { NotFoundError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { partnershipValidatorService, PartnershipValidatorService } from './partnership-validator.service';

export interface SaveCompanyOptions {
    /** Rescale shares that do not add up to 100 instead of rejecting them */
    normalizeShares?: boolean;
}

export class CompanyService {
    constructor(
        private readonly store: TaxStore,
        private readonly validator: PartnershipValidatorService = partnershipValidatorService
    ) {}

    /**
     * Save a company profile. An existing company with the same name gets its
     * partners replaced.
     */
    async saveCompany(name: string, partners: readonly Partner[], options: SaveCompanyOptions = {}): Promise<CompanyRecord> {
        const companyName = name.trim();
        if (!companyName) {
            throw new ValidationError('name', 'company name is empty');
        }

        const shares = options.normalizeShares && !this.validator.sharesAddUp(partners)
            ? this.validator.normalizeShares(partners)
            : partners;
        const validated = this.validator.validatePartners(shares);

        // An S.a.s. always has at least one general partner
        if (!this.validator.hasManagingPartner(validated)) {
            throw new ValidationError('partners', 'at least one accomandatario is required');
        }

        const existing = await this.store.loadCompany(companyName);
        if (existing) {
            logger.info(`[Company] "${companyName}" exists, replacing its partners`);
        }

        return this.store.saveCompany(companyName, validated);
    }

    async getCompany(name: string): Promise<CompanyRecord> {
        const company = await this.store.loadCompany(name);
        if (!company) {
            throw new NotFoundError('company', name);
        }
        return company;
    }

    async getCompanyById(id: number): Promise<CompanyRecord> {
        const company = await this.store.loadCompanyById(id);
        if (!company) {
            throw new NotFoundError('company', id);
        }
        return company;
    }

    listCompanies(): Promise<CompanySummary[]> {
        return this.store.listCompanies();
    }

    async deleteCompany(id: number): Promise<void> {
        const deleted = await this.store.deleteCompany(id);
        if (!deleted) {
            throw new NotFoundError('company', id);
        }
        logger.info('[Company] Deleted', { id });
    }
}
