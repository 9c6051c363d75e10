/**
 * Partnership Input Validation
 *
 * Four checks, run in order and failing fast, before any tax math:
 * 1. figures are finite and non-negative, vatRate within [0, 1]
 * 2. at least one partner, each with a unique name and a share in (0, 100]
 * 3. shares add up to 100
 * 4. every role is accomandante or accomandatario
 */

import { Value } from '@sinclair/typebox/value';
import type { TSchema } from '@sinclair/typebox';
import {
    CompanyFinancialInput,
    FinancialFiguresSchema,
    Partner,
    PartnerEntrySchema,
    PartnerRoleSchema,
    PartnerSchema,
    PARTNER_ROLES
} from '../schemas/partnership.schema';
import { ValidationError } from '../utils/errors';

export const SHARE_TOTAL = 100;
export const SHARE_TOTAL_TOLERANCE = 1e-6;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * `/partners/0/sharePercent` -> `partners[0].sharePercent`
 */
export function toFieldPath(pointer: string, prefix = ''): string {
    const segments = pointer.split('/').filter((segment) => segment.length > 0);
    let path = prefix;
    for (const segment of segments) {
        if (/^\d+$/.test(segment)) {
            path += `[${segment}]`;
        } else {
            path += path ? `.${segment}` : segment;
        }
    }
    return path || 'input';
}

function assertSchema(schema: TSchema, value: unknown, prefix = ''): void {
    const error = Value.Errors(schema, value).First();
    if (error) {
        throw new ValidationError(toFieldPath(error.path, prefix), error.message.toLowerCase());
    }
}

export class PartnershipValidatorService {
    /**
     * Validate raw input and return it typed. Throws ValidationError naming
     * the first offending field.
     */
    validate(input: unknown): CompanyFinancialInput {
        const rawPartners: unknown = isRecord(input) ? input.partners : undefined;

        // 1. Figures
        assertSchema(FinancialFiguresSchema, input);
        if (!Value.Check(FinancialFiguresSchema, input)) {
            throw new ValidationError('input', 'expected an object');
        }

        const partners = this.validatePartners(rawPartners);

        return {
            salesGross: input.salesGross,
            inputVat: input.inputVat,
            vatRate: input.vatRate,
            expenses: input.expenses,
            vatMode: input.vatMode ?? 'exclusive',
            partners
        };
    }

    /**
     * Checks 2 to 4 on their own, for saving a company profile
     */
    validatePartners(partners: unknown): Partner[] {
        // 2. Partner list
        if (!Array.isArray(partners)) {
            throw new ValidationError('partners', 'expected a list of partners');
        }
        const entries: unknown[] = partners;
        if (entries.length === 0) {
            throw new ValidationError('partners', 'at least one partner is required');
        }

        const seen = new Set<string>();
        let total = 0;
        for (const [index, entry] of entries.entries()) {
            const prefix = `partners[${index}]`;
            assertSchema(PartnerEntrySchema, entry, prefix);
            if (!Value.Check(PartnerEntrySchema, entry)) {
                throw new ValidationError(prefix, 'expected a partner');
            }
            if (seen.has(entry.name)) {
                throw new ValidationError(`${prefix}.name`, `duplicate partner "${entry.name}"`);
            }
            seen.add(entry.name);
            total += entry.sharePercent;
        }

        // 3. Share total
        if (Math.abs(total - SHARE_TOTAL) > SHARE_TOTAL_TOLERANCE) {
            throw new ValidationError('partners', `shares must add up to 100%, got ${total}%`);
        }

        // 4. Roles
        const validated: Partner[] = [];
        for (const [index, entry] of entries.entries()) {
            if (!Value.Check(PartnerSchema, entry)) {
                const role = isRecord(entry) ? String(entry.role) : '';
                throw new ValidationError(
                    `partners[${index}].role`,
                    `must be one of ${PARTNER_ROLES.join(', ')}, got "${role}"`
                );
            }
            validated.push({ name: entry.name, sharePercent: entry.sharePercent, role: entry.role });
        }
        return validated;
    }

    isRole(value: unknown): value is Partner['role'] {
        return Value.Check(PartnerRoleSchema, value);
    }

    sumShares(partners: readonly Pick<Partner, 'sharePercent'>[]): number {
        return partners.reduce((sum, partner) => sum + partner.sharePercent, 0);
    }

    sharesAddUp(partners: readonly Pick<Partner, 'sharePercent'>[]): boolean {
        return Math.abs(this.sumShares(partners) - SHARE_TOTAL) <= SHARE_TOTAL_TOLERANCE;
    }

    /**
     * Rescale shares proportionally so that they add up to 100
     */
    normalizeShares<T extends Pick<Partner, 'sharePercent'>>(partners: readonly T[]): T[] {
        const total = this.sumShares(partners);
        if (!(total > 0)) {
            throw new ValidationError('partners', 'cannot normalise shares that add up to 0');
        }
        const factor = SHARE_TOTAL / total;
        return partners.map((partner) => ({ ...partner, sharePercent: partner.sharePercent * factor }));
    }

    hasManagingPartner(partners: readonly Pick<Partner, 'role'>[]): boolean {
        return partners.some((partner) => partner.role === 'accomandatario');
    }
}

export const partnershipValidatorService = new PartnershipValidatorService();
