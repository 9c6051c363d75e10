import type { PartnerRole } from '../schemas/partnership.schema';
import { InpsRule } from '../types/tax.types';
import { ValidationError } from '../utils/errors';

/**
 * INPS contributions for the managing partner.
 * Flat rate on the share above the threshold; no ceiling, no fixed minimum.
 * Limited partners (accomandanti) owe nothing.
 */
export class InpsCalculatorService {
    calculate(profitShare: number, role: PartnerRole, rule: InpsRule): number {
        if (!Number.isFinite(profitShare) || profitShare < 0) {
            throw new ValidationError('profitShare', `INPS needs a non-negative share, got ${profitShare}`);
        }
        if (!this.isLiable(role)) {
            return 0;
        }
        return Math.max(0, profitShare - rule.threshold) * rule.rate;
    }

    isLiable(role: PartnerRole): boolean {
        return role === 'accomandatario';
    }
}

export const inpsCalculatorService = new InpsCalculatorService();
