import { Partner, PARTNER_ROLES } from '../schemas/partnership.schema';
import { ParseError } from '../utils/errors';
import { parseDecimal } from '../utils/numbers';
import { partnershipValidatorService } from './partnership-validator.service';

/**
 * Reads `name:share_percent:role` partner flags, e.g.
 * `Mario Rossi:70:accomandatario`. The role token is case-insensitive.
 */
export class PartnerParserService {
    parse(raw: string): Partner {
        const parts = raw.split(':');
        if (parts.length !== 3) {
            throw new ParseError(raw, 'partner must be in the form name:share_percent:role');
        }

        const [rawName, rawShare, rawRole] = parts;
        const name = rawName.trim();
        if (!name) {
            throw new ParseError(raw, 'partner name is empty');
        }

        const sharePercent = parseDecimal(rawShare);
        if (sharePercent === null) {
            throw new ParseError(raw, `share "${rawShare}" is not a number`);
        }

        const role = rawRole.trim().toLowerCase();
        if (!partnershipValidatorService.isRole(role)) {
            throw new ParseError(raw, `role must be ${PARTNER_ROLES.map((r) => `'${r}'`).join(' or ')}`);
        }

        return { name, sharePercent, role };
    }

    parseAll(raws: readonly string[]): Partner[] {
        return raws.map((raw) => this.parse(raw));
    }
}

export const partnerParserService = new PartnerParserService();
