/**
 * Partnership Input Schemas
 * Using TypeBox for runtime validation
 */

import { Type } from '@sinclair/typebox';
import type { Static } from '@sinclair/typebox';

export const PARTNER_ROLES = ['accomandante', 'accomandatario'] as const;

// Limited partner / managing partner
export const PartnerRoleSchema = Type.Union([
    Type.Literal('accomandante'),
    Type.Literal('accomandatario')
]);

export type PartnerRole = Static<typeof PartnerRoleSchema>;

// How salesGross relates to VAT
export const VatModeSchema = Type.Union([
    Type.Literal('exclusive'),
    Type.Literal('inclusive')
]);

export type VatMode = Static<typeof VatModeSchema>;

const MoneySchema = Type.Number({ minimum: 0 });

export const PartnerSchema = Type.Object({
    name: Type.String({ minLength: 1 }),
    sharePercent: Type.Number({ exclusiveMinimum: 0, maximum: 100 }),
    role: PartnerRoleSchema
});

export type Partner = Static<typeof PartnerSchema>;

// Same as PartnerSchema with the role left open, so that an unknown role is
// reported after the share total
export const PartnerEntrySchema = Type.Object({
    name: Type.String({ minLength: 1 }),
    sharePercent: Type.Number({ exclusiveMinimum: 0, maximum: 100 }),
    role: Type.String()
});

export const FinancialFiguresSchema = Type.Object({
    salesGross: MoneySchema,
    inputVat: MoneySchema,
    vatRate: Type.Number({ minimum: 0, maximum: 1 }),
    expenses: MoneySchema,
    vatMode: Type.Optional(VatModeSchema)
});

export type FinancialFigures = Static<typeof FinancialFiguresSchema>;

export const CompanyFinancialInputSchema = Type.Composite([
    FinancialFiguresSchema,
    Type.Object({
        partners: Type.Array(PartnerSchema, { minItems: 1 })
    })
]);

export type CompanyFinancialInput = Static<typeof CompanyFinancialInputSchema>;
