import { FamilyKey, LooseEntry, PaymentFields, RecordOfKind } from '../../model/index.js';
import { XmlFieldExtractor } from '../../extract/xmlFieldExtractor.js';

/**
 * A family routine reads the family-specific fields of a document and
 * returns the specialised record, seeded with the base payment fields.
 */
export type FamilyRoutine<K extends FamilyKey> = (x: XmlFieldExtractor, base: PaymentFields) => RecordOfKind<K>;

/** Nested list entry: absent values become null */
export function looseEntry(values: Record<string, string | undefined>): LooseEntry {
    const entry: LooseEntry = {};
    for (const [key, value] of Object.entries(values)) {
        entry[key] = value ?? null;
    }
    return entry;
}

export function toInteger(value: string | undefined): number | undefined {
    return value !== undefined && /^\d+$/.test(value) ? parseInt(value, 10) : undefined;
}

export const bicOf = (element: string) =>
    `${element}/FinInstnId/BICFI | ${element}/FinInstnId/BIC`;

export const accountOf = (element: string) =>
    `${element}/Id/IBAN | ${element}/Id/Othr/Id`;

/** Amount and currency of an amount element carrying a Ccy attribute */
export function amountOf(x: XmlFieldExtractor, path: string, context?: Element): { amount?: string; currency?: string } {
    return {
        amount: x.text(path, context),
        currency: x.attribute(path, 'Ccy', context),
    };
}
