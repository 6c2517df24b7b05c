import { LooseEntry, transactionEntries, TypedRecord } from '../model/index.js';

/**
 * Content checks on a typed record. Each check returns an error message or
 * undefined; absent values are never errors.
 */

const BIC_PATTERN = /^[A-Z]{4}[A-Z]{2}[A-Z0-9]{2}([A-Z0-9]{3})?$/;
const UETR_V4_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
const CURRENCY_PATTERN = /^[A-Za-z]{3}$/;
const IBAN_SHAPE = /^[A-Z]{2}\d{2}[A-Z0-9]{11,30}$/;

export function isBic(value: string): boolean {
    return BIC_PATTERN.test(value);
}

export function checkBic(bic: string | undefined): string | undefined {
    if (!bic) {
        return undefined;
    }
    const value = bic.trim();
    if (!isBic(value)) {
        return `Invalid BIC format: '${value}'. Must match ISO 9362 (8 or 11 characters).`;
    }
    return undefined;
}

export function checkUetr(uetr: string | undefined): string | undefined {
    if (uetr === undefined) {
        return undefined;
    }
    return UETR_V4_PATTERN.test(uetr.trim()) ? undefined : `Invalid UETR format: '${uetr}'`;
}

/** A blank currency is an error; an absent one is not */
export function checkCurrency(currency: string | undefined): string | undefined {
    if (currency === undefined) {
        return undefined;
    }
    return CURRENCY_PATTERN.test(currency) ? undefined : `Invalid currency code: '${currency}'`;
}

/** Uppercase alphanumerics only */
export function cleanIban(value: string): string {
    return value.toUpperCase().replace(/[^A-Z0-9]/g, '');
}

/**
 * ISO 13616 remainder: country and check digits moved to the end, letters
 * expanded to two digits, mod 97 taken over 7-digit chunks.
 */
export function ibanRemainder(iban: string): number {
    const rearranged = iban.slice(4) + iban.slice(0, 4);
    let numeral = '';
    for (const char of rearranged) {
        const code = char.charCodeAt(0);
        numeral += code >= 65 && code <= 90 ? String(code - 55) : char;
    }
    let remainder = 0;
    for (let i = 0; i < numeral.length; i += 7) {
        remainder = Number.parseInt(`${remainder}${numeral.slice(i, i + 7)}`, 10) % 97;
    }
    return remainder;
}

/**
 * Only IBAN-shaped values are checked; domestic account numbers pass untouched.
 */
export function checkIban(account: string | null | undefined): string | undefined {
    if (!account) {
        return undefined;
    }
    const iban = cleanIban(account);
    if (!IBAN_SHAPE.test(iban)) {
        return undefined;
    }
    return ibanRemainder(iban) === 1 ? undefined : `Invalid IBAN checksum: '${iban}'. Failed Modulo-97 check.`;
}

function prefixed(prefix: string, error: string | undefined): string[] {
    return error ? [`[${prefix}] ${error}`] : [];
}

function transactionErrors(entries: LooseEntry[]): string[] {
    return entries.flatMap((entry, index) => [
        ...prefixed(`Transaction ${index} Debtor Account`, checkIban(entry.debtorAccount)),
        ...prefixed(`Transaction ${index} Creditor Account`, checkIban(entry.creditorAccount)),
    ]);
}

/**
 * Every business rule over one record, errors in a fixed order: routing BICs,
 * UETR, currency, account IBANs, then transaction-list IBANs.
 */
export function businessRuleErrors(record: TypedRecord): string[] {
    return [
        ...prefixed('Sender', checkBic(record.senderBic)),
        ...prefixed('Receiver', checkBic(record.receiverBic)),
        ...prefixed('UETR', checkUetr(record.uetr)),
        ...prefixed('Currency', checkCurrency(record.currency)),
        ...prefixed('Debtor Account', checkIban(record.debtorAccount)),
        ...prefixed('Creditor Account', checkIban(record.creditorAccount)),
        ...transactionErrors(transactionEntries(record)),
    ];
}
