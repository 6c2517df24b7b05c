import {
    fieldNames,
    LooseEntry,
    Pacs004Message,
    Pacs008Message,
    Pacs009Message,
    Pain001Message,
    Pain008Message,
    Camt004Message,
    Camt052Message,
    Camt053Message,
    Camt054Message,
    Setr004Message,
    RecordKind,
    RecordOfKind,
    Setr010Message,
    TypedRecord,
} from './records.js';

/**
 * Capability guards. Callers branch on what a record can do rather than
 * probing for attributes.
 */

export function isRecordOf<K extends RecordKind>(record: TypedRecord, kind: K): record is RecordOfKind<K> {
    return record.kind === kind;
}

export type TransactionListRecord =
    | Pacs008Message | Pacs004Message | Pacs009Message
    | Pain001Message | Pain008Message;
export type EntryListRecord = Camt052Message | Camt053Message | Camt054Message;
export type BalanceListRecord = Camt053Message | Camt004Message;
export type OrderListRecord = Setr004Message | Setr010Message;

export function hasTransactionList(record: TypedRecord): record is TransactionListRecord {
    switch (record.kind) {
        case 'pacs.008':
        case 'pacs.004':
        case 'pacs.009':
        case 'pain.001':
        case 'pain.008':
            return true;
        default:
            return false;
    }
}

export function hasEntryList(record: TypedRecord): record is EntryListRecord {
    return record.kind === 'camt.052' || record.kind === 'camt.053' || record.kind === 'camt.054';
}

export function hasBalanceList(record: TypedRecord): record is BalanceListRecord {
    return record.kind === 'camt.053' || record.kind === 'camt.004';
}

export function hasOrderList(record: TypedRecord): record is OrderListRecord {
    return record.kind === 'setr.004' || record.kind === 'setr.010';
}

/**
 * The transaction-like list of a record: credit transfer transactions or
 * initiation payment information. Empty for every other variant.
 */
export function transactionEntries(record: TypedRecord): LooseEntry[] {
    if (!hasTransactionList(record)) {
        return [];
    }
    return record.kind === 'pain.001' || record.kind === 'pain.008'
        ? record.paymentInformation
        : record.transactions;
}

export type DictValue = string | number | null | string[] | LooseEntry[] | Record<string, string | string[] | null>;

function toDictValue(value: unknown): DictValue {
    if (value === undefined || value === null) return null;
    if (typeof value === 'string' || typeof value === 'number') return value;
    if (Array.isArray(value)) {
        if (value.every((item): item is string => typeof item === 'string')) {
            return [...value];
        }
        return value.filter(isLooseEntry).map(entry => ({ ...entry }));
    }
    if (typeof value === 'object') {
        const nested: Record<string, string | string[] | null> = {};
        for (const [key, inner] of Object.entries(value)) {
            if (typeof inner === 'string') nested[key] = inner;
            else if (Array.isArray(inner)) nested[key] = inner.filter((item): item is string => typeof item === 'string');
            else nested[key] = null;
        }
        return nested;
    }
    return String(value);
}

function isLooseEntry(value: unknown): value is LooseEntry {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
        && Object.values(value).every(inner => inner === null || typeof inner === 'string');
}

/**
 * Plain-object view of a record: `kind` plus every declared field of its
 * variant, absent ones as `null`.
 */
export function toDict(record: TypedRecord): Record<string, DictValue> {
    const values: Record<string, unknown> = record;
    const dict: Record<string, DictValue> = { kind: record.kind };
    for (const name of fieldNames(record.kind)) {
        dict[name] = toDictValue(values[name]);
    }
    return dict;
}
