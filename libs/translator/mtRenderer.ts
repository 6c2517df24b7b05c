import { hasBalanceList, hasEntryList, LooseEntry, PostalAddress, transactionEntries, TypedRecord } from '../model/index.js';
import { logicalTerminal, mtDate, toMtAmount } from './swiftFormat.js';

/**
 * Typed record to SWIFT MT block text, one fixed Block 4 layout per type.
 */

export const MT_TYPES = ['101', '103', '202', '900', '910', '940', '942', '950'] as const;
export type MtType = typeof MT_TYPES[number];

export function isMtType(value: string): value is MtType {
    return MT_TYPES.some(type => type === value);
}

export interface MtRenderContext {
    now: Date;
    placeholderBic: string;
    generateUetr: () => string;
}

const NOT_AVAILABLE = 'N/A';
const NO_REFERENCE = 'NONREF';

function valueDatedAmount(record: TypedRecord, now: Date): string {
    return `${mtDate(undefined, now)}${record.currency ?? 'USD'}${toMtAmount(record.amount)}`;
}

/** Party field: optional /account line, name, then up to three address lines */
function partyField(tag: string, account: string | null | undefined, name: string | null | undefined, address?: PostalAddress): string[] {
    const lines = account
        ? [`:${tag}:/${account}`, name ?? NOT_AVAILABLE]
        : [`:${tag}:${name ?? NOT_AVAILABLE}`];
    return [...lines, ...(address?.addressLines ?? []).slice(0, 3)];
}

function remittanceOf(record: TypedRecord): string | undefined {
    return transactionEntries(record)[0]?.remittanceInfo ?? undefined;
}

function accountIdOf(record: TypedRecord): string | undefined {
    if (hasEntryList(record) || record.kind === 'camt.004') {
        return record.accountId;
    }
    return undefined;
}

function body103(record: TypedRecord, ctx: MtRenderContext): string[] {
    const remittance = remittanceOf(record);
    return [
        `:20:${record.messageId ?? NO_REFERENCE}`,
        ':23B:CRED',
        `:32A:${valueDatedAmount(record, ctx.now)}`,
        ...partyField('50K', record.debtorAccount, record.debtorName, record.debtorAddress),
        ...partyField('59', record.creditorAccount, record.creditorName, record.creditorAddress),
        ...(remittance ? [`:70:${remittance}`] : []),
        ':71A:SHA',
    ];
}

function body202(record: TypedRecord, ctx: MtRenderContext): string[] {
    return [
        `:20:${record.messageId ?? NO_REFERENCE}`,
        `:21:${record.endToEndId ?? NO_REFERENCE}`,
        `:32A:${valueDatedAmount(record, ctx.now)}`,
        ...(record.senderBic ? [`:52A:${record.senderBic}`] : []),
        ...partyField('58A', record.creditorAccount, record.receiverBic ?? record.creditorName),
    ];
}

function bodyConfirmation(record: TypedRecord, ctx: MtRenderContext, account: string | undefined): string[] {
    return [
        `:20:${record.messageId ?? NO_REFERENCE}`,
        `:21:${record.endToEndId ?? NO_REFERENCE}`,
        `:25:${account ?? accountIdOf(record) ?? NOT_AVAILABLE}`,
        `:32A:${valueDatedAmount(record, ctx.now)}`,
    ];
}

function body101(record: TypedRecord, ctx: MtRenderContext): string[] {
    const listed = record.kind === 'pain.001' || record.kind === 'pain.008'
        ? record.paymentInformation
        : [];
    const transactions: LooseEntry[] = listed.length > 0 ? listed : [{
        endToEndId: record.endToEndId ?? null,
        amount: record.amount ?? null,
        currency: record.currency ?? null,
        creditorName: record.creditorName ?? null,
        creditorAccount: record.creditorAccount ?? null,
    }];

    const lines = [
        `:20:${record.messageId ?? NO_REFERENCE}`,
        ':28D:1/1',
        ...partyField('50H', record.debtorAccount, record.debtorName, record.debtorAddress),
        `:30:${mtDate(transactions[0].requestedExecutionDate, ctx.now)}`,
    ];
    for (const tx of transactions) {
        lines.push(
            `:21:${tx.endToEndId ?? NO_REFERENCE}`,
            `:32B:${tx.currency ?? record.currency ?? 'USD'}${toMtAmount(tx.amount ?? record.amount)}`,
            ...partyField('59', tx.creditorAccount, tx.creditorName),
        );
        if (tx.remittanceInfo) {
            lines.push(`:70:${tx.remittanceInfo}`);
        }
        lines.push(':71A:SHA');
    }
    return lines;
}

function statementLine(entry: LooseEntry, now: Date): string {
    const mark = entry.creditDebitIndicator === 'DBIT' ? 'D' : 'C';
    const entryDate = entry.entryDate && /^\d{4}$/.test(entry.entryDate) ? entry.entryDate : '';
    const servicerReference = entry.accountServicerReference ? `//${entry.accountServicerReference}` : '';
    return `:61:${mtDate(entry.valueDate ?? entry.bookingDate, now)}${entryDate}${mark}`
        + `${toMtAmount(entry.amount ?? '0')}${entry.transactionType ?? 'NTRF'}`
        + `${entry.reference ?? entry.endToEndId ?? NO_REFERENCE}${servicerReference}`;
}

function entryLines(record: TypedRecord, ctx: MtRenderContext, withRemittance: boolean): string[] {
    const entries = hasEntryList(record) ? record.entries : [];
    const lines: string[] = [];
    for (const entry of entries) {
        lines.push(statementLine(entry, ctx.now));
        if (withRemittance && entry.remittance) {
            lines.push(`:86:${entry.remittance}`);
        }
    }
    return lines;
}

function balanceLine(tag: string, balance: LooseEntry | undefined, record: TypedRecord, now: Date, amount?: string): string {
    const mark = balance?.creditDebitIndicator === 'DBIT' ? 'D' : 'C';
    const currency = balance?.currency ?? record.currency ?? 'USD';
    return `:${tag}:${mark}${mtDate(balance?.date, now)}${currency}${toMtAmount(amount ?? balance?.amount)}`;
}

function bodyStatement(record: TypedRecord, ctx: MtRenderContext, withRemittance: boolean): string[] {
    const balances = hasBalanceList(record) ? record.balances : [];
    const opening = balances.find(balance => balance.type === 'OPBD');
    const closing = balances.find(balance => balance.type === 'CLBD');
    return [
        `:20:${record.messageId ?? NO_REFERENCE}`,
        `:25:${accountIdOf(record) ?? record.debtorAccount ?? NOT_AVAILABLE}`,
        ':28C:1/1',
        ...(opening ? [balanceLine('60F', opening, record, ctx.now)] : []),
        ...entryLines(record, ctx, withRemittance),
        balanceLine('62F', closing, record, ctx.now, record.amount),
    ];
}

function bodyInterimReport(record: TypedRecord, ctx: MtRenderContext): string[] {
    const currency = record.currency ?? 'USD';
    const lines = [
        `:20:${record.messageId ?? NO_REFERENCE}`,
        `:25:${accountIdOf(record) ?? record.debtorAccount ?? NOT_AVAILABLE}`,
        ':28C:1/1',
        `:34F:${currency}${toMtAmount(record.amount)}`,
        ...entryLines(record, ctx, true),
    ];
    if (hasEntryList(record)) {
        if (record.totalDebitEntries && record.totalDebitAmount) {
            lines.push(`:90D:${record.totalDebitEntries}${currency}${toMtAmount(record.totalDebitAmount)}`);
        }
        if (record.totalCreditEntries && record.totalCreditAmount) {
            lines.push(`:90C:${record.totalCreditEntries}${currency}${toMtAmount(record.totalCreditAmount)}`);
        }
    }
    return lines;
}

function block4(record: TypedRecord, type: MtType, ctx: MtRenderContext): string[] {
    switch (type) {
        case '101': return body101(record, ctx);
        case '103': return body103(record, ctx);
        case '202': return body202(record, ctx);
        case '900': return bodyConfirmation(record, ctx, record.debtorAccount);
        case '910': return bodyConfirmation(record, ctx, record.creditorAccount);
        case '940': return bodyStatement(record, ctx, true);
        case '942': return bodyInterimReport(record, ctx);
        case '950': return bodyStatement(record, ctx, false);
    }
}

export function renderMt(record: TypedRecord, type: MtType, ctx: MtRenderContext): string {
    const sender = logicalTerminal(record.senderBic, ctx.placeholderBic);
    const receiver = logicalTerminal(record.receiverBic, ctx.placeholderBic);
    const userHeader = type === '103' || type === '202'
        ? `{3:{121:${record.uetr ?? ctx.generateUetr()}}}`
        : '';

    return `{1:F01${sender}0000000000}`
        + `{2:I${type}${receiver}N}`
        + userHeader
        + `{4:\n${block4(record, type, ctx).join('\n')}\n-}`;
}
