import { Camt052Message, Camt053Message, LooseEntry, Pain001Message, PaymentFields, PaymentMessage, PostalAddress, TypedRecord } from '../model/index.js';
import { MtField, MtTextBlocks } from '../extract/mtBlocks.js';
import { looseEntry } from './families/shared.js';
import { RawMessage } from './formatSniffer.js';

/**
 * SWIFT MT block text to typed records.
 * 101 becomes a pain.001, 940 and 950 a camt.053, 942 a camt.052; every other
 * type yields the base record.
 */

const FIELD_32A = /^(\d{6})([A-Z]{3})(\d+(?:,\d*)?)/;
const FIELD_32B = /^([A-Z]{3})(\d+(?:,\d*)?)/;
const STATEMENT_LINE = /^(\d{6})(\d{4})?(RC|RD|C|D)([A-Z])?(\d+(?:,\d*)?)([A-Z][A-Z0-9]{3})(.*?)(?:\/\/(.*))?$/;
const BALANCE = /^([CD])(\d{6})([A-Z]{3})(\d+(?:,\d*)?)/;
const FLOOR_LIMIT = /^([A-Z]{3})([CD])?(\d+(?:,\d*)?)/;
const ENTRY_TOTAL = /^(\d+)([A-Z]{3})(\d+(?:,\d*)?)/;

const ORDERING_CUSTOMER_TAGS = ['50K', '50A', '50F', '50H', '50C', '50L', '50G'];
const BENEFICIARY_TAGS = ['59', '59A', '59F'];
const BENEFICIARY_INSTITUTION_TAGS = ['58A', '58D'];

const BALANCE_TYPES: Readonly<Record<string, string>> = {
    '60F': 'OPBD',
    '60M': 'OPBD',
    '62F': 'CLBD',
    '62M': 'CLBD',
    '64': 'CLAV',
    '65': 'FWAV',
};

export interface MtParty {
    account?: string;
    name?: string;
    address?: PostalAddress;
}

/** MT decimal amounts use a comma separator */
export function mtAmount(value: string): string {
    return value.replace(',', '.');
}

/**
 * Party field: an optional `/account` line, then name, then address lines.
 */
export function readParty(value: string | undefined): MtParty {
    if (value === undefined) {
        return {};
    }
    const lines = value.split('\n').map(line => line.trim()).filter(line => line.length > 0);
    let account: string | undefined;
    if (lines[0]?.startsWith('/')) {
        account = lines.shift()?.slice(1).trim() || undefined;
    }
    const name = lines.shift();
    return {
        account,
        name,
        address: lines.length > 0 ? { addressLines: lines } : undefined,
    };
}

function readAmount(blocks: MtTextBlocks): { amount?: string; currency?: string } {
    const valueDated = blocks.field('32A');
    if (valueDated !== undefined) {
        const match = FIELD_32A.exec(valueDated);
        return match ? { currency: match[2], amount: mtAmount(match[3]) } : {};
    }
    const plain = blocks.field('32B', '33B');
    const match = plain === undefined ? null : FIELD_32B.exec(plain);
    return match ? { currency: match[1], amount: mtAmount(match[2]) } : {};
}

function trimmed(value: string | undefined): string | undefined {
    const result = value?.trim();
    return result ? result : undefined;
}

function headerFields(blocks: MtTextBlocks): PaymentFields {
    return {
        messageId: trimmed(blocks.field('20')),
        senderBic: blocks.senderBic(),
        receiverBic: blocks.receiverBic(),
        uetr: blocks.uetr(),
    };
}

function parsePaymentMt(blocks: MtTextBlocks): PaymentMessage {
    const debtor = readParty(blocks.field(...ORDERING_CUSTOMER_TAGS));
    const creditor = readParty(blocks.field(...BENEFICIARY_TAGS) ?? blocks.field(...BENEFICIARY_INSTITUTION_TAGS));
    return {
        kind: 'payment',
        ...headerFields(blocks),
        endToEndId: trimmed(blocks.field('21')),
        ...readAmount(blocks),
        debtorName: debtor.name,
        debtorAccount: debtor.account,
        debtorAddress: debtor.address,
        creditorName: creditor.name,
        creditorAccount: creditor.account,
        creditorAddress: creditor.address,
    };
}

/**
 * MT 101: one payment information entry per :21: sequence.
 */
function parseRequestForTransfer(blocks: MtTextBlocks): Pain001Message {
    const orderingCustomer = readParty(blocks.field('50H', '50C', '50L', '50K', '50F', '50G'));
    let executionDate: string | undefined;
    const transactions: Array<Record<string, string | undefined>> = [];
    let current: Record<string, string | undefined> | undefined;

    for (const { tag, value } of blocks.fields()) {
        if (tag === '30') {
            executionDate = trimmed(value);
            if (current) current.requestedExecutionDate = executionDate;
        } else if (tag === '21') {
            current = { endToEndId: trimmed(value), requestedExecutionDate: executionDate };
            transactions.push(current);
        } else if (!current) {
            continue;
        } else if (tag === '32B') {
            const match = FIELD_32B.exec(value);
            if (match) {
                current.currency = match[1];
                current.amount = mtAmount(match[2]);
            }
        } else if (BENEFICIARY_TAGS.includes(tag)) {
            const beneficiary = readParty(value);
            current.creditorName = beneficiary.name;
            current.creditorAccount = beneficiary.account;
        } else if (tag === '70') {
            current.remittanceInfo = value.replace(/\n/g, ' ').trim();
        }
    }

    const first = transactions[0];
    return {
        kind: 'pain.001',
        ...headerFields(blocks),
        endToEndId: first?.endToEndId,
        amount: first?.amount,
        currency: first?.currency,
        debtorName: orderingCustomer.name,
        debtorAccount: orderingCustomer.account,
        debtorAddress: orderingCustomer.address,
        initiatingParty: orderingCustomer.name,
        numberOfTransactions: transactions.length,
        paymentInformation: transactions.map(tx => looseEntry({
            ...tx,
            debtorName: orderingCustomer.name,
            debtorAccount: orderingCustomer.account,
        })),
    };
}

function creditDebit(mark: string): string {
    return mark === 'C' || mark === 'RD' ? 'CRDT' : 'DBIT';
}

function readStatementLine(value: string, currency: string | undefined): LooseEntry | undefined {
    const [line, ...details] = value.split('\n');
    const match = STATEMENT_LINE.exec(line.trim());
    if (!match) {
        return undefined;
    }
    return looseEntry({
        valueDate: match[1],
        entryDate: match[2],
        creditDebitIndicator: creditDebit(match[3]),
        fundsCode: match[4],
        amount: mtAmount(match[5]),
        currency,
        transactionType: match[6],
        reference: trimmed(match[7]),
        accountServicerReference: trimmed(match[8]),
        supplementaryDetails: trimmed(details.join('\n')),
        remittance: undefined,
    });
}

function readBalance(tag: string, value: string): LooseEntry | undefined {
    const match = BALANCE.exec(value.trim());
    if (!match) {
        return undefined;
    }
    return looseEntry({
        type: BALANCE_TYPES[tag],
        amount: mtAmount(match[4]),
        currency: match[3],
        creditDebitIndicator: match[1] === 'C' ? 'CRDT' : 'DBIT',
        date: match[2],
    });
}

/**
 * Statement lines grouped into entries: :61: opens one, an :86: directly
 * after it supplies the remittance text.
 */
export function groupStatementEntries(fields: MtField[], currency: string | undefined): LooseEntry[] {
    const entries: LooseEntry[] = [];
    let previous: string | undefined;
    for (const { tag, value } of fields) {
        if (tag === '61') {
            const entry = readStatementLine(value, currency);
            if (entry) {
                entries.push(entry);
            } else {
                previous = undefined;
                continue;
            }
        } else if (tag === '86' && previous === '61' && entries.length > 0) {
            entries[entries.length - 1].remittance = value.replace(/\n/g, ' ').trim();
        }
        previous = tag;
    }
    return entries;
}

function readBalances(fields: MtField[]): LooseEntry[] {
    const balances: LooseEntry[] = [];
    for (const { tag, value } of fields) {
        if (Object.prototype.hasOwnProperty.call(BALANCE_TYPES, tag)) {
            const balance = readBalance(tag, value);
            if (balance) balances.push(balance);
        }
    }
    return balances;
}

/**
 * Fields common to 940, 942 and 950. The record amount is the closing
 * balance, else the floor limit.
 */
function statementCore(blocks: MtTextBlocks, balances: LooseEntry[]) {
    const floor = FLOOR_LIMIT.exec(blocks.field('34F')?.trim() ?? '');
    const closing = balances.find(balance => balance.type === 'CLBD');
    const statementCurrency = balances[0]?.currency ?? floor?.[1];

    return {
        ...headerFields(blocks),
        endToEndId: trimmed(blocks.field('21')),
        amount: closing?.amount ?? (floor ? mtAmount(floor[3]) : undefined),
        currency: closing?.currency ?? floor?.[1],
        accountId: trimmed(blocks.field('25', '25P')),
        accountCurrency: statementCurrency,
        accountServicer: blocks.senderBic(),
        entries: groupStatementEntries(blocks.fields(), statementCurrency),
    };
}

function parseStatement(blocks: MtTextBlocks): Camt053Message {
    const balances = readBalances(blocks.fields());
    return {
        kind: 'camt.053',
        ...statementCore(blocks, balances),
        statementId: trimmed(blocks.field('28C', '28')),
        balances,
    };
}

function readEntryTotal(value: string | undefined): { entries?: string; amount?: string } {
    const match = value === undefined ? null : ENTRY_TOTAL.exec(value.trim());
    return match ? { entries: match[1], amount: mtAmount(match[3]) } : {};
}

function parseInterimReport(blocks: MtTextBlocks): Camt052Message {
    const debits = readEntryTotal(blocks.field('90D'));
    const credits = readEntryTotal(blocks.field('90C'));
    return {
        kind: 'camt.052',
        ...statementCore(blocks, readBalances(blocks.fields())),
        reportId: trimmed(blocks.field('28C', '28')),
        totalDebitEntries: debits.entries,
        totalDebitAmount: debits.amount,
        totalCreditEntries: credits.entries,
        totalCreditAmount: credits.amount,
    };
}

export function parseMt(raw: RawMessage): TypedRecord {
    const blocks = new MtTextBlocks(raw);
    switch (blocks.messageType()) {
        case '101':
            return parseRequestForTransfer(blocks);
        case '940':
        case '950':
            return parseStatement(blocks);
        case '942':
            return parseInterimReport(blocks);
        default:
            return parsePaymentMt(blocks);
    }
}
