import { create } from 'xmlbuilder2';
import type { XMLBuilder } from 'xmlbuilder2/lib/interfaces.js';
import { hasBalanceList, hasEntryList, LooseEntry, transactionEntries, TypedRecord } from '../model/index.js';
import { addAccount, addAgent, addPostalAddress, isoDateTime, ISO20022_NAMESPACE_PREFIX } from '../writer/xmlFragments.js';
import { xmlDate } from './swiftFormat.js';

export const MX_TARGETS = {
    'pacs.008': 'pacs.008.001.08',
    'pacs.009': 'pacs.009.001.08',
    'camt.052': 'camt.052.001.08',
    'camt.053': 'camt.053.001.08',
    'camt.054': 'camt.054.001.08',
    'camt.004': 'camt.004.001.08',
} as const;

export type MxTarget = keyof typeof MX_TARGETS;

export function isMxTarget(value: string): value is MxTarget {
    return Object.prototype.hasOwnProperty.call(MX_TARGETS, value);
}

export interface MxRenderContext {
    now: Date;
    generateUetr: () => string;
}

const UNKNOWN = 'UNKNOWN';
const NO_REFERENCE = 'NONREF';

interface StatementShape {
    root: string;
    container: string;
}

const STATEMENT_SHAPES: Record<'camt.052' | 'camt.053' | 'camt.054', StatementShape> = {
    'camt.052': { root: 'BkToCstmrAcctRpt', container: 'Rpt' },
    'camt.053': { root: 'BkToCstmrStmt', container: 'Stmt' },
    'camt.054': { root: 'BkToCstmrDbtCdtNtfctn', container: 'Ntfctn' },
};

function groupHeader(parent: XMLBuilder, record: TypedRecord, now: Date): XMLBuilder {
    const grpHdr = parent.ele('GrpHdr');
    grpHdr.ele('MsgId').txt(record.messageId ?? NO_REFERENCE);
    grpHdr.ele('CreDtTm').txt(isoDateTime(now));
    return grpHdr;
}

function amount(parent: XMLBuilder, tag: string, value: string | null | undefined, currency: string | null | undefined): void {
    parent.ele(tag, { Ccy: currency ?? 'USD' }).txt(value ?? '0.00');
}

/**
 * One customer credit transfer, GrpHdr plus a single CdtTrfTxInf.
 */
function customerCreditTransfer(body: XMLBuilder, record: TypedRecord, ctx: MxRenderContext): void {
    const sender = record.senderBic ?? UNKNOWN;
    const receiver = record.receiverBic ?? UNKNOWN;

    const grpHdr = groupHeader(body, record, ctx.now);
    grpHdr.ele('NbOfTxs').txt('1');
    const settlementMethod = record.kind === 'pacs.008' || record.kind === 'pacs.009'
        ? record.settlementMethod
        : undefined;
    grpHdr.ele('SttlmInf').ele('SttlmMtd').txt(settlementMethod ?? 'CLRG');
    addAgent(grpHdr, 'InstgAgt', sender);
    addAgent(grpHdr, 'InstdAgt', receiver);

    const tx = body.ele('CdtTrfTxInf');
    const pmtId = tx.ele('PmtId');
    pmtId.ele('EndToEndId').txt(record.endToEndId ?? record.messageId ?? NO_REFERENCE);
    pmtId.ele('UETR').txt(record.uetr ?? ctx.generateUetr());
    amount(tx, 'IntrBkSttlmAmt', record.amount, record.currency);
    tx.ele('ChrgBr').txt('SHAR');

    const debtor = tx.ele('Dbtr');
    debtor.ele('Nm').txt(record.debtorName ?? UNKNOWN);
    addPostalAddress(debtor, record.debtorAddress);
    if (record.debtorAccount) {
        addAccount(tx, 'DbtrAcct', record.debtorAccount);
    }
    addAgent(tx, 'DbtrAgt', sender);
    addAgent(tx, 'CdtrAgt', receiver);

    const creditor = tx.ele('Cdtr');
    creditor.ele('Nm').txt(record.creditorName ?? UNKNOWN);
    addPostalAddress(creditor, record.creditorAddress);
    if (record.creditorAccount) {
        addAccount(tx, 'CdtrAcct', record.creditorAccount);
    }

    const remittance = transactionEntries(record)[0]?.remittanceInfo;
    if (remittance) {
        tx.ele('RmtInf').ele('Ustrd').txt(remittance);
    }
}

/** Institution transfer: debtor and creditor are the agents themselves */
function institutionCreditTransfer(body: XMLBuilder, record: TypedRecord, ctx: MxRenderContext): void {
    const sender = record.senderBic ?? UNKNOWN;
    const receiver = record.receiverBic ?? UNKNOWN;

    const grpHdr = groupHeader(body, record, ctx.now);
    grpHdr.ele('NbOfTxs').txt('1');
    grpHdr.ele('SttlmInf').ele('SttlmMtd')
        .txt((record.kind === 'pacs.009' ? record.settlementMethod : undefined) ?? 'INDA');
    addAgent(grpHdr, 'InstgAgt', sender);
    addAgent(grpHdr, 'InstdAgt', receiver);

    const tx = body.ele('CdtTrfTxInf');
    const pmtId = tx.ele('PmtId');
    pmtId.ele('EndToEndId').txt(record.endToEndId ?? record.messageId ?? NO_REFERENCE);
    pmtId.ele('UETR').txt(record.uetr ?? ctx.generateUetr());
    amount(tx, 'IntrBkSttlmAmt', record.amount, record.currency);
    tx.ele('Dbtr').ele('FinInstnId').ele('BICFI').txt(sender);
    tx.ele('Cdtr').ele('FinInstnId').ele('BICFI').txt(receiver);
}

function balance(parent: XMLBuilder, type: string, item: LooseEntry, fallbackCurrency: string | undefined, now: Date): void {
    const bal = parent.ele('Bal');
    bal.ele('Tp').ele('CdOrPrtry').ele('Cd').txt(type);
    amount(bal, 'Amt', item.amount, item.currency ?? fallbackCurrency);
    bal.ele('CdtDbtInd').txt(item.creditDebitIndicator ?? 'CRDT');
    bal.ele('Dt').ele('Dt').txt(xmlDate(item.date, now));
}

/**
 * Balances in record order, except that the one carrying the record amount
 * leads; without a match a CLBD balance with the record amount is written first.
 */
function balances(parent: XMLBuilder, record: TypedRecord, now: Date): void {
    const known = hasBalanceList(record) ? record.balances : [];
    const lead = known.find(item => item.amount === (record.amount ?? null)
        && (item.currency ?? record.currency) === record.currency);
    balance(parent, lead?.type ?? 'CLBD', lead ?? {
        amount: record.amount ?? null,
        currency: record.currency ?? null,
        creditDebitIndicator: known.find(item => item.type === 'CLBD')?.creditDebitIndicator ?? null,
    }, record.currency, now);
    for (const item of known) {
        if (item !== lead) {
            balance(parent, item.type ?? 'CLBD', item, record.currency, now);
        }
    }
}

function entry(parent: XMLBuilder, item: LooseEntry, currency: string | undefined, now: Date): void {
    const ntry = parent.ele('Ntry');
    if (item.reference) {
        ntry.ele('NtryRef').txt(item.reference);
    }
    amount(ntry, 'Amt', item.amount, item.currency ?? currency);
    ntry.ele('CdtDbtInd').txt(item.creditDebitIndicator ?? 'CRDT');
    ntry.ele('Sts').ele('Cd').txt(item.status ?? 'BOOK');
    const valueDate = xmlDate(item.valueDate, now);
    ntry.ele('BookgDt').ele('Dt').txt(xmlDate(item.bookingDate ?? item.entryDate ?? item.valueDate, now));
    ntry.ele('ValDt').ele('Dt').txt(valueDate);
    if (item.accountServicerReference) {
        ntry.ele('AcctSvcrRef').txt(item.accountServicerReference);
    }
    ntry.ele('BkTxCd').ele('Prtry').ele('Cd').txt(item.transactionType ?? 'NTRF');
    if (item.endToEndId || item.remittance) {
        const txDtls = ntry.ele('NtryDtls').ele('TxDtls');
        if (item.endToEndId) {
            txDtls.ele('Refs').ele('EndToEndId').txt(item.endToEndId);
        }
        if (item.remittance) {
            txDtls.ele('RmtInf').ele('Ustrd').txt(item.remittance);
        }
    }
}

function statementId(record: TypedRecord): string | undefined {
    switch (record.kind) {
        case 'camt.052': return record.reportId;
        case 'camt.053': return record.statementId;
        case 'camt.054': return record.notificationId;
        default: return undefined;
    }
}

/**
 * Statement, report or notification: GrpHdr, then one container for the
 * account with its balances, totals and entries.
 */
function accountActivity(body: XMLBuilder, record: TypedRecord, shape: StatementShape, ctx: MxRenderContext): void {
    const grpHdr = groupHeader(body, record, ctx.now);
    grpHdr.ele('MsgRcpt').ele('Id').ele('OrgId').ele('AnyBIC').txt(record.receiverBic ?? UNKNOWN);

    const activity = hasEntryList(record) ? record : undefined;
    const container = body.ele(shape.container);
    container.ele('Id').txt(statementId(record) ?? record.messageId ?? NO_REFERENCE);
    container.ele('CreDtTm').txt(isoDateTime(ctx.now));

    const account = addAccount(container, 'Acct', activity?.accountId ?? record.debtorAccount ?? UNKNOWN);
    const accountCurrency = activity?.accountCurrency ?? record.currency;
    if (accountCurrency) {
        account.ele('Ccy').txt(accountCurrency);
    }
    if (activity?.accountOwner) {
        account.ele('Ownr').ele('Nm').txt(activity.accountOwner);
    }
    addAgent(account, 'Svcr', record.senderBic ?? activity?.accountServicer ?? UNKNOWN);

    balances(container, record, ctx.now);

    if (activity && (activity.totalCreditEntries || activity.totalDebitEntries)) {
        const summary = container.ele('TxsSummry');
        if (activity.totalCreditEntries) {
            const credits = summary.ele('TtlCdtNtries');
            credits.ele('NbOfNtries').txt(activity.totalCreditEntries);
            credits.ele('Sum').txt(activity.totalCreditAmount ?? '0');
        }
        if (activity.totalDebitEntries) {
            const debits = summary.ele('TtlDbtNtries');
            debits.ele('NbOfNtries').txt(activity.totalDebitEntries);
            debits.ele('Sum').txt(activity.totalDebitAmount ?? '0');
        }
    }

    for (const item of activity?.entries ?? []) {
        entry(container, item, accountCurrency, ctx.now);
    }
}

export function renderMx(record: TypedRecord, target: MxTarget, ctx: MxRenderContext): string {
    const namespace = `${ISO20022_NAMESPACE_PREFIX}${MX_TARGETS[target]}`;
    const doc = create({ version: '1.0', encoding: 'UTF-8' });
    const document = doc.ele(namespace, 'Document');

    switch (target) {
        case 'pacs.008':
            customerCreditTransfer(document.ele('FIToFICstmrCdtTrf'), record, ctx);
            break;
        case 'camt.004':
            customerCreditTransfer(document.ele('RtrAcct'), record, ctx);
            break;
        case 'pacs.009':
            institutionCreditTransfer(document.ele('FICdtTrf'), record, ctx);
            break;
        case 'camt.052':
        case 'camt.053':
        case 'camt.054': {
            const shape = STATEMENT_SHAPES[target];
            accountActivity(document.ele(shape.root), record, shape, ctx);
            break;
        }
    }

    return doc.end({ prettyPrint: true });
}
