import { create } from 'xmlbuilder2';
import type { XMLBuilder } from 'xmlbuilder2/lib/interfaces.js';
import { LooseEntry, PostalAddress, transactionEntries, TypedRecord } from '../model/index.js';
import { UnsupportedTargetError } from '../errors/transcoderError.js';
import { getComponentLogger } from '../logging/logger.js';
import { addAccount, addAgent, addPostalAddress, isoDateTime, ISO20022_NAMESPACE_PREFIX } from './xmlFragments.js';

const log = getComponentLogger('xml-writer');

export const WRITER_SCHEMAS = ['pacs.008.001.08', 'pain.001.001.09'] as const;
export type WriterSchema = typeof WRITER_SCHEMAS[number];

function isWriterSchema(value: string): value is WriterSchema {
    return WRITER_SCHEMAS.some(schema => schema === value);
}

export interface XmlWriterOptions {
    now?: () => Date;
}

interface Party {
    name?: string;
    address?: PostalAddress;
}

function addParty(parent: XMLBuilder, tag: string, party: Party): void {
    if (!party.name && !party.address) {
        return;
    }
    const node = parent.ele(tag);
    if (party.name) {
        node.ele('Nm').txt(party.name);
    }
    addPostalAddress(node, party.address);
}

function optional(value: string | null | undefined): string | undefined {
    return value ?? undefined;
}

/**
 * Writes ISO 20022 documents straight from record fields.
 *
 * Unlike the translator no defaults are invented: an element appears only
 * when the record carries its data.
 */
export class XmlWriter {
    public readonly schema: WriterSchema;
    private readonly now: () => Date;

    constructor(schema: string = 'pacs.008.001.08', options: XmlWriterOptions = {}) {
        if (!isWriterSchema(schema)) {
            throw new UnsupportedTargetError(schema, WRITER_SCHEMAS);
        }
        this.schema = schema;
        this.now = options.now ?? (() => new Date());
    }

    toXml(record: TypedRecord): Buffer {
        const doc = create({ version: '1.0', encoding: 'UTF-8' });
        const document = doc.ele(`${ISO20022_NAMESPACE_PREFIX}${this.schema}`, 'Document');

        if (this.schema === 'pacs.008.001.08') {
            this.writeCustomerCreditTransfer(document.ele('FIToFICstmrCdtTrf'), record);
        } else {
            this.writeCreditTransferInitiation(document.ele('CstmrCdtTrfInitn'), record);
        }

        log.debug({ kind: record.kind, schema: this.schema }, 'Wrote XML document');
        return Buffer.from(doc.end({ prettyPrint: true }), 'utf-8');
    }

    private groupHeader(body: XMLBuilder, record: TypedRecord, transactionCount: number, creationDateTime?: string): XMLBuilder {
        const grpHdr = body.ele('GrpHdr');
        if (record.messageId) {
            grpHdr.ele('MsgId').txt(record.messageId);
        }
        grpHdr.ele('CreDtTm').txt(creationDateTime ?? isoDateTime(this.now()));
        grpHdr.ele('NbOfTxs').txt(String(transactionCount));
        return grpHdr;
    }

    private writeCustomerCreditTransfer(body: XMLBuilder, record: TypedRecord): void {
        const grpHdr = this.groupHeader(body, record, 1);
        const settlementMethod = record.kind === 'pacs.008' ? record.settlementMethod : undefined;
        if (settlementMethod) {
            grpHdr.ele('SttlmInf').ele('SttlmMtd').txt(settlementMethod);
        }
        if (record.senderBic) {
            addAgent(grpHdr, 'InstgAgt', record.senderBic);
        }
        if (record.receiverBic) {
            addAgent(grpHdr, 'InstdAgt', record.receiverBic);
        }

        const first: LooseEntry = transactionEntries(record)[0] ?? {};
        const tx = body.ele('CdtTrfTxInf');
        const endToEndId = record.endToEndId ?? optional(first.endToEndId);
        const uetr = record.uetr ?? optional(first.uetr);
        if (endToEndId || uetr) {
            const pmtId = tx.ele('PmtId');
            if (endToEndId) pmtId.ele('EndToEndId').txt(endToEndId);
            if (uetr) pmtId.ele('UETR').txt(uetr);
        }
        if (record.amount && record.currency) {
            tx.ele('IntrBkSttlmAmt', { Ccy: record.currency }).txt(record.amount);
        }
        addParty(tx, 'Dbtr', { name: record.debtorName, address: record.debtorAddress });
        if (record.debtorAccount) {
            addAccount(tx, 'DbtrAcct', record.debtorAccount);
        }
        const debtorAgent = optional(first.debtorAgent) ?? record.senderBic;
        if (debtorAgent) {
            addAgent(tx, 'DbtrAgt', debtorAgent);
        }
        const creditorAgent = optional(first.creditorAgent) ?? record.receiverBic;
        if (creditorAgent) {
            addAgent(tx, 'CdtrAgt', creditorAgent);
        }
        addParty(tx, 'Cdtr', { name: record.creditorName, address: record.creditorAddress });
        if (record.creditorAccount) {
            addAccount(tx, 'CdtrAcct', record.creditorAccount);
        }
        if (first.remittanceInfo) {
            tx.ele('RmtInf').ele('Ustrd').txt(first.remittanceInfo);
        }
    }

    /**
     * Payment information blocks regrouped by PmtInfId; a record without
     * any becomes a single block with one transaction built from its base fields.
     */
    private writeCreditTransferInitiation(body: XMLBuilder, record: TypedRecord): void {
        const initiation = record.kind === 'pain.001' ? record : undefined;
        const listed = initiation?.paymentInformation ?? [];
        const transactions: LooseEntry[] = listed.length > 0 ? listed : [{
            paymentInformationId: record.messageId ?? null,
            endToEndId: record.endToEndId ?? null,
            amount: record.amount ?? null,
            currency: record.currency ?? null,
            debtorName: record.debtorName ?? null,
            debtorAccount: record.debtorAccount ?? null,
            creditorName: record.creditorName ?? null,
            creditorAccount: record.creditorAccount ?? null,
        }];

        const grpHdr = this.groupHeader(
            body,
            record,
            initiation?.numberOfTransactions ?? transactions.length,
            initiation?.creationDateTime
        );
        if (initiation?.controlSum) {
            grpHdr.ele('CtrlSum').txt(initiation.controlSum);
        }
        if (initiation?.initiatingParty) {
            grpHdr.ele('InitgPty').ele('Nm').txt(initiation.initiatingParty);
        }

        const blocks = new Map<string, LooseEntry[]>();
        for (const tx of transactions) {
            const key = tx.paymentInformationId ?? '';
            blocks.set(key, [...(blocks.get(key) ?? []), tx]);
        }

        let firstBlock = true;
        for (const [paymentInformationId, entries] of blocks) {
            const head = entries[0];
            const pmtInf = body.ele('PmtInf');
            if (paymentInformationId) {
                pmtInf.ele('PmtInfId').txt(paymentInformationId);
            }
            pmtInf.ele('PmtMtd').txt(head.paymentMethod ?? 'TRF');
            if (head.requestedExecutionDate) {
                const dated = head.requestedExecutionDate.includes('T') ? 'DtTm' : 'Dt';
                pmtInf.ele('ReqdExctnDt').ele(dated).txt(head.requestedExecutionDate);
            }
            addParty(pmtInf, 'Dbtr', {
                name: optional(head.debtorName) ?? record.debtorName,
                address: firstBlock ? record.debtorAddress : undefined,
            });
            const debtorAccount = optional(head.debtorAccount) ?? record.debtorAccount;
            if (debtorAccount) {
                addAccount(pmtInf, 'DbtrAcct', debtorAccount);
            }
            const debtorAgent = optional(head.debtorAgent) ?? record.senderBic;
            if (debtorAgent) {
                addAgent(pmtInf, 'DbtrAgt', debtorAgent);
            }
            entries.forEach((tx, index) => {
                this.writeInitiationTransaction(pmtInf, record, tx, firstBlock && index === 0);
            });
            firstBlock = false;
        }
    }

    private writeInitiationTransaction(pmtInf: XMLBuilder, record: TypedRecord, tx: LooseEntry, leading: boolean): void {
        const node = pmtInf.ele('CdtTrfTxInf');
        const pmtId = node.ele('PmtId');
        if (tx.instructionId) {
            pmtId.ele('InstrId').txt(tx.instructionId);
        }
        pmtId.ele('EndToEndId').txt(tx.endToEndId ?? 'NOTPROVIDED');
        const amount = tx.amount ?? record.amount;
        const currency = tx.currency ?? record.currency;
        if (amount && currency) {
            node.ele('Amt').ele('InstdAmt', { Ccy: currency }).txt(amount);
        }
        const creditorAgent = optional(tx.creditorAgent) ?? (leading ? record.receiverBic : undefined);
        if (creditorAgent) {
            addAgent(node, 'CdtrAgt', creditorAgent);
        }
        addParty(node, 'Cdtr', {
            name: optional(tx.creditorName) ?? (leading ? record.creditorName : undefined),
            address: leading ? record.creditorAddress : undefined,
        });
        const creditorAccount = optional(tx.creditorAccount) ?? (leading ? record.creditorAccount : undefined);
        if (creditorAccount) {
            addAccount(node, 'CdtrAcct', creditorAccount);
        }
        if (tx.remittanceInfo) {
            node.ele('RmtInf').ele('Ustrd').txt(tx.remittanceInfo);
        }
    }
}
