import { LooseEntry } from '../../model/index.js';
import { XmlFieldExtractor } from '../../extract/xmlFieldExtractor.js';
import { accountOf, amountOf, bicOf, FamilyRoutine, looseEntry, toInteger } from './shared.js';

/**
 * Payments initiation (pain). Payment information blocks are flattened: one
 * entry per transaction, each carrying its parent block's details.
 */

function groupHeader(x: XmlFieldExtractor) {
    return {
        creationDateTime: x.text('//GrpHdr/CreDtTm'),
        numberOfTransactions: toInteger(x.text('//GrpHdr/NbOfTxs')),
        controlSum: x.text('//GrpHdr/CtrlSum'),
        initiatingParty: x.text('//GrpHdr/InitgPty/Nm'),
    };
}

function flattenPaymentInformation(
    x: XmlFieldExtractor,
    transactionTag: string,
    parentFields: (block: Element) => Record<string, string | undefined>,
    transactionFields: (tx: Element) => Record<string, string | undefined>
): LooseEntry[] {
    const entries: LooseEntry[] = [];
    for (const block of x.nodes('//PmtInf')) {
        const parent = parentFields(block);
        const transactions = x.nodes(transactionTag, block);
        if (transactions.length === 0) {
            entries.push(looseEntry(parent));
            continue;
        }
        for (const tx of transactions) {
            entries.push(looseEntry({ ...parent, ...transactionFields(tx) }));
        }
    }
    return entries;
}

export const parsePain001: FamilyRoutine<'pain.001'> = (x, base) => ({
    kind: 'pain.001',
    ...base,
    ...groupHeader(x),
    paymentInformation: flattenPaymentInformation(
        x,
        'CdtTrfTxInf',
        block => ({
            paymentInformationId: x.text('PmtInfId', block),
            paymentMethod: x.text('PmtMtd', block),
            requestedExecutionDate: x.text('ReqdExctnDt/Dt | ReqdExctnDt/DtTm | ReqdExctnDt', block),
            debtorName: x.text('Dbtr/Nm', block),
            debtorAccount: x.text(accountOf('DbtrAcct'), block),
            debtorAgent: x.text(bicOf('DbtrAgt'), block),
        }),
        tx => {
            const { amount, currency } = amountOf(x, 'Amt/InstdAmt', tx);
            return {
                instructionId: x.text('PmtId/InstrId', tx),
                endToEndId: x.text('PmtId/EndToEndId', tx),
                amount,
                currency,
                creditorName: x.text('Cdtr/Nm', tx),
                creditorAccount: x.text(accountOf('CdtrAcct'), tx),
                creditorAgent: x.text(bicOf('CdtrAgt'), tx),
                remittanceInfo: x.text('RmtInf/Ustrd', tx),
            };
        }
    ),
});

export const parsePain008: FamilyRoutine<'pain.008'> = (x, base) => ({
    kind: 'pain.008',
    ...base,
    ...groupHeader(x),
    paymentInformation: flattenPaymentInformation(
        x,
        'DrctDbtTxInf',
        block => ({
            paymentInformationId: x.text('PmtInfId', block),
            paymentMethod: x.text('PmtMtd', block),
            requestedCollectionDate: x.text('ReqdColltnDt', block),
            creditorName: x.text('Cdtr/Nm', block),
            creditorAccount: x.text(accountOf('CdtrAcct'), block),
            creditorAgent: x.text(bicOf('CdtrAgt'), block),
        }),
        tx => {
            const { amount, currency } = amountOf(x, 'InstdAmt', tx);
            return {
                endToEndId: x.text('PmtId/EndToEndId', tx),
                amount,
                currency,
                mandateId: x.text('DrctDbtTx/MndtRltdInf/MndtId', tx),
                debtorName: x.text('Dbtr/Nm', tx),
                debtorAccount: x.text(accountOf('DbtrAcct'), tx),
                debtorAgent: x.text(bicOf('DbtrAgt'), tx),
                remittanceInfo: x.text('RmtInf/Ustrd', tx),
            };
        }
    ),
});

export const parsePain002: FamilyRoutine<'pain.002'> = (x, base) => ({
    kind: 'pain.002',
    ...base,
    creationDateTime: x.text('//GrpHdr/CreDtTm'),
    initiatingParty: x.text('//GrpHdr/InitgPty/Nm'),
    originalMessageId: x.text('//OrgnlGrpInfAndSts/OrgnlMsgId'),
    originalMessageNameId: x.text('//OrgnlGrpInfAndSts/OrgnlMsgNmId'),
    groupStatus: x.text('//OrgnlGrpInfAndSts/GrpSts'),
    transactionsStatus: x.nodes('//TxInfAndSts').map(tx => looseEntry({
        statusId: x.text('StsId', tx),
        originalInstructionId: x.text('OrgnlInstrId', tx),
        originalEndToEndId: x.text('OrgnlEndToEndId', tx),
        status: x.text('TxSts', tx),
        reason: x.text('StsRsnInf/Rsn/Cd | StsRsnInf/Rsn/Prtry', tx),
    })),
});
