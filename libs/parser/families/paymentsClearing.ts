import { accountOf, amountOf, bicOf, FamilyRoutine, looseEntry, toInteger } from './shared.js';

/**
 * Payments clearing and settlement (pacs).
 */

export const parsePacs008: FamilyRoutine<'pacs.008'> = (x, base) => {
    const settlement = amountOf(x, '//GrpHdr/TtlIntrBkSttlmAmt');

    return {
        kind: 'pacs.008',
        ...base,
        settlementMethod: x.text('//GrpHdr/SttlmInf/SttlmMtd'),
        clearingSystem: x.text('//GrpHdr/SttlmInf/ClrSys/Cd | //GrpHdr/SttlmInf/ClrSys/Prtry'),
        numberOfTransactions: toInteger(x.text('//GrpHdr/NbOfTxs')),
        settlementAmount: settlement.amount,
        settlementCurrency: settlement.currency,
        transactions: x.nodes('//CdtTrfTxInf').map(tx => {
            const { amount, currency } = amountOf(x, 'IntrBkSttlmAmt', tx);
            return looseEntry({
                instructionId: x.text('PmtId/InstrId', tx),
                endToEndId: x.text('PmtId/EndToEndId', tx),
                transactionId: x.text('PmtId/TxId', tx),
                uetr: x.text('PmtId/UETR', tx),
                amount,
                currency,
                debtorName: x.text('Dbtr/Nm', tx),
                debtorAccount: x.text(accountOf('DbtrAcct'), tx),
                debtorAgent: x.text(bicOf('DbtrAgt'), tx),
                creditorName: x.text('Cdtr/Nm', tx),
                creditorAccount: x.text(accountOf('CdtrAcct'), tx),
                creditorAgent: x.text(bicOf('CdtrAgt'), tx),
                remittanceInfo: x.text('RmtInf/Ustrd', tx),
            });
        }),
    };
};

export const parsePacs004: FamilyRoutine<'pacs.004'> = (x, base) => ({
    kind: 'pacs.004',
    ...base,
    creationDateTime: x.text('//GrpHdr/CreDtTm'),
    originalMessageId: x.text('//OrgnlGrpInf/OrgnlMsgId'),
    originalMessageNameId: x.text('//OrgnlGrpInf/OrgnlMsgNmId'),
    transactions: x.nodes('//TxInf').map(tx => {
        const returned = amountOf(x, 'RtrdIntrBkSttlmAmt', tx);
        return looseEntry({
            returnId: x.text('RtrId', tx),
            originalEndToEndId: x.text('OrgnlEndToEndId', tx),
            originalTransactionId: x.text('OrgnlTxId', tx),
            originalUetr: x.text('OrgnlUETR', tx),
            returnedAmount: returned.amount,
            returnedCurrency: returned.currency,
            returnReason: x.text('RtrRsnInf/Rsn/Cd | RtrRsnInf/Rsn/Prtry', tx),
        });
    }),
});

export const parsePacs009: FamilyRoutine<'pacs.009'> = (x, base) => ({
    kind: 'pacs.009',
    ...base,
    creationDateTime: x.text('//GrpHdr/CreDtTm'),
    settlementMethod: x.text('//GrpHdr/SttlmInf/SttlmMtd'),
    transactions: x.nodes('//CdtTrfTxInf').map(tx => {
        const { amount, currency } = amountOf(x, 'IntrBkSttlmAmt', tx);
        return looseEntry({
            instructionId: x.text('PmtId/InstrId', tx),
            endToEndId: x.text('PmtId/EndToEndId', tx),
            transactionId: x.text('PmtId/TxId', tx),
            uetr: x.text('PmtId/UETR', tx),
            amount,
            currency,
            debtor: x.text('Dbtr/BICFI | Dbtr/FinInstnId/BICFI | Dbtr/FinInstnId/BIC', tx),
            creditor: x.text('Cdtr/BICFI | Cdtr/FinInstnId/BICFI | Cdtr/FinInstnId/BIC', tx),
        });
    }),
});
