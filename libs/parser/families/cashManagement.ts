import { LooseEntry } from '../../model/index.js';
import { XmlFieldExtractor } from '../../extract/xmlFieldExtractor.js';
import { accountOf, amountOf, bicOf, FamilyRoutine, looseEntry } from './shared.js';

/**
 * Cash management (camt): account statements and reports, investigations,
 * account returns and billing statements.
 */

function readBalance(x: XmlFieldExtractor, balance: Element): LooseEntry {
    const { amount, currency } = amountOf(x, 'Amt', balance);
    return looseEntry({
        type: x.text('Tp/CdOrPrtry/Cd | Tp/CdOrPrtry/Prtry | Tp/Cd', balance),
        amount,
        currency,
        creditDebitIndicator: x.text('CdtDbtInd', balance),
        date: x.text('Dt/Dt | Dt/DtTm | ValDt/Dt', balance),
    });
}

function readEntry(x: XmlFieldExtractor, entry: Element): LooseEntry {
    const { amount, currency } = amountOf(x, 'Amt', entry);
    return looseEntry({
        reference: x.text('NtryRef', entry),
        amount,
        currency,
        creditDebitIndicator: x.text('CdtDbtInd', entry),
        status: x.text('Sts/Cd | Sts', entry),
        bookingDate: x.text('BookgDt/Dt | BookgDt/DtTm', entry),
        valueDate: x.text('ValDt/Dt | ValDt/DtTm', entry),
        accountServicerReference: x.text('AcctSvcrRef', entry),
        endToEndId: x.text('NtryDtls/TxDtls/Refs/EndToEndId', entry),
        remittance: x.text('NtryDtls/TxDtls/RmtInf/Ustrd | AddtlNtryInf', entry),
    });
}

/**
 * Fields shared by account statements, reports and notifications; `container`
 * is the element holding one account's data (Stmt, Rpt or Ntfctn).
 */
function readAccountActivity(x: XmlFieldExtractor, container: string) {
    const scope = x.node(`//${container}`);
    return {
        creationDateTime: x.text('//GrpHdr/CreDtTm'),
        accountId: scope ? x.text(accountOf('Acct'), scope) : undefined,
        accountCurrency: scope ? x.text('Acct/Ccy', scope) : undefined,
        accountOwner: scope ? x.text('Acct/Ownr/Nm | Acct/Ownr/Pty/Nm', scope) : undefined,
        accountServicer: scope ? x.text(bicOf('Acct/Svcr'), scope) : undefined,
        totalCreditEntries: x.text('//TxsSummry/TtlCdtNtries/NbOfNtries'),
        totalCreditAmount: x.text('//TxsSummry/TtlCdtNtries/Sum'),
        totalDebitEntries: x.text('//TxsSummry/TtlDbtNtries/NbOfNtries'),
        totalDebitAmount: x.text('//TxsSummry/TtlDbtNtries/Sum'),
        entries: x.nodes('//Ntry').map(entry => readEntry(x, entry)),
    };
}

export const parseCamt052: FamilyRoutine<'camt.052'> = (x, base) => ({
    kind: 'camt.052',
    ...base,
    reportId: x.text('//Rpt/Id'),
    ...readAccountActivity(x, 'Rpt'),
});

export const parseCamt053: FamilyRoutine<'camt.053'> = (x, base) => ({
    kind: 'camt.053',
    ...base,
    statementId: x.text('//Stmt/Id'),
    ...readAccountActivity(x, 'Stmt'),
    balances: x.nodes('//Stmt/Bal').map(balance => readBalance(x, balance)),
});

export const parseCamt054: FamilyRoutine<'camt.054'> = (x, base) => ({
    kind: 'camt.054',
    ...base,
    notificationId: x.text('//Ntfctn/Id'),
    ...readAccountActivity(x, 'Ntfctn'),
});

export const parseCamt004: FamilyRoutine<'camt.004'> = (x, base) => ({
    kind: 'camt.004',
    ...base,
    creationDateTime: x.text('//MsgHdr/CreDtTm'),
    originalBusinessQuery: x.text('//MsgHdr/OrgnlBizQry/MsgId'),
    accountId: x.text('//AcctRpt/AcctId/IBAN | //AcctRpt/AcctId/Othr/Id | //AcctId/IBAN | //AcctId/Othr/Id'),
    accountOwner: x.text('//Acct/Ownr/Nm | //Acct/Ownr/Pty/Nm'),
    accountServicer: x.text(bicOf('//Acct/Svcr')),
    accountStatus: x.text('//Acct/Sts | //AcctSts'),
    accountCurrency: x.text('//Acct/Ccy'),
    balances: x.nodes('//Acct/MulBal/Bal | //Bal').map(balance => readBalance(x, balance)),
    limits: x.nodes('//Lmt').map(limit => {
        const { amount, currency } = amountOf(x, 'Amt/AmtWthCcy | Amt', limit);
        return looseEntry({
            type: x.text('Tp/Cd | Tp/Prtry | LmtId/Tp/Cd', limit),
            amount,
            currency,
            creditDebitIndicator: x.text('CdtDbtInd', limit),
        });
    }),
    numberOfPayments: x.text('//Acct/NbOfPmts | //NbOfPmts'),
    businessErrors: x.nodes('//BizErr').map(error => looseEntry({
        code: x.text('Err/Cd | Err/Prtry', error),
        description: x.text('Desc', error),
    })),
});

export const parseCamt029: FamilyRoutine<'camt.029'> = (x, base) => ({
    kind: 'camt.029',
    ...base,
    creationDateTime: x.text('//Assgnmt/CreDtTm'),
    assignmentId: x.text('//Assgnmt/Id'),
    caseId: x.text('//Case/Id | //RslvdCase/Id'),
    investigationStatus: x.text('//Sts/Conf | //Sts/Prtry'),
    cancellationDetails: x.nodes('//CxlDtls/TxInfAndSts | //CxlDtls').map(detail => looseEntry({
        originalInstructionId: x.text('OrgnlInstrId', detail),
        originalEndToEndId: x.text('OrgnlEndToEndId', detail),
        originalUetr: x.text('OrgnlUETR', detail),
        status: x.text('TxCxlSts', detail),
    })),
});

export const parseCamt056: FamilyRoutine<'camt.056'> = (x, base) => ({
    kind: 'camt.056',
    ...base,
    creationDateTime: x.text('//Assgnmt/CreDtTm'),
    assignmentId: x.text('//Assgnmt/Id'),
    caseId: x.text('//Case/Id'),
    originalMessageId: x.text('//OrgnlGrpInf/OrgnlMsgId'),
    originalMessageNameId: x.text('//OrgnlGrpInf/OrgnlMsgNmId'),
    recallReason: x.text('//CxlRsnInf/Rsn/Cd | //CxlRsnInf/Rsn/Prtry'),
    underlyingTransactions: x.nodes('//Undrlyg/TxInf | //Undrlyg').map(tx => {
        const original = amountOf(x, 'OrgnlIntrBkSttlmAmt', tx);
        return looseEntry({
            originalInstructionId: x.text('OrgnlInstrId', tx),
            originalEndToEndId: x.text('OrgnlEndToEndId', tx),
            originalTransactionId: x.text('OrgnlTxId', tx),
            originalUetr: x.text('OrgnlUETR', tx),
            originalAmount: original.amount,
            originalCurrency: original.currency,
        });
    }),
});

export const parseCamt086: FamilyRoutine<'camt.086'> = (x, base) => ({
    kind: 'camt.086',
    ...base,
    reportId: x.text('//RptHdr/RptId'),
    groupId: x.text('//BllgStmtGrp/GrpId'),
    statementId: x.text('//BllgStmt/StmtId'),
    creationDateTime: x.text('//BllgStmt/CreDtTm'),
    statementStatus: x.text('//BllgStmt/Sts'),
});
