import { childElements } from '../../extract/locationPath.js';
import { directText, XmlFieldExtractor } from '../../extract/xmlFieldExtractor.js';
import { amountOf, FamilyRoutine, looseEntry } from './shared.js';

/**
 * Foreign exchange trades, securities settlement and investment fund orders.
 */

const partyOf = (side: string) =>
    `//${side}/SubmitgPty/AnyBIC/AnyBIC | //${side}/SubmitgPty/AnyBIC | //${side}/SubmitgPty/NmAndAdr/Nm`;

const settlementPartyOf = (side: string) =>
    `//${side}/Pty1/Id/AnyBIC | //${side}/Pty1/Id/NmAndAdr/Nm | //${side}/Pty1/Id/Nm`;

export const parseFxtr014: FamilyRoutine<'fxtr.014'> = (x, base) => {
    const traded = amountOf(x, '//TradAmts/TradgSdBuyAmt/Amt');
    return {
        kind: 'fxtr.014',
        ...base,
        creationDateTime: x.text('//CreDtTm'),
        tradeDate: x.text('//TradInf/TradDt'),
        settlementDate: x.text('//TradAmts/SttlmDt'),
        exchangeRate: x.text('//AgrdRate/XchgRate'),
        tradingParty: x.text(partyOf('TradgSdId')),
        counterparty: x.text(partyOf('CtrPtySdId')),
        tradedAmount: traded.amount,
        tradedCurrency: traded.currency,
    };
};

function readSecurityId(x: XmlFieldExtractor): { securityId?: string; securityIdType?: string } {
    const isin = x.text('//FinInstrmId/ISIN');
    if (isin) {
        return { securityId: isin, securityIdType: 'ISIN' };
    }
    const other = x.text('//FinInstrmId/OthrId/Id');
    if (other) {
        return {
            securityId: other,
            securityIdType: x.text('//FinInstrmId/OthrId/Tp/Cd | //FinInstrmId/OthrId/Tp/Prtry'),
        };
    }
    return {};
}

function readQuantity(x: XmlFieldExtractor): { securityQuantity?: string; securityQuantityType?: string } {
    const quantity = x.node('//SttlmQty/Qty');
    const held = quantity ? childElements(quantity)[0] : undefined;
    if (!held) {
        return {};
    }
    return { securityQuantity: directText(held), securityQuantityType: held.localName };
}

export const parseSese023: FamilyRoutine<'sese.023'> = (x, base) => {
    const settlement = amountOf(x, '//SttlmAmt/Amt/Amt | //SttlmAmt/Amt');
    return {
        kind: 'sese.023',
        ...base,
        creationDateTime: x.text('//CreDtTm'),
        tradeDate: x.text('//TradDt/Dt/Dt | //TradDt/Dt/DtTm'),
        settlementDate: x.text('//SttlmDt/Dt/Dt | //SttlmDt/Dt/DtTm'),
        ...readSecurityId(x),
        ...readQuantity(x),
        settlementAmount: settlement.amount,
        settlementCurrency: settlement.currency,
        deliveringAgent: x.text(settlementPartyOf('DlvrgSttlmPties')),
        receivingAgent: x.text(settlementPartyOf('RcvgSttlmPties')),
    };
};

function readOrders(x: XmlFieldExtractor) {
    return {
        creationDateTime: x.text('//MsgId/CreDtTm'),
        masterReference: x.text('//MltplOrdrDtls/MstrRef'),
        poolReference: x.text('//PoolRef/Ref'),
        orders: x.nodes('//IndvOrdrDtls').map(order => {
            const { amount, currency } = amountOf(x, 'OrdrQty/AmtdQty', order);
            return looseEntry({
                orderReference: x.text('OrdrRef', order),
                investmentAccountId: x.text('InvstmtAcctDtls/AcctId/Id | InvstmtAcctDtls/AcctId', order),
                financialInstrumentId: x.text('FinInstrmDtls/Id/ISIN | FinInstrmDtls/Id/OthrPrtryId/Id', order),
                units: x.text('OrdrQty/UnitQty/Unit | OrdrQty/UnitQty', order),
                amount,
                currency,
            });
        }),
    };
}

export const parseSetr004: FamilyRoutine<'setr.004'> = (x, base) => ({
    kind: 'setr.004',
    ...base,
    ...readOrders(x),
});

export const parseSetr010: FamilyRoutine<'setr.010'> = (x, base) => ({
    kind: 'setr.010',
    ...base,
    ...readOrders(x),
});
