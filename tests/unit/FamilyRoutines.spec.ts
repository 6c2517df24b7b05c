/**
 * Unit Tests: ISO 20022 Family Routines
 *
 * Tests the detailed record of every supported message family, family
 * resolution by namespace and by root element, and the generic fallback.
 *
 * @see libs/parser/families/
 * @see libs/parser/familyResolver.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { MessageParser, parseDetailedMessage, resolveFamily, ROOT_TAG_FAMILIES } from '../../libs/parser/index.js';
import { FAMILY_KEYS, isRecordOf, TypedRecord } from '../../libs/model/index.js';
import { loadFixture } from '../fixtures/loadFixture.js';

const UETR = '97ed4827-7b6f-4491-a06f-b548d5a7512d';

function detailed(fixture: string): TypedRecord {
    return new MessageParser(loadFixture(fixture)).parseDetailed();
}

describe('Family resolution', () => {
    it('should resolve every family from a generic document in its namespace', () => {
        for (const key of FAMILY_KEYS) {
            const xml = `<Document xmlns="urn:iso:std:iso:20022:tech:xsd:${key}.001.01">`
                + `<DummyRoot><GrpHdr><MsgId>SMOKE-${key}</MsgId></GrpHdr></DummyRoot></Document>`;

            const record = parseDetailedMessage(xml);

            assert.strictEqual(record.kind, key);
            assert.strictEqual(record.messageId, `SMOKE-${key}`);
        }
    });

    it('should return the base record for an unknown namespace', () => {
        const record = parseDetailedMessage(
            '<Document xmlns="urn:iso:std:iso:20022:tech:xsd:abcd.001.001.01"><Foo><GrpHdr><MsgId>GENERIC-1</MsgId></GrpHdr></Foo></Document>'
        );

        assert.strictEqual(record.kind, 'payment');
        assert.strictEqual(record.messageId, 'GENERIC-1');
    });

    it('should resolve by message element when there is no namespace', () => {
        const record = parseDetailedMessage('<Document><BkToCstmrStmt><GrpHdr><MsgId>NO-NS</MsgId></GrpHdr></BkToCstmrStmt></Document>');

        assert.strictEqual(record.kind, 'camt.053');
        assert.strictEqual(record.messageId, 'NO-NS');
    });

    it('should map both recall root elements to camt.056', () => {
        assert.strictEqual(ROOT_TAG_FAMILIES.FIToFICstmrCdtTrfRcl, 'camt.056');
        assert.strictEqual(ROOT_TAG_FAMILIES.FIToFIPmtCxlReq, 'camt.056');
    });

    it('should resolve nothing without namespace or root', () => {
        assert.strictEqual(resolveFamily(undefined, undefined), undefined);
        assert.strictEqual(resolveFamily('urn:example:other', undefined), undefined);
    });
});

describe('Payments clearing', () => {
    it('should parse pacs.008 settlement and transactions', () => {
        const record = detailed('pacs.008.xml');

        assert.ok(isRecordOf(record, 'pacs.008'));
        assert.strictEqual(record.settlementMethod, 'CLRG');
        assert.strictEqual(record.clearingSystem, 'TGT');
        assert.strictEqual(record.numberOfTransactions, 1);
        assert.strictEqual(record.settlementAmount, '2500.00');
        assert.strictEqual(record.settlementCurrency, 'EUR');
        assert.strictEqual(record.messageId, 'PACS008-001');
        assert.deepStrictEqual(record.transactions, [{
            instructionId: 'INSTR-1',
            endToEndId: 'E2E-001',
            transactionId: 'TX-001',
            uetr: UETR,
            amount: '2500.00',
            currency: 'EUR',
            debtorName: 'Alice Example',
            debtorAccount: 'DE89370400440532013000',
            debtorAgent: 'BANKDEFFXXX',
            creditorName: 'Bob Example',
            creditorAccount: 'ACC-778899',
            creditorAgent: 'BANKFRPPXXX',
            remittanceInfo: 'Invoice 2023-55',
        }]);
    });

    it('should parse pacs.004 returns', () => {
        const record = detailed('pacs.004.xml');

        assert.ok(isRecordOf(record, 'pacs.004'));
        assert.strictEqual(record.creationDateTime, '2023-10-26T08:00:00Z');
        assert.strictEqual(record.originalMessageId, 'PACS008-001');
        assert.strictEqual(record.originalMessageNameId, 'pacs.008.001.08');
        assert.deepStrictEqual(record.transactions, [{
            returnId: 'RTR-TX-1',
            originalEndToEndId: 'E2E-001',
            originalTransactionId: 'TX-001',
            originalUetr: UETR,
            returnedAmount: '2500.00',
            returnedCurrency: 'EUR',
            returnReason: 'AC04',
        }]);
    });

    it('should parse pacs.009 institution transfers', () => {
        const record = detailed('pacs.009.xml');

        assert.ok(isRecordOf(record, 'pacs.009'));
        assert.strictEqual(record.creationDateTime, '2023-10-24T11:00:00Z');
        assert.strictEqual(record.settlementMethod, 'INDA');
        assert.deepStrictEqual(record.transactions, [{
            instructionId: 'FI-INSTR-1',
            endToEndId: 'FI-E2E-1',
            transactionId: null,
            uetr: '1b4e28ba-2fa1-4d2b-883f-0016d3cca427',
            amount: '1000000.00',
            currency: 'USD',
            debtor: 'BANKUS33XXX',
            creditor: 'BANKGB22XXX',
        }]);
    });
});

describe('Payments initiation', () => {
    it('should flatten pain.001 payment information blocks', () => {
        const record = detailed('pain.001.xml');

        assert.ok(isRecordOf(record, 'pain.001'));
        assert.strictEqual(record.creationDateTime, '2023-10-24T09:30:00Z');
        assert.strictEqual(record.numberOfTransactions, 3);
        assert.strictEqual(record.controlSum, '1750.00');
        assert.strictEqual(record.initiatingParty, 'Erin Example GmbH');
        assert.deepStrictEqual(record.paymentInformation, [
            {
                paymentInformationId: 'PMTINF-1',
                paymentMethod: 'TRF',
                requestedExecutionDate: '2023-10-25',
                debtorName: 'Erin Example GmbH',
                debtorAccount: 'DE89370400440532013000',
                debtorAgent: 'BANKDEFFXXX',
                instructionId: 'I-1',
                endToEndId: 'E2E-P1',
                amount: '1000.00',
                currency: 'EUR',
                creditorName: 'Supplier A',
                creditorAccount: 'SUPA-001',
                creditorAgent: 'BANKFRPPXXX',
                remittanceInfo: 'Order 77',
            },
            {
                paymentInformationId: 'PMTINF-1',
                paymentMethod: 'TRF',
                requestedExecutionDate: '2023-10-25',
                debtorName: 'Erin Example GmbH',
                debtorAccount: 'DE89370400440532013000',
                debtorAgent: 'BANKDEFFXXX',
                instructionId: null,
                endToEndId: 'E2E-P2',
                amount: '500.00',
                currency: 'EUR',
                creditorName: 'Supplier B',
                creditorAccount: null,
                creditorAgent: null,
                remittanceInfo: null,
            },
            {
                paymentInformationId: 'PMTINF-2',
                paymentMethod: 'TRF',
                requestedExecutionDate: '2023-10-26',
                debtorName: 'Erin Example GmbH',
                debtorAccount: 'EUR-OPS-2',
                debtorAgent: 'BANKDEFFXXX',
                instructionId: null,
                endToEndId: 'E2E-P3',
                amount: '250.00',
                currency: 'EUR',
                creditorName: 'Supplier C',
                creditorAccount: null,
                creditorAgent: null,
                remittanceInfo: null,
            },
        ]);
    });

    it('should parse pain.002 status reports', () => {
        const record = detailed('pain.002.xml');

        assert.ok(isRecordOf(record, 'pain.002'));
        assert.strictEqual(record.initiatingParty, 'Bank Status Desk');
        assert.strictEqual(record.originalMessageId, 'PAIN001-001');
        assert.strictEqual(record.originalMessageNameId, 'pain.001.001.09');
        assert.strictEqual(record.groupStatus, 'PART');
        assert.deepStrictEqual(record.transactionsStatus, [
            { statusId: 'S-1', originalInstructionId: 'I-1', originalEndToEndId: 'E2E-P1', status: 'ACSC', reason: null },
            { statusId: 'S-2', originalInstructionId: null, originalEndToEndId: 'E2E-P2', status: 'RJCT', reason: 'AC01' },
        ]);
    });

    it('should parse pain.008 direct debits', () => {
        const record = detailed('pain.008.xml');

        assert.ok(isRecordOf(record, 'pain.008'));
        assert.strictEqual(record.controlSum, '89.90');
        assert.strictEqual(record.senderBic, 'BANKGB33XXX');
        assert.strictEqual(record.receiverBic, 'BANKGB22XXX');
        assert.deepStrictEqual(record.paymentInformation, [{
            paymentInformationId: 'DD-INF-1',
            paymentMethod: 'DD',
            requestedCollectionDate: '2023-11-01',
            creditorName: 'Utility Example Co',
            creditorAccount: 'GB82WEST12345698765432',
            creditorAgent: 'BANKGB22XXX',
            endToEndId: 'DD-E2E-1',
            amount: '89.90',
            currency: 'GBP',
            mandateId: 'MANDATE-42',
            debtorName: 'Frank Example',
            debtorAccount: 'FRANK-01',
            debtorAgent: 'BANKGB33XXX',
            remittanceInfo: 'October bill',
        }]);
    });
});

describe('Cash management', () => {
    it('should parse camt.053 statements', () => {
        const record = detailed('camt.053.xml');

        assert.ok(isRecordOf(record, 'camt.053'));
        assert.strictEqual(record.statementId, 'STMT-2023-10-24');
        assert.strictEqual(record.creationDateTime, '2023-10-24T18:00:00Z');
        assert.strictEqual(record.accountId, 'GB82WEST12345698765432');
        assert.strictEqual(record.accountCurrency, 'GBP');
        assert.strictEqual(record.accountOwner, 'Dave Example Ltd');
        assert.strictEqual(record.accountServicer, 'BANKGB22XXX');
        assert.strictEqual(record.totalCreditEntries, '1');
        assert.strictEqual(record.totalCreditAmount, '250.00');
        assert.strictEqual(record.totalDebitEntries, '1');
        assert.strictEqual(record.totalDebitAmount, '50.00');
        assert.deepStrictEqual(record.balances, [
            { type: 'OPBD', amount: '1000.00', currency: 'GBP', creditDebitIndicator: 'CRDT', date: '2023-10-24' },
            { type: 'CLBD', amount: '1200.00', currency: 'GBP', creditDebitIndicator: 'CRDT', date: '2023-10-24' },
        ]);
        assert.deepStrictEqual(record.entries, [
            {
                reference: 'NTRY-1',
                amount: '250.00',
                currency: 'GBP',
                creditDebitIndicator: 'CRDT',
                status: 'BOOK',
                bookingDate: '2023-10-24',
                valueDate: '2023-10-24',
                accountServicerReference: 'SVCR-1',
                endToEndId: 'E2E-IN-1',
                remittance: 'Consulting fee',
            },
            {
                reference: null,
                amount: '50.00',
                currency: 'GBP',
                creditDebitIndicator: 'DBIT',
                status: 'BOOK',
                bookingDate: '2023-10-24',
                valueDate: '2023-10-24',
                accountServicerReference: null,
                endToEndId: null,
                remittance: 'Monthly charges',
            },
        ]);
    });

    it('should parse camt.052 intraday reports', () => {
        const record = detailed('camt.052.xml');

        assert.ok(isRecordOf(record, 'camt.052'));
        assert.strictEqual(record.reportId, 'RPT-INTRADAY-1');
        assert.strictEqual(record.accountId, 'ACC-5566');
        assert.strictEqual(record.accountCurrency, 'USD');
        assert.strictEqual(record.accountServicer, 'BANKUS33XXX');
        assert.strictEqual(record.totalCreditEntries, '1');
        assert.strictEqual(record.totalCreditAmount, '420.00');
        assert.strictEqual(record.totalDebitEntries, undefined);
        assert.strictEqual(record.entries.length, 1);
        assert.strictEqual(record.entries[0].status, 'PDNG');
        assert.strictEqual(record.entries[0].bookingDate, null);
        assert.strictEqual(record.entries[0].valueDate, '2023-10-24');
    });

    it('should parse camt.054 notifications', () => {
        const record = detailed('camt.054.xml');

        assert.ok(isRecordOf(record, 'camt.054'));
        assert.strictEqual(record.notificationId, 'NTF-001');
        assert.strictEqual(record.accountOwner, 'Heidi Example');
        assert.strictEqual(record.endToEndId, 'CARD-42');
        assert.deepStrictEqual(record.entries, [{
            reference: null,
            amount: '99.99',
            currency: 'GBP',
            creditDebitIndicator: 'DBIT',
            status: 'BOOK',
            bookingDate: '2023-10-24',
            valueDate: null,
            accountServicerReference: null,
            endToEndId: 'CARD-42',
            remittance: null,
        }]);
    });

    it('should parse camt.004 account returns', () => {
        const record = detailed('camt.004.xml');

        assert.ok(isRecordOf(record, 'camt.004'));
        assert.strictEqual(record.creationDateTime, '2023-10-24T13:00:00Z');
        assert.strictEqual(record.originalBusinessQuery, 'QRY-9');
        assert.strictEqual(record.accountId, 'GB82WEST12345698765432');
        assert.strictEqual(record.accountOwner, 'Grace Example');
        assert.strictEqual(record.accountServicer, 'BANKGB22XXX');
        assert.strictEqual(record.accountStatus, 'ENAB');
        assert.strictEqual(record.accountCurrency, 'GBP');
        assert.strictEqual(record.numberOfPayments, '4');
        assert.deepStrictEqual(record.balances, [
            { type: 'ITBD', amount: '300.00', currency: 'GBP', creditDebitIndicator: 'CRDT', date: '2023-10-24' },
        ]);
        assert.deepStrictEqual(record.limits, []);
        assert.deepStrictEqual(record.businessErrors, []);
    });

    it('should parse camt.029 investigation resolutions', () => {
        const record = detailed('camt.029.xml');

        assert.ok(isRecordOf(record, 'camt.029'));
        assert.strictEqual(record.messageId, 'ASSIGN-29');
        assert.strictEqual(record.assignmentId, 'ASSIGN-29');
        assert.strictEqual(record.creationDateTime, '2023-10-27T09:00:00Z');
        assert.strictEqual(record.caseId, 'CASE-77');
        assert.strictEqual(record.investigationStatus, 'CNCL');
        assert.deepStrictEqual(record.cancellationDetails, [{
            originalInstructionId: 'INSTR-1',
            originalEndToEndId: 'E2E-001',
            originalUetr: UETR,
            status: 'CNCL',
        }]);
    });

    it('should parse camt.056 cancellation requests', () => {
        const record = detailed('camt.056.xml');

        assert.ok(isRecordOf(record, 'camt.056'));
        assert.strictEqual(record.assignmentId, 'ASSIGN-56');
        assert.strictEqual(record.creationDateTime, '2023-10-26T15:00:00Z');
        assert.strictEqual(record.caseId, 'CASE-77');
        assert.strictEqual(record.originalMessageId, 'PACS008-001');
        assert.strictEqual(record.originalMessageNameId, 'pacs.008.001.08');
        assert.strictEqual(record.recallReason, 'DUPL');
        assert.deepStrictEqual(record.underlyingTransactions, [{
            originalInstructionId: 'INSTR-1',
            originalEndToEndId: 'E2E-001',
            originalTransactionId: 'TX-001',
            originalUetr: UETR,
            originalAmount: '2500.00',
            originalCurrency: 'EUR',
        }]);
    });

    it('should parse camt.086 billing statements', () => {
        const record = detailed('camt.086.xml');

        assert.ok(isRecordOf(record, 'camt.086'));
        assert.strictEqual(record.reportId, 'BILL-RPT-1');
        assert.strictEqual(record.groupId, 'BILL-GRP-1');
        assert.strictEqual(record.statementId, 'BILL-STMT-1');
        assert.strictEqual(record.creationDateTime, '2023-11-20T10:00:00Z');
        assert.strictEqual(record.statementStatus, 'ORGN');
    });
});

describe('Securities and trades', () => {
    it('should parse fxtr.014 trade instructions', () => {
        const record = detailed('fxtr.014.xml');

        assert.ok(isRecordOf(record, 'fxtr.014'));
        assert.strictEqual(record.tradeDate, '2023-11-01');
        assert.strictEqual(record.settlementDate, '2023-11-03');
        assert.strictEqual(record.exchangeRate, '1.1000');
        assert.strictEqual(record.tradingParty, 'BANKUS33');
        assert.strictEqual(record.counterparty, 'Example Counterparty AG');
        assert.strictEqual(record.tradedAmount, '1500000.00');
        assert.strictEqual(record.tradedCurrency, 'EUR');
    });

    it('should parse sese.023 settlement instructions', () => {
        const record = detailed('sese.023.xml');

        assert.ok(isRecordOf(record, 'sese.023'));
        assert.strictEqual(record.tradeDate, '2023-10-15');
        assert.strictEqual(record.settlementDate, '2023-10-18');
        assert.strictEqual(record.securityId, 'XS0000000001');
        assert.strictEqual(record.securityIdType, 'ISIN');
        assert.strictEqual(record.securityQuantity, '250000');
        assert.strictEqual(record.securityQuantityType, 'FaceAmt');
        assert.strictEqual(record.settlementAmount, '248750.00');
        assert.strictEqual(record.settlementCurrency, 'USD');
        assert.strictEqual(record.deliveringAgent, 'BANKUS33');
        assert.strictEqual(record.receivingAgent, 'Example Asset Managers');
    });

    it('should parse setr.004 redemption orders', () => {
        const record = detailed('setr.004.xml');

        assert.ok(isRecordOf(record, 'setr.004'));
        assert.strictEqual(record.creationDateTime, '2023-11-06T14:32:00Z');
        assert.strictEqual(record.masterReference, 'MSTR-RED-1');
        assert.strictEqual(record.poolReference, 'POOL-RED-1');
        assert.deepStrictEqual(record.orders, [
            {
                orderReference: 'ORD-RED-1',
                investmentAccountId: 'INV-ACC-1',
                financialInstrumentId: 'XS0000000002',
                units: '150.5',
                amount: null,
                currency: null,
            },
            {
                orderReference: 'ORD-RED-2',
                investmentAccountId: 'INV-ACC-2',
                financialInstrumentId: 'XS0000000003',
                units: null,
                amount: '50000.00',
                currency: 'USD',
            },
        ]);
    });

    it('should parse setr.010 subscription orders', () => {
        const record = detailed('setr.010.xml');

        assert.ok(isRecordOf(record, 'setr.010'));
        assert.strictEqual(record.messageId, 'MSG-SUB-1');
        assert.strictEqual(record.masterReference, 'MSTR-SUB-1');
        assert.strictEqual(record.orders.length, 1);
        assert.strictEqual(record.orders[0].amount, '25000.00');
        assert.strictEqual(record.orders[0].currency, 'EUR');
    });
});

describe('Account management', () => {
    it('should parse acmt.007 opening requests', () => {
        const record = detailed('acmt.007.xml');

        assert.ok(isRecordOf(record, 'acmt.007'));
        assert.strictEqual(record.messageId, 'ACMT-111');
        assert.strictEqual(record.creationDateTime, '2023-11-06T14:32:00Z');
        assert.strictEqual(record.processId, 'PRC-777');
        assert.strictEqual(record.accountId, 'ACC-123');
        assert.strictEqual(record.accountCurrency, 'USD');
        assert.strictEqual(record.organizationName, 'Example Holdings Inc');
        assert.strictEqual(record.branchName, 'Downtown Branch');
    });

    it('should read a nested legal name in acmt.015', () => {
        const record = detailed('acmt.015.xml');

        assert.ok(isRecordOf(record, 'acmt.015'));
        assert.strictEqual(record.processId, 'PRC-888');
        assert.strictEqual(record.accountId, 'GB82WEST12345698765432');
        assert.strictEqual(record.organizationName, 'Example Trading Ltd');
        assert.strictEqual(record.branchName, 'Uptown Branch');
    });
});
