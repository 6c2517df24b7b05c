/**
 * Unit Tests: MessageParser (ISO 20022 XML)
 *
 * Tests format sniffing, base field extraction and the dictionary view.
 *
 * @see libs/parser/MessageParser.ts
 * @see libs/parser/xmlBaseFields.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { MessageParser, parseMessage, sniffFormat } from '../../libs/parser/index.js';
import { loadFixture, loadFixtureBytes } from '../fixtures/loadFixture.js';

describe('sniffFormat', () => {
    it('should recognise MT block text', () => {
        assert.strictEqual(sniffFormat(loadFixture('mt103.txt')), 'MT');
        assert.strictEqual(sniffFormat(loadFixtureBytes('mt940.txt')), 'MT');
    });

    it('should recognise XML after a byte order mark and whitespace', () => {
        assert.strictEqual(sniffFormat('\uFEFF  \n<Document/>'), 'XML');
    });

    it('should only take MT on the exact block 1 prefix', () => {
        assert.strictEqual(sniffFormat(` ${loadFixture('mt103.txt')}`), 'UNKNOWN');
        assert.strictEqual(sniffFormat(`\uFEFF${loadFixture('mt103.txt')}`), 'UNKNOWN');
        assert.strictEqual(sniffFormat(new Uint8Array([0xef, 0xbb, 0xbf, 0x7b, 0x31, 0x3a])), 'UNKNOWN');
    });

    it('should report anything else as unknown', () => {
        assert.strictEqual(sniffFormat('hello'), 'UNKNOWN');
        assert.strictEqual(sniffFormat(''), 'UNKNOWN');
    });
});

describe('MessageParser.parse (XML)', () => {
    it('should extract the base fields of a pacs.008', () => {
        const record = new MessageParser(loadFixture('pacs.008.xml')).parse();

        assert.deepStrictEqual(record, {
            kind: 'payment',
            messageId: 'PACS008-001',
            endToEndId: 'E2E-001',
            uetr: '97ed4827-7b6f-4491-a06f-b548d5a7512d',
            amount: '2500.00',
            currency: 'EUR',
            senderBic: 'BANKDEFFXXX',
            receiverBic: 'BANKFRPPXXX',
            debtorName: 'Alice Example',
            creditorName: 'Bob Example',
            debtorAddress: {
                country: 'DE',
                townName: 'Berlin',
                postCode: '10115',
                streetName: 'Hauptstrasse',
                buildingNumber: '1',
                addressLines: [],
            },
            creditorAddress: {
                country: 'FR',
                townName: 'Paris',
                postCode: undefined,
                streetName: undefined,
                buildingNumber: undefined,
                addressLines: ['1 Rue de Test'],
            },
            debtorAccount: 'DE89370400440532013000',
            creditorAccount: 'ACC-778899',
        });
    });

    it('should parse the same fields from bytes', () => {
        const fromBytes = parseMessage(loadFixtureBytes('pacs.008.xml'));

        assert.strictEqual(fromBytes.messageId, 'PACS008-001');
        assert.strictEqual(fromBytes.kind, 'payment');
    });

    it('should fall back through the agent paths for routing BICs', () => {
        const record = parseMessage(loadFixture('pain.001.xml'));

        assert.strictEqual(record.senderBic, 'BANKDEFFXXX');
        assert.strictEqual(record.receiverBic, 'BANKFRPPXXX');
        assert.strictEqual(record.creditorAccount, 'SUPA-001');
    });

    it('should take the statement servicer as sender and the first amount', () => {
        const record = parseMessage(loadFixture('camt.053.xml'));

        assert.strictEqual(record.messageId, 'CAMT053-001');
        assert.strictEqual(record.senderBic, 'BANKGB22XXX');
        assert.strictEqual(record.receiverBic, undefined);
        assert.strictEqual(record.amount, '1000.00');
        assert.strictEqual(record.currency, 'GBP');
        assert.strictEqual(record.endToEndId, 'E2E-IN-1');
    });

    it('should read original identifiers when no direct ones exist', () => {
        const record = parseMessage(loadFixture('pacs.004.xml'));

        assert.strictEqual(record.endToEndId, 'E2E-001');
        assert.strictEqual(record.uetr, '97ed4827-7b6f-4491-a06f-b548d5a7512d');
    });

    it('should read message ids from the other header layouts', () => {
        assert.strictEqual(parseMessage(loadFixture('acmt.007.xml')).messageId, 'ACMT-111');
        assert.strictEqual(parseMessage(loadFixture('setr.004.xml')).messageId, 'MSG-RED-1');
        assert.strictEqual(parseMessage(loadFixture('camt.056.xml')).messageId, 'ASSIGN-56');
        assert.strictEqual(parseMessage(loadFixture('camt.004.xml')).messageId, 'ACCT-RTN-1');
    });

    it('should keep the base record for every family', () => {
        assert.strictEqual(parseMessage(loadFixture('camt.053.xml')).kind, 'payment');
    });
});

describe('MessageParser.flatten', () => {
    it('should return every base field with null for absent ones', () => {
        const dict = new MessageParser(loadFixture('pacs.009.xml')).flatten();

        assert.deepStrictEqual(dict, {
            kind: 'payment',
            messageId: 'FI-001',
            endToEndId: 'FI-E2E-1',
            uetr: '1b4e28ba-2fa1-4d2b-883f-0016d3cca427',
            amount: '1000000.00',
            currency: 'USD',
            senderBic: null,
            receiverBic: null,
            debtorName: null,
            creditorName: null,
            debtorAddress: null,
            creditorAddress: null,
            debtorAccount: null,
            creditorAccount: null,
        });
    });
});
