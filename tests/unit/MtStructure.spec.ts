/**
 * Unit Tests: MT Block Structure
 *
 * Tests the header block grammar, Block 4 termination, mandatory fields and
 * the Field 32A value date, currency and amount checks.
 *
 * @see libs/validator/mtStructure.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { mtStructureErrors, terminalBic, Validator } from '../../libs/validator/index.js';
import { loadFixture } from '../fixtures/loadFixture.js';

const HEADERS = '{1:F01BANKUS33AXXX0000000000}{2:I202BANKGB22XXXXN}';

function withBody(...lines: string[]): string {
    return `${HEADERS}{4:\n${lines.join('\n')}\n-}`;
}

describe('MT Structure', () => {
    it('should accept a well-formed MT202', () => {
        assert.deepStrictEqual(mtStructureErrors(loadFixture('mt202.txt')), []);
        assert.deepStrictEqual(Validator.validateSchema(loadFixture('mt202.txt')), { isValid: true, errors: [] });
    });

    it('should accept a well-formed MT103', () => {
        assert.deepStrictEqual(mtStructureErrors(loadFixture('mt103.txt')), []);
    });

    it('should reject a Block 1 whose terminal is not twelve characters', () => {
        const text = loadFixture('mt103.txt').replace('{1:F01SENDUS33XXXX', '{1:F01SENDERUS33AXXX');

        assert.deepStrictEqual(mtStructureErrors(text), ['Invalid Block 1 structure']);
    });

    it('should check the BIC inside the logical terminal', () => {
        const text = '{1:F01bankus33axxx0000000000}{2:I202BANKGB22XXXXN}{4:\n:20:REF\n-}';

        assert.deepStrictEqual(mtStructureErrors(text), ["Invalid BIC format in Block 1: 'bankus33xxx'"]);
    });

    it('should reject a missing Block 4', () => {
        assert.deepStrictEqual(mtStructureErrors(HEADERS), [
            'Invalid Block 4 structure: missing or not terminated by -}',
        ]);
    });

    it('should reject a Block 4 that is never terminated', () => {
        assert.deepStrictEqual(mtStructureErrors(`${HEADERS}{4:\n:20:REF\n`), [
            'Invalid Block 4 structure: missing or not terminated by -}',
        ]);
    });

    it('should require Field 20', () => {
        assert.deepStrictEqual(mtStructureErrors(withBody(':21:REL001', ':32A:231024EUR50000,00')), [
            "Mandatory Field :20: (Sender's Reference) missing",
        ]);
    });

    it('should reject an impossible value date', () => {
        assert.deepStrictEqual(mtStructureErrors(withBody(':20:REF', ':32A:231345EUR50000,00')), [
            "Invalid date in Field 32A: '231345'",
        ]);
        assert.deepStrictEqual(mtStructureErrors(withBody(':20:REF', ':32A:230229EUR1,00')), [
            "Invalid date in Field 32A: '230229'",
        ]);
        assert.deepStrictEqual(mtStructureErrors(withBody(':20:REF', ':32A:240229EUR1,00')), []);
    });

    it('should reject a malformed currency and amount', () => {
        assert.deepStrictEqual(mtStructureErrors(withBody(':20:REF', ':32A:231024eur1x')), [
            "Invalid currency in Field 32A: 'eur'",
            "Invalid amount format in Field 32A: '1x'",
        ]);
    });

    it('should drop the terminal code from a logical terminal', () => {
        assert.strictEqual(terminalBic('BANKUS33AXXX'), 'BANKUS33XXX');
    });
});
