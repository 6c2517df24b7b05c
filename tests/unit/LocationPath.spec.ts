/**
 * Unit Tests: Location Paths
 *
 * Tests compilation of the field path language and its error cases.
 *
 * @see libs/extract/locationPath.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { compileLocationPath } from '../../libs/extract/locationPath.js';
import { LocationPathError } from '../../libs/errors/transcoderError.js';

describe('compileLocationPath', () => {
    it('should compile child steps', () => {
        const path = compileLocationPath('GrpHdr/MsgId');

        assert.deepStrictEqual(path.alternatives, [{
            steps: [
                { axis: 'child', name: 'GrpHdr', withAttribute: undefined },
                { axis: 'child', name: 'MsgId', withAttribute: undefined },
            ],
        }]);
    });

    it('should compile descendant and attribute predicates', () => {
        const path = compileLocationPath('//*[@Ccy]');

        assert.deepStrictEqual(path.alternatives[0].steps, [
            { axis: 'descendant-or-self', name: '*', withAttribute: 'Ccy' },
        ]);
    });

    it('should compile a terminal attribute selection', () => {
        const [alternative] = compileLocationPath('//IntrBkSttlmAmt/@Ccy').alternatives;

        assert.strictEqual(alternative.attribute, 'Ccy');
        assert.deepStrictEqual(alternative.steps.map(step => step.name), ['IntrBkSttlmAmt']);
    });

    it('should turn an inner double slash into a descendant step', () => {
        const [alternative] = compileLocationPath('Acct//BICFI').alternatives;

        assert.deepStrictEqual(alternative.steps.map(step => step.axis), ['child', 'descendant']);
    });

    it('should compile relative descendant paths', () => {
        const [alternative] = compileLocationPath('.//Ntry').alternatives;

        assert.deepStrictEqual(alternative.steps, [{ axis: 'descendant', name: 'Ntry', withAttribute: undefined }]);
    });

    it('should split alternatives on the pipe', () => {
        const path = compileLocationPath('//EndToEndId | //OrgnlEndToEndId');

        assert.deepStrictEqual(path.alternatives.map(alt => alt.steps[0].name), ['EndToEndId', 'OrgnlEndToEndId']);
    });

    it('should cache compiled expressions', () => {
        assert.strictEqual(compileLocationPath('//Dbtr/Nm'), compileLocationPath('//Dbtr/Nm'));
    });

    it('should reject malformed expressions', () => {
        for (const expression of ['/Document', 'GrpHdr/', '@Ccy', '//@Ccy', 'Amt[', 'A | ', '//Amt/@Ccy/Nm']) {
            assert.throws(() => compileLocationPath(expression), LocationPathError, expression);
        }
    });
});
