import { XmlFieldExtractor } from '../../extract/xmlFieldExtractor.js';
import { FamilyRoutine } from './shared.js';

/**
 * Account management (acmt): opening requests and excluded mandate maintenance
 * share one field layout.
 */
function readAccountRequest(x: XmlFieldExtractor) {
    return {
        creationDateTime: x.text('//Refs/MsgId/CreDtTm'),
        processId: x.text('//Refs/PrcId/Id'),
        accountId: x.text('//Acct/Id/IBAN | //Acct/Id/Othr/Id'),
        accountCurrency: x.text('//Acct/Ccy'),
        organizationName: x.text('//Org/FullLglNm/FullLglNm | //Org/FullLglNm'),
        branchName: x.text('//AcctSvcrId/BrnchId/Nm'),
    };
}

export const parseAcmt007: FamilyRoutine<'acmt.007'> = (x, base) => ({
    kind: 'acmt.007',
    ...base,
    ...readAccountRequest(x),
});

export const parseAcmt015: FamilyRoutine<'acmt.015'> = (x, base) => ({
    kind: 'acmt.015',
    ...base,
    ...readAccountRequest(x),
});
