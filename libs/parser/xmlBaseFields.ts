import { PaymentFields, PostalAddress } from '../model/index.js';
import { directText, XmlFieldExtractor } from '../extract/xmlFieldExtractor.js';
import { AppHeaderInfo } from './appHeader.js';

/**
 * Base payment fields shared by every ISO 20022 family.
 */

const agentBic = (agent: string) =>
    `//${agent}/FinInstnId/BICFI | //${agent}/FinInstnId/BIC`;

const SENDER_PATHS = [
    '//GrpHdr/InstgAgt/FinInstnId/BICFI | //GrpHdr/InstgAgt/FinInstnId/BIC',
    agentBic('InstgAgt'),
    agentBic('DbtrAgt'),
    '//Acct/Svcr/FinInstnId/BICFI | //Acct/Svcr/FinInstnId/BIC',
];

const RECEIVER_PATHS = [
    '//GrpHdr/InstdAgt/FinInstnId/BICFI | //GrpHdr/InstdAgt/FinInstnId/BIC',
    agentBic('InstdAgt'),
    agentBic('CdtrAgt'),
    '//MsgRcpt/Id/OrgId/AnyBIC',
];

function firstText(x: XmlFieldExtractor, paths: string[]): string | undefined {
    for (const path of paths) {
        const value = x.text(path);
        if (value !== undefined) {
            return value;
        }
    }
    return undefined;
}

/**
 * Postal address of a PstlAdr element; undefined when every part is empty.
 */
export function readPostalAddress(x: XmlFieldExtractor, element: Element | undefined): PostalAddress | undefined {
    if (!element) {
        return undefined;
    }
    const address: PostalAddress = {
        country: x.text('Ctry', element),
        townName: x.text('TwnNm', element),
        postCode: x.text('PstCd', element),
        streetName: x.text('StrtNm', element),
        buildingNumber: x.text('BldgNb', element),
        addressLines: x.texts('AdrLine', element),
    };
    const hasData = address.country !== undefined || address.townName !== undefined
        || address.postCode !== undefined || address.streetName !== undefined
        || address.buildingNumber !== undefined || address.addressLines.length > 0;
    return hasData ? address : undefined;
}

export function extractPaymentFields(x: XmlFieldExtractor, header?: AppHeaderInfo): PaymentFields {
    const amountNode = x.node('//*[@Ccy]');

    return {
        messageId: x.text('//GrpHdr/MsgId | //Refs/MsgId/Id | //MsgId/Id | //Assgnmt/Id | //MsgHdr/MsgId') ?? header?.businessMessageId,
        endToEndId: x.text('//EndToEndId | //OrgnlEndToEndId'),
        uetr: x.text('//UETR | //OrgnlUETR'),
        amount: amountNode ? directText(amountNode) : undefined,
        currency: amountNode?.getAttribute('Ccy')?.trim() || undefined,
        senderBic: firstText(x, SENDER_PATHS) ?? header?.senderBic,
        receiverBic: firstText(x, RECEIVER_PATHS) ?? header?.receiverBic,
        debtorName: x.text('//Dbtr/Nm | //Dbtr/Pty/Nm'),
        creditorName: x.text('//Cdtr/Nm | //Cdtr/Pty/Nm'),
        debtorAddress: readPostalAddress(x, x.node('//Dbtr/PstlAdr | //Dbtr/Pty/PstlAdr')),
        creditorAddress: readPostalAddress(x, x.node('//Cdtr/PstlAdr | //Cdtr/Pty/PstlAdr')),
        debtorAccount: x.text('//DbtrAcct/Id/IBAN | //DbtrAcct/Id/Othr/Id'),
        creditorAccount: x.text('//CdtrAcct/Id/IBAN | //CdtrAcct/Id/Othr/Id'),
    };
}
