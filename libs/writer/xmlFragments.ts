import type { XMLBuilder } from 'xmlbuilder2/lib/interfaces.js';
import type { PostalAddress } from '../model/index.js';

/**
 * Element groups shared by every XML document the library writes.
 */

export const ISO20022_NAMESPACE_PREFIX = 'urn:iso:std:iso:20022:tech:xsd:';

const IBAN_SHAPE = /^[A-Z]{2}\d{2}[A-Z0-9]{11,30}$/;

/** `<Tag><FinInstnId><BICFI>bic</BICFI></FinInstnId></Tag>` */
export function addAgent(parent: XMLBuilder, tag: string, bic: string): void {
    parent.ele(tag).ele('FinInstnId').ele('BICFI').txt(bic);
}

/** Account identification: IBAN when the value is IBAN-shaped, else Othr/Id */
export function addAccount(parent: XMLBuilder, tag: string, account: string): XMLBuilder {
    const node = parent.ele(tag);
    const id = node.ele('Id');
    if (IBAN_SHAPE.test(account)) {
        id.ele('IBAN').txt(account);
    } else {
        id.ele('Othr').ele('Id').txt(account);
    }
    return node;
}

/** PstlAdr with only the parts that carry data, in schema order */
export function addPostalAddress(parent: XMLBuilder, address: PostalAddress | undefined): void {
    if (!address) {
        return;
    }
    const parts: Array<[string, string | undefined]> = [
        ['StrtNm', address.streetName],
        ['BldgNb', address.buildingNumber],
        ['PstCd', address.postCode],
        ['TwnNm', address.townName],
        ['Ctry', address.country],
    ];
    const present = parts.filter((part): part is [string, string] => part[1] !== undefined);
    if (present.length === 0 && address.addressLines.length === 0) {
        return;
    }
    const node = parent.ele('PstlAdr');
    for (const [tag, value] of present) {
        node.ele(tag).txt(value);
    }
    for (const line of address.addressLines) {
        node.ele('AdrLine').txt(line);
    }
}

/** Timestamp without milliseconds, as ISO 20022 ISODateTime */
export function isoDateTime(date: Date): string {
    return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}
