import { FAMILY_KEYS, FamilyKey } from '../model/index.js';
import { childElements } from '../extract/locationPath.js';

/**
 * Message-level element name of each family, used when the document carries
 * no namespace to match on.
 */
export const ROOT_TAG_FAMILIES: Readonly<Record<string, FamilyKey>> = {
    FIToFICstmrCdtTrf: 'pacs.008',
    PmtRtr: 'pacs.004',
    FICdtTrf: 'pacs.009',
    CstmrCdtTrfInitn: 'pain.001',
    CstmrPmtStsRpt: 'pain.002',
    CstmrDrctDbtInitn: 'pain.008',
    RtrAcct: 'camt.004',
    RsltnOfInvstgtn: 'camt.029',
    BkToCstmrAcctRpt: 'camt.052',
    BkToCstmrStmt: 'camt.053',
    BkToCstmrDbtCdtNtfctn: 'camt.054',
    FIToFICstmrCdtTrfRcl: 'camt.056',
    FIToFIPmtCxlReq: 'camt.056',
    BkSrvcsBllgStmt: 'camt.086',
    FXTradInstr: 'fxtr.014',
    SctiesSttlmTxInstr: 'sese.023',
    AcctOpngReq: 'acmt.007',
    AcctExcldMndtMntncReq: 'acmt.015',
    RedOrdr: 'setr.004',
    SbcptOrdr: 'setr.010',
};

/** Local name of the message element: the Document child, or the root itself */
export function messageRootTag(root: Element): string {
    if (root.localName === 'Document') {
        return childElements(root)[0]?.localName ?? root.localName;
    }
    return root.localName;
}

/**
 * Family of a document: namespace substring match first, then the
 * message root element name. Undefined when neither identifies one.
 */
export function resolveFamily(namespace: string | undefined, root: Element | undefined): FamilyKey | undefined {
    if (namespace) {
        const byNamespace = FAMILY_KEYS.find(key => namespace.includes(key));
        if (byNamespace) {
            return byNamespace;
        }
    }
    if (!root) {
        return undefined;
    }
    const tag = messageRootTag(root);
    return Object.prototype.hasOwnProperty.call(ROOT_TAG_FAMILIES, tag) ? ROOT_TAG_FAMILIES[tag] : undefined;
}
