import { XmlFieldExtractor } from '../extract/xmlFieldExtractor.js';
import { deriveNamespace } from '../extract/xmlSource.js';

/**
 * Routing data carried by a Business Application Header (head.001).
 */
export interface AppHeaderInfo {
    senderBic?: string;
    receiverBic?: string;
    businessMessageId?: string;
}

export interface WorkingRoot {
    root: Element;
    namespace: string | undefined;
    header?: AppHeaderInfo;
}

/**
 * Locates an AppHdr (as the root or anywhere below it, in any namespace),
 * reads its routing fields, and moves the working root to the embedded
 * Document when there is one.
 */
export function unwrapAppHeader(root: Element): WorkingRoot {
    const anyNamespace = new XmlFieldExtractor(root, undefined);
    const appHdr = root.localName === 'AppHdr' ? root : anyNamespace.node('.//AppHdr');
    if (!appHdr) {
        return { root, namespace: deriveNamespace(root) };
    }

    const hdr = new XmlFieldExtractor(appHdr, deriveNamespace(appHdr));
    const header: AppHeaderInfo = {
        senderBic: hdr.text('Fr/FIId/FinInstnId/BICFI | Fr/FIId/FinInstnId/BIC'),
        receiverBic: hdr.text('To/FIId/FinInstnId/BICFI | To/FIId/FinInstnId/BIC'),
        businessMessageId: hdr.text('BizMsgIdr'),
    };

    const document = root.localName === 'Document' ? root : anyNamespace.node('.//Document');
    const working = document ?? root;
    return { root: working, namespace: deriveNamespace(working), header };
}
