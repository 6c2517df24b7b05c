import { PaymentMessage, toDict, TypedRecord, ValidationReport } from '../model/index.js';
import type { DictValue } from '../model/index.js';
import { XmlFieldExtractor } from '../extract/xmlFieldExtractor.js';
import { loadXmlDocument } from '../extract/xmlSource.js';
import { getComponentLogger } from '../logging/logger.js';
import { Validator } from '../validator/Validator.js';
import { AppHeaderInfo, unwrapAppHeader } from './appHeader.js';
import { resolveFamily } from './familyResolver.js';
import { runFamilyRoutine } from './families/index.js';
import { RawMessage, sniffFormat } from './formatSniffer.js';
import { parseMt } from './mtParser.js';
import { extractPaymentFields } from './xmlBaseFields.js';

const log = getComponentLogger('message-parser');

/**
 * Wire payload to typed record. Malformed input never throws: it yields a
 * record whose fields are absent.
 *
 * parse() gives the base record for XML and the detailed record for MT;
 * parseDetailed() gives the family record whenever the family is known.
 */
export class MessageParser {
    private readonly isMt: boolean;
    private xmlState?: { x: XmlFieldExtractor; header?: AppHeaderInfo };

    constructor(private readonly raw: RawMessage) {
        this.isMt = sniffFormat(raw) === 'MT';
    }

    private xml(): { x: XmlFieldExtractor; header?: AppHeaderInfo } {
        if (!this.xmlState) {
            const { root } = loadXmlDocument(this.raw);
            if (!root) {
                this.xmlState = { x: new XmlFieldExtractor(undefined, undefined) };
            } else {
                const working = unwrapAppHeader(root);
                this.xmlState = { x: new XmlFieldExtractor(working.root, working.namespace), header: working.header };
            }
        }
        return this.xmlState;
    }

    parse(): TypedRecord {
        if (this.isMt) {
            return parseMt(this.raw);
        }
        return this.parseBase();
    }

    private parseBase(): PaymentMessage {
        const { x, header } = this.xml();
        return { kind: 'payment', ...extractPaymentFields(x, header) };
    }

    parseDetailed(): TypedRecord {
        if (this.isMt) {
            return parseMt(this.raw);
        }
        const { x, header } = this.xml();
        const base = extractPaymentFields(x, header);
        const family = resolveFamily(x.namespace, x.root);
        if (!family) {
            log.debug({ namespace: x.namespace }, 'No family routine for document, returning base record');
            return { kind: 'payment', ...base };
        }
        return runFamilyRoutine(family, x, base);
    }

    /** Base record as a plain object, absent fields as null */
    flatten(): Record<string, DictValue> {
        return toDict(this.parse());
    }

    validateSchema(): ValidationReport {
        return Validator.validateSchema(this.raw);
    }
}

export function parseMessage(raw: RawMessage): TypedRecord {
    return new MessageParser(raw).parse();
}

export function parseDetailedMessage(raw: RawMessage): TypedRecord {
    return new MessageParser(raw).parseDetailed();
}
