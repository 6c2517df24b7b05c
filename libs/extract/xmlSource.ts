import { DOMParser } from '@xmldom/xmldom';
import { describeError } from '../errors/transcoderError.js';
import { getComponentLogger } from '../logging/logger.js';

const log = getComponentLogger('xml-source');

const XML_SCHEMA_INSTANCE = 'http://www.w3.org/2001/XMLSchema-instance';
const ENCODING_DECLARATION = /^\s*<\?xml[^>]*\bencoding\s*=\s*["']([A-Za-z0-9._-]+)["']/;

export interface XmlDocumentState {
    document?: Document;
    root?: Element;
}

class XmlSyntaxError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'XmlSyntaxError';
    }
}

/**
 * Decodes raw bytes using the encoding named in the XML declaration, falling
 * back to UTF-8 when none is declared or the label is unknown.
 */
export function decodeXml(raw: Uint8Array | string): string {
    if (typeof raw === 'string') {
        return raw;
    }
    const head = new TextDecoder('latin1').decode(raw.subarray(0, 256));
    const declared = ENCODING_DECLARATION.exec(head)?.[1];
    if (declared) {
        try {
            return new TextDecoder(declared).decode(raw);
        } catch (err) {
            log.debug({ encoding: declared, error: describeError(err) }, 'Unknown XML encoding label, decoding as UTF-8');
        }
    }
    return new TextDecoder('utf-8').decode(raw);
}

/**
 * Parses an XML payload. Malformed input yields an empty state; nothing is thrown.
 */
export function loadXmlDocument(raw: Uint8Array | string): XmlDocumentState {
    try {
        const parser = new DOMParser({
            errorHandler: {
                warning: (message: unknown) => log.debug({ message: String(message) }, 'XML parser warning'),
                error: (message: unknown) => { throw new XmlSyntaxError(String(message)); },
                fatalError: (message: unknown) => { throw new XmlSyntaxError(String(message)); },
            },
        });
        const document = parser.parseFromString(decodeXml(raw), 'text/xml');
        const root = document.documentElement;
        if (!root) {
            log.debug('XML payload has no root element');
            return {};
        }
        return { document, root };
    } catch (err) {
        log.debug({ error: describeError(err) }, 'Malformed XML payload');
        return {};
    }
}

/**
 * Namespace the location paths of a working root are bound to: its declared
 * default namespace, else its own resolved namespace, else the first prefix
 * mapping other than XML Schema instance.
 */
export function deriveNamespace(root: Element): string | undefined {
    const declaredDefault = root.getAttribute('xmlns');
    if (declaredDefault) {
        return declaredDefault;
    }
    if (root.namespaceURI) {
        return root.namespaceURI;
    }
    const attributes = root.attributes;
    for (let i = 0; i < attributes.length; i++) {
        const attribute = attributes[i];
        if (attribute.name.startsWith('xmlns:') && attribute.value && attribute.value !== XML_SCHEMA_INSTANCE) {
            return attribute.value;
        }
    }
    return undefined;
}
