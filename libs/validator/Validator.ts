import { makeReport, TypedRecord, ValidationReport } from '../model/index.js';
import { loadXmlDocument } from '../extract/xmlSource.js';
import { getComponentLogger } from '../logging/logger.js';
import { unwrapAppHeader } from '../parser/appHeader.js';
import { RawMessage, sniffFormat } from '../parser/formatSniffer.js';
import { businessRuleErrors } from './businessRules.js';
import { mtStructureErrors } from './mtStructure.js';
import { SchemaRegistry } from './schemaRegistry.js';
import { checkConformance } from './xsdConformance.js';

const log = getComponentLogger('validator');

export interface SchemaValidationOptions {
    /** Registry to resolve namespaces against (default: the shared registry) */
    registry?: SchemaRegistry;
}

function xmlStructureErrors(raw: RawMessage, registry: SchemaRegistry): string[] {
    const { root } = loadXmlDocument(raw);
    if (!root) {
        return ['Malformed XML: document could not be parsed'];
    }
    const working = unwrapAppHeader(root);
    const namespace = working.namespace ?? '';
    const lookup = registry.lookup(namespace);
    switch (lookup.status) {
        case 'unregistered':
            return [`Unsupported namespace: '${namespace}'. No schema is registered for it.`];
        case 'unreadable':
            log.warn({ namespace, filePath: lookup.filePath, reason: lookup.reason }, 'Registered schema could not be loaded');
            return [`Schema for namespace '${namespace}' could not be loaded: ${lookup.reason}`];
        case 'ready':
            return checkConformance(working.root, lookup.schema);
    }
}

/**
 * Structural and business-rule validation. Both return a report; invalid
 * input is never an exception.
 */
export class Validator {
    /**
     * Wire-level check: MT block grammar, or XML conformance to the schema
     * registered for the document namespace.
     */
    static validateSchema(raw: RawMessage, options: SchemaValidationOptions = {}): ValidationReport {
        const format = sniffFormat(raw);
        let errors: string[];
        if (format === 'MT') {
            errors = mtStructureErrors(typeof raw === 'string' ? raw : new TextDecoder('utf-8').decode(raw));
        } else if (format === 'XML') {
            errors = xmlStructureErrors(raw, options.registry ?? SchemaRegistry.shared());
        } else {
            errors = ['Unrecognized message format: expected SWIFT MT blocks or XML'];
        }
        log.debug({ format, errorCount: errors.length }, 'Schema validation finished');
        return makeReport(errors);
    }

    /** Business rules over a parsed record */
    static validate(record: TypedRecord): ValidationReport {
        return makeReport(businessRuleErrors(record));
    }
}
