import { describeError } from '../errors/transcoderError.js';
import { getComponentLogger } from '../logging/logger.js';
import { compileLocationPath, LocationPath, PathAlternative, selectElements } from './locationPath.js';

const log = getComponentLogger('xml-field-extractor');

/**
 * Trimmed concatenation of an element's direct text and CDATA children.
 */
export function directText(element: Element): string | undefined {
    let value = '';
    const nodes = element.childNodes;
    for (let i = 0; i < nodes.length; i++) {
        const node = nodes[i];
        if ((node.nodeType === 3 || node.nodeType === 4) && node.nodeValue) {
            value += node.nodeValue;
        }
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Namespace-aware field lookups over a working root.
 * Every lookup degrades to undefined / [] instead of throwing.
 */
export class XmlFieldExtractor {
    constructor(
        public readonly root: Element | undefined,
        public readonly namespace: string | undefined
    ) { }

    private compile(expression: string): LocationPath | undefined {
        try {
            return compileLocationPath(expression);
        } catch (err) {
            log.debug({ expression, error: describeError(err) }, 'Location path rejected');
            return undefined;
        }
    }

    private matches(alternative: PathAlternative, start: Element): Element[] {
        const selected = selectElements(alternative, start, this.namespace);
        const attribute = alternative.attribute;
        return attribute === undefined ? selected : selected.filter(element => element.hasAttribute(attribute));
    }

    private values(alternative: PathAlternative, start: Element): string[] {
        const values: string[] = [];
        for (const element of this.matches(alternative, start)) {
            const value = alternative.attribute !== undefined
                ? element.getAttribute(alternative.attribute)?.trim()
                : directText(element);
            if (value) {
                values.push(value);
            }
        }
        return values;
    }

    /** Ordered elements selected by the first non-empty alternative */
    nodes(expression: string, context?: Element): Element[] {
        const path = this.compile(expression);
        const start = context ?? this.root;
        if (!path || !start) {
            return [];
        }
        for (const alternative of path.alternatives) {
            const found = this.matches(alternative, start);
            if (found.length > 0) {
                return found;
            }
        }
        return [];
    }

    node(expression: string, context?: Element): Element | undefined {
        return this.nodes(expression, context)[0];
    }

    /** Non-empty values of the first alternative that yields any */
    texts(expression: string, context?: Element): string[] {
        const path = this.compile(expression);
        const start = context ?? this.root;
        if (!path || !start) {
            return [];
        }
        for (const alternative of path.alternatives) {
            const found = this.values(alternative, start);
            if (found.length > 0) {
                return found;
            }
        }
        return [];
    }

    text(expression: string, context?: Element): string | undefined {
        return this.texts(expression, context)[0];
    }

    /** Attribute of the first element matched by the expression */
    attribute(expression: string, name: string, context?: Element): string | undefined {
        const value = this.node(expression, context)?.getAttribute(name)?.trim();
        return value ? value : undefined;
    }
}
