import { LocationPathError } from '../errors/transcoderError.js';

/**
 * Location paths: the small path language used to address fields in an
 * ISO 20022 document.
 *
 *   GrpHdr/MsgId                  child steps from the context element
 *   //Dbtr/Nm                     descendant-or-self of the context
 *   .//Ntry                       descendants of the context
 *   Acct//BICFI                   descendants of the previous step
 *   //*[@Ccy]                     any element carrying the attribute
 *   //IntrBkSttlmAmt/@Ccy         attribute value
 *   //EndToEndId | //OrgnlEndToEndId   alternatives, first non-empty wins
 */

export type StepAxis = 'child' | 'descendant' | 'descendant-or-self';

export interface PathStep {
    axis: StepAxis;
    /** Local name, or `*` for any element */
    name: string;
    /** Element must carry this attribute */
    withAttribute?: string;
}

export interface PathAlternative {
    steps: PathStep[];
    /** Terminal attribute selection */
    attribute?: string;
}

export interface LocationPath {
    expression: string;
    alternatives: PathAlternative[];
}

const NAME = '[A-Za-z_][\\w.-]*';
const STEP_PATTERN = new RegExp(`^(\\*|${NAME})(?:\\[@(${NAME})\\])?$`);
const ATTRIBUTE_PATTERN = new RegExp(`^@(${NAME})$`);

const compiled = new Map<string, LocationPath>();

function compileAlternative(expression: string, source: string): PathAlternative {
    let rest = source.trim();
    if (rest.length === 0) {
        throw new LocationPathError(expression, 'empty alternative');
    }

    let axis: StepAxis = 'child';
    if (rest.startsWith('.//')) {
        axis = 'descendant';
        rest = rest.slice(3);
    } else if (rest.startsWith('//')) {
        axis = 'descendant-or-self';
        rest = rest.slice(2);
    } else if (rest.startsWith('./')) {
        rest = rest.slice(2);
    } else if (rest.startsWith('/')) {
        throw new LocationPathError(expression, 'absolute paths are not supported');
    }

    const segments = rest.split('/');
    const alternative: PathAlternative = { steps: [] };

    for (let i = 0; i < segments.length; i++) {
        const segment = segments[i].trim();
        const isLast = i === segments.length - 1;

        if (segment === '') {
            if (isLast || axis !== 'child') {
                throw new LocationPathError(expression, 'dangling separator');
            }
            axis = 'descendant';
            continue;
        }

        const attributeMatch = ATTRIBUTE_PATTERN.exec(segment);
        if (attributeMatch) {
            if (!isLast || alternative.steps.length === 0 || axis !== 'child') {
                throw new LocationPathError(expression, 'attribute selection must be the final step');
            }
            alternative.attribute = attributeMatch[1];
            continue;
        }

        const stepMatch = STEP_PATTERN.exec(segment);
        if (!stepMatch) {
            throw new LocationPathError(expression, `invalid step '${segment}'`);
        }
        alternative.steps.push({
            axis,
            name: stepMatch[1],
            withAttribute: stepMatch[2],
        });
        axis = 'child';
    }

    return alternative;
}

/**
 * Compiles an expression, caching the result. Throws LocationPathError for
 * malformed expressions.
 */
export function compileLocationPath(expression: string): LocationPath {
    const cached = compiled.get(expression);
    if (cached) {
        return cached;
    }

    const path: LocationPath = {
        expression,
        alternatives: expression.split('|').map(part => compileAlternative(expression, part)),
    };
    compiled.set(expression, path);
    return path;
}

export function isElement(node: Node): node is Element {
    return node.nodeType === 1;
}

export function childElements(parent: Element): Element[] {
    const children: Element[] = [];
    const nodes = parent.childNodes;
    for (let i = 0; i < nodes.length; i++) {
        const node = nodes[i];
        if (isElement(node)) {
            children.push(node);
        }
    }
    return children;
}

function collectDescendants(parent: Element, into: Element[]): void {
    for (const child of childElements(parent)) {
        into.push(child);
        collectDescendants(child, into);
    }
}

function matchesStep(element: Element, step: PathStep, namespace: string | undefined): boolean {
    if (step.name !== '*' && element.localName !== step.name) {
        return false;
    }
    if (namespace !== undefined && element.namespaceURI !== namespace) {
        return false;
    }
    return step.withAttribute === undefined || element.hasAttribute(step.withAttribute);
}

function candidates(context: Element, axis: StepAxis): Element[] {
    if (axis === 'child') {
        return childElements(context);
    }
    const found: Element[] = axis === 'descendant-or-self' ? [context] : [];
    collectDescendants(context, found);
    return found;
}

/**
 * Elements selected by one alternative, in document order without duplicates.
 */
export function selectElements(alternative: PathAlternative, context: Element, namespace: string | undefined): Element[] {
    let current: Element[] = [context];
    for (const step of alternative.steps) {
        const seen = new Set<Element>();
        const next: Element[] = [];
        for (const node of current) {
            for (const candidate of candidates(node, step.axis)) {
                if (!seen.has(candidate) && matchesStep(candidate, step, namespace)) {
                    seen.add(candidate);
                    next.push(candidate);
                }
            }
        }
        current = next;
        if (current.length === 0) break;
    }
    return current;
}
