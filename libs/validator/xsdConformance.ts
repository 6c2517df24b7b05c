import { childElements } from '../extract/locationPath.js';

/**
 * Structural XML Schema checking: content models (sequence, choice, all,
 * any and occurrence bounds), simple versus element-only content, and
 * required attributes. Facets and simple-type lexical rules are not checked.
 *
 * Messages follow the libxml2 wording, element names in `{namespace}local` form.
 */

const XSD_NAMESPACE = 'http://www.w3.org/2001/XMLSchema';

interface Occurs {
    min: number;
    max: number;
}

export interface ElementParticle extends Occurs {
    kind: 'element';
    name: string;
    type: TypeRef;
}

export interface GroupParticle extends Occurs {
    kind: 'sequence' | 'choice' | 'all';
    particles: Particle[];
}

export interface AnyParticle extends Occurs {
    kind: 'any';
}

export type Particle = ElementParticle | GroupParticle | AnyParticle;

export interface ComplexTypeDef {
    kind: 'complex';
    content?: GroupParticle;
    requiredAttributes: string[];
    simpleContent: boolean;
    mixed: boolean;
}

export interface SimpleTypeDef {
    kind: 'simple';
}

/** Element declared without a type: anything goes */
export interface AnyTypeDef {
    kind: 'anyType';
}

export type TypeDef = ComplexTypeDef | SimpleTypeDef | AnyTypeDef;

/** Named reference resolved lazily, or an inline definition */
export type TypeRef = { ref: string } | TypeDef;

export interface CompiledSchema {
    targetNamespace: string;
    elements: Map<string, TypeRef>;
    types: Map<string, TypeDef>;
}

function xsdChildren(element: Element, localName?: string): Element[] {
    return childElements(element).filter(child =>
        child.namespaceURI === XSD_NAMESPACE && (localName === undefined || child.localName === localName));
}

function readOccurs(element: Element): Occurs {
    const min = element.getAttribute('minOccurs');
    const max = element.getAttribute('maxOccurs');
    return {
        min: min ? Number.parseInt(min, 10) : 1,
        max: max === 'unbounded' ? Number.POSITIVE_INFINITY : max ? Number.parseInt(max, 10) : 1,
    };
}

function localPart(qualifiedName: string): { prefix?: string; local: string } {
    const colon = qualifiedName.indexOf(':');
    return colon < 0
        ? { local: qualifiedName }
        : { prefix: qualifiedName.slice(0, colon), local: qualifiedName.slice(colon + 1) };
}

function typeReference(element: Element, typeName: string): TypeRef {
    const { prefix, local } = localPart(typeName);
    const namespace = prefix === undefined
        ? element.lookupNamespaceURI(null)
        : element.lookupNamespaceURI(prefix);
    if (namespace === XSD_NAMESPACE) {
        return local === 'anyType' ? { kind: 'anyType' } : { kind: 'simple' };
    }
    return { ref: local };
}

function compileElement(element: Element): TypeRef {
    const typeName = element.getAttribute('type');
    if (typeName) {
        return typeReference(element, typeName);
    }
    const complex = xsdChildren(element, 'complexType')[0];
    if (complex) {
        return compileComplexType(complex);
    }
    return xsdChildren(element, 'simpleType').length > 0 ? { kind: 'simple' } : { kind: 'anyType' };
}

function compileGroup(group: Element): GroupParticle {
    const kind = group.localName === 'choice' ? 'choice' : group.localName === 'all' ? 'all' : 'sequence';
    const particles: Particle[] = [];
    for (const child of xsdChildren(group)) {
        switch (child.localName) {
            case 'element':
                particles.push({
                    kind: 'element',
                    name: child.getAttribute('name') ?? localPart(child.getAttribute('ref') ?? '').local,
                    type: compileElement(child),
                    ...readOccurs(child),
                });
                break;
            case 'sequence':
            case 'choice':
            case 'all':
                particles.push(compileGroup(child));
                break;
            case 'any':
                particles.push({ kind: 'any', ...readOccurs(child) });
                break;
        }
    }
    return { kind, particles, ...readOccurs(group) };
}

function requiredAttributes(container: Element): string[] {
    return xsdChildren(container, 'attribute')
        .filter(attribute => attribute.getAttribute('use') === 'required')
        .map(attribute => attribute.getAttribute('name') ?? '')
        .filter(name => name.length > 0);
}

function compileComplexType(complex: Element): ComplexTypeDef {
    const simpleContent = xsdChildren(complex, 'simpleContent')[0];
    if (simpleContent) {
        const derivation = xsdChildren(simpleContent)[0];
        return {
            kind: 'complex',
            requiredAttributes: derivation ? requiredAttributes(derivation) : [],
            simpleContent: true,
            mixed: false,
        };
    }
    const group = xsdChildren(complex).find(child =>
        child.localName === 'sequence' || child.localName === 'choice' || child.localName === 'all');
    return {
        kind: 'complex',
        content: group ? compileGroup(group) : undefined,
        requiredAttributes: requiredAttributes(complex),
        simpleContent: false,
        mixed: complex.getAttribute('mixed') === 'true',
    };
}

/**
 * Compiles the global element and type declarations of a schema document.
 */
export function compileSchema(schemaRoot: Element): CompiledSchema {
    const schema: CompiledSchema = {
        targetNamespace: schemaRoot.getAttribute('targetNamespace') ?? '',
        elements: new Map(),
        types: new Map(),
    };
    for (const child of xsdChildren(schemaRoot)) {
        const name = child.getAttribute('name');
        if (!name) {
            continue;
        }
        if (child.localName === 'element') {
            schema.elements.set(name, compileElement(child));
        } else if (child.localName === 'complexType') {
            schema.types.set(name, compileComplexType(child));
        } else if (child.localName === 'simpleType') {
            schema.types.set(name, { kind: 'simple' });
        }
    }
    return schema;
}

/**
 * Content-model matcher over one element's children. Tracks the furthest
 * position a particle failed at and the names expected there.
 */
class ContentMatcher {
    furthest = -1;
    expected: string[] = [];

    constructor(
        private readonly children: Element[],
        private readonly namespace: string
    ) {}

    private expect(position: number, name: string): void {
        if (position > this.furthest) {
            this.furthest = position;
            this.expected = [];
        }
        if (position === this.furthest && !this.expected.includes(name)) {
            this.expected.push(name);
        }
    }

    /** Position after matching the particle with its occurrence bounds, or undefined */
    match(particle: Particle, position: number): number | undefined {
        let current = position;
        let count = 0;
        while (count < particle.max) {
            const next = this.matchOnce(particle, current);
            if (next === undefined) {
                break;
            }
            count++;
            if (next === current) {
                // empty match satisfies any remaining minimum
                count = Math.max(count, particle.min);
                break;
            }
            current = next;
        }
        return count >= particle.min ? current : undefined;
    }

    private matchOnce(particle: Particle, position: number): number | undefined {
        switch (particle.kind) {
            case 'element': {
                const child = this.children[position];
                if (child && child.localName === particle.name && (child.namespaceURI ?? '') === this.namespace) {
                    return position + 1;
                }
                this.expect(position, `{${this.namespace}}${particle.name}`);
                return undefined;
            }
            case 'any':
                return position < this.children.length ? position + 1 : undefined;
            case 'sequence': {
                let current: number | undefined = position;
                for (const inner of particle.particles) {
                    current = this.match(inner, current);
                    if (current === undefined) {
                        return undefined;
                    }
                }
                return current;
            }
            case 'choice': {
                let empty = false;
                for (const inner of particle.particles) {
                    const next = this.match(inner, position);
                    if (next !== undefined && next > position) {
                        return next;
                    }
                    empty = empty || next !== undefined;
                }
                return empty ? position : undefined;
            }
            case 'all':
                return this.matchAll(particle, position);
        }
    }

    private matchAll(group: GroupParticle, position: number): number | undefined {
        const counts = new Map<Particle, number>();
        let current = position;
        for (; current < this.children.length; current++) {
            const child = this.children[current];
            const particle = group.particles.find(inner =>
                inner.kind === 'element' && inner.name === child.localName && (counts.get(inner) ?? 0) < inner.max);
            if (!particle) {
                break;
            }
            counts.set(particle, (counts.get(particle) ?? 0) + 1);
        }
        for (const particle of group.particles) {
            if ((counts.get(particle) ?? 0) < particle.min) {
                if (particle.kind === 'element') {
                    this.expect(current, `{${this.namespace}}${particle.name}`);
                }
                return undefined;
            }
        }
        return current;
    }
}

function declaredElements(particle: Particle, into: Map<string, TypeRef>): Map<string, TypeRef> {
    if (particle.kind === 'element') {
        if (!into.has(particle.name)) {
            into.set(particle.name, particle.type);
        }
    } else if (particle.kind !== 'any') {
        for (const inner of particle.particles) {
            declaredElements(inner, into);
        }
    }
    return into;
}

function hasCharacterContent(element: Element): boolean {
    for (let node = element.firstChild; node; node = node.nextSibling) {
        if ((node.nodeType === 3 || node.nodeType === 4) && (node.nodeValue ?? '').trim().length > 0) {
            return true;
        }
    }
    return false;
}

/**
 * Checks a document root against a compiled schema; returns every violation found.
 */
export function checkConformance(root: Element, schema: CompiledSchema): string[] {
    const errors: string[] = [];
    const namespace = schema.targetNamespace;
    const label = (element: Element) => `{${element.namespaceURI ?? ''}}${element.localName}`;

    const resolve = (ref: TypeRef): TypeDef => {
        if ('ref' in ref) {
            return schema.types.get(ref.ref) ?? { kind: 'anyType' };
        }
        return ref;
    };

    const visit = (element: Element, ref: TypeRef): void => {
        const type = resolve(ref);
        if (type.kind === 'anyType') {
            return;
        }
        const children = childElements(element);

        if (type.kind === 'simple' || type.simpleContent) {
            if (children.length > 0) {
                errors.push(`Element '${label(element)}': Element content is not allowed, because the content type is a simple type.`);
            }
            if (type.kind === 'complex') {
                for (const attribute of type.requiredAttributes) {
                    if (!element.hasAttribute(attribute)) {
                        errors.push(`Element '${label(element)}': The attribute '${attribute}' is required but missing.`);
                    }
                }
            }
            return;
        }

        for (const attribute of type.requiredAttributes) {
            if (!element.hasAttribute(attribute)) {
                errors.push(`Element '${label(element)}': The attribute '${attribute}' is required but missing.`);
            }
        }
        if (!type.mixed && hasCharacterContent(element)) {
            errors.push(`Element '${label(element)}': Character content other than whitespace is not allowed because the content type is 'element-only'.`);
        }

        if (!type.content) {
            if (children.length > 0) {
                errors.push(`Element '${label(children[0])}': This element is not expected.`);
            }
            return;
        }

        const matcher = new ContentMatcher(children, namespace);
        const consumed = matcher.match(type.content, 0);
        if (consumed === undefined || consumed < children.length) {
            const at = Math.max(matcher.furthest, consumed ?? 0);
            const expected = at === matcher.furthest && matcher.expected.length > 0
                ? ` Expected is ( ${matcher.expected.join(', ')} ).`
                : '';
            if (at < children.length) {
                errors.push(`Element '${label(children[at])}': This element is not expected.${expected}`);
            } else {
                errors.push(`Element '${label(element)}': Missing child element(s).${expected}`);
            }
        }

        const declared = declaredElements(type.content, new Map());
        for (const child of children) {
            const childType = declared.get(child.localName);
            if (childType && (child.namespaceURI ?? '') === namespace) {
                visit(child, childType);
            }
        }
    };

    const rootType = (root.namespaceURI ?? '') === namespace ? schema.elements.get(root.localName) : undefined;
    if (!rootType) {
        return [`Element '${label(root)}': No matching global declaration available for the validation root.`];
    }
    visit(root, rootType);
    return errors;
}
