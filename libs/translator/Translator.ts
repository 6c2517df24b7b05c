import crypto from 'crypto';
import { TypedRecord } from '../model/index.js';
import { getRuntimeConfig } from '../config/runtimeConfig.js';
import { getComponentLogger } from '../logging/logger.js';
import { UnsupportedTargetError } from '../errors/transcoderError.js';
import { isMtType, MT_TYPES, renderMt } from './mtRenderer.js';
import { isMxTarget, MX_TARGETS, renderMx } from './mxRenderer.js';

const log = getComponentLogger('translator');

export interface TranslatorOptions {
    /** Supplies a UETR where the record has none (default: random UUIDv4) */
    generateUetr?: () => string;
    /** Clock for creation timestamps and default value dates */
    now?: () => Date;
    /** 12-character logical terminal used for missing MT BICs */
    placeholderBic?: string;
}

const MT_TARGET = /^(?:MT)?(\d{3})$/i;
const MX_PREFIX = /^(?:MX[.:]?)?/i;
const MX_VERSION = /\.\d{3}\.\d{2}$/;

export const SUPPORTED_TARGETS: readonly string[] = [
    ...MT_TYPES.map(type => `MT${type}`),
    ...Object.keys(MX_TARGETS),
];

/**
 * Renders Typed Records as SWIFT MT text or ISO 20022 XML.
 *
 * Targets are either an MT type (`'103'`, `'MT940'`) or an ISO 20022 family
 * key (`'pacs.008'`, `'camt.053'`); anything else throws
 * `UnsupportedTargetError`.
 */
export class Translator {
    private readonly generateUetr: () => string;
    private readonly now: () => Date;
    private readonly placeholderBic: string;

    constructor(options: TranslatorOptions = {}) {
        this.generateUetr = options.generateUetr ?? (() => crypto.randomUUID());
        this.now = options.now ?? (() => new Date());
        this.placeholderBic = (options.placeholderBic ?? getRuntimeConfig().mtPlaceholderBic)
            .padEnd(12, 'X')
            .slice(0, 12);
    }

    static render(record: TypedRecord, target: string, options?: TranslatorOptions): Buffer {
        return new Translator(options).render(record, target);
    }

    render(record: TypedRecord, target: string): Buffer {
        const mt = MT_TARGET.exec(target.trim());
        return mt ? this.toMt(record, mt[1]) : this.toMx(record, target);
    }

    toMt(record: TypedRecord, type: string = '103'): Buffer {
        const normalized = type.trim().replace(/^MT/i, '');
        if (!isMtType(normalized)) {
            throw new UnsupportedTargetError(`MT${normalized}`, SUPPORTED_TARGETS);
        }
        log.debug({ kind: record.kind, target: `MT${normalized}` }, 'Rendering MT message');
        return Buffer.from(renderMt(record, normalized, {
            now: this.now(),
            placeholderBic: this.placeholderBic,
            generateUetr: this.generateUetr,
        }), 'utf-8');
    }

    toMx(record: TypedRecord, key: string = 'pacs.008'): Buffer {
        const normalized = key.trim().replace(MX_PREFIX, '').replace(MX_VERSION, '').toLowerCase();
        if (!isMxTarget(normalized)) {
            throw new UnsupportedTargetError(key, SUPPORTED_TARGETS);
        }
        log.debug({ kind: record.kind, target: normalized }, 'Rendering ISO 20022 message');
        return Buffer.from(renderMx(record, normalized, {
            now: this.now(),
            generateUetr: this.generateUetr,
        }), 'utf-8');
    }
}
