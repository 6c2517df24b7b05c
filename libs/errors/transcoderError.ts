import crypto from 'crypto';
import { logger } from '../logging/logger.js';

/**
 * Programming-time failures raised by the library.
 * Data-quality problems in messages never reach here: they surface as absent
 * record fields or validation report entries.
 */

export type TranscoderErrorCategory = 'PROGRAMMING' | 'SCHEMA';

export class TranscoderError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: TranscoderErrorCategory = 'PROGRAMMING',
        options?: { cause?: unknown }
    ) {
        super(publicMessage);
        this.name = 'TranscoderError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.cause = options?.cause;

        logger.error({
            incidentId: this.incidentId,
            category: this.category,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

/**
 * Raised by the translator and the XML writer for a target outside the supported set.
 */
export class UnsupportedTargetError extends TranscoderError {
    constructor(public readonly target: string, supported: readonly string[]) {
        super(`Unsupported translation target: ${target}`, { supported });
        this.name = 'UnsupportedTargetError';
    }
}

/**
 * Raised when a location path expression cannot be compiled.
 */
export class LocationPathError extends TranscoderError {
    constructor(public readonly expression: string, reason: string) {
        super(`Malformed location path '${expression}': ${reason}`, { expression }, 'SCHEMA');
        this.name = 'LocationPathError';
    }
}

/**
 * Renders an unknown thrown value as a single line suitable for a log field.
 */
export function describeError(err: unknown): string {
    if (err instanceof Error) {
        return `${err.name}: ${err.message}`;
    }
    if (typeof err === 'string') {
        return err;
    }
    if (err && typeof err === 'object' && 'message' in err && typeof err.message === 'string') {
        return err.message;
    }
    return String(err);
}
