import { TypedRecord } from '../model/index.js';
import { getComponentLogger } from '../logging/logger.js';
import { decimalEquals, parseDecimal, withinPercent } from './decimalAmount.js';

const log = getComponentLogger('reconciler');

export interface MatchOptions {
    /** Accept amounts up to 1% apart, for fees taken along the chain */
    fuzzyAmount?: boolean;
}

const FEE_TOLERANCE_PERCENT = 1n;

function originalMessageId(record: TypedRecord): string | undefined {
    return record.kind === 'pain.002' || record.kind === 'camt.056' ? record.originalMessageId : undefined;
}

function investigationCaseId(record: TypedRecord): string | undefined {
    return record.kind === 'camt.029' || record.kind === 'camt.056' ? record.caseId : undefined;
}

function refersTo(report: TypedRecord, target: TypedRecord): boolean {
    const original = originalMessageId(report);
    return original !== undefined && original === target.messageId;
}

/** The identifier tier that links two records, if any */
export function linkTier(a: TypedRecord, b: TypedRecord): 'uetr' | 'endToEndId' | 'originalMessageId' | 'caseId' | undefined {
    if (a.uetr && a.uetr === b.uetr) {
        return 'uetr';
    }
    if (a.endToEndId && a.endToEndId === b.endToEndId) {
        return 'endToEndId';
    }
    if (refersTo(a, b) || refersTo(b, a)) {
        return 'originalMessageId';
    }
    const caseId = investigationCaseId(a);
    if (caseId !== undefined && caseId === investigationCaseId(b)) {
        return 'caseId';
    }
    return undefined;
}

function amountsAgree(a: TypedRecord, b: TypedRecord, fuzzy: boolean): boolean {
    if (!a.amount || !b.amount || a.currency !== b.currency) {
        return true;
    }
    const left = parseDecimal(a.amount);
    const right = parseDecimal(b.amount);
    if (!left || !right) {
        return a.amount === b.amount;
    }
    return fuzzy ? withinPercent(left, right, FEE_TOLERANCE_PERCENT) : decimalEquals(left, right);
}

/**
 * Links records of one payment lifecycle by shared identifiers, confirmed by
 * amount where both sides carry one in the same currency.
 */
export const Reconciler = {
    isMatch(a: TypedRecord, b: TypedRecord, options: MatchOptions = {}): boolean {
        const tier = linkTier(a, b);
        if (!tier) {
            return false;
        }
        const agreed = amountsAgree(a, b, options.fuzzyAmount ?? false);
        if (!agreed) {
            log.debug({ tier, a: a.messageId, b: b.messageId }, 'Identifiers link but amounts disagree');
        }
        return agreed;
    },

    findMatches(primary: TypedRecord, candidates: readonly TypedRecord[], options: MatchOptions = {}): TypedRecord[] {
        return candidates.filter(candidate => candidate !== primary && Reconciler.isMatch(primary, candidate, options));
    },

    /**
     * Breadth-first closure of the match relation from the seed, in discovery
     * order. Records are tracked by identity.
     */
    traceLifecycle(seed: TypedRecord, all: readonly TypedRecord[], options: MatchOptions = {}): TypedRecord[] {
        const timeline = [seed];
        const seen = new Set<TypedRecord>([seed]);
        const queue = [seed];
        for (let current = queue.shift(); current; current = queue.shift()) {
            for (const match of Reconciler.findMatches(current, all, options)) {
                if (!seen.has(match)) {
                    seen.add(match);
                    timeline.push(match);
                    queue.push(match);
                }
            }
        }
        return timeline;
    },
};
