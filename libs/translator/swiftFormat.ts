/**
 * Field formatting shared by the MT and MX renderers.
 */

/**
 * 12-character logical terminal for Blocks 1 and 2: BIC8 + terminal code +
 * branch. Missing identifiers take the placeholder.
 */
export function logicalTerminal(bic: string | undefined, placeholder: string): string {
    const value = bic?.trim().toUpperCase();
    if (!value) {
        return placeholder;
    }
    if (value.length === 8) {
        return `${value}XXXX`;
    }
    if (value.length === 11) {
        return `${value.slice(0, 8)}X${value.slice(8)}`;
    }
    return value.padEnd(12, 'X').slice(0, 12);
}

/** Decimal point to MT comma; nothing else changes */
export function toMtAmount(amount: string | null | undefined): string {
    return (amount ?? '0.00').replace('.', ',');
}

function pad2(value: number): string {
    return String(value).padStart(2, '0');
}

export function yymmdd(date: Date): string {
    return `${pad2(date.getUTCFullYear() % 100)}${pad2(date.getUTCMonth() + 1)}${pad2(date.getUTCDate())}`;
}

export function isoDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

/**
 * MT date (YYMMDD) from a value already in MT or ISO form, else the fallback.
 */
export function mtDate(value: string | null | undefined, fallback: Date): string {
    if (value && /^\d{6}$/.test(value)) {
        return value;
    }
    const iso = value ? /^(\d{2})(\d{2})-(\d{2})-(\d{2})/.exec(value) : null;
    return iso ? `${iso[2]}${iso[3]}${iso[4]}` : yymmdd(fallback);
}

/**
 * ISO date (YYYY-MM-DD) from a value already in ISO or MT form, else the fallback.
 */
export function xmlDate(value: string | null | undefined, fallback: Date): string {
    if (value && /^\d{4}-\d{2}-\d{2}/.test(value)) {
        return value.slice(0, 10);
    }
    const mt = value ? /^(\d{2})(\d{2})(\d{2})$/.exec(value) : null;
    return mt ? `20${mt[1]}-${mt[2]}-${mt[3]}` : isoDate(fallback);
}
