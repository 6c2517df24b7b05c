/**
 * Wire format detection on the first bytes of a payload.
 */

export type RawMessage = Uint8Array | string;

export type WireFormat = 'MT' | 'XML' | 'UNKNOWN';

export function sniffFormat(raw: RawMessage): WireFormat {
    const head = typeof raw === 'string'
        ? raw.slice(0, 64)
        : new TextDecoder('utf-8', { ignoreBOM: true }).decode(raw.subarray(0, 64));
    // MT is recognised on the raw prefix only; XML may follow a BOM or whitespace
    if (head.startsWith('{1:')) {
        return 'MT';
    }
    if (head.replace(/^\uFEFF/, '').trimStart().startsWith('<')) {
        return 'XML';
    }
    return 'UNKNOWN';
}
