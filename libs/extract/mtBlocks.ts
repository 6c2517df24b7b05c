/**
 * Block-level access to SWIFT MT text.
 *
 * {1:F01BANKUS33AXXX0000000000}{2:I103BANKGB22XXXXN}{3:{121:<uetr>}}{4:
 * :20:REFERENCE
 * ...
 * -}
 */

export interface MtField {
    tag: string;
    value: string;
}

const BLOCK1_PRIMARY = /\{1:[A-Z]\d{2}([A-Z0-9]{8,14}?)\d{10}\}/;
const BLOCK1_FALLBACK = /\{1:[A-Z]\d{2}([A-Z0-9]{8,12})/;
const BLOCK2 = /\{2:([^}]*)\}?/;
const BLOCK2_OUTPUT_WITH_MIR = /^O(\d{3})\d{4}\d{6}([A-Z0-9]{12})/;
const BLOCK2_TWELVE = /^[IO](\d{3})([A-Z0-9]{12})/;
const BLOCK2_SHORT = /^[IO](\d{3})([A-Z0-9]{8,11})/;
const BLOCK2_TYPE = /^[IO](\d{3})/;
const BLOCK3_UETR = /\{121:([0-9a-fA-F-]{36})\}/;
const TAG_LINE = /^:([0-9A-Z]{2,3}):(.*)$/;

/** Logical terminal to BIC: the terminal code at position 9 is dropped */
export function terminalBic(logicalTerminal: string): string {
    return logicalTerminal.slice(0, 8) + logicalTerminal.slice(9);
}

/** Twelve-character terminals become BIC11; anything else is kept as found */
function headerBic(identifier: string | undefined): string | undefined {
    return identifier?.length === 12 ? terminalBic(identifier) : identifier;
}

export class MtTextBlocks {
    public readonly text: string;
    private fieldCache?: MtField[];

    constructor(raw: Uint8Array | string) {
        this.text = typeof raw === 'string' ? raw : new TextDecoder('utf-8').decode(raw);
    }

    /** BIC of the Block 1 logical terminal */
    senderBic(): string | undefined {
        return headerBic((BLOCK1_PRIMARY.exec(this.text) ?? BLOCK1_FALLBACK.exec(this.text))?.[1]);
    }

    private applicationHeader(): string | undefined {
        return BLOCK2.exec(this.text)?.[1];
    }

    messageType(): string | undefined {
        const header = this.applicationHeader();
        return header === undefined ? undefined : BLOCK2_TYPE.exec(header)?.[1];
    }

    receiverBic(): string | undefined {
        const header = this.applicationHeader();
        if (header === undefined) {
            return undefined;
        }
        const match = BLOCK2_OUTPUT_WITH_MIR.exec(header)
            ?? BLOCK2_TWELVE.exec(header)
            ?? BLOCK2_SHORT.exec(header);
        return headerBic(match?.[2]);
    }

    uetr(): string | undefined {
        return BLOCK3_UETR.exec(this.text)?.[1];
    }

    /**
     * Block 4 tag/value pairs in order. A value runs until the next tag line,
     * a line starting with '-', or the end of input.
     */
    fields(): MtField[] {
        if (this.fieldCache) {
            return this.fieldCache;
        }
        const fields: MtField[] = [];
        const start = this.text.indexOf('{4:');
        if (start >= 0) {
            let current: MtField | undefined;
            for (const line of this.text.slice(start + 3).split(/\r?\n/)) {
                if (line.startsWith('-')) {
                    break;
                }
                const tagged = TAG_LINE.exec(line);
                if (tagged) {
                    current = { tag: tagged[1], value: tagged[2] };
                    fields.push(current);
                } else if (current) {
                    current.value += `\n${line}`;
                }
            }
        }
        this.fieldCache = fields.map(field => ({ tag: field.tag, value: field.value.trimEnd() }));
        return this.fieldCache;
    }

    /** First value of any of the given tags, in field order */
    field(...tags: string[]): string | undefined {
        return this.fields().find(field => tags.includes(field.tag))?.value;
    }

    has(tag: string): boolean {
        return this.fields().some(field => field.tag === tag);
    }
}
