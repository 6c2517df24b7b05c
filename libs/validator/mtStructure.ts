import { terminalBic } from '../extract/mtBlocks.js';
import { isBic } from './businessRules.js';

/**
 * Block grammar checks for SWIFT MT text.
 */

const BLOCK_1 = /\{1:(.{3})(.{12})(\d{10})\}/;
const BLOCK_2 = /\{2:([IO])(\d{3})(.{12})[^}]*\}/;
const BLOCK_4 = /\{4:\r?\n(?:([\s\S]*?)\r?\n)?-\}/;
const FIELD_20 = /(?:^|\n):20:/;
const FIELD_32A = /(?:^|\n):32A:([^\r\n]*)/;
const AMOUNT = /^\d+(?:\.\d*)?$/;

function isCalendarDate(yymmdd: string): boolean {
    if (!/^\d{6}$/.test(yymmdd)) {
        return false;
    }
    const year = 2000 + Number(yymmdd.slice(0, 2));
    const month = Number(yymmdd.slice(2, 4));
    const day = Number(yymmdd.slice(4, 6));
    const date = new Date(Date.UTC(year, month - 1, day));
    return date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

function checkHeaderBlock(text: string, pattern: RegExp, block: number, terminalGroup: number): string[] {
    const match = pattern.exec(text);
    if (!match) {
        return [`Invalid Block ${block} structure`];
    }
    const bic = terminalBic(match[terminalGroup]);
    return isBic(bic) ? [] : [`Invalid BIC format in Block ${block}: '${bic}'`];
}

function checkValueDateAmount(value: string): string[] {
    const errors: string[] = [];
    const field = value.trim();
    if (!isCalendarDate(field.slice(0, 6))) {
        errors.push(`Invalid date in Field 32A: '${field.slice(0, 6)}'`);
    }
    if (!/^[A-Z]{3}$/.test(field.slice(6, 9))) {
        errors.push(`Invalid currency in Field 32A: '${field.slice(6, 9)}'`);
    }
    if (!AMOUNT.test(field.slice(9).replace(',', '.'))) {
        errors.push(`Invalid amount format in Field 32A: '${field.slice(9)}'`);
    }
    return errors;
}

export function mtStructureErrors(text: string): string[] {
    const errors = [
        ...checkHeaderBlock(text, BLOCK_1, 1, 2),
        ...checkHeaderBlock(text, BLOCK_2, 2, 3),
    ];

    const block4 = BLOCK_4.exec(text);
    if (!block4) {
        errors.push('Invalid Block 4 structure: missing or not terminated by -}');
        return errors;
    }
    const body = `\n${block4[1] ?? ''}`;
    if (!FIELD_20.test(body)) {
        errors.push("Mandatory Field :20: (Sender's Reference) missing");
    }
    const valueDateAmount = FIELD_32A.exec(body);
    if (valueDateAmount) {
        errors.push(...checkValueDateAmount(valueDateAmount[1]));
    }
    return errors;
}
