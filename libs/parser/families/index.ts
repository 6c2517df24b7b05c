import { FamilyKey, PaymentFields, RecordOfKind } from '../../model/index.js';
import { XmlFieldExtractor } from '../../extract/xmlFieldExtractor.js';
import { parseAcmt007, parseAcmt015 } from './accountManagement.js';
import {
    parseCamt004,
    parseCamt029,
    parseCamt052,
    parseCamt053,
    parseCamt054,
    parseCamt056,
    parseCamt086,
} from './cashManagement.js';
import { parsePacs004, parsePacs008, parsePacs009 } from './paymentsClearing.js';
import { parsePain001, parsePain002, parsePain008 } from './paymentsInitiation.js';
import { parseFxtr014, parseSese023, parseSetr004, parseSetr010 } from './securities.js';
import { FamilyRoutine } from './shared.js';

export type { FamilyRoutine } from './shared.js';

export const FAMILY_ROUTINES: { readonly [K in FamilyKey]: FamilyRoutine<K> } = {
    'pacs.008': parsePacs008,
    'pacs.004': parsePacs004,
    'pacs.009': parsePacs009,
    'pain.001': parsePain001,
    'pain.002': parsePain002,
    'pain.008': parsePain008,
    'camt.004': parseCamt004,
    'camt.029': parseCamt029,
    'camt.052': parseCamt052,
    'camt.053': parseCamt053,
    'camt.054': parseCamt054,
    'camt.056': parseCamt056,
    'camt.086': parseCamt086,
    'fxtr.014': parseFxtr014,
    'sese.023': parseSese023,
    'acmt.007': parseAcmt007,
    'acmt.015': parseAcmt015,
    'setr.004': parseSetr004,
    'setr.010': parseSetr010,
};

export function runFamilyRoutine<K extends FamilyKey>(family: K, x: XmlFieldExtractor, base: PaymentFields): RecordOfKind<K> {
    const routine: FamilyRoutine<K> = FAMILY_ROUTINES[family];
    return routine(x, base);
}
