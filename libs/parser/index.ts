export { MessageParser, parseMessage, parseDetailedMessage } from './MessageParser.js';
export { parseMt } from './mtParser.js';
export { sniffFormat } from './formatSniffer.js';
export { resolveFamily, ROOT_TAG_FAMILIES } from './familyResolver.js';
export { FAMILY_ROUTINES } from './families/index.js';
export type { RawMessage, WireFormat } from './formatSniffer.js';
export type { AppHeaderInfo } from './appHeader.js';
export type { FamilyRoutine } from './families/index.js';
