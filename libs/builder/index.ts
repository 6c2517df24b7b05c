export { MessageBuilder } from './MessageBuilder.js';
export type { LooseFields } from './MessageBuilder.js';
