export * from './records.js';
export * from './capabilities.js';
