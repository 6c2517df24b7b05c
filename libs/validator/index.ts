export { Validator } from './Validator.js';
export type { SchemaValidationOptions } from './Validator.js';
export { SchemaRegistry, scanTargetNamespace } from './schemaRegistry.js';
export type { SchemaLookup } from './schemaRegistry.js';
export { businessRuleErrors, checkBic, checkCurrency, checkIban, checkUetr, cleanIban, ibanRemainder, isBic } from './businessRules.js';
export { mtStructureErrors } from './mtStructure.js';
export { terminalBic } from '../extract/mtBlocks.js';
export { checkConformance, compileSchema } from './xsdConformance.js';
export type { CompiledSchema } from './xsdConformance.js';
