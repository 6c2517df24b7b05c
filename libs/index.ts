export * from './model/index.js';
export * from './parser/index.js';
export * from './translator/index.js';
export * from './validator/index.js';
export * from './reconciler/index.js';
export * from './builder/index.js';
export * from './writer/index.js';
export { TranscoderError, UnsupportedTargetError, LocationPathError } from './errors/transcoderError.js';
export type { TranscoderErrorCategory } from './errors/transcoderError.js';
export { XmlFieldExtractor } from './extract/xmlFieldExtractor.js';
export { MtTextBlocks } from './extract/mtBlocks.js';
export type { MtField } from './extract/mtBlocks.js';
export { compileLocationPath } from './extract/locationPath.js';
export { getRuntimeConfig, loadRuntimeConfig, ConfigurationError } from './config/runtimeConfig.js';
export type { RuntimeConfig } from './config/runtimeConfig.js';
export { logger, getComponentLogger } from './logging/logger.js';
