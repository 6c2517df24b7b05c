export { Translator, SUPPORTED_TARGETS } from './Translator.js';
export type { TranslatorOptions } from './Translator.js';
export { MT_TYPES, isMtType, renderMt } from './mtRenderer.js';
export type { MtType, MtRenderContext } from './mtRenderer.js';
export { MX_TARGETS, isMxTarget, renderMx } from './mxRenderer.js';
export type { MxTarget, MxRenderContext } from './mxRenderer.js';
