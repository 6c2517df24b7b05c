export { XmlWriter, WRITER_SCHEMAS } from './XmlWriter.js';
export type { WriterSchema, XmlWriterOptions } from './XmlWriter.js';
