import { z } from 'zod';
import { isRecordKind, RECORD_SCHEMAS, RecordKind, TypedRecord, TypedRecordSchema } from '../model/index.js';
import { getComponentLogger } from '../logging/logger.js';

const log = getComponentLogger('message-builder');

export type LooseFields = Record<string, unknown>;

function defaults(kind: RecordKind): TypedRecord {
    return TypedRecordSchema.parse({ kind });
}

/**
 * Programmatic record construction from loose field maps.
 */
export class MessageBuilder {
    /**
     * Builds the variant named by `schemaKey`, or the base record for an
     * unknown key. Fields the variant does not declare, and values that do
     * not fit a declared field, are dropped. Never throws.
     */
    static build(schemaKey: string, fields: LooseFields = {}): TypedRecord {
        const kind: RecordKind = isRecordKind(schemaKey) ? schemaKey : 'payment';
        const shape: Record<string, z.ZodTypeAny> = RECORD_SCHEMAS[kind].shape;

        const accepted: LooseFields = { kind };
        for (const [name, value] of Object.entries(fields)) {
            if (name === 'kind' || value === undefined || value === null) {
                continue;
            }
            if (!Object.prototype.hasOwnProperty.call(shape, name)) {
                log.debug({ schemaKey, field: name }, 'Dropping undeclared field');
                continue;
            }
            const parsed = shape[name].safeParse(value);
            if (parsed.success) {
                accepted[name] = parsed.data;
            } else {
                log.debug({ schemaKey, field: name, valueType: typeof value }, 'Dropping field with mismatched type');
            }
        }

        const record = TypedRecordSchema.safeParse(accepted);
        return record.success ? record.data : defaults(kind);
    }
}
