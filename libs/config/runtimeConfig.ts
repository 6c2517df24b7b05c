import { existsSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

/**
 * Runtime configuration read from the process environment.
 * Every value has a default; an invalid value is a startup error.
 */
export const RuntimeConfigSchema = z.object({
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    MSGBRIDGE_SCHEMA_DIR: z.string().min(1).optional(),
    MSGBRIDGE_MT_PLACEHOLDER_BIC: z.string().regex(/^[A-Z0-9]{1,12}$/).default('XXXXXXXXXXXX'),
});

export interface RuntimeConfig {
    readonly logLevel: z.infer<typeof RuntimeConfigSchema>['LOG_LEVEL'];
    /** Root of the directory tree scanned for .xsd files */
    readonly schemaDir: string;
    /** Always exactly 12 characters */
    readonly mtPlaceholderBic: string;
}

export class ConfigurationError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigurationError';
    }
}

/**
 * Locates the package root by walking up from this module until a package.json
 * is found. Works from both the TypeScript sources and the compiled dist tree.
 */
export function resolvePackageRoot(start: string = path.dirname(fileURLToPath(import.meta.url))): string {
    let current = start;
    for (;;) {
        if (existsSync(path.join(current, 'package.json'))) {
            return current;
        }
        const parent = path.dirname(current);
        if (parent === current) {
            return start;
        }
        current = parent;
    }
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
    const parsed = RuntimeConfigSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigurationError(
            parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        );
    }

    const values = parsed.data;
    return {
        logLevel: values.LOG_LEVEL,
        schemaDir: values.MSGBRIDGE_SCHEMA_DIR
            ? path.resolve(values.MSGBRIDGE_SCHEMA_DIR)
            : path.join(resolvePackageRoot(), 'schemas'),
        mtPlaceholderBic: values.MSGBRIDGE_MT_PLACEHOLDER_BIC.padEnd(12, 'X').slice(0, 12),
    };
}

let cached: RuntimeConfig | undefined;

/**
 * Process-wide configuration, read once on first use.
 */
export function getRuntimeConfig(): RuntimeConfig {
    if (!cached) {
        cached = loadRuntimeConfig();
    }
    return cached;
}
