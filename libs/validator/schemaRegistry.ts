import fs, { Dirent } from 'fs';
import path from 'path';
import { getRuntimeConfig } from '../config/runtimeConfig.js';
import { describeError } from '../errors/transcoderError.js';
import { loadXmlDocument } from '../extract/xmlSource.js';
import { getComponentLogger } from '../logging/logger.js';
import { CompiledSchema, compileSchema } from './xsdConformance.js';

const log = getComponentLogger('schema-registry');

const SCAN_BYTES = 1024;
const TARGET_NAMESPACE = /targetNamespace\s*=\s*["']([^"']+)["']/;

/**
 * Reads the declared targetNamespace from the head of a schema file without
 * parsing it.
 */
export function scanTargetNamespace(filePath: string): string | undefined {
    const handle = fs.openSync(filePath, 'r');
    try {
        const buffer = Buffer.alloc(SCAN_BYTES);
        const read = fs.readSync(handle, buffer, 0, SCAN_BYTES, 0);
        return TARGET_NAMESPACE.exec(buffer.subarray(0, read).toString('utf-8'))?.[1];
    } finally {
        fs.closeSync(handle);
    }
}

function listSchemaFiles(directory: string): string[] {
    let entries: Dirent[];
    try {
        entries = fs.readdirSync(directory, { withFileTypes: true });
    } catch (err) {
        log.warn({ directory, error: describeError(err) }, 'Skipping unreadable schema directory');
        return [];
    }
    const files: string[] = [];
    for (const entry of entries) {
        const fullPath = path.join(directory, entry.name);
        if (entry.isDirectory()) {
            files.push(...listSchemaFiles(fullPath));
        } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.xsd')) {
            files.push(fullPath);
        }
    }
    return files.sort();
}

export type SchemaLookup =
    | { status: 'unregistered' }
    | { status: 'unreadable'; filePath: string; reason: string }
    | { status: 'ready'; filePath: string; schema: CompiledSchema };

/**
 * Namespace to schema-file map, built from one directory scan. Compiled
 * schemas are cached per file.
 */
export class SchemaRegistry {
    private static instance?: SchemaRegistry;

    private readonly compiled = new Map<string, CompiledSchema>();

    private constructor(
        public readonly directory: string,
        private readonly files: ReadonlyMap<string, string>
    ) {}

    /**
     * Scans a directory tree for .xsd files. A missing directory gives an
     * empty registry.
     */
    static fromDirectory(directory: string): SchemaRegistry {
        const files = new Map<string, string>();
        if (!fs.existsSync(directory) || !fs.statSync(directory).isDirectory()) {
            log.warn({ directory }, 'Schema directory not found, registry is empty');
            return new SchemaRegistry(directory, files);
        }
        for (const filePath of listSchemaFiles(directory)) {
            try {
                const namespace = scanTargetNamespace(filePath);
                if (namespace && !files.has(namespace)) {
                    files.set(namespace, filePath);
                }
            } catch (err) {
                log.warn({ filePath, error: describeError(err) }, 'Skipping unreadable schema file');
            }
        }
        log.info({ directory, namespaces: files.size }, 'Schema registry populated');
        return new SchemaRegistry(directory, files);
    }

    /** Process-wide registry over the configured schema directory, built on first use */
    static shared(): SchemaRegistry {
        if (!SchemaRegistry.instance) {
            SchemaRegistry.instance = SchemaRegistry.fromDirectory(getRuntimeConfig().schemaDir);
        }
        return SchemaRegistry.instance;
    }

    namespaces(): string[] {
        return [...this.files.keys()];
    }

    has(namespace: string): boolean {
        return this.files.has(namespace);
    }

    filePath(namespace: string): string | undefined {
        return this.files.get(namespace);
    }

    lookup(namespace: string): SchemaLookup {
        const filePath = this.files.get(namespace);
        if (!filePath) {
            return { status: 'unregistered' };
        }
        const cached = this.compiled.get(filePath);
        if (cached) {
            return { status: 'ready', filePath, schema: cached };
        }

        let source: Buffer;
        try {
            source = fs.readFileSync(filePath);
        } catch (err) {
            return { status: 'unreadable', filePath, reason: describeError(err) };
        }
        const { root } = loadXmlDocument(source);
        if (!root) {
            return { status: 'unreadable', filePath, reason: 'schema document is not well-formed' };
        }
        const schema = compileSchema(root);
        this.compiled.set(filePath, schema);
        log.debug({ namespace, filePath }, 'Compiled schema');
        return { status: 'ready', filePath, schema };
    }
}
