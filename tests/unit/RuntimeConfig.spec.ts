/**
 * Unit Tests: Runtime Configuration
 *
 * @see libs/config/runtimeConfig.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import path from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError, loadRuntimeConfig, resolvePackageRoot } from '../../libs/config/runtimeConfig.js';

const repoRoot = path.resolve(fileURLToPath(new URL('../..', import.meta.url)));

describe('RuntimeConfig', () => {
    it('should apply defaults to an empty environment', () => {
        const config = loadRuntimeConfig({});

        assert.strictEqual(config.logLevel, 'info');
        assert.strictEqual(config.mtPlaceholderBic, 'XXXXXXXXXXXX');
        assert.strictEqual(config.schemaDir, path.join(repoRoot, 'schemas'));
    });

    it('should find the package root from the sources', () => {
        assert.strictEqual(resolvePackageRoot(), repoRoot);
    });

    it('should resolve a configured schema directory', () => {
        const config = loadRuntimeConfig({ MSGBRIDGE_SCHEMA_DIR: 'vendor/xsd' });

        assert.strictEqual(config.schemaDir, path.resolve('vendor/xsd'));
    });

    it('should pad a short placeholder BIC to 12 characters', () => {
        const config = loadRuntimeConfig({ MSGBRIDGE_MT_PLACEHOLDER_BIC: 'ABC' });

        assert.strictEqual(config.mtPlaceholderBic, 'ABCXXXXXXXXX');
    });

    it('should reject an unknown log level', () => {
        assert.throws(
            () => loadRuntimeConfig({ LOG_LEVEL: 'verbose' }),
            (err: unknown) => err instanceof ConfigurationError
                && err.issues.length === 1
                && err.issues[0].startsWith('LOG_LEVEL:')
        );
    });

    it('should reject a lowercase placeholder BIC', () => {
        assert.throws(() => loadRuntimeConfig({ MSGBRIDGE_MT_PLACEHOLDER_BIC: 'bankxxxx' }), ConfigurationError);
    });
});
