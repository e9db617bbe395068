/**
 * Unit Tests: Application configuration
 *
 * @see libs/config/appConfig.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { loadAppConfig } from '../../libs/config/appConfig.js';
import { ConfigurationError } from '../../libs/errors/errors.js';

const VALID_ENV = {
    WORLDCAT_METADATA_API_KEY: 'test-key',
    WORLDCAT_METADATA_API_SECRET: 'test-secret',
    OCLC_AUTHORIZATION_SERVER_TOKEN_URL: 'https://auth.example.org/token',
    WORLDCAT_METADATA_API_URL: 'https://metadata.example.org/worldcat/',
    WORLDCAT_METADATA_API_URL_FOR_SEARCH: 'https://search.example.org/worldcat/search/v1',
    WORLDCAT_METADATA_API_MAX_RECORDS_PER_REQUEST: '50'
};

describe('AppConfig', () => {
    it('builds the run configuration with defaults', () => {
        const config = loadAppConfig(VALID_ENV);

        assert.strictEqual(config.apiKey, 'test-key');
        assert.strictEqual(config.scope, 'WorldCatMetadataAPI refresh_token');
        assert.strictEqual(config.metadataApiUrl, 'https://metadata.example.org/worldcat');
        assert.strictEqual(config.maxRecordsPerRequest, 50);
        assert.strictEqual(config.requestTimeoutMs, 30000);
        assert.strictEqual(config.institutionSymbol, undefined);
        assert.strictEqual(config.logLevel, 'info');
        assert.strictEqual(Object.isFrozen(config), true);
    });

    it('treats an empty optional value as absent', () => {
        const config = loadAppConfig({ ...VALID_ENV, OCLC_INSTITUTION_SYMBOL: '', WORLDCAT_PRINCIPAL_ID: ' test-principal ' });

        assert.strictEqual(config.institutionSymbol, undefined);
        assert.strictEqual(config.principalId, 'test-principal');
    });

    it('reports every violation at once', () => {
        const env: Record<string, string | undefined> = {
            ...VALID_ENV,
            WORLDCAT_METADATA_API_KEY: undefined,
            WORLDCAT_METADATA_API_MAX_RECORDS_PER_REQUEST: 'lots'
        };

        assert.throws(() => loadAppConfig(env), (err: unknown) => {
            assert.ok(err instanceof ConfigurationError);
            assert.strictEqual(err.issues.length, 2);
            assert.ok(err.issues.includes('WORLDCAT_METADATA_API_KEY is missing'));
            assert.ok(err.issues.includes('WORLDCAT_METADATA_API_MAX_RECORDS_PER_REQUEST must be a number'));
            return true;
        });
    });

    it('rejects a batch size below one', () => {
        assert.throws(
            () => loadAppConfig({ ...VALID_ENV, WORLDCAT_METADATA_API_MAX_RECORDS_PER_REQUEST: '0' }),
            ConfigurationError
        );
    });
});
