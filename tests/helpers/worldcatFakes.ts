import { mock } from 'node:test';
import type { AppConfig } from '../../libs/config/appConfig.js';
import { InMemoryConfigStore } from '../../libs/config/configStore.js';
import { CREDENTIAL_KEYS } from '../../libs/auth/credentials.js';
import type { HttpReply } from '../../libs/http/transport.js';

/** 2024-05-01T12:00:00Z */
export const NOW_MS = Date.parse('2024-05-01T12:00:00Z');
export const NOW_SECONDS = NOW_MS / 1000;

export const TEST_CONFIG: AppConfig = {
    apiKey: 'test-key',
    apiSecret: 'test-secret',
    tokenUrl: 'https://auth.example.org/token',
    scope: 'WorldCatMetadataAPI refresh_token',
    metadataApiUrl: 'https://metadata.example.org/worldcat',
    searchApiUrl: 'https://search.example.org/worldcat/search/v1',
    maxRecordsPerRequest: 3,
    requestTimeoutMs: 1000,
    institutionSymbol: 'TSTLB',
    principalId: 'test-principal',
    logLevel: 'silent'
};

export function jsonResponse(status: number, body: unknown): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' }
    });
}

export function textResponse(status: number, body: string): Response {
    return new Response(body, { status });
}

export function reply(body: unknown, status = 200): HttpReply {
    return {
        url: 'https://metadata.example.org/worldcat/bib/checkcontrolnumbers',
        status,
        ok: status >= 200 && status < 300,
        body: typeof body === 'string' ? body : JSON.stringify(body)
    };
}

/**
 * Store holding an access token that is valid for another hour.
 */
export function storeWithValidToken(extra: Record<string, string> = {}): InMemoryConfigStore {
    return new InMemoryConfigStore({
        [CREDENTIAL_KEYS.accessToken]: 'test-access-token',
        [CREDENTIAL_KEYS.accessTokenType]: 'bearer',
        [CREDENTIAL_KEYS.accessTokenExpiresAt]: String(NOW_SECONDS + 3600),
        ...extra
    });
}

export type TransportHandler = (url: string, init: RequestInit) => Promise<Response>;

export function fakeTransport(handler: TransportHandler) {
    return mock.fn(handler);
}

export function oclcNumbersOf(url: string): string[] {
    return (new URL(url).searchParams.get('oclcNumbers') ?? '').split(',').filter((n) => n !== '');
}
