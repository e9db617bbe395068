/**
 * Unit Tests: Token Lifecycle Manager
 *
 * @see libs/auth/tokenLifecycleManager.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CREDENTIAL_KEYS, formatExpiryTimestamp, parseExpiryTimestamp } from '../../libs/auth/credentials.js';
import { TokenLifecycleManager } from '../../libs/auth/tokenLifecycleManager.js';
import { InMemoryConfigStore } from '../../libs/config/configStore.js';
import { AuthExpiredError, HttpError } from '../../libs/errors/errors.js';
import {
    NOW_MS,
    NOW_SECONDS,
    TEST_CONFIG,
    fakeTransport,
    jsonResponse,
    storeWithValidToken
} from '../helpers/worldcatFakes.js';

function expiredStore(refreshExpiresInSeconds?: number): InMemoryConfigStore {
    const values: Record<string, string> = {
        [CREDENTIAL_KEYS.accessToken]: 'stale-access-token',
        [CREDENTIAL_KEYS.accessTokenType]: 'bearer',
        [CREDENTIAL_KEYS.accessTokenExpiresAt]: String(NOW_SECONDS - 5)
    };
    if (refreshExpiresInSeconds !== undefined) {
        values[CREDENTIAL_KEYS.refreshToken] = 'test-refresh-token';
        values[CREDENTIAL_KEYS.refreshTokenExpiresAt] = formatExpiryTimestamp(NOW_SECONDS + refreshExpiresInSeconds);
    }
    return new InMemoryConfigStore(values);
}

function expiredOnce<T>(result: T) {
    let calls = 0;
    return async (_token: string): Promise<T> => {
        calls += 1;
        if (calls === 1) {
            throw new AuthExpiredError();
        }
        return result;
    };
}

describe('TokenLifecycleManager', () => {
    describe('currentAccessToken', () => {
        it('returns a token whose expiry is still ahead', () => {
            const manager = new TokenLifecycleManager({ config: TEST_CONFIG, store: storeWithValidToken(), now: () => NOW_MS });
            assert.strictEqual(manager.currentAccessToken(), 'test-access-token');
        });

        it('fails with AuthExpiredError once the expiry has passed', () => {
            const manager = new TokenLifecycleManager({ config: TEST_CONFIG, store: expiredStore(), now: () => NOW_MS });
            assert.throws(() => manager.currentAccessToken(), AuthExpiredError);
        });

        it('fails with AuthExpiredError when no token is stored', () => {
            const manager = new TokenLifecycleManager({ config: TEST_CONFIG, store: new InMemoryConfigStore(), now: () => NOW_MS });
            assert.throws(() => manager.currentAccessToken(), { name: 'AuthExpiredError', message: 'No access token stored' });
        });
    });

    describe('authorizationFor', () => {
        it('capitalizes the stored token type and defaults to Bearer', () => {
            const stored = new TokenLifecycleManager({ config: TEST_CONFIG, store: storeWithValidToken(), now: () => NOW_MS });
            const untyped = new TokenLifecycleManager({
                config: TEST_CONFIG,
                store: new InMemoryConfigStore({ [CREDENTIAL_KEYS.accessToken]: 'test-access-token' }),
                now: () => NOW_MS
            });

            assert.strictEqual(stored.authorizationFor('test-access-token'), 'Bearer test-access-token');
            assert.strictEqual(untyped.authorizationFor('test-access-token'), 'Bearer test-access-token');
        });
    });

    describe('executeWithAuth', () => {
        it('does not contact the token endpoint while the token is valid', async () => {
            const transport = fakeTransport(async () => jsonResponse(500, {}));
            const manager = new TokenLifecycleManager({ config: TEST_CONFIG, store: storeWithValidToken(), transport, now: () => NOW_MS });
            const seen: string[] = [];

            const result = await manager.executeWithAuth(async (token) => {
                seen.push(token);
                return 'done';
            });

            assert.strictEqual(result, 'done');
            assert.deepStrictEqual(seen, ['test-access-token']);
            assert.strictEqual(transport.mock.callCount(), 0);
        });

        it('refreshes exactly once and returns the retried result', async () => {
            const store = expiredStore(100);
            const transport = fakeTransport(async () =>
                jsonResponse(200, { access_token: 'new-access-token', token_type: 'bearer', expires_in: 1199 })
            );
            const manager = new TokenLifecycleManager({ config: TEST_CONFIG, store, transport, now: () => NOW_MS });
            const tokens: string[] = [];
            const requestFn = expiredOnce('second-response');

            const result = await manager.executeWithAuth(async (token) => {
                tokens.push(token);
                return requestFn(token);
            });

            assert.strictEqual(result, 'second-response');
            assert.strictEqual(transport.mock.callCount(), 1);
            assert.deepStrictEqual(tokens, ['stale-access-token', 'new-access-token']);
            assert.strictEqual(store.get(CREDENTIAL_KEYS.accessToken), 'new-access-token');
            assert.strictEqual(store.get(CREDENTIAL_KEYS.accessTokenExpiresAt), String(NOW_SECONDS + 1199));
        });

        it('propagates a second expiry instead of refreshing again', async () => {
            const transport = fakeTransport(async () =>
                jsonResponse(200, { access_token: 'new-access-token', token_type: 'bearer', expires_in: 1199 })
            );
            const manager = new TokenLifecycleManager({ config: TEST_CONFIG, store: expiredStore(100), transport, now: () => NOW_MS });
            let calls = 0;

            await assert.rejects(
                manager.executeWithAuth(async () => {
                    calls += 1;
                    throw new AuthExpiredError('Access token rejected (HTTP 401)');
                }),
                AuthExpiredError
            );
            assert.strictEqual(calls, 2);
            assert.strictEqual(transport.mock.callCount(), 1);
        });

        it('does not retry other failures', async () => {
            const transport = fakeTransport(async () => jsonResponse(500, {}));
            const manager = new TokenLifecycleManager({ config: TEST_CONFIG, store: storeWithValidToken(), transport, now: () => NOW_MS });
            let calls = 0;

            await assert.rejects(
                manager.executeWithAuth(async () => {
                    calls += 1;
                    throw new HttpError(503, 'unavailable', 'https://metadata.example.org/worldcat/ih/datalist');
                }),
                HttpError
            );
            assert.strictEqual(calls, 1);
            assert.strictEqual(transport.mock.callCount(), 0);
        });
    });

    describe('grant selection', () => {
        it('uses the refresh token when it has 100 seconds left', async () => {
            const transport = fakeTransport(async () =>
                jsonResponse(200, { access_token: 'new-access-token', token_type: 'bearer', expires_in: 1199 })
            );
            const manager = new TokenLifecycleManager({ config: TEST_CONFIG, store: expiredStore(100), transport, now: () => NOW_MS });

            assert.strictEqual(manager.selectGrant(), 'refresh_token');
            assert.strictEqual(await manager.renew(), 'refresh_token');

            const init = transport.mock.calls[0]?.arguments[1];
            assert.strictEqual(init?.method, 'POST');
            assert.strictEqual(init?.body, 'grant_type=refresh_token&refresh_token=test-refresh-token');
            assert.deepStrictEqual(init?.headers, {
                Authorization: `Basic ${Buffer.from('test-key:test-secret').toString('base64')}`,
                'Content-Type': 'application/x-www-form-urlencoded',
                Accept: 'application/json'
            });
        });

        it('performs a full exchange when the refresh token has only 10 seconds left', async () => {
            const store = expiredStore(10);
            const transport = fakeTransport(async () =>
                jsonResponse(200, {
                    access_token: 'new-access-token',
                    token_type: 'bearer',
                    expires_in: 1199,
                    refresh_token: 'issued-refresh-token',
                    refresh_token_expires_at: '2024-05-01 19:00:00Z'
                })
            );
            const manager = new TokenLifecycleManager({ config: TEST_CONFIG, store, transport, now: () => NOW_MS });

            assert.strictEqual(await manager.renew(), 'client_credentials');

            const init = transport.mock.calls[0]?.arguments[1];
            assert.strictEqual(init?.body, 'grant_type=client_credentials&scope=WorldCatMetadataAPI+refresh_token');
            assert.strictEqual(store.get(CREDENTIAL_KEYS.refreshToken), 'issued-refresh-token');
            assert.strictEqual(store.get(CREDENTIAL_KEYS.refreshTokenExpiresAt), '2024-05-01 19:00:00Z');
            assert.strictEqual(store.get(CREDENTIAL_KEYS.accessToken), 'new-access-token');
        });

        it('performs a full exchange when no refresh token is stored', () => {
            const manager = new TokenLifecycleManager({ config: TEST_CONFIG, store: expiredStore(), now: () => NOW_MS });
            assert.strictEqual(manager.refreshTokenRemainingSeconds(), undefined);
            assert.strictEqual(manager.selectGrant(), 'client_credentials');
        });

        it('fails with HttpError when the token endpoint refuses', async () => {
            const transport = fakeTransport(async () => jsonResponse(401, { error: 'invalid_client' }));
            const manager = new TokenLifecycleManager({ config: TEST_CONFIG, store: expiredStore(), transport, now: () => NOW_MS });

            await assert.rejects(manager.renew(), (err: unknown) => {
                assert.ok(err instanceof HttpError);
                assert.strictEqual(err.status, 401);
                assert.strictEqual(err.message, 'HTTP 401 returned by https://auth.example.org/token');
                return true;
            });
        });
    });

    describe('expiry timestamps', () => {
        it('round-trips the authorization server format', () => {
            assert.strictEqual(formatExpiryTimestamp(NOW_SECONDS + 100), '2024-05-01 12:01:40Z');
            assert.strictEqual(parseExpiryTimestamp('2024-05-01 12:01:40Z'), NOW_SECONDS + 100);
            assert.strictEqual(parseExpiryTimestamp('2024-05-01T12:01:40Z'), undefined);
        });
    });
});
