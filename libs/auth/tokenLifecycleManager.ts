/**
 * Token Lifecycle Manager
 *
 * Owns the OAuth2 credential state for the metadata API. Requests run through
 * `executeWithAuth`, which renews the access token and retries exactly once
 * when the request reports an expired token. Renewed credentials are written
 * to the configuration store before the retry.
 */

import type { Logger } from 'pino';
import type { AppConfig } from '../config/appConfig.js';
import type { ConfigStore } from '../config/configStore.js';
import { AuthExpiredError, HttpError, MalformedResponseError } from '../errors/errors.js';
import { fetchTransport, sendRequest, type HttpTransport } from '../http/transport.js';
import { getComponentLogger } from '../logging/logger.js';
import {
    CREDENTIAL_KEYS,
    TokenResponseSchema,
    accessExpiryOf,
    parseExpiryTimestamp,
    refreshExpiryOf,
    type TokenResponse
} from './credentials.js';

/** A refresh token this close to expiry is not used. */
export const REFRESH_TOKEN_MIN_REMAINING_SECONDS = 25;

export type GrantType = 'refresh_token' | 'client_credentials';

export interface TokenLifecycleManagerOptions {
    config: Pick<AppConfig, 'apiKey' | 'apiSecret' | 'tokenUrl' | 'scope' | 'requestTimeoutMs'>;
    store: ConfigStore;
    transport?: HttpTransport;
    /** Milliseconds since the Unix epoch */
    now?: () => number;
    logger?: Logger;
}

export class TokenLifecycleManager {
    private readonly config: TokenLifecycleManagerOptions['config'];
    private readonly store: ConfigStore;
    private readonly transport: HttpTransport;
    private readonly now: () => number;
    private readonly logger: Logger;

    constructor(options: TokenLifecycleManagerOptions) {
        this.config = options.config;
        this.store = options.store;
        this.transport = options.transport ?? fetchTransport;
        this.now = options.now ?? Date.now;
        this.logger = options.logger ?? getComponentLogger('token-lifecycle');
    }

    /**
     * The stored access token.
     * @throws AuthExpiredError when no token is stored or its expiry has passed
     */
    currentAccessToken(): string {
        const token = this.store.get(CREDENTIAL_KEYS.accessToken);
        const expiresAt = Number.parseFloat(this.store.get(CREDENTIAL_KEYS.accessTokenExpiresAt) ?? '');

        if (token === undefined || token === '') {
            throw new AuthExpiredError('No access token stored');
        }
        if (Number.isNaN(expiresAt) || expiresAt * 1000 <= this.now()) {
            throw new AuthExpiredError();
        }
        return token;
    }

    /**
     * `Authorization` header value for the stored token type. The service
     * issues `bearer`; the scheme is sent capitalized.
     */
    authorizationFor(accessToken: string): string {
        const tokenType = (this.store.get(CREDENTIAL_KEYS.accessTokenType) ?? '').trim();
        const scheme = tokenType === '' ? 'Bearer' : tokenType.charAt(0).toUpperCase() + tokenType.slice(1);
        return `${scheme} ${accessToken}`;
    }

    async executeWithAuth<T>(requestFn: (accessToken: string) => Promise<T>): Promise<T> {
        try {
            return await requestFn(this.currentAccessToken());
        } catch (error) {
            if (!(error instanceof AuthExpiredError)) {
                throw error;
            }
            this.logger.debug({ event: 'ACCESS_TOKEN_EXPIRED', reason: error.message }, 'Requesting new access token');
        }

        await this.renew();
        return requestFn(this.currentAccessToken());
    }

    /**
     * Seconds until the stored refresh token expires; negative once it has,
     * `undefined` when no usable expiry is stored.
     */
    refreshTokenRemainingSeconds(): number | undefined {
        const expiresAtText = this.store.get(CREDENTIAL_KEYS.refreshTokenExpiresAt);
        if (expiresAtText === undefined || expiresAtText === '') {
            return undefined;
        }
        const expiresAt = parseExpiryTimestamp(expiresAtText);
        return expiresAt === undefined ? undefined : expiresAt - this.now() / 1000;
    }

    selectGrant(): GrantType {
        const remaining = this.refreshTokenRemainingSeconds();
        const refreshToken = this.store.get(CREDENTIAL_KEYS.refreshToken);
        return refreshToken !== undefined && refreshToken !== '' &&
            remaining !== undefined && remaining > REFRESH_TOKEN_MIN_REMAINING_SECONDS
            ? 'refresh_token'
            : 'client_credentials';
    }

    /**
     * Obtain a new access token and persist it.
     */
    async renew(): Promise<GrantType> {
        const grant = this.selectGrant();
        const form = new URLSearchParams();

        if (grant === 'refresh_token') {
            form.set('grant_type', 'refresh_token');
            form.set('refresh_token', this.store.get(CREDENTIAL_KEYS.refreshToken) ?? '');
        } else {
            form.set('grant_type', 'client_credentials');
            form.set('scope', this.config.scope);
        }

        const token = await this.requestToken(form);
        this.persist(token);

        this.logger.info(
            { event: 'TOKEN_REFRESHED', grant, refreshTokenIssued: token.refresh_token !== undefined },
            'Access token renewed'
        );
        return grant;
    }

    private async requestToken(form: URLSearchParams): Promise<TokenResponse> {
        const basicAuth = Buffer.from(`${this.config.apiKey}:${this.config.apiSecret}`).toString('base64');

        const reply = await sendRequest(
            this.transport,
            this.config.tokenUrl,
            {
                method: 'POST',
                headers: {
                    Authorization: `Basic ${basicAuth}`,
                    'Content-Type': 'application/x-www-form-urlencoded',
                    Accept: 'application/json'
                },
                body: form.toString()
            },
            this.config.requestTimeoutMs
        );

        if (!reply.ok) {
            throw new HttpError(reply.status, reply.body, reply.url);
        }

        let json: unknown;
        try {
            json = JSON.parse(reply.body);
        } catch (error) {
            throw new MalformedResponseError('Token response is not valid JSON', reply.body, { cause: error });
        }

        const parsed = TokenResponseSchema.safeParse(json);
        if (!parsed.success) {
            throw new MalformedResponseError(
                `Token response has an unexpected shape: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
                reply.body
            );
        }
        return parsed.data;
    }

    private persist(token: TokenResponse): void {
        const nowSeconds = Math.floor(this.now() / 1000);
        const accessExpiry = accessExpiryOf(token, nowSeconds);
        if (accessExpiry === undefined) {
            throw new MalformedResponseError('Token response expiry could not be read', '');
        }

        if (token.refresh_token !== undefined) {
            this.store.set(CREDENTIAL_KEYS.refreshToken, token.refresh_token);
            const refreshExpiry = refreshExpiryOf(token, nowSeconds);
            if (refreshExpiry !== undefined) {
                this.store.set(CREDENTIAL_KEYS.refreshTokenExpiresAt, refreshExpiry);
            }
        }

        this.store.set(CREDENTIAL_KEYS.accessToken, token.access_token);
        this.store.set(CREDENTIAL_KEYS.accessTokenType, token.token_type);
        this.store.set(CREDENTIAL_KEYS.accessTokenExpiresAt, String(accessExpiry));
    }
}
