import { z } from 'zod';

/**
 * Configuration-store keys holding the credential state.
 */
export const CREDENTIAL_KEYS = {
    accessToken: 'WORLDCAT_METADATA_API_ACCESS_TOKEN',
    accessTokenType: 'WORLDCAT_METADATA_API_ACCESS_TOKEN_TYPE',
    accessTokenExpiresAt: 'WORLDCAT_METADATA_API_ACCESS_TOKEN_EXPIRES_AT',
    refreshToken: 'WORLDCAT_METADATA_API_REFRESH_TOKEN',
    refreshTokenExpiresAt: 'WORLDCAT_METADATA_API_REFRESH_TOKEN_EXPIRES_AT'
} as const;

/**
 * Token endpoint reply. The authorization server reports refresh-token
 * expiry as `YYYY-MM-DD HH:MM:SSZ`.
 */
export const TokenResponseSchema = z
    .object({
        access_token: z.string().min(1),
        token_type: z.string().min(1).default('bearer'),
        expires_in: z.number().nonnegative().optional(),
        expires_at: z.union([z.string(), z.number()]).optional(),
        refresh_token: z.string().min(1).optional(),
        refresh_token_expires_at: z.string().optional(),
        refresh_token_expires_in: z.number().optional()
    })
    .passthrough()
    .refine((token) => token.expires_in !== undefined || token.expires_at !== undefined, {
        message: 'Token response carries neither expires_in nor expires_at'
    });

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

const EXPIRY_PATTERN = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2})Z$/;

/**
 * `2021-09-30 22:43:07Z` → seconds since the Unix epoch, or undefined when
 * the text is not in that shape.
 */
export function parseExpiryTimestamp(text: string): number | undefined {
    const match = EXPIRY_PATTERN.exec(text.trim());
    if (match === null) {
        return undefined;
    }
    const millis = Date.parse(`${match[1]}T${match[2]}Z`);
    return Number.isNaN(millis) ? undefined : millis / 1000;
}

export function formatExpiryTimestamp(epochSeconds: number): string {
    return new Date(epochSeconds * 1000).toISOString().replace('T', ' ').replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Access-token expiry in epoch seconds, from either form the server uses.
 */
export function accessExpiryOf(token: TokenResponse, nowSeconds: number): number | undefined {
    if (token.expires_in !== undefined) {
        return nowSeconds + token.expires_in;
    }
    if (typeof token.expires_at === 'number') {
        return token.expires_at;
    }
    return token.expires_at === undefined ? undefined : parseExpiryTimestamp(token.expires_at);
}

export function refreshExpiryOf(token: TokenResponse, nowSeconds: number): string | undefined {
    if (token.refresh_token_expires_at !== undefined) {
        return token.refresh_token_expires_at;
    }
    if (token.refresh_token_expires_in !== undefined) {
        return formatExpiryTimestamp(nowSeconds + token.refresh_token_expires_in);
    }
    return undefined;
}
