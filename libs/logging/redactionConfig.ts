/**
 * Centralized Redaction Configuration
 * Keys that must never reach the log output in clear text.
 */
export const REDACT_KEYS = [
    // OAuth2 credentials (Root and Nested)
    'authorization', '*.authorization',
    'accessToken', '*.accessToken',
    'access_token', '*.access_token',
    'refreshToken', '*.refreshToken',
    'refresh_token', '*.refresh_token',
    'clientSecret', '*.clientSecret',
    'client_secret', '*.client_secret',
    'password', '*.password',
    'secret', '*.secret',

    // Raw headers on outbound requests
    'headers.authorization', '*.headers.authorization',
    'headers.Authorization', '*.headers.Authorization'
];

export const REDACT_CENSOR = '[REDACTED]';
