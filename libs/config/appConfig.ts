import { z } from 'zod';
import { ConfigurationError } from '../errors/errors.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('config');

const requiredString = (name: string) =>
    z.string({ required_error: `${name} is missing` }).trim().min(1, `${name} is empty`);

const optionalString = z
    .string()
    .trim()
    .optional()
    .transform((value) => (value === undefined || value === '' ? undefined : value));

/**
 * Environment keys read at startup. Credential state (access and refresh
 * tokens) is not part of this schema; it lives in the configuration store.
 */
export const AppConfigSchema = z.object({
    WORLDCAT_METADATA_API_KEY: requiredString('WORLDCAT_METADATA_API_KEY'),
    WORLDCAT_METADATA_API_SECRET: requiredString('WORLDCAT_METADATA_API_SECRET'),
    OCLC_AUTHORIZATION_SERVER_TOKEN_URL: requiredString('OCLC_AUTHORIZATION_SERVER_TOKEN_URL').url(),
    WORLDCAT_METADATA_API_SCOPE: z.string().trim().min(1).default('WorldCatMetadataAPI refresh_token'),
    WORLDCAT_METADATA_API_URL: requiredString('WORLDCAT_METADATA_API_URL').url(),
    WORLDCAT_METADATA_API_URL_FOR_SEARCH: requiredString('WORLDCAT_METADATA_API_URL_FOR_SEARCH').url(),
    WORLDCAT_METADATA_API_MAX_RECORDS_PER_REQUEST: z.coerce
        .number({ invalid_type_error: 'WORLDCAT_METADATA_API_MAX_RECORDS_PER_REQUEST must be a number' })
        .int()
        .positive(),
    WORLDCAT_API_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    OCLC_INSTITUTION_SYMBOL: optionalString,
    WORLDCAT_PRINCIPAL_ID: optionalString,
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

export type LogLevel = z.infer<typeof AppConfigSchema>['LOG_LEVEL'];

export interface AppConfig {
    readonly apiKey: string;
    readonly apiSecret: string;
    readonly tokenUrl: string;
    readonly scope: string;
    readonly metadataApiUrl: string;
    readonly searchApiUrl: string;
    readonly maxRecordsPerRequest: number;
    readonly requestTimeoutMs: number;
    readonly institutionSymbol: string | undefined;
    readonly principalId: string | undefined;
    readonly logLevel: LogLevel;
}

/**
 * Build the immutable run configuration from an environment record.
 * Every violation is reported at once.
 */
export function loadAppConfig(env: Record<string, string | undefined> = process.env): AppConfig {
    const parsed = AppConfigSchema.safeParse(env);

    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) =>
            issue.path.length > 0 && !issue.message.includes(String(issue.path[0]))
                ? `${issue.path.join('.')}: ${issue.message}`
                : issue.message
        );
        logger.fatal(
            { event: 'CONFIGURATION_INVALID', issues, remediation: 'Check the .env file or environment variables.' },
            'Configuration validation failed'
        );
        throw new ConfigurationError(issues);
    }

    const data = parsed.data;
    return Object.freeze({
        apiKey: data.WORLDCAT_METADATA_API_KEY,
        apiSecret: data.WORLDCAT_METADATA_API_SECRET,
        tokenUrl: data.OCLC_AUTHORIZATION_SERVER_TOKEN_URL,
        scope: data.WORLDCAT_METADATA_API_SCOPE,
        metadataApiUrl: stripTrailingSlash(data.WORLDCAT_METADATA_API_URL),
        searchApiUrl: stripTrailingSlash(data.WORLDCAT_METADATA_API_URL_FOR_SEARCH),
        maxRecordsPerRequest: data.WORLDCAT_METADATA_API_MAX_RECORDS_PER_REQUEST,
        requestTimeoutMs: data.WORLDCAT_API_TIMEOUT_MS,
        institutionSymbol: data.OCLC_INSTITUTION_SYMBOL,
        principalId: data.WORLDCAT_PRINCIPAL_ID,
        logLevel: data.LOG_LEVEL
    });
}

function stripTrailingSlash(url: string): string {
    return url.endsWith('/') ? url.slice(0, -1) : url;
}
