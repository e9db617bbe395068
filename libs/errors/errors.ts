/**
 * Error taxonomy for the batch pipeline.
 * Each error carries a machine-readable code so failures can be classified
 * without matching on message text.
 */

export type BatchErrorCode =
    | 'VALIDATION_ERROR'
    | 'MISSING_COLUMN'
    | 'DUPLICATE_IDENTIFIER'
    | 'AUTH_EXPIRED'
    | 'HTTP_ERROR'
    | 'CONNECTION_ERROR'
    | 'TIMEOUT'
    | 'MALFORMED_RESPONSE'
    | 'CONSISTENCY_CHECK_FAILED'
    | 'CONFIGURATION_ERROR';

export class BatchError extends Error {
    readonly code: BatchErrorCode;

    constructor(code: BatchErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'BatchError';
        this.code = code;
        Object.setPrototypeOf(this, BatchError.prototype);
    }
}

/**
 * Row-local problem with an input value. Recorded and skipped.
 */
export class ValidationError extends BatchError {
    readonly field: string | undefined;

    constructor(message: string, field?: string) {
        super('VALIDATION_ERROR', message);
        this.name = 'ValidationError';
        this.field = field;
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}

/**
 * The input source lacks a column every row needs. Halts the run.
 */
export class MissingColumnError extends BatchError {
    readonly column: string;

    constructor(column: string) {
        super('MISSING_COLUMN', `Input is missing required column '${column}'`);
        this.name = 'MissingColumnError';
        this.column = column;
        Object.setPrototypeOf(this, MissingColumnError.prototype);
    }
}

export class DuplicateIdentifierError extends BatchError {
    readonly identifier: string;

    constructor(identifier: string, message?: string) {
        super('DUPLICATE_IDENTIFIER', message ?? `Identifier ${identifier} already exists in records buffer`);
        this.name = 'DuplicateIdentifierError';
        this.identifier = identifier;
        Object.setPrototypeOf(this, DuplicateIdentifierError.prototype);
    }
}

/**
 * The access token is missing, past its expiry, or was rejected with 401.
 */
export class AuthExpiredError extends BatchError {
    constructor(message = 'Access token expired') {
        super('AUTH_EXPIRED', message);
        this.name = 'AuthExpiredError';
        Object.setPrototypeOf(this, AuthExpiredError.prototype);
    }
}

export class HttpError extends BatchError {
    readonly status: number;
    readonly body: string;
    readonly url: string;

    constructor(status: number, body: string, url: string) {
        super('HTTP_ERROR', `HTTP ${status} returned by ${stripQuery(url)}`);
        this.name = 'HttpError';
        this.status = status;
        this.body = body;
        this.url = url;
        Object.setPrototypeOf(this, HttpError.prototype);
    }
}

export class ConnectionError extends BatchError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('CONNECTION_ERROR', message, options);
        this.name = 'ConnectionError';
        Object.setPrototypeOf(this, ConnectionError.prototype);
    }
}

export class TimeoutError extends BatchError {
    readonly timeoutMs: number;

    constructor(url: string, timeoutMs: number) {
        super('TIMEOUT', `Request to ${stripQuery(url)} timed out after ${timeoutMs} ms`);
        this.name = 'TimeoutError';
        this.timeoutMs = timeoutMs;
        Object.setPrototypeOf(this, TimeoutError.prototype);
    }
}

export class MalformedResponseError extends BatchError {
    readonly body: string;

    constructor(message: string, body: string, options?: { cause?: unknown }) {
        super('MALFORMED_RESPONSE', message, options);
        this.name = 'MalformedResponseError';
        this.body = body;
        Object.setPrototypeOf(this, MalformedResponseError.prototype);
    }
}

export class ConsistencyCheckError extends BatchError {
    readonly expected: number;
    readonly actual: number;

    constructor(expected: number, actual: number) {
        super(
            'CONSISTENCY_CHECK_FAILED',
            `Total rows in input (${expected}) does not equal total rows accounted for in outputs (${actual})`
        );
        this.name = 'ConsistencyCheckError';
        this.expected = expected;
        this.actual = actual;
        Object.setPrototypeOf(this, ConsistencyCheckError.prototype);
    }
}

export class ConfigurationError extends BatchError {
    readonly issues: readonly string[];

    constructor(issues: readonly string[]) {
        super('CONFIGURATION_ERROR', `Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigurationError';
        this.issues = issues;
        Object.setPrototypeOf(this, ConfigurationError.prototype);
    }
}

function stripQuery(url: string): string {
    const queryStart = url.indexOf('?');
    return queryStart === -1 ? url : url.slice(0, queryStart);
}
