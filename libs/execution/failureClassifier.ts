/**
 * Failure Classifier
 *
 * Maps a thrown error onto a failure class by its error code, never by its
 * message. Unknown errors are SYSTEM_FAILURE.
 */

import {
    AuthExpiredError,
    BatchError,
    type BatchErrorCode
} from '../errors/errors.js';
import {
    Failure,
    FailureClass,
    FailureLevel,
    FailureStage,
    FAILURE_CLASS_METADATA
} from './failureTypes.js';

const CODE_TO_CLASS: Partial<Record<BatchErrorCode, FailureClass>> = {
    VALIDATION_ERROR: 'VALIDATION_FAILURE',
    MISSING_COLUMN: 'MISSING_COLUMN',
    DUPLICATE_IDENTIFIER: 'DUPLICATE_IDENTIFIER',
    AUTH_EXPIRED: 'AUTH_FAILURE',
    HTTP_ERROR: 'HTTP_FAILURE',
    CONNECTION_ERROR: 'TRANSPORT_ERROR',
    TIMEOUT: 'TIMEOUT',
    MALFORMED_RESPONSE: 'MALFORMED_RESPONSE'
};

/**
 * Classify an error raised while validating, buffering or flushing.
 */
export function classifyFailure(error: unknown, level: FailureLevel, stage: FailureStage): Failure {
    const normalized = error instanceof Error ? error : new Error(String(error));

    let failureClass: FailureClass = 'SYSTEM_FAILURE';
    if (normalized instanceof BatchError) {
        failureClass = CODE_TO_CLASS[normalized.code] ?? 'SYSTEM_FAILURE';
    }

    return {
        level,
        stage,
        failureClass,
        handling: FAILURE_CLASS_METADATA[failureClass],
        message: describeError(normalized),
        error: normalized
    };
}

function describeError(error: Error): string {
    const label = error instanceof AuthExpiredError
        ? `${error.name}: ${error.message} (after token refresh)`
        : `${error.name}: ${error.message}`;
    return sanitizeErrorMessage(label);
}

/**
 * Remove credential values and bound the length of a message that ends up in
 * an output file.
 */
export function sanitizeErrorMessage(message: string): string {
    return message
        .replace(/password[=:]\s*\S+/gi, 'password=[REDACTED]')
        .replace(/token[=:]\s*\S+/gi, 'token=[REDACTED]')
        .replace(/secret[=:]\s*\S+/gi, 'secret=[REDACTED]')
        .replace(/Bearer\s+\S+/g, 'Bearer [REDACTED]')
        .substring(0, 500);
}
