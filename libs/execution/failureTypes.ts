/**
 * Failure Types
 *
 * Deterministic failure classification for the batch driver. A failure is
 * either ROW_LEVEL (one input row, never touches the buffer) or BATCH_LEVEL
 * (everything currently buffered shares the outcome).
 */

export type FailureLevel = 'ROW_LEVEL' | 'BATCH_LEVEL';

/**
 * Where the failure surfaced.
 */
export type FailureStage = 'validate' | 'buffer' | 'dispatch' | 'classify';

/**
 * Failure class enumeration.
 */
export type FailureClass =
    | 'VALIDATION_FAILURE'    // Bad input value → record and continue
    | 'MISSING_COLUMN'        // Input shape wrong for every row → halt
    | 'DUPLICATE_IDENTIFIER'  // Driver failed to dedupe → halt
    | 'AUTH_FAILURE'          // Still rejected after one refresh → halt
    | 'HTTP_FAILURE'          // Non-2xx from the service → halt
    | 'TRANSPORT_ERROR'       // Connection refused/reset, DNS → halt
    | 'TIMEOUT'               // No answer within the request timeout → halt
    | 'MALFORMED_RESPONSE'    // Response cannot be interpreted → propagate
    | 'SYSTEM_FAILURE';       // Anything unexpected → halt

/**
 * Handling policy for a failure class.
 */
export interface FailureHandling {
    /** Remaining input is not processed */
    readonly fatal: boolean;
    /** Buffered identifiers are written to the error sink */
    readonly attributable: boolean;
    /** The error is re-thrown to the caller once the batch is settled */
    readonly propagate: boolean;
    /** Human-readable reason */
    readonly reason: string;
}

/**
 * A classified failure, carried as data through `Result`.
 */
export interface Failure {
    readonly level: FailureLevel;
    readonly stage: FailureStage;
    readonly failureClass: FailureClass;
    readonly handling: FailureHandling;
    /** Sanitized message, safe for output rows */
    readonly message: string;
    readonly error: Error;
}

export const FAILURE_CLASS_METADATA: Record<FailureClass, FailureHandling> = {
    VALIDATION_FAILURE: {
        fatal: false,
        attributable: true,
        propagate: false,
        reason: 'Local to the record; the next record is unaffected'
    },
    MISSING_COLUMN: {
        fatal: true,
        attributable: true,
        propagate: false,
        reason: 'Every remaining row would fail the same way'
    },
    DUPLICATE_IDENTIFIER: {
        fatal: true,
        attributable: true,
        propagate: false,
        reason: 'Buffer invariant violated; driver state cannot be trusted'
    },
    AUTH_FAILURE: {
        fatal: true,
        attributable: true,
        propagate: false,
        reason: 'Credentials rejected after a refresh; later batches would be rejected too'
    },
    HTTP_FAILURE: {
        fatal: true,
        attributable: true,
        propagate: false,
        reason: 'Service returned an error status'
    },
    TRANSPORT_ERROR: {
        fatal: true,
        attributable: true,
        propagate: false,
        reason: 'Service unreachable'
    },
    TIMEOUT: {
        fatal: true,
        attributable: true,
        propagate: false,
        reason: 'Handled as a connection failure'
    },
    MALFORMED_RESPONSE: {
        fatal: true,
        attributable: false,
        propagate: true,
        reason: 'Response could not be interpreted; the same would recur on the next batch'
    },
    SYSTEM_FAILURE: {
        fatal: true,
        attributable: true,
        propagate: false,
        reason: 'Unexpected internal failure'
    }
};
