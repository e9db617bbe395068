/**
 * Batch-Processing Driver
 *
 * Row loop: validate → buffer → flush when full, with a final flush once the
 * source is exhausted. Failures are classified and attributed here; the
 * operation only knows how to validate, buffer and flush.
 */

import type { Logger } from 'pino';
import type { IdentifierBuffer } from '../buffer/identifierBuffer.js';
import { ConsistencyCheckError } from '../errors/errors.js';
import { classifyFailure } from '../execution/failureClassifier.js';
import type { Failure, FailureClass, FailureStage } from '../execution/failureTypes.js';
import { fail, ok, type Result } from '../execution/result.js';
import { getComponentLogger } from '../logging/logger.js';
import type { InputRow, RowSource } from '../records/rowSource.js';
import { writeRow } from '../records/sink.js';
import type { BulkOperation } from '../worldcat/bulkRequestDispatcher.js';
import type { CategoryHeaders, CategorySinks, Counters } from '../worldcat/responseClassifier.js';
import type { SearchStats, StageTracker } from '../worldcat/search.js';

export interface FlushContext<C extends string> extends StageTracker {
    readonly counters: Counters<C>;
    readonly sinks: CategorySinks<C>;
}

/**
 * One operation's view of the pipeline.
 */
export interface BatchOperation<C extends string, Item> {
    readonly name: BulkOperation;
    readonly categories: readonly C[];
    createCounters(): Counters<C>;
    readonly errorCategory: C;
    readonly headers: CategoryHeaders<C>;
    readonly buffer: IdentifierBuffer;
    /** Normalize a row and check it against run-scoped dedupe. */
    validate(row: InputRow): Item;
    add(item: Item): void;
    /** Error row for a row that never reached the buffer */
    rowErrorRow(row: InputRow, message: string): string[];
    /** One error row per buffered identifier */
    bufferedErrorRows(message: string): string[][];
    flush(context: FlushContext<C>): Promise<void>;
    searchStats?(): SearchStats;
}

export interface HaltReason {
    readonly failureClass: FailureClass;
    readonly stage: FailureStage;
    readonly message: string;
}

export interface RunSummary<C extends string> {
    readonly operation: BulkOperation;
    readonly counters: Counters<C>;
    /** Rows left unread after a halt */
    readonly notProcessed: number;
    readonly totalRows: number;
    readonly apiRequests: number;
    readonly haltedBy?: HaltReason;
    readonly searchStats?: SearchStats;
}

const STAGE_LABELS: Record<FailureStage, string> = {
    validate: 'validation',
    buffer: 'buffering',
    dispatch: 'API request',
    classify: 'response classification'
};

export async function runBatch<C extends string, Item>(
    operation: BatchOperation<C, Item>,
    rows: RowSource,
    sinks: CategorySinks<C>,
    logger: Logger = getComponentLogger('batch-driver', { operation: operation.name })
): Promise<RunSummary<C>> {
    const counters = operation.createCounters();
    const buffer = operation.buffer;
    const errorCategory = operation.errorCategory;
    let totalRows = 0;
    let notProcessed = 0;
    const run: { halt?: Failure } = {};
    let flushes = 0;

    const recordError = (row: string[]): void => {
        writeRow(sinks[errorCategory], operation.headers[errorCategory], row);
        counters[errorCategory] += 1;
    };

    const flush = async (): Promise<void> => {
        if (buffer.size() === 0) {
            return;
        }
        flushes += 1;
        const batchSize = buffer.size();
        const tracker: { stage: FailureStage } = { stage: 'dispatch' };
        const context: FlushContext<C> = {
            counters,
            sinks,
            enter: (next) => {
                tracker.stage = next;
            }
        };

        try {
            await operation.flush(context);
            logger.info({ event: 'BATCH_FLUSHED', flush: flushes, size: batchSize, counters }, 'Batch processed');
        } catch (error) {
            const failure = classifyFailure(error, 'BATCH_LEVEL', tracker.stage);
            const logFields = {
                failureClass: failure.failureClass,
                failureLevel: failure.level,
                stage: failure.stage,
                size: batchSize,
                fatal: failure.handling.fatal,
                reason: failure.handling.reason
            };

            if (failure.handling.attributable) {
                const message = `${failure.message} (failed during ${STAGE_LABELS[failure.stage]})`;
                for (const row of operation.bufferedErrorRows(message)) {
                    recordError(row);
                }
            }

            if (failure.handling.propagate) {
                logger.fatal({ event: 'BATCH_ABORTED', ...logFields, counters, apiRequests: buffer.requestCount }, failure.message);
                throw error;
            }

            logger.error({ event: 'BATCH_FAILED', ...logFields }, failure.message);
            if (failure.handling.fatal) {
                run.halt = failure;
            }
        } finally {
            buffer.clear();
        }
    };

    for await (const row of rows) {
        totalRows += 1;
        if (run.halt !== undefined) {
            notProcessed += 1;
            continue;
        }

        const accepted = acceptRow(operation, row);
        if (!accepted.ok) {
            const failure = accepted.failure;
            recordError(operation.rowErrorRow(row, failure.message));
            logger.warn(
                { event: 'ROW_REJECTED', row: row.index, failureClass: failure.failureClass, failureLevel: failure.level, fatal: failure.handling.fatal },
                failure.message
            );
            if (failure.handling.fatal) {
                await flush();
                run.halt ??= failure;
            }
            continue;
        }

        if (buffer.isFull()) {
            await flush();
        }
    }

    await flush();

    const accounted = operation.categories.reduce((sum, category) => sum + counters[category], 0) + notProcessed;
    if (accounted !== totalRows) {
        logger.error({ event: 'CONSISTENCY_CHECK_FAILED', totalRows, accounted, counters }, 'Counters do not add up');
        throw new ConsistencyCheckError(totalRows, accounted);
    }

    const halt = run.halt;
    const summary: RunSummary<C> = {
        operation: operation.name,
        counters,
        notProcessed,
        totalRows,
        apiRequests: buffer.requestCount,
        ...(halt === undefined
            ? {}
            : { haltedBy: { failureClass: halt.failureClass, stage: halt.stage, message: halt.message } }),
        ...(operation.searchStats === undefined ? {} : { searchStats: operation.searchStats() })
    };

    logger.info({ event: 'RUN_COMPLETED', ...summary }, halt === undefined ? 'Run completed' : 'Run halted');
    return summary;
}

function acceptRow<C extends string, Item>(operation: BatchOperation<C, Item>, row: InputRow): Result<Item> {
    let item: Item;
    try {
        item = operation.validate(row);
    } catch (error) {
        return fail(classifyFailure(error, 'ROW_LEVEL', 'validate'));
    }
    try {
        operation.add(item);
    } catch (error) {
        return fail(classifyFailure(error, 'ROW_LEVEL', 'buffer'));
    }
    return ok(item);
}
