/**
 * Operation definitions and the four entry points.
 */

import type { Logger } from 'pino';
import {
    createDictBuffer,
    createSetBuffer,
    createSingleBuffer,
    type SearchRecord
} from '../buffer/identifierBuffer.js';
import { ConfigurationError, MissingColumnError, ValidationError } from '../errors/errors.js';
import type { InputRow, RowSource } from '../records/rowSource.js';
import { normalizeOclcNumber, validateIdentifier } from '../records/validator.js';
import type { BulkRequestDispatcher, Cascade } from '../worldcat/bulkRequestDispatcher.js';
import {
    GET_CURRENT_HEADERS,
    HOLDING_HEADERS,
    classifyCheckControlNumbers,
    classifyHoldings,
    commitOutcomes,
    type CategorySinks,
    type GetCurrentCategory,
    type HoldingAction,
    type HoldingCategory
} from '../worldcat/responseClassifier.js';
import { WorldCatSearch, searchHeaders, type SearchCategory } from '../worldcat/search.js';
import { runBatch, type BatchOperation, type RunSummary } from './batchDriver.js';

export const MMS_ID_COLUMN = 'MMS ID';
export const OCLC_NUMBER_COLUMN = 'OCLC Number';
/** Column name used by catalog exports for the 035 $a value */
export const ALMA_OCLC_NUMBER_COLUMN = "Unique OCLC Number from Alma Record's 035 $a";
export const SEARCH_MMS_ID_COLUMN = 'mms_id';

export const OUTPUT_FILES = {
    get_current_number: {
        current: 'already_has_current_oclc_number.csv',
        old: 'needs_current_oclc_number.csv',
        error: 'records_with_errors_when_getting_current_oclc_number.csv'
    },
    set_holding: {
        updated: 'records_with_holding_successfully_set.csv',
        'no-update-needed': 'records_with_holding_already_set.csv',
        error: 'records_with_errors_when_setting_holding.csv'
    },
    unset_holding: {
        updated: 'records_with_holding_successfully_unset.csv',
        'no-update-needed': 'records_with_holding_already_unset.csv',
        error: 'records_with_errors_when_unsetting_holding.csv'
    },
    search: {
        found: 'records_with_oclc_num.csv',
        'zero-or-multiple': 'records_with_zero_or_multiple_worldcat_matches.csv',
        error: 'records_with_errors_when_searching_worldcat.csv'
    }
} as const;

function requireColumn(row: InputRow, ...candidates: string[]): string {
    for (const column of candidates) {
        const value = row.fields[column];
        if (value !== undefined) {
            return value;
        }
    }
    throw new MissingColumnError(candidates.join("' or '"));
}

function rawField(row: InputRow, ...candidates: string[]): string {
    for (const column of candidates) {
        const value = row.fields[column];
        if (value !== undefined) {
            return value.trim();
        }
    }
    return '';
}

function alreadyProcessed(label: string, identifier: string): ValidationError {
    return new ValidationError(`Record with ${label} ${identifier} has already been processed.`);
}

interface GetCurrentItem {
    readonly mmsId: string;
    readonly oclcNumber: string;
}

export function getCurrentNumberOperation(
    dispatcher: BulkRequestDispatcher,
    maxRecordsPerRequest: number
): BatchOperation<GetCurrentCategory, GetCurrentItem> {
    const buffer = createDictBuffer(maxRecordsPerRequest);
    const seenMmsIds = new Set<string>();

    return {
        name: 'get_current_number',
        categories: ['current', 'old', 'error'],
        errorCategory: 'error',
        headers: GET_CURRENT_HEADERS,
        buffer,
        createCounters: () => ({ current: 0, old: 0, error: 0 }),
        validate(row) {
            const mmsId = validateIdentifier(requireColumn(row, MMS_ID_COLUMN), 'MMS ID');
            const oclcNumber = normalizeOclcNumber(requireColumn(row, ALMA_OCLC_NUMBER_COLUMN, OCLC_NUMBER_COLUMN));
            if (seenMmsIds.has(mmsId)) {
                throw alreadyProcessed('MMS ID', mmsId);
            }
            // Records may share an OCLC number; only one per request.
            const bufferedMmsId = buffer.companionOf(oclcNumber);
            if (bufferedMmsId !== undefined) {
                throw new ValidationError(
                    `OCLC number ${oclcNumber} already exists in records buffer with MMS ID ${bufferedMmsId}`
                );
            }
            seenMmsIds.add(mmsId);
            return { mmsId, oclcNumber };
        },
        add: (item) => buffer.add(item.oclcNumber, item.mmsId),
        rowErrorRow: (row, message) => [
            rawField(row, MMS_ID_COLUMN),
            rawField(row, ALMA_OCLC_NUMBER_COLUMN, OCLC_NUMBER_COLUMN),
            message
        ],
        bufferedErrorRows: (message) =>
            buffer.identifiers().map((oclcNumber) => [buffer.companionOf(oclcNumber) ?? '', oclcNumber, message]),
        async flush(context) {
            context.enter('dispatch');
            const reply = await dispatcher.dispatch('get_current_number', buffer);
            context.enter('classify');
            classifyCheckControlNumbers(reply, buffer, context.counters, context.sinks);
        }
    };
}

export function holdingOperation(
    action: HoldingAction,
    dispatcher: BulkRequestDispatcher,
    maxRecordsPerRequest: number,
    cascade: Cascade = 0
): BatchOperation<HoldingCategory, string> {
    const buffer = createSetBuffer(maxRecordsPerRequest);
    const seenOclcNumbers = new Set<string>();
    const operationName = action === 'set' ? 'set_holding' : 'unset_holding';

    return {
        name: operationName,
        categories: ['updated', 'no-update-needed', 'error'],
        errorCategory: 'error',
        headers: HOLDING_HEADERS,
        buffer,
        createCounters: () => ({ updated: 0, 'no-update-needed': 0, error: 0 }),
        validate(row) {
            const oclcNumber = normalizeOclcNumber(requireColumn(row, OCLC_NUMBER_COLUMN));
            if (seenOclcNumbers.has(oclcNumber)) {
                throw alreadyProcessed('OCLC Number', oclcNumber);
            }
            seenOclcNumbers.add(oclcNumber);
            return oclcNumber;
        },
        add: (oclcNumber) => buffer.add(oclcNumber),
        rowErrorRow: (row, message) => [rawField(row, OCLC_NUMBER_COLUMN), '', message],
        bufferedErrorRows: (message) => buffer.identifiers().map((oclcNumber) => [oclcNumber, '', message]),
        async flush(context) {
            context.enter('dispatch');
            const reply = await dispatcher.dispatch(operationName, buffer, action === 'unset' ? { cascade } : {});
            context.enter('classify');
            classifyHoldings(reply, buffer, action, context.counters, context.sinks);
        }
    };
}

export function searchOperation(
    dispatcher: BulkRequestDispatcher,
    institutionSymbol: string,
    heldByFirst: boolean,
    logger?: Logger
): BatchOperation<SearchCategory, SearchRecord> {
    const buffer = createSingleBuffer();
    const seenMmsIds = new Set<string>();
    const headers = searchHeaders(institutionSymbol);
    const worldCatSearch = new WorldCatSearch({ dispatcher, institutionSymbol, heldByFirst, logger });

    return {
        name: 'search',
        categories: ['found', 'zero-or-multiple', 'error'],
        errorCategory: 'error',
        headers,
        buffer,
        createCounters: () => ({ found: 0, 'zero-or-multiple': 0, error: 0 }),
        validate(row) {
            const mmsId = validateIdentifier(requireColumn(row, SEARCH_MMS_ID_COLUMN), 'MMS ID');
            if (seenMmsIds.has(mmsId)) {
                throw alreadyProcessed('MMS ID', mmsId);
            }
            seenMmsIds.add(mmsId);
            return { mmsId, fields: row.fields };
        },
        add: (record) => buffer.add(record),
        rowErrorRow: (row, message) => [rawField(row, SEARCH_MMS_ID_COLUMN), message],
        bufferedErrorRows: (message) => buffer.identifiers().map((mmsId) => [mmsId, message]),
        async flush(context) {
            const outcome = await worldCatSearch.resolve(buffer, context);
            commitOutcomes([outcome], headers, context.counters, context.sinks);
        },
        searchStats: () => ({ ...worldCatSearch.stats })
    };
}

export interface BulkRunOptions<C extends string> {
    rows: RowSource;
    maxRecordsPerRequest: number;
    sinks: CategorySinks<C>;
    dispatcher: BulkRequestDispatcher;
    logger?: Logger;
}

export function getCurrentNumber(options: BulkRunOptions<GetCurrentCategory>): Promise<RunSummary<GetCurrentCategory>> {
    return runBatch(
        getCurrentNumberOperation(options.dispatcher, options.maxRecordsPerRequest),
        options.rows,
        options.sinks,
        options.logger
    );
}

export function setHolding(options: BulkRunOptions<HoldingCategory>): Promise<RunSummary<HoldingCategory>> {
    return runBatch(
        holdingOperation('set', options.dispatcher, options.maxRecordsPerRequest),
        options.rows,
        options.sinks,
        options.logger
    );
}

export function unsetHolding(
    options: BulkRunOptions<HoldingCategory> & { cascade: Cascade }
): Promise<RunSummary<HoldingCategory>> {
    return runBatch(
        holdingOperation('unset', options.dispatcher, options.maxRecordsPerRequest, options.cascade),
        options.rows,
        options.sinks,
        options.logger
    );
}

export interface SearchRunOptions {
    rows: RowSource;
    sinks: CategorySinks<SearchCategory>;
    dispatcher: BulkRequestDispatcher;
    institutionSymbol: string | undefined;
    /** Search the institution's holdings before all of WorldCat */
    heldByFirst?: boolean;
    logger?: Logger;
}

export async function search(options: SearchRunOptions): Promise<RunSummary<SearchCategory>> {
    if (options.institutionSymbol === undefined || options.institutionSymbol === '') {
        throw new ConfigurationError(['OCLC_INSTITUTION_SYMBOL is required for search']);
    }
    return runBatch(
        searchOperation(options.dispatcher, options.institutionSymbol, options.heldByFirst ?? false, options.logger),
        options.rows,
        options.sinks,
        options.logger
    );
}
