/**
 * WorldCat brief-bibs search for one input record at a time.
 *
 * Up to two requests per record: one across all of WorldCat and one limited
 * to records held by the institution. Which runs first is a per-run choice.
 */

import type { Logger } from 'pino';
import type { SearchRecord, SingleBuffer } from '../buffer/identifierBuffer.js';
import { ValidationError } from '../errors/errors.js';
import { getComponentLogger } from '../logging/logger.js';
import type { BulkRequestDispatcher } from './bulkRequestDispatcher.js';
import type { CategoryHeaders, Outcome } from './responseClassifier.js';
import { parseResponse } from './responseClassifier.js';
import { BriefBibsResponseSchema } from './responseSchemas.js';

export type SearchCategory = 'found' | 'zero-or-multiple' | 'error';

export const SEARCH_API_LABEL = 'Search Brief Bibliographic Resources API response';

export function searchHeaders(institutionSymbol: string): CategoryHeaders<SearchCategory> {
    return {
        found: ['MMS ID', 'OCLC Number'],
        'zero-or-multiple': ['MMS ID', `Records held by ${institutionSymbol}`, 'Total records'],
        error: ['MMS ID', 'Error']
    };
}

/** Columns, in priority order, that can produce a search query. */
export const SEARCH_COLUMNS = [
    'lccn_fixed',
    'lccn',
    'isbn',
    'issn',
    'gov_doc_class_num_086',
    'gpo_item_num_074'
] as const;

function splitAndJoin(value: string | undefined, joinSeparator: string): string {
    return (value ?? '')
        .split(';')
        .map((part) => part.trim())
        .filter((part) => part !== '')
        .join(joinSeparator);
}

/**
 * Query from the first identifier column with a value.
 * @throws ValidationError when none has one
 */
export function buildSearchQuery(fields: Readonly<Record<string, string>>): string {
    const lccnFixed = (fields['lccn_fixed'] ?? '').trim();
    if (lccnFixed !== '') {
        return `nl:${lccnFixed}`;
    }
    const lccn = (fields['lccn'] ?? '').trim();
    if (lccn !== '') {
        return `nl:${lccn}`;
    }
    const isbn = splitAndJoin(fields['isbn'], ',');
    if (isbn !== '') {
        return `bn:${isbn}`;
    }
    const issn = splitAndJoin(fields['issn'], ',');
    if (issn !== '') {
        return `in:${issn}`;
    }
    const govDoc = splitAndJoin(fields['gov_doc_class_num_086'], ' OR ');
    if (govDoc !== '') {
        const gpoItem = splitAndJoin(fields['gpo_item_num_074'], ' OR ');
        return gpoItem === '' ? govDoc : `${govDoc} AND ${gpoItem}`;
    }

    throw new ValidationError(
        'Cannot build a valid search query. Record must include at least one of the following ' +
            'record identifiers: lccn_fixed, lccn, isbn, issn, gov_doc_class_num_086.',
        'query'
    );
}

export interface SearchStats {
    recordsNeedingOneRequest: number;
    recordsNeedingTwoRequests: number;
}

/**
 * Stage hooks so the caller can tell a failed request from a failed
 * interpretation.
 */
export interface StageTracker {
    enter(stage: 'validate' | 'dispatch' | 'classify'): void;
}

interface SearchCount {
    readonly total: number;
    readonly oclcNumber: string | undefined;
}

export interface WorldCatSearchOptions {
    dispatcher: BulkRequestDispatcher;
    institutionSymbol: string;
    heldByFirst: boolean;
    logger?: Logger;
}

export class WorldCatSearch {
    readonly stats: SearchStats = { recordsNeedingOneRequest: 0, recordsNeedingTwoRequests: 0 };

    private readonly dispatcher: BulkRequestDispatcher;
    private readonly institutionSymbol: string;
    private readonly heldByFirst: boolean;
    private readonly logger: Logger;

    constructor(options: WorldCatSearchOptions) {
        this.dispatcher = options.dispatcher;
        this.institutionSymbol = options.institutionSymbol;
        this.heldByFirst = options.heldByFirst;
        this.logger = options.logger ?? getComponentLogger('search');
    }

    /**
     * Search for the buffered record and resolve its outcome row.
     */
    async resolve(buffer: SingleBuffer, stages: StageTracker): Promise<Outcome<SearchCategory>> {
        stages.enter('validate');
        const record: SearchRecord | undefined = buffer.current();
        if (record === undefined) {
            throw new RangeError('Search buffer is empty');
        }
        const query = buildSearchQuery(record.fields);
        const requestsBefore = buffer.requestCount;

        const outcome = this.heldByFirst
            ? await this.heldByFirstSearch(record, query, buffer, stages)
            : await this.allRecordsFirstSearch(record, query, buffer, stages);

        const requests = buffer.requestCount - requestsBefore;
        if (requests === 1) {
            this.stats.recordsNeedingOneRequest += 1;
        } else if (requests === 2) {
            this.stats.recordsNeedingTwoRequests += 1;
        } else {
            this.logger.warn({ event: 'SEARCH_REQUEST_COUNT_UNEXPECTED', mmsId: record.mmsId, requests }, 'Unexpected number of search requests');
        }
        return outcome;
    }

    private async heldByFirstSearch(
        record: SearchRecord,
        query: string,
        buffer: SingleBuffer,
        stages: StageTracker
    ): Promise<Outcome<SearchCategory>> {
        const held = await this.count(query, true, buffer, stages);
        if (held.total > 0) {
            return held.total === 1 && held.oclcNumber !== undefined
                ? found(record, held.oclcNumber)
                : zeroOrMultiple(record, held.total, undefined);
        }

        this.logger.debug({ mmsId: record.mmsId }, 'No records held by institution; searching all records');
        const all = await this.count(query, false, buffer, stages);
        return all.total === 1 && all.oclcNumber !== undefined
            ? found(record, all.oclcNumber)
            : zeroOrMultiple(record, held.total, all.total);
    }

    private async allRecordsFirstSearch(
        record: SearchRecord,
        query: string,
        buffer: SingleBuffer,
        stages: StageTracker
    ): Promise<Outcome<SearchCategory>> {
        const all = await this.count(query, false, buffer, stages);
        if (all.total <= 1) {
            return all.total === 1 && all.oclcNumber !== undefined
                ? found(record, all.oclcNumber)
                : zeroOrMultiple(record, undefined, all.total);
        }

        this.logger.debug({ mmsId: record.mmsId, total: all.total }, 'Multiple records found; searching with held-by filter');
        const held = await this.count(query, true, buffer, stages);
        return held.total === 1 && held.oclcNumber !== undefined
            ? found(record, held.oclcNumber)
            : zeroOrMultiple(record, held.total, all.total);
    }

    private async count(query: string, heldBy: boolean, buffer: SingleBuffer, stages: StageTracker): Promise<SearchCount> {
        stages.enter('dispatch');
        const reply = await this.dispatcher.dispatch('search', buffer, {
            query,
            heldBySymbol: heldBy ? this.institutionSymbol : undefined
        });

        stages.enter('classify');
        const response = parseResponse(reply, BriefBibsResponseSchema, SEARCH_API_LABEL);
        this.logger.debug(
            { event: 'SEARCH_COUNTED', heldBy, numberOfRecords: response.numberOfRecords },
            heldBy ? `found ${response.numberOfRecords} records held by ${this.institutionSymbol}` : `found ${response.numberOfRecords} total records`
        );
        return { total: response.numberOfRecords, oclcNumber: response.briefRecords?.[0]?.oclcNumber };
    }
}

function found(record: SearchRecord, oclcNumber: string): Outcome<SearchCategory> {
    return { category: 'found', row: [record.mmsId, oclcNumber] };
}

function zeroOrMultiple(record: SearchRecord, held: number | undefined, total: number | undefined): Outcome<SearchCategory> {
    return {
        category: 'zero-or-multiple',
        row: [record.mmsId, held === undefined ? '' : String(held), total === undefined ? '' : String(total)]
    };
}
