/**
 * Response Classifier
 *
 * Turns one bulk response into outcome rows and counter increments. Every
 * entry is resolved before anything is written, so a response that fails
 * part-way leaves the sinks and counters untouched.
 */

import type { z } from 'zod';
import type { DictBuffer, SetBuffer } from '../buffer/identifierBuffer.js';
import { MalformedResponseError } from '../errors/errors.js';
import type { HttpReply } from '../http/transport.js';
import { getComponentLogger } from '../logging/logger.js';
import { writeRow, type Sink } from '../records/sink.js';
import { CheckControlNumbersResponseSchema, HoldingsResponseSchema } from './responseSchemas.js';

const logger = getComponentLogger('classifier');

export type GetCurrentCategory = 'current' | 'old' | 'error';
export type HoldingCategory = 'updated' | 'no-update-needed' | 'error';
export type HoldingAction = 'set' | 'unset';

export type Counters<C extends string> = Record<C, number>;
export type CategorySinks<C extends string> = Record<C, Sink>;
export type CategoryHeaders<C extends string> = Record<C, readonly string[]>;

export interface Outcome<C extends string> {
    readonly category: C;
    readonly row: readonly string[];
}

export const GET_CURRENT_HEADERS: CategoryHeaders<GetCurrentCategory> = {
    current: ['MMS ID', 'Current OCLC Number'],
    old: ['MMS ID', 'Current OCLC Number', 'Original OCLC Number'],
    error: ['MMS ID', 'OCLC Number', 'Error']
};

export const HOLDING_HEADERS: CategoryHeaders<HoldingCategory> = {
    updated: ['Requested OCLC Number', 'New OCLC Number (if applicable)', 'Warning'],
    'no-update-needed': ['Requested OCLC Number', 'New OCLC Number (if applicable)', 'Error'],
    error: ['Requested OCLC Number', 'New OCLC Number (if applicable)', 'Error']
};

export const HTTP_OK_MARKER = 'HTTP 200 OK';
export const HTTP_CONFLICT_MARKER = 'HTTP 409 Conflict';

export const GET_CURRENT_API_LABEL = 'Get Current OCLC Number API response';

export function holdingApiLabel(action: HoldingAction): string {
    return action === 'set' ? 'Set Holding API response' : 'Unset Holding API response';
}

/**
 * Decode and validate a response body.
 * @throws MalformedResponseError
 */
export function parseResponse<S extends z.ZodTypeAny>(reply: HttpReply, schema: S, label: string): z.output<S> {
    let json: unknown;
    try {
        json = JSON.parse(reply.body);
    } catch (error) {
        logger.error({ event: 'RESPONSE_MALFORMED', label, body: reply.body }, 'Error decoding JSON');
        throw new MalformedResponseError(`Problem with ${label}: Error decoding JSON`, reply.body, { cause: error });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
        const detail = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        logger.error({ event: 'RESPONSE_MALFORMED', label, detail }, 'Unexpected response shape');
        throw new MalformedResponseError(`Problem with ${label}: unexpected response shape (${detail})`, reply.body);
    }
    return parsed.data;
}

/**
 * Write resolved outcomes in order, header first for empty sinks.
 */
export function commitOutcomes<C extends string>(
    outcomes: readonly Outcome<C>[],
    headers: CategoryHeaders<C>,
    counters: Counters<C>,
    sinks: CategorySinks<C>
): void {
    for (const { category, row } of outcomes) {
        writeRow(sinks[category], headers[category], row);
        counters[category] += 1;
    }
}

function assertNotSeen(seen: Set<string>, requested: string, label: string, body: string): void {
    if (seen.has(requested)) {
        throw new MalformedResponseError(`Problem with ${label}: OCLC number ${requested} appears more than once`, body);
    }
    seen.add(requested);
}

function unrequested(requested: string, label: string, body: string): MalformedResponseError {
    return new MalformedResponseError(`Problem with ${label}: OCLC number ${requested} was not requested`, body);
}

export function resolveCheckControlNumbers(reply: HttpReply, buffer: DictBuffer): Outcome<GetCurrentCategory>[] {
    const label = GET_CURRENT_API_LABEL;
    const response = parseResponse(reply, CheckControlNumbersResponseSchema, label);
    const seen = new Set<string>();
    const outcomes: Outcome<GetCurrentCategory>[] = [];

    for (const entry of response.entry) {
        const requested = entry.requestedOclcNumber;
        const mmsId = buffer.companionOf(requested);
        if (mmsId === undefined) {
            throw unrequested(requested, label, reply.body);
        }
        assertNotSeen(seen, requested, label, reply.body);

        const current = entry.currentOclcNumber ?? requested;
        if (!entry.found) {
            logger.warn({ event: 'OCLC_NUMBER_NOT_FOUND', oclcNumber: requested }, 'OCLC number not found');
            outcomes.push({ category: 'error', row: [mmsId, requested, `Problem with ${label}: OCLC number not found`] });
        } else if (requested === current) {
            outcomes.push({ category: 'current', row: [mmsId, current] });
        } else {
            outcomes.push({ category: 'old', row: [mmsId, current, requested] });
        }
    }

    for (const requested of buffer.identifiers()) {
        if (!seen.has(requested)) {
            outcomes.push({
                category: 'error',
                row: [buffer.companionOf(requested) ?? '', requested, `Problem with ${label}: OCLC number not returned in the response`]
            });
        }
    }
    return outcomes;
}

export function resolveHoldings(reply: HttpReply, buffer: SetBuffer, action: HoldingAction): Outcome<HoldingCategory>[] {
    const label = holdingApiLabel(action);
    const response = parseResponse(reply, HoldingsResponseSchema, label);
    const seen = new Set<string>();
    const outcomes: Outcome<HoldingCategory>[] = [];

    for (const entry of response.entry) {
        const requested = entry.requestedOclcNumber;
        if (!buffer.has(requested)) {
            throw unrequested(requested, label, reply.body);
        }
        assertNotSeen(seen, requested, label, reply.body);

        const current = entry.currentOclcNumber ?? requested;
        const newOclcNumber = requested === current ? '' : current;
        const warning = newOclcNumber === ''
            ? ''
            : `Warning: OCLC number ${requested} has been updated to ${newOclcNumber}. Consider updating Alma record.`;
        if (warning !== '') {
            logger.warn({ event: 'OCLC_NUMBER_UPDATED', requested, current }, 'OCLC number has been updated');
        }

        if (entry.httpStatusCode === HTTP_OK_MARKER) {
            outcomes.push({ category: 'updated', row: [requested, newOclcNumber, warning] });
        } else if (entry.httpStatusCode === HTTP_CONFLICT_MARKER) {
            outcomes.push({
                category: 'no-update-needed',
                row: [requested, newOclcNumber, appendNote(`Problem with ${label}: ${entry.errorDetail}.`, warning)]
            });
        } else {
            logger.error(
                { event: 'HOLDING_ENTRY_FAILED', oclcNumber: requested, status: entry.httpStatusCode, detail: entry.errorDetail },
                'Holding entry failed'
            );
            outcomes.push({
                category: 'error',
                row: [requested, newOclcNumber, appendNote(`Problem with ${label}: ${entry.httpStatusCode}: ${entry.errorDetail}.`, warning)]
            });
        }
    }

    for (const requested of buffer.identifiers()) {
        if (!seen.has(requested)) {
            outcomes.push({
                category: 'error',
                row: [requested, '', `Problem with ${label}: OCLC number not returned in the response`]
            });
        }
    }
    return outcomes;
}

/**
 * Classify a check-control-numbers response for the buffered records.
 */
export function classifyCheckControlNumbers(
    reply: HttpReply,
    buffer: DictBuffer,
    counters: Counters<GetCurrentCategory>,
    sinks: CategorySinks<GetCurrentCategory>
): void {
    commitOutcomes(resolveCheckControlNumbers(reply, buffer), GET_CURRENT_HEADERS, counters, sinks);
}

/**
 * Classify a set or unset holding response for the buffered records.
 */
export function classifyHoldings(
    reply: HttpReply,
    buffer: SetBuffer,
    action: HoldingAction,
    counters: Counters<HoldingCategory>,
    sinks: CategorySinks<HoldingCategory>
): void {
    commitOutcomes(resolveHoldings(reply, buffer, action), HOLDING_HEADERS, counters, sinks);
}

function appendNote(message: string, note: string): string {
    return note === '' ? message : `${message} ${note}`;
}
