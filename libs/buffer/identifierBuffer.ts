/**
 * Identifier Buffer
 *
 * Accumulates identifiers until one bulk request can carry them. Three
 * variants share a common core and differ only in what they hold:
 *
 * - `dict`:   original OCLC number → MMS ID (get current number)
 * - `set`:    OCLC numbers (set / unset holding)
 * - `single`: exactly one search record
 *
 * `add` never enforces capacity. Callers check `isFull()` after each add.
 */

import { DuplicateIdentifierError } from '../errors/errors.js';

export type BufferKind = 'dict' | 'set' | 'single';

export interface SearchRecord {
    readonly mmsId: string;
    readonly fields: Readonly<Record<string, string>>;
}

interface BufferCore {
    readonly kind: BufferKind;
    readonly maxSize: number;
    /** Bulk requests issued on behalf of this buffer over the run */
    requestCount: number;
    size(): number;
    isFull(): boolean;
    clear(): void;
    identifiers(): string[];
}

export interface DictBuffer extends BufferCore {
    readonly kind: 'dict';
    add(oclcNumber: string, mmsId: string): void;
    companionOf(oclcNumber: string): string | undefined;
}

export interface SetBuffer extends BufferCore {
    readonly kind: 'set';
    add(oclcNumber: string): void;
    has(oclcNumber: string): boolean;
}

export interface SingleBuffer extends BufferCore {
    readonly kind: 'single';
    add(record: SearchRecord): void;
    current(): SearchRecord | undefined;
}

export type IdentifierBuffer = DictBuffer | SetBuffer | SingleBuffer;

function assertCapacity(maxSize: number): void {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
        throw new RangeError(`Buffer capacity must be a positive integer, got ${maxSize}`);
    }
}

export function createDictBuffer(maxSize: number): DictBuffer {
    assertCapacity(maxSize);
    const entries = new Map<string, string>();

    return {
        kind: 'dict',
        maxSize,
        requestCount: 0,
        add(oclcNumber, mmsId) {
            if (entries.has(oclcNumber)) {
                throw new DuplicateIdentifierError(oclcNumber);
            }
            entries.set(oclcNumber, mmsId);
        },
        companionOf: (oclcNumber) => entries.get(oclcNumber),
        size: () => entries.size,
        isFull: () => entries.size >= maxSize,
        clear: () => entries.clear(),
        identifiers: () => [...entries.keys()]
    };
}

export function createSetBuffer(maxSize: number): SetBuffer {
    assertCapacity(maxSize);
    const entries = new Set<string>();

    return {
        kind: 'set',
        maxSize,
        requestCount: 0,
        add(oclcNumber) {
            if (entries.has(oclcNumber)) {
                throw new DuplicateIdentifierError(oclcNumber);
            }
            entries.add(oclcNumber);
        },
        has: (oclcNumber) => entries.has(oclcNumber),
        size: () => entries.size,
        isFull: () => entries.size >= maxSize,
        clear: () => entries.clear(),
        identifiers: () => [...entries]
    };
}

export function createSingleBuffer(): SingleBuffer {
    let record: SearchRecord | undefined;

    return {
        kind: 'single',
        maxSize: 1,
        requestCount: 0,
        add(next) {
            if (record !== undefined) {
                throw new DuplicateIdentifierError(
                    next.mmsId,
                    `Buffer already holds record ${record.mmsId}; cannot add ${next.mmsId}`
                );
            }
            record = next;
        },
        current: () => record,
        size: () => (record === undefined ? 0 : 1),
        isFull: () => record !== undefined,
        clear: () => {
            record = undefined;
        },
        identifiers: () => (record === undefined ? [] : [record.mmsId])
    };
}
