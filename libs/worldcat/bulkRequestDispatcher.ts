/**
 * Bulk Request Dispatcher
 *
 * One outbound call per buffer flush, made through the token manager so an
 * expired token is renewed and the call retried once.
 */

import type { Logger } from 'pino';
import type { TokenLifecycleManager } from '../auth/tokenLifecycleManager.js';
import type { IdentifierBuffer } from '../buffer/identifierBuffer.js';
import type { AppConfig } from '../config/appConfig.js';
import { AuthExpiredError, HttpError } from '../errors/errors.js';
import { fetchTransport, sendRequest, type HttpReply, type HttpTransport } from '../http/transport.js';
import { getComponentLogger } from '../logging/logger.js';
import { buildTransactionId } from './transactionId.js';

export type BulkOperation = 'get_current_number' | 'set_holding' | 'unset_holding' | 'search';

export type Cascade = 0 | 1;

export interface DispatchExtras {
    /** unset_holding: 0 aborts when local holdings exist, 1 removes them */
    cascade?: Cascade;
    /** search: query expression */
    query?: string;
    /** search: restrict hits to records held by this institution */
    heldBySymbol?: string;
}

const METHODS: Record<BulkOperation, 'GET' | 'POST' | 'DELETE'> = {
    get_current_number: 'GET',
    set_holding: 'POST',
    unset_holding: 'DELETE',
    search: 'GET'
};

export interface BulkRequestDispatcherOptions {
    config: Pick<AppConfig, 'metadataApiUrl' | 'searchApiUrl' | 'requestTimeoutMs' | 'institutionSymbol' | 'principalId'>;
    tokens: TokenLifecycleManager;
    transport?: HttpTransport;
    now?: () => number;
    logger?: Logger;
}

export class BulkRequestDispatcher {
    private readonly config: BulkRequestDispatcherOptions['config'];
    private readonly tokens: TokenLifecycleManager;
    private readonly transport: HttpTransport;
    private readonly now: () => number;
    private readonly logger: Logger;

    constructor(options: BulkRequestDispatcherOptions) {
        this.config = options.config;
        this.tokens = options.tokens;
        this.transport = options.transport ?? fetchTransport;
        this.now = options.now ?? Date.now;
        this.logger = options.logger ?? getComponentLogger('dispatcher');
    }

    buildUrl(operation: BulkOperation, identifiers: readonly string[], extras: DispatchExtras = {}): string {
        const oclcNumbers = identifiers.join(',');

        switch (operation) {
            case 'get_current_number':
                return `${this.config.metadataApiUrl}/bib/checkcontrolnumbers?oclcNumbers=${oclcNumbers}` +
                    `&transactionID=${this.transactionId()}`;
            case 'set_holding':
                return `${this.config.metadataApiUrl}/ih/datalist?oclcNumbers=${oclcNumbers}` +
                    `&transactionID=${this.transactionId()}`;
            case 'unset_holding':
                return `${this.config.metadataApiUrl}/ih/datalist?oclcNumbers=${oclcNumbers}` +
                    `&cascade=${extras.cascade ?? 0}&transactionID=${this.transactionId()}`;
            case 'search': {
                if (extras.query === undefined || extras.query === '') {
                    throw new RangeError('Search dispatch requires a query');
                }
                const heldBy = extras.heldBySymbol === undefined
                    ? ''
                    : `&heldBySymbol=${encodeQueryValue(extras.heldBySymbol)}`;
                return `${this.config.searchApiUrl}/brief-bibs?q=${encodeQueryValue(extras.query)}&limit=2${heldBy}`;
            }
        }
    }

    /**
     * Issue the request for the buffer's current contents and return the raw
     * reply once its status is known to be 2xx.
     */
    async dispatch(operation: BulkOperation, buffer: IdentifierBuffer, extras: DispatchExtras = {}): Promise<HttpReply> {
        const url = this.buildUrl(operation, buffer.identifiers(), extras);
        const method = METHODS[operation];

        this.logger.debug({ event: 'DISPATCH_STARTED', operation, method, size: buffer.size() }, 'Sending bulk request');

        const reply = await this.tokens.executeWithAuth(async (accessToken) => {
            const result = await sendRequest(
                this.transport,
                url,
                {
                    method,
                    headers: {
                        Authorization: this.tokens.authorizationFor(accessToken),
                        Accept: 'application/json'
                    }
                },
                this.config.requestTimeoutMs
            );
            if (result.status === 401) {
                throw new AuthExpiredError('Access token rejected (HTTP 401)');
            }
            return result;
        });

        buffer.requestCount += 1;
        this.logger.debug(
            { event: 'DISPATCH_COMPLETED', operation, status: reply.status, requestCount: buffer.requestCount },
            'Bulk request completed'
        );

        if (!reply.ok) {
            this.logger.error({ event: 'DISPATCH_HTTP_ERROR', operation, status: reply.status, body: reply.body }, 'Bulk request failed');
            throw new HttpError(reply.status, reply.body, reply.url);
        }
        return reply;
    }

    private transactionId(): string {
        return buildTransactionId(this.config.institutionSymbol, this.config.principalId, new Date(this.now()));
    }
}

function encodeQueryValue(value: string): string {
    return encodeURIComponent(value).replace(/%3A/gi, ':').replace(/%2C/gi, ',');
}
