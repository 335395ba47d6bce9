/**
 * HTTP utilities for the Steam Web API.
 *
 * All network access goes through a single `HttpTransport` so the fetcher can be
 * driven by an in-process fake in tests. The production transport is global fetch.
 */

import { randomUUID } from 'node:crypto';
import { DEFAULT_API_BASE_URL, DEFAULT_HTTP_TIMEOUT_MS } from '../../config.js';
import { TransportError } from '../../lib/errors/errors.js';
import { logSteamCall, type SteamCallLog, type SteamCallOutcome } from '../../lib/logging/http-logger.js';

export interface TransportRequest {
    timeoutMs: number;
    headers?: Record<string, string>;
}

/**
 * Performs one GET request. Rejects on network failure or timeout; resolves with
 * any HTTP status (status handling is the caller's job).
 */
export type HttpTransport = (url: string, request: TransportRequest) => Promise<Response>;

const USER_AGENT = 'steam-showcase-card/1.0 (+https://steamcommunity.com/dev)';

export const fetchTransport: HttpTransport = (url, request) =>
    fetch(url, {
        method: 'GET',
        headers: {
            'User-Agent': USER_AGENT,
            ...request.headers,
        },
        signal: AbortSignal.timeout(request.timeoutMs),
    });

export type QueryParams = Record<string, string | number | undefined>;

export interface SteamApiClientOptions {
    apiKey: string;
    baseUrl?: string;
    timeoutMs?: number;
    transport?: HttpTransport;
}

/**
 * Timeouts surface as a DOMException named TimeoutError (AbortSignal.timeout)
 * or AbortError (manual AbortController).
 */
export function isTimeoutError(err: unknown): boolean {
    if (typeof err !== 'object' || err === null || !('name' in err)) return false;
    return err.name === 'TimeoutError' || err.name === 'AbortError';
}

function describeFailure(err: unknown): string {
    if (err instanceof Error) {
        const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
        return `${err.message}${cause}`;
    }
    return String(err);
}

/**
 * Thin JSON client bound to one API key.
 */
export class SteamApiClient {
    readonly baseUrl: string;
    readonly timeoutMs: number;
    readonly transport: HttpTransport;
    private readonly apiKey: string;

    constructor(options: SteamApiClientOptions) {
        this.apiKey = options.apiKey;
        this.baseUrl = options.baseUrl ?? DEFAULT_API_BASE_URL;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
        this.transport = options.transport ?? fetchTransport;
    }

    /**
     * Build the full URL for an API method. The key is always the first query parameter.
     * A path prefix on the base URL (a proxy mount, say) is kept.
     * @param path Method path, e.g. `/ISteamUser/GetPlayerSummaries/v2/`
     */
    buildUrl(path: string, query: QueryParams = {}): URL {
        const url = new URL(`${this.baseUrl.replace(/\/+$/, '')}${path}`);
        url.searchParams.set('key', this.apiKey);
        for (const [key, value] of Object.entries(query)) {
            if (value === undefined) continue;
            url.searchParams.set(key, String(value));
        }
        return url;
    }

    /**
     * GET an API method and return the decoded JSON body.
     *
     * @throws TransportError on timeout, network failure, non-2xx status or a body that is not JSON
     *
     * @example
     * const data = await client.getJSON('/IPlayerService/GetSteamLevel/v1/', { steamid });
     */
    async getJSON(path: string, query: QueryParams = {}): Promise<unknown> {
        const url = this.buildUrl(path, query);
        const requestId = randomUUID().slice(0, 8);
        const started = Date.now();
        const steamid = typeof query.steamid === 'string' ? query.steamid : undefined;

        const log = (outcome: SteamCallOutcome, extra: Pick<SteamCallLog, 'status' | 'detail'> = {}): void =>
            logSteamCall({ requestId, path, outcome, durationMs: Date.now() - started, steamid, ...extra });

        // A failed body read counts as a failed request
        let response: Response;
        let text: string;
        try {
            response = await this.transport(url.toString(), {
                timeoutMs: this.timeoutMs,
                headers: { Accept: 'application/json' },
            });
            text = await response.text();
        } catch (err) {
            if (isTimeoutError(err)) {
                log('timeout');
                throw new TransportError(path, null, `timeout after ${this.timeoutMs}ms`, { cause: err });
            }
            const message = describeFailure(err);
            log('network', { detail: message });
            throw new TransportError(path, null, message, { cause: err });
        }

        if (!response.ok) {
            log('status', { status: response.status });
            throw new TransportError(path, response.status, text);
        }

        let data: unknown;
        try {
            data = JSON.parse(text);
        } catch (err) {
            log('invalid-json', { status: response.status });
            throw new TransportError(path, response.status, `invalid JSON body: ${text.slice(0, 200)}`, { cause: err });
        }

        log('ok', { status: response.status });
        return data;
    }
}
