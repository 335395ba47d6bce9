/**
 * In-process stand-in for the HTTP transport.
 *
 * Routes are looked up by full URL first (avatars), then by pathname (API methods).
 * Unrouted requests reject like undici does when a host is unreachable.
 */

import { vi } from 'vitest';
import type { HttpTransport, TransportRequest } from '../../src/services/steam/http.js';

export type RouteHandler = (url: URL) => Response | Promise<Response>;

export type Routes = Record<string, RouteHandler>;

export const json = (body: unknown, status = 200): RouteHandler => () =>
    new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json' },
    });

export const text = (body: string, status: number): RouteHandler => () => new Response(body, { status });

export const bytes = (data: number[], headers: Record<string, string> = {}): RouteHandler => () =>
    new Response(new Uint8Array(data), { status: 200, headers });

export const fail = (error: unknown): RouteHandler => () => {
    throw error;
};

export function createFakeTransport(routes: Routes) {
    const transport = vi.fn(async (url: string, _request: TransportRequest): Promise<Response> => {
        const parsed = new URL(url);
        const handler = routes[parsed.href] ?? routes[parsed.pathname];
        if (!handler) {
            throw new TypeError('fetch failed');
        }
        return handler(parsed);
    });

    const requestedUrls = (): URL[] => transport.mock.calls.map(([url]) => new URL(url));
    const requestedPaths = (): string[] => requestedUrls().map((u) => u.pathname);

    const typed: HttpTransport = transport;
    return { transport: typed, mock: transport, requestedUrls, requestedPaths };
}
