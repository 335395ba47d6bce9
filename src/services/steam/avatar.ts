/**
 * Avatar embedding. Avatars are cosmetic: every failure here turns into `null`
 * and the renderer substitutes its placeholder.
 */

import { DEFAULT_HTTP_TIMEOUT_MS } from '../../config.js';
import { createLogger } from '../../lib/logging/logger.js';
import { fetchTransport, type HttpTransport } from './http.js';

const logger = createLogger('Avatar');

export const FALLBACK_IMAGE_TYPE = 'image/jpeg';

const IMAGE_TYPES_BY_EXTENSION: Readonly<Record<string, string>> = {
    jpg: 'image/jpeg',
    jpeg: 'image/jpeg',
    jpe: 'image/jpeg',
    png: 'image/png',
    gif: 'image/gif',
    webp: 'image/webp',
    avif: 'image/avif',
    bmp: 'image/bmp',
    ico: 'image/vnd.microsoft.icon',
    svg: 'image/svg+xml',
};

/**
 * Guess an image MIME type from the extension of a URL's path.
 * Query strings and fragments are ignored.
 */
export function guessImageType(url: string): string | null {
    let pathname: string;
    try {
        pathname = new URL(url).pathname;
    } catch {
        pathname = url.split(/[?#]/, 1)[0];
    }
    const match = /\.([a-z0-9]+)$/i.exec(pathname);
    if (!match) return null;
    const ext = match[1].toLowerCase();
    return Object.hasOwn(IMAGE_TYPES_BY_EXTENSION, ext) ? IMAGE_TYPES_BY_EXTENSION[ext] : null;
}

/**
 * Content type for an avatar: the declared header without parameters, then the
 * URL extension, then a generic JPEG.
 *
 * @example
 * normalizeContentType('image/png; charset=binary', 'https://x/a.jpg'); // "image/png"
 * normalizeContentType(null, 'https://x/a.gif'); // "image/gif"
 */
export function normalizeContentType(header: string | null | undefined, url: string): string {
    if (header) {
        const type = header.split(';', 1)[0].trim();
        if (type) return type;
    }
    return guessImageType(url) ?? FALLBACK_IMAGE_TYPE;
}

export interface AvatarFetchOptions {
    transport?: HttpTransport;
    timeoutMs?: number;
}

/**
 * Download an avatar and inline it as a base64 data URI.
 * Never throws: network errors, non-2xx responses and empty bodies yield null.
 */
export async function fetchAvatarData(url: string, options: AvatarFetchOptions = {}): Promise<string | null> {
    if (!url) return null;

    const transport = options.transport ?? fetchTransport;
    const timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;

    try {
        const response = await transport(url, { timeoutMs });
        if (!response.ok) {
            await response.body?.cancel();
            logger.debug('Avatar request returned non-success status', { url, status: response.status });
            return null;
        }

        const bytes = Buffer.from(await response.arrayBuffer());
        if (bytes.length === 0) {
            logger.debug('Avatar response was empty', { url });
            return null;
        }

        const contentType = normalizeContentType(response.headers.get('content-type'), url);
        return `data:${contentType};base64,${bytes.toString('base64')}`;
    } catch (error) {
        logger.debug('Avatar fetch failed, placeholder will be used', { url, error });
        return null;
    }
}
