/**
 * Error taxonomy for the showcase generator.
 *
 * Every error carries a stable `code` so callers can branch without string matching:
 *   RESOLUTION_FAILED, NOT_FOUND, TRANSPORT_ERROR  -> live fetch failed, cache fallback applies
 *   CACHE_ERROR, USAGE_ERROR, CONFIG_ERROR         -> fatal for the run
 */

export type ShowcaseErrorCode =
    | 'RESOLUTION_FAILED'
    | 'NOT_FOUND'
    | 'TRANSPORT_ERROR'
    | 'CACHE_ERROR'
    | 'USAGE_ERROR'
    | 'CONFIG_ERROR';

export class ShowcaseError extends Error {
    readonly code: ShowcaseErrorCode;

    constructor(code: ShowcaseErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * Vanity handle could not be resolved to a SteamID64.
 */
export class ResolutionError extends ShowcaseError {
    readonly handle: string;

    constructor(handle: string, message: string) {
        super('RESOLUTION_FAILED', message);
        this.handle = handle;
    }
}

/**
 * The API returned no player for the identifier.
 */
export class NotFoundError extends ShowcaseError {
    readonly steamid: string;

    constructor(steamid: string) {
        super('NOT_FOUND', `No player data returned for steamid ${steamid}`);
        this.steamid = steamid;
    }
}

/**
 * HTTP-level failure on a mandatory API call.
 * `status` is null when no response was received (timeout, DNS, connection reset).
 */
export class TransportError extends ShowcaseError {
    readonly path: string;
    readonly status: number | null;
    readonly body: string;

    constructor(path: string, status: number | null, body: string, options?: { cause?: unknown }) {
        const detail = status === null ? body : `${status} ${body}`;
        super('TRANSPORT_ERROR', `steam ${path} -> ${detail}`, options);
        this.path = path;
        this.status = status;
        this.body = body;
    }
}

export class CacheError extends ShowcaseError {
    readonly cachePath: string;

    constructor(cachePath: string, message: string, options?: { cause?: unknown }) {
        super('CACHE_ERROR', message, options);
        this.cachePath = cachePath;
    }
}

export class UsageError extends ShowcaseError {
    constructor(message: string) {
        super('USAGE_ERROR', message);
    }
}

export class ConfigError extends ShowcaseError {
    readonly issues: string[];

    constructor(issues: string[]) {
        super('CONFIG_ERROR', ['Invalid environment configuration:', ...issues].join('\n'));
        this.issues = issues;
    }
}

export function isShowcaseError(err: unknown): err is ShowcaseError {
    return err instanceof ShowcaseError;
}
