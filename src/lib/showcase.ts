/**
 * Showcase pipeline: live fetch -> cache fallback -> optional cache write -> render -> write.
 */

import { isShowcaseError, UsageError } from './errors/errors.js';
import { createLogger } from './logging/logger.js';
import { loadProfileCache, saveProfileCache } from './cache/profile-cache.js';
import type { SteamProfile } from './profile/index.js';
import { renderCard } from './render/index.js';
import { writeFileAtomic } from './utilities/fs-helpers.js';
import { SteamApiClient, SteamProfileFetcher, type HttpTransport } from '../services/steam/index.js';

const logger = createLogger('Showcase');

/**
 * Outcome codes for a live fetch attempt.
 */
export type LiveFetchResultCode =
    | 'Success'            // Profile fetched and normalized
    | 'MissingCredential'  // No API key from flag or environment
    | 'MissingHandle'      // Neither --steamid nor --vanity given
    | 'ResolutionFailed'   // Vanity handle did not resolve
    | 'NotFound'           // No player for the SteamID64
    | 'ServiceUnavailable' // HTTP failure, timeout or malformed payload
    | 'Error';             // Anything else

export type LiveFetchResult =
    | { code: 'Success'; profile: SteamProfile }
    | { code: Exclude<LiveFetchResultCode, 'Success'>; errorMessage: string };

export interface ShowcaseOptions {
    vanity?: string;
    steamid?: string;
    apiKey?: string;
    output: string;
    cache?: string;
    writeCache?: string;
}

export interface ShowcaseDeps {
    transport?: HttpTransport;
    baseUrl?: string;
    timeoutMs?: number;
    now?: () => Date;
}

export interface ShowcaseResult {
    source: 'live' | 'cache';
    outputPath: string;
    cacheWritten: boolean;
    profile: SteamProfile;
}

function classifyFailure(err: unknown): Exclude<LiveFetchResultCode, 'Success'> {
    if (!isShowcaseError(err)) return 'Error';
    switch (err.code) {
        case 'RESOLUTION_FAILED':
            return 'ResolutionFailed';
        case 'NOT_FOUND':
            return 'NotFound';
        case 'TRANSPORT_ERROR':
            return 'ServiceUnavailable';
        default:
            return 'Error';
    }
}

/**
 * Try the Web API. Never throws; failures come back as a result code so the
 * caller can decide on the cache fallback.
 */
export async function fetchLiveProfile(options: ShowcaseOptions, deps: ShowcaseDeps = {}): Promise<LiveFetchResult> {
    if (!options.apiKey) {
        return { code: 'MissingCredential', errorMessage: 'No Steam Web API key (use --api-key or STEAM_API_KEY)' };
    }
    const target: { steamid: string } | { vanity: string } | null = options.steamid
        ? { steamid: options.steamid }
        : options.vanity
            ? { vanity: options.vanity }
            : null;
    if (!target) {
        return { code: 'MissingHandle', errorMessage: 'A vanity handle or steamid must be provided when using the API' };
    }

    const client = new SteamApiClient({
        apiKey: options.apiKey,
        baseUrl: deps.baseUrl,
        timeoutMs: deps.timeoutMs,
        transport: deps.transport,
    });
    const fetcher = new SteamProfileFetcher(client);

    try {
        const steamid = 'steamid' in target ? target.steamid : await fetcher.resolveHandle(target.vanity);
        const profile = await fetcher.fetchProfile(steamid);
        return { code: 'Success', profile };
    } catch (err) {
        return {
            code: classifyFailure(err),
            errorMessage: err instanceof Error ? err.message : String(err),
        };
    }
}

/**
 * Produce the SVG card at `options.output`.
 *
 * @throws UsageError when the live fetch is unavailable and no cache was given
 * @throws CacheError when the fallback cache cannot be loaded
 */
export async function runShowcase(options: ShowcaseOptions, deps: ShowcaseDeps = {}): Promise<ShowcaseResult> {
    const now = deps.now ?? (() => new Date());

    let profile: SteamProfile;
    let source: ShowcaseResult['source'];

    const live = await fetchLiveProfile(options, deps);
    if (live.code === 'Success') {
        profile = live.profile;
        source = 'live';
    } else {
        logger.warn('Live fetch failed', { code: live.code, error: live.errorMessage });

        if (!options.cache) {
            throw new UsageError(`API fetch failed (${live.errorMessage}) and no cache provided`);
        }
        profile = loadProfileCache(options.cache);
        source = 'cache';
    }

    let cacheWritten = false;
    if (source === 'live' && options.writeCache) {
        saveProfileCache(profile, options.writeCache);
        cacheWritten = true;
    }

    const svg = renderCard(profile, now());
    writeFileAtomic(options.output, `${svg}\n`);
    logger.info('Wrote showcase card', { output: options.output, source, steamid: profile.steamid });

    return { source, outputPath: options.output, cacheWritten, profile };
}
