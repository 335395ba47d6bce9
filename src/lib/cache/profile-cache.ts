/**
 * Profile cache codec.
 *
 * Persists the raw profile fields (never derived display values) to a flat JSON
 * document so a later run can render without API access. Lists are stored in
 * full; truncation to the card's three slots happens at render time.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { CacheError } from '../errors/errors.js';
import { createLogger } from '../logging/logger.js';
import { personaStateSchema } from '../validation/schemas.js';
import {
    createProfile,
    DEFAULT_BADGE_NAME,
    UNKNOWN_GAME_NAME,
    UNKNOWN_PERSONA_NAME,
    type SteamProfile,
} from '../profile/profile.js';

const logger = createLogger('Cache');

export const CACHE_FALLBACK_PROFILE_URL = 'https://steamcommunity.com';

const nullableString = z.string().nullish().transform((v) => v ?? null);
const nullableNumber = z.number().nullish().transform((v) => v ?? null);

const CachedBadgeSchema = z.object({
    name: z.string().nullish().transform((v) => v ?? DEFAULT_BADGE_NAME),
    level: nullableNumber,
});

const CachedGameSchema = z.object({
    name: z.string().nullish().transform((v) => v ?? UNKNOWN_GAME_NAME),
    playtime_2weeks: z.number().nullish().transform((v) => v ?? 0),
});

export const CachedProfileSchema = z.object({
    steamid: z.union([z.string(), z.number()]).nullish().transform((v) => (v === null || v === undefined ? '' : String(v))),
    personaname: z.string().nullish().transform((v) => v ?? UNKNOWN_PERSONA_NAME),
    profileurl: z.string().nullish().transform((v) => v ?? CACHE_FALLBACK_PROFILE_URL),
    avatarfull: z.string().nullish().transform((v) => v ?? ''),
    avatar_data_uri: nullableString,
    realname: nullableString,
    loccountrycode: nullableString,
    timecreated: nullableNumber,
    lastlogoff: nullableNumber,
    personastate: personaStateSchema,
    personastateflags: nullableNumber,
    level: nullableNumber,
    badge_highlights: z.array(CachedBadgeSchema).nullish().transform((v) => v ?? []),
    recent_games: z.array(CachedGameSchema).nullish().transform((v) => v ?? []),
});

/** On-disk representation (snake_case keys, explicit nulls) */
export interface CachedProfile {
    steamid: string;
    personaname: string;
    profileurl: string;
    avatarfull: string;
    avatar_data_uri: string | null;
    realname: string | null;
    loccountrycode: string | null;
    timecreated: number | null;
    lastlogoff: number | null;
    personastate: number;
    personastateflags: number | null;
    level: number | null;
    badge_highlights: Array<{ name: string; level: number | null }>;
    recent_games: Array<{ name: string; playtime_2weeks: number }>;
}

export function serializeProfile(profile: SteamProfile): CachedProfile {
    return {
        steamid: profile.steamid,
        personaname: profile.personaname,
        profileurl: profile.profileurl,
        avatarfull: profile.avatarfull,
        avatar_data_uri: profile.avatarDataUri,
        realname: profile.realname,
        loccountrycode: profile.loccountrycode,
        timecreated: profile.timecreated,
        lastlogoff: profile.lastlogoff,
        personastate: profile.personastate,
        personastateflags: profile.personastateflags,
        level: profile.level,
        badge_highlights: profile.badgeHighlights.map((badge) => ({ name: badge.name, level: badge.level })),
        recent_games: profile.recentGames.map((game) => ({ name: game.name, playtime_2weeks: game.playtime2Weeks })),
    };
}

/**
 * Rebuild a profile from decoded cache JSON, applying the same defaults as a live fetch.
 * @throws CacheError when the document is not an object or a field has the wrong type
 */
export function deserializeProfile(raw: unknown, cachePath = '<memory>'): SteamProfile {
    const parsed = CachedProfileSchema.safeParse(raw);
    if (!parsed.success) {
        const msg = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
        throw new CacheError(cachePath, `Invalid profile cache ${cachePath}: ${msg}`);
    }

    const data = parsed.data;
    return createProfile({
        steamid: data.steamid,
        personaname: data.personaname,
        profileurl: data.profileurl,
        avatarfull: data.avatarfull,
        avatarDataUri: data.avatar_data_uri,
        realname: data.realname,
        loccountrycode: data.loccountrycode,
        timecreated: data.timecreated,
        lastlogoff: data.lastlogoff,
        personastate: data.personastate,
        personastateflags: data.personastateflags,
        level: data.level,
        badgeHighlights: data.badge_highlights,
        recentGames: data.recent_games.map((game) => ({ name: game.name, playtime2Weeks: game.playtime_2weeks })),
    });
}

/**
 * Write the profile cache, replacing any existing file. Parent directories are created.
 */
export function saveProfileCache(profile: SteamProfile, cachePath: string): void {
    fs.mkdirSync(path.dirname(path.resolve(cachePath)), { recursive: true });
    fs.writeFileSync(cachePath, JSON.stringify(serializeProfile(profile), null, 2), 'utf8');
    logger.info('Wrote profile cache', { cachePath, steamid: profile.steamid });
}

/**
 * Read a profile cache written by `saveProfileCache`. Never touches the network.
 * @throws CacheError if the file is missing, unreadable, or not a valid cache document
 */
export function loadProfileCache(cachePath: string): SteamProfile {
    let text: string;
    try {
        text = fs.readFileSync(cachePath, 'utf8');
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new CacheError(cachePath, `Cannot read profile cache ${cachePath}: ${reason}`, { cause: err });
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new CacheError(cachePath, `Profile cache ${cachePath} is not valid JSON: ${reason}`, { cause: err });
    }

    const profile = deserializeProfile(raw, cachePath);
    logger.info('Loaded profile cache', { cachePath, steamid: profile.steamid });
    return profile;
}
