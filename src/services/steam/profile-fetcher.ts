/**
 * Assembles a full SteamProfile from the Web API.
 *
 * A profile takes four sequential read-only calls plus one avatar download:
 *   1. GetPlayerSummaries     (mandatory, empty -> NotFoundError)
 *   2. GetSteamLevel          (level may be hidden)
 *   3. GetBadges              (first 3 kept)
 *   4. GetRecentlyPlayedGames (count=3 server side)
 *   5. avatar bytes           (best effort)
 */

import type { z } from 'zod';
import { NotFoundError, ResolutionError, TransportError } from '../../lib/errors/errors.js';
import { createLogger } from '../../lib/logging/logger.js';
import {
    buildProfileUrl,
    createProfile,
    DEFAULT_BADGE_NAME,
    HIGHLIGHT_LIMIT,
    UNKNOWN_GAME_NAME,
    UNKNOWN_PERSONA_NAME,
    type BadgeHighlight,
    type RecentGame,
    type SteamProfile,
} from '../../lib/profile/profile.js';
import {
    BadgesResponseSchema,
    PlayerSummariesResponseSchema,
    RecentlyPlayedResponseSchema,
    ResolveVanityResponseSchema,
    SteamLevelResponseSchema,
} from './api-types.js';
import { fetchAvatarData } from './avatar.js';
import type { SteamApiClient } from './http.js';

const logger = createLogger('Fetcher');

export const STEAM_PATHS = {
    resolveVanity: '/ISteamUser/ResolveVanityURL/v1/',
    playerSummaries: '/ISteamUser/GetPlayerSummaries/v2/',
    steamLevel: '/IPlayerService/GetSteamLevel/v1/',
    badges: '/IPlayerService/GetBadges/v1/',
    recentlyPlayed: '/IPlayerService/GetRecentlyPlayedGames/v1/',
} as const;

/**
 * Validate a decoded payload. A body that decodes but has the wrong shape is
 * reported like any other transport failure on that endpoint.
 */
function parsePayload<T extends z.ZodTypeAny>(schema: T, data: unknown, path: string): z.infer<T> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
        const msg = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
        throw new TransportError(path, 200, `unexpected payload: ${msg}`);
    }
    return parsed.data;
}

export class SteamProfileFetcher {
    constructor(private readonly client: SteamApiClient) {}

    /**
     * Resolve a vanity handle (the `name` in steamcommunity.com/id/name) to a SteamID64.
     * @throws ResolutionError when Steam reports no match
     * @throws TransportError on HTTP failure
     */
    async resolveHandle(handle: string): Promise<string> {
        const path = STEAM_PATHS.resolveVanity;
        const data = parsePayload(
            ResolveVanityResponseSchema,
            await this.client.getJSON(path, { vanityurl: handle }),
            path,
        );

        const { success, steamid, message } = data.response;
        if (success !== 1) {
            throw new ResolutionError(handle, `Failed to resolve vanity URL '${handle}': ${message ?? `success=${success ?? 'missing'}`}`);
        }
        if (!steamid) {
            throw new ResolutionError(handle, `No steamid returned for vanity '${handle}'`);
        }

        logger.info('Resolved vanity handle', { handle, steamid });
        return steamid;
    }

    /**
     * Fetch and normalize everything the card needs for one SteamID64.
     * @throws NotFoundError when the summary lookup returns no player
     * @throws TransportError on HTTP failure of any mandatory call
     */
    async fetchProfile(steamid: string): Promise<SteamProfile> {
        const summaryPath = STEAM_PATHS.playerSummaries;
        const summary = parsePayload(
            PlayerSummariesResponseSchema,
            await this.client.getJSON(summaryPath, { steamids: steamid }),
            summaryPath,
        );
        const player = summary.response.players?.[0];
        if (!player) {
            throw new NotFoundError(steamid);
        }

        const levelPath = STEAM_PATHS.steamLevel;
        const levelData = parsePayload(
            SteamLevelResponseSchema,
            await this.client.getJSON(levelPath, { steamid }),
            levelPath,
        );
        const level = levelData.response.player_level ?? null;

        const badgesPath = STEAM_PATHS.badges;
        const badgeData = parsePayload(
            BadgesResponseSchema,
            await this.client.getJSON(badgesPath, { steamid }),
            badgesPath,
        );
        const badgeHighlights: BadgeHighlight[] = (badgeData.response.badges ?? [])
            .slice(0, HIGHLIGHT_LIMIT)
            .map((badge) => ({
                name: badge.name || badge.description || DEFAULT_BADGE_NAME,
                level: badge.level ?? null,
            }));

        const recentPath = STEAM_PATHS.recentlyPlayed;
        const recentData = parsePayload(
            RecentlyPlayedResponseSchema,
            await this.client.getJSON(recentPath, { steamid, count: HIGHLIGHT_LIMIT }),
            recentPath,
        );
        const recentGames: RecentGame[] = (recentData.response.games ?? []).map((game) => ({
            name: game.name ?? UNKNOWN_GAME_NAME,
            playtime2Weeks: game.playtime_2weeks ?? 0,
        }));

        const avatarfull = player.avatarfull ?? '';
        const avatarDataUri = await this.fetchAvatarData(avatarfull);

        const resolvedId = player.steamid === null || player.steamid === undefined ? steamid : String(player.steamid);

        logger.info('Fetched profile', {
            steamid: resolvedId,
            level,
            badges: badgeHighlights.length,
            recentGames: recentGames.length,
            avatarEmbedded: avatarDataUri !== null,
        });

        return createProfile({
            steamid: resolvedId,
            personaname: player.personaname ?? UNKNOWN_PERSONA_NAME,
            profileurl: player.profileurl ?? buildProfileUrl(steamid),
            avatarfull,
            avatarDataUri,
            realname: player.realname ?? null,
            loccountrycode: player.loccountrycode ?? null,
            timecreated: player.timecreated ?? null,
            lastlogoff: player.lastlogoff ?? null,
            personastate: player.personastate,
            personastateflags: player.personastateflags ?? null,
            level,
            badgeHighlights,
            recentGames,
        });
    }

    /**
     * Inline the avatar through the same transport and timeout as the API calls.
     * Never throws.
     */
    fetchAvatarData(url: string): Promise<string | null> {
        return fetchAvatarData(url, { transport: this.client.transport, timeoutMs: this.client.timeoutMs });
    }
}
