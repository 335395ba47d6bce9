/**
 * Steam Web API payload schemas.
 *
 * Steam omits fields freely (private profiles, hidden levels, no recent games),
 * so every field is optional and a wrongly typed value degrades to "absent"
 * instead of failing the whole response.
 */

import { z } from 'zod';
import { personaStateSchema } from '../../lib/validation/schemas.js';

const optionalString = z.string().nullish().catch(null);
const optionalNumber = z.number().finite().nullish().catch(null);

export const ResolveVanityResponseSchema = z.object({
    // A missing `response` envelope reads as empty
    response: z.object({
        success: optionalNumber,
        steamid: optionalString,
        message: optionalString,
    }).passthrough().default({}),
});

export const PlayerSummarySchema = z.object({
    steamid: z.union([z.string(), z.number()]).nullish().catch(null),
    personaname: optionalString,
    profileurl: optionalString,
    avatarfull: optionalString,
    realname: optionalString,
    loccountrycode: optionalString,
    timecreated: optionalNumber,
    lastlogoff: optionalNumber,
    personastate: personaStateSchema,
    personastateflags: optionalNumber,
}).passthrough();

export type PlayerSummary = z.infer<typeof PlayerSummarySchema>;

export const PlayerSummariesResponseSchema = z.object({
    response: z.object({
        players: z.array(PlayerSummarySchema).nullish().catch(null),
    }).passthrough().default({}),
});

export const SteamLevelResponseSchema = z.object({
    response: z.object({
        player_level: optionalNumber,
    }).passthrough().default({}),
});

export const BadgeSchema = z.object({
    badgeid: optionalNumber,
    appid: optionalNumber,
    level: optionalNumber,
    name: optionalString,
    description: optionalString,
}).passthrough();

export const BadgesResponseSchema = z.object({
    response: z.object({
        badges: z.array(BadgeSchema).nullish().catch(null),
    }).passthrough().default({}),
});

export const RecentGameSchema = z.object({
    appid: optionalNumber,
    name: optionalString,
    playtime_2weeks: optionalNumber,
    playtime_forever: optionalNumber,
}).passthrough();

export const RecentlyPlayedResponseSchema = z.object({
    response: z.object({
        total_count: optionalNumber,
        games: z.array(RecentGameSchema).nullish().catch(null),
    }).passthrough().default({}),
});
