/**
 * Steam profile data model.
 *
 * Only raw fields live on the record. Everything shown on the card that is derived
 * (status label, flag, membership age, last seen) is computed by the functions in
 * `display.ts`, so a cache round-trip never has to persist derived values.
 */

export interface BadgeHighlight {
    readonly name: string;
    /** Badge level, null when the API omits it */
    readonly level: number | null;
}

export interface RecentGame {
    readonly name: string;
    /** Minutes played in the trailing two weeks */
    readonly playtime2Weeks: number;
}

export interface SteamProfile {
    readonly steamid: string;
    readonly personaname: string;
    readonly profileurl: string;
    readonly avatarfull: string;
    /** Avatar bytes inlined once at fetch time so rendering never touches the network */
    readonly avatarDataUri: string | null;
    readonly realname: string | null;
    /** ISO 3166-1 alpha-2 as reported by Steam */
    readonly loccountrycode: string | null;
    /** Unix seconds */
    readonly timecreated: number | null;
    /** Unix seconds */
    readonly lastlogoff: number | null;
    readonly personastate: number;
    readonly personastateflags: number | null;
    readonly level: number | null;
    readonly badgeHighlights: readonly BadgeHighlight[];
    readonly recentGames: readonly RecentGame[];
}

export const UNKNOWN_PERSONA_NAME = 'Unknown';
export const DEFAULT_BADGE_NAME = 'Badge';
export const UNKNOWN_GAME_NAME = 'Unknown';

/** Number of badges / games that make it onto the card */
export const HIGHLIGHT_LIMIT = 3;

export type ProfileFields = Pick<SteamProfile, 'steamid' | 'profileurl'> & Partial<SteamProfile>;

/**
 * Build an immutable profile, filling unspecified optional fields with their defaults.
 */
export function createProfile(fields: ProfileFields): SteamProfile {
    return Object.freeze({
        steamid: fields.steamid,
        personaname: fields.personaname ?? UNKNOWN_PERSONA_NAME,
        profileurl: fields.profileurl,
        avatarfull: fields.avatarfull ?? '',
        avatarDataUri: fields.avatarDataUri ?? null,
        realname: fields.realname ?? null,
        loccountrycode: fields.loccountrycode ?? null,
        timecreated: fields.timecreated ?? null,
        lastlogoff: fields.lastlogoff ?? null,
        personastate: fields.personastate ?? 0,
        personastateflags: fields.personastateflags ?? null,
        level: fields.level ?? null,
        badgeHighlights: Object.freeze((fields.badgeHighlights ?? []).map((b) => Object.freeze({ ...b }))),
        recentGames: Object.freeze((fields.recentGames ?? []).map((g) => Object.freeze({ ...g }))),
    });
}

/**
 * Canonical community URL for a SteamID64.
 */
export function buildProfileUrl(steamid: string): string {
    return `https://steamcommunity.com/profiles/${encodeURIComponent(steamid)}`;
}
