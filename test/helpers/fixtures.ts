/**
 * Test data builders and temp-directory helpers.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createProfile, type ProfileFields, type SteamProfile } from '../../src/lib/profile/profile.js';
import { STEAM_PATHS } from '../../src/services/steam/profile-fetcher.js';
import { bytes, json, type Routes } from './fake-transport.js';

export const TEST_API_KEY = 'test-key';
export const TEST_STEAMID = '76561190000000001';
export const TEST_AVATAR_URL = 'https://avatars.example.test/pixel_full.jpg';

/** 2012-01-01T00:00:00Z */
export const JAN_2012 = 1_325_376_000;

export function makeProfile(overrides: Partial<ProfileFields> = {}): SteamProfile {
    return createProfile({
        steamid: TEST_STEAMID,
        personaname: 'Pixel Ranger',
        profileurl: 'https://steamcommunity.com/id/pixelranger/',
        avatarfull: TEST_AVATAR_URL,
        ...overrides,
    });
}

/**
 * A full, healthy set of API routes for TEST_STEAMID.
 */
export function happyRoutes(overrides: Routes = {}): Routes {
    return {
        [STEAM_PATHS.resolveVanity]: json({ response: { success: 1, steamid: TEST_STEAMID } }),
        [STEAM_PATHS.playerSummaries]: json({
            response: {
                players: [
                    {
                        steamid: TEST_STEAMID,
                        personaname: 'Pixel Ranger',
                        profileurl: 'https://steamcommunity.com/id/pixelranger/',
                        avatarfull: TEST_AVATAR_URL,
                        realname: 'Ada Test',
                        loccountrycode: 'SE',
                        timecreated: JAN_2012,
                        lastlogoff: 1_700_000_000,
                        personastate: 1,
                        personastateflags: 0,
                    },
                ],
            },
        }),
        [STEAM_PATHS.steamLevel]: json({ response: { player_level: 42 } }),
        [STEAM_PATHS.badges]: json({
            response: {
                badges: [
                    { badgeid: 1, name: 'Pillar of Community', level: 3 },
                    { badgeid: 2, description: 'Years of Service', level: 10 },
                    { badgeid: 3, level: 1 },
                    { badgeid: 4, name: 'Fourth' },
                    { badgeid: 5, name: 'Fifth' },
                ],
            },
        }),
        [STEAM_PATHS.recentlyPlayed]: json({
            response: {
                total_count: 3,
                games: [
                    { appid: 10, name: 'Orbital Farm', playtime_2weeks: 125 },
                    { appid: 20, playtime_2weeks: 30 },
                    { appid: 30, name: 'Tiny Racers' },
                ],
            },
        }),
        [TEST_AVATAR_URL]: bytes([1, 2, 3], { 'content-type': 'image/jpeg' }),
        ...overrides,
    };
}

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'steam-showcase-'));
}

export function removeTempDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}
