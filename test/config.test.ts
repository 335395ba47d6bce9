import { describe, expect, it } from 'vitest';
import { DEFAULT_API_BASE_URL, DEFAULT_HTTP_TIMEOUT_MS, loadShowcaseConfig } from '../src/config.js';
import { ConfigError } from '../src/lib/errors/errors.js';

describe('loadShowcaseConfig', () => {
    it('applies defaults to an empty environment', () => {
        expect(loadShowcaseConfig({})).toEqual({
            STEAM_API_KEY: undefined,
            STEAM_API_BASE_URL: DEFAULT_API_BASE_URL,
            STEAM_HTTP_TIMEOUT_MS: DEFAULT_HTTP_TIMEOUT_MS,
            LOG_LEVEL: 'info',
        });
    });

    it('trims the key and treats a blank one as absent', () => {
        expect(loadShowcaseConfig({ STEAM_API_KEY: '  test-key ' }).STEAM_API_KEY).toBe('test-key');
        expect(loadShowcaseConfig({ STEAM_API_KEY: '   ' }).STEAM_API_KEY).toBeUndefined();
    });

    it('coerces the timeout', () => {
        expect(loadShowcaseConfig({ STEAM_HTTP_TIMEOUT_MS: '2500' }).STEAM_HTTP_TIMEOUT_MS).toBe(2500);
    });

    it('lists every invalid variable', () => {
        let error: unknown;
        try {
            loadShowcaseConfig({ STEAM_API_BASE_URL: 'not a url', STEAM_HTTP_TIMEOUT_MS: '-5', LOG_LEVEL: 'loud' });
        } catch (err) {
            error = err;
        }

        expect(error).toBeInstanceOf(ConfigError);
        if (!(error instanceof ConfigError)) return;
        expect(error.issues).toHaveLength(3);
        expect(error.issues[0]).toBe(
            '- STEAM_API_BASE_URL: STEAM_API_BASE_URL must be a valid URL (e.g. https://api.steampowered.com)',
        );
        expect(error.issues[1].startsWith('- STEAM_HTTP_TIMEOUT_MS: ')).toBe(true);
        expect(error.issues[2].startsWith('- LOG_LEVEL: ')).toBe(true);
        expect(error.message.split('\n')[0]).toBe('Invalid environment configuration:');
    });
});
