import { z } from 'zod';
import { ConfigError } from './lib/errors/errors.js';

export const DEFAULT_API_BASE_URL = 'https://api.steampowered.com';
export const DEFAULT_HTTP_TIMEOUT_MS = 15_000;

const EnvSchema = z.object({
    // Optional: without a key the generator goes straight to --cache
    STEAM_API_KEY: z.string().trim().optional().transform((v) => (v ? v : undefined)),
    STEAM_API_BASE_URL: z.string().url('STEAM_API_BASE_URL must be a valid URL (e.g. https://api.steampowered.com)').default(DEFAULT_API_BASE_URL),
    STEAM_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_HTTP_TIMEOUT_MS),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type ShowcaseConfig = z.infer<typeof EnvSchema>;

/**
 * Validate the environment. Call `dotenv` first if a .env file should be honoured.
 * @throws ConfigError listing every invalid variable
 */
export const loadShowcaseConfig = (env: NodeJS.ProcessEnv = process.env): ShowcaseConfig => {
    const parsed = EnvSchema.safeParse(env);

    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `- ${issue.path.join('.')}: ${issue.message}`),
        );
    }

    return parsed.data;
};
