import { loadShowcaseConfig } from '../config.js';
import { formatErrorMessage } from '../lib/errors/error-handler.js';
import { UsageError } from '../lib/errors/errors.js';
import { createLogger } from '../lib/logging/logger.js';
import { runShowcase, type ShowcaseDeps } from '../lib/showcase.js';
import { parseCliArgs, USAGE, type CliOptions } from './args.js';

const logger = createLogger('CLI');

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface MainDeps extends Omit<ShowcaseDeps, 'baseUrl' | 'timeoutMs'> {
    env?: NodeJS.ProcessEnv;
}

function reportUsageError(error: UsageError): number {
    console.error(formatErrorMessage({ error, baseMessage: 'steam-showcase' }));
    console.error(USAGE);
    return EXIT_USAGE;
}

/**
 * Run one invocation and return the process exit code.
 */
export async function main(argv: readonly string[], deps: MainDeps = {}): Promise<number> {
    let options: CliOptions;
    try {
        options = parseCliArgs(argv);
    } catch (error) {
        if (error instanceof UsageError) return reportUsageError(error);
        throw error;
    }

    if (options.help) {
        console.log(USAGE);
        return EXIT_OK;
    }

    try {
        const config = loadShowcaseConfig(deps.env ?? process.env);
        const result = await runShowcase(
            {
                vanity: options.vanity,
                steamid: options.steamid,
                apiKey: options.apiKey ?? config.STEAM_API_KEY,
                output: options.output,
                cache: options.cache,
                writeCache: options.writeCache,
            },
            {
                transport: deps.transport,
                now: deps.now,
                baseUrl: config.STEAM_API_BASE_URL,
                timeoutMs: config.STEAM_HTTP_TIMEOUT_MS,
            },
        );
        logger.debug('Showcase complete', { source: result.source, cacheWritten: result.cacheWritten });
        return EXIT_OK;
    } catch (error) {
        if (error instanceof UsageError) return reportUsageError(error);
        console.error(formatErrorMessage({ error, baseMessage: 'Showcase generation failed' }));
        return EXIT_FAILURE;
    }
}
