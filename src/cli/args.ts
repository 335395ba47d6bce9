import { z } from 'zod';
import { UsageError } from '../lib/errors/errors.js';

export const DEFAULT_OUTPUT = 'img/steam-profile-showcase.svg';

export const USAGE = `Usage: steam-showcase [options]

Generate a Steam showcase SVG from the Steam Web API.

Options:
  --vanity <handle>      Steam vanity URL handle
  --steamid <id>         SteamID64 (skips vanity resolution)
  --api-key <key>        Steam Web API key (falls back to STEAM_API_KEY)
  --output <path>        Path to write the SVG output (default: ${DEFAULT_OUTPUT})
  --cache <path>         Cache JSON to read when the API is unavailable
  --write-cache <path>   Write fetched data here for offline reuse
  -h, --help             Show this help`;

const VALUE_FLAGS = {
    '--vanity': 'vanity',
    '--steamid': 'steamid',
    '--api-key': 'apiKey',
    '--output': 'output',
    '--cache': 'cache',
    '--write-cache': 'writeCache',
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

function isValueFlag(flag: string): flag is ValueFlag {
    return Object.hasOwn(VALUE_FLAGS, flag);
}

const nonEmpty = (flag: string) => z.string().trim().min(1, `${flag} must not be empty`);

const CliOptionsSchema = z.object({
    vanity: nonEmpty('--vanity').optional(),
    steamid: nonEmpty('--steamid').regex(/^\d+$/, '--steamid must be a numeric SteamID64').optional(),
    apiKey: nonEmpty('--api-key').optional(),
    output: nonEmpty('--output').default(DEFAULT_OUTPUT),
    cache: nonEmpty('--cache').optional(),
    writeCache: nonEmpty('--write-cache').optional(),
    help: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/**
 * Parse command-line flags. Accepts `--flag value` and `--flag=value`.
 *
 * @throws UsageError on unknown flags, positional arguments or missing values
 *
 * @example
 * parseCliArgs(['--vanity', 'gabelogannewell', '--output=card.svg']);
 * // { vanity: 'gabelogannewell', output: 'card.svg', help: false }
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
    const raw: Record<string, string | boolean> = {};

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (arg === '-h' || arg === '--help') {
            raw.help = true;
            continue;
        }
        if (!arg.startsWith('--')) {
            throw new UsageError(`Unexpected argument '${arg}'`);
        }

        const eq = arg.indexOf('=');
        const flag = eq >= 0 ? arg.slice(0, eq) : arg;
        if (!isValueFlag(flag)) {
            throw new UsageError(`Unknown option '${flag}'`);
        }

        let value: string;
        if (eq >= 0) {
            value = arg.slice(eq + 1);
        } else {
            const next = argv[i + 1];
            if (next === undefined || next.startsWith('--')) {
                throw new UsageError(`Option '${flag}' requires a value`);
            }
            value = next;
            i++;
        }

        raw[VALUE_FLAGS[flag]] = value;
    }

    const parsed = CliOptionsSchema.safeParse(raw);
    if (!parsed.success) {
        throw new UsageError(parsed.error.issues.map((i) => i.message).join('; '));
    }
    return parsed.data;
}
