/**
 * Display-only derivations over raw profile fields.
 * All functions are total: bad input yields null (or "Unknown"), never an exception.
 */

const PERSONA_STATES: Readonly<Record<number, string>> = {
    0: 'Offline',
    1: 'Online',
    2: 'Busy',
    3: 'Away',
    4: 'Snooze',
    5: 'Looking to Trade',
    6: 'Looking to Play',
};

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;

const REGIONAL_INDICATOR_A = 0x1f1e6;

const SECONDS_PER_DAY = 86_400;
const SECONDS_PER_HOUR = 3_600;

export function statusLabel(code: number): string {
    return Object.hasOwn(PERSONA_STATES, code) ? PERSONA_STATES[code] : 'Unknown';
}

/**
 * Turn a two-letter country code into its regional-indicator flag emoji.
 * @returns null unless the code is exactly two ASCII letters
 *
 * @example
 * countryFlag('br'); // "🇧🇷"
 * countryFlag('BRA'); // null
 */
export function countryFlag(code: string | null | undefined): string | null {
    if (!code) return null;
    const upper = code.toUpperCase();
    if (upper.length !== 2 || !/^[A-Z]{2}$/.test(upper)) return null;

    return Array.from(upper, (ch) => String.fromCodePoint(REGIONAL_INDICATOR_A + ch.charCodeAt(0) - 65)).join('');
}

function toUtcDate(timestamp: number | null | undefined): Date | null {
    if (!timestamp || !Number.isFinite(timestamp)) return null;
    const date = new Date(timestamp * 1000);
    if (Number.isNaN(date.getTime())) return null;
    const year = date.getUTCFullYear();
    if (year < 1 || year > 9999) return null;
    return date;
}

/**
 * Short "Mon YYYY" label in UTC for an account creation timestamp (unix seconds).
 */
export function memberSince(timestamp: number | null | undefined): string | null {
    const date = toUtcDate(timestamp);
    if (!date) return null;
    return `${MONTHS[date.getUTCMonth()]} ${String(date.getUTCFullYear()).padStart(4, '0')}`;
}

/**
 * Relative age of a logoff timestamp (unix seconds), tiered days → hours → minutes.
 * Minutes never drop below 1; a timestamp in the future counts as just now.
 *
 * @example
 * const now = new Date('2024-05-01T12:00:00Z');
 * lastSeen(now.getTime() / 1000 - 5000, now); // "1h ago"
 */
export function lastSeen(timestamp: number | null | undefined, now: Date): string | null {
    const date = toUtcDate(timestamp);
    if (!date) return null;

    const elapsed = Math.max(0, Math.floor((now.getTime() - date.getTime()) / 1000));
    const days = Math.floor(elapsed / SECONDS_PER_DAY);
    if (days >= 1) return `${days}d ago`;

    const hours = Math.floor(elapsed / SECONDS_PER_HOUR);
    if (hours >= 1) return `${hours}h ago`;

    const minutes = Math.max(1, Math.floor(elapsed / 60));
    return `${minutes}m ago`;
}

export function humanMinutes(totalMinutes: number): string {
    const hours = Math.floor(totalMinutes / 60);
    const mins = totalMinutes % 60;
    if (hours && mins) return `${hours}h ${mins}m`;
    if (hours) return `${hours}h`;
    return `${mins}m`;
}
