/**
 * One structured line per Steam Web API call, written once the outcome is known.
 * Successful calls log at debug; every failure logs at warn with its outcome.
 */

import { createLogger } from './logger.js';

const logger = createLogger('HTTP');

export type SteamCallOutcome = 'ok' | 'status' | 'timeout' | 'network' | 'invalid-json';

export type SteamCallLog = {
    requestId: string;
    path: string;
    outcome: SteamCallOutcome;
    durationMs: number;
    status?: number;
    steamid?: string;
    detail?: string;
};

const OUTCOME_MESSAGES: Record<SteamCallOutcome, string> = {
    ok: 'Steam API call succeeded',
    status: 'Steam API returned an error status',
    timeout: 'Steam API call timed out',
    network: 'Steam API call failed before a response was read',
    'invalid-json': 'Steam API returned a body that is not JSON',
};

export function logSteamCall(call: SteamCallLog): void {
    const { outcome, ...fields } = call;
    if (outcome === 'ok') {
        logger.debug(OUTCOME_MESSAGES.ok, fields);
        return;
    }
    logger.warn(OUTCOME_MESSAGES[outcome], { outcome, ...fields });
}
