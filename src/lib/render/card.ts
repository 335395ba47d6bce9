/**
 * Steam showcase card renderer.
 *
 * `renderCard` is a pure function of the profile and the clock: no network,
 * no randomness. Every piece of user-controlled text passes through `escapeXml`.
 */

import {
    countryFlag,
    humanMinutes,
    lastSeen,
    memberSince,
    statusLabel,
} from '../profile/display.js';
import { HIGHLIGHT_LIMIT, type BadgeHighlight, type RecentGame, type SteamProfile } from '../profile/profile.js';
import { DEFAULT_AVATAR_DATA_URI } from './avatar-placeholder.js';
import { escapeXml as X } from './markup.js';

export const CARD_WIDTH = 360;
export const CARD_HEIGHT = 260;

const FONT = `'Segoe UI', 'Inter', sans-serif`;
const INFO_SEPARATOR = '  ·  ';

const PLACEHOLDER_GAME: RecentGame = { name: 'No recent games', playtime2Weeks: 0 };
const PLACEHOLDER_BADGE: BadgeHighlight = { name: 'Collector', level: null };

export interface CardText {
    name: string;
    levelText: string;
    statusText: string;
    infoLine: string;
    recentLines: string[];
    badgeLines: string[];
    avatarHref: string;
    profileUrl: string;
}

export function badgeLabel(badge: BadgeHighlight): string {
    return badge.level ? `${badge.name} · Lv${badge.level}` : badge.name;
}

export function gameLine(game: RecentGame): string {
    return `${game.name} — ${humanMinutes(game.playtime2Weeks)}`;
}

/**
 * Everything the card shows, as plain (unescaped) strings.
 */
export function describeCard(profile: SteamProfile, now: Date): CardText {
    const recent = profile.recentGames.slice(0, HIGHLIGHT_LIMIT);
    const badges = profile.badgeHighlights.slice(0, HIGHLIGHT_LIMIT);

    const info: string[] = [];
    if (profile.realname) info.push(profile.realname);
    const flag = countryFlag(profile.loccountrycode);
    if (flag) info.push(flag);
    const since = memberSince(profile.timecreated);
    if (since) info.push(`Member since ${since}`);

    let statusText = statusLabel(profile.personastate);
    const seen = lastSeen(profile.lastlogoff, now);
    if (seen && profile.personastate === 0) {
        statusText += ` (${seen})`;
    }

    return {
        name: profile.personaname,
        levelText: profile.level !== null ? `Level ${profile.level}` : 'Level hidden',
        statusText,
        infoLine: info.join(INFO_SEPARATOR),
        recentLines: (recent.length ? recent : [PLACEHOLDER_GAME]).map(gameLine),
        badgeLines: (badges.length ? badges : [PLACEHOLDER_BADGE]).map(badgeLabel),
        avatarHref: profile.avatarDataUri ?? DEFAULT_AVATAR_DATA_URI,
        profileUrl: profile.profileurl,
    };
}

function listPanel(y: number, title: string, fill: string, lines: string[]): string {
    const spans = lines
        .map((line, i) => `<tspan x="20" dy="${i === 0 ? 0 : 16}">${X(line)}</tspan>`)
        .join('\n      ');

    return `<g transform="translate(24 ${y})" font-family="${FONT}">
    <rect width="312" height="52" rx="16" fill="${fill}" stroke="rgba(102,192,244,0.3)" />
    <text x="20" y="24" font-size="13" font-weight="600" fill="#66C0F4">${X(title)}</text>
    <text x="20" y="36" font-size="12" fill="#B5D8F2">
      ${spans}
    </text>
  </g>`;
}

/**
 * Render the 360×260 showcase card as a standalone SVG document.
 *
 * @param now Reference time for the "last seen" suffix
 */
export function renderCard(profile: SteamProfile, now: Date = new Date()): string {
    const card = describeCard(profile, now);

    return `<svg width="${CARD_WIDTH}" height="${CARD_HEIGHT}" viewBox="0 0 ${CARD_WIDTH} ${CARD_HEIGHT}" fill="none" xmlns="http://www.w3.org/2000/svg">
  <defs>
    <linearGradient id="steamCardGradient" x1="0" y1="0" x2="1" y2="1">
      <stop offset="0%" stop-color="#0B141C" />
      <stop offset="45%" stop-color="#13283D" />
      <stop offset="100%" stop-color="#1E405F" />
    </linearGradient>
    <filter id="steamCardShadow" x="-20%" y="-20%" width="140%" height="140%">
      <feDropShadow dx="0" dy="14" stdDeviation="18" flood-color="#040A14" flood-opacity="0.55" />
    </filter>
    <clipPath id="avatarClip">
      <rect x="24" y="26" width="88" height="88" rx="18" />
    </clipPath>
  </defs>
  <g filter="url(#steamCardShadow)">
    <rect x="0" y="0" width="${CARD_WIDTH}" height="${CARD_HEIGHT}" rx="22" fill="url(#steamCardGradient)" stroke="rgba(102,192,244,0.35)" />
  </g>
  <image href="${X(card.avatarHref)}" x="24" y="26" width="88" height="88" clip-path="url(#avatarClip)" preserveAspectRatio="xMidYMid slice" />
  <rect x="24" y="26" width="88" height="88" rx="18" fill="rgba(15, 29, 44, 0.4)" stroke="rgba(102,192,244,0.45)" />
  <g transform="translate(128 40)" font-family="${FONT}">
    <text x="0" y="0" font-size="24" font-weight="700" fill="#F5FAFF">${X(card.name)}</text>
    <text x="0" y="18" font-size="12" fill="#90ABC4">${X(card.levelText)}</text>
    <text x="0" y="38" font-size="12" fill="#6E8BA8">${X(card.statusText)}</text>
    <text x="0" y="58" font-size="11" fill="#4DA6DA">${X(card.infoLine)}</text>
  </g>
  ${listPanel(136, 'Recent playtime', 'rgba(15, 29, 44, 0.7)', card.recentLines)}
  ${listPanel(196, 'Badge highlights', 'rgba(12, 24, 36, 0.65)', card.badgeLines)}
  <a href="${X(card.profileUrl)}" target="_blank" rel="noreferrer">
    <rect x="260" y="30" width="76" height="30" rx="10" fill="rgba(18, 42, 60, 0.75)" stroke="rgba(102,192,244,0.4)" />
    <text x="298" y="50" font-family="${FONT}" font-size="11" font-weight="600" fill="#F5FAFF" text-anchor="middle">View</text>
  </a>
</svg>`;
}
