import { describe, expect, it } from 'vitest';
import { DEFAULT_AVATAR_DATA_URI } from '../src/lib/render/avatar-placeholder.js';
import { badgeLabel, describeCard, renderCard } from '../src/lib/render/card.js';
import { escapeXml } from '../src/lib/render/markup.js';
import { JAN_2012, makeProfile } from './helpers/fixtures.js';

const now = new Date('2024-05-01T12:00:00Z');
const nowSeconds = now.getTime() / 1000;

function count(haystack: string, needle: string): number {
    return haystack.split(needle).length - 1;
}

/**
 * Checks that tags nest and close in order, that no `<` or `>` sits outside a tag,
 * and that every `&` starts one of the five predefined entities.
 */
function expectWellFormed(svg: string): void {
    const tagPattern = /<(\/?)([a-zA-Z][\w:-]*)(?:\s+[\w:-]+="[^"<>]*")*\s*(\/?)>/g;
    const open: string[] = [];
    let cursor = 0;
    let match: RegExpExecArray | null;

    while ((match = tagPattern.exec(svg)) !== null) {
        expect(svg.slice(cursor, match.index)).not.toMatch(/[<>]/);
        cursor = match.index + match[0].length;

        const [, closing, name, selfClosing] = match;
        if (closing) {
            expect(open.pop()).toBe(name);
        } else if (!selfClosing) {
            open.push(name);
        }
    }

    expect(svg.slice(cursor)).toBe('');
    expect(open).toEqual([]);
    expect(svg.replace(/&(?:amp|lt|gt|quot|apos);/g, '')).not.toContain('&');
}

describe('escapeXml', () => {
    it('escapes markup and quote characters', () => {
        expect(escapeXml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
            '&lt;a href=&quot;x&quot;&gt;Tom &amp; &apos;Jerry&apos;&lt;/a&gt;',
        );
    });
});

describe('describeCard', () => {
    it('substitutes one placeholder entry for empty lists', () => {
        const card = describeCard(makeProfile(), now);

        expect(card.recentLines).toEqual(['No recent games — 0m']);
        expect(card.badgeLines).toEqual(['Collector']);
    });

    it('keeps only the first three games and badges', () => {
        const card = describeCard(
            makeProfile({
                recentGames: ['A', 'B', 'C', 'D', 'E'].map((name, i) => ({ name, playtime2Weeks: i * 60 })),
                badgeHighlights: ['V', 'W', 'X', 'Y', 'Z'].map((name) => ({ name, level: null })),
            }),
            now,
        );

        expect(card.recentLines).toEqual(['A — 0m', 'B — 1h', 'C — 2h']);
        expect(card.badgeLines).toEqual(['V', 'W', 'X']);
    });

    it('appends last seen only while offline', () => {
        const lastlogoff = nowSeconds - 2 * 3600;

        expect(describeCard(makeProfile({ personastate: 0, lastlogoff }), now).statusText).toBe('Offline (2h ago)');
        expect(describeCard(makeProfile({ personastate: 1, lastlogoff }), now).statusText).toBe('Online');
        expect(describeCard(makeProfile({ personastate: 0 }), now).statusText).toBe('Offline');
        expect(describeCard(makeProfile({ personastate: 9, lastlogoff }), now).statusText).toBe('Unknown');
    });

    it('joins real name, flag and membership into the info line', () => {
        const card = describeCard(makeProfile({ realname: 'Ada', loccountrycode: 'se', timecreated: JAN_2012 }), now);

        expect(card.infoLine).toBe('Ada  ·  \u{1F1F8}\u{1F1EA}  ·  Member since Jan 2012');
    });

    it('leaves the info line empty when nothing is known', () => {
        expect(describeCard(makeProfile({ loccountrycode: 'XYZ' }), now).infoLine).toBe('');
    });

    it('shows the level or marks it hidden', () => {
        expect(describeCard(makeProfile({ level: 0 }), now).levelText).toBe('Level 0');
        expect(describeCard(makeProfile(), now).levelText).toBe('Level hidden');
    });

    it('falls back to the placeholder avatar', () => {
        expect(describeCard(makeProfile(), now).avatarHref).toBe(DEFAULT_AVATAR_DATA_URI);
        expect(describeCard(makeProfile({ avatarDataUri: 'data:image/png;base64,AQID' }), now).avatarHref).toBe(
            'data:image/png;base64,AQID',
        );
    });
});

describe('badgeLabel', () => {
    it('adds the level only when it is non-zero', () => {
        expect(badgeLabel({ name: 'Pillar', level: 5 })).toBe('Pillar · Lv5');
        expect(badgeLabel({ name: 'Pillar', level: 0 })).toBe('Pillar');
        expect(badgeLabel({ name: 'Pillar', level: null })).toBe('Pillar');
    });
});

describe('renderCard', () => {
    it('renders exactly one placeholder line per empty section', () => {
        const svg = renderCard(makeProfile(), now);

        expect(count(svg, '<tspan')).toBe(2);
        expect(svg).toContain('<tspan x="20" dy="0">No recent games — 0m</tspan>');
        expect(svg).toContain('<tspan x="20" dy="0">Collector</tspan>');
    });

    it('stacks follow-up lines 16px apart', () => {
        const svg = renderCard(
            makeProfile({ recentGames: [{ name: 'A', playtime2Weeks: 5 }, { name: 'B', playtime2Weeks: 65 }] }),
            now,
        );

        expect(svg).toContain('<tspan x="20" dy="0">A — 5m</tspan>\n      <tspan x="20" dy="16">B — 1h 5m</tspan>');
    });

    it('escapes user-controlled text', () => {
        const svg = renderCard(
            makeProfile({
                personaname: 'A<b>&"c"',
                realname: 'R&D',
                profileurl: 'https://steamcommunity.com/id/x?a=1&b=2',
                badgeHighlights: [{ name: '<script>', level: 2 }],
                recentGames: [{ name: 'Tom & Jerry', playtime2Weeks: 1 }],
            }),
            now,
        );

        expect(svg).toContain('fill="#F5FAFF">A&lt;b&gt;&amp;&quot;c&quot;</text>');
        expect(svg).toContain('fill="#4DA6DA">R&amp;D</text>');
        expect(svg).toContain('<a href="https://steamcommunity.com/id/x?a=1&amp;b=2"');
        expect(svg).toContain('>&lt;script&gt; · Lv2</tspan>');
        expect(svg).toContain('>Tom &amp; Jerry — 1m</tspan>');
        expect(svg).not.toContain('<b>');
        expect(svg).not.toContain('<script>');
    });

    it('renders the offline status with last seen', () => {
        const svg = renderCard(makeProfile({ personastate: 0, lastlogoff: nowSeconds - 2 * 3600 }), now);

        expect(svg).toContain('<text x="0" y="38" font-size="12" fill="#6E8BA8">Offline (2h ago)</text>');
    });

    it('stays well-formed markup for hostile text', () => {
        const svg = renderCard(
            makeProfile({
                personaname: '</text><script>alert("x")</script> & <',
                realname: "O'Brien & >>",
                profileurl: 'https://steamcommunity.com/id/x?a=1&b=<2>',
                badgeHighlights: [{ name: '&amp; <b>', level: 2 }],
                recentGames: [{ name: ']]><!-- & -->', playtime2Weeks: 61 }],
                personastate: 0,
                lastlogoff: nowSeconds - 90,
            }),
            now,
        );

        expectWellFormed(svg);
    });

    it('inlines the avatar and references nothing else but the profile link', () => {
        const svg = renderCard(makeProfile({ avatarDataUri: 'data:image/jpeg;base64,AQID' }), now);

        expect(svg).toContain('<image href="data:image/jpeg;base64,AQID"');
        expect(svg.match(/href="([^"]*)"/g)).toEqual([
            'href="data:image/jpeg;base64,AQID"',
            'href="https://steamcommunity.com/id/pixelranger/"',
        ]);
    });

    it('is a single standalone svg element', () => {
        const svg = renderCard(makeProfile(), now);

        expect(svg.startsWith('<svg width="360" height="260"')).toBe(true);
        expect(svg.endsWith('</svg>')).toBe(true);
        expect(count(svg, '<svg')).toBe(1);
    });

    it('is deterministic for the same input', () => {
        const profile = makeProfile({ personastate: 0, lastlogoff: nowSeconds - 100 });

        expect(renderCard(profile, now)).toBe(renderCard(profile, now));
    });
});
