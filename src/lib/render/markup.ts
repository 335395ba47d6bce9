/**
 * Escape text for an XML text node or a double/single-quoted attribute value.
 */
export const escapeXml = (s: string): string =>
    s
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');

/**
 * Base64 data URI for an inline SVG document.
 */
export const svgDataUri = (svg: string): string =>
    `data:image/svg+xml;base64,${Buffer.from(svg, 'utf8').toString('base64')}`;
