export { renderCard, describeCard, badgeLabel, gameLine, CARD_WIDTH, CARD_HEIGHT } from './card.js';
export type { CardText } from './card.js';
export { DEFAULT_AVATAR_DATA_URI } from './avatar-placeholder.js';
export { escapeXml, svgDataUri } from './markup.js';
