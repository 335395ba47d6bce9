export { SteamApiClient, fetchTransport, isTimeoutError } from './http.js';
export type { HttpTransport, TransportRequest, SteamApiClientOptions, QueryParams } from './http.js';
export { SteamProfileFetcher, STEAM_PATHS } from './profile-fetcher.js';
export { fetchAvatarData, normalizeContentType, guessImageType, FALLBACK_IMAGE_TYPE } from './avatar.js';
