export type HenrikRegion = 'eu' | 'na' | 'latam' | 'br' | 'ap' | 'kr';
export type HenrikPlatform = 'pc' | 'console';
export const HENRIK_REGIONS: readonly HenrikRegion[] = ['eu', 'na', 'latam', 'br', 'ap', 'kr'];
export const HENRIK_PLATFORMS: readonly HenrikPlatform[] = ['pc', 'console'];
export const COMPETITIVE_MODE = 'competitive';
export const LATEST_MATCH_COUNT = 1; // only the most recent match is ever requested
export const MATCH_HISTORY_LIMIT = 5;
export const TEAM_SIZE = 5;
export const RATE_LIMIT_DEFAULT_WAIT = 10; // in seconds, when a 429 carries no Retry-After
export const MAX_RATE_LIMIT_WAIT = 60; // in seconds; a longer Retry-After fails the request instead
export const MAX_TIMER_DELAY_MS = 2_147_483_647; // setInterval/setTimeout limit (2^31 - 1)
