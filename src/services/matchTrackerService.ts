import { AxiosInstance, isAxiosError } from 'axios';
import { retryOnRateLimit } from '../helper/helper';
import { DataSourceError } from '../helper/errors';
import { parseLatestMatch } from '../mappers/MatchMapper';
import type { NewMatchDB } from '../models/database/MatchDBModel';
import { COMPETITIVE_MODE, LATEST_MATCH_COUNT, type HenrikPlatform, type HenrikRegion } from '../utils/constant';

export type LatestMatchResult =
    | { status: 'found'; match: NewMatchDB }
    | { status: 'not_found'; reason: string };

export interface MatchSource {
    fetchLatestMatch(handle: string, tag: string, region: HenrikRegion): Promise<LatestMatchResult>;
}

/**
 * Build the v4 match-history path for a Riot ID.
 */
export function latestMatchPath(region: HenrikRegion, platform: HenrikPlatform, handle: string, tag: string): string {
    return `/valorant/v4/matches/${region}/${platform}/${encodeURIComponent(handle)}/${encodeURIComponent(tag)}`;
}

function toDataSourceError(error: unknown, player: string): DataSourceError {
    if (isAxiosError(error)) {
        const status = error.response?.status;
        if (status !== undefined) {
            return new DataSourceError(`API Error for ${player}: ${status}`, { cause: error, status });
        }
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
            return new DataSourceError(`Request timed out for ${player}`, { cause: error });
        }
        return new DataSourceError(`Request failed for ${player}: ${error.message}`, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new DataSourceError(`Error fetching latest match for ${player}: ${message}`, { cause: error });
}

/**
 * Client for the most recent competitive match of a tracked player.
 *
 * @param api - Instance from createHenrikApi()
 * @param platform - Account platform ('pc' or 'console')
 */
export function createMatchTrackerService(api: AxiosInstance, platform: HenrikPlatform): MatchSource {
    return {
        /**
         * Fetch exactly one (the latest) competitive match.
         * 404 (unknown or private account) and an empty history are "not found", not errors.
         *
         * @throws DataSourceError for any other status, a timeout, or a malformed payload
         */
        async fetchLatestMatch(handle: string, tag: string, region: HenrikRegion): Promise<LatestMatchResult> {
            const player = `${handle}#${tag}`;

            let body: unknown;
            try {
                const response = await retryOnRateLimit(() =>
                    api.get<unknown>(latestMatchPath(region, platform, handle, tag), {
                        params: { mode: COMPETITIVE_MODE, size: LATEST_MATCH_COUNT }
                    }));
                body = response.data;
            } catch (error) {
                if (isAxiosError(error) && error.response?.status === 404) {
                    return { status: 'not_found', reason: `Account ${player} not found or private` };
                }
                throw toDataSourceError(error, player);
            }

            const parsed = parseLatestMatch(body, { handle, tag });
            if (parsed.success) {
                return { status: 'found', match: parsed.match };
            }
            if (parsed.reason === 'no_matches') {
                return { status: 'not_found', reason: parsed.message };
            }
            throw new DataSourceError(parsed.message);
        }
    };
}
