import {
    HenrikMatchListResponseSchema,
    HenrikMatchSchema,
    type HenrikMatch,
    type HenrikMatchPlayer,
    type HenrikTeam
} from '../models/henrik/HenrikMatchModels';
import { NewMatchDBSchema, type MatchResult, type NewMatchDB } from '../models/database/MatchDBModel';
import { TEAM_SIZE } from '../utils/constant';

/**
 * Mapper for converting HenrikDev match payloads to match_records rows
 * Every derived stat (K/D, HS%, ADR, ACS, team placement) is computed here.
 */

export interface PlayerIdentity {
    handle: string;
    tag: string;
}

export type MatchParseFailureReason = 'no_matches' | 'player_missing' | 'invalid_payload';

export type MatchParseResult =
    | { success: true; match: NewMatchDB }
    | { success: false; reason: MatchParseFailureReason; message: string };

const round = (value: number, digits: number): number => {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
};

const samePlayer = (player: HenrikMatchPlayer, identity: PlayerIdentity): boolean =>
    player.name.toLowerCase() === identity.handle.toLowerCase() &&
    player.tag.toLowerCase() === identity.tag.toLowerCase();

export function calculateKdRatio(kills: number, deaths: number): number {
    return deaths > 0 ? round(kills / deaths, 2) : kills;
}

export function calculateHeadshotPercentage(headshots: number, bodyshots: number, legshots: number): number {
    const total_shots = headshots + bodyshots + legshots;
    return total_shots > 0 ? round((headshots / total_shots) * 100, 1) : 0;
}

/**
 * 1-based rank of the player by score within their own team.
 * Ties keep the order the API returned; a player that cannot be found is ranked last.
 */
export function calculateTeamPlacement(players: HenrikMatchPlayer[], identity: PlayerIdentity, team_id: string): number {
    const sorted_team = players
        .filter((player) => player.team_id === team_id)
        .sort((a, b) => b.stats.score - a.stats.score);

    const index = sorted_team.findIndex((player) => samePlayer(player, identity));
    if (index < 0) return TEAM_SIZE;
    return Math.min(index + 1, TEAM_SIZE);
}

export function determineResult(team: HenrikTeam | undefined): MatchResult {
    if (!team) return 'Defeat';
    if (team.won) return 'Victory';
    return team.rounds.won === team.rounds.lost ? 'Draw' : 'Defeat';
}

/**
 * Build the database row of one tracked player's performance, without validating it.
 * Returns null if the player is not part of the match.
 */
export function buildMatchRow(match: HenrikMatch, identity: PlayerIdentity): NewMatchDB | null {
    const player = match.players.find((candidate) => samePlayer(candidate, identity));
    if (!player) return null;

    const team = match.teams.find((candidate) => candidate.team_id === player.team_id);
    const rounds_won = team?.rounds.won ?? 0;
    const rounds_lost = team?.rounds.lost ?? 0;
    const total_rounds = Math.max(rounds_won + rounds_lost, 1);

    const { stats } = player;

    const mapped: NewMatchDB = {
        match_id: match.metadata.match_id,
        handle: identity.handle,
        tag: identity.tag,
        agent: player.agent.name,
        score: `${rounds_won}-${rounds_lost}`,
        kills: stats.kills,
        deaths: stats.deaths,
        assists: stats.assists,
        kd_ratio: calculateKdRatio(stats.kills, stats.deaths),
        damage_delta: Math.round(stats.damage.dealt - stats.damage.received),
        headshot_percentage: calculateHeadshotPercentage(stats.headshots, stats.bodyshots, stats.legshots),
        adr: round(stats.damage.dealt / total_rounds, 1),
        acs: round(stats.score / total_rounds, 1),
        team_placement: calculateTeamPlacement(match.players, identity, player.team_id),
        map_name: match.metadata.map?.name ?? 'Unknown',
        result: determineResult(team),
        started_at: match.metadata.started_at ?? null
    };

    return mapped;
}

/**
 * Parse a "latest match" response body into a row for the given player.
 * Never throws: every failure is reported as a tagged result.
 *
 * @param body - Raw JSON body returned by the API
 * @param identity - Tracked player the match was requested for
 */
export function parseLatestMatch(body: unknown, identity: PlayerIdentity): MatchParseResult {
    const envelope = HenrikMatchListResponseSchema.safeParse(body);
    if (!envelope.success) {
        return { success: false, reason: 'invalid_payload', message: `Unexpected response shape: ${envelope.error.message}` };
    }

    const [latest] = envelope.data.data;
    if (latest === undefined) {
        return { success: false, reason: 'no_matches', message: `No competitive matches for ${identity.handle}#${identity.tag}` };
    }

    const match = HenrikMatchSchema.safeParse(latest);
    if (!match.success) {
        return { success: false, reason: 'invalid_payload', message: `Unexpected match shape: ${match.error.message}` };
    }

    const row = buildMatchRow(match.data, identity);
    if (!row) {
        return {
            success: false,
            reason: 'player_missing',
            message: `${identity.handle}#${identity.tag} not found in match ${match.data.metadata.match_id}`
        };
    }

    const validated = NewMatchDBSchema.safeParse(row);
    if (!validated.success) {
        return { success: false, reason: 'invalid_payload', message: `Derived stats out of range: ${validated.error.message}` };
    }

    return { success: true, match: validated.data };
}
