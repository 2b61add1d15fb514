import { describeError } from '../helper/helper';
import { mapRegistrationToDatabase, parsePlayerIdentifier } from '../mappers/PlayerMapper';
import type { MatchDB } from '../models/database/MatchDBModel';
import type { PlayerRepository } from '../repository/playerRepository';
import type { MatchRepository } from '../repository/matchRepository';
import { MATCH_HISTORY_LIMIT, type HenrikRegion } from '../utils/constant';

export type CommandOutcome = 'success' | 'duplicate' | 'not_found' | 'invalid' | 'error';

export interface CommandReply {
    outcome: CommandOutcome;
    content: string;
}

export interface TrackerCommandService {
    addPlayer(owner_id: string, identifier: string, region?: HenrikRegion | null): Promise<CommandReply>;
    removePlayer(owner_id: string, identifier: string): Promise<CommandReply>;
    listPlayers(owner_id: string): Promise<CommandReply>;
    matchHistory(identifier: string): Promise<CommandReply>;
}

export interface TrackerCommandServiceOptions {
    players: PlayerRepository;
    matches: MatchRepository;
}

const GENERIC_ERROR = '❌ An error occurred while processing your request. Please try again later.';

function formatHistoryLine(match: MatchDB): string {
    return `• **${match.result}** on ${match.map_name} (${match.score}) as ${match.agent} · ` +
        `${match.kills}/${match.deaths}/${match.assists}, ACS ${match.acs}`;
}

/**
 * Registration, removal and listing of tracked players.
 * Holds no state of its own: every outcome comes from the repositories.
 */
export function createTrackerCommandService({ players, matches }: TrackerCommandServiceOptions): TrackerCommandService {
    return {
        async addPlayer(owner_id, identifier, region = null): Promise<CommandReply> {
            const parsed = parsePlayerIdentifier(identifier);
            if (!parsed.success) {
                return { outcome: 'invalid', content: `❌ ${parsed.message}` };
            }

            const { handle, tag } = parsed;
            try {
                const created = await players.upsertPlayer(mapRegistrationToDatabase({ handle, tag, owner_id, region }));
                if (!created) {
                    return {
                        outcome: 'duplicate',
                        content: `ℹ️ **${handle}#${tag}** is already being tracked.\nYou will continue to receive match notifications.`
                    };
                }

                console.log(`(OK) Added player ${handle}#${tag} for Discord user ${owner_id}`);
                return {
                    outcome: 'success',
                    content:
                        `✅ Successfully added **${handle}#${tag}** to tracking!\n` +
                        `Discord User: <@${owner_id}>\n` +
                        'You will receive notifications when new matches are detected.'
                };
            } catch (error) {
                console.error(`(ERROR) Error adding player ${handle}#${tag}: ${describeError(error)}`);
                return { outcome: 'error', content: GENERIC_ERROR };
            }
        },

        async removePlayer(owner_id, identifier): Promise<CommandReply> {
            const parsed = parsePlayerIdentifier(identifier);
            if (!parsed.success) {
                return { outcome: 'invalid', content: `❌ ${parsed.message}` };
            }

            const { handle, tag } = parsed;
            try {
                const removed = await players.removePlayer(handle, tag, owner_id);
                if (!removed) {
                    return { outcome: 'not_found', content: `❓ **${handle}#${tag}** is not tracked by you.` };
                }

                console.log(`(OK) Removed player ${handle}#${tag} for Discord user ${owner_id}`);
                return { outcome: 'success', content: `🗑️ Stopped tracking **${handle}#${tag}**.` };
            } catch (error) {
                console.error(`(ERROR) Error removing player ${handle}#${tag}: ${describeError(error)}`);
                return { outcome: 'error', content: GENERIC_ERROR };
            }
        },

        async listPlayers(owner_id): Promise<CommandReply> {
            try {
                const tracked = await players.listPlayers(owner_id);
                if (tracked.length === 0) {
                    return {
                        outcome: 'not_found',
                        content: 'You are not tracking anyone yet. Use `/tracker add` to start.'
                    };
                }

                const lines = tracked.map((player, index) => {
                    const region = player.region ? ` (${player.region})` : '';
                    return `${index + 1}. **${player.handle}#${player.tag}**${region}`;
                });
                return { outcome: 'success', content: `**Tracked players (${tracked.length})**\n${lines.join('\n')}` };
            } catch (error) {
                console.error(`(ERROR) Error listing players for ${owner_id}: ${describeError(error)}`);
                return { outcome: 'error', content: GENERIC_ERROR };
            }
        },

        async matchHistory(identifier): Promise<CommandReply> {
            const parsed = parsePlayerIdentifier(identifier);
            if (!parsed.success) {
                return { outcome: 'invalid', content: `❌ ${parsed.message}` };
            }

            const { handle, tag } = parsed;
            try {
                const recent = await matches.listRecentMatches(handle, tag, MATCH_HISTORY_LIMIT);
                if (recent.length === 0) {
                    return { outcome: 'not_found', content: `No recorded matches for **${handle}#${tag}** yet.` };
                }

                return {
                    outcome: 'success',
                    content: `**Last ${recent.length} recorded matches for ${handle}#${tag}**\n${recent.map(formatHistoryLine).join('\n')}`
                };
            } catch (error) {
                console.error(`(ERROR) Error fetching history for ${handle}#${tag}: ${describeError(error)}`);
                return { outcome: 'error', content: GENERIC_ERROR };
            }
        }
    };
}
