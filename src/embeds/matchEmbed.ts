import { EmbedBuilder } from 'discord.js';
import type { NewMatchDB } from '../models/database/MatchDBModel';
import { TEAM_SIZE } from '../utils/constant';
import { colorForResult } from './colors';

const EMPTY_FIELD = '\u200b';

export function formatSigned(value: number): string {
    return value >= 0 ? `+${value}` : `${value}`;
}

/**
 * Direct-message embed announcing a newly recorded match.
 * Fields are laid out three per row.
 */
export function buildMatchEmbed(match: NewMatchDB): EmbedBuilder {
    return new EmbedBuilder()
        .setTitle('🎮 New Match Detected!')
        .setDescription(`**${match.handle}#${match.tag}** just finished a match!`)
        .setColor(colorForResult(match.result))
        .addFields(
            { name: 'Agent', value: match.agent, inline: true },
            { name: 'Map', value: match.map_name || 'Unknown', inline: true },
            { name: 'Result', value: match.result, inline: true },

            { name: 'Score', value: match.score, inline: true },
            { name: 'K/D/A', value: `${match.kills}/${match.deaths}/${match.assists}`, inline: true },
            { name: 'K/D Ratio', value: `${match.kd_ratio}`, inline: true },

            { name: 'ACS', value: `${match.acs}`, inline: true },
            { name: 'ADR', value: `${match.adr}`, inline: true },
            { name: 'HS%', value: `${match.headshot_percentage}%`, inline: true },

            { name: 'Damage Δ', value: formatSigned(match.damage_delta), inline: true },
            { name: 'Team Rank', value: `#${match.team_placement}/${TEAM_SIZE}`, inline: true },
            { name: EMPTY_FIELD, value: EMPTY_FIELD, inline: true }
        )
        .setFooter({ text: `Match ID: ${match.match_id}` });
}
