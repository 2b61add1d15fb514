import type { MatchResult } from '../models/database/MatchDBModel';

export const EmbedColors = {
    VICTORY: 0x28a745,
    DEFEAT: 0xed4245,
    DRAW: 0x808080,
} as const;

export function colorForResult(result: MatchResult): number {
    switch (result) {
        case 'Victory':
            return EmbedColors.VICTORY;
        case 'Defeat':
            return EmbedColors.DEFEAT;
        case 'Draw':
            return EmbedColors.DRAW;
    }
}
