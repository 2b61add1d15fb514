import { z } from 'zod';

/**
 * HenrikDev Valorant API models
 * GET /valorant/v4/matches/{region}/{platform}/{name}/{tag}
 * Only the fields the tracker reads are declared; everything else is stripped.
 */

// --- PLAYER SCHEMA ---
const DamageSchema = z.object({
    dealt: z.number(),
    received: z.number()
});

const PlayerStatsSchema = z.object({
    score: z.number(),
    kills: z.number().int(),
    deaths: z.number().int(),
    assists: z.number().int(),
    headshots: z.number().int(),
    bodyshots: z.number().int(),
    legshots: z.number().int(),
    damage: DamageSchema
});

const MatchPlayerSchema = z.object({
    puuid: z.string().optional(),
    name: z.string(),
    tag: z.string(),
    team_id: z.string(),
    agent: z.object({ name: z.string() }),
    stats: PlayerStatsSchema
});

export type HenrikMatchPlayer = z.infer<typeof MatchPlayerSchema>;

// --- TEAM SCHEMA ---
const TeamSchema = z.object({
    team_id: z.string(),
    rounds: z.object({
        won: z.number().int(),
        lost: z.number().int()
    }),
    won: z.boolean().nullable().optional()
});

export type HenrikTeam = z.infer<typeof TeamSchema>;

// --- METADATA SCHEMA ---
const MetadataSchema = z.object({
    match_id: z.string().min(1),
    map: z.object({ name: z.string() }).nullable().optional(),
    started_at: z.string().nullable().optional()
});

// --- FULL MATCH SCHEMA ---
export const HenrikMatchSchema = z.object({
    metadata: MetadataSchema,
    players: z.array(MatchPlayerSchema),
    teams: z.array(TeamSchema)
});

export type HenrikMatch = z.infer<typeof HenrikMatchSchema>;

// --- RESPONSE ENVELOPE ---
// `data` is validated match-by-match so that an empty history is told apart from a malformed one.
export const HenrikMatchListResponseSchema = z.object({
    status: z.number().optional(),
    data: z.array(z.unknown())
});
