import { z } from 'zod';

export const MATCH_RESULTS = ['Victory', 'Defeat', 'Draw'] as const;
export const MatchResultSchema = z.enum(MATCH_RESULTS);
export type MatchResult = z.infer<typeof MatchResultSchema>;

// PostgREST serialises numeric columns as JSON numbers, but accept numeric strings as well.
const NumericSchema = z.union([z.number(), z.string().regex(/^-?\d+(\.\d+)?$/).transform(Number)]);

/**
 * Database model for match_records table
 * One row per upstream match id; `handle`/`tag` are the tracked player's as registered.
 */
export const NewMatchDBSchema = z.object({
    match_id: z.string().min(1),
    handle: z.string(),
    tag: z.string(),
    agent: z.string(),
    score: z.string(),
    kills: z.number().int().nonnegative(),
    deaths: z.number().int().nonnegative(),
    assists: z.number().int().nonnegative(),
    kd_ratio: NumericSchema,
    damage_delta: z.number().int(),
    headshot_percentage: NumericSchema.pipe(z.number().min(0).max(100)),
    adr: NumericSchema,
    acs: NumericSchema,
    team_placement: z.number().int().min(1).max(5),
    map_name: z.string(),
    result: MatchResultSchema,
    started_at: z.string().nullable()
});

export type NewMatchDB = z.infer<typeof NewMatchDBSchema>;

export const MatchDBSchema = NewMatchDBSchema.extend({
    created_at: z.string()
});

export type MatchDB = z.infer<typeof MatchDBSchema>;
