import { z } from 'zod';

/**
 * Database model for tracked_players table
 * Snake_case naming to match PostgreSQL conventions
 */
export const NewPlayerDBSchema = z.object({
    fingerprint: z.string().length(16),
    handle: z.string().min(1),
    tag: z.string().min(1),
    owner_id: z.string().min(1),   // Discord user snowflake, kept as text
    region: z.string().nullable()  // null = use HENRIK_REGION
});

export type NewPlayerDB = z.infer<typeof NewPlayerDBSchema>;

export const PlayerDBSchema = NewPlayerDBSchema.extend({
    created_at: z.string()
});

export type PlayerDB = z.infer<typeof PlayerDBSchema>;
