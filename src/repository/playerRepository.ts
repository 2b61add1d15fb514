import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { PersistenceError } from '../helper/errors';
import { PlayerDBSchema, type NewPlayerDB, type PlayerDB } from '../models/database/PlayerDBModel';
import { generatePlayerFingerprint } from '../utils/hash';
import { escapeLikePattern, toPersistenceError } from './postgrest';

/**
 * Repository for tracked player operations
 * Handles all Supabase interactions for the 'tracked_players' table
 */

export const PLAYERS_TABLE = 'tracked_players';

export interface PlayerRepository {
    upsertPlayer(player: NewPlayerDB): Promise<boolean>;
    removePlayer(handle: string, tag: string, owner_id: string): Promise<boolean>;
    listPlayers(owner_id: string): Promise<PlayerDB[]>;
    listAllPlayers(): Promise<PlayerDB[]>;
    listOwners(handle: string, tag: string): Promise<string[]>;
}

const OwnerRowsSchema = z.array(z.object({ owner_id: z.string() }));

function parsePlayerRows(rows: unknown): PlayerDB[] {
    const parsed = PlayerDBSchema.array().safeParse(rows ?? []);
    if (!parsed.success) {
        throw new PersistenceError(`Unexpected tracked player rows: ${parsed.error.message}`, { cause: parsed.error });
    }
    return parsed.data;
}

export function createPlayerRepository(supabase: SupabaseClient): PlayerRepository {
    return {
        /**
         * Insert a tracked player unless its fingerprint already exists.
         * ON CONFLICT DO NOTHING ... RETURNING: an empty result means the row was already there.
         *
         * @returns true if the player was newly created
         * @throws PersistenceError if the insert fails
         */
        async upsertPlayer(player: NewPlayerDB): Promise<boolean> {
            const { data, error } = await supabase
                .from(PLAYERS_TABLE)
                .upsert(player, { onConflict: 'fingerprint', ignoreDuplicates: true })
                .select('fingerprint');

            if (error) {
                console.error("(ERROR) Error upserting tracked player:", error.message, error.details);
                throw toPersistenceError('upserting tracked player', error);
            }

            return (data?.length ?? 0) > 0;
        },

        /**
         * Delete the registration of (handle, tag) owned by owner_id.
         *
         * @returns true if a row was deleted, false if the player was not tracked
         */
        async removePlayer(handle: string, tag: string, owner_id: string): Promise<boolean> {
            const fingerprint = generatePlayerFingerprint(handle, tag, owner_id);

            const { data, error } = await supabase
                .from(PLAYERS_TABLE)
                .delete()
                .eq('fingerprint', fingerprint)
                .select('fingerprint');

            if (error) {
                console.error("(ERROR) Error deleting tracked player:", error.message);
                throw toPersistenceError('deleting tracked player', error);
            }

            return (data?.length ?? 0) > 0;
        },

        /**
         * Players registered by one Discord user, oldest first.
         */
        async listPlayers(owner_id: string): Promise<PlayerDB[]> {
            const { data, error } = await supabase
                .from(PLAYERS_TABLE)
                .select('*')
                .eq('owner_id', owner_id)
                .order('created_at', { ascending: true });

            if (error) {
                console.error("(ERROR) Error fetching tracked players:", error.message);
                throw toPersistenceError('fetching tracked players', error);
            }

            return parsePlayerRows(data);
        },

        /**
         * Full roster, used by the tracker job.
         */
        async listAllPlayers(): Promise<PlayerDB[]> {
            const { data, error } = await supabase
                .from(PLAYERS_TABLE)
                .select('*')
                .order('created_at', { ascending: true });

            if (error) {
                console.error("(ERROR) Error fetching all tracked players:", error.message);
                throw toPersistenceError('fetching all tracked players', error);
            }

            return parsePlayerRows(data);
        },

        /**
         * Discord users currently tracking a Riot ID, matched case-insensitively, oldest registration first.
         */
        async listOwners(handle: string, tag: string): Promise<string[]> {
            const { data, error } = await supabase
                .from(PLAYERS_TABLE)
                .select('owner_id')
                .ilike('handle', escapeLikePattern(handle))
                .ilike('tag', escapeLikePattern(tag))
                .order('created_at', { ascending: true });

            if (error) {
                console.error("(ERROR) Error fetching owners of tracked player:", error.message);
                throw toPersistenceError(`fetching owners of ${handle}#${tag}`, error);
            }

            const parsed = OwnerRowsSchema.safeParse(data ?? []);
            if (!parsed.success) {
                throw new PersistenceError(`Unexpected owner rows: ${parsed.error.message}`, { cause: parsed.error });
            }
            return [...new Set(parsed.data.map((row) => row.owner_id))];
        }
    };
}
