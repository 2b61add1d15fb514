import type { SupabaseClient } from '@supabase/supabase-js';
import { PersistenceError } from '../helper/errors';
import { MatchDBSchema, NewMatchDBSchema, type MatchDB, type NewMatchDB } from '../models/database/MatchDBModel';
import { MATCH_HISTORY_LIMIT } from '../utils/constant';
import { escapeLikePattern, toPersistenceError } from './postgrest';

export const MATCHES_TABLE = 'match_records';

export interface MatchRepository {
    tryInsertMatch(match: NewMatchDB): Promise<boolean>;
    getMatch(match_id: string): Promise<MatchDB | null>;
    listRecentMatches(handle: string, tag: string, limit?: number): Promise<MatchDB[]>;
    ping(): Promise<number>;
}

function parseMatchRows(rows: unknown): MatchDB[] {
    const parsed = MatchDBSchema.array().safeParse(rows ?? []);
    if (!parsed.success) {
        throw new PersistenceError(`Unexpected match rows: ${parsed.error.message}`, { cause: parsed.error });
    }
    return parsed.data;
}

export function createMatchRepository(supabase: SupabaseClient): MatchRepository {
    return {
        /**
         * Record a match unless its id is already stored.
         * The uniqueness check and the insert are one statement (ON CONFLICT DO NOTHING RETURNING),
         * so overlapping passes can never both see the same match as new.
         *
         * @returns true for a new match, false for one already recorded
         * @throws PersistenceError for any other storage failure
         */
        async tryInsertMatch(match: NewMatchDB): Promise<boolean> {
            const validated_match = NewMatchDBSchema.parse(match);

            const { data, error } = await supabase
                .from(MATCHES_TABLE)
                .upsert(validated_match, { onConflict: 'match_id', ignoreDuplicates: true })
                .select('match_id');

            if (error) {
                throw toPersistenceError(`inserting match ${match.match_id}`, error);
            }

            return (data?.length ?? 0) > 0;
        },

        async getMatch(match_id: string): Promise<MatchDB | null> {
            const { data, error } = await supabase
                .from(MATCHES_TABLE)
                .select('*')
                .eq('match_id', match_id)
                .limit(1);

            if (error) {
                throw toPersistenceError(`fetching match ${match_id}`, error);
            }

            const [row] = parseMatchRows(data);
            return row ?? null;
        },

        /**
         * Most recently recorded matches of one Riot ID, newest first.
         */
        async listRecentMatches(handle: string, tag: string, limit = MATCH_HISTORY_LIMIT): Promise<MatchDB[]> {
            const { data, error } = await supabase
                .from(MATCHES_TABLE)
                .select('*')
                .ilike('handle', escapeLikePattern(handle))
                .ilike('tag', escapeLikePattern(tag))
                .order('created_at', { ascending: false })
                .limit(limit);

            if (error) {
                throw toPersistenceError(`fetching matches of ${handle}#${tag}`, error);
            }

            return parseMatchRows(data);
        },

        /**
         * Count recorded matches. Used at startup to check the store is reachable.
         */
        async ping(): Promise<number> {
            const { count, error } = await supabase
                .from(MATCHES_TABLE)
                .select('match_id', { count: 'exact', head: true });

            if (error) {
                throw toPersistenceError('getting match count', error);
            }

            return count ?? 0;
        }
    };
}
