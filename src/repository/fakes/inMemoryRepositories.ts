import { PersistenceError } from '../../helper/errors';
import { MatchDBSchema, type MatchDB, type NewMatchDB } from '../../models/database/MatchDBModel';
import type { NewPlayerDB, PlayerDB } from '../../models/database/PlayerDBModel';
import { generatePlayerFingerprint } from '../../utils/hash';
import type { MatchRepository } from '../matchRepository';
import type { PlayerRepository } from '../playerRepository';

/**
 * In-process stand-ins for the Supabase repositories.
 * Uniqueness is enforced on the same keys as the real tables.
 */

export class InMemoryPlayerRepository implements PlayerRepository {
    readonly rows = new Map<string, PlayerDB>();
    failNextList: Error | null = null;
    private clock = 0;

    async upsertPlayer(player: NewPlayerDB): Promise<boolean> {
        if (this.rows.has(player.fingerprint)) return false;
        this.clock++;
        this.rows.set(player.fingerprint, { ...player, created_at: new Date(Date.UTC(2025, 0, 1, 0, 0, this.clock)).toISOString() });
        return true;
    }

    async removePlayer(handle: string, tag: string, owner_id: string): Promise<boolean> {
        return this.rows.delete(generatePlayerFingerprint(handle, tag, owner_id));
    }

    async listPlayers(owner_id: string): Promise<PlayerDB[]> {
        return [...this.rows.values()].filter((row) => row.owner_id === owner_id);
    }

    async listOwners(handle: string, tag: string): Promise<string[]> {
        const owners = [...this.rows.values()]
            .filter((row) => row.handle.toLowerCase() === handle.toLowerCase() && row.tag.toLowerCase() === tag.toLowerCase())
            .map((row) => row.owner_id);
        return [...new Set(owners)];
    }

    async listAllPlayers(): Promise<PlayerDB[]> {
        if (this.failNextList) {
            const error = this.failNextList;
            this.failNextList = null;
            throw error;
        }
        return [...this.rows.values()];
    }
}

export class InMemoryMatchRepository implements MatchRepository {
    readonly rows = new Map<string, MatchDB>();
    readonly failingMatchIds = new Set<string>();

    async tryInsertMatch(match: NewMatchDB): Promise<boolean> {
        if (this.failingMatchIds.has(match.match_id)) {
            throw new PersistenceError(`Error inserting match ${match.match_id}: connection refused`);
        }
        if (this.rows.has(match.match_id)) return false;
        this.rows.set(match.match_id, MatchDBSchema.parse({ ...match, created_at: new Date(0).toISOString() }));
        return true;
    }

    async getMatch(match_id: string): Promise<MatchDB | null> {
        return this.rows.get(match_id) ?? null;
    }

    async listRecentMatches(handle: string, tag: string, limit = 5): Promise<MatchDB[]> {
        return [...this.rows.values()]
            .filter((row) => row.handle.toLowerCase() === handle.toLowerCase() && row.tag.toLowerCase() === tag.toLowerCase())
            .reverse()
            .slice(0, limit);
    }

    async ping(): Promise<number> {
        return this.rows.size;
    }
}
