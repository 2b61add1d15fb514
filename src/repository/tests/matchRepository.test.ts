import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { createMatchRepository } from '../matchRepository';
import { aFakeTable, createFakeSupabase, errorResponse, jsonResponse } from '../../database/fakes/supabase.fake';
import { PersistenceError } from '../../helper/errors';
import { aFakeNewMatchDB } from '../../models/fakes/data';

describe('MatchRepository', () => {
    describe('tryInsertMatch', () => {
        it('inserts with ON CONFLICT DO NOTHING on the match id', async () => {
            const { client, requests } = createFakeSupabase(() => jsonResponse([{ match_id: 'M1' }], 201));

            await expect(createMatchRepository(client).tryInsertMatch(aFakeNewMatchDB())).resolves.toBe(true);

            const [request] = requests;
            expect(request.url.pathname).toBe('/rest/v1/match_records');
            expect(request.url.searchParams.get('on_conflict')).toBe('match_id');
            expect(request.headers.get('Prefer')).toContain('resolution=ignore-duplicates');
            expect(request.body).toEqual(aFakeNewMatchDB());
        });

        it('reads back an inserted match with identical values', async () => {
            const table = aFakeTable('match_id');
            const repository = createMatchRepository(createFakeSupabase(table.respond).client);
            const match = aFakeNewMatchDB({
                match_id: 'M9',
                score: '11-13',
                kills: 10,
                deaths: 15,
                assists: 7,
                kd_ratio: 0.67,
                damage_delta: -215,
                headshot_percentage: 33.3,
                adr: 142.6,
                acs: 187.4,
                team_placement: 4,
                result: 'Defeat',
                started_at: null
            });

            await expect(repository.tryInsertMatch(match)).resolves.toBe(true);
            await expect(repository.tryInsertMatch(match)).resolves.toBe(false);

            await expect(repository.getMatch('M9')).resolves.toEqual({ ...match, created_at: '2025-03-01T18:40:00+00:00' });
            expect(table.rows.size).toBe(1);
        });

        it('validates the row before writing', async () => {
            const { client, requests } = createFakeSupabase(() => jsonResponse([], 201));

            await expect(createMatchRepository(client).tryInsertMatch(aFakeNewMatchDB({ headshot_percentage: 120 })))
                .rejects.toBeInstanceOf(ZodError);
            expect(requests).toHaveLength(0);
        });

        it('wraps storage failures', async () => {
            const { client } = createFakeSupabase(() => errorResponse('connection refused'));

            await expect(createMatchRepository(client).tryInsertMatch(aFakeNewMatchDB()))
                .rejects.toThrow(new PersistenceError('Error inserting match M1: connection refused'));
        });
    });

    describe('getMatch', () => {
        it('returns the stored row', async () => {
            const row = { ...aFakeNewMatchDB(), created_at: '2025-03-01T18:40:00+00:00' };
            const { client, requests } = createFakeSupabase(() => jsonResponse([row]));

            await expect(createMatchRepository(client).getMatch('M1')).resolves.toEqual(row);
            expect(requests[0].url.searchParams.get('match_id')).toBe('eq.M1');
        });

        it('accepts numeric columns serialised as strings', async () => {
            const row = { ...aFakeNewMatchDB(), kd_ratio: '2.00', acs: '208.3', created_at: '2025-03-01T18:40:00+00:00' };
            const { client } = createFakeSupabase(() => jsonResponse([row]));

            const match = await createMatchRepository(client).getMatch('M1');
            expect(match?.kd_ratio).toBe(2);
            expect(match?.acs).toBe(208.3);
        });

        it('returns null for an unknown match', async () => {
            const { client } = createFakeSupabase(() => jsonResponse([]));

            await expect(createMatchRepository(client).getMatch('nope')).resolves.toBeNull();
        });
    });

    describe('listRecentMatches', () => {
        it('matches the Riot ID case-insensitively, newest first', async () => {
            const { client, requests } = createFakeSupabase(() => jsonResponse([]));

            await createMatchRepository(client).listRecentMatches('Foo_Bar', '123', 3);

            const params = requests[0].url.searchParams;
            expect(params.get('handle')).toBe('ilike.Foo\\_Bar');
            expect(params.get('tag')).toBe('ilike.123');
            expect(params.get('order')).toBe('created_at.desc');
            expect(params.get('limit')).toBe('3');
        });
    });

    describe('ping', () => {
        it('returns the exact row count', async () => {
            const { client, requests } = createFakeSupabase(() =>
                new Response(null, { status: 200, headers: { 'Content-Range': '*/42' } }));

            await expect(createMatchRepository(client).ping()).resolves.toBe(42);
            expect(requests[0].method).toBe('HEAD');
            expect(requests[0].headers.get('Prefer')).toContain('count=exact');
        });

        it('wraps storage failures', async () => {
            const { client } = createFakeSupabase(() => errorResponse('no route to host', 503));

            await expect(createMatchRepository(client).ping()).rejects.toBeInstanceOf(PersistenceError);
        });
    });
});
