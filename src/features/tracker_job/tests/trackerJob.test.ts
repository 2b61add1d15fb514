import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { groupTrackedAccounts, runTrackerPass, type TrackerContext } from '../trackerJob';
import { InMemoryMatchRepository, InMemoryPlayerRepository } from '../../../repository/fakes/inMemoryRepositories';
import { aFakeMatchSource, type FakeMatchSource } from '../../../services/fakes/matchSource.fake';
import { aFakeMatchNotifier, type FakeMatchNotifier } from '../../../services/fakes/notifier.fake';
import { mapRegistrationToDatabase, type PlayerRegistration } from '../../../mappers/PlayerMapper';
import { DataSourceError, PersistenceError } from '../../../helper/errors';
import type { LatestMatchResult } from '../../../services/matchTrackerService';
import { aFakeNewMatchDB, aFakePlayerDB } from '../../../models/fakes/data';

describe('groupTrackedAccounts', () => {
    it('checks each Riot ID once regardless of case', () => {
        const players = [
            aFakePlayerDB({ handle: 'Foo', tag: '123', owner_id: 'u1', region: 'eu' }),
            aFakePlayerDB({ handle: 'FOO', tag: '123', owner_id: 'u2', region: 'kr' }),
            aFakePlayerDB({ handle: 'Bar', tag: '456', owner_id: 'u1' })
        ];

        expect(groupTrackedAccounts(players, 'na')).toEqual([
            { handle: 'Foo', tag: '123', region: 'eu' },
            { handle: 'Bar', tag: '456', region: 'na' }
        ]);
    });

    it('falls back to the default region for an unknown one', () => {
        const [account] = groupTrackedAccounts([aFakePlayerDB({ region: 'moon' })], 'ap');
        expect(account.region).toBe('ap');
    });
});

describe('runTrackerPass', () => {
    let players: InMemoryPlayerRepository;
    let matches: InMemoryMatchRepository;
    let source: FakeMatchSource;
    let notifier: FakeMatchNotifier;

    const register = (registration: PlayerRegistration): Promise<boolean> =>
        players.upsertPlayer(mapRegistrationToDatabase(registration));

    const contextWith = (opts: Partial<TrackerContext> = {}): TrackerContext => ({
        players,
        matches,
        source,
        notifier,
        defaultRegion: 'na',
        requestDelayMs: 0,
        ...opts
    });

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        players = new InMemoryPlayerRepository();
        matches = new InMemoryMatchRepository();
        source = aFakeMatchSource();
        notifier = aFakeMatchNotifier();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('records a new match and notifies the owner exactly once', async () => {
        await register({ handle: 'Foo', tag: '123', owner_id: 'u1' });
        source.replies.set('foo#123', { status: 'found', match: aFakeNewMatchDB() });

        const first = await runTrackerPass(contextWith());

        expect(first).toMatchObject({
            status: 'COMPLETED',
            accounts_checked: 1,
            new_matches: 1,
            notifications_sent: 1,
            notifications_failed: 0,
            errors: []
        });
        expect(matches.rows.get('M1')).toMatchObject({
            kills: 20,
            deaths: 10,
            assists: 5,
            kd_ratio: 2,
            score: '13-11',
            result: 'Victory'
        });
        expect(notifier.delivered).toEqual([{ owner_id: 'u1', match_id: 'M1' }]);

        const second = await runTrackerPass(contextWith());

        expect(second).toMatchObject({ status: 'COMPLETED', accounts_checked: 1, new_matches: 0, notifications_sent: 0 });
        expect(notifier.delivered).toHaveLength(1);
    });

    it('requests the account in its registered region', async () => {
        await register({ handle: 'Foo', tag: '123', owner_id: 'u1', region: 'eu' });

        await runTrackerPass(contextWith());

        expect(source.fetchLatestMatch).toHaveBeenCalledWith('Foo', '123', 'eu');
    });

    it('fetches a shared account once and notifies every owner', async () => {
        await register({ handle: 'Foo', tag: '123', owner_id: 'u1' });
        await register({ handle: 'foo', tag: '123', owner_id: 'u2' });
        source.replies.set('foo#123', { status: 'found', match: aFakeNewMatchDB() });

        const result = await runTrackerPass(contextWith());

        expect(source.fetchLatestMatch).toHaveBeenCalledTimes(1);
        expect(result.notifications_sent).toBe(2);
        expect(notifier.delivered).toEqual([
            { owner_id: 'u1', match_id: 'M1' },
            { owner_id: 'u2', match_id: 'M1' }
        ]);
    });

    it('notifies the owners registered when the match is recorded', async () => {
        await register({ handle: 'Foo', tag: '123', owner_id: 'u1' });
        await register({ handle: 'Foo', tag: '123', owner_id: 'u2' });
        const fetchLatestMatch = vi.fn(async (): Promise<LatestMatchResult> => {
            await players.removePlayer('Foo', '123', 'u2');
            await register({ handle: 'FOO', tag: '123', owner_id: 'u3' });
            return { status: 'found', match: aFakeNewMatchDB() };
        });

        const result = await runTrackerPass(contextWith({ source: { fetchLatestMatch } }));

        expect(result.notifications_sent).toBe(2);
        expect(notifier.delivered).toEqual([
            { owner_id: 'u1', match_id: 'M1' },
            { owner_id: 'u3', match_id: 'M1' }
        ]);
    });

    it('does not notify anyone when the owner lookup fails', async () => {
        await register({ handle: 'Foo', tag: '123', owner_id: 'u1' });
        source.replies.set('foo#123', { status: 'found', match: aFakeNewMatchDB() });
        vi.spyOn(players, 'listOwners').mockRejectedValue(new PersistenceError('Error fetching owners of Foo#123: down'));

        const result = await runTrackerPass(contextWith());

        expect(result).toMatchObject({ new_matches: 1, notifications_sent: 0, errors: ['Error fetching owners of Foo#123: down'] });
        expect(notifier.delivered).toEqual([]);
    });

    it('skips accounts without a match', async () => {
        await register({ handle: 'Foo', tag: '123', owner_id: 'u1' });

        const result = await runTrackerPass(contextWith());

        expect(result).toMatchObject({ accounts_checked: 1, new_matches: 0, errors: [] });
        expect(matches.rows.size).toBe(0);
    });

    it('moves on to the next account when the data source fails', async () => {
        await register({ handle: 'A', tag: '1', owner_id: 'u1' });
        await register({ handle: 'B', tag: '2', owner_id: 'u1' });
        source.replies.set('a#1', new DataSourceError('API Error for A#1: 500', { status: 500 }));
        source.replies.set('b#2', { status: 'found', match: aFakeNewMatchDB({ match_id: 'M2', handle: 'B', tag: '2' }) });

        const result = await runTrackerPass(contextWith());

        expect(result).toMatchObject({
            status: 'COMPLETED',
            accounts_checked: 2,
            new_matches: 1,
            notifications_sent: 1,
            errors: ['API Error for A#1: 500']
        });
        expect(notifier.delivered).toEqual([{ owner_id: 'u1', match_id: 'M2' }]);
    });

    it('does not notify when the match cannot be recorded', async () => {
        await register({ handle: 'Foo', tag: '123', owner_id: 'u1' });
        source.replies.set('foo#123', { status: 'found', match: aFakeNewMatchDB() });
        matches.failingMatchIds.add('M1');

        const result = await runTrackerPass(contextWith());

        expect(result).toMatchObject({ new_matches: 0, notifications_sent: 0, errors: ['Error inserting match M1: connection refused'] });
        expect(notifier.delivered).toEqual([]);
    });

    it('keeps going when a notification fails', async () => {
        notifier = aFakeMatchNotifier(['u1']);
        await register({ handle: 'Foo', tag: '123', owner_id: 'u1' });
        await register({ handle: 'Foo', tag: '123', owner_id: 'u2' });
        await register({ handle: 'Bar', tag: '456', owner_id: 'u3' });
        source.replies.set('foo#123', { status: 'found', match: aFakeNewMatchDB() });
        source.replies.set('bar#456', { status: 'found', match: aFakeNewMatchDB({ match_id: 'M2', handle: 'Bar', tag: '456' }) });

        const result = await runTrackerPass(contextWith());

        expect(result).toMatchObject({
            status: 'COMPLETED',
            new_matches: 2,
            notifications_sent: 2,
            notifications_failed: 1,
            errors: ['Cannot send DM to user u1 - DMs may be disabled']
        });
        expect(notifier.delivered).toEqual([
            { owner_id: 'u2', match_id: 'M1' },
            { owner_id: 'u3', match_id: 'M2' }
        ]);
    });

    it('aborts when the roster cannot be loaded', async () => {
        players.failNextList = new PersistenceError('Error fetching all tracked players: down');

        const result = await runTrackerPass(contextWith(), 'tick-7');

        expect(result).toMatchObject({
            job_id: 'tick-7',
            status: 'ABORTED',
            accounts_checked: 0,
            errors: ['Error fetching all tracked players: down']
        });
        expect(source.fetchLatestMatch).not.toHaveBeenCalled();
    });

    it('waits between accounts but not before the first', async () => {
        vi.useFakeTimers();
        await register({ handle: 'A', tag: '1', owner_id: 'u1' });
        await register({ handle: 'B', tag: '2', owner_id: 'u1' });

        const pending = runTrackerPass(contextWith({ requestDelayMs: 2_100 }));
        await vi.advanceTimersByTimeAsync(2_099);
        expect(source.fetchLatestMatch).toHaveBeenCalledTimes(1);

        await vi.advanceTimersByTimeAsync(1);
        const result = await pending;

        expect(source.fetchLatestMatch).toHaveBeenCalledTimes(2);
        expect(result.accounts_checked).toBe(2);
    });
});
