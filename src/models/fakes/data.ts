import type { HenrikMatch, HenrikMatchPlayer, HenrikTeam } from '../henrik/HenrikMatchModels';
import type { NewMatchDB } from '../database/MatchDBModel';
import type { PlayerDB } from '../database/PlayerDBModel';
import { generatePlayerFingerprint } from '../../utils/hash';

export function aFakeHenrikPlayer(opts: Partial<HenrikMatchPlayer> = {}): HenrikMatchPlayer {
    const defaultOpts: HenrikMatchPlayer = {
        puuid: 'puuid-foo',
        name: 'Foo',
        tag: '123',
        team_id: 'Red',
        agent: { name: 'Jett' },
        stats: {
            score: 5000,
            kills: 20,
            deaths: 10,
            assists: 5,
            headshots: 15,
            bodyshots: 40,
            legshots: 5,
            damage: { dealt: 3600, received: 2900 }
        }
    };

    return {
        ...defaultOpts,
        ...opts
    };
}

const teammate = (name: string, team_id: string, score: number): HenrikMatchPlayer =>
    aFakeHenrikPlayer({
        puuid: `puuid-${name.toLowerCase()}`,
        name,
        tag: 'EUW',
        team_id,
        agent: { name: 'Sova' },
        stats: {
            score,
            kills: 10,
            deaths: 10,
            assists: 3,
            headshots: 5,
            bodyshots: 20,
            legshots: 0,
            damage: { dealt: 2000, received: 2000 }
        }
    });

export function aFakeHenrikTeams(red: Partial<HenrikTeam> = {}): HenrikTeam[] {
    return [
        { team_id: 'Red', rounds: { won: 13, lost: 11 }, won: true, ...red },
        { team_id: 'Blue', rounds: { won: 11, lost: 13 }, won: false }
    ];
}

/**
 * A 5v5 competitive match on Ascent won 13-11 by Red.
 * Foo#123 plays for Red and ranks second on the team by score.
 */
export function aFakeHenrikMatch(opts: Partial<HenrikMatch> = {}): HenrikMatch {
    const defaultOpts: HenrikMatch = {
        metadata: {
            match_id: 'M1',
            map: { name: 'Ascent' },
            started_at: '2025-03-01T18:00:00.000Z'
        },
        players: [
            teammate('Alpha', 'Red', 6000),
            aFakeHenrikPlayer(),
            teammate('Bravo', 'Red', 4000),
            teammate('Charlie', 'Red', 3000),
            teammate('Delta', 'Red', 2000),
            teammate('Echo', 'Blue', 5500),
            teammate('Foxtrot', 'Blue', 4500),
            teammate('Golf', 'Blue', 3500),
            teammate('Hotel', 'Blue', 2500),
            teammate('India', 'Blue', 1500)
        ],
        teams: aFakeHenrikTeams()
    };

    return {
        ...defaultOpts,
        ...opts
    };
}

export function aFakeMatchListResponse(matches: unknown[] = [aFakeHenrikMatch()]): { status: number; data: unknown[] } {
    return { status: 200, data: matches };
}

/**
 * Row produced for Foo#123 from aFakeHenrikMatch().
 */
export function aFakeNewMatchDB(opts: Partial<NewMatchDB> = {}): NewMatchDB {
    const defaultOpts: NewMatchDB = {
        match_id: 'M1',
        handle: 'Foo',
        tag: '123',
        agent: 'Jett',
        score: '13-11',
        kills: 20,
        deaths: 10,
        assists: 5,
        kd_ratio: 2,
        damage_delta: 700,
        headshot_percentage: 25,
        adr: 150,
        acs: 208.3,
        team_placement: 2,
        map_name: 'Ascent',
        result: 'Victory',
        started_at: '2025-03-01T18:00:00.000Z'
    };

    return {
        ...defaultOpts,
        ...opts
    };
}

export function aFakePlayerDB(opts: Partial<Omit<PlayerDB, 'fingerprint'>> = {}): PlayerDB {
    const handle = opts.handle ?? 'Foo';
    const tag = opts.tag ?? '123';
    const owner_id = opts.owner_id ?? 'discord_user_01';

    return {
        handle,
        tag,
        owner_id,
        region: opts.region ?? null,
        created_at: opts.created_at ?? '2025-01-01T00:00:00.000Z',
        fingerprint: generatePlayerFingerprint(handle, tag, owner_id)
    };
}
