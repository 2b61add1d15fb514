import { DataSourceError, PersistenceError } from '../../helper/errors';
import { describeError, sleep } from '../../helper/helper';
import type { PlayerDB } from '../../models/database/PlayerDBModel';
import type { PlayerRepository } from '../../repository/playerRepository';
import type { MatchRepository } from '../../repository/matchRepository';
import type { MatchSource } from '../../services/matchTrackerService';
import type { MatchNotifier } from '../../services/notifierService';
import { HENRIK_REGIONS, type HenrikRegion } from '../../utils/constant';

/**
 * Everything a tracker pass needs, built once at startup and passed to every pass.
 */
export interface TrackerContext {
    players: PlayerRepository;
    matches: MatchRepository;
    source: MatchSource;
    notifier: MatchNotifier;
    defaultRegion: HenrikRegion;
    requestDelayMs: number;
}

export type TrackerJobStatus = 'COMPLETED' | 'ABORTED';

export interface TrackerJobResult {
    job_id: string;
    status: TrackerJobStatus;
    duration_ms: number;
    accounts_checked: number;
    new_matches: number;
    notifications_sent: number;
    notifications_failed: number;
    errors: string[];
}

/**
 * One Riot ID to check, however many users track it.
 */
export interface TrackedAccount {
    handle: string;
    tag: string;
    region: HenrikRegion;
}

function resolveRegion(region: string | null, fallback: HenrikRegion): HenrikRegion {
    return HENRIK_REGIONS.find((candidate) => candidate === region) ?? fallback;
}

/**
 * Group registrations by case-insensitive Riot ID so each account is fetched once per pass.
 * The first registration decides the handle casing and region used for the request.
 */
export function groupTrackedAccounts(players: PlayerDB[], default_region: HenrikRegion): TrackedAccount[] {
    const accounts = new Map<string, TrackedAccount>();

    for (const player of players) {
        const key = `${player.handle.toLowerCase()}#${player.tag.toLowerCase()}`;
        if (accounts.has(key)) continue;
        accounts.set(key, {
            handle: player.handle,
            tag: player.tag,
            region: resolveRegion(player.region, default_region)
        });
    }

    return [...accounts.values()];
}

/**
 * Run one full pass over the tracked roster.
 * Fetches the latest competitive match of every account, records it if it is new and notifies
 * the owners. Never throws: failures are logged, counted and the pass moves on.
 *
 * @param context - Repositories, data source and notifier
 * @param job_id - Label used in logs and in the returned summary
 * @returns Summary of the pass
 */
export async function runTrackerPass(context: TrackerContext, job_id = 'tracker_job'): Promise<TrackerJobResult> {
    const started_at = Date.now();
    const result: TrackerJobResult = {
        job_id,
        status: 'COMPLETED',
        duration_ms: 0,
        accounts_checked: 0,
        new_matches: 0,
        notifications_sent: 0,
        notifications_failed: 0,
        errors: []
    };

    const finish = (): TrackerJobResult => {
        result.duration_ms = Date.now() - started_at;
        return result;
    };

    console.log(`(INFO) Executing job ${job_id}`);

    // --- STEP 1: LOAD ROSTER ---
    let players: PlayerDB[];
    try {
        players = await context.players.listAllPlayers();
    } catch (error) {
        // Store unreachable: the next tick retries the whole pass from scratch.
        result.status = 'ABORTED';
        result.errors.push(describeError(error));
        console.error(`(ERROR) Could not load tracked players, aborting pass: ${describeError(error)}`);
        return finish();
    }

    const accounts = groupTrackedAccounts(players, context.defaultRegion);
    console.log(`(INFO) Checking ${accounts.length} accounts (${players.length} registrations)...`);

    // --- STEP 2: CHECK EACH ACCOUNT ---
    for (let i = 0; i < accounts.length; i++) {
        const account = accounts[i];
        const player = `${account.handle}#${account.tag}`;

        if (i > 0 && context.requestDelayMs > 0) await sleep(context.requestDelayMs);

        result.accounts_checked++;
        console.log(`[Account ${i + 1}/${accounts.length}] Checking ${player}...`);

        try {
            const latest = await context.source.fetchLatestMatch(account.handle, account.tag, account.region);
            if (latest.status === 'not_found') {
                console.log(`... No match: ${latest.reason}`);
                continue;
            }

            const inserted = await context.matches.tryInsertMatch(latest.match);
            if (!inserted) {
                console.log(`... Match ${latest.match.match_id} already recorded`);
                continue;
            }

            result.new_matches++;
            console.log(`(OK) New match recorded for ${player}: ${latest.match.match_id}`);

            // Owners as of the insert, not as of the roster snapshot.
            const owner_ids = await context.players.listOwners(account.handle, account.tag);
            for (const owner_id of owner_ids) {
                const outcome = await context.notifier.sendMatchNotification(owner_id, latest.match);
                if (outcome.delivered) {
                    result.notifications_sent++;
                } else {
                    result.notifications_failed++;
                    result.errors.push(outcome.error.message);
                }
            }
        } catch (error) {
            result.errors.push(describeError(error));
            if (error instanceof DataSourceError) {
                console.warn(`(WARNING) Skipping ${player}: ${error.message}`);
            } else if (error instanceof PersistenceError) {
                console.error(`(ERROR) Could not record match for ${player}: ${error.message}`);
            } else {
                console.error(`(ERROR) Unexpected error while checking ${player}:`, describeError(error));
            }
        }
    }

    const summary = finish();
    console.log(
        `(OK) Job ${job_id} completed in ${summary.duration_ms}ms: ` +
        `${summary.new_matches} new matches, ${summary.notifications_sent} notifications sent, ` +
        `${summary.errors.length} errors`
    );
    return summary;
}
