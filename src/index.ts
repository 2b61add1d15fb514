import { Events, type Client } from 'discord.js';
import { loadConfigFromDotenv, type Config } from './config';
import { createSupabaseClient } from './database/supabaseClient';
import { createPlayerRepository } from './repository/playerRepository';
import { createMatchRepository } from './repository/matchRepository';
import { createHenrikApi } from './service/api';
import { createMatchTrackerService } from './services/matchTrackerService';
import { createDiscordNotifier } from './services/notifierService';
import { createTrackerCommandService } from './services/trackerCommandService';
import { runTrackerPass, type TrackerContext } from './features/tracker_job/trackerJob';
import { IntervalScheduler } from './features/scheduler/intervalScheduler';
import { createDiscordClient, registerCommandHandlers } from './bot/discordBot';
import { getCommands } from './bot/commands';
import { describeError } from './helper/helper';
import { closeFileLogging, setupFileLogging } from './utils/logger';

// --- CLI ARGUMENTS PARSING ---
/**
 * CLI Usage: node dist/index.js [MODE]
 *
 * Examples:
 *   node dist/index.js           (same as "serve")
 *   node dist/index.js serve
 *   node dist/index.js once
 *
 * Arguments:
 *   MODE: "serve" - log in, answer commands and run the tracker on an interval
 *         "once"  - log in, run a single tracker pass, print the summary and exit
 */
type RunMode = 'serve' | 'once';

function parseMode(args: string[]): RunMode {
    const mode_arg = (args[0] ?? 'serve').toLowerCase();
    if (mode_arg === 'serve' || mode_arg === 'once') return mode_arg;
    throw new Error(`Invalid mode: "${mode_arg}". Usage: node dist/index.js [serve|once]`);
}

function buildTrackerContext(config: Config, client: Client): TrackerContext {
    const supabase = createSupabaseClient({
        projectUrl: config.SUPABASE_PROJECT_URL,
        serviceKey: config.SUPABASE_SERVICE_KEY
    });
    const henrik_api = createHenrikApi({
        apiKey: config.HENRIK_API_KEY,
        baseURL: config.HENRIK_BASE_URL,
        timeoutMs: config.HENRIK_TIMEOUT_MS
    });

    return {
        players: createPlayerRepository(supabase),
        matches: createMatchRepository(supabase),
        source: createMatchTrackerService(henrik_api, config.HENRIK_PLATFORM),
        notifier: createDiscordNotifier(client.users),
        defaultRegion: config.HENRIK_REGION,
        requestDelayMs: config.REQUEST_DELAY_MS
    };
}

function waitForReady(client: Client): Promise<void> {
    return new Promise((resolve) => {
        client.once(Events.ClientReady, (ready_client) => {
            console.log(`(OK) ${ready_client.user.tag} has connected to Discord!`);
            console.log(`(INFO) Bot is in ${ready_client.guilds.cache.size} guilds`);
            resolve();
        });
    });
}

/**
 * Startup: every failure here is fatal and happens before any scheduling.
 */
async function main(): Promise<void> {
    const mode = parseMode(process.argv.slice(2));
    const config = loadConfigFromDotenv();
    const log_file = setupFileLogging(config.LOG_DIR);

    console.log(`(INFO) Configuration:`);
    console.log(`  - Mode: ${mode}`);
    console.log(`  - Region: ${config.HENRIK_REGION} (${config.HENRIK_PLATFORM})`);
    console.log(`  - Interval: ${config.TRACKER_INTERVAL_MINUTES} minute(s)`);
    console.log(`  - Log file: ${log_file}`);

    const client = createDiscordClient();
    const context = buildTrackerContext(config, client);

    const recorded_matches = await context.matches.ping();
    console.log(`(OK) Database reachable - ${recorded_matches} matches recorded`);

    const ready = waitForReady(client);
    await client.login(config.DISCORD_BOT_TOKEN);
    await ready;

    if (mode === 'once') {
        const result = await runTrackerPass(context);
        console.log(`(INFO) Tracker job result: ${JSON.stringify(result)}`);
        await client.destroy();
        await closeFileLogging();
        return;
    }

    const service = createTrackerCommandService({ players: context.players, matches: context.matches });
    registerCommandHandlers(client, getCommands(service, () => client.ws.ping));

    const scheduler = new IntervalScheduler({
        name: 'Valorant Match Tracker',
        intervalMs: config.TRACKER_INTERVAL_MINUTES * 60_000,
        task: () => runTrackerPass(context)
    });

    let shutting_down = false;
    const shutdown = async (signal: string): Promise<void> => {
        if (shutting_down) return;
        shutting_down = true;
        console.log(`(INFO) Received ${signal}, shutting down...`);
        await scheduler.stop();
        await client.destroy();
        await closeFileLogging();
        process.exit(0);
    };

    process.once('SIGINT', () => void shutdown('SIGINT'));
    process.once('SIGTERM', () => void shutdown('SIGTERM'));

    await scheduler.start();
}

main().catch((error: unknown) => {
    console.error(`(ERROR) Fatal error during startup: ${describeError(error)}`);
    process.exit(1);
});
