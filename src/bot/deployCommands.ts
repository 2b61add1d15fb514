import { REST, Routes } from 'discord.js';
import { loadConfigFromDotenv } from '../config';
import { describeError } from '../helper/helper';
import { getCommands } from './commands';
import type { TrackerCommandService } from '../services/trackerCommandService';

/**
 * Register the slash commands globally for the application.
 * Usage: npm run deploy-commands
 */

// Command definitions do not touch the service; deployment only needs their JSON.
const unusedService: TrackerCommandService = {
    addPlayer: () => Promise.reject(new Error('not available during deployment')),
    removePlayer: () => Promise.reject(new Error('not available during deployment')),
    listPlayers: () => Promise.reject(new Error('not available during deployment')),
    matchHistory: () => Promise.reject(new Error('not available during deployment'))
};

async function deployCommands(): Promise<void> {
    const config = loadConfigFromDotenv();
    if (!config.DISCORD_APP_ID) {
        throw new Error('DISCORD_APP_ID is required to deploy commands');
    }

    const commands = getCommands(unusedService, () => 0);
    const body = [...commands.values()].map(({ data }) => data.toJSON());

    console.log(`(INFO) Started refreshing ${body.length} application (/) commands.`);

    const rest = new REST().setToken(config.DISCORD_BOT_TOKEN);
    await rest.put(Routes.applicationCommands(config.DISCORD_APP_ID), { body });

    console.log(`(OK) Successfully reloaded ${body.length} application (/) commands.`);
}

deployCommands().catch((error: unknown) => {
    console.error(`(ERROR) Failed to deploy commands: ${describeError(error)}`);
    process.exit(1);
});
