import { Client, Events, GatewayIntentBits } from 'discord.js';
import { describeError } from '../helper/helper';
import type { BaseCommand, SlashCommandInteraction } from './commands';

const COMMAND_ERROR_REPLY = '❌ Something went wrong while running that command. Please try again later.';

export function createDiscordClient(): Client {
    // Slash commands and outgoing DMs need no privileged intents.
    return new Client({ intents: [GatewayIntentBits.Guilds] });
}

/**
 * Route a slash command to its handler.
 * A failing command gets a generic reply so the user is never left without an answer.
 */
export async function handleInteraction(commands: ReadonlyMap<string, BaseCommand>, interaction: SlashCommandInteraction): Promise<void> {
    const command = commands.get(interaction.commandName);
    if (!command) {
        console.warn(`(WARNING) No command matching ${interaction.commandName} was found.`);
        return;
    }

    try {
        await command.execute(interaction);
    } catch (error) {
        console.error(`(ERROR) Error executing /${interaction.commandName}: ${describeError(error)}`);
        try {
            if (interaction.replied || interaction.deferred) {
                await interaction.followUp({ content: COMMAND_ERROR_REPLY });
            } else {
                await interaction.reply({ content: COMMAND_ERROR_REPLY });
            }
        } catch (reply_error) {
            console.error(`(ERROR) Could not report the failure to the user: ${describeError(reply_error)}`);
        }
    }
}

export function registerCommandHandlers(client: Client, commands: ReadonlyMap<string, BaseCommand>): void {
    client.on(Events.InteractionCreate, (interaction) => {
        if (!interaction.isChatInputCommand()) return;
        void handleInteraction(commands, interaction);
    });
}
