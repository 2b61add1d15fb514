import { SlashCommandBuilder, type RESTPostAPIChatInputApplicationCommandsJSONBody } from 'discord.js';
import type { TrackerCommandService } from '../services/trackerCommandService';
import { HENRIK_REGIONS, type HenrikRegion } from '../utils/constant';

/**
 * The part of a ChatInputCommandInteraction the commands use.
 */
export interface SlashCommandInteraction {
    readonly commandName: string;
    readonly user: { readonly id: string };
    readonly options: {
        getSubcommand(): string;
        getString(name: string, required: true): string;
        getString(name: string): string | null;
    };
    readonly replied: boolean;
    readonly deferred: boolean;
    reply(options: { content: string }): Promise<unknown>;
    followUp(options: { content: string }): Promise<unknown>;
}

export interface BaseCommand {
    readonly data: { readonly name: string; toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody };
    execute(interaction: SlashCommandInteraction): Promise<void>;
}

const REGION_CHOICES = HENRIK_REGIONS.map((region) => ({ name: region.toUpperCase(), value: region }));

const parseRegion = (value: string | null): HenrikRegion | null =>
    HENRIK_REGIONS.find((region) => region === value) ?? null;

export class PingCommand implements BaseCommand {
    readonly data = new SlashCommandBuilder().setName('ping').setDescription('Check that the bot is responsive');

    constructor(private readonly getLatency: () => number) {}

    async execute(interaction: SlashCommandInteraction): Promise<void> {
        await interaction.reply({ content: `🏓 Pong! Latency: ${Math.round(this.getLatency())}ms` });
    }
}

export class TrackerCommand implements BaseCommand {
    readonly data = new SlashCommandBuilder()
        .setName('tracker')
        .setDescription('Get a DM whenever a Valorant player finishes a competitive match')
        .addSubcommand((subcommand) =>
            subcommand
                .setName('add')
                .setDescription('Start tracking a player')
                .addStringOption((option) =>
                    option.setName('player').setDescription('Riot ID, e.g. AGreenFruit#PEPE').setRequired(true))
                .addStringOption((option) =>
                    option.setName('region').setDescription('Account region (defaults to the bot region)').addChoices(...REGION_CHOICES)))
        .addSubcommand((subcommand) =>
            subcommand
                .setName('remove')
                .setDescription('Stop tracking a player')
                .addStringOption((option) =>
                    option.setName('player').setDescription('Riot ID, e.g. AGreenFruit#PEPE').setRequired(true)))
        .addSubcommand((subcommand) =>
            subcommand.setName('list').setDescription('List the players you track'))
        .addSubcommand((subcommand) =>
            subcommand
                .setName('history')
                .setDescription('Show the last recorded matches of a player')
                .addStringOption((option) =>
                    option.setName('player').setDescription('Riot ID, e.g. AGreenFruit#PEPE').setRequired(true)));

    constructor(private readonly service: TrackerCommandService) {}

    async execute(interaction: SlashCommandInteraction): Promise<void> {
        const owner_id = interaction.user.id;
        const subcommand = interaction.options.getSubcommand();

        switch (subcommand) {
            case 'add': {
                const player = interaction.options.getString('player', true);
                const region = parseRegion(interaction.options.getString('region'));
                const reply = await this.service.addPlayer(owner_id, player, region);
                await interaction.reply({ content: reply.content });
                return;
            }
            case 'remove': {
                const reply = await this.service.removePlayer(owner_id, interaction.options.getString('player', true));
                await interaction.reply({ content: reply.content });
                return;
            }
            case 'list': {
                const reply = await this.service.listPlayers(owner_id);
                await interaction.reply({ content: reply.content });
                return;
            }
            case 'history': {
                const reply = await this.service.matchHistory(interaction.options.getString('player', true));
                await interaction.reply({ content: reply.content });
                return;
            }
            default:
                await interaction.reply({
                    content: `❌ Unknown action: \`${subcommand}\`\nAvailable actions: \`add\`, \`remove\`, \`list\`, \`history\``
                });
        }
    }
}

export function getCommands(service: TrackerCommandService, getLatency: () => number): Map<string, BaseCommand> {
    const commands: BaseCommand[] = [new TrackerCommand(service), new PingCommand(getLatency)];
    return new Map(commands.map((command) => [command.data.name, command]));
}
