import { beforeEach, describe, it, expect, vi } from 'vitest';
import { handleInteraction } from '../discordBot';
import type { BaseCommand, SlashCommandInteraction } from '../commands';
import { aFakeInteractionWith } from '../fakes/interaction.fake';

const COMMAND_ERROR_REPLY = '❌ Something went wrong while running that command. Please try again later.';

function aFakeCommand(name: string, execute: (interaction: SlashCommandInteraction) => Promise<void>): BaseCommand {
    return {
        data: { name, toJSON: () => ({ name, description: `${name} command` }) },
        execute: vi.fn(execute)
    };
}

describe('handleInteraction', () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    it('runs the matching command', async () => {
        const command = aFakeCommand('tracker', async (interaction) => {
            await interaction.reply({ content: 'done' });
        });
        const interaction = aFakeInteractionWith({ commandName: 'tracker' });

        await handleInteraction(new Map([['tracker', command]]), interaction);

        expect(command.execute).toHaveBeenCalledWith(interaction);
        expect(interaction.replies).toEqual(['done']);
    });

    it('ignores an unknown command', async () => {
        const interaction = aFakeInteractionWith({ commandName: 'dance' });

        await handleInteraction(new Map(), interaction);

        expect(interaction.replies).toEqual([]);
        expect(console.warn).toHaveBeenCalledWith('(WARNING) No command matching dance was found.');
    });

    it('replies with a generic error when the command fails', async () => {
        const command = aFakeCommand('tracker', async () => {
            throw new Error('boom');
        });
        const interaction = aFakeInteractionWith({ commandName: 'tracker' });

        await handleInteraction(new Map([['tracker', command]]), interaction);

        expect(interaction.replies).toEqual([COMMAND_ERROR_REPLY]);
        expect(console.error).toHaveBeenCalledWith('(ERROR) Error executing /tracker: boom');
    });

    it('follows up when the command already replied', async () => {
        const command = aFakeCommand('tracker', async () => {
            throw new Error('boom');
        });
        const interaction = aFakeInteractionWith({ commandName: 'tracker', replied: true });

        await handleInteraction(new Map([['tracker', command]]), interaction);

        expect(interaction.followUps).toEqual([COMMAND_ERROR_REPLY]);
        expect(interaction.replies).toEqual([]);
    });
});
