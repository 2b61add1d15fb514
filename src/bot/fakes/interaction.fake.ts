import { vi } from 'vitest';
import type { SlashCommandInteraction } from '../commands';

export interface FakeInteractionOpts {
    commandName?: string;
    userId?: string;
    subcommand?: string;
    strings?: Record<string, string>;
    replied?: boolean;
}

export interface FakeSlashCommandInteraction extends SlashCommandInteraction {
    replies: string[];
    followUps: string[];
}

export function aFakeInteractionWith(opts: FakeInteractionOpts = {}): FakeSlashCommandInteraction {
    const strings = opts.strings ?? {};
    const replies: string[] = [];
    const followUps: string[] = [];

    function getString(name: string, required: true): string;
    function getString(name: string): string | null;
    function getString(name: string, required?: boolean): string | null {
        const value = strings[name] ?? null;
        if (value === null && required) throw new Error(`Required option "${name}" not found.`);
        return value;
    }

    return {
        commandName: opts.commandName ?? 'tracker',
        user: { id: opts.userId ?? 'discord_user_01' },
        options: {
            getSubcommand: () => opts.subcommand ?? 'list',
            getString
        },
        replied: opts.replied ?? false,
        deferred: false,
        replies,
        followUps,
        reply: vi.fn(async ({ content }: { content: string }) => {
            replies.push(content);
        }),
        followUp: vi.fn(async ({ content }: { content: string }) => {
            followUps.push(content);
        })
    };
}
