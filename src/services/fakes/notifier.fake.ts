import { vi } from 'vitest';
import type { MessageCreateOptions } from 'discord.js';
import { NotificationDeliveryError } from '../../helper/errors';
import type { NewMatchDB } from '../../models/database/MatchDBModel';
import type { DirectMessageUsers, MatchNotifier, NotificationOutcome } from '../notifierService';

export interface FakeDirectMessageUsers extends DirectMessageUsers {
    sent: { user_id: string; options: MessageCreateOptions }[];
}

/**
 * Stand-in for `client.users`.
 * `fetchError` makes the lookup fail, `sendError` makes the DM fail.
 */
export function aFakeDirectMessageUsers(opts: { fetchError?: unknown; sendError?: unknown } = {}): FakeDirectMessageUsers {
    const sent: FakeDirectMessageUsers['sent'] = [];

    return {
        sent,
        fetch: vi.fn(async (user_id: string) => {
            if (opts.fetchError !== undefined) throw opts.fetchError;
            return {
                send: async (options: MessageCreateOptions) => {
                    if (opts.sendError !== undefined) throw opts.sendError;
                    sent.push({ user_id, options });
                    return {};
                }
            };
        })
    };
}

export interface FakeMatchNotifier extends MatchNotifier {
    delivered: { owner_id: string; match_id: string }[];
}

/**
 * Notifier that records deliveries; owners in `unreachable` fail.
 */
export function aFakeMatchNotifier(unreachable: string[] = []): FakeMatchNotifier {
    const delivered: FakeMatchNotifier['delivered'] = [];

    return {
        delivered,
        sendMatchNotification: vi.fn(async (owner_id: string, match: NewMatchDB): Promise<NotificationOutcome> => {
            if (unreachable.includes(owner_id)) {
                return {
                    delivered: false,
                    error: new NotificationDeliveryError(owner_id, `Cannot send DM to user ${owner_id} - DMs may be disabled`)
                };
            }
            delivered.push({ owner_id, match_id: match.match_id });
            return { delivered: true };
        })
    };
}
