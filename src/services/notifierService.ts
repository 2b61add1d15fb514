import { DiscordAPIError, RESTJSONErrorCodes, type MessageCreateOptions } from 'discord.js';
import { buildMatchEmbed } from '../embeds/matchEmbed';
import { NotificationDeliveryError } from '../helper/errors';
import { describeError } from '../helper/helper';
import type { NewMatchDB } from '../models/database/MatchDBModel';

export type NotificationOutcome =
    | { delivered: true }
    | { delivered: false; error: NotificationDeliveryError };

/**
 * Lookup of DM recipients; `client.users` satisfies it.
 */
export interface DirectMessageUsers {
    fetch(user_id: string): Promise<{ send(options: MessageCreateOptions): Promise<unknown> }>;
}

export interface MatchNotifier {
    sendMatchNotification(owner_id: string, match: NewMatchDB): Promise<NotificationOutcome>;
}

function toDeliveryError(owner_id: string, error: unknown): NotificationDeliveryError {
    if (error instanceof DiscordAPIError) {
        if (error.code === RESTJSONErrorCodes.CannotSendMessagesToThisUser) {
            return new NotificationDeliveryError(owner_id, `Cannot send DM to user ${owner_id} - DMs may be disabled`, { cause: error });
        }
        if (error.code === RESTJSONErrorCodes.UnknownUser) {
            return new NotificationDeliveryError(owner_id, `Could not find Discord user with ID ${owner_id}`, { cause: error });
        }
    }
    return new NotificationDeliveryError(owner_id, `Error sending notification to user ${owner_id}: ${describeError(error)}`, { cause: error });
}

/**
 * Delivers match notifications as Discord direct messages.
 * Delivery is at-most-once: a failed DM is logged and never retried.
 *
 * @param users - The logged-in client's user manager (`client.users`)
 */
export function createDiscordNotifier(users: DirectMessageUsers): MatchNotifier {
    return {
        async sendMatchNotification(owner_id: string, match: NewMatchDB): Promise<NotificationOutcome> {
            try {
                const user = await users.fetch(owner_id);
                await user.send({ embeds: [buildMatchEmbed(match)] });
                console.log(`(OK) Sent match notification to Discord user ${owner_id}`);
                return { delivered: true };
            } catch (error) {
                const delivery_error = toDeliveryError(owner_id, error);
                console.warn(`(WARNING) ${delivery_error.message}`);
                return { delivered: false, error: delivery_error };
            }
        }
    };
}
