import { NewPlayerDBSchema, type NewPlayerDB } from '../models/database/PlayerDBModel';
import { generatePlayerFingerprint } from '../utils/hash';
import type { HenrikRegion } from '../utils/constant';

/**
 * Mapper for converting registration requests to tracked_players rows
 */

export interface PlayerRegistration {
    handle: string;
    tag: string;
    owner_id: string;
    region?: HenrikRegion | null;
}

export type PlayerIdentifierParseResult =
    | { success: true; handle: string; tag: string }
    | { success: false; message: string };

/**
 * Parse a Riot ID typed by a user ("Name#TAG").
 * Splits on the first '#'; surrounding whitespace is dropped.
 */
export function parsePlayerIdentifier(input: string): PlayerIdentifierParseResult {
    const separator_index = input.indexOf('#');
    if (separator_index < 0) {
        return { success: false, message: 'Invalid format. Please use: `username#tag` (e.g., `AGreenFruit#PEPE`)' };
    }

    const handle = input.slice(0, separator_index).trim();
    const tag = input.slice(separator_index + 1).trim();

    if (!handle || !tag) {
        return { success: false, message: 'Both username and tag are required.' };
    }

    return { success: true, handle, tag };
}

/**
 * Map a registration to its database row, deriving the uniqueness fingerprint.
 *
 * @throws ZodError if validation fails
 */
export function mapRegistrationToDatabase(registration: PlayerRegistration): NewPlayerDB {
    const handle = registration.handle.trim();
    const tag = registration.tag.trim();

    const mapped = {
        fingerprint: generatePlayerFingerprint(handle, tag, registration.owner_id),
        handle,
        tag,
        owner_id: registration.owner_id,
        region: registration.region ?? null
    };

    return NewPlayerDBSchema.parse(mapped);
}
