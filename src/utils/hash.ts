import { createHash } from 'crypto';

/**
 * Generate a SHA-256 hex digest of an identifier, truncated to `length` characters.
 */
export function generateHash(identifier: string, length = 16): string {
    return createHash('sha256').update(identifier, 'utf8').digest('hex').slice(0, length);
}

/**
 * Uniqueness key of a tracked player registration.
 * Riot IDs are case-insensitive, so handle and tag are normalised before hashing.
 */
export function generatePlayerFingerprint(handle: string, tag: string, owner_id: string): string {
    const identifier = `${handle.trim().toLowerCase()}#${tag.trim().toLowerCase()}:${owner_id}`;
    return generateHash(identifier);
}
