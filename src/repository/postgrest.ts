import { PersistenceError } from '../helper/errors';

interface PostgrestErrorLike {
    message: string;
    details?: string | null;
}

export function toPersistenceError(action: string, error: PostgrestErrorLike): PersistenceError {
    const details = error.details ? ` - ${error.details}` : '';
    return new PersistenceError(`Error ${action}: ${error.message}${details}`, { cause: error });
}

/**
 * Escape LIKE wildcards so a Riot ID is matched literally (case-insensitively) by ilike.
 * PostgREST also treats '*' as a wildcard.
 */
export function escapeLikePattern(value: string): string {
    return value.replace(/[\\%_*]/g, (char) => `\\${char}`);
}
