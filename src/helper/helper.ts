import { isAxiosError } from 'axios';
import { MAX_RATE_LIMIT_WAIT, RATE_LIMIT_DEFAULT_WAIT } from '../utils/constant';

// --- HELPER: Utilities ---
export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// --- HELPER: API Call with Retry Logic ---
/**
 * Retry a request rejected with 429, waiting as long as its Retry-After header asks.
 * A wait longer than `maxWaitSeconds` is not taken: the 429 is rethrown at once.
 */
export async function retryOnRateLimit<T>(apiCall: () => Promise<T>, maxRetries = 3, maxWaitSeconds = MAX_RATE_LIMIT_WAIT): Promise<T> {
    for (let attempt = 1; attempt <= maxRetries; attempt++) {
        try {
            return await apiCall();
        } catch (error) {
            if (isAxiosError(error) && error.response?.status === 429 && attempt < maxRetries) {
                const retryAfter = parseInt(String(error.response.headers['retry-after'] ?? RATE_LIMIT_DEFAULT_WAIT), 10);
                const wait_seconds = isNaN(retryAfter) ? RATE_LIMIT_DEFAULT_WAIT : retryAfter;
                if (wait_seconds > maxWaitSeconds) {
                    console.warn(`(WARNING) Rate limited for ${wait_seconds}s, more than the ${maxWaitSeconds}s allowed. Giving up.`);
                    throw error;
                }
                console.warn(`(WARNING) Rate limited! Waiting ${wait_seconds}s... (Attempt ${attempt}/${maxRetries})`);
                await sleep(wait_seconds * 1000);
            } else {
                throw error;
            }
        }
    }
    throw new Error("API call failed after retries");
}

// --- HELPER: Error formatting ---
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
