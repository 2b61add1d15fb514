import axios, { AxiosInstance } from 'axios';

export interface HenrikApiOptions {
    apiKey: string;
    baseURL: string;
    timeoutMs: number;
}

/**
 * Axios instance for the HenrikDev Valorant API.
 * The API key travels in the Authorization header of every request.
 */
export function createHenrikApi({ apiKey, baseURL, timeoutMs }: HenrikApiOptions): AxiosInstance {
    if (!apiKey) {
        throw new Error('HENRIK_API_KEY is not defined in environment variables');
    }

    return axios.create({
        baseURL,
        timeout: timeoutMs,
        headers: { Authorization: apiKey, Accept: 'application/json' }
    });
}
