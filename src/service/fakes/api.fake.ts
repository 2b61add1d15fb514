import {
    AxiosError,
    type AxiosInstance,
    type AxiosResponse,
    type InternalAxiosRequestConfig
} from 'axios';
import { createHenrikApi } from '../api';

export type FakeReply =
    | { status: number; data?: unknown; headers?: Record<string, string> }
    | { networkError: string };

export interface FakeHenrikApi {
    api: AxiosInstance;
    requests: InternalAxiosRequestConfig[];
}

/**
 * HenrikDev API instance whose requests never leave the process.
 * `replies` are consumed in order; the last one is repeated once the list runs out.
 */
export function createFakeHenrikApi(...replies: FakeReply[]): FakeHenrikApi {
    const requests: InternalAxiosRequestConfig[] = [];
    const api = createHenrikApi({ apiKey: 'test-secret', baseURL: 'https://henrik.test', timeoutMs: 1_000 });

    api.defaults.adapter = async (config) => {
        requests.push(config);
        const reply = replies[Math.min(requests.length, replies.length) - 1];
        if (!reply) throw new Error('No fake reply configured');

        if ('networkError' in reply) {
            throw new AxiosError(`fake ${reply.networkError}`, reply.networkError, config);
        }

        const response: AxiosResponse = {
            data: reply.data ?? null,
            status: reply.status,
            statusText: String(reply.status),
            headers: reply.headers ?? {},
            config,
            request: {}
        };

        const validate = config.validateStatus;
        if (validate && !validate(reply.status)) {
            const code = reply.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST;
            throw new AxiosError(`Request failed with status code ${reply.status}`, code, config, null, response);
        }
        return response;
    };

    return { api, requests };
}
