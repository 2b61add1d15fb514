import type { SupabaseClient } from '@supabase/supabase-js';
import { createSupabaseClient } from '../supabaseClient';

export interface RecordedRequest {
    method: string;
    url: URL;
    headers: Headers;
    body: unknown;
}

export type FakeResponder = (request: RecordedRequest) => Response;

export interface FakeSupabase {
    client: SupabaseClient;
    requests: RecordedRequest[];
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json', ...headers }
    });
}

export function errorResponse(message: string, status = 500): Response {
    return jsonResponse({ message, details: null, hint: null, code: 'XX000' }, status);
}

/**
 * Supabase client whose HTTP calls are answered in process by `respond`.
 * Every PostgREST request is recorded for assertions.
 */
export function createFakeSupabase(respond: FakeResponder): FakeSupabase {
    const requests: RecordedRequest[] = [];

    const fake_fetch: typeof fetch = async (input, init) => {
        const url = new URL(input instanceof Request ? input.url : input.toString());
        const raw_body = init?.body;
        const request: RecordedRequest = {
            method: init?.method ?? 'GET',
            url,
            headers: new Headers(init?.headers),
            body: typeof raw_body === 'string' ? JSON.parse(raw_body) : null
        };
        requests.push(request);
        return respond(request);
    };

    const client = createSupabaseClient({
        projectUrl: 'http://supabase.test',
        serviceKey: 'test-secret',
        fetch: fake_fetch
    });

    return { client, requests };
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const NON_FILTER_PARAMS = new Set(['select', 'order', 'limit', 'offset', 'on_conflict', 'columns']);

export interface FakeTable {
    rows: Map<string, Record<string, unknown>>;
    respond: FakeResponder;
}

/**
 * Responder backed by an in-memory table with a unique `key_column`.
 * POST stores rows whose key is new and returns only those (ON CONFLICT DO NOTHING RETURNING);
 * GET applies `eq.` filters and `limit`.
 */
export function aFakeTable(key_column: string, created_at = '2025-03-01T18:40:00+00:00'): FakeTable {
    const rows = new Map<string, Record<string, unknown>>();

    const respond: FakeResponder = ({ method, url, body }) => {
        if (method === 'POST') {
            const incoming: unknown[] = Array.isArray(body) ? body : [body];
            const inserted: Record<string, unknown>[] = [];
            for (const row of incoming) {
                if (!isRecord(row)) continue;
                const key = String(row[key_column]);
                if (rows.has(key)) continue;
                const stored = { ...row, created_at };
                rows.set(key, stored);
                inserted.push(stored);
            }
            return jsonResponse(inserted, 201);
        }

        if (method === 'GET') {
            const filters = [...url.searchParams].filter(([name]) => !NON_FILTER_PARAMS.has(name));
            const matching = [...rows.values()].filter((row) =>
                filters.every(([column, filter]) => filter === `eq.${String(row[column])}`));
            const limit = url.searchParams.get('limit');
            return jsonResponse(limit === null ? matching : matching.slice(0, Number(limit)));
        }

        return errorResponse(`Unsupported method ${method}`, 405);
    };

    return { rows, respond };
}
