import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export interface SupabaseClientOptions {
    projectUrl: string;
    serviceKey: string;
    fetch?: typeof fetch;
}

/**
 * Create the service-role client used by the repositories.
 * The bot never signs users in, so session persistence and token refresh are off.
 */
export function createSupabaseClient({ projectUrl, serviceKey, fetch: custom_fetch }: SupabaseClientOptions): SupabaseClient {
    if (!projectUrl || !serviceKey) {
        throw new Error("Supabase Project URL/ Service Key not provided");
    }

    return createClient(projectUrl, serviceKey, {
        auth: { persistSession: false, autoRefreshToken: false, detectSessionInUrl: false },
        global: custom_fetch ? { fetch: custom_fetch } : {}
    });
}
