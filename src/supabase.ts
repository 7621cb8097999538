import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import type { AppConfig } from './config.js';

const debug = process.env.SUPABASE_DEBUG === '1' || process.env.NODE_ENV !== 'production';

/**
 * Service-role client for recipe lookups and session rows.
 * Throws when credentials are missing; callers that can run without Supabase should not call this.
 */
export function createSupabaseClient(config: AppConfig['supabase']): SupabaseClient {
    if (debug) {
        console.log('[Supabase] SUPABASE_URL exists:', !!config.url);
        console.log('[Supabase] SUPABASE_SERVICE_ROLE_KEY exists:', !!config.serviceRoleKey);
    }

    if (!config.url) {
        throw new Error('[Supabase] Missing SUPABASE_URL');
    }
    if (!config.serviceRoleKey) {
        throw new Error('[Supabase] Missing SUPABASE_SERVICE_ROLE_KEY');
    }

    return createClient(config.url, config.serviceRoleKey, {
        auth: {
            persistSession: false,
        },
    });
}
