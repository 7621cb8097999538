import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import { DataAccessError } from './errors.js';
import { createTimeoutSignal, TtlCache } from './resilience.js';

// ============================================================================
// TYPES
// ============================================================================

/** Per-session storage of the detected ingredient names. */
export interface IngredientSessionStore {
    read(sessionId: string): Promise<string[]>;
    write(sessionId: string, ingredients: readonly string[]): Promise<void>;
}

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{8,128}$/;

export const isValidSessionId = (value: unknown): value is string =>
    typeof value === 'string' && SESSION_ID_PATTERN.test(value);

// ============================================================================
// MEMORY STORE
// ============================================================================

/**
 * Process-local store. Entries expire `ttlMs` after their last write, which stands in for the
 * session lifetime.
 */
export class MemoryIngredientSessionStore implements IngredientSessionStore {
    private readonly cache = new TtlCache<string, string[]>();

    constructor(private readonly ttlMs: number) {}

    async read(sessionId: string): Promise<string[]> {
        return [...(this.cache.get(sessionId) ?? [])];
    }

    async write(sessionId: string, ingredients: readonly string[]): Promise<void> {
        this.cache.set(sessionId, [...ingredients], this.ttlMs);
    }

    /** Live sessions, counting expired ones not yet swept. */
    get size(): number {
        return this.cache.size;
    }
}

// ============================================================================
// SUPABASE STORE
// ============================================================================

const SessionRowSchema = z.object({
    ingredients: z.array(z.string()).nullable(),
});

export class SupabaseIngredientSessionStore implements IngredientSessionStore {
    constructor(
        private readonly client: SupabaseClient,
        private readonly timeoutMs: number,
    ) {}

    async read(sessionId: string): Promise<string[]> {
        const { signal, cleanup } = createTimeoutSignal(this.timeoutMs);
        try {
            const { data, error } = await this.client
                .from('ingredient_sessions')
                .select('ingredients')
                .eq('session_id', sessionId)
                .abortSignal(signal)
                .maybeSingle();

            if (error) {
                throw new DataAccessError('session_read', 'Session read failed', error);
            }
            if (!data) return [];

            const row = SessionRowSchema.safeParse(data);
            if (!row.success) {
                throw new DataAccessError('session_read', 'Malformed session row', row.error);
            }
            return row.data.ingredients ?? [];
        } finally {
            cleanup();
        }
    }

    async write(sessionId: string, ingredients: readonly string[]): Promise<void> {
        const { signal, cleanup } = createTimeoutSignal(this.timeoutMs);
        try {
            const { error } = await this.client
                .from('ingredient_sessions')
                .upsert(
                    {
                        session_id: sessionId,
                        ingredients: [...ingredients],
                        updated_at: new Date().toISOString(),
                    },
                    { onConflict: 'session_id' },
                )
                .abortSignal(signal);

            if (error) {
                throw new DataAccessError('session_write', 'Session write failed', error);
            }
        } finally {
            cleanup();
        }
    }
}
