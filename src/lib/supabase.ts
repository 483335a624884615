import { createClient as createSupabaseClient } from '@supabase/supabase-js'

// Server-side only: the service key bypasses row level security
export function createClient(url: string, serviceKey: string, fetchImpl?: typeof fetch) {
  return createSupabaseClient(url, serviceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    global: fetchImpl ? { fetch: fetchImpl } : {},
  })
}

export type ServerSupabase = ReturnType<typeof createClient>
