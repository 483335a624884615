import path from 'node:path'
import type { Tiebreak, TournamentSettings } from './types'

export interface AppConfig {
  tournament: TournamentSettings
  entryFee: number
  dataDir: string
  adminPassword: string | null
  tiebreak: Tiebreak
  rankingsTtlMs: number
  feedTimeoutMs: number
  supabase: { url: string; serviceKey: string } | null
}

const SIX_HOURS = 6 * 60 * 60 * 1000

function intFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback
  const n = Number.parseInt(value, 10)
  if (Number.isNaN(n) || n < 0) {
    console.warn(`[config] ignoring non-numeric value "${value}", using ${fallback}`)
    return fallback
  }
  return n
}

// Read at request time, never at build time
export function getConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const supabaseUrl = env.NEXT_PUBLIC_SUPABASE_URL
  const serviceKey = env.SUPABASE_SERVICE_KEY

  return {
    tournament: {
      name: env.TOURNAMENT_NAME || 'Genesis Invitational',
      dates: env.TOURNAMENT_DATES || 'Feb 19–22, 2026',
      course: env.TOURNAMENT_COURSE || 'Riviera Country Club',
      espnEventId: env.ESPN_EVENT_ID || '401811933',
    },
    entryFee: intFromEnv(env.ENTRY_FEE, 25),
    dataDir: path.resolve(env.DATA_DIR || 'data'),
    adminPassword: env.ADMIN_PASSWORD || null,
    tiebreak: env.STANDINGS_TIEBREAK === 'unique' ? 'unique' : 'all',
    rankingsTtlMs: intFromEnv(env.RANKINGS_TTL_MS, SIX_HOURS),
    feedTimeoutMs: intFromEnv(env.FEED_TIMEOUT_MS, 10_000),
    supabase: supabaseUrl && serviceKey ? { url: supabaseUrl, serviceKey } : null,
  }
}
