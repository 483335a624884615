import type { Rankings } from './types'
import { TtlCache } from './cache'

export const OWGR_URL = 'https://apiweb.owgr.com/api/owgr/rankings/getRankings?pageSize=300&pageNumber=1'

interface OwgrResponse {
  rankingsList?: { rank?: number; player?: { fullName?: string } }[]
}

export function parseRankings(data: OwgrResponse): Rankings {
  const rankings: Rankings = {}
  for (const r of data.rankingsList || []) {
    const name = r.player?.fullName
    if (!name || typeof r.rank !== 'number') continue
    rankings[name.toLowerCase()] = r.rank
  }
  return rankings
}

/** Official World Golf Rankings as lowercase name -> rank. Empty on failure. */
export async function fetchRankings(timeoutMs = 10_000): Promise<Rankings> {
  try {
    const res = await fetch(OWGR_URL, {
      headers: { 'User-Agent': 'Mozilla/5.0', Accept: 'application/json' },
      signal: AbortSignal.timeout(timeoutMs),
    })
    if (!res.ok) throw new Error(`OWGR responded ${res.status}`)
    const data: OwgrResponse = await res.json()
    const rankings = parseRankings(data)
    console.log(`[owgr] cached ${Object.keys(rankings).length} rankings`)
    return rankings
  } catch (e) {
    console.error('[owgr] could not fetch rankings:', e)
    return {}
  }
}

export function createRankingCache(ttlMs: number): TtlCache<Rankings> {
  return new TtlCache<Rankings>({
    ttlMs,
    isEmpty: (r) => Object.keys(r).length === 0,
  })
}
