import { NextResponse } from 'next/server'
import { getServices } from '@/lib/services'
import { fetchLeaderboard, fetchPlayerNames } from '@/lib/espn'
import { errorResponse } from '@/lib/api'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

// Autocomplete: the live field once the event has one, otherwise recent ESPN names
export async function GET() {
  try {
    const { pool, config, playerNameCache } = getServices()
    const { players } = await fetchLeaderboard(await pool.getTournament(), config.feedTimeoutMs)
    if (players.length) {
      return NextResponse.json({ source: 'leaderboard', names: players.map((p) => p.name) })
    }
    const names = await playerNameCache.getOrLoad(() => fetchPlayerNames(config.feedTimeoutMs))
    return NextResponse.json({ source: 'espn', names })
  } catch (e) {
    return errorResponse('api/players', e)
  }
}
