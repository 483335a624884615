import { NextResponse } from 'next/server'
import { getServices } from '@/lib/services'
import { fetchLeaderboard } from '@/lib/espn'
import { errorResponse } from '@/lib/api'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

export async function GET() {
  try {
    const { pool, config } = getServices()
    const settings = await pool.getTournament()
    return NextResponse.json(await fetchLeaderboard(settings, config.feedTimeoutMs))
  } catch (e) {
    return errorResponse('api/leaderboard', e)
  }
}
