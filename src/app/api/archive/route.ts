import { NextResponse } from 'next/server'
import type { NextRequest } from 'next/server'
import { getServices } from '@/lib/services'
import { fetchLeaderboard } from '@/lib/espn'
import { errorResponse, requireAdmin } from '@/lib/api'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

export async function POST(request: NextRequest) {
  try {
    const services = getServices()
    requireAdmin(request, services)
    const settings = await services.pool.getTournament()
    const { players } = await fetchLeaderboard(settings, services.config.feedTimeoutMs)
    const record = await services.pool.archive(players, new Date().getFullYear())
    return NextResponse.json({ success: true, record })
  } catch (e) {
    return errorResponse('api/archive', e)
  }
}
