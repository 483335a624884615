import { NextResponse } from 'next/server'
import type { NextRequest } from 'next/server'
import { getServices } from '@/lib/services'
import { errorResponse, requireAdmin } from '@/lib/api'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

// Drop cached rankings and autocomplete names; the next request refetches
export async function POST(request: NextRequest) {
  try {
    const services = getServices()
    requireAdmin(request, services)
    services.rankingCache.invalidate()
    services.playerNameCache.invalidate()
    return NextResponse.json({ success: true })
  } catch (e) {
    return errorResponse('api/refresh', e)
  }
}
