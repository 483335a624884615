import { NextResponse } from 'next/server'
import type { NextRequest } from 'next/server'
import { getServices } from '@/lib/services'
import { parseTournamentUpdate } from '@/lib/validation'
import { errorResponse, readBody, requireAdmin } from '@/lib/api'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

export async function GET() {
  try {
    const { pool } = getServices()
    const [settings, state] = await Promise.all([pool.getTournament(), pool.getPool()])
    return NextResponse.json({ settings, entryFee: state.entryFee })
  } catch (e) {
    return errorResponse('api/tournament', e)
  }
}

export async function POST(request: NextRequest) {
  try {
    const services = getServices()
    requireAdmin(request, services)
    const update = parseTournamentUpdate(await readBody(request), await services.pool.getTournament())
    const { settings, pool } = await services.pool.updateTournament(update)
    return NextResponse.json({ settings, entryFee: pool.entryFee })
  } catch (e) {
    return errorResponse('api/tournament', e)
  }
}
