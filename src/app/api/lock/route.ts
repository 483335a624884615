import { NextResponse } from 'next/server'
import type { NextRequest } from 'next/server'
import { getServices } from '@/lib/services'
import { parseLocked } from '@/lib/validation'
import { errorResponse, readBody, requireAdmin } from '@/lib/api'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

export async function POST(request: NextRequest) {
  try {
    const services = getServices()
    requireAdmin(request, services)
    const pool = await services.pool.setLocked(parseLocked(await readBody(request)))
    return NextResponse.json({ success: true, locked: pool.locked })
  } catch (e) {
    return errorResponse('api/lock', e)
  }
}
