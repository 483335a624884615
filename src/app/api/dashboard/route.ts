import { NextResponse } from 'next/server'
import { getServices } from '@/lib/services'
import { buildDashboard } from '@/lib/dashboard'
import { errorResponse } from '@/lib/api'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

export async function GET() {
  try {
    return NextResponse.json(await buildDashboard(getServices()))
  } catch (e) {
    return errorResponse('api/dashboard', e)
  }
}
