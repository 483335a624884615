import { NextResponse } from 'next/server'
import { getServices } from '@/lib/services'
import { aggregateCareers } from '@/lib/history'
import { errorResponse } from '@/lib/api'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

export async function GET() {
  try {
    const records = await getServices().pool.getHistory()
    return NextResponse.json({ records: [...records].reverse(), careers: aggregateCareers(records) })
  } catch (e) {
    return errorResponse('api/history', e)
  }
}
