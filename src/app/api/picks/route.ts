import { NextResponse } from 'next/server'
import type { NextRequest } from 'next/server'
import { getServices } from '@/lib/services'
import { parseEntryInput } from '@/lib/validation'
import { errorResponse, readBody } from '@/lib/api'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

export async function GET() {
  try {
    return NextResponse.json(await getServices().pool.getPool())
  } catch (e) {
    return errorResponse('api/picks', e)
  }
}

export async function POST(request: NextRequest) {
  try {
    const entry = parseEntryInput(await readBody(request))
    const pool = await getServices().pool.submitEntry(entry)
    return NextResponse.json({ success: true, participants: pool.participants.length }, { status: 201 })
  } catch (e) {
    return errorResponse('api/picks', e)
  }
}
