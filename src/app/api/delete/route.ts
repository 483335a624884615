import { NextResponse } from 'next/server'
import type { NextRequest } from 'next/server'
import { getServices } from '@/lib/services'
import { parseName } from '@/lib/validation'
import { errorResponse, readBody } from '@/lib/api'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

export async function POST(request: NextRequest) {
  try {
    const name = parseName(await readBody(request))
    await getServices().pool.deleteEntry(name)
    return NextResponse.json({ success: true })
  } catch (e) {
    return errorResponse('api/delete', e)
  }
}
