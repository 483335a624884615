import { NextResponse } from 'next/server'
import type { NextRequest } from 'next/server'
import type { Services } from './services'
import { AppError, getErrorMessage } from './errors'
import { ADMIN_HEADER, assertAdmin } from './auth'

export async function readBody(request: NextRequest): Promise<unknown> {
  try {
    return await request.json()
  } catch {
    throw new AppError('Invalid request body', 'invalid_input', 400)
  }
}

export function requireAdmin(request: NextRequest, services: Services): void {
  assertAdmin(services.config.adminPassword, request.headers.get(ADMIN_HEADER))
}

export function errorResponse(tag: string, error: unknown): NextResponse {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) console.error(`[${tag}]`, error.message)
    return NextResponse.json({ error: error.message, code: error.code }, { status: error.statusCode })
  }
  console.error(`[${tag}] unexpected error:`, error)
  return NextResponse.json({ error: getErrorMessage(error) }, { status: 500 })
}
