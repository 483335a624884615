// Browser-side calls to the route handlers. No server imports here.

export type ApiResult<T> = { ok: true; data: T } | { ok: false; error: string }

const ADMIN_HEADER = 'x-admin-password'

async function parse<T>(res: Response): Promise<ApiResult<T>> {
  if (res.ok) {
    const data: T = await res.json()
    return { ok: true, data }
  }
  let body: unknown = null
  try {
    body = await res.json()
  } catch {
    body = null // non-JSON error page
  }
  const error =
    body && typeof body === 'object' && 'error' in body && typeof body.error === 'string'
      ? body.error
      : `Request failed (${res.status})`
  return { ok: false, error }
}

export async function getJson<T>(url: string): Promise<ApiResult<T>> {
  try {
    return await parse<T>(await fetch(url, { cache: 'no-store' }))
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : 'Network error' }
  }
}

export async function postJson<T>(url: string, body: unknown, adminPassword?: string): Promise<ApiResult<T>> {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' }
  if (adminPassword) headers[ADMIN_HEADER] = adminPassword
  try {
    return await parse<T>(await fetch(url, { method: 'POST', headers, body: JSON.stringify(body) }))
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : 'Network error' }
  }
}
