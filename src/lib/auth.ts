import { createHash, timingSafeEqual } from 'node:crypto'
import { AppError } from './errors'

export const ADMIN_HEADER = 'x-admin-password'

const digest = (s: string) => createHash('sha256').update(s).digest()

/** Throws unless `supplied` matches the configured admin password. */
export function assertAdmin(configured: string | null, supplied: string | null): void {
  if (!configured) {
    throw new AppError('Admin password is not configured on the server', 'admin_disabled', 503)
  }
  // Hash first so the comparison is constant-time regardless of length
  if (!supplied || !timingSafeEqual(digest(configured), digest(supplied))) {
    throw new AppError('Incorrect admin password', 'unauthorized', 401)
  }
}
