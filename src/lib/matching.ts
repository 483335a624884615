import type { LeaderboardEntry, Rankings } from './types'
import { NOT_FOUND } from './types'

export function normalizeName(name: string): string {
  return name.toLowerCase().trim()
}

function surname(normalized: string): string {
  const parts = normalized.split(/\s+/)
  return parts[parts.length - 1]
}

/**
 * Find the candidate a free-text pick refers to.
 * Tries exact full name, then exact surname, then containment either way.
 * Within each pass the first candidate in feed order wins.
 */
export function matchName<T>(
  pick: string,
  candidates: readonly T[],
  nameOf: (c: T) => string
): T | undefined {
  const key = normalizeName(pick)
  if (!key || !candidates.length) return undefined

  const names = candidates.map((c) => normalizeName(nameOf(c)))

  const exact = names.indexOf(key)
  if (exact >= 0) return candidates[exact]

  const bySurname = names.findIndex((n) => n !== '' && surname(n) === key)
  if (bySurname >= 0) return candidates[bySurname]

  const partial = names.findIndex((n) => n !== '' && (n.includes(key) || key.includes(n)))
  if (partial >= 0) return candidates[partial]

  return undefined
}

export function resolvePick(
  pick: string,
  leaderboard: readonly LeaderboardEntry[]
): { position: number; cut: boolean } {
  const entry = matchName(pick, leaderboard, (e) => e.name)
  if (!entry) return { position: NOT_FOUND, cut: false }
  return { position: entry.position, cut: entry.cut }
}

export function resolveRank(pick: string, rankings: Rankings): { rank: number; found: boolean } {
  const hit = matchName(pick, Object.entries(rankings), ([name]) => name)
  if (!hit) return { rank: NOT_FOUND, found: false }
  return { rank: hit[1], found: true }
}
