import type { LeaderboardEntry, Participant, RankedPick, StandingsRow, Tiebreak } from './types'
import { NOT_FOUND } from './types'
import { normalizeName, resolvePick } from './matching'

export function formatPosition(position: number): string {
  return position < NOT_FOUND ? `T${position}` : '-'
}

export function formatMoney(v: number): string {
  return v > 0 ? `$${v}` : '-'
}

// ESPN score strings: "-12", "E", "+3", or "-" before a golfer tees off
export function scoreClass(score: string): string {
  const s = score.trim()
  if (s.startsWith('-') && s.length > 1) return 'under'
  if (s.startsWith('+')) return 'over'
  return 'even'
}

export function ordinalPlace(index: number): string {
  if (index === 0) return '1st'
  if (index === 1) return '2nd'
  return `${index + 1}th`
}

export function prizeFor(index: number, participantCount: number, entryFee: number): number {
  const pot = participantCount * entryFee
  if (participantCount === 1) return pot
  if (index === 0) return pot - entryFee
  if (index === 1) return entryFee
  return 0
}

export function countPicks(participants: readonly Participant[]): Map<string, number> {
  const counts = new Map<string, number>()
  for (const p of participants) {
    for (const pick of p.picks) {
      const key = normalizeName(pick)
      counts.set(key, (counts.get(key) ?? 0) + 1)
    }
  }
  return counts
}

/**
 * Which participants picked a leaderboard golfer. Uses loose containment,
 * so "Woods" is credited to every golfer named Woods.
 */
export function buildPickedBy(
  golferName: string,
  participants: readonly Participant[]
): string[] {
  const name = normalizeName(golferName)
  const pickers: string[] = []
  for (const p of participants) {
    const hit = p.picks.some((pick) => {
      const key = normalizeName(pick)
      return key !== '' && (name.includes(key) || key.includes(name))
    })
    if (hit) pickers.push(p.name)
  }
  return pickers
}

export function compareSortKeys(a: readonly number[], b: readonly number[]): number {
  const len = Math.min(a.length, b.length)
  for (let i = 0; i < len; i++) {
    if (a[i] !== b[i]) return a[i] - b[i]
  }
  return a.length - b.length
}

export interface StandingsOptions {
  // 'unique' scores shared picks as NOT_FOUND when ranking
  tiebreak?: Tiebreak
}

/**
 * Pool standings: best pick wins, ties cascade to the next-best pick.
 * Returns [] until there are both participants and leaderboard data.
 */
export function computeStandings(
  participants: readonly Participant[],
  leaderboard: readonly LeaderboardEntry[],
  entryFee: number,
  options: StandingsOptions = {}
): StandingsRow[] {
  if (!participants.length || !leaderboard.length) return []

  const tiebreak = options.tiebreak ?? 'all'
  const counts = countPicks(participants)

  const rows = participants.map((participant) => {
    const picks: RankedPick[] = participant.picks.map((name) => {
      const { position, cut } = resolvePick(name, leaderboard)
      const unique = counts.get(normalizeName(name)) === 1
      return { name, position, cut, unique }
    })
    picks.sort((a, b) => a.position - b.position)

    const sortKey = tiebreak === 'unique'
      ? picks.map((p) => (p.unique ? p.position : NOT_FOUND)).sort((a, b) => a - b)
      : picks.map((p) => p.position)

    return { name: participant.name, picks, sortKey }
  })

  rows.sort((a, b) => compareSortKeys(a.sortKey, b.sortKey))

  return rows.map((row, i) => ({
    ...row,
    place: ordinalPlace(i),
    prize: prizeFor(i, participants.length, entryFee),
  }))
}
