import type { LeaderboardEntry, LiveTournament, TournamentSettings } from './types'
import { NOT_FOUND } from './types'

export const ESPN_SCOREBOARD_URL = 'https://site.api.espn.com/apis/site/v2/sports/golf/pga/scoreboard'

// Only the parts of ESPN's scoreboard payload we read
interface EspnLinescore {
  period?: number
  displayValue?: string
  linescores?: { period?: number }[]
}

interface EspnCompetitor {
  order?: number
  score?: string | number | null
  athlete?: { displayName?: string; fullName?: string }
  status?: { type?: { name?: string } }
  linescores?: EspnLinescore[]
}

interface EspnCompetition {
  status?: { type?: { description?: string } }
  competitors?: EspnCompetitor[]
}

export interface EspnEvent {
  name?: string
  date?: string
  courses?: { name?: string }[]
  competitions?: EspnCompetition[]
}

export interface EspnScoreboard {
  events?: EspnEvent[]
}

export interface LeaderboardResult {
  tournament: LiveTournament
  players: LeaderboardEntry[]
}

const HEADERS = { 'User-Agent': 'Mozilla/5.0', Accept: 'application/json' }

function isCutStatus(c: EspnCompetitor): boolean {
  const statusRaw = (c.status?.type?.name || '').toLowerCase()
  return statusRaw.includes('cut') || statusRaw.includes('wd') || statusRaw.includes('withdr')
}

// "F · R2" once all 18 holes of the latest round are in, otherwise "Thru 14 · R3"
function thruFor(lines: EspnLinescore[]): string {
  let thru = '-'
  for (const l of lines) {
    const holes = l.linescores || []
    if (!holes.length) continue
    const round = l.period ?? 1
    const hole = Math.max(...holes.map((h) => h.period ?? 0))
    thru = hole >= 18 ? `F · R${round}` : `Thru ${hole} · R${round}`
  }
  return thru
}

function positionFor(c: EspnCompetitor, cut: boolean): number {
  if (cut) return NOT_FOUND
  const order = c.order
  if (typeof order !== 'number' || !Number.isFinite(order) || order < 1) return NOT_FOUND
  return Math.min(Math.floor(order), NOT_FOUND)
}

export function parseCompetitor(c: EspnCompetitor): LeaderboardEntry {
  const lines = c.linescores || []
  const cut = isCutStatus(c)
  return {
    name: c.athlete?.displayName || c.athlete?.fullName || 'Unknown',
    position: positionFor(c, cut),
    score: c.score === undefined || c.score === null || c.score === '' ? 'E' : String(c.score),
    cut,
    thru: thruFor(lines),
    rounds: lines.map((l) => l.displayValue || '-'),
  }
}

/**
 * The event endpoint returns the event at the top level, the scoreboard
 * nests it under `events`. Accept either.
 */
export function parseLeaderboard(
  data: EspnEvent & EspnScoreboard,
  fallback: TournamentSettings
): LeaderboardResult {
  const event: EspnEvent = data.competitions ? data : data.events?.[0] ?? {}
  const competition = event.competitions?.[0] ?? {}
  const competitors = competition.competitors || []

  const tournament: LiveTournament = {
    name: event.name || fallback.name,
    date: event.date || '',
    status: competition.status?.type?.description || 'Scheduled',
    course: event.courses?.[0]?.name || fallback.course,
  }

  const players = competitors.map(parseCompetitor)
  players.sort((a, b) => a.position - b.position)
  return { tournament, players }
}

export function unavailableTournament(settings: TournamentSettings): LiveTournament {
  return {
    name: settings.name,
    date: '',
    status: 'Unable to fetch live data',
    course: settings.course,
  }
}

export async function fetchLeaderboard(
  settings: TournamentSettings,
  timeoutMs = 10_000
): Promise<LeaderboardResult> {
  try {
    const res = await fetch(`${ESPN_SCOREBOARD_URL}/${encodeURIComponent(settings.espnEventId)}`, {
      headers: HEADERS,
      cache: 'no-store',
      signal: AbortSignal.timeout(timeoutMs),
    })
    if (!res.ok) throw new Error(`ESPN responded ${res.status}`)
    const data: EspnEvent & EspnScoreboard = await res.json()
    return parseLeaderboard(data, settings)
  } catch (e) {
    console.error('[espn] leaderboard fetch error:', e)
    return { tournament: unavailableTournament(settings), players: [] }
  }
}

// Current and previous season, for broad autocomplete coverage before a tournament starts
export function playerNameUrls(now: Date): string[] {
  const year = now.getFullYear()
  return [
    `${ESPN_SCOREBOARD_URL}?dates=${year}0101-${year}1231&limit=20`,
    `${ESPN_SCOREBOARD_URL}?dates=${year - 1}0101-${year - 1}1231&limit=20`,
  ]
}

export function collectPlayerNames(boards: readonly EspnScoreboard[]): string[] {
  const names = new Set<string>()
  for (const board of boards) {
    for (const event of board.events || []) {
      for (const c of event.competitions?.[0]?.competitors || []) {
        const name = c.athlete?.displayName
        if (name) names.add(name)
      }
    }
  }
  return [...names].sort((a, b) => a.localeCompare(b))
}

export async function fetchPlayerNames(timeoutMs = 10_000, now = new Date()): Promise<string[]> {
  const boards: EspnScoreboard[] = []
  for (const url of playerNameUrls(now)) {
    try {
      const res = await fetch(url, { headers: HEADERS, signal: AbortSignal.timeout(timeoutMs) })
      if (!res.ok) throw new Error(`ESPN responded ${res.status}`)
      const board: EspnScoreboard = await res.json()
      boards.push(board)
    } catch (e) {
      console.warn('[espn] player names fetch warning:', e)
    }
  }
  const names = collectPlayerNames(boards)
  if (names.length) console.log(`[espn] loaded ${names.length} player names for autocomplete`)
  return names
}
