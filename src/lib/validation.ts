import type { HistoryRecord, HistoryResult, Participant, PoolState, TournamentSettings } from './types'
import { PICKS_PER_ENTRY } from './types'
import { badRequest } from './errors'

export interface EntryInput {
  name: string
  picks: string[]
}

type Json = Record<string, unknown>

function isObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function str(value: unknown): string {
  return typeof value === 'string' ? value.trim() : ''
}

// ─── Request bodies ──────────────────────────────────────────────────────────

/**
 * Accepts `{ name, picks: [...] }` or the form-style `{ name, pick1..pick6 }`.
 * Blank picks are dropped before counting.
 */
export function parseEntryInput(body: unknown): EntryInput {
  if (!isObject(body)) throw badRequest('Invalid request body')

  const name = str(body.name)
  const raw: unknown[] = Array.isArray(body.picks)
    ? body.picks
    : Array.from({ length: PICKS_PER_ENTRY }, (_, i) => body[`pick${i + 1}`])
  const picks = raw.map(str).filter(Boolean)

  if (!name) throw badRequest('Please enter your name.')
  if (picks.length < PICKS_PER_ENTRY) throw badRequest(`Please enter all ${PICKS_PER_ENTRY} picks.`)
  if (picks.length > PICKS_PER_ENTRY) throw badRequest(`Enter exactly ${PICKS_PER_ENTRY} picks.`)

  return { name, picks }
}

export function parseName(body: unknown): string {
  const name = isObject(body) ? str(body.name) : ''
  if (!name) throw badRequest('Please enter your name.')
  return name
}

export function parseLocked(body: unknown): boolean {
  if (!isObject(body) || typeof body.locked !== 'boolean') {
    throw badRequest('Expected { locked: boolean }')
  }
  return body.locked
}

export interface TournamentUpdate {
  settings: TournamentSettings
  entryFee?: number
}

// A non-negative integer, or a string of digits from a form field
function wholeDollars(value: unknown): number | null {
  if (typeof value === 'number') return Number.isInteger(value) && value >= 0 ? value : null
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return Number(value.trim())
  return null
}

export function parseTournamentUpdate(body: unknown, current: TournamentSettings): TournamentUpdate {
  if (!isObject(body)) throw badRequest('Invalid request body')

  const settings: TournamentSettings = {
    name: str(body.name) || current.name,
    dates: str(body.dates) || current.dates,
    course: str(body.course) || current.course,
    espnEventId: str(body.espnEventId) || current.espnEventId,
  }
  if (!/^\d+$/.test(settings.espnEventId)) throw badRequest('ESPN event id must be numeric')

  const fee = body.entryFee
  if (fee === undefined || fee === '') return { settings }
  const entryFee = wholeDollars(fee)
  if (entryFee === null) throw badRequest('Entry fee must be a whole number of dollars')
  return { settings, entryFee }
}

// ─── Stored documents ────────────────────────────────────────────────────────
// Files on disk are trusted only this far: anything malformed falls back

function toParticipant(value: unknown): Participant | null {
  if (!isObject(value) || typeof value.name !== 'string' || !Array.isArray(value.picks)) return null
  const picks = value.picks.filter((p): p is string => typeof p === 'string')
  return { name: value.name, picks }
}

export function toPoolState(value: unknown, defaultFee: number): PoolState {
  if (!isObject(value)) return { entryFee: defaultFee, locked: false, participants: [] }
  const fee = value.entryFee ?? value.entry_fee
  const participants = Array.isArray(value.participants) ? value.participants : []
  const pool: PoolState = {
    entryFee: typeof fee === 'number' && Number.isFinite(fee) ? fee : defaultFee,
    locked: value.locked === true,
    participants: participants.map(toParticipant).filter((p): p is Participant => p !== null),
  }
  const pending = toHistoryRecord(value.pendingArchive ?? value.pending_archive)
  if (pending) pool.pendingArchive = pending
  return pool
}

export function toTournamentSettings(value: unknown, defaults: TournamentSettings): TournamentSettings {
  if (!isObject(value)) return defaults
  return {
    name: str(value.name) || defaults.name,
    dates: str(value.dates) || defaults.dates,
    course: str(value.course) || defaults.course,
    espnEventId: str(value.espnEventId) || defaults.espnEventId,
  }
}

function toHistoryResult(value: unknown): HistoryResult | null {
  if (!isObject(value) || typeof value.name !== 'string' || typeof value.place !== 'string') return null
  return { name: value.name, place: value.place, prize: typeof value.prize === 'number' ? value.prize : 0 }
}

export function toHistoryRecord(value: unknown): HistoryRecord | null {
  if (!isObject(value) || typeof value.tournamentName !== 'string') return null
  const results = Array.isArray(value.results) ? value.results : []
  return {
    tournamentName: value.tournamentName,
    dates: typeof value.dates === 'string' ? value.dates : '',
    year: typeof value.year === 'number' ? value.year : 0,
    results: results.map(toHistoryResult).filter((r): r is HistoryResult => r !== null),
  }
}

export function toHistory(value: unknown): HistoryRecord[] {
  if (!Array.isArray(value)) return []
  return value.map(toHistoryRecord).filter((r): r is HistoryRecord => r !== null)
}
