export const PICKS_PER_ENTRY = 6

// Position/rank given to anything the feed does not place: cut, WD, or no match
export const NOT_FOUND = 999

export type Tiebreak = 'all' | 'unique'

export interface Participant {
  name: string
  picks: string[]
}

export interface PoolState {
  entryFee: number
  locked: boolean
  participants: Participant[]
  // Set between resetting the pool and appending its history record
  pendingArchive?: HistoryRecord
  // Compare-and-set token from stores shared across server processes
  revision?: number
}

export interface TournamentSettings {
  name: string
  dates: string          // display string, e.g. "Feb 19–22, 2026"
  course: string         // fallback when ESPN doesn't return one
  espnEventId: string
}

export interface LiveTournament {
  name: string
  date: string
  status: string
  course: string
}

export interface LeaderboardEntry {
  name: string
  position: number       // 1 = leader, NOT_FOUND for cut/wd/unknown
  score: string          // ESPN display string: "-12", "E", "+3"
  cut: boolean
  thru: string           // "F · R4", "Thru 14 · R3", "-"
  rounds: string[]       // per-round display values
}

export interface RankedPick {
  name: string
  position: number
  cut: boolean
  unique: boolean
}

export interface StandingsRow {
  name: string
  picks: RankedPick[]    // best position first
  sortKey: number[]
  place: string
  prize: number
}

export interface HistoryResult {
  name: string
  place: string
  prize: number
}

export interface HistoryRecord {
  tournamentName: string
  dates: string
  year: number
  results: HistoryResult[]
}

export interface CareerTotal {
  name: string
  tournaments: number
  wins: number
  seconds: number
  winnings: number
}

export type Rankings = Record<string, number>
