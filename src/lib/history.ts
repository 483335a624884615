import type { CareerTotal, HistoryRecord, PoolState, StandingsRow, TournamentSettings } from './types'

export function buildHistoryRecord(
  settings: TournamentSettings,
  standings: readonly StandingsRow[],
  year: number
): HistoryRecord {
  return {
    tournamentName: settings.name,
    dates: settings.dates,
    year,
    results: standings.map((s) => ({ name: s.name, place: s.place, prize: s.prize })),
  }
}

/**
 * Record the finished tournament and hand back an emptied, unlocked pool.
 * The entry fee carries over to the next tournament.
 */
export function archivePool(
  pool: PoolState,
  standings: readonly StandingsRow[],
  settings: TournamentSettings,
  year: number
): { pool: PoolState; record: HistoryRecord } {
  return {
    record: buildHistoryRecord(settings, standings, year),
    pool: { entryFee: pool.entryFee, locked: false, participants: [] },
  }
}

/**
 * Career totals across every archived tournament, most winnings first.
 * Equal winnings keep the order each name first appeared in.
 */
export function aggregateCareers(records: readonly HistoryRecord[]): CareerTotal[] {
  const totals = new Map<string, CareerTotal>()

  for (const record of records) {
    for (const r of record.results) {
      let t = totals.get(r.name)
      if (!t) {
        t = { name: r.name, tournaments: 0, wins: 0, seconds: 0, winnings: 0 }
        totals.set(r.name, t)
      }
      t.tournaments += 1
      t.winnings += r.prize
      if (r.place === '1st') t.wins += 1
      if (r.place === '2nd') t.seconds += 1
    }
  }

  return [...totals.values()].sort((a, b) => b.winnings - a.winnings)
}
