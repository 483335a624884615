import { describe, expect, it } from 'vitest'
import type { HistoryRecord, PoolState, StandingsRow, TournamentSettings } from './types'
import { aggregateCareers, archivePool, buildHistoryRecord } from './history'

const settings: TournamentSettings = {
  name: 'Spring Classic',
  dates: 'Apr 9–12',
  course: 'Oak Hollow',
  espnEventId: '100',
}

const row = (name: string, place: string, prize: number): StandingsRow => ({
  name, place, prize, picks: [], sortKey: [],
})

const record = (tournamentName: string, results: [string, string, number][]): HistoryRecord => ({
  tournamentName,
  dates: '',
  year: 2026,
  results: results.map(([name, place, prize]) => ({ name, place, prize })),
})

describe('buildHistoryRecord', () => {
  it('copies name, place and prize from the standings', () => {
    expect(buildHistoryRecord(settings, [row('Ann', '1st', 50), row('Bob', '2nd', 25)], 2026)).toEqual({
      tournamentName: 'Spring Classic',
      dates: 'Apr 9–12',
      year: 2026,
      results: [
        { name: 'Ann', place: '1st', prize: 50 },
        { name: 'Bob', place: '2nd', prize: 25 },
      ],
    })
  })
})

describe('archivePool', () => {
  it('clears and unlocks the pool but keeps the fee', () => {
    const pool: PoolState = {
      entryFee: 25,
      locked: true,
      participants: [
        { name: 'Ann', picks: ['a', 'b', 'c', 'd', 'e', 'f'] },
        { name: 'Bob', picks: ['g', 'h', 'i', 'j', 'k', 'l'] },
      ],
    }
    const standings = [row('Bob', '1st', 25), row('Ann', '2nd', 25)]
    const result = archivePool(pool, standings, settings, 2026)

    expect(result.pool).toEqual({ entryFee: 25, locked: false, participants: [] })
    expect(result.record.results).toHaveLength(pool.participants.length)
    expect(pool.participants).toHaveLength(2)
  })
})

describe('aggregateCareers', () => {
  it('sums tournaments, wins, seconds and winnings', () => {
    const careers = aggregateCareers([
      record('One', [['X', '1st', 100], ['Y', '2nd', 25]]),
      record('Two', [['Y', '1st', 100], ['X', '2nd', 25]]),
    ])
    expect(careers.find((c) => c.name === 'X')).toEqual({
      name: 'X', tournaments: 2, wins: 1, seconds: 1, winnings: 125,
    })
  })

  it('orders by winnings, ties by first appearance', () => {
    const careers = aggregateCareers([
      record('One', [['Ann', '1st', 50], ['Bob', '2nd', 10], ['Cat', '3th', 0], ['Dan', '4th', 0]]),
      record('Two', [['Dan', '1st', 50], ['Cat', '2nd', 10], ['Bob', '3th', 0]]),
    ])
    expect(careers.map((c) => [c.name, c.winnings])).toEqual([
      ['Ann', 50],
      ['Dan', 50],
      ['Bob', 10],
      ['Cat', 10],
    ])
  })

  it('has no row for anyone never archived', () => {
    expect(aggregateCareers([])).toEqual([])
    expect(aggregateCareers([record('Empty', [])])).toEqual([])
  })

  it('counts places beyond second as appearances only', () => {
    const [cat] = aggregateCareers([record('One', [['Cat', '3th', 0]])])
    expect(cat).toEqual({ name: 'Cat', tournaments: 1, wins: 0, seconds: 0, winnings: 0 })
  })
})
