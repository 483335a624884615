import { describe, expect, it } from 'vitest'
import type { LeaderboardEntry } from './types'
import { matchName, normalizeName, resolvePick, resolveRank } from './matching'

const entry = (name: string, position: number, cut = false): LeaderboardEntry => ({
  name, position, cut, score: 'E', thru: '-', rounds: [],
})

describe('normalizeName', () => {
  it('lowercases and trims', () => {
    expect(normalizeName('  Rory McIlroy ')).toBe('rory mcilroy')
  })
})

describe('resolvePick', () => {
  it('matches the full name exactly', () => {
    expect(resolvePick('Tiger Woods', [entry('Tiger Woods', 5)])).toEqual({ position: 5, cut: false })
  })

  it('matches a surname alone', () => {
    expect(resolvePick('woods', [entry('Tiger Woods', 5)])).toEqual({ position: 5, cut: false })
  })

  it('is case and whitespace insensitive', () => {
    expect(resolvePick('  TIGER woods ', [entry('Tiger Woods', 5)])).toEqual({ position: 5, cut: false })
  })

  it('returns the sentinel against an empty leaderboard', () => {
    expect(resolvePick('Nobody Here', [])).toEqual({ position: 999, cut: false })
  })

  it('returns the sentinel when nothing matches', () => {
    expect(resolvePick('Nobody Here', [entry('Tiger Woods', 5)])).toEqual({ position: 999, cut: false })
  })

  it('carries the cut flag of the matched entry', () => {
    expect(resolvePick('Jon Rahm', [entry('Jon Rahm', 999, true)])).toEqual({ position: 999, cut: true })
  })

  it('prefers an exact full name over an earlier surname hit', () => {
    const board = [entry('Davis Thompson', 3), entry('Thompson', 8)]
    expect(resolvePick('Thompson', board).position).toBe(8)
  })

  it('takes the first surname match in feed order', () => {
    const board = [entry('Matt Fitzpatrick', 12), entry('Alex Fitzpatrick', 4)]
    expect(resolvePick('Fitzpatrick', board).position).toBe(12)
  })

  it('prefers a surname match over an earlier substring match', () => {
    const board = [entry('Kim Simpson-Lee', 2), entry('Webb Simpson', 30)]
    expect(resolvePick('simpson', board).position).toBe(30)
  })

  it('falls back to containment in either direction', () => {
    const board = [entry('Ludvig Åberg', 7), entry('Xander Schauffele', 2)]
    expect(resolvePick('Schauff', board).position).toBe(2)
    expect(resolvePick('Xander Schauffele Jr.', board).position).toBe(2)
  })

  it('never matches a blank pick', () => {
    expect(resolvePick('   ', [entry('Tiger Woods', 5)])).toEqual({ position: 999, cut: false })
  })
})

describe('resolveRank', () => {
  const rankings = { 'scottie scheffler': 1, 'rory mcilroy': 2, 'tommy fleetwood': 9 }

  it('finds an exact name', () => {
    expect(resolveRank('Rory McIlroy', rankings)).toEqual({ rank: 2, found: true })
  })

  it('finds a surname', () => {
    expect(resolveRank('Fleetwood', rankings)).toEqual({ rank: 9, found: true })
  })

  it('reports unranked golfers as 999', () => {
    expect(resolveRank('Amateur Player', rankings)).toEqual({ rank: 999, found: false })
  })
})

describe('matchName', () => {
  it('works over any candidate shape', () => {
    const hit = matchName('mcil', [{ id: 1, label: 'Rory McIlroy' }], (c) => c.label)
    expect(hit).toEqual({ id: 1, label: 'Rory McIlroy' })
  })
})
