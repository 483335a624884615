import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { HistoryRecord, LeaderboardEntry, PoolState } from './types'
import { AppError } from './errors'
import { PoolService } from './pool'
import { MemoryStore, testSettings } from '@/test/memoryStore'

const picks = (prefix: string) => [1, 2, 3, 4, 5, 6].map((n) => `${prefix} ${n}`)

const entry = (name: string, position: number): LeaderboardEntry => ({
  name, position, cut: false, score: 'E', thru: '-', rounds: [],
})

const leaderboard = [...picks('Ann'), ...picks('Bob')].map((name, i) => entry(name, i + 1))

// Fails the first save that matches, then behaves
class FailingStore extends MemoryStore {
  failSave: ((pool: PoolState) => boolean) | null = null
  failAppends = 0

  async savePool(pool: PoolState): Promise<void> {
    if (this.failSave?.(pool)) {
      this.failSave = null
      throw new Error('disk full')
    }
    return super.savePool(pool)
  }

  async appendHistory(record: HistoryRecord): Promise<void> {
    if (this.failAppends > 0) {
      this.failAppends--
      throw new Error('disk full')
    }
    return super.appendHistory(record)
  }
}

let store: MemoryStore
let service: PoolService

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {})
  store = new MemoryStore()
  service = new PoolService({ store, tiebreak: 'all' })
})

async function rejection(promise: Promise<unknown>): Promise<AppError> {
  const err = await promise.then(
    () => null,
    (e: unknown) => e
  )
  if (!(err instanceof AppError)) throw new Error('expected an AppError')
  return err
}

describe('submitEntry', () => {
  it('appends the participant in entry order', async () => {
    await service.submitEntry({ name: 'Ann', picks: picks('Ann') })
    await service.submitEntry({ name: 'Bob', picks: picks('Bob') })
    expect(store.pool.participants.map((p) => p.name)).toEqual(['Ann', 'Bob'])
  })

  it('rejects a duplicate name regardless of case', async () => {
    await service.submitEntry({ name: 'Ann', picks: picks('Ann') })
    const err = await rejection(service.submitEntry({ name: 'ANN', picks: picks('Bob') }))
    expect(err.statusCode).toBe(409)
    expect(err.message).toBe('ANN has already entered picks.')
    expect(store.pool.participants).toHaveLength(1)
  })

  it('refuses entries once locked', async () => {
    await service.setLocked(true)
    const err = await rejection(service.submitEntry({ name: 'Ann', picks: picks('Ann') }))
    expect(err.statusCode).toBe(423)
  })

  it('keeps every entry from concurrent submissions', async () => {
    await Promise.all(
      ['Ann', 'Bob', 'Cat', 'Dan'].map((name) => service.submitEntry({ name, picks: picks(name) }))
    )
    expect(store.pool.participants.map((p) => p.name)).toEqual(['Ann', 'Bob', 'Cat', 'Dan'])
  })
})

describe('editEntry and deleteEntry', () => {
  beforeEach(async () => {
    await service.submitEntry({ name: 'Ann', picks: picks('Ann') })
  })

  it('replaces picks for a case-insensitive name', async () => {
    await service.editEntry({ name: 'ann', picks: picks('Bob') })
    expect(store.pool.participants).toEqual([{ name: 'Ann', picks: picks('Bob') }])
  })

  it('reports an unknown participant', async () => {
    const err = await rejection(service.editEntry({ name: 'Zed', picks: picks('Bob') }))
    expect(err.statusCode).toBe(404)
    expect(err.message).toBe('Participant not found.')
  })

  it('deletes by name and ignores unknown names', async () => {
    await service.deleteEntry('Zed')
    expect(store.pool.participants).toHaveLength(1)
    await service.deleteEntry('ANN')
    expect(store.pool.participants).toEqual([])
  })

  it('refuses edits and deletes once locked', async () => {
    await service.setLocked(true)
    expect((await rejection(service.editEntry({ name: 'Ann', picks: picks('Bob') }))).statusCode).toBe(423)
    expect((await rejection(service.deleteEntry('Ann'))).statusCode).toBe(423)
  })
})

describe('updateTournament', () => {
  it('saves settings and a new entry fee', async () => {
    const settings = { ...testSettings, name: 'Fall Open' }
    const result = await service.updateTournament({ settings, entryFee: 40 })
    expect(result.pool.entryFee).toBe(40)
    expect(store.settings).toEqual(settings)
    expect(store.pool.entryFee).toBe(40)
  })

  it('leaves the fee alone when none is given', async () => {
    await service.updateTournament({ settings: testSettings })
    expect(store.pool.entryFee).toBe(25)
  })
})

describe('archive', () => {
  it('records standings and resets the pool', async () => {
    await service.submitEntry({ name: 'Bob', picks: picks('Bob') })
    await service.submitEntry({ name: 'Ann', picks: picks('Ann') })
    await service.setLocked(true)

    const record = await service.archive(leaderboard, 2026)

    expect(record).toEqual({
      tournamentName: 'Spring Classic',
      dates: 'Apr 9–12',
      year: 2026,
      results: [
        { name: 'Ann', place: '1st', prize: 25 },
        { name: 'Bob', place: '2nd', prize: 25 },
      ],
    })
    expect(store.history).toEqual([record])
    expect(store.pool).toEqual({ entryFee: 25, locked: false, participants: [] })
  })

  it('refuses an empty pool', async () => {
    const err = await rejection(service.archive(leaderboard, 2026))
    expect(err.code).toBe('empty_pool')
    expect(store.history).toEqual([])
  })

  it('refuses without a leaderboard and keeps the pool', async () => {
    await service.submitEntry({ name: 'Ann', picks: picks('Ann') })
    const err = await rejection(service.archive([], 2026))
    expect(err.code).toBe('no_leaderboard')
    expect(store.pool.participants).toHaveLength(1)
    expect(store.history).toEqual([])
  })
})

describe('archive after a failed write', () => {
  let flaky: FailingStore
  let pool: PoolService

  beforeEach(async () => {
    flaky = new FailingStore()
    pool = new PoolService({ store: flaky, tiebreak: 'all' })
    await pool.submitEntry({ name: 'Ann', picks: picks('Ann') })
    await pool.submitEntry({ name: 'Bob', picks: picks('Bob') })
  })

  it('leaves the pool untouched when the reset cannot be saved', async () => {
    flaky.failSave = (p) => p.pendingArchive !== undefined

    await expect(pool.archive(leaderboard, 2026)).rejects.toThrow('disk full')
    expect(flaky.history).toEqual([])
    expect(flaky.pool.participants).toHaveLength(2)

    await pool.archive(leaderboard, 2026)
    expect(flaky.history).toHaveLength(1)
    expect(flaky.pool).toEqual({ entryFee: 25, locked: false, participants: [] })
  })

  it('finishes a half-done archive on the next call without a leaderboard', async () => {
    flaky.failAppends = 1

    await expect(pool.archive(leaderboard, 2026)).rejects.toThrow('disk full')
    expect(flaky.history).toEqual([])
    expect(flaky.pool.participants).toEqual([])
    expect(flaky.pool.pendingArchive?.results.map((r) => r.name)).toEqual(['Ann', 'Bob'])

    const record = await pool.archive([], 2026)
    expect(record.results.map((r) => r.name)).toEqual(['Ann', 'Bob'])
    expect(flaky.history).toEqual([record])
    expect(flaky.pool.pendingArchive).toBeUndefined()
  })

  it('records one history entry when only clearing the marker failed', async () => {
    flaky.failSave = (p) => p.pendingArchive === undefined && p.participants.length === 0

    await expect(pool.archive(leaderboard, 2026)).rejects.toThrow('disk full')
    expect(flaky.history).toHaveLength(1)

    await pool.archive(leaderboard, 2026)
    expect(flaky.history).toHaveLength(1)
    expect(flaky.pool).toEqual({ entryFee: 25, locked: false, participants: [] })
  })
})
