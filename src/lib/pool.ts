import type { HistoryRecord, LeaderboardEntry, PoolState, Tiebreak, TournamentSettings } from './types'
import type { PoolStore } from './store'
import type { EntryInput, TournamentUpdate } from './validation'
import { WriteLock } from './writeLock'
import { AppError, conflict, locked, notFound } from './errors'
import { computeStandings } from './scoring'
import { archivePool } from './history'

const sameName = (a: string, b: string) => a.toLowerCase() === b.toLowerCase()

const sameRecord = (a: HistoryRecord, b: HistoryRecord) => JSON.stringify(a) === JSON.stringify(b)

function withoutPendingArchive(pool: PoolState): PoolState {
  const next = { ...pool }
  delete next.pendingArchive
  return next
}

export interface PoolServiceOptions {
  store: PoolStore
  tiebreak: Tiebreak
  lock?: WriteLock
}

/**
 * Every mutation is a read-modify-write against the store, serialised
 * through one WriteLock so an edit can't interleave with an archive reset.
 */
export class PoolService {
  private readonly store: PoolStore
  private readonly tiebreak: Tiebreak
  private readonly lock: WriteLock

  constructor(options: PoolServiceOptions) {
    this.store = options.store
    this.tiebreak = options.tiebreak
    this.lock = options.lock ?? new WriteLock()
  }

  getPool(): Promise<PoolState> {
    return this.store.loadPool()
  }

  getTournament(): Promise<TournamentSettings> {
    return this.store.loadTournament()
  }

  getHistory(): Promise<HistoryRecord[]> {
    return this.store.loadHistory()
  }

  private mutate(fn: (pool: PoolState) => PoolState | Promise<PoolState>): Promise<PoolState> {
    return this.lock.run(async () => {
      const next = await fn(await this.store.loadPool())
      await this.store.savePool(next)
      return next
    })
  }

  submitEntry(entry: EntryInput): Promise<PoolState> {
    return this.mutate((pool) => {
      if (pool.locked) throw locked()
      if (pool.participants.some((p) => sameName(p.name, entry.name))) {
        throw conflict(`${entry.name} has already entered picks.`)
      }
      return { ...pool, participants: [...pool.participants, { name: entry.name, picks: entry.picks }] }
    })
  }

  // Name uniqueness is only checked on entry; edits match case-insensitively
  editEntry(entry: EntryInput): Promise<PoolState> {
    return this.mutate((pool) => {
      if (pool.locked) throw locked()
      const idx = pool.participants.findIndex((p) => sameName(p.name, entry.name))
      if (idx < 0) throw notFound('Participant not found.')
      const participants = pool.participants.map((p, i) => (i === idx ? { ...p, picks: entry.picks } : p))
      return { ...pool, participants }
    })
  }

  deleteEntry(name: string): Promise<PoolState> {
    return this.mutate((pool) => {
      if (pool.locked) throw locked()
      return { ...pool, participants: pool.participants.filter((p) => !sameName(p.name, name)) }
    })
  }

  setLocked(isLocked: boolean): Promise<PoolState> {
    return this.mutate((pool) => ({ ...pool, locked: isLocked }))
  }

  updateTournament(update: TournamentUpdate): Promise<{ settings: TournamentSettings; pool: PoolState }> {
    return this.lock.run(async () => {
      await this.store.saveTournament(update.settings)
      let pool = await this.store.loadPool()
      if (update.entryFee !== undefined && update.entryFee !== pool.entryFee) {
        pool = { ...pool, entryFee: update.entryFee }
        await this.store.savePool(pool)
      }
      return { settings: update.settings, pool }
    })
  }

  /**
   * Record final standings into history and reset the pool. Refuses when the
   * leaderboard is empty, since that would record no results for anyone.
   *
   * The reset pool is saved first, carrying the record as `pendingArchive`;
   * the record is appended and the marker cleared after. A failed attempt is
   * finished by the next call instead of archiving a second time.
   */
  archive(leaderboard: readonly LeaderboardEntry[], year: number): Promise<HistoryRecord> {
    return this.lock.run(async () => {
      const pool = await this.store.loadPool()
      if (pool.pendingArchive) return this.finishArchive(pool.pendingArchive, true)

      if (!pool.participants.length) {
        throw new AppError('There are no entries to archive.', 'empty_pool', 409)
      }
      if (!leaderboard.length) {
        throw new AppError('Leaderboard is unavailable; try again once live data loads.', 'no_leaderboard', 409)
      }

      const settings = await this.store.loadTournament()
      const standings = computeStandings(pool.participants, leaderboard, pool.entryFee, {
        tiebreak: this.tiebreak,
      })
      const archived = archivePool(pool, standings, settings, year)
      await this.store.savePool({ ...archived.pool, revision: pool.revision, pendingArchive: archived.record })
      return this.finishArchive(archived.record, false)
    })
  }

  // Caller holds the lock
  private async finishArchive(record: HistoryRecord, resumed: boolean): Promise<HistoryRecord> {
    // A resumed archive may have appended before failing to clear the marker
    const history = resumed ? await this.store.loadHistory() : []
    const last = history[history.length - 1]
    if (!last || !sameRecord(last, record)) await this.store.appendHistory(record)

    await this.store.savePool(withoutPendingArchive(await this.store.loadPool()))
    console.log(`[pool] archived ${record.tournamentName} with ${record.results.length} results`)
    return record
  }
}
