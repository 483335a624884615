import type { HistoryRecord, PoolState, TournamentSettings } from './types'
import type { PoolStore, StoreDefaults } from './store'
import type { ServerSupabase } from './supabase'
import { AppError } from './errors'
import { toHistoryRecord, toPoolState, toTournamentSettings } from './validation'

// Single-row tables use id = 1; see supabase/schema.sql
const SINGLETON_ID = 1

type PoolRow = {
  id: number
  entry_fee: number
  locked: boolean
  participants: unknown
  pending_archive: unknown
  revision: number
}
type TournamentRow = { id: number; name: string; dates: string; course: string; espn_event_id: string }
type HistoryRow = { tournament_name: string; dates: string; year: number; results: unknown }

// Postgres unique_violation: another process created the row first
const UNIQUE_VIOLATION = '23505'

const staleWrite = () =>
  new AppError('The pool was changed by another request. Please try again.', 'stale_write', 409)

/**
 * The whole pool lives on one `pool_state` row, so each save is a single
 * statement. Saves are compare-and-set on `revision`: a pool loaded before
 * another server process wrote is rejected instead of overwriting that write.
 */
export class SupabaseStore implements PoolStore {
  constructor(
    private readonly supabase: ServerSupabase,
    private readonly defaults: StoreDefaults
  ) {}

  async loadPool(): Promise<PoolState> {
    const { data, error } = await this.supabase
      .from('pool_state')
      .select('id,entry_fee,locked,participants,pending_archive,revision')
      .eq('id', SINGLETON_ID)
      .maybeSingle()
    if (error) throw new Error(error.message)

    const row: PoolRow | null = data
    if (!row) return toPoolState(undefined, this.defaults.entryFee)
    const pool = toPoolState(
      {
        entryFee: row.entry_fee,
        locked: row.locked,
        participants: row.participants,
        pendingArchive: row.pending_archive,
      },
      this.defaults.entryFee
    )
    return { ...pool, revision: row.revision }
  }

  async savePool(pool: PoolState): Promise<void> {
    const values = {
      entry_fee: pool.entryFee,
      locked: pool.locked,
      participants: pool.participants,
      pending_archive: pool.pendingArchive ?? null,
    }

    if (pool.revision === undefined) {
      const { error } = await this.supabase
        .from('pool_state')
        .insert({ id: SINGLETON_ID, ...values, revision: 1 })
      if (error?.code === UNIQUE_VIOLATION) throw staleWrite()
      if (error) throw new Error(error.message)
      return
    }

    const { data, error } = await this.supabase
      .from('pool_state')
      .update({ ...values, revision: pool.revision + 1 })
      .eq('id', SINGLETON_ID)
      .eq('revision', pool.revision)
      .select('revision')
    if (error) throw new Error(error.message)
    const updated: { revision: number }[] = data ?? []
    if (!updated.length) throw staleWrite()
  }

  async loadTournament(): Promise<TournamentSettings> {
    const { data, error } = await this.supabase
      .from('tournament_settings')
      .select('id,name,dates,course,espn_event_id')
      .eq('id', SINGLETON_ID)
      .maybeSingle()
    if (error) throw new Error(error.message)

    const row: TournamentRow | null = data
    if (!row) return this.defaults.tournament
    return toTournamentSettings(
      { name: row.name, dates: row.dates, course: row.course, espnEventId: row.espn_event_id },
      this.defaults.tournament
    )
  }

  async saveTournament(settings: TournamentSettings): Promise<void> {
    const { error } = await this.supabase.from('tournament_settings').upsert(
      {
        id: SINGLETON_ID,
        name: settings.name,
        dates: settings.dates,
        course: settings.course,
        espn_event_id: settings.espnEventId,
      },
      { onConflict: 'id' }
    )
    if (error) throw new Error(error.message)
  }

  async loadHistory(): Promise<HistoryRecord[]> {
    const { data, error } = await this.supabase
      .from('history')
      .select('tournament_name,dates,year,results')
      .order('created_at', { ascending: true })
    if (error) throw new Error(error.message)

    const rows: HistoryRow[] = data ?? []
    return rows
      .map((r) =>
        toHistoryRecord({ tournamentName: r.tournament_name, dates: r.dates, year: r.year, results: r.results })
      )
      .filter((r): r is HistoryRecord => r !== null)
  }

  async appendHistory(record: HistoryRecord): Promise<void> {
    const { error } = await this.supabase.from('history').insert({
      tournament_name: record.tournamentName,
      dates: record.dates,
      year: record.year,
      results: record.results,
    })
    if (error) throw new Error(error.message)
  }
}
