import type { HistoryRecord, PoolState, TournamentSettings } from './types'

/**
 * Persistence for the pool. Implementations read defaults from config when
 * nothing has been saved yet.
 */
export interface PoolStore {
  loadPool(): Promise<PoolState>
  savePool(pool: PoolState): Promise<void>
  loadTournament(): Promise<TournamentSettings>
  saveTournament(settings: TournamentSettings): Promise<void>
  loadHistory(): Promise<HistoryRecord[]>
  appendHistory(record: HistoryRecord): Promise<void>
}

export interface StoreDefaults {
  entryFee: number
  tournament: TournamentSettings
}
