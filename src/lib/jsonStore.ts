import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import path from 'node:path'
import type { HistoryRecord, PoolState, TournamentSettings } from './types'
import type { PoolStore, StoreDefaults } from './store'
import { toHistory, toPoolState, toTournamentSettings } from './validation'

export const PICKS_FILE = 'picks.json'
export const TOURNAMENT_FILE = 'tournament.json'
export const HISTORY_FILE = 'history.json'

async function readJson(file: string): Promise<unknown> {
  try {
    return JSON.parse(await readFile(file, 'utf8'))
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return undefined
    console.error(`[store] could not read ${path.basename(file)}, using defaults:`, e)
    return undefined
  }
}

// Write-then-rename so a crash never leaves half a file behind
async function writeJson(file: string, data: unknown): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true })
  const tmp = `${file}.tmp`
  await writeFile(tmp, JSON.stringify(data, null, 2) + '\n', 'utf8')
  await rename(tmp, file)
}

/** Pool, settings and history as JSON files under one data directory. */
export class JsonFileStore implements PoolStore {
  constructor(
    private readonly dir: string,
    private readonly defaults: StoreDefaults
  ) {}

  private file(name: string): string {
    return path.join(this.dir, name)
  }

  async loadPool(): Promise<PoolState> {
    return toPoolState(await readJson(this.file(PICKS_FILE)), this.defaults.entryFee)
  }

  async savePool(pool: PoolState): Promise<void> {
    await writeJson(this.file(PICKS_FILE), pool)
  }

  async loadTournament(): Promise<TournamentSettings> {
    return toTournamentSettings(await readJson(this.file(TOURNAMENT_FILE)), this.defaults.tournament)
  }

  async saveTournament(settings: TournamentSettings): Promise<void> {
    await writeJson(this.file(TOURNAMENT_FILE), settings)
  }

  async loadHistory(): Promise<HistoryRecord[]> {
    return toHistory(await readJson(this.file(HISTORY_FILE)))
  }

  async appendHistory(record: HistoryRecord): Promise<void> {
    const history = await this.loadHistory()
    await writeJson(this.file(HISTORY_FILE), [...history, record])
  }
}
