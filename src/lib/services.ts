import type { AppConfig } from './config'
import type { PoolStore } from './store'
import type { Rankings } from './types'
import { getConfig } from './config'
import { TtlCache } from './cache'
import { createRankingCache } from './owgr'
import { JsonFileStore } from './jsonStore'
import { SupabaseStore } from './supabaseStore'
import { createClient } from './supabase'
import { PoolService } from './pool'

export interface Services {
  config: AppConfig
  store: PoolStore
  pool: PoolService
  rankingCache: TtlCache<Rankings>
  playerNameCache: TtlCache<string[]>
}

function createStore(config: AppConfig): PoolStore {
  const defaults = { entryFee: config.entryFee, tournament: config.tournament }
  if (config.supabase) {
    console.log('[store] using Supabase')
    return new SupabaseStore(createClient(config.supabase.url, config.supabase.serviceKey), defaults)
  }
  console.log(`[store] using JSON files in ${config.dataDir}`)
  return new JsonFileStore(config.dataDir, defaults)
}

export function createServices(config: AppConfig = getConfig()): Services {
  const store = createStore(config)
  return {
    config,
    store,
    pool: new PoolService({ store, tiebreak: config.tiebreak }),
    rankingCache: createRankingCache(config.rankingsTtlMs),
    playerNameCache: new TtlCache<string[]>({
      ttlMs: config.rankingsTtlMs,
      isEmpty: (names) => names.length === 0,
    }),
  }
}

// One container per server process, built lazily on the first request
let services: Services | null = null

export function getServices(): Services {
  if (!services) services = createServices()
  return services
}
