import type { Services } from '@/lib/services'
import { getConfig } from '@/lib/config'
import { PoolService } from '@/lib/pool'
import { TtlCache } from '@/lib/cache'
import { createRankingCache } from '@/lib/owgr'
import { MemoryStore } from './memoryStore'

/** Services wired to an in-memory store, for route tests. */
export function createTestServices(env: Record<string, string | undefined> = {}, store = new MemoryStore()): Services {
  const config = getConfig(env)
  return {
    config,
    store,
    pool: new PoolService({ store, tiebreak: config.tiebreak }),
    rankingCache: createRankingCache(config.rankingsTtlMs),
    playerNameCache: new TtlCache<string[]>({ ttlMs: config.rankingsTtlMs }),
  }
}
