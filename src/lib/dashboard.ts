import type {
  LeaderboardEntry,
  LiveTournament,
  PoolState,
  Rankings,
  StandingsRow,
  Tiebreak,
  TournamentSettings,
} from './types'
import type { Services } from './services'
import type { LeaderboardResult } from './espn'
import { fetchLeaderboard } from './espn'
import { fetchRankings } from './owgr'
import { resolvePick, resolveRank } from './matching'
import { buildPickedBy, computeStandings, formatPosition } from './scoring'

export interface PickView {
  name: string
  rank: number
  rankFound: boolean
  position: string       // "T4" or "-"
}

export interface ParticipantView {
  name: string
  entry: string[]        // picks in the order they were entered
  picks: PickView[]      // by world ranking, best first
}

export interface PickedGolfer extends LeaderboardEntry {
  pickedBy: string[]
}

export interface DashboardData {
  settings: TournamentSettings
  tournament: LiveTournament
  entryFee: number
  locked: boolean
  pot: number
  standings: StandingsRow[]
  leaderboard: PickedGolfer[]
  participants: ParticipantView[]
  updatedAt: string
}

export interface DashboardInput {
  settings: TournamentSettings
  pool: PoolState
  live: LeaderboardResult
  rankings: Rankings
  tiebreak: Tiebreak
  now: Date
}

export function assembleDashboard({ settings, pool, live, rankings, tiebreak, now }: DashboardInput): DashboardData {
  const { participants, entryFee } = pool

  // Only golfers somebody picked make the leaderboard card
  const leaderboard = live.players
    .map((p) => ({ ...p, pickedBy: buildPickedBy(p.name, participants) }))
    .filter((p) => p.pickedBy.length > 0)

  const views: ParticipantView[] = participants.map((p) => {
    const picks = p.picks.map((name) => {
      const { rank, found } = resolveRank(name, rankings)
      const { position } = resolvePick(name, live.players)
      return { name, rank, rankFound: found, position: formatPosition(position) }
    })
    picks.sort((a, b) => a.rank - b.rank)
    return { name: p.name, entry: [...p.picks], picks }
  })

  return {
    settings,
    tournament: live.tournament,
    entryFee,
    locked: pool.locked,
    pot: participants.length * entryFee,
    standings: computeStandings(participants, live.players, entryFee, { tiebreak }),
    leaderboard,
    participants: views,
    updatedAt: now.toISOString(),
  }
}

export async function buildDashboard(services: Services, now = new Date()): Promise<DashboardData> {
  const { config, pool: poolService, rankingCache } = services
  const [settings, pool] = await Promise.all([poolService.getTournament(), poolService.getPool()])

  const [live, rankings] = await Promise.all([
    fetchLeaderboard(settings, config.feedTimeoutMs),
    pool.participants.length
      ? rankingCache.getOrLoad(() => fetchRankings(config.feedTimeoutMs))
      : Promise.resolve<Rankings>({}),
  ])

  return assembleDashboard({ settings, pool, live, rankings, tiebreak: config.tiebreak, now })
}
