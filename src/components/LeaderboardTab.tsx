import type { PickedGolfer } from '@/lib/dashboard'
import { NOT_FOUND } from '@/lib/types'
import { scoreClass } from '@/lib/scoring'

export function LeaderboardTab({ golfers }: { golfers: PickedGolfer[] }) {
  return (
    <div className="card">
      <div className="card-header"><div className="card-title">Live Leaderboard · All Picks</div></div>
      {golfers.length === 0 ? (
        <div className="empty-state">Leaderboard data will appear once the tournament begins</div>
      ) : (
        <table className="table">
          <thead>
            <tr><th>Pos</th><th>Player</th><th>Score</th><th>Thru</th><th>Rounds</th></tr>
          </thead>
          <tbody>
            {golfers.map((g) => (
              <tr key={g.name}>
                <td>{g.cut ? 'CUT' : g.position < NOT_FOUND ? g.position : '-'}</td>
                <td>
                  {g.name}
                  <span className="badge">{g.pickedBy.join(', ')}</span>
                </td>
                <td><span className={`score ${scoreClass(g.score)}`}>{g.score}</span></td>
                <td>{g.thru}</td>
                <td>{g.rounds.length ? g.rounds.slice(0, 4).join(' / ') : '-'}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </div>
  )
}
