import type { DashboardData } from '@/lib/dashboard'
import { formatMoney, formatPosition } from '@/lib/scoring'

const placeClass = (place: string) => (place === '1st' ? 'place-1' : place === '2nd' ? 'place-2' : '')

export function StatusCard({ data }: { data: DashboardData }) {
  return (
    <div className="card">
      <div className="card-header"><div className="card-title">Tournament Status</div></div>
      <div className="status-grid">
        {[
          ['Course', data.tournament.course],
          ['Status', data.tournament.status],
          ['Participants', String(data.participants.length)],
          ['Prize Pool', `$${data.pot}`],
        ].map(([label, value]) => (
          <div key={label} className="status-item">
            <div className="status-label">{label}</div>
            <div className="status-value">{value}</div>
          </div>
        ))}
      </div>
    </div>
  )
}

export function StandingsTab({ data }: { data: DashboardData }) {
  return (
    <div>
      <StatusCard data={data} />
      <div className="card">
        <div className="card-header"><div className="card-title">Pool Standings</div></div>
        {data.standings.length === 0 ? (
          <div className="empty-state">
            {data.participants.length
              ? 'Standings will update once the tournament begins'
              : 'No entries yet'}
          </div>
        ) : (
          <table className="table">
            <thead>
              <tr><th>Place</th><th>Name</th><th>Top Picks (Position)</th><th>Prize</th></tr>
            </thead>
            <tbody>
              {data.standings.map((s) => (
                <tr key={s.name}>
                  <td className={placeClass(s.place)}>{s.place}</td>
                  <td>{s.name}</td>
                  <td>
                    {s.picks.slice(0, 3).map((pk, i) => (
                      <span key={`${pk.name}-${i}`}>
                        {i > 0 && ' · '}
                        <span className={pk.unique ? 'pick-unique' : 'pick-shared'}>
                          {pk.name}
                          <span className="pick-pos">({formatPosition(pk.position)})</span>
                        </span>
                      </span>
                    ))}
                  </td>
                  <td>{s.prize > 0 ? <span className="prize">{formatMoney(s.prize)}</span> : '-'}</td>
                </tr>
              ))}
            </tbody>
          </table>
        )}
      </div>
    </div>
  )
}
