import type { CareerTotal, HistoryRecord } from '@/lib/types'
import { formatMoney } from '@/lib/scoring'

export interface HistoryData {
  records: HistoryRecord[]   // newest first
  careers: CareerTotal[]
}

export function HistoryTab({ history }: { history: HistoryData | null }) {
  if (!history || history.records.length === 0) {
    return (
      <div className="card empty-state">
        No past tournaments yet. Archive one from the Admin tab to start the career ledger.
      </div>
    )
  }

  return (
    <div>
      <div className="card">
        <div className="card-header"><div className="card-title">Career Standings</div></div>
        <table className="table">
          <thead>
            <tr><th>Name</th><th>Tournaments</th><th>Wins</th><th>2nds</th><th>Winnings</th></tr>
          </thead>
          <tbody>
            {history.careers.map((c) => (
              <tr key={c.name}>
                <td><strong>{c.name}</strong></td>
                <td>{c.tournaments}</td>
                <td>{c.wins}</td>
                <td>{c.seconds}</td>
                <td className="prize">{c.winnings > 0 ? `$${c.winnings}` : '$0'}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>

      {history.records.map((h, i) => (
        <div key={`${h.tournamentName}-${h.year}-${i}`} className="card">
          <div className="card-header">
            <div className="card-title">{h.tournamentName}</div>
            <span className="updated">{h.dates}{h.dates.includes(String(h.year)) ? '' : ` ${h.year}`}</span>
          </div>
          <table className="table">
            <thead><tr><th>Place</th><th>Name</th><th>Prize</th></tr></thead>
            <tbody>
              {h.results.map((r) => (
                <tr key={r.name}>
                  <td>{r.place}</td>
                  <td>{r.name}</td>
                  <td>{formatMoney(r.prize)}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      ))}
    </div>
  )
}
