'use client'

import { useCallback, useEffect, useState } from 'react'
import type { DashboardData } from '@/lib/dashboard'
import { getJson } from '@/lib/clientApi'
import { StandingsTab } from '@/components/StandingsTab'
import { LeaderboardTab } from '@/components/LeaderboardTab'
import { PicksTab } from '@/components/PicksTab'
import { HistoryTab } from '@/components/HistoryTab'
import type { HistoryData } from '@/components/HistoryTab'
import { AdminTab } from '@/components/AdminTab'

const REFRESH_INTERVAL = 300_000 // 5 minutes

const TABS = [
  ['live', 'Standings'],
  ['leaderboard', 'Leaderboard'],
  ['picks', 'Picks'],
  ['history', 'History'],
  ['admin', 'Admin'],
] as const

type Tab = (typeof TABS)[number][0]

// ─── Auto-Refresh Countdown Hook ─────────────────────────────────────────────
function useCountdown(lastUpdated: Date | null, intervalMs: number) {
  const [secondsLeft, setSecondsLeft] = useState(intervalMs / 1000)

  useEffect(() => {
    if (!lastUpdated) return
    const tick = () => {
      const elapsed = Date.now() - lastUpdated.getTime()
      const remaining = Math.max(0, Math.ceil((intervalMs - elapsed) / 1000))
      setSecondsLeft(remaining)
    }
    tick()
    const id = setInterval(tick, 1000)
    return () => clearInterval(id)
  }, [lastUpdated, intervalMs])

  return secondsLeft
}

function formatCountdown(seconds: number): string {
  const m = Math.floor(seconds / 60)
  const s = seconds % 60
  return `${m}:${s < 10 ? '0' : ''}${s}`
}

// ─── Root App ─────────────────────────────────────────────────────────────────
export default function App() {
  const [tab, setTab] = useState<Tab>('live')
  const [data, setData] = useState<DashboardData | null>(null)
  const [history, setHistory] = useState<HistoryData | null>(null)
  const [golferNames, setGolferNames] = useState<string[]>([])
  const [loading, setLoading] = useState(false)
  const [error, setError] = useState('')
  const [lastUpdated, setLastUpdated] = useState<Date | null>(null)

  const secondsLeft = useCountdown(lastUpdated, REFRESH_INTERVAL)

  const loadDashboard = useCallback(async () => {
    setLoading(true)
    const res = await getJson<DashboardData>('/api/dashboard')
    if (res.ok) {
      setData(res.data)
      setError('')
    } else {
      setError(res.error)
    }
    setLastUpdated(new Date())
    setLoading(false)
  }, [])

  const loadHistory = useCallback(async () => {
    const res = await getJson<HistoryData>('/api/history')
    if (res.ok) setHistory(res.data)
  }, [])

  useEffect(() => {
    loadDashboard()
    const interval = setInterval(loadDashboard, REFRESH_INTERVAL)
    return () => clearInterval(interval)
  }, [loadDashboard])

  useEffect(() => {
    if (tab === 'history') loadHistory()
  }, [tab, loadHistory])

  useEffect(() => {
    (async () => {
      const res = await getJson<{ names: string[] }>('/api/players')
      if (res.ok) setGolferNames(res.data.names)
    })()
  }, [])

  const handleChanged = useCallback(async () => {
    await loadDashboard()
    await loadHistory()
  }, [loadDashboard, loadHistory])

  return (
    <div className="container">
      <div className="header">
        <div>
          <div className="page-title">
            Golf Pool · {data ? `${data.settings.name} ${data.settings.dates}` : 'Loading…'}
          </div>
          <div className="updated">
            Last Updated: {data ? new Date(data.updatedAt).toLocaleString() : '—'}
          </div>
        </div>
        <div className="refresh-area">
          <button className="btn btn-green" onClick={loadDashboard} disabled={loading}>
            <span className={loading ? 'spin' : ''}>↻</span> Refresh
          </button>
          <div className="countdown">Auto-refresh in {formatCountdown(secondsLeft)}</div>
        </div>
      </div>

      <nav className="tabs">
        {TABS.map(([id, label]) => (
          <button key={id} className={`tab ${tab === id ? 'active' : ''}`} onClick={() => setTab(id)}>
            {label}
          </button>
        ))}
      </nav>

      {error && <div className="alert alert-red">{error}</div>}

      {!data ? (
        <div className="card empty-state"><span className="spin">⛳</span> Loading…</div>
      ) : (
        <>
          {tab === 'live' && <StandingsTab data={data} />}
          {tab === 'leaderboard' && <LeaderboardTab golfers={data.leaderboard} />}
          {tab === 'picks' && (
            <PicksTab
              participants={data.participants}
              locked={data.locked}
              entryFee={data.entryFee}
              golferNames={golferNames}
              onChanged={loadDashboard}
            />
          )}
          {tab === 'history' && <HistoryTab history={history} />}
          {tab === 'admin' && (
            <AdminTab
              key={`${data.settings.espnEventId}-${data.entryFee}`}
              settings={data.settings}
              entryFee={data.entryFee}
              locked={data.locked}
              participantCount={data.participants.length}
              onChanged={handleChanged}
            />
          )}
        </>
      )}
    </div>
  )
}
