'use client'

import { useState } from 'react'
import type { FormEvent } from 'react'
import type { HistoryRecord, TournamentSettings } from '@/lib/types'
import { postJson } from '@/lib/clientApi'

interface AdminTabProps {
  settings: TournamentSettings
  entryFee: number
  locked: boolean
  participantCount: number
  onChanged: () => void
}

export function AdminTab({ settings, entryFee, locked, participantCount, onChanged }: AdminTabProps) {
  const [password, setPassword] = useState('')
  const [form, setForm] = useState({ ...settings, entryFee: String(entryFee) })
  const [busy, setBusy] = useState(false)
  const [msg, setMsg] = useState<{ text: string; error: boolean } | null>(null)

  const run = async <T,>(url: string, body: unknown, success: (data: T) => string) => {
    setBusy(true)
    const res = await postJson<T>(url, body, password)
    setBusy(false)
    setMsg(res.ok ? { text: success(res.data), error: false } : { text: res.error, error: true })
    if (res.ok) onChanged()
  }

  const handleLock = () => {
    const msgText = locked
      ? 'Unlock entries? Participants will be able to edit picks again.'
      : 'Lock entries? Participants will no longer be able to edit or add picks.'
    if (!confirm(msgText)) return
    return run('/api/lock', { locked: !locked }, () => (locked ? 'Entries unlocked' : 'Entries locked'))
  }

  const handleSettings = (e: FormEvent) => {
    e.preventDefault()
    return run('/api/tournament', form, () => 'Tournament settings saved')
  }

  const handleArchive = () => {
    if (!confirm(`Archive ${settings.name} and clear all ${participantCount} entries? This cannot be undone.`)) return
    return run<{ record: HistoryRecord }>('/api/archive', {}, (d) =>
      `Archived ${d.record.tournamentName} with ${d.record.results.length} results`)
  }

  const handleRefresh = () => run('/api/refresh', {}, () => 'Rankings and player names will reload')

  const field = (key: keyof typeof form, label: string) => (
    <div className="form-group">
      <label className="form-label" htmlFor={`admin-${key}`}>{label}</label>
      <input id={`admin-${key}`} className="form-input" value={form[key]}
        onChange={(e) => setForm((f) => ({ ...f, [key]: e.target.value }))} />
    </div>
  )

  return (
    <div>
      {msg && <div className={`alert ${msg.error ? 'alert-red' : 'alert-green'}`} role="status">{msg.text}</div>}

      <div className="card form-container">
        <div className="form-group">
          <label className="form-label" htmlFor="admin-password">Admin Password</label>
          <input id="admin-password" type="password" className="form-input" value={password}
            onChange={(e) => setPassword(e.target.value)} />
        </div>
      </div>

      <div className="grid-2">
        <div className="card">
          <div className="card-header"><div className="card-title">Tournament Settings</div></div>
          <form onSubmit={handleSettings}>
            {field('name', 'Tournament Name')}
            {field('dates', 'Dates')}
            {field('course', 'Course')}
            {field('espnEventId', 'ESPN Event ID')}
            {field('entryFee', 'Entry Fee ($)')}
            <button className="btn btn-green" type="submit" disabled={busy || !password}>Save Settings</button>
          </form>
        </div>

        <div className="card">
          <div className="card-header">
            <div className="card-title">Pool Controls</div>
            <span className="badge">{locked ? 'Locked' : 'Open'}</span>
          </div>
          <div style={{ display: 'flex', flexDirection: 'column', gap: 10 }}>
            <button className={`btn ${locked ? 'btn-green' : 'btn-danger'}`} onClick={handleLock} disabled={busy || !password}>
              {locked ? 'Unlock Entries' : 'Lock Entries'}
            </button>
            <button className="btn btn-outline" onClick={handleRefresh} disabled={busy || !password}>
              Refresh Rankings &amp; Player Names
            </button>
            <button className="btn btn-danger" onClick={handleArchive} disabled={busy || !password || participantCount === 0}>
              Archive Tournament &amp; Reset Pool
            </button>
          </div>
        </div>
      </div>
    </div>
  )
}
