'use client'

import { useState } from 'react'
import type { FormEvent } from 'react'
import { PICKS_PER_ENTRY } from '@/lib/types'
import { postJson } from '@/lib/clientApi'

interface EntryFormProps {
  mode: 'enter' | 'edit'
  entryFee: number
  golferNames: string[]
  initialName?: string
  initialPicks?: string[]
  onSaved: () => void
  onCancel?: () => void
}

export function EntryForm({
  mode, entryFee, golferNames, initialName = '', initialPicks = [], onSaved, onCancel,
}: EntryFormProps) {
  const [name, setName] = useState(initialName)
  const [picks, setPicks] = useState<string[]>(
    Array.from({ length: PICKS_PER_ENTRY }, (_, i) => initialPicks[i] ?? '')
  )
  const [saving, setSaving] = useState(false)
  const [error, setError] = useState('')

  const setPick = (i: number, value: string) =>
    setPicks((prev) => prev.map((p, j) => (j === i ? value : p)))

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault()
    setSaving(true)
    setError('')
    const res = await postJson(mode === 'enter' ? '/api/picks' : '/api/edit', { name, picks })
    setSaving(false)
    if (!res.ok) {
      setError(res.error)
      return
    }
    if (mode === 'enter') {
      setName('')
      setPicks(Array.from({ length: PICKS_PER_ENTRY }, () => ''))
    }
    onSaved()
  }

  return (
    <div className="card form-container">
      <div className="card-header">
        <div className="card-title">
          {mode === 'enter' ? `Participant Entry · $${entryFee} Buy-in` : `Edit Picks for ${initialName}`}
        </div>
        {onCancel && <button className="btn btn-outline" type="button" onClick={onCancel}>Cancel</button>}
      </div>
      {error && <div className="alert alert-red" role="alert">{error}</div>}
      <form onSubmit={handleSubmit}>
        {mode === 'enter' && (
          <div className="form-group">
            <label className="form-label" htmlFor="entry-name">Your Name</label>
            <input id="entry-name" className="form-input" placeholder="Enter your name"
              value={name} onChange={(e) => setName(e.target.value)} required />
          </div>
        )}
        {picks.map((pick, i) => (
          <div key={i} className="form-group">
            <label className="form-label" htmlFor={`pick-${i + 1}`}>Pick #{i + 1}</label>
            <input id={`pick-${i + 1}`} className="form-input" placeholder="Golfer name" list="golfers"
              value={pick} onChange={(e) => setPick(i, e.target.value)} required />
          </div>
        ))}
        <button className="btn btn-green btn-block" type="submit" disabled={saving}>
          {saving ? 'Saving…' : mode === 'enter' ? 'Submit Picks' : 'Save Changes'}
        </button>
      </form>
      <datalist id="golfers">
        {golferNames.map((n) => <option key={n} value={n} />)}
      </datalist>
    </div>
  )
}
