'use client'

import { useState } from 'react'
import type { ParticipantView } from '@/lib/dashboard'
import { postJson } from '@/lib/clientApi'
import { EntryForm } from './EntryForm'

interface PicksTabProps {
  participants: ParticipantView[]
  locked: boolean
  entryFee: number
  golferNames: string[]
  onChanged: () => void
}

export function PicksTab({ participants, locked, entryFee, golferNames, onChanged }: PicksTabProps) {
  const [editing, setEditing] = useState<ParticipantView | null>(null)
  const [error, setError] = useState('')

  const handleDelete = async (name: string) => {
    if (!confirm(`Delete ${name} from the pool?`)) return
    const res = await postJson('/api/delete', { name })
    if (!res.ok) setError(res.error)
    onChanged()
  }

  // Cards list picks by world rank; the form edits them in entry order
  if (editing) {
    return (
      <EntryForm
        key={editing.name}
        mode="edit"
        entryFee={entryFee}
        golferNames={golferNames}
        initialName={editing.name}
        initialPicks={editing.entry}
        onSaved={() => { setEditing(null); onChanged() }}
        onCancel={() => setEditing(null)}
      />
    )
  }

  return (
    <div>
      {error && <div className="alert alert-red" role="alert">{error}</div>}
      <div className="card">
        <div className="card-header"><div className="card-title">Participants &amp; Picks</div></div>
        {participants.length === 0 ? (
          <div className="empty-state">No entries yet</div>
        ) : (
          <div className="participants-grid">
            {participants.map((p) => (
              <div key={p.name} className="participant-card">
                <div className="participant-name">{p.name}</div>
                {p.picks.map((pk, i) => (
                  <div key={`${pk.name}-${i}`} className="pick-item">
                    <span>
                      <span className="owgr-rank">{pk.rankFound ? `#${pk.rank}` : 'NR'}</span> {pk.name}
                    </span>
                    <span className="pick-pos">{pk.position}</span>
                  </div>
                ))}
                {locked ? (
                  <div className="badge badge-red">Picks locked - tournament in progress</div>
                ) : (
                  <div className="participant-actions">
                    <button className="btn btn-green" onClick={() => setEditing(p)}>Edit Picks</button>
                    <button className="btn btn-danger" onClick={() => handleDelete(p.name)}>Delete</button>
                  </div>
                )}
              </div>
            ))}
          </div>
        )}
      </div>
      {!locked && (
        <EntryForm mode="enter" entryFee={entryFee} golferNames={golferNames} onSaved={onChanged} />
      )}
    </div>
  )
}
