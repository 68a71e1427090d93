// ─────────────────────────────────────────────────────────────────────────────
// Note Validation: Input policy for degenerate numeric note data
// ─────────────────────────────────────────────────────────────────────────────

import type { NoteEvent } from '../domain/types'

export const MIN_MIDI = 0
export const MAX_MIDI = 127

export interface SanitizedNotes {
  notes: NoteEvent[]
  dropped: NoteEvent[]
}

/**
 * Check whether a note can be placed on a timeline at all.
 * Velocity only needs to be finite here; range is fixed by clamping.
 */
export function isPlayableNote(note: NoteEvent): boolean {
  return (
    Number.isInteger(note.pitch) &&
    note.pitch >= MIN_MIDI &&
    note.pitch <= MAX_MIDI &&
    Number.isFinite(note.start) &&
    note.start >= 0 &&
    Number.isFinite(note.duration) &&
    note.duration > 0 &&
    Number.isFinite(note.velocity)
  )
}

export function clampVelocity(velocity: number): number {
  return Math.max(MIN_MIDI, Math.min(MAX_MIDI, Math.round(velocity)))
}

/**
 * Split incoming notes into playable ones (velocity clamped to 0-127 and
 * rounded) and rejected ones. Nothing is thrown; callers decide whether to
 * report the dropped notes.
 */
export function sanitizeNoteEvents(notes: readonly NoteEvent[]): SanitizedNotes {
  const valid: NoteEvent[] = []
  const dropped: NoteEvent[] = []

  for (const note of notes) {
    if (!isPlayableNote(note)) {
      dropped.push(note)
      continue
    }
    valid.push({ ...note, velocity: clampVelocity(note.velocity) })
  }

  return { notes: valid, dropped }
}
