// ─────────────────────────────────────────────────────────────────────────────
// Note Grouping: Cluster a flat note list into chord events by onset
// ─────────────────────────────────────────────────────────────────────────────

import type { ChordEvent, NoteEvent } from '../domain/types'

// Max onset distance (seconds) from a group's first note to count as "together"
export const DEFAULT_CHORD_GROUPING_TOLERANCE = 0.05

/**
 * Group notes into chord events based on onset proximity.
 *
 * Each group is anchored at the start of its first note. A note joins the
 * current group while it starts within `tolerance` of that anchor, so a slow
 * roll longer than the tolerance is split even if consecutive notes are close.
 */
export function groupNotesByOnset(
  notes: readonly NoteEvent[],
  tolerance: number = DEFAULT_CHORD_GROUPING_TOLERANCE
): ChordEvent[] {
  if (notes.length === 0) return []

  // Stable sort keeps input order for notes sharing an onset
  const sorted = [...notes].sort((a, b) => a.start - b.start)

  const groups: ChordEvent[] = []
  let anchor = sorted[0].start
  let current: NoteEvent[] = [sorted[0]]

  for (let i = 1; i < sorted.length; i++) {
    const note = sorted[i]

    if (Math.abs(note.start - anchor) <= tolerance) {
      current.push(note)
    } else {
      groups.push({ start: anchor, notes: current })
      anchor = note.start
      current = [note]
    }
  }

  // Don't forget the last group
  groups.push({ start: anchor, notes: current })

  return groups
}

/**
 * Pitches of a chord event, in the order the notes were grouped.
 */
export function chordEventPitches(event: ChordEvent): number[] {
  return event.notes.map((note) => note.pitch)
}
