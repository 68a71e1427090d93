import { describe, it, expect } from 'vitest'
import {
  groupNotesByOnset,
  chordEventPitches,
  DEFAULT_CHORD_GROUPING_TOLERANCE,
} from './noteGrouping'
import type { NoteEvent } from '../domain/types'

describe('noteGrouping', () => {
  const createNote = (
    start: number,
    pitch: number = 60,
    duration: number = 1,
    velocity: number = 80
  ): NoteEvent => ({ pitch, start, duration, velocity })

  describe('groupNotesByOnset', () => {
    it('returns no groups for empty input', () => {
      expect(groupNotesByOnset([])).toEqual([])
    })

    it('puts a single note in its own group', () => {
      const note = createNote(1.5)
      expect(groupNotesByOnset([note])).toEqual([{ start: 1.5, notes: [note] }])
    })

    it('splits onsets 0.0, 0.01, 0.5, 0.52 into two groups', () => {
      const notes = [createNote(0), createNote(0.01), createNote(0.5), createNote(0.52)]
      const groups = groupNotesByOnset(notes, 0.05)

      expect(groups).toHaveLength(2)
      expect(groups[0].notes.map((n) => n.start)).toEqual([0, 0.01])
      expect(groups[1].notes.map((n) => n.start)).toEqual([0.5, 0.52])
    })

    it('uses 50ms as the default tolerance', () => {
      expect(DEFAULT_CHORD_GROUPING_TOLERANCE).toBe(0.05)
      expect(groupNotesByOnset([createNote(0), createNote(0.04)])).toHaveLength(1)
      expect(groupNotesByOnset([createNote(0), createNote(0.06)])).toHaveLength(2)
    })

    it('sorts unsorted input by start time', () => {
      const notes = [createNote(2, 67), createNote(0, 60), createNote(2.01, 72), createNote(0.02, 64)]
      const groups = groupNotesByOnset(notes)

      expect(groups.map((g) => g.start)).toEqual([0, 2])
      expect(chordEventPitches(groups[0])).toEqual([60, 64])
      expect(chordEventPitches(groups[1])).toEqual([67, 72])
    })

    it('measures distance from the first note of the group, not the previous note', () => {
      // Each note is 30ms after the last, but the third is 60ms after the anchor
      const notes = [createNote(0), createNote(0.03), createNote(0.06)]
      const groups = groupNotesByOnset(notes, 0.05)

      expect(groups).toHaveLength(2)
      expect(groups[0].start).toBe(0)
      expect(groups[1].start).toBe(0.06)
    })

    it('keeps input order for notes with the same onset', () => {
      const notes = [createNote(0, 67), createNote(0, 60), createNote(0, 64)]
      expect(chordEventPitches(groupNotesByOnset(notes)[0])).toEqual([67, 60, 64])
    })

    it('has no upper bound on group size', () => {
      const notes = Array.from({ length: 12 }, (_, i) => createNote(0, 48 + i))
      const groups = groupNotesByOnset(notes)

      expect(groups).toHaveLength(1)
      expect(groups[0].notes).toHaveLength(12)
    })

    it('does not mutate the input array', () => {
      const notes = [createNote(1), createNote(0)]
      groupNotesByOnset(notes)
      expect(notes.map((n) => n.start)).toEqual([1, 0])
    })
  })
})
